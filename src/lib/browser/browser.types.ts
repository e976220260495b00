/**
 * Browser pool types
 *
 * The narrow surface the dynamic backend needs from a browser. Playwright's
 * Browser, Page and Response satisfy these structurally, and tests substitute
 * in-process fakes.
 */

export interface RenderResponse {
  status(): number;
  headers(): Record<string, string>;
}

export interface RenderPage {
  goto(
    url: string,
    options: { waitUntil: 'networkidle'; timeout: number }
  ): Promise<RenderResponse | null>;
  content(): Promise<string>;
  url(): string;
  close(): Promise<void>;
}

export interface RenderBrowser {
  newPage(): Promise<RenderPage>;
  close(): Promise<void>;
  isConnected(): boolean;
}

export type BrowserLauncher = () => Promise<RenderBrowser>;

export interface BrowserPoolConfig {
  size: number;
  acquireTimeoutMs: number;
  launcher?: BrowserLauncher;
}

/**
 * A checked-out browser; release() returns it to the pool (idempotent)
 */
export interface BrowserLease {
  handleId: number;
  browser: RenderBrowser;
  release: () => void;
}

export interface BrowserPoolStats {
  size: number;
  launched: number;
  busy: number;
  waiting: number;
  launches: number;
}
