/**
 * Fetch backend interface and shared types
 */

import type { BackendKind } from '../../../lib/scraping';

export interface FetchedPage {
  backend: BackendKind;
  markup: string;
  statusCode: number;
  finalUrl: string;
  headers: Record<string, string>;
  elapsedMs: number;
}

export interface FetchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * A backend either resolves with a page or rejects with FetchError
 * (or ScrapeError{Cancelled} once the signal has aborted)
 */
export interface FetchBackend {
  readonly kind: BackendKind;
  fetch(url: string, options: FetchOptions): Promise<FetchedPage>;
}
