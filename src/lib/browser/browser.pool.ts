/**
 * Browser Pool
 * Fixed set of lazily launched headless browsers with FIFO checkout
 */

import { chromium } from 'playwright-core';
import { logger } from '../logger';
import { FetchError, cancelledError, throwIfCancelled } from '../scraping/errors';
import {
  BrowserLauncher,
  BrowserLease,
  BrowserPoolConfig,
  BrowserPoolStats,
  RenderBrowser,
} from './browser.types';

interface BrowserHandle {
  id: number;
  browser?: RenderBrowser;
  busy: boolean;
}

interface PoolWaiter {
  grant: (handle: BrowserHandle) => void;
  fail: (error: Error) => void;
}

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-extensions',
  '--disable-background-networking',
  '--mute-audio',
  '--no-first-run',
];

export const launchChromium: BrowserLauncher = () => chromium.launch({ headless: true, args: LAUNCH_ARGS });

export class BrowserPool {
  private handles: BrowserHandle[];
  private waiters: PoolWaiter[] = [];
  private launcher: BrowserLauncher;
  private acquireTimeoutMs: number;
  private launches: number = 0;
  private closed: boolean = false;

  constructor(config: BrowserPoolConfig) {
    this.handles = Array.from({ length: Math.max(1, config.size) }, (_, id) => ({ id, busy: false }));
    this.launcher = config.launcher ?? launchChromium;
    this.acquireTimeoutMs = config.acquireTimeoutMs;
  }

  /**
   * Check out a browser, launching (or relaunching a disconnected) one on demand.
   * Exhaustion queues the caller until a handle frees up or the acquire timeout passes.
   */
  async acquire(signal?: AbortSignal): Promise<BrowserLease> {
    if (this.closed) {
      throw new FetchError('Render', 'Browser pool is closed', { hostFailure: false });
    }
    throwIfCancelled(signal);

    const free = this.handles.find((handle) => !handle.busy);
    let handle: BrowserHandle;
    if (free) {
      free.busy = true;
      handle = free;
    } else {
      handle = await this.wait(signal);
    }

    let released = false;
    const release = (): void => {
      if (released) return;
      released = true;
      this.release(handle);
    };

    try {
      const browser = await this.ensureBrowser(handle);
      return { handleId: handle.id, browser, release };
    } catch (error) {
      release();
      throw error;
    }
  }

  /**
   * Scoped checkout; the browser goes back to the pool however `fn` settles
   */
  async withBrowser<T>(fn: (browser: RenderBrowser) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const lease = await this.acquire(signal);
    try {
      return await fn(lease.browser);
    } finally {
      lease.release();
    }
  }

  stats(): BrowserPoolStats {
    return {
      size: this.handles.length,
      launched: this.handles.filter((handle) => handle.browser?.isConnected()).length,
      busy: this.handles.filter((handle) => handle.busy).length,
      waiting: this.waiters.length,
      launches: this.launches,
    };
  }

  async close(): Promise<void> {
    this.closed = true;

    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      waiter.fail(new FetchError('Render', 'Browser pool is closed', { hostFailure: false }));
    }

    const results = await Promise.allSettled(
      this.handles.map(async (handle) => {
        const browser = handle.browser;
        handle.browser = undefined;
        if (browser) await browser.close();
      })
    );

    for (const result of results) {
      if (result.status === 'rejected') {
        logger.error('Failed to close browser:', result.reason);
      }
    }
  }

  private wait(signal?: AbortSignal): Promise<BrowserHandle> {
    return new Promise<BrowserHandle>((resolve, reject) => {
      const cleanup = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const waiter: PoolWaiter = {
        grant: (handle) => {
          cleanup();
          resolve(handle);
        },
        fail: (error) => {
          cleanup();
          reject(error);
        },
      };

      const onAbort = (): void => {
        cleanup();
        reject(cancelledError());
      };

      const timer = setTimeout(() => {
        cleanup();
        reject(
          new FetchError('Render', `No browser available within ${this.acquireTimeoutMs}ms`, {
            hostFailure: false,
          })
        );
      }, this.acquireTimeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private release(handle: BrowserHandle): void {
    const next = this.waiters.shift();
    if (next && !this.closed) {
      next.grant(handle);
      return;
    }
    handle.busy = false;
  }

  private async ensureBrowser(handle: BrowserHandle): Promise<RenderBrowser> {
    if (handle.browser && handle.browser.isConnected()) {
      return handle.browser;
    }

    if (handle.browser) {
      logger.warn(`Browser ${handle.id} disconnected, relaunching`);
    }

    try {
      const browser = await this.launcher();
      this.launches++;
      handle.browser = browser;
      logger.debug(`Browser ${handle.id} launched`);
      return browser;
    } catch (error) {
      handle.browser = undefined;
      throw new FetchError('Render', 'Failed to launch browser', { hostFailure: false, cause: error });
    }
  }
}
