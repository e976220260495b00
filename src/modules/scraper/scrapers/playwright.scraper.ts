/**
 * Playwright Scraper - dynamic backend
 * Renders the page in a pooled headless browser and returns the final DOM
 */

import { BrowserPool, RenderPage, RenderResponse } from '../../../lib/browser';
import { logger } from '../../../lib/logger';
import {
  FetchError,
  ScrapeError,
  cancelledError,
  throwIfCancelled,
} from '../../../lib/scraping';
import type { FetchBackend, FetchedPage, FetchOptions } from './types';

// A navigation timeout gets one more try inside the same attempt
const NAVIGATION_TRIES = 2;

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

export class PlaywrightBackend implements FetchBackend {
  readonly kind = 'dynamic' as const;
  private pool: BrowserPool;

  constructor(pool: BrowserPool) {
    this.pool = pool;
  }

  async fetch(url: string, options: FetchOptions): Promise<FetchedPage> {
    const { timeoutMs, signal } = options;
    const startTime = Date.now();
    const lease = await this.pool.acquire(signal);
    let page: RenderPage | undefined;

    const onAbort = (): void => {
      page?.close().catch((error: unknown) => logger.debug('Page close after cancel failed', { error: String(error) }));
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      page = await lease.browser.newPage();
      const response = await this.navigate(page, url, timeoutMs, signal);
      const statusCode = response?.status() ?? 200;

      if (statusCode >= 400) {
        throw new FetchError('HTTPStatus', `HTTP ${statusCode} from ${url}`, { url, statusCode });
      }

      const markup = await page.content();

      return {
        backend: this.kind,
        markup,
        statusCode,
        finalUrl: page.url(),
        headers: response?.headers() ?? {},
        elapsedMs: Date.now() - startTime,
      };
    } catch (error) {
      if (signal?.aborted) {
        throw cancelledError();
      }
      if (error instanceof FetchError || error instanceof ScrapeError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError('Render', `Browser render failed: ${message}`, { url, cause: error });
    } finally {
      signal?.removeEventListener('abort', onAbort);
      if (page) {
        await page.close().catch((error: unknown) => logger.debug('Page close failed', { error: String(error) }));
      }
      lease.release();
    }
  }

  private async navigate(
    page: RenderPage,
    url: string,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<RenderResponse | null> {
    for (let tries = 1; ; tries++) {
      throwIfCancelled(signal);
      try {
        return await page.goto(url, { waitUntil: 'networkidle', timeout: timeoutMs });
      } catch (error) {
        if (!isTimeoutError(error)) {
          throw error;
        }
        if (tries >= NAVIGATION_TRIES) {
          throw new FetchError('Timeout', `Navigation to ${url} timed out after ${timeoutMs}ms`, {
            url,
            cause: error,
          });
        }
        logger.debug(`Navigation to ${url} timed out, retrying once`);
      }
    }
  }
}
