/**
 * HTTP Scraper - static backend
 * Plain fetch with manual redirect handling; no browser involved
 */

import {
  FetchError,
  UserAgentRotator,
  buildRequestHeaders,
  cancelledError,
  classifyFetchFailure,
  parseRetryAfter,
  throwIfCancelled,
} from '../../../lib/scraping';
import type { FetchBackend, FetchedPage, FetchOptions } from './types';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const RETRY_AFTER_STATUSES = new Set([429, 503]);

export interface HttpBackendOptions {
  maxRedirects: number;
  userAgents: UserAgentRotator;
}

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

export class HttpBackend implements FetchBackend {
  readonly kind = 'static' as const;
  private maxRedirects: number;
  private userAgents: UserAgentRotator;

  constructor(options: HttpBackendOptions) {
    this.maxRedirects = options.maxRedirects;
    this.userAgents = options.userAgents;
  }

  async fetch(url: string, options: FetchOptions): Promise<FetchedPage> {
    const { timeoutMs, signal } = options;
    throwIfCancelled(signal);

    const startTime = Date.now();
    const controller = new AbortController();
    let timedOut = false;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const headers = buildRequestHeaders(this.userAgents.next());

    try {
      let currentUrl = url;

      for (let redirects = 0; ; redirects++) {
        const response = await fetch(currentUrl, {
          method: 'GET',
          headers,
          redirect: 'manual',
          signal: controller.signal,
        });

        if (REDIRECT_STATUSES.has(response.status)) {
          // Unread bodies hold the connection open
          await response.body?.cancel();
          const location = response.headers.get('location');
          if (!location) {
            throw new FetchError('Network', `Redirect from ${currentUrl} has no Location header`, { url });
          }
          if (redirects >= this.maxRedirects) {
            throw new FetchError('Network', `Too many redirects (more than ${this.maxRedirects})`, { url });
          }
          currentUrl = new URL(location, currentUrl).href;
          continue;
        }

        if (!response.ok) {
          await response.body?.cancel();
          throw new FetchError('HTTPStatus', `HTTP ${response.status} from ${currentUrl}`, {
            url,
            statusCode: response.status,
            retryAfterMs: RETRY_AFTER_STATUSES.has(response.status)
              ? parseRetryAfter(response.headers.get('retry-after'))
              : undefined,
          });
        }

        const markup = await response.text();

        return {
          backend: this.kind,
          markup,
          statusCode: response.status,
          finalUrl: currentUrl,
          headers: headersToRecord(response.headers),
          elapsedMs: Date.now() - startTime,
        };
      }
    } catch (error) {
      if (signal?.aborted) {
        throw cancelledError();
      }
      if (timedOut) {
        throw new FetchError('Timeout', `Request to ${url} timed out after ${timeoutMs}ms`, { url, cause: error });
      }
      throw classifyFetchFailure(error, url);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
