/**
 * Scraping Utilities - Barrel Export
 *
 * - Fetch error taxonomy and job error codes
 * - Retry with backoff behind the host circuit breaker
 * - Request headers and user-agent rotation
 */

export type { FetchErrorKind, FetchErrorOptions, ScrapeErrorCode } from './errors';
export {
  SCRAPE_ERROR_CODES,
  FetchError,
  ScrapeError,
  toScrapeError,
  classifyFetchFailure,
  parseRetryAfter,
  cancelledError,
  throwIfCancelled,
} from './errors';

export type { BackendKind, AttemptOutcome, FetchAttempt, RetryPolicy, RetryContext } from './retry';
export { backoffDelay, sleep, withRetry } from './retry';

export { USER_AGENTS, UserAgentRotator, buildRequestHeaders } from './headers';
