/**
 * Scraping Error Handling
 * Fetch failure taxonomy, job error codes and classification helpers
 */

export type FetchErrorKind = 'Timeout' | 'Network' | 'HTTPStatus' | 'CircuitOpen' | 'Render';

export interface FetchErrorOptions {
  url?: string;
  statusCode?: number;
  retryAfterMs?: number;
  /** false when the failure says nothing about the remote host (e.g. browser pool exhausted) */
  hostFailure?: boolean;
  cause?: unknown;
}

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url?: string;
  readonly statusCode?: number;
  readonly retryAfterMs?: number;
  readonly hostFailure: boolean;

  constructor(kind: FetchErrorKind, message: string, options: FetchErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.url = options.url;
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
    this.hostFailure = options.hostFailure ?? defaultHostFailure(kind, options.statusCode);
  }

  /**
   * 5xx and 429 are worth another try, other 4xx are not
   */
  get retryable(): boolean {
    switch (this.kind) {
      case 'Timeout':
      case 'Network':
      case 'Render':
        return true;
      case 'HTTPStatus':
        return this.statusCode !== undefined && (this.statusCode >= 500 || this.statusCode === 429);
      case 'CircuitOpen':
        return false;
    }
  }
}

function defaultHostFailure(kind: FetchErrorKind, statusCode?: number): boolean {
  if (kind === 'CircuitOpen') return false;
  if (kind === 'HTTPStatus' && statusCode !== undefined) {
    return statusCode >= 500 || statusCode === 429;
  }
  return true;
}

export const SCRAPE_ERROR_CODES = [
  'InvalidInput',
  'QueueFull',
  'Throttled',
  'Timeout',
  'Network',
  'HTTPStatus',
  'CircuitOpen',
  'RobotsDisallowed',
  'RenderError',
  'Cancelled',
  'Internal',
  'NotFound',
  'NotReady',
  'AlreadyTerminal',
] as const;

export type ScrapeErrorCode = (typeof SCRAPE_ERROR_CODES)[number];

export class ScrapeError extends Error {
  readonly code: ScrapeErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ScrapeErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ScrapeError';
    this.code = code;
    this.details = details;
  }
}

export function cancelledError(): ScrapeError {
  return new ScrapeError('Cancelled', 'Job was cancelled');
}

/**
 * Cooperative cancellation check used at every suspension point
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancelledError();
  }
}

const FETCH_KIND_TO_CODE: Record<FetchErrorKind, ScrapeErrorCode> = {
  Timeout: 'Timeout',
  Network: 'Network',
  HTTPStatus: 'HTTPStatus',
  CircuitOpen: 'CircuitOpen',
  Render: 'RenderError',
};

/**
 * Convert anything thrown below the job manager into a job-level error.
 * Unknown errors become `Internal` with a generic message.
 */
export function toScrapeError(error: unknown): ScrapeError {
  if (error instanceof ScrapeError) {
    return error;
  }

  if (error instanceof FetchError) {
    return new ScrapeError(FETCH_KIND_TO_CODE[error.kind], error.message, {
      ...(error.statusCode !== undefined && { statusCode: error.statusCode }),
    });
  }

  return new ScrapeError('Internal', 'Internal error while processing job');
}

const TIMEOUT_MARKERS = ['timeout', 'ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT'];
const NETWORK_MARKERS = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'fetch failed',
  'network',
];

function errorText(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause;
  const causeCode =
    typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string'
      ? cause.code
      : '';
  const causeMessage = cause instanceof Error ? cause.message : '';
  return `${error.name} ${error.message} ${causeCode} ${causeMessage}`;
}

/**
 * Classify a raw transport error thrown by fetch or the browser
 */
export function classifyFetchFailure(error: unknown, url?: string): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  const text = errorText(error);

  if (error instanceof Error && error.name === 'TimeoutError') {
    return new FetchError('Timeout', 'Request timed out', { url, cause: error });
  }

  if (TIMEOUT_MARKERS.some((marker) => text.toLowerCase().includes(marker.toLowerCase()))) {
    return new FetchError('Timeout', 'Request timed out', { url, cause: error });
  }

  if (NETWORK_MARKERS.some((marker) => text.toLowerCase().includes(marker.toLowerCase()))) {
    return new FetchError('Network', 'Network connection failed', { url, cause: error });
  }

  const message = error instanceof Error ? error.message : 'Unknown fetch failure';
  return new FetchError('Network', message, { url, cause: error });
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}
