/**
 * Retry utility with exponential backoff, guarded by the host circuit breaker
 */

import { HostCircuitBreaker } from '../circuit-breaker';
import { logger } from '../logger';
import { FetchError, FetchErrorKind, ScrapeError, cancelledError, throwIfCancelled } from './errors';

export type BackendKind = 'static' | 'dynamic';

export type AttemptOutcome =
  | 'success'
  | 'timeout'
  | 'network-error'
  | 'http-error'
  | 'render-error'
  | 'circuit-open';

export interface FetchAttempt {
  url: string;
  backend: BackendKind;
  attempt: number;
  outcome: AttemptOutcome;
  elapsedMs: number;
  statusCode?: number;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface RetryContext {
  url: string;
  backend: BackendKind;
  /** Every attempt, successful or not, is appended here */
  attempts: FetchAttempt[];
  breaker?: HostCircuitBreaker;
  signal?: AbortSignal;
  label?: string;
}

const OUTCOME_BY_KIND: Record<FetchErrorKind, AttemptOutcome> = {
  Timeout: 'timeout',
  Network: 'network-error',
  HTTPStatus: 'http-error',
  Render: 'render-error',
  CircuitOpen: 'circuit-open',
};

/**
 * Delay before the attempt that follows attempt `attempt` (1-based).
 * A server-provided Retry-After wins when it is longer, but never past the cap.
 */
export function backoffDelay(
  attempt: number,
  policy: RetryPolicy,
  retryAfterMs?: number,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
  const jittered = exponential + random() * policy.jitterMs;
  const wanted = retryAfterMs !== undefined ? Math.max(jittered, retryAfterMs) : jittered;
  return Math.min(policy.maxDelayMs, Math.round(wanted));
}

/**
 * Sleep that wakes early (rejecting with Cancelled) when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(cancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` up to `policy.maxAttempts` times.
 *
 * Each attempt checks cancellation, then goes through the breaker; an open
 * breaker or a non-retryable FetchError ends the loop at once. Errors that are
 * not FetchErrors (cancellation, programming errors) propagate untouched.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  context: RetryContext
): Promise<T> {
  const { url, backend, attempts, breaker, signal } = context;
  const label = context.label ?? url;

  for (let attempt = 1; ; attempt++) {
    throwIfCancelled(signal);
    const startTime = Date.now();

    try {
      const value = breaker ? await breaker.execute(() => fn(attempt)) : await fn(attempt);
      attempts.push({ url, backend, attempt, outcome: 'success', elapsedMs: Date.now() - startTime });
      return value;
    } catch (error) {
      if (error instanceof ScrapeError) {
        throw error;
      }
      if (signal?.aborted) {
        throw cancelledError();
      }
      if (!(error instanceof FetchError)) {
        throw error;
      }

      attempts.push({
        url,
        backend,
        attempt,
        outcome: OUTCOME_BY_KIND[error.kind],
        elapsedMs: Date.now() - startTime,
        ...(error.statusCode !== undefined && { statusCode: error.statusCode }),
      });

      if (!error.retryable || attempt >= policy.maxAttempts) {
        throw error;
      }
      // The failure may have just opened the circuit: no point waiting out a backoff
      if (breaker?.isOpen()) {
        attempts.push({ url, backend, attempt: attempt + 1, outcome: 'circuit-open', elapsedMs: 0 });
        throw breaker.openError();
      }

      const delay = backoffDelay(attempt, policy, error.retryAfterMs);
      logger.info(
        `${label}: ${backend} attempt ${attempt}/${policy.maxAttempts} failed (${error.kind}), retrying in ${delay}ms`
      );
      await sleep(delay, signal);
    }
  }
}
