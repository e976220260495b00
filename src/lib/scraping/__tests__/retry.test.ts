/**
 * Retry Tests
 */

import { FetchAttempt, RetryPolicy, backoffDelay, withRetry } from '../retry';
import { FetchError, ScrapeError } from '../errors';
import { CircuitBreakerRegistry } from '../../circuit-breaker';

const FAST: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1, multiplier: 2, maxDelayMs: 5, jitterMs: 0 };
const URL = 'https://retry.test/';

function failing(...errors: Error[]): jest.Mock<Promise<string>, [number]> {
  return jest.fn(async (attempt: number) => {
    const error = errors[attempt - 1];
    if (error) throw error;
    return `ok on ${attempt}`;
  });
}

describe('backoffDelay', () => {
  const policy: RetryPolicy = { maxAttempts: 5, baseDelayMs: 100, multiplier: 2, maxDelayMs: 1000, jitterMs: 50 };
  const noJitter = (): number => 0;

  it('should grow exponentially from the base delay', () => {
    expect([1, 2, 3].map((n) => backoffDelay(n, policy, undefined, noJitter))).toEqual([100, 200, 400]);
  });

  it('should cap the delay', () => {
    expect(backoffDelay(5, policy, undefined, noJitter)).toBe(1000);
  });

  it('should add jitter on top', () => {
    expect(backoffDelay(1, policy, undefined, () => 1)).toBe(150);
  });

  it('should wait for Retry-After when it is longer, up to the cap', () => {
    expect(backoffDelay(1, policy, 700, noJitter)).toBe(700);
    expect(backoffDelay(3, policy, 10, noJitter)).toBe(400);
    expect(backoffDelay(1, policy, 5000, noJitter)).toBe(1000);
  });
});

describe('withRetry', () => {
  let attempts: FetchAttempt[];

  beforeEach(() => {
    attempts = [];
  });

  it('should retry transient failures until one succeeds', async () => {
    const fn = failing(new FetchError('Network', 'reset'), new FetchError('HTTPStatus', 'HTTP 503', { statusCode: 503 }));

    await expect(withRetry(fn, FAST, { url: URL, backend: 'static', attempts })).resolves.toBe('ok on 3');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(attempts.map((a) => [a.attempt, a.outcome, a.statusCode])).toEqual([
      [1, 'network-error', undefined],
      [2, 'http-error', 503],
      [3, 'success', undefined],
    ]);
  });

  it('should give up after maxAttempts with the last error', async () => {
    const timeout = new FetchError('Timeout', 'too slow');
    const fn = failing(timeout, timeout, timeout, timeout);

    await expect(withRetry(fn, FAST, { url: URL, backend: 'dynamic', attempts })).rejects.toBe(timeout);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(attempts.every((a) => a.outcome === 'timeout' && a.backend === 'dynamic')).toBe(true);
  });

  it('should not retry a client error', async () => {
    const fn = failing(new FetchError('HTTPStatus', 'HTTP 404', { statusCode: 404 }));

    await expect(withRetry(fn, FAST, { url: URL, backend: 'static', attempts })).rejects.toThrow('HTTP 404');

    expect(fn).toHaveBeenCalledTimes(1);
    expect(attempts).toHaveLength(1);
  });

  it('should stop at an open circuit without calling the backend again', async () => {
    const registry = new CircuitBreakerRegistry({ failureThreshold: 1, recoveryTimeout: 60_000 });
    const fn = failing(new FetchError('Network', 'refused'), new FetchError('Network', 'refused'));
    const slow: RetryPolicy = { ...FAST, baseDelayMs: 400, maxDelayMs: 400 };

    const started = Date.now();
    const error = await withRetry(fn, slow, {
      url: URL,
      backend: 'static',
      attempts,
      breaker: registry.get('retry.test'),
    }).catch((e: unknown) => e);

    expect(error instanceof FetchError && error.kind).toBe('CircuitOpen');
    expect(Date.now() - started).toBeLessThan(200);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(attempts.map((a) => a.outcome)).toEqual(['network-error', 'circuit-open']);

    registry.shutdown();
  });

  it('should end with Cancelled when aborted during backoff', async () => {
    const controller = new AbortController();
    const slow: RetryPolicy = { ...FAST, baseDelayMs: 10_000, maxDelayMs: 10_000 };
    const fn = failing(new FetchError('Network', 'reset'), new FetchError('Network', 'reset'));

    setTimeout(() => controller.abort(), 10);
    const started = Date.now();
    const error = await withRetry(fn, slow, { url: URL, backend: 'static', attempts, signal: controller.signal }).catch(
      (e: unknown) => e
    );

    expect(error instanceof ScrapeError && error.code).toBe('Cancelled');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(Date.now() - started).toBeLessThan(5000);
  });

  it('should not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = failing();

    await expect(
      withRetry(fn, FAST, { url: URL, backend: 'static', attempts, signal: controller.signal })
    ).rejects.toThrow('Job was cancelled');
    expect(fn).not.toHaveBeenCalled();
  });

  it('should let unexpected errors through untouched', async () => {
    const bug = new TypeError('undefined is not a function');
    const fn = failing(bug);

    await expect(withRetry(fn, FAST, { url: URL, backend: 'static', attempts })).rejects.toBe(bug);
    expect(attempts).toEqual([]);
  });
});
