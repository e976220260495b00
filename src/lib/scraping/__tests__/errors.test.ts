/**
 * Scraping Error Tests
 */

import { FetchError, ScrapeError, classifyFetchFailure, parseRetryAfter, toScrapeError } from '../errors';
import { USER_AGENTS, UserAgentRotator } from '../headers';

describe('FetchError', () => {
  it('should retry server errors and rate limiting but not other client errors', () => {
    const status = (code: number): FetchError => new FetchError('HTTPStatus', `HTTP ${code}`, { statusCode: code });

    expect(status(500).retryable).toBe(true);
    expect(status(429).retryable).toBe(true);
    expect(status(404).retryable).toBe(false);
    expect(new FetchError('Timeout', 'slow').retryable).toBe(true);
    expect(new FetchError('CircuitOpen', 'open').retryable).toBe(false);
  });

  it('should only blame the host for failures the host caused', () => {
    expect(new FetchError('Network', 'refused').hostFailure).toBe(true);
    expect(new FetchError('HTTPStatus', 'HTTP 503', { statusCode: 503 }).hostFailure).toBe(true);
    expect(new FetchError('HTTPStatus', 'HTTP 403', { statusCode: 403 }).hostFailure).toBe(false);
    expect(new FetchError('Render', 'pool exhausted', { hostFailure: false }).hostFailure).toBe(false);
  });
});

describe('classifyFetchFailure', () => {
  it('should map refused connections to Network', () => {
    const raw = new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } });

    const error = classifyFetchFailure(raw, 'https://down.test/');

    expect(error.kind).toBe('Network');
    expect(error.message).toBe('Network connection failed');
    expect(error.url).toBe('https://down.test/');
  });

  it('should map timeouts to Timeout', () => {
    const raw = new Error('The operation was aborted due to timeout');
    raw.name = 'TimeoutError';

    expect(classifyFetchFailure(raw).kind).toBe('Timeout');
  });

  it('should pass FetchErrors through', () => {
    const original = new FetchError('HTTPStatus', 'HTTP 502', { statusCode: 502 });

    expect(classifyFetchFailure(original)).toBe(original);
  });
});

describe('toScrapeError', () => {
  it('should carry the fetch kind over as the job error code', () => {
    expect(toScrapeError(new FetchError('Render', 'crashed')).code).toBe('RenderError');
    expect(toScrapeError(new FetchError('CircuitOpen', 'open')).code).toBe('CircuitOpen');
  });

  it('should hide unexpected errors behind Internal', () => {
    const error = toScrapeError(new RangeError('index 7 out of range'));

    expect(error).toBeInstanceOf(ScrapeError);
    expect(error.code).toBe('Internal');
    expect(error.message).toBe('Internal error while processing job');
  });
});

describe('parseRetryAfter', () => {
  it('should read delta-seconds', () => {
    expect(parseRetryAfter('120')).toBe(120_000);
  });

  it('should read an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');

    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:30 GMT', now)).toBe(30_000);
  });

  it('should ignore missing or unreadable values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('UserAgentRotator', () => {
  it('should cycle through the known agents', () => {
    const rotator = new UserAgentRotator(true, 'unused');
    const seen = Array.from({ length: USER_AGENTS.length + 1 }, () => rotator.next());

    expect(seen.slice(0, USER_AGENTS.length)).toEqual([...USER_AGENTS]);
    expect(seen[USER_AGENTS.length]).toBe(USER_AGENTS[0]);
  });

  it('should always use the fixed agent when rotation is off', () => {
    const rotator = new UserAgentRotator(false, 'test-agent');

    expect([rotator.next(), rotator.next()]).toEqual(['test-agent', 'test-agent']);
  });
});
