/**
 * HTTP Backend Tests
 * global fetch is replaced per test; nothing leaves the process
 */

import { HttpBackend } from '../http.scraper';
import { FetchError, ScrapeError, UserAgentRotator } from '../../../../lib/scraping';

const URL = 'https://static.test/start';

function html(body: string, init: ResponseInit = {}): Response {
  return new Response(body, { status: 200, headers: { 'content-type': 'text/html' }, ...init });
}

describe('HttpBackend', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  let backend: HttpBackend;

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, 'fetch');
    backend = new HttpBackend({ maxRedirects: 2, userAgents: new UserAgentRotator(false, 'test-agent') });
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should return the body, status and headers of a successful fetch', async () => {
    fetchSpy.mockResolvedValueOnce(html('<p>hello</p>'));

    const page = await backend.fetch(URL, { timeoutMs: 1000 });

    expect(page).toMatchObject({
      backend: 'static',
      markup: '<p>hello</p>',
      statusCode: 200,
      finalUrl: URL,
      headers: { 'content-type': 'text/html' },
    });
    const init = fetchSpy.mock.calls[0][1];
    expect(init?.redirect).toBe('manual');
    expect(init?.headers).toMatchObject({ 'User-Agent': 'test-agent' });
  });

  it('should follow redirects and report the final URL', async () => {
    fetchSpy
      .mockResolvedValueOnce(new Response(null, { status: 301, headers: { location: '/moved' } }))
      .mockResolvedValueOnce(html('<p>moved</p>'));

    const page = await backend.fetch(URL, { timeoutMs: 1000 });

    expect(page.finalUrl).toBe('https://static.test/moved');
    expect(fetchSpy.mock.calls[1][0]).toBe('https://static.test/moved');
  });

  it('should give up after too many redirects', async () => {
    fetchSpy.mockImplementation(async () => new Response(null, { status: 302, headers: { location: '/loop' } }));

    const error = await backend.fetch(URL, { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(error instanceof FetchError && error.kind).toBe('Network');
    expect(error instanceof Error && error.message).toBe('Too many redirects (more than 2)');
    expect(fetchSpy).toHaveBeenCalledTimes(3);
  });

  it('should turn error statuses into HTTPStatus failures with Retry-After', async () => {
    fetchSpy.mockResolvedValueOnce(html('busy', { status: 503, headers: { 'retry-after': '3' } }));

    const error = await backend.fetch(URL, { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error instanceof FetchError && [error.kind, error.statusCode, error.retryAfterMs, error.retryable]).toEqual([
      'HTTPStatus',
      503,
      3000,
      true,
    ]);
  });

  it('should release the bodies of redirects and error responses', async () => {
    const redirect = new Response('moved here', { status: 302, headers: { location: '/gone' } });
    const missing = html('<h1>not found</h1>', { status: 404 });
    fetchSpy.mockResolvedValueOnce(redirect).mockResolvedValueOnce(missing);

    const error = await backend.fetch(URL, { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(error instanceof FetchError && error.statusCode).toBe(404);
    expect(redirect.bodyUsed).toBe(true);
    expect(missing.bodyUsed).toBe(true);
  });

  it('should time out a request that never answers', async () => {
    fetchSpy.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
    );

    const error = await backend.fetch(URL, { timeoutMs: 20 }).catch((e: unknown) => e);

    expect(error instanceof FetchError && error.kind).toBe('Timeout');
  });

  it('should classify connection failures as Network', async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } }));

    const error = await backend.fetch(URL, { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(error instanceof FetchError && [error.kind, error.hostFailure]).toEqual(['Network', true]);
  });

  it('should report Cancelled when the job signal aborts mid-request', async () => {
    const controller = new AbortController();
    fetchSpy.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          controller.abort();
        })
    );

    const error = await backend.fetch(URL, { timeoutMs: 1000, signal: controller.signal }).catch((e: unknown) => e);

    expect(error instanceof ScrapeError && error.code).toBe('Cancelled');
  });
});
