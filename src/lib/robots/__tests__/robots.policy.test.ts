/**
 * Robots Policy Tests
 * robots.txt bodies come from an in-memory fetcher
 */

import { RobotsPolicy } from '../robots.policy';
import { RobotsConfig, RobotsFetcher } from '../robots.types';
import { ScrapeError } from '../../scraping/errors';

const RULES = 'User-agent: *\nDisallow: /private\nCrawl-delay: 2\n';

const CONFIG: RobotsConfig = { enabled: true, userAgent: 'test-agent', cacheTtlMs: 60_000, timeoutMs: 1000 };

function serving(body: string | null): jest.Mock<Promise<string | null>, Parameters<RobotsFetcher>> {
  return jest.fn<Promise<string | null>, Parameters<RobotsFetcher>>(async () => body);
}

describe('RobotsPolicy', () => {
  it('should refuse disallowed paths and report the crawl delay', async () => {
    const policy = new RobotsPolicy(CONFIG, serving(RULES));

    await expect(policy.check('https://site.test/private/report')).resolves.toEqual({
      allowed: false,
      crawlDelayMs: 2000,
    });
    await expect(policy.check('https://site.test/public')).resolves.toEqual({ allowed: true, crawlDelayMs: 2000 });
  });

  it('should fetch robots.txt once per origin while cached', async () => {
    const fetcher = serving(RULES);
    const policy = new RobotsPolicy(CONFIG, fetcher);

    await policy.check('https://site.test/a');
    await policy.check('https://site.test/b');

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(fetcher).toHaveBeenCalledWith('https://site.test/robots.txt', 1000, 'test-agent');
  });

  it('should share one fetch between concurrent checks', async () => {
    const fetcher = serving(RULES);
    const policy = new RobotsPolicy(CONFIG, fetcher);

    const verdicts = await Promise.all([
      policy.check('https://site.test/private'),
      policy.check('https://site.test/open'),
    ]);

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(verdicts.map((v) => v.allowed)).toEqual([false, true]);
  });

  it('should keep origins apart', async () => {
    const fetcher = serving(RULES);
    const policy = new RobotsPolicy(CONFIG, fetcher);

    await policy.check('https://site.test/a');
    await policy.check('https://other.test/a');

    expect(fetcher.mock.calls.map((call) => call[0])).toEqual([
      'https://site.test/robots.txt',
      'https://other.test/robots.txt',
    ]);
  });

  it('should allow everything when the host has no robots.txt', async () => {
    const policy = new RobotsPolicy(CONFIG, serving(null));

    await expect(policy.check('https://site.test/private')).resolves.toEqual({ allowed: true });
  });

  it('should allow everything when robots.txt cannot be fetched', async () => {
    const fetcher: RobotsFetcher = jest.fn(async () => {
      throw new TypeError('fetch failed');
    });
    const policy = new RobotsPolicy(CONFIG, fetcher);

    await expect(policy.check('https://site.test/private')).resolves.toEqual({ allowed: true });
  });

  it('should cap an excessive crawl delay at one minute', async () => {
    const policy = new RobotsPolicy(CONFIG, serving('User-agent: *\nCrawl-delay: 600\n'));

    await expect(policy.check('https://site.test/')).resolves.toEqual({ allowed: true, crawlDelayMs: 60_000 });
  });

  it('should follow the group for its own user agent', async () => {
    const rules = 'User-agent: test-agent\nDisallow: /\n\nUser-agent: *\nDisallow:\n';
    const policy = new RobotsPolicy(CONFIG, serving(rules));

    await expect(policy.check('https://site.test/anything')).resolves.toEqual({ allowed: false });
  });

  it('should not fetch anything when disabled', async () => {
    const fetcher = serving(RULES);
    const policy = new RobotsPolicy({ ...CONFIG, enabled: false }, fetcher);

    await expect(policy.check('https://site.test/private')).resolves.toEqual({ allowed: true });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('should refetch once the cache entry expires', async () => {
    const fetcher = serving(RULES);
    const policy = new RobotsPolicy({ ...CONFIG, cacheTtlMs: 0 }, fetcher);

    await policy.check('https://site.test/a');
    await policy.check('https://site.test/a');

    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it('should end with Cancelled when the job is cancelled while robots.txt loads', async () => {
    const controller = new AbortController();
    const fetcher: RobotsFetcher = jest.fn(async () => {
      controller.abort();
      return RULES;
    });
    const policy = new RobotsPolicy(CONFIG, fetcher);

    const error = await policy.check('https://site.test/a', controller.signal).catch((e: unknown) => e);

    expect(error instanceof ScrapeError && error.code).toBe('Cancelled');
  });
});
