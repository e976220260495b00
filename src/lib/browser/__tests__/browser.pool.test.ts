/**
 * Browser Pool Tests
 * Uses an in-process launcher; no real browser is started
 */

import { BrowserPool } from '../browser.pool';
import { FetchError, ScrapeError } from '../../scraping/errors';
import { FakeBrowser } from '../../../__tests__/helpers/fakes';

describe('BrowserPool', () => {
  let launched: FakeBrowser[];
  let pool: BrowserPool;

  const launcher = jest.fn(async () => {
    const browser = new FakeBrowser();
    launched.push(browser);
    return browser;
  });

  beforeEach(() => {
    launched = [];
    launcher.mockClear();
    pool = new BrowserPool({ size: 2, acquireTimeoutMs: 50, launcher });
  });

  afterEach(async () => {
    await pool.close();
  });

  it('should launch browsers lazily and reuse them', async () => {
    expect(pool.stats().launched).toBe(0);

    const lease = await pool.acquire();
    lease.release();
    const again = await pool.acquire();

    expect(launcher).toHaveBeenCalledTimes(1);
    expect(again.browser).toBe(launched[0]);
    again.release();
  });

  it('should never hand out more browsers than the pool size', async () => {
    const a = await pool.acquire();
    const b = await pool.acquire();

    expect(pool.stats()).toMatchObject({ size: 2, busy: 2, launched: 2 });
    expect(a.handleId).not.toBe(b.handleId);

    const waiting = pool.acquire();
    expect(pool.stats().waiting).toBe(1);

    a.release();
    const c = await waiting;
    expect(c.handleId).toBe(a.handleId);
    expect(pool.stats().busy).toBe(2);

    b.release();
    c.release();
    expect(pool.stats().busy).toBe(0);
  });

  it('should fail a waiter with a Render error once the acquire timeout passes', async () => {
    await pool.acquire();
    await pool.acquire();

    const error = await pool.acquire().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error instanceof FetchError && [error.kind, error.hostFailure]).toEqual(['Render', false]);
    expect(pool.stats().waiting).toBe(0);
  });

  it('should relaunch a browser that disconnected', async () => {
    const lease = await pool.acquire();
    launched[0].connected = false;
    lease.release();

    const next = await pool.acquire();

    expect(launcher).toHaveBeenCalledTimes(2);
    expect(next.browser).toBe(launched[1]);
    expect(pool.stats().launches).toBe(2);
    next.release();
  });

  it('should free the handle when the launch fails', async () => {
    launcher.mockRejectedValueOnce(new Error('no chromium here'));

    const error = await pool.acquire().catch((e: unknown) => e);

    expect(error instanceof FetchError && error.message).toBe('Failed to launch browser');
    expect(pool.stats().busy).toBe(0);
  });

  it('should return the browser even when the scoped work throws', async () => {
    await expect(
      pool.withBrowser(async () => {
        throw new Error('page crashed');
      })
    ).rejects.toThrow('page crashed');

    expect(pool.stats().busy).toBe(0);
  });

  it('should stop a waiter with Cancelled when its signal aborts', async () => {
    await pool.acquire();
    await pool.acquire();
    const controller = new AbortController();

    const waiting = pool.acquire(controller.signal).catch((e: unknown) => e);
    controller.abort();

    const error = await waiting;
    expect(error instanceof ScrapeError && error.code).toBe('Cancelled');
  });

  it('should close every launched browser and refuse new leases', async () => {
    const lease = await pool.acquire();
    lease.release();

    await pool.close();

    expect(launched[0].closed).toBe(true);
    await expect(pool.acquire()).rejects.toThrow('Browser pool is closed');
  });
});
