/**
 * Domain Throttle
 * Per-host concurrency bound plus a politeness gap between request starts
 */

import { logger } from '../logger';
import { ScrapeError, cancelledError, throwIfCancelled } from '../scraping/errors';
import { sleep } from '../scraping/retry';
import {
  AcquireOptions,
  DomainThrottleConfig,
  DomainThrottleStats,
  ReleaseFn,
} from './rate-limit.types';

interface Waiter {
  grant: () => void;
}

interface DomainSlot {
  inFlight: number;
  lastStart?: number;
  // Earliest time the next request to this host may start
  nextStart: number;
  waiters: Waiter[];
}

export class DomainThrottle {
  private slots: Map<string, DomainSlot> = new Map();
  private config: DomainThrottleConfig;
  // Per-host gaps asked for by the site itself (robots.txt Crawl-delay)
  private hostDelays: Map<string, number> = new Map();
  private timedOut: number = 0;

  constructor(config: DomainThrottleConfig) {
    this.config = config;
  }

  /**
   * Wait (FIFO) for a slot on `host`, then for the politeness gap.
   * Fails with ScrapeError{Throttled} when no slot frees up in time.
   */
  async acquire(host: string, options: AcquireOptions = {}): Promise<ReleaseFn> {
    const { signal } = options;
    throwIfCancelled(signal);
    this.prune();

    const slot = this.slotFor(host);

    if (slot.inFlight < this.config.maxConcurrentPerDomain && slot.waiters.length === 0) {
      slot.inFlight++;
    } else {
      await this.enqueue(host, slot, options);
    }

    let released = false;
    const release: ReleaseFn = () => {
      if (released) return;
      released = true;
      this.release(host);
    };

    const now = Date.now();
    const startAt = Math.max(now, slot.nextStart);
    slot.nextStart = startAt + this.gapFor(host);

    if (startAt > now) {
      try {
        await sleep(startAt - now, signal);
      } catch (error) {
        release();
        throw error;
      }
    }

    slot.lastStart = Date.now();
    return release;
  }

  /**
   * Scoped acquire/release; the slot is freed however `fn` settles
   */
  async run<T>(host: string, fn: () => Promise<T>, options: AcquireOptions = {}): Promise<T> {
    const release = await this.acquire(host, options);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Widen the gap between request starts to `host`; never narrows it below `requestDelayMs`
   */
  setHostDelay(host: string, delayMs: number): void {
    if (delayMs > 0) {
      this.hostDelays.set(host, delayMs);
    } else {
      this.hostDelays.delete(host);
    }
  }

  gapFor(host: string): number {
    return Math.max(this.config.requestDelayMs, this.hostDelays.get(host) ?? 0);
  }

  inFlight(host: string): number {
    return this.slots.get(host)?.inFlight ?? 0;
  }

  stats(): DomainThrottleStats {
    const hosts = Array.from(this.slots.entries()).map(([host, slot]) => ({
      host,
      inFlight: slot.inFlight,
      waiting: slot.waiters.length,
      lastStart: slot.lastStart,
      gapMs: this.gapFor(host),
    }));

    return {
      activeHosts: hosts.filter((h) => h.inFlight > 0 || h.waiting > 0).length,
      totalInFlight: hosts.reduce((sum, h) => sum + h.inFlight, 0),
      totalWaiting: hosts.reduce((sum, h) => sum + h.waiting, 0),
      timedOut: this.timedOut,
      hosts,
    };
  }

  private slotFor(host: string): DomainSlot {
    let slot = this.slots.get(host);
    if (!slot) {
      slot = { inFlight: 0, nextStart: 0, waiters: [] };
      this.slots.set(host, slot);
    }
    return slot;
  }

  private enqueue(host: string, slot: DomainSlot, options: AcquireOptions): Promise<void> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? this.config.acquireTimeoutMs;

    return new Promise<void>((resolve, reject) => {
      const remove = (): void => {
        const index = slot.waiters.indexOf(waiter);
        if (index !== -1) slot.waiters.splice(index, 1);
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      // The releaser hands its slot over, so inFlight is not touched here
      const waiter: Waiter = {
        grant: () => {
          remove();
          resolve();
        },
      };

      const onAbort = (): void => {
        remove();
        reject(cancelledError());
      };

      const timer = setTimeout(() => {
        remove();
        this.timedOut++;
        logger.warn(`Throttle: timed out after ${timeoutMs}ms waiting for a slot on ${host}`);
        reject(new ScrapeError('Throttled', `Timed out waiting for a request slot on ${host}`, { host }));
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      slot.waiters.push(waiter);
    });
  }

  private release(host: string): void {
    const slot = this.slots.get(host);
    if (!slot) return;

    const next = slot.waiters.shift();
    if (next) {
      next.grant();
      return;
    }

    slot.inFlight = Math.max(0, slot.inFlight - 1);
  }

  /**
   * Forget hosts with nothing in flight whose politeness gap has passed
   */
  private prune(): void {
    const now = Date.now();
    for (const [host, slot] of this.slots) {
      if (slot.inFlight === 0 && slot.waiters.length === 0 && slot.nextStart <= now) {
        this.slots.delete(host);
      }
    }
  }
}
