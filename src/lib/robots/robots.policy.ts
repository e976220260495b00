/**
 * Robots Policy
 * Per-origin robots.txt cache answering "may we fetch this URL, and how slowly"
 */

import robotsParser from 'robots-parser';
import { logger } from '../logger';
import { throwIfCancelled } from '../scraping/errors';
import { RobotsConfig, RobotsFetcher, RobotsVerdict } from './robots.types';

type Robot = ReturnType<typeof robotsParser>;

interface CacheEntry {
  // null: no usable robots.txt, everything is allowed
  robot: Robot | null;
  expiresAt: number;
}

const MAX_CRAWL_DELAY_MS = 60_000;

/**
 * Plain GET of robots.txt; any non-2xx answer counts as "no rules"
 */
export const fetchRobotsTxt: RobotsFetcher = async (robotsUrl, timeoutMs, userAgent) => {
  const response = await fetch(robotsUrl, {
    headers: { 'User-Agent': userAgent, Accept: 'text/plain,*/*' },
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    await response.body?.cancel();
    return null;
  }
  return response.text();
};

export class RobotsPolicy {
  private config: RobotsConfig;
  private fetcher: RobotsFetcher;
  private cache: Map<string, CacheEntry> = new Map();
  private pending: Map<string, Promise<Robot | null>> = new Map();

  constructor(config: RobotsConfig, fetcher: RobotsFetcher = fetchRobotsTxt) {
    this.config = config;
    this.fetcher = fetcher;
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * A robots.txt that cannot be fetched or read allows everything
   */
  async check(url: string, signal?: AbortSignal): Promise<RobotsVerdict> {
    if (!this.config.enabled) {
      return { allowed: true };
    }

    const robot = await this.robotFor(new URL(url).origin);
    throwIfCancelled(signal);

    if (!robot) {
      return { allowed: true };
    }

    const { userAgent } = this.config;
    const delaySeconds = robot.getCrawlDelay(userAgent);

    return {
      allowed: robot.isAllowed(url, userAgent) !== false,
      ...(delaySeconds !== undefined &&
        delaySeconds > 0 && { crawlDelayMs: Math.min(MAX_CRAWL_DELAY_MS, Math.round(delaySeconds * 1000)) }),
    };
  }

  clear(): void {
    this.cache.clear();
  }

  private async robotFor(origin: string): Promise<Robot | null> {
    const cached = this.cache.get(origin);
    if (cached && cached.expiresAt > Date.now()) {
      return cached.robot;
    }

    // Concurrent jobs for one origin share a single fetch
    let loading = this.pending.get(origin);
    if (!loading) {
      loading = this.load(origin).finally(() => this.pending.delete(origin));
      this.pending.set(origin, loading);
    }
    return loading;
  }

  private async load(origin: string): Promise<Robot | null> {
    const robotsUrl = `${origin}/robots.txt`;
    let robot: Robot | null = null;

    try {
      const body = await this.fetcher(robotsUrl, this.config.timeoutMs, this.config.userAgent);
      robot = body === null ? null : robotsParser(robotsUrl, body);
    } catch (error) {
      logger.warn(`Could not read ${robotsUrl}, treating it as allowing everything:`, error);
    }

    this.cache.set(origin, { robot, expiresAt: Date.now() + this.config.cacheTtlMs });
    return robot;
  }
}
