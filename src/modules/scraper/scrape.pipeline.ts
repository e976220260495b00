/**
 * Scrape Pipeline
 * detect → throttle → retry/breaker → backend, for a single job
 */

import { CircuitBreakerRegistry } from '../../lib/circuit-breaker';
import { DetectionResult, RenderDetector } from '../../lib/detection';
import { logger } from '../../lib/logger';
import { DomainThrottle } from '../../lib/rate-limit';
import { RobotsPolicy } from '../../lib/robots';
import { BackendKind, FetchAttempt, FetchError, RetryPolicy, ScrapeError, withRetry } from '../../lib/scraping';
import type { FetchBackend, FetchedPage } from './scrapers';
import { IJobRecord, ScrapeMode } from './scraper.types';

export interface PipelineTimeouts {
  staticMs: number;
  dynamicMs: number;
}

export interface PipelineDeps {
  detector: RenderDetector;
  throttle: DomainThrottle;
  breakers: CircuitBreakerRegistry;
  robots: RobotsPolicy;
  backends: Record<BackendKind, FetchBackend>;
  retryPolicy: RetryPolicy;
  timeouts: PipelineTimeouts;
}

export interface PipelineOutcome {
  page: FetchedPage;
  detection?: DetectionResult;
}

/**
 * In auto mode a failed static fetch is worth one rendered try when the
 * failure might be the page blocking plain HTTP clients
 */
function shouldFallBackToDynamic(error: unknown): boolean {
  if (!(error instanceof FetchError)) return false;
  switch (error.kind) {
    case 'Timeout':
    case 'Network':
      return true;
    case 'HTTPStatus':
      return error.statusCode === 403;
    default:
      return false;
  }
}

export class ScrapePipeline {
  private deps: PipelineDeps;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
  }

  /**
   * Attempts (successful or not) are appended to `attempts` as they happen,
   * so a caller still has them when this rejects
   */
  async run(job: Readonly<IJobRecord>, signal: AbortSignal, attempts: FetchAttempt[]): Promise<PipelineOutcome> {
    await this.checkRobots(job, signal);

    if (job.mode === ScrapeMode.STATIC || job.mode === ScrapeMode.DYNAMIC) {
      const page = await this.fetchWith(job.mode, job, signal, attempts);
      return { page };
    }

    let page: FetchedPage;
    try {
      page = await this.fetchWith('static', job, signal, attempts);
    } catch (error) {
      if (!shouldFallBackToDynamic(error)) {
        throw error;
      }
      logger.warn(`Job ${job.jobId}: static fetch failed, trying dynamic render`);
      return { page: await this.fetchWith('dynamic', job, signal, attempts) };
    }

    const detection = this.deps.detector.analyze(page.markup, page.headers);
    logger.info(
      `Job ${job.jobId}: render score ${detection.score}/${detection.threshold} -> ${detection.decision}`,
      { reasons: detection.reasons }
    );

    if (detection.decision === 'dynamic') {
      return { page: await this.fetchWith('dynamic', job, signal, attempts), detection };
    }
    return { page, detection };
  }

  /**
   * Refuse disallowed URLs before any fetch; a Crawl-delay widens the host's throttle gap
   */
  private async checkRobots(job: Readonly<IJobRecord>, signal: AbortSignal): Promise<void> {
    const { robots, throttle } = this.deps;
    if (!robots.enabled) return;

    const verdict = await robots.check(job.url, signal);
    if (verdict.crawlDelayMs !== undefined) {
      throttle.setHostDelay(new URL(job.url).host, verdict.crawlDelayMs);
    }
    if (!verdict.allowed) {
      logger.warn(`Job ${job.jobId}: ${job.url} is disallowed by robots.txt`);
      throw new ScrapeError('RobotsDisallowed', `Request blocked by robots.txt: ${job.url}`, { url: job.url });
    }
  }

  private fetchWith(
    kind: BackendKind,
    job: Readonly<IJobRecord>,
    signal: AbortSignal,
    attempts: FetchAttempt[]
  ): Promise<FetchedPage> {
    const { throttle, breakers, backends, retryPolicy, timeouts } = this.deps;
    const host = new URL(job.url).host;
    const backend = backends[kind];
    const timeoutMs = kind === 'static' ? timeouts.staticMs : timeouts.dynamicMs;

    return throttle.run(
      host,
      () =>
        withRetry((attempt) => {
          logger.debug(`Job ${job.jobId}: ${kind} attempt ${attempt} for ${job.url}`);
          return backend.fetch(job.url, { timeoutMs, signal });
        }, retryPolicy, {
          url: job.url,
          backend: kind,
          attempts,
          breaker: breakers.get(host),
          signal,
          label: `Job ${job.jobId}`,
        }),
      { signal }
    );
  }
}
