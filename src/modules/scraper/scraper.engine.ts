/**
 * Scrape Engine
 * Wires the job manager, worker pool, pipeline and shared resources together.
 * Every transport (REST, socket, CLI) drives one of these.
 */

import { env } from '../../config/env';
import { BrowserLauncher, BrowserPool, BrowserPoolStats } from '../../lib/browser';
import { CircuitBreakerConfig, CircuitBreakerRegistry, CircuitBreakerStats } from '../../lib/circuit-breaker';
import { RenderDetector } from '../../lib/detection';
import { SelectorExtractor } from '../../lib/extraction';
import { logger } from '../../lib/logger';
import { DomainThrottle, DomainThrottleConfig, DomainThrottleStats } from '../../lib/rate-limit';
import { RobotsFetcher, RobotsPolicy } from '../../lib/robots';
import { BackendKind, RetryPolicy, UserAgentRotator } from '../../lib/scraping';
import { JobManager, JobManagerStats } from './job.manager';
import { ScrapePipeline } from './scrape.pipeline';
import { FileResultStore, MongoResultStore, ResultStore } from './scraper.repository';
import { FetchBackend, HttpBackend, PlaywrightBackend } from './scrapers';
import { WorkerPool, WorkerPoolStats } from './worker.pool';

export type ResultStoreKind = 'file' | 'mongo';

export interface EngineConfig {
  workerCount: number;
  maxQueueSize: number;
  retention: {
    max: number;
    ttlMs: number;
  };
  retry: RetryPolicy;
  breaker: CircuitBreakerConfig;
  throttle: DomainThrottleConfig;
  browser: {
    size: number;
    acquireTimeoutMs: number;
  };
  http: {
    timeoutMs: number;
    maxRedirects: number;
    userAgent: string;
    rotateUserAgents: boolean;
  };
  navigationTimeoutMs: number;
  renderThreshold?: number;
  robots: {
    enabled: boolean;
    cacheTtlMs: number;
    timeoutMs: number;
  };
  store: {
    kind: ResultStoreKind;
    outputDir: string;
  };
}

/**
 * Replacements for the real collaborators, used by tests and the CLI
 */
export interface EngineOverrides {
  store?: ResultStore;
  backends?: Partial<Record<BackendKind, FetchBackend>>;
  launcher?: BrowserLauncher;
  robotsFetcher?: RobotsFetcher;
}

export interface EngineStats {
  jobs: JobManagerStats;
  workers: WorkerPoolStats;
  throttle: DomainThrottleStats;
  breakers: CircuitBreakerStats[];
  browsers: BrowserPoolStats;
}

function toStoreKind(value: string): ResultStoreKind {
  return value === 'mongo' ? 'mongo' : 'file';
}

export function engineConfigFromEnv(): EngineConfig {
  return {
    workerCount: env.WORKER_COUNT,
    maxQueueSize: env.MAX_QUEUE_SIZE,
    retention: {
      max: env.JOB_RETENTION_MAX,
      ttlMs: env.JOB_RETENTION_TTL,
    },
    retry: {
      maxAttempts: env.MAX_RETRIES,
      baseDelayMs: env.RETRY_BACKOFF_BASE,
      multiplier: env.RETRY_BACKOFF_MULTIPLIER,
      maxDelayMs: env.RETRY_BACKOFF_MAX,
      jitterMs: Math.round(env.RETRY_BACKOFF_BASE / 2),
    },
    breaker: {
      failureThreshold: env.CIRCUIT_BREAKER_FAILURE_THRESHOLD,
      recoveryTimeout: env.CIRCUIT_BREAKER_RECOVERY_TIMEOUT,
    },
    throttle: {
      maxConcurrentPerDomain: env.MAX_CONCURRENT_PER_DOMAIN,
      requestDelayMs: env.REQUEST_DELAY,
      acquireTimeoutMs: env.THROTTLE_ACQUIRE_TIMEOUT,
    },
    browser: {
      size: env.MAX_PLAYWRIGHT_INSTANCES,
      acquireTimeoutMs: env.BROWSER_ACQUIRE_TIMEOUT,
    },
    http: {
      timeoutMs: env.HTTP_TIMEOUT,
      maxRedirects: env.MAX_REDIRECTS,
      userAgent: env.USER_AGENT,
      rotateUserAgents: env.ROTATE_USER_AGENTS,
    },
    navigationTimeoutMs: env.NAVIGATION_TIMEOUT,
    robots: {
      enabled: env.RESPECT_ROBOTS_TXT,
      cacheTtlMs: env.ROBOTS_CACHE_TTL,
      timeoutMs: env.ROBOTS_TIMEOUT,
    },
    store: {
      kind: toStoreKind(env.RESULT_STORE),
      outputDir: env.OUTPUT_DIR,
    },
  };
}

function createStore(config: EngineConfig['store']): ResultStore {
  return config.kind === 'mongo' ? new MongoResultStore() : new FileResultStore(config.outputDir);
}

export class ScrapeEngine {
  readonly manager: JobManager;
  readonly workers: WorkerPool;
  readonly pipeline: ScrapePipeline;
  readonly throttle: DomainThrottle;
  readonly breakers: CircuitBreakerRegistry;
  readonly browsers: BrowserPool;
  readonly robots: RobotsPolicy;
  readonly store: ResultStore;
  private stopped: boolean = false;

  constructor(config: EngineConfig, overrides: EngineOverrides = {}) {
    this.store = overrides.store ?? createStore(config.store);
    this.throttle = new DomainThrottle(config.throttle);
    this.breakers = new CircuitBreakerRegistry(config.breaker);
    this.robots = new RobotsPolicy({ ...config.robots, userAgent: config.http.userAgent }, overrides.robotsFetcher);
    this.browsers = new BrowserPool({
      size: config.browser.size,
      acquireTimeoutMs: config.browser.acquireTimeoutMs,
      launcher: overrides.launcher,
    });

    const backends: Record<BackendKind, FetchBackend> = {
      static:
        overrides.backends?.static ??
        new HttpBackend({
          maxRedirects: config.http.maxRedirects,
          userAgents: new UserAgentRotator(config.http.rotateUserAgents, config.http.userAgent),
        }),
      dynamic: overrides.backends?.dynamic ?? new PlaywrightBackend(this.browsers),
    };

    this.pipeline = new ScrapePipeline({
      detector: new RenderDetector({ threshold: config.renderThreshold }),
      throttle: this.throttle,
      breakers: this.breakers,
      robots: this.robots,
      backends,
      retryPolicy: config.retry,
      timeouts: {
        staticMs: config.http.timeoutMs,
        dynamicMs: config.navigationTimeoutMs,
      },
    });

    this.manager = new JobManager(this.store, {
      maxQueueSize: config.maxQueueSize,
      retentionMax: config.retention.max,
      retentionTtlMs: config.retention.ttlMs,
    });

    this.workers = new WorkerPool(this.manager, this.pipeline, new SelectorExtractor(), {
      workerCount: config.workerCount,
    });
  }

  start(): void {
    this.workers.start();
  }

  stats(): EngineStats {
    return {
      jobs: this.manager.stats(),
      workers: this.workers.stats(),
      throttle: this.throttle.stats(),
      breakers: this.breakers.stats(),
      browsers: this.browsers.stats(),
    };
  }

  /**
   * Stop intake, let in-flight jobs finish, then release browsers and breakers
   */
  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    logger.info('Shutting down scrape engine...');
    this.manager.close();
    await this.workers.stop();
    this.breakers.shutdown();
    await this.browsers.close();
    logger.info('Scrape engine stopped');
  }
}

export function createScrapeEngine(config: EngineConfig = engineConfigFromEnv(), overrides: EngineOverrides = {}): ScrapeEngine {
  return new ScrapeEngine(config, overrides);
}
