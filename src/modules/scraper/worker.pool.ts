/**
 * Worker Pool
 * Fixed number of async executors draining the job manager's queue
 */

import type { SelectorExtractor } from '../../lib/extraction';
import { logger } from '../../lib/logger';
import { FetchAttempt, throwIfCancelled, toScrapeError } from '../../lib/scraping';
import type { ClaimedJob, JobManager } from './job.manager';
import type { ScrapePipeline } from './scrape.pipeline';
import { buildCompletedResult, buildFailedResult } from './scraper.result';
import { IScrapeResult } from './scraper.types';

export interface WorkerPoolConfig {
  workerCount: number;
}

export interface WorkerPoolStats {
  workers: number;
  busy: number;
  paused: boolean;
  running: boolean;
  processed: number;
}

export class WorkerPool {
  private manager: JobManager;
  private pipeline: ScrapePipeline;
  private extractor: SelectorExtractor;
  private workerCount: number;
  private loops: Promise<void>[] = [];
  private takeController: AbortController = new AbortController();
  private resumeWaiters: Array<() => void> = [];
  private paused: boolean = false;
  private stopping: boolean = false;
  private busy: number = 0;
  private processed: number = 0;

  constructor(manager: JobManager, pipeline: ScrapePipeline, extractor: SelectorExtractor, config: WorkerPoolConfig) {
    this.manager = manager;
    this.pipeline = pipeline;
    this.extractor = extractor;
    this.workerCount = Math.max(1, config.workerCount);
  }

  start(): void {
    if (this.loops.length > 0) return;
    this.stopping = false;
    for (let i = 0; i < this.workerCount; i++) {
      this.loops.push(this.loop(i));
    }
    logger.info(`Worker pool started with ${this.workerCount} worker(s)`);
  }

  /**
   * Idle workers stop taking jobs; jobs already running carry on
   */
  pause(): void {
    if (this.paused) return;
    this.paused = true;
    this.takeController.abort();
    logger.info('Worker pool paused');
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    this.takeController = new AbortController();
    this.wakeAll();
    logger.info('Worker pool resumed');
  }

  /**
   * Stop taking jobs and wait for in-flight ones to finish
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.takeController.abort();
    this.wakeAll();
    await Promise.all(this.loops);
    this.loops = [];
    logger.info('Worker pool stopped');
  }

  stats(): WorkerPoolStats {
    return {
      workers: this.workerCount,
      busy: this.busy,
      paused: this.paused,
      running: this.loops.length > 0 && !this.stopping,
      processed: this.processed,
    };
  }

  private async loop(index: number): Promise<void> {
    while (!this.stopping) {
      if (this.paused) {
        await new Promise<void>((resolve) => this.resumeWaiters.push(resolve));
        continue;
      }

      const claimed = await this.manager.take(this.takeController.signal);
      if (!claimed) {
        if (this.paused || this.stopping) continue;
        // Manager closed
        break;
      }

      await this.process(claimed, index);
    }
  }

  /**
   * Never throws: every outcome becomes a persisted result
   */
  private async process(claimed: ClaimedJob, index: number): Promise<void> {
    const { job, signal } = claimed;
    if (!this.manager.markRunning(job.jobId)) {
      return;
    }

    this.busy++;
    const attempts: FetchAttempt[] = [];
    let result: IScrapeResult;

    try {
      logger.debug(`Worker ${index}: picked up job ${job.jobId}`);
      const { page } = await this.pipeline.run(job, signal, attempts);
      throwIfCancelled(signal);

      const extraction = this.extractor.extract(page.markup, page.finalUrl, job.selectors);
      for (const warning of extraction.warnings) {
        logger.warn(`Job ${job.jobId}: ${warning.message}`);
      }
      result = buildCompletedResult(job, page, extraction, attempts);
    } catch (error) {
      const scrapeError = toScrapeError(error);
      if (scrapeError.code === 'Internal') {
        logger.error(`Job ${job.jobId}: unexpected error`, error);
      }
      result = buildFailedResult(job, scrapeError, attempts);
    }

    try {
      await this.manager.finish(job.jobId, result);
    } catch (error) {
      logger.error(`Job ${job.jobId}: could not record terminal state`, error);
    } finally {
      this.busy--;
      this.processed++;
    }
  }

  private wakeAll(): void {
    const waiters = this.resumeWaiters.splice(0);
    for (const wake of waiters) {
      wake();
    }
  }
}
