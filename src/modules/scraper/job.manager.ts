/**
 * Job Manager
 * Job identity, state transitions, the bounded submission queue, retention
 * and cancellation. The only writer of job state.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../lib/logger';
import { ScrapeError, cancelledError } from '../../lib/scraping';
import type { ResultStore } from './scraper.repository';
import { buildFailedResult } from './scraper.result';
import {
  IJobRecord,
  IJobStatusEvent,
  IJobSummary,
  IScrapeResult,
  ScrapeMode,
  ScrapeStatus,
  TERMINAL_STATUSES,
} from './scraper.types';
import { parseScrapeRequest } from './scraper.validation';

export interface JobManagerConfig {
  maxQueueSize: number;
  retentionMax: number;
  retentionTtlMs: number;
}

/**
 * A job handed to a worker together with its cancellation signal
 */
export interface ClaimedJob {
  job: Readonly<IJobRecord>;
  signal: AbortSignal;
}

export interface JobManagerStats {
  queued: number;
  running: number;
  completed: number;
  failed: number;
  total: number;
  queueCapacity: number;
  waitingWorkers: number;
}

interface JobEntry {
  record: IJobRecord;
  controller: AbortController;
}

type Taker = (claimed: ClaimedJob | null) => void;

const ALLOWED_TRANSITIONS: Record<ScrapeStatus, ScrapeStatus[]> = {
  [ScrapeStatus.QUEUED]: [ScrapeStatus.RUNNING, ScrapeStatus.FAILED],
  [ScrapeStatus.RUNNING]: [ScrapeStatus.COMPLETED, ScrapeStatus.FAILED],
  [ScrapeStatus.COMPLETED]: [],
  [ScrapeStatus.FAILED]: [],
};

export const JOB_STATUS_EVENT = 'job:status';

function toSummary(record: IJobRecord): IJobSummary {
  return {
    jobId: record.jobId,
    url: record.url,
    mode: record.mode,
    state: record.status,
    submittedAt: record.submittedAt.toISOString(),
    ...(record.startedAt ? { startedAt: record.startedAt.toISOString() } : {}),
    ...(record.completedAt ? { completedAt: record.completedAt.toISOString() } : {}),
    ...(record.errorCode !== undefined ? { errorCode: record.errorCode } : {}),
    ...(record.errorMessage !== undefined ? { errorMessage: record.errorMessage } : {}),
  };
}

export class JobManager extends EventEmitter {
  private jobs: Map<string, JobEntry> = new Map();
  private queue: string[] = [];
  private takers: Taker[] = [];
  private store: ResultStore;
  private config: JobManagerConfig;
  private closed: boolean = false;

  constructor(store: ResultStore, config: JobManagerConfig) {
    super();
    this.store = store;
    this.config = config;
  }

  /**
   * Validate and enqueue a scrape. Fails with InvalidInput or QueueFull.
   * Takes raw input since transports hand over untrusted payloads.
   */
  submit(request: unknown): string {
    const { url, selectors, mode } = parseScrapeRequest(request);

    if (this.closed) {
      throw new ScrapeError('QueueFull', 'Job manager is shutting down');
    }
    if (this.queue.length >= this.config.maxQueueSize) {
      throw new ScrapeError('QueueFull', `Submission queue is full (${this.config.maxQueueSize} jobs waiting)`);
    }

    this.prune();

    const record: IJobRecord = {
      jobId: uuidv4(),
      url,
      selectors,
      mode: mode ?? ScrapeMode.AUTO,
      status: ScrapeStatus.QUEUED,
      submittedAt: new Date(),
    };
    this.jobs.set(record.jobId, { record, controller: new AbortController() });

    logger.info(`Job ${record.jobId}: queued ${record.url} (mode: ${record.mode})`);
    this.emitStatus(record, 'Job queued');

    const taker = this.takers.shift();
    if (taker) {
      taker(this.claim(record.jobId));
    } else {
      this.queue.push(record.jobId);
    }

    return record.jobId;
  }

  status(jobId: string): IJobSummary {
    return toSummary(this.entry(jobId).record);
  }

  /**
   * Job summaries, most recently submitted first
   */
  list(limit: number = 20): IJobSummary[] {
    // Map order is submission order
    return Array.from(this.jobs.values())
      .map((entry) => entry.record)
      .reverse()
      .slice(0, Math.max(0, limit))
      .map(toSummary);
  }

  /**
   * Queued jobs are removed and failed with Cancelled right away; running jobs
   * are signalled and end Cancelled at their next suspension point.
   */
  async cancel(jobId: string): Promise<void> {
    const entry = this.entry(jobId);
    const { record, controller } = entry;

    if (TERMINAL_STATUSES.has(record.status)) {
      throw new ScrapeError('AlreadyTerminal', `Job ${jobId} has already ${record.status}`);
    }
    if (controller.signal.aborted) {
      return;
    }

    controller.abort();

    if (record.status === ScrapeStatus.RUNNING) {
      logger.info(`Job ${jobId}: cancellation requested`);
      return;
    }

    const index = this.queue.indexOf(jobId);
    if (index !== -1) this.queue.splice(index, 1);

    logger.info(`Job ${jobId}: cancelled while queued`);
    await this.finish(jobId, buildFailedResult(record, cancelledError()));
  }

  /**
   * Result of a terminal job. NotReady while queued or running.
   */
  async result(jobId: string): Promise<IScrapeResult> {
    const entry = this.jobs.get(jobId);

    if (!entry) {
      // Evicted from memory, but the store may still hold it
      const stored = await this.store.read(jobId);
      if (!stored) {
        throw new ScrapeError('NotFound', `Job ${jobId} not found`);
      }
      return stored;
    }

    const { record } = entry;
    if (!TERMINAL_STATUSES.has(record.status)) {
      throw new ScrapeError('NotReady', `Job ${jobId} is ${record.status}`);
    }

    const stored = await this.store.read(jobId);
    if (stored) {
      return stored;
    }

    // Only reachable when persisting a failure itself failed
    return buildFailedResult(
      record,
      new ScrapeError(record.errorCode ?? 'Internal', record.errorMessage ?? 'Internal error while processing job'),
      [],
      record.completedAt
    );
  }

  /**
   * Wait for the next queued job. Resolves null once the manager closes or
   * the signal aborts.
   */
  take(signal?: AbortSignal): Promise<ClaimedJob | null> {
    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }

    const jobId = this.queue.shift();
    if (jobId !== undefined) {
      return Promise.resolve(this.claim(jobId));
    }

    return new Promise<ClaimedJob | null>((resolve) => {
      const taker: Taker = (claimed) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(claimed);
      };
      const onAbort = (): void => {
        const index = this.takers.indexOf(taker);
        if (index !== -1) this.takers.splice(index, 1);
        resolve(null);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.takers.push(taker);
    });
  }

  /**
   * queued → running. False when the job was cancelled in the meantime.
   */
  markRunning(jobId: string): boolean {
    const entry = this.entry(jobId);
    if (entry.controller.signal.aborted || entry.record.status !== ScrapeStatus.QUEUED) {
      return false;
    }

    this.transition(entry.record, ScrapeStatus.RUNNING);
    entry.record.startedAt = new Date();
    logger.info(`Job ${jobId}: running`);
    this.emitStatus(entry.record, 'Job started');
    return true;
  }

  /**
   * Persist the result, then move the job to its terminal state
   */
  async finish(jobId: string, result: IScrapeResult): Promise<void> {
    const entry = this.entry(jobId);
    if (TERMINAL_STATUSES.has(entry.record.status)) {
      throw new ScrapeError('AlreadyTerminal', `Job ${jobId} has already ${entry.record.status}`);
    }

    let final = result;
    try {
      await this.store.write(jobId, result);
    } catch (error) {
      logger.error(`Job ${jobId}: failed to persist result`, error);
      // A completed job must never be observable without its result
      if (result.status === ScrapeStatus.COMPLETED) {
        final = buildFailedResult(entry.record, new ScrapeError('Internal', 'Internal error while processing job'));
        await this.store
          .write(jobId, final)
          .catch((retryError: unknown) => logger.error(`Job ${jobId}: failed to persist failure`, retryError));
      }
    }

    const record = entry.record;
    this.transition(record, final.status);
    record.completedAt = new Date();
    record.errorCode = final.error_code;
    record.errorMessage = final.error_message;

    if (final.status === ScrapeStatus.COMPLETED) {
      logger.info(`Job ${jobId}: completed with ${final.metadata.data_items_count} record(s)`);
      this.emitStatus(record, 'Job completed');
    } else {
      logger.warn(`Job ${jobId}: failed (${final.error_code}) ${final.error_message ?? ''}`);
      this.emitStatus(record, final.error_message ?? 'Job failed');
    }

    this.prune();
  }

  get(jobId: string): Readonly<IJobRecord> | undefined {
    return this.jobs.get(jobId)?.record;
  }

  stats(): JobManagerStats {
    const counts: Record<ScrapeStatus, number> = {
      [ScrapeStatus.QUEUED]: 0,
      [ScrapeStatus.RUNNING]: 0,
      [ScrapeStatus.COMPLETED]: 0,
      [ScrapeStatus.FAILED]: 0,
    };
    for (const { record } of this.jobs.values()) {
      counts[record.status]++;
    }
    return {
      queued: counts[ScrapeStatus.QUEUED],
      running: counts[ScrapeStatus.RUNNING],
      completed: counts[ScrapeStatus.COMPLETED],
      failed: counts[ScrapeStatus.FAILED],
      total: this.jobs.size,
      queueCapacity: this.config.maxQueueSize,
      waitingWorkers: this.takers.length,
    };
  }

  /**
   * Stop handing out work; idle workers get null from take()
   */
  close(): void {
    this.closed = true;
    const takers = this.takers.splice(0);
    for (const taker of takers) {
      taker(null);
    }
  }

  private claim(jobId: string): ClaimedJob {
    const entry = this.entry(jobId);
    return { job: entry.record, signal: entry.controller.signal };
  }

  private entry(jobId: string): JobEntry {
    const entry = this.jobs.get(jobId);
    if (!entry) {
      throw new ScrapeError('NotFound', `Job ${jobId} not found`);
    }
    return entry;
  }

  private transition(record: IJobRecord, to: ScrapeStatus): void {
    if (!ALLOWED_TRANSITIONS[record.status].includes(to)) {
      throw new Error(`Illegal job transition ${record.status} -> ${to} for ${record.jobId}`);
    }
    record.status = to;
  }

  private emitStatus(record: IJobRecord, message: string): void {
    const event: IJobStatusEvent = {
      jobId: record.jobId,
      state: record.status,
      message,
      ...(record.errorCode !== undefined ? { errorCode: record.errorCode } : {}),
      timestamp: new Date().toISOString(),
    };
    this.emit(JOB_STATUS_EVENT, event);
  }

  /**
   * Evict terminal jobs past the TTL, then the oldest terminal jobs over the cap
   */
  private prune(): void {
    const now = Date.now();

    for (const [jobId, { record }] of this.jobs) {
      if (record.completedAt && now - record.completedAt.getTime() > this.config.retentionTtlMs) {
        this.jobs.delete(jobId);
      }
    }

    let excess = this.jobs.size - this.config.retentionMax;
    if (excess <= 0) return;

    const terminal = Array.from(this.jobs.values())
      .map((entry) => entry.record)
      .filter((record) => TERMINAL_STATUSES.has(record.status))
      .sort((a, b) => (a.completedAt?.getTime() ?? 0) - (b.completedAt?.getTime() ?? 0));

    for (const record of terminal) {
      if (excess <= 0) break;
      this.jobs.delete(record.jobId);
      excess--;
    }
  }
}
