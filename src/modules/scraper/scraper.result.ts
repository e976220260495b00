/**
 * Builders for the persisted result record
 */

import type { ExtractionResult } from '../../lib/extraction';
import type { FetchAttempt, ScrapeError } from '../../lib/scraping';
import type { FetchedPage } from './scrapers';
import { IAttemptRecord, IJobRecord, IScrapeResult, ScrapeStatus } from './scraper.types';

function toAttemptRecord(attempt: FetchAttempt): IAttemptRecord {
  return {
    url: attempt.url,
    backend: attempt.backend,
    attempt: attempt.attempt,
    outcome: attempt.outcome,
    elapsed_ms: attempt.elapsedMs,
    ...(attempt.statusCode !== undefined && { status_code: attempt.statusCode }),
  };
}

function elapsedSeconds(startedAt: Date, now: Date): number {
  return Math.max(0, Math.round(now.getTime() - startedAt.getTime())) / 1000;
}

export function buildCompletedResult(
  job: IJobRecord,
  page: FetchedPage,
  extraction: ExtractionResult,
  attempts: FetchAttempt[],
  now: Date = new Date()
): IScrapeResult {
  return {
    job_id: job.jobId,
    source_url: job.url,
    scrape_timestamp: now.toISOString(),
    status: ScrapeStatus.COMPLETED,
    extraction_method: page.backend,
    data: extraction.records,
    metadata: {
      processing_time_seconds: elapsedSeconds(job.startedAt ?? job.submittedAt, now),
      html_size_bytes: Buffer.byteLength(page.markup, 'utf8'),
      data_items_count: extraction.records.length,
      final_url: page.finalUrl,
      status_code: page.statusCode,
      attempts: attempts.map(toAttemptRecord),
      warnings: extraction.warnings,
    },
  };
}

export function buildFailedResult(
  job: IJobRecord,
  error: ScrapeError,
  attempts: FetchAttempt[] = [],
  now: Date = new Date()
): IScrapeResult {
  const last = attempts[attempts.length - 1];

  return {
    job_id: job.jobId,
    source_url: job.url,
    scrape_timestamp: now.toISOString(),
    status: ScrapeStatus.FAILED,
    extraction_method: last ? last.backend : null,
    data: [],
    error_code: error.code,
    error_message: error.message,
    metadata: {
      processing_time_seconds: elapsedSeconds(job.startedAt ?? job.submittedAt, now),
      html_size_bytes: 0,
      data_items_count: 0,
      final_url: null,
      status_code: last?.statusCode ?? null,
      attempts: attempts.map(toAttemptRecord),
      warnings: [],
    },
  };
}
