/**
 * Scraper Module Types
 * Job records, persisted results and transport payloads for the scrape engine
 */

import type { SelectorMap, ExtractedRecord, ExtractionWarning } from '../../lib/extraction';
import type { BackendKind, AttemptOutcome, ScrapeErrorCode } from '../../lib/scraping';

// ============================================================================
// Enums
// ============================================================================

export enum ScrapeStatus {
  QUEUED = 'queued',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export enum ScrapeMode {
  AUTO = 'auto',         // Static fetch, then render only if the detector asks for it
  STATIC = 'static',     // Plain HTTP fetch, never rendered
  DYNAMIC = 'dynamic',   // Always rendered in a headless browser
}

export const TERMINAL_STATUSES: ReadonlySet<ScrapeStatus> = new Set([ScrapeStatus.COMPLETED, ScrapeStatus.FAILED]);

// ============================================================================
// Core Interfaces
// ============================================================================

export interface IScrapeRequest {
  url: string;
  selectors?: SelectorMap;
  mode?: ScrapeMode;
}

/**
 * Authoritative job state, owned by the job manager
 */
export interface IJobRecord {
  jobId: string;
  url: string;
  selectors?: SelectorMap;
  mode: ScrapeMode;
  status: ScrapeStatus;
  submittedAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  errorCode?: ScrapeErrorCode;
  errorMessage?: string;
}

/**
 * Read-only view of a job handed to callers
 */
export interface IJobSummary {
  jobId: string;
  url: string;
  mode: ScrapeMode;
  state: ScrapeStatus;
  submittedAt: string;
  startedAt?: string;
  completedAt?: string;
  errorCode?: ScrapeErrorCode;
  errorMessage?: string;
}

// ============================================================================
// Persisted Result (stable JSON surface)
// ============================================================================

export type ResultStatus = ScrapeStatus.COMPLETED | ScrapeStatus.FAILED;

export interface IAttemptRecord {
  url: string;
  backend: BackendKind;
  attempt: number;
  outcome: AttemptOutcome;
  elapsed_ms: number;
  status_code?: number;
}

export interface IResultMetadata {
  processing_time_seconds: number;
  html_size_bytes: number;
  data_items_count: number;
  final_url: string | null;
  status_code: number | null;
  attempts: IAttemptRecord[];
  warnings: ExtractionWarning[];
}

export interface IScrapeResult {
  job_id: string;
  source_url: string;
  scrape_timestamp: string;
  status: ResultStatus;
  extraction_method: BackendKind | null;
  data: ExtractedRecord[];
  error_code?: ScrapeErrorCode;
  error_message?: string;
  metadata: IResultMetadata;
}

// ============================================================================
// Socket Event Interfaces
// ============================================================================

export interface IJobStatusEvent {
  jobId: string;
  state: ScrapeStatus;
  message: string;
  errorCode?: ScrapeErrorCode;
  timestamp: string;
}

export interface ISubmitAck {
  success: boolean;
  jobId?: string;
  error?: string;
  code?: ScrapeErrorCode;
}

/**
 * Events the server pushes to clients
 */
export interface ServerToClientEvents {
  'scrape:status': (event: IJobStatusEvent) => void;
}

/**
 * Events clients send. Payloads arrive untrusted and are checked by the handlers.
 */
export interface ClientToServerEvents {
  'scrape:subscribe': (jobId: unknown) => void;
  'scrape:unsubscribe': (jobId: unknown) => void;
  'scrape:submit': (payload: unknown, ack?: (response: ISubmitAck) => void) => void;
}
