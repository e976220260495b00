/**
 * Scraper Validation
 * zod schemas for submissions and for persisted result records
 */

import { z } from 'zod';
import { SCRAPE_ERROR_CODES, ScrapeError } from '../../lib/scraping';
import { assertValidSelectors } from '../../lib/extraction';
import { IScrapeRequest, IScrapeResult, ScrapeMode, ScrapeStatus } from './scraper.types';

const targetUrlSchema = z
  .string()
  .trim()
  .url('url must be an absolute URL')
  .refine((value) => /^https?:\/\//i.test(value), 'url must use http or https');

export const scrapeRequestSchema = z.object({
  url: targetUrlSchema,
  selectors: z.record(z.string().min(1, 'selector must not be empty')).optional(),
  mode: z.nativeEnum(ScrapeMode).optional(),
});

export const listQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional(),
});

/**
 * Validate a submission; anything wrong surfaces as ScrapeError{InvalidInput}
 */
export function parseScrapeRequest(input: unknown): IScrapeRequest {
  const parsed = scrapeRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.join('.');
    throw new ScrapeError('InvalidInput', path ? `${path}: ${issue.message}` : issue.message, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }

  if (parsed.data.selectors) {
    assertValidSelectors(parsed.data.selectors);
  }

  return parsed.data;
}

// ============================================================================
// Persisted result schema
// ============================================================================

const attemptSchema = z.object({
  url: z.string(),
  backend: z.enum(['static', 'dynamic']),
  attempt: z.number().int().positive(),
  outcome: z.enum(['success', 'timeout', 'network-error', 'http-error', 'render-error', 'circuit-open']),
  elapsed_ms: z.number().nonnegative(),
  status_code: z.number().int().optional(),
});

const warningSchema = z.object({
  code: z.literal('ExtractionWarning'),
  field: z.string(),
  selector: z.string(),
  message: z.string(),
});

export const scrapeResultSchema = z.object({
  job_id: z.string(),
  source_url: z.string(),
  scrape_timestamp: z.string(),
  status: z.union([z.literal(ScrapeStatus.COMPLETED), z.literal(ScrapeStatus.FAILED)]),
  extraction_method: z.enum(['static', 'dynamic']).nullable(),
  data: z.array(z.record(z.union([z.string(), z.array(z.string())]))),
  error_code: z.enum(SCRAPE_ERROR_CODES).optional(),
  error_message: z.string().optional(),
  metadata: z.object({
    processing_time_seconds: z.number().nonnegative(),
    html_size_bytes: z.number().int().nonnegative(),
    data_items_count: z.number().int().nonnegative(),
    final_url: z.string().nullable(),
    status_code: z.number().int().nullable(),
    attempts: z.array(attemptSchema),
    warnings: z.array(warningSchema),
  }),
});

export function parseScrapeResult(raw: unknown): IScrapeResult {
  return scrapeResultSchema.parse(raw);
}
