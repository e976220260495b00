/**
 * Scraper Repository
 * Write-once result persistence, on disk or in MongoDB
 */

import { promises as fs } from 'fs';
import path from 'path';
import { logger } from '../../lib/logger';
import { ScrapeResultModel } from './scraper.model';
import { IScrapeResult } from './scraper.types';
import { parseScrapeResult } from './scraper.validation';

export interface ResultStore {
  /** Rejects with DuplicateResultError when the job already has a result */
  write(jobId: string, result: IScrapeResult): Promise<void>;
  read(jobId: string): Promise<IScrapeResult | null>;
}

export class DuplicateResultError extends Error {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Result for job ${jobId} has already been written`);
    this.name = 'DuplicateResultError';
    this.jobId = jobId;
  }
}

const SAFE_JOB_ID = /^[A-Za-z0-9_-]+$/;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * One `<jobId>.json` file per job under the output directory
 */
export class FileResultStore implements ResultStore {
  private outputDir: string;
  private pending: Set<string> = new Set();

  constructor(outputDir: string) {
    this.outputDir = path.resolve(outputDir);
  }

  async write(jobId: string, result: IScrapeResult): Promise<void> {
    const target = this.pathFor(jobId);

    if (this.pending.has(jobId)) {
      throw new DuplicateResultError(jobId);
    }
    this.pending.add(jobId);

    const temp = `${target}.${process.pid}.${Date.now()}.tmp`;
    try {
      if (await this.exists(target)) {
        throw new DuplicateResultError(jobId);
      }
      await fs.mkdir(this.outputDir, { recursive: true });
      await fs.writeFile(temp, JSON.stringify(result, null, 2), 'utf8');
      await fs.rename(temp, target);
      logger.debug(`Result for job ${jobId} saved to ${target}`);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    } finally {
      this.pending.delete(jobId);
    }
  }

  async read(jobId: string): Promise<IScrapeResult | null> {
    if (!SAFE_JOB_ID.test(jobId)) {
      return null;
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.pathFor(jobId), 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    return parseScrapeResult(JSON.parse(raw));
  }

  private pathFor(jobId: string): string {
    if (!SAFE_JOB_ID.test(jobId)) {
      throw new Error(`Invalid job id for result file: ${jobId}`);
    }
    return path.join(this.outputDir, `${jobId}.json`);
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await fs.access(file);
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Results stored in the `scraperesults` collection, unique on job_id
 */
export class MongoResultStore implements ResultStore {
  async write(jobId: string, result: IScrapeResult): Promise<void> {
    try {
      await ScrapeResultModel.create(result);
    } catch (error) {
      if (isErrnoException(error) && String(error.code) === '11000') {
        throw new DuplicateResultError(jobId);
      }
      throw error;
    }
  }

  async read(jobId: string): Promise<IScrapeResult | null> {
    const doc: unknown = await ScrapeResultModel.findOne({ job_id: jobId }).select('-_id').lean().exec();
    if (!doc) {
      return null;
    }
    return parseScrapeResult(doc);
  }
}
