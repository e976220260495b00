/**
 * Scraper Controller
 * HTTP request/response handling for scraping endpoints
 */

import { Request, Response } from 'express';
import { asyncHandler } from '../../middleware/error-handler';
import type { ScrapeEngine } from './scraper.engine';
import { IJobSummary, IScrapeResult } from './scraper.types';
import { listQuerySchema } from './scraper.validation';

export interface IJobResponse {
  success: true;
  job: IJobSummary;
}

export interface IJobListResponse {
  success: true;
  jobs: IJobSummary[];
  total: number;
  limit: number;
}

export interface IResultResponse {
  success: true;
  result: IScrapeResult;
}

const DEFAULT_LIST_LIMIT = 20;

export class ScraperController {
  private engine: ScrapeEngine;

  constructor(engine: ScrapeEngine) {
    this.engine = engine;
  }

  /**
   * POST /api/scrape
   * Submit a scrape job; validation happens in the job manager
   */
  createJob = asyncHandler(async (req: Request, res: Response) => {
    const jobId = this.engine.manager.submit(req.body);

    const response: IJobResponse = {
      success: true,
      job: this.engine.manager.status(jobId),
    };

    res.status(202).json(response);
  });

  /**
   * GET /api/scrape
   * Most recent jobs first
   */
  getJobs = asyncHandler(async (req: Request, res: Response) => {
    const { limit = DEFAULT_LIST_LIMIT } = listQuerySchema.parse(req.query);
    const jobs = this.engine.manager.list(limit);

    const response: IJobListResponse = {
      success: true,
      jobs,
      total: jobs.length,
      limit,
    };

    res.json(response);
  });

  /**
   * GET /api/scrape/stats
   */
  getStats = asyncHandler(async (req: Request, res: Response) => {
    res.json({
      success: true,
      stats: this.engine.stats(),
    });
  });

  /**
   * GET /api/scrape/:id
   */
  getJob = asyncHandler(async (req: Request, res: Response) => {
    const response: IJobResponse = {
      success: true,
      job: this.engine.manager.status(req.params.id),
    };

    res.json(response);
  });

  /**
   * GET /api/scrape/:id/result
   * 409 while the job is still queued or running
   */
  getResult = asyncHandler(async (req: Request, res: Response) => {
    const response: IResultResponse = {
      success: true,
      result: await this.engine.manager.result(req.params.id),
    };

    res.json(response);
  });

  /**
   * POST /api/scrape/:id/cancel
   * Cancel a queued or running job
   */
  cancelJob = asyncHandler(async (req: Request, res: Response) => {
    const { id } = req.params;
    await this.engine.manager.cancel(id);

    const response: IJobResponse = {
      success: true,
      job: this.engine.manager.status(id),
    };

    res.json(response);
  });
}
