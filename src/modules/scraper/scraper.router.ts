/**
 * Scraper Router
 * Route definitions for scraping endpoints
 */

import { Router } from 'express';
import { ScraperController } from './scraper.controller';
import type { ScrapeEngine } from './scraper.engine';

export const createScraperRouter = (engine: ScrapeEngine): Router => {
  const router = Router();
  const scraperController = new ScraperController(engine);

  /**
   * @route   POST /api/scrape
   * @desc    Submit a scrape job
   * @access  Public
   */
  router.post('/', scraperController.createJob);

  /**
   * @route   GET /api/scrape/stats
   * @desc    Queue, worker, throttle, breaker and browser pool statistics
   * @access  Public
   */
  router.get('/stats', scraperController.getStats);

  /**
   * @route   GET /api/scrape
   * @desc    List recent jobs (?limit=)
   * @access  Public
   */
  router.get('/', scraperController.getJobs);

  /**
   * @route   GET /api/scrape/:id
   * @desc    Job status
   * @access  Public
   */
  router.get('/:id', scraperController.getJob);

  /**
   * @route   GET /api/scrape/:id/result
   * @desc    Result of a finished job
   * @access  Public
   */
  router.get('/:id/result', scraperController.getResult);

  /**
   * @route   POST /api/scrape/:id/cancel
   * @desc    Cancel a scrape job
   * @access  Public
   */
  router.post('/:id/cancel', scraperController.cancelJob);

  return router;
};
