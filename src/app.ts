/**
 * Express Application Configuration
 */

import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { ApiError, errorHandler } from './middleware/error-handler';
import type { ScrapeEngine } from './modules/scraper/scraper.engine';
import { createScraperRouter } from './modules/scraper/scraper.router';

export const createApp = (engine: ScrapeEngine): Application => {
  const app = express();

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  app.use(helmet());

  app.use(
    cors({
      origin: env.CLIENT_URL,
      credentials: true,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/health', (req: Request, res: Response) => {
    const { jobs, workers } = engine.stats();
    res.json({
      success: true,
      message: 'Scrape engine is running',
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
      queued: jobs.queued,
      running: jobs.running,
      workers: workers.workers,
    });
  });

  app.use('/api/scrape', createScraperRouter(engine));

  // 404 Handler
  app.use((_req: Request, _res: Response, next: NextFunction) => {
    next(new ApiError(404, 'Route not found', 'NotFound'));
  });

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};
