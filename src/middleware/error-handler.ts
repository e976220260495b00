/**
 * Error Handler Middleware
 * API errors, async route wrapper and the terminal express error handler
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { logger } from '../lib/logger';
import { ScrapeError, ScrapeErrorCode } from '../lib/scraping';

export class ApiError extends Error {
  readonly statusCode: number;
  readonly code?: string;

  constructor(statusCode: number, message: string, code?: string) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

export interface ErrorResponse {
  success: false;
  error: string;
  code?: string;
}

const STATUS_BY_CODE: Partial<Record<ScrapeErrorCode, number>> = {
  InvalidInput: 400,
  NotFound: 404,
  NotReady: 409,
  AlreadyTerminal: 409,
  QueueFull: 429,
  Throttled: 503,
  CircuitOpen: 503,
};

export function statusForScrapeError(error: ScrapeError): number {
  return STATUS_BY_CODE[error.code] ?? 500;
}

/**
 * Forward rejected promises from async handlers to the error handler
 */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

function hasStatus(error: unknown): error is { status: number; message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

function toErrorResponse(error: unknown): { statusCode: number; body: ErrorResponse } {
  if (error instanceof ApiError) {
    return {
      statusCode: error.statusCode,
      body: { success: false, error: error.message, ...(error.code ? { code: error.code } : {}) },
    };
  }

  if (error instanceof ScrapeError) {
    return {
      statusCode: statusForScrapeError(error),
      body: { success: false, error: error.message, code: error.code },
    };
  }

  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    const message = issue ? (path ? `${path}: ${issue.message}` : issue.message) : 'Invalid request';
    return { statusCode: 400, body: { success: false, error: message, code: 'InvalidInput' } };
  }

  // body-parser failures (malformed JSON, oversized payloads) carry their own status
  if (hasStatus(error) && error.status >= 400 && error.status < 500) {
    return { statusCode: error.status, body: { success: false, error: error.message, code: 'InvalidInput' } };
  }

  return {
    statusCode: 500,
    body: { success: false, error: 'Internal server error', code: 'Internal' },
  };
}

export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const { statusCode, body } = toErrorResponse(error);

  if (statusCode >= 500) {
    logger.error(`${req.method} ${req.path} failed:`, error);
  } else {
    logger.debug(`${req.method} ${req.path} -> ${statusCode} ${body.error}`);
  }

  res.status(statusCode).json(body);
};
