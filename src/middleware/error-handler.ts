/**
 * Error Handler
 * API error type, async route wrapper and the terminal error middleware
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { EmptySeriesError, UnknownDatasetError, UpstreamError } from '../lib/errors';

export class ApiError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
  }
}

/**
 * Forward rejections from async handlers to the error middleware
 */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

/**
 * Error middleware (must be registered last)
 */
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
): void => {
  if (err instanceof ApiError) {
    res.status(err.statusCode).json({ success: false, error: err.message });
    return;
  }

  if (err instanceof UnknownDatasetError) {
    res.status(404).json({ success: false, error: err.message });
    return;
  }

  if (err instanceof UpstreamError) {
    console.error(`Upstream failure on ${req.method} ${req.path}: [${err.type}] ${err.message}`);
    res.status(503).json({ success: false, error: 'Data unavailable', details: err.toJSON() });
    return;
  }

  if (err instanceof EmptySeriesError) {
    console.error(`Empty series on ${req.method} ${req.path}: ${err.message}`);
    res.status(503).json({ success: false, error: 'Data unavailable', details: { message: err.message } });
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.path}:`, err);
  res.status(500).json({ success: false, error: 'Internal server error' });
};
