import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../config/logger';
import { AnalysisError } from '../services/analysis/energy-analyzer.service';
import { SourceUnavailableError } from '../services/sources/source-fetcher.interface';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Wrap an async route handler so rejections reach the error middleware.
 */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };

const statusFor = (err: Error): number => {
  if (err instanceof AppError) return err.statusCode;
  if (err instanceof SourceUnavailableError) return 404;
  if (err instanceof AnalysisError) return 422;
  // malformed JSON bodies
  if (err instanceof SyntaxError) return 400;
  return 500;
};

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction): void => {
  const statusCode = statusFor(err);

  if (statusCode >= 500) {
    logger.error('Request failed', { method: req.method, path: req.path, error: err.message, stack: err.stack });
  } else {
    logger.warn('Request rejected', { method: req.method, path: req.path, statusCode, error: err.message });
  }

  res.status(statusCode).json({
    success: false,
    message: statusCode >= 500 && process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    ...(err instanceof AnalysisError ? { stage: err.stage } : {}),
  });
};
