import type { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger';
import { ExternalCallError, HttpError, asError } from '../lib/errors';

/**
 * Global API error handler — consistent JSON responses.
 */
export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const e = asError(err);
  const statusCode = e instanceof HttpError ? e.statusCode : 500;
  const message = e.message || 'Internal server error';

  if (statusCode >= 500) {
    logger.error('API', message, {
      ...(e instanceof ExternalCallError && { source: e.source }),
      stack: e.stack
    });
  } else {
    logger.warn('API', message);
  }

  res.status(statusCode).json({
    error: message,
    ...(process.env.NODE_ENV !== 'production' && statusCode >= 500 && e.stack !== undefined && { stack: e.stack })
  });
}

/**
 * Async route wrapper — catches errors and forwards to errorHandler.
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
