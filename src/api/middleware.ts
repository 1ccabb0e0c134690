import { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { config } from '../config/environment';
import { AppError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Wrap an async route handler so rejected promises reach the error handler.
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();
  res.on('finish', () => {
    logger.http('Request completed', {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - startedAt
    });
  });
  next();
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Cannot ${req.method} ${req.path}`
    }
  });
}

function isBodyParseError(error: Error): boolean {
  return 'type' in error && error.type === 'entity.parse.failed';
}

function toAppError(error: Error): Error {
  if (error instanceof ZodError) {
    return ValidationError.fromZodError(error);
  }
  if (isBodyParseError(error)) {
    return ValidationError.forField('body', 'Request body is not valid JSON.');
  }
  return error;
}

/**
 * Map errors to responses. Must be registered after every router.
 */
export function errorHandler(error: Error, req: Request, res: Response, _next: NextFunction): void {
  const appError = toAppError(error);

  if (appError instanceof AppError) {
    if (appError.statusCode >= 500) {
      logger.error('Request failed', { path: req.path, method: req.method, error: appError.message });
    } else {
      logger.warn('Request rejected', { path: req.path, method: req.method, code: appError.code, error: appError.message });
    }

    res.status(appError.statusCode).json({
      success: false,
      error: {
        code: appError.code,
        message: appError.message,
        ...(appError.details && { details: appError.details })
      }
    });
    return;
  }

  logger.error('Unhandled request error', {
    path: req.path,
    method: req.method,
    error: appError.message,
    stack: appError.stack
  });

  res.status(500).json({
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      message: config.isProduction ? 'An unexpected error occurred. Please try again later.' : appError.message
    }
  });
}
