/**
 * Global error handler middleware
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { config } from '../../config/index.js';
import { EngineError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const errorLogger = logger.child({ middleware: 'errorHandler' });

export interface ApiError extends Error {
  statusCode?: number;
  code?: string;
  details?: unknown;
}

export function errorHandler(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
    errorLogger.debug({ path: req.path, issues: err.errors.length }, 'Validation failed');
    res.status(400).json({
      error: 'Validation error',
      code: 'VALIDATION_ERROR',
      details: err.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      })),
    });
    return;
  }

  // Engine errors carry their own status and are part of the contract
  if (err instanceof EngineError) {
    errorLogger.warn(
      { error: err.message, code: err.code, path: req.path, method: req.method },
      'Rejected request'
    );
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      ...(config.isProduction ? {} : { details: err.details }),
    });
    return;
  }

  errorLogger.error(
    {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
      code: err.code,
    },
    'Request error'
  );

  // Handle known errors with status codes (body-parser, createApiError)
  if (err.statusCode) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code || 'ERROR',
      ...(config.isProduction ? {} : { details: err.details }),
    });
    return;
  }

  // Handle unknown errors
  res.status(500).json({
    error: config.isProduction ? 'Internal server error' : err.message,
    code: 'INTERNAL_ERROR',
    ...(config.isProduction ? {} : { stack: err.stack }),
  });
}

// Helper to create API errors
export function createApiError(
  message: string,
  statusCode: number,
  code?: string,
  details?: unknown
): ApiError {
  return Object.assign(new Error(message), { statusCode, code, details });
}
