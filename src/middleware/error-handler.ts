/**
 * Standardized Error Handling Middleware
 *
 * Renders every failure as an `ApiError` body. Domain errors map to status
 * codes here so route handlers can simply throw.
 *
 * @module middleware/error-handler
 */

import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { EncodingError, IndexCorruptionError } from '../core/errors';
import { logger } from '../utils/logger';

export interface ApiError {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
  timestamp: number;
  path: string;
}

export enum ErrorCode {
  INVALID_REQUEST = 'invalid_request',
  VALIDATION_ERROR = 'validation_error',
  NOT_FOUND = 'not_found',
  INTERNAL_ERROR = 'internal_error',
  INDEX_CORRUPTION = 'index_corruption',
  TIMEOUT = 'timeout',
  DEPENDENCY_ERROR = 'dependency_error'
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

const encodingStatus = (error: EncodingError): { code: ErrorCode; statusCode: number } => {
  switch (error.reason) {
    case 'empty_text':
      return { code: ErrorCode.INVALID_REQUEST, statusCode: 400 };
    case 'timeout':
      return { code: ErrorCode.TIMEOUT, statusCode: 503 };
    default:
      return { code: ErrorCode.DEPENDENCY_ERROR, statusCode: 503 };
  }
};

function formatErrorResponse(error: Error, req: Request): ApiError {
  const base = { timestamp: Date.now(), path: req.path };

  if (error instanceof ZodError) {
    return {
      error: ErrorCode.VALIDATION_ERROR,
      message: 'Request validation failed',
      statusCode: 400,
      details: error.flatten(),
      ...base
    };
  }

  if (error instanceof AppError) {
    return {
      error: error.code,
      message: error.message,
      statusCode: error.statusCode,
      details: error.details,
      ...base
    };
  }

  if (error instanceof EncodingError) {
    return {
      error: encodingStatus(error).code,
      message: error.message,
      statusCode: encodingStatus(error).statusCode,
      details: { reason: error.reason, retryable: error.retryable },
      ...base
    };
  }

  if (error instanceof IndexCorruptionError) {
    return {
      error: ErrorCode.INDEX_CORRUPTION,
      message: error.message,
      statusCode: 500,
      details: { expectedDimensions: error.expectedDimensions, actualDimensions: error.actualDimensions },
      ...base
    };
  }

  // body-parser errors carry their own status (400 for malformed JSON, 413 for oversize)
  const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;

  return {
    error: statusCode < 500 ? ErrorCode.INVALID_REQUEST : ErrorCode.INTERNAL_ERROR,
    message: error.message || 'An unexpected error occurred',
    statusCode,
    ...base
  };
}

/**
 * Global error handler middleware
 */
export const errorHandler: ErrorRequestHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const errorResponse = formatErrorResponse(err, req);

  if (errorResponse.statusCode >= 500) {
    logger.error('Server error', {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
      statusCode: errorResponse.statusCode
    });
  } else {
    logger.warn('Client error', {
      error: err.message,
      path: req.path,
      method: req.method,
      statusCode: errorResponse.statusCode
    });
  }

  res.status(errorResponse.statusCode).json(errorResponse);
};

/**
 * Async handler wrapper - catches async errors and passes to error middleware
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export function notFoundHandler(req: Request, res: Response): void {
  const error: ApiError = {
    error: ErrorCode.NOT_FOUND,
    message: `Route ${req.method} ${req.path} not found`,
    statusCode: 404,
    timestamp: Date.now(),
    path: req.path
  };

  logger.warn('Route not found', {
    path: req.path,
    method: req.method
  });

  res.status(404).json(error);
}
