/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - ERROR HANDLING MIDDLEWARE
 * ============================================================================
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { JsonWebTokenError, TokenExpiredError } from 'jsonwebtoken';
import { ZodError } from 'zod';
import { config } from '../config/config';
import logger, { errorMessage } from '../config/logger';
import {
  AppError,
  AuthenticationError,
  type ErrorDetails,
  NotFoundError,
  ValidationError,
  handlePgError,
  handleZodError,
  isPgError,
} from '../utils/errors';

const log = logger.child('errors');

/**
 * Error response body
 */
export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  errorCode: string;
  details?: ErrorDetails[];
  timestamp: string;
  path: string;
  requestId?: string;
  stack?: string;
}

/**
 * Convert anything thrown by a handler into an AppError
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  if (error instanceof TokenExpiredError) return new AuthenticationError('Token has expired');
  if (error instanceof JsonWebTokenError) return new AuthenticationError('Invalid token');
  if (error instanceof ZodError) return handleZodError(error);
  if (isPgError(error)) return handlePgError(error);
  if (error instanceof SyntaxError && 'body' in error) return new ValidationError('Malformed JSON body');

  return new AppError(config.isProduction ? 'Something went wrong' : errorMessage(error), 500, 'INTERNAL_ERROR', false);
}

export function formatErrorResponse(error: AppError, req: Request): ErrorResponse {
  const response: ErrorResponse = {
    error: error.name,
    message: error.message,
    statusCode: error.statusCode,
    errorCode: error.errorCode,
    details: error.details,
    timestamp: new Date().toISOString(),
    path: req.path,
    requestId: req.requestId,
  };

  if (config.isDevelopment) {
    response.stack = error.stack;
  }

  // Generic message for unexpected server errors
  if (config.isProduction && error.statusCode >= 500 && !error.isOperational) {
    response.message = 'Internal server error';
    delete response.details;
  }

  return response;
}

function logError(error: AppError, req: Request): void {
  const logData = {
    error: error.message,
    errorCode: error.errorCode,
    statusCode: error.statusCode,
    method: req.method,
    path: req.path,
    requestId: req.requestId,
    userId: req.user?.id,
  };

  if (error.statusCode >= 500) {
    log.error('Server error', { ...logData, stack: error.stack });
  } else {
    log.warn('Client error', logData);
  }
}

/**
 * Main error handling middleware
 */
export function errorHandler() {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const appError = toAppError(error);
    logError(appError, req);
    res.status(appError.statusCode).json(formatErrorResponse(appError, req));
  };
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new NotFoundError(`Route ${req.method} ${req.path}`));
  };
}

/**
 * Async error wrapper
 */
export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Global exception handlers
 */
export function setupGlobalErrorHandlers(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', {
      error: error.message,
      stack: error.stack,
      severity: 'critical',
    });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', {
      reason: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
      severity: 'critical',
    });
    process.exit(1);
  });

  process.on('warning', (warning: Error) => {
    logger.warn('Process Warning', {
      name: warning.name,
      message: warning.message,
    });
  });
}
