/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - ERROR TYPES
 * ============================================================================
 */

import { ZodError } from 'zod';

// ============================================================================
// ERROR TYPES AND INTERFACES
// ============================================================================

export interface ErrorDetails {
  code: string;
  message: string;
  field?: string;
  context?: Record<string, unknown>;
}

// ============================================================================
// CUSTOM ERROR CLASSES
// ============================================================================

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly errorCode: string;
  public readonly isOperational: boolean;
  public readonly details?: ErrorDetails[];

  constructor(
    message: string,
    statusCode: number = 500,
    errorCode: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: ErrorDetails[]
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.errorCode = errorCode;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails[]) {
    super(message, 400, 'VALIDATION_ERROR', true, details);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(message, 401, 'AUTHENTICATION_ERROR');
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = 'Insufficient permissions') {
    super(message, 403, 'AUTHORIZATION_ERROR');
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: ErrorDetails[]) {
    super(message, 409, 'CONFLICT', true, details);
  }
}

/**
 * A lifecycle operation was attempted from a state that forbids it
 */
export class InvalidTransitionError extends AppError {
  constructor(message: string, errorCode: string = 'INVALID_TRANSITION') {
    super(message, 409, errorCode);
  }
}

export class AlreadyStartedError extends InvalidTransitionError {
  constructor() {
    super('Consultation has already started', 'ALREADY_STARTED');
  }
}

export class NotStartedError extends InvalidTransitionError {
  constructor() {
    super('Consultation has not been started', 'NOT_STARTED');
  }
}

export class AlreadyEndedError extends InvalidTransitionError {
  constructor() {
    super('Consultation has already ended', 'ALREADY_ENDED');
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(service: string, message?: string) {
    super(message || `External service ${service} is unavailable`, 503, 'EXTERNAL_SERVICE_ERROR');
    this.service = service;
  }
}

export class DatabaseError extends AppError {
  constructor(message: string) {
    super(message, 500, 'DATABASE_ERROR', false);
  }
}

// ============================================================================
// ERROR CONVERSION
// ============================================================================

/**
 * Convert Zod validation errors
 */
export function handleZodError(error: ZodError): ValidationError {
  const details: ErrorDetails[] = error.errors.map((issue) => ({
    code: issue.code,
    message: issue.message,
    field: issue.path.join('.'),
  }));

  return new ValidationError('Validation failed', details);
}

interface PgErrorLike {
  code: string;
  message: string;
  constraint?: string;
}

export function isPgError(error: unknown): error is PgErrorLike {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    /^[0-9A-Z]{5}$/.test(error.code)
  );
}

/**
 * Convert PostgreSQL errors raised inside scheduling transactions
 */
export function handlePgError(error: PgErrorLike): AppError {
  switch (error.code) {
    case '23P01':
      // exclusion constraint: overlapping active appointments
      return new ConflictError('Provider already has an appointment during this time', [
        { code: 'overlap', message: 'Time range overlaps an existing appointment' },
      ]);

    case '40001':
    case '40P01':
      return new ConflictError('Concurrent booking detected, please retry', [
        { code: 'overlap', message: 'Another booking for this provider committed first' },
      ]);

    case '23505':
      return new ConflictError(`Duplicate record${error.constraint ? ` (${error.constraint})` : ''}`);

    case '23503':
      return new ValidationError('Invalid reference to related record');

    case '22P02':
      return new ValidationError('Invalid identifier format');

    default:
      return new DatabaseError('Database operation failed');
  }
}
