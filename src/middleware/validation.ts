/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - VALIDATION MIDDLEWARE
 * ============================================================================
 *
 * Route params and query strings are checked with express-validator; request
 * bodies are validated by the services with zod.
 */

import { Request, Response, NextFunction } from 'express';
import { param, query, validationResult, ValidationChain } from 'express-validator';
import logger from '../config/logger';
import { type ErrorDetails, ValidationError } from '../utils/errors';
import { CALENDAR_DATE_PATTERN } from '../utils/helpers';

const log = logger.child('validation');

/**
 * Validation result handler
 */
export function handleValidationErrors() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const errors = validationResult(req);

    if (!errors.isEmpty()) {
      const details: ErrorDetails[] = errors.array().map((error) => ({
        code: 'invalid_request',
        message: String(error.msg),
        field: error.type === 'field' ? error.path : error.type,
      }));

      log.warn('Validation failed', { errors: details, path: req.path, method: req.method });
      next(new ValidationError('Validation failed', details));
      return;
    }

    next();
  };
}

/**
 * Run validation chains followed by the result handler
 */
export function validate(...validations: ValidationChain[]) {
  return [...validations, handleValidationErrors()];
}

export const commonValidations = {
  id: param('id').isUUID().withMessage('Invalid ID format'),
  providerIdQuery: query('providerId').isUUID().withMessage('providerId must be a UUID'),
  optionalProviderIdQuery: query('providerId').optional().isUUID().withMessage('providerId must be a UUID'),
  dateQuery: query('date').matches(CALENDAR_DATE_PATTERN).withMessage('date must be YYYY-MM-DD'),
};

/**
 * Read a query parameter that express-validator has already checked
 */
export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}
