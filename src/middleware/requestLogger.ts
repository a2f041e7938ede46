/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - REQUEST LOGGER MIDDLEWARE
 * ============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import logger from '../config/logger';

const log = logger.child('http');

/**
 * Request logger middleware
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header ? header : uuidv4();

  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  log.debug('Request started', {
    requestId,
    method: req.method,
    url: req.originalUrl,
    ipAddress: req.ip,
  });

  res.on('finish', () => {
    const meta = {
      requestId,
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
      userId: req.user?.id,
    };

    if (res.statusCode >= 400) {
      log.warn('Request completed', meta);
    } else {
      log.info('Request completed', meta);
    }
  });

  next();
}

export default requestLogger;
