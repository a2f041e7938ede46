/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - ROUTES INDEX
 * ============================================================================
 */

import { Router, Request, Response } from 'express';
import { config } from '../config/config';
import logger from '../config/logger';
import { authenticate, type TokenOptions } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import type { Services } from '../services';
import { createAppointmentRoutes } from './appointments';
import { createAvailabilityRoutes } from './availability';
import { createConsultationRoutes } from './consultations';

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  latency?: number;
  error?: string;
}

export interface RouteOptions {
  services: Services;
  healthCheck?: () => Promise<HealthStatus>;
  tokens?: TokenOptions;
}

export function createRoutes({ services, healthCheck, tokens }: RouteOptions): Router {
  const router = Router();

  /**
   * @route   GET /api/health
   * @access  Public
   */
  router.get(
    '/health',
    asyncHandler(async (req: Request, res: Response) => {
      const database = healthCheck ? await healthCheck() : undefined;
      const healthy = !database || database.status === 'healthy';

      logger.debug('Health check requested', { ip: req.ip });

      res.status(healthy ? 200 : 503).json({
        success: healthy,
        data: {
          status: healthy ? 'healthy' : 'unhealthy',
          timestamp: new Date().toISOString(),
          version: config.app.version,
          environment: config.env,
          uptime: process.uptime(),
          database,
        },
      });
    })
  );

  const requireAuth = authenticate(tokens);

  router.use('/appointments', requireAuth, createAppointmentRoutes(services));
  router.use('/consultations', requireAuth, createConsultationRoutes(services));
  router.use('/availability', requireAuth, createAvailabilityRoutes(services));

  return router;
}
