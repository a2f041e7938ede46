/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - CONSULTATION ROUTES
 * ============================================================================
 */

import { Router } from 'express';
import { createConsultationController } from '../controllers/consultationController';
import { authorize } from '../middleware/auth';
import { commonValidations, validate } from '../middleware/validation';
import type { Services } from '../services';

export function createConsultationRoutes(services: Services): Router {
  const router = Router();
  const controller = createConsultationController(services);
  const byId = validate(commonValidations.id);

  router.post('/', authorize('provider', 'admin'), controller.create);
  router.get('/:id', byId, controller.get);
  router.patch('/:id', authorize('provider', 'admin'), byId, controller.updateNotes);
  router.delete('/:id', authorize('provider', 'admin'), byId, controller.delete);

  /**
   * @route   POST /api/consultations/:id/start
   * @access  Provider, Admin
   */
  router.post('/:id/start', authorize('provider', 'admin'), byId, controller.start);
  router.post('/:id/end', authorize('provider', 'admin'), byId, controller.end);

  /**
   * @route   GET /api/consultations/:id/join-info
   * @access  Appointment patient or provider
   */
  router.get('/:id/join-info', byId, controller.joinInfo);
  router.post('/:id/access-code', byId, controller.requestAccessCode);
  router.post('/:id/access-code/verify', byId, controller.verifyAccessCode);

  return router;
}
