/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - AVAILABILITY ROUTES
 * ============================================================================
 */

import { Router } from 'express';
import { createAvailabilityController } from '../controllers/availabilityController';
import { authorize } from '../middleware/auth';
import { commonValidations, validate } from '../middleware/validation';
import type { Services } from '../services';

export function createAvailabilityRoutes(services: Services): Router {
  const router = Router();
  const controller = createAvailabilityController(services);
  const manage = authorize('provider', 'admin');
  const byId = validate(commonValidations.id);

  // Time-off first so `/time-off` is not taken for an id
  router.get('/time-off', validate(commonValidations.optionalProviderIdQuery), controller.listTimeOff);
  router.post('/time-off', manage, controller.addTimeOff);
  router.delete('/time-off/:id', manage, byId, controller.deleteTimeOff);

  router.get('/', validate(commonValidations.optionalProviderIdQuery), controller.list);
  router.post('/', manage, controller.create);
  router.put('/:id', manage, byId, controller.update);
  router.delete('/:id', manage, byId, controller.delete);

  return router;
}
