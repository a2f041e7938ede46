/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - APPOINTMENT ROUTES
 * ============================================================================
 */

import { Router } from 'express';
import { createAppointmentController } from '../controllers/appointmentController';
import { authorize } from '../middleware/auth';
import { commonValidations, validate } from '../middleware/validation';
import type { Services } from '../services';

export function createAppointmentRoutes(services: Services): Router {
  const router = Router();
  const controller = createAppointmentController(services);

  /**
   * @route   POST /api/appointments
   * @desc    Book an appointment
   */
  router.post('/', controller.create);

  /**
   * @route   GET /api/appointments/upcoming
   * @desc    Upcoming appointments of the caller
   */
  router.get('/upcoming', controller.upcoming);

  /**
   * @route   GET /api/appointments/available-slots
   * @desc    Open slots for a provider on a date
   */
  router.get(
    '/available-slots',
    validate(commonValidations.providerIdQuery, commonValidations.dateQuery),
    controller.availableSlots
  );

  /**
   * @route   POST /api/appointments/send-reminders
   * @access  Admin
   */
  router.post('/send-reminders', authorize('admin'), controller.sendReminders);

  router.get('/:id', validate(commonValidations.id), controller.get);
  router.post('/:id/confirm', validate(commonValidations.id), controller.confirm);
  router.post('/:id/cancel', validate(commonValidations.id), controller.cancel);
  router.post('/:id/reschedule', validate(commonValidations.id), controller.reschedule);

  /**
   * @route   POST /api/appointments/:id/no-show
   * @access  Provider, Admin
   */
  router.post('/:id/no-show', authorize('provider', 'admin'), validate(commonValidations.id), controller.noShow);

  return router;
}
