/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - APPOINTMENT CONTROLLER
 * ============================================================================
 */

import { Request, Response } from 'express';
import { currentActor } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { queryString } from '../middleware/validation';
import type { Services } from '../services';
import { ValidationError } from '../utils/errors';

export function createAppointmentController({ appointments, calendar, reminders }: Services) {
  return {
    /**
     * Book a new appointment
     */
    create: asyncHandler(async (req: Request, res: Response) => {
      const result = await appointments.createAppointment(currentActor(req), req.body);

      res.status(201).json({
        success: true,
        data: result,
        message: 'Appointment scheduled successfully',
      });
    }),

    upcoming: asyncHandler(async (req: Request, res: Response) => {
      const data = await appointments.upcoming(currentActor(req));
      res.json({ success: true, data });
    }),

    /**
     * Open slots for a provider on a date
     */
    availableSlots: asyncHandler(async (req: Request, res: Response) => {
      const providerId = queryString(req, 'providerId');
      const date = queryString(req, 'date');
      if (!providerId || !date) {
        throw new ValidationError('providerId and date are required');
      }

      const slots = await calendar.resolveSlots(providerId, date);
      res.json({ success: true, data: { providerId, date, slots } });
    }),

    get: asyncHandler(async (req: Request, res: Response) => {
      const data = await appointments.getAppointment(currentActor(req), req.params.id);
      res.json({ success: true, data });
    }),

    confirm: asyncHandler(async (req: Request, res: Response) => {
      const data = await appointments.confirm(currentActor(req), req.params.id);
      res.json({ success: true, data, message: 'Appointment confirmed' });
    }),

    cancel: asyncHandler(async (req: Request, res: Response) => {
      const reason = typeof req.body?.reason === 'string' ? req.body.reason : undefined;
      const data = await appointments.cancel(currentActor(req), req.params.id, reason);
      res.json({ success: true, data, message: 'Appointment cancelled successfully' });
    }),

    reschedule: asyncHandler(async (req: Request, res: Response) => {
      const data = await appointments.reschedule(currentActor(req), req.params.id, req.body);
      res.json({ success: true, data, message: 'Appointment rescheduled successfully' });
    }),

    noShow: asyncHandler(async (req: Request, res: Response) => {
      const data = await appointments.markNoShow(currentActor(req), req.params.id);
      res.json({ success: true, data, message: 'Appointment marked as no-show' });
    }),

    /**
     * Run the reminder sweep now
     */
    sendReminders: asyncHandler(async (_req: Request, res: Response) => {
      const data = await reminders.runSweep();
      res.json({ success: true, data, message: `Sent ${data.sent} of ${data.found} reminders` });
    }),
  };
}

export type AppointmentController = ReturnType<typeof createAppointmentController>;
