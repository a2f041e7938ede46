/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - CONSULTATION CONTROLLER
 * ============================================================================
 */

import { Request, Response } from 'express';
import { currentActor } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import type { Services } from '../services';
import { AuthenticationError } from '../utils/errors';

export function createConsultationController({ consultations, accessCodes }: Services) {
  return {
    create: asyncHandler(async (req: Request, res: Response) => {
      const data = await consultations.createConsultation(currentActor(req), {
        appointmentId: req.body?.appointmentId,
        notes: req.body?.notes,
      });
      res.status(201).json({ success: true, data, message: 'Consultation created successfully' });
    }),

    get: asyncHandler(async (req: Request, res: Response) => {
      const data = await consultations.getConsultation(currentActor(req), req.params.id);
      res.json({ success: true, data });
    }),

    updateNotes: asyncHandler(async (req: Request, res: Response) => {
      const data = await consultations.updateNotes(currentActor(req), req.params.id, req.body);
      res.json({ success: true, data });
    }),

    delete: asyncHandler(async (req: Request, res: Response) => {
      await consultations.deleteConsultation(currentActor(req), req.params.id);
      res.status(204).send();
    }),

    start: asyncHandler(async (req: Request, res: Response) => {
      const data = await consultations.start(currentActor(req), req.params.id);
      res.json({ success: true, data, message: 'Consultation started' });
    }),

    end: asyncHandler(async (req: Request, res: Response) => {
      const data = await consultations.end(currentActor(req), req.params.id);
      res.json({ success: true, data, message: 'Consultation ended' });
    }),

    joinInfo: asyncHandler(async (req: Request, res: Response) => {
      const data = await consultations.joinInfo(currentActor(req), req.params.id);
      res.json({ success: true, data });
    }),

    requestAccessCode: asyncHandler(async (req: Request, res: Response) => {
      const sent = await accessCodes.requestAccessCode(currentActor(req), req.params.id);
      res.json({
        success: sent,
        data: { sent },
        message: sent ? 'Access code sent' : 'Access code could not be sent',
      });
    }),

    /**
     * Exchange a valid access code for the meeting details
     */
    verifyAccessCode: asyncHandler(async (req: Request, res: Response) => {
      const actor = currentActor(req);
      // Resolve join details first so an unauthorized caller cannot consume the code
      const info = await consultations.joinInfo(actor, req.params.id);

      const verified = await accessCodes.verifyAccessCode(req.params.id, String(req.body?.code ?? ''));
      if (!verified) {
        throw new AuthenticationError('Invalid or expired access code');
      }

      res.json({ success: true, data: info });
    }),
  };
}

export type ConsultationController = ReturnType<typeof createConsultationController>;
