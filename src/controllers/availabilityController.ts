/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - AVAILABILITY CONTROLLER
 * ============================================================================
 *
 * Weekly availability windows and time-off periods of a provider.
 */

import { Request, Response } from 'express';
import { currentActor } from '../middleware/auth';
import { asyncHandler } from '../middleware/errorHandler';
import { queryString } from '../middleware/validation';
import type { Services } from '../services';
import { ValidationError } from '../utils/errors';

/**
 * Providers read their own calendar unless another provider is named
 */
function providerFor(req: Request): string {
  const actor = currentActor(req);
  const providerId = queryString(req, 'providerId') ?? (actor.role === 'provider' ? actor.id : undefined);
  if (!providerId) {
    throw new ValidationError('providerId is required');
  }
  return providerId;
}

export function createAvailabilityController({ calendar }: Services) {
  return {
    list: asyncHandler(async (req: Request, res: Response) => {
      const data = await calendar.listAvailability(providerFor(req));
      res.json({ success: true, data });
    }),

    create: asyncHandler(async (req: Request, res: Response) => {
      const data = await calendar.createAvailability(currentActor(req), req.body);
      res.status(201).json({ success: true, data });
    }),

    update: asyncHandler(async (req: Request, res: Response) => {
      const data = await calendar.updateAvailability(currentActor(req), req.params.id, req.body);
      res.json({ success: true, data });
    }),

    delete: asyncHandler(async (req: Request, res: Response) => {
      await calendar.deleteAvailability(currentActor(req), req.params.id);
      res.status(204).send();
    }),

    listTimeOff: asyncHandler(async (req: Request, res: Response) => {
      const data = await calendar.listTimeOff(providerFor(req));
      res.json({ success: true, data });
    }),

    addTimeOff: asyncHandler(async (req: Request, res: Response) => {
      const data = await calendar.addTimeOff(currentActor(req), req.body);
      res.status(201).json({ success: true, data });
    }),

    deleteTimeOff: asyncHandler(async (req: Request, res: Response) => {
      await calendar.deleteTimeOff(currentActor(req), req.params.id);
      res.status(204).send();
    }),
  };
}

export type AvailabilityController = ReturnType<typeof createAvailabilityController>;
