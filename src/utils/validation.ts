/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - VALIDATION UTILITIES
 * ============================================================================
 */

import { z } from 'zod';
import { APPOINTMENT_KINDS, RECURRENCE_PATTERNS } from '../types';
import { handleZodError } from './errors';
import { TIME_OF_DAY_PATTERN, isValidCalendarDate, normalizeTimeOfDay, parseTimeOfDay } from './helpers';

// ============================================================================
// COMMON VALIDATION SCHEMAS
// ============================================================================

export const uuidSchema = z.string().uuid('Invalid UUID format');

export const timeOfDaySchema = z
  .string()
  .regex(TIME_OF_DAY_PATTERN, 'Time must be in HH:mm format')
  .transform(normalizeTimeOfDay);

export const calendarDateSchema = z
  .string()
  .refine(isValidCalendarDate, { message: 'Date must be in YYYY-MM-DD format' });

/** ISO-8601 timestamp with offset, or a Date */
export const dateTimeSchema = z.union([
  z.date(),
  z
    .string()
    .datetime({ offset: true, message: 'Invalid date format' })
    .transform((value) => new Date(value)),
]);

export const dayOfWeekSchema = z.number().int().min(0, 'Day must be 0 (Monday) to 6 (Sunday)').max(6, 'Day must be 0 (Monday) to 6 (Sunday)');

// ============================================================================
// AVAILABILITY VALIDATION SCHEMAS
// ============================================================================

export const availabilityCreateSchema = z
  .object({
    providerId: uuidSchema.optional(),
    dayOfWeek: dayOfWeekSchema,
    startTime: timeOfDaySchema,
    endTime: timeOfDaySchema,
    isAvailable: z.boolean().default(true),
  })
  .refine((value) => parseTimeOfDay(value.endTime) > parseTimeOfDay(value.startTime), {
    message: 'End time must be after start time',
    path: ['endTime'],
  });

export const availabilityUpdateSchema = z.object({
  dayOfWeek: dayOfWeekSchema.optional(),
  startTime: timeOfDaySchema.optional(),
  endTime: timeOfDaySchema.optional(),
  isAvailable: z.boolean().optional(),
});

export const timeOffCreateSchema = z
  .object({
    providerId: uuidSchema.optional(),
    startDate: dateTimeSchema,
    endDate: dateTimeSchema,
    reason: z.string().max(500).optional(),
  })
  .refine((value) => value.endDate.getTime() >= value.startDate.getTime(), {
    message: 'End date must not be before start date',
    path: ['endDate'],
  });

// ============================================================================
// APPOINTMENT VALIDATION SCHEMAS
// ============================================================================

export const appointmentCreateSchema = z
  .object({
    patientId: uuidSchema,
    providerId: uuidSchema,
    scheduledTime: dateTimeSchema,
    endTime: dateTimeSchema,
    kind: z.enum(APPOINTMENT_KINDS).default('video_consultation'),
    reason: z.string().max(500).default(''),
    notes: z.string().max(2000).optional(),
    parentAppointmentId: uuidSchema.optional(),
    isRecurring: z.boolean().default(false),
    recurrencePattern: z.enum(RECURRENCE_PATTERNS).optional(),
    recurrenceEndDate: calendarDateSchema.optional(),
    sendReminder: z.boolean().default(true),
  })
  .refine((value) => value.endTime.getTime() > value.scheduledTime.getTime(), {
    message: 'End time must be after scheduled time',
    path: ['endTime'],
  })
  .refine((value) => !value.isRecurring || value.recurrencePattern !== undefined, {
    message: 'Recurring appointments need a recurrence pattern',
    path: ['recurrencePattern'],
  });

export const appointmentRescheduleSchema = z
  .object({
    scheduledTime: dateTimeSchema,
    endTime: dateTimeSchema,
    reason: z.string().max(500).optional(),
  })
  .refine((value) => value.endTime.getTime() > value.scheduledTime.getTime(), {
    message: 'End time must be after scheduled time',
    path: ['endTime'],
  });

// ============================================================================
// CONSULTATION VALIDATION SCHEMAS
// ============================================================================

export const consultationNotesSchema = z.object({
  notes: z.string().max(10000).nullable(),
});

export const accessCodeSchema = z.object({
  code: z.string().trim().min(1, 'Access code is required').max(32),
});

export type AvailabilityCreateInput = z.input<typeof availabilityCreateSchema>;
export type AvailabilityUpdateInput = z.input<typeof availabilityUpdateSchema>;
export type TimeOffCreateInput = z.input<typeof timeOffCreateSchema>;
export type AppointmentCreateInput = z.input<typeof appointmentCreateSchema>;
export type AppointmentRescheduleInput = z.input<typeof appointmentRescheduleSchema>;

/**
 * Parse with a schema, raising ValidationError on failure
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw handleZodError(result.error);
  }
  return result.data;
}
