/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - CALENDAR SERVICE
 * ============================================================================
 *
 * Slot resolution and the booking rules (availability, time-off, overlap),
 * plus maintenance of a provider's weekly availability and time-off.
 */

import { addDays } from 'date-fns';
import { config } from '../config/config';
import logger, { errorMessage } from '../config/logger';
import type { SchedulingStore } from '../models';
import {
  ACTIVE_STATUSES,
  type Actor,
  type Appointment,
  type ProviderAvailability,
  type ProviderTimeOff,
  type Slot,
} from '../types';
import { AuthorizationError, NotFoundError, ValidationError } from '../utils/errors';
import {
  atTimeOfDay,
  dayBounds,
  dayOfWeek,
  formatTimeOfDay,
  isValidCalendarDate,
  minutesOfDay,
  parseCalendarDate,
  parseTimeOfDay,
  rangesOverlap,
  toCalendarDate,
} from '../utils/helpers';
import {
  availabilityCreateSchema,
  availabilityUpdateSchema,
  parseInput,
  timeOffCreateSchema,
  type AvailabilityCreateInput,
  type AvailabilityUpdateInput,
  type TimeOffCreateInput,
} from '../utils/validation';

const log = logger.child('calendar');

const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

export type ConflictRule = 'outside_availability' | 'time_off' | 'overlap';

export interface BookingConflict {
  conflictType: ConflictRule;
  message: string;
  conflictingAppointment?: {
    id: string;
    start: Date;
    end: Date;
  };
}

// ============================================================================
// PURE RULES
// ============================================================================

export interface SlotInputs {
  /** YYYY-MM-DD */
  date: string;
  availability: ProviderAvailability[];
  timeOff: ProviderTimeOff[];
  appointments: Appointment[];
  slotMinutes?: number;
}

/**
 * Bookable slots for one provider on one calendar day, chronological and
 * without duplicates. Any time-off touching the day empties it.
 */
export function resolveSlots({ date, availability, timeOff, appointments, slotMinutes = 30 }: SlotInputs): Slot[] {
  const { start: dayStart, end: dayEnd } = dayBounds(date);

  const onTimeOff = timeOff.some(
    (period) => period.startDate.getTime() <= dayEnd.getTime() && period.endDate.getTime() >= dayStart.getTime()
  );
  if (onTimeOff) {
    return [];
  }

  const weekday = dayOfWeek(dayStart);
  const windows = availability.filter((row) => row.isAvailable && row.dayOfWeek === weekday);
  const booked = appointments.filter((appointment) => ACTIVE_STATUSES.includes(appointment.status));
  const slots = new Map<string, { startMinutes: number; endMinutes: number }>();

  for (const window of windows) {
    const windowEnd = parseTimeOfDay(window.endTime);

    for (
      let slotStart = parseTimeOfDay(window.startTime);
      slotStart + slotMinutes <= windowEnd;
      slotStart += slotMinutes
    ) {
      const slotEnd = slotStart + slotMinutes;
      const candidateStart = atTimeOfDay(date, slotStart);
      const candidateEnd = atTimeOfDay(date, slotEnd);

      const taken = booked.some((appointment) =>
        rangesOverlap(appointment.scheduledTime, appointment.endTime, candidateStart, candidateEnd)
      );

      if (!taken) {
        slots.set(`${slotStart}-${slotEnd}`, { startMinutes: slotStart, endMinutes: slotEnd });
      }
    }
  }

  return [...slots.values()]
    .sort((a, b) => a.startMinutes - b.startMinutes || a.endMinutes - b.endMinutes)
    .map((slot) => ({ start: formatTimeOfDay(slot.startMinutes), end: formatTimeOfDay(slot.endMinutes) }));
}

export interface ConflictInputs {
  start: Date;
  end: Date;
  availability: ProviderAvailability[];
  timeOff: ProviderTimeOff[];
  appointments: Appointment[];
  excludeAppointmentId?: string;
}

/**
 * Every booking rule the range [start, end) breaks; empty when bookable
 */
export function findConflicts({
  start,
  end,
  availability,
  timeOff,
  appointments,
  excludeAppointmentId,
}: ConflictInputs): BookingConflict[] {
  const conflicts: BookingConflict[] = [];
  const weekday = dayOfWeek(start);
  const startMinutes = minutesOfDay(start);
  const endMinutes = minutesOfDay(end);
  const sameDay = toCalendarDate(start) === toCalendarDate(end);

  const fits =
    sameDay &&
    availability.some(
      (row) =>
        row.isAvailable &&
        row.dayOfWeek === weekday &&
        parseTimeOfDay(row.startTime) <= startMinutes &&
        endMinutes <= parseTimeOfDay(row.endTime)
    );

  if (!fits) {
    conflicts.push({
      conflictType: 'outside_availability',
      message: `Provider is not available from ${formatUtc(start)} to ${formatUtc(end)} on ${WEEKDAY_NAMES[weekday]}`,
    });
  }

  for (const period of timeOff) {
    if (period.startDate.getTime() < end.getTime() && period.endDate.getTime() >= start.getTime()) {
      conflicts.push({
        conflictType: 'time_off',
        message: `Provider is unavailable: ${period.reason || 'Time off scheduled'}`,
      });
    }
  }

  for (const appointment of appointments) {
    if (
      appointment.id !== excludeAppointmentId &&
      ACTIVE_STATUSES.includes(appointment.status) &&
      rangesOverlap(appointment.scheduledTime, appointment.endTime, start, end)
    ) {
      conflicts.push({
        conflictType: 'overlap',
        message: `Appointment overlaps with existing appointment from ${formatUtc(appointment.scheduledTime)} to ${formatUtc(appointment.endTime)}`,
        conflictingAppointment: {
          id: appointment.id,
          start: appointment.scheduledTime,
          end: appointment.endTime,
        },
      });
    }
  }

  return conflicts;
}

function formatUtc(date: Date): string {
  return formatTimeOfDay(Math.floor(minutesOfDay(date)));
}

// ============================================================================
// SERVICE
// ============================================================================

export interface CalendarServiceOptions {
  slotMinutes?: number;
}

export class CalendarService {
  private readonly slotMinutes: number;

  constructor(
    private readonly store: SchedulingStore,
    options: CalendarServiceOptions = {}
  ) {
    this.slotMinutes = options.slotMinutes ?? config.scheduling.slotMinutes;
  }

  /**
   * Available slots for a provider on a `YYYY-MM-DD` date
   */
  async resolveSlots(providerId: string, date: string): Promise<Slot[]> {
    if (!isValidCalendarDate(date)) {
      throw new ValidationError('Date must be in YYYY-MM-DD format', [
        { code: 'invalid_date', message: 'Date must be in YYYY-MM-DD format', field: 'date' },
      ]);
    }

    const dayStart = parseCalendarDate(date);
    const { end: dayEnd } = dayBounds(date);

    const [availability, timeOff, appointments] = await Promise.all([
      this.store.availability.listForProvider(providerId, { dayOfWeek: dayOfWeek(dayStart), enabledOnly: true }),
      this.store.timeOff.listOverlapping(providerId, dayStart, dayEnd),
      this.store.appointments.listActiveInRange(providerId, dayStart, addDays(dayStart, 1)),
    ]);

    const slots = resolveSlots({ date, availability, timeOff, appointments, slotMinutes: this.slotMinutes });

    log.debug('Resolved available slots', { providerId, date, count: slots.length });
    return slots;
  }

  /**
   * Booking rules broken by [start, end); pass `tx` to read inside a transaction
   */
  async findConflicts(
    providerId: string,
    start: Date,
    end: Date,
    excludeAppointmentId?: string,
    tx: SchedulingStore = this.store
  ): Promise<BookingConflict[]> {
    try {
      const [availability, timeOff, appointments] = await Promise.all([
        tx.availability.listForProvider(providerId, { dayOfWeek: dayOfWeek(start), enabledOnly: true }),
        tx.timeOff.listOverlapping(providerId, start, end),
        tx.appointments.listActiveInRange(providerId, start, end, excludeAppointmentId),
      ]);

      return findConflicts({ start, end, availability, timeOff, appointments, excludeAppointmentId });
    } catch (error) {
      log.error('Failed to check appointment conflicts', {
        error: errorMessage(error),
        providerId,
        start: start.toISOString(),
        end: end.toISOString(),
      });
      throw error;
    }
  }

  async checkAvailable(
    providerId: string,
    start: Date,
    end: Date,
    excludeAppointmentId?: string,
    tx: SchedulingStore = this.store
  ): Promise<boolean> {
    const conflicts = await this.findConflicts(providerId, start, end, excludeAppointmentId, tx);
    return conflicts.length === 0;
  }

  // ==========================================================================
  // WEEKLY AVAILABILITY
  // ==========================================================================

  async listAvailability(providerId: string): Promise<ProviderAvailability[]> {
    return this.store.availability.listForProvider(providerId);
  }

  async createAvailability(actor: Actor, input: AvailabilityCreateInput): Promise<ProviderAvailability> {
    const data = parseInput(availabilityCreateSchema, input);
    const providerId = resolveProviderId(actor, data.providerId);

    const row = await this.store.availability.create({
      providerId,
      dayOfWeek: data.dayOfWeek,
      startTime: data.startTime,
      endTime: data.endTime,
      isAvailable: data.isAvailable,
    });

    log.info('Availability created', { availabilityId: row.id, providerId, dayOfWeek: row.dayOfWeek });
    return row;
  }

  async updateAvailability(actor: Actor, id: string, input: AvailabilityUpdateInput): Promise<ProviderAvailability> {
    const patch = parseInput(availabilityUpdateSchema, input);
    const existing = await this.store.availability.findById(id);
    if (!existing) {
      throw new NotFoundError('Availability');
    }
    assertOwnsProvider(actor, existing.providerId);

    const startTime = patch.startTime ?? existing.startTime;
    const endTime = patch.endTime ?? existing.endTime;
    if (parseTimeOfDay(endTime) <= parseTimeOfDay(startTime)) {
      throw new ValidationError('End time must be after start time', [
        { code: 'invalid_range', message: 'End time must be after start time', field: 'endTime' },
      ]);
    }

    const updated = await this.store.availability.update(id, patch);
    if (!updated) {
      throw new NotFoundError('Availability');
    }

    log.info('Availability updated', { availabilityId: id });
    return updated;
  }

  async deleteAvailability(actor: Actor, id: string): Promise<void> {
    const existing = await this.store.availability.findById(id);
    if (!existing) {
      throw new NotFoundError('Availability');
    }
    assertOwnsProvider(actor, existing.providerId);

    await this.store.availability.delete(id);
    log.info('Availability deleted', { availabilityId: id });
  }

  // ==========================================================================
  // TIME-OFF
  // ==========================================================================

  async listTimeOff(providerId: string): Promise<ProviderTimeOff[]> {
    return this.store.timeOff.listForProvider(providerId);
  }

  async addTimeOff(actor: Actor, input: TimeOffCreateInput): Promise<ProviderTimeOff> {
    const data = parseInput(timeOffCreateSchema, input);
    const providerId = resolveProviderId(actor, data.providerId);

    const period = await this.store.timeOff.create({
      providerId,
      startDate: data.startDate,
      endDate: data.endDate,
      reason: data.reason ?? null,
    });

    log.info('Provider time off added', {
      timeOffId: period.id,
      providerId,
      from: period.startDate.toISOString(),
      to: period.endDate.toISOString(),
    });
    return period;
  }

  async deleteTimeOff(actor: Actor, id: string): Promise<void> {
    const existing = await this.store.timeOff.findById(id);
    if (!existing) {
      throw new NotFoundError('Time off');
    }
    assertOwnsProvider(actor, existing.providerId);

    await this.store.timeOff.delete(id);
    log.info('Provider time off removed', { timeOffId: id });
  }
}

/**
 * Providers manage their own calendar; admins name the provider explicitly
 */
function resolveProviderId(actor: Actor, requested: string | undefined): string {
  if (actor.role === 'provider') {
    if (requested && requested !== actor.id) {
      throw new AuthorizationError('Providers can only manage their own calendar');
    }
    return actor.id;
  }
  if (actor.role === 'admin' && requested) {
    return requested;
  }
  if (actor.role === 'admin') {
    throw new ValidationError('providerId is required', [
      { code: 'required', message: 'providerId is required', field: 'providerId' },
    ]);
  }
  throw new AuthorizationError();
}

function assertOwnsProvider(actor: Actor, providerId: string): void {
  if (actor.role === 'admin') return;
  if (actor.role === 'provider' && actor.id === providerId) return;
  throw new AuthorizationError('Providers can only manage their own calendar');
}
