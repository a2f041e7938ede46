/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - APPOINTMENT SERVICE
 * ============================================================================
 *
 * Booking and the appointment lifecycle:
 *
 *   scheduled -> confirmed -> in_progress -> completed
 *   scheduled | confirmed -> cancelled | rescheduled
 *   any -> no_show
 *
 * Every write runs in one store transaction together with the outbox rows for
 * its side effects; the outbox is dispatched once the transaction commits.
 */

import logger from '../config/logger';
import type { SchedulingStore } from '../models';
import {
  UPCOMING_STATUSES,
  type Actor,
  type Appointment,
  type AppointmentKind,
  type AppointmentStatus,
  type Consultation,
} from '../types';
import {
  AuthorizationError,
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  type ErrorDetails,
} from '../utils/errors';
import { assertCanManage, assertCanView } from '../utils/permissions';
import {
  appointmentCreateSchema,
  appointmentRescheduleSchema,
  parseInput,
  type AppointmentCreateInput,
  type AppointmentRescheduleInput,
} from '../utils/validation';
import type { BookingConflict, CalendarService } from './calendarService';
import type { IdentityDirectory } from './identityService';
import type { OutboxDispatcher } from './outboxService';

const log = logger.child('appointments');

export interface BookedAppointment {
  appointment: Appointment;
  consultation: Consultation | null;
}

export interface RescheduledAppointment extends BookedAppointment {
  previous: Appointment;
}

export interface AppointmentDetails extends BookedAppointment {
  followUps: Appointment[];
}

export interface AppointmentServiceDeps {
  store: SchedulingStore;
  calendar: CalendarService;
  identities: IdentityDirectory;
  outbox: OutboxDispatcher;
  now?: () => Date;
}

/**
 * Whether a kind of appointment is held over a video session
 */
export function requiresSession(kind: AppointmentKind): boolean {
  switch (kind) {
    case 'video_consultation':
      return true;
    case 'phone_consultation':
    case 'in_person':
    case 'follow_up':
    case 'urgent_care':
    case 'specialist_referral':
      return false;
  }
}

export function conflictDetails(conflicts: BookingConflict[]): ErrorDetails[] {
  return conflicts.map((conflict) => ({
    code: conflict.conflictType,
    message: conflict.message,
    context: conflict.conflictingAppointment
      ? {
          appointmentId: conflict.conflictingAppointment.id,
          start: conflict.conflictingAppointment.start.toISOString(),
          end: conflict.conflictingAppointment.end.toISOString(),
        }
      : undefined,
  }));
}

function assertStatus(appointment: Appointment, allowed: readonly AppointmentStatus[], action: string): void {
  if (!allowed.includes(appointment.status)) {
    throw new InvalidTransitionError(`Cannot ${action} an appointment that is ${appointment.status}`);
  }
}

export class AppointmentService {
  private readonly store: SchedulingStore;
  private readonly calendar: CalendarService;
  private readonly identities: IdentityDirectory;
  private readonly outbox: OutboxDispatcher;
  private readonly now: () => Date;

  constructor(deps: AppointmentServiceDeps) {
    this.store = deps.store;
    this.calendar = deps.calendar;
    this.identities = deps.identities;
    this.outbox = deps.outbox;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Book an appointment after checking availability, time-off and overlaps
   */
  async createAppointment(actor: Actor, input: AppointmentCreateInput): Promise<BookedAppointment> {
    const data = parseInput(appointmentCreateSchema, input);

    if (actor.role === 'patient' && actor.id !== data.patientId) {
      throw new AuthorizationError('Patients can only book appointments for themselves');
    }
    if (actor.role === 'provider' && actor.id !== data.providerId) {
      throw new AuthorizationError('Providers can only book appointments on their own calendar');
    }

    const [patient, provider] = await Promise.all([
      this.identities.findById(data.patientId),
      this.identities.findById(data.providerId),
    ]);
    if (!patient) {
      throw new NotFoundError('Patient');
    }
    if (!provider || provider.role !== 'provider') {
      throw new NotFoundError('Provider');
    }

    const { appointment, consultation, eventIds } = await this.store.transaction(async (tx) => {
      if (data.parentAppointmentId && !(await tx.appointments.findById(data.parentAppointmentId))) {
        throw new NotFoundError('Parent appointment');
      }

      const conflicts = await this.calendar.findConflicts(data.providerId, data.scheduledTime, data.endTime, undefined, tx);
      if (conflicts.length > 0) {
        throw new ConflictError('Requested time is not available', conflictDetails(conflicts));
      }

      const appointment = await tx.appointments.create({
        patientId: data.patientId,
        providerId: data.providerId,
        scheduledTime: data.scheduledTime,
        endTime: data.endTime,
        kind: data.kind,
        reason: data.reason,
        parentAppointmentId: data.parentAppointmentId ?? null,
        isRecurring: data.isRecurring,
        recurrencePattern: data.recurrencePattern ?? null,
        recurrenceEndDate: data.recurrenceEndDate ?? null,
        sendReminder: data.sendReminder,
      });

      const eventIds: string[] = [];
      let consultation: Consultation | null = null;

      if (requiresSession(appointment.kind)) {
        consultation = await tx.consultations.create({ appointmentId: appointment.id, notes: data.notes ?? null });
        const event = await tx.outbox.enqueue({ type: 'meeting.create', payload: { consultationId: consultation.id } });
        eventIds.push(event.id);
      }

      const email = await tx.outbox.enqueue({
        type: 'email.appointment',
        payload: { appointmentId: appointment.id, notice: 'confirmed' },
      });
      eventIds.push(email.id);

      return { appointment, consultation, eventIds };
    });

    log.info('Appointment booked', {
      appointmentId: appointment.id,
      providerId: appointment.providerId,
      kind: appointment.kind,
      consultationId: consultation?.id,
    });

    await this.outbox.dispatch(eventIds);

    return {
      appointment,
      consultation: consultation ? await this.store.consultations.findById(consultation.id) : null,
    };
  }

  async confirm(actor: Actor, appointmentId: string): Promise<Appointment> {
    const appointment = await this.store.transaction(async (tx) => {
      const current = await this.load(tx, appointmentId);
      assertCanView(actor, current);
      assertStatus(current, ['scheduled'], 'confirm');
      return this.setStatus(tx, appointmentId, 'confirmed');
    });

    log.info('Appointment confirmed', { appointmentId });
    return appointment;
  }

  async cancel(actor: Actor, appointmentId: string, reason?: string): Promise<Appointment> {
    const { appointment, eventIds } = await this.store.transaction(async (tx) => {
      const current = await this.load(tx, appointmentId);
      assertCanView(actor, current);
      assertStatus(current, UPCOMING_STATUSES, 'cancel');

      const appointment = await this.setStatus(tx, appointmentId, 'cancelled');
      const email = await tx.outbox.enqueue({
        type: 'email.appointment',
        payload: { appointmentId, notice: 'cancelled' },
      });
      return { appointment, eventIds: [email.id] };
    });

    log.info('Appointment cancelled', { appointmentId, cancelledBy: actor.id, reason });
    await this.outbox.dispatch(eventIds);
    return appointment;
  }

  /**
   * Move an appointment to a new range. The old appointment keeps its range
   * and becomes `rescheduled`; a new one is linked to it as parent.
   */
  async reschedule(actor: Actor, appointmentId: string, input: AppointmentRescheduleInput): Promise<RescheduledAppointment> {
    const data = parseInput(appointmentRescheduleSchema, input);

    const result = await this.store.transaction(async (tx) => {
      const current = await this.load(tx, appointmentId);
      assertCanView(actor, current);
      assertStatus(current, UPCOMING_STATUSES, 'reschedule');

      const conflicts = await this.calendar.findConflicts(
        current.providerId,
        data.scheduledTime,
        data.endTime,
        current.id,
        tx
      );
      if (conflicts.length > 0) {
        throw new ConflictError('Requested time is not available', conflictDetails(conflicts));
      }

      // Release the old range before booking the new one
      const previous = await this.setStatus(tx, current.id, 'rescheduled');

      const appointment = await tx.appointments.create({
        patientId: current.patientId,
        providerId: current.providerId,
        scheduledTime: data.scheduledTime,
        endTime: data.endTime,
        kind: current.kind,
        reason: data.reason ?? current.reason,
        parentAppointmentId: current.id,
        isRecurring: current.isRecurring,
        recurrencePattern: current.recurrencePattern,
        recurrenceEndDate: current.recurrenceEndDate,
        sendReminder: current.sendReminder,
      });

      const eventIds: string[] = [];
      let consultation = await tx.consultations.findByAppointmentId(current.id);

      if (consultation) {
        consultation = await tx.consultations.update(consultation.id, { appointmentId: appointment.id });
        if (consultation?.meetingId) {
          const event = await tx.outbox.enqueue({ type: 'meeting.update', payload: { consultationId: consultation.id } });
          eventIds.push(event.id);
        }
      }

      const email = await tx.outbox.enqueue({
        type: 'email.appointment',
        payload: { appointmentId: appointment.id, notice: 'rescheduled' },
      });
      eventIds.push(email.id);

      return { appointment, previous, consultation, eventIds };
    });

    log.info('Appointment rescheduled', {
      appointmentId: result.appointment.id,
      previousAppointmentId: result.previous.id,
      consultationId: result.consultation?.id,
    });

    await this.outbox.dispatch(result.eventIds);

    return {
      appointment: result.appointment,
      previous: result.previous,
      consultation: result.consultation,
    };
  }

  async markNoShow(actor: Actor, appointmentId: string): Promise<Appointment> {
    const appointment = await this.store.transaction(async (tx) => {
      const current = await this.load(tx, appointmentId);
      assertCanManage(actor, current);
      return this.setStatus(tx, appointmentId, 'no_show');
    });

    log.info('Appointment marked as no-show', { appointmentId });
    return appointment;
  }

  /**
   * Scheduled and confirmed appointments of the actor that start later
   */
  async upcoming(actor: Actor): Promise<Appointment[]> {
    return this.store.appointments.listUpcoming(actor, this.now());
  }

  async getAppointment(actor: Actor, appointmentId: string): Promise<AppointmentDetails> {
    const appointment = await this.load(this.store, appointmentId);
    assertCanView(actor, appointment);

    const [consultation, followUps] = await Promise.all([
      this.store.consultations.findByAppointmentId(appointmentId),
      this.store.appointments.listFollowUps(appointmentId),
    ]);

    return { appointment, consultation, followUps };
  }

  private async load(tx: SchedulingStore, appointmentId: string): Promise<Appointment> {
    const appointment = await tx.appointments.findById(appointmentId);
    if (!appointment) {
      throw new NotFoundError('Appointment');
    }
    return appointment;
  }

  private async setStatus(tx: SchedulingStore, appointmentId: string, status: AppointmentStatus): Promise<Appointment> {
    const updated = await tx.appointments.update(appointmentId, { status });
    if (!updated) {
      throw new NotFoundError('Appointment');
    }
    return updated;
  }
}
