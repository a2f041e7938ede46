/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - STORE CONTRACTS
 * ============================================================================
 *
 * Every scheduling record lives in one of these repositories. Services only
 * talk to a `SchedulingStore`; the PostgreSQL and in-memory stores both
 * implement it.
 */

import type {
  Actor,
  Appointment,
  AppointmentKind,
  Consultation,
  OutboxEvent,
  OutboxPayloads,
  OutboxEventType,
  ProviderAvailability,
  ProviderTimeOff,
  RecurrencePattern,
} from '../types';

// ============================================================================
// INPUTS
// ============================================================================

export interface CreateAvailabilityRecord {
  providerId: string;
  dayOfWeek: number;
  startTime: string;
  endTime: string;
  isAvailable: boolean;
}

export type AvailabilityPatch = Partial<Pick<ProviderAvailability, 'dayOfWeek' | 'startTime' | 'endTime' | 'isAvailable'>>;

export interface CreateTimeOffRecord {
  providerId: string;
  startDate: Date;
  endDate: Date;
  reason: string | null;
}

export interface CreateAppointmentRecord {
  patientId: string;
  providerId: string;
  scheduledTime: Date;
  endTime: Date;
  kind: AppointmentKind;
  reason: string;
  parentAppointmentId: string | null;
  isRecurring: boolean;
  recurrencePattern: RecurrencePattern | null;
  recurrenceEndDate: string | null;
  sendReminder: boolean;
}

/** Appointment ranges are never edited in place */
export type AppointmentPatch = Partial<Pick<Appointment, 'status' | 'sendReminder' | 'reminderSent' | 'reason'>>;

export interface CreateConsultationRecord {
  appointmentId: string;
  notes: string | null;
}

export type ConsultationPatch = Partial<
  Pick<
    Consultation,
    | 'appointmentId'
    | 'startTime'
    | 'endTime'
    | 'meetingId'
    | 'meetingPassword'
    | 'joinUrl'
    | 'startUrl'
    | 'accessCode'
    | 'accessCodeExpires'
    | 'notes'
  >
>;

export type OutboxMessage = {
  [K in OutboxEventType]: { type: K; payload: OutboxPayloads[K] };
}[OutboxEventType];

// ============================================================================
// REPOSITORIES
// ============================================================================

export interface AvailabilityRepository {
  findById(id: string): Promise<ProviderAvailability | null>;
  listForProvider(
    providerId: string,
    filter?: { dayOfWeek?: number; enabledOnly?: boolean }
  ): Promise<ProviderAvailability[]>;
  create(record: CreateAvailabilityRecord): Promise<ProviderAvailability>;
  update(id: string, patch: AvailabilityPatch): Promise<ProviderAvailability | null>;
  delete(id: string): Promise<boolean>;
}

export interface TimeOffRepository {
  findById(id: string): Promise<ProviderTimeOff | null>;
  listForProvider(providerId: string): Promise<ProviderTimeOff[]>;
  /** Time-off rows with `startDate <= to AND endDate >= from` */
  listOverlapping(providerId: string, from: Date, to: Date): Promise<ProviderTimeOff[]>;
  create(record: CreateTimeOffRecord): Promise<ProviderTimeOff>;
  delete(id: string): Promise<boolean>;
}

export interface AppointmentRepository {
  findById(id: string): Promise<Appointment | null>;
  create(record: CreateAppointmentRecord): Promise<Appointment>;
  update(id: string, patch: AppointmentPatch): Promise<Appointment | null>;
  /** Active appointments whose [scheduledTime, endTime) overlaps [from, to) */
  listActiveInRange(providerId: string, from: Date, to: Date, excludeId?: string): Promise<Appointment[]>;
  /** Scheduled/confirmed appointments of the actor starting after `now`, ascending */
  listUpcoming(actor: Actor, now: Date): Promise<Appointment[]>;
  /** Reminder candidates with scheduledTime in [from, to], ascending */
  listDueForReminder(from: Date, to: Date): Promise<Appointment[]>;
  /** Sets reminderSent only if it is still false */
  markReminderSent(id: string): Promise<boolean>;
  listFollowUps(parentAppointmentId: string): Promise<Appointment[]>;
}

export interface ConsultationRepository {
  findById(id: string): Promise<Consultation | null>;
  findByAppointmentId(appointmentId: string): Promise<Consultation | null>;
  create(record: CreateConsultationRecord): Promise<Consultation>;
  /** Recomputes durationMs whenever both start and end are set */
  update(id: string, patch: ConsultationPatch): Promise<Consultation | null>;
  delete(id: string): Promise<boolean>;
}

export interface OutboxRepository {
  enqueue(message: OutboxMessage): Promise<OutboxEvent>;
  findById(id: string): Promise<OutboxEvent | null>;
  /** Pending or failed events below the attempt limit, oldest first */
  listDispatchable(limit: number, maxAttempts: number): Promise<OutboxEvent[]>;
  markDone(id: string, at: Date): Promise<void>;
  markFailed(id: string, error: string, at: Date): Promise<void>;
}

export interface SchedulingStore {
  readonly availability: AvailabilityRepository;
  readonly timeOff: TimeOffRepository;
  readonly appointments: AppointmentRepository;
  readonly consultations: ConsultationRepository;
  readonly outbox: OutboxRepository;
  /**
   * Run `work` atomically. Inside a transaction, nested calls reuse it.
   */
  transaction<T>(work: (tx: SchedulingStore) => Promise<T>): Promise<T>;
}

/**
 * Milliseconds between start and end, or null while either is missing
 */
export function computeDurationMs(startTime: Date | null, endTime: Date | null): number | null {
  if (!startTime || !endTime) return null;
  return endTime.getTime() - startTime.getTime();
}
