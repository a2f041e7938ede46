/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - IN-MEMORY STORE
 * ============================================================================
 *
 * Process-local store with the same contract as the PostgreSQL one, including
 * the no-overlap constraint on active appointments and one consultation per
 * appointment. Transactions are serialized and roll back on error.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ACTIVE_STATUSES,
  UPCOMING_STATUSES,
  type Actor,
  type Appointment,
  type Consultation,
  type OutboxEvent,
  type ProviderAvailability,
  type ProviderTimeOff,
} from '../types';
import { ConflictError } from '../utils/errors';
import { rangesOverlap } from '../utils/helpers';
import {
  computeDurationMs,
  type AppointmentPatch,
  type AppointmentRepository,
  type AvailabilityPatch,
  type AvailabilityRepository,
  type ConsultationPatch,
  type ConsultationRepository,
  type CreateAppointmentRecord,
  type CreateAvailabilityRecord,
  type CreateConsultationRecord,
  type CreateTimeOffRecord,
  type OutboxMessage,
  type OutboxRepository,
  type SchedulingStore,
  type TimeOffRepository,
} from './types';

interface MemoryState {
  availability: Map<string, ProviderAvailability>;
  timeOff: Map<string, ProviderTimeOff>;
  appointments: Map<string, Appointment>;
  consultations: Map<string, Consultation>;
  outbox: Map<string, OutboxEvent>;
}

/** Inside a transaction, `journal` collects the undo step of every write */
type StateRef = { state: MemoryState; now: () => Date; journal?: Array<() => void> };

function emptyState(): MemoryState {
  return {
    availability: new Map(),
    timeOff: new Map(),
    appointments: new Map(),
    consultations: new Map(),
    outbox: new Map(),
  };
}

const byTime = (a: Date, b: Date): number => a.getTime() - b.getTime();

function journal<T>(ref: StateRef, rows: Map<string, T>, id: string): void {
  if (!ref.journal) return;
  const previous = rows.get(id);
  ref.journal.push(
    previous === undefined
      ? () => {
          rows.delete(id);
        }
      : () => {
          rows.set(id, previous);
        }
  );
}

function putRow<T>(ref: StateRef, rows: Map<string, T>, id: string, row: T): void {
  journal(ref, rows, id);
  rows.set(id, row);
}

function deleteRow<T>(ref: StateRef, rows: Map<string, T>, id: string): boolean {
  journal(ref, rows, id);
  return rows.delete(id);
}

// ============================================================================
// REPOSITORIES
// ============================================================================

class MemoryAvailabilityRepository implements AvailabilityRepository {
  constructor(private readonly ref: StateRef) {}

  async findById(id: string): Promise<ProviderAvailability | null> {
    const row = this.ref.state.availability.get(id);
    return row ? structuredClone(row) : null;
  }

  async listForProvider(
    providerId: string,
    filter: { dayOfWeek?: number; enabledOnly?: boolean } = {}
  ): Promise<ProviderAvailability[]> {
    return [...this.ref.state.availability.values()]
      .filter((row) => row.providerId === providerId)
      .filter((row) => filter.dayOfWeek === undefined || row.dayOfWeek === filter.dayOfWeek)
      .filter((row) => !filter.enabledOnly || row.isAvailable)
      .sort((a, b) => a.dayOfWeek - b.dayOfWeek || a.startTime.localeCompare(b.startTime))
      .map((row) => structuredClone(row));
  }

  async create(record: CreateAvailabilityRecord): Promise<ProviderAvailability> {
    const now = this.ref.now();
    const row: ProviderAvailability = { id: uuidv4(), ...record, createdAt: now, updatedAt: now };
    putRow(this.ref, this.ref.state.availability, row.id, row);
    return structuredClone(row);
  }

  async update(id: string, patch: AvailabilityPatch): Promise<ProviderAvailability | null> {
    const existing = this.ref.state.availability.get(id);
    if (!existing) return null;
    const row: ProviderAvailability = { ...existing, ...definedOnly(patch), updatedAt: this.ref.now() };
    putRow(this.ref, this.ref.state.availability, id, row);
    return structuredClone(row);
  }

  async delete(id: string): Promise<boolean> {
    return deleteRow(this.ref, this.ref.state.availability, id);
  }
}

class MemoryTimeOffRepository implements TimeOffRepository {
  constructor(private readonly ref: StateRef) {}

  async findById(id: string): Promise<ProviderTimeOff | null> {
    const row = this.ref.state.timeOff.get(id);
    return row ? structuredClone(row) : null;
  }

  async listForProvider(providerId: string): Promise<ProviderTimeOff[]> {
    return [...this.ref.state.timeOff.values()]
      .filter((row) => row.providerId === providerId)
      .sort((a, b) => byTime(a.startDate, b.startDate))
      .map((row) => structuredClone(row));
  }

  async listOverlapping(providerId: string, from: Date, to: Date): Promise<ProviderTimeOff[]> {
    return (await this.listForProvider(providerId)).filter(
      (row) => row.startDate.getTime() <= to.getTime() && row.endDate.getTime() >= from.getTime()
    );
  }

  async create(record: CreateTimeOffRecord): Promise<ProviderTimeOff> {
    const row: ProviderTimeOff = { id: uuidv4(), ...record, createdAt: this.ref.now() };
    putRow(this.ref, this.ref.state.timeOff, row.id, row);
    return structuredClone(row);
  }

  async delete(id: string): Promise<boolean> {
    return deleteRow(this.ref, this.ref.state.timeOff, id);
  }
}

class MemoryAppointmentRepository implements AppointmentRepository {
  constructor(private readonly ref: StateRef) {}

  async findById(id: string): Promise<Appointment | null> {
    const row = this.ref.state.appointments.get(id);
    return row ? structuredClone(row) : null;
  }

  async create(record: CreateAppointmentRecord): Promise<Appointment> {
    const now = this.ref.now();
    const row: Appointment = {
      id: uuidv4(),
      ...record,
      status: 'scheduled',
      reminderSent: false,
      createdAt: now,
      updatedAt: now,
    };
    this.assertNoOverlap(row);
    putRow(this.ref, this.ref.state.appointments, row.id, row);
    return structuredClone(row);
  }

  async update(id: string, patch: AppointmentPatch): Promise<Appointment | null> {
    const existing = this.ref.state.appointments.get(id);
    if (!existing) return null;
    const row: Appointment = { ...existing, ...definedOnly(patch), updatedAt: this.ref.now() };
    this.assertNoOverlap(row);
    putRow(this.ref, this.ref.state.appointments, id, row);
    return structuredClone(row);
  }

  async listActiveInRange(providerId: string, from: Date, to: Date, excludeId?: string): Promise<Appointment[]> {
    return this.sorted(
      (row) =>
        row.providerId === providerId &&
        row.id !== excludeId &&
        ACTIVE_STATUSES.includes(row.status) &&
        rangesOverlap(row.scheduledTime, row.endTime, from, to)
    );
  }

  async listUpcoming(actor: Actor, now: Date): Promise<Appointment[]> {
    return this.sorted(
      (row) =>
        row.scheduledTime.getTime() > now.getTime() &&
        UPCOMING_STATUSES.includes(row.status) &&
        (actor.role === 'admin' ||
          (actor.role === 'patient' && row.patientId === actor.id) ||
          (actor.role === 'provider' && row.providerId === actor.id))
    );
  }

  async listDueForReminder(from: Date, to: Date): Promise<Appointment[]> {
    return this.sorted(
      (row) =>
        row.scheduledTime.getTime() >= from.getTime() &&
        row.scheduledTime.getTime() <= to.getTime() &&
        UPCOMING_STATUSES.includes(row.status) &&
        row.sendReminder &&
        !row.reminderSent
    );
  }

  async markReminderSent(id: string): Promise<boolean> {
    const existing = this.ref.state.appointments.get(id);
    if (!existing || existing.reminderSent) return false;
    putRow(this.ref, this.ref.state.appointments, id, { ...existing, reminderSent: true, updatedAt: this.ref.now() });
    return true;
  }

  async listFollowUps(parentAppointmentId: string): Promise<Appointment[]> {
    return this.sorted((row) => row.parentAppointmentId === parentAppointmentId);
  }

  private sorted(predicate: (row: Appointment) => boolean): Appointment[] {
    return [...this.ref.state.appointments.values()]
      .filter(predicate)
      .sort((a, b) => byTime(a.scheduledTime, b.scheduledTime))
      .map((row) => structuredClone(row));
  }

  /**
   * Mirrors the exclusion constraint on appointments
   */
  private assertNoOverlap(candidate: Appointment): void {
    if (!ACTIVE_STATUSES.includes(candidate.status)) return;

    for (const row of this.ref.state.appointments.values()) {
      if (
        row.id !== candidate.id &&
        row.providerId === candidate.providerId &&
        ACTIVE_STATUSES.includes(row.status) &&
        rangesOverlap(row.scheduledTime, row.endTime, candidate.scheduledTime, candidate.endTime)
      ) {
        throw new ConflictError('Provider already has an appointment during this time', [
          { code: 'overlap', message: 'Time range overlaps an existing appointment', context: { appointmentId: row.id } },
        ]);
      }
    }
  }
}

class MemoryConsultationRepository implements ConsultationRepository {
  constructor(private readonly ref: StateRef) {}

  async findById(id: string): Promise<Consultation | null> {
    const row = this.ref.state.consultations.get(id);
    return row ? structuredClone(row) : null;
  }

  async findByAppointmentId(appointmentId: string): Promise<Consultation | null> {
    for (const row of this.ref.state.consultations.values()) {
      if (row.appointmentId === appointmentId) return structuredClone(row);
    }
    return null;
  }

  async create(record: CreateConsultationRecord): Promise<Consultation> {
    this.assertUniqueAppointment(record.appointmentId);
    const now = this.ref.now();
    const row: Consultation = {
      id: uuidv4(),
      appointmentId: record.appointmentId,
      startTime: null,
      endTime: null,
      durationMs: null,
      meetingId: null,
      meetingPassword: null,
      joinUrl: null,
      startUrl: null,
      accessCode: null,
      accessCodeExpires: null,
      notes: record.notes,
      createdAt: now,
      updatedAt: now,
    };
    putRow(this.ref, this.ref.state.consultations, row.id, row);
    return structuredClone(row);
  }

  async update(id: string, patch: ConsultationPatch): Promise<Consultation | null> {
    const existing = this.ref.state.consultations.get(id);
    if (!existing) return null;
    if (patch.appointmentId !== undefined && patch.appointmentId !== existing.appointmentId) {
      this.assertUniqueAppointment(patch.appointmentId);
    }
    const merged: Consultation = { ...existing, ...definedOnly(patch), updatedAt: this.ref.now() };
    const row: Consultation = { ...merged, durationMs: computeDurationMs(merged.startTime, merged.endTime) };
    putRow(this.ref, this.ref.state.consultations, id, row);
    return structuredClone(row);
  }

  async delete(id: string): Promise<boolean> {
    return deleteRow(this.ref, this.ref.state.consultations, id);
  }

  private assertUniqueAppointment(appointmentId: string): void {
    for (const row of this.ref.state.consultations.values()) {
      if (row.appointmentId === appointmentId) {
        throw new ConflictError('Duplicate record (consultations_appointment_id_key)');
      }
    }
  }
}

class MemoryOutboxRepository implements OutboxRepository {
  constructor(private readonly ref: StateRef) {}

  async enqueue(message: OutboxMessage): Promise<OutboxEvent> {
    const event: OutboxEvent = {
      ...message,
      id: uuidv4(),
      status: 'pending',
      attempts: 0,
      lastError: null,
      createdAt: this.ref.now(),
      processedAt: null,
    };
    putRow(this.ref, this.ref.state.outbox, event.id, event);
    return structuredClone(event);
  }

  async findById(id: string): Promise<OutboxEvent | null> {
    const event = this.ref.state.outbox.get(id);
    return event ? structuredClone(event) : null;
  }

  async listDispatchable(limit: number, maxAttempts: number): Promise<OutboxEvent[]> {
    return [...this.ref.state.outbox.values()]
      .filter((event) => event.status !== 'done' && event.attempts < maxAttempts)
      .sort((a, b) => byTime(a.createdAt, b.createdAt))
      .slice(0, limit)
      .map((event) => structuredClone(event));
  }

  async markDone(id: string, at: Date): Promise<void> {
    const event = this.ref.state.outbox.get(id);
    if (!event) return;
    putRow(this.ref, this.ref.state.outbox, id, {
      ...event,
      status: 'done',
      attempts: event.attempts + 1,
      lastError: null,
      processedAt: at,
    });
  }

  async markFailed(id: string, error: string, at: Date): Promise<void> {
    const event = this.ref.state.outbox.get(id);
    if (!event) return;
    putRow(this.ref, this.ref.state.outbox, id, {
      ...event,
      status: 'failed',
      attempts: event.attempts + 1,
      lastError: error,
      processedAt: at,
    });
  }
}

/**
 * Drop keys whose value is undefined so a spread does not erase fields
 */
function definedOnly<T extends object>(patch: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(patch)) {
    if (isKeyOf(patch, key) && patch[key] !== undefined) {
      result[key] = patch[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

// ============================================================================
// STORE
// ============================================================================

class MemoryRepositories {
  readonly availability: AvailabilityRepository;
  readonly timeOff: TimeOffRepository;
  readonly appointments: AppointmentRepository;
  readonly consultations: ConsultationRepository;
  readonly outbox: OutboxRepository;

  constructor(ref: StateRef) {
    this.availability = new MemoryAvailabilityRepository(ref);
    this.timeOff = new MemoryTimeOffRepository(ref);
    this.appointments = new MemoryAppointmentRepository(ref);
    this.consultations = new MemoryConsultationRepository(ref);
    this.outbox = new MemoryOutboxRepository(ref);
  }
}

class MemoryTransactionScope extends MemoryRepositories implements SchedulingStore {
  transaction<T>(work: (tx: SchedulingStore) => Promise<T>): Promise<T> {
    return work(this);
  }
}

export interface InMemorySchedulingStoreOptions {
  /** Clock for createdAt/updatedAt stamps */
  now?: () => Date;
}

export class InMemorySchedulingStore extends MemoryRepositories implements SchedulingStore {
  private readonly ref: StateRef;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: InMemorySchedulingStoreOptions = {}) {
    const ref: StateRef = { state: emptyState(), now: options.now ?? (() => new Date()) };
    super(ref);
    this.ref = ref;
  }

  async transaction<T>(work: (tx: SchedulingStore) => Promise<T>): Promise<T> {
    const previous = this.queue;
    let release: () => void = () => undefined;
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    // Only this transaction's writes are undone; writes made outside it stay
    const undo: Array<() => void> = [];
    const scope: StateRef = { state: this.ref.state, now: this.ref.now, journal: undo };

    try {
      return await work(new MemoryTransactionScope(scope));
    } catch (error) {
      for (const step of undo.reverse()) {
        step();
      }
      throw error;
    } finally {
      release();
    }
  }

  /** Remove every record */
  clear(): void {
    this.ref.state = emptyState();
  }
}
