/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - CONSULTATION SERVICE
 * ============================================================================
 *
 * The video session that accompanies an appointment. Starting and ending a
 * consultation drives the appointment to in_progress and completed; the
 * remote meeting is created, moved and released through the outbox.
 */

import logger from '../config/logger';
import type { SchedulingStore } from '../models';
import { UPCOMING_STATUSES, type Actor, type Appointment, type Consultation, type JoinInfo } from '../types';
import {
  AlreadyEndedError,
  AlreadyStartedError,
  AuthorizationError,
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  NotStartedError,
} from '../utils/errors';
import { assertCanManage, participantRole } from '../utils/permissions';
import { consultationNotesSchema, parseInput, uuidSchema } from '../utils/validation';
import type { OutboxDispatcher } from './outboxService';

const log = logger.child('consultations');

export interface ConsultationServiceDeps {
  store: SchedulingStore;
  outbox: OutboxDispatcher;
  now?: () => Date;
}

export interface CreateConsultationInput {
  appointmentId: string;
  notes?: string | null;
}

export class ConsultationService {
  private readonly store: SchedulingStore;
  private readonly outbox: OutboxDispatcher;
  private readonly now: () => Date;

  constructor(deps: ConsultationServiceDeps) {
    this.store = deps.store;
    this.outbox = deps.outbox;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Open a consultation for an appointment and request its meeting
   */
  async createConsultation(actor: Actor, input: CreateConsultationInput): Promise<Consultation> {
    const appointmentId = parseInput(uuidSchema, input.appointmentId);

    const { consultation, eventIds } = await this.store.transaction(async (tx) => {
      const appointment = await this.loadAppointment(tx, appointmentId);
      assertCanManage(actor, appointment);

      if (await tx.consultations.findByAppointmentId(appointmentId)) {
        throw new ConflictError('A consultation already exists for this appointment');
      }

      const consultation = await tx.consultations.create({ appointmentId, notes: input.notes ?? null });
      const event = await tx.outbox.enqueue({ type: 'meeting.create', payload: { consultationId: consultation.id } });
      return { consultation, eventIds: [event.id] };
    });

    log.info('Consultation created', { consultationId: consultation.id, appointmentId });
    await this.outbox.dispatch(eventIds);

    return (await this.store.consultations.findById(consultation.id)) ?? consultation;
  }

  async getConsultation(actor: Actor, consultationId: string): Promise<Consultation> {
    const consultation = await this.loadConsultation(this.store, consultationId);
    const appointment = await this.loadAppointment(this.store, consultation.appointmentId);
    if (actor.role !== 'admin' && !participantRole(actor, appointment)) {
      throw new AuthorizationError('You do not have access to this consultation');
    }
    return consultation;
  }

  async start(actor: Actor, consultationId: string): Promise<Consultation> {
    const consultation = await this.store.transaction(async (tx) => {
      const current = await this.loadConsultation(tx, consultationId);
      if (current.startTime) {
        throw new AlreadyStartedError();
      }

      const appointment = await this.loadAppointment(tx, current.appointmentId);
      assertCanManage(actor, appointment);
      if (!UPCOMING_STATUSES.includes(appointment.status)) {
        throw new InvalidTransitionError(`Cannot start a consultation for an appointment that is ${appointment.status}`);
      }

      const started = await this.updateConsultation(tx, consultationId, { startTime: this.now() });
      await tx.appointments.update(appointment.id, { status: 'in_progress' });
      return started;
    });

    log.info('Consultation started', { consultationId, appointmentId: consultation.appointmentId });
    return consultation;
  }

  async end(actor: Actor, consultationId: string): Promise<Consultation> {
    const consultation = await this.store.transaction(async (tx) => {
      const current = await this.loadConsultation(tx, consultationId);
      if (!current.startTime) {
        throw new NotStartedError();
      }
      if (current.endTime) {
        throw new AlreadyEndedError();
      }

      const appointment = await this.loadAppointment(tx, current.appointmentId);
      assertCanManage(actor, appointment);

      const ended = await this.updateConsultation(tx, consultationId, { endTime: this.now() });
      await tx.appointments.update(appointment.id, { status: 'completed' });
      return ended;
    });

    log.info('Consultation ended', {
      consultationId,
      appointmentId: consultation.appointmentId,
      durationMs: consultation.durationMs,
    });
    return consultation;
  }

  async updateNotes(actor: Actor, consultationId: string, input: { notes: string | null }): Promise<Consultation> {
    const { notes } = parseInput(consultationNotesSchema, input);

    return this.store.transaction(async (tx) => {
      const current = await this.loadConsultation(tx, consultationId);
      assertCanManage(actor, await this.loadAppointment(tx, current.appointmentId));
      return this.updateConsultation(tx, consultationId, { notes });
    });
  }

  /**
   * Remove the consultation; its meeting is released after commit
   */
  async deleteConsultation(actor: Actor, consultationId: string): Promise<void> {
    const eventIds = await this.store.transaction(async (tx) => {
      const current = await this.loadConsultation(tx, consultationId);
      assertCanManage(actor, await this.loadAppointment(tx, current.appointmentId));

      await tx.consultations.delete(consultationId);

      if (!current.meetingId) return [];
      const event = await tx.outbox.enqueue({ type: 'meeting.delete', payload: { meetingId: current.meetingId } });
      return [event.id];
    });

    log.info('Consultation deleted', { consultationId });
    await this.outbox.dispatch(eventIds);
  }

  /**
   * Meeting details for the appointment's patient or provider. Only the
   * provider receives the host start URL.
   */
  async joinInfo(actor: Actor, consultationId: string): Promise<JoinInfo> {
    const consultation = await this.loadConsultation(this.store, consultationId);
    const appointment = await this.loadAppointment(this.store, consultation.appointmentId);
    const role = participantRole(actor, appointment);

    if (!role) {
      throw new AuthorizationError('Only the patient or provider can join this consultation');
    }
    if (!consultation.meetingId) {
      throw new NotFoundError('Meeting');
    }

    const info: JoinInfo = {
      meetingId: consultation.meetingId,
      meetingPassword: consultation.meetingPassword,
      joinUrl: consultation.joinUrl,
    };
    if (role === 'provider') {
      info.startUrl = consultation.startUrl;
    }
    return info;
  }

  private async loadConsultation(tx: SchedulingStore, consultationId: string): Promise<Consultation> {
    const consultation = await tx.consultations.findById(consultationId);
    if (!consultation) {
      throw new NotFoundError('Consultation');
    }
    return consultation;
  }

  private async loadAppointment(tx: SchedulingStore, appointmentId: string): Promise<Appointment> {
    const appointment = await tx.appointments.findById(appointmentId);
    if (!appointment) {
      throw new NotFoundError('Appointment');
    }
    return appointment;
  }

  private async updateConsultation(
    tx: SchedulingStore,
    consultationId: string,
    patch: Parameters<SchedulingStore['consultations']['update']>[1]
  ): Promise<Consultation> {
    const updated = await tx.consultations.update(consultationId, patch);
    if (!updated) {
      throw new NotFoundError('Consultation');
    }
    return updated;
  }
}
