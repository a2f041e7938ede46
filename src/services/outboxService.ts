/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - OUTBOX DISPATCHER
 * ============================================================================
 *
 * Performs the side effects recorded by scheduling transactions: meeting
 * provider calls and appointment e-mails. Runs after commit and again from
 * the retry job; delivery is at-least-once.
 */

import { differenceInMinutes } from 'date-fns';
import { config } from '../config/config';
import logger, { errorMessage } from '../config/logger';
import type { SchedulingStore } from '../models';
import type { OutboxEvent, OutboxPayloads } from '../types';
import { fullName, type IdentityDirectory } from './identityService';
import type { MeetingProvider } from './meetingService';
import type { NotificationService } from './notificationService';

const log = logger.child('outbox');

export interface OutboxDispatcher {
  /** Handle the given events now; never throws */
  dispatch(eventIds: string[]): Promise<void>;
}

export interface OutboxRunResult {
  processed: number;
  succeeded: number;
  failed: number;
}

export interface OutboxServiceDeps {
  store: SchedulingStore;
  meetings: MeetingProvider;
  notifications: NotificationService;
  identities: IdentityDirectory;
  now?: () => Date;
  maxAttempts?: number;
  batchSize?: number;
}

export function meetingTopic(providerName: string, patientName: string): string {
  return `Medical Consultation - ${providerName} and ${patientName}`;
}

export class OutboxService implements OutboxDispatcher {
  private readonly store: SchedulingStore;
  private readonly meetings: MeetingProvider;
  private readonly notifications: NotificationService;
  private readonly identities: IdentityDirectory;
  private readonly now: () => Date;
  private readonly maxAttempts: number;
  private readonly batchSize: number;
  private readonly inFlight = new Set<string>();

  constructor(deps: OutboxServiceDeps) {
    this.store = deps.store;
    this.meetings = deps.meetings;
    this.notifications = deps.notifications;
    this.identities = deps.identities;
    this.now = deps.now ?? (() => new Date());
    this.maxAttempts = deps.maxAttempts ?? config.scheduling.outbox.maxAttempts;
    this.batchSize = deps.batchSize ?? config.scheduling.outbox.batchSize;
  }

  async dispatch(eventIds: string[]): Promise<void> {
    for (const id of eventIds) {
      try {
        const event = await this.store.outbox.findById(id);
        if (event && event.status !== 'done') {
          await this.process(event);
        }
      } catch (error) {
        log.error('Outbox dispatch failed', { eventId: id, error: errorMessage(error) });
      }
    }
  }

  /**
   * Retry pending and failed events below the attempt limit
   */
  async processPending(limit: number = this.batchSize): Promise<OutboxRunResult> {
    const events = await this.store.outbox.listDispatchable(limit, this.maxAttempts);
    const result: OutboxRunResult = { processed: 0, succeeded: 0, failed: 0 };

    for (const event of events) {
      const ok = await this.process(event);
      if (ok === null) continue;
      result.processed++;
      if (ok) {
        result.succeeded++;
      } else {
        result.failed++;
      }
    }

    if (result.processed > 0) {
      log.info('Outbox batch processed', { ...result });
    }
    return result;
  }

  /**
   * Run one event's handler and record the outcome; null when already running
   */
  private async process(event: OutboxEvent): Promise<boolean | null> {
    if (this.inFlight.has(event.id)) return null;
    this.inFlight.add(event.id);

    try {
      await this.handle(event);
      await this.store.outbox.markDone(event.id, this.now());
      log.debug('Outbox event handled', { eventId: event.id, type: event.type });
      return true;
    } catch (error) {
      const message = errorMessage(error);
      await this.store.outbox.markFailed(event.id, message, this.now());
      log.warn('Outbox event failed', {
        eventId: event.id,
        type: event.type,
        attempt: event.attempts + 1,
        maxAttempts: this.maxAttempts,
        error: message,
      });
      return false;
    } finally {
      this.inFlight.delete(event.id);
    }
  }

  private handle(event: OutboxEvent): Promise<void> {
    switch (event.type) {
      case 'meeting.create':
        return this.createMeeting(event.payload);
      case 'meeting.update':
        return this.updateMeeting(event.payload);
      case 'meeting.delete':
        return this.meetings.deleteMeeting(event.payload.meetingId);
      case 'email.appointment':
        return this.sendAppointmentEmail(event.payload);
    }
  }

  // ==========================================================================
  // HANDLERS
  // ==========================================================================

  private async createMeeting({ consultationId }: OutboxPayloads['meeting.create']): Promise<void> {
    const consultation = await this.store.consultations.findById(consultationId);
    if (!consultation || consultation.meetingId) {
      return;
    }

    const appointment = await this.store.appointments.findById(consultation.appointmentId);
    if (!appointment) {
      throw new Error(`Appointment ${consultation.appointmentId} not found`);
    }

    const [patient, provider] = await Promise.all([
      this.identities.findById(appointment.patientId),
      this.identities.findById(appointment.providerId),
    ]);
    if (!patient || !provider) {
      throw new Error('Appointment participants could not be resolved');
    }
    if (!provider.email) {
      throw new Error('Provider has no email address to host the meeting');
    }

    const meeting = await this.meetings.createMeeting({
      topic: meetingTopic(fullName(provider), fullName(patient)),
      start: appointment.scheduledTime,
      durationMinutes: differenceInMinutes(appointment.endTime, appointment.scheduledTime),
      hostEmail: provider.email,
    });

    await this.store.consultations.update(consultationId, {
      meetingId: meeting.id,
      meetingPassword: meeting.password,
      joinUrl: meeting.joinUrl,
      startUrl: meeting.startUrl,
    });
  }

  private async updateMeeting({ consultationId }: OutboxPayloads['meeting.update']): Promise<void> {
    const consultation = await this.store.consultations.findById(consultationId);
    if (!consultation?.meetingId) {
      return;
    }

    const appointment = await this.store.appointments.findById(consultation.appointmentId);
    if (!appointment) {
      throw new Error(`Appointment ${consultation.appointmentId} not found`);
    }

    await this.meetings.updateMeeting(consultation.meetingId, {
      start: appointment.scheduledTime,
      durationMinutes: differenceInMinutes(appointment.endTime, appointment.scheduledTime),
    });
  }

  private async sendAppointmentEmail({ appointmentId, notice }: OutboxPayloads['email.appointment']): Promise<void> {
    const appointment = await this.store.appointments.findById(appointmentId);
    if (!appointment) {
      throw new Error(`Appointment ${appointmentId} not found`);
    }

    const sent = await this.notifications.sendAppointmentNotice(appointment, notice);
    if (!sent) {
      throw new Error(`Appointment ${notice} email was not delivered`);
    }
  }
}
