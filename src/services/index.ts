/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - SERVICE CONTAINER
 * ============================================================================
 */

import type { Pool } from 'pg';
import { config } from '../config/config';
import { PostgresSchedulingStore, type SchedulingStore } from '../models';
import { AppointmentService } from './appointmentService';
import { CalendarService } from './calendarService';
import { ConsultationAuthService } from './consultationAuthService';
import { ConsultationService } from './consultationService';
import { EmailService, type Mailer } from './emailService';
import { PostgresIdentityDirectory, type IdentityDirectory } from './identityService';
import { createMeetingProvider, type MeetingProvider } from './meetingService';
import { NotificationService } from './notificationService';
import { OutboxService } from './outboxService';
import { ReminderService } from './reminderService';

export interface ServiceDependencies {
  store: SchedulingStore;
  identities: IdentityDirectory;
  mailer: Mailer;
  meetings: MeetingProvider;
  now?: () => Date;
}

export interface Services {
  store: SchedulingStore;
  identities: IdentityDirectory;
  calendar: CalendarService;
  appointments: AppointmentService;
  consultations: ConsultationService;
  accessCodes: ConsultationAuthService;
  reminders: ReminderService;
  outbox: OutboxService;
  notifications: NotificationService;
}

export function createServices({ store, identities, mailer, meetings, now }: ServiceDependencies): Services {
  const notifications = new NotificationService(mailer, identities);
  const outbox = new OutboxService({ store, meetings, notifications, identities, now });
  const calendar = new CalendarService(store, { slotMinutes: config.scheduling.slotMinutes });

  return {
    store,
    identities,
    calendar,
    notifications,
    outbox,
    appointments: new AppointmentService({ store, calendar, identities, outbox, now }),
    consultations: new ConsultationService({ store, outbox, now }),
    accessCodes: new ConsultationAuthService({ store, identities, notifications, now }),
    reminders: new ReminderService({ store, notifications, now }),
  };
}

/**
 * Production wiring over a PostgreSQL pool
 */
export function createPostgresServices(pool: Pool): Services {
  return createServices({
    store: new PostgresSchedulingStore(pool),
    identities: new PostgresIdentityDirectory(pool),
    mailer: new EmailService(),
    meetings: createMeetingProvider(),
  });
}

export {
  AppointmentService,
  CalendarService,
  ConsultationAuthService,
  ConsultationService,
  EmailService,
  NotificationService,
  OutboxService,
  ReminderService,
};
