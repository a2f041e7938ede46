/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - REMINDER SERVICE
 * ============================================================================
 */

import { addHours } from 'date-fns';
import { config } from '../config/config';
import logger, { errorMessage } from '../config/logger';
import type { SchedulingStore } from '../models';
import type { Appointment, ReminderSweepResult } from '../types';
import type { NotificationService } from './notificationService';

const log = logger.child('reminders');

export interface ReminderServiceDeps {
  store: SchedulingStore;
  notifications: NotificationService;
  now?: () => Date;
  leadHours?: number;
}

export class ReminderService {
  private readonly store: SchedulingStore;
  private readonly notifications: NotificationService;
  private readonly now: () => Date;
  private readonly leadHours: number;

  constructor(deps: ReminderServiceDeps) {
    this.store = deps.store;
    this.notifications = deps.notifications;
    this.now = deps.now ?? (() => new Date());
    this.leadHours = deps.leadHours ?? config.scheduling.reminders.leadHours;
  }

  /**
   * Upcoming appointments starting within the lead window that still owe a reminder
   */
  dueForReminder(now: Date = this.now(), leadHours: number = this.leadHours): Promise<Appointment[]> {
    return this.store.appointments.listDueForReminder(now, addHours(now, leadHours));
  }

  /**
   * E-mail the reminder and flag the appointment; false leaves it due
   */
  async sendReminder(appointment: Appointment): Promise<boolean> {
    try {
      const sent = await this.notifications.sendReminder(appointment);
      if (!sent) {
        log.warn('Reminder not delivered', { appointmentId: appointment.id });
        return false;
      }

      const marked = await this.store.appointments.markReminderSent(appointment.id);
      if (!marked) {
        log.debug('Reminder already recorded by another run', { appointmentId: appointment.id });
      }
      return true;
    } catch (error) {
      log.error('Failed to send reminder', { appointmentId: appointment.id, error: errorMessage(error) });
      return false;
    }
  }

  async runSweep(now: Date = this.now()): Promise<ReminderSweepResult> {
    const due = await this.dueForReminder(now);
    let sent = 0;

    for (const appointment of due) {
      if (await this.sendReminder(appointment)) {
        sent++;
      }
    }

    const result: ReminderSweepResult = { found: due.length, sent };
    log.info('Reminder sweep completed', { ...result });
    return result;
  }
}
