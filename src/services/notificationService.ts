/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - NOTIFICATION SERVICE
 * ============================================================================
 *
 * Scheduling e-mails to patients: appointment notices, access codes and
 * reminders. Delivery failures come back as `false`.
 */

import logger from '../config/logger';
import { APPOINTMENT_KIND_LABELS, type Appointment, type AppointmentNotice, type Identity } from '../types';
import type { EmailOptions, Mailer } from './emailService';
import { fullName, type IdentityDirectory } from './identityService';

const log = logger.child('notifications');

interface EmailTemplate {
  subject: string;
  html: string;
  text: string;
}

export interface AppointmentEmailContext {
  appointment: Appointment;
  patient: Identity;
  provider: Identity;
  /** Patient's address */
  recipient: string;
}

const whenFormatter = new Intl.DateTimeFormat('en-US', {
  timeZone: 'UTC',
  weekday: 'long',
  year: 'numeric',
  month: 'long',
  day: 'numeric',
  hour: '2-digit',
  minute: '2-digit',
  hour12: false,
});

export function formatAppointmentTime(date: Date): string {
  return `${whenFormatter.format(date)} UTC`;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function layout(title: string, body: string): string {
  return `
      <!DOCTYPE html>
      <html>
      <head>
          <meta charset="utf-8">
          <title>${escapeHtml(title)}</title>
          <style>
              body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; }
              .container { max-width: 600px; margin: 0 auto; padding: 20px; }
              .header { background: #2563eb; color: white; padding: 24px; text-align: center; border-radius: 8px 8px 0 0; }
              .content { padding: 24px; background: #f9fafb; border-radius: 0 0 8px 8px; }
              .code { font-size: 28px; letter-spacing: 6px; font-weight: bold; }
          </style>
      </head>
      <body>
          <div class="container">
              <div class="header"><h1>${escapeHtml(title)}</h1></div>
              <div class="content">${body}</div>
          </div>
      </body>
      </html>
    `;
}

// ============================================================================
// TEMPLATES
// ============================================================================

export function renderAppointmentNotice(notice: AppointmentNotice, context: AppointmentEmailContext): EmailTemplate {
  const { appointment, patient, provider } = context;
  const label = APPOINTMENT_KIND_LABELS[appointment.kind];
  const when = formatAppointmentTime(appointment.scheduledTime);
  const doctor = `Dr. ${provider.lastName}`;
  const greeting = `Dear ${patient.firstName},`;

  switch (notice) {
    case 'confirmed':
      return {
        subject: `Appointment Confirmation: ${label} with ${doctor}`,
        html: layout(
          'Appointment Confirmed',
          `<p>${escapeHtml(greeting)}</p>
           <p>Your ${escapeHtml(label)} with ${escapeHtml(doctor)} is scheduled for <strong>${when}</strong>.</p>
           ${appointment.reason ? `<p>Reason: ${escapeHtml(appointment.reason)}</p>` : ''}`
        ),
        text: `${greeting}\n\nYour ${label} with ${doctor} is scheduled for ${when}.`,
      };

    case 'cancelled':
      return {
        subject: `Appointment Cancelled: Your appointment with ${doctor}`,
        html: layout(
          'Appointment Cancelled',
          `<p>${escapeHtml(greeting)}</p>
           <p>Your ${escapeHtml(label)} with ${escapeHtml(doctor)} on <strong>${when}</strong> has been cancelled.</p>`
        ),
        text: `${greeting}\n\nYour ${label} with ${doctor} on ${when} has been cancelled.`,
      };

    case 'rescheduled':
      return {
        subject: `Appointment Rescheduled: Your appointment with ${doctor}`,
        html: layout(
          'Appointment Rescheduled',
          `<p>${escapeHtml(greeting)}</p>
           <p>Your ${escapeHtml(label)} with ${escapeHtml(doctor)} has been moved to <strong>${when}</strong>.</p>`
        ),
        text: `${greeting}\n\nYour ${label} with ${doctor} has been moved to ${when}.`,
      };
  }
}

export function renderAccessCode(context: AppointmentEmailContext, code: string, ttlMinutes: number): EmailTemplate {
  const { patient, provider } = context;
  const doctor = `Dr. ${provider.lastName}`;
  const greeting = `Dear ${patient.firstName},`;

  return {
    subject: `Access Code for Your Video Consultation with ${doctor}`,
    html: layout(
      'Your Access Code',
      `<p>${escapeHtml(greeting)}</p>
       <p>Use this code to join your video consultation with ${escapeHtml(doctor)}:</p>
       <p class="code">${escapeHtml(code)}</p>
       <p>The code expires in ${ttlMinutes} minutes and can be used once.</p>`
    ),
    text: `${greeting}\n\nYour access code for the video consultation with ${doctor} is ${code}. It expires in ${ttlMinutes} minutes and can be used once.`,
  };
}

export function renderReminder(context: AppointmentEmailContext): EmailTemplate {
  const { appointment, patient, provider } = context;
  const label = APPOINTMENT_KIND_LABELS[appointment.kind];
  const when = formatAppointmentTime(appointment.scheduledTime);
  const doctor = `Dr. ${provider.lastName}`;
  const greeting = `Dear ${patient.firstName},`;

  return {
    subject: `Reminder: Your ${label} with ${doctor} tomorrow`,
    html: layout(
      'Appointment Reminder',
      `<p>${escapeHtml(greeting)}</p>
       <p>This is a reminder of your ${escapeHtml(label)} with ${escapeHtml(doctor)} on <strong>${when}</strong>.</p>`
    ),
    text: `${greeting}\n\nThis is a reminder of your ${label} with ${doctor} on ${when}.`,
  };
}

// ============================================================================
// SERVICE
// ============================================================================

export class NotificationService {
  constructor(
    private readonly mailer: Mailer,
    private readonly identities: IdentityDirectory
  ) {}

  async sendAppointmentNotice(appointment: Appointment, notice: AppointmentNotice): Promise<boolean> {
    const context = await this.loadContext(appointment);
    if (!context) return false;
    return this.deliver(context, renderAppointmentNotice(notice, context));
  }

  async sendAccessCode(appointment: Appointment, code: string, ttlMinutes: number): Promise<boolean> {
    const context = await this.loadContext(appointment);
    if (!context) return false;
    return this.deliver(context, renderAccessCode(context, code, ttlMinutes));
  }

  async sendReminder(appointment: Appointment): Promise<boolean> {
    const context = await this.loadContext(appointment);
    if (!context) return false;
    return this.deliver(context, renderReminder(context));
  }

  private async loadContext(appointment: Appointment): Promise<AppointmentEmailContext | null> {
    const [patient, provider] = await Promise.all([
      this.identities.findById(appointment.patientId),
      this.identities.findById(appointment.providerId),
    ]);

    if (!patient || !provider) {
      log.warn('Cannot notify: participant not found', {
        appointmentId: appointment.id,
        patientFound: Boolean(patient),
        providerFound: Boolean(provider),
      });
      return null;
    }

    if (!patient.email) {
      log.warn('Cannot notify: patient has no email address', { appointmentId: appointment.id });
      return null;
    }

    return { appointment, patient, provider, recipient: patient.email };
  }

  private deliver(context: AppointmentEmailContext, template: EmailTemplate): Promise<boolean> {
    const options: EmailOptions = {
      to: `"${fullName(context.patient)}" <${context.recipient}>`,
      ...template,
    };
    return this.mailer.sendEmail(options);
  }
}
