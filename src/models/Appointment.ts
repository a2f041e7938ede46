/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - APPOINTMENT MODEL
 * ============================================================================
 */

import { z } from 'zod';
import {
  ACTIVE_STATUSES,
  APPOINTMENT_KINDS,
  APPOINTMENT_STATUSES,
  RECURRENCE_PATTERNS,
  UPCOMING_STATUSES,
  type Actor,
  type Appointment,
} from '../types';
import type { QueryExecutor } from './executor';
import type { AppointmentPatch, AppointmentRepository, CreateAppointmentRecord } from './types';

interface AppointmentRow {
  id: string;
  patient_id: string;
  provider_id: string;
  scheduled_time: Date;
  end_time: Date;
  status: string;
  kind: string;
  reason: string;
  parent_appointment_id: string | null;
  is_recurring: boolean;
  recurrence_pattern: string | null;
  recurrence_end_date: string | null;
  send_reminder: boolean;
  reminder_sent: boolean;
  created_at: Date;
  updated_at: Date;
}

// recurrence_end_date is a DATE; read it as text so it is not shifted into local time
const APPOINTMENT_COLUMNS = `id, patient_id, provider_id, scheduled_time, end_time, status, kind, reason,
  parent_appointment_id, is_recurring, recurrence_pattern, recurrence_end_date::text AS recurrence_end_date,
  send_reminder, reminder_sent, created_at, updated_at`;

const statusSchema = z.enum(APPOINTMENT_STATUSES);
const kindSchema = z.enum(APPOINTMENT_KINDS);
const recurrenceSchema = z.enum(RECURRENCE_PATTERNS).nullable();

function mapAppointmentRow(row: AppointmentRow): Appointment {
  return {
    id: row.id,
    patientId: row.patient_id,
    providerId: row.provider_id,
    scheduledTime: row.scheduled_time,
    endTime: row.end_time,
    status: statusSchema.parse(row.status),
    kind: kindSchema.parse(row.kind),
    reason: row.reason,
    parentAppointmentId: row.parent_appointment_id,
    isRecurring: row.is_recurring,
    recurrencePattern: recurrenceSchema.parse(row.recurrence_pattern),
    recurrenceEndDate: row.recurrence_end_date,
    sendReminder: row.send_reminder,
    reminderSent: row.reminder_sent,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class AppointmentModel implements AppointmentRepository {
  constructor(private readonly db: QueryExecutor) {}

  async findById(id: string): Promise<Appointment | null> {
    const result = await this.db.query<AppointmentRow>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? mapAppointmentRow(row) : null;
  }

  async create(record: CreateAppointmentRecord): Promise<Appointment> {
    const result = await this.db.query<AppointmentRow>(
      `INSERT INTO appointments (
         patient_id, provider_id, scheduled_time, end_time, status, kind, reason,
         parent_appointment_id, is_recurring, recurrence_pattern, recurrence_end_date, send_reminder
       )
       VALUES ($1, $2, $3, $4, 'scheduled', $5, $6, $7, $8, $9, $10, $11)
       RETURNING ${APPOINTMENT_COLUMNS}`,
      [
        record.patientId,
        record.providerId,
        record.scheduledTime,
        record.endTime,
        record.kind,
        record.reason,
        record.parentAppointmentId,
        record.isRecurring,
        record.recurrencePattern,
        record.recurrenceEndDate,
        record.sendReminder,
      ]
    );
    return mapAppointmentRow(result.rows[0]);
  }

  async update(id: string, patch: AppointmentPatch): Promise<Appointment | null> {
    const sets: string[] = [];
    const params: unknown[] = [id];
    const columns: Array<[keyof AppointmentPatch, string]> = [
      ['status', 'status'],
      ['sendReminder', 'send_reminder'],
      ['reminderSent', 'reminder_sent'],
      ['reason', 'reason'],
    ];

    for (const [field, column] of columns) {
      if (patch[field] !== undefined) {
        params.push(patch[field]);
        sets.push(`${column} = $${params.length}`);
      }
    }
    sets.push('updated_at = NOW()');

    const result = await this.db.query<AppointmentRow>(
      `UPDATE appointments SET ${sets.join(', ')} WHERE id = $1 RETURNING ${APPOINTMENT_COLUMNS}`,
      params
    );
    const row = result.rows[0];
    return row ? mapAppointmentRow(row) : null;
  }

  async listActiveInRange(providerId: string, from: Date, to: Date, excludeId?: string): Promise<Appointment[]> {
    const params: unknown[] = [providerId, from, to, [...ACTIVE_STATUSES]];
    let exclusion = '';
    if (excludeId) {
      params.push(excludeId);
      exclusion = `AND id <> $${params.length}`;
    }

    const result = await this.db.query<AppointmentRow>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments
       WHERE provider_id = $1
         AND status = ANY($4::text[])
         AND scheduled_time < $3
         AND end_time > $2
         ${exclusion}
       ORDER BY scheduled_time`,
      params
    );
    return result.rows.map(mapAppointmentRow);
  }

  async listUpcoming(actor: Actor, now: Date): Promise<Appointment[]> {
    const params: unknown[] = [now, [...UPCOMING_STATUSES]];
    let ownership = '';
    if (actor.role === 'patient') {
      params.push(actor.id);
      ownership = `AND patient_id = $${params.length}`;
    } else if (actor.role === 'provider') {
      params.push(actor.id);
      ownership = `AND provider_id = $${params.length}`;
    }

    const result = await this.db.query<AppointmentRow>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments
       WHERE scheduled_time > $1
         AND status = ANY($2::text[])
         ${ownership}
       ORDER BY scheduled_time`,
      params
    );
    return result.rows.map(mapAppointmentRow);
  }

  async listDueForReminder(from: Date, to: Date): Promise<Appointment[]> {
    const result = await this.db.query<AppointmentRow>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments
       WHERE scheduled_time BETWEEN $1 AND $2
         AND status = ANY($3::text[])
         AND send_reminder = TRUE
         AND reminder_sent = FALSE
       ORDER BY scheduled_time`,
      [from, to, [...UPCOMING_STATUSES]]
    );
    return result.rows.map(mapAppointmentRow);
  }

  async markReminderSent(id: string): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE appointments SET reminder_sent = TRUE, updated_at = NOW()
       WHERE id = $1 AND reminder_sent = FALSE`,
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listFollowUps(parentAppointmentId: string): Promise<Appointment[]> {
    const result = await this.db.query<AppointmentRow>(
      `SELECT ${APPOINTMENT_COLUMNS} FROM appointments
       WHERE parent_appointment_id = $1
       ORDER BY scheduled_time`,
      [parentAppointmentId]
    );
    return result.rows.map(mapAppointmentRow);
  }
}
