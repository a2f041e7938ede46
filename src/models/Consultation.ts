/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - CONSULTATION MODEL
 * ============================================================================
 */

import type { Consultation } from '../types';
import type { QueryExecutor } from './executor';
import type { ConsultationPatch, ConsultationRepository, CreateConsultationRecord } from './types';

interface ConsultationRow {
  id: string;
  appointment_id: string;
  start_time: Date | null;
  end_time: Date | null;
  // BIGINT arrives as a string
  duration_ms: string | null;
  meeting_id: string | null;
  meeting_password: string | null;
  join_url: string | null;
  start_url: string | null;
  access_code: string | null;
  access_code_expires: Date | null;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
}

const CONSULTATION_COLUMNS = `id, appointment_id, start_time, end_time, duration_ms, meeting_id,
  meeting_password, join_url, start_url, access_code, access_code_expires, notes, created_at, updated_at`;

const PATCH_COLUMNS: Array<[keyof ConsultationPatch, string]> = [
  ['appointmentId', 'appointment_id'],
  ['startTime', 'start_time'],
  ['endTime', 'end_time'],
  ['meetingId', 'meeting_id'],
  ['meetingPassword', 'meeting_password'],
  ['joinUrl', 'join_url'],
  ['startUrl', 'start_url'],
  ['accessCode', 'access_code'],
  ['accessCodeExpires', 'access_code_expires'],
  ['notes', 'notes'],
];

function mapConsultationRow(row: ConsultationRow): Consultation {
  return {
    id: row.id,
    appointmentId: row.appointment_id,
    startTime: row.start_time,
    endTime: row.end_time,
    durationMs: row.duration_ms === null ? null : Number(row.duration_ms),
    meetingId: row.meeting_id,
    meetingPassword: row.meeting_password,
    joinUrl: row.join_url,
    startUrl: row.start_url,
    accessCode: row.access_code,
    accessCodeExpires: row.access_code_expires,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class ConsultationModel implements ConsultationRepository {
  constructor(private readonly db: QueryExecutor) {}

  async findById(id: string): Promise<Consultation | null> {
    const result = await this.db.query<ConsultationRow>(
      `SELECT ${CONSULTATION_COLUMNS} FROM consultations WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? mapConsultationRow(row) : null;
  }

  async findByAppointmentId(appointmentId: string): Promise<Consultation | null> {
    const result = await this.db.query<ConsultationRow>(
      `SELECT ${CONSULTATION_COLUMNS} FROM consultations WHERE appointment_id = $1`,
      [appointmentId]
    );
    const row = result.rows[0];
    return row ? mapConsultationRow(row) : null;
  }

  async create(record: CreateConsultationRecord): Promise<Consultation> {
    const result = await this.db.query<ConsultationRow>(
      `INSERT INTO consultations (appointment_id, notes)
       VALUES ($1, $2)
       RETURNING ${CONSULTATION_COLUMNS}`,
      [record.appointmentId, record.notes]
    );
    return mapConsultationRow(result.rows[0]);
  }

  async update(id: string, patch: ConsultationPatch): Promise<Consultation | null> {
    const sets: string[] = [];
    const params: unknown[] = [id];
    const assigned = new Map<string, string>();

    for (const [field, column] of PATCH_COLUMNS) {
      if (patch[field] !== undefined) {
        params.push(patch[field]);
        assigned.set(column, `$${params.length}`);
        sets.push(`${column} = $${params.length}`);
      }
    }

    // SET expressions read the old row, so use the incoming values where given
    const start = assigned.get('start_time') ?? 'start_time';
    const end = assigned.get('end_time') ?? 'end_time';
    sets.push(
      `duration_ms = CASE WHEN ${start}::timestamptz IS NOT NULL AND ${end}::timestamptz IS NOT NULL
         THEN (EXTRACT(EPOCH FROM ${end}::timestamptz - ${start}::timestamptz) * 1000)::bigint END`
    );
    sets.push('updated_at = NOW()');

    const result = await this.db.query<ConsultationRow>(
      `UPDATE consultations SET ${sets.join(', ')} WHERE id = $1 RETURNING ${CONSULTATION_COLUMNS}`,
      params
    );
    const row = result.rows[0];
    return row ? mapConsultationRow(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM consultations WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
