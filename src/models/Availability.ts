/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - AVAILABILITY AND TIME-OFF MODELS
 * ============================================================================
 */

import type { ProviderAvailability, ProviderTimeOff } from '../types';
import { normalizeTimeOfDay } from '../utils/helpers';
import type { QueryExecutor } from './executor';
import type {
  AvailabilityPatch,
  AvailabilityRepository,
  CreateAvailabilityRecord,
  CreateTimeOffRecord,
  TimeOffRepository,
} from './types';

// ============================================================================
// DATABASE ROW TYPES
// ============================================================================

interface AvailabilityRow {
  id: string;
  provider_id: string;
  day_of_week: number;
  start_time: string;
  end_time: string;
  is_available: boolean;
  created_at: Date;
  updated_at: Date;
}

interface TimeOffRow {
  id: string;
  provider_id: string;
  start_date: Date;
  end_date: Date;
  reason: string | null;
  created_at: Date;
}

const AVAILABILITY_COLUMNS =
  'id, provider_id, day_of_week, start_time, end_time, is_available, created_at, updated_at';

const TIME_OFF_COLUMNS = 'id, provider_id, start_date, end_date, reason, created_at';

function mapAvailabilityRow(row: AvailabilityRow): ProviderAvailability {
  return {
    id: row.id,
    providerId: row.provider_id,
    dayOfWeek: row.day_of_week,
    startTime: normalizeTimeOfDay(row.start_time),
    endTime: normalizeTimeOfDay(row.end_time),
    isAvailable: row.is_available,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mapTimeOffRow(row: TimeOffRow): ProviderTimeOff {
  return {
    id: row.id,
    providerId: row.provider_id,
    startDate: row.start_date,
    endDate: row.end_date,
    reason: row.reason,
    createdAt: row.created_at,
  };
}

// ============================================================================
// AVAILABILITY
// ============================================================================

export class AvailabilityModel implements AvailabilityRepository {
  constructor(private readonly db: QueryExecutor) {}

  async findById(id: string): Promise<ProviderAvailability | null> {
    const result = await this.db.query<AvailabilityRow>(
      `SELECT ${AVAILABILITY_COLUMNS} FROM provider_availability WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? mapAvailabilityRow(row) : null;
  }

  async listForProvider(
    providerId: string,
    filter: { dayOfWeek?: number; enabledOnly?: boolean } = {}
  ): Promise<ProviderAvailability[]> {
    const conditions = ['provider_id = $1'];
    const params: unknown[] = [providerId];

    if (filter.dayOfWeek !== undefined) {
      params.push(filter.dayOfWeek);
      conditions.push(`day_of_week = $${params.length}`);
    }
    if (filter.enabledOnly) {
      conditions.push('is_available = TRUE');
    }

    const result = await this.db.query<AvailabilityRow>(
      `SELECT ${AVAILABILITY_COLUMNS} FROM provider_availability
       WHERE ${conditions.join(' AND ')}
       ORDER BY day_of_week, start_time`,
      params
    );
    return result.rows.map(mapAvailabilityRow);
  }

  async create(record: CreateAvailabilityRecord): Promise<ProviderAvailability> {
    const result = await this.db.query<AvailabilityRow>(
      `INSERT INTO provider_availability (provider_id, day_of_week, start_time, end_time, is_available)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${AVAILABILITY_COLUMNS}`,
      [record.providerId, record.dayOfWeek, record.startTime, record.endTime, record.isAvailable]
    );
    return mapAvailabilityRow(result.rows[0]);
  }

  async update(id: string, patch: AvailabilityPatch): Promise<ProviderAvailability | null> {
    const sets: string[] = [];
    const params: unknown[] = [id];
    const columns: Array<[keyof AvailabilityPatch, string]> = [
      ['dayOfWeek', 'day_of_week'],
      ['startTime', 'start_time'],
      ['endTime', 'end_time'],
      ['isAvailable', 'is_available'],
    ];

    for (const [field, column] of columns) {
      if (patch[field] !== undefined) {
        params.push(patch[field]);
        sets.push(`${column} = $${params.length}`);
      }
    }
    sets.push('updated_at = NOW()');

    const result = await this.db.query<AvailabilityRow>(
      `UPDATE provider_availability SET ${sets.join(', ')} WHERE id = $1 RETURNING ${AVAILABILITY_COLUMNS}`,
      params
    );
    const row = result.rows[0];
    return row ? mapAvailabilityRow(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM provider_availability WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

// ============================================================================
// TIME-OFF
// ============================================================================

export class TimeOffModel implements TimeOffRepository {
  constructor(private readonly db: QueryExecutor) {}

  async findById(id: string): Promise<ProviderTimeOff | null> {
    const result = await this.db.query<TimeOffRow>(
      `SELECT ${TIME_OFF_COLUMNS} FROM provider_time_off WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? mapTimeOffRow(row) : null;
  }

  async listForProvider(providerId: string): Promise<ProviderTimeOff[]> {
    const result = await this.db.query<TimeOffRow>(
      `SELECT ${TIME_OFF_COLUMNS} FROM provider_time_off WHERE provider_id = $1 ORDER BY start_date`,
      [providerId]
    );
    return result.rows.map(mapTimeOffRow);
  }

  async listOverlapping(providerId: string, from: Date, to: Date): Promise<ProviderTimeOff[]> {
    const result = await this.db.query<TimeOffRow>(
      `SELECT ${TIME_OFF_COLUMNS} FROM provider_time_off
       WHERE provider_id = $1 AND start_date <= $3 AND end_date >= $2
       ORDER BY start_date`,
      [providerId, from, to]
    );
    return result.rows.map(mapTimeOffRow);
  }

  async create(record: CreateTimeOffRecord): Promise<ProviderTimeOff> {
    const result = await this.db.query<TimeOffRow>(
      `INSERT INTO provider_time_off (provider_id, start_date, end_date, reason)
       VALUES ($1, $2, $3, $4)
       RETURNING ${TIME_OFF_COLUMNS}`,
      [record.providerId, record.startDate, record.endDate, record.reason]
    );
    return mapTimeOffRow(result.rows[0]);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM provider_time_off WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
