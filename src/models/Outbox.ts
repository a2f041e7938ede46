/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - OUTBOX MODEL
 * ============================================================================
 *
 * Side effects (meeting provider calls, emails) are recorded here inside the
 * scheduling transaction and dispatched once it has committed.
 */

import { z } from 'zod';
import type { OutboxEvent } from '../types';
import type { QueryExecutor } from './executor';
import type { OutboxMessage, OutboxRepository } from './types';

interface OutboxRow {
  id: string;
  type: string;
  payload: unknown;
  status: string;
  attempts: number;
  last_error: string | null;
  created_at: Date;
  processed_at: Date | null;
}

const OUTBOX_COLUMNS = 'id, type, payload, status, attempts, last_error, created_at, processed_at';

const messageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('meeting.create'), payload: z.object({ consultationId: z.string() }) }),
  z.object({ type: z.literal('meeting.update'), payload: z.object({ consultationId: z.string() }) }),
  z.object({ type: z.literal('meeting.delete'), payload: z.object({ meetingId: z.string() }) }),
  z.object({
    type: z.literal('email.appointment'),
    payload: z.object({
      appointmentId: z.string(),
      notice: z.enum(['confirmed', 'cancelled', 'rescheduled']),
    }),
  }),
]);

const statusSchema = z.enum(['pending', 'done', 'failed']);

function mapOutboxRow(row: OutboxRow): OutboxEvent {
  const message = messageSchema.parse({ type: row.type, payload: row.payload });
  return {
    ...message,
    id: row.id,
    status: statusSchema.parse(row.status),
    attempts: row.attempts,
    lastError: row.last_error,
    createdAt: row.created_at,
    processedAt: row.processed_at,
  };
}

export class OutboxModel implements OutboxRepository {
  constructor(private readonly db: QueryExecutor) {}

  async enqueue(message: OutboxMessage): Promise<OutboxEvent> {
    const result = await this.db.query<OutboxRow>(
      `INSERT INTO outbox_events (type, payload) VALUES ($1, $2::jsonb) RETURNING ${OUTBOX_COLUMNS}`,
      [message.type, JSON.stringify(message.payload)]
    );
    return mapOutboxRow(result.rows[0]);
  }

  async findById(id: string): Promise<OutboxEvent | null> {
    const result = await this.db.query<OutboxRow>(`SELECT ${OUTBOX_COLUMNS} FROM outbox_events WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? mapOutboxRow(row) : null;
  }

  async listDispatchable(limit: number, maxAttempts: number): Promise<OutboxEvent[]> {
    const result = await this.db.query<OutboxRow>(
      `SELECT ${OUTBOX_COLUMNS} FROM outbox_events
       WHERE status IN ('pending', 'failed') AND attempts < $2
       ORDER BY created_at
       LIMIT $1`,
      [limit, maxAttempts]
    );
    return result.rows.map(mapOutboxRow);
  }

  async markDone(id: string, at: Date): Promise<void> {
    await this.db.query(
      `UPDATE outbox_events SET status = 'done', attempts = attempts + 1, last_error = NULL, processed_at = $2
       WHERE id = $1`,
      [id, at]
    );
  }

  async markFailed(id: string, error: string, at: Date): Promise<void> {
    await this.db.query(
      `UPDATE outbox_events SET status = 'failed', attempts = attempts + 1, last_error = $2, processed_at = $3
       WHERE id = $1`,
      [id, error, at]
    );
  }
}
