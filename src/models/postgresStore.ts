/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - POSTGRESQL STORE
 * ============================================================================
 */

import type { Pool, PoolClient } from 'pg';
import logger, { errorMessage } from '../config/logger';
import { AppointmentModel } from './Appointment';
import { AvailabilityModel, TimeOffModel } from './Availability';
import { ConsultationModel } from './Consultation';
import { ClientExecutor, PoolExecutor, type QueryExecutor } from './executor';
import { OutboxModel } from './Outbox';
import type {
  AppointmentRepository,
  AvailabilityRepository,
  ConsultationRepository,
  OutboxRepository,
  SchedulingStore,
  TimeOffRepository,
} from './types';

const log = logger.child('store');

class PostgresRepositories {
  readonly availability: AvailabilityRepository;
  readonly timeOff: TimeOffRepository;
  readonly appointments: AppointmentRepository;
  readonly consultations: ConsultationRepository;
  readonly outbox: OutboxRepository;

  constructor(executor: QueryExecutor) {
    this.availability = new AvailabilityModel(executor);
    this.timeOff = new TimeOffModel(executor);
    this.appointments = new AppointmentModel(executor);
    this.consultations = new ConsultationModel(executor);
    this.outbox = new OutboxModel(executor);
  }
}

/**
 * Repositories bound to one open transaction
 */
class TransactionScope extends PostgresRepositories implements SchedulingStore {
  constructor(client: PoolClient) {
    super(new ClientExecutor(client));
  }

  transaction<T>(work: (tx: SchedulingStore) => Promise<T>): Promise<T> {
    return work(this);
  }
}

/**
 * Store over a pg pool. Transactions run at SERIALIZABLE so two bookings
 * that each saw a free range cannot both commit.
 */
export class PostgresSchedulingStore extends PostgresRepositories implements SchedulingStore {
  constructor(private readonly pool: Pool) {
    super(new PoolExecutor(pool));
  }

  async transaction<T>(work: (tx: SchedulingStore) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    const executor = new ClientExecutor(client);

    try {
      await executor.query('BEGIN ISOLATION LEVEL SERIALIZABLE');
      const result = await work(new TransactionScope(client));
      await executor.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        log.error('Transaction rollback failed', { error: errorMessage(rollbackError) });
      }
      throw error;
    } finally {
      client.release();
    }
  }
}
