/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - QUERY EXECUTION
 * ============================================================================
 */

import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { handlePgError, isPgError } from '../utils/errors';

/**
 * What the PostgreSQL models need from a connection
 */
export interface QueryExecutor {
  query<R extends QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>>;
}

function translate(error: unknown): never {
  if (isPgError(error)) {
    throw handlePgError(error);
  }
  throw error;
}

export class PoolExecutor implements QueryExecutor {
  constructor(private readonly pool: Pool) {}

  async query<R extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<QueryResult<R>> {
    try {
      return await this.pool.query<R>(sql, params);
    } catch (error) {
      return translate(error);
    }
  }
}

export class ClientExecutor implements QueryExecutor {
  constructor(private readonly client: PoolClient) {}

  async query<R extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<QueryResult<R>> {
    try {
      return await this.client.query<R>(sql, params);
    } catch (error) {
      return translate(error);
    }
  }
}
