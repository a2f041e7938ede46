/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - IDENTITY DIRECTORY
 * ============================================================================
 *
 * Read-only view of patients and providers. Accounts are managed elsewhere.
 */

import type { Pool } from 'pg';
import { z } from 'zod';
import type { Identity } from '../types';
import { PoolExecutor, type QueryExecutor } from '../models/executor';

export interface IdentityDirectory {
  findById(id: string): Promise<Identity | null>;
}

interface UserRow {
  id: string;
  first_name: string;
  last_name: string;
  email: string | null;
  role: string;
}

const roleSchema = z.enum(['patient', 'provider', 'admin']);

export class PostgresIdentityDirectory implements IdentityDirectory {
  private readonly db: QueryExecutor;

  constructor(pool: Pool) {
    this.db = new PoolExecutor(pool);
  }

  async findById(id: string): Promise<Identity | null> {
    const result = await this.db.query<UserRow>(
      'SELECT id, first_name, last_name, email, role FROM users WHERE id = $1',
      [id]
    );
    const row = result.rows[0];
    if (!row) return null;

    return {
      id: row.id,
      firstName: row.first_name,
      lastName: row.last_name,
      email: row.email,
      role: roleSchema.parse(row.role),
    };
  }
}

/**
 * Directory over a fixed list of people (local runs and tests)
 */
export class StaticIdentityDirectory implements IdentityDirectory {
  private readonly people = new Map<string, Identity>();

  constructor(people: Identity[] = []) {
    people.forEach((person) => this.add(person));
  }

  add(person: Identity): void {
    this.people.set(person.id, { ...person });
  }

  async findById(id: string): Promise<Identity | null> {
    const person = this.people.get(id);
    return person ? { ...person } : null;
  }
}

export function fullName(person: Pick<Identity, 'firstName' | 'lastName'>): string {
  return `${person.firstName} ${person.lastName}`.trim();
}
