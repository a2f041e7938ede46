/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - DATABASE CONFIGURATION
 * ============================================================================
 */

import { Pool, PoolConfig } from 'pg';
import { config } from './config';
import logger, { errorMessage } from './logger';

const log = logger.child('database');

/**
 * pg pool configuration options
 */
const poolOptions: PoolConfig = {
  connectionString: config.database.url,
  ssl: config.database.ssl ? { rejectUnauthorized: false } : undefined,
  max: config.database.poolMax,
  connectionTimeoutMillis: config.database.timeout,
  idleTimeoutMillis: 30000,
};

/**
 * Owns the process-wide connection pool
 */
class DatabaseManager {
  private static instance: DatabaseManager;
  private _pool: Pool | null = null;
  private _isConnected = false;
  private _connectionAttempts = 0;
  private readonly _maxRetries = 5;
  private readonly _retryDelay = 5000; // 5 seconds

  private constructor() {}

  public static getInstance(): DatabaseManager {
    if (!DatabaseManager.instance) {
      DatabaseManager.instance = new DatabaseManager();
    }
    return DatabaseManager.instance;
  }

  /**
   * Lazily created pool; connections are opened on demand
   */
  public get pool(): Pool {
    if (!this._pool) {
      this._pool = new Pool(poolOptions);
      this._pool.on('error', (error) => {
        log.error('Idle database client error', { error: error.message });
      });
    }
    return this._pool;
  }

  public get isConnected(): boolean {
    return this._isConnected;
  }

  /**
   * Connect to database with retry logic
   */
  public async connect(): Promise<void> {
    if (this._isConnected) {
      log.info('Database already connected');
      return;
    }

    while (this._connectionAttempts < this._maxRetries) {
      try {
        this._connectionAttempts++;

        log.info(`Attempting to connect to database (attempt ${this._connectionAttempts}/${this._maxRetries})`);

        await this.pool.query('SELECT 1');

        this._isConnected = true;
        this._connectionAttempts = 0;

        log.info('Database connected successfully', {
          url: this.maskDatabaseUrl(config.database.url),
          ssl: config.database.ssl,
        });

        return;
      } catch (error) {
        log.error(`Database connection attempt ${this._connectionAttempts} failed`, {
          error: errorMessage(error),
          attempt: this._connectionAttempts,
          maxRetries: this._maxRetries,
        });

        if (this._connectionAttempts >= this._maxRetries) {
          throw new Error(`Failed to connect to database after ${this._maxRetries} attempts: ${errorMessage(error)}`);
        }

        await this.delay(this._retryDelay);
      }
    }
  }

  public async disconnect(): Promise<void> {
    if (!this._pool) {
      log.info('Database not connected, skipping disconnect');
      return;
    }

    try {
      await this._pool.end();
      this._pool = null;
      this._isConnected = false;
      log.info('Database disconnected successfully');
    } catch (error) {
      log.error('Error disconnecting from database', { error: errorMessage(error) });
      throw error;
    }
  }

  public async healthCheck(): Promise<{
    status: 'healthy' | 'unhealthy';
    latency?: number;
    error?: string;
  }> {
    try {
      const start = Date.now();
      await this.pool.query('SELECT 1');
      return {
        status: 'healthy',
        latency: Date.now() - start,
      };
    } catch (error) {
      return {
        status: 'unhealthy',
        error: errorMessage(error),
      };
    }
  }

  private maskDatabaseUrl(url: string): string {
    try {
      const parsed = new URL(url);
      if (parsed.password) {
        parsed.password = '****';
      }
      return parsed.toString();
    } catch {
      return 'invalid-url';
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

export const databaseManager = DatabaseManager.getInstance();

export default databaseManager;
