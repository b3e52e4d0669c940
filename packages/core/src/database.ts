/**
 * Database Client Factory
 * Provides a simple database client interface for use with repositories
 *
 * Repository adapters depend on the narrow `DatabasePool` interface so that
 * tests can substitute a recorded fake without a PostgreSQL server.
 */

import crypto from 'crypto';
import pg from 'pg';
import { DatabaseConfigError } from './errors.js';
import { createLogger, type Logger } from './logger.js';

/**
 * Database query result type
 */
export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number | null;
}

/**
 * Database client interface
 * Compatible with pg.Pool and pg.Client
 */
export interface DatabaseClient {
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * Database pool interface for connection management
 */
export interface DatabasePool extends DatabaseClient {
  connect(): Promise<PoolClient>;
  end(): Promise<void>;
}

/**
 * Pool client interface (acquired connection)
 */
export interface PoolClient extends DatabaseClient {
  release(): void;
}

export interface DatabaseConfig {
  connectionString: string;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
  ssl?: boolean;
}

/**
 * PostgreSQL database pool wrapper
 */
class PostgresPool implements DatabasePool {
  private readonly pool: InstanceType<typeof pg.Pool>;
  private readonly logger: Logger;

  constructor(config: DatabaseConfig) {
    this.logger = createLogger({ name: 'database' });
    this.pool = new pg.Pool({
      connectionString: config.connectionString,
      max: config.maxConnections ?? 10,
      idleTimeoutMillis: config.idleTimeoutMs ?? 30000,
      connectionTimeoutMillis: config.connectionTimeoutMs ?? 5000,
      ssl: config.ssl ? { rejectUnauthorized: true } : undefined,
    });

    this.pool.on('error', (error) => {
      this.logger.error({ err: error }, 'Idle database client error');
    });
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> {
    const result = await this.pool.query(sql, params);
    return { rows: result.rows as T[], rowCount: result.rowCount };
  }

  async connect(): Promise<PoolClient> {
    const client = await this.pool.connect();

    return {
      query: async <T = Record<string, unknown>>(
        sql: string,
        params?: unknown[]
      ): Promise<QueryResult<T>> => {
        const result = await client.query(sql, params);
        return { rows: result.rows as T[], rowCount: result.rowCount };
      },
      release: () => client.release(),
    };
  }

  async end(): Promise<void> {
    await this.pool.end();
    this.logger.info('Database pool closed');
  }
}

/**
 * Create a database pool
 *
 * @example
 * ```typescript
 * const db = createDatabaseClient({ connectionString: process.env.DATABASE_URL });
 * const result = await db.query('SELECT * FROM dental_statuses WHERE id = $1', [statusId]);
 * ```
 */
export function createDatabaseClient(config: Partial<DatabaseConfig> = {}): DatabasePool {
  const connectionString = config.connectionString ?? process.env.DATABASE_URL;

  if (!connectionString) {
    throw new DatabaseConfigError('database', 'DATABASE_URL must be configured to use PostgreSQL');
  }

  return new PostgresPool({ ...config, connectionString });
}

// =============================================================================
// TRANSACTION MANAGEMENT - ACID Compliance
// =============================================================================

/**
 * Transaction isolation levels
 */
export enum IsolationLevel {
  READ_COMMITTED = 'READ COMMITTED',
  REPEATABLE_READ = 'REPEATABLE READ',
  SERIALIZABLE = 'SERIALIZABLE',
}

/**
 * Transaction configuration options
 */
export interface TransactionOptions {
  /** Isolation level for the transaction */
  isolationLevel?: IsolationLevel;
  /** Statement timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Number of attempts on serialization failures (default: 3) */
  maxRetries?: number;
  /** Base delay for exponential backoff in ms (default: 100) */
  retryBaseDelayMs?: number;
}

/**
 * Transaction client interface with additional transaction methods
 */
export interface TransactionClient extends DatabaseClient {
  /**
   * Acquire a row lock using SELECT FOR UPDATE
   */
  selectForUpdate<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<QueryResult<T>>;

  /**
   * Acquire a transaction-scoped advisory lock, released on COMMIT/ROLLBACK
   */
  advisoryLock(lockKey: number): Promise<void>;
}

/**
 * Error thrown when a transaction cannot be serialized (concurrent conflict)
 */
export class SerializationError extends Error {
  public readonly code = 'SERIALIZATION_FAILURE';
  public readonly isRetryable = true;

  constructor(message: string) {
    super(message);
    this.name = 'SerializationError';
  }
}

/**
 * Error thrown when a deadlock is detected
 */
export class DeadlockError extends Error {
  public readonly code = 'DEADLOCK_DETECTED';
  public readonly isRetryable = true;

  constructor(message: string) {
    super(message);
    this.name = 'DeadlockError';
  }
}

const DEFAULT_TRANSACTION_TIMEOUT = 30000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_BASE_DELAY = 100;

function readPgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Execute a function within a database transaction
 *
 * - Automatic BEGIN/COMMIT/ROLLBACK management
 * - Configurable isolation level
 * - Retry with exponential backoff on serialization failures and deadlocks
 * - Row and advisory locking helpers
 *
 * @example
 * ```typescript
 * const created = await withTransaction(db, async (tx) => {
 *   await tx.advisoryLock(stringToLockKey(`chart:${patientId}:${examinationId}`));
 *   const { rows } = await tx.query('SELECT 1 FROM dental_chart_cells WHERE ...', [...]);
 *   if (rows.length > 0) return false;
 *   await tx.query('INSERT INTO dental_chart_cells ...', [...]);
 *   return true;
 * });
 * ```
 */
export async function withTransaction<T>(
  pool: DatabasePool,
  fn: (client: TransactionClient) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const {
    isolationLevel = IsolationLevel.READ_COMMITTED,
    timeoutMs = DEFAULT_TRANSACTION_TIMEOUT,
    maxRetries = DEFAULT_MAX_RETRIES,
    retryBaseDelayMs = DEFAULT_RETRY_BASE_DELAY,
  } = options;

  const logger = createLogger({ name: 'transaction' });
  let attempt = 0;

  while (attempt < maxRetries) {
    const client = await pool.connect();

    try {
      await client.query(`BEGIN ISOLATION LEVEL ${isolationLevel}`);
      await client.query(`SET LOCAL statement_timeout = ${timeoutMs}`);

      const txClient: TransactionClient = {
        query: client.query.bind(client),

        selectForUpdate: async <R = Record<string, unknown>>(
          sql: string,
          params?: unknown[]
        ): Promise<QueryResult<R>> => {
          const lockingSql = sql.trim().toLowerCase().endsWith('for update')
            ? sql
            : `${sql.trim()} FOR UPDATE`;
          return client.query<R>(lockingSql, params);
        },

        advisoryLock: async (lockKey: number): Promise<void> => {
          await client.query('SELECT pg_advisory_xact_lock($1)', [lockKey]);
        },
      };

      const result = await fn(txClient);

      await client.query('COMMIT');

      return result;
    } catch (error: unknown) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError: unknown) {
        logger.warn({ err: rollbackError }, 'Rollback failed');
      }

      const code = readPgErrorCode(error);
      const isSerializationFailure = code === '40001';
      const isDeadlock = code === '40P01';

      if (isSerializationFailure || isDeadlock) {
        attempt++;

        if (attempt < maxRetries) {
          const jitterFactor = 0.5 + (crypto.randomInt(0, 1000) / 1000) * 0.5;
          const delay = retryBaseDelayMs * Math.pow(2, attempt) * jitterFactor;

          logger.warn(
            { attempt, maxRetries, delay, errorCode: code },
            'Transaction conflict, retrying with backoff'
          );

          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        const message = error instanceof Error ? error.message : String(error);
        if (isSerializationFailure) {
          throw new SerializationError(
            `Transaction serialization failure after ${maxRetries} attempts: ${message}`
          );
        }
        throw new DeadlockError(`Deadlock detected after ${maxRetries} attempts: ${message}`);
      }

      throw error;
    } finally {
      client.release();
    }
  }

  throw new SerializationError('Transaction failed after maximum retries');
}

/**
 * Generate a consistent hash code from a string for use as advisory lock key
 * Uses Java-style hashCode algorithm for consistent, deterministic results
 */
export function stringToLockKey(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash; // Convert to 32-bit integer
  }
  return Math.abs(hash);
}
