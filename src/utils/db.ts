/**
 * Database connection pool utility.
 *
 * Provides a PostgreSQL connection pool using the `pg` library,
 * configured via environment variables. This module is the single
 * entry point for all storage access in the access-control core, and the
 * boundary where driver failures become {@link StorageError}s.
 *
 * @module utils/db
 */

import pg from 'pg';
import { StorageError } from './errors.js';

const { Pool } = pg;

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  /** Upper bound on a single statement; the core's only timeout semantics. */
  statementTimeoutMillis: number;
  ssl?: boolean;
}

/**
 * Build database configuration from environment variables with sensible defaults.
 */
export function getDbConfig(env: NodeJS.ProcessEnv = process.env): DbConfig {
  return {
    host: env['DB_HOST'] ?? 'localhost',
    port: parseInt(env['DB_PORT'] ?? '5432', 10),
    database: env['DB_NAME'] ?? 'access_core',
    user: env['DB_USER'] ?? 'postgres',
    password: env['DB_PASSWORD'] ?? '',
    max: parseInt(env['DB_POOL_MAX'] ?? '20', 10),
    idleTimeoutMillis: parseInt(env['DB_IDLE_TIMEOUT'] ?? '30000', 10),
    connectionTimeoutMillis: parseInt(env['DB_CONNECT_TIMEOUT'] ?? '5000', 10),
    statementTimeoutMillis: parseInt(env['DB_STATEMENT_TIMEOUT'] ?? '5000', 10),
    ssl: env['DB_SSL'] === 'true',
  };
}

/**
 * Create a new PostgreSQL connection pool with the given configuration.
 */
export function createPool(config?: Partial<DbConfig>): pg.Pool {
  const dbConfig = { ...getDbConfig(), ...config };
  return new Pool({
    host: dbConfig.host,
    port: dbConfig.port,
    database: dbConfig.database,
    user: dbConfig.user,
    password: dbConfig.password,
    max: dbConfig.max,
    idleTimeoutMillis: dbConfig.idleTimeoutMillis,
    connectionTimeoutMillis: dbConfig.connectionTimeoutMillis,
    statement_timeout: dbConfig.statementTimeoutMillis,
    ssl: dbConfig.ssl ? { rejectUnauthorized: false } : undefined,
  });
}

/** Singleton pool instance, lazily initialized. */
let pool: pg.Pool | null = null;

/**
 * Install the shared pool explicitly (e.g. from loaded configuration).
 * Any previously installed pool is left for the caller to close.
 */
export function setPool(next: pg.Pool): void {
  pool = next;
}

/**
 * Get the shared database connection pool.
 * Creates the pool on first call using environment-based configuration.
 */
export function getPool(): pg.Pool {
  if (!pool) {
    pool = createPool();
  }
  return pool;
}

/** Read the SQLSTATE off a driver error, if it carries one. */
export function getDriverCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/** SQLSTATE for a unique-constraint violation. */
export const UNIQUE_VIOLATION = '23505';
/** SQLSTATE for a foreign-key violation. */
export const FOREIGN_KEY_VIOLATION = '23503';

/**
 * Execute a parameterized SQL query using the shared pool.
 * Driver failures are rethrown as {@link StorageError} carrying the SQLSTATE.
 */
export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<pg.QueryResult<T>> {
  try {
    return await getPool().query<T>(text, params);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new StorageError(`Query failed: ${message}`, getDriverCode(err), err);
  }
}

/**
 * Gracefully shut down the connection pool.
 * Should be called during application shutdown.
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
