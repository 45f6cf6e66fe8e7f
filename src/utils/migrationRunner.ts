/**
 * Schema migrations for the access-core tables.
 *
 * Every `NNN_name.sql` file under `src/migrations/` is applied once, in
 * filename order, and remembered in `schema_migrations`. `npm run migrate`
 * runs this module against the database configured by the DB_* variables.
 *
 * @module utils/migrationRunner
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type pg from 'pg';
import { closePool, getPool } from './db.js';
import { asError, createLogger } from '../logging/logger.js';

const modulePath = fileURLToPath(import.meta.url);

export const DEFAULT_MIGRATIONS_DIR = path.resolve(path.dirname(modulePath), '..', 'migrations');

const TRACKING_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    filename   TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
`;

interface Migration {
  file: string;
  sql: string;
}

/** `.sql` filenames in `migrationsDir`, sorted; empty when the directory is missing. */
export function getMigrationFiles(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): string[] {
  if (!fs.existsSync(migrationsDir)) {
    return [];
  }
  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

async function pendingMigrations(client: pg.PoolClient, migrationsDir: string): Promise<Migration[]> {
  await client.query(TRACKING_TABLE_DDL);
  const { rows } = await client.query<{ filename: string }>('SELECT filename FROM schema_migrations');
  const done = new Set(rows.map((row) => row.filename));

  return getMigrationFiles(migrationsDir)
    .filter((file) => !done.has(file))
    .map((file) => ({ file, sql: fs.readFileSync(path.join(migrationsDir, file), 'utf-8') }));
}

async function applyMigration(client: pg.PoolClient, { file, sql }: Migration): Promise<void> {
  await client.query('BEGIN');
  try {
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (filename) VALUES ($1)', [file]);
    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    throw new Error(`Migration ${file} failed: ${asError(err).message}`, { cause: err });
  }
}

/**
 * Apply the pending files of `migrationsDir`. Stops at the first failure;
 * earlier files in the same run remain committed.
 *
 * @returns The files applied by this call.
 */
export async function runMigrations(
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR,
  poolOverride?: pg.Pool,
): Promise<string[]> {
  const client = await (poolOverride ?? getPool()).connect();
  const applied: string[] = [];

  try {
    for (const migration of await pendingMigrations(client, migrationsDir)) {
      await applyMigration(client, migration);
      applied.push(migration.file);
    }
  } finally {
    client.release();
  }

  return applied;
}

if (process.argv[1] !== undefined && path.resolve(process.argv[1]) === modulePath) {
  const logger = createLogger({ context: { component: 'migrations' } });
  void runMigrations()
    .then((applied) => {
      logger.info('Migrations complete', { applied, count: applied.length });
    })
    .catch((err: unknown) => {
      logger.error('Migration run failed', asError(err));
      process.exitCode = 1;
    })
    .finally(() => closePool());
}
