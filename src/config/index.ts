/**
 * Configuration consumed by the access-control core.
 *
 * Values come from environment variables; the core owns no config file.
 * Every invalid key is reported at once in a single {@link ValidationError}.
 *
 * @module config
 */

import { getDbConfig, type DbConfig } from '../utils/db.js';
import { ValidationError } from '../utils/errors.js';
import { isLogLevel, type LogLevel } from '../logging/logger.js';

/** Milliseconds in one minute. */
const MS_PER_MINUTE = 60 * 1000;

export const DEFAULT_CACHE_TTL_MS = 5 * MS_PER_MINUTE;
export const DEFAULT_CACHE_MAX_ENTRIES = 1000;
export const DEFAULT_BCRYPT_COST = 12;
/** bcrypt rejects cost factors outside 4..31; above 15 logins become unreasonably slow. */
export const MIN_BCRYPT_COST = 4;
export const MAX_BCRYPT_COST = 15;

export interface AccessConfig {
  cache: {
    ttlMs: number;
    maxEntries: number;
  };
  grants: {
    /** Applied when an assignment omits an expiry; null means grants never expire. */
    defaultDurationMs: number | null;
  };
  credentials: {
    bcryptCost: number;
  };
  audit: {
    /** Record allowed decisions as well as denials. */
    recordAllowed: boolean;
  };
  logLevel: LogLevel;
  db: DbConfig;
}

function readInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  min: number,
  max: number,
  errors: string[],
): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    errors.push(`${key} must be an integer between ${min} and ${max}`);
    return fallback;
  }
  return value;
}

function readBoolean(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: boolean,
  errors: string[],
): boolean {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  errors.push(`${key} must be 'true' or 'false'`);
  return fallback;
}

/**
 * Build the core's configuration from environment variables.
 *
 * @throws ValidationError listing every malformed key
 */
export function loadAccessConfig(env: NodeJS.ProcessEnv = process.env): AccessConfig {
  const errors: string[] = [];

  const ttlMs = readInt(
    env,
    'ACCESS_CACHE_TTL_MS',
    DEFAULT_CACHE_TTL_MS,
    0,
    24 * 60 * MS_PER_MINUTE,
    errors,
  );
  const maxEntries = readInt(
    env,
    'ACCESS_CACHE_MAX_ENTRIES',
    DEFAULT_CACHE_MAX_ENTRIES,
    1,
    1_000_000,
    errors,
  );
  const bcryptCost = readInt(
    env,
    'ACCESS_BCRYPT_COST',
    DEFAULT_BCRYPT_COST,
    MIN_BCRYPT_COST,
    MAX_BCRYPT_COST,
    errors,
  );

  const defaultDurationMs = env['ACCESS_DEFAULT_GRANT_DURATION_MS']
    ? readInt(env, 'ACCESS_DEFAULT_GRANT_DURATION_MS', 1, 1, Number.MAX_SAFE_INTEGER, errors)
    : null;

  const recordAllowed = readBoolean(env, 'ACCESS_AUDIT_ALLOWED', false, errors);

  const rawLevel = env['LOG_LEVEL'] ?? 'info';
  let logLevel: LogLevel = 'info';
  if (isLogLevel(rawLevel)) {
    logLevel = rawLevel;
  } else {
    errors.push(`LOG_LEVEL must be one of debug, info, warn, error, fatal`);
  }

  const db = getDbConfig(env);
  for (const [key, value] of [
    ['DB_PORT', db.port],
    ['DB_POOL_MAX', db.max],
    ['DB_IDLE_TIMEOUT', db.idleTimeoutMillis],
    ['DB_CONNECT_TIMEOUT', db.connectionTimeoutMillis],
    ['DB_STATEMENT_TIMEOUT', db.statementTimeoutMillis],
  ] as const) {
    if (!Number.isInteger(value) || value < 0) {
      errors.push(`${key} must be a non-negative integer`);
    }
  }

  if (errors.length > 0) {
    throw new ValidationError(errors);
  }

  return {
    cache: { ttlMs, maxEntries },
    grants: { defaultDurationMs },
    credentials: { bcryptCost },
    audit: { recordAllowed },
    logLevel,
    db,
  };
}
