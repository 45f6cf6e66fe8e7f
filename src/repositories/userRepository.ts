/**
 * User repository for database operations on the users table.
 *
 * Maps the two nullable credential columns (`password_hash` for bcrypt,
 * `legacy_digest` for SHA-256) onto the {@link Credential} tagged union,
 * and keeps every credential write a single statement keyed by user id.
 *
 * @module repositories/userRepository
 */

import { query, UNIQUE_VIOLATION } from '../utils/db.js';
import { ConflictError, StorageError } from '../utils/errors.js';
import { UserStatus } from '../types/index.js';
import type { Credential, UserAccount } from '../types/index.js';
import type { NewUserRecord, UserRepository } from './types.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

/** Raw row shape returned by PostgreSQL for the users table. */
interface UserRow {
  id: number;
  login: string;
  display_name: string;
  password_hash: string | null;
  legacy_digest: string | null;
  status: string;
  created_at: Date;
  updated_at: Date;
  last_login_at: Date | null;
}

const USER_COLUMNS =
  'id, login, display_name, password_hash, legacy_digest, status, created_at, updated_at, last_login_at';

export function mapCredential(hash: string | null, digest: string | null): Credential {
  if (hash && digest) return { format: 'transitional', hash, digest };
  if (hash) return { format: 'adaptive', hash };
  if (digest) return { format: 'legacy', digest };
  return { format: 'none' };
}

/**
 * Map a database row (snake_case) to a UserAccount (camelCase).
 */
function mapRowToUser(row: UserRow): UserAccount {
  return {
    id: row.id,
    login: row.login,
    displayName: row.display_name,
    status: row.status === UserStatus.ACTIVE ? UserStatus.ACTIVE : UserStatus.DISABLED,
    credential: mapCredential(row.password_hash, row.legacy_digest),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    lastLoginAt: row.last_login_at,
  };
}

// ─── Repository Functions ────────────────────────────────────────────────────

/**
 * Create a user with an adaptive-only credential.
 *
 * @throws ConflictError when the login is taken (case-insensitive)
 */
export async function createUser(record: NewUserRecord): Promise<UserAccount> {
  try {
    const result = await query<UserRow>(
      `INSERT INTO users (login, display_name, password_hash)
       VALUES ($1, $2, $3)
       RETURNING ${USER_COLUMNS}`,
      [record.login, record.displayName, record.passwordHash],
    );
    const row = result.rows[0];
    if (!row) throw new StorageError('INSERT INTO users returned no row', undefined);
    return mapRowToUser(row);
  } catch (err) {
    if (err instanceof StorageError && err.driverCode === UNIQUE_VIOLATION) {
      throw new ConflictError(`Login "${record.login}" is already taken`, err);
    }
    throw err;
  }
}

/**
 * Find a user by login (case-insensitive).
 */
export async function findByLogin(login: string): Promise<UserAccount | null> {
  const result = await query<UserRow>(
    `SELECT ${USER_COLUMNS}
     FROM users
     WHERE LOWER(login) = LOWER($1)`,
    [login],
  );
  const row = result.rows[0];
  return row ? mapRowToUser(row) : null;
}

export async function findById(id: number): Promise<UserAccount | null> {
  const result = await query<UserRow>(
    `SELECT ${USER_COLUMNS}
     FROM users
     WHERE id = $1`,
    [id],
  );
  const row = result.rows[0];
  return row ? mapRowToUser(row) : null;
}

/**
 * Write a new adaptive hash and drop any residual legacy digest.
 */
export async function setAdaptiveCredential(userId: number, passwordHash: string): Promise<boolean> {
  const result = await query(
    `UPDATE users
     SET password_hash = $2, legacy_digest = NULL, updated_at = NOW()
     WHERE id = $1`,
    [userId, passwordHash],
  );
  return (result.rowCount ?? 0) > 0;
}

/**
 * One-way legacy → adaptive upgrade. The `legacy_digest IS NOT NULL` guard
 * makes a concurrent second migration of the same row update nothing.
 */
export async function migrateLegacyCredential(
  userId: number,
  passwordHash: string,
): Promise<boolean> {
  const result = await query(
    `UPDATE users
     SET password_hash = $2, legacy_digest = NULL, updated_at = NOW()
     WHERE id = $1 AND legacy_digest IS NOT NULL`,
    [userId, passwordHash],
  );
  return (result.rowCount ?? 0) > 0;
}

export async function updateLastLogin(userId: number): Promise<void> {
  await query(
    `UPDATE users
     SET last_login_at = NOW()
     WHERE id = $1`,
    [userId],
  );
}

/**
 * Soft delete / restore. Rows are never removed while grants reference them.
 */
export async function setStatus(userId: number, status: UserStatus): Promise<boolean> {
  const result = await query(
    `UPDATE users
     SET status = $2, updated_at = NOW()
     WHERE id = $1`,
    [userId, status],
  );
  return (result.rowCount ?? 0) > 0;
}

/** Accounts still inside the compatibility window. */
export async function countLegacyCredentials(): Promise<number> {
  const result = await query<{ count: string }>(
    `SELECT COUNT(*) AS count
     FROM users
     WHERE legacy_digest IS NOT NULL`,
  );
  return parseInt(result.rows[0]?.count ?? '0', 10);
}

export const pgUserRepository: UserRepository = {
  findByLogin,
  findById,
  createUser,
  setAdaptiveCredential,
  migrateLegacyCredential,
  updateLastLogin,
  setStatus,
  countLegacyCredentials,
};
