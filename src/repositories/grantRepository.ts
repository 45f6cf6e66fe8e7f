/**
 * Grant repository for the user_roles table.
 *
 * Rows are never deleted here: revocation flips `is_active`, and
 * re-assignment reactivates the same (user_id, role_id) row through a
 * single upsert, so concurrent assigners cannot create duplicates.
 *
 * @module repositories/grantRepository
 */

import { query, FOREIGN_KEY_VIOLATION } from '../utils/db.js';
import { NotFoundError, StorageError } from '../utils/errors.js';
import type { Grant, GrantAssignment } from '../types/index.js';
import type { GrantRepository } from './types.js';

interface GrantRow {
  user_id: number;
  role_id: number;
  role_name: string;
  assigned_by: number | null;
  assigned_at: Date;
  expires_at: Date | null;
  is_active: boolean;
}

function mapRowToGrant(row: GrantRow): Grant {
  return {
    userId: row.user_id,
    roleId: row.role_id,
    roleName: row.role_name,
    assignedBy: row.assigned_by,
    assignedAt: row.assigned_at,
    expiresAt: row.expires_at,
    isActive: row.is_active,
  };
}

const GRANT_SELECT = `SELECT ur.user_id, ur.role_id, r.name AS role_name, ur.assigned_by,
       ur.assigned_at, ur.expires_at, ur.is_active
     FROM user_roles ur
     JOIN roles r ON r.id = ur.role_id`;

export async function findGrant(userId: number, roleId: number): Promise<Grant | null> {
  const result = await query<GrantRow>(`${GRANT_SELECT} WHERE ur.user_id = $1 AND ur.role_id = $2`, [
    userId,
    roleId,
  ]);
  const row = result.rows[0];
  return row ? mapRowToGrant(row) : null;
}

export async function listGrantsForUser(userId: number): Promise<Grant[]> {
  const result = await query<GrantRow>(`${GRANT_SELECT} WHERE ur.user_id = $1 ORDER BY r.name`, [
    userId,
  ]);
  return result.rows.map(mapRowToGrant);
}

/**
 * Insert the grant, or reactivate the existing row with the new expiry and assigner.
 *
 * @throws NotFoundError when the user or role does not exist
 */
export async function upsertGrant(assignment: GrantAssignment): Promise<Grant> {
  try {
    const result = await query<GrantRow>(
      `WITH upserted AS (
         INSERT INTO user_roles (user_id, role_id, assigned_by, assigned_at, expires_at, is_active)
         VALUES ($1, $2, $3, NOW(), $4, TRUE)
         ON CONFLICT (user_id, role_id) DO UPDATE
           SET is_active = TRUE,
               assigned_by = EXCLUDED.assigned_by,
               assigned_at = EXCLUDED.assigned_at,
               expires_at = EXCLUDED.expires_at
         RETURNING user_id, role_id, assigned_by, assigned_at, expires_at, is_active
       )
       SELECT u.user_id, u.role_id, r.name AS role_name, u.assigned_by,
              u.assigned_at, u.expires_at, u.is_active
       FROM upserted u
       JOIN roles r ON r.id = u.role_id`,
      [assignment.userId, assignment.roleId, assignment.assignedBy, assignment.expiresAt],
    );
    const row = result.rows[0];
    if (!row) throw new StorageError('Grant upsert returned no row', undefined);
    return mapRowToGrant(row);
  } catch (err) {
    if (err instanceof StorageError && err.driverCode === FOREIGN_KEY_VIOLATION) {
      throw new NotFoundError('grant', `${assignment.userId}:${assignment.roleId}`);
    }
    throw err;
  }
}

export async function deactivateGrant(userId: number, roleId: number): Promise<boolean> {
  const result = await query(
    `UPDATE user_roles
     SET is_active = FALSE
     WHERE user_id = $1 AND role_id = $2 AND is_active = TRUE`,
    [userId, roleId],
  );
  return (result.rowCount ?? 0) > 0;
}

export const pgGrantRepository: GrantRepository = {
  findGrant,
  listGrantsForUser,
  upsertGrant,
  deactivateGrant,
};
