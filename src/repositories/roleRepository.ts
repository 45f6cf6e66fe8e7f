/**
 * Role repository for the roles, permissions and role_permissions tables.
 *
 * Deleting a role or permission relies on the schema's ON DELETE CASCADE to
 * remove association rows (and, for roles, user_roles rows).
 *
 * @module repositories/roleRepository
 */

import { query, UNIQUE_VIOLATION, FOREIGN_KEY_VIOLATION } from '../utils/db.js';
import { ConflictError, NotFoundError, StorageError } from '../utils/errors.js';
import type { Permission, Role, RolePermissionName } from '../types/index.js';
import type { PermissionRecord, RoleRecord, RoleRepository } from './types.js';

// ─── Row Mapping ─────────────────────────────────────────────────────────────

interface RoleRow {
  id: number;
  name: string;
  label: string;
  description: string;
  is_system: boolean;
  created_at: Date;
}

interface PermissionRow {
  id: number;
  name: string;
  label: string;
  category: string;
  description: string;
  is_system: boolean;
  created_at: Date;
}

const ROLE_COLUMNS = 'id, name, label, description, is_system, created_at';
const PERMISSION_COLUMNS = 'id, name, label, category, description, is_system, created_at';

function mapRowToRole(row: RoleRow): Role {
  return {
    id: row.id,
    name: row.name,
    label: row.label,
    description: row.description,
    isSystem: row.is_system,
    createdAt: row.created_at,
  };
}

function mapRowToPermission(row: PermissionRow): Permission {
  return {
    id: row.id,
    name: row.name,
    label: row.label,
    category: row.category,
    description: row.description,
    isSystem: row.is_system,
    createdAt: row.created_at,
  };
}

function rethrowUnique(err: unknown, message: string): never {
  if (err instanceof StorageError && err.driverCode === UNIQUE_VIOLATION) {
    throw new ConflictError(message, err);
  }
  throw err;
}

// ─── Roles ───────────────────────────────────────────────────────────────────

export async function createRole(role: RoleRecord): Promise<Role> {
  try {
    const result = await query<RoleRow>(
      `INSERT INTO roles (name, label, description, is_system)
       VALUES ($1, $2, $3, $4)
       RETURNING ${ROLE_COLUMNS}`,
      [role.name, role.label, role.description, role.isSystem],
    );
    const row = result.rows[0];
    if (!row) throw new StorageError('INSERT INTO roles returned no row', undefined);
    return mapRowToRole(row);
  } catch (err) {
    return rethrowUnique(err, `Role "${role.name}" already exists`);
  }
}

export async function findRoleById(id: number): Promise<Role | null> {
  const result = await query<RoleRow>(`SELECT ${ROLE_COLUMNS} FROM roles WHERE id = $1`, [id]);
  const row = result.rows[0];
  return row ? mapRowToRole(row) : null;
}

export async function findRoleByName(name: string): Promise<Role | null> {
  const result = await query<RoleRow>(`SELECT ${ROLE_COLUMNS} FROM roles WHERE name = $1`, [name]);
  const row = result.rows[0];
  return row ? mapRowToRole(row) : null;
}

export async function listRoles(): Promise<Role[]> {
  const result = await query<RoleRow>(`SELECT ${ROLE_COLUMNS} FROM roles ORDER BY name`);
  return result.rows.map(mapRowToRole);
}

export async function deleteRole(id: number): Promise<boolean> {
  const result = await query('DELETE FROM roles WHERE id = $1', [id]);
  return (result.rowCount ?? 0) > 0;
}

// ─── Permissions ─────────────────────────────────────────────────────────────

export async function createPermission(permission: PermissionRecord): Promise<Permission> {
  try {
    const result = await query<PermissionRow>(
      `INSERT INTO permissions (name, label, category, description, is_system)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${PERMISSION_COLUMNS}`,
      [
        permission.name,
        permission.label,
        permission.category,
        permission.description,
        permission.isSystem,
      ],
    );
    const row = result.rows[0];
    if (!row) throw new StorageError('INSERT INTO permissions returned no row', undefined);
    return mapRowToPermission(row);
  } catch (err) {
    return rethrowUnique(err, `Permission "${permission.name}" already exists`);
  }
}

export async function findPermissionById(id: number): Promise<Permission | null> {
  const result = await query<PermissionRow>(
    `SELECT ${PERMISSION_COLUMNS} FROM permissions WHERE id = $1`,
    [id],
  );
  const row = result.rows[0];
  return row ? mapRowToPermission(row) : null;
}

export async function findPermissionByName(name: string): Promise<Permission | null> {
  const result = await query<PermissionRow>(
    `SELECT ${PERMISSION_COLUMNS} FROM permissions WHERE name = $1`,
    [name],
  );
  const row = result.rows[0];
  return row ? mapRowToPermission(row) : null;
}

export async function listPermissions(category?: string): Promise<Permission[]> {
  const result =
    category === undefined
      ? await query<PermissionRow>(`SELECT ${PERMISSION_COLUMNS} FROM permissions ORDER BY name`)
      : await query<PermissionRow>(
          `SELECT ${PERMISSION_COLUMNS} FROM permissions WHERE category = $1 ORDER BY name`,
          [category],
        );
  return result.rows.map(mapRowToPermission);
}

export async function deletePermission(id: number): Promise<boolean> {
  const result = await query('DELETE FROM permissions WHERE id = $1', [id]);
  return (result.rowCount ?? 0) > 0;
}

// ─── Role ↔ Permission ───────────────────────────────────────────────────────

/**
 * @throws NotFoundError when either side was deleted concurrently
 */
export async function addRolePermission(roleId: number, permissionId: number): Promise<boolean> {
  try {
    const result = await query(
      `INSERT INTO role_permissions (role_id, permission_id)
       VALUES ($1, $2)
       ON CONFLICT (role_id, permission_id) DO NOTHING`,
      [roleId, permissionId],
    );
    return (result.rowCount ?? 0) > 0;
  } catch (err) {
    if (err instanceof StorageError && err.driverCode === FOREIGN_KEY_VIOLATION) {
      throw new NotFoundError('role', roleId);
    }
    throw err;
  }
}

export async function removeRolePermission(roleId: number, permissionId: number): Promise<boolean> {
  const result = await query(
    'DELETE FROM role_permissions WHERE role_id = $1 AND permission_id = $2',
    [roleId, permissionId],
  );
  return (result.rowCount ?? 0) > 0;
}

export async function listPermissionsForRole(roleId: number): Promise<Permission[]> {
  const result = await query<PermissionRow>(
    `SELECT p.id, p.name, p.label, p.category, p.description, p.is_system, p.created_at
     FROM permissions p
     JOIN role_permissions rp ON rp.permission_id = p.id
     WHERE rp.role_id = $1
     ORDER BY p.name`,
    [roleId],
  );
  return result.rows.map(mapRowToPermission);
}

export async function listPermissionNamesForRoles(
  roleIds: readonly number[],
): Promise<RolePermissionName[]> {
  if (roleIds.length === 0) return [];
  const result = await query<{ role_id: number; name: string }>(
    `SELECT rp.role_id, p.name
     FROM role_permissions rp
     JOIN permissions p ON p.id = rp.permission_id
     WHERE rp.role_id = ANY($1::int[])`,
    [[...roleIds]],
  );
  return result.rows.map((row) => ({ roleId: row.role_id, permissionName: row.name }));
}

export const pgRoleRepository: RoleRepository = {
  createRole,
  createPermission,
  findRoleById,
  findRoleByName,
  findPermissionById,
  findPermissionByName,
  listRoles,
  listPermissions,
  addRolePermission,
  removeRolePermission,
  listPermissionsForRole,
  listPermissionNamesForRoles,
  deleteRole,
  deletePermission,
};
