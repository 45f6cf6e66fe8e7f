/**
 * Storage contracts the core's services depend on.
 *
 * The PostgreSQL modules in this directory implement them; tests use the
 * in-memory versions under `src/test/`. Implementations must honour the
 * unique and cascade constraints of the schema and raise `ConflictError`
 * / `NotFoundError` / `StorageError` from `utils/errors`.
 */

import type {
  Grant,
  GrantAssignment,
  NewPermission,
  NewRole,
  Permission,
  Role,
  RolePermissionName,
  UserAccount,
  UserStatus,
} from '../types/index.js';

export interface NewUserRecord {
  login: string;
  displayName: string;
  passwordHash: string;
}

export interface UserRepository {
  findByLogin(login: string): Promise<UserAccount | null>;
  findById(id: number): Promise<UserAccount | null>;
  /** Writes an adaptive-only credential. */
  createUser(record: NewUserRecord): Promise<UserAccount>;
  /** Replace the credential with an adaptive hash and clear any legacy digest. */
  setAdaptiveCredential(userId: number, passwordHash: string): Promise<boolean>;
  /**
   * Store `passwordHash` and clear the legacy digest, but only while a legacy
   * digest is still present. Returns false when another writer got there first.
   */
  migrateLegacyCredential(userId: number, passwordHash: string): Promise<boolean>;
  updateLastLogin(userId: number): Promise<void>;
  setStatus(userId: number, status: UserStatus): Promise<boolean>;
  countLegacyCredentials(): Promise<number>;
}

export type RoleRecord = Required<NewRole>;
export type PermissionRecord = Required<NewPermission>;

export interface RoleRepository {
  createRole(role: RoleRecord): Promise<Role>;
  createPermission(permission: PermissionRecord): Promise<Permission>;
  findRoleById(id: number): Promise<Role | null>;
  findRoleByName(name: string): Promise<Role | null>;
  findPermissionById(id: number): Promise<Permission | null>;
  findPermissionByName(name: string): Promise<Permission | null>;
  listRoles(): Promise<Role[]>;
  listPermissions(category?: string): Promise<Permission[]>;
  /** Returns false when the pair already existed. */
  addRolePermission(roleId: number, permissionId: number): Promise<boolean>;
  /** Returns false when the pair did not exist. */
  removeRolePermission(roleId: number, permissionId: number): Promise<boolean>;
  listPermissionsForRole(roleId: number): Promise<Permission[]>;
  listPermissionNamesForRoles(roleIds: readonly number[]): Promise<RolePermissionName[]>;
  /** Association rows (and grants of a role) go with the deleted row. */
  deleteRole(id: number): Promise<boolean>;
  deletePermission(id: number): Promise<boolean>;
}

export interface GrantRepository {
  findGrant(userId: number, roleId: number): Promise<Grant | null>;
  /** Every grant row for the user, active or not, with its role name. */
  listGrantsForUser(userId: number): Promise<Grant[]>;
  /** Insert, or reactivate and overwrite the existing (user, role) row. */
  upsertGrant(assignment: GrantAssignment): Promise<Grant>;
  /** Flip is_active to false. Returns false when no active row matched. */
  deactivateGrant(userId: number, roleId: number): Promise<boolean>;
}
