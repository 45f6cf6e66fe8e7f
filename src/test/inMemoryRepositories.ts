/**
 * In-memory implementations of the repository contracts.
 *
 * The three repositories share one set of tables so that the schema's
 * unique, foreign-key and cascade rules hold across them the way they do in
 * PostgreSQL: logins are unique case-insensitively, (role, permission) and
 * (user, role) pairs are unique, deleting a role removes its association and
 * grant rows, and the legacy migration update is conditional.
 *
 * @module test/inMemoryRepositories
 */

import { UserStatus } from '../types/index.js';
import type {
  Grant,
  GrantAssignment,
  Permission,
  Role,
  RolePermissionName,
  UserAccount,
} from '../types/index.js';
import { mapCredential } from '../repositories/userRepository.js';
import type {
  GrantRepository,
  NewUserRecord,
  PermissionRecord,
  RoleRecord,
  RoleRepository,
  UserRepository,
} from '../repositories/types.js';
import { ConflictError, NotFoundError } from '../utils/errors.js';

// ─── Tables ──────────────────────────────────────────────────────────────────

interface UserRow {
  id: number;
  login: string;
  displayName: string;
  passwordHash: string | null;
  legacyDigest: string | null;
  status: UserStatus;
  createdAt: Date;
  updatedAt: Date;
  lastLoginAt: Date | null;
}

type GrantRow = Omit<Grant, 'roleName'>;

export class InMemoryTables {
  readonly users = new Map<number, UserRow>();
  readonly roles = new Map<number, Role>();
  readonly permissions = new Map<number, Permission>();
  /** `${roleId}:${permissionId}` */
  readonly rolePermissions = new Set<string>();
  /** `${userId}:${roleId}` */
  readonly grants = new Map<string, GrantRow>();

  private sequence = 0;

  nextId(): number {
    this.sequence += 1;
    return this.sequence;
  }
}

function pairKey(a: number, b: number): string {
  return `${a}:${b}`;
}

// ─── Users ───────────────────────────────────────────────────────────────────

export class InMemoryUserRepository implements UserRepository {
  constructor(private readonly tables: InMemoryTables) {}

  async findByLogin(login: string): Promise<UserAccount | null> {
    const needle = login.toLowerCase();
    for (const row of this.tables.users.values()) {
      if (row.login.toLowerCase() === needle) return this.toAccount(row);
    }
    return null;
  }

  async findById(id: number): Promise<UserAccount | null> {
    const row = this.tables.users.get(id);
    return row ? this.toAccount(row) : null;
  }

  async createUser(record: NewUserRecord): Promise<UserAccount> {
    return this.toAccount(this.insert(record.login, record.displayName, record.passwordHash, null));
  }

  /**
   * Fixture helper: insert a row holding whatever credential columns the
   * test needs, as accounts that predate the adaptive format do.
   */
  seed(
    login: string,
    columns: { passwordHash?: string | null; legacyDigest?: string | null; status?: UserStatus },
  ): UserAccount {
    const row = this.insert(login, '', columns.passwordHash ?? null, columns.legacyDigest ?? null);
    if (columns.status) row.status = columns.status;
    return this.toAccount(row);
  }

  /** Raw credential columns, as a storage query would show them. */
  columns(id: number): { passwordHash: string | null; legacyDigest: string | null } | undefined {
    const row = this.tables.users.get(id);
    return row ? { passwordHash: row.passwordHash, legacyDigest: row.legacyDigest } : undefined;
  }

  async setAdaptiveCredential(userId: number, passwordHash: string): Promise<boolean> {
    const row = this.tables.users.get(userId);
    if (!row) return false;
    row.passwordHash = passwordHash;
    row.legacyDigest = null;
    row.updatedAt = new Date();
    return true;
  }

  async migrateLegacyCredential(userId: number, passwordHash: string): Promise<boolean> {
    const row = this.tables.users.get(userId);
    if (!row || row.legacyDigest === null) return false;
    row.passwordHash = passwordHash;
    row.legacyDigest = null;
    row.updatedAt = new Date();
    return true;
  }

  async updateLastLogin(userId: number): Promise<void> {
    const row = this.tables.users.get(userId);
    if (row) row.lastLoginAt = new Date();
  }

  async setStatus(userId: number, status: UserStatus): Promise<boolean> {
    const row = this.tables.users.get(userId);
    if (!row) return false;
    row.status = status;
    row.updatedAt = new Date();
    return true;
  }

  async countLegacyCredentials(): Promise<number> {
    let count = 0;
    for (const row of this.tables.users.values()) {
      if (row.legacyDigest !== null) count += 1;
    }
    return count;
  }

  private insert(
    login: string,
    displayName: string,
    passwordHash: string | null,
    legacyDigest: string | null,
  ): UserRow {
    const needle = login.toLowerCase();
    for (const existing of this.tables.users.values()) {
      if (existing.login.toLowerCase() === needle) {
        throw new ConflictError(`Login "${login}" is already taken`);
      }
    }
    const now = new Date();
    const row: UserRow = {
      id: this.tables.nextId(),
      login,
      displayName,
      passwordHash,
      legacyDigest,
      status: UserStatus.ACTIVE,
      createdAt: now,
      updatedAt: now,
      lastLoginAt: null,
    };
    this.tables.users.set(row.id, row);
    return row;
  }

  private toAccount(row: UserRow): UserAccount {
    return {
      id: row.id,
      login: row.login,
      displayName: row.displayName,
      status: row.status,
      credential: mapCredential(row.passwordHash, row.legacyDigest),
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
      lastLoginAt: row.lastLoginAt,
    };
  }
}

// ─── Roles & Permissions ─────────────────────────────────────────────────────

const byName = <T extends { name: string }>(a: T, b: T): number => a.name.localeCompare(b.name);

export class InMemoryRoleRepository implements RoleRepository {
  constructor(private readonly tables: InMemoryTables) {}

  async createRole(role: RoleRecord): Promise<Role> {
    for (const existing of this.tables.roles.values()) {
      if (existing.name === role.name) throw new ConflictError(`Role "${role.name}" already exists`);
    }
    const created: Role = { id: this.tables.nextId(), ...role, createdAt: new Date() };
    this.tables.roles.set(created.id, created);
    return { ...created };
  }

  async createPermission(permission: PermissionRecord): Promise<Permission> {
    for (const existing of this.tables.permissions.values()) {
      if (existing.name === permission.name) {
        throw new ConflictError(`Permission "${permission.name}" already exists`);
      }
    }
    const created: Permission = { id: this.tables.nextId(), ...permission, createdAt: new Date() };
    this.tables.permissions.set(created.id, created);
    return { ...created };
  }

  async findRoleById(id: number): Promise<Role | null> {
    const role = this.tables.roles.get(id);
    return role ? { ...role } : null;
  }

  async findRoleByName(name: string): Promise<Role | null> {
    for (const role of this.tables.roles.values()) {
      if (role.name === name) return { ...role };
    }
    return null;
  }

  async findPermissionById(id: number): Promise<Permission | null> {
    const permission = this.tables.permissions.get(id);
    return permission ? { ...permission } : null;
  }

  async findPermissionByName(name: string): Promise<Permission | null> {
    for (const permission of this.tables.permissions.values()) {
      if (permission.name === name) return { ...permission };
    }
    return null;
  }

  async listRoles(): Promise<Role[]> {
    return [...this.tables.roles.values()].map((r) => ({ ...r })).sort(byName);
  }

  async listPermissions(category?: string): Promise<Permission[]> {
    return [...this.tables.permissions.values()]
      .filter((p) => category === undefined || p.category === category)
      .map((p) => ({ ...p }))
      .sort(byName);
  }

  async addRolePermission(roleId: number, permissionId: number): Promise<boolean> {
    if (!this.tables.roles.has(roleId) || !this.tables.permissions.has(permissionId)) {
      throw new NotFoundError('role', roleId);
    }
    const key = pairKey(roleId, permissionId);
    if (this.tables.rolePermissions.has(key)) return false;
    this.tables.rolePermissions.add(key);
    return true;
  }

  async removeRolePermission(roleId: number, permissionId: number): Promise<boolean> {
    return this.tables.rolePermissions.delete(pairKey(roleId, permissionId));
  }

  async listPermissionsForRole(roleId: number): Promise<Permission[]> {
    return [...this.tables.permissions.values()]
      .filter((p) => this.tables.rolePermissions.has(pairKey(roleId, p.id)))
      .map((p) => ({ ...p }))
      .sort(byName);
  }

  async listPermissionNamesForRoles(roleIds: readonly number[]): Promise<RolePermissionName[]> {
    const names: RolePermissionName[] = [];
    for (const roleId of roleIds) {
      for (const permission of this.tables.permissions.values()) {
        if (this.tables.rolePermissions.has(pairKey(roleId, permission.id))) {
          names.push({ roleId, permissionName: permission.name });
        }
      }
    }
    return names;
  }

  async deleteRole(id: number): Promise<boolean> {
    if (!this.tables.roles.delete(id)) return false;
    for (const key of [...this.tables.rolePermissions]) {
      if (key.startsWith(`${id}:`)) this.tables.rolePermissions.delete(key);
    }
    for (const [key, grant] of [...this.tables.grants]) {
      if (grant.roleId === id) this.tables.grants.delete(key);
    }
    return true;
  }

  async deletePermission(id: number): Promise<boolean> {
    if (!this.tables.permissions.delete(id)) return false;
    for (const key of [...this.tables.rolePermissions]) {
      if (key.endsWith(`:${id}`)) this.tables.rolePermissions.delete(key);
    }
    return true;
  }
}

// ─── Grants ──────────────────────────────────────────────────────────────────

export class InMemoryGrantRepository implements GrantRepository {
  constructor(private readonly tables: InMemoryTables) {}

  async findGrant(userId: number, roleId: number): Promise<Grant | null> {
    const row = this.tables.grants.get(pairKey(userId, roleId));
    return row ? this.withRoleName(row) : null;
  }

  async listGrantsForUser(userId: number): Promise<Grant[]> {
    return [...this.tables.grants.values()]
      .filter((row) => row.userId === userId)
      .map((row) => this.withRoleName(row))
      .sort((a, b) => a.roleName.localeCompare(b.roleName));
  }

  async upsertGrant(assignment: GrantAssignment): Promise<Grant> {
    const { userId, roleId, assignedBy, expiresAt } = assignment;
    if (
      !this.tables.users.has(userId) ||
      !this.tables.roles.has(roleId) ||
      (assignedBy !== null && !this.tables.users.has(assignedBy))
    ) {
      throw new NotFoundError('grant', pairKey(userId, roleId));
    }
    const row: GrantRow = {
      userId,
      roleId,
      assignedBy,
      assignedAt: new Date(),
      expiresAt,
      isActive: true,
    };
    this.tables.grants.set(pairKey(userId, roleId), row);
    return this.withRoleName(row);
  }

  async deactivateGrant(userId: number, roleId: number): Promise<boolean> {
    const row = this.tables.grants.get(pairKey(userId, roleId));
    if (!row || !row.isActive) return false;
    row.isActive = false;
    return true;
  }

  /** Number of stored grant rows, active or not. */
  get rowCount(): number {
    return this.tables.grants.size;
  }

  private withRoleName(row: GrantRow): Grant {
    return { ...row, roleName: this.tables.roles.get(row.roleId)?.name ?? '' };
  }
}

// ─── Factory ─────────────────────────────────────────────────────────────────

export interface InMemoryRepositories {
  tables: InMemoryTables;
  users: InMemoryUserRepository;
  roles: InMemoryRoleRepository;
  grants: InMemoryGrantRepository;
}

export function createInMemoryRepositories(): InMemoryRepositories {
  const tables = new InMemoryTables();
  return {
    tables,
    users: new InMemoryUserRepository(tables),
    roles: new InMemoryRoleRepository(tables),
    grants: new InMemoryGrantRepository(tables),
  };
}
