/**
 * AccessCore: the caller-facing surface of the access-control core.
 *
 * Wires the credential store, role registry, grant store, resolver, cache
 * and guard around one set of repositories and one audit sink. Front ends
 * use two calls, `authenticate` and `authorize` (or its raising `require`
 * forms); the administrative operations are guarded by the `admin.*`
 * permissions of the acting identity and audited.
 *
 * @module accessCore
 */

import { AccessGuard } from './access/accessGuard.js';
import { GrantStore } from './access/grantStore.js';
import type { AssignmentResult } from './access/grantStore.js';
import { PermissionCache } from './access/permissionCache.js';
import { PermissionResolver } from './access/permissionResolver.js';
import { RoleRegistry } from './access/roleRegistry.js';
import type { AccessRequirement, Clock } from './access/types.js';
import { systemClock } from './access/types.js';
import { recordAudit } from './audit/recordAudit.js';
import type { AuditAction, AuditRecord, AuditSink } from './audit/types.js';
import type { AccessConfig } from './config/index.js';
import {
  DEFAULT_BCRYPT_COST,
  DEFAULT_CACHE_MAX_ENTRIES,
  DEFAULT_CACHE_TTL_MS,
  loadAccessConfig,
} from './config/index.js';
import { CredentialStore } from './credentials/credentialStore.js';
import type { Logger } from './logging/logger.js';
import { createLogger } from './logging/logger.js';
import { PgAuditSink } from './repositories/auditRepository.js';
import { pgGrantRepository } from './repositories/grantRepository.js';
import { pgRoleRepository } from './repositories/roleRepository.js';
import type { GrantRepository, RoleRepository, UserRepository } from './repositories/types.js';
import { pgUserRepository } from './repositories/userRepository.js';
import type {
  Identity,
  NewPermission,
  NewRole,
  Permission,
  Role,
  Subject,
  UserAccount,
} from './types/index.js';
import { createPool, setPool } from './utils/db.js';
import { AccessCoreError, AuthenticationError, NotFoundError } from './utils/errors.js';
import { KeyedLock } from './utils/keyedLock.js';

export type AccessSettings = Pick<AccessConfig, 'cache' | 'grants' | 'credentials' | 'audit'>;

export const DEFAULT_ACCESS_SETTINGS: AccessSettings = {
  cache: { ttlMs: DEFAULT_CACHE_TTL_MS, maxEntries: DEFAULT_CACHE_MAX_ENTRIES },
  grants: { defaultDurationMs: null },
  credentials: { bcryptCost: DEFAULT_BCRYPT_COST },
  audit: { recordAllowed: false },
};

export interface AccessCoreDeps {
  users: UserRepository;
  roles: RoleRepository;
  grants: GrantRepository;
  audit?: AuditSink;
  settings?: AccessSettings;
  clock?: Clock;
  logger?: Logger;
}

export interface CreateUserOptions {
  displayName?: string;
  /** Granted to the new user with the default grant duration. */
  roleName?: string;
}

export class AccessCore {
  readonly credentials: CredentialStore;
  readonly registry: RoleRegistry;
  readonly grants: GrantStore;
  readonly resolver: PermissionResolver;
  readonly cache: PermissionCache;
  readonly guard: AccessGuard;

  private readonly audit: AuditSink | undefined;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: AccessCoreDeps) {
    const settings = deps.settings ?? DEFAULT_ACCESS_SETTINGS;
    const logger = deps.logger ?? createLogger();
    const locks = new KeyedLock();

    this.audit = deps.audit;
    this.clock = deps.clock ?? systemClock;
    this.logger = logger.child({ component: 'accessCore' });

    this.resolver = new PermissionResolver({
      users: deps.users,
      grants: deps.grants,
      roles: deps.roles,
      clock: this.clock,
    });
    this.cache = new PermissionCache({
      resolver: this.resolver,
      ttlMs: settings.cache.ttlMs,
      maxEntries: settings.cache.maxEntries,
      now: () => this.clock().getTime(),
      logger,
    });
    this.credentials = new CredentialStore({
      users: deps.users,
      bcryptCost: settings.credentials.bcryptCost,
      logger,
      locks,
    });
    this.registry = new RoleRegistry({ roles: deps.roles, cache: this.cache, logger, locks });
    this.grants = new GrantStore({
      grants: deps.grants,
      users: deps.users,
      roles: deps.roles,
      cache: this.cache,
      defaultDurationMs: settings.grants.defaultDurationMs,
      clock: this.clock,
      logger,
      locks,
    });
    this.guard = new AccessGuard({
      access: this.cache,
      audit: deps.audit,
      auditAllowed: settings.audit.recordAllowed,
      clock: this.clock,
      logger,
    });
  }

  // ─── Authentication ──────────────────────────────────────────────────────

  /**
   * Verify credentials and resolve the caller's access.
   *
   * Unknown logins, disabled accounts and wrong passwords all raise the
   * same {@link AuthenticationError}. Storage failures propagate unchanged.
   */
  async authenticate(login: string, password: string): Promise<Identity> {
    const result = await this.credentials.verify(login, password);

    if (!result.ok) {
      this.record({ actor: login, action: 'authenticate', target: login, outcome: 'failure' });
      this.logger.warn('Authentication failed', { login, format: result.formatUsed });
      throw new AuthenticationError();
    }

    const { user } = result;
    if (result.formatUsed === 'legacy') {
      this.record({
        actor: String(user.id),
        action: 'migrate_credential',
        target: String(user.id),
        outcome: result.migration === 'failed' ? 'failure' : 'success',
        metadata: { migration: result.migration },
      });
    }

    await this.credentials.recordLogin(user.id);
    const access = await this.cache.getOrResolveAccess(user.id);

    this.record({
      actor: String(user.id),
      action: 'authenticate',
      target: user.login,
      outcome: 'success',
      metadata: { format: result.formatUsed },
    });
    this.logger.info('User authenticated', { userId: user.id, format: result.formatUsed });

    return {
      userId: user.id,
      login: user.login,
      roles: access.roles,
      permissions: access.permissions,
      resolvedAt: access.resolvedAt,
    };
  }

  async changePassword(login: string, oldPassword: string, newPassword: string): Promise<void> {
    try {
      await this.credentials.changePassword(login, oldPassword, newPassword);
    } catch (err) {
      if (err instanceof AuthenticationError) {
        this.record({ actor: login, action: 'change_password', target: login, outcome: 'failure' });
      }
      throw err;
    }
    this.record({ actor: login, action: 'change_password', target: login, outcome: 'success' });
  }

  // ─── Authorization ───────────────────────────────────────────────────────

  authorize(subject: Subject, permission: string): Promise<boolean> {
    return this.guard.authorize(subject, permission);
  }

  require(subject: Subject, permission: string): Promise<void> {
    return this.guard.require(subject, permission);
  }

  requireAny(subject: Subject, permissions: readonly string[]): Promise<void> {
    return this.guard.requireAny(subject, permissions);
  }

  requireAll(subject: Subject, permissions: readonly string[]): Promise<void> {
    return this.guard.requireAll(subject, permissions);
  }

  requireRole(subject: Subject, roleName: string): Promise<void> {
    return this.guard.requireRole(subject, roleName);
  }

  protect<A extends unknown[], R>(
    requirement: AccessRequirement,
    operation: (...args: A) => R | Promise<R>,
  ): (subject: Subject, ...args: A) => Promise<R> {
    return this.guard.protect(requirement, operation);
  }

  // ─── Administration: users ───────────────────────────────────────────────

  async createUser(
    actor: Identity,
    login: string,
    password: string,
    options: CreateUserOptions = {},
  ): Promise<UserAccount> {
    // An initial role is a grant, so it needs the same permission as assignRole.
    if (options.roleName !== undefined) {
      await this.guard.require(actor, 'admin.roles');
    }
    return this.administer(actor, 'admin.users', 'create_user', login, async () => {
      const role =
        options.roleName === undefined
          ? null
          : await this.registry.findRoleByName(options.roleName);
      if (options.roleName !== undefined && !role) {
        throw new NotFoundError('role', options.roleName);
      }

      const user = await this.credentials.createUser(login, password, options.displayName);
      if (role) {
        await this.grants.assignRoleToUser(user.id, role.id, actor.userId);
      }
      return user;
    });
  }

  async disableUser(actor: Identity, userId: number): Promise<void> {
    await this.administer(actor, 'admin.users', 'disable_user', String(userId), async () => {
      await this.credentials.disableUser(userId);
      this.cache.invalidate(userId);
    });
  }

  // ─── Administration: roles & permissions ─────────────────────────────────

  async createRole(actor: Identity, input: NewRole): Promise<Role> {
    return this.administer(actor, 'admin.roles', 'create_role', input.name, () =>
      this.registry.createRole(input),
    );
  }

  async deleteRole(actor: Identity, roleId: number): Promise<void> {
    await this.administer(actor, 'admin.roles', 'delete_role', String(roleId), () =>
      this.registry.deleteRole(roleId),
    );
  }

  async createPermission(actor: Identity, input: NewPermission): Promise<Permission> {
    return this.administer(actor, 'admin.permissions', 'create_permission', input.name, () =>
      this.registry.createPermission(input),
    );
  }

  async deletePermission(actor: Identity, permissionId: number): Promise<void> {
    await this.administer(actor, 'admin.permissions', 'delete_permission', String(permissionId), () =>
      this.registry.deletePermission(permissionId),
    );
  }

  async assignPermissionToRole(actor: Identity, roleId: number, permissionId: number): Promise<boolean> {
    return this.administer(actor, 'admin.roles', 'assign_permission', `${roleId}:${permissionId}`, () =>
      this.registry.assignPermissionToRole(roleId, permissionId),
    );
  }

  async revokePermissionFromRole(
    actor: Identity,
    roleId: number,
    permissionId: number,
  ): Promise<boolean> {
    return this.administer(actor, 'admin.roles', 'revoke_permission', `${roleId}:${permissionId}`, () =>
      this.registry.revokePermissionFromRole(roleId, permissionId),
    );
  }

  async listRoles(actor: Identity): Promise<Role[]> {
    await this.guard.require(actor, 'admin.roles');
    return this.registry.listRoles();
  }

  async listPermissions(actor: Identity, category?: string): Promise<Permission[]> {
    await this.guard.require(actor, 'admin.roles');
    return this.registry.listPermissions(category);
  }

  async listPermissionsForRole(actor: Identity, roleId: number): Promise<Permission[]> {
    await this.guard.require(actor, 'admin.roles');
    return this.registry.listPermissionsForRole(roleId);
  }

  // ─── Administration: grants ──────────────────────────────────────────────

  async assignRole(
    actor: Identity,
    userId: number,
    roleId: number,
    expiresAt?: Date | null,
  ): Promise<AssignmentResult> {
    return this.administer(actor, 'admin.roles', 'assign_role', `${userId}:${roleId}`, () =>
      this.grants.assignRoleToUser(userId, roleId, actor.userId, expiresAt),
    );
  }

  async revokeRole(actor: Identity, userId: number, roleId: number): Promise<boolean> {
    return this.administer(actor, 'admin.roles', 'revoke_role', `${userId}:${roleId}`, () =>
      this.grants.revokeRoleFromUser(userId, roleId),
    );
  }

  /** Drop every cached resolution, e.g. after a bulk data migration. */
  invalidateAll(): void {
    this.cache.invalidateAll();
  }

  // ─── Internals ───────────────────────────────────────────────────────────

  /**
   * Check the actor's permission, run the operation, and audit its outcome.
   * A denial is audited by the guard itself.
   */
  private async administer<T>(
    actor: Identity,
    permission: string,
    action: AuditAction,
    target: string,
    operation: () => Promise<T>,
  ): Promise<T> {
    await this.guard.require(actor, permission);
    const base = { actor: String(actor.userId), action, target };

    try {
      const result = await operation();
      this.record({ ...base, outcome: 'success' });
      return result;
    } catch (err) {
      this.record({
        ...base,
        outcome: 'failure',
        metadata: { error: err instanceof AccessCoreError ? err.code : 'INTERNAL_ERROR' },
      });
      throw err;
    }
  }

  private record(record: Omit<AuditRecord, 'timestamp'>): void {
    recordAudit(this.audit, { ...record, timestamp: this.clock() }, this.logger);
  }
}

export function createAccessCore(deps: AccessCoreDeps): AccessCore {
  return new AccessCore(deps);
}

export interface PgAccessCoreOptions {
  /** Defaults to the persistent `audit_records` sink. */
  audit?: AuditSink;
  logger?: Logger;
}

/**
 * Build a core over PostgreSQL, installing a pool built from `config.db`
 * as the shared pool.
 */
export function createPgAccessCore(
  config: AccessConfig = loadAccessConfig(),
  options: PgAccessCoreOptions = {},
): AccessCore {
  setPool(createPool(config.db));
  return new AccessCore({
    users: pgUserRepository,
    roles: pgRoleRepository,
    grants: pgGrantRepository,
    audit: options.audit ?? new PgAuditSink(),
    settings: config,
    logger: options.logger ?? createLogger({ level: config.logLevel }),
  });
}
