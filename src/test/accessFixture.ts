/**
 * Wires the access components over in-memory repositories with a pinned
 * clock, for tests that exercise several of them together.
 *
 * @module test/accessFixture
 */

import { PermissionResolver } from '../access/permissionResolver.js';
import { PermissionCache } from '../access/permissionCache.js';
import { RoleRegistry } from '../access/roleRegistry.js';
import { GrantStore } from '../access/grantStore.js';
import { AccessGuard } from '../access/accessGuard.js';
import { AuditTrail } from '../audit/auditTrail.js';
import type { UserAccount } from '../types/index.js';
import { createInMemoryRepositories } from './inMemoryRepositories.js';
import type { InMemoryRepositories } from './inMemoryRepositories.js';
import { silentLogger } from './logCollector.js';

export const FIXED_NOW = new Date('2025-01-15T09:00:00Z');

export interface AccessFixture {
  repos: InMemoryRepositories;
  clock: { now: Date; advance(ms: number): void };
  resolver: PermissionResolver;
  cache: PermissionCache;
  registry: RoleRegistry;
  grants: GrantStore;
  guard: AccessGuard;
  audit: AuditTrail;
  /** Create a user with no credential; access tests never log in. */
  user(login: string): UserAccount;
  /** Create a role holding the given permissions, creating missing permissions. */
  role(name: string, permissions: readonly string[]): Promise<number>;
}

export interface AccessFixtureOptions {
  ttlMs?: number;
  maxEntries?: number;
  defaultDurationMs?: number | null;
  auditAllowed?: boolean;
}

export function createAccessFixture(options: AccessFixtureOptions = {}): AccessFixture {
  const repos = createInMemoryRepositories();
  const clock = {
    now: FIXED_NOW,
    advance(ms: number) {
      clock.now = new Date(clock.now.getTime() + ms);
    },
  };
  const readClock = (): Date => clock.now;

  const resolver = new PermissionResolver({
    users: repos.users,
    grants: repos.grants,
    roles: repos.roles,
    clock: readClock,
  });
  const cache = new PermissionCache({
    resolver,
    ttlMs: options.ttlMs,
    maxEntries: options.maxEntries,
    now: () => clock.now.getTime(),
    logger: silentLogger,
  });
  const registry = new RoleRegistry({ roles: repos.roles, cache, logger: silentLogger });
  const grants = new GrantStore({
    grants: repos.grants,
    users: repos.users,
    roles: repos.roles,
    cache,
    defaultDurationMs: options.defaultDurationMs,
    clock: readClock,
    logger: silentLogger,
  });
  const audit = new AuditTrail();
  const guard = new AccessGuard({
    access: cache,
    audit,
    auditAllowed: options.auditAllowed,
    clock: readClock,
    logger: silentLogger,
  });

  return {
    repos,
    clock,
    resolver,
    cache,
    registry,
    grants,
    guard,
    audit,
    user: (login) => repos.users.seed(login, {}),
    async role(name, permissions) {
      const role = await registry.createRole({ name });
      for (const permissionName of permissions) {
        const permission =
          (await registry.findPermissionByName(permissionName)) ??
          (await registry.createPermission({ name: permissionName }));
        await registry.assignPermissionToRole(role.id, permission.id);
      }
      return role.id;
    },
  };
}
