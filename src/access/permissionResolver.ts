/**
 * Computes a user's effective roles and permissions.
 *
 * Read-only: one clock reading per call decides which grants are in force,
 * and the permissions of all of their roles are fetched in a single query
 * and unioned. An account that is missing or not active resolves to empty
 * sets whatever its grants say; grants survive a disable untouched.
 *
 * @module access/permissionResolver
 */

import type { GrantRepository, RoleRepository, UserRepository } from '../repositories/types.js';
import { UserStatus } from '../types/index.js';
import type { ResolvedAccess } from '../types/index.js';
import { isGrantEffective } from './grantStore.js';
import type { AccessResolver, Clock } from './types.js';
import { systemClock } from './types.js';

export interface PermissionResolverOptions {
  users: UserRepository;
  grants: GrantRepository;
  roles: RoleRepository;
  clock?: Clock;
}

export class PermissionResolver implements AccessResolver {
  private readonly users: UserRepository;
  private readonly grants: GrantRepository;
  private readonly roles: RoleRepository;
  private readonly clock: Clock;

  constructor(options: PermissionResolverOptions) {
    this.users = options.users;
    this.grants = options.grants;
    this.roles = options.roles;
    this.clock = options.clock ?? systemClock;
  }

  async resolve(userId: number): Promise<Set<string>> {
    const access = await this.resolveAccess(userId);
    return new Set(access.permissions);
  }

  async resolveAccess(userId: number): Promise<ResolvedAccess> {
    const now = this.clock();
    const user = await this.users.findById(userId);
    if (user?.status !== UserStatus.ACTIVE) {
      return { userId, roles: new Set(), permissions: new Set(), resolvedAt: now };
    }

    const effective = (await this.grants.listGrantsForUser(userId)).filter((grant) =>
      isGrantEffective(grant, now),
    );

    const names = await this.roles.listPermissionNamesForRoles(
      effective.map((grant) => grant.roleId),
    );

    return {
      userId,
      roles: new Set(effective.map((grant) => grant.roleName)),
      permissions: new Set(names.map((entry) => entry.permissionName)),
      resolvedAt: now,
    };
  }
}
