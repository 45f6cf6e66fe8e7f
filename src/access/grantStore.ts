/**
 * User → role assignments.
 *
 * A grant counts toward a user's permissions while it is active and its
 * expiry (if any) lies after the evaluation instant. Expiry is derived at
 * read time; nothing flips `is_active` when a grant lapses. Revocation keeps
 * the row for audit, and re-assignment reactivates the same row.
 *
 * @module access/grantStore
 */

import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import type { GrantRepository, RoleRepository, UserRepository } from '../repositories/types.js';
import type { Grant, GrantState } from '../types/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { KeyedLock } from '../utils/keyedLock.js';
import type { CacheInvalidator, Clock } from './types.js';
import { systemClock } from './types.js';

export type AssignmentOutcome = 'created' | 'reactivated' | 'renewed';

export interface AssignmentResult {
  grant: Grant;
  outcome: AssignmentOutcome;
}

export interface GrantStoreOptions {
  grants: GrantRepository;
  users: UserRepository;
  roles: RoleRepository;
  cache: CacheInvalidator;
  /** Lifetime given to assignments that do not name an expiry. Null: no expiry. */
  defaultDurationMs?: number | null;
  clock?: Clock;
  logger?: Logger;
  locks?: KeyedLock;
}

export function classifyGrant(grant: Grant, now: Date): GrantState {
  if (!grant.isActive) return 'revoked';
  if (grant.expiresAt !== null && grant.expiresAt.getTime() <= now.getTime()) return 'expired';
  return 'active';
}

export function isGrantEffective(grant: Grant, now: Date): boolean {
  return classifyGrant(grant, now) === 'active';
}

export class GrantStore {
  private readonly grants: GrantRepository;
  private readonly users: UserRepository;
  private readonly roles: RoleRepository;
  private readonly cache: CacheInvalidator;
  private readonly defaultDurationMs: number | null;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly locks: KeyedLock;

  constructor(options: GrantStoreOptions) {
    this.grants = options.grants;
    this.users = options.users;
    this.roles = options.roles;
    this.cache = options.cache;
    this.defaultDurationMs = options.defaultDurationMs ?? null;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createLogger()).child({ component: 'grantStore' });
    this.locks = options.locks ?? new KeyedLock();
  }

  /**
   * Grant a role, or reactivate / renew the existing (user, role) row.
   *
   * `expiresAt` undefined applies the default duration; null means the
   * grant never expires.
   *
   * @throws ValidationError when the expiry is not in the future
   * @throws NotFoundError for an unknown user, assigner or role
   */
  async assignRoleToUser(
    userId: number,
    roleId: number,
    assignedBy: number | null,
    expiresAt?: Date | null,
  ): Promise<AssignmentResult> {
    const now = this.clock();
    const expiry = expiresAt === undefined ? this.defaultExpiry(now) : expiresAt;
    if (expiry !== null && expiry.getTime() <= now.getTime()) {
      throw new ValidationError(['Grant expiry must be in the future']);
    }

    if (!(await this.users.findById(userId))) throw new NotFoundError('user', userId);
    if (assignedBy !== null && !(await this.users.findById(assignedBy))) {
      throw new NotFoundError('user', assignedBy);
    }
    if (!(await this.roles.findRoleById(roleId))) throw new NotFoundError('role', roleId);

    const result = await this.locks.run(grantLockKey(userId, roleId), async () => {
      const previous = await this.grants.findGrant(userId, roleId);
      const grant = await this.grants.upsertGrant({ userId, roleId, assignedBy, expiresAt: expiry });
      const outcome: AssignmentOutcome = !previous
        ? 'created'
        : isGrantEffective(previous, now)
          ? 'renewed'
          : 'reactivated';
      this.cache.invalidate(userId);
      return { grant, outcome };
    });

    this.logger.info('Role assigned', {
      userId,
      roleId,
      assignedBy,
      outcome: result.outcome,
      expiresAt: expiry?.toISOString() ?? null,
    });
    return result;
  }

  /**
   * Deactivate the grant. The row is kept.
   *
   * @returns whether an active grant was revoked
   */
  async revokeRoleFromUser(userId: number, roleId: number): Promise<boolean> {
    const revoked = await this.locks.run(grantLockKey(userId, roleId), async () => {
      const changed = await this.grants.deactivateGrant(userId, roleId);
      if (changed) this.cache.invalidate(userId);
      return changed;
    });

    if (revoked) this.logger.info('Role revoked', { userId, roleId });
    return revoked;
  }

  /** Grants that currently contribute permissions, judged at one instant. */
  async listActiveGrants(userId: number): Promise<Grant[]> {
    const now = this.clock();
    const grants = await this.grants.listGrantsForUser(userId);
    return grants.filter((grant) => isGrantEffective(grant, now));
  }

  /** Every grant row for the user, including revoked and expired ones. */
  async listGrantHistory(userId: number): Promise<Grant[]> {
    return this.grants.listGrantsForUser(userId);
  }

  private defaultExpiry(now: Date): Date | null {
    return this.defaultDurationMs === null ? null : new Date(now.getTime() + this.defaultDurationMs);
  }
}

function grantLockKey(userId: number, roleId: number): string {
  return `grant:${userId}:${roleId}`;
}
