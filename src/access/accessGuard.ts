/**
 * Enforcement point for protected operations.
 *
 * Every check reads the subject's access through the cache by user id, so
 * an Identity issued before a revocation loses the permission as soon as
 * the writer has invalidated the cache. Denials raise
 * {@link AuthorizationError} naming what was missing and are always
 * audited; allowed decisions are audited only when `auditAllowed` is set.
 *
 * @module access/accessGuard
 */

import { recordAudit } from '../audit/recordAudit.js';
import type { AuditSink } from '../audit/types.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import type { ResolvedAccess, Subject } from '../types/index.js';
import { AuthorizationError } from '../utils/errors.js';
import type { RequirementMode } from '../utils/errors.js';
import type { AccessRequirement, Clock } from './types.js';
import { systemClock } from './types.js';

/** Read side of the permission cache. */
export interface AccessSource {
  getOrResolveAccess(userId: number): Promise<ResolvedAccess>;
}

export interface AccessGuardOptions {
  access: AccessSource;
  audit?: AuditSink;
  auditAllowed?: boolean;
  clock?: Clock;
  logger?: Logger;
}

interface Decision {
  allowed: boolean;
  mode: RequirementMode;
  required: string[];
  missing: string[];
}

export function subjectUserId(subject: Subject): number {
  return typeof subject === 'number' ? subject : subject.userId;
}

/**
 * Pure evaluation of a requirement against resolved access.
 * An empty `anyOf` is never satisfied; an empty `allOf` always is.
 */
export function evaluateRequirement(access: ResolvedAccess, requirement: AccessRequirement): Decision {
  if ('role' in requirement) {
    const allowed = access.roles.has(requirement.role);
    return {
      allowed,
      mode: 'role',
      required: [requirement.role],
      missing: allowed ? [] : [requirement.role],
    };
  }
  if ('anyOf' in requirement) {
    const required = [...requirement.anyOf];
    const allowed = required.some((name) => access.permissions.has(name));
    return { allowed, mode: 'any', required, missing: allowed ? [] : required };
  }

  const required = 'allOf' in requirement ? [...requirement.allOf] : [requirement.permission];
  const missing = required.filter((name) => !access.permissions.has(name));
  return { allowed: missing.length === 0, mode: 'all', required, missing };
}

export class AccessGuard {
  private readonly access: AccessSource;
  private readonly audit: AuditSink | undefined;
  private readonly auditAllowed: boolean;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: AccessGuardOptions) {
    this.access = options.access;
    this.audit = options.audit;
    this.auditAllowed = options.auditAllowed ?? false;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? createLogger()).child({ component: 'accessGuard' });
  }

  /** Boolean form: never raises for a denial. */
  async authorize(subject: Subject, permission: string): Promise<boolean> {
    const decision = await this.decide(subject, { permission });
    return decision.allowed;
  }

  async require(subject: Subject, permission: string): Promise<void> {
    await this.check(subject, { permission });
  }

  async requireAny(subject: Subject, permissions: readonly string[]): Promise<void> {
    await this.check(subject, { anyOf: permissions });
  }

  async requireAll(subject: Subject, permissions: readonly string[]): Promise<void> {
    await this.check(subject, { allOf: permissions });
  }

  async requireRole(subject: Subject, roleName: string): Promise<void> {
    await this.check(subject, { role: roleName });
  }

  /**
   * @throws AuthorizationError when the requirement is not met
   */
  async check(subject: Subject, requirement: AccessRequirement): Promise<void> {
    const decision = await this.decide(subject, requirement);
    if (!decision.allowed) {
      throw new AuthorizationError(
        subjectUserId(subject),
        decision.mode,
        decision.required,
        decision.missing,
      );
    }
  }

  /**
   * Wrap `operation` so it only runs once `requirement` holds for the
   * subject passed as the first argument.
   */
  protect<A extends unknown[], R>(
    requirement: AccessRequirement,
    operation: (...args: A) => R | Promise<R>,
  ): (subject: Subject, ...args: A) => Promise<R> {
    return async (subject: Subject, ...args: A): Promise<R> => {
      await this.check(subject, requirement);
      return operation(...args);
    };
  }

  private async decide(subject: Subject, requirement: AccessRequirement): Promise<Decision> {
    const userId = subjectUserId(subject);
    const access = await this.access.getOrResolveAccess(userId);
    const decision = evaluateRequirement(access, requirement);

    if (!decision.allowed) {
      this.logger.info('Access denied', { userId, mode: decision.mode, missing: decision.missing });
    }

    if (!decision.allowed || this.auditAllowed) {
      recordAudit(
        this.audit,
        {
          actor: String(userId),
          action: 'authorize',
          target: decision.mode === 'role' ? `role:${decision.required.join(',')}` : decision.required.join(','),
          outcome: decision.allowed ? 'allowed' : 'denied',
          timestamp: this.clock(),
          metadata: decision.allowed
            ? { mode: decision.mode }
            : { mode: decision.mode, missing: decision.missing },
        },
        this.logger,
      );
    }
    return decision;
  }
}
