/**
 * Seams between the access components. Each component depends on the
 * narrowest of these rather than on its concrete neighbour.
 */

import type { ResolvedAccess } from '../types/index.js';

/** Source of a user's effective roles and permissions. */
export interface AccessResolver {
  resolveAccess(userId: number): Promise<ResolvedAccess>;
}

/** Invalidation hooks called by every writer that changes effective permissions. */
export interface CacheInvalidator {
  invalidate(userId: number): void;
  invalidateAll(): void;
}

/** What a guard check demands of its subject. */
export type AccessRequirement =
  | { permission: string }
  | { anyOf: readonly string[] }
  | { allOf: readonly string[] }
  | { role: string };

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  ttlMs: number;
}

/** Injectable time source; tests pin it. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
