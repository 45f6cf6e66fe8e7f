/**
 * Per-user memo of resolved access, with TTL expiry and explicit invalidation.
 *
 * Owned by whoever builds it and handed to the guard and to every writer;
 * there is no module-level instance. Concurrent misses for one user share a
 * single resolution. Each invalidation bumps a generation (per user, or the
 * global epoch for `invalidateAll`) so that a resolution which started
 * before it is returned to its callers but never stored.
 *
 * @module access/permissionCache
 */

import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import type { ResolvedAccess } from '../types/index.js';
import { DEFAULT_CACHE_MAX_ENTRIES, DEFAULT_CACHE_TTL_MS } from '../config/index.js';
import type { AccessResolver, CacheInvalidator, CacheStats } from './types.js';

export interface PermissionCacheOptions {
  resolver: AccessResolver;
  ttlMs?: number;
  maxEntries?: number;
  /** Milliseconds since the epoch; tests pin it. */
  now?: () => number;
  logger?: Logger;
}

interface CacheEntry {
  access: ResolvedAccess;
  cachedAt: number;
}

interface PendingResolution {
  generation: number;
  epoch: number;
  promise: Promise<ResolvedAccess>;
}

export class PermissionCache implements CacheInvalidator {
  private readonly resolver: AccessResolver;
  private readonly ttlMs: number;
  readonly maxEntries: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  /** Insertion order doubles as age order: re-stored entries move to the end. */
  private readonly entries = new Map<number, CacheEntry>();
  private readonly pending = new Map<number, PendingResolution>();
  private readonly generations = new Map<number, number>();
  private epoch = 0;
  private hits = 0;
  private misses = 0;

  constructor(options: PermissionCacheOptions) {
    this.resolver = options.resolver;
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? createLogger()).child({ component: 'permissionCache' });
  }

  async getOrResolve(userId: number): Promise<Set<string>> {
    const access = await this.getOrResolveAccess(userId);
    return new Set(access.permissions);
  }

  async getOrResolveAccess(userId: number): Promise<ResolvedAccess> {
    const entry = this.entries.get(userId);
    if (entry) {
      if (this.now() - entry.cachedAt < this.ttlMs) {
        this.hits += 1;
        return entry.access;
      }
      this.entries.delete(userId);
    }

    this.misses += 1;
    const generation = this.generationOf(userId);
    const epoch = this.epoch;

    const inFlight = this.pending.get(userId);
    if (inFlight && inFlight.generation === generation && inFlight.epoch === epoch) {
      return inFlight.promise;
    }

    const promise = this.resolver
      .resolveAccess(userId)
      .then((access) => {
        if (this.generationOf(userId) === generation && this.epoch === epoch) {
          this.store(userId, access);
        }
        return access;
      })
      .finally(() => {
        if (this.pending.get(userId)?.promise === promise) {
          this.pending.delete(userId);
        }
      });

    this.pending.set(userId, { generation, epoch, promise });
    return promise;
  }

  invalidate(userId: number): void {
    this.entries.delete(userId);
    if (this.pending.has(userId)) {
      this.generations.set(userId, this.generationOf(userId) + 1);
    }
    this.logger.debug('Cache entry invalidated', { userId });
  }

  invalidateAll(): void {
    const cleared = this.entries.size;
    this.entries.clear();
    this.generations.clear();
    this.epoch += 1;
    this.logger.debug('Cache cleared', { cleared });
  }

  stats(): CacheStats {
    return { size: this.entries.size, hits: this.hits, misses: this.misses, ttlMs: this.ttlMs };
  }

  private generationOf(userId: number): number {
    return this.generations.get(userId) ?? 0;
  }

  private store(userId: number, access: ResolvedAccess): void {
    this.entries.delete(userId);
    this.entries.set(userId, { access, cachedAt: this.now() });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
