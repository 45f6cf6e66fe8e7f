/**
 * Access module: role registry, grants, permission resolution and caching,
 * and the enforcement guard.
 *
 * @module access
 */

export type {
  AccessRequirement,
  AccessResolver,
  CacheInvalidator,
  CacheStats,
  Clock,
} from './types.js';
export { systemClock } from './types.js';
export { RoleRegistry } from './roleRegistry.js';
export type { RoleRegistryOptions } from './roleRegistry.js';
export { GrantStore, classifyGrant, isGrantEffective } from './grantStore.js';
export type { AssignmentOutcome, AssignmentResult, GrantStoreOptions } from './grantStore.js';
export { PermissionResolver } from './permissionResolver.js';
export type { PermissionResolverOptions } from './permissionResolver.js';
export { PermissionCache } from './permissionCache.js';
export type { PermissionCacheOptions } from './permissionCache.js';
export { AccessGuard, evaluateRequirement, subjectUserId } from './accessGuard.js';
export type { AccessGuardOptions, AccessSource } from './accessGuard.js';
export { seedDefaultCatalog, loadDefaultCatalog, parseCatalog } from './defaultCatalog.js';
export type { Catalog, SeedResult } from './defaultCatalog.js';
