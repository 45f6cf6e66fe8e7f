/**
 * Access-control core – package entry point.
 *
 * Re-exports the facade alongside the credential, access, audit and
 * storage modules it is built from.
 *
 * @module access-core
 */

// ─── Facade ───
export { AccessCore, createAccessCore, createPgAccessCore, DEFAULT_ACCESS_SETTINGS } from './accessCore.js';
export type { AccessCoreDeps, AccessSettings, CreateUserOptions, PgAccessCoreOptions } from './accessCore.js';

// ─── Core Types ───
export { UserStatus } from './types/index.js';
export type {
  Credential,
  CredentialFormat,
  Grant,
  GrantAssignment,
  GrantState,
  Identity,
  NewPermission,
  NewRole,
  Permission,
  ResolvedAccess,
  Role,
  Subject,
  UserAccount,
  ValidationResult,
} from './types/index.js';

// ─── Errors ───
export {
  AccessCoreError,
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  INVALID_CREDENTIALS_MESSAGE,
  NotFoundError,
  PolicyError,
  StorageError,
  ValidationError,
  toPublicError,
} from './utils/errors.js';
export type { AccessErrorCode, EntityKind, PublicError, RequirementMode } from './utils/errors.js';

// ─── Modules ───
export * from './credentials/index.js';
export * from './access/index.js';
export * from './audit/index.js';

// ─── Storage ───
export type { GrantRepository, RoleRepository, UserRepository } from './repositories/types.js';
export { pgUserRepository } from './repositories/userRepository.js';
export { pgRoleRepository } from './repositories/roleRepository.js';
export { pgGrantRepository } from './repositories/grantRepository.js';
export { PgAuditSink, findAuditRecords } from './repositories/auditRepository.js';
export { runMigrations } from './utils/migrationRunner.js';

// ─── Configuration & Logging ───
export { loadAccessConfig } from './config/index.js';
export type { AccessConfig } from './config/index.js';
export { createLogger } from './logging/logger.js';
export type { LogEntry, Logger, LogLevel } from './logging/logger.js';
