/**
 * Credential module: dual-format password verification and migration.
 *
 * @module credentials
 */

export { CredentialStore } from './credentialStore.js';
export type { CredentialStoreOptions, VerificationResult } from './credentialStore.js';
export { CredentialMigrator, credentialLockKey } from './credentialMigrator.js';
export type { CredentialMigratorOptions, MigrationOutcome } from './credentialMigrator.js';
