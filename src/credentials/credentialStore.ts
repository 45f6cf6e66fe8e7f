/**
 * Credential verification and provisioning over the dual-format store.
 *
 * The adaptive (bcrypt) hash is authoritative whenever present; the legacy
 * digest is consulted only for accounts that have nothing else. A correct
 * legacy password triggers a migration to the adaptive format. Unknown,
 * disabled and credential-less logins still pay for one bcrypt comparison
 * so that they cannot be told apart from a wrong password by timing.
 *
 * @module credentials/credentialStore
 */

import {
  BCRYPT_COST_FACTOR,
  getDummyHash,
  hashPassword,
  validatePasswordStrength,
  verifyLegacyDigest,
  verifyPassword,
} from '../services/passwordService.js';
import type { Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';
import type { UserRepository } from '../repositories/types.js';
import { UserStatus } from '../types/index.js';
import type { Credential, CredentialFormat, UserAccount } from '../types/index.js';
import { AuthenticationError, NotFoundError, ValidationError } from '../utils/errors.js';
import { KeyedLock } from '../utils/keyedLock.js';
import { validateLogin } from '../utils/validators/nameValidator.js';
import { CredentialMigrator, credentialLockKey } from './credentialMigrator.js';
import type { MigrationOutcome } from './credentialMigrator.js';

export type VerificationResult =
  | { ok: true; formatUsed: 'adaptive'; user: UserAccount }
  | { ok: true; formatUsed: 'legacy'; user: UserAccount; migration: MigrationOutcome }
  | { ok: false; formatUsed: CredentialFormat };

export interface CredentialStoreOptions {
  users: UserRepository;
  bcryptCost?: number;
  logger?: Logger;
  locks?: KeyedLock;
  /** Built from the other options when omitted. */
  migrator?: CredentialMigrator;
}

interface CredentialCheck {
  matched: boolean;
  format: CredentialFormat;
}

export class CredentialStore {
  private readonly users: UserRepository;
  private readonly bcryptCost: number;
  private readonly logger: Logger;
  private readonly locks: KeyedLock;
  readonly migrator: CredentialMigrator;

  constructor(options: CredentialStoreOptions) {
    this.users = options.users;
    this.bcryptCost = options.bcryptCost ?? BCRYPT_COST_FACTOR;
    this.logger = (options.logger ?? createLogger()).child({ component: 'credentialStore' });
    this.locks = options.locks ?? new KeyedLock();
    this.migrator =
      options.migrator ??
      new CredentialMigrator({
        users: this.users,
        bcryptCost: this.bcryptCost,
        logger: options.logger,
        locks: this.locks,
      });
  }

  /**
   * Check a login/password pair. Never throws for a bad credential; storage
   * errors propagate. A legacy match is migrated before returning, and a
   * failed migration does not change the result.
   */
  async verify(login: string, password: string): Promise<VerificationResult> {
    const user = await this.findUsable(login);
    if (!user) {
      await this.burnDummyComparison(password);
      return { ok: false, formatUsed: 'none' };
    }

    const check = await this.checkCredential(user.credential, password);
    if (!check.matched) {
      this.logger.debug('Credential mismatch', { userId: user.id, format: check.format });
      return { ok: false, formatUsed: check.format };
    }

    if (check.format === 'legacy') {
      const migration = await this.migrator.migrate(user, password);
      return { ok: true, formatUsed: 'legacy', user, migration };
    }
    return { ok: true, formatUsed: 'adaptive', user };
  }

  /**
   * Re-check the old password by the same adaptive-then-legacy rule (without
   * migrating), then store the new one as an adaptive-only credential.
   *
   * @throws AuthenticationError when the login or old password is wrong
   * @throws ValidationError when the new password is too weak
   */
  async changePassword(login: string, oldPassword: string, newPassword: string): Promise<void> {
    const user = await this.findUsable(login);
    if (!user) {
      await this.burnDummyComparison(oldPassword);
      throw new AuthenticationError();
    }

    await this.locks.run(credentialLockKey(user.id), async () => {
      const current = await this.users.findById(user.id);
      const check: CredentialCheck = current
        ? await this.checkCredential(current.credential, oldPassword)
        : { matched: false, format: 'none' };
      if (!check.matched) throw new AuthenticationError();

      const strength = validatePasswordStrength(newPassword);
      if (!strength.valid) throw new ValidationError(strength.errors);

      const hash = await hashPassword(newPassword, this.bcryptCost);
      await this.users.setAdaptiveCredential(user.id, hash);
    });

    this.logger.info('Password changed', { userId: user.id });
  }

  /**
   * Provision an account with an adaptive-only credential.
   *
   * @throws ValidationError for a malformed login or weak password
   * @throws ConflictError when the login is taken
   */
  async createUser(login: string, password: string, displayName = ''): Promise<UserAccount> {
    const errors = [...validateLogin(login).errors, ...validatePasswordStrength(password).errors];
    if (errors.length > 0) throw new ValidationError(errors);

    const passwordHash = await hashPassword(password, this.bcryptCost);
    const user = await this.users.createUser({ login, displayName, passwordHash });
    this.logger.info('User created', { userId: user.id });
    return user;
  }

  /**
   * Soft delete. Grants are kept; the account can no longer authenticate.
   */
  async disableUser(userId: number): Promise<void> {
    const updated = await this.locks.run(credentialLockKey(userId), () =>
      this.users.setStatus(userId, UserStatus.DISABLED),
    );
    if (!updated) throw new NotFoundError('user', userId);
    this.logger.info('User disabled', { userId });
  }

  async recordLogin(userId: number): Promise<void> {
    await this.users.updateLastLogin(userId);
  }

  private async findUsable(login: string): Promise<UserAccount | null> {
    const user = await this.users.findByLogin(login);
    if (!user || user.status !== UserStatus.ACTIVE || user.credential.format === 'none') {
      return null;
    }
    return user;
  }

  private async checkCredential(credential: Credential, password: string): Promise<CredentialCheck> {
    switch (credential.format) {
      case 'adaptive':
      case 'transitional':
        return { matched: await verifyPassword(password, credential.hash), format: 'adaptive' };
      case 'legacy':
        return { matched: verifyLegacyDigest(password, credential.digest), format: 'legacy' };
      case 'none':
        await this.burnDummyComparison(password);
        return { matched: false, format: 'none' };
    }
  }

  private async burnDummyComparison(password: string): Promise<void> {
    await verifyPassword(password, await getDummyHash(this.bcryptCost));
  }
}
