/**
 * One-way legacy → adaptive credential upgrade.
 *
 * Runs only after a successful legacy verification, while the plaintext is
 * still at hand. The write is a single conditional update keyed by user id,
 * so two concurrent migrations of one account leave exactly one adaptive
 * hash and the second reports `already-migrated`. Failures are logged and
 * reported as `failed`; they never reach the login that triggered them.
 *
 * @module credentials/credentialMigrator
 */

import { hashPassword, BCRYPT_COST_FACTOR } from '../services/passwordService.js';
import type { Logger } from '../logging/logger.js';
import { asError, createLogger } from '../logging/logger.js';
import type { UserRepository } from '../repositories/types.js';
import type { UserAccount } from '../types/index.js';
import { KeyedLock } from '../utils/keyedLock.js';

export type MigrationOutcome = 'migrated' | 'already-migrated' | 'failed';

export interface CredentialMigratorOptions {
  users: UserRepository;
  bcryptCost?: number;
  logger?: Logger;
  /** Shared with the credential store so credential writes per user never interleave. */
  locks?: KeyedLock;
}

/** Lock key for writes to one user's credential columns. */
export function credentialLockKey(userId: number): string {
  return `credential:${userId}`;
}

export class CredentialMigrator {
  private readonly users: UserRepository;
  private readonly bcryptCost: number;
  private readonly logger: Logger;
  private readonly locks: KeyedLock;

  constructor(options: CredentialMigratorOptions) {
    this.users = options.users;
    this.bcryptCost = options.bcryptCost ?? BCRYPT_COST_FACTOR;
    this.logger = (options.logger ?? createLogger()).child({ component: 'credentialMigrator' });
    this.locks = options.locks ?? new KeyedLock();
  }

  async migrate(user: UserAccount, plaintext: string): Promise<MigrationOutcome> {
    try {
      const hash = await hashPassword(plaintext, this.bcryptCost);
      const updated = await this.locks.run(credentialLockKey(user.id), () =>
        this.users.migrateLegacyCredential(user.id, hash),
      );

      if (!updated) {
        this.logger.debug('Legacy credential already migrated', { userId: user.id });
        return 'already-migrated';
      }
      this.logger.info('Legacy credential migrated to adaptive hash', { userId: user.id });
      return 'migrated';
    } catch (err) {
      this.logger.error('Legacy credential migration failed', asError(err), { userId: user.id });
      return 'failed';
    }
  }

  /** Accounts still holding a legacy digest. */
  async countLegacyCredentials(): Promise<number> {
    return this.users.countLegacyCredentials();
  }
}
