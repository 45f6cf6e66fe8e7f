/**
 * Password hashing primitives for both credential formats.
 *
 * The adaptive format is bcrypt with a configurable cost factor (12 by
 * default). The legacy format is an unsalted SHA-256 hex digest, kept only
 * so accounts created before the bcrypt upgrade can still log in once and be
 * migrated. Both comparisons are constant-time.
 *
 * @module services/passwordService
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import bcrypt from 'bcrypt';
import { validatePassword } from '../utils/validators/passwordValidator.js';
import type { ValidationResult } from '../types/index.js';

/**
 * Bcrypt cost factor (number of salt rounds).
 * Cost factor 12 provides a good balance between security and performance.
 */
export const BCRYPT_COST_FACTOR = 12;

/** Length of a hex-encoded SHA-256 digest. */
const LEGACY_DIGEST_LENGTH = 64;

/**
 * Hash a plaintext password using bcrypt.
 *
 * Generates a unique salt for each hash, so identical passwords produce
 * different hashes.
 *
 * @example
 * ```typescript
 * const hash = await hashPassword('mySecurePass1');
 * // '$2b$12$...' (60-character bcrypt hash)
 * ```
 */
export async function hashPassword(
  plaintext: string,
  costFactor: number = BCRYPT_COST_FACTOR,
): Promise<string> {
  const salt = await bcrypt.genSalt(costFactor);
  return bcrypt.hash(plaintext, salt);
}

/**
 * Verify a plaintext password against a stored bcrypt hash.
 * Uses bcrypt's constant-time comparison.
 */
export async function verifyPassword(plaintext: string, hash: string): Promise<boolean> {
  return bcrypt.compare(plaintext, hash);
}

/**
 * Compute the legacy digest of a password: lowercase hex SHA-256 of its UTF-8 bytes.
 * Only used to check pre-migration credentials and to build test fixtures.
 */
export function computeLegacyDigest(plaintext: string): string {
  return createHash('sha256').update(plaintext, 'utf8').digest('hex');
}

/**
 * Compare a plaintext password with a stored legacy digest without an early exit.
 *
 * Both sides are reduced to 32-byte buffers before comparison, so a
 * malformed stored digest compares unequal instead of throwing.
 */
export function verifyLegacyDigest(plaintext: string, storedDigest: string): boolean {
  const candidate = createHash('sha256').update(plaintext, 'utf8').digest();
  const normalised = storedDigest.trim().toLowerCase();
  const wellFormed = normalised.length === LEGACY_DIGEST_LENGTH && /^[0-9a-f]+$/.test(normalised);
  const stored = wellFormed ? Buffer.from(normalised, 'hex') : Buffer.alloc(candidate.length);
  return timingSafeEqual(candidate, stored) && wellFormed;
}

/**
 * Validate password strength against the core's requirements.
 * Delegates to the password validator utility.
 */
export function validatePasswordStrength(password: string): ValidationResult {
  return validatePassword(password);
}

const dummyHashes = new Map<number, Promise<string>>();

/**
 * A fixed bcrypt hash at the given cost, computed once per cost factor.
 *
 * Compared against when a login has no usable credential so that unknown
 * logins take as long as wrong passwords.
 */
export function getDummyHash(costFactor: number = BCRYPT_COST_FACTOR): Promise<string> {
  let hash = dummyHashes.get(costFactor);
  if (!hash) {
    hash = hashPassword('access-core-dummy-credential', costFactor);
    dummyHashes.set(costFactor, hash);
  }
  return hash;
}
