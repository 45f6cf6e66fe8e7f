/**
 * Password strength rules applied whenever a new adaptive credential is written.
 *
 * - 8 to 72 bytes (bcrypt ignores everything past byte 72)
 * - at least 1 numeric digit
 * - not only whitespace
 *
 * Legacy digests are never re-validated; they are checked and migrated as-is.
 *
 * @module utils/validators/passwordValidator
 */

import type { ValidationResult } from '../../types/index.js';

export const MIN_PASSWORD_LENGTH = 8;

/** bcrypt only reads the first 72 bytes of its input. */
export const MAX_PASSWORD_BYTES = 72;

const HAS_NUMBER_REGEX = /\d/;

/**
 * Validate a password, reporting every failed rule at once.
 *
 * @example
 * ```typescript
 * validatePassword('securePass1');
 * // { valid: true, errors: [] }
 *
 * validatePassword('short');
 * // { valid: false, errors: ['Password must be at least 8 characters', 'Password must contain at least 1 number'] }
 * ```
 */
export function validatePassword(password: string): ValidationResult {
  if (password.length === 0) {
    return { valid: false, errors: ['Password is required'] };
  }

  const errors: string[] = [];

  if (password.trim().length === 0) {
    errors.push('Password must not be only whitespace');
  }
  if (password.length < MIN_PASSWORD_LENGTH) {
    errors.push(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
  }
  if (Buffer.byteLength(password, 'utf8') > MAX_PASSWORD_BYTES) {
    errors.push(`Password must be at most ${MAX_PASSWORD_BYTES} bytes`);
  }
  if (!HAS_NUMBER_REGEX.test(password)) {
    errors.push('Password must contain at least 1 number');
  }

  return { valid: errors.length === 0, errors };
}
