/**
 * Validation of the identifiers the core stores: logins, role names and
 * dotted permission names. Role and permission names are immutable once
 * created, so they are checked strictly up front.
 *
 * @module utils/validators/nameValidator
 */

import type { ValidationResult } from '../../types/index.js';

const LOGIN_REGEX = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;
const ROLE_NAME_REGEX = /^[a-z][a-z0-9_]{0,63}$/;
/** At least two dot-separated segments, e.g. `materials.create`. */
const PERMISSION_NAME_REGEX = /^[a-z][a-z0-9_]*(\.[a-z][a-z0-9_]*)+$/;
const MAX_PERMISSION_NAME_LENGTH = 128;

function result(errors: string[]): ValidationResult {
  return { valid: errors.length === 0, errors };
}

export function validateLogin(login: string): ValidationResult {
  if (login.length === 0) return result(['Login is required']);
  if (!LOGIN_REGEX.test(login)) {
    return result([
      'Login must be 1-64 characters of letters, digits, ".", "_" or "-" and start with a letter or digit',
    ]);
  }
  return result([]);
}

export function validateRoleName(name: string): ValidationResult {
  if (!ROLE_NAME_REGEX.test(name)) {
    return result([
      `Role name "${name}" must start with a lowercase letter and contain only a-z, 0-9 and "_"`,
    ]);
  }
  return result([]);
}

export function validatePermissionName(name: string): ValidationResult {
  const errors: string[] = [];
  if (name.length > MAX_PERMISSION_NAME_LENGTH) {
    errors.push(`Permission name must be at most ${MAX_PERMISSION_NAME_LENGTH} characters`);
  }
  if (!PERMISSION_NAME_REGEX.test(name)) {
    errors.push(`Permission name "${name}" must be a dotted namespace such as "materials.create"`);
  }
  return result(errors);
}

/** The namespace of a dotted permission name: `lab.view` → `lab`. */
export function permissionCategory(name: string): string {
  const dot = name.indexOf('.');
  return dot === -1 ? name : name.slice(0, dot);
}
