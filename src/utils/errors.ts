/**
 * Error taxonomy for the access-control core.
 *
 * Authentication failures and denials are reported to callers as denials
 * with no internal detail. Administrative errors keep a message an operator
 * can act on.
 *
 * @module utils/errors
 */

export type AccessErrorCode =
  | 'AUTH_INVALID_CREDENTIALS'
  | 'ACCESS_DENIED'
  | 'POLICY_VIOLATION'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'VALIDATION_FAILED'
  | 'STORAGE_FAILURE';

export class AccessCoreError extends Error {
  constructor(
    public readonly code: AccessErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AccessCoreError';
  }
}

/** Shared by unknown logins, disabled accounts and wrong passwords alike. */
export const INVALID_CREDENTIALS_MESSAGE = 'Invalid login or password';

export class AuthenticationError extends AccessCoreError {
  constructor(cause?: unknown) {
    super('AUTH_INVALID_CREDENTIALS', INVALID_CREDENTIALS_MESSAGE, cause);
    this.name = 'AuthenticationError';
  }
}

export type RequirementMode = 'all' | 'any' | 'role';

export class AuthorizationError extends AccessCoreError {
  constructor(
    public readonly userId: number,
    public readonly mode: RequirementMode,
    public readonly required: readonly string[],
    public readonly missing: readonly string[],
  ) {
    super(
      'ACCESS_DENIED',
      mode === 'role'
        ? `Missing role: ${missing.join(', ')}`
        : `Missing permission(s): ${missing.join(', ')}`,
    );
    this.name = 'AuthorizationError';
  }
}

export class PolicyError extends AccessCoreError {
  constructor(message: string) {
    super('POLICY_VIOLATION', message);
    this.name = 'PolicyError';
  }
}

export type EntityKind = 'user' | 'role' | 'permission' | 'grant';

export class NotFoundError extends AccessCoreError {
  constructor(
    public readonly entity: EntityKind,
    public readonly id: number | string,
  ) {
    super('NOT_FOUND', `${entity} ${String(id)} not found`);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AccessCoreError {
  constructor(message: string, cause?: unknown) {
    super('CONFLICT', message, cause);
    this.name = 'ConflictError';
  }
}

export class ValidationError extends AccessCoreError {
  constructor(public readonly errors: string[]) {
    super('VALIDATION_FAILED', errors.join('; '));
    this.name = 'ValidationError';
  }
}

export class StorageError extends AccessCoreError {
  constructor(
    message: string,
    /** SQLSTATE reported by the driver, when there is one. */
    public readonly driverCode: string | undefined,
    cause?: unknown,
  ) {
    super('STORAGE_FAILURE', message, cause);
    this.name = 'StorageError';
  }
}

// ─── Caller-facing view ──────────────────────────────────────────────────────

export interface PublicError {
  code: AccessErrorCode | 'INTERNAL_ERROR';
  message: string;
}

/**
 * Reduce any thrown value to what may be shown to an end user.
 * Denials never reveal which permission or which half of a credential failed.
 */
export function toPublicError(err: unknown): PublicError {
  if (err instanceof AuthenticationError) {
    return { code: err.code, message: INVALID_CREDENTIALS_MESSAGE };
  }
  if (err instanceof AuthorizationError) {
    return { code: err.code, message: 'Access denied' };
  }
  if (
    err instanceof PolicyError ||
    err instanceof NotFoundError ||
    err instanceof ConflictError ||
    err instanceof ValidationError
  ) {
    return { code: err.code, message: err.message };
  }
  return { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' };
}
