/**
 * Core type definitions for the access-control core.
 * Covers identities, credentials, the role/permission vocabulary and grants.
 */

// ─── Enums ───────────────────────────────────────────────────────────────────

export enum UserStatus {
  ACTIVE = 'active',
  DISABLED = 'disabled',
}

/** Which stored representation a verification attempt compared against. */
export type CredentialFormat = 'adaptive' | 'legacy' | 'none';

/** Derived, read-time classification of a grant. */
export type GrantState = 'active' | 'revoked' | 'expired';

// ─── Credentials ─────────────────────────────────────────────────────────────

/**
 * Stored password representation.
 *
 * `transitional` only exists inside the compatibility window; once a
 * credential has been migrated or changed it is `adaptive` for good.
 */
export type Credential =
  | { format: 'adaptive'; hash: string }
  | { format: 'legacy'; digest: string }
  | { format: 'transitional'; hash: string; digest: string }
  | { format: 'none' };

// ─── Data Models ─────────────────────────────────────────────────────────────

export interface UserAccount {
  id: number;
  login: string;
  displayName: string;
  status: UserStatus;
  credential: Credential;
  createdAt: Date;
  updatedAt: Date;
  lastLoginAt: Date | null;
}

export interface Role {
  id: number;
  name: string;
  label: string;
  description: string;
  isSystem: boolean;
  createdAt: Date;
}

export interface Permission {
  id: number;
  name: string;
  label: string;
  category: string;
  description: string;
  isSystem: boolean;
  createdAt: Date;
}

export interface Grant {
  userId: number;
  roleId: number;
  roleName: string;
  assignedBy: number | null;
  assignedAt: Date;
  expiresAt: Date | null;
  isActive: boolean;
}

/** A (role, permission name) pair from the role_permissions join. */
export interface RolePermissionName {
  roleId: number;
  permissionName: string;
}

// ─── Inputs ──────────────────────────────────────────────────────────────────

export interface NewRole {
  name: string;
  label?: string;
  description?: string;
  isSystem?: boolean;
}

export interface NewPermission {
  name: string;
  label?: string;
  /** Defaults to the first segment of the dotted name. */
  category?: string;
  description?: string;
  isSystem?: boolean;
}

export interface GrantAssignment {
  userId: number;
  roleId: number;
  assignedBy: number | null;
  expiresAt: Date | null;
}

// ─── Resolution & Identity ───────────────────────────────────────────────────

export interface ResolvedAccess {
  userId: number;
  roles: ReadonlySet<string>;
  permissions: ReadonlySet<string>;
  resolvedAt: Date;
}

/** Transient value produced by a successful authentication. Never persisted. */
export interface Identity {
  userId: number;
  login: string;
  roles: ReadonlySet<string>;
  permissions: ReadonlySet<string>;
  resolvedAt: Date;
}

/** A guard subject: an authenticated identity or a bare user id. */
export type Subject = Identity | number;

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}
