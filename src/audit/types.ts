/**
 * Type definitions for the Audit module.
 */

export type AuditAction =
  | 'authenticate'
  | 'authorize'
  | 'change_password'
  | 'migrate_credential'
  | 'create_user'
  | 'disable_user'
  | 'create_role'
  | 'delete_role'
  | 'create_permission'
  | 'delete_permission'
  | 'assign_permission'
  | 'revoke_permission'
  | 'assign_role'
  | 'revoke_role';

export type AuditOutcome = 'success' | 'failure' | 'allowed' | 'denied';

/**
 * One authentication or authorization decision, or one administrative change.
 *
 * `actor` is the acting user's id, or the submitted login when authentication
 * failed and no user id is known.
 */
export interface AuditRecord {
  actor: string;
  action: AuditAction;
  target: string;
  outcome: AuditOutcome;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

/** Append-only destination for audit records. */
export interface AuditSink {
  record(record: AuditRecord): Promise<void>;
}

export interface AuditEntry extends AuditRecord {
  id: string;
  checksum: string;
  previousChecksum: string;
}

export interface AuditFilter {
  actor?: string;
  action?: AuditAction;
  outcome?: AuditOutcome;
  target?: string;
  startDate?: Date;
  endDate?: Date;
  limit?: number;
  offset?: number;
}

export interface ChainIntegrityResult {
  valid: boolean;
  totalEntries: number;
  firstInvalidIndex: number | null;
  details: string;
}
