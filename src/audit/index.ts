/**
 * Audit module: decision and administrative-change records.
 *
 * @module audit
 */

export type {
  AuditAction,
  AuditOutcome,
  AuditRecord,
  AuditSink,
  AuditEntry,
  AuditFilter,
  ChainIntegrityResult,
} from './types.js';

export { AuditTrail } from './auditTrail.js';
export { recordAudit } from './recordAudit.js';
