/**
 * Audit repository for the audit_records table.
 *
 * Persistent {@link AuditSink}: inserts only, never updates or deletes.
 * Metadata is stored as JSONB.
 *
 * @module repositories/auditRepository
 */

import { query } from '../utils/db.js';
import type { AuditAction, AuditFilter, AuditOutcome, AuditRecord, AuditSink } from '../audit/types.js';

interface AuditRow {
  actor: string;
  action: AuditAction;
  target: string;
  outcome: AuditOutcome;
  created_at: Date;
  metadata: Record<string, unknown> | null;
}

function mapRowToRecord(row: AuditRow): AuditRecord {
  const record: AuditRecord = {
    actor: row.actor,
    action: row.action,
    target: row.target,
    outcome: row.outcome,
    timestamp: row.created_at,
  };
  if (row.metadata) record.metadata = row.metadata;
  return record;
}

export async function insertAuditRecord(record: AuditRecord): Promise<void> {
  await query(
    `INSERT INTO audit_records (actor, action, target, outcome, created_at, metadata)
     VALUES ($1, $2, $3, $4, $5, $6)`,
    [
      record.actor,
      record.action,
      record.target,
      record.outcome,
      record.timestamp,
      record.metadata ? JSON.stringify(record.metadata) : null,
    ],
  );
}

/**
 * Query audit records, newest first.
 * Builds the WHERE clause from the filter's set fields only.
 */
export async function findAuditRecords(filter: AuditFilter = {}): Promise<AuditRecord[]> {
  const conditions: string[] = [];
  const params: unknown[] = [];

  const add = (column: string, op: string, value: unknown): void => {
    params.push(value);
    conditions.push(`${column} ${op} $${params.length}`);
  };

  if (filter.actor !== undefined) add('actor', '=', filter.actor);
  if (filter.action) add('action', '=', filter.action);
  if (filter.outcome) add('outcome', '=', filter.outcome);
  if (filter.target !== undefined) add('target', '=', filter.target);
  if (filter.startDate) add('created_at', '>=', filter.startDate);
  if (filter.endDate) add('created_at', '<=', filter.endDate);

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  params.push(filter.limit ?? 100, filter.offset ?? 0);

  const result = await query<AuditRow>(
    `SELECT actor, action, target, outcome, created_at, metadata
     FROM audit_records
     ${where}
     ORDER BY created_at DESC, id DESC
     LIMIT $${params.length - 1} OFFSET $${params.length}`,
    params,
  );
  return result.rows.map(mapRowToRecord);
}

export class PgAuditSink implements AuditSink {
  async record(record: AuditRecord): Promise<void> {
    await insertAuditRecord(record);
  }
}
