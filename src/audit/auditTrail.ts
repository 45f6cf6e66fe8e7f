/**
 * In-memory, append-only audit trail.
 *
 * Each entry's SHA-256 checksum covers its own fields and the previous
 * entry's checksum, forming a hash chain that makes mid-log tampering
 * detectable. Suitable for single-process deployments and for tests;
 * `PgAuditSink` is the persistent counterpart.
 *
 * @module audit
 */

import { createHash } from 'node:crypto';
import { v4 as uuidv4 } from 'uuid';
import type {
  AuditEntry,
  AuditFilter,
  AuditRecord,
  AuditSink,
  ChainIntegrityResult,
} from './types.js';

export class AuditTrail implements AuditSink {
  private readonly entries: AuditEntry[] = [];

  /**
   * Append a record. Generates the entry id and its chain checksum.
   */
  async record(record: AuditRecord): Promise<void> {
    const last = this.entries[this.entries.length - 1];
    const entry: AuditEntry = {
      ...record,
      metadata: record.metadata ? { ...record.metadata } : undefined,
      id: uuidv4(),
      checksum: '',
      previousChecksum: last ? last.checksum : '',
    };
    entry.checksum = this.computeChecksum(entry);
    this.entries.push(entry);
  }

  /**
   * Query entries with optional filtering, oldest first.
   */
  async query(filter: AuditFilter = {}): Promise<AuditEntry[]> {
    const results = this.entries.filter((entry) => {
      if (filter.actor !== undefined && entry.actor !== filter.actor) return false;
      if (filter.action && entry.action !== filter.action) return false;
      if (filter.outcome && entry.outcome !== filter.outcome) return false;
      if (filter.target !== undefined && entry.target !== filter.target) return false;
      if (filter.startDate && entry.timestamp < filter.startDate) return false;
      if (filter.endDate && entry.timestamp > filter.endDate) return false;
      return true;
    });

    const offset = filter.offset ?? 0;
    const limit = filter.limit ?? results.length;
    return results.slice(offset, offset + limit);
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Walk the chain from the start, checking each link and each checksum.
   */
  async verifyChain(): Promise<ChainIntegrityResult> {
    let previousChecksum = '';

    for (const [index, entry] of this.entries.entries()) {
      if (entry.previousChecksum !== previousChecksum) {
        return {
          valid: false,
          totalEntries: this.entries.length,
          firstInvalidIndex: index,
          details: `Chain broken at index ${index}: previousChecksum mismatch`,
        };
      }
      if (entry.checksum !== this.computeChecksum(entry)) {
        return {
          valid: false,
          totalEntries: this.entries.length,
          firstInvalidIndex: index,
          details: `Tampered entry at index ${index}: checksum mismatch`,
        };
      }
      previousChecksum = entry.checksum;
    }

    return {
      valid: true,
      totalEntries: this.entries.length,
      firstInvalidIndex: null,
      details: this.entries.length === 0 ? 'No entries to verify' : 'All entries verified',
    };
  }

  /**
   * SHA-256 over the entry's fields and previousChecksum; the checksum itself is excluded.
   */
  private computeChecksum(entry: AuditEntry): string {
    const payload = {
      id: entry.id,
      timestamp: entry.timestamp.toISOString(),
      actor: entry.actor,
      action: entry.action,
      target: entry.target,
      outcome: entry.outcome,
      metadata: entry.metadata ?? null,
      previousChecksum: entry.previousChecksum,
    };
    return createHash('sha256').update(JSON.stringify(payload)).digest('hex');
  }
}
