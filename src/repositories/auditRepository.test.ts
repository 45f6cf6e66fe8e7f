/**
 * Unit tests for the AuditRepository module, with the db module mocked.
 *
 * @module repositories/auditRepository.test
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { QueryResult } from 'pg';
import type { AuditRecord } from '../audit/types.js';

const mockQuery = vi.fn();

vi.mock('../utils/db.js', () => ({
  query: (...args: unknown[]) => mockQuery(...args),
}));

const { insertAuditRecord, findAuditRecords, PgAuditSink } = await import('./auditRepository.js');

const TIMESTAMP = new Date('2024-06-01T12:00:00Z');

function pgResult(rows: Record<string, unknown>[]): QueryResult {
  return { rows, rowCount: rows.length, command: '', oid: 0, fields: [] };
}

beforeEach(() => {
  mockQuery.mockReset();
});

describe('auditRepository', () => {
  describe('insertAuditRecord', () => {
    it('should serialise metadata to JSON', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));
      const record: AuditRecord = {
        actor: '7',
        action: 'authorize',
        target: 'admin.users',
        outcome: 'denied',
        timestamp: TIMESTAMP,
        metadata: { missing: ['admin.users'] },
      };

      await insertAuditRecord(record);

      const [sql, params] = mockQuery.mock.calls[0] as [string, unknown[]];
      expect(sql).toContain('INSERT INTO audit_records');
      expect(params).toEqual([
        '7',
        'authorize',
        'admin.users',
        'denied',
        TIMESTAMP,
        '{"missing":["admin.users"]}',
      ]);
    });

    it('should store null metadata when absent', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));
      await new PgAuditSink().record({
        actor: 'otk1',
        action: 'authenticate',
        target: 'otk1',
        outcome: 'failure',
        timestamp: TIMESTAMP,
      });
      expect((mockQuery.mock.calls[0] as [string, unknown[]])[1][5]).toBeNull();
    });
  });

  describe('findAuditRecords', () => {
    it('should default to the newest 100 records', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));
      await findAuditRecords();

      const [sql, params] = mockQuery.mock.calls[0] as [string, unknown[]];
      expect(sql).not.toContain('WHERE');
      expect(sql).toContain('ORDER BY created_at DESC, id DESC');
      expect(sql).toContain('LIMIT $1 OFFSET $2');
      expect(params).toEqual([100, 0]);
    });

    it('should number parameters after the filter conditions', async () => {
      mockQuery.mockResolvedValueOnce(
        pgResult([
          {
            actor: '7',
            action: 'authorize',
            target: 'lab.approve',
            outcome: 'denied',
            created_at: TIMESTAMP,
            metadata: null,
          },
        ]),
      );

      const records = await findAuditRecords({ actor: '7', outcome: 'denied', limit: 10 });

      const [sql, params] = mockQuery.mock.calls[0] as [string, unknown[]];
      expect(sql).toContain('WHERE actor = $1 AND outcome = $2');
      expect(sql).toContain('LIMIT $3 OFFSET $4');
      expect(params).toEqual(['7', 'denied', 10, 0]);
      expect(records).toEqual([
        { actor: '7', action: 'authorize', target: 'lab.approve', outcome: 'denied', timestamp: TIMESTAMP },
      ]);
    });
  });
});
