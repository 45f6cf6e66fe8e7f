/**
 * Unit tests for the migration runner utility.
 *
 * File discovery runs against the real migrations directory; the apply loop
 * runs against a fake pg client that records every statement.
 */

import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type pg from 'pg';
import { DEFAULT_MIGRATIONS_DIR, getMigrationFiles, runMigrations } from './migrationRunner.js';

interface FakeClient {
  statements: string[];
  query: Mock<[sql: string], Promise<{ rows: { filename: string }[] }>>;
  release: ReturnType<typeof vi.fn>;
}

function fakePool(applied: string[], failOn?: string): { pool: pg.Pool; client: FakeClient } {
  const statements: string[] = [];
  const client: FakeClient = {
    statements,
    query: vi.fn(async (sql: string) => {
      statements.push(sql.trim());
      if (failOn && sql.includes(failOn)) throw new Error('syntax error');
      if (sql.startsWith('SELECT filename')) {
        return { rows: applied.map((filename) => ({ filename })) };
      }
      return { rows: [] };
    }),
    release: vi.fn(),
  };
  const pool = { connect: vi.fn(async () => client) } as unknown as pg.Pool;
  return { pool, client };
}

function tempMigrations(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'access-core-migrations-'));
  for (const [name, sql] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, name), sql);
  }
  return dir;
}

describe('migrationRunner', () => {
  describe('getMigrationFiles', () => {
    it('should find every schema migration in order', () => {
      expect(getMigrationFiles(DEFAULT_MIGRATIONS_DIR)).toEqual([
        '001_create_users.sql',
        '002_create_roles_permissions.sql',
        '003_create_user_roles.sql',
        '004_create_audit_records.sql',
      ]);
    });

    it('should ignore non-SQL files', () => {
      const dir = tempMigrations({ '002_b.sql': 'SELECT 2;', '001_a.sql': 'SELECT 1;', 'README.md': '' });
      expect(getMigrationFiles(dir)).toEqual(['001_a.sql', '002_b.sql']);
    });

    it('should return empty array for non-existent directory', () => {
      expect(getMigrationFiles('/non/existent/path')).toEqual([]);
    });
  });

  describe('schema', () => {
    it('should not bound the length of audited actors and targets', () => {
      const sql = fs.readFileSync(
        path.join(DEFAULT_MIGRATIONS_DIR, '004_create_audit_records.sql'),
        'utf8',
      );

      expect(sql).toMatch(/^\s+actor\s+TEXT NOT NULL,$/m);
      expect(sql).toMatch(/^\s+target\s+TEXT NOT NULL,$/m);
    });
  });

  describe('runMigrations', () => {
    it('should apply only pending files, each in its own transaction', async () => {
      const dir = tempMigrations({ '001_a.sql': 'SELECT 1;', '002_b.sql': 'SELECT 2;' });
      const { pool, client } = fakePool(['001_a.sql']);

      const applied = await runMigrations(dir, pool);

      expect(applied).toEqual(['002_b.sql']);
      expect(client.statements).not.toContain('SELECT 1;');
      const begin = client.statements.indexOf('BEGIN');
      expect(client.statements.slice(begin, begin + 4)).toEqual([
        'BEGIN',
        'SELECT 2;',
        'INSERT INTO schema_migrations (filename) VALUES ($1)',
        'COMMIT',
      ]);
      expect(client.release).toHaveBeenCalledOnce();
    });

    it('should roll back and stop on a failing file', async () => {
      const dir = tempMigrations({
        '001_a.sql': 'SELECT 1;',
        '002_bad.sql': 'CREATE BROKEN;',
        '003_c.sql': 'SELECT 3;',
      });
      const { pool, client } = fakePool([], 'BROKEN');

      await expect(runMigrations(dir, pool)).rejects.toThrow(
        'Migration 002_bad.sql failed: syntax error',
      );
      expect(client.statements).toContain('ROLLBACK');
      expect(client.statements).not.toContain('SELECT 3;');
      expect(client.release).toHaveBeenCalledOnce();
    });
  });
});
