/**
 * Unit tests for the PostgreSQL store.
 *
 * The db module is mocked so these tests run without a live PostgreSQL
 * connection. They check the generated SQL, parameter order, the
 * compare-and-swap guard and transaction boundaries.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { QueryResult } from 'pg';

// ─── Mock the db module ──────────────────────────────────────────────────────

const mockQuery = vi.fn();
const mockClientQuery = vi.fn();
const mockRelease = vi.fn();

vi.mock('../utils/db.js', () => ({
  query: (...args: unknown[]) => mockQuery(...args),
  getPool: () => ({
    connect: async () => ({
      query: (...args: unknown[]) => mockClientQuery(...args),
      release: () => mockRelease(),
    }),
  }),
}));

const { PgStore, buildWhere, toSnakeCase } = await import('./pgStore.js');
const { createTestContext, unwrap } = await import('../test/setup.js');

// ─── Helpers ─────────────────────────────────────────────────────────────────

function pgResult(rows: Record<string, unknown>[], rowCount = rows.length): QueryResult {
  return { rows, rowCount, command: '', oid: 0, fields: [] };
}

beforeEach(() => {
  mockQuery.mockReset();
  mockClientQuery.mockReset();
  mockRelease.mockReset();
});

describe('pgStore', () => {
  describe('toSnakeCase', () => {
    it('should convert camelCase column names', () => {
      expect(toSnakeCase('previousHash')).toBe('previous_hash');
      expect(toSnakeCase('id')).toBe('id');
    });
  });

  describe('buildWhere', () => {
    it('should bind equality, null and operator conditions in order', () => {
      const params: unknown[] = [];
      const sql = buildWhere(
        'retention_records',
        { status: 'ACTIVE', onHold: false, subjectId: null, expiryDate: { lte: '2024-05-01' } },
        params,
      );

      expect(sql).toBe(
        ' WHERE status = $1 AND on_hold = $2 AND subject_id IS NULL AND expiry_date <= $3',
      );
      expect(params).toEqual(['ACTIVE', false, '2024-05-01']);
    });

    it('should support in, not and between', () => {
      const params: unknown[] = ['existing'];
      const sql = buildWhere(
        'rights_requests',
        { status: { in: ['RECEIVED', 'UNDER_REVIEW'] }, kind: { not: 'objection' }, dueDate: { between: ['2024-01-01', '2024-02-01'] } },
        params,
      );

      expect(sql).toBe(
        ' WHERE status = ANY($2) AND kind IS DISTINCT FROM $3 AND due_date BETWEEN $4 AND $5',
      );
      expect(params).toEqual(['existing', ['RECEIVED', 'UNDER_REVIEW'], 'objection', '2024-01-01', '2024-02-01']);
    });

    it('should reject unknown columns', () => {
      expect(() => buildWhere('record_locks', { bogus: 1 }, [])).toThrow('Unknown column bogus');
    });

    it('should return an empty clause without a filter', () => {
      expect(buildWhere('record_locks', undefined, [])).toBe('');
    });
  });

  describe('read sessions', () => {
    it('should select with camelCase aliases', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([{ id: 'l-1', tableName: 'patients', recordId: 'p-1' }]));
      const store = new PgStore();

      const row = await store.read((s) => s.get('record_locks', 'l-1'));

      expect(row).toMatchObject({ id: 'l-1', tableName: 'patients' });
      const [text, params] = mockQuery.mock.calls[0] ?? [];
      expect(text).toBe(
        'SELECT id AS "id", table_name AS "tableName", record_id AS "recordId", locked_by AS "lockedBy", reason AS "reason", locked_at AS "lockedAt" FROM record_locks WHERE id = $1',
      );
      expect(params).toEqual(['l-1']);
    });

    it('should return null for a missing row', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));
      const row = await new PgStore().read((s) => s.get('legal_holds', 'missing'));
      expect(row).toBeNull();
    });

    it('should order and limit finds', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([]));
      await new PgStore().read((s) =>
        s.find('ledger_entries', { scopeKey: 'holds' }, { orderBy: 'sequence', direction: 'desc', limit: 1 }),
      );

      const [text, params] = mockQuery.mock.calls[0] ?? [];
      expect(String(text).endsWith('FROM ledger_entries WHERE scope_key = $1 ORDER BY sequence DESC LIMIT $2')).toBe(true);
      expect(params).toEqual(['holds', 1]);
    });

    it('should count rows', async () => {
      mockQuery.mockResolvedValueOnce(pgResult([{ total: 3 }]));
      const total = await new PgStore().read((s) => s.count('ledger_entries', { scopeKey: 'holds' }));
      expect(total).toBe(3);
      expect(mockQuery.mock.calls[0]?.[0]).toBe(
        'SELECT COUNT(*)::int AS total FROM ledger_entries WHERE scope_key = $1',
      );
    });
  });

  describe('transactions', () => {
    it('should wrap work in BEGIN and COMMIT and release the client', async () => {
      mockClientQuery.mockResolvedValue(pgResult([], 1));
      const store = new PgStore();

      const written = await store.transaction((s) =>
        s.update('rights_requests', 'r-1', { status: 'COMPLETED' }, { status: 'UNDER_REVIEW' }),
      );

      expect(written).toBe(1);
      const statements = mockClientQuery.mock.calls.map((call) => call[0]);
      expect(statements).toEqual([
        'BEGIN',
        'UPDATE rights_requests SET status = $1 WHERE id = $2 AND status = $3',
        'COMMIT',
      ]);
      expect(mockClientQuery.mock.calls[1]?.[1]).toEqual(['COMPLETED', 'r-1', 'UNDER_REVIEW']);
      expect(mockRelease).toHaveBeenCalledOnce();
    });

    it('should report zero rows when the compare-and-swap guard misses', async () => {
      mockClientQuery.mockResolvedValue(pgResult([], 0));
      const written = await new PgStore().transaction((s) =>
        s.update('rights_requests', 'r-1', { status: 'COMPLETED' }, { status: 'UNDER_REVIEW' }),
      );
      expect(written).toBe(0);
    });

    it('should roll back and rethrow when work fails', async () => {
      mockClientQuery.mockResolvedValue(pgResult([]));

      await expect(
        new PgStore().transaction(async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      const statements = mockClientQuery.mock.calls.map((call) => call[0]);
      expect(statements).toEqual(['BEGIN', 'ROLLBACK']);
      expect(mockRelease).toHaveBeenCalledOnce();
    });

    it('should take a transaction-scoped advisory lock on the scope key', async () => {
      mockClientQuery.mockResolvedValue(pgResult([]));

      await new PgStore().transaction((s) => s.lockScope('erasure:requests'));

      const statements = mockClientQuery.mock.calls.map((call) => call[0]);
      expect(statements).toEqual(['BEGIN', 'SELECT pg_advisory_xact_lock(hashtext($1))', 'COMMIT']);
      expect(mockClientQuery.mock.calls[1]?.[1]).toEqual(['erasure:requests']);
    });

    it('should refuse to lock a scope outside a transaction', async () => {
      await expect(new PgStore().read((s) => s.lockScope('holds'))).rejects.toThrow(
        'Ledger scopes can only be locked inside a transaction',
      );
      expect(mockQuery).not.toHaveBeenCalled();
    });

    it('should insert only the columns present and return the stored row', async () => {
      const row = {
        id: 'lock-1',
        tableName: 'patients',
        recordId: 'p-1',
        lockedBy: 'alice',
        reason: null,
        lockedAt: '2024-03-01T10:00:00.000Z',
      };
      mockClientQuery
        .mockResolvedValueOnce(pgResult([]))
        .mockResolvedValueOnce(pgResult([row]))
        .mockResolvedValueOnce(pgResult([]));

      const inserted = await new PgStore().transaction((s) => s.insert('record_locks', row));

      expect(inserted).toEqual(row);
      const [text, params] = mockClientQuery.mock.calls[1] ?? [];
      expect(String(text).startsWith(
        'INSERT INTO record_locks (id, table_name, record_id, locked_by, reason, locked_at) VALUES ($1, $2, $3, $4, $5, $6) RETURNING',
      )).toBe(true);
      expect(params).toEqual(['lock-1', 'patients', 'p-1', 'alice', null, '2024-03-01T10:00:00.000Z']);
    });
  });

  describe('concurrent completion', () => {
    it('should roll back a losing completion before it touches the ledger', async () => {
      const seed = createTestContext();
      const created = unwrap(
        await seed.rights.erasure.create({
          subjectId: 'subject-1',
          subjectName: 'Test Subject',
          details: { grounds: 'NO_LONGER_NECESSARY' },
          createdBy: 'dpo',
        }),
      );
      const stored = { ...(await seed.store.read((s) => s.get('rights_requests', created.id))) };
      const completed = { ...stored, status: 'COMPLETED', completedAt: '2025-03-03T10:00:00.000Z', completedBy: 'winner' };

      // The other caller committed between this caller's read and its status swap.
      mockClientQuery.mockImplementation(async (text: string) => {
        if (text.startsWith('SELECT COUNT(*)')) return pgResult([{ total: 0 }]);
        if (text.startsWith('SELECT') && text.includes('FROM rights_requests')) return pgResult([stored]);
        if (text.startsWith('UPDATE rights_requests')) return pgResult([], 0);
        return pgResult([]);
      });
      mockQuery.mockImplementation(async (text: string) =>
        text.includes('FROM rights_requests') ? pgResult([completed]) : pgResult([]),
      );
      const ctx = createTestContext({ store: new PgStore() });

      const result = unwrap(await ctx.rights.erasure.completeRequest(created.id, { completedBy: 'loser' }));

      expect(result.alreadyCompleted).toBe(true);
      expect(result.request.completedBy).toBe('winner');
      const statements = mockClientQuery.mock.calls.map((call) => String(call[0]));
      expect(statements[statements.length - 1]).toBe('ROLLBACK');
      expect(statements.some((text) => text.startsWith('SELECT pg_advisory_xact_lock'))).toBe(false);
      expect(statements.some((text) => text.startsWith('INSERT INTO ledger_entries'))).toBe(false);
    });
  });
});
