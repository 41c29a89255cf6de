import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createHash } from 'node:crypto';
import { InMemoryStore } from '../store/inMemoryStore.js';
import { IntegrityError } from '../utils/errors.js';
import type { HashProvider } from '../crypto/hashProvider.js';
import { HashChainLedger } from './hashChainLedger.js';
import { GENESIS } from './types.js';

const clock = () => new Date('2024-06-01T09:00:00.000Z');

describe('HashChainLedger', () => {
  let store: InMemoryStore;
  let ledger: HashChainLedger;

  const append = (scope: string, payload: Record<string, string | number>) =>
    store.transaction((s) => ledger.append(s, scope, payload));

  async function entryIdAt(scope: string, sequence: number): Promise<string> {
    const [row] = await store.read((s) => s.find('ledger_entries', { scopeKey: scope, sequence }));
    if (!row) throw new Error(`no entry ${sequence}`);
    return row.id;
  }

  beforeEach(() => {
    store = new InMemoryStore();
    ledger = new HashChainLedger(store, { clock });
  });

  describe('append', () => {
    it('should start every chain at GENESIS with sequence 0', async () => {
      const link = await append('erasure:r-1', { action: 'CREATED' });

      expect(link.previousHash).toBe(GENESIS);
      expect(link.sequence).toBe(0);
      expect(link.hash).toBe(
        createHash('sha256').update('{"action":"CREATED"}GENESIS').digest('hex'),
      );
    });

    it('should link each entry to its predecessor', async () => {
      const first = await append('erasure:r-1', { action: 'CREATED' });
      const second = await append('erasure:r-1', { action: 'ITEM_ADDED' });

      expect(second.previousHash).toBe(first.hash);
      expect(second.sequence).toBe(1);
    });

    it('should keep scopes independent', async () => {
      await append('erasure:r-1', { action: 'CREATED' });
      const other = await append('erasure:r-2', { action: 'CREATED' });

      expect(other.previousHash).toBe(GENESIS);
    });

    it('should hash the same payload identically regardless of key order', async () => {
      const a = await append('a', { x: 1, y: 'two' });
      const b = await append('b', { y: 'two', x: 1 });
      expect(a.hash).toBe(b.hash);
    });

    it('should lock the scope before reading the chain head', async () => {
      await store.transaction(async (s) => {
        const lockScope = vi.spyOn(s, 'lockScope');
        const find = vi.spyOn(s, 'find');

        await ledger.append(s, 'holds', { action: 'CREATED' });

        expect(lockScope).toHaveBeenCalledWith('holds');
        expect(lockScope.mock.invocationCallOrder[0]).toBeLessThan(find.mock.invocationCallOrder[0] ?? 0);
      });
    });

    it('should give concurrent appends distinct sequences', async () => {
      const links = await Promise.all(
        Array.from({ length: 25 }, (_, i) => append('erasure:requests', { action: 'CREATED', index: i })),
      );

      expect(new Set(links.map((link) => link.sequence)).size).toBe(25);
      expect((await ledger.verify('erasure:requests')).valid).toBe(true);
    });

    it('should leave no entry behind when the unit of work fails', async () => {
      await expect(
        store.transaction(async (s) => {
          await ledger.append(s, 'holds', { action: 'CREATED' });
          throw new Error('business write failed');
        }),
      ).rejects.toThrow('business write failed');

      expect(await ledger.head('holds')).toBeNull();
    });

    it('should refuse to append when a predecessor is missing', async () => {
      await append('holds', { n: 0 });
      await append('holds', { n: 1 });
      await append('holds', { n: 2 });
      const id = await entryIdAt('holds', 1);
      await store.transaction((s) => s.remove('ledger_entries', id));

      await expect(append('holds', { n: 3 })).rejects.toThrow(IntegrityError);
      await expect(append('holds', { n: 3 })).rejects.toThrow('predecessor missing');
    });

    it('should refuse to continue a chain with another algorithm', async () => {
      await append('holds', { n: 0 });
      const md: HashProvider = {
        id: 'sha256/2',
        hash: (data) => createHash('sha256').update(data).digest('hex'),
      };
      const other = new HashChainLedger(store, { hasher: md });

      await expect(store.transaction((s) => other.append(s, 'holds', { n: 1 }))).rejects.toThrow(
        'needs a new scope',
      );
    });

    it('should record the hashing algorithm and time', async () => {
      await append('holds', { n: 0 });
      const [entry] = await ledger.history('holds');
      expect(entry).toMatchObject({ algorithm: 'sha256/1', recordedAt: '2024-06-01T09:00:00.000Z' });
    });
  });

  describe('nextSequence', () => {
    it('should answer the sequence the next append will take', async () => {
      expect(await store.transaction((s) => ledger.nextSequence(s, 'holds'))).toBe(0);

      await append('holds', { action: 'CREATED' });
      await append('holds', { action: 'RELEASED' });

      expect(await store.transaction((s) => ledger.nextSequence(s, 'holds'))).toBe(2);
    });
  });

  describe('verify', () => {
    it('should report an empty chain as valid', async () => {
      await expect(ledger.verify('nothing')).resolves.toEqual({
        scopeKey: 'nothing',
        valid: true,
        breakPosition: null,
        totalEntries: 0,
        reason: null,
      });
    });

    it('should accept an untouched chain', async () => {
      for (let n = 0; n < 4; n++) await append('s', { n });
      const result = await ledger.verify('s');
      expect(result.valid).toBe(true);
      expect(result.totalEntries).toBe(4);
    });

    it('should report the position of a tampered payload', async () => {
      for (let n = 0; n < 5; n++) await append('s', { n });
      const id = await entryIdAt('s', 2);
      await store.transaction((s) => s.update('ledger_entries', id, { payload: '{"n":99}' }));

      const result = await ledger.verify('s');
      expect(result).toMatchObject({ valid: false, breakPosition: 2, reason: 'stored hash does not match the payload' });
    });

    it('should report a rewritten hash at the rewritten entry', async () => {
      for (let n = 0; n < 3; n++) await append('s', { n });
      const id = await entryIdAt('s', 1);
      await store.transaction((s) => s.update('ledger_entries', id, { hash: 'f'.repeat(64) }));

      expect((await ledger.verify('s')).breakPosition).toBe(1);
    });

    it('should report a removed entry at the gap', async () => {
      for (let n = 0; n < 3; n++) await append('s', { n });
      const id = await entryIdAt('s', 1);
      await store.transaction((s) => s.remove('ledger_entries', id));

      expect(await ledger.verify('s')).toMatchObject({ valid: false, breakPosition: 1 });
    });
  });

  describe('history', () => {
    it('should decode payloads in order', async () => {
      await append('s', { action: 'A' });
      await append('s', { action: 'B' });

      const entries = await ledger.history('s');
      expect(entries.map((e) => e.payload)).toEqual([{ action: 'A' }, { action: 'B' }]);
    });

    it('should raise an integrity error for an unreadable payload', async () => {
      await append('s', { action: 'A' });
      const id = await entryIdAt('s', 0);
      await store.transaction((s) => s.update('ledger_entries', id, { payload: 'not json' }));

      await expect(ledger.history('s')).rejects.toThrow(IntegrityError);
    });
  });
});
