import { describe, it, expect, beforeEach } from 'vitest';
import { createTestContext, failure, unwrap, type TestContext } from '../test/setup.js';

describe('RecordLockService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it('should acquire a free lock', async () => {
    const result = unwrap(await ctx.locks.lock('visits', 'visit-1', { holder: 'monitor-a', reason: 'Source review' }));

    expect(result).toEqual({
      action: 'ACQUIRED',
      lock: {
        tableName: 'visits',
        recordId: 'visit-1',
        lockedBy: 'monitor-a',
        reason: 'Source review',
        lockedAt: '2025-03-03T10:00:00.000Z',
      },
    });
    expect(unwrap(await ctx.locks.getLock('visits', 'visit-1')).isLocked).toBe(true);
  });

  it('should extend the lock for the same holder', async () => {
    unwrap(await ctx.locks.lock('visits', 'visit-1', { holder: 'monitor-a' }));
    const again = unwrap(await ctx.locks.lock('visits', 'visit-1', { holder: 'monitor-a', reason: 'Still reviewing' }));

    expect(again.action).toBe('EXTENDED');
    expect(again.lock.reason).toBe('Still reviewing');
  });

  it('should refuse a different holder', async () => {
    unwrap(await ctx.locks.lock('visits', 'visit-1', { holder: 'monitor-a' }));

    const result = await ctx.locks.lock('visits', 'visit-1', { holder: 'monitor-b' });
    expect(failure(result)).toEqual({ code: 'RECORD_LOCKED', message: 'Record locked by monitor-a' });
  });

  it('should keep a lock indefinitely', async () => {
    unwrap(await ctx.locks.lock('visits', 'visit-1', { holder: 'monitor-a' }));
    const later = createTestContext({ store: ctx.store, clock: () => new Date('2026-03-03T10:00:00.000Z') });

    const result = await later.locks.lock('visits', 'visit-1', { holder: 'monitor-b' });
    expect(failure(result).code).toBe('RECORD_LOCKED');
  });

  describe('unlock', () => {
    it('should succeed when there is no lock', async () => {
      const result = unwrap(await ctx.locks.unlock('visits', 'visit-1', { holder: 'monitor-a' }));
      expect(result).toEqual({ released: false, message: 'No lock to release', previousHolder: null });
    });

    it('should release a lock the caller holds', async () => {
      unwrap(await ctx.locks.lock('visits', 'visit-1', { holder: 'monitor-a' }));

      const result = unwrap(await ctx.locks.unlock('visits', 'visit-1', { holder: 'monitor-a' }));
      expect(result).toEqual({ released: true, message: 'Lock released', previousHolder: 'monitor-a' });
      expect(unwrap(await ctx.locks.getLock('visits', 'visit-1'))).toEqual({ isLocked: false, lock: null });
    });

    it('should need force to release a lock someone else holds', async () => {
      unwrap(await ctx.locks.lock('visits', 'visit-1', { holder: 'monitor-a' }));

      const refused = await ctx.locks.unlock('visits', 'visit-1', { holder: 'monitor-b' });
      expect(failure(refused)).toEqual({
        code: 'RECORD_LOCKED',
        message: 'Record locked by monitor-a; force is needed to release it',
      });

      const forced = unwrap(await ctx.locks.unlock('visits', 'visit-1', { holder: 'monitor-b', force: true }));
      expect(forced.previousHolder).toBe('monitor-a');

      const history = unwrap(await ctx.locks.getHistory('visits', 'visit-1'));
      expect(history.map((entry) => entry.payload['action'])).toEqual(['LOCK_ACQUIRED', 'LOCK_FORCE_RELEASED']);
    });
  });
});
