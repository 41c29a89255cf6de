import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryStore } from '../store/inMemoryStore.js';
import type { Filter, FindOptions, Row, Store, StoreSession, TableName } from '../store/types.js';
import { createTestContext, failure, unwrap, type TestContext } from '../test/setup.js';
import type { CreateHoldInput } from '../holds/types.js';
import type { ErasureItemDetails, ErasureRequestDetails } from './kinds/erasure.js';
import type { AddItemInput, CreateRequestInput } from './types.js';

const HOLD_REASON = 'Pending litigation over trial site records';

function erasureRequest(overrides: Partial<CreateRequestInput<ErasureRequestDetails>> = {}) {
  return {
    subjectId: 'subject-1',
    subjectName: 'Test Subject',
    subjectEmail: 'Subject@Example.org',
    details: { grounds: 'CONSENT_WITHDRAWN' as const },
    createdBy: 'privacy-officer',
    ...overrides,
  };
}

function erasureItem(overrides: Partial<AddItemInput<ErasureItemDetails>> = {}): AddItemInput<ErasureItemDetails> {
  return {
    tableName: 'visits',
    recordId: 'visit-1',
    dataCategory: 'HEALTH',
    details: {},
    addedBy: 'privacy-officer',
    ...overrides,
  };
}

function hold(overrides: Partial<CreateHoldInput> = {}): CreateHoldInput {
  return { holdType: 'LITIGATION', reason: HOLD_REASON, legalBasis: 'Court order', createdBy: 'legal', ...overrides };
}

/** Store whose status swaps on requests always lose once `losing` is set. */
class LosingStore implements Store {
  losing = false;
  readonly lockedScopes: string[] = [];

  constructor(private readonly inner: Store) {}

  transaction<R>(work: (session: StoreSession) => Promise<R>): Promise<R> {
    return this.inner.transaction((session) => work(this.losing ? this.wrap(session) : session));
  }

  read<R>(work: (session: StoreSession) => Promise<R>): Promise<R> {
    return this.inner.read(work);
  }

  private wrap(session: StoreSession): StoreSession {
    return {
      insert: <T extends TableName>(table: T, row: Row<T>) => session.insert(table, row),
      get: <T extends TableName>(table: T, id: string) => session.get(table, id),
      find: <T extends TableName>(table: T, filter?: Filter<Row<T>>, options?: FindOptions<Row<T>>) =>
        session.find(table, filter, options),
      count: <T extends TableName>(table: T, filter?: Filter<Row<T>>) => session.count(table, filter),
      update: async <T extends TableName>(table: T, id: string, patch: Partial<Row<T>>, expected?: Filter<Row<T>>) =>
        table === 'rights_requests' ? 0 : session.update(table, id, patch, expected),
      remove: <T extends TableName>(table: T, id: string) => session.remove(table, id),
      lockScope: (scopeKey: string) => {
        this.lockedScopes.push(scopeKey);
        return session.lockScope(scopeKey);
      },
    };
  }
}

describe('RightsRequestEngine', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  // ─── End to end ───

  describe('erasure happy path', () => {
    it('should run a request from creation to completion', async () => {
      const engine = ctx.rights.erasure;

      const request = unwrap(await engine.create(erasureRequest()));
      expect(request.status).toBe('RECEIVED');
      expect(request.receivedDate).toBe('2025-03-03');
      expect(request.dueDate).toBe('2025-04-02');
      expect(request.requestNumber).toBe('ERASE-20250303100000-0001');
      expect(request.subjectEmail).toBe('subject@example.org');

      const item = unwrap(await engine.addItem(request.id, erasureItem()));
      expect(item.status).toBe('PENDING');

      const approved = unwrap(
        await engine.reviewItem(item.id, { decision: 'APPROVED', reviewedBy: 'dpo' }),
      );
      expect(approved.status).toBe('APPROVED');
      expect(unwrap(await engine.getRequest(request.id)).status).toBe('UNDER_REVIEW');

      const executed = unwrap(
        await engine.applyItem(item.id, { appliedBy: 'dba', parameters: { method: 'ANONYMIZE' } }),
      );
      expect(executed.status).toBe('EXECUTED');
      expect(executed.outcome).toEqual({ method: 'ANONYMIZE' });
      expect(executed.verificationHash).toMatch(/^[0-9a-f]{64}$/);

      const completion = unwrap(await engine.completeRequest(request.id, { completedBy: 'dpo' }));
      expect(completion).toMatchObject({ alreadyCompleted: false, itemsExecuted: 1, itemsRejected: 0, itemsLifted: 0 });
      expect(completion.request.status).toBe('COMPLETED');
      expect(completion.request.completedAt).toBe('2025-03-03T10:00:00.000Z');

      const history = unwrap(await engine.getHistory(request.id));
      expect(history.map((entry) => entry.payload['action'])).toEqual([
        'REQUEST_CREATED',
        'ITEM_ADDED',
        'ITEM_REVIEWED',
        'ITEM_EXECUTED',
        'REQUEST_COMPLETED',
      ]);
      expect(unwrap(await engine.verifyHistory(request.id))).toMatchObject({ valid: true, totalEntries: 5 });
    });
  });

  describe('legal hold path', () => {
    it('should hold an item until the matching hold is released', async () => {
      const engine = ctx.rights.erasure;
      const categoryHold = unwrap(await ctx.holds.createHold(hold({ categories: ['HEALTH'] })));

      const request = unwrap(await engine.create(erasureRequest()));
      expect(request.status).toBe('RECEIVED');

      const item = unwrap(await engine.addItem(request.id, erasureItem()));
      expect(item.status).toBe('ON_HOLD');

      const blocked = await engine.reviewItem(item.id, { decision: 'APPROVED', reviewedBy: 'dpo' });
      expect(failure(blocked)).toEqual({
        code: 'LEGAL_HOLD',
        message: 'Item is on legal hold and cannot be reviewed',
      });

      unwrap(await ctx.holds.releaseHold(categoryHold.id, { reason: 'Litigation settled out of court', releasedBy: 'legal' }));
      expect(unwrap(await engine.getItem(item.id)).status).toBe('ON_HOLD');

      const approved = unwrap(await engine.reviewItem(item.id, { decision: 'APPROVED', reviewedBy: 'dpo' }));
      expect(approved.status).toBe('APPROVED');
    });

    it('should create the request in LEGAL_HOLD when the subject is held', async () => {
      const engine = ctx.rights.erasure;
      unwrap(await ctx.holds.createHold(hold({ subjects: ['subject-1'] })));

      const request = unwrap(await engine.create(erasureRequest()));
      expect(request.status).toBe('LEGAL_HOLD');

      const item = unwrap(await engine.addItem(request.id, erasureItem({ dataCategory: 'CONTACT' })));
      expect(item.status).toBe('ON_HOLD');

      expect(unwrap(await engine.getPendingRequests())).toEqual([]);
      const held = unwrap(await engine.getPendingRequests({ includeHeld: true }));
      expect(held.map((pending) => pending.id)).toEqual([request.id]);
    });

    it('should refuse to apply an item once a hold covers it', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));
      const item = unwrap(await engine.addItem(request.id, erasureItem()));
      unwrap(await engine.reviewItem(item.id, { decision: 'APPROVED', reviewedBy: 'dpo' }));
      const created = unwrap(await ctx.holds.createHold(hold({ categories: 'ALL' })));

      const result = await engine.applyItem(item.id, { appliedBy: 'dba', parameters: { method: 'DELETE' } });
      expect(failure(result)).toEqual({
        code: 'LEGAL_HOLD',
        message: `Item is covered by legal hold ${created.holdNumber}`,
      });
      expect(unwrap(await engine.getItem(item.id)).status).toBe('APPROVED');
    });

    it('should refuse completion while the subject is held', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));
      const created = unwrap(await ctx.holds.createHold(hold({ subjects: ['subject-1'] })));

      const result = await engine.completeRequest(request.id, { completedBy: 'dpo' });
      expect(failure(result)).toEqual({
        code: 'LEGAL_HOLD',
        message: `Subject is under legal hold ${created.holdNumber}`,
      });
    });
  });

  // ─── Creation ───

  describe('create', () => {
    it('should link each request into the creation chain', async () => {
      const engine = ctx.rights.erasure;
      const first = unwrap(await engine.create(erasureRequest()));
      const second = unwrap(await engine.create(erasureRequest({ subjectId: 'subject-2' })));

      expect(first.previousHash).toBe('GENESIS');
      expect(second.previousHash).toBe(first.hash);
      expect(unwrap(await engine.verifyCreationChain())).toMatchObject({ valid: true, totalEntries: 2 });
    });

    it('should reject unknown grounds', () => {
      expect(() =>
        ctx.rights.erasure.parseCreateInput({ ...erasureRequest(), details: { grounds: 'BORED' } }),
      ).toThrow(
        'grounds must be one of: NO_LONGER_NECESSARY, CONSENT_WITHDRAWN, OBJECTION, UNLAWFUL_PROCESSING, LEGAL_OBLIGATION, CHILD_DATA',
      );
    });

    it('should count the due date from an explicit received date', async () => {
      const request = unwrap(await ctx.rights.erasure.create(erasureRequest({ receivedDate: '2025-02-10' })));
      expect(request.dueDate).toBe('2025-03-12');
    });
  });

  // ─── Items ───

  describe('items', () => {
    it('should require a rejection reason of at least 10 characters', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));
      const item = unwrap(await engine.addItem(request.id, erasureItem()));

      const result = await engine.reviewItem(item.id, {
        decision: 'REJECTED',
        rejectionReason: 'no',
        reviewedBy: 'dpo',
      });
      expect(failure(result)).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'rejectionReason must be at least 10 characters',
      });
    });

    it('should require approval before applying', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));
      const item = unwrap(await engine.addItem(request.id, erasureItem()));

      const result = await engine.applyItem(item.id, { appliedBy: 'dba', parameters: { method: 'DELETE' } });
      expect(failure(result)).toEqual({
        code: 'STATE_ERROR',
        message: 'Item must be approved before applying (status PENDING)',
      });
    });

    it('should require an erasure method', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));
      const item = unwrap(await engine.addItem(request.id, erasureItem()));
      unwrap(await engine.reviewItem(item.id, { decision: 'APPROVED', reviewedBy: 'dpo' }));

      const result = await engine.applyItem(item.id, { appliedBy: 'dba' });
      expect(failure(result)).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'method must be one of: DELETE, ANONYMIZE, PSEUDONYMIZE',
      });
    });

    it('should refuse to lift erasure items', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));
      const item = unwrap(await engine.addItem(request.id, erasureItem()));

      const result = await engine.liftItem(item.id, { reason: 'Subject withdrew the request', liftedBy: 'dpo' });
      expect(failure(result)).toEqual({ code: 'STATE_ERROR', message: 'Erasure request items cannot be lifted' });
    });

    it('should refuse items on a completed request', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));
      unwrap(await engine.completeRequest(request.id, { completedBy: 'dpo' }));

      const result = await engine.addItem(request.id, erasureItem());
      expect(failure(result)).toEqual({ code: 'STATE_ERROR', message: 'Cannot add items to a completed request' });
    });

    it('should not find items through another kind', async () => {
      const request = unwrap(await ctx.rights.erasure.create(erasureRequest()));
      const item = unwrap(await ctx.rights.erasure.addItem(request.id, erasureItem()));

      const result = await ctx.rights.rectification.getItem(item.id);
      expect(failure(result)).toEqual({ code: 'NOT_FOUND', message: `Item not found: ${item.id}` });
    });
  });

  // ─── Completion ───

  describe('completeRequest', () => {
    it('should name pending items', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));
      unwrap(await engine.addItem(request.id, erasureItem()));
      unwrap(await engine.addItem(request.id, erasureItem({ recordId: 'visit-2' })));

      const result = await engine.completeRequest(request.id, { completedBy: 'dpo' });
      expect(failure(result)).toEqual({ code: 'STATE_ERROR', message: '2 items still pending review' });
    });

    it('should name approved items that were not executed', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));
      const item = unwrap(await engine.addItem(request.id, erasureItem()));
      unwrap(await engine.reviewItem(item.id, { decision: 'APPROVED', reviewedBy: 'dpo' }));

      const result = await engine.completeRequest(request.id, { completedBy: 'dpo' });
      expect(failure(result)).toEqual({ code: 'STATE_ERROR', message: '1 approved items not yet executed' });
    });

    it('should wait for required third-party notifications', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));
      const recipient = unwrap(
        await ctx.rights.thirdParties.addRecipient('erasure', request.id, {
          name: 'Central Lab',
          recipientType: 'PROCESSOR',
          addedBy: 'dpo',
        }),
      );

      const blocked = await engine.completeRequest(request.id, { completedBy: 'dpo' });
      expect(failure(blocked)).toEqual({ code: 'STATE_ERROR', message: '1 third party notifications pending' });

      unwrap(await ctx.rights.thirdParties.recordNotification('erasure', recipient.id, { method: 'EMAIL', notifiedBy: 'dpo' }));
      const completion = unwrap(await engine.completeRequest(request.id, { completedBy: 'dpo' }));
      expect(completion.request.status).toBe('COMPLETED');
    });

    it('should succeed without writing when already completed', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));
      unwrap(await engine.completeRequest(request.id, { completedBy: 'dpo' }));

      const again = unwrap(await engine.completeRequest(request.id, { completedBy: 'someone-else' }));
      expect(again.alreadyCompleted).toBe(true);
      expect(again.request.completedBy).toBe('dpo');
      const history = unwrap(await engine.getHistory(request.id));
      expect(history).toHaveLength(2);
    });

    it('should treat a lost status swap as a no-op success', async () => {
      const store = new LosingStore(new InMemoryStore());
      ctx = createTestContext({ store });
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));

      store.losing = true;
      const result = unwrap(await engine.completeRequest(request.id, { completedBy: 'dpo' }));
      store.losing = false;

      expect(result.alreadyCompleted).toBe(false);
      expect(result.request.status).toBe('RECEIVED');
      expect(result.request.completedAt).toBeNull();
      const history = unwrap(await engine.getHistory(request.id));
      expect(history.map((entry) => entry.payload['action'])).toEqual(['REQUEST_CREATED']);
    });

    it('should give up a lost status swap before locking the request chain', async () => {
      const store = new LosingStore(new InMemoryStore());
      ctx = createTestContext({ store });
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));

      store.losing = true;
      unwrap(await engine.completeRequest(request.id, { completedBy: 'dpo' }));
      unwrap(await engine.reject(request.id, { reason: 'Records are needed for legal claims', rejectedBy: 'dpo' }));
      const extended = await engine.extendDeadline(request.id, {
        days: 30,
        reason: 'Complex multi-site search',
        extendedBy: 'dpo',
      });
      store.losing = false;

      expect(failure(extended)).toEqual({
        code: 'STATE_ERROR',
        message: 'Request changed while the action was in progress',
      });
      expect(store.lockedScopes).toEqual([]);
    });

    it('should refuse to complete a rejected request', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));
      unwrap(await engine.reject(request.id, { reason: 'Records are needed for legal claims', rejectedBy: 'dpo' }));

      const result = await engine.completeRequest(request.id, { completedBy: 'dpo' });
      expect(failure(result)).toEqual({ code: 'STATE_ERROR', message: 'Cannot complete a rejected request' });
    });
  });

  // ─── Request numbers ───

  describe('request numbers', () => {
    it('should number every request distinctly within the same second', async () => {
      const engine = ctx.rights.erasure;

      const created = await Promise.all(
        Array.from({ length: 300 }, (_, i) => engine.create(erasureRequest({ subjectId: `subject-${i}` }))),
      );
      const requests = created.map((result) => unwrap(result));
      const numbers = requests.map((request) => request.requestNumber).sort();

      expect(new Set(numbers).size).toBe(300);
      expect(numbers[0]).toBe('ERASE-20250303100000-0001');
      expect(numbers[299]).toBe('ERASE-20250303100000-0300');
      for (const request of requests.slice(145, 155)) {
        expect(unwrap(await engine.getRequest(request.requestNumber)).id).toBe(request.id);
      }
    });

    it('should number each kind separately', async () => {
      const erasure = unwrap(await ctx.rights.erasure.create(erasureRequest()));
      const restriction = unwrap(
        await ctx.rights.restriction.create({
          subjectId: 'subject-1',
          subjectName: 'Test Subject',
          details: { grounds: 'ACCURACY_CONTESTED' },
          createdBy: 'dpo',
        }),
      );

      expect(erasure.requestNumber).toBe('ERASE-20250303100000-0001');
      expect(restriction.requestNumber).toBe('RESTRICT-20250303100000-0001');
    });
  });

  // ─── Deadlines ───

  describe('extendDeadline', () => {
    it('should extend once only', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));

      const extended = unwrap(
        await engine.extendDeadline(request.id, { days: 60, reason: 'Complex multi-site search', extendedBy: 'dpo' }),
      );
      expect(extended.extendedDueDate).toBe('2025-06-01');

      const again = await engine.extendDeadline(request.id, { days: 5, reason: 'Still searching', extendedBy: 'dpo' });
      expect(failure(again)).toEqual({ code: 'STATE_ERROR', message: 'Request has already been extended' });
    });

    it('should bound the extension to 60 days', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));

      const result = await engine.extendDeadline(request.id, { days: 61, reason: 'Complex search', extendedBy: 'dpo' });
      expect(failure(result)).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'days must be a whole number between 1 and 60',
      });
    });

    it('should order pending requests by effective due date and flag overdue ones', async () => {
      const engine = ctx.rights.erasure;
      const late = unwrap(await engine.create(erasureRequest({ receivedDate: '2025-01-01' })));
      const fresh = unwrap(await engine.create(erasureRequest({ subjectId: 'subject-2' })));

      const pending = unwrap(await engine.getPendingRequests());
      expect(pending.map((request) => request.id)).toEqual([late.id, fresh.id]);
      expect(pending[0]).toMatchObject({ effectiveDueDate: '2025-01-31', overdue: true, daysRemaining: -31 });
      expect(pending[1]).toMatchObject({ effectiveDueDate: '2025-04-02', overdue: false, daysRemaining: 30 });
    });
  });

  // ─── Rejection ───

  describe('reject and override', () => {
    it('should record a rejection exception', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));

      const rejected = unwrap(
        await engine.reject(request.id, {
          reason: 'Data needed for public health reporting',
          rejectedBy: 'dpo',
          exception: 'PUBLIC_HEALTH',
        }),
      );
      expect(rejected).toMatchObject({
        status: 'REJECTED',
        decision: 'REJECTED',
        rejectionException: 'PUBLIC_HEALTH',
        completedAt: null,
      });
    });

    it('should refuse a rejection exception for kinds that have none', async () => {
      const request = unwrap(
        await ctx.rights.rectification.create({
          ...erasureRequest(),
          details: { requestType: 'CORRECTION' },
        }),
      );
      const result = await ctx.rights.rectification.reject(request.id, {
        reason: 'Recorded value was verified at source',
        rejectedBy: 'dpo',
        exception: 'PUBLIC_HEALTH',
      });
      expect(failure(result)).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Rectification requests take no rejection exception',
      });
    });

    it('should refuse to override an erasure request', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest()));

      const result = await engine.override(request.id, {
        compellingGrounds: 'x'.repeat(60),
        overriddenBy: 'dpo',
      });
      expect(failure(result)).toEqual({ code: 'STATE_ERROR', message: 'Erasure requests cannot be overridden' });
    });
  });

  // ─── Statistics ───

  describe('getStatistics', () => {
    it('should count requests and items by status', async () => {
      const engine = ctx.rights.erasure;
      const request = unwrap(await engine.create(erasureRequest({ receivedDate: '2025-01-01' })));
      unwrap(await engine.addItem(request.id, erasureItem()));
      const other = unwrap(await engine.create(erasureRequest({ subjectId: 'subject-2' })));
      unwrap(await engine.extendDeadline(other.id, { days: 10, reason: 'Complex search', extendedBy: 'dpo' }));

      const stats = unwrap(await engine.getStatistics());
      expect(stats).toEqual({
        total: 2,
        byStatus: { RECEIVED: 2, LEGAL_HOLD: 0, UNDER_REVIEW: 0, COMPLETED: 0, REJECTED: 0 },
        itemsByStatus: { PENDING: 1, ON_HOLD: 0, APPROVED: 0, REJECTED: 0, APPLIED: 0, EXECUTED: 0, LIFTED: 0 },
        overdue: 1,
        extended: 1,
      });
    });
  });
});
