import { describe, it, expect, beforeEach } from 'vitest';
import { createTestContext, failure, unwrap, type TestContext } from '../test/setup.js';
import { parseAddRecipientInput } from './thirdPartyTracker.js';

describe('ThirdPartyTracker', () => {
  let ctx: TestContext;
  let requestId: string;

  beforeEach(async () => {
    ctx = createTestContext();
    const request = unwrap(
      await ctx.rights.erasure.create({
        subjectId: 'subject-1',
        subjectName: 'Test Subject',
        details: { grounds: 'NO_LONGER_NECESSARY' },
        createdBy: 'privacy-officer',
      }),
    );
    requestId = request.id;
  });

  describe('parseAddRecipientInput', () => {
    it('should default notificationRequired to true', () => {
      const input = parseAddRecipientInput({ name: 'Central Lab', recipientType: 'PROCESSOR', addedBy: 'dpo' });
      expect(input.notificationRequired).toBe(true);
    });

    it('should reject a non-boolean notificationRequired', () => {
      expect(() =>
        parseAddRecipientInput({
          name: 'Central Lab',
          recipientType: 'PROCESSOR',
          notificationRequired: 'yes',
          addedBy: 'dpo',
        }),
      ).toThrow('notificationRequired must be a boolean');
    });
  });

  it('should walk a recipient through notification and confirmation', async () => {
    const tracker = ctx.rights.thirdParties;
    const recipient = unwrap(
      await tracker.addRecipient('erasure', requestId, {
        name: 'Central Lab',
        recipientType: 'PROCESSOR',
        contact: 'privacy@lab.test',
        addedBy: 'dpo',
      }),
    );
    expect(unwrap(await tracker.countPending(requestId))).toBe(1);

    const early = await tracker.recordConfirmation('erasure', recipient.id, { confirmedBy: 'dpo' });
    expect(failure(early)).toEqual({ code: 'STATE_ERROR', message: 'Must send notification first' });

    const notified = unwrap(await tracker.recordNotification('erasure', recipient.id, { method: 'API', notifiedBy: 'dpo' }));
    expect(notified).toMatchObject({ method: 'API', notifiedAt: '2025-03-03T10:00:00.000Z', notifiedBy: 'dpo' });
    expect(unwrap(await tracker.countPending(requestId))).toBe(0);

    const twice = await tracker.recordNotification('erasure', recipient.id, { method: 'EMAIL', notifiedBy: 'dpo' });
    expect(failure(twice)).toEqual({ code: 'STATE_ERROR', message: 'Notification already sent' });

    unwrap(await tracker.recordConfirmation('erasure', recipient.id, { confirmedBy: 'lab-contact' }));
    const again = await tracker.recordConfirmation('erasure', recipient.id, { confirmedBy: 'lab-contact' });
    expect(failure(again)).toEqual({ code: 'STATE_ERROR', message: 'Receipt already confirmed' });

    const history = unwrap(await ctx.rights.erasure.getHistory(requestId));
    expect(history.map((entry) => entry.payload['action'])).toEqual([
      'REQUEST_CREATED',
      'RECIPIENT_ADDED',
      'RECIPIENT_NOTIFIED',
      'RECIPIENT_CONFIRMED',
    ]);
  });

  it('should not count recipients that need no notification', async () => {
    const tracker = ctx.rights.thirdParties;
    unwrap(
      await tracker.addRecipient('erasure', requestId, {
        name: 'Archive',
        recipientType: 'CONTROLLER',
        notificationRequired: false,
        addedBy: 'dpo',
      }),
    );
    expect(unwrap(await tracker.countPending(requestId))).toBe(0);
    expect(unwrap(await tracker.getRecipients(requestId))).toHaveLength(1);
  });

  it('should not find a request under another kind', async () => {
    const result = await ctx.rights.thirdParties.addRecipient('restriction', requestId, {
      name: 'Central Lab',
      recipientType: 'PROCESSOR',
      addedBy: 'dpo',
    });
    expect(failure(result)).toEqual({ code: 'NOT_FOUND', message: `restriction request not found: ${requestId}` });
  });

  it('should refuse recipients on a completed request', async () => {
    unwrap(await ctx.rights.erasure.completeRequest(requestId, { completedBy: 'dpo' }));

    const result = await ctx.rights.thirdParties.addRecipient('erasure', requestId, {
      name: 'Central Lab',
      recipientType: 'PROCESSOR',
      addedBy: 'dpo',
    });
    expect(failure(result)).toEqual({ code: 'STATE_ERROR', message: 'Cannot add recipients to a completed request' });
  });

  describe('recipient updates', () => {
    let recipientId: string;

    beforeEach(async () => {
      const recipient = unwrap(
        await ctx.rights.thirdParties.addRecipient('erasure', requestId, {
          name: 'Central Lab',
          recipientType: 'PROCESSOR',
          addedBy: 'dpo',
        }),
      );
      recipientId = recipient.id;
    });

    it('should not find a recipient under another kind', async () => {
      const tracker = ctx.rights.thirdParties;

      const notified = await tracker.recordNotification('restriction', recipientId, {
        method: 'EMAIL',
        notifiedBy: 'dpo',
      });
      const confirmed = await tracker.recordConfirmation('portability', recipientId, { confirmedBy: 'dpo' });

      expect(failure(notified)).toEqual({ code: 'NOT_FOUND', message: `Recipient not found: ${recipientId}` });
      expect(failure(confirmed)).toEqual({ code: 'NOT_FOUND', message: `Recipient not found: ${recipientId}` });
      expect(unwrap(await tracker.countPending(requestId))).toBe(1);
    });

    it('should refuse to notify recipients of a rejected request', async () => {
      unwrap(
        await ctx.rights.erasure.reject(requestId, {
          reason: 'Records are needed for an ongoing clinical trial audit',
          rejectedBy: 'dpo',
        }),
      );

      const result = await ctx.rights.thirdParties.recordNotification('erasure', recipientId, {
        method: 'EMAIL',
        notifiedBy: 'dpo',
      });

      expect(failure(result)).toEqual({
        code: 'STATE_ERROR',
        message: 'Cannot notify recipients of a rejected request',
      });
      const history = unwrap(await ctx.rights.erasure.getHistory(requestId));
      expect(history.map((entry) => entry.payload['action'])).not.toContain('RECIPIENT_NOTIFIED');
    });

    it('should refuse to confirm recipients of a completed request', async () => {
      const tracker = ctx.rights.thirdParties;
      unwrap(await tracker.recordNotification('erasure', recipientId, { method: 'EMAIL', notifiedBy: 'dpo' }));
      unwrap(await ctx.rights.erasure.completeRequest(requestId, { completedBy: 'dpo' }));

      const result = await tracker.recordConfirmation('erasure', recipientId, { confirmedBy: 'lab-contact' });

      expect(failure(result)).toEqual({
        code: 'STATE_ERROR',
        message: 'Cannot confirm recipients of a completed request',
      });
    });
  });
});
