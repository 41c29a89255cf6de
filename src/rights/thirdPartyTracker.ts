/**
 * Third-Party Notification Tracker
 *
 * Records which downstream recipients of a subject's data were told about
 * a rights request, and when they confirmed. A request cannot complete
 * while a recipient that requires notification has not been notified.
 * Every action is chained onto the owning request's history.
 *
 * @module rights/thirdPartyTracker
 */

import { v4 as uuidv4 } from 'uuid';
import type { HashChainLedger } from '../ledger/hashChainLedger.js';
import { createLogger, silentOutput, type Logger } from '../logging/logger.js';
import type { RightsRequestRow, Store, StoreSession, ThirdPartyRecipientRow } from '../store/types.js';
import type { EngineDependencies } from '../types/dependencies.js';
import { systemClock, type Clock } from '../utils/dates.js';
import { NotFoundError, StateError, ValidationError } from '../utils/errors.js';
import type { JsonObject } from '../utils/json.js';
import { toResult, type Result } from '../utils/responses.js';
import { optionalText, requireOneOf, requireRecord, requireText } from '../utils/validation.js';
import { requestChain } from './chains.js';
import { REQUEST_KINDS, TERMINAL_REQUEST_STATUSES, type RequestKind } from './types.js';

export const RECIPIENT_TYPES = ['PROCESSOR', 'CONTROLLER', 'THIRD_PARTY', 'REGULATOR'] as const;

export type RecipientType = (typeof RECIPIENT_TYPES)[number];

export const NOTIFICATION_METHODS = ['EMAIL', 'API', 'POSTAL', 'MANUAL'] as const;

export type NotificationMethod = (typeof NOTIFICATION_METHODS)[number];

export interface ThirdPartyRecipient {
  id: string;
  requestId: string;
  kind: RequestKind;
  name: string;
  recipientType: RecipientType;
  contact: string | null;
  dataShared: string | null;
  notificationRequired: boolean;
  method: NotificationMethod | null;
  notifiedAt: string | null;
  notifiedBy: string | null;
  confirmedAt: string | null;
  confirmedBy: string | null;
  createdAt: string;
}

export interface AddRecipientInput {
  name: string;
  recipientType: RecipientType;
  contact?: string;
  dataShared?: string;
  /** Defaults to true. */
  notificationRequired?: boolean;
  addedBy: string;
}

export interface RecordNotificationInput {
  method: NotificationMethod;
  notifiedBy: string;
}

export interface RecordConfirmationInput {
  confirmedBy: string;
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

export function parseAddRecipientInput(value: unknown): AddRecipientInput {
  const body = requireRecord(value, 'recipient');
  const required = body['notificationRequired'] ?? true;
  if (typeof required !== 'boolean') {
    throw new ValidationError('notificationRequired must be a boolean');
  }
  return {
    name: requireText(body['name'], 'name'),
    recipientType: requireOneOf(body['recipientType'], RECIPIENT_TYPES, 'recipientType'),
    contact: optionalText(body['contact'], 'contact') ?? undefined,
    dataShared: optionalText(body['dataShared'], 'dataShared') ?? undefined,
    notificationRequired: required,
    addedBy: requireText(body['addedBy'], 'addedBy'),
  };
}

export function parseRecordNotificationInput(value: unknown): RecordNotificationInput {
  const body = requireRecord(value, 'notification');
  return {
    method: requireOneOf(body['method'], NOTIFICATION_METHODS, 'method'),
    notifiedBy: requireText(body['notifiedBy'], 'notifiedBy'),
  };
}

export function parseRecordConfirmationInput(value: unknown): RecordConfirmationInput {
  const body = requireRecord(value, 'confirmation');
  return { confirmedBy: requireText(body['confirmedBy'], 'confirmedBy') };
}

export function mapRowToRecipient(row: ThirdPartyRecipientRow): ThirdPartyRecipient {
  return {
    ...row,
    kind: requireOneOf(row.kind, REQUEST_KINDS, 'kind'),
    recipientType: requireOneOf(row.recipientType, RECIPIENT_TYPES, 'recipientType'),
    method: row.method === null ? null : requireOneOf(row.method, NOTIFICATION_METHODS, 'method'),
  };
}

/** Required recipients not yet notified, counted inside a unit of work. */
export function countPendingNotifications(session: StoreSession, requestId: string): Promise<number> {
  return session.count('third_party_recipients', { requestId, notificationRequired: true, notifiedAt: null });
}

// ─── Tracker ─────────────────────────────────────────────────────────────────

export class ThirdPartyTracker {
  private readonly store: Store;
  private readonly ledger: HashChainLedger;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: EngineDependencies) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.clock = deps.clock ?? systemClock;
    this.logger = (deps.logger ?? createLogger({ output: silentOutput })).child({ component: 'third-party' });
  }

  async addRecipient(
    kind: RequestKind,
    requestId: string,
    input: AddRecipientInput,
  ): Promise<Result<ThirdPartyRecipient>> {
    return toResult(this.logger, 'addRecipient', async () => {
      const recipient = parseAddRecipientInput(input);
      const createdAt = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const request = await session.get('rights_requests', requestId);
        if (!request || request.kind !== kind) throw new NotFoundError(`${kind} request`, requestId);
        if (TERMINAL_REQUEST_STATUSES.some((status) => status === request.status)) {
          throw new StateError(`Cannot add recipients to a ${request.status.toLowerCase()} request`);
        }

        const id = uuidv4();
        await this.appendAction(session, request, 'RECIPIENT_ADDED', recipient.addedBy, createdAt, {
          recipientId: id,
          name: recipient.name,
          recipientType: recipient.recipientType,
          notificationRequired: recipient.notificationRequired ?? true,
        });
        return session.insert('third_party_recipients', {
          id,
          requestId,
          kind,
          name: recipient.name,
          recipientType: recipient.recipientType,
          contact: recipient.contact ?? null,
          dataShared: recipient.dataShared ?? null,
          notificationRequired: recipient.notificationRequired ?? true,
          method: null,
          notifiedAt: null,
          notifiedBy: null,
          confirmedAt: null,
          confirmedBy: null,
          createdAt,
        });
      });

      return mapRowToRecipient(row);
    });
  }

  async recordNotification(
    kind: RequestKind,
    recipientId: string,
    input: RecordNotificationInput,
  ): Promise<Result<ThirdPartyRecipient>> {
    return toResult(this.logger, 'recordNotification', async () => {
      const notification = parseRecordNotificationInput(input);
      const notifiedAt = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const { recipient, request } = await this.load(session, kind, recipientId, 'notify recipients of');
        if (recipient.notifiedAt !== null) throw new StateError('Notification already sent');

        const patch = { method: notification.method, notifiedAt, notifiedBy: notification.notifiedBy };
        const written = await session.update('third_party_recipients', recipientId, patch, { notifiedAt: null });
        if (written === 0) throw new StateError('Notification already sent');
        await this.appendAction(session, request, 'RECIPIENT_NOTIFIED', notification.notifiedBy, notifiedAt, {
          recipientId,
          method: notification.method,
        });
        return { ...recipient, ...patch };
      });

      this.logger.info('Third party notified', { recipientId, method: notification.method });
      return mapRowToRecipient(row);
    });
  }

  async recordConfirmation(
    kind: RequestKind,
    recipientId: string,
    input: RecordConfirmationInput,
  ): Promise<Result<ThirdPartyRecipient>> {
    return toResult(this.logger, 'recordConfirmation', async () => {
      const confirmation = parseRecordConfirmationInput(input);
      const confirmedAt = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const { recipient, request } = await this.load(session, kind, recipientId, 'confirm recipients of');
        if (recipient.notifiedAt === null) throw new StateError('Must send notification first');
        if (recipient.confirmedAt !== null) throw new StateError('Receipt already confirmed');

        const patch = { confirmedAt, confirmedBy: confirmation.confirmedBy };
        const written = await session.update('third_party_recipients', recipientId, patch, { confirmedAt: null });
        if (written === 0) throw new StateError('Receipt already confirmed');
        await this.appendAction(session, request, 'RECIPIENT_CONFIRMED', confirmation.confirmedBy, confirmedAt, {
          recipientId,
        });
        return { ...recipient, ...patch };
      });

      return mapRowToRecipient(row);
    });
  }

  async getRecipients(requestId: string): Promise<Result<ThirdPartyRecipient[]>> {
    return toResult(this.logger, 'getRecipients', async () => {
      const rows = await this.store.read((session) =>
        session.find('third_party_recipients', { requestId }, { orderBy: 'createdAt' }),
      );
      return rows.map(mapRowToRecipient);
    });
  }

  async countPending(requestId: string): Promise<Result<number>> {
    return toResult(this.logger, 'countPendingNotifications', () =>
      this.store.read((session) => countPendingNotifications(session, requestId)),
    );
  }

  /** Recipient of a `kind` request that is still open. */
  private async load(
    session: StoreSession,
    kind: RequestKind,
    recipientId: string,
    verb: string,
  ): Promise<{ recipient: ThirdPartyRecipientRow; request: RightsRequestRow }> {
    const recipient = await session.get('third_party_recipients', recipientId);
    if (!recipient || recipient.kind !== kind) throw new NotFoundError('Recipient', recipientId);
    const request = await session.get('rights_requests', recipient.requestId);
    if (!request) throw new NotFoundError(`${kind} request`, recipient.requestId);
    if (TERMINAL_REQUEST_STATUSES.some((status) => status === request.status)) {
      throw new StateError(`Cannot ${verb} a ${request.status.toLowerCase()} request`);
    }
    return { recipient, request };
  }

  private async appendAction(
    session: StoreSession,
    request: RightsRequestRow,
    action: string,
    performedBy: string,
    performedAt: string,
    details: JsonObject,
  ): Promise<void> {
    const kind = requireOneOf(request.kind, REQUEST_KINDS, 'kind');
    await this.ledger.append(session, requestChain(kind, request.id), {
      action,
      requestId: request.id,
      performedBy,
      performedAt,
      details,
    });
  }
}
