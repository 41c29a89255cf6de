/**
 * Legal Hold Registry
 *
 * Tracks administrative holds scoped by subject and data category and
 * answers hold checks. The registry never blocks anything itself; every
 * engine asks it, inside its own unit of work, before a destructive
 * transition.
 *
 * A hold matches a query when its subject dimension matches (ALL or a
 * listed id) or its category dimension matches (ALL or a listed category).
 * Dimensions are never AND-combined. A hold that constrains neither
 * dimension matches everything.
 *
 * @module holds/legalHoldRegistry
 */

import { v4 as uuidv4 } from 'uuid';
import type { HashChainLedger } from '../ledger/hashChainLedger.js';
import type { ChainVerification, HistoryEntry } from '../ledger/types.js';
import { createLogger, silentOutput, type Logger } from '../logging/logger.js';
import type { LegalHoldRow, Store, StoreSession } from '../store/types.js';
import type { EngineDependencies } from '../types/dependencies.js';
import { DATA_CATEGORIES, type DataCategory } from '../types/vocabulary.js';
import { systemClock, type Clock } from '../utils/dates.js';
import { NotFoundError, StateError, ValidationError } from '../utils/errors.js';
import type { JsonValue } from '../utils/json.js';
import { toResult, type Result } from '../utils/responses.js';
import { sequenceCode } from '../utils/sequenceCodes.js';
import { requireMinLength, requireOneOf, requireRecord, requireText } from '../utils/validation.js';
import {
  HOLD_REASON_MIN_LENGTH,
  HOLD_TYPES,
  type CreateHoldInput,
  type HoldCheck,
  type HoldDimension,
  type HoldQuery,
  type HoldStatistics,
  type HoldType,
  type LegalHold,
  type ReleaseHoldInput,
} from './types.js';

/** Scope key of the chain holding every hold creation and release. */
export const HOLD_CHAIN = 'holds';

// ─── Matching ────────────────────────────────────────────────────────────────

function dimensionMatches(dimension: HoldDimension | null, value: string | undefined): boolean {
  if (dimension === 'ALL') return true;
  if (dimension === null || value === undefined) return false;
  return dimension.includes(value);
}

export interface HoldScope {
  subjects: HoldDimension | null;
  categories: HoldDimension | null;
}

export function holdMatches(hold: HoldScope, query: HoldQuery): boolean {
  if (hold.subjects === null && hold.categories === null) return true;
  return dimensionMatches(hold.subjects, query.subjectId) || dimensionMatches(hold.categories, query.category);
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

function parseDimension<T extends string>(
  value: unknown,
  field: string,
  parseMember: (member: unknown) => T,
): HoldDimension<T> | undefined {
  if (value === undefined || value === null) return undefined;
  if (value === 'ALL') return 'ALL';
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError(`${field} must be ALL or a non-empty list`);
  }
  if (value.includes('ALL')) return 'ALL';
  return Array.from(new Set(value.map(parseMember)));
}

const parseSubject = (member: unknown): string => requireText(member, 'subjects');
const parseCategory = (member: unknown): DataCategory => requireOneOf(member, DATA_CATEGORIES, 'categories');

export function parseCreateHoldInput(value: unknown): CreateHoldInput {
  const body = requireRecord(value, 'hold');
  return {
    subjects: parseDimension(body['subjects'], 'subjects', parseSubject),
    categories: parseDimension(body['categories'], 'categories', parseCategory),
    holdType: requireOneOf(body['holdType'], HOLD_TYPES, 'holdType'),
    reason: requireMinLength(body['reason'], 'reason', HOLD_REASON_MIN_LENGTH),
    legalBasis: requireText(body['legalBasis'], 'legalBasis'),
    createdBy: requireText(body['createdBy'], 'createdBy'),
  };
}

export function parseReleaseHoldInput(value: unknown): ReleaseHoldInput {
  const body = requireRecord(value, 'release');
  return {
    reason: requireMinLength(body['reason'], 'reason', HOLD_REASON_MIN_LENGTH),
    releasedBy: requireText(body['releasedBy'], 'releasedBy'),
  };
}

// ─── Row mapping ─────────────────────────────────────────────────────────────

function dimensionFromRow<T extends string>(
  all: boolean,
  values: readonly string[],
  parseMember: (member: unknown) => T,
): HoldDimension<T> | null {
  if (all) return 'ALL';
  return values.length > 0 ? values.map(parseMember) : null;
}

function dimensionToJson(dimension: HoldDimension | undefined): JsonValue {
  if (dimension === undefined) return null;
  return dimension === 'ALL' ? 'ALL' : [...dimension];
}

export function mapRowToHold(row: LegalHoldRow): LegalHold {
  return {
    id: row.id,
    holdNumber: row.holdNumber,
    holdType: requireOneOf(row.holdType, HOLD_TYPES, 'holdType'),
    subjects: dimensionFromRow(row.allSubjects, row.subjects, parseSubject),
    categories: dimensionFromRow(row.allCategories, row.categories, parseCategory),
    reason: row.reason,
    legalBasis: row.legalBasis,
    isActive: row.isActive,
    createdBy: row.createdBy,
    createdAt: row.createdAt,
    releasedBy: row.releasedBy,
    releasedAt: row.releasedAt,
    releaseReason: row.releaseReason,
    hash: row.hash,
    previousHash: row.previousHash,
  };
}

// ─── Registry ────────────────────────────────────────────────────────────────

export class LegalHoldRegistry {
  private readonly store: Store;
  private readonly ledger: HashChainLedger;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: EngineDependencies) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.clock = deps.clock ?? systemClock;
    this.logger = (deps.logger ?? createLogger({ output: silentOutput })).child({ component: 'holds' });
  }

  async createHold(input: CreateHoldInput): Promise<Result<LegalHold>> {
    return toResult(this.logger, 'createHold', async () => {
      const hold = parseCreateHoldInput(input);
      const now = this.clock();
      const id = uuidv4();
      const createdAt = now.toISOString();

      const row = await this.store.transaction(async (session) => {
        const serial = (await this.ledger.nextSequence(session, HOLD_CHAIN)) + 1;
        const holdNumber = sequenceCode('HOLD', now, serial);
        const link = await this.ledger.append(session, HOLD_CHAIN, {
          action: 'HOLD_CREATED',
          holdId: id,
          holdNumber,
          holdType: hold.holdType,
          subjects: dimensionToJson(hold.subjects),
          categories: dimensionToJson(hold.categories),
          reason: hold.reason,
          legalBasis: hold.legalBasis,
          performedBy: hold.createdBy,
          performedAt: createdAt,
        });
        return session.insert('legal_holds', {
          id,
          holdNumber,
          holdType: hold.holdType,
          allSubjects: hold.subjects === 'ALL',
          subjects: hold.subjects === 'ALL' || hold.subjects === undefined ? [] : [...hold.subjects],
          allCategories: hold.categories === 'ALL',
          categories: hold.categories === 'ALL' || hold.categories === undefined ? [] : [...hold.categories],
          reason: hold.reason,
          legalBasis: hold.legalBasis,
          isActive: true,
          createdBy: hold.createdBy,
          createdAt,
          releasedBy: null,
          releasedAt: null,
          releaseReason: null,
          hash: link.hash,
          previousHash: link.previousHash,
        });
      });

      this.logger.info('Legal hold created', { holdNumber: row.holdNumber, holdType: hold.holdType, actor: hold.createdBy });
      return mapRowToHold(row);
    });
  }

  /** Mark a hold inactive. Its rows and chain entries stay. */
  async releaseHold(holdId: string, input: ReleaseHoldInput): Promise<Result<LegalHold>> {
    return toResult(this.logger, 'releaseHold', async () => {
      const release = parseReleaseHoldInput(input);
      const releasedAt = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const hold = await session.get('legal_holds', holdId);
        if (!hold) throw new NotFoundError('Hold', holdId);
        if (!hold.isActive) throw new StateError('Hold is already released');

        const patch = {
          isActive: false,
          releasedBy: release.releasedBy,
          releasedAt,
          releaseReason: release.reason,
        };
        const written = await session.update('legal_holds', holdId, patch, { isActive: true });
        if (written === 0) throw new StateError('Hold is already released');
        await this.ledger.append(session, HOLD_CHAIN, {
          action: 'HOLD_RELEASED',
          holdId,
          holdNumber: hold.holdNumber,
          reason: release.reason,
          performedBy: release.releasedBy,
          performedAt: releasedAt,
        });
        return { ...hold, ...patch };
      });

      this.logger.info('Legal hold released', { holdNumber: row.holdNumber, actor: release.releasedBy });
      return mapRowToHold(row);
    });
  }

  async check(query: HoldQuery = {}): Promise<Result<HoldCheck>> {
    return toResult(this.logger, 'checkHold', () =>
      this.store.read((session) => this.checkWithin(session, query)),
    );
  }

  /** Hold check inside an engine's unit of work. */
  async checkWithin(session: StoreSession, query: HoldQuery): Promise<HoldCheck> {
    const active = await session.find('legal_holds', { isActive: true }, { orderBy: 'createdAt' });
    const matchingHolds = active.map(mapRowToHold).filter((hold) => holdMatches(hold, query));
    return { isHeld: matchingHolds.length > 0, matchingHolds };
  }

  async getHold(holdId: string): Promise<Result<LegalHold>> {
    return toResult(this.logger, 'getHold', async () => {
      const row = await this.store.read((session) => session.get('legal_holds', holdId));
      if (!row) throw new NotFoundError('Hold', holdId);
      return mapRowToHold(row);
    });
  }

  async getActiveHolds(): Promise<Result<LegalHold[]>> {
    return toResult(this.logger, 'getActiveHolds', async () => {
      const rows = await this.store.read((session) =>
        session.find('legal_holds', { isActive: true }, { orderBy: 'createdAt' }),
      );
      return rows.map(mapRowToHold);
    });
  }

  /** Chain entries for every hold, or for one hold when `holdId` is given. */
  async getHoldHistory(holdId?: string): Promise<Result<HistoryEntry[]>> {
    return toResult(this.logger, 'getHoldHistory', async () => {
      const entries = await this.ledger.history(HOLD_CHAIN);
      return holdId === undefined ? entries : entries.filter((entry) => entry.payload['holdId'] === holdId);
    });
  }

  async getStatistics(): Promise<Result<HoldStatistics>> {
    return toResult(this.logger, 'getHoldStatistics', async () => {
      const rows = await this.store.read((session) => session.find('legal_holds'));
      const activeByType: Record<HoldType, number> = {
        REGULATORY: 0,
        LITIGATION: 0,
        AUDIT: 0,
        INVESTIGATION: 0,
        OTHER: 0,
      };
      let active = 0;
      for (const hold of rows.map(mapRowToHold)) {
        if (!hold.isActive) continue;
        active += 1;
        activeByType[hold.holdType] += 1;
      }
      return { total: rows.length, active, released: rows.length - active, activeByType };
    });
  }

  async verifyChain(): Promise<Result<ChainVerification>> {
    return toResult(this.logger, 'verifyHoldChain', () => this.ledger.verify(HOLD_CHAIN));
  }
}
