/**
 * Marketing opt-out register.
 *
 * Upheld objections to direct marketing or marketing profiling opt the
 * subject out of every channel. Each change is chained under
 * `marketing:<subjectId>`.
 *
 * @module rights/marketingPreferences
 */

import { v4 as uuidv4 } from 'uuid';
import type { HashChainLedger } from '../ledger/hashChainLedger.js';
import type { HistoryEntry } from '../ledger/types.js';
import { createLogger, silentOutput, type Logger } from '../logging/logger.js';
import type { MarketingPreferenceRow, Store, StoreSession } from '../store/types.js';
import type { EngineDependencies } from '../types/dependencies.js';
import { systemClock, type Clock } from '../utils/dates.js';
import { toResult, type Result } from '../utils/responses.js';
import { optionalOneOf, requireOneOf, requireRecord, requireText } from '../utils/validation.js';
import { marketingChain } from './chains.js';

export const MARKETING_CHANNELS = ['EMAIL', 'SMS', 'PHONE', 'POST', 'PUSH', 'SOCIAL'] as const;

export type MarketingChannel = (typeof MARKETING_CHANNELS)[number];

export type ChannelSelection = MarketingChannel | 'ALL';

const CHANNEL_SELECTIONS: readonly ChannelSelection[] = [...MARKETING_CHANNELS, 'ALL'];

export interface MarketingPreference {
  subjectId: string;
  channel: MarketingChannel;
  optedOut: boolean;
  /** Request number or other reference that caused the change. */
  source: string;
  updatedAt: string;
}

export interface OptOutInput {
  channel: ChannelSelection;
  source: string;
  performedBy: string;
}

export interface MarketingStatus {
  subjectId: string;
  /** True when every queried channel is opted out. */
  optedOut: boolean;
  preferences: MarketingPreference[];
}

export function parseOptOutInput(value: unknown): OptOutInput {
  const body = requireRecord(value, 'optOut');
  return {
    channel: requireOneOf(body['channel'], CHANNEL_SELECTIONS, 'channel'),
    source: requireText(body['source'], 'source'),
    performedBy: requireText(body['performedBy'], 'performedBy'),
  };
}

function mapRowToPreference(row: MarketingPreferenceRow): MarketingPreference {
  return {
    subjectId: row.subjectId,
    channel: requireOneOf(row.channel, MARKETING_CHANNELS, 'channel'),
    optedOut: row.optedOut,
    source: row.source,
    updatedAt: row.updatedAt,
  };
}

export class MarketingPreferences {
  private readonly store: Store;
  private readonly ledger: HashChainLedger;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(deps: EngineDependencies) {
    this.store = deps.store;
    this.ledger = deps.ledger;
    this.clock = deps.clock ?? systemClock;
    this.logger = (deps.logger ?? createLogger({ output: silentOutput })).child({ component: 'marketing' });
  }

  async optOut(subjectId: string, input: OptOutInput): Promise<Result<MarketingPreference[]>> {
    return toResult(this.logger, 'optOutMarketing', async () => {
      requireText(subjectId, 'subjectId');
      const optOut = parseOptOutInput(input);
      return this.store.transaction((session) => this.optOutWithin(session, subjectId, optOut));
    });
  }

  /** Opt a subject out inside an engine's unit of work. */
  async optOutWithin(session: StoreSession, subjectId: string, input: OptOutInput): Promise<MarketingPreference[]> {
    const channels = input.channel === 'ALL' ? [...MARKETING_CHANNELS] : [input.channel];
    const updatedAt = this.clock().toISOString();

    await this.ledger.append(session, marketingChain(subjectId), {
      action: 'MARKETING_OPT_OUT',
      subjectId,
      channels,
      source: input.source,
      performedBy: input.performedBy,
      performedAt: updatedAt,
    });

    const preferences: MarketingPreference[] = [];
    for (const channel of channels) {
      const [existing] = await session.find('marketing_preferences', { subjectId, channel }, { limit: 1 });
      const row: MarketingPreferenceRow = {
        id: existing?.id ?? uuidv4(),
        subjectId,
        channel,
        optedOut: true,
        source: input.source,
        updatedAt,
      };
      if (existing) {
        await session.update('marketing_preferences', existing.id, row);
      } else {
        await session.insert('marketing_preferences', row);
      }
      preferences.push(mapRowToPreference(row));
    }

    this.logger.info('Marketing opt-out recorded', { subjectId, channels: channels.length, source: input.source });
    return preferences;
  }

  /** Opt-out status for one channel, or for every channel when none is given. */
  async check(subjectId: string, channel?: MarketingChannel): Promise<Result<MarketingStatus>> {
    return toResult(this.logger, 'checkMarketingPreference', async () => {
      const selected = optionalOneOf(channel, MARKETING_CHANNELS, 'channel');
      const rows = await this.store.read((session) =>
        session.find(
          'marketing_preferences',
          selected === null ? { subjectId } : { subjectId, channel: selected },
          { orderBy: 'channel' },
        ),
      );
      const preferences = rows.map(mapRowToPreference);
      const expected = selected === null ? MARKETING_CHANNELS.length : 1;
      const optedOut = preferences.filter((preference) => preference.optedOut).length === expected;
      return { subjectId, optedOut, preferences };
    });
  }

  async getHistory(subjectId: string): Promise<Result<HistoryEntry[]>> {
    return toResult(this.logger, 'getMarketingHistory', () => this.ledger.history(marketingChain(subjectId)));
  }
}
