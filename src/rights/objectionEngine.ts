/**
 * Objection workflow: the generic engine plus the uphold decision.
 *
 * @module rights/objectionEngine
 */

import { toResult, type Result } from '../utils/responses.js';
import { optionalText, requireRecord, requireText } from '../utils/validation.js';
import { LegalHoldError, StateError } from '../utils/errors.js';
import {
  MARKETING_OBJECTION_TYPES,
  objectionKind,
  type ObjectionItemDetails,
  type ObjectionRequestDetails,
} from './kinds/objection.js';
import { MarketingPreferences } from './marketingPreferences.js';
import { RightsRequestEngine, type RightsEngineDependencies } from './rightsRequestEngine.js';
import type { RightsRequest } from './types.js';

export interface UpholdInput {
  upheldBy: string;
  notes?: string;
}

export function parseUpholdInput(value: unknown): UpholdInput {
  const body = requireRecord(value, 'uphold');
  return {
    upheldBy: requireText(body['upheldBy'], 'upheldBy'),
    notes: optionalText(body['notes'], 'notes') ?? undefined,
  };
}

export interface ObjectionEngineDependencies extends RightsEngineDependencies {
  marketing?: MarketingPreferences;
}

export class ObjectionEngine extends RightsRequestEngine<ObjectionRequestDetails, ObjectionItemDetails> {
  private readonly marketing: MarketingPreferences;

  constructor(deps: ObjectionEngineDependencies) {
    super(objectionKind, deps);
    this.marketing = deps.marketing ?? new MarketingPreferences(deps);
  }

  /**
   * Record that the objection stands. Marketing objections also opt the
   * subject out of every marketing channel in the same unit of work, and
   * the channels are listed on the one chain entry the decision appends.
   * Refused while a legal hold covers the subject.
   */
  async uphold(requestId: string, input: UpholdInput): Promise<Result<RightsRequest<ObjectionRequestDetails>>> {
    return toResult(this.logger, 'upholdObjection', async () => {
      const uphold = parseUpholdInput(input);
      const now = this.clock().toISOString();

      const row = await this.store.transaction(async (session) => {
        const request = await this.requestById(session, requestId);
        this.assertOpen(request, 'uphold');
        if (request.decision !== null) {
          throw new StateError(`Objection already has a decision: ${request.decision}`);
        }

        const check = await this.holds.checkWithin(session, { subjectId: request.subjectId });
        if (check.isHeld) {
          const numbers = check.matchingHolds.map((hold) => hold.holdNumber).join(', ');
          throw new LegalHoldError(`Subject is under legal hold ${numbers}`);
        }

        const { objectionType } = this.definition.parseRequestDetails(request.details);
        const patch = {
          status: 'UNDER_REVIEW',
          decision: 'UPHELD',
          decisionReason: uphold.notes ?? null,
          decidedBy: uphold.upheldBy,
          decidedAt: now,
          updatedAt: now,
        };
        await this.writeRequest(session, request, patch);

        let optedOut: string[] = [];
        if (MARKETING_OBJECTION_TYPES.includes(objectionType)) {
          const preferences = await this.marketing.optOutWithin(session, request.subjectId, {
            channel: 'ALL',
            source: request.requestNumber,
            performedBy: uphold.upheldBy,
          });
          optedOut = preferences.map((preference) => preference.channel);
        }

        await this.appendAction(session, requestId, 'OBJECTION_UPHELD', uphold.upheldBy, now, {
          objectionType,
          notes: uphold.notes,
          marketingOptOut: optedOut,
        });
        return { ...request, ...patch };
      });

      this.logger.info('Objection upheld', { requestNumber: row.requestNumber, actor: uphold.upheldBy });
      return this.toRequest(row);
    });
  }
}
