/**
 * Builds one engine per request kind over shared collaborators.
 *
 * @module rights/engines
 */

import { erasureKind, type ErasureItemDetails, type ErasureRequestDetails } from './kinds/erasure.js';
import {
  rectificationKind,
  type RectificationItemDetails,
  type RectificationRequestDetails,
} from './kinds/rectification.js';
import { MarketingPreferences } from './marketingPreferences.js';
import { ObjectionEngine } from './objectionEngine.js';
import { RestrictionEngine } from './restrictionEngine.js';
import { RightsRequestEngine, type RightsEngineDependencies } from './rightsRequestEngine.js';
import { ThirdPartyTracker } from './thirdPartyTracker.js';

export interface RightsEngines {
  erasure: RightsRequestEngine<ErasureRequestDetails, ErasureItemDetails>;
  rectification: RightsRequestEngine<RectificationRequestDetails, RectificationItemDetails>;
  restriction: RestrictionEngine;
  objection: ObjectionEngine;
  thirdParties: ThirdPartyTracker;
  marketing: MarketingPreferences;
}

export function createRightsEngines(deps: RightsEngineDependencies): RightsEngines {
  const marketing = new MarketingPreferences(deps);
  return {
    erasure: new RightsRequestEngine(erasureKind, deps),
    rectification: new RightsRequestEngine(rectificationKind, deps),
    restriction: new RestrictionEngine(deps),
    objection: new ObjectionEngine({ ...deps, marketing }),
    thirdParties: new ThirdPartyTracker(deps),
    marketing,
  };
}
