/**
 * `/api/requests/:kind`
 *
 * One router shape serves every request kind; objection and restriction
 * routes add their own extra operations.
 *
 * @module api/requestsRouter
 */

import express from 'express';
import type { RightsEngines } from '../rights/engines.js';
import { parseUpholdInput } from '../rights/objectionEngine.js';
import { parseProcessingAttemptInput } from '../rights/restrictionEngine.js';
import {
  parseApplyItemInput,
  parseCompleteRequestInput,
  parseExtendDeadlineInput,
  parseLiftItemInput,
  parseReviewItemInput,
  type RightsRequestEngine,
} from '../rights/rightsRequestEngine.js';
import {
  parseAddRecipientInput,
  parseRecordConfirmationInput,
  parseRecordNotificationInput,
} from '../rights/thirdPartyTracker.js';
import { MARKETING_CHANNELS, parseOptOutInput, type MarketingChannel } from '../rights/marketingPreferences.js';
import type { JsonObject } from '../utils/json.js';
import { optionalOneOf, requireRecord } from '../utils/validation.js';
import { param, queryString, route } from './http.js';

/** Routes shared by every request kind. */
export function createKindRouter<R extends JsonObject, I extends JsonObject>(
  engine: RightsRequestEngine<R, I>,
  engines: RightsEngines,
): express.Router {
  const router = express.Router();
  const thirdParties = engines.thirdParties;

  router.post('/', route((req) => engine.create(engine.parseCreateInput(req.body)), 201));
  router.get(
    '/',
    route((req) =>
      engine.getPendingRequests({
        includeHeld: queryString(req, 'includeHeld') === 'true',
        asOf: queryString(req, 'asOf'),
      }),
    ),
  );
  router.get('/statistics', route((req) => engine.getStatistics(queryString(req, 'asOf'))));
  router.get('/verify', route(() => engine.verifyCreationChain()));

  router.get('/:requestId', route((req) => engine.getRequest(param(req, 'requestId'))));
  router.get('/:requestId/history', route((req) => engine.getHistory(param(req, 'requestId'))));
  router.get('/:requestId/verify', route((req) => engine.verifyHistory(param(req, 'requestId'))));
  router.post(
    '/:requestId/extend',
    route((req) => engine.extendDeadline(param(req, 'requestId'), parseExtendDeadlineInput(req.body))),
  );
  router.post(
    '/:requestId/complete',
    route((req) => engine.completeRequest(param(req, 'requestId'), parseCompleteRequestInput(req.body))),
  );
  router.post(
    '/:requestId/reject',
    route((req) => engine.reject(param(req, 'requestId'), req.body)),
  );
  router.post(
    '/:requestId/override',
    route((req) => engine.override(param(req, 'requestId'), req.body)),
  );

  // ── Items ──
  router.get('/:requestId/items', route((req) => engine.getItems(param(req, 'requestId'))));
  router.post(
    '/:requestId/items',
    route((req) => engine.addItem(param(req, 'requestId'), engine.parseAddItemInput(req.body)), 201),
  );
  router.get('/items/:itemId', route((req) => engine.getItem(param(req, 'itemId'))));
  router.post(
    '/items/:itemId/review',
    route((req) => engine.reviewItem(param(req, 'itemId'), parseReviewItemInput(req.body))),
  );
  router.post(
    '/items/:itemId/apply',
    route((req) => engine.applyItem(param(req, 'itemId'), parseApplyItemInput(req.body))),
  );
  router.post(
    '/items/:itemId/lift',
    route((req) => engine.liftItem(param(req, 'itemId'), parseLiftItemInput(req.body))),
  );

  // ── Third parties ──
  router.get('/:requestId/recipients', route((req) => thirdParties.getRecipients(param(req, 'requestId'))));
  router.post(
    '/:requestId/recipients',
    route(
      (req) => thirdParties.addRecipient(engine.kind, param(req, 'requestId'), parseAddRecipientInput(req.body)),
      201,
    ),
  );
  router.post(
    '/recipients/:recipientId/notify',
    route((req) =>
      thirdParties.recordNotification(engine.kind, param(req, 'recipientId'), parseRecordNotificationInput(req.body)),
    ),
  );
  router.post(
    '/recipients/:recipientId/confirm',
    route((req) =>
      thirdParties.recordConfirmation(engine.kind, param(req, 'recipientId'), parseRecordConfirmationInput(req.body)),
    ),
  );

  return router;
}

export function createRequestsRouter(engines: RightsEngines): express.Router {
  const router = express.Router();

  const objection = createKindRouter(engines.objection, engines);
  objection.post(
    '/:requestId/uphold',
    route((req) => engines.objection.uphold(param(req, 'requestId'), parseUpholdInput(req.body))),
  );

  const restriction = createKindRouter(engines.restriction, engines);
  restriction.get(
    '/records/:tableName/:recordId',
    route((req) => engines.restriction.checkRestriction(param(req, 'tableName'), param(req, 'recordId'))),
  );
  restriction.post(
    '/records/:tableName/:recordId/attempts',
    route(
      (req) =>
        engines.restriction.logProcessingAttempt(
          parseProcessingAttemptInput({
            ...requireRecord(req.body, 'attempt'),
            tableName: param(req, 'tableName'),
            recordId: param(req, 'recordId'),
          }),
        ),
      201,
    ),
  );
  restriction.get(
    '/records/:tableName/:recordId/attempts',
    route((req) =>
      engines.restriction.getProcessingAttempts({
        tableName: param(req, 'tableName'),
        recordId: param(req, 'recordId'),
        blockedOnly: queryString(req, 'blockedOnly') !== 'false',
      }),
    ),
  );
  restriction.get(
    '/subjects/:subjectId/attempts',
    route((req) =>
      engines.restriction.getProcessingAttempts({
        subjectId: param(req, 'subjectId'),
        blockedOnly: queryString(req, 'blockedOnly') !== 'false',
      }),
    ),
  );

  router.use('/erasure', createKindRouter(engines.erasure, engines));
  router.use('/rectification', createKindRouter(engines.rectification, engines));
  router.use('/restriction', restriction);
  router.use('/objection', objection);

  return router;
}

function parseChannel(value: string | undefined): MarketingChannel | undefined {
  return optionalOneOf(value, MARKETING_CHANNELS, 'channel') ?? undefined;
}

/** `/api/marketing` */
export function createMarketingRouter(engines: RightsEngines): express.Router {
  const router = express.Router();
  const marketing = engines.marketing;

  router.get(
    '/:subjectId',
    route((req) => marketing.check(param(req, 'subjectId'), parseChannel(queryString(req, 'channel')))),
  );
  router.get('/:subjectId/history', route((req) => marketing.getHistory(param(req, 'subjectId'))));
  router.post(
    '/:subjectId/opt-out',
    route((req) => marketing.optOut(param(req, 'subjectId'), parseOptOutInput(req.body))),
  );

  return router;
}
