/**
 * `/api/holds`
 *
 * @module api/holdsRouter
 */

import express from 'express';
import type { LegalHoldRegistry } from '../holds/legalHoldRegistry.js';
import { parseCreateHoldInput, parseReleaseHoldInput } from '../holds/legalHoldRegistry.js';
import { param, queryString, route } from './http.js';

export function createHoldsRouter(holds: LegalHoldRegistry): express.Router {
  const router = express.Router();

  router.post('/', route((req) => holds.createHold(parseCreateHoldInput(req.body)), 201));
  router.get('/', route(() => holds.getActiveHolds()));
  router.get(
    '/check',
    route((req) => holds.check({ subjectId: queryString(req, 'subjectId'), category: queryString(req, 'category') })),
  );
  router.get('/statistics', route(() => holds.getStatistics()));
  router.get('/verify', route(() => holds.verifyChain()));
  router.get('/history', route(() => holds.getHoldHistory()));
  router.get('/:holdId', route((req) => holds.getHold(param(req, 'holdId'))));
  router.get('/:holdId/history', route((req) => holds.getHoldHistory(param(req, 'holdId'))));
  router.post(
    '/:holdId/release',
    route((req) => holds.releaseHold(param(req, 'holdId'), parseReleaseHoldInput(req.body))),
  );

  return router;
}
