/**
 * `/api/retention`
 *
 * @module api/retentionRouter
 */

import express from 'express';
import {
  parseActorInput,
  parseCompleteReviewInput,
  parseCreatePolicyInput,
  parseCreateReviewInput,
  parseDisposalInput,
  parseExtendRetentionInput,
  parseRecordHoldInput,
  parseRegisterRecordInput,
  type RetentionEngine,
} from '../retention/retentionEngine.js';
import { param, queryString, route } from './http.js';

const DEFAULT_EXPIRY_HORIZON_DAYS = 30;

export function createRetentionRouter(retention: RetentionEngine): express.Router {
  const router = express.Router();

  // ── Policies ──
  router.post('/policies', route((req) => retention.createPolicy(parseCreatePolicyInput(req.body)), 201));
  router.get(
    '/policies',
    route((req) => retention.listPolicies({ activeOnly: queryString(req, 'activeOnly') === 'true' })),
  );
  router.get('/policies/:code', route((req) => retention.getPolicy(param(req, 'code'))));
  router.post(
    '/policies/:code/deactivate',
    route((req) => retention.deactivatePolicy(param(req, 'code'), parseActorInput(req.body))),
  );

  // ── Records ──
  router.post('/records', route((req) => retention.register(parseRegisterRecordInput(req.body)), 201));
  router.get('/expired', route((req) => retention.scanExpired(queryString(req, 'asOf'))));
  router.get(
    '/expiring',
    route((req) =>
      retention.getRecordsExpiringSoon(
        Number(queryString(req, 'days') ?? DEFAULT_EXPIRY_HORIZON_DAYS),
        queryString(req, 'asOf'),
      ),
    ),
  );
  router.post(
    '/enforce',
    route((req) => retention.enforceExpired(parseActorInput(req.body), queryString(req, 'asOf'))),
  );
  router.get('/statistics', route((req) => retention.getStatistics(queryString(req, 'asOf'))));
  router.get('/records/:recordId', route((req) => retention.getRecord(param(req, 'recordId'))));
  router.get('/records/:recordId/history', route((req) => retention.getHistory(param(req, 'recordId'))));
  router.get('/records/:recordId/verify', route((req) => retention.verifyHistory(param(req, 'recordId'))));
  router.post(
    '/records/:recordId/extend',
    route((req) => retention.extend(param(req, 'recordId'), parseExtendRetentionInput(req.body))),
  );
  router.post(
    '/records/:recordId/hold',
    route((req) => retention.applyHold(param(req, 'recordId'), parseRecordHoldInput(req.body))),
  );
  router.post(
    '/records/:recordId/release',
    route((req) => retention.releaseHold(param(req, 'recordId'), parseActorInput(req.body))),
  );
  router.post(
    '/records/:recordId/delete',
    route((req) => retention.delete(param(req, 'recordId'), parseDisposalInput(req.body))),
  );
  router.post(
    '/records/:recordId/anonymize',
    route((req) => retention.anonymize(param(req, 'recordId'), parseDisposalInput(req.body))),
  );
  router.get(
    '/subjects/:subjectId/records',
    route((req) =>
      retention.getSubjectRecords(param(req, 'subjectId'), {
        includeDisposed: queryString(req, 'includeDisposed') === 'true',
      }),
    ),
  );

  // ── Reviews ──
  router.post('/reviews', route((req) => retention.createReview(parseCreateReviewInput(req.body)), 201));
  router.get(
    '/reviews',
    route((req) => retention.listReviews({ openOnly: queryString(req, 'openOnly') === 'true' })),
  );
  router.get('/reviews/:reviewId', route((req) => retention.getReview(param(req, 'reviewId'))));
  router.get('/reviews/:reviewId/records', route((req) => retention.getReviewRecords(param(req, 'reviewId'))));
  router.post(
    '/reviews/:reviewId/complete',
    route((req) => retention.completeReview(param(req, 'reviewId'), parseCompleteReviewInput(req.body))),
  );

  return router;
}
