/**
 * `/api/locks` and `/api/versions`, both keyed by table and record id.
 *
 * @module api/locksRouter
 */

import express from 'express';
import { parseLockInput, parseUnlockInput, type RecordLockService } from '../locks/recordLockService.js';
import {
  parseRecordVersionInput,
  parseRestoreVersionInput,
  type RecordVersionService,
} from '../versioning/recordVersionService.js';
import { param, route } from './http.js';

export function createLocksRouter(locks: RecordLockService): express.Router {
  const router = express.Router();

  router.get('/:tableName/:recordId', route((req) => locks.getLock(param(req, 'tableName'), param(req, 'recordId'))));
  router.get(
    '/:tableName/:recordId/history',
    route((req) => locks.getHistory(param(req, 'tableName'), param(req, 'recordId'))),
  );
  router.post(
    '/:tableName/:recordId',
    route((req) => locks.lock(param(req, 'tableName'), param(req, 'recordId'), parseLockInput(req.body))),
  );
  router.delete(
    '/:tableName/:recordId',
    route((req) => locks.unlock(param(req, 'tableName'), param(req, 'recordId'), parseUnlockInput(req.body))),
  );

  return router;
}

export function createVersionsRouter(versions: RecordVersionService): express.Router {
  const router = express.Router();

  router.get(
    '/:tableName/:recordId',
    route((req) => versions.getVersions(param(req, 'tableName'), param(req, 'recordId'))),
  );
  router.post(
    '/:tableName/:recordId',
    route(
      (req) =>
        versions.recordVersion(param(req, 'tableName'), param(req, 'recordId'), parseRecordVersionInput(req.body)),
      201,
    ),
  );
  router.get(
    '/:tableName/:recordId/verify',
    route((req) => versions.verifyVersions(param(req, 'tableName'), param(req, 'recordId'))),
  );
  router.get(
    '/:tableName/:recordId/compare/:from/:to',
    route((req) =>
      versions.compareVersions(
        param(req, 'tableName'),
        param(req, 'recordId'),
        Number(param(req, 'from')),
        Number(param(req, 'to')),
      ),
    ),
  );
  router.get(
    '/:tableName/:recordId/:versionNumber',
    route((req) =>
      versions.getVersion(param(req, 'tableName'), param(req, 'recordId'), Number(param(req, 'versionNumber'))),
    ),
  );
  router.post(
    '/:tableName/:recordId/:versionNumber/restore',
    route((req) =>
      versions.restoreVersion(
        param(req, 'tableName'),
        param(req, 'recordId'),
        Number(param(req, 'versionNumber')),
        parseRestoreVersionInput(req.body),
      ),
    ),
  );

  return router;
}
