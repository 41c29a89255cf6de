/**
 * Express application factory.
 *
 * Middleware is wired in order:
 * 1. JSON body parser
 * 2. Request logging with correlation ids
 * 3. Compliance routes
 * 4. Not-found and global error handlers
 *
 * Every route answers with the `{ success, data | error }` envelope, its
 * status mapped from the error code.
 *
 * @module app
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { createHoldsRouter } from './api/holdsRouter.js';
import { createLocksRouter, createVersionsRouter } from './api/locksRouter.js';
import { requestLogger } from './api/requestLogger.js';
import { createMarketingRouter, createRequestsRouter } from './api/requestsRouter.js';
import { createRetentionRouter } from './api/retentionRouter.js';
import type { ComplianceLedger } from './complianceLedger.js';
import { ERROR_CODES, IntegrityError } from './utils/errors.js';
import { fail, getHttpStatusForError } from './utils/responses.js';

export function createApp(deps: ComplianceLedger): express.Express {
  const app = express();
  const logger = deps.logger.child({ component: 'http' });

  // ── Global Middleware (order matters) ──
  app.use(express.json());
  app.use(requestLogger(deps.logger));

  // ── Routes ──
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ success: true, data: { status: 'ok', algorithm: deps.ledger.algorithm } });
  });
  app.use('/api/holds', createHoldsRouter(deps.holds));
  app.use('/api/retention', createRetentionRouter(deps.retention));
  app.use('/api/requests', createRequestsRouter(deps.rights));
  app.use('/api/marketing', createMarketingRouter(deps.rights));
  app.use('/api/locks', createLocksRouter(deps.locks));
  app.use('/api/versions', createVersionsRouter(deps.versions));

  app.use((req: Request, res: Response) => {
    res.status(404).json(fail(ERROR_CODES.NOT_FOUND, `No route for ${req.method} ${req.path}`));
  });

  // ── Global Error Handler ──
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json(fail(ERROR_CODES.VALIDATION, 'Request body is not valid JSON'));
      return;
    }
    if (err instanceof IntegrityError) {
      res
        .status(getHttpStatusForError(err.code))
        .json(fail(err.code, `Ledger integrity failure in ${err.scopeKey}`));
      return;
    }
    logger.error('Unhandled error', err instanceof Error ? err : undefined);
    res.status(500).json(fail(ERROR_CODES.INTERNAL, 'An unexpected error occurred'));
  });

  return app;
}
