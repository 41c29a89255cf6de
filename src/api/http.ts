/**
 * Glue between Express handlers and the result envelope.
 *
 * @module api/http
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { IntegrityError, isComplianceError } from '../utils/errors.js';
import { fail, getHttpStatusForError, type Result } from '../utils/responses.js';

/**
 * Wrap an operation as a handler. Failures answer with the status mapped
 * from their error code. Compliance errors thrown while parsing the
 * request become failures too; anything else goes to the error handler.
 */
export function route<T>(work: (req: Request) => Promise<Result<T>>, successStatus = 200): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    let result: Result<T>;
    try {
      result = await work(req);
    } catch (err) {
      if (!isComplianceError(err) || err instanceof IntegrityError) {
        next(err);
        return;
      }
      result = fail(err.code, err.message);
    }
    res.status(result.success ? successStatus : getHttpStatusForError(result.error.code)).json(result);
  };
}

/** Route parameter that Express always fills for a matched path. */
export function param(req: Request, name: string): string {
  return req.params[name] ?? '';
}

/** Optional string query parameter. */
export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
