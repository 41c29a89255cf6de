/**
 * Request logging with a correlation id per request.
 *
 * @module api/requestLogger
 */

import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../logging/logger.js';

export const CORRELATION_HEADER = 'x-correlation-id';

function getOrCreateCorrelationId(req: Request): string {
  const existing = req.get(CORRELATION_HEADER);
  return existing !== undefined && existing.length > 0 ? existing : randomUUID();
}

export function requestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const correlationId = getOrCreateCorrelationId(req);
    res.setHeader(CORRELATION_HEADER, correlationId);

    const start = Date.now();
    const child = logger.child({ correlationId, component: 'http' });
    const method = req.method;
    const url = req.originalUrl;

    res.on('finish', () => {
      child.info('request completed', { method, url, statusCode: res.statusCode, durationMs: Date.now() - start });
    });

    next();
  };
}
