/**
 * Runtime configuration read from environment variables.
 *
 * @module config
 */

import { isLogLevel, type LogLevel } from './logging/logger.js';
import { ValidationError } from './utils/errors.js';

export const STORE_KINDS = ['postgres', 'memory'] as const;

export type StoreKind = (typeof STORE_KINDS)[number];

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  /** `memory` keeps everything in process and is lost on exit. */
  store: StoreKind;
}

function isStoreKind(value: string): value is StoreKind {
  return STORE_KINDS.some((kind) => kind === value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseInt(env['PORT'] ?? '3000', 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new ValidationError(`PORT must be a port number, got ${env['PORT'] ?? ''}`);
  }

  const logLevel = env['LOG_LEVEL'] ?? 'info';
  if (!isLogLevel(logLevel)) throw new ValidationError(`LOG_LEVEL is not a log level: ${logLevel}`);

  const store = env['COMPLIANCE_STORE'] ?? 'postgres';
  if (!isStoreKind(store)) {
    throw new ValidationError(`COMPLIANCE_STORE must be one of: ${STORE_KINDS.join(', ')}`);
  }

  return { port, logLevel, store };
}
