/**
 * Structured Logger
 *
 * JSON-structured logging with level filtering, context enrichment and
 * child loggers. Every engine takes a logger so that refusals, chain appends
 * and integrity failures land in one stream.
 *
 * @module logging/logger
 */

import { v4 as uuidv4 } from 'uuid';

// ─── Types ───────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  /** Component that emitted the entry, e.g. `holds` or `rights:erasure`. */
  component?: string;
  /** Person or system acting on the ledger. */
  actor?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  component?: string;
  actor?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  fatal(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

/** Output sink for log entries. Defaults to one JSON line on stdout. */
export type LogOutput = (entry: LogEntry) => void;

const stdoutOutput: LogOutput = (entry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

/** Sink that drops everything. Handy as a default in tests. */
export const silentOutput: LogOutput = () => undefined;

export interface LoggerOptions {
  /** Service name on every entry. Defaults to 'compliance-ledger'. */
  service?: string;
  /** Minimum level to emit. Defaults to 'info'. */
  level?: LogLevel;
  context?: LogContext;
  output?: LogOutput;
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createLogger(options: LoggerOptions = {}): Logger {
  const service = options.service ?? 'compliance-ledger';
  const minLevel = options.level ?? 'info';
  const output = options.output ?? stdoutOutput;
  const context: LogContext = {
    ...options.context,
    correlationId: options.context?.correlationId ?? uuidv4(),
  };

  function log(level: LogLevel, message: string, error?: Error, metadata?: LogMetadata): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service,
      correlationId: context.correlationId ?? '',
    };
    if (context.component) entry.component = context.component;
    if (context.actor) entry.actor = context.actor;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = metadata;
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }
    output(entry);
  }

  return {
    debug: (message, metadata) => log('debug', message, undefined, metadata),
    info: (message, metadata) => log('info', message, undefined, metadata),
    warn: (message, metadata) => log('warn', message, undefined, metadata),
    error: (message, error, metadata) => log('error', message, error, metadata),
    fatal: (message, error, metadata) => log('fatal', message, error, metadata),
    child(childContext: LogContext): Logger {
      return createLogger({
        service,
        level: minLevel,
        output,
        context: { ...context, ...childContext },
      });
    },
  };
}
