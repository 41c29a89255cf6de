/**
 * PostgreSQL connection pool.
 *
 * The pool is configured from environment variables and shared by the
 * store, the migration runner and the server entry point. Connections carry
 * the ledger's application name and a statement timeout, so a stuck ledger
 * append shows up in `pg_stat_activity` and fails instead of holding its
 * transaction open.
 *
 * @module utils/db
 */

import pg from 'pg';

const { Pool } = pg;

export interface DbConfig {
  /** Full connection string. When set it wins over the discrete fields. */
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  ssl: boolean;
  /** Reported as `application_name` on every connection. */
  applicationName: string;
  /** Per-statement limit; 0 disables it. */
  statementTimeoutMillis: number;
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Build database configuration from environment variables with defaults.
 */
export function getDbConfig(env: NodeJS.ProcessEnv = process.env): DbConfig {
  return {
    connectionString: env['DATABASE_URL'] || undefined,
    host: env['DB_HOST'] ?? 'localhost',
    port: intFromEnv(env['DB_PORT'], 5432),
    database: env['DB_NAME'] ?? 'compliance_ledger',
    user: env['DB_USER'] ?? 'postgres',
    password: env['DB_PASSWORD'] ?? '',
    max: intFromEnv(env['DB_POOL_MAX'], 10),
    idleTimeoutMillis: intFromEnv(env['DB_IDLE_TIMEOUT'], 30000),
    connectionTimeoutMillis: intFromEnv(env['DB_CONNECT_TIMEOUT'], 5000),
    ssl: env['DB_SSL'] === 'true',
    applicationName: env['DB_APPLICATION_NAME'] ?? 'compliance-ledger',
    statementTimeoutMillis: intFromEnv(env['DB_STATEMENT_TIMEOUT'], 15000),
  };
}

export function createPool(config?: Partial<DbConfig>): pg.Pool {
  const dbConfig = { ...getDbConfig(), ...config };
  return new Pool({
    connectionString: dbConfig.connectionString,
    host: dbConfig.host,
    port: dbConfig.port,
    database: dbConfig.database,
    user: dbConfig.user,
    password: dbConfig.password,
    max: dbConfig.max,
    idleTimeoutMillis: dbConfig.idleTimeoutMillis,
    connectionTimeoutMillis: dbConfig.connectionTimeoutMillis,
    ssl: dbConfig.ssl ? { rejectUnauthorized: false } : undefined,
    application_name: dbConfig.applicationName,
    statement_timeout: dbConfig.statementTimeoutMillis > 0 ? dbConfig.statementTimeoutMillis : undefined,
  });
}

let pool: pg.Pool | null = null;

/** Shared pool, created on first use. */
export function getPool(): pg.Pool {
  if (!pool) {
    pool = createPool();
  }
  return pool;
}

/**
 * Execute a parameterized SQL statement on the shared pool.
 */
export async function query<T extends pg.QueryResultRow = pg.QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<pg.QueryResult<T>> {
  return getPool().query<T>(text, params);
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
