/**
 * Runner for the numbered SQL files in `src/migrations`.
 *
 * Each applied file is recorded in `schema_migrations` with the SHA-256 of
 * its contents. A recorded file whose contents have since changed stops the
 * run with an IntegrityError: the ledger tables must match the SQL that
 * created them. Runs from concurrent processes are serialized through a
 * PostgreSQL advisory lock, and each file applies in its own transaction.
 *
 * @module utils/migrationRunner
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type pg from 'pg';
import { sha256 } from '../crypto/hashProvider.js';
import type { Logger } from '../logging/logger.js';
import { getPool } from './db.js';
import { IntegrityError } from './errors.js';

/** Default migrations directory, beside this module's parent. */
export const DEFAULT_MIGRATIONS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  'migrations',
);

/** Advisory lock key held for the whole run. */
export const MIGRATION_LOCK_KEY = 7_310_245;

export interface MigrationFile {
  filename: string;
  sql: string;
  checksum: string;
}

export interface MigrationOptions {
  migrationsDir?: string;
  pool?: pg.Pool;
  logger?: Logger;
}

/**
 * List `.sql` files in lexical order. A missing directory yields nothing.
 */
export function getMigrationFiles(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): string[] {
  if (!fs.existsSync(migrationsDir)) {
    return [];
  }
  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

export function loadMigrations(migrationsDir: string = DEFAULT_MIGRATIONS_DIR): MigrationFile[] {
  return getMigrationFiles(migrationsDir).map((filename) => {
    const sql = fs.readFileSync(path.join(migrationsDir, filename), 'utf-8');
    return { filename, sql, checksum: sha256.hash(sql) };
  });
}

async function ensureMigrationsTable(client: pg.PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      filename   TEXT PRIMARY KEY,
      checksum   TEXT NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

async function getAppliedChecksums(client: pg.PoolClient): Promise<Map<string, string>> {
  const result = await client.query<{ filename: string; checksum: string }>(
    'SELECT filename, checksum FROM schema_migrations ORDER BY filename',
  );
  return new Map(result.rows.map((row) => [row.filename, row.checksum]));
}

async function applyMigration(client: pg.PoolClient, migration: MigrationFile): Promise<void> {
  await client.query('BEGIN');
  try {
    await client.query(migration.sql);
    await client.query('INSERT INTO schema_migrations (filename, checksum) VALUES ($1, $2)', [
      migration.filename,
      migration.checksum,
    ]);
    await client.query('COMMIT');
  } catch (err) {
    await client.query('ROLLBACK');
    throw new Error(
      `Migration ${migration.filename} failed: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Apply every pending migration.
 *
 * @returns Filenames applied in this run.
 */
export async function runMigrations(options: MigrationOptions = {}): Promise<string[]> {
  const migrations = loadMigrations(options.migrationsDir);
  const client = await (options.pool ?? getPool()).connect();
  const applied: string[] = [];

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);
    try {
      await ensureMigrationsTable(client);
      const recorded = await getAppliedChecksums(client);

      for (const migration of migrations) {
        const checksum = recorded.get(migration.filename);
        if (checksum !== undefined) {
          if (checksum !== migration.checksum) {
            throw new IntegrityError(
              `Migration ${migration.filename} has changed since it was applied`,
              'schema_migrations',
            );
          }
          continue;
        }

        await applyMigration(client, migration);
        applied.push(migration.filename);
        options.logger?.info('Applied migration', { file: migration.filename });
      }
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY]);
    }
  } finally {
    client.release();
  }

  return applied;
}
