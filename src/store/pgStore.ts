/**
 * PostgreSQL store.
 *
 * Maps the table contract onto parameterized SQL over the shared `pg` pool.
 * Columns are snake_case in the database and selected back under their
 * camelCase names. A transaction checks a client out of the pool and wraps
 * the unit of work in BEGIN / COMMIT, rolling back when it throws.
 *
 * @module store/pgStore
 */

import type pg from 'pg';
import { getPool, query } from '../utils/db.js';
import type {
  Filter,
  FindOptions,
  Row,
  Store,
  StoreSession,
  TableName,
  Tables,
} from './types.js';

type Runner = <R extends pg.QueryResultRow>(
  text: string,
  params: unknown[],
) => Promise<pg.QueryResult<R>>;

type ColumnMap = { [T in TableName]: readonly (keyof Tables[T] & string)[] };

export const TABLE_COLUMNS: ColumnMap = {
  ledger_entries: ['id', 'scopeKey', 'sequence', 'payload', 'hash', 'previousHash', 'algorithm', 'recordedAt'],
  legal_holds: [
    'id', 'holdNumber', 'holdType', 'allSubjects', 'subjects', 'allCategories', 'categories',
    'reason', 'legalBasis', 'isActive', 'createdBy', 'createdAt', 'releasedBy', 'releasedAt',
    'releaseReason', 'hash', 'previousHash',
  ],
  retention_policies: [
    'id', 'code', 'name', 'dataCategory', 'retentionDays', 'legalBasis', 'actionOnExpiry',
    'isActive', 'createdBy', 'createdAt',
  ],
  retention_records: [
    'id', 'policyId', 'tableName', 'recordKey', 'subjectId', 'dataCategory', 'createdDate',
    'expiryDate', 'status', 'extensionCount', 'onHold', 'holdReason', 'heldBy', 'heldAt',
    'registeredBy', 'reviewId', 'updatedAt',
  ],
  retention_reviews: [
    'id', 'policyId', 'reviewType', 'scope', 'startedBy', 'startedAt', 'completedBy', 'completedAt',
    'notes', 'recordsReviewed', 'recordsExtended', 'recordsDeleted', 'recordsAnonymized', 'hash',
  ],
  rights_requests: [
    'id', 'kind', 'requestNumber', 'subjectId', 'subjectName', 'subjectEmail', 'details', 'status',
    'receivedDate', 'dueDate', 'extendedDueDate', 'extensionReason', 'decision', 'decisionReason',
    'rejectionException', 'decidedBy', 'decidedAt', 'completedAt', 'completedBy', 'completionNotes', 'createdBy',
    'createdAt', 'updatedAt', 'hash', 'previousHash',
  ],
  rights_items: [
    'id', 'requestId', 'kind', 'tableName', 'recordId', 'dataCategory', 'details', 'status',
    'reviewedBy', 'reviewedAt', 'rejectionReason', 'appliedBy', 'appliedAt', 'outcome',
    'verificationHash', 'liftedBy', 'liftedAt', 'liftReason', 'createdAt', 'updatedAt',
  ],
  third_party_recipients: [
    'id', 'requestId', 'kind', 'name', 'recipientType', 'contact', 'dataShared',
    'notificationRequired', 'method', 'notifiedAt', 'notifiedBy', 'confirmedAt', 'confirmedBy',
    'createdAt',
  ],
  marketing_preferences: ['id', 'subjectId', 'channel', 'optedOut', 'source', 'updatedAt'],
  processing_attempts: [
    'id', 'requestId', 'itemId', 'subjectId', 'tableName', 'recordId', 'operation', 'operationDetails',
    'attemptedBy', 'attemptedAt', 'wasBlocked', 'overrideReason', 'overrideAuthorizedBy', 'attemptHash',
  ],
  record_locks: ['id', 'tableName', 'recordId', 'lockedBy', 'reason', 'lockedAt'],
};

// ─── SQL building ────────────────────────────────────────────────────────────

export function toSnakeCase(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

function columnsOf(table: TableName): readonly string[] {
  return TABLE_COLUMNS[table];
}

function assertColumn(table: TableName, name: string): string {
  if (!columnsOf(table).includes(name)) {
    throw new Error(`Unknown column ${name} on ${table}`);
  }
  return toSnakeCase(name);
}

function selectList(table: TableName): string {
  return columnsOf(table)
    .map((name) => `${toSnakeCase(name)} AS "${name}"`)
    .join(', ');
}

/** Build a WHERE clause, appending its parameters to `params`. */
export function buildWhere(table: TableName, filter: object | undefined, params: unknown[]): string {
  if (!filter) return '';
  const clauses: string[] = [];
  const bind = (value: unknown): string => {
    params.push(value);
    return `$${params.length}`;
  };

  for (const [name, condition] of Object.entries(filter)) {
    if (condition === undefined) continue;
    const col = assertColumn(table, name);

    if (condition === null) {
      clauses.push(`${col} IS NULL`);
    } else if (typeof condition !== 'object') {
      clauses.push(`${col} = ${bind(condition)}`);
    } else if ('in' in condition) {
      clauses.push(`${col} = ANY(${bind(condition.in)})`);
    } else if ('not' in condition) {
      clauses.push(
        condition.not === null ? `${col} IS NOT NULL` : `${col} IS DISTINCT FROM ${bind(condition.not)}`,
      );
    } else if ('lte' in condition) {
      clauses.push(`${col} <= ${bind(condition.lte)}`);
    } else if ('gte' in condition) {
      clauses.push(`${col} >= ${bind(condition.gte)}`);
    } else if ('between' in condition && Array.isArray(condition.between)) {
      clauses.push(`${col} BETWEEN ${bind(condition.between[0])} AND ${bind(condition.between[1])}`);
    } else {
      throw new Error(`Unsupported condition on ${table}.${name}`);
    }
  }

  return clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
}

// ─── Session ─────────────────────────────────────────────────────────────────

export class PgSession implements StoreSession {
  /** @param transactional Whether `run` executes inside BEGIN / COMMIT. */
  constructor(
    private readonly run: Runner,
    private readonly transactional = false,
  ) {}

  async insert<T extends TableName>(table: T, row: Row<T>): Promise<Row<T>> {
    const names = columnsOf(table).filter((name) => Object.prototype.hasOwnProperty.call(row, name));
    const params = names.map((name) => Reflect.get(row, name));
    const placeholders = names.map((_, i) => `$${i + 1}`);
    const result = await this.run<Row<T>>(
      `INSERT INTO ${table} (${names.map(toSnakeCase).join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING ${selectList(table)}`,
      params,
    );
    const inserted = result.rows[0];
    if (!inserted) {
      throw new Error(`Insert into ${table} returned no row`);
    }
    return inserted;
  }

  async get<T extends TableName>(table: T, id: string): Promise<Row<T> | null> {
    const result = await this.run<Row<T>>(`SELECT ${selectList(table)} FROM ${table} WHERE id = $1`, [id]);
    return result.rows[0] ?? null;
  }

  async find<T extends TableName>(
    table: T,
    filter?: Filter<Row<T>>,
    options: FindOptions<Row<T>> = {},
  ): Promise<Row<T>[]> {
    const params: unknown[] = [];
    let text = `SELECT ${selectList(table)} FROM ${table}${buildWhere(table, filter, params)}`;
    if (options.orderBy) {
      text += ` ORDER BY ${assertColumn(table, options.orderBy)} ${options.direction === 'desc' ? 'DESC' : 'ASC'}`;
    }
    if (options.limit !== undefined) {
      params.push(options.limit);
      text += ` LIMIT $${params.length}`;
    }
    const result = await this.run<Row<T>>(text, params);
    return result.rows;
  }

  async count<T extends TableName>(table: T, filter?: Filter<Row<T>>): Promise<number> {
    const params: unknown[] = [];
    const result = await this.run<{ total: number }>(
      `SELECT COUNT(*)::int AS total FROM ${table}${buildWhere(table, filter, params)}`,
      params,
    );
    return result.rows[0]?.total ?? 0;
  }

  async update<T extends TableName>(
    table: T,
    id: string,
    patch: Partial<Row<T>>,
    expected?: Filter<Row<T>>,
  ): Promise<number> {
    const params: unknown[] = [];
    const assignments = Object.entries(patch)
      .filter(([name, value]) => name !== 'id' && value !== undefined)
      .map(([name, value]) => {
        params.push(value);
        return `${assertColumn(table, name)} = $${params.length}`;
      });
    if (assignments.length === 0) return 0;

    params.push(id);
    const idParam = `$${params.length}`;
    const guard = buildWhere(table, expected, params).replace(' WHERE ', ' AND ');
    const result = await this.run(
      `UPDATE ${table} SET ${assignments.join(', ')} WHERE id = ${idParam}${guard}`,
      params,
    );
    return result.rowCount ?? 0;
  }

  async remove<T extends TableName>(table: T, id: string): Promise<number> {
    const result = await this.run(`DELETE FROM ${table} WHERE id = $1`, [id]);
    return result.rowCount ?? 0;
  }

  /** Transaction-scoped advisory lock keyed on the scope name; released at COMMIT or ROLLBACK. */
  async lockScope(scopeKey: string): Promise<void> {
    if (!this.transactional) {
      throw new Error('Ledger scopes can only be locked inside a transaction');
    }
    await this.run('SELECT pg_advisory_xact_lock(hashtext($1))', [scopeKey]);
  }
}

// ─── Store ───────────────────────────────────────────────────────────────────

export class PgStore implements Store {
  /** @param pool Defaults to the shared pool from `utils/db`. */
  constructor(private readonly pool?: pg.Pool) {}

  async transaction<R>(work: (session: StoreSession) => Promise<R>): Promise<R> {
    const client = await (this.pool ?? getPool()).connect();
    try {
      await client.query('BEGIN');
      try {
        const result = await work(new PgSession((text, params) => client.query(text, params), true));
        await client.query('COMMIT');
        return result;
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    } finally {
      client.release();
    }
  }

  async read<R>(work: (session: StoreSession) => Promise<R>): Promise<R> {
    const pool = this.pool;
    const run: Runner = pool ? (text, params) => pool.query(text, params) : (text, params) => query(text, params);
    return work(new PgSession(run));
  }
}
