/**
 * In-process store.
 *
 * Keeps every table in a Map. Transactions are serialized through a promise
 * queue and work on a private copy of the tables that replaces the live copy
 * only when the unit of work resolves, so readers never see a half-finished
 * unit and a throwing unit leaves nothing behind.
 *
 * @module store/inMemoryStore
 */

import type {
  Filter,
  FindOptions,
  Row,
  Store,
  StoreSession,
  TableName,
  Tables,
} from './types.js';
import { matchesCondition } from './types.js';

type TableState = { [T in TableName]: Map<string, Tables[T]> };

function emptyState(): TableState {
  return {
    ledger_entries: new Map(),
    legal_holds: new Map(),
    retention_policies: new Map(),
    retention_records: new Map(),
    retention_reviews: new Map(),
    rights_requests: new Map(),
    rights_items: new Map(),
    third_party_recipients: new Map(),
    marketing_preferences: new Map(),
    processing_attempts: new Map(),
    record_locks: new Map(),
  };
}

function column(row: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(row, key) ? Reflect.get(row, key) : undefined;
}

function matches(row: object, filter: object | undefined): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(
    ([key, condition]) => condition === undefined || matchesCondition(column(row, key), condition),
  );
}

function compareColumn(a: object, b: object, key: string): number {
  const left = column(a, key);
  const right = column(b, key);
  if (left === right) return 0;
  if (left === null || left === undefined) return -1;
  if (right === null || right === undefined) return 1;
  if (typeof left === 'number' && typeof right === 'number') return left - right;
  return String(left) < String(right) ? -1 : 1;
}

class MemorySession implements StoreSession {
  constructor(
    private readonly state: TableState,
    private readonly writable: boolean,
  ) {}

  private assertWritable(): void {
    if (!this.writable) {
      throw new Error('Writes are only allowed inside a transaction');
    }
  }

  async insert<T extends TableName>(table: T, row: Row<T>): Promise<Row<T>> {
    this.assertWritable();
    const rows = this.state[table];
    if (rows.has(row.id)) {
      throw new Error(`Duplicate primary key in ${table}: ${row.id}`);
    }
    rows.set(row.id, structuredClone(row));
    return structuredClone(row);
  }

  async get<T extends TableName>(table: T, id: string): Promise<Row<T> | null> {
    const row = this.state[table].get(id);
    return row ? structuredClone(row) : null;
  }

  async find<T extends TableName>(
    table: T,
    filter?: Filter<Row<T>>,
    options: FindOptions<Row<T>> = {},
  ): Promise<Row<T>[]> {
    let rows = Array.from(this.state[table].values()).filter((row) => matches(row, filter));
    const { orderBy } = options;
    if (orderBy) {
      const sign = options.direction === 'desc' ? -1 : 1;
      rows = rows.sort((a, b) => sign * compareColumn(a, b, orderBy));
    }
    if (options.limit !== undefined) {
      rows = rows.slice(0, options.limit);
    }
    return rows.map((row) => structuredClone(row));
  }

  async count<T extends TableName>(table: T, filter?: Filter<Row<T>>): Promise<number> {
    let total = 0;
    for (const row of this.state[table].values()) {
      if (matches(row, filter)) total += 1;
    }
    return total;
  }

  async update<T extends TableName>(
    table: T,
    id: string,
    patch: Partial<Row<T>>,
    expected?: Filter<Row<T>>,
  ): Promise<number> {
    this.assertWritable();
    const rows = this.state[table];
    const existing = rows.get(id);
    if (!existing || !matches(existing, expected)) return 0;
    rows.set(id, { ...existing, ...structuredClone(patch), id });
    return 1;
  }

  async remove<T extends TableName>(table: T, id: string): Promise<number> {
    this.assertWritable();
    return this.state[table].delete(id) ? 1 : 0;
  }

  /** Transactions already run one at a time; only the context is checked. */
  async lockScope(_scopeKey: string): Promise<void> {
    this.assertWritable();
  }
}

export class InMemoryStore implements Store {
  private state: TableState = emptyState();

  /** Tail of the transaction queue. */
  private queue: Promise<void> = Promise.resolve();

  async transaction<R>(work: (session: StoreSession) => Promise<R>): Promise<R> {
    const run = this.queue.then(async () => {
      const working = structuredClone(this.state);
      const result = await work(new MemorySession(working, true));
      this.state = working;
      return result;
    });
    // Failures reach the caller through `run`; the queue only orders units.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async read<R>(work: (session: StoreSession) => Promise<R>): Promise<R> {
    return work(new MemorySession(this.state, false));
  }
}
