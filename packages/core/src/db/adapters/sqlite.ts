/**
 * SQLite connection backed by better-sqlite3.
 * One handle per process, opened and closed by the host.
 */

import Database from 'better-sqlite3';
import { ConnectionError, errorMessage } from '../../errors.js';
import type {
  ColumnDescriptor,
  DatabaseConnection,
  ForeignKeyDescriptor,
  QueryRows,
  SqlValue,
  WriteOutcome,
} from '../types.js';

export interface SqliteOpenOptions {
  readonly?: boolean;
  /** Defaults to true for file paths so a typo does not create an empty database */
  fileMustExist?: boolean;
}

interface TableInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: 0 | 1;
  dflt_value: string | null;
  pk: number;
}

interface ForeignKeyRow {
  id: number;
  seq: number;
  table: string;
  from: string;
  to: string | null;
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/** Integers are read as bigint and narrowed back to number when that is exact. */
function narrowInteger(value: SqlValue): SqlValue {
  if (typeof value === 'bigint' && value >= MIN_SAFE && value <= MAX_SAFE) {
    return Number(value);
  }
  return value;
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export class SqliteConnection implements DatabaseConnection {
  readonly path: string;
  private db: Database.Database;

  private constructor(path: string, db: Database.Database) {
    this.path = path;
    this.db = db;
  }

  static open(path: string, opts: SqliteOpenOptions = {}): SqliteConnection {
    if (!path.trim()) {
      throw new ConnectionError('SQLite database path is required.');
    }
    const inMemory = path === ':memory:';
    try {
      const db = new Database(path, {
        readonly: opts.readonly ?? false,
        fileMustExist: opts.fileMustExist ?? !inMemory,
      });
      return new SqliteConnection(path, db);
    } catch (err: unknown) {
      throw new ConnectionError(`Cannot open SQLite database at ${path}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  listTables(): string[] {
    return this.catalog(() =>
      this.db
        .prepare<[], { name: string }>(
          `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'`,
        )
        .all()
        .map((row) => row.name),
    );
  }

  listColumns(table: string): ColumnDescriptor[] {
    return this.catalog(() =>
      this.db
        .prepare<[], TableInfoRow>(`PRAGMA table_info(${quoteIdent(table)})`)
        .all()
        .map((column) => ({ name: column.name, declaredType: column.type })),
    );
  }

  listForeignKeys(table: string): ForeignKeyDescriptor[] {
    return this.catalog(() =>
      this.db
        .prepare<[], ForeignKeyRow>(`PRAGMA foreign_key_list(${quoteIdent(table)})`)
        .all()
        .map((fk) => ({
          fromColumn: fk.from,
          referencedTable: fk.table,
          referencedColumn: fk.to,
        })),
    );
  }

  explain(sql: string): void {
    this.db.prepare(`EXPLAIN QUERY PLAN ${sql}`).all();
  }

  returnsData(sql: string): boolean {
    return this.db.prepare(sql).reader;
  }

  query(sql: string): QueryRows {
    const stmt = this.db.prepare<[], SqlValue[]>(sql).safeIntegers(true);
    const columns = stmt.columns().map((column) => column.name);
    const rows = stmt
      .raw(true)
      .all()
      .map((values) => values.map(narrowInteger));
    return { columns, rows };
  }

  // No explicit transaction: VACUUM, ATTACH and some PRAGMAs refuse to run inside one.
  execute(sql: string): WriteOutcome {
    const { changes } = this.db.prepare(sql).run();
    return { changes: Number(changes) };
  }

  private catalog<T>(read: () => T): T {
    if (!this.db.open) {
      throw new ConnectionError(`Database connection to ${this.path} is closed.`);
    }
    try {
      return read();
    } catch (err: unknown) {
      throw new ConnectionError(`Catalog query failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
