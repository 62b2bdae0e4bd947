/**
 * Turn history using better-sqlite3.
 * Stores each request with its generated SQL and result summary.
 * NEVER stores result row data.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { ExecutionResult } from '../query/execute.js';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: turns
  `CREATE TABLE IF NOT EXISTS turns (
    id TEXT PRIMARY KEY,
    asked_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    database_path TEXT NOT NULL,
    request TEXT NOT NULL,
    model TEXT NOT NULL,
    generated_sql TEXT NOT NULL,
    result_kind TEXT NOT NULL,
    row_count INTEGER,
    message TEXT
  )`,

  // 2: list ordering
  `CREATE INDEX IF NOT EXISTS idx_turns_asked_at ON turns (asked_at)`,
];

// ── Types ────────────────────────────────────────────────────────────

export type ResultKind = ExecutionResult['kind'];

export interface NewTurn {
  databasePath: string;
  request: string;
  model: string;
  generatedSql: string;
  result: ExecutionResult;
}

export interface StoredTurn {
  id: string;
  askedAt: string;
  databasePath: string;
  request: string;
  model: string;
  generatedSql: string;
  resultKind: ResultKind;
  rowCount: number | null;
  message: string | null;
}

interface TurnRow {
  id: string;
  asked_at: string;
  database_path: string;
  request: string;
  model: string;
  generated_sql: string;
  result_kind: string;
  row_count: number | null;
  message: string | null;
}

function toResultKind(value: string): ResultKind {
  return value === 'rows' || value === 'status' ? value : 'error';
}

function fromRow(row: TurnRow): StoredTurn {
  return {
    id: row.id,
    askedAt: row.asked_at,
    databasePath: row.database_path,
    request: row.request,
    model: row.model,
    generatedSql: row.generated_sql,
    resultKind: toResultKind(row.result_kind),
    rowCount: row.row_count,
    message: row.message,
  };
}

function summarize(result: ExecutionResult): { rowCount: number | null; message: string | null } {
  switch (result.kind) {
    case 'rows':
      return { rowCount: result.rows.length, message: null };
    case 'status':
      return { rowCount: result.changes, message: result.message };
    case 'error':
      return { rowCount: null, message: result.message };
  }
}

// ── HistoryStore ─────────────────────────────────────────────────────

export class HistoryStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
  }

  /** Run all pending migrations */
  migrate(): void {
    this.db.exec(MIGRATIONS[0]);

    const applied = this.db
      .prepare<[], { version: number }>('SELECT version FROM migrations ORDER BY version')
      .all();
    const appliedSet = new Set(applied.map((r) => r.version));

    const insert = this.db.prepare<[number]>('INSERT INTO migrations (version) VALUES (?)');

    for (let i = 1; i < MIGRATIONS.length; i++) {
      if (!appliedSet.has(i)) {
        this.db.exec(MIGRATIONS[i]);
        insert.run(i);
      }
    }
  }

  recordTurn(turn: NewTurn): string {
    const id = randomUUID();
    const { rowCount, message } = summarize(turn.result);
    this.db
      .prepare(
        `INSERT INTO turns (id, database_path, request, model, generated_sql, result_kind, row_count, message)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(id, turn.databasePath, turn.request, turn.model, turn.generatedSql, turn.result.kind, rowCount, message);
    return id;
  }

  /** Most recent first */
  listTurns(limit = 20): StoredTurn[] {
    return this.db
      .prepare<[number], TurnRow>('SELECT * FROM turns ORDER BY asked_at DESC, rowid DESC LIMIT ?')
      .all(limit)
      .map(fromRow);
  }

  getTurn(id: string): StoredTurn | undefined {
    const row = this.db.prepare<[string], TurnRow>('SELECT * FROM turns WHERE id = ?').get(id);
    return row ? fromRow(row) : undefined;
  }

  close(): void {
    this.db.close();
  }
}
