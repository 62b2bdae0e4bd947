/**
 * AST-based SQL parsing for the statement policy.
 * Uses node-sql-parser with the SQLite dialect.
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

const parser = new Parser();
const SQLITE_OPT = { database: 'sqlite' } as const;

export type SqlKind =
  | 'select'
  | 'insert'
  | 'replace'
  | 'update'
  | 'delete'
  | 'create'
  | 'alter'
  | 'drop'
  | 'unknown';

const KNOWN_KINDS: readonly string[] = [
  'select',
  'insert',
  'replace',
  'update',
  'delete',
  'create',
  'alter',
  'drop',
];

export interface ParseResult {
  /** Number of statements found */
  statementCount: number;
  /** Kind of the first statement */
  kind: SqlKind;
  /** Original SQL with trailing semicolons stripped */
  normalizedSql: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | { ok: false; error: string };

export function parseSql(sql: string): ParseOutcome {
  const normalizedSql = sql.trim().replace(/;+\s*$/, '');

  if (!normalizedSql) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  try {
    const astResult = parser.astify(normalizedSql, SQLITE_OPT);
    const statements = Array.isArray(astResult) ? astResult : [astResult];

    if (statements.length === 0) {
      return { ok: false, error: 'No statements found' };
    }

    const rawKind = String(statements[0].type).toLowerCase();
    const kind: SqlKind = isKnownKind(rawKind) ? rawKind : 'unknown';

    return { ok: true, statementCount: statements.length, kind, normalizedSql };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }
}

function isKnownKind(s: string): s is SqlKind {
  return KNOWN_KINDS.includes(s);
}
