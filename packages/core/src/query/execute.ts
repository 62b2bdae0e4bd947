/**
 * Guarded execution: validate, apply policy, classify, run.
 * Total: every engine error is folded into an ExecutionResult.
 */

import { errorMessage } from '../errors.js';
import type { DatabaseConnection, Row, SqlValue } from '../db/types.js';
import { checkStatement, UNRESTRICTED_POLICY, type StatementPolicy } from '../policy/guard.js';
import { classifyStatement } from './classify.js';
import { validateQuery, type ValidationOutcome } from './validate.js';

export const WRITE_SUCCESS_MESSAGE = 'Query executed successfully.';

export type ExecutionResult =
  | { kind: 'rows'; columns: string[]; rows: Row[] }
  | { kind: 'status'; message: string; changes: number }
  | { kind: 'error'; message: string };

export interface ExecuteOptions {
  policy?: StatementPolicy;
}

export interface ValidatedExecution {
  validation: ValidationOutcome;
  /** Set when the statement passed validation but the policy refused it */
  blocked: boolean;
  result: ExecutionResult;
}

function toRow(columns: string[], values: SqlValue[]): Row {
  return columns.map((column, i) => [column, values[i] ?? null] as const);
}

export function executeWithValidation(
  sql: string,
  connection: DatabaseConnection,
  opts: ExecuteOptions = {},
): ValidatedExecution {
  const validation = validateQuery(sql, connection);
  if (!validation.valid) {
    return {
      validation,
      blocked: false,
      result: { kind: 'error', message: `Invalid SQL Query: ${validation.diagnostic}` },
    };
  }

  const decision = checkStatement(sql, opts.policy ?? UNRESTRICTED_POLICY);
  if (!decision.allowed) {
    return {
      validation,
      blocked: true,
      result: { kind: 'error', message: `Query blocked by policy: ${decision.reason}` },
    };
  }

  try {
    if (classifyStatement(sql, { returnsData: connection.returnsData(sql) }) === 'read') {
      const { columns, rows } = connection.query(sql);
      return {
        validation,
        blocked: false,
        result: { kind: 'rows', columns, rows: rows.map((values) => toRow(columns, values)) },
      };
    }
    const { changes } = connection.execute(sql);
    return { validation, blocked: false, result: { kind: 'status', message: WRITE_SUCCESS_MESSAGE, changes } };
  } catch (err: unknown) {
    return {
      validation,
      blocked: false,
      result: { kind: 'error', message: `SQL execution error: ${errorMessage(err)}` },
    };
  }
}

export function executeQuery(
  sql: string,
  connection: DatabaseConnection,
  opts: ExecuteOptions = {},
): ExecutionResult {
  return executeWithValidation(sql, connection, opts).result;
}

// ── Row helpers ──────────────────────────────────────────────────────

/** Last entry wins when a column name repeats. */
export function rowToObject(row: Row): Record<string, SqlValue> {
  const obj: Record<string, SqlValue> = {};
  for (const [column, value] of row) {
    obj[column] = value;
  }
  return obj;
}

/** First entry with the given column name, or undefined. */
export function rowValue(row: Row, column: string): SqlValue | undefined {
  return row.find(([name]) => name === column)?.[1];
}
