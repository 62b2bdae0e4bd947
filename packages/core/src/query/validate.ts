/**
 * Dry-run validation via EXPLAIN QUERY PLAN.
 * SQLite compiles the statement (syntax, tables, columns) but never steps it,
 * so no row or schema changes whatever the input.
 */

import { errorMessage } from '../errors.js';
import type { DatabaseConnection } from '../db/types.js';

export type ValidationOutcome =
  | { valid: true }
  | { valid: false; diagnostic: string };

export function validateQuery(sql: string, connection: DatabaseConnection): ValidationOutcome {
  try {
    connection.explain(sql);
    return { valid: true };
  } catch (err: unknown) {
    return { valid: false, diagnostic: errorMessage(err) };
  }
}
