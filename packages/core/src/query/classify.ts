/**
 * Read/write split used to shape execution results.
 *
 * Leading-keyword heuristic. It is the only place statement kind is decided for
 * execution, so a real parser can replace it without touching the executor.
 */

export type StatementClass = 'read' | 'write';

const READ_KEYWORDS = new Set(['SELECT', 'WITH', 'VALUES']);

export function leadingKeyword(sql: string): string {
  const match = sql.trim().match(/^[A-Za-z]+/);
  return match ? match[0].toUpperCase() : '';
}

export interface ClassifyHints {
  /** From the prepared statement; a read keyword that yields no result set is a write */
  returnsData?: boolean;
}

export function classifyStatement(sql: string, hints: ClassifyHints = {}): StatementClass {
  if (!READ_KEYWORDS.has(leadingKeyword(sql))) return 'write';
  return hints.returnsData === false ? 'write' : 'read';
}
