/**
 * Optional statement policy applied between validation and execution.
 *
 * The default policy lets generated SQL run verbatim, writes included.
 * Restrictive policies prefer false negatives: anything the parser cannot
 * read is blocked.
 */

import { classifyStatement } from '../query/classify.js';
import { parseSql, type SqlKind } from './parse.js';

export interface StatementPolicy {
  /** Only statements that both the keyword classifier and the AST call reads */
  readOnly: boolean;
  /** When set, only these AST statement kinds may run */
  allow?: SqlKind[];
}

export const UNRESTRICTED_POLICY: StatementPolicy = { readOnly: false };

export type PolicyDecision = { allowed: true } | { allowed: false; reason: string };

export function isRestrictive(policy: StatementPolicy): boolean {
  return policy.readOnly || policy.allow !== undefined;
}

export function checkStatement(sql: string, policy: StatementPolicy): PolicyDecision {
  if (!isRestrictive(policy)) {
    return { allowed: true };
  }

  const parsed = parseSql(sql);
  if (!parsed.ok) {
    return { allowed: false, reason: parsed.error };
  }
  if (parsed.statementCount > 1) {
    return { allowed: false, reason: 'multiple statements are not allowed' };
  }

  if (policy.readOnly) {
    if (classifyStatement(sql) !== 'read' || parsed.kind !== 'select') {
      return { allowed: false, reason: `read-only mode does not allow ${parsed.kind.toUpperCase()} statements` };
    }
  }

  if (policy.allow && !policy.allow.includes(parsed.kind)) {
    return { allowed: false, reason: `${parsed.kind.toUpperCase()} statements are not in the allow-list` };
  }

  return { allowed: true };
}
