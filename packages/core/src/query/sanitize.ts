/**
 * Strip Markdown code fences from a model reply.
 * No other rewriting: keyword case, statement splitting and whitespace inside the SQL are untouched.
 */

const SQL_FENCE_RE = /```sql/gi;
const FENCE_RE = /```/g;

/**
 * Remove every "```sql" opener (any case), then every bare "```", then trim.
 * Idempotent: the second pass leaves no run of three backticks behind.
 */
export function cleanSql(raw: string): string {
  return raw.replace(SQL_FENCE_RE, '').replace(FENCE_RE, '').trim();
}
