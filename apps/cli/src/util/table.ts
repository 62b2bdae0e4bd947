/**
 * Minimal table formatter for CLI output.
 * Rows are positional, so repeated column names each keep their own cell.
 */

import type { Row, SqlValue } from '@askdb/core';

const MAX_WIDTH = 60;

export function formatTable(columns: string[], rows: Row[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const cells = rows.map((row) => columns.map((_, i) => formatValue(row[i]?.[1] ?? null)));

  const widths = columns.map((col) => col.length);
  for (const line of cells) {
    line.forEach((val, i) => {
      widths[i] = Math.min(Math.max(widths[i], val.length), MAX_WIDTH);
    });
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => col.padEnd(widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));

  for (const line of cells) {
    lines.push(
      line
        .map((val, i) => (val.length > widths[i] ? val.slice(0, widths[i] - 1) + '…' : val.padEnd(widths[i])))
        .join(' | '),
    );
  }

  return lines.join('\n');
}

export function formatValue(val: SqlValue): string {
  if (val === null) return 'NULL';
  if (Buffer.isBuffer(val)) return `<blob ${val.length} bytes>`;
  return String(val);
}
