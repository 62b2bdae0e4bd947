/**
 * Schema introspection: reads the live catalog and renders it as prompt text.
 */

import type { DatabaseConnection, SchemaDescriptor, TableDescriptor } from '../db/types.js';

export interface SerializeOpts {
  /** Character cap on the rendered text; 0 or undefined disables */
  maxChars?: number;
}

/**
 * Build a fresh descriptor. Tables, columns and foreign keys keep catalog order.
 * Throws ConnectionError when the handle is closed or a catalog query fails.
 */
export function describeSchema(connection: DatabaseConnection): SchemaDescriptor {
  const tables = connection.listTables().map((name) => ({
    name,
    columns: connection.listColumns(name),
    foreignKeys: connection.listForeignKeys(name),
  }));
  return { tables };
}

function renderTable(table: TableDescriptor): string {
  const lines = [`Table: ${table.name}`];
  for (const column of table.columns) {
    lines.push(`  - ${column.name} (${column.declaredType})`);
  }
  for (const fk of table.foreignKeys) {
    const target = fk.referencedColumn === null
      ? fk.referencedTable
      : `${fk.referencedTable}(${fk.referencedColumn})`;
    lines.push(`  - Foreign Key: ${fk.fromColumn} references ${target}`);
  }
  return lines.join('\n') + '\n\n';
}

/**
 * Deterministic text rendering. When a cap is set, whole tables are dropped
 * from the end and an omission line is appended.
 */
export function serializeSchema(schema: SchemaDescriptor, opts: SerializeOpts = {}): string {
  const maxChars = opts.maxChars ?? 0;
  const blocks = schema.tables.map(renderTable);
  if (maxChars <= 0) {
    return blocks.join('');
  }

  let text = '';
  let kept = 0;
  for (const block of blocks) {
    if (text.length + block.length > maxChars) break;
    text += block;
    kept++;
  }

  const omitted = blocks.length - kept;
  if (omitted > 0) {
    text += `-- ${omitted} more table(s) omitted\n`;
  }
  return text;
}
