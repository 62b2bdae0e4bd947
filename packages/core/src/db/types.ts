/**
 * Database abstraction types for askdb.
 * SqliteConnection implements DatabaseConnection; pipeline stages only see the interface.
 */

export type SqlValue = string | number | bigint | Buffer | null;

/** One result cell, keyed by the column name from the statement's result metadata. */
export type RowEntry = readonly [column: string, value: SqlValue];

/** Ordered row. Duplicate column names are kept as separate entries. */
export type Row = readonly RowEntry[];

export interface ColumnDescriptor {
  name: string;
  /** Type as written in the table definition; may be empty */
  declaredType: string;
}

export interface ForeignKeyDescriptor {
  fromColumn: string;
  referencedTable: string;
  /** null when the constraint names only the parent table */
  referencedColumn: string | null;
}

export interface TableDescriptor {
  name: string;
  columns: ColumnDescriptor[];
  foreignKeys: ForeignKeyDescriptor[];
}

export interface SchemaDescriptor {
  tables: TableDescriptor[];
}

export interface QueryRows {
  columns: string[];
  rows: SqlValue[][];
}

export interface WriteOutcome {
  changes: number;
}

/**
 * Connection handle borrowed by every pipeline stage.
 * The host owns open/close; stages never close it.
 */
export interface DatabaseConnection {
  readonly path: string;
  isOpen(): boolean;
  close(): void;

  /** User tables in catalog order */
  listTables(): string[];
  listColumns(table: string): ColumnDescriptor[];
  listForeignKeys(table: string): ForeignKeyDescriptor[];

  /** Plan-only dry run. Throws the engine error on failure. */
  explain(sql: string): void;
  /** Whether the compiled statement produces a result set. Throws the engine error on failure. */
  returnsData(sql: string): boolean;
  /** Run a statement that returns data */
  query(sql: string): QueryRows;
  /** Run a statement in autocommit mode; it is committed once it returns */
  execute(sql: string): WriteOutcome;
}
