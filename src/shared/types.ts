/**
 * Shared type definitions for the dump converter
 *
 * This is the single source of truth for types used across the ingest
 * pipeline, the table registry and the CLI.
 */

/**
 * Declared type of a dump column.
 *
 * Used by strict type checking in the row assembler:
 * - 'integer' / 'float': unquoted numeric literals
 * - 'string': quoted, backslash-escaped text
 * - 'timestamp': quoted digit strings (`'20200901123456'`) or dates
 */
export type ColumnType = 'integer' | 'float' | 'string' | 'timestamp';

/**
 * All column types as a readonly array, for runtime validation.
 */
export const COLUMN_TYPES: readonly ColumnType[] = [
  'integer',
  'float',
  'string',
  'timestamp',
] as const;

/** One column of a dump table */
export interface ColumnSchema {
  /** Column name as written in the dump */
  readonly name: string;
  /** Declared type */
  readonly type: ColumnType;
  /** True if the column allows NULL */
  readonly nullable: boolean;
}

/**
 * Ordered column layout of a table. Fields of a tuple bind to columns by
 * position, so the order here is the order of values in the dump.
 */
export interface TableSchema {
  /** Table name (e.g. 'page') */
  readonly tableName: string;
  /** Columns in dump order */
  readonly columns: readonly ColumnSchema[];
}

/** One decoded SQL value from a tuple */
export type FieldToken =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly text: string }
  | { readonly kind: 'null' };

/** Get the ordered column names of a schema */
export function columnNames(schema: TableSchema): string[] {
  return schema.columns.map((column) => column.name);
}
