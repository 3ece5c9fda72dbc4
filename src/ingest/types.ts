/**
 * Type definitions for the dump conversion pipeline
 */

// Re-export shared types for convenience
export type { FieldToken, TableSchema, ColumnSchema, ColumnType } from '../shared/types.js';
import type { FieldToken, TableSchema } from '../shared/types.js';
import type { Logger } from '../lib/logger.js';

/** Text of one `(...)` tuple from a VALUES list, without the outer parens */
export interface RawTuple {
  /** Table named by the INSERT statement */
  table: string;
  /** Tuple text exactly as it appears in the dump */
  text: string;
  /** 1-based index among tuples of the processed table */
  index: number;
  /** 1-based INSERT statement number (counting all tables) */
  statement: number;
  /** 1-based line of the tuple's opening parenthesis */
  line: number;
}

/** A tuple bound to its table's columns */
export interface Row {
  /** Tuple index this row came from */
  index: number;
  /** Column name -> decoded value */
  fields: Readonly<Record<string, FieldToken>>;
}

/**
 * One CSV line's worth of cells, restricted to retained columns.
 * `null` marks a SQL NULL and is written as an empty, unquoted cell.
 */
export type OutputRecord = readonly (string | null)[];

/** Column selection and row predicates for a run */
export interface FilterSpec {
  /** Columns to keep (output follows schema order) */
  keepColumnNames?: readonly string[];
  /** Columns to omit */
  dropColumnNames?: readonly string[];
  /** Keep a row only if the column's value is listed */
  allowlists?: Readonly<Record<string, readonly string[]>>;
  /** Drop a row if the column's value is listed */
  blocklists?: Readonly<Record<string, readonly string[]>>;
}

/** Compression types supported by the decompressor */
export type CompressionType = 'gzip' | 'none' | 'auto';

/** Parts of a `WIKI-YYYYMMDD-TABLE.sql[.gz]` dump file name */
export interface DumpFileInfo {
  /** Wiki database name (e.g. 'enwiki') */
  wiki: string;
  /** Dump date as YYYYMMDD */
  date: string;
  /** Table the dump recreates */
  tableName: string;
  /** True for `.sql.gz` */
  compressed: boolean;
  /** File name without the `.sql[.gz]` extension */
  basename: string;
}

/** Options for the statement scanner */
export interface ScannerOptions {
  /**
   * Table whose statements produce tuples. Statements for other tables are
   * skipped. If omitted, the first INSERT statement's table is used.
   */
  table?: string;
  /**
   * Expected column names. When a statement spells out its column list it
   * must match these exactly.
   */
  columns?: readonly string[];
  /** Stop after this many INSERT statements of the target table */
  maxStatements?: number;
  /** Longest statement header accepted before `VALUES` */
  maxHeaderLength?: number;
}

/** Pipeline statistics */
export interface ConversionStats {
  /** INSERT statements for the processed table */
  statementsScanned: number;
  /** INSERT statements for other tables */
  statementsSkipped: number;
  /** Tuples tokenized and assembled */
  rowsParsed: number;
  /** Rows that passed the filters and were encoded */
  rowsWritten: number;
  /** Rows rejected by allowlists/blocklists */
  rowsFiltered: number;
  /** Processing start time (ms since epoch) */
  startTime: number;
  /** Elapsed time in milliseconds */
  elapsedMs: number;
  /** Rows parsed per second */
  rowsPerSecond: number;
}

/** Options for the conversion pipeline */
export interface ConversionOptions {
  /** Schema of the table being converted */
  schema: TableSchema;
  /** Column selection and row predicates */
  filter?: FilterSpec;
  /** Check each field against its column's declared type */
  strictTypes?: boolean;
  /** Stop after this many INSERT statements */
  maxStatements?: number;
  /** Log and report progress every N parsed rows */
  progressInterval?: number;
  /** Progress callback */
  onProgress?: (stats: ConversionStats) => void;
  /** Optional logger for dependency injection (testing) */
  logger?: Logger;
}
