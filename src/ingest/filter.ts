/**
 * Row predicates and column projection
 *
 * Rows are tested against allowlists and blocklists using the FULL row, then
 * projected to the retained columns. A filter may therefore reference a
 * column that is dropped from the output.
 */

import { TransformStream } from 'node:stream/web';
import type { FieldToken, FilterSpec, OutputRecord, Row, TableSchema } from './types.js';
import { columnNames } from '../shared/types.js';
import { tokenToString } from './tokenize.js';
import { ConfigurationError } from '../lib/errors.js';

/**
 * Value compared against allowlists and blocklists. NULL compares as the
 * empty string, which is how it appears in the CSV.
 */
export function filterValue(token: FieldToken): string {
  return tokenToString(token) ?? '';
}

function checkColumns(
  label: string,
  names: readonly string[],
  known: ReadonlySet<string>,
  tableName: string
): void {
  const unknown = names.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `${label} names unknown column(s) ${unknown.join(', ')} for table ${tableName}`
    );
  }
}

function checkNoDuplicates(label: string, names: readonly string[]): void {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  if (duplicates.size > 0) {
    throw new ConfigurationError(`${label} includes duplicates: ${[...duplicates].join(', ')}`);
  }
}

function toSets(
  lists: Readonly<Record<string, readonly string[]>> | undefined
): Map<string, ReadonlySet<string>> {
  const sets = new Map<string, ReadonlySet<string>>();
  for (const [name, values] of Object.entries(lists ?? {})) {
    sets.set(name, new Set(values));
  }
  return sets;
}

/**
 * Validated filter for one table.
 *
 * Construction fails fast on contradictory or unknown settings, so a run
 * never starts with a filter that cannot be applied.
 */
export class RowFilter {
  /** Output columns in schema order */
  readonly columns: readonly string[];
  private readonly allow: Map<string, ReadonlySet<string>>;
  private readonly block: Map<string, ReadonlySet<string>>;
  private passedCount = 0;
  private rejectedCount = 0;

  /**
   * @throws {ConfigurationError} If both keep and drop lists are given, a
   *   column has both an allowlist and a blocklist, a list names an unknown
   *   column, keep/drop lists contain duplicates, or no column is retained
   */
  constructor(schema: TableSchema, spec: FilterSpec = {}) {
    const all = columnNames(schema);
    const known = new Set(all);
    const { keepColumnNames, dropColumnNames, allowlists, blocklists } = spec;

    if (keepColumnNames !== undefined && dropColumnNames !== undefined) {
      throw new ConfigurationError('keepColumnNames and dropColumnNames cannot both be set');
    }

    if (keepColumnNames !== undefined) {
      checkNoDuplicates('keepColumnNames', keepColumnNames);
      checkColumns('keepColumnNames', keepColumnNames, known, schema.tableName);
    }
    if (dropColumnNames !== undefined) {
      checkNoDuplicates('dropColumnNames', dropColumnNames);
      checkColumns('dropColumnNames', dropColumnNames, known, schema.tableName);
    }
    checkColumns('allowlists', Object.keys(allowlists ?? {}), known, schema.tableName);
    checkColumns('blocklists', Object.keys(blocklists ?? {}), known, schema.tableName);

    const contradictory = Object.keys(allowlists ?? {}).filter(
      (name) => blocklists !== undefined && name in blocklists
    );
    if (contradictory.length > 0) {
      throw new ConfigurationError(
        `column(s) ${contradictory.join(', ')} have both an allowlist and a blocklist`
      );
    }

    if (keepColumnNames !== undefined) {
      const keep = new Set(keepColumnNames);
      this.columns = all.filter((name) => keep.has(name));
    } else if (dropColumnNames !== undefined) {
      const drop = new Set(dropColumnNames);
      this.columns = all.filter((name) => !drop.has(name));
    } else {
      this.columns = all;
    }

    if (this.columns.length === 0) {
      throw new ConfigurationError(`filter retains no columns of table ${schema.tableName}`);
    }

    this.allow = toSets(allowlists);
    this.block = toSets(blocklists);
  }

  /** Rows that passed so far */
  get passed(): number {
    return this.passedCount;
  }

  /** Rows rejected so far */
  get rejected(): number {
    return this.rejectedCount;
  }

  /**
   * Check a row against every allowlist and blocklist (logical AND).
   */
  matches(row: Row): boolean {
    for (const [name, allowed] of this.allow) {
      const token = row.fields[name];
      if (!token || !allowed.has(filterValue(token))) return false;
    }
    for (const [name, blocked] of this.block) {
      const token = row.fields[name];
      if (token && blocked.has(filterValue(token))) return false;
    }
    return true;
  }

  /**
   * Project a row to the retained columns.
   */
  project(row: Row): OutputRecord {
    return this.columns.map((name) => {
      const token = row.fields[name];
      return token ? tokenToString(token) : null;
    });
  }

  /**
   * Apply predicates, then projection. Returns null for rejected rows.
   */
  apply(row: Row): OutputRecord | null {
    if (!this.matches(row)) {
      this.rejectedCount++;
      return null;
    }
    this.passedCount++;
    return this.project(row);
  }
}

/**
 * Create a streaming row filter.
 *
 * @param filter - Validated filter
 * @returns TransformStream that drops rejected rows and projects the rest
 */
export function createRowFilter(filter: RowFilter): TransformStream<Row, OutputRecord> {
  return new TransformStream<Row, OutputRecord>({
    transform(row, controller) {
      const record = filter.apply(row);
      if (record !== null) {
        controller.enqueue(record);
      }
    },
  });
}
