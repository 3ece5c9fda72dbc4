/**
 * Table registry
 *
 * Column layouts for the MediaWiki tables the converter supports. The
 * layouts describe the dumps as published on dumps.wikimedia.org; see
 * https://www.mediawiki.org/wiki/Manual:Database_layout for each table.
 */

import type { ColumnSchema, ColumnType, TableSchema } from '../shared/types.js';
import { UnsupportedTableError } from '../lib/errors.js';

function column(name: string, type: ColumnType, nullable = false): ColumnSchema {
  return { name, type, nullable };
}

function table(tableName: string, columns: ColumnSchema[]): TableSchema {
  return Object.freeze({ tableName, columns: Object.freeze(columns) });
}

const TABLES: ReadonlyMap<string, TableSchema> = new Map(
  [
    table('page', [
      column('page_id', 'integer'),
      column('page_namespace', 'integer'),
      column('page_title', 'string'),
      column('page_restrictions', 'string'),
      column('page_is_redirect', 'integer'),
      column('page_is_new', 'integer'),
      column('page_random', 'float'),
      column('page_touched', 'timestamp'),
      column('page_links_updated', 'timestamp', true),
      column('page_latest', 'integer'),
      column('page_len', 'integer'),
      column('page_content_model', 'string', true),
      column('page_lang', 'string', true),
    ]),
    table('category', [
      column('cat_id', 'integer'),
      column('cat_title', 'string'),
      column('cat_pages', 'integer'),
      column('cat_subcats', 'integer'),
      column('cat_files', 'integer'),
    ]),
    table('categorylinks', [
      column('cl_from', 'integer'),
      column('cl_to', 'string'),
      column('cl_sortkey', 'string'),
      column('cl_timestamp', 'timestamp'),
      column('cl_sortkey_prefix', 'string'),
      column('cl_collation', 'string'),
      column('cl_type', 'string'),
    ]),
    table('pagelinks', [
      column('pl_from', 'integer'),
      column('pl_namespace', 'integer'),
      column('pl_title', 'string'),
      column('pl_from_namespace', 'integer'),
    ]),
    table('page_props', [
      column('pp_page', 'integer'),
      column('pp_propname', 'string'),
      column('pp_value', 'string'),
      column('pp_sortkey', 'float', true),
    ]),
    table('redirect', [
      column('rd_from', 'integer'),
      column('rd_namespace', 'integer'),
      column('rd_title', 'string'),
      column('rd_interwiki', 'string', true),
      column('rd_fragment', 'string', true),
    ]),
  ].map((schema) => [schema.tableName, schema] as const)
);

/** Names of all supported tables, in registry order */
export function listTables(): string[] {
  return [...TABLES.keys()];
}

/** Check whether a table has a known schema */
export function isSupportedTable(tableName: string): boolean {
  return TABLES.has(tableName);
}

/**
 * Look up the schema for a table.
 *
 * @throws {UnsupportedTableError} If the table is not in the registry
 */
export function getTableSchema(tableName: string): TableSchema {
  const schema = TABLES.get(tableName);
  if (!schema) {
    throw new UnsupportedTableError(tableName, listTables());
  }
  return schema;
}
