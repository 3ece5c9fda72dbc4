/**
 * Table schemas for supported MediaWiki dumps
 */

export { getTableSchema, isSupportedTable, listTables } from './registry.js';
export { COLUMN_TYPES, columnNames } from '../shared/types.js';
export type { ColumnSchema, ColumnType, TableSchema } from '../shared/types.js';
