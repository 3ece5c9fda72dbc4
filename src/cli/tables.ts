/**
 * Tables Command
 *
 * List the supported tables, or one table's columns.
 */

import { Command } from 'commander';
import { color, fatal, formatTable } from './utils.js';
import { getTableSchema, listTables } from '../tables/registry.js';
import { getExitCodeForKind, isTypedError } from '../lib/errors.js';
import type { TableSchema } from '../shared/types.js';

/** Tables command options */
interface TablesOptions {
  json?: boolean;
}

/**
 * Render one table's columns as text
 */
export function describeTable(schema: TableSchema): string {
  const rows = schema.columns.map((column, index) => ({
    '#': index + 1,
    column: column.name,
    type: column.type,
    nullable: column.nullable ? 'yes' : '',
  }));
  return `\n  ${color.bold(schema.tableName)}\n\n${formatTable(rows)}\n`;
}

/**
 * Render the table list as text
 */
export function describeTables(schemas: readonly TableSchema[]): string {
  const rows = schemas.map((schema) => ({
    table: schema.tableName,
    columns: schema.columns.length,
  }));
  return `\n  Supported tables\n\n${formatTable(rows)}\n`;
}

export const tablesCommand = new Command('tables')
  .description('List supported tables and their columns')
  .argument('[name]', 'Show the columns of one table')
  .option('--json', 'Output as JSON')
  .action((name: string | undefined, options: TablesOptions) => {
    try {
      const schemas = name !== undefined ? [getTableSchema(name)] : listTables().map(getTableSchema);

      if (options.json) {
        console.log(JSON.stringify(name !== undefined ? schemas[0] : schemas, null, 2));
        return;
      }

      const [only] = schemas;
      console.log(name !== undefined && only ? describeTable(only) : describeTables(schemas));
    } catch (error) {
      if (isTypedError(error)) {
        fatal(error.message, getExitCodeForKind(error.kind));
      }
      throw error;
    }
  });
