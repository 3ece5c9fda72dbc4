/**
 * Row assembly: bind tokenized tuples to a table schema by position
 */

import { TransformStream } from 'node:stream/web';
import type { ColumnSchema, FieldToken, RawTuple, Row, TableSchema } from './types.js';
import { tokenizeTuple } from './tokenize.js';
import { SchemaMismatchError, type SourceLocation } from '../lib/errors.js';

/** Options for row assembly */
export interface AssembleOptions {
  /** Check each field against its column's declared type and nullability */
  strictTypes?: boolean;
}

function locate(tuple: RawTuple): SourceLocation {
  return {
    tupleIndex: tuple.index,
    statement: tuple.statement,
    line: tuple.line,
    span: tuple.text,
  };
}

/** Describe why a token does not fit a column, or null if it does */
function typeProblem(column: ColumnSchema, token: FieldToken): string | null {
  if (token.kind === 'null') {
    return column.nullable ? null : 'NULL in non-nullable column';
  }
  switch (column.type) {
    case 'integer':
    case 'float':
      return token.kind === 'number' ? null : 'quoted string in numeric column';
    case 'string':
    case 'timestamp':
      return token.kind === 'string' ? null : 'unquoted value in string column';
  }
}

/**
 * Bind a token sequence to a schema.
 *
 * @param schema - Table schema supplying column names in dump order
 * @param tokens - Tokens of one tuple
 * @param location - Where the tuple came from, attached to errors
 * @throws {SchemaMismatchError} If the field count differs from the column
 *   count, or (with strictTypes) a field does not fit its column
 */
export function assembleRow(
  schema: TableSchema,
  tokens: readonly FieldToken[],
  location: SourceLocation = {},
  options: AssembleOptions = {}
): Row {
  const { columns } = schema;
  if (tokens.length !== columns.length) {
    throw new SchemaMismatchError(
      `${schema.tableName}: expected ${columns.length} fields, got ${tokens.length}`,
      location
    );
  }

  const fields: Record<string, FieldToken> = {};
  columns.forEach((column, i) => {
    const token = tokens[i];
    if (token === undefined) return;
    if (options.strictTypes) {
      const problem = typeProblem(column, token);
      if (problem) {
        throw new SchemaMismatchError(`${schema.tableName}.${column.name}: ${problem}`, location);
      }
    }
    fields[column.name] = token;
  });

  return { index: location.tupleIndex ?? 0, fields };
}

/**
 * Tokenize and assemble one raw tuple.
 */
export function parseTuple(
  schema: TableSchema,
  tuple: RawTuple,
  options: AssembleOptions = {}
): Row {
  const location = locate(tuple);
  return assembleRow(schema, tokenizeTuple(tuple.text, location), location, options);
}

/**
 * Create a streaming row assembler.
 *
 * @param schema - Schema of the table being converted
 * @param options - Assembly options
 * @returns TransformStream that converts RawTuple objects to Rows
 */
export function createRowAssembler(
  schema: TableSchema,
  options: AssembleOptions = {}
): TransformStream<RawTuple, Row> {
  return new TransformStream<RawTuple, Row>({
    transform(tuple, controller) {
      controller.enqueue(parseTuple(schema, tuple, options));
    },
  });
}
