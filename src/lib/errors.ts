/**
 * Typed error hierarchy for dump conversion
 *
 * Provides structured error classes with a `kind` discriminator for
 * type-safe error handling in the pipeline and the CLI.
 *
 * Usage:
 * ```ts
 * import { SchemaMismatchError, isTypedError } from './lib/errors.js';
 *
 * // Throw typed errors
 * throw new SchemaMismatchError('expected 13 fields, got 12', { tupleIndex: 7 });
 *
 * // Check error type
 * if (error instanceof SchemaMismatchError) { ... }
 * if (isTypedError(error) && error.kind === 'SCHEMA_MISMATCH') { ... }
 * ```
 *
 * None of these are recoverable: a conversion that raises one stops and
 * writes no further rows.
 */

/** Error kinds for type discrimination */
export type ErrorKind =
  | 'MALFORMED_TUPLE'
  | 'MALFORMED_STATEMENT'
  | 'SCHEMA_MISMATCH'
  | 'CONFIGURATION'
  | 'UNSUPPORTED_TABLE';

/** Base interface for typed errors */
export interface TypedError extends Error {
  readonly kind: ErrorKind;
}

/** Where in the dump an error was found */
export interface SourceLocation {
  /** 1-based index of the tuple among tuples of the processed table */
  tupleIndex?: number;
  /** 1-based INSERT statement number */
  statement?: number;
  /** 1-based line of the dump */
  line?: number;
  /** Raw tuple text (truncated for display) */
  span?: string;
}

/** Longest span carried on an error */
const MAX_SPAN_LENGTH = 200;

function describeLocation(location: SourceLocation): string {
  const parts: string[] = [];
  if (location.tupleIndex !== undefined) parts.push(`tuple ${location.tupleIndex}`);
  if (location.statement !== undefined) parts.push(`statement ${location.statement}`);
  if (location.line !== undefined) parts.push(`line ${location.line}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

function clipSpan(span: string | undefined): string | undefined {
  if (span === undefined || span.length <= MAX_SPAN_LENGTH) return span;
  return `${span.slice(0, MAX_SPAN_LENGTH)}...`;
}

/**
 * Error thrown when a tuple's text cannot be tokenized
 *
 * Unterminated quotes, a dangling backslash, or stray characters after a
 * quoted value all mean the dump is truncated or corrupted.
 */
export class MalformedTupleError extends Error implements TypedError {
  readonly kind = 'MALFORMED_TUPLE' as const;
  readonly location: SourceLocation;

  constructor(message: string, location: SourceLocation = {}) {
    super(`${message}${describeLocation(location)}`);
    this.name = 'MalformedTupleError';
    this.location = { ...location, span: clipSpan(location.span) };
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, MalformedTupleError.prototype);
  }
}

/**
 * Error thrown when INSERT statement structure is broken
 * (garbage between tuples, or input ending mid-statement)
 */
export class MalformedStatementError extends Error implements TypedError {
  readonly kind = 'MALFORMED_STATEMENT' as const;
  readonly location: SourceLocation;

  constructor(message: string, location: SourceLocation = {}) {
    super(`${message}${describeLocation(location)}`);
    this.name = 'MalformedStatementError';
    this.location = { ...location, span: clipSpan(location.span) };
    Object.setPrototypeOf(this, MalformedStatementError.prototype);
  }
}

/**
 * Error thrown when decoded fields do not line up with the table schema
 */
export class SchemaMismatchError extends Error implements TypedError {
  readonly kind = 'SCHEMA_MISMATCH' as const;
  readonly location: SourceLocation;

  constructor(message: string, location: SourceLocation = {}) {
    super(`${message}${describeLocation(location)}`);
    this.name = 'SchemaMismatchError';
    this.location = { ...location, span: clipSpan(location.span) };
    Object.setPrototypeOf(this, SchemaMismatchError.prototype);
  }
}

/**
 * Error thrown for contradictory or invalid filter and run options.
 * Raised before any input is read.
 */
export class ConfigurationError extends Error implements TypedError {
  readonly kind = 'CONFIGURATION' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when a table has no known schema
 */
export class UnsupportedTableError extends Error implements TypedError {
  readonly kind = 'UNSUPPORTED_TABLE' as const;
  readonly tableName: string;

  constructor(tableName: string, supported: readonly string[] = []) {
    const hint = supported.length > 0 ? `. Supported tables: ${supported.join(', ')}` : '';
    super(`Unsupported table: ${tableName}${hint}`);
    this.name = 'UnsupportedTableError';
    this.tableName = tableName;
    Object.setPrototypeOf(this, UnsupportedTableError.prototype);
  }
}

/**
 * Type guard to check if an error is one of the typed conversion errors
 */
export function isTypedError(error: unknown): error is TypedError {
  return (
    error instanceof Error &&
    'kind' in error &&
    typeof error.kind === 'string'
  );
}

/**
 * Map error kind to CLI exit code
 */
export function getExitCodeForKind(kind: ErrorKind): number {
  switch (kind) {
    case 'CONFIGURATION':
      return 2;
    case 'UNSUPPORTED_TABLE':
      return 3;
    case 'MALFORMED_TUPLE':
    case 'MALFORMED_STATEMENT':
      return 4;
    case 'SCHEMA_MISMATCH':
      return 5;
    default:
      return 1;
  }
}
