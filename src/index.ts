/**
 * wikisql-csv - Main Library Entry Point
 *
 * This module re-exports key functionality from the various sub-modules
 * for convenient access by library consumers.
 */

// ============================================================================
// CONVERSION PIPELINE
// ============================================================================
export * from './ingest/index.js'

// ============================================================================
// TABLE SCHEMAS
// ============================================================================
export { getTableSchema, isSupportedTable, listTables, columnNames } from './tables/index.js'
export type { ColumnSchema, ColumnType, TableSchema } from './tables/index.js'
export type { FieldToken } from './shared/types.js'

// ============================================================================
// CSV OUTPUT
// ============================================================================
export {
  encodeCsvCell,
  encodeCsvRecord,
  createCsvEncoder,
  openCsvFileSink,
  createCsvStreamSink,
} from './storage/csv-writer.js'

// ============================================================================
// ERRORS
// ============================================================================
export {
  MalformedTupleError,
  MalformedStatementError,
  SchemaMismatchError,
  ConfigurationError,
  UnsupportedTableError,
  isTypedError,
  getExitCodeForKind,
} from './lib/errors.js'
export type { ErrorKind, TypedError, SourceLocation } from './lib/errors.js'

// ============================================================================
// LOGGING
// ============================================================================
export {
  Logger,
  DefaultLoggerProvider,
  createLogger,
  setLoggerProvider,
  resetLoggerProvider,
  generateRunId,
  withRunContext,
} from './lib/logger.js'
export type { LogLevel, LogFormat, LoggerConfig, LoggerProvider, RunContext } from './lib/logger.js'
