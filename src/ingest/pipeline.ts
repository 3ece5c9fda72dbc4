/**
 * Complete conversion pipeline for MediaWiki SQL dumps
 *
 * Composes: text -> scan statements -> tokenize/assemble -> filter -> CSV
 * Every stage is a TransformStream, so at most a tuple's worth of text is
 * in flight at any time.
 */

import { rm } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { TransformStream, type ReadableStream, type WritableStream } from 'node:stream/web';
import type {
  CompressionType,
  ConversionOptions,
  ConversionStats,
  FilterSpec,
  Row,
} from './types.js';
import { columnNames } from '../shared/types.js';
import { StatementScanner, createStatementScanner } from './scan-statements.js';
import { createRowAssembler } from './assemble.js';
import { RowFilter, createRowFilter } from './filter.js';
import { openDumpFile, parseDumpFilename } from './source.js';
import { createCsvEncoder, openCsvFileSink } from '../storage/csv-writer.js';
import { getTableSchema } from '../tables/registry.js';
import { CSV_EXTENSION, DEFAULT_PROGRESS_INTERVAL } from '../lib/constants.js';
import { ConfigurationError } from '../lib/errors.js';
import {
  createLogger,
  generateRunId,
  withRunContext,
  type Logger,
} from '../lib/logger.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('ingest:pipeline');

/** A running conversion */
export interface ConversionRun {
  /** CSV text, header first */
  csv: ReadableStream<string>;
  /** Retained column names (the CSV header) */
  header: readonly string[];
  /** Snapshot of the run's statistics */
  stats: () => ConversionStats;
}

/** Conversion options that also accept an already validated filter */
export type PipelineOptions = Omit<ConversionOptions, 'filter'> & {
  filter?: FilterSpec | RowFilter;
};

/**
 * Report progress if callback is provided
 */
function reportProgress(
  stats: ConversionStats,
  onProgress?: (stats: ConversionStats) => void
): void {
  if (onProgress) {
    onProgress({ ...stats });
  }
}

function logProgress(log: Logger, stats: ConversionStats): void {
  log.info('Progress', {
    elapsedSeconds: Number((stats.elapsedMs / 1000).toFixed(2)),
    rowsPerSecond: Math.round(stats.rowsPerSecond),
    rowsParsed: stats.rowsParsed,
    rowsWritten: stats.rowsWritten,
    rowsFiltered: stats.rowsFiltered,
  });
}

/**
 * Create a conversion pipeline over a stream of dump text.
 *
 * The filter is validated before any text is read; a ConfigurationError is
 * thrown synchronously from this call.
 *
 * @param text - Decoded dump text
 * @param options - Schema, filter and reporting options
 * @returns The CSV stream and a statistics accessor
 *
 * @example
 * ```typescript
 * const run = createConversionStream(text, {
 *   schema: getTableSchema('page'),
 *   filter: { allowlists: { page_namespace: ['0'] } },
 * });
 * await run.csv.pipeTo(sink);
 * console.log(run.stats().rowsWritten);
 * ```
 */
export function createConversionStream(
  text: ReadableStream<string>,
  options: PipelineOptions
): ConversionRun {
  const { schema, strictTypes = false, maxStatements, onProgress } = options;
  const log = (options.logger ?? getLog()).withFields({ table: schema.tableName });
  const progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;

  if (!Number.isInteger(progressInterval) || progressInterval <= 0) {
    throw new ConfigurationError(`progressInterval must be a positive integer, got ${progressInterval}`);
  }
  if (maxStatements !== undefined && (!Number.isInteger(maxStatements) || maxStatements <= 0)) {
    throw new ConfigurationError(`maxStatements must be a positive integer, got ${maxStatements}`);
  }

  const filter =
    options.filter instanceof RowFilter ? options.filter : new RowFilter(schema, options.filter);

  const scanner = new StatementScanner(
    {
      table: schema.tableName,
      columns: columnNames(schema),
      ...(maxStatements !== undefined ? { maxStatements } : {}),
    },
    log.child('scan')
  );

  // Initialize statistics
  const startTime = Date.now();
  let rowsParsed = 0;

  const stats = (): ConversionStats => {
    const elapsedMs = Date.now() - startTime;
    return {
      statementsScanned: scanner.statementsScanned,
      statementsSkipped: scanner.statementsSkipped,
      rowsParsed,
      rowsWritten: filter.passed,
      rowsFiltered: filter.rejected,
      startTime,
      elapsedMs,
      rowsPerSecond: elapsedMs > 0 ? rowsParsed / (elapsedMs / 1000) : 0,
    };
  };

  const counter = new TransformStream<Row, Row>({
    transform(row, controller) {
      rowsParsed++;
      controller.enqueue(row);

      // Report progress periodically
      if (rowsParsed % progressInterval === 0) {
        const snapshot = stats();
        logProgress(log, snapshot);
        reportProgress(snapshot, onProgress);
      }
    },
  });

  const completion = new TransformStream<string, string>({
    flush() {
      const snapshot = stats();
      log.info('Conversion complete', {
        statementsScanned: snapshot.statementsScanned,
        statementsSkipped: snapshot.statementsSkipped,
        rowsParsed: snapshot.rowsParsed,
        rowsWritten: snapshot.rowsWritten,
        rowsFiltered: snapshot.rowsFiltered,
        elapsedMs: snapshot.elapsedMs,
      });
      reportProgress(snapshot, onProgress);
    },
  });

  log.debug('Starting conversion', {
    columns: filter.columns.length,
    strictTypes,
    maxStatements,
  });

  const csv = text
    .pipeThrough(createStatementScanner(scanner))
    .pipeThrough(createRowAssembler(schema, { strictTypes }))
    .pipeThrough(counter)
    .pipeThrough(createRowFilter(filter))
    .pipeThrough(createCsvEncoder(filter.columns))
    .pipeThrough(completion);

  return { csv, header: filter.columns, stats };
}

/**
 * Convert dump text to CSV, writing into a sink.
 *
 * The first error aborts the sink and is rethrown; no row after it is
 * written.
 *
 * @param text - Decoded dump text
 * @param sink - Destination for CSV text
 * @param options - Schema, filter and reporting options
 * @returns Final statistics
 */
export async function convertDump(
  text: ReadableStream<string>,
  sink: WritableStream<string>,
  options: PipelineOptions
): Promise<ConversionStats> {
  let run: ConversionRun;
  try {
    run = createConversionStream(text, options);
  } catch (error) {
    await text.cancel(error);
    throw error;
  }

  await run.csv.pipeTo(sink);
  return run.stats();
}

/** Options for converting a dump file */
export interface DumpFileConversionOptions extends Omit<ConversionOptions, 'schema'> {
  /** Table name (default: parsed from the dump file name) */
  table?: string;
  /** Output file path, or a sink (default: `<basename>.csv` in cwd) */
  output?: string | WritableStream<string>;
  /** Compression type (default: from extension, then magic bytes) */
  compression?: CompressionType;
}

/** Outcome of a file conversion */
export interface DumpFileConversionResult extends ConversionStats {
  /** Table converted */
  table: string;
  /** Output path, when writing to a file */
  outputPath?: string;
  /** CSV header */
  header: readonly string[];
}

/** Strip `.sql` / `.sql.gz` from a file name */
function dumpBasename(path: string): string {
  return basename(path).replace(/\.sql(\.gz)?$/i, '').replace(/\.gz$/i, '');
}

/**
 * Default CSV path for a dump: `<dir>/<dump basename>.csv`.
 *
 * @example
 * ```typescript
 * defaultOutputPath('/data/enwiki-20200901-page.sql.gz', '/out');
 * // '/out/enwiki-20200901-page.csv'
 * ```
 */
export function defaultOutputPath(inputPath: string, dir: string = process.cwd()): string {
  return join(dir, `${dumpBasename(inputPath)}${CSV_EXTENSION}`);
}

/**
 * Convert a dump file to CSV.
 *
 * Table, schema and filter are all validated before any file is opened. A
 * failed conversion removes its partial output file.
 *
 * @param inputPath - Path to a `.sql` or `.sql.gz` dump
 * @param options - Table override, output target, filter and reporting
 * @returns Statistics plus the table and output path
 */
export async function convertDumpFile(
  inputPath: string,
  options: DumpFileConversionOptions = {}
): Promise<DumpFileConversionResult> {
  const tableName = options.table ?? parseDumpFilename(inputPath).tableName;
  const schema = getTableSchema(tableName);
  const filter = new RowFilter(schema, options.filter);

  return withRunContext(
    { runId: generateRunId(), fields: { table: tableName } },
    async () => {
      const log = (options.logger ?? getLog()).withOperation('convert');
      const { output = defaultOutputPath(inputPath) } = options;
      const outputPath = typeof output === 'string' ? output : undefined;

      const text = await openDumpFile(inputPath, {
        logger: log,
        ...(options.compression !== undefined ? { compression: options.compression } : {}),
      });
      let sink: WritableStream<string>;
      try {
        sink = typeof output === 'string' ? await openCsvFileSink(output) : output;
      } catch (error) {
        await text.cancel(error);
        throw error;
      }

      log.info('Writing CSV', { output: outputPath ?? 'stream', columns: filter.columns });

      try {
        const stats = await convertDump(text, sink, { ...options, schema, filter, logger: log });
        return {
          ...stats,
          table: tableName,
          header: filter.columns,
          ...(outputPath !== undefined ? { outputPath } : {}),
        };
      } catch (error) {
        if (outputPath !== undefined) {
          await rm(outputPath, { force: true });
          log.warn('Removed incomplete output', { output: outputPath, error });
        }
        throw error;
      }
    }
  );
}
