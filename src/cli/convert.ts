/**
 * Convert Command
 *
 * Convert one MediaWiki SQL dump file into a CSV file (or stdout).
 */

import { Command } from 'commander';
import { mkdir } from 'node:fs/promises';
import {
  color,
  formatDuration,
  formatNumber,
  loadConfig,
  loadFilterFile,
  fatal,
  parseAssignment,
  parseList,
  resolvePath,
  info,
} from './utils.js';
import { convertDumpFile, defaultOutputPath } from '../ingest/pipeline.js';
import type { CompressionType, FilterSpec } from '../ingest/types.js';
import { createCsvStreamSink } from '../storage/csv-writer.js';
import { ConfigurationError, getExitCodeForKind, isTypedError } from '../lib/errors.js';
import { DefaultLoggerProvider, setLoggerProvider } from '../lib/logger.js';

/** Convert command options */
export interface ConvertOptions {
  output?: string;
  table?: string;
  keep?: string;
  drop?: string;
  allow: string[];
  block: string[];
  filters?: string;
  maxStatements?: string;
  progressInterval?: string;
  strictTypes: boolean;
  compression?: string;
  verbose: boolean;
}

/** Accumulate repeatable options */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePositiveInt(value: string, flag: string): number {
  if (!/^\d+$/.test(value) || parseInt(value, 10) <= 0) {
    throw new ConfigurationError(`${flag} must be a positive integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

function parseCompression(value: string): CompressionType {
  if (value === 'auto' || value === 'gzip' || value === 'none') {
    return value;
  }
  throw new ConfigurationError(`--compression must be one of auto, gzip, none; got "${value}"`);
}

function toValueLists(assignments: readonly string[], flag: string): Record<string, string[]> {
  const lists: Record<string, string[]> = {};
  for (const assignment of assignments) {
    const { column, values } = parseAssignment(assignment);
    if (lists[column] !== undefined) {
      throw new ConfigurationError(`${flag} given twice for column ${column}`);
    }
    lists[column] = values;
  }
  return lists;
}

/**
 * Build the filter from a JSON filter file and the column/value flags.
 * Flags replace the file's setting of the same kind.
 */
export async function buildFilterSpec(options: ConvertOptions): Promise<FilterSpec> {
  const spec: FilterSpec = options.filters ? await loadFilterFile(resolvePath(options.filters)) : {};

  return {
    ...spec,
    ...(options.keep !== undefined ? { keepColumnNames: parseList(options.keep) } : {}),
    ...(options.drop !== undefined ? { dropColumnNames: parseList(options.drop) } : {}),
    ...(options.allow.length > 0 ? { allowlists: toValueLists(options.allow, '--allow') } : {}),
    ...(options.block.length > 0 ? { blocklists: toValueLists(options.block, '--block') } : {}),
  };
}

async function runConvert(dumpFile: string, options: ConvertOptions): Promise<void> {
  const config = await loadConfig();

  const level = options.verbose ? 'debug' : config.logLevel;
  if (level !== undefined) {
    setLoggerProvider(new DefaultLoggerProvider({ level }));
  }

  const inputPath = resolvePath(dumpFile);
  const filter = await buildFilterSpec(options);
  const compression = options.compression
    ? parseCompression(options.compression)
    : config.compression;
  const progressInterval = options.progressInterval
    ? parsePositiveInt(options.progressInterval, '--progress-interval')
    : config.progressInterval;
  const maxStatements = options.maxStatements
    ? parsePositiveInt(options.maxStatements, '--max-statements')
    : undefined;

  const toStdout = options.output === '-';
  let outputPath: string | undefined;
  if (!toStdout) {
    if (options.output) {
      outputPath = resolvePath(options.output);
    } else if (config.outputDir) {
      const outputDir = resolvePath(config.outputDir);
      await mkdir(outputDir, { recursive: true });
      outputPath = defaultOutputPath(inputPath, outputDir);
    }
  }

  const result = await convertDumpFile(inputPath, {
    filter,
    strictTypes: options.strictTypes,
    ...(options.table !== undefined ? { table: options.table } : {}),
    ...(compression !== undefined ? { compression } : {}),
    ...(progressInterval !== undefined ? { progressInterval } : {}),
    ...(maxStatements !== undefined ? { maxStatements } : {}),
    ...(toStdout
      ? { output: createCsvStreamSink(process.stdout) }
      : outputPath !== undefined
        ? { output: outputPath }
        : {}),
  });

  info(
    `${color.bold(result.table)}: ${formatNumber(result.rowsWritten)} of ` +
      `${formatNumber(result.rowsParsed)} rows written ` +
      `(${formatNumber(result.statementsScanned)} statements, ` +
      `${formatDuration(result.elapsedMs / 1000)})` +
      (result.outputPath ? ` to ${color.cyan(result.outputPath)}` : '')
  );
}

export const convertCommand = new Command('convert')
  .description('Convert a MediaWiki SQL dump (.sql or .sql.gz) to CSV')
  .argument('<dump-file>', 'Dump file named WIKI-YYYYMMDD-TABLE.sql[.gz]')
  .option('-o, --output <file>', 'Output CSV file, or - for stdout')
  .option('-t, --table <name>', 'Table name (default: from the file name)')
  .option('-k, --keep <columns>', 'Columns to keep (comma-separated)')
  .option('-d, --drop <columns>', 'Columns to drop (comma-separated)')
  .option('-a, --allow <column=values>', 'Keep rows whose column is one of the values (repeatable)', collect, [])
  .option('-b, --block <column=values>', 'Drop rows whose column is one of the values (repeatable)', collect, [])
  .option('-f, --filters <json-file>', 'JSON file with keepColumnNames, dropColumnNames, allowlists, blocklists')
  .option('-m, --max-statements <n>', 'Stop after this many INSERT statements')
  .option('--progress-interval <n>', 'Rows between progress log lines')
  .option('--strict-types', 'Check each field against its column type', false)
  .option('--compression <type>', 'Input compression: auto, gzip or none')
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (dumpFile: string, options: ConvertOptions) => {
    try {
      await runConvert(dumpFile, options);
    } catch (error) {
      if (isTypedError(error)) {
        fatal(error.message, getExitCodeForKind(error.kind));
      }
      fatal(error instanceof Error ? error.message : String(error));
    }
  });
