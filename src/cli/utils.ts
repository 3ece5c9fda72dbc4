/**
 * CLI Utilities
 *
 * Shared utilities for the wikisql CLI commands.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { homedir } from 'node:os';
import { createLogger } from '../lib/logger.js';
import {
  type CliConfig,
  safeValidateCliConfig,
  safeValidateFilterSpec,
  formatValidationError,
} from '../lib/config-schema.js';
import { ConfigurationError } from '../lib/errors.js';
import { CONFIG_FILE_NAME } from '../lib/constants.js';
import type { FilterSpec } from '../ingest/types.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('cli');

const ESC = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
} as const;

/** Color output helpers */
export const color = {
  bold: (s: string) => `${ESC.bold}${s}${ESC.reset}`,
  dim: (s: string) => `${ESC.dim}${s}${ESC.reset}`,
  cyan: (s: string) => `${ESC.cyan}${s}${ESC.reset}`,
  error: (s: string) => `${ESC.red}${ESC.bold}${s}${ESC.reset}`,
};

/** Strip ANSI codes from string */
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Format duration as human-readable string
 */
export function formatDuration(seconds: number): string {
  if (!isFinite(seconds) || seconds < 0) return '--:--';
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) {
    const m = Math.floor(seconds / 60);
    const s = Math.round(seconds % 60);
    return `${m}m ${s}s`;
  }
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  return `${h}h ${m}m`;
}

/**
 * Format number with commas
 */
export function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Render rows as an indented, left-aligned table under a bold header.
 * Columns come from the keys of the first row.
 */
export function formatTable(rows: Record<string, unknown>[]): string {
  const [first] = rows;
  if (!first) return '';

  const cols = Object.keys(first);
  const cells = rows.map((row) => cols.map((col) => String(row[col] ?? '')));
  const widths = cols.map((col, i) =>
    Math.max(col.length, ...cells.map((line) => stripAnsi(line[i] ?? '').length))
  );
  const pad = (value: string, i: number) =>
    value + ' '.repeat(Math.max(0, (widths[i] ?? 0) - stripAnsi(value).length));

  return [
    cols.map((col, i) => color.bold(pad(col, i))).join('  '),
    widths.map((width) => color.dim('─'.repeat(width))).join('  '),
    ...cells.map((line) => line.map(pad).join('  ')),
  ]
    .map((line) => `    ${line}`)
    .join('\n');
}

// Re-export CliConfig type from schema
export type { CliConfig } from '../lib/config-schema.js';

/** Parse a positive integer environment value; anything else is left for the schema to reject */
function envNumber(value: string): number | string {
  return /^\d+$/.test(value) ? parseInt(value, 10) : value;
}

/**
 * Load configuration from .wikisqlrc or environment
 *
 * Configuration is loaded from (in order of precedence):
 * 1. Environment variables (highest priority)
 * 2. .wikisqlrc in current directory
 * 3. .wikisqlrc in home directory (lowest priority)
 *
 * @param dirs - Directories searched for the config file, first match wins
 * @returns Validated CLI configuration
 * @throws {ConfigurationError} If a config file is not valid JSON or validation fails
 */
export async function loadConfig(
  dirs: readonly string[] = [process.cwd(), homedir()]
): Promise<CliConfig> {
  const config: Record<string, unknown> = {};

  for (const dir of dirs) {
    const configPath = join(dir, CONFIG_FILE_NAME);
    let data: string;
    try {
      data = await readFile(configPath, 'utf-8');
    } catch {
      // No config file here
      continue;
    }
    const parsed = parseJson(data, configPath);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationError(`${configPath} must contain a JSON object`);
    }
    Object.assign(config, parsed);
    break;
  }

  // Override with environment variables
  const envOutputDir = process.env['WIKISQL_OUTPUT_DIR'];
  if (envOutputDir) {
    config['outputDir'] = envOutputDir;
  }
  const envInterval = process.env['WIKISQL_PROGRESS_INTERVAL'];
  if (envInterval) {
    config['progressInterval'] = envNumber(envInterval);
  }
  const envCompression = process.env['WIKISQL_COMPRESSION'];
  if (envCompression) {
    config['compression'] = envCompression;
  }

  // Validate configuration with Zod
  const result = safeValidateCliConfig(config);
  if (!result.success) {
    const errorMessage = formatValidationError(result.error);
    throw new ConfigurationError(`Invalid configuration:\n${errorMessage}`);
  }

  return result.data;
}

function parseJson(data: string, source: string): unknown {
  try {
    return JSON.parse(data);
  } catch (error) {
    throw new ConfigurationError(
      `${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Load a JSON filter file
 *
 * @throws {ConfigurationError} If the file is unreadable or does not describe a filter
 */
export async function loadFilterFile(path: string): Promise<FilterSpec> {
  let data: string;
  try {
    data = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `cannot read filter file ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = safeValidateFilterSpec(parseJson(data, path));
  if (!result.success) {
    throw new ConfigurationError(`Invalid filter file ${path}:\n${formatValidationError(result.error)}`);
  }
  return result.data;
}

/**
 * Print error message and exit
 */
export function fatal(message: string, exitCode = 1): never {
  getLog().withOperation('exit').debug(message, { exitCode });
  console.error(`\n${color.error('Error:')} ${message}\n`);
  process.exit(exitCode);
}

/**
 * Print info message (stderr, so it never mixes with CSV on stdout)
 */
export function info(message: string): void {
  console.error(`${color.cyan('Info:')} ${message}`);
}

/**
 * Parse comma-separated list
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Parse a `column=v1,v2` assignment.
 *
 * Values are kept verbatim (no trimming), and `column=` yields one empty
 * value, which matches NULL and empty-string fields.
 *
 * @throws {ConfigurationError} If there is no `=` or the column is empty
 */
export function parseAssignment(value: string): { column: string; values: string[] } {
  const eq = value.indexOf('=');
  const column = eq === -1 ? '' : value.slice(0, eq).trim();
  if (column === '') {
    throw new ConfigurationError(`expected column=value[,value...], got "${value}"`);
  }
  return { column, values: value.slice(eq + 1).split(',') };
}

/**
 * Resolve path relative to cwd or absolute
 */
export function resolvePath(p: string): string {
  if (p === '~' || p.startsWith('~/')) {
    return join(homedir(), p.slice(1));
  }
  if (isAbsolute(p)) {
    return p;
  }
  return join(process.cwd(), p);
}
