/**
 * Structured logging
 *
 * Every line goes to stderr, as text for terminals or JSON for log
 * collectors (`LOG_FORMAT=json`). `LOG_LEVEL` sets the threshold. Lines
 * written inside `withRunContext` carry that run's ID and fields, so the
 * output of one conversion can be picked out of a shared log.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'text' | 'json';

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/** Check whether a string names a log level */
export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

// ============================================================================
// Run context
// ============================================================================

/** Identity of one conversion run */
export interface RunContext {
  runId: string;
  /** Fields added to every line logged during the run */
  fields?: Record<string, unknown>;
}

const runContext = new AsyncLocalStorage<RunContext>();

/** New random run ID */
export function generateRunId(): string {
  return randomUUID();
}

/**
 * Run `fn` inside a run context. The context follows async work started
 * by `fn`, so a returned promise keeps it until it settles.
 */
export function withRunContext<T>(context: RunContext, fn: () => T): T {
  return runContext.run(context, fn);
}

// ============================================================================
// Entries
// ============================================================================

/** One structured log line */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  context: string;
  message: string;
  runId?: string;
  operation?: string;
  data?: Record<string, unknown>;
  stack?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  /** Module path, e.g. `ingest:scan` */
  context: string;
  /** Prefix text lines with the local time */
  timestamps: boolean;
  service: string;
  /** Tag added to every line, e.g. `convert` */
  operation?: string;
  /** Fields merged into every line's data */
  fields?: Record<string, unknown>;
}

function levelFromEnv(): LogLevel {
  const level = process.env['LOG_LEVEL']?.toLowerCase();
  if (level !== undefined && isLogLevel(level)) {
    return level;
  }
  return process.env['NODE_ENV'] === 'development' ? 'debug' : 'info';
}

function formatFromEnv(): LogFormat {
  const format = process.env['LOG_FORMAT']?.toLowerCase();
  if (format === 'json' || format === 'text') {
    return format;
  }
  return process.env['NODE_ENV'] === 'production' ? 'json' : 'text';
}

function resolveConfig(config: Partial<LoggerConfig>): LoggerConfig {
  return {
    level: config.level ?? levelFromEnv(),
    format: config.format ?? formatFromEnv(),
    context: config.context ?? 'wikisql',
    timestamps: config.timestamps ?? true,
    service: config.service ?? process.env['SERVICE_NAME'] ?? 'wikisql',
    ...(config.operation !== undefined ? { operation: config.operation } : {}),
    ...(config.fields !== undefined ? { fields: config.fields } : {}),
  };
}

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
} as const;

const LEVEL_STYLE: Record<LogLevel, { label: string; color: string }> = {
  debug: { label: 'DEBUG', color: '\x1b[90m' },
  info: { label: 'INFO ', color: '\x1b[34m' },
  warn: { label: 'WARN ', color: '\x1b[33m' },
  error: { label: 'ERROR', color: '\x1b[31m' },
};

function dim(text: string): string {
  return `${ANSI.dim}${text}${ANSI.reset}`;
}

function renderText(entry: LogEntry, timestamps: boolean): string {
  const style = LEVEL_STYLE[entry.level];
  const parts: string[] = [];

  if (timestamps) {
    parts.push(dim(new Date(entry.timestamp).toLocaleTimeString('en-GB', { hour12: false })));
  }
  parts.push(`${style.color}${style.label}${ANSI.reset}`);
  if (entry.runId) {
    // The first UUID group is enough to tell runs apart on a terminal
    parts.push(dim(`[${entry.runId.slice(0, 8)}]`));
  }
  parts.push(`${ANSI.cyan}[${entry.context}]${ANSI.reset}`);
  if (entry.operation) {
    parts.push(dim(`(${entry.operation})`));
  }
  parts.push(entry.message);
  if (entry.data) {
    const pairs = Object.entries(entry.data).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    if (pairs.length > 0) {
      parts.push(dim(pairs.join(' ')));
    }
  }

  const line = parts.join(' ');
  return entry.stack ? `${line}\n${dim(entry.stack)}` : line;
}

// ============================================================================
// Logger
// ============================================================================

export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = resolveConfig(config);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  /** Logger for a sub-module: `ingest` becomes `ingest:scan` */
  child(context: string): Logger {
    return new Logger({ ...this.config, context: `${this.config.context}:${context}` });
  }

  /** Logger whose lines are all tagged with an operation name */
  withOperation(operation: string): Logger {
    return new Logger({ ...this.config, operation });
  }

  /** Logger that adds fixed fields to every line */
  withFields(fields: Record<string, unknown>): Logger {
    return new Logger({ ...this.config, fields: { ...this.config.fields, ...fields } });
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (SEVERITY[level] < SEVERITY[this.config.level]) {
      return;
    }

    const run = runContext.getStore();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.config.service,
      context: this.config.context,
      message,
    };
    if (run) {
      entry.runId = run.runId;
    }
    if (this.config.operation) {
      entry.operation = this.config.operation;
    }

    const merged: Record<string, unknown> = { ...this.config.fields, ...run?.fields, ...data };
    // An Error under `error` is logged as its message, with the stack beside it
    const error = merged['error'];
    if (error instanceof Error) {
      merged['error'] = error.message;
      merged['errorName'] = error.name;
      if (error.stack) {
        entry.stack = error.stack;
      }
    }
    if (Object.keys(merged).length > 0) {
      entry.data = merged;
    }

    // stdout may be carrying CSV
    console.error(
      this.config.format === 'json' ? JSON.stringify(entry) : renderText(entry, this.config.timestamps)
    );
  }
}

// ============================================================================
// Providers
// ============================================================================

/** Factory for module loggers; replaceable for tests or CLI flags */
export interface LoggerProvider {
  createLogger(context: string): Logger;
}

/**
 * Creates one cached logger per context, all sharing the given settings
 * (e.g. the level chosen by `--verbose`).
 */
export class DefaultLoggerProvider implements LoggerProvider {
  private readonly cache = new Map<string, Logger>();

  constructor(private readonly shared: Partial<Omit<LoggerConfig, 'context'>> = {}) {}

  createLogger(context: string): Logger {
    let logger = this.cache.get(context);
    if (!logger) {
      logger = new Logger({ ...this.shared, context });
      this.cache.set(context, logger);
    }
    return logger;
  }
}

let provider: LoggerProvider = new DefaultLoggerProvider();

/**
 * Replace the logger provider.
 *
 * @returns The previous provider, for restoring it
 */
export function setLoggerProvider(next: LoggerProvider): LoggerProvider {
  const previous = provider;
  provider = next;
  return previous;
}

export function resetLoggerProvider(): void {
  provider = new DefaultLoggerProvider();
}

/** Logger for a module, from the current provider */
export function createLogger(context: string): Logger {
  return provider.createLogger(context);
}
