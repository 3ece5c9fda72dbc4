/**
 * Streaming statement scanner for MySQL dump text
 *
 * Finds `INSERT INTO ... VALUES` statements and cuts their VALUES lists
 * into one RawTuple per `(...)`. Text arrives in arbitrary chunks; chunk
 * boundaries may split a statement, a tuple, or an escape sequence.
 *
 * The scanner only tracks quotes, escapes and parenthesis depth so that a
 * `)` or `;` inside a string is not taken as structure. Decoding values is
 * left to the tokenizer. At most one tuple (or one statement header) is
 * held in memory at a time.
 */

import { TransformStream } from 'node:stream/web';
import type { RawTuple, ScannerOptions } from './types.js';
import {
  MalformedStatementError,
  MalformedTupleError,
  SchemaMismatchError,
} from '../lib/errors.js';
import { DEFAULT_MAX_HEADER_LENGTH } from '../lib/constants.js';
import { createLogger, type Logger } from '../lib/logger.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('ingest:scan');

const INSERT_PREFIX = 'INSERT INTO';

/** `INSERT INTO `table` [(`a`,`b`)] VALUES` */
const HEADER_PATTERN = /^INSERT INTO\s+`?([^`\s(]+)`?\s*(?:\(([^)]*)\))?\s*VALUES\s*$/;

const VALUES_SUFFIX = /\bVALUES\s*$/;

/** Scanner state machine states */
type ScanState =
  | 'lineStart'
  | 'skipLine'
  | 'header'
  | 'betweenTuples'
  | 'inTuple'
  | 'skipStatement'
  | 'done';

function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r';
}

/**
 * Incremental scanner. Feed text with `push()`, then call `finish()` once
 * the input is exhausted.
 *
 * @example
 * ```typescript
 * const scanner = new StatementScanner({ table: 'page' });
 * scanner.push("INSERT INTO `page` VALUES (1,0,'A'),(2,", emit);
 * scanner.push("0,'B');\n", emit);
 * scanner.finish();
 * ```
 */
export class StatementScanner {
  private readonly options: ScannerOptions;
  private readonly maxHeaderLength: number;
  private readonly log: Logger;

  private state: ScanState = 'lineStart';
  private target: string | undefined;
  private currentTable = '';

  /** Characters of the current line prefix or statement header */
  private headerBuffer = '';
  /** Characters of the current tuple */
  private tupleBuffer = '';

  private depth = 0;
  private inQuote = false;
  private escapePending = false;
  private sawComma = false;

  private line = 1;
  private tupleLine = 1;
  private statementNumber = 0;
  private tupleCount = 0;
  private scanned = 0;
  private skipped = 0;
  private peakBuffered = 0;

  constructor(options: ScannerOptions = {}, logger?: Logger) {
    this.options = options;
    this.target = options.table;
    this.maxHeaderLength = options.maxHeaderLength ?? DEFAULT_MAX_HEADER_LENGTH;
    this.log = logger ?? getLog();
  }

  /** Table whose tuples are emitted (undefined until known) */
  get table(): string | undefined {
    return this.target;
  }

  /** True once `maxStatements` has been reached */
  get done(): boolean {
    return this.state === 'done';
  }

  /** INSERT statements of the target table seen so far */
  get statementsScanned(): number {
    return this.scanned;
  }

  /** INSERT statements of other tables skipped so far */
  get statementsSkipped(): number {
    return this.skipped;
  }

  /** Tuples emitted so far */
  get tuplesEmitted(): number {
    return this.tupleCount;
  }

  /** Largest number of characters held at once */
  get peakBufferedChars(): number {
    return this.peakBuffered;
  }

  /**
   * Scan a chunk of text, calling `emit` for each complete tuple of the
   * target table.
   *
   * @throws {MalformedStatementError} On broken statement structure
   * @throws {SchemaMismatchError} When a statement's column list differs
   *   from the expected columns
   */
  push(chunk: string, emit: (tuple: RawTuple) => void): void {
    const len = chunk.length;
    let i = 0;

    while (i < len && this.state !== 'done') {
      switch (this.state) {
        case 'lineStart':
          i = this.scanLineStart(chunk, i);
          break;
        case 'skipLine':
          i = this.scanSkippedLine(chunk, i);
          break;
        case 'header':
          i = this.scanHeader(chunk, i);
          break;
        case 'betweenTuples':
          i = this.scanBetweenTuples(chunk, i);
          break;
        case 'inTuple':
          i = this.scanTuple(chunk, i, emit);
          break;
        case 'skipStatement':
          i = this.scanSkippedStatement(chunk, i);
          break;
      }
    }
  }

  /**
   * Signal end of input.
   *
   * @throws {MalformedTupleError} If the input ended inside a tuple
   * @throws {MalformedStatementError} If the input ended inside a statement
   */
  finish(): void {
    switch (this.state) {
      case 'inTuple':
        throw new MalformedTupleError('input ended inside tuple', {
          tupleIndex: this.tupleCount + 1,
          statement: this.statementNumber,
          line: this.tupleLine,
          span: this.tupleBuffer,
        });
      case 'header':
        throw new MalformedStatementError('input ended inside INSERT statement header', {
          line: this.line,
          span: this.headerBuffer,
        });
      case 'betweenTuples':
      case 'skipStatement':
        throw new MalformedStatementError('input ended before statement terminator', {
          statement: this.statementNumber,
          line: this.line,
        });
      default:
        this.log.debug('Scan finished', {
          statementsScanned: this.scanned,
          statementsSkipped: this.skipped,
          tuples: this.tupleCount,
          lines: this.line,
        });
    }
  }

  private noteBuffered(size: number): void {
    if (size > this.peakBuffered) {
      this.peakBuffered = size;
    }
  }

  /** Collect just enough of a line to tell whether it starts an INSERT */
  private scanLineStart(chunk: string, i: number): number {
    for (; i < chunk.length; i++) {
      const ch = chunk.charAt(i);
      if (ch === '\n') {
        this.line++;
        this.headerBuffer = '';
        continue;
      }
      if (this.headerBuffer === '' && isBlank(ch)) {
        continue;
      }

      this.headerBuffer += ch;
      if (!INSERT_PREFIX.startsWith(this.headerBuffer)) {
        this.headerBuffer = '';
        this.state = 'skipLine';
        return i + 1;
      }
      if (this.headerBuffer.length === INSERT_PREFIX.length) {
        this.state = 'header';
        return i + 1;
      }
    }
    return i;
  }

  private scanSkippedLine(chunk: string, i: number): number {
    const newline = chunk.indexOf('\n', i);
    if (newline === -1) {
      return chunk.length;
    }
    this.line++;
    this.state = 'lineStart';
    return newline + 1;
  }

  private scanHeader(chunk: string, i: number): number {
    for (; i < chunk.length; i++) {
      const ch = chunk.charAt(i);
      if (ch === '(' && VALUES_SUFFIX.test(this.headerBuffer)) {
        this.beginStatement();
        return i + 1;
      }
      if (ch === ';') {
        throw new MalformedStatementError('INSERT statement has no VALUES list', {
          line: this.line,
          span: this.headerBuffer,
        });
      }
      if (ch === '\n') this.line++;

      this.headerBuffer += ch;
      this.noteBuffered(this.headerBuffer.length);
      if (this.headerBuffer.length > this.maxHeaderLength) {
        throw new MalformedStatementError(
          `INSERT statement header exceeds ${this.maxHeaderLength} characters`,
          { line: this.line, span: this.headerBuffer }
        );
      }
    }
    return i;
  }

  /** Parse the header and route the statement; the first tuple's `(` is consumed */
  private beginStatement(): void {
    const header = this.headerBuffer.trim();
    this.headerBuffer = '';
    this.statementNumber++;

    const match = HEADER_PATTERN.exec(header);
    const tableName = match?.[1];
    if (!match || tableName === undefined) {
      throw new MalformedStatementError('unrecognized INSERT statement header', {
        statement: this.statementNumber,
        line: this.line,
        span: header,
      });
    }

    if (this.target === undefined) {
      this.target = tableName;
      this.log.info('Detected table from first INSERT statement', { table: tableName });
    }

    if (tableName !== this.target) {
      this.skipped++;
      this.log.debug('Skipping statement for other table', {
        table: tableName,
        statement: this.statementNumber,
      });
      this.depth = 1;
      this.inQuote = false;
      this.escapePending = false;
      this.state = 'skipStatement';
      return;
    }

    const { maxStatements } = this.options;
    if (maxStatements !== undefined && this.scanned >= maxStatements) {
      this.log.info('Reached statement limit', { maxStatements });
      this.state = 'done';
      return;
    }

    const columnList = match[2];
    if (columnList !== undefined && this.options.columns) {
      this.checkColumnList(columnList);
    }

    this.scanned++;
    this.currentTable = tableName;
    this.beginTuple();
  }

  private checkColumnList(columnList: string): void {
    const declared = columnList
      .split(',')
      .map((name) => name.trim().replace(/^`|`$/g, ''));
    const expected = this.options.columns ?? [];
    const matches =
      declared.length === expected.length &&
      declared.every((name, i) => name === expected[i]);

    if (!matches) {
      throw new SchemaMismatchError(
        `statement columns (${declared.join(', ')}) do not match schema (${expected.join(', ')})`,
        { statement: this.statementNumber, line: this.line }
      );
    }
  }

  private beginTuple(): void {
    this.tupleBuffer = '';
    this.tupleLine = this.line;
    this.depth = 1;
    this.inQuote = false;
    this.escapePending = false;
    this.sawComma = false;
    this.state = 'inTuple';
  }

  private scanTuple(chunk: string, i: number, emit: (tuple: RawTuple) => void): number {
    const start = i;

    for (; i < chunk.length; i++) {
      const ch = chunk.charAt(i);
      if (ch === '\n') this.line++;

      if (this.escapePending) {
        this.escapePending = false;
        continue;
      }
      if (this.inQuote) {
        if (ch === '\\') this.escapePending = true;
        else if (ch === "'") this.inQuote = false;
        continue;
      }

      if (ch === "'") {
        this.inQuote = true;
      } else if (ch === '(') {
        this.depth++;
      } else if (ch === ')') {
        this.depth--;
        if (this.depth === 0) {
          const text = this.tupleBuffer + chunk.slice(start, i);
          this.tupleBuffer = '';
          this.noteBuffered(text.length);
          this.tupleCount++;
          this.state = 'betweenTuples';
          emit({
            table: this.currentTable,
            text,
            index: this.tupleCount,
            statement: this.statementNumber,
            line: this.tupleLine,
          });
          return i + 1;
        }
      }
    }

    this.tupleBuffer += chunk.slice(start);
    this.noteBuffered(this.tupleBuffer.length);
    return i;
  }

  private scanBetweenTuples(chunk: string, i: number): number {
    for (; i < chunk.length; i++) {
      const ch = chunk.charAt(i);
      if (ch === '\n') {
        this.line++;
        continue;
      }
      if (isBlank(ch)) continue;

      if (ch === ',' && !this.sawComma) {
        this.sawComma = true;
        continue;
      }
      if (ch === '(' && this.sawComma) {
        this.beginTuple();
        return i + 1;
      }
      if (ch === ';' && !this.sawComma) {
        this.state = 'lineStart';
        return i + 1;
      }

      throw new MalformedStatementError(
        `unexpected ${JSON.stringify(ch)} between tuples`,
        { statement: this.statementNumber, line: this.line }
      );
    }
    return i;
  }

  /** Consume a statement for another table, honoring quotes so `;` in strings is ignored */
  private scanSkippedStatement(chunk: string, i: number): number {
    for (; i < chunk.length; i++) {
      const ch = chunk.charAt(i);
      if (ch === '\n') this.line++;

      if (this.escapePending) {
        this.escapePending = false;
        continue;
      }
      if (this.inQuote) {
        if (ch === '\\') this.escapePending = true;
        else if (ch === "'") this.inQuote = false;
        continue;
      }

      if (ch === "'") this.inQuote = true;
      else if (ch === '(') this.depth++;
      else if (ch === ')') this.depth--;
      else if (ch === ';' && this.depth === 0) {
        this.state = 'lineStart';
        return i + 1;
      }
    }
    return i;
  }
}

/**
 * Create a streaming statement scanner.
 *
 * The stream terminates early once the scanner's `maxStatements` is
 * reached, which cancels the upstream source.
 *
 * @param scanner - Scanner instance (pass one in to read its counters)
 * @returns TransformStream that converts dump text to RawTuple objects
 *
 * @example
 * ```typescript
 * const tuples = textStream.pipeThrough(
 *   createStatementScanner(new StatementScanner({ table: 'page' }))
 * );
 * ```
 */
export function createStatementScanner(
  scanner: StatementScanner = new StatementScanner()
): TransformStream<string, RawTuple> {
  return new TransformStream<string, RawTuple>({
    transform(chunk, controller) {
      scanner.push(chunk, (tuple) => controller.enqueue(tuple));
      if (scanner.done) {
        controller.terminate();
      }
    },

    flush() {
      scanner.finish();
    },
  });
}
