/**
 * Dump file sources
 *
 * Opens a `WIKI-YYYYMMDD-TABLE.sql[.gz]` file as a stream of decoded text.
 */

import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { Readable } from 'node:stream';
import { TextDecoderStream, type ReadableStream } from 'node:stream/web';
import type { CompressionType, DumpFileInfo } from './types.js';
import { decompressStream, detectCompressionFromExtension } from './decompress.js';
import { ConfigurationError } from '../lib/errors.js';
import { createLogger, type Logger } from '../lib/logger.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('ingest:source');

/** `enwiki-20200901-page.sql.gz` */
const DUMP_FILE_PATTERN = /^(?<basename>(?<wiki>[a-z_]+)-(?<date>\d{8})-(?<table>\w+))(?<extension>\.sql(?:\.gz)?)$/;

/**
 * Parse a dump file name.
 *
 * @param path - File path; only the base name is inspected
 * @throws {ConfigurationError} If the name does not follow
 *   `WIKI-YYYYMMDD-TABLE_NAME.sql[.gz]`
 *
 * @example
 * ```typescript
 * parseDumpFilename('/data/enwiki-20200901-page.sql.gz');
 * // { wiki: 'enwiki', date: '20200901', tableName: 'page', compressed: true,
 * //   basename: 'enwiki-20200901-page' }
 * ```
 */
export function parseDumpFilename(path: string): DumpFileInfo {
  const name = basename(path);
  const groups = DUMP_FILE_PATTERN.exec(name)?.groups;
  const wiki = groups?.['wiki'];
  const date = groups?.['date'];
  const tableName = groups?.['table'];
  const base = groups?.['basename'];

  if (!wiki || !date || !tableName || !base) {
    throw new ConfigurationError(
      `dump file name ${name} does not match the pattern WIKI-YYYYMMDD-TABLE_NAME.sql[.gz]`
    );
  }

  return {
    wiki,
    date,
    tableName,
    compressed: groups?.['extension'] === '.sql.gz',
    basename: base,
  };
}

/** Options for opening a dump */
export interface OpenDumpOptions {
  /** Compression type (default: from extension, then magic bytes) */
  compression?: CompressionType;
  /** Optional logger for dependency injection (testing) */
  logger?: Logger;
}

/**
 * Decode a byte stream of dump text as UTF-8.
 *
 * Invalid byte sequences become U+FFFD instead of aborting the run.
 */
export async function decodeDumpStream(
  bytes: ReadableStream<Uint8Array>,
  compression: CompressionType = 'auto'
): Promise<ReadableStream<string>> {
  const decompressed = await decompressStream(bytes, compression);
  return decompressed.pipeThrough(new TextDecoderStream('utf-8'));
}

/**
 * Open a dump file as a stream of text.
 *
 * @param path - Path to a `.sql` or `.sql.gz` file
 * @param options - Compression override and logger
 * @returns Stream of decoded dump text
 * @throws {ConfigurationError} If the path is not a readable file
 */
export async function openDumpFile(
  path: string,
  options: OpenDumpOptions = {}
): Promise<ReadableStream<string>> {
  const log = options.logger ?? getLog();

  let size: number;
  try {
    const stats = await stat(path);
    if (!stats.isFile()) {
      throw new ConfigurationError(`not a file: ${path}`);
    }
    size = stats.size;
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError(
      `cannot read dump file ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const compression =
    options.compression && options.compression !== 'auto'
      ? options.compression
      : detectCompressionFromExtension(path);

  log.info('Opening dump file', { path, size, compression });

  const bytes: ReadableStream<Uint8Array> = Readable.toWeb(createReadStream(path));
  return decodeDumpStream(bytes, compression);
}
