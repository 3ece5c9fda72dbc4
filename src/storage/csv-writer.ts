/**
 * CSV Writer
 *
 * RFC 4180 style encoding of output records, header first, `\n` line ends.
 *
 * Cell rules:
 * - NULL            -> empty, unquoted cell
 * - ''              -> `""` (so it stays distinct from NULL)
 * - contains , " LF CR -> quoted, embedded `"` doubled
 * - anything else   -> written verbatim (`NaN`, `Null`, `NULL` included)
 *
 * Readers must treat only the unquoted empty cell as missing and must not
 * coerce strings like "NaN" or "Null" to missing values.
 */

import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import { Writable } from 'node:stream';
import { TransformStream, type WritableStream } from 'node:stream/web';
import type { OutputRecord } from '../ingest/types.js';
import { CSV_LINE_TERMINATOR } from '../lib/constants.js';
import { ConfigurationError } from '../lib/errors.js';

const NEEDS_QUOTING = /[",\n\r]/;

/**
 * Encode a single cell.
 */
export function encodeCsvCell(value: string | null): string {
  if (value === null) return '';
  if (value === '') return '""';
  if (NEEDS_QUOTING.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Encode a record as one CSV line, including the line terminator.
 */
export function encodeCsvRecord(record: OutputRecord): string {
  return record.map(encodeCsvCell).join(',') + CSV_LINE_TERMINATOR;
}

/**
 * Create a streaming CSV encoder.
 *
 * The header line is emitted when the stream starts, so even an input with
 * no surviving rows yields a well-formed CSV.
 *
 * @param header - Column names of the retained columns
 * @returns TransformStream that converts records to CSV lines
 */
export function createCsvEncoder(
  header: readonly string[]
): TransformStream<OutputRecord, string> {
  return new TransformStream<OutputRecord, string>({
    start(controller) {
      controller.enqueue(encodeCsvRecord(header));
    },

    transform(record, controller) {
      controller.enqueue(encodeCsvRecord(record));
    },
  });
}

/**
 * Open a file as a text sink. The file is created or truncated before this
 * resolves.
 *
 * @throws {ConfigurationError} If the file cannot be opened for writing
 */
export async function openCsvFileSink(path: string): Promise<WritableStream<string>> {
  const stream = createWriteStream(path, { encoding: 'utf-8' });
  try {
    await once(stream, 'ready');
  } catch (error) {
    throw new ConfigurationError(
      `cannot write output file ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return Writable.toWeb(stream);
}

/**
 * Wrap a Node writable (e.g. process.stdout) as a text sink.
 *
 * An error on the target (EPIPE once a reader like `head` exits) fails the
 * write waiting on `'drain'` and every write after it.
 */
export function createCsvStreamSink(stream: NodeJS.WritableStream): WritableStream<string> {
  let failure: Error | undefined;
  let pending: ((error?: Error | null) => void) | undefined;

  const release = () => {
    const callback = pending;
    pending = undefined;
    callback?.();
  };
  const onError = (error: Error) => {
    failure = error;
    stream.off('drain', release);
    const callback = pending;
    pending = undefined;
    callback?.(error);
  };
  stream.on('error', onError);

  return Writable.toWeb(new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (failure) {
        callback(failure);
      } else if (stream.write(chunk)) {
        callback();
      } else {
        pending = callback;
        stream.once('drain', release);
      }
    },
    final(callback) {
      stream.off('error', onError);
      callback(failure ?? null);
    },
    destroy(error, callback) {
      stream.off('error', onError);
      stream.off('drain', release);
      callback(error);
    },
  }));
}
