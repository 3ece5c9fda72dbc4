/**
 * Streaming decompression for gzip-compressed and plain dumps
 */

import { DecompressionStream, ReadableStream, TransformStream } from 'node:stream/web';
import type { CompressionType } from './types.js';

/** Magic bytes for compression format detection */
const GZIP_MAGIC = [0x1f, 0x8b];

/**
 * Create a decompression TransformStream.
 *
 * @param type - 'gzip' to inflate, 'none' to pass bytes through
 * @returns TransformStream that decompresses the input
 *
 * @example
 * ```typescript
 * const decompressed = compressedStream.pipeThrough(createDecompressor('gzip'));
 * ```
 */
export function createDecompressor(
  type: Exclude<CompressionType, 'auto'>
): TransformStream<Uint8Array, Uint8Array> {
  if (type === 'gzip') {
    // Use native DecompressionStream API
    return new DecompressionStream('gzip');
  }
  return new TransformStream<Uint8Array, Uint8Array>();
}

/**
 * Decompress a byte stream.
 *
 * With 'auto', the first bytes are inspected for the gzip magic number and
 * replayed into the chosen decompressor.
 *
 * @param input - Raw byte stream
 * @param type - Compression type, or 'auto' to detect
 * @returns Decompressed byte stream
 */
export async function decompressStream(
  input: ReadableStream<Uint8Array>,
  type: CompressionType = 'auto'
): Promise<ReadableStream<Uint8Array>> {
  if (type !== 'auto') {
    return input.pipeThrough(createDecompressor(type));
  }

  const reader = input.getReader();
  const head: Uint8Array[] = [];
  let headLength = 0;
  let exhausted = false;

  // Accumulate header bytes for detection
  while (headLength < GZIP_MAGIC.length) {
    const { done, value } = await reader.read();
    if (done) {
      exhausted = true;
      break;
    }
    head.push(value);
    headLength += value.byteLength;
  }

  const header = concatBytes(head, headLength);
  const replay = new ReadableStream<Uint8Array>({
    start(controller) {
      if (header.byteLength > 0) {
        controller.enqueue(header);
      }
      if (exhausted) {
        controller.close();
      }
    },
    async pull(controller) {
      const { done, value } = await reader.read();
      if (done) {
        controller.close();
      } else {
        controller.enqueue(value);
      }
    },
    cancel(reason) {
      return reader.cancel(reason);
    },
  });

  return replay.pipeThrough(createDecompressor(detectFormat(header)));
}

/**
 * Detect compression format from magic bytes
 */
export function detectFormat(header: Uint8Array): Exclude<CompressionType, 'auto'> {
  if (header[0] === GZIP_MAGIC[0] && header[1] === GZIP_MAGIC[1]) {
    return 'gzip';
  }
  return 'none';
}

function concatBytes(chunks: Uint8Array[], totalLength: number): Uint8Array {
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}

/**
 * Detect compression type from file extension
 */
export function detectCompressionFromExtension(filename: string): CompressionType {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.gz') || lower.endsWith('.gzip')) {
    return 'gzip';
  }
  if (lower.endsWith('.sql')) {
    return 'none';
  }
  return 'auto';
}
