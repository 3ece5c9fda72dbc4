/**
 * MediaWiki SQL dump conversion pipeline
 *
 * Streaming components to decompress, scan, parse, filter and encode
 * `INSERT INTO ... VALUES` dumps as CSV without holding more than one tuple
 * in memory.
 *
 * @example
 * ```typescript
 * import { convertDumpFile } from 'wikisql-csv/ingest';
 *
 * const result = await convertDumpFile('enwiki-20200901-page.sql.gz', {
 *   filter: { allowlists: { page_namespace: ['0'] } },
 * });
 * console.log(result.rowsWritten, result.outputPath);
 * ```
 */

// Type exports
export type {
  RawTuple,
  Row,
  OutputRecord,
  FilterSpec,
  CompressionType,
  DumpFileInfo,
  ScannerOptions,
  ConversionStats,
  ConversionOptions,
} from './types.js';

// Tokenizing
export {
  tokenizeTuple,
  tokenToString,
  escapeSqlString,
  encodeSqlValue,
  encodeTuple,
} from './tokenize.js';

// Statement scanning
export { StatementScanner, createStatementScanner } from './scan-statements.js';

// Row assembly
export { assembleRow, parseTuple, createRowAssembler, type AssembleOptions } from './assemble.js';

// Filtering
export { RowFilter, createRowFilter, filterValue } from './filter.js';

// Decompression
export {
  createDecompressor,
  decompressStream,
  detectFormat,
  detectCompressionFromExtension,
} from './decompress.js';

// Sources
export { parseDumpFilename, decodeDumpStream, openDumpFile, type OpenDumpOptions } from './source.js';

// Pipeline
export {
  createConversionStream,
  convertDump,
  convertDumpFile,
  defaultOutputPath,
  type ConversionRun,
  type PipelineOptions,
  type DumpFileConversionOptions,
  type DumpFileConversionResult,
} from './pipeline.js';
