/**
 * Test helpers and utilities
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { gzipSync } from 'node:zlib';
import { ReadableStream, WritableStream } from 'node:stream/web';
import { Logger } from '../src/lib/logger.js';

/**
 * Create a readable stream from an array of items
 */
export function createReadableStreamFromArray<T>(items: readonly T[]): ReadableStream<T> {
  return new ReadableStream<T>({
    start(controller) {
      for (const item of items) {
        controller.enqueue(item);
      }
      controller.close();
    },
  });
}

/**
 * Split text into chunks of a fixed size, to exercise chunk boundaries
 */
export function chunkText(text: string, size: number): string[] {
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    chunks.push(text.slice(i, i + size));
  }
  return chunks;
}

/**
 * Stream text in chunks of a fixed size
 */
export function textStream(text: string, chunkSize = 64): ReadableStream<string> {
  return createReadableStreamFromArray(chunkText(text, chunkSize));
}

/**
 * Collect all items from a readable stream into an array
 */
export async function collectStream<T>(stream: ReadableStream<T>): Promise<T[]> {
  const reader = stream.getReader();
  const items: T[] = [];

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    items.push(value);
  }

  return items;
}

/**
 * Collect a text stream into one string
 */
export async function collectText(stream: ReadableStream<string>): Promise<string> {
  return (await collectStream(stream)).join('');
}

/**
 * In-memory text sink
 */
export function createMemorySink(): { sink: WritableStream<string>; text: () => string } {
  const chunks: string[] = [];
  return {
    sink: new WritableStream<string>({
      write(chunk) {
        chunks.push(chunk);
      },
    }),
    text: () => chunks.join(''),
  };
}

/**
 * Build a dump line: `INSERT INTO `table` VALUES (..),(..);`
 */
export function insertStatement(table: string, tuples: readonly string[]): string {
  return `INSERT INTO \`${table}\` VALUES ${tuples.map((t) => `(${t})`).join(',')};\n`;
}

/**
 * Wrap statements in the preamble and table DDL mysqldump writes
 */
export function dumpText(table: string, statements: readonly string[]): string {
  return [
    '-- MySQL dump 10.19  Distrib 10.3.38-MariaDB, for debian-linux-gnu (x86_64)\n',
    '--\n',
    `-- Table structure for table \`${table}\`\n`,
    '--\n',
    '\n',
    `DROP TABLE IF EXISTS \`${table}\`;\n`,
    '/*!40101 SET @saved_cs_client     = @@character_set_client */;\n',
    `CREATE TABLE \`${table}\` (\n`,
    '  `id` int(8) unsigned NOT NULL AUTO_INCREMENT,\n',
    '  PRIMARY KEY (`id`)\n',
    ') ENGINE=InnoDB DEFAULT CHARSET=binary;\n',
    '\n',
    `LOCK TABLES \`${table}\` WRITE;\n`,
    `/*!40000 ALTER TABLE \`${table}\` DISABLE KEYS */;\n`,
    ...statements,
    `/*!40000 ALTER TABLE \`${table}\` ENABLE KEYS */;\n`,
    'UNLOCK TABLES;\n',
    '\n',
    '-- Dump completed on 2024-01-01  0:00:00\n',
  ].join('');
}

/**
 * A `page` tuple with 13 fields
 */
export function pageTuple(id: number, namespace: number, title: string): string {
  return `${id},${namespace},'${title}','',0,1,0.123456789,'20240101000000','20240101000000',${100 + id},${10 * id},'wikitext',NULL`;
}

/**
 * Create a temporary directory and return its path with a cleanup function
 */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), 'wikisql-test-'));
  return {
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Write a dump fixture, gzip-compressed when the name ends in `.gz`
 */
export async function writeDumpFile(dir: string, name: string, text: string): Promise<string> {
  const path = join(dir, name);
  const bytes = Buffer.from(text, 'utf-8');
  await writeFile(path, name.endsWith('.gz') ? gzipSync(bytes) : bytes);
  return path;
}

/**
 * A logger that writes nothing
 */
export function silentLogger(): Logger {
  return new Logger({ level: 'error', context: 'test' });
}
