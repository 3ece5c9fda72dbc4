/**
 * Tests for CLI utilities
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import {
  color,
  stripAnsi,
  formatDuration,
  formatNumber,
  formatTable,
  loadConfig,
  loadFilterFile,
  parseAssignment,
  parseList,
  resolvePath,
} from '../../src/cli/utils.js';
import { ConfigurationError } from '../../src/lib/errors.js';
import { createTempDir } from '../helpers.js';

describe('CLI Utils', () => {
  describe('formatting', () => {
    it('should strip color codes', () => {
      expect(stripAnsi(color.error('Error:'))).toBe('Error:');
    });

    it('should format durations', () => {
      expect(formatDuration(45)).toBe('45s');
      expect(formatDuration(125)).toBe('2m 5s');
      expect(formatDuration(3725)).toBe('1h 2m');
      expect(formatDuration(-1)).toBe('--:--');
    });

    it('should format numbers with separators', () => {
      expect(formatNumber(1234567)).toBe('1,234,567');
    });

    it('should align table columns', () => {
      const table = formatTable([
        { table: 'page', columns: 13 },
        { table: 'redirect', columns: 5 },
      ]);

      expect(stripAnsi(table).split('\n')).toEqual([
        '    table     columns',
        `    ${'─'.repeat(8)}  ${'─'.repeat(7)}`,
        '    page      13     ',
        '    redirect  5      ',
      ]);
    });
  });

  describe('parseList', () => {
    it('should split and trim comma-separated values', () => {
      expect(parseList('page_id, page_title,,')).toEqual(['page_id', 'page_title']);
    });
  });

  describe('parseAssignment', () => {
    it('should split a column from its values', () => {
      expect(parseAssignment('page_namespace=0,14')).toEqual({
        column: 'page_namespace',
        values: ['0', '14'],
      });
    });

    it('should keep values verbatim', () => {
      expect(parseAssignment('page_title=Main Page, x')).toEqual({
        column: 'page_title',
        values: ['Main Page', ' x'],
      });
    });

    it('should read an empty value as one empty string', () => {
      expect(parseAssignment('rd_fragment=')).toEqual({ column: 'rd_fragment', values: [''] });
    });

    it('should reject input without a column', () => {
      expect(() => parseAssignment('page_namespace')).toThrow(
        'expected column=value[,value...], got "page_namespace"'
      );
      expect(() => parseAssignment('=0')).toThrow(ConfigurationError);
    });
  });

  describe('resolvePath', () => {
    it('should keep absolute paths', () => {
      expect(resolvePath('/data/dump.sql')).toBe('/data/dump.sql');
    });

    it('should resolve relative paths against cwd', () => {
      expect(resolvePath('dumps/page.sql')).toBe(join(process.cwd(), 'dumps/page.sql'));
    });

    it('should expand the home directory', () => {
      expect(resolvePath('~/dumps')).toBe(join(homedir(), 'dumps'));
    });
  });

  describe('loadConfig', () => {
    let originalEnv: NodeJS.ProcessEnv;
    let dir: string;
    let cleanup: () => Promise<void>;

    beforeEach(async () => {
      originalEnv = { ...process.env };
      delete process.env['WIKISQL_OUTPUT_DIR'];
      delete process.env['WIKISQL_PROGRESS_INTERVAL'];
      delete process.env['WIKISQL_COMPRESSION'];
      ({ dir, cleanup } = await createTempDir());
      await mkdir(join(dir, 'a'));
      await mkdir(join(dir, 'b'));
    });

    afterEach(async () => {
      process.env = originalEnv;
      await cleanup();
    });

    it('should return empty config when no file exists', async () => {
      expect(await loadConfig([join(dir, 'a'), join(dir, 'b')])).toEqual({});
    });

    it('should use the first config file found', async () => {
      await writeFile(join(dir, 'b', '.wikisqlrc'), JSON.stringify({ outputDir: '/from-b' }));
      expect(await loadConfig([join(dir, 'a'), join(dir, 'b')])).toEqual({ outputDir: '/from-b' });

      await writeFile(join(dir, 'a', '.wikisqlrc'), JSON.stringify({ compression: 'none' }));
      expect(await loadConfig([join(dir, 'a'), join(dir, 'b')])).toEqual({ compression: 'none' });
    });

    it('should let environment variables override the file', async () => {
      await writeFile(
        join(dir, 'a', '.wikisqlrc'),
        JSON.stringify({ outputDir: '/from-file', progressInterval: 10 })
      );
      process.env['WIKISQL_OUTPUT_DIR'] = '/from-env';
      process.env['WIKISQL_PROGRESS_INTERVAL'] = '1000';
      process.env['WIKISQL_COMPRESSION'] = 'gzip';

      expect(await loadConfig([join(dir, 'a')])).toEqual({
        outputDir: '/from-env',
        progressInterval: 1000,
        compression: 'gzip',
      });
    });

    it('should reject an invalid environment value', async () => {
      process.env['WIKISQL_PROGRESS_INTERVAL'] = 'often';

      await expect(loadConfig([join(dir, 'a')])).rejects.toThrow(
        'Invalid configuration:\nprogressInterval: Expected number, received string'
      );
    });

    it('should reject a config file that is not JSON', async () => {
      await writeFile(join(dir, 'a', '.wikisqlrc'), 'outputDir=/tmp');

      await expect(loadConfig([join(dir, 'a')])).rejects.toThrow(
        `${join(dir, 'a', '.wikisqlrc')} is not valid JSON`
      );
    });

    it('should reject a config file that is not an object', async () => {
      await writeFile(join(dir, 'a', '.wikisqlrc'), '["outputDir"]');

      await expect(loadConfig([join(dir, 'a')])).rejects.toThrow('must contain a JSON object');
    });
  });

  describe('loadFilterFile', () => {
    let dir: string;
    let cleanup: () => Promise<void>;

    beforeEach(async () => {
      ({ dir, cleanup } = await createTempDir());
    });

    afterEach(async () => {
      await cleanup();
    });

    it('should load a filter', async () => {
      const path = join(dir, 'filter.json');
      await writeFile(
        path,
        JSON.stringify({ keepColumnNames: ['page_id'], allowlists: { page_namespace: ['0'] } })
      );

      expect(await loadFilterFile(path)).toEqual({
        keepColumnNames: ['page_id'],
        allowlists: { page_namespace: ['0'] },
      });
    });

    it('should reject a missing file', async () => {
      await expect(loadFilterFile(join(dir, 'none.json'))).rejects.toThrow(
        `cannot read filter file ${join(dir, 'none.json')}`
      );
    });

    it('should reject a file that does not describe a filter', async () => {
      const path = join(dir, 'filter.json');
      await writeFile(path, JSON.stringify({ keepColumnNames: 'page_id' }));

      await expect(loadFilterFile(path)).rejects.toThrow(
        `Invalid filter file ${path}:\nkeepColumnNames: Expected array, received string`
      );
    });
  });
});
