/**
 * Tests for the convert and tables commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { buildFilterSpec, convertCommand, type ConvertOptions } from '../../src/cli/convert.js';
import { describeTable, describeTables, tablesCommand } from '../../src/cli/tables.js';
import { stripAnsi } from '../../src/cli/utils.js';
import { getTableSchema } from '../../src/tables/registry.js';
import { ConfigurationError } from '../../src/lib/errors.js';
import { createTempDir, dumpText, insertStatement, writeDumpFile } from '../helpers.js';

function options(overrides: Partial<ConvertOptions> = {}): ConvertOptions {
  return { allow: [], block: [], strictTypes: false, verbose: false, ...overrides };
}

describe('buildFilterSpec', () => {
  it('should build an empty filter from no flags', async () => {
    expect(await buildFilterSpec(options())).toEqual({});
  });

  it('should read column and value flags', async () => {
    const spec = await buildFilterSpec(
      options({
        keep: 'page_id,page_title',
        allow: ['page_namespace=0,1'],
        block: ['page_is_redirect=1'],
      })
    );

    expect(spec).toEqual({
      keepColumnNames: ['page_id', 'page_title'],
      allowlists: { page_namespace: ['0', '1'] },
      blocklists: { page_is_redirect: ['1'] },
    });
  });

  it('should reject the same column twice', async () => {
    await expect(
      buildFilterSpec(options({ allow: ['page_namespace=0', 'page_namespace=1'] }))
    ).rejects.toThrow('--allow given twice for column page_namespace');
  });

  describe('with a filter file', () => {
    let dir: string;
    let cleanup: () => Promise<void>;

    beforeEach(async () => {
      ({ dir, cleanup } = await createTempDir());
    });

    afterEach(async () => {
      await cleanup();
    });

    it('should let flags replace settings from the file', async () => {
      const path = join(dir, 'filter.json');
      await writeFile(
        path,
        JSON.stringify({ keepColumnNames: ['page_id'], allowlists: { page_namespace: ['0'] } })
      );

      const spec = await buildFilterSpec(options({ filters: path, keep: 'page_title' }));

      expect(spec).toEqual({
        keepColumnNames: ['page_title'],
        allowlists: { page_namespace: ['0'] },
      });
    });

    it('should reject an invalid filter file', async () => {
      const path = join(dir, 'filter.json');
      await writeFile(path, '{"allowlists": []}');

      await expect(buildFilterSpec(options({ filters: path }))).rejects.toThrow(ConfigurationError);
    });
  });
});

describe('convert command', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(async () => {
    originalEnv = { ...process.env };
    delete process.env['WIKISQL_OUTPUT_DIR'];
    delete process.env['WIKISQL_PROGRESS_INTERVAL'];
    delete process.env['WIKISQL_COMPRESSION'];
    ({ dir, cleanup } = await createTempDir());
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    process.env = originalEnv;
    vi.restoreAllMocks();
    await cleanup();
  });

  it('should convert a dump file with filters', async () => {
    const input = await writeDumpFile(
      dir,
      'enwiki-20240101-redirect.sql.gz',
      dumpText('redirect', [
        insertStatement('redirect', [
          "1,0,'Main_Page',NULL,NULL",
          "2,14,'Physics',NULL,NULL",
          "3,0,'NaN','',''",
        ]),
      ])
    );
    const output = join(dir, 'out.csv');

    await convertCommand.parseAsync(
      [input, '-o', output, '-k', 'rd_from,rd_title', '-a', 'rd_namespace=0'],
      { from: 'user' }
    );

    expect(await readFile(output, 'utf-8')).toBe('rd_from,rd_title\n1,Main_Page\n3,NaN\n');
  });
});

describe('tables command', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print a table schema as JSON', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await tablesCommand.parseAsync(['category', '--json'], { from: 'user' });

    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual(getTableSchema('category'));
  });

  it('should describe one table', () => {
    const lines = stripAnsi(describeTable(getTableSchema('redirect'))).split('\n');

    expect(lines[1]).toBe('  redirect');
    expect(lines).toContain('    4  rd_interwiki  string   yes     ');
  });

  it('should list every table', () => {
    const text = stripAnsi(describeTables([getTableSchema('page'), getTableSchema('redirect')]));

    expect(text).toContain('    page      13     ');
    expect(text).toContain('    redirect  5      ');
  });
});
