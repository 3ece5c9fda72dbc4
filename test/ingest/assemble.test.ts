/**
 * Tests for row assembly
 */

import { describe, it, expect } from 'vitest';
import { assembleRow, createRowAssembler, parseTuple } from '../../src/ingest/assemble.js';
import { tokenizeTuple } from '../../src/ingest/tokenize.js';
import { getTableSchema } from '../../src/tables/registry.js';
import { MalformedTupleError, SchemaMismatchError } from '../../src/lib/errors.js';
import type { RawTuple, TableSchema } from '../../src/ingest/types.js';
import { collectStream, createReadableStreamFromArray, pageTuple } from '../helpers.js';

const page = getTableSchema('page');
const redirect = getTableSchema('redirect');

/** A twelve-column table */
const wide: TableSchema = {
  tableName: 'wide',
  columns: Array.from({ length: 12 }, (_, i) => ({
    name: `c${i + 1}`,
    type: 'integer' as const,
    nullable: false,
  })),
};

function rawTuple(text: string, index = 1): RawTuple {
  return { table: 'page', text, index, statement: 1, line: 20 };
}

describe('assembleRow', () => {
  it('should bind tokens to columns by position', () => {
    const row = assembleRow(redirect, tokenizeTuple("10,0,'Target','',NULL"), { tupleIndex: 4 });

    expect(row).toEqual({
      index: 4,
      fields: {
        rd_from: { kind: 'number', text: '10' },
        rd_namespace: { kind: 'number', text: '0' },
        rd_title: { kind: 'string', value: 'Target' },
        rd_interwiki: { kind: 'string', value: '' },
        rd_fragment: { kind: 'null' },
      },
    });
  });

  it('should reject too few fields', () => {
    const tokens = tokenizeTuple('1,2,3,4,5,6,7,8,9,10,11');
    const location = { tupleIndex: 5, statement: 2, line: 30 };

    expect(() => assembleRow(wide, tokens, location)).toThrow(SchemaMismatchError);
    expect(() => assembleRow(wide, tokens, location)).toThrow(
      'wide: expected 12 fields, got 11 (tuple 5, statement 2, line 30)'
    );
  });

  it('should reject too many fields', () => {
    expect(() => assembleRow(redirect, tokenizeTuple('1,0,NULL,NULL,NULL,NULL'))).toThrow(
      'redirect: expected 5 fields, got 6'
    );
  });

  describe('strictTypes', () => {
    const strict = { strictTypes: true };

    it('should accept a well-typed row', () => {
      const row = assembleRow(page, tokenizeTuple(pageTuple(1, 0, 'A')), {}, strict);
      expect(row.fields['page_lang']).toEqual({ kind: 'null' });
    });

    it('should reject NULL in a non-nullable column', () => {
      const tokens = tokenizeTuple("NULL,0,'A',NULL,NULL");
      expect(() => assembleRow(redirect, tokens, {}, strict)).toThrow(
        'redirect.rd_from: NULL in non-nullable column'
      );
    });

    it('should reject a quoted value in a numeric column', () => {
      const tokens = tokenizeTuple("1,'0','A',NULL,NULL");
      expect(() => assembleRow(redirect, tokens, {}, strict)).toThrow(
        'redirect.rd_namespace: quoted string in numeric column'
      );
    });

    it('should reject an unquoted value in a string column', () => {
      const tokens = tokenizeTuple('1,0,123,NULL,NULL');
      expect(() => assembleRow(redirect, tokens, {}, strict)).toThrow(
        'redirect.rd_title: unquoted value in string column'
      );
    });

    it('should not check types by default', () => {
      const row = assembleRow(redirect, tokenizeTuple("'1',0,123,NULL,NULL"));
      expect(row.fields['rd_from']).toEqual({ kind: 'string', value: '1' });
    });
  });
});

describe('parseTuple', () => {
  it('should tokenize and assemble a raw tuple', () => {
    const row = parseTuple(page, rawTuple(pageTuple(3, 14, 'Physics'), 9));

    expect(row.index).toBe(9);
    expect(row.fields['page_title']).toEqual({ kind: 'string', value: 'Physics' });
    expect(row.fields['page_namespace']).toEqual({ kind: 'number', text: '14' });
  });

  it('should carry the tuple location on tokenizer errors', () => {
    let caught: unknown;
    try {
      parseTuple(page, rawTuple("1,0,'broken", 2));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedTupleError);
    if (caught instanceof MalformedTupleError) {
      expect(caught.location).toEqual({
        tupleIndex: 2,
        statement: 1,
        line: 20,
        span: "1,0,'broken",
      });
    }
  });
});

describe('createRowAssembler', () => {
  it('should stream rows', async () => {
    const rows = await collectStream(
      createReadableStreamFromArray([rawTuple("1,0,'A',NULL,NULL", 1), rawTuple("2,0,'B',NULL,NULL", 2)])
        .pipeThrough(createRowAssembler(redirect))
    );

    expect(rows.map((row) => row.fields['rd_title'])).toEqual([
      { kind: 'string', value: 'A' },
      { kind: 'string', value: 'B' },
    ]);
  });

  it('should error the stream on a schema mismatch', async () => {
    const stream = createReadableStreamFromArray([rawTuple('1,0', 1)]).pipeThrough(
      createRowAssembler(redirect)
    );

    await expect(collectStream(stream)).rejects.toThrow(SchemaMismatchError);
  });
});
