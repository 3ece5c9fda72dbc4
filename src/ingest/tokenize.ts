/**
 * Value tokenizer for MySQL dump tuples
 *
 * Splits the text inside one `(...)` of an extended-insert VALUES list into
 * typed fields:
 *
 *   1,'it\'s',NULL,-0.5   ->   number "1", string "it's", null, number "-0.5"
 *
 * Only backslash escapes are recognized inside quotes. mysqldump never
 * doubles quotes, so `''` inside a value is a closing quote followed by an
 * opening one and is rejected.
 *
 * Numbers are not parsed: the literal text is kept so fields such as
 * `page_random` or 14-digit timestamps round-trip byte for byte.
 */

import type { FieldToken } from './types.js';
import { MalformedTupleError, type SourceLocation } from '../lib/errors.js';

/** Backslash escapes that do not stand for the escaped character itself */
const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '0': '\0',
  Z: '\x1a',
};

/** Characters mysqldump escapes inside quoted strings */
const ESCAPE_PATTERN = /[\\'"\n\r\t\0\x1a]/g;

const UNESCAPES: Readonly<Record<string, string>> = {
  '\\': '\\\\',
  "'": "\\'",
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\0': '\\0',
  '\x1a': '\\Z',
};

const NULL_LITERAL = 'NULL';

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

/**
 * Tokenize the interior of one tuple.
 *
 * @param span - Tuple text without the enclosing parentheses
 * @param location - Where the tuple came from, attached to errors
 * @returns One token per top-level comma-separated element
 * @throws {MalformedTupleError} On unterminated quotes, a dangling escape,
 *   characters after a closing quote, or an empty element
 *
 * @example
 * ```typescript
 * tokenizeTuple("1,'hello',NULL");
 * // [{ kind: 'number', text: '1' }, { kind: 'string', value: 'hello' }, { kind: 'null' }]
 * ```
 */
export function tokenizeTuple(span: string, location: SourceLocation = {}): FieldToken[] {
  const tokens: FieldToken[] = [];
  const len = span.length;
  const fail = (message: string): never => {
    throw new MalformedTupleError(message, { ...location, span });
  };

  if (span.trim() === '') {
    return tokens;
  }

  let i = 0;
  while (true) {
    while (i < len && isWhitespace(span.charAt(i))) i++;
    if (i >= len) {
      fail(`empty value at position ${i}`);
    }

    if (span.charAt(i) === "'") {
      i++; // skip opening quote
      let value = '';
      let runStart = i;
      let closed = false;

      while (i < len) {
        const ch = span.charAt(i);
        if (ch === '\\') {
          if (i + 1 >= len) {
            fail('escape pending at end of tuple');
          }
          value += span.slice(runStart, i);
          const escaped = span.charAt(i + 1);
          value += ESCAPES[escaped] ?? escaped;
          i += 2;
          runStart = i;
        } else if (ch === "'") {
          value += span.slice(runStart, i);
          i++; // skip closing quote
          closed = true;
          break;
        } else {
          i++;
        }
      }

      if (!closed) {
        fail('unterminated quoted string');
      }
      tokens.push({ kind: 'string', value });

      while (i < len && isWhitespace(span.charAt(i))) i++;
      if (i < len && span.charAt(i) !== ',') {
        fail(`unexpected character ${JSON.stringify(span.charAt(i))} after quoted value at position ${i}`);
      }
    } else {
      const start = i;
      let depth = 0;
      while (i < len) {
        const ch = span.charAt(i);
        if (ch === ',' && depth === 0) break;
        if (ch === "'") {
          fail(`unexpected quote inside unquoted value at position ${i}`);
        }
        if (ch === '(') depth++;
        else if (ch === ')' && depth > 0) depth--;
        i++;
      }

      const text = span.slice(start, i).trim();
      if (text === '') {
        fail(`empty value at position ${start}`);
      }
      tokens.push(text === NULL_LITERAL ? { kind: 'null' } : { kind: 'number', text });
    }

    if (i >= len) break;
    i++; // skip comma
  }

  return tokens;
}

/**
 * Escape a string the way mysqldump writes it inside single quotes.
 */
export function escapeSqlString(value: string): string {
  return value.replace(ESCAPE_PATTERN, (ch) => UNESCAPES[ch] ?? ch);
}

/**
 * Re-encode one token as a dump literal.
 */
export function encodeSqlValue(token: FieldToken): string {
  switch (token.kind) {
    case 'null':
      return NULL_LITERAL;
    case 'number':
      return token.text;
    case 'string':
      return `'${escapeSqlString(token.value)}'`;
  }
}

/**
 * Re-encode tokens as the interior of a tuple (inverse of tokenizeTuple).
 */
export function encodeTuple(tokens: readonly FieldToken[]): string {
  return tokens.map(encodeSqlValue).join(',');
}

/**
 * String form of a token for filtering and CSV output.
 *
 * NULL has no string form; callers decide how to present it.
 */
export function tokenToString(token: FieldToken): string | null {
  switch (token.kind) {
    case 'null':
      return null;
    case 'number':
      return token.text;
    case 'string':
      return token.value;
  }
}
