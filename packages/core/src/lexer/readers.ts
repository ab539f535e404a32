/**
 * Token Readers
 * Functions to read specific token types from the input stream
 */

import { Decimal } from 'decimal.js';
import type { NumberToken, TextToken } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { lexerError } from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import type { InputStream } from './input-stream.js';
import { KEYWORDS, TWO_CHAR_OPERATORS } from './operators.js';

/** Largest magnitude a fixed-point literal can hold (2^96 - 1) */
const MAX_NUMBER = new Decimal('79228162514264337593543950335');
const MAX_FRACTION_DIGITS = 28;

export function readNumber(stream: InputStream, path: string): NumberToken {
  const start = stream.location();
  let raw = stream.readWhile(isDigit);

  const next = stream.peekAt(1);
  if (stream.peek() === '.' && next !== undefined && isDigit(next)) {
    stream.next(); // consume .
    raw += '.' + stream.readWhile(isDigit);
  }

  const fraction = raw.split('.')[1] ?? '';
  if (fraction.length > MAX_FRACTION_DIGITS) {
    throw lexerError(
      'LOFT-L003',
      {
        literal: raw,
        reason: `more than ${MAX_FRACTION_DIGITS} fractional digits`,
      },
      start,
      path,
      raw.length
    );
  }

  const value = new Decimal(raw);
  if (value.gt(MAX_NUMBER)) {
    throw lexerError(
      'LOFT-L003',
      { literal: raw, reason: 'value is out of range' },
      start,
      path,
      raw.length
    );
  }

  return {
    type: TOKEN_TYPES.NUMBER,
    value,
    raw,
    span: { start, end: stream.location() },
  };
}

/**
 * Read a double-quoted string. A backslash makes the following character
 * literal and is itself dropped; there is no escape table. End of input
 * before the closing quote ends the string without an error.
 */
export function readString(stream: InputStream): TextToken {
  const start = stream.location();
  stream.next(); // consume opening "

  let value = '';
  let ch = stream.next();
  while (ch !== undefined && ch !== '"') {
    if (ch === '\\') {
      const escaped = stream.next();
      if (escaped !== undefined) value += escaped;
    } else {
      value += ch;
    }
    ch = stream.next();
  }

  return makeToken(TOKEN_TYPES.STRING, value, start, stream.location());
}

export function readIdentifier(stream: InputStream): TextToken {
  const start = stream.location();
  const value = stream.readWhile(isIdentifierChar);
  const type = KEYWORDS.has(value) ? TOKEN_TYPES.KEYWORD : TOKEN_TYPES.IDENT;
  return makeToken(type, value, start, stream.location());
}

/** Read one operator character, extended greedily into a two-character operator */
export function readOperator(stream: InputStream): TextToken {
  const start = stream.location();
  let value = stream.next() ?? '';

  const second = stream.peek();
  if (second !== undefined && TWO_CHAR_OPERATORS.has(value + second)) {
    stream.next();
    value += second;
  }

  return makeToken(TOKEN_TYPES.OP, value, start, stream.location());
}
