/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation } from '../source-location.js';
import type { MarkerToken, TextToken } from '../token-types.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isIdentifierStart(ch: string): boolean {
  return /^\p{L}$/u.test(ch);
}

export function isIdentifierChar(ch: string): boolean {
  return /^[\p{L}\p{N}_]$/u.test(ch);
}

export function isWhitespace(ch: string): boolean {
  return /^\s$/u.test(ch);
}

export function makeToken(
  type: TextToken['type'],
  value: string,
  start: SourceLocation,
  end: SourceLocation
): TextToken {
  return { type, value, span: { start, end } };
}

export function makeMarker(
  type: MarkerToken['type'],
  start: SourceLocation,
  end: SourceLocation
): MarkerToken {
  return { type, span: { start, end } };
}
