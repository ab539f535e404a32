/**
 * Character Class Lookup Tables
 */

/** Reserved words, emitted as Keyword tokens */
export const KEYWORDS: ReadonlySet<string> = new Set([
  'let',
  'const',
  'fn',
  'if',
  'else',
  'while',
  'for',
  'in',
  'return',
  'break',
  'continue',
  'match',
  'def',
  'enum',
  'impl',
  'trait',
  'async',
  'await',
  'lazy',
  'mut',
  'true',
  'false',
  'learn',
  'teach',
]);

/** Single-character punctuation */
export const PUNCTUATION: ReadonlySet<string> = new Set([
  ',',
  ';',
  ':',
  '(',
  ')',
  '{',
  '}',
  '[',
  ']',
  '#',
]);

/** Characters that start an operator */
export const OPERATOR_CHARS: ReadonlySet<string> = new Set([
  '+',
  '-',
  '*',
  '/',
  '%',
  '=',
  '!',
  '<',
  '>',
  '&',
  '|',
  '^',
  '~',
  '.',
  '@',
  '?',
]);

/** Two-character operators; a first character may extend into one of these */
export const TWO_CHAR_OPERATORS: ReadonlySet<string> = new Set([
  '->',
  '=>',
  '==',
  '!=',
  '<=',
  '>=',
  '&&',
  '||',
  '+=',
  '-=',
  '*=',
  '/=',
  '::',
]);
