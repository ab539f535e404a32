/**
 * Parser State
 * Core state management and token navigation utilities
 */

import { ParseError } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';
import type { LoftError } from '../error-classes.js';
import type { SourceLocation, SourceSpan } from '../source-location.js';
import type { TextToken, Token } from '../token-types.js';
import { describeToken, TOKEN_TYPES } from '../token-types.js';
import type { TokenCursor } from './token-cursor.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly cursor: TokenCursor;
  /** Recovery mode: collect errors instead of throwing */
  readonly recoveryMode: boolean;
  /** Errors collected during recovery mode parsing */
  readonly errors: LoftError[];
}

export function createParserState(
  cursor: TokenCursor,
  options: { recoveryMode?: boolean | undefined } = {}
): ParserState {
  return {
    cursor,
    recoveryMode: options.recoveryMode ?? false,
    errors: [],
  };
}

// ============================================================
// TOKEN PREDICATES
// ============================================================

export function isPunct(
  token: Token | undefined,
  punct: string
): token is TextToken & { readonly type: typeof TOKEN_TYPES.PUNCT } {
  return token?.type === TOKEN_TYPES.PUNCT && token.value === punct;
}

export function isKeyword(
  token: Token | undefined,
  keyword: string
): token is TextToken & { readonly type: typeof TOKEN_TYPES.KEYWORD } {
  return token?.type === TOKEN_TYPES.KEYWORD && token.value === keyword;
}

export function isOp(
  token: Token | undefined,
  op: string
): token is TextToken & { readonly type: typeof TOKEN_TYPES.OP } {
  return token?.type === TOKEN_TYPES.OP && token.value === op;
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function peek(state: ParserState): Token | undefined {
  return state.cursor.peek();
}

/** @internal */
export function advance(state: ParserState): Token | undefined {
  return state.cursor.next();
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return state.cursor.peek() === undefined;
}

/** @internal */
export function checkPunct(state: ParserState, punct: string): boolean {
  return isPunct(peek(state), punct);
}

/** @internal */
export function checkKeyword(state: ParserState, keyword: string): boolean {
  return isKeyword(peek(state), keyword);
}

/** @internal */
export function checkOp(state: ParserState, op: string): boolean {
  return isOp(peek(state), op);
}

/**
 * Consume the next token if it is the given punctuation.
 * @internal
 */
export function matchPunct(state: ParserState, punct: string): boolean {
  if (!checkPunct(state, punct)) return false;
  advance(state);
  return true;
}

/** @internal */
export function expectPunct(state: ParserState, punct: string): TextToken {
  const token = peek(state);
  if (isPunct(token, punct)) {
    advance(state);
    return token;
  }
  throw expected(state, `'${punct}'`, token, generateHint(`'${punct}'`, token));
}

/** @internal */
export function expectKeyword(state: ParserState, keyword: string): TextToken {
  const token = peek(state);
  if (isKeyword(token, keyword)) {
    advance(state);
    return token;
  }
  throw expected(state, `keyword '${keyword}'`, token, undefined);
}

/** @internal */
export function expectOp(state: ParserState, op: string): TextToken {
  const token = peek(state);
  if (isOp(token, op)) {
    advance(state);
    return token;
  }
  throw expected(state, `operator '${op}'`, token, generateHint(`'${op}'`, token));
}

/**
 * Consume an identifier. `what` names it in the error message
 * ("function name", "field name", ...).
 * @internal
 */
export function expectIdent(state: ParserState, what = 'identifier'): string {
  const token = peek(state);
  if (token?.type === TOKEN_TYPES.IDENT) {
    advance(state);
    return token.value;
  }
  throw parseError(
    state,
    'LOFT-P004',
    { what, actual: describeToken(token) },
    token
  );
}

/**
 * Consume a trailing `;` if present.
 * @internal
 */
export function skipSemicolon(state: ParserState): void {
  matchPunct(state, ';');
}

// ============================================================
// ERRORS
// ============================================================

/**
 * Build a ParseError positioned at `token`, or at end of input when the
 * token is undefined. The token is not consumed.
 * @internal
 */
export function parseError(
  state: ParserState,
  errorId: string,
  context: Readonly<Record<string, unknown>>,
  token: Token | undefined,
  help?: string
): ParseError {
  const template = ERROR_REGISTRY.get(errorId)?.messageTemplate ?? errorId;
  const location = token?.span.start ?? state.cursor.location();
  const length = token === undefined ? undefined : highlightLength(token.span);
  return new ParseError(
    errorId,
    renderMessage(template, context),
    location,
    state.cursor.path,
    { context, length, help }
  );
}

/**
 * Characters to underline for a token. Offsets count bytes, so a token on
 * one line is measured in columns; one running over several lines is
 * given its byte length, which reaches the end of its first line.
 */
function highlightLength(span: SourceSpan): number {
  const { start, end } = span;
  const width =
    start.line === end.line
      ? end.column - start.column
      : end.offset - start.offset;
  return Math.max(1, width);
}

/**
 * Error for a token that cannot appear here. End of input gets its own
 * message.
 * @internal
 */
export function unexpectedToken(
  state: ParserState,
  token: Token | undefined,
  context: string
): ParseError {
  if (token === undefined) {
    return parseError(state, 'LOFT-P002', { context }, undefined);
  }
  return parseError(
    state,
    'LOFT-P001',
    { context, token: describeToken(token) },
    token
  );
}

function expected(
  state: ParserState,
  what: string,
  token: Token | undefined,
  help: string | undefined
): ParseError {
  return parseError(
    state,
    'LOFT-P003',
    { expected: what, actual: describeToken(token) },
    token,
    help
  );
}

// ============================================================
// ERROR HINTS
// ============================================================

const KEYWORD_TYPOS: Readonly<Record<string, string>> = {
  fucn: 'fn',
  fnc: 'fn',
  lte: 'let',
  retrun: 'return',
  retrn: 'return',
  whlie: 'while',
  esle: 'else',
  mathc: 'match',
  improt: 'learn',
  import: 'learn',
  export: 'teach',
  tru: 'true',
  ture: 'true',
  fals: 'false',
  flase: 'false',
};

/**
 * Generate contextual hints for common parse errors.
 * `expectedToken` is the quoted expected token, e.g. `'}'`.
 * @internal
 */
export function generateHint(
  expectedToken: string,
  actual: Token | undefined
): string | undefined {
  // Hint for unclosed brackets/braces/parens
  if (actual === undefined) {
    if (expectedToken === "')'") return 'Check for an unclosed parenthesis';
    if (expectedToken === "'}'") return 'Check for an unclosed brace';
    if (expectedToken === "']'") return 'Check for an unclosed bracket';
    return undefined;
  }

  // Hint for keyword typos
  if (actual.type === TOKEN_TYPES.IDENT) {
    const suggestion = KEYWORD_TYPOS[actual.value];
    if (suggestion !== undefined) {
      return `Did you mean '${suggestion}'?`;
    }
  }

  // Hint for match arms written with = or ->
  if (expectedToken === "'=>'" && (isOp(actual, '=') || isOp(actual, '->'))) {
    return "Match arms and lambdas use '=>'";
  }

  return undefined;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/**
 * Span from `start` to the end of the most recently consumed token.
 * @internal
 */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  return { start, end: state.cursor.previousEnd() };
}
