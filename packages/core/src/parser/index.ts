/**
 * Loft Parser
 * Main entry points and re-exports
 */

import type { Expr, Stmt } from '../ast-nodes.js';
import type { LoftError } from '../error-classes.js';
import { Tokenizer } from '../lexer/index.js';
import { describeToken } from '../token-types.js';
import { Parser } from './parser.js';
import { parseError, peek, skipSemicolon } from './state.js';
import { TokenCursor } from './token-cursor.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-declarations.js';
import './parser-control.js';
import './parser-expr.js';
import './parser-literals.js';
import './parser-lambda.js';
import './parser-match.js';
import './parser-types.js';

export interface ParseOptions {
  /** Display path used in error messages (default: `<input>`) */
  path?: string | undefined;
}

/** Result of {@link parseRecoverable} */
export interface ParseResult {
  readonly statements: Stmt[];
  /** Every error, in source order */
  readonly errors: LoftError[];
  readonly success: boolean;
}

function createParser(
  source: string,
  options: ParseOptions | undefined,
  recoveryMode: boolean
): Parser {
  const tokenizer = new Tokenizer(source, { path: options?.path });
  return new Parser(new TokenCursor(tokenizer), { recoveryMode });
}

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse loft source code into statements.
 *
 * Throws the first LexerError or ParseError.
 *
 * @example
 * ```typescript
 * const statements = parse('let x = 2 + 3 * 4;', { path: 'main.lf' });
 * ```
 */
export function parse(source: string, options?: ParseOptions): Stmt[] {
  return createParser(source, options, false).parse();
}

/**
 * Parse with error recovery for editor and tooling scenarios.
 *
 * A failed statement is skipped up to the next `;` or statement keyword and
 * parsing continues. A lexer error is recorded and ends the parse.
 *
 * @example
 * ```typescript
 * const result = parseRecoverable(source);
 * if (!result.success) {
 *   for (const error of result.errors) console.error(error.message);
 * }
 * ```
 */
export function parseRecoverable(
  source: string,
  options?: ParseOptions
): ParseResult {
  const parser = createParser(source, options, true);
  const statements = parser.parse();

  return {
    statements,
    errors: parser.errors,
    success: parser.errors.length === 0,
  };
}

/**
 * Parse exactly one expression. A trailing `;` is allowed; any other
 * trailing token is an error.
 */
export function parseExpression(source: string, options?: ParseOptions): Expr {
  const parser = createParser(source, options, false);
  const expression = parser.parseExpression();
  skipSemicolon(parser.state);

  const trailing = peek(parser.state);
  if (trailing !== undefined) {
    throw parseError(
      parser.state,
      'LOFT-P006',
      { token: describeToken(trailing) },
      trailing
    );
  }

  return expression;
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class and cursor (for advanced usage)
export { Parser } from './parser.js';
export { TokenCursor } from './token-cursor.js';
export { getPrecedence } from './precedence.js';
export { MAX_LAMBDA_SCAN } from './parser-lambda.js';
