/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { Stmt } from '../ast-nodes.js';
import type { LoftError } from '../error-classes.js';
import { type ParserState, createParserState } from './state.js';
import type { TokenCursor } from './token-cursor.js';

/**
 * Recursive-descent parser over a token cursor.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program loop, recovery, statement dispatch, attributes, blocks
 * - parser-declarations.ts: let/const, functions, def, enum, trait, impl, learn
 * - parser-control.ts: if, while, for, return, match statements
 * - parser-expr.ts: Precedence climbing, unary and postfix chains, primaries
 * - parser-literals.ts: Arrays, struct literals, template literals
 * - parser-lambda.ts: Lambda detection and parsing
 * - parser-match.ts: Match expressions, subjects and patterns
 * - parser-types.ts: Type annotations
 *
 * @example
 * ```typescript
 * const cursor = new TokenCursor(new Tokenizer(source));
 * const statements = new Parser(cursor).parse();
 * ```
 */
export class Parser {
  /** Parser state including the cursor and collected errors */
  state: ParserState;

  constructor(cursor: TokenCursor, options?: { recoveryMode?: boolean }) {
    this.state = createParserState(cursor, {
      recoveryMode: options?.recoveryMode ?? false,
    });
  }

  /** Parse statements until end of input */
  parse(): Stmt[] {
    return this.parseProgram();
  }

  /** Get collected errors (for recovery mode) */
  get errors(): LoftError[] {
    return this.state.errors;
  }
}
