/**
 * Parser Extension: Program and Statement Parsing
 * Program loop, recovery, statement dispatch, attributes and blocks
 */

import { Parser } from './parser.js';
import type { AttrStmt, BlockStmt, Expr, Stmt } from '../ast-nodes.js';
import { LexerError, LoftError } from '../error-classes.js';
import { TOKEN_TYPES } from '../token-types.js';
import type { SourceLocation } from '../source-location.js';
import {
  advance,
  checkKeyword,
  checkOp,
  checkPunct,
  expectIdent,
  expectPunct,
  isAtEnd,
  isPunct,
  matchPunct,
  peek,
  skipSemicolon,
  spanFrom,
  unexpectedToken,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): Stmt[];
    synchronize(): boolean;
    parseStatement(): Stmt;
    parseAsyncStatement(start: SourceLocation): Stmt;
    parseExpressionStatement(start: SourceLocation): Stmt;
    parseAttributeStatement(): AttrStmt;
    parseBlock(): BlockStmt;
  }
}

/** Keywords that begin a statement; recovery stops in front of them */
const STATEMENT_KEYWORDS: ReadonlySet<string> = new Set([
  'fn',
  'let',
  'const',
  'if',
  'while',
  'for',
  'return',
  'teach',
  'learn',
  'def',
  'impl',
  'trait',
]);

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): Stmt[] {
  const statements: Stmt[] = [];

  for (;;) {
    try {
      if (isAtEnd(this.state)) break;
      statements.push(this.parseStatement());
    } catch (err) {
      if (!this.state.recoveryMode || !(err instanceof LoftError)) {
        throw err;
      }
      this.state.errors.push(err);
      // A lexer error leaves no token boundary to resume from
      if (err instanceof LexerError || !this.synchronize()) break;
    }
  }

  return statements;
};

/**
 * Skip past a failed statement: discard the offending token, then tokens up
 * to and including the next `;`, or up to (not including) a keyword that
 * starts a statement. Returns false when a lexer error stops the scan.
 */
Parser.prototype.synchronize = function (this: Parser): boolean {
  try {
    advance(this.state);
    for (;;) {
      const token = peek(this.state);
      if (token === undefined) return true;
      if (isPunct(token, ';')) {
        advance(this.state);
        return true;
      }
      if (
        token.type === TOKEN_TYPES.KEYWORD &&
        STATEMENT_KEYWORDS.has(token.value)
      ) {
        return true;
      }
      advance(this.state);
    }
  } catch (err) {
    if (err instanceof LexerError) {
      this.state.errors.push(err);
      return false;
    }
    throw err;
  }
};

// ============================================================
// STATEMENT PARSING
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): Stmt {
  const token = peek(this.state);
  const start = this.state.cursor.location();

  if (token === undefined) {
    throw unexpectedToken(this.state, undefined, 'statement');
  }

  if (isPunct(token, '#')) return this.parseAttributeStatement();
  if (isPunct(token, '{')) return this.parseBlock();

  if (token.type === TOKEN_TYPES.KEYWORD) {
    switch (token.value) {
      case 'let':
        return this.parseVarDecl(start, false);
      case 'mut':
        advance(this.state);
        return this.parseVarDecl(start, true);
      case 'const':
        return this.parseConstDecl();
      case 'fn':
        return this.parseFunctionDecl(start, false, false);
      case 'teach': {
        advance(this.state);
        const isAsync = checkKeyword(this.state, 'async');
        if (isAsync) advance(this.state);
        return this.parseFunctionDecl(start, isAsync, true);
      }
      case 'async':
        return this.parseAsyncStatement(start);
      case 'def':
        return this.parseStructDecl();
      case 'enum':
        return this.parseEnumDecl();
      case 'trait':
        return this.parseTraitDecl();
      case 'impl':
        return this.parseImplBlock();
      case 'learn':
        return this.parseImportDecl();
      case 'if':
        return this.parseIfStatement();
      case 'while':
        return this.parseWhileStatement();
      case 'for':
        return this.parseForStatement();
      case 'match':
        return this.parseMatchStatement();
      case 'return':
        return this.parseReturnStatement();
      case 'break':
        advance(this.state);
        skipSemicolon(this.state);
        return { type: 'Break', span: spanFrom(this.state, start) };
      case 'continue':
        advance(this.state);
        skipSemicolon(this.state);
        return { type: 'Continue', span: spanFrom(this.state, start) };
    }
  }

  // Assignment: identifier followed by '='
  if (token.type === TOKEN_TYPES.IDENT) {
    advance(this.state);
    if (checkOp(this.state, '=')) {
      advance(this.state);
      const value = this.parseExpression();
      skipSemicolon(this.state);
      return {
        type: 'Assign',
        name: token.value,
        value,
        span: spanFrom(this.state, start),
      };
    }
    this.state.cursor.pushBack(token);
  }

  return this.parseExpressionStatement(start);
};

/**
 * `async fn ...` declares an async function; `async <expr>` is an
 * expression statement.
 */
Parser.prototype.parseAsyncStatement = function (
  this: Parser,
  start: SourceLocation
): Stmt {
  const asyncToken = advance(this.state);
  if (checkKeyword(this.state, 'fn')) {
    return this.parseFunctionDecl(start, true, false);
  }
  if (asyncToken !== undefined) this.state.cursor.pushBack(asyncToken);
  return this.parseExpressionStatement(start);
};

Parser.prototype.parseExpressionStatement = function (
  this: Parser,
  start: SourceLocation
): Stmt {
  const expression = this.parseExpression();
  skipSemicolon(this.state);
  return { type: 'Expr', expression, span: spanFrom(this.state, start) };
};

// ============================================================
// ATTRIBUTES
// ============================================================

/** `#[name]` or `#[name(args...)]` followed by the statement it annotates */
Parser.prototype.parseAttributeStatement = function (this: Parser): AttrStmt {
  const start = this.state.cursor.location();
  expectPunct(this.state, '#');
  expectPunct(this.state, '[');
  const name = expectIdent(this.state, 'attribute name');

  const args: Expr[] = [];
  if (matchPunct(this.state, '(')) {
    while (!checkPunct(this.state, ')')) {
      args.push(this.parseExpression());
      if (!matchPunct(this.state, ',')) break;
    }
    expectPunct(this.state, ')');
  }

  expectPunct(this.state, ']');
  const statement = this.parseStatement();

  return {
    type: 'AttrStmt',
    attr: { name, args },
    statement,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// BLOCKS
// ============================================================

Parser.prototype.parseBlock = function (this: Parser): BlockStmt {
  const start = this.state.cursor.location();
  expectPunct(this.state, '{');

  const statements: Stmt[] = [];
  while (!isAtEnd(this.state) && !checkPunct(this.state, '}')) {
    statements.push(this.parseStatement());
  }

  expectPunct(this.state, '}');
  return { type: 'Block', statements, span: spanFrom(this.state, start) };
};
