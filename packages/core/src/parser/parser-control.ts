/**
 * Parser Extension: Control Flow Parsing
 * Conditionals, loops, returns and match statements
 */

import { Parser } from './parser.js';
import type {
  Expr,
  ForStmt,
  IfStmt,
  MatchStmt,
  MatchStmtArm,
  ReturnStmt,
  Stmt,
  WhileStmt,
} from '../ast-nodes.js';
import {
  advance,
  checkKeyword,
  checkPunct,
  expectIdent,
  expectKeyword,
  expectOp,
  expectPunct,
  isAtEnd,
  matchPunct,
  skipSemicolon,
  spanFrom,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseIfStatement(): IfStmt;
    parseWhileStatement(): WhileStmt;
    parseForStatement(): ForStmt;
    parseReturnStatement(): ReturnStmt;
    parseMatchStatement(): MatchStmt;
  }
}

// ============================================================
// CONDITIONALS
// ============================================================

/** `if (cond) stmt [else stmt]`; branches are any statement */
Parser.prototype.parseIfStatement = function (this: Parser): IfStmt {
  const start = this.state.cursor.location();
  expectKeyword(this.state, 'if');
  expectPunct(this.state, '(');
  const condition = this.parseExpression();
  expectPunct(this.state, ')');

  const thenBranch = this.parseStatement();

  let elseBranch: Stmt | null = null;
  if (checkKeyword(this.state, 'else')) {
    advance(this.state);
    elseBranch = this.parseStatement();
  }

  return {
    type: 'If',
    condition,
    thenBranch,
    elseBranch,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// LOOPS
// ============================================================

Parser.prototype.parseWhileStatement = function (this: Parser): WhileStmt {
  const start = this.state.cursor.location();
  expectKeyword(this.state, 'while');
  expectPunct(this.state, '(');
  const condition = this.parseExpression();
  expectPunct(this.state, ')');
  const body = this.parseStatement();

  return {
    type: 'While',
    condition,
    body,
    span: spanFrom(this.state, start),
  };
};

/** `for item in items { ... }` */
Parser.prototype.parseForStatement = function (this: Parser): ForStmt {
  const start = this.state.cursor.location();
  expectKeyword(this.state, 'for');
  const variable = expectIdent(this.state, 'loop variable');
  expectKeyword(this.state, 'in');
  // Subject-style entry point: the body's `{` is never a struct literal
  const iterable = this.parseMatchSubject();
  const body = this.parseBlock();

  return {
    type: 'For',
    variable,
    iterable,
    body,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// RETURN
// ============================================================

Parser.prototype.parseReturnStatement = function (this: Parser): ReturnStmt {
  const start = this.state.cursor.location();
  expectKeyword(this.state, 'return');

  let value: Expr | null = null;
  if (!isAtEnd(this.state) && !checkPunct(this.state, ';')) {
    value = this.parseExpression();
  }

  skipSemicolon(this.state);
  return { type: 'Return', value, span: spanFrom(this.state, start) };
};

// ============================================================
// MATCH STATEMENT
// ============================================================

/** `match subject { pattern => stmt, ... }` with statement arm bodies */
Parser.prototype.parseMatchStatement = function (this: Parser): MatchStmt {
  const start = this.state.cursor.location();
  expectKeyword(this.state, 'match');
  const expression = this.parseMatchSubject();
  expectPunct(this.state, '{');

  const arms: MatchStmtArm[] = [];
  while (!isAtEnd(this.state) && !checkPunct(this.state, '}')) {
    const pattern = this.parsePattern();
    expectOp(this.state, '=>');
    const body = this.parseStatement();
    arms.push({ pattern, body });
    matchPunct(this.state, ',');
  }

  expectPunct(this.state, '}');
  return {
    type: 'Match',
    expression,
    arms,
    span: spanFrom(this.state, start),
  };
};
