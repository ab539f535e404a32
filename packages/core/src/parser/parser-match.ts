/**
 * Parser Extension: Match Expressions
 * Match subjects and arm patterns never read `{` as a struct literal, so
 * the brace that opens the arms (or a loop body) stays where it belongs.
 */

import { Parser } from './parser.js';
import type { Expr, MatchExpr, MatchExprArm } from '../ast-nodes.js';
import { TOKEN_TYPES } from '../token-types.js';
import {
  advance,
  checkPunct,
  expectIdent,
  expectKeyword,
  expectOp,
  expectPunct,
  isAtEnd,
  isOp,
  isPunct,
  matchPunct,
  peek,
  spanFrom,
  unexpectedToken,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseMatchExpression(): MatchExpr;
    parseMatchSubject(): Expr;
    parsePattern(): Expr;
    parsePatternOperand(): Expr;
    parsePatternPrimary(): Expr;
  }
}

/** `match subject { pattern => expr, ... }` */
Parser.prototype.parseMatchExpression = function (this: Parser): MatchExpr {
  const start = this.state.cursor.location();
  expectKeyword(this.state, 'match');
  const expression = this.parseMatchSubject();
  expectPunct(this.state, '{');

  const arms: MatchExprArm[] = [];
  while (!isAtEnd(this.state) && !checkPunct(this.state, '}')) {
    const pattern = this.parsePattern();
    expectOp(this.state, '=>');
    const body = this.parseExpression();
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

/** Full expression minus the struct-literal postfix */
Parser.prototype.parseMatchSubject = function (this: Parser): Expr {
  const operand = (): Expr => this.parseOperand(false);
  return this.parseBinaryWithLeft(operand(), 0, operand);
};

/**
 * Pattern: literal, identifier or parenthesized pattern with call, field
 * and index postfixes. Only operators from the precedence table fold, so
 * the `=>` after a pattern is never taken as an operator.
 */
Parser.prototype.parsePattern = function (this: Parser): Expr {
  const operand = (): Expr => this.parsePatternOperand();
  return this.parseBinaryWithLeft(operand(), 1, operand);
};

Parser.prototype.parsePatternOperand = function (this: Parser): Expr {
  let result = this.parsePatternPrimary();
  const start = result.span.start;

  for (;;) {
    const token = peek(this.state);

    if (isPunct(token, '(')) {
      // Constructor pattern: Some(x), Point(a, b)
      advance(this.state);
      const args: Expr[] = [];
      while (!isAtEnd(this.state) && !checkPunct(this.state, ')')) {
        args.push(this.parsePattern());
        matchPunct(this.state, ',');
      }
      expectPunct(this.state, ')');
      result = {
        type: 'Call',
        func: result,
        args,
        span: spanFrom(this.state, start),
      };
    } else if (isOp(token, '.')) {
      advance(this.state);
      const field = expectIdent(this.state, "field name after '.'");
      result = {
        type: 'FieldAccess',
        object: result,
        field,
        span: spanFrom(this.state, start),
      };
    } else if (isPunct(token, '[')) {
      advance(this.state);
      const index = this.parseExpression();
      expectPunct(this.state, ']');
      result = {
        type: 'Index',
        array: result,
        index,
        span: spanFrom(this.state, start),
      };
    } else {
      return result;
    }
  }
};

Parser.prototype.parsePatternPrimary = function (this: Parser): Expr {
  const token = peek(this.state);
  if (token === undefined) {
    throw unexpectedToken(this.state, undefined, 'pattern');
  }

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return { type: 'Number', value: token.value, span: token.span };
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'String', value: token.value, span: token.span };
    case TOKEN_TYPES.IDENT:
      advance(this.state);
      return { type: 'Ident', name: token.value, span: token.span };
    case TOKEN_TYPES.KEYWORD:
      if (token.value === 'true' || token.value === 'false') {
        advance(this.state);
        return {
          type: 'Boolean',
          value: token.value === 'true',
          span: token.span,
        };
      }
      break;
    case TOKEN_TYPES.PUNCT:
      if (token.value === '(') {
        advance(this.state);
        const inner = this.parsePattern();
        expectPunct(this.state, ')');
        return inner;
      }
      break;
  }

  throw unexpectedToken(this.state, token, 'pattern');
};
