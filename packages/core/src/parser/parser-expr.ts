/**
 * Parser Extension: Expression Parsing
 * Precedence climbing, prefix operators, postfix chains and primaries
 */

import { Parser } from './parser.js';
import type { CallExpr, Expr } from '../ast-nodes.js';
import { TOKEN_TYPES, describeToken } from '../token-types.js';
import { getPrecedence } from './precedence.js';
import {
  advance,
  checkOp,
  checkPunct,
  expectIdent,
  expectPunct,
  isAtEnd,
  isOp,
  isPunct,
  matchPunct,
  parseError,
  peek,
  spanFrom,
  unexpectedToken,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): Expr;
    parseExpressionNoStruct(): Expr;
    parseBinaryWithLeft(left: Expr, minPrec: number, operand: () => Expr): Expr;
    parseOperand(allowStruct: boolean): Expr;
    parsePostfix(expr: Expr, allowStruct: boolean): Expr;
    parseCall(func: Expr): CallExpr;
    parsePrimary(allowStruct: boolean): Expr;
  }
}

/** Prefix operators; each applies to one operand */
const UNARY_OPERATORS: ReadonlySet<string> = new Set(['-', '!']);

// ============================================================
// BINARY EXPRESSIONS
// ============================================================

/** Full expression: operands with any postfix, folded by precedence */
Parser.prototype.parseExpression = function (this: Parser): Expr {
  const operand = (): Expr => this.parseOperand(true);
  return this.parseBinaryWithLeft(operand(), 0, operand);
};

/**
 * Expression whose operands never take a struct-literal postfix, so a
 * following `{` stays with the enclosing construct. Used for array
 * elements.
 */
Parser.prototype.parseExpressionNoStruct = function (this: Parser): Expr {
  const operand = (): Expr => this.parseOperand(false);
  return this.parseBinaryWithLeft(operand(), 0, operand);
};

/**
 * Precedence climbing from an already parsed left operand. Right operands
 * come from `operand`, then fold operators binding tighter than the one
 * just consumed. Left-associative.
 */
Parser.prototype.parseBinaryWithLeft = function (
  this: Parser,
  left: Expr,
  minPrec: number,
  operand: () => Expr
): Expr {
  let result = left;

  for (;;) {
    const token = peek(this.state);
    if (token?.type !== TOKEN_TYPES.OP) break;
    const prec = getPrecedence(token.value);
    if (prec < minPrec) break;

    advance(this.state);
    const right = this.parseBinaryWithLeft(operand(), prec + 1, operand);
    result = {
      type: 'BinOp',
      op: token.value,
      left: result,
      right,
      span: { start: result.span.start, end: right.span.end },
    };
  }

  return result;
};

// ============================================================
// OPERANDS
// ============================================================

/** Prefix operators, then a primary with its postfix chain */
Parser.prototype.parseOperand = function (
  this: Parser,
  allowStruct: boolean
): Expr {
  const token = peek(this.state);
  if (token?.type === TOKEN_TYPES.OP && UNARY_OPERATORS.has(token.value)) {
    const start = token.span.start;
    advance(this.state);
    const operand = this.parseOperand(allowStruct);
    return {
      type: 'UnaryOp',
      op: token.value,
      operand,
      span: spanFrom(this.state, start),
    };
  }

  return this.parsePostfix(this.parsePrimary(allowStruct), allowStruct);
};

/**
 * Apply calls, field access, indexing, `?`, and (when allowed, on a bare
 * identifier only) struct literals, until none matches.
 */
Parser.prototype.parsePostfix = function (
  this: Parser,
  expr: Expr,
  allowStruct: boolean
): Expr {
  let result = expr;
  const start = expr.span.start;

  for (;;) {
    const token = peek(this.state);

    if (isPunct(token, '(')) {
      result = this.parseCall(result);
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
    } else if (isPunct(token, '{') && allowStruct && result.type === 'Ident') {
      result = this.parseStructLiteral(result);
    } else if (isOp(token, '?')) {
      advance(this.state);
      result = {
        type: 'Try',
        expression: result,
        span: spanFrom(this.state, start),
      };
    } else {
      return result;
    }
  }
};

/** `func(arg, ...)` */
Parser.prototype.parseCall = function (this: Parser, func: Expr): CallExpr {
  expectPunct(this.state, '(');
  const args: Expr[] = [];

  while (!isAtEnd(this.state) && !checkPunct(this.state, ')')) {
    args.push(this.parseExpression());
    if (matchPunct(this.state, ',')) continue;
    if (!checkPunct(this.state, ')')) {
      const token = peek(this.state);
      throw parseError(
        this.state,
        'LOFT-P003',
        {
          expected: "',' or ')' in function call",
          actual: describeToken(token),
        },
        token
      );
    }
  }

  expectPunct(this.state, ')');
  return {
    type: 'Call',
    func,
    args,
    span: spanFrom(this.state, func.span.start),
  };
};

// ============================================================
// PRIMARY EXPRESSIONS
// ============================================================

Parser.prototype.parsePrimary = function (
  this: Parser,
  allowStruct: boolean
): Expr {
  const token = peek(this.state);
  if (token === undefined) {
    throw unexpectedToken(this.state, undefined, 'expression');
  }
  const start = token.span.start;

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return { type: 'Number', value: token.value, span: token.span };

    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'String', value: token.value, span: token.span };

    case TOKEN_TYPES.TEMPLATE_START:
      return this.parseTemplateLiteral();

    case TOKEN_TYPES.IDENT:
      advance(this.state);
      // v => body
      if (checkOp(this.state, '=>')) {
        advance(this.state);
        return this.parseLambdaBody(
          [{ name: token.value, paramType: null }],
          start
        );
      }
      return { type: 'Ident', name: token.value, span: token.span };

    case TOKEN_TYPES.KEYWORD:
      switch (token.value) {
        case 'true':
        case 'false':
          advance(this.state);
          return {
            type: 'Boolean',
            value: token.value === 'true',
            span: token.span,
          };
        // Each binds to one operand: `await a + b` is `(await a) + b`
        case 'await':
          advance(this.state);
          return {
            type: 'Await',
            expression: this.parseOperand(allowStruct),
            span: spanFrom(this.state, start),
          };
        case 'async':
          advance(this.state);
          return {
            type: 'Async',
            expression: this.parseOperand(allowStruct),
            span: spanFrom(this.state, start),
          };
        case 'lazy':
          advance(this.state);
          return {
            type: 'Lazy',
            expression: this.parseOperand(allowStruct),
            span: spanFrom(this.state, start),
          };
        case 'match':
          return this.parseMatchExpression();
      }
      break;

    case TOKEN_TYPES.PUNCT:
      if (token.value === '(') {
        advance(this.state);
        if (this.scanLambdaParams()) {
          return this.parseLambdaWithParens(start);
        }
        const inner = this.parseExpression();
        expectPunct(this.state, ')');
        return inner;
      }
      if (token.value === '[') {
        return this.parseArrayLiteral();
      }
      if (token.value === '{') {
        const block = this.parseBlock();
        return {
          type: 'Block',
          statements: block.statements,
          span: block.span,
        };
      }
      break;
  }

  throw unexpectedToken(this.state, token, 'expression');
};
