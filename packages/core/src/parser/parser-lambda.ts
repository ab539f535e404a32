/**
 * Parser Extension: Lambdas
 * Speculative detection of `(params) =>` and lambda construction
 */

import { Parser } from './parser.js';
import type { Expr, LambdaExpr, LambdaParam, TypeNode } from '../ast-nodes.js';
import type { SourceLocation } from '../source-location.js';
import type { Token } from '../token-types.js';
import {
  checkPunct,
  expectIdent,
  expectOp,
  expectPunct,
  isAtEnd,
  isOp,
  isPunct,
  matchPunct,
  spanFrom,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    scanLambdaParams(): boolean;
    parseLambdaWithParens(start: SourceLocation): LambdaExpr;
    parseLambdaBody(params: LambdaParam[], start: SourceLocation): LambdaExpr;
  }
}

/** Tokens examined before giving up on finding `) =>` */
export const MAX_LAMBDA_SCAN = 100;

/**
 * Called just after `(`. Looks ahead for the `)` closing this group and
 * reports whether `=>` follows it. Every token pulled during the scan goes
 * back to the cursor in order, whatever the outcome.
 */
Parser.prototype.scanLambdaParams = function (this: Parser): boolean {
  const cursor = this.state.cursor;
  const scanned: Token[] = [];
  let depth = 0;
  let isLambda = false;

  try {
    while (scanned.length < MAX_LAMBDA_SCAN) {
      const token = cursor.next();
      if (token === undefined) break;
      scanned.push(token);

      if (isPunct(token, '(')) {
        depth++;
      } else if (isPunct(token, ')')) {
        if (depth === 0) {
          const after = cursor.next();
          if (after !== undefined) {
            scanned.push(after);
            isLambda = isOp(after, '=>');
          }
          break;
        }
        depth--;
      }
    }
  } finally {
    cursor.pushBackAll(scanned);
  }

  return isLambda;
};

/** `(a, b: num) => body`, with the `(` already consumed */
Parser.prototype.parseLambdaWithParens = function (
  this: Parser,
  start: SourceLocation
): LambdaExpr {
  const params: LambdaParam[] = [];

  while (!isAtEnd(this.state) && !checkPunct(this.state, ')')) {
    const name = expectIdent(this.state, 'parameter name');
    let paramType: TypeNode | null = null;
    if (matchPunct(this.state, ':')) {
      paramType = this.parseType();
    }
    params.push({ name, paramType });
    matchPunct(this.state, ',');
  }

  expectPunct(this.state, ')');
  expectOp(this.state, '=>');
  return this.parseLambdaBody(params, start);
};

/** Body after `=>`: a block, or any expression */
Parser.prototype.parseLambdaBody = function (
  this: Parser,
  params: LambdaParam[],
  start: SourceLocation
): LambdaExpr {
  let body: Expr;
  if (checkPunct(this.state, '{')) {
    const block = this.parseBlock();
    body = { type: 'Block', statements: block.statements, span: block.span };
  } else {
    body = this.parseExpression();
  }

  return {
    type: 'Lambda',
    params,
    returnType: null,
    body,
    span: spanFrom(this.state, start),
  };
};
