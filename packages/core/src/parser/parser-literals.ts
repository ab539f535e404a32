/**
 * Parser Extension: Literal Parsing
 * Arrays, struct literals and template literals
 */

import { Parser } from './parser.js';
import type {
  ArrayLiteralExpr,
  Expr,
  IdentExpr,
  StructFieldInit,
  StructLiteralExpr,
  TemplateLiteralExpr,
  TemplatePart,
} from '../ast-nodes.js';
import { TOKEN_TYPES, describeToken } from '../token-types.js';
import {
  advance,
  checkPunct,
  expectIdent,
  expectPunct,
  isAtEnd,
  matchPunct,
  parseError,
  peek,
  spanFrom,
  unexpectedToken,
} from './state.js';

declare module './parser.js' {
  interface Parser {
    parseArrayLiteral(): ArrayLiteralExpr;
    parseStructLiteral(name: IdentExpr): StructLiteralExpr;
    parseTemplateLiteral(): TemplateLiteralExpr;
  }
}

// ============================================================
// ARRAYS
// ============================================================

/** `[a, b, c]`; commas between elements are optional */
Parser.prototype.parseArrayLiteral = function (this: Parser): ArrayLiteralExpr {
  const start = this.state.cursor.location();
  expectPunct(this.state, '[');

  const elements: Expr[] = [];
  while (!isAtEnd(this.state) && !checkPunct(this.state, ']')) {
    elements.push(this.parseExpressionNoStruct());
    matchPunct(this.state, ',');
  }

  expectPunct(this.state, ']');
  return {
    type: 'ArrayLiteral',
    elements,
    span: spanFrom(this.state, start),
  };
};

// ============================================================
// STRUCT LITERALS
// ============================================================

/** `Name { field: expr, ... }` with the name already parsed */
Parser.prototype.parseStructLiteral = function (
  this: Parser,
  name: IdentExpr
): StructLiteralExpr {
  expectPunct(this.state, '{');

  const fields: StructFieldInit[] = [];
  while (!isAtEnd(this.state) && !checkPunct(this.state, '}')) {
    const fieldName = expectIdent(this.state, 'field name');
    expectPunct(this.state, ':');
    fields.push({ name: fieldName, value: this.parseExpression() });
    matchPunct(this.state, ',');
  }

  expectPunct(this.state, '}');
  return {
    type: 'StructLiteral',
    name: name.name,
    fields,
    span: spanFrom(this.state, name.span.start),
  };
};

// ============================================================
// TEMPLATE LITERALS
// ============================================================

/**
 * Rebuild a template literal from TemplateStart ... TemplateEnd. Each
 * interpolation's tokens are parsed as one full expression.
 */
Parser.prototype.parseTemplateLiteral = function (
  this: Parser
): TemplateLiteralExpr {
  const start = this.state.cursor.location();
  advance(this.state); // TemplateStart

  const parts: TemplatePart[] = [];
  for (;;) {
    const token = peek(this.state);

    if (token?.type === TOKEN_TYPES.TEMPLATE_STRING) {
      advance(this.state);
      parts.push({ type: 'Text', value: token.value });
      continue;
    }

    if (token?.type === TOKEN_TYPES.TEMPLATE_EXPR_START) {
      advance(this.state);
      const expression = this.parseExpression();
      const close = peek(this.state);
      if (close?.type !== TOKEN_TYPES.TEMPLATE_EXPR_END) {
        throw parseError(
          this.state,
          'LOFT-P003',
          {
            expected: "'}' after template expression",
            actual: describeToken(close),
          },
          close
        );
      }
      advance(this.state);
      parts.push({ type: 'Expression', expression });
      continue;
    }

    if (token?.type === TOKEN_TYPES.TEMPLATE_END) {
      advance(this.state);
      return {
        type: 'TemplateLiteral',
        parts,
        span: spanFrom(this.state, start),
      };
    }

    throw unexpectedToken(this.state, token, 'template literal');
  }
};
