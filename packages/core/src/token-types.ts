import type { Decimal } from 'decimal.js';
import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  NUMBER: 'Number',
  STRING: 'String',

  // Words
  KEYWORD: 'Keyword',
  IDENT: 'Ident',

  // Symbols
  PUNCT: 'Punct', // , ; : ( ) { } [ ] #
  OP: 'Op', // + - * / ... and digraphs like => ::

  // Comments (only emitted when requested)
  DOC_COMMENT: 'DocComment',
  COMMENT: 'Comment',

  // Template literals
  TEMPLATE_START: 'TemplateStart', // `
  TEMPLATE_STRING: 'TemplateString',
  TEMPLATE_EXPR_START: 'TemplateExprStart', // ${
  TEMPLATE_EXPR_END: 'TemplateExprEnd', // }
  TEMPLATE_END: 'TemplateEnd', // `
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

interface BaseToken {
  readonly span: SourceSpan;
}

export interface NumberToken extends BaseToken {
  readonly type: typeof TOKEN_TYPES.NUMBER;
  readonly value: Decimal;
  /** Literal text as written in the source */
  readonly raw: string;
}

export interface TextToken extends BaseToken {
  readonly type:
    | typeof TOKEN_TYPES.STRING
    | typeof TOKEN_TYPES.KEYWORD
    | typeof TOKEN_TYPES.IDENT
    | typeof TOKEN_TYPES.PUNCT
    | typeof TOKEN_TYPES.OP
    | typeof TOKEN_TYPES.DOC_COMMENT
    | typeof TOKEN_TYPES.COMMENT
    | typeof TOKEN_TYPES.TEMPLATE_STRING;
  readonly value: string;
}

export interface MarkerToken extends BaseToken {
  readonly type:
    | typeof TOKEN_TYPES.TEMPLATE_START
    | typeof TOKEN_TYPES.TEMPLATE_EXPR_START
    | typeof TOKEN_TYPES.TEMPLATE_EXPR_END
    | typeof TOKEN_TYPES.TEMPLATE_END;
}

export type Token = NumberToken | TextToken | MarkerToken;

// ============================================================
// DISPLAY
// ============================================================

/**
 * Render a token the way error messages quote it.
 * `undefined` stands for end of input.
 */
export function describeToken(token: Token | undefined): string {
  if (token === undefined) return 'EOF';

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      return token.raw;
    case TOKEN_TYPES.STRING:
      return `"${token.value}"`;
    case TOKEN_TYPES.KEYWORD:
    case TOKEN_TYPES.IDENT:
    case TOKEN_TYPES.PUNCT:
    case TOKEN_TYPES.OP:
      return `'${token.value}'`;
    case TOKEN_TYPES.DOC_COMMENT:
      return 'doc comment';
    case TOKEN_TYPES.COMMENT:
      return 'comment';
    case TOKEN_TYPES.TEMPLATE_STRING:
      return `template text "${token.value}"`;
    case TOKEN_TYPES.TEMPLATE_START:
    case TOKEN_TYPES.TEMPLATE_END:
      return "'`'";
    case TOKEN_TYPES.TEMPLATE_EXPR_START:
      return "'${'";
    case TOKEN_TYPES.TEMPLATE_EXPR_END:
      return "'}'";
  }
}
