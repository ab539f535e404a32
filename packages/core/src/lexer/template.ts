/**
 * Template Literal Reader
 * Splits a backtick literal into text chunks and interpolation token groups
 */

import type { SourceLocation } from '../source-location.js';
import type { Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { lexerError } from './errors.js';
import { makeMarker, makeToken } from './helpers.js';
import type { InputStream } from './input-stream.js';

/** Tokenizes interpolation text that starts at `base` in the outer source */
export type InterpolationTokenizer = (
  text: string,
  base: SourceLocation
) => Token[];

const TEMPLATE_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  '`': '`',
  $: '$',
};

/**
 * Read a whole template literal, opening backtick included, and return its
 * token sequence from TemplateStart through TemplateEnd.
 */
export function readTemplateLiteral(
  stream: InputStream,
  path: string,
  tokenizeInterpolation: InterpolationTokenizer
): Token[] {
  const literalStart = stream.location();
  stream.next(); // consume `
  const tokens: Token[] = [
    makeMarker(TOKEN_TYPES.TEMPLATE_START, literalStart, stream.location()),
  ];

  let text = '';
  let textStart = stream.location();

  const flushText = (): void => {
    if (text !== '') {
      tokens.push(
        makeToken(TOKEN_TYPES.TEMPLATE_STRING, text, textStart, stream.location())
      );
      text = '';
    }
  };

  for (;;) {
    const ch = stream.peek();
    if (ch === undefined) {
      throw lexerError('LOFT-L004', {}, literalStart, path, 1);
    }

    if (ch === '`') {
      flushText();
      const end = stream.location();
      stream.next();
      tokens.push(makeMarker(TOKEN_TYPES.TEMPLATE_END, end, stream.location()));
      return tokens;
    }

    if (ch === '$') {
      const dollar = stream.savePosition();
      const exprStart = stream.location();
      stream.next();
      if (stream.peek() !== '{') {
        // Lone $ is text
        stream.restorePosition(dollar);
        text += stream.next() ?? '';
        continue;
      }
      flushText();
      stream.next(); // consume {
      tokens.push(
        makeMarker(TOKEN_TYPES.TEMPLATE_EXPR_START, exprStart, stream.location())
      );
      tokens.push(
        ...readInterpolation(stream, path, exprStart, tokenizeInterpolation)
      );
      textStart = stream.location();
      continue;
    }

    if (ch === '\\') {
      stream.next();
      const escaped = stream.next();
      if (escaped !== undefined) {
        text += TEMPLATE_ESCAPES[escaped] ?? `\\${escaped}`;
      }
      continue;
    }

    text += stream.next() ?? '';
  }
}

/**
 * Collect brace-balanced interpolation text after `${`, consume the closing
 * `}`, and return the inner tokens followed by TemplateExprEnd.
 */
function readInterpolation(
  stream: InputStream,
  path: string,
  exprStart: SourceLocation,
  tokenizeInterpolation: InterpolationTokenizer
): Token[] {
  const base = stream.location();
  let depth = 1;
  let exprText = '';

  for (;;) {
    const ch = stream.peek();
    if (ch === undefined) {
      throw lexerError('LOFT-L005', {}, exprStart, path, 2);
    }
    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) break;
    }
    exprText += ch;
    stream.next();
  }

  const closeStart = stream.location();
  stream.next(); // consume }
  const inner = exprText === '' ? [] : tokenizeInterpolation(exprText, base);
  return [
    ...inner,
    makeMarker(TOKEN_TYPES.TEMPLATE_EXPR_END, closeStart, stream.location()),
  ];
}
