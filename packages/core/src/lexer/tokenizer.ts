/**
 * Tokenizer
 * Produces tokens on demand from an input stream
 */

import type { SourceLocation } from '../source-location.js';
import type { TextToken, Token } from '../token-types.js';
import { TOKEN_TYPES } from '../token-types.js';
import { lexerError } from './errors.js';
import {
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import { InputStream } from './input-stream.js';
import { OPERATOR_CHARS, PUNCTUATION } from './operators.js';
import {
  readIdentifier,
  readNumber,
  readOperator,
  readString,
} from './readers.js';
import { readTemplateLiteral } from './template.js';

export interface TokenizerOptions {
  /** Display path used in error messages (default: `<input>`) */
  path?: string | undefined;
  /** Return Comment and DocComment tokens instead of skipping them */
  emitComments?: boolean | undefined;
  /** Location of the first character, for sources embedded in a larger file */
  baseLocation?: SourceLocation | undefined;
}

export const DEFAULT_PATH = '<input>';

export class Tokenizer {
  readonly path: string;
  private readonly stream: InputStream;
  private readonly emitComments: boolean;
  /** Tokens already produced but not yet returned (template literals) */
  private readonly pending: Token[] = [];
  private lastDocComment: string | undefined;

  constructor(source: string, options: TokenizerOptions = {}) {
    this.path = options.path ?? DEFAULT_PATH;
    this.emitComments = options.emitComments ?? false;
    this.stream = new InputStream(source, options.baseLocation);
  }

  /** Next token, or undefined at end of input */
  next(): Token | undefined {
    const queued = this.pending.shift();
    if (queued !== undefined) return queued;

    const comment = this.skipTrivia();
    if (comment !== undefined) return comment;

    const ch = this.stream.peek();
    if (ch === undefined) return undefined;

    if (ch === '"') {
      return readString(this.stream);
    }

    if (ch === '`') {
      this.pending.push(
        ...readTemplateLiteral(this.stream, this.path, (text, base) =>
          tokenize(text, { path: this.path, baseLocation: base })
        )
      );
      return this.pending.shift();
    }

    if (isDigit(ch)) {
      return readNumber(this.stream, this.path);
    }

    if (isIdentifierStart(ch)) {
      return readIdentifier(this.stream);
    }

    // :: is an operator although : alone is punctuation
    if (ch === ':' && this.stream.peekAt(1) === ':') {
      return readOperator(this.stream);
    }

    if (PUNCTUATION.has(ch)) {
      const start = this.stream.location();
      this.stream.next();
      return makeToken(TOKEN_TYPES.PUNCT, ch, start, this.stream.location());
    }

    if (OPERATOR_CHARS.has(ch)) {
      return readOperator(this.stream);
    }

    throw lexerError(
      'LOFT-L002',
      { char: ch },
      this.stream.location(),
      this.path,
      1
    );
  }

  /**
   * Return and clear the most recent doc comment. Only one is held at a
   * time; a newer doc comment replaces an untaken one.
   */
  takeDocComment(): string | undefined {
    const doc = this.lastDocComment;
    this.lastDocComment = undefined;
    return doc;
  }

  /** Current position of the character stream */
  location(): SourceLocation {
    return this.stream.location();
  }

  /**
   * Skip whitespace and comments. Returns a comment token when comments are
   * emitted, otherwise undefined once real input (or the end) is reached.
   */
  private skipTrivia(): TextToken | undefined {
    for (;;) {
      this.stream.readWhile(isWhitespace);
      if (this.stream.peek() !== '/') return undefined;

      const second = this.stream.peekAt(1);
      let comment: TextToken;
      if (second === '/') {
        comment = this.readLineComment();
      } else if (second === '*') {
        comment = this.readBlockComment();
      } else {
        return undefined;
      }

      if (comment.type === TOKEN_TYPES.DOC_COMMENT) {
        this.lastDocComment = comment.value;
      }
      if (this.emitComments) return comment;
    }
  }

  private readLineComment(): TextToken {
    const start = this.stream.location();
    this.stream.next();
    this.stream.next();

    const isDoc = this.stream.peek() === '/';
    if (isDoc) this.stream.next();

    const text = this.stream.readWhile((c) => c !== '\n');
    return isDoc
      ? makeToken(
          TOKEN_TYPES.DOC_COMMENT,
          text.trim(),
          start,
          this.stream.location()
        )
      : makeToken(TOKEN_TYPES.COMMENT, text, start, this.stream.location());
  }

  private readBlockComment(): TextToken {
    const start = this.stream.location();
    this.stream.next();
    this.stream.next();

    // /**/ is an empty plain comment, not an open doc block
    const isDoc =
      this.stream.peek() === '*' && this.stream.peekAt(1) !== '/';
    if (isDoc) this.stream.next();

    let text = '';
    for (;;) {
      const ch = this.stream.next();
      if (ch === undefined) {
        throw lexerError('LOFT-L001', {}, start, this.path, 2);
      }
      if (ch === '*' && this.stream.peek() === '/') {
        this.stream.next();
        break;
      }
      text += ch;
    }

    return isDoc
      ? makeToken(
          TOKEN_TYPES.DOC_COMMENT,
          text.trim(),
          start,
          this.stream.location()
        )
      : makeToken(TOKEN_TYPES.COMMENT, text, start, this.stream.location());
  }
}

/**
 * Tokenize a whole source.
 *
 * @example
 * tokenize('let x = 1;').map((t) => t.type)
 * // ['Keyword', 'Ident', 'Op', 'Number', 'Punct']
 */
export function tokenize(source: string, options?: TokenizerOptions): Token[] {
  const tokenizer = new Tokenizer(source, options);
  const tokens: Token[] = [];
  let token = tokenizer.next();
  while (token !== undefined) {
    tokens.push(token);
    token = tokenizer.next();
  }
  return tokens;
}
