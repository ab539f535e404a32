/**
 * Token Cursor
 * Lookahead buffer over the tokenizer. Speculative parses pull tokens
 * forward and push them back; the tokenizer itself never rewinds.
 */

import type { Tokenizer } from '../lexer/index.js';
import type { SourceLocation } from '../source-location.js';
import type { Token } from '../token-types.js';

export class TokenCursor {
  private readonly buffer: Token[] = [];
  private previous: Token | undefined;

  constructor(private readonly tokenizer: Tokenizer) {}

  get path(): string {
    return this.tokenizer.path;
  }

  /** Next token without consuming it; undefined at end of input */
  peek(): Token | undefined {
    if (this.buffer.length === 0) {
      const token = this.tokenizer.next();
      if (token === undefined) return undefined;
      this.buffer.push(token);
    }
    return this.buffer[0];
  }

  next(): Token | undefined {
    const token = this.buffer.shift() ?? this.tokenizer.next();
    if (token !== undefined) this.previous = token;
    return token;
  }

  pushBack(token: Token): void {
    this.buffer.unshift(token);
  }

  /** Return a run of consumed tokens to the front, keeping their order */
  pushBackAll(tokens: readonly Token[]): void {
    this.buffer.unshift(...tokens);
  }

  takeDocComment(): string | undefined {
    return this.tokenizer.takeDocComment();
  }

  /** Start of the next token, or the end of input */
  location(): SourceLocation {
    return this.peek()?.span.start ?? this.tokenizer.location();
  }

  /** End of the most recently consumed token */
  previousEnd(): SourceLocation {
    return this.previous?.span.end ?? this.location();
  }
}
