/**
 * Input Stream
 * Character cursor over source text with line/column tracking
 */

import type { SourceLocation } from '../source-location.js';

/** Opaque checkpoint returned by {@link InputStream.savePosition} */
export interface StreamPosition {
  readonly pos: number;
  readonly byteOffset: number;
  readonly line: number;
  readonly column: number;
}

/** UTF-8 encoded width of a code point */
function utf8Width(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/**
 * Walks the source one code point at a time. Columns count code points;
 * offsets count UTF-8 bytes.
 */
export class InputStream {
  /** UTF-16 index into `source` */
  private pos = 0;
  private byteOffset = 0;
  private line: number;
  private column: number;
  private readonly baseOffset: number;

  /**
   * @param baseLocation - Location of the first character when the text is
   *   a slice of a larger source (template interpolations)
   */
  constructor(
    readonly source: string,
    baseLocation?: SourceLocation
  ) {
    this.line = baseLocation?.line ?? 1;
    this.column = baseLocation?.column ?? 1;
    this.baseOffset = baseLocation?.offset ?? 0;
  }

  /** Consume one character. Returns undefined at end of input. */
  next(): string | undefined {
    const codePoint = this.source.codePointAt(this.pos);
    if (codePoint === undefined) return undefined;
    const ch = String.fromCodePoint(codePoint);
    this.pos += ch.length;
    this.byteOffset += utf8Width(codePoint);
    if (ch === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  peek(): string | undefined {
    return this.charAt(this.pos);
  }

  /** Look `n` characters past the current one without consuming */
  peekAt(n: number): string | undefined {
    let index = this.pos;
    for (let skipped = 0; skipped < n; skipped++) {
      const ch = this.charAt(index);
      if (ch === undefined) return undefined;
      index += ch.length;
    }
    return this.charAt(index);
  }

  eof(): boolean {
    return this.peek() === undefined;
  }

  savePosition(): StreamPosition {
    return {
      pos: this.pos,
      byteOffset: this.byteOffset,
      line: this.line,
      column: this.column,
    };
  }

  restorePosition(position: StreamPosition): void {
    this.pos = position.pos;
    this.byteOffset = position.byteOffset;
    this.line = position.line;
    this.column = position.column;
  }

  location(): SourceLocation {
    return {
      line: this.line,
      column: this.column,
      offset: this.byteOffset + this.baseOffset,
    };
  }

  /** Consume characters while `predicate` holds and return them */
  readWhile(predicate: (ch: string) => boolean): string {
    let value = '';
    let ch = this.peek();
    while (ch !== undefined && predicate(ch)) {
      value += ch;
      this.next();
      ch = this.peek();
    }
    return value;
  }

  private charAt(index: number): string | undefined {
    const codePoint = this.source.codePointAt(index);
    return codePoint === undefined ? undefined : String.fromCodePoint(codePoint);
  }
}
