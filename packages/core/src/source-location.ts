// ============================================================
// SOURCE LOCATION
// ============================================================

/**
 * Position in source text: 1-based line, 1-based column counted in code
 * points, 0-based offset counted in UTF-8 bytes
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}
