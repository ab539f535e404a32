/**
 * CLI LSP Diagnostic
 * Convert LoftError to Language Server Protocol diagnostic objects
 */

import type { LoftError } from '@loft-lang/core';

// ============================================================
// PUBLIC TYPES
// ============================================================

/** Zero-based LSP position */
export interface LspPosition {
  readonly line: number;
  readonly character: number;
}

export interface LspRange {
  readonly start: LspPosition;
  readonly end: LspPosition;
}

/** LSP severity: 1 = Error, 2 = Warning, 3 = Information, 4 = Hint */
export type LspSeverity = 1 | 2 | 3 | 4;

export interface LspDiagnostic {
  readonly range: LspRange;
  readonly severity: LspSeverity;
  readonly code: string;
  readonly source: 'loft';
  readonly message: string;
  readonly data?: { readonly help: string };
}

// ============================================================
// CONVERSION
// ============================================================

/**
 * Convert a LoftError to an LSP diagnostic.
 *
 * The range starts at the error location and spans `error.length`
 * characters on the same line. Errors at end of input carry no length and
 * produce an empty range.
 */
export function toLspDiagnostic(error: LoftError): LspDiagnostic {
  const { errorId, message, location, length, help } = error.toData();

  const start: LspPosition = {
    line: location.line - 1,
    character: location.column - 1,
  };
  const end: LspPosition = {
    line: start.line,
    character: start.character + (length ?? 0),
  };

  const diagnostic: LspDiagnostic = {
    range: { start, end },
    severity: 1,
    code: errorId,
    source: 'loft',
    message,
  };

  if (help !== undefined && help !== '') {
    return { ...diagnostic, data: { help } };
  }
  return diagnostic;
}
