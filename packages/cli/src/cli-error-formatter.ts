/**
 * CLI Error Formatter
 * Format tokenizer and parser errors for human-readable, JSON, or compact output
 */

import type { LoftError } from '@loft-lang/core';
import { toLspDiagnostic, type LspDiagnostic } from './cli-lsp-diagnostic.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export const OUTPUT_FORMATS = ['human', 'json', 'compact'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface SnippetOptions {
  /** Source lines shown before and after the error line (default: 2) */
  readonly contextLines?: number | undefined;
}

export interface FormatOptions extends SnippetOptions {
  readonly format: OutputFormat;
}

/** JSON output entry: an LSP diagnostic tagged with its file */
export type JsonDiagnostic = { readonly path: string } & LspDiagnostic;

const DEFAULT_CONTEXT_LINES = 2;

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format an error for output.
 *
 * - Human format: multi-line with snippet and caret underline
 * - JSON format: LSP Diagnostic compatible
 * - Compact format: single line for CI output
 *
 * @throws {TypeError} Unknown format
 */
export function formatDiagnostic(
  error: LoftError,
  source: string,
  options: FormatOptions
): string {
  switch (options.format) {
    case 'human':
      return formatDiagnosticHuman(error, source, options);
    case 'json':
      return JSON.stringify(toJsonDiagnostic(error), null, 2);
    case 'compact':
      return formatDiagnosticCompact(error);
    default:
      throw new TypeError(`Unknown format: ${String(options.format)}`);
  }
}

export function toJsonDiagnostic(error: LoftError): JsonDiagnostic {
  return { path: error.path, ...toLspDiagnostic(error) };
}

/**
 * Format error in human-readable format.
 *
 * Output format:
 * ```
 * error[LOFT-P003]: Expected ';' but got 'let'
 *   --> main.lf:2:1
 *    |
 *  1 | let x = 1
 *  2 | let y = 2;
 *    | ^^^
 *    |
 * ```
 */
function formatDiagnosticHuman(
  error: LoftError,
  source: string,
  options: SnippetOptions
): string {
  const { errorId, message, location, path, help } = error.toData();
  const lines: string[] = [];

  lines.push(`error[${errorId}]: ${message}`);
  lines.push(`  --> ${path}:${location.line}:${location.column}`);
  lines.push(...renderSnippet(error, source, options));

  if (help !== undefined && help !== '') {
    lines.push(`   = help: ${help}`);
  }

  return lines.join('\n');
}

/** `main.lf:3:7: error[LOFT-P001]: message` */
function formatDiagnosticCompact(error: LoftError): string {
  const { errorId, message, location, path } = error.toData();
  return `${path}:${location.line}:${location.column}: error[${errorId}]: ${message}`;
}

// ============================================================
// SOURCE SNIPPET
// ============================================================

/**
 * Render the source lines around an error with a gutter of line numbers
 * and a caret underline below the error line. Returns no lines when the
 * location lies outside the source.
 */
export function renderSnippet(
  error: LoftError,
  source: string,
  options: SnippetOptions = {}
): string[] {
  const contextLines = options.contextLines ?? DEFAULT_CONTEXT_LINES;
  const sourceLines = source.split(/\r?\n/);
  const errorLine = error.location.line;

  if (errorLine < 1 || errorLine > sourceLines.length) {
    return [];
  }

  const first = Math.max(1, errorLine - contextLines);
  const last = Math.min(sourceLines.length, errorLine + contextLines);
  const width = String(last).length;
  const gutter = ' '.repeat(width);

  const lines: string[] = [` ${gutter} |`];
  for (let lineNumber = first; lineNumber <= last; lineNumber++) {
    const content = sourceLines[lineNumber - 1] ?? '';
    lines.push(` ${String(lineNumber).padStart(width, ' ')} | ${content}`);

    if (lineNumber === errorLine) {
      const caret = renderCaretUnderline(
        error.location.column,
        error.length,
        content
      );
      lines.push(` ${gutter} | ${caret}`);
    }
  }
  lines.push(` ${gutter} |`);

  return lines;
}

// ============================================================
// CARET UNDERLINE
// ============================================================

/**
 * Render the caret underline for an error starting at 1-based `column`.
 *
 * - Missing length: single ^
 * - Length past the end of the line: carets stop at the line end
 *
 * @throws {RangeError} Column below 1
 */
export function renderCaretUnderline(
  column: number,
  length: number | undefined,
  lineContent: string
): string {
  if (column < 1) {
    throw new RangeError('Column must be at least 1');
  }

  const padding = ' '.repeat(column - 1);
  const available = Math.max(1, [...lineContent].length - (column - 1));
  const caretCount = Math.max(1, Math.min(length ?? 1, available));

  return padding + '^'.repeat(caretCount);
}
