/**
 * CLI Error Formatter Tests
 * Human, JSON and compact output, source snippets and caret underlines
 */

import { describe, expect, it } from 'vitest';
import { createError, parseRecoverable, type LoftError } from '@loft-lang/core';
import {
  formatDiagnostic,
  isOutputFormat,
  OUTPUT_FORMATS,
  renderCaretUnderline,
  renderSnippet,
} from '../src/cli-error-formatter.js';

const SOURCE = 'let x = 1;\nlet = 2;\nlet z = 3;';

function firstError(source: string, path: string): LoftError {
  const [error] = parseRecoverable(source, { path }).errors;
  if (error === undefined) throw new Error('Expected a parse error');
  return error;
}

describe('formatDiagnostic', () => {
  describe('human format', () => {
    it('shows the location, snippet and caret', () => {
      const error = firstError(SOURCE, 'main.lf');
      expect(formatDiagnostic(error, SOURCE, { format: 'human' })).toBe(
        [
          "error[LOFT-P004]: Expected identifier but got '='",
          '  --> main.lf:2:5',
          '   |',
          ' 1 | let x = 1;',
          ' 2 | let = 2;',
          '   |     ^',
          ' 3 | let z = 3;',
          '   |',
        ].join('\n')
      );
    });

    it('appends help when the error has one', () => {
      const source = 'fn f() {';
      const error = firstError(source, 'open.lf');
      expect(formatDiagnostic(error, source, { format: 'human' })).toBe(
        [
          "error[LOFT-P003]: Expected '}' but got EOF",
          '  --> open.lf:1:9',
          '   |',
          ' 1 | fn f() {',
          '   |         ^',
          '   |',
          '   = help: Check for an unclosed brace',
        ].join('\n')
      );
    });
  });

  it('renders compact output on one line', () => {
    const error = firstError(SOURCE, 'main.lf');
    expect(formatDiagnostic(error, SOURCE, { format: 'compact' })).toBe(
      "main.lf:2:5: error[LOFT-P004]: Expected identifier but got '='"
    );
  });

  it('renders JSON output as an LSP diagnostic with its path', () => {
    const error = firstError(SOURCE, 'main.lf');
    expect(JSON.parse(formatDiagnostic(error, SOURCE, { format: 'json' }))).toEqual({
      path: 'main.lf',
      range: {
        start: { line: 1, character: 4 },
        end: { line: 1, character: 5 },
      },
      severity: 1,
      code: 'LOFT-P004',
      source: 'loft',
      message: "Expected identifier but got '='",
    });
  });
});

describe('renderSnippet', () => {
  it('limits context to the requested lines', () => {
    const error = firstError(SOURCE, 'main.lf');
    expect(renderSnippet(error, SOURCE, { contextLines: 0 })).toEqual([
      '   |',
      ' 2 | let = 2;',
      '   |     ^',
      '   |',
    ]);
  });

  it('widens the gutter for two-digit line numbers', () => {
    const lines = Array.from({ length: 9 }, (_, i) => `let v${i} = ${i};`);
    const source = [...lines, 'let = 9;'].join('\n');
    const error = firstError(source, 'long.lf');
    expect(renderSnippet(error, source, { contextLines: 1 })).toEqual([
      '    |',
      '  9 | let v8 = 8;',
      ' 10 | let = 9;',
      '    |     ^',
      '    |',
    ]);
  });

  it('returns no lines for a location outside the source', () => {
    const error = createError(
      'LOFT-P002',
      { context: 'block' },
      { line: 5, column: 1, offset: 40 },
      'short.lf'
    );
    expect(renderSnippet(error, 'x')).toEqual([]);
  });
});

describe('renderCaretUnderline', () => {
  it('underlines the error length', () => {
    expect(renderCaretUnderline(1, 3, 'abcdef')).toBe('^^^');
  });

  it('uses one caret without a length', () => {
    expect(renderCaretUnderline(3, undefined, 'abc')).toBe('  ^');
  });

  it('stops at the end of the line', () => {
    expect(renderCaretUnderline(5, 10, 'abcdefg')).toBe('    ^^^');
    expect(renderCaretUnderline(10, 2, 'abc')).toBe(`${' '.repeat(9)}^`);
    expect(renderCaretUnderline(2, 10, 'a😀bc')).toBe(' ^^^');
  });

  it('rejects columns below 1', () => {
    expect(() => renderCaretUnderline(0, 1, 'x')).toThrow(
      new RangeError('Column must be at least 1')
    );
  });
});

describe('isOutputFormat', () => {
  it('accepts the three formats only', () => {
    expect(['human', 'json', 'compact', 'xml', 1].map(isOutputFormat)).toEqual([
      true,
      true,
      true,
      false,
      false,
    ]);
  });

  it('agrees with the list of formats', () => {
    expect(OUTPUT_FORMATS).toEqual(['human', 'json', 'compact']);
    expect(OUTPUT_FORMATS.every(isOutputFormat)).toBe(true);
  });
});
