/**
 * CLI LSP Diagnostic Tests
 */

import { describe, expect, it } from 'vitest';
import { parseRecoverable, type LoftError } from '@loft-lang/core';
import { toLspDiagnostic } from '../src/cli-lsp-diagnostic.js';

function firstError(source: string): LoftError {
  const [error] = parseRecoverable(source).errors;
  if (error === undefined) throw new Error('Expected an error');
  return error;
}

describe('toLspDiagnostic', () => {
  it('converts the location to a zero-based range over the error length', () => {
    const diagnostic = toLspDiagnostic(
      firstError('let x = 79228162514264337593543950336;')
    );
    expect(diagnostic.range).toEqual({
      start: { line: 0, character: 8 },
      end: { line: 0, character: 37 },
    });
    expect(diagnostic.code).toBe('LOFT-L003');
    expect(diagnostic.message).toBe(
      'Invalid number literal 79228162514264337593543950336: value is out of range'
    );
  });

  it('omits data when there is no help', () => {
    const diagnostic = toLspDiagnostic(firstError('let = 1;'));
    expect(diagnostic.severity).toBe(1);
    expect(diagnostic.source).toBe('loft');
    expect('data' in diagnostic).toBe(false);
  });

  it('gives end-of-input errors an empty range and carries help', () => {
    const diagnostic = toLspDiagnostic(firstError('fn f() {'));
    expect(diagnostic.range).toEqual({
      start: { line: 0, character: 8 },
      end: { line: 0, character: 8 },
    });
    expect(diagnostic.data).toEqual({ help: 'Check for an unclosed brace' });
  });
});
