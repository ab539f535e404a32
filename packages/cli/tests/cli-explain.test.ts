/**
 * CLI Explain Tests
 */

import { describe, expect, it } from 'vitest';
import { ERROR_REGISTRY } from '@loft-lang/core';
import { explainError } from '../src/cli-explain.js';

describe('explainError', () => {
  it('renders description, cause, resolution and examples', () => {
    expect(explainError('LOFT-L001')).toBe(
      [
        'LOFT-L001: Unterminated block comment',
        '',
        'Cause:',
        '  A /* or /** comment reaches end of file without a closing */.',
        '',
        'Resolution:',
        '  Close the comment with */.',
        '',
        'Examples:',
        '  Missing comment terminator',
        '',
        '    /* helper for the parser',
        '    fn f() {}',
      ].join('\n')
    );
  });

  it('documents every registered error', () => {
    for (const [id] of ERROR_REGISTRY.entries()) {
      expect(explainError(id)?.startsWith(`${id}: `)).toBe(true);
    }
  });

  it('returns null for malformed or unknown IDs', () => {
    expect(explainError('LOFT-P999')).toBeNull();
    expect(explainError('P001')).toBeNull();
    expect(explainError('loft-p001')).toBeNull();
    expect(explainError('LOFT-X001')).toBeNull();
  });
});
