/**
 * Loft Parser Tests: Error Hints
 */

import { describe, expect, it } from 'vitest';
import { tokenize, type Token } from '@loft-lang/core';
import { generateHint } from '../../src/parser/state.js';

function token(source: string): Token | undefined {
  return tokenize(source)[0];
}

describe('generateHint', () => {
  it('points at unclosed delimiters at end of input', () => {
    expect(generateHint("')'", undefined)).toBe('Check for an unclosed parenthesis');
    expect(generateHint("'}'", undefined)).toBe('Check for an unclosed brace');
    expect(generateHint("']'", undefined)).toBe('Check for an unclosed bracket');
    expect(generateHint("';'", undefined)).toBeUndefined();
  });

  it('suggests keywords for common typos', () => {
    expect(generateHint("'('", token('fucn'))).toBe("Did you mean 'fn'?");
    expect(generateHint("';'", token('import'))).toBe("Did you mean 'learn'?");
    expect(generateHint("';'", token('retrun'))).toBe("Did you mean 'return'?");
  });

  it('explains => for match arms', () => {
    expect(generateHint("'=>'", token('->'))).toBe("Match arms and lambdas use '=>'");
    expect(generateHint("'=>'", token('='))).toBe("Match arms and lambdas use '=>'");
  });

  it('returns undefined otherwise', () => {
    expect(generateHint("'('", token('name'))).toBeUndefined();
    expect(generateHint("'=>'", token('+'))).toBeUndefined();
  });
});
