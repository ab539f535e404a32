/**
 * Loft Parser Tests: Error Recovery
 * parseRecoverable collects errors and resumes at statement boundaries
 */

import { describe, expect, it } from 'vitest';
import { LexerError, parse, parseRecoverable } from '@loft-lang/core';
import { catchError, expectStmt } from '../helpers/ast.js';

function summary(source: string): {
  statements: string[];
  errors: string[];
} {
  const result = parseRecoverable(source);
  return {
    statements: result.statements.map((stmt) =>
      'name' in stmt ? `${stmt.type} ${stmt.name}` : stmt.type
    ),
    errors: result.errors.map(
      (err) => `${err.errorId} ${err.location.line}:${err.location.column}`
    ),
  };
}

describe('parseRecoverable', () => {
  it('succeeds on valid input', () => {
    const result = parseRecoverable('let x = 1;');
    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.statements).toHaveLength(1);
  });

  it('resumes after the next semicolon', () => {
    const result = parseRecoverable('let = 1;\nlet y = 2;');
    expect(result.success).toBe(false);
    expect(result.errors.map((e) => e.message)).toEqual([
      "Expected identifier but got '=' at 1:5",
    ]);
    expect(expectStmt(result.statements[0], 'VarDecl').name).toBe('y');
    expect(result.statements).toHaveLength(1);
  });

  it('resumes before a statement keyword', () => {
    expect(summary('let x = ) fn f() {}')).toEqual({
      statements: ['FunctionDecl f'],
      errors: ['LOFT-P001 1:9'],
    });
  });

  it('discards a semicolon that is itself the unexpected token', () => {
    expect(summary('let x = ;\nlet x = ;\nlet x = ;')).toEqual({
      statements: [],
      errors: ['LOFT-P001 1:9', 'LOFT-P001 2:9', 'LOFT-P001 3:9'],
    });
  });

  it('collects one error per failed statement', () => {
    expect(summary('let = 1;\nconst = 2;\nfn ok() {}')).toEqual({
      statements: ['FunctionDecl ok'],
      errors: ['LOFT-P004 1:5', 'LOFT-P004 2:7'],
    });
  });

  it('reports the stray brace left by a failed block', () => {
    expect(summary('fn f() { let = 1; }\nlet z = 3;')).toEqual({
      statements: ['VarDecl z'],
      errors: ['LOFT-P004 1:14', 'LOFT-P001 1:19'],
    });
  });

  it('stops at end of input', () => {
    expect(summary('let x = (')).toEqual({
      statements: [],
      errors: ['LOFT-P002 1:10'],
    });
  });

  it('stops at a lexer error raised while parsing', () => {
    const result = parseRecoverable('let a = 1;\nlet b = $;\nlet c = 3;');
    expect(result.statements.map((s) => s.type)).toEqual(['VarDecl']);
    expect(result.errors).toHaveLength(1);
    const [err] = result.errors;
    expect(err).toBeInstanceOf(LexerError);
    expect(err?.location).toEqual({ line: 2, column: 9, offset: 19 });
  });

  it('stops at a lexer error raised while skipping', () => {
    expect(summary('let = 1 $ ;')).toEqual({
      statements: [],
      errors: ['LOFT-P004 1:5', 'LOFT-L002 1:9'],
    });
  });

  it('measures the error length in characters', () => {
    const err = catchError(() => parse('let "héllo" = 1;'));
    expect(err.errorId).toBe('LOFT-P004');
    expect(err.location).toEqual({ line: 1, column: 5, offset: 4 });
    expect(err.length).toBe(7);
  });

  it('measures a token spanning lines by its bytes', () => {
    const err = catchError(() => parse('let "a\nb" = 1;'));
    expect(err.length).toBe(5);
  });

  it('reports the configured path', () => {
    const result = parseRecoverable('let = 1;', { path: 'app.lf' });
    expect(result.errors[0]?.path).toBe('app.lf');
  });

  it('leaves parse unchanged: the first error is thrown', () => {
    const err = catchError(() => parse('let = 1;\nconst = 2;'));
    expect(err.errorId).toBe('LOFT-P004');
    expect(err.location.line).toBe(1);
  });
});
