/**
 * CLI Shared Utilities Tests
 */

import { describe, expect, it } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { parse, tokenize } from '@loft-lang/core';
import {
  formatFailure,
  formatTokenLine,
  serializeAst,
  VERSION,
} from '../src/cli-shared.js';

describe('VERSION', () => {
  it('comes from the package manifest', () => {
    expect(VERSION).toBe('0.1.0');
  });
});

describe('formatTokenLine', () => {
  it('prints position, type and value', () => {
    const tokens = tokenize('let s = "a b"; // hi', { emitComments: true });
    expect(tokens.map(formatTokenLine)).toEqual([
      '1:1 Keyword let',
      '1:5 Ident s',
      '1:7 Op =',
      '1:9 String "a b"',
      '1:14 Punct ;',
      '1:16 Comment " hi"',
    ]);
  });

  it('prints numbers as written', () => {
    expect(tokenize('1.50').map(formatTokenLine)).toEqual(['1:1 Number 1.50']);
  });

  it('prints template markers without a value', () => {
    expect(tokenize('`x${y}`').map(formatTokenLine)).toEqual([
      '1:1 TemplateStart',
      '1:2 TemplateString "x"',
      '1:3 TemplateExprStart',
      '1:5 Ident y',
      '1:6 TemplateExprEnd',
      '1:7 TemplateEnd',
    ]);
  });
});

describe('serializeAst', () => {
  it('drops spans and writes numbers as strings', () => {
    expect(JSON.parse(serializeAst(parse('let x = 2;')))).toEqual([
      {
        type: 'VarDecl',
        name: 'x',
        varType: null,
        mutable: false,
        value: { type: 'Number', value: '2' },
      },
    ]);
  });

  it('keeps spans on request', () => {
    const json: unknown = JSON.parse(
      serializeAst(parse('break;'), { includeSpans: true })
    );
    expect(json).toEqual([
      {
        type: 'Break',
        span: {
          start: { line: 1, column: 1, offset: 0 },
          end: { line: 1, column: 7, offset: 6 },
        },
      },
    ]);
  });

  it('indents with two spaces', () => {
    expect(serializeAst(parse('break'))).toBe(
      '[\n  {\n    "type": "Break"\n  }\n]'
    );
  });
});

describe('formatFailure', () => {
  it('reports missing files by path', async () => {
    const missing = path.join(os.tmpdir(), 'loft-shared-missing', 'none.lf');
    const failure: unknown = await fs.readFile(missing, 'utf-8').then(
      () => null,
      (err: unknown) => err
    );
    expect(formatFailure(failure)).toBe(`File not found: ${missing}`);
  });

  it('uses the message of other errors', () => {
    expect(formatFailure(new Error('Unknown option: --bogus'))).toBe(
      'Unknown option: --bogus'
    );
    expect(formatFailure('plain')).toBe('plain');
  });
});
