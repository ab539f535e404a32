/**
 * Configuration Loader Tests
 * Tests for .loft-check.yaml loading and validation.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CONFIG_FILE,
  createDefaultConfig,
  loadConfig,
  validateConfig,
} from '../src/cli-config.js';

// ============================================================
// TEST FIXTURES
// ============================================================

let testDir: string;

function writeConfig(content: string): void {
  writeFileSync(join(testDir, CONFIG_FILE), content, 'utf-8');
}

beforeEach(() => {
  testDir = mkdtempSync(join(tmpdir(), 'loft-config-'));
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

describe('createDefaultConfig', () => {
  it('returns human output with 50 errors and 2 context lines', () => {
    expect(createDefaultConfig()).toEqual({
      format: 'human',
      maxErrors: 50,
      contextLines: 2,
    });
  });
});

// ============================================================
// LOADING
// ============================================================

describe('loadConfig', () => {
  it('returns null when the file does not exist', () => {
    expect(loadConfig(testDir)).toBeNull();
    expect(loadConfig(join(testDir, 'missing'))).toBeNull();
  });

  it('merges file values over the defaults', () => {
    writeConfig('maxErrors: 5\ncontextLines: 1\n');
    expect(loadConfig(testDir)).toEqual({
      format: 'human',
      maxErrors: 5,
      contextLines: 1,
    });
  });

  it('reads the output format', () => {
    writeConfig('format: compact\n');
    expect(loadConfig(testDir)?.format).toBe('compact');
  });

  it('treats an empty or comment-only file as the defaults', () => {
    writeConfig('');
    expect(loadConfig(testDir)).toEqual(createDefaultConfig());
    writeConfig('# nothing configured yet\n');
    expect(loadConfig(testDir)).toEqual(createDefaultConfig());
  });

  it('rejects invalid YAML', () => {
    writeConfig('format: "json\n');
    expect(() => loadConfig(testDir)).toThrow(
      /^Invalid configuration: invalid YAML \(/
    );
  });

  it('rejects invalid values from the file', () => {
    writeConfig('maxErrors: 0\n');
    expect(() => loadConfig(testDir)).toThrow(
      'Invalid configuration: maxErrors must be an integer between 1 and 1000'
    );
  });
});

// ============================================================
// VALIDATION
// ============================================================

describe('validateConfig', () => {
  it('requires a mapping', () => {
    expect(() => validateConfig([])).toThrow(
      'Invalid configuration: must be an object'
    );
    expect(() => validateConfig('human')).toThrow(
      'Invalid configuration: must be an object'
    );
  });

  it('rejects unknown keys', () => {
    expect(() => validateConfig({ rules: {} })).toThrow(
      'Invalid configuration: unknown key rules'
    );
  });

  it('rejects unknown formats', () => {
    expect(() => validateConfig({ format: 'xml' })).toThrow(
      'Invalid configuration: format must be one of human, json, compact'
    );
  });

  it('requires integer context lines within range', () => {
    const message =
      'Invalid configuration: contextLines must be an integer between 0 and 10';
    expect(() => validateConfig({ contextLines: 11 })).toThrow(message);
    expect(() => validateConfig({ contextLines: 2.5 })).toThrow(message);
    expect(() => validateConfig({ contextLines: '2' })).toThrow(message);
  });

  it('accepts boundary values', () => {
    expect(validateConfig({ contextLines: 0, maxErrors: 1000 })).toEqual({
      format: 'human',
      maxErrors: 1000,
      contextLines: 0,
    });
  });
});
