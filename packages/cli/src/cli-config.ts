/**
 * CLI Configuration
 * Loads and validates .loft-check.yaml
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import {
  isOutputFormat,
  OUTPUT_FORMATS,
  type OutputFormat,
} from './cli-error-formatter.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface CheckConfig {
  readonly format: OutputFormat;
  /** Diagnostics printed per run before the rest are summarised */
  readonly maxErrors: number;
  /** Source lines around each error in human output */
  readonly contextLines: number;
}

export const CONFIG_FILE = '.loft-check.yaml';

export const MAX_ERRORS_LIMIT = 1000;
const MAX_CONTEXT_LINES = 10;

const CONFIG_KEYS: ReadonlySet<string> = new Set([
  'format',
  'maxErrors',
  'contextLines',
]);

// ============================================================
// DEFAULTS
// ============================================================

export function createDefaultConfig(): CheckConfig {
  return {
    format: 'human',
    maxErrors: 50,
    contextLines: 2,
  };
}

// ============================================================
// LOADING
// ============================================================

/**
 * Load .loft-check.yaml from a directory and merge it over the defaults.
 * An empty file yields the defaults.
 *
 * @returns Merged configuration, or null when the file does not exist
 * @throws {Error} Invalid YAML or invalid configuration values
 */
export function loadConfig(dir: string): CheckConfig | null {
  const configPath = join(dir, CONFIG_FILE);
  if (!existsSync(configPath)) {
    return null;
  }

  const content = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid configuration: invalid YAML (${reason})`);
  }

  return validateConfig(parsed ?? {});
}

/**
 * Validate a parsed configuration document and merge it over the defaults.
 *
 * @throws {Error} Message prefixed with "Invalid configuration:"
 */
export function validateConfig(value: unknown): CheckConfig {
  if (!isRecord(value)) {
    throw new Error('Invalid configuration: must be an object');
  }

  for (const key of Object.keys(value)) {
    if (!CONFIG_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  const defaults = createDefaultConfig();

  return {
    format: readOption(
      value['format'],
      isOutputFormat,
      defaults.format,
      `format must be one of ${OUTPUT_FORMATS.join(', ')}`
    ),
    maxErrors: readOption(
      value['maxErrors'],
      (v): v is number => isIntegerInRange(v, 1, MAX_ERRORS_LIMIT),
      defaults.maxErrors,
      `maxErrors must be an integer between 1 and ${MAX_ERRORS_LIMIT}`
    ),
    contextLines: readOption(
      value['contextLines'],
      (v): v is number => isIntegerInRange(v, 0, MAX_CONTEXT_LINES),
      defaults.contextLines,
      `contextLines must be an integer between 0 and ${MAX_CONTEXT_LINES}`
    ),
  };
}

function readOption<T>(
  value: unknown,
  guard: (value: unknown) => value is T,
  fallback: T,
  message: string
): T {
  if (value === undefined) return fallback;
  if (!guard(value)) {
    throw new Error(`Invalid configuration: ${message}`);
  }
  return value;
}

// ============================================================
// TYPE GUARDS
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isIntegerInRange(
  value: unknown,
  min: number,
  max: number
): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= min &&
    value <= max
  );
}
