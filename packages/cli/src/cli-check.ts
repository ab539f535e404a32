/**
 * loft-check Entry Point
 *
 * Parses loft files and reports tokenizer and parser diagnostics. Also
 * dumps the AST or token stream of a single file.
 */

import * as fs from 'fs/promises';
import {
  LoftError,
  parse,
  parseRecoverable,
  tokenize,
} from '@loft-lang/core';
import {
  createDefaultConfig,
  isIntegerInRange,
  loadConfig,
  MAX_ERRORS_LIMIT,
  type CheckConfig,
} from './cli-config.js';
import {
  formatDiagnostic,
  isOutputFormat,
  OUTPUT_FORMATS,
  toJsonDiagnostic,
  type OutputFormat,
} from './cli-error-formatter.js';
import { explainError } from './cli-explain.js';
import {
  formatFailure,
  formatTokenLine,
  serializeAst,
  VERSION,
} from './cli-shared.js';

// ============================================================
// ARGUMENTS
// ============================================================

/**
 * Parsed command-line arguments. `format` and `maxErrors` stay undefined
 * when not given so the configuration file can supply them.
 */
export type ParsedCheckArgs =
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string }
  | {
      mode: 'check';
      files: string[];
      format: OutputFormat | undefined;
      maxErrors: number | undefined;
    }
  | { mode: 'ast'; file: string; spans: boolean }
  | { mode: 'tokens'; file: string };

const COMMANDS: ReadonlySet<string> = new Set(['check', 'ast', 'tokens']);
const VALUE_FLAGS: ReadonlySet<string> = new Set([
  '--format',
  '--max-errors',
  '--explain',
]);
const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  '--spans',
]);

/**
 * Parse command-line arguments into a structured command.
 *
 * @param argv - Raw arguments (typically process.argv.slice(2))
 * @throws {Error} Unknown option, missing value or missing file
 */
export function parseCheckArgs(argv: string[]): ParsedCheckArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let format: OutputFormat | undefined;
  let maxErrors: number | undefined;
  let explain: string | undefined;
  let spans = false;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (VALUE_FLAGS.has(arg)) {
      const value = argv[++i];
      if (value === undefined) {
        throw new Error(`Missing value after ${arg}`);
      }
      if (arg === '--format') {
        if (!isOutputFormat(value)) {
          throw new Error(
            `Invalid --format value: ${value}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`
          );
        }
        format = value;
      } else if (arg === '--max-errors') {
        const count = /^\d+$/.test(value) ? Number(value) : NaN;
        if (!isIntegerInRange(count, 1, MAX_ERRORS_LIMIT)) {
          throw new Error(
            `--max-errors must be a number between 1 and ${MAX_ERRORS_LIMIT}`
          );
        }
        maxErrors = count;
      } else {
        explain = value;
      }
    } else if (BOOLEAN_FLAGS.has(arg)) {
      spans = spans || arg === '--spans';
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (explain !== undefined) {
    return { mode: 'explain', errorId: explain };
  }

  const first = positional[0];
  const command = first !== undefined && COMMANDS.has(first) ? first : 'check';
  const files = command === first ? positional.slice(1) : positional;
  const file = files[0];

  if (file === undefined) {
    throw new Error('Missing file argument');
  }
  if (command === 'check') {
    return { mode: 'check', files, format, maxErrors };
  }
  if (files.length > 1) {
    throw new Error(`Too many file arguments for ${command}`);
  }
  return command === 'ast'
    ? { mode: 'ast', file, spans }
    : { mode: 'tokens', file };
}

// ============================================================
// CHECKING
// ============================================================

export interface FileReport {
  readonly path: string;
  readonly source: string;
  readonly errors: readonly LoftError[];
}

/** Parse one source with recovery and collect its errors */
export function checkSource(path: string, source: string): FileReport {
  const result = parseRecoverable(source, { path });
  return { path, source, errors: result.errors };
}

/**
 * Render the diagnostics of every report. At most `maxErrors` diagnostics
 * are rendered; human and compact output then note how many were left out.
 * Clean human or compact output is the empty string.
 */
export function formatReport(
  reports: readonly FileReport[],
  config: CheckConfig
): string {
  const entries = reports.flatMap((report) =>
    report.errors.map((error) => ({ error, source: report.source }))
  );
  const shown = entries.slice(0, config.maxErrors);
  const omitted = entries.length - shown.length;

  if (config.format === 'json') {
    return JSON.stringify(
      shown.map(({ error }) => toJsonDiagnostic(error)),
      null,
      2
    );
  }

  const blocks = shown.map(({ error, source }) =>
    formatDiagnostic(error, source, {
      format: config.format,
      contextLines: config.contextLines,
    })
  );
  if (omitted > 0) {
    blocks.push(`... ${omitted} more ${plural(omitted, 'error')} not shown`);
  }

  if (config.format === 'compact') {
    return blocks.join('\n');
  }

  if (entries.length > 0) {
    const failing = reports.filter((report) => report.errors.length > 0);
    blocks.push(
      `found ${entries.length} ${plural(entries.length, 'error')} in ${failing.length} ${plural(failing.length, 'file')}`
    );
  }
  return blocks.join('\n\n');
}

function plural(count: number, noun: string): string {
  return count === 1 ? noun : `${noun}s`;
}

// ============================================================
// ENTRY POINT
// ============================================================

const USAGE = `Usage:
  loft-check [check] <files...>       Report tokenizer and parser errors
  loft-check ast <file>               Print the AST as JSON
  loft-check tokens <file>            Print one token per line
  loft-check --explain LOFT-XXXX      Show error documentation
  loft-check --help                   Show this help message
  loft-check --version                Show version information

Options:
  --format <format>     Output format: ${OUTPUT_FORMATS.join(', ')} (default: human)
  --max-errors <n>      Diagnostics to print (default: 50, range: 1-${MAX_ERRORS_LIMIT})
  --spans               Include source spans in AST output

Configuration:
  .loft-check.yaml in the working directory may set format, maxErrors
  and contextLines. Command-line options take precedence.

Exit codes:
  0  no errors
  1  tokenizer or parser errors
  2  usage, configuration or file system failure`;

/**
 * Entry point for the loft-check binary. Writes results to stdout,
 * diagnostics and failures to stderr, and sets process.exitCode.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  try {
    const parsed = parseCheckArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return;

      case 'version':
        console.log(VERSION);
        return;

      case 'explain': {
        const documentation = explainError(parsed.errorId);
        if (documentation === null) {
          console.error(`Invalid error ID: ${parsed.errorId}`);
          console.error(
            'Error ID must be a known LOFT-{L|P}{3-digit} code, e.g., LOFT-P003'
          );
          process.exitCode = 2;
          return;
        }
        console.log(documentation);
        return;
      }

      case 'check': {
        const fileConfig = loadConfig(process.cwd()) ?? createDefaultConfig();
        const config: CheckConfig = {
          ...fileConfig,
          format: parsed.format ?? fileConfig.format,
          maxErrors: parsed.maxErrors ?? fileConfig.maxErrors,
        };

        const reports: FileReport[] = [];
        for (const file of parsed.files) {
          reports.push(checkSource(file, await fs.readFile(file, 'utf-8')));
        }

        const output = formatReport(reports, config);
        if (config.format === 'json') {
          console.log(output);
        } else if (output !== '') {
          console.error(output);
        }
        process.exitCode = reports.some((r) => r.errors.length > 0) ? 1 : 0;
        return;
      }

      case 'ast': {
        const source = await fs.readFile(parsed.file, 'utf-8');
        try {
          const statements = parse(source, { path: parsed.file });
          console.log(serializeAst(statements, { includeSpans: parsed.spans }));
        } catch (err) {
          if (!(err instanceof LoftError)) throw err;
          console.error(formatDiagnostic(err, source, { format: 'human' }));
          process.exitCode = 1;
        }
        return;
      }

      case 'tokens': {
        const source = await fs.readFile(parsed.file, 'utf-8');
        try {
          const tokens = tokenize(source, {
            path: parsed.file,
            emitComments: true,
          });
          console.log(tokens.map(formatTokenLine).join('\n'));
        } catch (err) {
          if (!(err instanceof LoftError)) throw err;
          console.error(formatDiagnostic(err, source, { format: 'human' }));
          process.exitCode = 1;
        }
        return;
      }
    }
  } catch (err) {
    console.error(formatFailure(err));
    process.exitCode = 2;
  }
}

