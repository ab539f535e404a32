/**
 * CLI Shared Utilities
 * Common formatting functions for loft-check
 */

import { readFileSync } from 'node:fs';
import { TOKEN_TYPES, type Stmt, type Token } from '@loft-lang/core';

// ============================================================
// VERSION
// ============================================================

function readVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
  );
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  return '0.0.0';
}

/** Package version from packages/cli/package.json */
export const VERSION = readVersion();

// ============================================================
// AST OUTPUT
// ============================================================

/**
 * Serialize statements as indented JSON. Decimals serialize as strings
 * through their own `toJSON`. Spans are dropped unless requested.
 */
export function serializeAst(
  statements: readonly Stmt[],
  options: { includeSpans?: boolean } = {}
): string {
  const includeSpans = options.includeSpans ?? false;
  return JSON.stringify(
    statements,
    (key, value: unknown) => (key === 'span' && !includeSpans ? undefined : value),
    2
  );
}

// ============================================================
// TOKEN OUTPUT
// ============================================================

/**
 * One token per line: `line:column Type value`.
 * Text-bearing tokens are JSON-quoted so whitespace stays visible.
 */
export function formatTokenLine(token: Token): string {
  const { line, column } = token.span.start;
  const prefix = `${line}:${column} ${token.type}`;

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      return `${prefix} ${token.raw}`;
    case TOKEN_TYPES.STRING:
    case TOKEN_TYPES.TEMPLATE_STRING:
    case TOKEN_TYPES.COMMENT:
    case TOKEN_TYPES.DOC_COMMENT:
      return `${prefix} ${JSON.stringify(token.value)}`;
    case TOKEN_TYPES.KEYWORD:
    case TOKEN_TYPES.IDENT:
    case TOKEN_TYPES.PUNCT:
    case TOKEN_TYPES.OP:
      return `${prefix} ${token.value}`;
    case TOKEN_TYPES.TEMPLATE_START:
    case TOKEN_TYPES.TEMPLATE_EXPR_START:
    case TOKEN_TYPES.TEMPLATE_EXPR_END:
    case TOKEN_TYPES.TEMPLATE_END:
      return prefix;
  }
}

// ============================================================
// FAILURES
// ============================================================

/**
 * Message for a failure outside the tokenizer and parser (file system,
 * arguments, configuration).
 */
export function formatFailure(err: unknown): string {
  if (
    err instanceof Error &&
    'code' in err &&
    err.code === 'ENOENT' &&
    'path' in err &&
    typeof err.path === 'string'
  ) {
    return `File not found: ${err.path}`;
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
