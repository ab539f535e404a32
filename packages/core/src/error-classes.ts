/**
 * Loft Error Classes and Factory
 * Structured error types with registry-based error IDs
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for tools that format diagnostics themselves */
export interface LoftErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location: SourceLocation;
  /** Display path of the source (file name or a placeholder) */
  readonly path: string;
  /** Number of characters to highlight, starting at `location` */
  readonly length?: number | undefined;
  readonly help?: string | undefined;
  readonly context?: Readonly<Record<string, unknown>> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for tokenizer and parser failures.
 * Carries positional metadata so hosts can render snippets and diagnostics.
 */
export class LoftError extends Error {
  readonly errorId: string;
  readonly location: SourceLocation;
  readonly path: string;
  readonly length: number | undefined;
  readonly help: string | undefined;
  readonly context: Readonly<Record<string, unknown>> | undefined;

  constructor(data: LoftErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(`${data.message} at ${data.location.line}:${data.location.column}`);
    this.name = 'LoftError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.path = data.path;
    this.length = data.length;
    this.help = data.help;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LoftErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      path: this.path,
      length: this.length,
      help: this.help,
      context: this.context,
    };
  }
}

/** Optional fields shared by the specialised constructors */
export interface ErrorDetails {
  readonly length?: number | undefined;
  readonly help?: string | undefined;
  readonly context?: Readonly<Record<string, unknown>> | undefined;
}

function checkCategory(errorId: string, expected: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== expected) {
    throw new TypeError(`Expected ${expected} error ID, got: ${errorId}`);
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Character-level failures raised while producing tokens */
export class LexerError extends LoftError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    path: string,
    details: ErrorDetails = {}
  ) {
    checkCategory(errorId, 'lexer');
    super({ errorId, message, location, path, ...details });
    this.name = 'LexerError';
  }
}

/** Token-level failures raised by the parser */
export class ParseError extends LoftError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    path: string,
    details: ErrorDetails = {}
  ) {
    checkCategory(errorId, 'parse');
    super({ errorId, message, location, path, ...details });
    this.name = 'ParseError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create a lexer or parse error whose message is rendered from the
 * registry template for `errorId`.
 *
 * @throws TypeError if errorId is not in the registry
 *
 * @example
 * createError('LOFT-P003', { expected: "';'", actual: 'EOF' }, location, 'main.lf')
 * // ParseError: "Expected ';' but got EOF at 3:1"
 */
export function createError(
  errorId: string,
  context: Readonly<Record<string, unknown>>,
  location: SourceLocation,
  path: string,
  details: Omit<ErrorDetails, 'context'> = {}
): LexerError | ParseError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);
  const full: ErrorDetails = { ...details, context };
  return definition.category === 'lexer'
    ? new LexerError(errorId, message, location, path, full)
    : new ParseError(errorId, message, location, path, full);
}
