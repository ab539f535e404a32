/**
 * Lexer Errors
 */

import type { SourceLocation } from '../source-location.js';
import { LexerError } from '../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../error-registry.js';

/**
 * Build a LexerError whose message comes from the registry template.
 * `length` is the number of characters to highlight.
 */
export function lexerError(
  errorId: string,
  context: Readonly<Record<string, unknown>>,
  location: SourceLocation,
  path: string,
  length?: number
): LexerError {
  const template = ERROR_REGISTRY.get(errorId)?.messageTemplate ?? errorId;
  return new LexerError(
    errorId,
    renderMessage(template, context),
    location,
    path,
    { context, length }
  );
}
