/**
 * CLI Error Explanation
 * Render full error documentation for `loft-check --explain`
 */

import { ERROR_REGISTRY } from '@loft-lang/core';

const ERROR_ID_PATTERN = /^LOFT-[LP]\d{3}$/;

/**
 * Render the registry entry for an error ID: description, cause,
 * resolution and examples.
 *
 * @returns Formatted documentation, or null if the ID is malformed or unknown
 *
 * @example
 * explainError('LOFT-P002')
 * // "LOFT-P002: Unexpected end of input\n\nCause:\n  ..."
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [];

  sections.push(`${definition.errorId}: ${definition.description}`);
  sections.push('');

  if (definition.cause) {
    sections.push('Cause:');
    sections.push(`  ${definition.cause}`);
    sections.push('');
  }

  if (definition.resolution) {
    sections.push('Resolution:');
    sections.push(`  ${definition.resolution}`);
    sections.push('');
  }

  if (definition.examples && definition.examples.length > 0) {
    sections.push('Examples:');
    for (const example of definition.examples) {
      sections.push(`  ${example.description}`);
      sections.push('');
      for (const line of example.code.split('\n')) {
        sections.push(`    ${line}`);
      }
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}
