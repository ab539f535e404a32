/**
 * Error Registry
 * Central error definitions for the tokenizer and parser, with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse';

/**
 * Example demonstrating an error condition.
 * Used by `loft-check --explain` to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LOFT-{L|P}{3-digit} (e.g., LOFT-P003) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Short human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: readonly ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Lookup table for error definitions.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new Error(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }
    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (LOFT-L0xx)
  {
    errorId: 'LOFT-L001',
    category: 'lexer',
    description: 'Unterminated block comment',
    messageTemplate: 'Unterminated block comment',
    cause: 'A /* or /** comment reaches end of file without a closing */.',
    resolution: 'Close the comment with */.',
    examples: [
      {
        description: 'Missing comment terminator',
        code: '/* helper for the parser\nfn f() {}',
      },
    ],
  },
  {
    errorId: 'LOFT-L002',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: "Unexpected token '{char}'",
    cause:
      'The character does not start a number, string, identifier, operator or punctuation.',
    resolution:
      'Remove the character, or put it inside a string or template literal.',
    examples: [
      {
        description: 'Dollar sign outside a template literal',
        code: 'let price = $5;',
      },
    ],
  },
  {
    errorId: 'LOFT-L003',
    category: 'lexer',
    description: 'Invalid number literal',
    messageTemplate: 'Invalid number literal {literal}: {reason}',
    cause:
      'Number literals are fixed-point decimals with at most 28 fractional digits and a magnitude below 2^96.',
    resolution: 'Shorten the literal or reduce its precision.',
    examples: [
      {
        description: 'Too many fractional digits',
        code: 'let x = 0.12345678901234567890123456789;',
      },
    ],
  },
  {
    errorId: 'LOFT-L004',
    category: 'lexer',
    description: 'Unterminated template literal',
    messageTemplate: 'Unterminated template literal',
    cause: 'A template literal reaches end of file without a closing backtick.',
    resolution: 'Close the template literal with `.',
    examples: [
      {
        description: 'Missing closing backtick',
        code: 'let greeting = `hello ${name};',
      },
    ],
  },
  {
    errorId: 'LOFT-L005',
    category: 'lexer',
    description: 'Unterminated template expression',
    messageTemplate: 'Unterminated template expression',
    cause: 'A ${ interpolation has no matching closing brace.',
    resolution: 'Balance the braces inside the interpolation.',
    examples: [
      {
        description: 'Unbalanced brace in interpolation',
        code: 'let s = `${ {a: 1 }`',
      },
    ],
  },

  // Parse Errors (LOFT-P0xx)
  {
    errorId: 'LOFT-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Unexpected token in {context}: {token}',
    cause: 'The token cannot start or continue the construct being parsed.',
    resolution: 'Check for a missing operand or a stray symbol.',
    examples: [
      {
        description: 'Missing initializer after =',
        code: 'let x = ;',
      },
    ],
  },
  {
    errorId: 'LOFT-P002',
    category: 'parse',
    description: 'Unexpected end of input',
    messageTemplate: 'Unexpected end of input in {context}',
    cause: 'The source ends in the middle of an expression or statement.',
    resolution: 'Complete the expression or statement.',
    examples: [
      {
        description: 'Dangling operator',
        code: 'let x = 1 +',
      },
    ],
  },
  {
    errorId: 'LOFT-P003',
    category: 'parse',
    description: 'Expected token',
    messageTemplate: 'Expected {expected} but got {actual}',
    cause: 'A required punctuation mark, keyword or operator is missing.',
    resolution: 'Insert the expected token.',
    examples: [
      {
        description: 'Missing closing parenthesis',
        code: 'if (x > 0 { return x; }',
      },
      {
        description: 'Match arm without =>',
        code: 'match x { 1 -> "one" }',
      },
    ],
  },
  {
    errorId: 'LOFT-P004',
    category: 'parse',
    description: 'Expected name',
    messageTemplate: 'Expected {what} but got {actual}',
    cause: 'A declaration, parameter or field needs an identifier here.',
    resolution: 'Provide an identifier. Keywords cannot be used as names.',
    examples: [
      {
        description: 'Keyword used as a variable name',
        code: 'let match = 1;',
      },
    ],
  },
  {
    errorId: 'LOFT-P005',
    category: 'parse',
    description: 'Invalid import path',
    messageTemplate: 'Import path cannot be empty',
    cause: "The string after 'learn' is empty.",
    resolution: 'Name a module, using :: between path segments.',
    examples: [
      {
        description: 'Empty import',
        code: 'learn "";',
      },
    ],
  },
  {
    errorId: 'LOFT-P006',
    category: 'parse',
    description: 'Trailing input after expression',
    messageTemplate: 'Unexpected {token} after expression',
    cause: 'A single expression was requested but more tokens follow it.',
    resolution: 'Remove the extra tokens or parse the source as statements.',
    examples: [
      {
        description: 'Two expressions',
        code: '1 + 2 3',
      },
    ],
  },
];

/** Registry of every tokenizer and parser error definition */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// MESSAGE RENDERING
// ============================================================

/**
 * Replace `{name}` placeholders in a message template.
 *
 * Missing context values render as an empty string. An unclosed brace
 * returns the template unchanged.
 *
 * @example
 * renderMessage('Expected {expected} but got {actual}', { expected: "';'", actual: 'EOF' })
 * // "Expected ';' but got EOF"
 */
export function renderMessage(
  template: string,
  context: Readonly<Record<string, unknown>>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const open = template.indexOf('{', i);
    if (open === -1) {
      result += template.slice(i);
      break;
    }
    const close = template.indexOf('}', open + 1);
    if (close === -1) {
      return template;
    }
    result += template.slice(i, open);
    const value = context[template.slice(open + 1, close)];
    result += value === undefined ? '' : String(value);
    i = close + 1;
  }

  return result;
}
