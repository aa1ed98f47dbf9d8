/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'limit';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: IDL-{category}{3-digit} (e.g., IDL-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
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
 * Registry of all error definitions with O(1) lookup.
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
  // Lexer Errors (IDL-L0xx)
  {
    errorId: 'IDL-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'String opened with a quote but never closed before end of file.',
    resolution: 'Add the closing quote.',
    examples: [{ description: 'Missing closing quote', code: '@since("1.0)' }],
  },
  {
    errorId: 'IDL-L002',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character: {char}',
    cause: 'Character is not part of the IDL syntax.',
    resolution:
      'Remove or replace the character. Common causes: single quotes, backticks, copy-paste artifacts.',
    examples: [{ description: 'Single-quoted string', code: "@since('1.0')" }],
  },
  {
    errorId: 'IDL-L003',
    category: 'lexer',
    description: 'Invalid number format',
    messageTemplate: 'Invalid number format: {value}',
    cause: 'Number has a leading zero, a dangling decimal point or exponent.',
    resolution: 'Write numbers as JSON numbers: 10, 1.5, -2e3.',
  },
  {
    errorId: 'IDL-L004',
    category: 'lexer',
    description: 'Malformed text block',
    messageTemplate: 'Malformed text block: {reason}',
    cause:
      'Text block opening """ not followed by a newline, or closing """ missing.',
    resolution: 'Start the text block content on the line after """.',
    examples: [
      { description: 'Content on opening line', code: '@documentation("""hi""")' },
    ],
  },
  {
    errorId: 'IDL-L005',
    category: 'lexer',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape sequence: \\{sequence}',
    cause: 'Backslash followed by a character that is not a valid escape.',
    resolution: 'Use one of \\" \\\\ \\/ \\b \\f \\n \\r \\t \\uXXXX.',
  },

  // Parse Errors (IDL-P0xx)
  {
    errorId: 'IDL-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Expected {expected} but found {actual}',
    cause: 'A token appeared where the grammar does not allow it.',
    resolution: 'Check the trait syntax near the reported location.',
    examples: [
      { description: 'Operator as trait value', code: '@length(=)' },
      { description: 'Missing closing parenthesis', code: '@length(min: 1' },
    ],
  },
  {
    errorId: 'IDL-P002',
    category: 'parse',
    description: 'Missing expected token',
    messageTemplate: '{message}',
    cause: 'A required delimiter or separator is missing.',
    resolution: 'Add the missing token.',
  },
  {
    errorId: 'IDL-P003',
    category: 'parse',
    description: 'Duplicate member',
    messageTemplate: "Duplicate member of {container}: '{key}'",
    cause: 'The same key appears twice in a trait value or object literal.',
    resolution: 'Remove or rename one of the duplicate keys.',
    examples: [
      { description: 'Shorthand trait with repeated key', code: '@foo(a: 1, a: 2)' },
    ],
  },
  {
    errorId: 'IDL-P004',
    category: 'parse',
    description: 'Invalid shape ID',
    messageTemplate: 'Invalid shape ID: {reason}',
    cause:
      'Shape ID contains whitespace or a separator not followed by an identifier.',
    resolution: 'Write shape IDs as namespace#Name or Name, without spaces.',
    examples: [{ description: 'Space after namespace dot', code: '@foo. bar' }],
  },
  {
    errorId: 'IDL-P005',
    category: 'parse',
    description: 'Number out of range',
    messageTemplate: 'Number out of range: {value}',
    cause: 'A decimal number overflows a 64-bit float.',
    resolution: 'Use a smaller exponent, or write the value as a string.',
    examples: [{ description: 'Exponent too large', code: '@range(max: 1e400)' }],
  },

  // Resource Limit Errors (IDL-R0xx)
  {
    errorId: 'IDL-R001',
    category: 'limit',
    description: 'Maximum nesting depth exceeded',
    messageTemplate: 'Parser exceeded maximum allowed depth of {max}',
    cause: 'Trait values are nested deeper than the configured maximum.',
    resolution: 'Flatten the value, or raise maxNestingDepth.',
  },
];

/** All error definitions indexed by error ID */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a message template, replacing `{name}` placeholders with values
 * from context. Missing values render as empty strings. A template with an
 * unclosed brace is returned unchanged.
 *
 * @example
 * renderMessage("Duplicate member of {container}: '{key}'", { container: 'trait', key: 'a' })
 * // Returns: "Duplicate member of trait: 'a'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }
      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += Array.isArray(value) ? value.join(', ') : String(value);
      }
      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
