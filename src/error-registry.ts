/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime' | 'config';

/**
 * Example demonstrating an error condition.
 * Used by --explain to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: PIPE-{category}{3-digit} (e.g., PIPE-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
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

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }
    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId.toUpperCase());
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId.toUpperCase());
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (PIPE-L0xx)
  {
    errorId: 'PIPE-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'A string was opened with a quote but never closed.',
    resolution: 'Add the matching closing quote.',
    examples: [{ description: 'Missing closing quote', code: '"hello' }],
  },
  {
    errorId: 'PIPE-L002',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character: {char}',
    cause: 'The character is not part of the language syntax.',
    resolution: 'Remove the character or quote it inside a string.',
    examples: [{ description: 'Stray backtick', code: '$x = `5' }],
  },

  // Parse Errors (PIPE-P0xx)
  {
    errorId: 'PIPE-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Unexpected token: {token}',
    cause: 'The parser found a token that cannot start or continue a statement.',
    resolution: 'Check for missing operators, braces or separators.',
    examples: [{ description: 'Dangling operator', code: '$x = 5 +' }],
  },
  {
    errorId: 'PIPE-P002',
    category: 'parse',
    description: 'Expected token missing',
    messageTemplate: 'Expected {expected}, got {actual}',
    cause: 'A required token such as a closing brace or parenthesis is missing.',
    resolution: 'Add the missing token.',
    examples: [{ description: 'Unclosed block', code: 'if ($x) { 1' }],
  },
  {
    errorId: 'PIPE-P003',
    category: 'parse',
    description: 'Invalid string interpolation',
    messageTemplate: 'Invalid string interpolation: {detail}',
    cause: 'A $( ) subexpression inside a double-quoted string is malformed.',
    resolution: 'Close the subexpression or escape the dollar sign with \\$.',
    examples: [{ description: 'Unclosed subexpression', code: '"total: $(1 + 2"' }],
  },

  // Runtime Errors (PIPE-R0xx)
  {
    errorId: 'PIPE-R001',
    category: 'runtime',
    description: 'Undefined variable',
    messageTemplate: 'Variable ${name} is not defined',
    cause: 'The variable was read before any assignment made it visible.',
    resolution:
      'Assign the variable first, or qualify it with $global: when it lives at top level.',
    examples: [{ description: 'Reading before assigning', code: '$total + 1' }],
  },
  {
    errorId: 'PIPE-R002',
    category: 'runtime',
    description: 'Type mismatch',
    messageTemplate: 'Cannot apply {operation}: expected {expected}, got {actual}',
    cause: 'An operator received a value it cannot coerce.',
    resolution: 'Convert the value first, or use a string operand for concatenation.',
    examples: [{ description: 'Multiplying a word', code: '"abc" * 2' }],
  },
  {
    errorId: 'PIPE-R003',
    category: 'runtime',
    description: 'Division by zero',
    messageTemplate: 'Division by zero',
    cause: 'The right operand of / or % evaluated to 0.',
    resolution: 'Guard the divisor with an if statement.',
    examples: [{ description: 'Literal zero divisor', code: '10 / 0' }],
  },
  {
    errorId: 'PIPE-R004',
    category: 'runtime',
    description: 'Command not found',
    messageTemplate: "The term '{name}' is not a function or registered stage",
    cause: 'No user function or registered stage matches the call name.',
    resolution: 'Define the function before calling it, or check the spelling.',
    examples: [{ description: 'Typo in stage name', code: '@(1,2) | Were-Object { $_ }' }],
  },
  {
    errorId: 'PIPE-R005',
    category: 'runtime',
    description: 'Invalid property access',
    messageTemplate: "Property '{property}' {detail}",
    cause: 'The property is missing from the record, or the value is not a record.',
    resolution: 'Check the key names of the record, or index lists with [n].',
    examples: [
      { description: 'Missing key', code: '@{Name="a"}.Age' },
      { description: 'Member of a number', code: '$x = 5; $x.Name' },
    ],
  },
  {
    errorId: 'PIPE-R006',
    category: 'runtime',
    description: 'Return outside function',
    messageTemplate: 'return used outside of a function',
    cause: 'A return statement ran at top level.',
    resolution: 'Move the return into a function body.',
    examples: [{ description: 'Top-level return', code: 'return 5' }],
  },
  {
    errorId: 'PIPE-R007',
    category: 'runtime',
    description: 'Call depth exceeded',
    messageTemplate: 'Call depth exceeded {limit} in {name}',
    cause: 'Function calls nested deeper than the configured maxCallDepth.',
    resolution: 'Add a base case to the recursion, or raise maxCallDepth.',
    examples: [{ description: 'Unbounded recursion', code: 'function F { F }; F' }],
  },
  {
    errorId: 'PIPE-R008',
    category: 'runtime',
    description: 'Unknown parameter',
    messageTemplate: "'{name}' has no parameter named '{param}'",
    cause: 'A -Name argument does not match any declared parameter.',
    resolution: 'Use one of the declared parameter names.',
    examples: [{ description: 'Misspelled switch', code: 'Sort-Object -Desc' }],
  },
  {
    errorId: 'PIPE-R009',
    category: 'runtime',
    description: 'Invalid argument',
    messageTemplate: "Invalid argument for '{name}': {detail}",
    cause: 'An argument has the wrong shape for the stage receiving it.',
    resolution: 'Check the argument against the stage description.',
    examples: [{ description: 'Non-numeric count', code: 'Select-Object -First abc' }],
  },

  // Config Errors (PIPE-C0xx)
  {
    errorId: 'PIPE-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {detail}',
    cause: 'The .pipeshrc.yaml file has an unexpected shape.',
    resolution: 'Fix the offending key; see the README for accepted options.',
    examples: [{ description: 'Negative depth', code: 'maxCallDepth: -1' }],
  },
  {
    errorId: 'PIPE-C002',
    category: 'config',
    description: 'Configuration unreadable',
    messageTemplate: 'Cannot read configuration {path}: {detail}',
    cause: 'The configuration file exists but is not valid YAML.',
    resolution: 'Fix the YAML syntax.',
    examples: [{ description: 'Bad indentation', code: 'variables:\n name: a\n  b: c' }],
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "number", actual: "string"})
 * // Returns: "Expected number, got string"
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
        result += String(value);
      }
      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
