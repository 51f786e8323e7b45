/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'taxon' | 'config';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario (max 100 characters) */
  readonly description: string;
  /** Example input demonstrating the error (max 500 characters) */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: NWK-{category}{3-digit} (e.g., NWK-P001) */
  readonly errorId: string;
  /** Error category (determines ID prefix) */
  readonly category: ErrorCategory;
  /** Short name of the error kind (e.g., MalformedStatement) */
  readonly kind: string;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error (max 200 characters) */
  readonly cause?: string | undefined;
  /** How to resolve this error (max 300 characters) */
  readonly resolution?: string | undefined;
  /** Example scenarios demonstrating this error (max 3 entries) */
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

/** Registry over a Map keyed by errorId; later duplicates win */
function createErrorRegistry(
  definitions: readonly ErrorDefinition[]
): ErrorRegistry {
  const byId = new Map(definitions.map((def) => [def.errorId, def] as const));
  return {
    get: (errorId) => byId.get(errorId),
    has: (errorId) => byId.has(errorId),
    get size() {
      return byId.size;
    },
    entries: () => byId.entries(),
  };
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (NWK-L0xx)
  {
    errorId: 'NWK-L001',
    category: 'lexer',
    kind: 'UnterminatedQuote',
    description: 'Unterminated quoted literal',
    messageTemplate: 'Unterminated quote: {quote}',
    cause:
      'A label was opened with a quote character but the stream ended before the matching close quote.',
    resolution:
      "Add the closing quote. To put a quote inside a quoted label, double it: 'it''s'.",
    examples: [
      {
        description: 'Missing closing quote',
        code: "('Homo sapiens,B);",
      },
    ],
  },
  {
    errorId: 'NWK-L002',
    category: 'lexer',
    kind: 'UnexpectedEndOfStream',
    description: 'Unexpected end of stream',
    messageTemplate: 'Unexpected end of stream',
    cause: 'A token was required but the input was exhausted.',
    resolution:
      'Complete the statement. Common causes: truncated files, a dangling ":" or an unclosed child list.',
    examples: [
      {
        description: 'Edge length marker with no value',
        code: '(A,B:',
      },
    ],
  },

  // Parse Errors (NWK-P0xx)
  {
    errorId: 'NWK-P001',
    category: 'parse',
    kind: 'InvalidToken',
    description: 'Invalid token',
    messageTemplate: "Unexpected token '{token}', expected {expected}",
    cause: 'A token appears where the grammar requires a different one.',
    resolution:
      'Check the statement at the indicated position. Quote labels that contain punctuation.',
    examples: [
      {
        description: 'Edge number braces without jplace parsing enabled',
        code: '(A:1{0},B:2{1});',
      },
    ],
  },
  {
    errorId: 'NWK-P002',
    category: 'parse',
    kind: 'MalformedStatement',
    description: 'Malformed tree statement',
    messageTemplate: '{detail}',
    cause:
      'Structural violation: unbalanced parentheses, a node opened before the previous one closed, or two labels in sequence.',
    resolution:
      'Balance the parentheses and separate sibling nodes with commas. Quote labels that contain spaces.',
    examples: [
      {
        description: 'Missing closing parenthesis',
        code: '(A,(B,C);',
      },
      {
        description: 'Unquoted label with a space',
        code: '(Homo sapiens,B);',
      },
    ],
  },
  {
    errorId: 'NWK-P003',
    category: 'parse',
    kind: 'IncompleteStatement',
    description: 'Incomplete tree statement',
    messageTemplate:
      "Incomplete or improperly-terminated tree statement (last token read was '{token}' instead of a semicolon ';')",
    cause: 'The statement ended without a terminating semicolon.',
    resolution:
      "Add ';' at the end of the tree statement, or disable terminatingSemicolonRequired.",
    examples: [
      {
        description: 'Missing terminating semicolon',
        code: '(A,B)',
      },
    ],
  },
  {
    errorId: 'NWK-P004',
    category: 'parse',
    kind: 'InvalidValue',
    description: 'Invalid numeric value',
    messageTemplate: "Invalid {what}: '{value}'",
    cause:
      'A token that must be numeric (edge length, edge number, tree weight) could not be parsed.',
    resolution:
      'Use plain decimal numbers. Tree weights take the forms n, n/d or a real number.',
    examples: [
      {
        description: 'Non-numeric edge length',
        code: '(A:x,B:1);',
      },
    ],
  },
  {
    errorId: 'NWK-P005',
    category: 'parse',
    kind: 'DuplicateTaxon',
    description: 'Duplicate taxon in tree',
    messageTemplate:
      'Multiple occurrences of the same taxa on trees are not supported: trees with duplicate node labels can only be processed if the labels are not parsed as taxa but as node labels (suppressInternalNodeTaxa and suppressLeafNodeTaxa). Duplicate taxon labels: {label}',
    cause: 'The same taxon was resolved for more than one node of one tree.',
    resolution:
      'Remove the repeated label, or read the labels as free node labels with suppressLeafNodeTaxa.',
    examples: [
      {
        description: 'Leaf label repeated',
        code: '(A:1,(B:1,A:1):1);',
      },
    ],
  },

  // Taxon Errors (NWK-T0xx)
  {
    errorId: 'NWK-T001',
    category: 'taxon',
    kind: 'UnknownTaxon',
    description: 'Unknown taxon',
    messageTemplate: "Taxon '{symbol}' not found in an immutable taxon namespace",
    cause:
      'The symbol matched no translate token, label or taxon number and the namespace does not allow new taxa.',
    resolution:
      'Declare the taxon beforehand, or make the namespace mutable before reading.',
  },
  {
    errorId: 'NWK-T002',
    category: 'taxon',
    kind: 'ImmutableTaxonNamespace',
    description: 'Immutable taxon namespace',
    messageTemplate:
      "Taxon '{label}' cannot be added to an immutable taxon namespace",
    cause: 'A taxon was added to a namespace whose isMutable flag is false.',
    resolution: 'Set isMutable to true before adding taxa.',
  },

  // Configuration Errors (NWK-C0xx)
  {
    errorId: 'NWK-C001',
    category: 'config',
    kind: 'InvalidConfiguration',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {detail}',
    cause: 'An option has an unsupported value or conflicts with another option.',
    resolution: 'Check option names, types and allowed values.',
    examples: [
      {
        description: 'Unrecognized rooting directive',
        code: '{ "rooting": "rooted" }',
      },
    ],
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = createErrorRegistry(
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
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Invalid {what}: '{value}'", {what: "edge length", value: "x"})
 * // Returns: "Invalid edge length: 'x'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      const close = template.indexOf('}', i + 1);

      // Unclosed brace - return template unchanged
      if (close === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, close)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          // String() coercion failed - use default toString behavior
          result += Object.prototype.toString.call(value);
        }
      }

      i = close + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
