/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory =
  | 'lexer'
  | 'grouping'
  | 'parse'
  | 'internal'
  | 'emit'
  | 'config';

/** ID prefix letter for each category */
export const CATEGORY_PREFIXES: Readonly<Record<ErrorCategory, string>> = {
  lexer: 'L',
  grouping: 'G',
  parse: 'P',
  internal: 'I',
  emit: 'E',
  config: 'C',
};

/** Valid error ID format: BREW-{category letter}{3 digits} */
export const ERROR_ID_PATTERN = /^BREW-[LGPIEC]\d{3}$/;

/**
 * Example demonstrating an error condition.
 * Used by `brewport --explain`.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: BREW-{category}{3-digit} (e.g., BREW-P001) */
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
 * Registry for all error definitions with O(1) lookup.
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
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
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

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (BREW-L0xx)
  {
    errorId: 'BREW-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'String opened with a double quote but never closed on the same line.',
    resolution:
      'Add the closing quote, or use a text block (""") for multi-line content.',
    examples: [{ description: 'Missing closing quote', code: 'String s = "abc;' }],
  },
  {
    errorId: 'BREW-L002',
    category: 'lexer',
    description: 'Invalid character',
    messageTemplate: 'Unexpected character {char}',
    cause: 'Character is not part of the supported source syntax.',
    resolution:
      'Remove the character. Common causes: smart quotes or backticks pasted from documents.',
    examples: [{ description: 'Backtick', code: 'int x = `1`;' }],
  },
  {
    errorId: 'BREW-L003',
    category: 'lexer',
    description: 'Unterminated block comment',
    messageTemplate: 'Unterminated block comment',
    cause: 'A /* comment was opened but */ never appears before end of file.',
    resolution: 'Close the comment with */.',
    examples: [{ description: 'Open comment', code: '/* TODO\nclass A {}' }],
  },
  {
    errorId: 'BREW-L004',
    category: 'lexer',
    description: 'Unterminated character literal',
    messageTemplate: 'Unterminated character literal',
    cause: 'Character literal opened with a single quote but never closed.',
    resolution: "Add the closing single quote, e.g. 'a'.",
    examples: [{ description: 'Missing quote', code: "char c = 'a;" }],
  },

  // Grouping Errors (BREW-G0xx)
  {
    errorId: 'BREW-G001',
    category: 'grouping',
    description: 'Unmatched closing bracket',
    messageTemplate: "Unmatched closing '{bracket}'",
    cause: 'A closing bracket appears with no open bracket pending.',
    resolution: 'Remove the extra closing bracket or add its opening partner.',
    examples: [{ description: 'Extra brace', code: 'class A { } }' }],
  },
  {
    errorId: 'BREW-G002',
    category: 'grouping',
    description: 'Mismatched closing bracket',
    messageTemplate:
      "Closing '{bracket}' does not match '{opener}' opened at {openLine}:{openColumn}",
    cause: 'Brackets are interleaved instead of nested.',
    resolution: 'Close the innermost open bracket first.',
    examples: [{ description: 'Paren closed by brace', code: 'void m( } {' }],
  },
  {
    errorId: 'BREW-G003',
    category: 'grouping',
    description: 'Unclosed bracket',
    messageTemplate: "Unclosed '{bracket}'",
    cause: 'End of file reached while this bracket was still open.',
    resolution: 'Add the matching closing bracket.',
    examples: [
      { description: 'Extra opening brace', code: 'class A { void m() { }' },
    ],
  },

  // Parse Errors (BREW-P0xx)
  {
    errorId: 'BREW-P001',
    category: 'parse',
    description: 'Unrecognized member declaration',
    messageTemplate: 'Unrecognized {scope} member starting at {text}',
    cause:
      'No construct matcher (field, method, nested class, initializer, constructor) accepts the input at this position.',
    resolution:
      'Check the declaration for a missing type, name or body. Enum and annotation type declarations are not supported.',
    examples: [
      { description: 'Method without return type', code: 'class A { m() {} }' },
      { description: 'Dangling annotation', code: 'class A { @Deprecated }' },
    ],
  },
  {
    errorId: 'BREW-P002',
    category: 'parse',
    description: 'Malformed declaration structure',
    messageTemplate: 'Malformed {construct}: expected {expected}, found {text}',
    cause:
      'A recognized declaration contains a parameter list, type parameter list or type argument list that cannot be read.',
    resolution: 'Fix the syntax inside the bracketed list.',
    examples: [{ description: 'Parameter without name', code: 'void m(int) {}' }],
  },

  // Internal Errors (BREW-I0xx)
  {
    errorId: 'BREW-I001',
    category: 'internal',
    description: 'Matcher consumption mismatch',
    messageTemplate:
      "Matcher '{matcher}' recognized a construct but its parser {detail}",
    cause:
      'A matcher parser consumed a different span than its recognizer validated. This is a defect in the transpiler.',
    resolution: 'Report the input that triggers it.',
  },

  // Emission Errors (BREW-E0xx)
  {
    errorId: 'BREW-E001',
    category: 'emit',
    description: 'Unresolved type reference',
    messageTemplate: 'Cannot resolve type {name}',
    cause:
      'The type is not declared in this file, not imported, not a java.lang type and not listed in knownTypes.',
    resolution:
      'Add an import, pass the other input files together, or list the type under emit.knownTypes.',
    examples: [{ description: 'Typo in base type', code: 'Runable r = new Runable() {};' }],
  },
  {
    errorId: 'BREW-E002',
    category: 'emit',
    description: 'Cyclic inheritance',
    messageTemplate: 'Cyclic inheritance involving {names}',
    cause: 'Local types extend each other in a cycle.',
    resolution: 'Break the cycle; the source does not compile either.',
    examples: [{ description: 'Mutual extends', code: 'class A extends B {} class B extends A {}' }],
  },

  // Config Errors (BREW-C0xx)
  {
    errorId: 'BREW-C001',
    category: 'config',
    description: 'Invalid configuration',
    messageTemplate: 'Invalid configuration: {detail}',
    cause: 'The configuration file contains an unknown key or a value of the wrong type.',
    resolution: 'Compare the file against the documented keys and types.',
    examples: [{ description: 'Wrong type', code: 'emit:\n  indent: "two"' }],
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a message template, replacing {name} placeholders from context.
 *
 * Missing values render as empty strings. An unclosed brace returns the
 * template unchanged.
 *
 * @example
 * renderMessage("Cannot resolve type {name}", { name: "Foo" })
 * // Returns: "Cannot resolve type Foo"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

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
