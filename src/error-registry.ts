/**
 * Error Registry
 * Lexical error definitions with template rendering.
 */

import { TOKEN_KINDS, type ErrorKind } from './types.js';

// ============================================================
// ERROR DEFINITIONS
// ============================================================

/** Registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LEX{3-digit} (e.g., LEX001) */
  readonly errorId: string;
  /** Token kind carried by error tokens with this ID */
  readonly kind: ErrorKind;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** How to resolve this error */
  readonly resolution: string;
}

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
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
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }
}

export const ERROR_IDS = {
  UNTERMINATED_STRING: 'LEX001',
  INVALID_NUMBER: 'LEX002',
  INVALID_SYMBOL: 'LEX003',
  INVALID_IDENTIFIER: 'LEX004',
  UNDERSCORE_IDENTIFIER: 'LEX005',
  NESTED_COMMENT: 'LEX006',
  UNTERMINATED_COMMENT: 'LEX007',
} as const;

export type ErrorId = (typeof ERROR_IDS)[keyof typeof ERROR_IDS];

const PREFIX_LIST = "'071', '070', or '048'";

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  {
    errorId: ERROR_IDS.UNTERMINATED_STRING,
    kind: TOKEN_KINDS.UNTERMINATED_STRING,
    messageTemplate: "Unterminated string literal: '{text}'",
    resolution:
      'Close the string with $ on the same line. Strings cannot span lines.',
  },
  {
    errorId: ERROR_IDS.INVALID_NUMBER,
    kind: TOKEN_KINDS.INVALID_NUMBER,
    messageTemplate: "Invalid number format: '{text}'",
    resolution:
      'Use an integer (123), a decimal (3.14 or .5), or exponential notation (2.5e10, 1E-5).',
  },
  {
    errorId: ERROR_IDS.INVALID_SYMBOL,
    kind: TOKEN_KINDS.INVALID_SYMBOL,
    messageTemplate: "Invalid symbol: '{text}'",
    resolution: 'Remove the character or replace it with a supported operator.',
  },
  {
    errorId: ERROR_IDS.INVALID_IDENTIFIER,
    kind: TOKEN_KINDS.ERROR,
    messageTemplate: `Invalid identifier: {text} (must start with ${PREFIX_LIST})`,
    resolution: `Start the identifier with ${PREFIX_LIST}.`,
  },
  {
    errorId: ERROR_IDS.UNDERSCORE_IDENTIFIER,
    kind: TOKEN_KINDS.ERROR,
    messageTemplate: `Invalid identifier: {text} (cannot start with '_'; must start with ${PREFIX_LIST})`,
    resolution: `Remove the leading underscore and start the identifier with ${PREFIX_LIST}.`,
  },
  {
    errorId: ERROR_IDS.NESTED_COMMENT,
    kind: TOKEN_KINDS.ERROR,
    messageTemplate: 'Nested multi-line comments are not supported',
    resolution: 'Close the outer comment with */ before opening another.',
  },
  {
    errorId: ERROR_IDS.UNTERMINATED_COMMENT,
    kind: TOKEN_KINDS.ERROR,
    messageTemplate: 'Unterminated multi-line comment',
    resolution: 'Close the comment with */.',
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
 * renderMessage("Invalid symbol: '{text}'", { text: '@' })
 * // Returns: "Invalid symbol: '@'"
 */
export function renderMessage(
  template: string,
  context: Readonly<Record<string, string>>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const placeholderName = template.slice(i + 1, j);
      result += context[placeholderName] ?? '';

      // Each character is visited once
      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
