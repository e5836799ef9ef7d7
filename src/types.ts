/**
 * IBTAC Token Types
 * Token kinds, token records, and source positions
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  /** Code-point index into the source text */
  readonly offset: number;
}

// ============================================================
// TOKEN KINDS
// ============================================================

export const TOKEN_KINDS = {
  // Literals
  IDENTIFIER: 'IDENTIFIER',
  INTEGER: 'INTEGER',
  FLOAT: 'FLOAT',
  STRING: 'STRING',

  // Keywords
  IF: 'IF',
  ELSE: 'ELSE',
  WHILE: 'WHILE',
  RETURN: 'RETURN',
  FUNC: 'FUNC',

  // Operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  MULTIPLY: 'MULTIPLY', // *
  DIVIDE: 'DIVIDE', // /
  EQUAL: 'EQUAL', // ==
  NOT_EQUAL: 'NOT_EQUAL', // !=
  LESS_THAN: 'LESS_THAN', // <
  GREATER_THAN: 'GREATER_THAN', // >
  LESS_EQUAL: 'LESS_EQUAL', // <=
  GREATER_EQUAL: 'GREATER_EQUAL', // >=

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  SEMICOLON: 'SEMICOLON', // ;
  COMMA: 'COMMA', // ,

  // Structural
  COMMENT: 'COMMENT',
  WHITESPACE: 'WHITESPACE',
  NEWLINE: 'NEWLINE',
  EOF: 'EOF',

  // Errors
  ERROR: 'ERROR',
  UNTERMINATED_STRING: 'UNTERMINATED_STRING',
  INVALID_NUMBER: 'INVALID_NUMBER',
  INVALID_SYMBOL: 'INVALID_SYMBOL',
} as const;

export type TokenKind = (typeof TOKEN_KINDS)[keyof typeof TOKEN_KINDS];

export type ErrorKind =
  | typeof TOKEN_KINDS.ERROR
  | typeof TOKEN_KINDS.UNTERMINATED_STRING
  | typeof TOKEN_KINDS.INVALID_NUMBER
  | typeof TOKEN_KINDS.INVALID_SYMBOL;

export type ValidKind = Exclude<TokenKind, ErrorKind>;

const ERROR_KINDS: ReadonlySet<TokenKind> = new Set<ErrorKind>([
  TOKEN_KINDS.ERROR,
  TOKEN_KINDS.UNTERMINATED_STRING,
  TOKEN_KINDS.INVALID_NUMBER,
  TOKEN_KINDS.INVALID_SYMBOL,
]);

const TRIVIA_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  TOKEN_KINDS.COMMENT,
  TOKEN_KINDS.WHITESPACE,
  TOKEN_KINDS.NEWLINE,
]);

export function isErrorKind(kind: TokenKind): kind is ErrorKind {
  return ERROR_KINDS.has(kind);
}

/** Comments, whitespace and newlines: emitted, but filtered by most consumers */
export function isTriviaKind(kind: TokenKind): boolean {
  return TRIVIA_KINDS.has(kind);
}

// ============================================================
// TOKENS
// ============================================================

interface TokenBase {
  /** Exact source text captured for the token */
  readonly lexeme: string;
  /** 1-based line of the first character */
  readonly line: number;
  /** 1-based column of the first character */
  readonly column: number;
  readonly offset: number;
}

export interface ValidToken extends TokenBase {
  readonly kind: ValidKind;
}

export interface ErrorToken extends TokenBase {
  readonly kind: ErrorKind;
  /** Stable error code from the error registry (e.g. LEX001) */
  readonly code: string;
  readonly errorDetail: string;
}

export type Token = ValidToken | ErrorToken;

export function isErrorToken(token: Token): token is ErrorToken {
  return isErrorKind(token.kind);
}

const ESCAPES: Readonly<Record<string, string>> = {
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

/**
 * String form used by error summaries and text reports. Line breaks and
 * tabs in the lexeme are escaped so each token stays on one line.
 *
 *   IDENTIFIER(071x) at line 1, col 5
 *   NEWLINE(\n) at line 1, col 9
 *   ERROR(INVALID_SYMBOL): Invalid symbol: '@' at line 2, col 1
 */
export function formatToken(token: Token): string {
  const position = `at line ${token.line}, col ${token.column}`;
  if (isErrorToken(token)) {
    return `ERROR(${token.kind}): ${token.errorDetail} ${position}`;
  }
  const lexeme = token.lexeme.replace(/[\n\r\t]/g, (ch) => ESCAPES[ch] ?? ch);
  return `${token.kind}(${lexeme}) ${position}`;
}
