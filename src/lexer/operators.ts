/**
 * Lookup Tables
 * Keywords, operators, delimiters, and identifier prefixes
 */

import type { ValidKind } from '../types.js';
import { TOKEN_KINDS } from '../types.js';

/** Keyword lookup table, keyed by lowercase spelling */
export const KEYWORDS: Readonly<Record<string, ValidKind>> = {
  if: TOKEN_KINDS.IF,
  else: TOKEN_KINDS.ELSE,
  while: TOKEN_KINDS.WHILE,
  return: TOKEN_KINDS.RETURN,
  func: TOKEN_KINDS.FUNC,
};

/** Two-character operator lookup table (matched before single characters) */
export const TWO_CHAR_OPERATORS: Readonly<Record<string, ValidKind>> = {
  '==': TOKEN_KINDS.EQUAL,
  '!=': TOKEN_KINDS.NOT_EQUAL,
  '<=': TOKEN_KINDS.LESS_EQUAL,
  '>=': TOKEN_KINDS.GREATER_EQUAL,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Readonly<Record<string, ValidKind>> = {
  '+': TOKEN_KINDS.PLUS,
  '-': TOKEN_KINDS.MINUS,
  '*': TOKEN_KINDS.MULTIPLY,
  '/': TOKEN_KINDS.DIVIDE,
  '<': TOKEN_KINDS.LESS_THAN,
  '>': TOKEN_KINDS.GREATER_THAN,
};

/** Characters that start an operator scan. `=` and `!` only pair up. */
export const OPERATOR_CHARS: ReadonlySet<string> = new Set([
  '+',
  '-',
  '*',
  '/',
  '=',
  '!',
  '<',
  '>',
]);

/** Single-character delimiter lookup table */
export const DELIMITERS: Readonly<Record<string, ValidKind>> = {
  '(': TOKEN_KINDS.LPAREN,
  ')': TOKEN_KINDS.RPAREN,
  '{': TOKEN_KINDS.LBRACE,
  '}': TOKEN_KINDS.RBRACE,
  ';': TOKEN_KINDS.SEMICOLON,
  ',': TOKEN_KINDS.COMMA,
};

/** Identifiers must begin with one of these */
export const IDENTIFIER_PREFIXES: readonly string[] = ['071', '070', '048'];

export function hasIdentifierPrefix(text: string): boolean {
  return IDENTIFIER_PREFIXES.some((prefix) => text.startsWith(prefix));
}

export function lookupKeyword(word: string): ValidKind | undefined {
  return Object.hasOwn(KEYWORDS, word.toLowerCase())
    ? KEYWORDS[word.toLowerCase()]
    : undefined;
}
