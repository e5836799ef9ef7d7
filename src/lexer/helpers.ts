/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, ValidKind, ValidToken } from '../types.js';

const LETTER = /^\p{L}$/u;
const NUMBER = /^\p{N}$/u;

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isLetter(ch: string): boolean {
  return LETTER.test(ch);
}

/** Letters, digits, and underscore */
export function isIdentifierChar(ch: string): boolean {
  return ch === '_' || isLetter(ch) || NUMBER.test(ch);
}

/** Whitespace excluding newline */
export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r';
}

export function isNewline(ch: string): boolean {
  return ch === '\n';
}

export function makeToken(
  kind: ValidKind,
  lexeme: string,
  start: SourceLocation
): ValidToken {
  return {
    kind,
    lexeme,
    line: start.line,
    column: start.column,
    offset: start.offset,
  };
}
