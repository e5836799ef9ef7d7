/**
 * Test helpers for token assertions
 */

import { tokenize } from '../../src/lexer/index.js';
import { isTriviaKind, type Token, type TokenKind } from '../../src/types.js';

/** Tokens with NEWLINE and COMMENT removed */
export function significantTokens(source: string): Token[] {
  return tokenize(source).tokens.filter((token) => !isTriviaKind(token.kind));
}

/** Kinds of the significant tokens, EOF included */
export function kindsOf(source: string): TokenKind[] {
  return significantTokens(source).map((token) => token.kind);
}

/** `KIND(lexeme)` for each significant token, EOF excluded */
export function describeTokens(source: string): string[] {
  return significantTokens(source)
    .filter((token) => token.kind !== 'EOF')
    .map((token) => `${token.kind}(${token.lexeme})`);
}
