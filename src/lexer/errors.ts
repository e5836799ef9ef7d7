/**
 * Lexer Errors
 * Records lexical failures as error tokens. Nothing here throws:
 * every failure becomes a token the scanner yields in place.
 */

import {
  ERROR_IDS,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorId,
} from '../error-registry.js';
import {
  TOKEN_KINDS,
  formatToken,
  isErrorToken,
  type ErrorToken,
  type SourceLocation,
  type Token,
} from '../types.js';
import { hasIdentifierPrefix } from './operators.js';

const NUMBER_FORMAT = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Identifier validity gate: one of the three numeral prefixes */
export function validateIdentifierFormat(identifier: string): boolean {
  return identifier.length >= 3 && hasIdentifierPrefix(identifier);
}

/**
 * Numeral validity gate. Accepts 123, 3.14, 3., .5, and any of those with
 * an exponent suffix. Rejects a bare exponent (1e) and a lone dot.
 */
export function validateNumberFormat(numeral: string): boolean {
  return NUMBER_FORMAT.test(numeral);
}

/**
 * Ordered log of error tokens for one scan session.
 */
export class LexicalErrorHandler {
  private readonly log: ErrorToken[] = [];

  get errors(): readonly ErrorToken[] {
    return this.log;
  }

  get errorCount(): number {
    return this.log.length;
  }

  hasErrors(): boolean {
    return this.log.length > 0;
  }

  clear(): void {
    this.log.length = 0;
  }

  /** Create an error token from the registry, log it, and return it */
  report(errorId: ErrorId, start: SourceLocation, lexeme: string): ErrorToken {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }

    const token: ErrorToken = {
      kind: definition.kind,
      code: definition.errorId,
      lexeme,
      line: start.line,
      column: start.column,
      offset: start.offset,
      errorDetail: renderMessage(definition.messageTemplate, { text: lexeme }),
    };
    this.log.push(token);
    return token;
  }

  unterminatedString(start: SourceLocation, partial: string): ErrorToken {
    return this.report(ERROR_IDS.UNTERMINATED_STRING, start, partial);
  }

  invalidNumber(start: SourceLocation, numeral: string): ErrorToken {
    return this.report(ERROR_IDS.INVALID_NUMBER, start, numeral);
  }

  invalidSymbol(start: SourceLocation, symbol: string): ErrorToken {
    return this.report(ERROR_IDS.INVALID_SYMBOL, start, symbol);
  }

  /** A word that is neither a keyword nor prefixed with 071/070/048 */
  invalidIdentifier(start: SourceLocation, word: string): ErrorToken {
    return this.report(ERROR_IDS.INVALID_IDENTIFIER, start, word);
  }

  underscoreIdentifier(start: SourceLocation, word: string): ErrorToken {
    return this.report(ERROR_IDS.UNDERSCORE_IDENTIFIER, start, word);
  }

  nestedComment(start: SourceLocation): ErrorToken {
    return this.report(ERROR_IDS.NESTED_COMMENT, start, '/*');
  }

  unterminatedComment(start: SourceLocation): ErrorToken {
    return this.report(ERROR_IDS.UNTERMINATED_COMMENT, start, '/*');
  }

  /**
   * Numbered list of every logged error, in detection order.
   *
   * @example
   * Found 1 lexical error(s):
   * 1. ERROR(INVALID_SYMBOL): Invalid symbol: '@' at line 1, col 1
   */
  getErrorSummary(): string {
    if (this.log.length === 0) {
      return 'No lexical errors found.';
    }

    const lines = this.log.map(
      (token, index) => `${index + 1}. ${formatToken(token)}`
    );
    return [`Found ${this.log.length} lexical error(s):`, ...lines].join('\n');
  }
}

/**
 * Correction hint for an error token, or null when there is nothing useful
 * to suggest.
 */
export function suggestCorrection(token: Token): string | null {
  if (!isErrorToken(token)) {
    return null;
  }
  if (token.kind === TOKEN_KINDS.UNTERMINATED_STRING) {
    return `Add closing '$' to complete string: '${token.lexeme}$'`;
  }

  switch (token.code) {
    case ERROR_IDS.INVALID_IDENTIFIER:
    case ERROR_IDS.UNDERSCORE_IDENTIFIER:
    case ERROR_IDS.INVALID_NUMBER:
      return ERROR_REGISTRY.get(token.code)?.resolution ?? null;
    default:
      return null;
  }
}
