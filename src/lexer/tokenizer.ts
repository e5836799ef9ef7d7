/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_KINDS } from '../types.js';
import { LexicalErrorHandler } from './errors.js';
import {
  isDigit,
  isLetter,
  isNewline,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  DELIMITERS,
  IDENTIFIER_PREFIXES,
  OPERATOR_CHARS,
} from './operators.js';
import {
  readBlockComment,
  readLineComment,
  readNumber,
  readOperator,
  readPrefixedIdentifier,
  readString,
  readUnderscoreWord,
  readWord,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  resetLexerState,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

/**
 * Read the next token. Dispatch order is significant: the identifier
 * prefix check runs before numbers so that 071x is an identifier.
 * Returns the EOF token once the source is exhausted.
 */
export function nextToken(
  state: LexerState,
  errors: LexicalErrorHandler
): Token {
  skipWhitespace(state);

  const start = currentLocation(state);
  if (isAtEnd(state)) {
    return makeToken(TOKEN_KINDS.EOF, '', start);
  }

  const ch = peek(state);
  const next = peek(state, 1);

  if (isNewline(ch)) {
    advance(state);
    return makeToken(TOKEN_KINDS.NEWLINE, ch, start);
  }

  if (ch === '/' && next === '/') {
    return readLineComment(state);
  }
  if (ch === '/' && next === '*') {
    return readBlockComment(state, errors);
  }

  if (ch === '$') {
    return readString(state, errors);
  }

  if (IDENTIFIER_PREFIXES.includes(peekString(state, 3))) {
    return readPrefixedIdentifier(state, errors);
  }

  if (isDigit(ch) || (ch === '.' && isDigit(next))) {
    return readNumber(state, errors);
  }

  if (ch === '_') {
    return readUnderscoreWord(state, errors);
  }

  if (isLetter(ch)) {
    return readWord(state, errors);
  }

  if (OPERATOR_CHARS.has(ch)) {
    return readOperator(state, errors);
  }

  const delimiterKind = DELIMITERS[ch];
  if (delimiterKind) {
    advance(state);
    return makeToken(delimiterKind, ch, start);
  }

  advance(state);
  return errors.invalidSymbol(start, ch);
}

/**
 * Scanner over one source text. Owns its cursor and its error log;
 * `tokenize()` rewinds both, so repeated calls give the same result.
 */
export class Scanner {
  readonly errors = new LexicalErrorHandler();
  private readonly state: LexerState;

  constructor(readonly source: string) {
    this.state = createLexerState(source);
  }

  tokenize(): Token[] {
    resetLexerState(this.state);
    this.errors.clear();

    const tokens: Token[] = [];
    let token: Token;

    do {
      token = nextToken(this.state, this.errors);
      tokens.push(token);
    } while (token.kind !== TOKEN_KINDS.EOF);

    return tokens;
  }
}

export interface TokenizeResult {
  readonly tokens: Token[];
  readonly errors: LexicalErrorHandler;
}

export function tokenize(source: string): TokenizeResult {
  const scanner = new Scanner(source);
  const tokens = scanner.tokenize();
  return { tokens, errors: scanner.errors };
}
