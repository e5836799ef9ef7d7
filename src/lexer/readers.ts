/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TOKEN_KINDS } from '../types.js';
import {
  type LexicalErrorHandler,
  validateIdentifierFormat,
  validateNumberFormat,
} from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import {
  SINGLE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
  lookupKeyword,
} from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

/** Consume identifier characters and append them to `value` */
function readIdentifierTail(state: LexerState, value: string): string {
  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }
  return value;
}

function readDigits(state: LexerState, value: string): string {
  while (!isAtEnd(state) && isDigit(peek(state))) {
    value += advance(state);
  }
  return value;
}

/** `// ...` up to, not including, the newline */
export function readLineComment(state: LexerState): Token {
  const start = currentLocation(state);
  let value = advance(state) + advance(state); // consume //

  while (!isAtEnd(state) && peek(state) !== '\n') {
    value += advance(state);
  }

  return makeToken(TOKEN_KINDS.COMMENT, value, start);
}

/**
 * `/* ... *\/`. Comments do not nest: a second opener aborts the comment
 * and scanning resumes at that opener.
 */
export function readBlockComment(
  state: LexerState,
  errors: LexicalErrorHandler
): Token {
  const start = currentLocation(state);
  let value = advance(state) + advance(state); // consume /*

  while (!isAtEnd(state)) {
    const pair = peekString(state, 2);
    if (pair === '/*') {
      return errors.nestedComment(start);
    }
    if (pair === '*/') {
      value += advance(state) + advance(state);
      return makeToken(TOKEN_KINDS.COMMENT, value, start);
    }
    value += advance(state);
  }

  return errors.unterminatedComment(start);
}

/** `$...$`, delimiters included. Strings end at the line. */
export function readString(
  state: LexerState,
  errors: LexicalErrorHandler
): Token {
  const start = currentLocation(state);
  let value = advance(state); // consume opening $

  while (!isAtEnd(state) && peek(state) !== '\n') {
    const ch = advance(state);
    value += ch;
    if (ch === '$') {
      return makeToken(TOKEN_KINDS.STRING, value, start);
    }
  }

  return errors.unterminatedString(start, value);
}

/** Integers, floats (3.14, .5), and exponent forms (2.5e10, 1E-5) */
export function readNumber(
  state: LexerState,
  errors: LexicalErrorHandler
): Token {
  const start = currentLocation(state);
  let value = '';
  let hasFraction = false;
  let hasExponent = false;

  if (peek(state) === '.') {
    value += advance(state);
    hasFraction = true;
  }

  value = readDigits(state, value);

  if (!hasFraction && peek(state) === '.') {
    value += advance(state);
    hasFraction = true;
    value = readDigits(state, value);
  }

  if (peek(state) === 'e' || peek(state) === 'E') {
    value += advance(state);
    hasExponent = true;
    if (peek(state) === '+' || peek(state) === '-') {
      value += advance(state);
    }
    if (!isDigit(peek(state))) {
      return errors.invalidNumber(start, value);
    }
    value = readDigits(state, value);
  }

  if (!validateNumberFormat(value)) {
    return errors.invalidNumber(start, value);
  }

  const kind =
    hasFraction || hasExponent ? TOKEN_KINDS.FLOAT : TOKEN_KINDS.INTEGER;
  return makeToken(kind, value, start);
}

/** Identifier led by one of the numeral prefixes (071, 070, 048) */
export function readPrefixedIdentifier(
  state: LexerState,
  errors: LexicalErrorHandler
): Token {
  const start = currentLocation(state);
  const prefix = advance(state) + advance(state) + advance(state);
  const value = readIdentifierTail(state, prefix);

  if (!validateIdentifierFormat(prefix)) {
    return errors.invalidIdentifier(start, value);
  }
  return makeToken(TOKEN_KINDS.IDENTIFIER, value, start);
}

/**
 * Letter-led word. Keywords match case-insensitively and keep their
 * original spelling; any other word is an invalid identifier.
 */
export function readWord(
  state: LexerState,
  errors: LexicalErrorHandler
): Token {
  const start = currentLocation(state);
  const word = readIdentifierTail(state, '');

  const kind = lookupKeyword(word);
  if (kind === undefined) {
    return errors.invalidIdentifier(start, word);
  }
  return makeToken(kind, word, start);
}

/** Identifiers never begin with `_`; the whole word becomes one error */
export function readUnderscoreWord(
  state: LexerState,
  errors: LexicalErrorHandler
): Token {
  const start = currentLocation(state);
  const value = readIdentifierTail(state, advance(state));
  return errors.underscoreIdentifier(start, value);
}

/** Longest match: two-character operators before single characters */
export function readOperator(
  state: LexerState,
  errors: LexicalErrorHandler
): Token {
  const start = currentLocation(state);

  const twoChar = peekString(state, 2);
  const twoCharKind = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharKind) {
    advance(state);
    advance(state);
    return makeToken(twoCharKind, twoChar, start);
  }

  const ch = advance(state);
  const singleCharKind = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharKind) {
    return makeToken(singleCharKind, ch, start);
  }

  // Lone = or !
  return errors.invalidSymbol(start, ch);
}
