/**
 * Lexer Module
 * Converts source text into tokens
 */

export {
  LexicalErrorHandler,
  suggestCorrection,
  validateIdentifierFormat,
  validateNumberFormat,
} from './errors.js';
export {
  isDigit,
  isIdentifierChar,
  isLetter,
  isNewline,
  isWhitespace,
} from './helpers.js';
export {
  DELIMITERS,
  IDENTIFIER_PREFIXES,
  KEYWORDS,
  SINGLE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
  hasIdentifierPrefix,
} from './operators.js';
export { END_OF_INPUT, createLexerState, type LexerState } from './state.js';
export {
  Scanner,
  nextToken,
  tokenize,
  type TokenizeResult,
} from './tokenizer.js';
