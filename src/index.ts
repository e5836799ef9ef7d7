/**
 * IBTAC Lexer
 * Exports the scanner, token model, error registry, and report rendering
 */

export {
  DELIMITERS,
  END_OF_INPUT,
  IDENTIFIER_PREFIXES,
  KEYWORDS,
  LexicalErrorHandler,
  SINGLE_CHAR_OPERATORS,
  Scanner,
  TWO_CHAR_OPERATORS,
  createLexerState,
  hasIdentifierPrefix,
  isDigit,
  isIdentifierChar,
  isLetter,
  isNewline,
  isWhitespace,
  nextToken,
  suggestCorrection,
  tokenize,
  validateIdentifierFormat,
  validateNumberFormat,
  type LexerState,
  type TokenizeResult,
} from './lexer/index.js';
export {
  ERROR_IDS,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorDefinition,
  type ErrorId,
  type ErrorRegistry,
} from './error-registry.js';
export {
  filterTokens,
  formatReport,
  type OutputFormat,
  type ReportOptions,
} from './report.js';
export {
  TOKEN_KINDS,
  formatToken,
  isErrorKind,
  isErrorToken,
  isTriviaKind,
  type ErrorKind,
  type ErrorToken,
  type SourceLocation,
  type Token,
  type TokenKind,
  type ValidKind,
  type ValidToken,
} from './types.js';
