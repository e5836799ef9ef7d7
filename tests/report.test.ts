/**
 * Token Report Tests
 */

import { describe, expect, it } from 'vitest';
import { LexicalErrorHandler, tokenize } from '../src/lexer/index.js';
import {
  filterTokens,
  formatReport,
  type ReportOptions,
} from '../src/report.js';
import { TOKEN_KINDS } from '../src/types.js';

const TEXT: ReportOptions = { format: 'text', trivia: false, suggest: false };

describe('filterTokens', () => {
  const { tokens } = tokenize('if // note\n@');

  it('drops newlines and comments by default', () => {
    expect(
      filterTokens(tokens, { includeTrivia: false }).map((t) => t.kind)
    ).toEqual([
      TOKEN_KINDS.IF,
      TOKEN_KINDS.INVALID_SYMBOL,
      TOKEN_KINDS.EOF,
    ]);
  });

  it('keeps everything when trivia is requested', () => {
    expect(filterTokens(tokens, { includeTrivia: true })).toEqual(tokens);
  });
});

describe('formatReport', () => {
  it('renders a clean scan as text', () => {
    const { tokens, errors } = tokenize('if');
    expect(formatReport(tokens, errors, TEXT)).toBe(
      [
        'Tokens:',
        '1. IF(if) at line 1, col 1',
        '2. EOF() at line 1, col 3',
        '',
        'No lexical errors found.',
      ].join('\n')
    );
  });

  it('lists errors once, in the summary', () => {
    const { tokens, errors } = tokenize('if @\n// c');
    expect(formatReport(tokens, errors, TEXT)).toBe(
      [
        'Tokens:',
        '1. IF(if) at line 1, col 1',
        '2. EOF() at line 2, col 5',
        '',
        'Found 1 lexical error(s):',
        "1. ERROR(INVALID_SYMBOL): Invalid symbol: '@' at line 1, col 4",
      ].join('\n')
    );
  });

  it('includes trivia when requested', () => {
    const { tokens, errors } = tokenize('if\n// c');
    expect(formatReport(tokens, errors, { ...TEXT, trivia: true })).toBe(
      [
        'Tokens:',
        '1. IF(if) at line 1, col 1',
        '2. NEWLINE(\\n) at line 1, col 3',
        '3. COMMENT(// c) at line 2, col 1',
        '4. EOF() at line 2, col 5',
        '',
        'No lexical errors found.',
      ].join('\n')
    );
  });

  it('adds hints under errors that have one', () => {
    const { tokens, errors } = tokenize('$ab\n@');
    expect(formatReport(tokens, errors, { ...TEXT, suggest: true })).toBe(
      [
        'Tokens:',
        '1. EOF() at line 2, col 2',
        '',
        'Found 2 lexical error(s):',
        "1. ERROR(UNTERMINATED_STRING): Unterminated string literal: '$ab' at line 1, col 1",
        "   Hint: Add closing '$' to complete string: '$ab$'",
        "2. ERROR(INVALID_SYMBOL): Invalid symbol: '@' at line 2, col 1",
      ].join('\n')
    );
  });

  it('keeps each hint under its own error when a detail spans lines', () => {
    const errors = new LexicalErrorHandler();
    errors.unterminatedString({ line: 1, column: 1, offset: 0 }, '$a\nb');
    errors.invalidSymbol({ line: 2, column: 1, offset: 5 }, '@');

    expect(formatReport([], errors, { ...TEXT, suggest: true })).toBe(
      [
        'Tokens:',
        '',
        'Found 2 lexical error(s):',
        "1. ERROR(UNTERMINATED_STRING): Unterminated string literal: '$a\nb' at line 1, col 1",
        "   Hint: Add closing '$' to complete string: '$a\nb$'",
        "2. ERROR(INVALID_SYMBOL): Invalid symbol: '@' at line 2, col 1",
      ].join('\n')
    );
  });

  it('renders JSON', () => {
    const { tokens, errors } = tokenize('if @');
    const output: unknown = JSON.parse(
      formatReport(tokens, errors, { ...TEXT, format: 'json' })
    );
    expect(output).toEqual({
      tokens: [
        { kind: 'IF', lexeme: 'if', line: 1, column: 1 },
        { kind: 'EOF', lexeme: '', line: 1, column: 5 },
      ],
      errors: [
        {
          code: 'LEX003',
          kind: 'INVALID_SYMBOL',
          message: "Invalid symbol: '@'",
          lexeme: '@',
          line: 1,
          column: 4,
        },
      ],
      summary: { total: 2, errors: 1 },
    });
  });

  it('includes suggestions in JSON when requested', () => {
    const { tokens, errors } = tokenize('abc @');
    const output: unknown = JSON.parse(
      formatReport(tokens, errors, {
        format: 'json',
        trivia: false,
        suggest: true,
      })
    );
    expect(output).toMatchObject({
      errors: [
        { code: 'LEX004', suggestion: "Start the identifier with '071', '070', or '048'." },
        { code: 'LEX003', suggestion: null },
      ],
    });
  });
});
