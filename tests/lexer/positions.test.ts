/**
 * Lexer Tests: Token Positions
 * Every token's line, column, and offset point at its first character
 */

import { describe, expect, it } from 'vitest';
import { createLexerState, peek, advance } from '../../src/lexer/state.js';
import { tokenize } from '../../src/lexer/index.js';
import { TOKEN_KINDS } from '../../src/types.js';

const MIXED_SOURCE = [
  '// header',
  'func 071main() {',
  '\t071total = .5 + 2.5e10 * 3;',
  '  if (071total >= 10) { return $big$; }',
  '  /* block',
  '     comment */ while (070i != 048j) { _bad @ 1e }',
  '  $open',
  '}',
].join('\n');

describe('Lexer: Token Positions', () => {
  const { tokens } = tokenize(MIXED_SOURCE);
  const chars = Array.from(MIXED_SOURCE);
  const lines = MIXED_SOURCE.split('\n').map((line) => Array.from(line));

  it('offsets point at the lexeme', () => {
    for (const token of tokens) {
      const text = chars.slice(token.offset).join('');
      expect(text.startsWith(token.lexeme)).toBe(true);
    }
  });

  it('line and column point at the lexeme', () => {
    for (const token of tokens) {
      if (token.kind === TOKEN_KINDS.EOF) continue;
      const line = lines[token.line - 1]!;
      const text = line.slice(token.column - 1).join('');
      const firstLine = token.lexeme.split('\n')[0]!;
      expect(text.startsWith(firstLine)).toBe(true);
    }
  });

  it('positions agree with the cursor rules', () => {
    const state = createLexerState(MIXED_SOURCE);
    const byOffset = new Map<number, { line: number; column: number }>();
    while (peek(state) !== '') {
      byOffset.set(state.pos, { line: state.line, column: state.column });
      advance(state);
    }
    for (const token of tokens) {
      if (token.kind === TOKEN_KINDS.EOF) continue;
      expect(byOffset.get(token.offset)).toEqual({
        line: token.line,
        column: token.column,
      });
    }
  });

  it('tracks columns after tabs and multi-line comments', () => {
    const total = tokens.find((t) => t.lexeme === '071total')!;
    expect([total.line, total.column]).toEqual([3, 2]);

    const keyword = tokens.find((t) => t.kind === TOKEN_KINDS.WHILE)!;
    expect([keyword.line, keyword.column]).toEqual([6, 17]);
  });

  it('ends with EOF after the last line', () => {
    const eof = tokens[tokens.length - 1]!;
    expect(eof).toEqual({
      kind: TOKEN_KINDS.EOF,
      lexeme: '',
      line: 8,
      column: 2,
      offset: chars.length,
    });
  });
});
