/**
 * Lexer Tests: Cursor State
 */

import { describe, expect, it } from 'vitest';
import {
  END_OF_INPUT,
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  peek,
  peekString,
  resetLexerState,
} from '../../src/lexer/state.js';
import {
  isDigit,
  isIdentifierChar,
  isLetter,
  isNewline,
  isWhitespace,
} from '../../src/lexer/helpers.js';

describe('Lexer: State', () => {
  it('peeks without consuming', () => {
    const state = createLexerState('ab');
    expect(peek(state)).toBe('a');
    expect(peek(state, 1)).toBe('b');
    expect(peek(state, 2)).toBe(END_OF_INPUT);
    expect(peekString(state, 5)).toBe('ab');
    expect(state.pos).toBe(0);
  });

  it('advances line and column', () => {
    const state = createLexerState('a\nb');
    expect(advance(state)).toBe('a');
    expect(currentLocation(state)).toEqual({ line: 1, column: 2, offset: 1 });
    expect(advance(state)).toBe('\n');
    expect(currentLocation(state)).toEqual({ line: 2, column: 1, offset: 2 });
    expect(advance(state)).toBe('b');
    expect(isAtEnd(state)).toBe(true);
  });

  it('returns the sentinel without moving at the end', () => {
    const state = createLexerState('x');
    advance(state);
    expect(advance(state)).toBe(END_OF_INPUT);
    expect(currentLocation(state)).toEqual({ line: 1, column: 2, offset: 1 });
  });

  it('counts code points, not UTF-16 units', () => {
    const state = createLexerState('😀x');
    expect(advance(state)).toBe('😀');
    expect(peek(state)).toBe('x');
    expect(state.column).toBe(2);
  });

  it('resets to the start', () => {
    const state = createLexerState('a\nb');
    advance(state);
    advance(state);
    resetLexerState(state);
    expect(currentLocation(state)).toEqual({ line: 1, column: 1, offset: 0 });
    expect(peek(state)).toBe('a');
  });
});

describe('Lexer: Character classes', () => {
  it('classifies digits', () => {
    expect(['0', '5', '9'].every(isDigit)).toBe(true);
    expect(['a', '.', '', '٣'].some(isDigit)).toBe(false);
  });

  it('classifies letters', () => {
    expect(['a', 'Z', 'é', 'ж'].every(isLetter)).toBe(true);
    expect(['1', '_', '$', ''].some(isLetter)).toBe(false);
  });

  it('classifies identifier characters', () => {
    expect(['a', '7', '_'].every(isIdentifierChar)).toBe(true);
    expect(['-', ' ', '$', ''].some(isIdentifierChar)).toBe(false);
  });

  it('separates whitespace from newlines', () => {
    expect([' ', '\t', '\r'].every(isWhitespace)).toBe(true);
    expect(isWhitespace('\n')).toBe(false);
    expect(isNewline('\n')).toBe(true);
    expect(isNewline('\r')).toBe(false);
  });
});
