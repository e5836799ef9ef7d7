/**
 * Lexer State
 * Cursor over the source text: position, line, and column
 */

import type { SourceLocation } from '../types.js';

/** Returned by peek/advance past the end of the source */
export const END_OF_INPUT = '';

export interface LexerState {
  /** Source split into code points */
  readonly chars: readonly string[];
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return {
    chars: Array.from(source),
    pos: 0,
    line: 1,
    column: 1,
  };
}

export function resetLexerState(state: LexerState): void {
  state.pos = 0;
  state.line = 1;
  state.column = 1;
}

/** Location of the next character to be read */
export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function peek(state: LexerState, offset = 0): string {
  return state.chars[state.pos + offset] ?? END_OF_INPUT;
}

export function peekString(state: LexerState, length: number): string {
  return state.chars.slice(state.pos, state.pos + length).join('');
}

export function advance(state: LexerState): string {
  const ch = state.chars[state.pos];
  if (ch === undefined) return END_OF_INPUT;

  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.chars.length;
}
