/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import type { SourceLocation } from '../source-location.js';
import type { Token, TokenType } from '../token-types.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
  baseOffset: number;
}

export function createLexerState(
  source: string,
  baseLocation?: SourceLocation
): LexerState {
  return {
    source,
    pos: 0,
    line: baseLocation?.line ?? 1,
    column: baseLocation?.column ?? 1,
    baseOffset: baseLocation?.offset ?? 0,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return {
    line: state.line,
    column: state.column,
    offset: state.pos + state.baseOffset,
  };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

/** Consume one character. `\r\n` and a lone `\r` count as one line break. */
export function advance(state: LexerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  if (ch === '\n' || (ch === '\r' && peek(state) !== '\n')) {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

/** Token spanning from `start` to the current position */
export function tokenFrom(
  state: LexerState,
  type: TokenType,
  value: string,
  start: SourceLocation
): Token {
  return { type, value, span: { start, end: currentLocation(state) } };
}
