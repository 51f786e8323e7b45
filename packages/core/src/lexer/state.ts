/**
 * Lexer State
 * Tracks the current character and its position in the stream
 */

import type { SourceLocation } from '../source-location.js';
import type { CharacterSource } from './source.js';

export interface LexerState {
  readonly source: CharacterSource;
  /** Current character, '' at end of stream */
  ch: string;
  line: number;
  column: number;
  offset: number;
}

export function createLexerState(source: CharacterSource): LexerState {
  return {
    source,
    ch: source.read(),
    line: 1,
    column: 1,
    offset: 0,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return {
    line: state.line,
    column: state.column,
    offset: state.offset,
  };
}

export function isAtEnd(state: LexerState): boolean {
  return state.ch === '';
}

/** Move to the next character, returning the one consumed */
export function advance(state: LexerState): string {
  const ch = state.ch;
  if (ch === '') return ch;
  state.ch = state.source.read();
  state.offset++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}
