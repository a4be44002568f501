/**
 * Lexer Cursor
 *
 * Position, line and column over one source text. The parser re-lexes
 * `$( )` bodies found inside double-quoted strings; those start at the
 * string's location so spans point into the enclosing script.
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
  /** Offset of source[0] within the enclosing script */
  readonly baseOffset: number;
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
    offset: state.baseOffset + state.pos,
  };
}

/** Character `ahead` positions past the cursor; '' past the end */
export function peek(state: LexerState, ahead = 0): string {
  return state.source.charAt(state.pos + ahead);
}

/** The next `length` characters, shorter near the end */
export function upcoming(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

/** Consume one character, moving to the next line after '\n' */
export function advance(state: LexerState): string {
  const ch = peek(state);
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Consume characters while `test` holds and return them */
export function consumeWhile(
  state: LexerState,
  test: (ch: string) => boolean
): string {
  let text = '';
  while (!isAtEnd(state) && test(peek(state))) {
    text += advance(state);
  }
  return text;
}
