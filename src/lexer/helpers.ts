/**
 * Lexer Helpers
 *
 * Words in pipesh may carry inner dashes (`Where-Object`), while a dash
 * that starts a word is either an operator (`-eq`) or a parameter name
 * (`-Property`). The classification lives here so the readers only
 * collect characters.
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { DASH_OPERATORS, KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  peek,
  type LexerState,
} from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

/** First character of a name, variable or keyword */
export function isWordStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isWordChar(ch: string): boolean {
  return isWordStart(ch) || isDigit(ch);
}

/** Spaces between tokens; newlines are tokens of their own */
export function isInlineSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r';
}

/** `-` then a letter: inside a word it joins (Get-Item), else it starts -word */
export function atDashLetter(state: LexerState): boolean {
  return peek(state) === '-' && isLetter(peek(state, 1));
}

/** `:` then a name, as in $global:count */
export function atScopeSeparator(state: LexerState): boolean {
  return peek(state) === ':' && isWordStart(peek(state, 1));
}

/** Keywords match case-insensitively; anything else is a name */
export function classifyWord(word: string): TokenType {
  return KEYWORDS[word.toLowerCase()] ?? TOKEN_TYPES.IDENTIFIER;
}

/** -eq, -and, ... are operators; any other -word names a parameter */
export function classifyDashWord(word: string): TokenType {
  return DASH_OPERATORS[word.toLowerCase()] ?? TOKEN_TYPES.PARAMETER;
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, value, span: { start, end } };
}

/** Consume a fixed-width operator and return its token */
export function takeToken(
  state: LexerState,
  width: number,
  type: TokenType,
  start: SourceLocation
): Token {
  let value = '';
  for (let i = 0; i < width; i++) value += advance(state);
  return makeToken(type, value, start, currentLocation(state));
}
