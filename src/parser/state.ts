/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
}

export function createParserState(tokens: Token[]): ParserState {
  return { tokens, pos: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** @internal */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const actual = describeToken(token);
  const hint = generateHint(type, token);
  const message = `Expected ${expected}, got ${actual}`;
  throw new ParseError(
    'PIPE-P002',
    hint ? `${message}. ${hint}` : message,
    token.span.start,
    { expected, actual }
  );
}

/** @internal */
export function skipNewlines(state: ParserState): void {
  while (check(state, TOKEN_TYPES.NEWLINE)) advance(state);
}

/** Skip statement separators: newlines and semicolons */
export function skipSeparators(state: ParserState): void {
  while (check(state, TOKEN_TYPES.NEWLINE, TOKEN_TYPES.SEMICOLON)) {
    advance(state);
  }
}

/** @internal */
export function describeToken(token: Token): string {
  if (token.type === TOKEN_TYPES.EOF) return 'end of input';
  if (token.type === TOKEN_TYPES.NEWLINE) return 'newline';
  if (token.type === TOKEN_TYPES.PARAMETER) return `-${token.value}`;
  if (token.type === TOKEN_TYPES.VARIABLE) return `$${token.value}`;
  return `'${token.value}'`;
}

/** @internal */
export function unexpectedToken(token: Token): ParseError {
  const description = describeToken(token);
  return new ParseError(
    'PIPE-P001',
    `Unexpected token: ${description}`,
    token.span.start,
    { token: description }
  );
}

// ============================================================
// ERROR HINTS
// ============================================================

function generateHint(expectedType: TokenType, actualToken: Token): string | null {
  const actual = actualToken.type;

  if (expectedType === TOKEN_TYPES.RPAREN && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed parenthesis';
  }
  if (expectedType === TOKEN_TYPES.RBRACE && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed brace';
  }
  if (expectedType === TOKEN_TYPES.RBRACKET && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed bracket';
  }
  if (expectedType === TOKEN_TYPES.LBRACE && actual === TOKEN_TYPES.NEWLINE) {
    return "Hint: Put '{' on the same line as the statement";
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Span from start to the end of the previously consumed token */
export function spanFrom(state: ParserState, start: SourceLocation): SourceSpan {
  const previous = state.tokens[state.pos - 1];
  return makeSpan(start, previous ? previous.span.end : start);
}
