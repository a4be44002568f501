/**
 * Tokenizer
 * Main tokenization logic
 */

import type { SourceLocation, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import {
  atDashLetter,
  isDigit,
  isInlineSpace,
  isWordStart,
  makeToken,
  takeToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import {
  readDashWord,
  readIdentifier,
  readLiteralString,
  readNumber,
  readString,
  readVariable,
} from './readers.js';
import {
  advance,
  consumeWhile,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  upcoming,
} from './state.js';

/** Spaces, then a `#` comment up to the newline */
function skipTrivia(state: LexerState): void {
  consumeWhile(state, isInlineSpace);
  if (peek(state) === '#') {
    consumeWhile(state, (ch) => ch !== '\n');
  }
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '\n') {
    advance(state);
    return makeToken(TOKEN_TYPES.NEWLINE, '\n', start, currentLocation(state));
  }

  if (ch === '"') {
    return readString(state);
  }

  if (ch === "'") {
    return readLiteralString(state);
  }

  // Number (positive only - unary minus handled by parser)
  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isWordStart(ch)) {
    return readIdentifier(state);
  }

  // Two-character operators first so $( and -= win over $name and -word
  const twoCharType = TWO_CHAR_OPERATORS[upcoming(state, 2)];
  if (twoCharType) {
    return takeToken(state, 2, twoCharType, start);
  }

  if (ch === '$') {
    return readVariable(state);
  }

  if (atDashLetter(state)) {
    return readDashWord(state);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return takeToken(state, 1, singleCharType, start);
  }

  throw new LexerError('PIPE-L002', `Unexpected character: ${ch}`, start, {
    char: ch,
  });
}

/**
 * Convert source text into tokens, ending with EOF.
 * baseLocation offsets spans for text embedded in a larger source.
 */
export function tokenize(
  source: string,
  baseLocation?: SourceLocation
): Token[] {
  const state = createLexerState(source, baseLocation);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
