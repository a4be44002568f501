/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { SourceLocation, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import {
  atDashLetter,
  atScopeSeparator,
  classifyDashWord,
  classifyWord,
  isDigit,
  isWordChar,
  isWordStart,
  makeToken,
} from './helpers.js';
import {
  advance,
  consumeWhile,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read a double-quoted string.
 * The token value is the raw body: escapes and $ interpolation are
 * resolved by the parser, so only string boundaries are found here.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    if (peek(state) === '\\') {
      value += advance(state);
      if (isAtEnd(state)) break;
      value += advance(state);
    } else if (peek(state) === '$' && peek(state, 1) === '(') {
      value += readSubexpressionSource(state, start);
    } else {
      value += advance(state);
    }
  }

  if (isAtEnd(state)) {
    throw new LexerError('PIPE-L001', 'Unterminated string literal', start);
  }
  advance(state); // consume closing "

  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

/**
 * Copy a $( ... ) subexpression verbatim, tracking nested parentheses
 * and quoted strings so a quote inside it does not end the outer string.
 */
function readSubexpressionSource(
  state: LexerState,
  stringStart: SourceLocation
): string {
  let text = advance(state) + advance(state); // $(
  let depth = 1;

  while (!isAtEnd(state) && depth > 0) {
    const ch = peek(state);
    if (ch === '"' || ch === "'") {
      const quote = advance(state);
      text += quote;
      while (!isAtEnd(state) && peek(state) !== quote) {
        if (quote === '"' && peek(state) === '\\') {
          text += advance(state);
        }
        text += advance(state);
      }
      if (isAtEnd(state)) break;
      text += advance(state);
      continue;
    }
    if (ch === '(') depth++;
    if (ch === ')') depth--;
    text += advance(state);
  }

  if (depth > 0) {
    throw new LexerError(
      'PIPE-L001',
      'Unterminated string literal',
      stringStart
    );
  }
  return text;
}

/** Read a single-quoted literal string ('' escapes a quote) */
export function readLiteralString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening '

  let value = '';
  for (;;) {
    if (isAtEnd(state)) {
      throw new LexerError('PIPE-L001', 'Unterminated string literal', start);
    }
    const ch = advance(state);
    if (ch === "'") {
      if (peek(state) === "'") {
        value += advance(state);
        continue;
      }
      break;
    }
    value += ch;
  }

  return makeToken(
    TOKEN_TYPES.LITERAL_STRING,
    value,
    start,
    currentLocation(state)
  );
}

export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = consumeWhile(state, isDigit);

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    value += advance(state) + consumeWhile(state, isDigit);
  }

  return makeToken(TOKEN_TYPES.NUMBER, value, start, currentLocation(state));
}

/**
 * Read a command name or keyword. Inner dashes join the word
 * (Where-Object); a dash before a non-letter ends it (`$n-1`).
 */
export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = consumeWhile(state, isWordChar);

  while (atDashLetter(state)) {
    value += advance(state) + consumeWhile(state, isWordChar);
  }

  return makeToken(classifyWord(value), value, start, currentLocation(state));
}

/**
 * Read a variable: $name, $_, $global:name.
 * The token value keeps the qualifier; the scope stack interprets it.
 */
export function readVariable(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume $

  if (!isWordStart(peek(state))) {
    throw new LexerError('PIPE-L002', 'Unexpected character: $', start, {
      char: '$',
    });
  }

  let name = consumeWhile(state, isWordChar);
  if (atScopeSeparator(state)) {
    name += advance(state) + consumeWhile(state, isWordChar);
  }

  return makeToken(TOKEN_TYPES.VARIABLE, name, start, currentLocation(state));
}

/**
 * Read -word: a dash operator keeps its dash (-eq); a parameter token
 * holds the bare name (Property).
 */
export function readDashWord(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume -

  const word = consumeWhile(state, isWordChar);
  const type = classifyDashWord(word);
  const value = type === TOKEN_TYPES.PARAMETER ? word : `-${word}`;
  return makeToken(type, value, start, currentLocation(state));
}
