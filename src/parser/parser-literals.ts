/**
 * Parser Extension: Literal Parsing
 * Strings and interpolation, lists, records, blocks, subexpressions
 */

import { Parser } from './parser.js';
import type {
  BlockLiteralNode,
  ExpressionNode,
  InterpolationNode,
  ListLiteralNode,
  RecordEntryNode,
  RecordLiteralNode,
  SourceLocation,
  SubExpressionNode,
  Token,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import { tokenize } from '../lexer/index.js';
import {
  advance,
  check,
  current,
  expect,
  isAtEnd,
  skipNewlines,
  skipSeparators,
  spanFrom,
  unexpectedToken,
} from './state.js';
import { constantForVariable, pipelineAsExpression } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parseString(): ExpressionNode;
    parseStringParts(
      raw: string,
      baseLocation: SourceLocation
    ): (string | InterpolationNode)[];
    parseInterpolatedStatements(
      source: string,
      baseLocation: SourceLocation
    ): InterpolationNode;
    parseListLiteral(): ListLiteralNode;
    parseRecordLiteral(): RecordLiteralNode;
    parseRecordEntry(): RecordEntryNode;
    parseBlockLiteral(): BlockLiteralNode;
    parseSubExpression(): SubExpressionNode;
  }
}

const ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '\\': '\\',
  '"': '"',
  "'": "'",
  $: '$',
};

function isNameStart(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z_]/.test(ch);
}

function isNameChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

/** Location of raw[index] for a string token starting at base */
function locationInString(
  base: SourceLocation,
  index: number
): SourceLocation {
  return {
    line: base.line,
    column: base.column + 1 + index,
    offset: base.offset + 1 + index,
  };
}

/** Index of the ')' closing the '$(' at raw[start], or -1 */
function findSubexpressionEnd(raw: string, start: number): number {
  let depth = 0;
  let i = start + 1;
  while (i < raw.length) {
    const ch = raw[i];
    if (ch === '"' || ch === "'") {
      i++;
      while (i < raw.length && raw[i] !== ch) {
        if (ch === '"' && raw[i] === '\\') i++;
        i++;
      }
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }
  return -1;
}

// ============================================================
// STRING PARSING
// ============================================================

/**
 * Double-quoted string. Without $ parts it is a plain Literal.
 */
Parser.prototype.parseString = function (this: Parser): ExpressionNode {
  const token = advance(this.state);
  const parts = this.parseStringParts(token.value, token.span.start);

  const [only] = parts;
  if (parts.length === 0) {
    return { type: 'Literal', value: '', span: token.span };
  }
  if (parts.length === 1 && typeof only === 'string') {
    return { type: 'Literal', value: only, span: token.span };
  }
  return { type: 'StringInterpolation', parts, span: token.span };
};

/**
 * Split a raw string body into literal text and interpolations:
 * $name, $scope:name and $( statements ). Backslash escapes apply to
 * literal text only.
 */
Parser.prototype.parseStringParts = function (
  this: Parser,
  raw: string,
  baseLocation: SourceLocation
): (string | InterpolationNode)[] {
  const parts: (string | InterpolationNode)[] = [];
  let text = '';
  let i = 0;

  const flush = (): void => {
    if (text) parts.push(text);
    text = '';
  };

  while (i < raw.length) {
    const ch = raw.charAt(i);

    if (ch === '\\' && i + 1 < raw.length) {
      const escaped = raw.charAt(i + 1);
      text += ESCAPES[escaped] ?? `\\${escaped}`;
      i += 2;
      continue;
    }

    if (ch === '$' && raw[i + 1] === '(') {
      const end = findSubexpressionEnd(raw, i);
      if (end < 0) {
        throw new ParseError(
          'PIPE-P003',
          'Invalid string interpolation: unclosed $(',
          locationInString(baseLocation, i),
          { detail: 'unclosed $(' }
        );
      }
      flush();
      parts.push(
        this.parseInterpolatedStatements(
          raw.slice(i + 2, end),
          locationInString(baseLocation, i + 2)
        )
      );
      i = end + 1;
      continue;
    }

    if (ch === '$' && isNameStart(raw[i + 1])) {
      let j = i + 1;
      while (isNameChar(raw[j])) j++;
      if (raw[j] === ':' && isNameStart(raw[j + 1])) {
        j++;
        while (isNameChar(raw[j])) j++;
      }
      const name = raw.slice(i + 1, j);
      const start = locationInString(baseLocation, i);
      const end = locationInString(baseLocation, j);
      const span = { start, end };
      const constant = constantForVariable(name);
      const expression: ExpressionNode = constant
        ? { type: 'Literal', value: constant.value, span }
        : { type: 'Variable', name, span };

      flush();
      parts.push({ type: 'Interpolation', expression, span });
      i = j;
      continue;
    }

    text += ch;
    i++;
  }

  flush();
  return parts;
};

Parser.prototype.parseInterpolatedStatements = function (
  this: Parser,
  source: string,
  baseLocation: SourceLocation
): InterpolationNode {
  const tokens: Token[] = tokenize(source, baseLocation);
  const subParser = new Parser(tokens);
  const statements = subParser.parseStatementList(TOKEN_TYPES.EOF);

  if (!isAtEnd(subParser.state)) {
    throw unexpectedToken(current(subParser.state));
  }

  const span = spanFrom(subParser.state, baseLocation);
  return {
    type: 'Interpolation',
    expression: { type: 'SubExpression', statements, span },
    span,
  };
};

// ============================================================
// COLLECTIONS
// ============================================================

/** @( item, item ) - items separated by commas, semicolons or newlines */
Parser.prototype.parseListLiteral = function (this: Parser): ListLiteralNode {
  const start = advance(this.state).span.start; // @(
  const elements: ExpressionNode[] = [];

  for (;;) {
    skipSeparators(this.state);
    if (check(this.state, TOKEN_TYPES.RPAREN)) break;

    elements.push(pipelineAsExpression(this.parsePipeline(false)));

    const endedLine = check(this.state, TOKEN_TYPES.NEWLINE);
    skipNewlines(this.state);
    if (check(this.state, TOKEN_TYPES.COMMA, TOKEN_TYPES.SEMICOLON)) {
      advance(this.state);
      continue;
    }
    if (!endedLine && !check(this.state, TOKEN_TYPES.RPAREN)) {
      throw unexpectedToken(current(this.state));
    }
  }

  expect(this.state, TOKEN_TYPES.RPAREN, "')' to close list");
  return { type: 'ListLiteral', elements, span: spanFrom(this.state, start) };
};

/** @{ Key = value; Other = value } */
Parser.prototype.parseRecordLiteral = function (
  this: Parser
): RecordLiteralNode {
  const start = advance(this.state).span.start; // @{
  const entries: RecordEntryNode[] = [];

  for (;;) {
    skipSeparators(this.state);
    if (check(this.state, TOKEN_TYPES.RBRACE)) break;

    entries.push(this.parseRecordEntry());

    if (!check(this.state, TOKEN_TYPES.NEWLINE, TOKEN_TYPES.SEMICOLON)) {
      if (!check(this.state, TOKEN_TYPES.RBRACE)) {
        throw unexpectedToken(current(this.state));
      }
    }
  }

  expect(this.state, TOKEN_TYPES.RBRACE, "'}' to close record");
  return { type: 'RecordLiteral', entries, span: spanFrom(this.state, start) };
};

Parser.prototype.parseRecordEntry = function (this: Parser): RecordEntryNode {
  const keyToken = advance(this.state);
  let key: string;

  switch (keyToken.type) {
    case TOKEN_TYPES.NUMBER:
      key = String(parseFloat(keyToken.value));
      break;
    case TOKEN_TYPES.STRING: {
      const parts = this.parseStringParts(keyToken.value, keyToken.span.start);
      key = parts.filter((part) => typeof part === 'string').join('');
      break;
    }
    case TOKEN_TYPES.LITERAL_STRING:
    case TOKEN_TYPES.IDENTIFIER:
    case TOKEN_TYPES.IF:
    case TOKEN_TYPES.ELSE:
    case TOKEN_TYPES.ELSEIF:
    case TOKEN_TYPES.FUNCTION:
    case TOKEN_TYPES.RETURN:
    case TOKEN_TYPES.PARAM:
    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      key = keyToken.value;
      break;
    default:
      throw unexpectedToken(keyToken);
  }

  expect(this.state, TOKEN_TYPES.ASSIGN, "'=' after record key");
  skipNewlines(this.state);
  const value = pipelineAsExpression(this.parsePipeline());

  return {
    type: 'RecordEntry',
    key,
    value,
    span: spanFrom(this.state, keyToken.span.start),
  };
};

// ============================================================
// BLOCKS
// ============================================================

/** { statements } as a value: a deferred block */
Parser.prototype.parseBlockLiteral = function (this: Parser): BlockLiteralNode {
  const start = advance(this.state).span.start; // {
  const body = this.parseStatementList(TOKEN_TYPES.RBRACE);
  expect(this.state, TOKEN_TYPES.RBRACE, "'}' to close block");
  return { type: 'BlockLiteral', body, span: spanFrom(this.state, start) };
};

/** $( statements ) */
Parser.prototype.parseSubExpression = function (
  this: Parser
): SubExpressionNode {
  const start = advance(this.state).span.start; // $(
  const statements = this.parseStatementList(TOKEN_TYPES.RPAREN);
  expect(this.state, TOKEN_TYPES.RPAREN, "')' to close subexpression");
  return {
    type: 'SubExpression',
    statements,
    span: spanFrom(this.state, start),
  };
};
