/**
 * Parser Extension: Expression Parsing
 * Pipelines, the precedence chain, postfix access and primaries
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  ExpressionNode,
  PipelineNode,
  SourceLocation,
  TokenType,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  expect,
  makeSpan,
  skipNewlines,
  spanFrom,
  unexpectedToken,
} from './state.js';
import { constantForVariable } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parsePipeline(allowCommaList?: boolean): PipelineNode;
    parseStage(allowCommaList: boolean): ExpressionNode;
    parseCommaList(first: ExpressionNode): ExpressionNode;
    parseExpression(): ExpressionNode;
    parseBinaryLevel(
      operators: Partial<Record<TokenType, BinaryOp>>,
      next: () => ExpressionNode
    ): ExpressionNode;
    parseUnary(): ExpressionNode;
    parsePostfix(): ExpressionNode;
    parsePostfixOn(base: ExpressionNode, start: SourceLocation): ExpressionNode;
    parsePrimary(): ExpressionNode;
  }
}

// ============================================================
// OPERATOR TABLES (lowest to highest precedence)
// ============================================================

const OR_OPERATORS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.OR]: '-or',
};

const AND_OPERATORS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.AND]: '-and',
};

const COMPARISON_OPERATORS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.EQ]: '-eq',
  [TOKEN_TYPES.NE]: '-ne',
  [TOKEN_TYPES.GT]: '-gt',
  [TOKEN_TYPES.LT]: '-lt',
  [TOKEN_TYPES.GE]: '-ge',
  [TOKEN_TYPES.LE]: '-le',
};

const ADDITIVE_OPERATORS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};

const MULTIPLICATIVE_OPERATORS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
  [TOKEN_TYPES.PERCENT]: '%',
};

/** Token types usable as member names after '.' */
const MEMBER_NAME_TYPES: readonly TokenType[] = [
  TOKEN_TYPES.IDENTIFIER,
  TOKEN_TYPES.FUNCTION,
  TOKEN_TYPES.IF,
  TOKEN_TYPES.ELSEIF,
  TOKEN_TYPES.ELSE,
  TOKEN_TYPES.RETURN,
  TOKEN_TYPES.PARAM,
  TOKEN_TYPES.TRUE,
  TOKEN_TYPES.FALSE,
];

// ============================================================
// PIPELINES
// ============================================================

/**
 * stage ('|' stage)*
 * A newline may follow '|'.
 */
Parser.prototype.parsePipeline = function (
  this: Parser,
  allowCommaList = true
): PipelineNode {
  const start = current(this.state).span.start;
  const stages = [this.parseStage(allowCommaList)];

  while (check(this.state, TOKEN_TYPES.PIPE)) {
    advance(this.state);
    skipNewlines(this.state);
    stages.push(this.parseStage(allowCommaList));
  }

  return { type: 'Pipeline', stages, span: spanFrom(this.state, start) };
};

/**
 * A stage is a command call, or an expression optionally followed by
 * ', expr' items that build a list (1, 2, 3 | ...).
 */
Parser.prototype.parseStage = function (
  this: Parser,
  allowCommaList: boolean
): ExpressionNode {
  if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    return this.parseCommandCall();
  }

  const expression = this.parseExpression();
  if (allowCommaList && check(this.state, TOKEN_TYPES.COMMA)) {
    return this.parseCommaList(expression);
  }
  return expression;
};

Parser.prototype.parseCommaList = function (
  this: Parser,
  first: ExpressionNode
): ExpressionNode {
  const elements = [first];
  while (check(this.state, TOKEN_TYPES.COMMA)) {
    advance(this.state);
    skipNewlines(this.state);
    elements.push(this.parseExpression());
  }
  return {
    type: 'ListLiteral',
    elements,
    span: spanFrom(this.state, first.span.start),
  };
};

// ============================================================
// PRECEDENCE CHAIN
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  const comparison = (): ExpressionNode =>
    this.parseBinaryLevel(COMPARISON_OPERATORS, additive);
  const additive = (): ExpressionNode =>
    this.parseBinaryLevel(ADDITIVE_OPERATORS, multiplicative);
  const multiplicative = (): ExpressionNode =>
    this.parseBinaryLevel(MULTIPLICATIVE_OPERATORS, () => this.parseUnary());
  const and = (): ExpressionNode =>
    this.parseBinaryLevel(AND_OPERATORS, comparison);

  return this.parseBinaryLevel(OR_OPERATORS, and);
};

/** Left-associative binary level; newlines may follow an operator */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  operators: Partial<Record<TokenType, BinaryOp>>,
  next: () => ExpressionNode
): ExpressionNode {
  let left = next();

  for (;;) {
    const op = operators[current(this.state).type];
    if (op === undefined) break;
    advance(this.state);
    skipNewlines(this.state);
    const right = next();
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }

  return left;
};

Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  if (check(this.state, TOKEN_TYPES.MINUS)) {
    advance(this.state);
    const operand = this.parseUnary();
    return {
      type: 'UnaryExpr',
      op: '-',
      operand,
      span: makeSpan(token.span.start, operand.span.end),
    };
  }

  if (check(this.state, TOKEN_TYPES.BANG, TOKEN_TYPES.NOT)) {
    advance(this.state);
    const operand = this.parseUnary();
    return {
      type: 'UnaryExpr',
      op: '!',
      operand,
      span: makeSpan(token.span.start, operand.span.end),
    };
  }

  return this.parsePostfix();
};

// ============================================================
// POSTFIX ACCESS
// ============================================================

Parser.prototype.parsePostfix = function (this: Parser): ExpressionNode {
  const start = current(this.state).span.start;
  return this.parsePostfixOn(this.parsePrimary(), start);
};

/** .member and [index] chains */
Parser.prototype.parsePostfixOn = function (
  this: Parser,
  base: ExpressionNode,
  start: SourceLocation
): ExpressionNode {
  let node = base;

  for (;;) {
    if (check(this.state, TOKEN_TYPES.DOT)) {
      advance(this.state);
      const memberToken = current(this.state);
      if (!MEMBER_NAME_TYPES.includes(memberToken.type)) {
        throw unexpectedToken(memberToken);
      }
      advance(this.state);
      node = {
        type: 'MemberAccess',
        object: node,
        member: memberToken.value,
        span: spanFrom(this.state, start),
      };
      continue;
    }

    if (check(this.state, TOKEN_TYPES.LBRACKET)) {
      advance(this.state);
      const index = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RBRACKET, "']' after index");
      node = {
        type: 'IndexAccess',
        object: node,
        index,
        span: spanFrom(this.state, start),
      };
      continue;
    }

    return node;
  }
};

// ============================================================
// PRIMARIES
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.NUMBER:
      advance(this.state);
      return { type: 'Literal', value: parseFloat(token.value), span: token.span };

    case TOKEN_TYPES.STRING:
      return this.parseString();

    case TOKEN_TYPES.LITERAL_STRING:
      advance(this.state);
      return { type: 'Literal', value: token.value, span: token.span };

    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'Literal',
        value: token.type === TOKEN_TYPES.TRUE,
        span: token.span,
      };

    case TOKEN_TYPES.VARIABLE: {
      advance(this.state);
      const constant = constantForVariable(token.value);
      if (constant) {
        return { type: 'Literal', value: constant.value, span: token.span };
      }
      return { type: 'Variable', name: token.value, span: token.span };
    }

    case TOKEN_TYPES.LPAREN: {
      advance(this.state);
      skipNewlines(this.state);
      const pipeline = this.parsePipeline();
      skipNewlines(this.state);
      expect(this.state, TOKEN_TYPES.RPAREN, "')'");
      return {
        type: 'Grouped',
        pipeline,
        span: spanFrom(this.state, token.span.start),
      };
    }

    case TOKEN_TYPES.DOLLAR_LPAREN:
      return this.parseSubExpression();

    case TOKEN_TYPES.AT_LPAREN:
      return this.parseListLiteral();

    case TOKEN_TYPES.AT_LBRACE:
      return this.parseRecordLiteral();

    case TOKEN_TYPES.LBRACE:
      return this.parseBlockLiteral();

    case TOKEN_TYPES.IDENTIFIER:
      // A command name inside an expression takes no arguments
      advance(this.state);
      return {
        type: 'Call',
        name: token.value,
        args: [],
        namedArgs: [],
        span: token.span,
      };

    default:
      throw unexpectedToken(token);
  }
};
