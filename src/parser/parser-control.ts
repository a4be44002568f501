/**
 * Parser Extension: Control Flow Parsing
 * Conditionals, function definitions, return, statement blocks
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  FunctionDefNode,
  IfNode,
  ParamNode,
  ReturnNode,
  StatementNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  expect,
  skipNewlines,
  skipSeparators,
  spanFrom,
} from './state.js';
import { elseClauseOffset, pipelineAsExpression } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parseIf(): IfNode;
    parseFunctionDef(): FunctionDefNode;
    parseParamList(): ParamNode[];
    parseReturn(): ReturnNode;
    parseStatementBlock(): StatementNode[];
  }
}

// ============================================================
// CONDITIONALS
// ============================================================

/**
 * if (cond) { } elseif (cond) { } else { }
 * elseif is parsed as a nested IfNode in the else branch.
 */
Parser.prototype.parseIf = function (this: Parser): IfNode {
  const start = advance(this.state).span.start; // if / elseif
  expect(this.state, TOKEN_TYPES.LPAREN, "'(' after if");
  skipNewlines(this.state);
  const condition = pipelineAsExpression(this.parsePipeline());
  skipNewlines(this.state);
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after condition");

  const thenBody = this.parseStatementBlock();

  let elseBody: StatementNode[] | null = null;
  const offset = elseClauseOffset(this.state);
  if (offset >= 0) {
    for (let i = 0; i < offset; i++) advance(this.state);
    if (check(this.state, TOKEN_TYPES.ELSEIF)) {
      elseBody = [this.parseIf()];
    } else {
      advance(this.state); // else
      elseBody = this.parseStatementBlock();
    }
  }

  return {
    type: 'If',
    condition,
    thenBody,
    elseBody,
    span: spanFrom(this.state, start),
  };
};

/** { statements } for if/else and function bodies */
Parser.prototype.parseStatementBlock = function (
  this: Parser
): StatementNode[] {
  expect(this.state, TOKEN_TYPES.LBRACE, "'{'");
  const body = this.parseStatementList(TOKEN_TYPES.RBRACE);
  expect(this.state, TOKEN_TYPES.RBRACE, "'}'");
  return body;
};

// ============================================================
// FUNCTIONS
// ============================================================

/**
 * function Name($a, $b = 1) { body }
 * function Name { param($a, $b = 1) body }
 */
Parser.prototype.parseFunctionDef = function (this: Parser): FunctionDefNode {
  const start = advance(this.state).span.start; // function
  const nameToken = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'function name');

  let params: ParamNode[] = [];
  if (check(this.state, TOKEN_TYPES.LPAREN)) {
    advance(this.state);
    params = this.parseParamList();
  }

  expect(this.state, TOKEN_TYPES.LBRACE, "'{' to open function body");
  skipSeparators(this.state);
  if (check(this.state, TOKEN_TYPES.PARAM)) {
    advance(this.state);
    expect(this.state, TOKEN_TYPES.LPAREN, "'(' after param");
    params = [...params, ...this.parseParamList()];
  }
  const body = this.parseStatementList(TOKEN_TYPES.RBRACE);
  expect(this.state, TOKEN_TYPES.RBRACE, "'}' to close function body");

  return {
    type: 'FunctionDef',
    name: nameToken.value,
    params,
    body,
    span: spanFrom(this.state, start),
  };
};

/** $a, $b = default ) - consumes the closing parenthesis */
Parser.prototype.parseParamList = function (this: Parser): ParamNode[] {
  const params: ParamNode[] = [];
  skipNewlines(this.state);

  while (!check(this.state, TOKEN_TYPES.RPAREN)) {
    const token = expect(this.state, TOKEN_TYPES.VARIABLE, 'parameter name');
    let defaultValue: ExpressionNode | null = null;
    if (check(this.state, TOKEN_TYPES.ASSIGN)) {
      advance(this.state);
      defaultValue = this.parseExpression();
    }
    params.push({
      type: 'Param',
      name: token.value,
      defaultValue,
      span: spanFrom(this.state, token.span.start),
    });

    skipNewlines(this.state);
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
    skipNewlines(this.state);
  }

  expect(this.state, TOKEN_TYPES.RPAREN, "')' after parameters");
  return params;
};

// ============================================================
// RETURN
// ============================================================

Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  const start = advance(this.state).span.start; // return
  const hasValue = !check(
    this.state,
    TOKEN_TYPES.NEWLINE,
    TOKEN_TYPES.SEMICOLON,
    TOKEN_TYPES.RBRACE,
    TOKEN_TYPES.RPAREN,
    TOKEN_TYPES.EOF
  );
  const value = hasValue ? this.parsePipeline() : null;
  return { type: 'Return', value, span: spanFrom(this.state, start) };
};
