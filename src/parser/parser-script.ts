/**
 * Parser Extension: Script Parsing
 * Script, statement lists, statements and assignments
 */

import { Parser } from './parser.js';
import type {
  AssignmentNode,
  ScriptNode,
  StatementNode,
  TokenType,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  isAtEnd,
  skipNewlines,
  skipSeparators,
  spanFrom,
  unexpectedToken,
} from './state.js';
import {
  COMPOUND_ASSIGNMENT,
  isAssignment,
  pipelineAsExpression,
} from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseScript(): ScriptNode;
    parseStatementList(end: TokenType): StatementNode[];
    parseStatement(): StatementNode;
    parseAssignment(): AssignmentNode;
  }
}

// ============================================================
// SCRIPT PARSING
// ============================================================

Parser.prototype.parseScript = function (this: Parser): ScriptNode {
  const start = current(this.state).span.start;
  const statements = this.parseStatementList(TOKEN_TYPES.EOF);
  return {
    type: 'Script',
    statements,
    span: spanFrom(this.state, start),
  };
};

/**
 * Parse statements separated by newlines or semicolons until `end`.
 * The end token itself is left for the caller to consume.
 */
Parser.prototype.parseStatementList = function (
  this: Parser,
  end: TokenType
): StatementNode[] {
  const statements: StatementNode[] = [];

  for (;;) {
    skipSeparators(this.state);
    if (check(this.state, end) || isAtEnd(this.state)) break;

    statements.push(this.parseStatement());

    if (
      !check(
        this.state,
        TOKEN_TYPES.NEWLINE,
        TOKEN_TYPES.SEMICOLON,
        end,
        TOKEN_TYPES.EOF
      )
    ) {
      throw unexpectedToken(current(this.state));
    }
  }

  return statements;
};

// ============================================================
// STATEMENT PARSING
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  if (check(this.state, TOKEN_TYPES.FUNCTION)) {
    return this.parseFunctionDef();
  }
  if (check(this.state, TOKEN_TYPES.IF)) {
    return this.parseIf();
  }
  if (check(this.state, TOKEN_TYPES.RETURN)) {
    return this.parseReturn();
  }
  if (isAssignment(this.state)) {
    return this.parseAssignment();
  }
  return this.parsePipeline();
};

/**
 * Parse $name = value. Compound forms desugar:
 * $x += 1  ->  $x = $x + 1
 */
Parser.prototype.parseAssignment = function (this: Parser): AssignmentNode {
  const target = advance(this.state);
  const operator = advance(this.state);
  skipNewlines(this.state);
  const value = this.parsePipeline();

  const compound = COMPOUND_ASSIGNMENT[operator.type];
  if (compound === undefined) {
    return {
      type: 'Assignment',
      target: target.value,
      value,
      span: spanFrom(this.state, target.span.start),
    };
  }

  const span = spanFrom(this.state, target.span.start);
  return {
    type: 'Assignment',
    target: target.value,
    value: {
      type: 'Pipeline',
      stages: [
        {
          type: 'BinaryExpr',
          op: compound,
          left: { type: 'Variable', name: target.value, span: target.span },
          right: pipelineAsExpression(value),
          span,
        },
      ],
      span: value.span,
    },
    span,
  };
};
