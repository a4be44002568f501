/**
 * Parser Helpers
 * Lookahead predicates and small AST builders
 * @internal This module contains internal parser utilities
 */

import type {
  ArithmeticOp,
  ExpressionNode,
  PipelineNode,
  TokenType,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { type ParserState, check, current, peek } from './state.js';

// ============================================================
// OPERATOR TABLES
// ============================================================

/** Compound assignment tokens and the operator they desugar to */
export const COMPOUND_ASSIGNMENT: Partial<Record<TokenType, ArithmeticOp>> = {
  [TOKEN_TYPES.PLUS_ASSIGN]: '+',
  [TOKEN_TYPES.MINUS_ASSIGN]: '-',
  [TOKEN_TYPES.STAR_ASSIGN]: '*',
  [TOKEN_TYPES.SLASH_ASSIGN]: '/',
  [TOKEN_TYPES.PERCENT_ASSIGN]: '%',
};

/** Tokens that can begin a command argument */
const ARGUMENT_START: readonly TokenType[] = [
  TOKEN_TYPES.IDENTIFIER,
  TOKEN_TYPES.NUMBER,
  TOKEN_TYPES.STRING,
  TOKEN_TYPES.LITERAL_STRING,
  TOKEN_TYPES.VARIABLE,
  TOKEN_TYPES.TRUE,
  TOKEN_TYPES.FALSE,
  TOKEN_TYPES.LPAREN,
  TOKEN_TYPES.AT_LPAREN,
  TOKEN_TYPES.AT_LBRACE,
  TOKEN_TYPES.LBRACE,
  TOKEN_TYPES.DOLLAR_LPAREN,
];

// ============================================================
// LOOKAHEAD PREDICATES
// ============================================================

/**
 * Check for assignment: $name = ..., $name += ...
 * @internal
 */
export function isAssignment(state: ParserState): boolean {
  if (!check(state, TOKEN_TYPES.VARIABLE)) return false;
  const next = peek(state, 1).type;
  return next === TOKEN_TYPES.ASSIGN || COMPOUND_ASSIGNMENT[next] !== undefined;
}

/**
 * Check for the start of a positional argument value.
 * A minus directly followed by a number is a negative literal.
 * @internal
 */
export function isArgumentStart(state: ParserState): boolean {
  if (ARGUMENT_START.includes(current(state).type)) return true;
  return isNegativeNumber(state);
}

/** @internal */
export function isNegativeNumber(state: ParserState): boolean {
  const minus = current(state);
  const next = peek(state, 1);
  return (
    minus.type === TOKEN_TYPES.MINUS &&
    next.type === TOKEN_TYPES.NUMBER &&
    next.span.start.offset === minus.span.end.offset
  );
}

/**
 * Check whether an ELSE/ELSEIF follows, possibly after newlines.
 * Returns the number of newline tokens to skip, or -1.
 * @internal
 */
export function elseClauseOffset(state: ParserState): number {
  let offset = 0;
  while (peek(state, offset).type === TOKEN_TYPES.NEWLINE) offset++;
  const type = peek(state, offset).type;
  return type === TOKEN_TYPES.ELSE || type === TOKEN_TYPES.ELSEIF
    ? offset
    : -1;
}

/** Variables that are constants rather than bindings */
export function constantForVariable(
  name: string
): { value: boolean | null } | null {
  switch (name.toLowerCase()) {
    case 'true':
      return { value: true };
    case 'false':
      return { value: false };
    case 'null':
      return { value: null };
    default:
      return null;
  }
}

// ============================================================
// AST BUILDERS
// ============================================================

/**
 * Use a parsed pipeline where a single expression is expected.
 * A lone stage is used as-is; anything longer becomes a Grouped node.
 */
export function pipelineAsExpression(pipeline: PipelineNode): ExpressionNode {
  const [first] = pipeline.stages;
  if (pipeline.stages.length === 1 && first !== undefined) {
    return first;
  }
  return { type: 'Grouped', pipeline, span: pipeline.span };
}
