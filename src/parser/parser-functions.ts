/**
 * Parser Extension: Command Call Parsing
 * Name arg1 arg2 -Param value -Switch
 */

import { Parser } from './parser.js';
import type { CallNode, ExpressionNode, NamedArgNode } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { advance, check, current, spanFrom } from './state.js';
import { isArgumentStart, isNegativeNumber } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parseCommandCall(): CallNode;
    parseArgument(): ExpressionNode;
    parseArgumentValue(): ExpressionNode;
  }
}

// ============================================================
// COMMAND CALLS
// ============================================================

/**
 * Arguments run until a pipe, separator or closing bracket.
 * -Name followed by a value is a named argument; -Name alone is a switch.
 */
Parser.prototype.parseCommandCall = function (this: Parser): CallNode {
  const nameToken = advance(this.state);
  const args: ExpressionNode[] = [];
  const namedArgs: NamedArgNode[] = [];

  for (;;) {
    if (check(this.state, TOKEN_TYPES.PARAMETER)) {
      const paramToken = advance(this.state);
      const value = isArgumentStart(this.state) ? this.parseArgument() : null;
      namedArgs.push({
        type: 'NamedArg',
        name: paramToken.value,
        value,
        span: spanFrom(this.state, paramToken.span.start),
      });
      continue;
    }

    if (isArgumentStart(this.state)) {
      args.push(this.parseArgument());
      continue;
    }

    break;
  }

  return {
    type: 'Call',
    name: nameToken.value,
    args,
    namedArgs,
    span: spanFrom(this.state, nameToken.span.start),
  };
};

/** An argument value; `a, b` builds a list (Select-Object Name, Age) */
Parser.prototype.parseArgument = function (this: Parser): ExpressionNode {
  const first = this.parseArgumentValue();
  if (!check(this.state, TOKEN_TYPES.COMMA)) return first;

  const elements = [first];
  while (check(this.state, TOKEN_TYPES.COMMA)) {
    advance(this.state);
    elements.push(this.parseArgumentValue());
  }
  return {
    type: 'ListLiteral',
    elements,
    span: spanFrom(this.state, first.span.start),
  };
};

/**
 * Barewords are strings and -5 is a number; anything else is a
 * primary with postfix access. Binary operators need parentheses.
 */
Parser.prototype.parseArgumentValue = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    advance(this.state);
    return { type: 'Literal', value: token.value, span: token.span };
  }

  if (isNegativeNumber(this.state)) {
    advance(this.state); // -
    const numberToken = advance(this.state);
    return {
      type: 'Literal',
      value: -parseFloat(numberToken.value),
      span: spanFrom(this.state, token.span.start),
    };
  }

  return this.parsePostfix();
};
