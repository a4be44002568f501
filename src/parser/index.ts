/**
 * pipesh Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ScriptNode } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-expr.js';
import './parser-functions.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse source code into an AST.
 *
 * Throws LexerError or ParseError on the first syntax error.
 *
 * @example
 * ```typescript
 * const ast = parse('$x = 5; $x + 10');
 * ```
 */
export function parse(source: string): ScriptNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens);
  return parser.parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { createParserState, type ParserState } from './state.js';
export { Parser } from './parser.js';
