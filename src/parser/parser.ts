/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ScriptNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Script, statement lists, assignments
 * - parser-control.ts: if/elseif/else, function definitions, return
 * - parser-expr.ts: Pipelines, precedence chain, postfix access
 * - parser-functions.ts: Command calls and their arguments
 * - parser-literals.ts: Strings, interpolation, lists, records, blocks
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(source));
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  state: ParserState;

  constructor(tokens: Token[]) {
    this.state = createParserState(tokens);
  }

  parse(): ScriptNode {
    return this.parseScript();
  }
}
