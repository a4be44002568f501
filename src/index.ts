/**
 * pipesh Module
 * Exports lexer, parser, runtime, and AST types
 */

export { LexerError, tokenize } from './lexer/index.js';
export { parse } from './parser/index.js';
export * from './runtime/index.js';
export * from './types.js';
export { VERSION } from './version.js';
