/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { isList, toDisplayString, type PipeValue } from './runtime/index.js';
import { ConfigError, ParseError, RuntimeError } from './types.js';
import { LexerError } from './lexer/errors.js';
import { VERSION } from './version.js';

/**
 * Convert a result to output text.
 * Lists print one item per line; null prints nothing.
 *
 * @example
 * formatOutput([1, 'two']) // "1\ntwo"
 */
export function formatOutput(value: PipeValue): string {
  if (isList(value)) {
    return value.map(toDisplayString).join('\n');
  }
  return toDisplayString(value);
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    return `Lexer error at line ${err.location.line}: ${stripLocation(err.message)}`;
  }

  if (err instanceof ParseError) {
    return `Parse error at line ${err.location.line}: ${stripLocation(err.message)}`;
  }

  if (err instanceof RuntimeError) {
    const location = err.location;
    const baseMessage = stripLocation(err.message);
    if (location) {
      return `Runtime error at line ${location.line}: ${baseMessage}`;
    }
    return `Runtime error: ${baseMessage}`;
  }

  if (err instanceof ConfigError) {
    return `Config error: ${err.message}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

function stripLocation(message: string): string {
  return message.replace(/ at \d+:\d+$/, '');
}

/** Print a result to stdout; nothing for empty output */
export function printOutput(value: PipeValue): void {
  const text = formatOutput(value);
  if (text !== '') {
    console.log(text);
  }
}

/** Only run main outside the test runner */
export function shouldRunMain(): boolean {
  return (
    process.env['NODE_ENV'] !== 'test' &&
    !process.env['VITEST'] &&
    !process.env['VITEST_WORKER_ID']
  );
}

export { VERSION };
