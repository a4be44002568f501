/**
 * Lexer Errors
 */

import { ERROR_REGISTRY, PipeError } from '../types.js';
import type { SourceLocation } from '../types.js';

export class LexerError extends PipeError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (definition?.category !== 'lexer') {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    super({ errorId, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}
