/**
 * Error Classes and Factory
 * Structured error types with registry-based error ids
 */

import type { SourceLocation, SourceSpan } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface PipeErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Render the registry message for an error id.
 * @throws TypeError if errorId is not registered
 */
export function messageFor(
  errorId: string,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

/**
 * Create an error from the registry with a rendered message.
 *
 * @example
 * createError('PIPE-R001', { name: 'x' }, location)
 * // PipeError: "Variable $x is not defined at 1:1"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): PipeError {
  return new PipeError({
    errorId,
    message: messageFor(errorId, context),
    location,
    context,
  });
}

function assertCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all interpreter errors.
 * Provides structured data for host applications to format as needed.
 */
export class PipeError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: PipeErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'PipeError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): PipeErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: PipeErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Parse-time errors */
export class ParseError extends PipeError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'parse');
    super({ errorId, message, location, context });
    this.name = 'ParseError';
    this.location = location;
  }
}

/** Configuration loading errors */
export class ConfigError extends PipeError {
  constructor(errorId: string, context: Record<string, unknown>) {
    assertCategory(errorId, 'config');
    super({ errorId, message: messageFor(errorId, context), context });
    this.name = 'ConfigError';
  }
}

/** Runtime execution errors */
export class RuntimeError extends PipeError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'runtime');
    super({ errorId, message, location, context });
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    errorId: string,
    context: Record<string, unknown>,
    node?: { span: SourceSpan }
  ): RuntimeError {
    return new RuntimeError(
      errorId,
      messageFor(errorId, context),
      node?.span.start,
      context
    );
  }
}

/** Name lookup failed */
export class UndefinedVariableError extends RuntimeError {
  readonly variableName: string;

  constructor(name: string, location?: SourceLocation) {
    super('PIPE-R001', messageFor('PIPE-R001', { name }), location, { name });
    this.name = 'UndefinedVariableError';
    this.variableName = name;
  }
}

/** An operator or coercion received an incompatible value */
export class TypeMismatchError extends RuntimeError {
  readonly operation: string;
  readonly expected: string;
  readonly actual: string;

  constructor(
    operation: string,
    expected: string,
    actual: string,
    location?: SourceLocation
  ) {
    const context = { operation, expected, actual };
    super('PIPE-R002', messageFor('PIPE-R002', context), location, context);
    this.name = 'TypeMismatchError';
    this.operation = operation;
    this.expected = expected;
    this.actual = actual;
  }
}

export class DivisionByZeroError extends RuntimeError {
  constructor(operation: '/' | '%', location?: SourceLocation) {
    super('PIPE-R003', messageFor('PIPE-R003', {}), location, { operation });
    this.name = 'DivisionByZeroError';
  }
}

/** Neither a user function nor a registered stage matched a call name */
export class CommandNotFoundError extends RuntimeError {
  readonly commandName: string;

  constructor(name: string, location?: SourceLocation) {
    super('PIPE-R004', messageFor('PIPE-R004', { name }), location, { name });
    this.name = 'CommandNotFoundError';
    this.commandName = name;
  }
}

/**
 * Member access failed. One kind covers both causes; `reason`
 * tells them apart.
 */
export class InvalidPropertyAccessError extends RuntimeError {
  readonly property: string;
  readonly reason: 'missing' | 'not-record';

  constructor(
    property: string,
    reason: 'missing' | 'not-record',
    actualType: string,
    location?: SourceLocation
  ) {
    const detail =
      reason === 'missing'
        ? 'does not exist on record'
        : `cannot be read from ${actualType}`;
    super(
      'PIPE-R005',
      messageFor('PIPE-R005', { property, detail }),
      location,
      { property, reason, actualType }
    );
    this.name = 'InvalidPropertyAccessError';
    this.property = property;
    this.reason = reason;
  }
}

export class ReturnOutsideFunctionError extends RuntimeError {
  constructor(location?: SourceLocation) {
    super('PIPE-R006', messageFor('PIPE-R006', {}), location, {});
    this.name = 'ReturnOutsideFunctionError';
  }
}

export class CallDepthExceededError extends RuntimeError {
  constructor(name: string, limit: number, location?: SourceLocation) {
    super('PIPE-R007', messageFor('PIPE-R007', { name, limit }), location, {
      name,
      limit,
    });
    this.name = 'CallDepthExceededError';
  }
}

export class UnknownParameterError extends RuntimeError {
  constructor(name: string, param: string, location?: SourceLocation) {
    super('PIPE-R008', messageFor('PIPE-R008', { name, param }), location, {
      name,
      param,
    });
    this.name = 'UnknownParameterError';
  }
}

export class InvalidArgumentError extends RuntimeError {
  constructor(name: string, detail: string, location?: SourceLocation) {
    super('PIPE-R009', messageFor('PIPE-R009', { name, detail }), location, {
      name,
      detail,
    });
    this.name = 'InvalidArgumentError';
  }
}
