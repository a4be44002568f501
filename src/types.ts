/**
 * pipesh AST, token and error types
 * Single import point for the front end and the runtime.
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export { TOKEN_TYPES, type Token, type TokenType } from './token-types.js';
export type * from './ast-nodes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
export {
  CallDepthExceededError,
  CommandNotFoundError,
  ConfigError,
  createError,
  DivisionByZeroError,
  InvalidArgumentError,
  InvalidPropertyAccessError,
  messageFor,
  ParseError,
  PipeError,
  ReturnOutsideFunctionError,
  RuntimeError,
  TypeMismatchError,
  UndefinedVariableError,
  UnknownParameterError,
  type PipeErrorData,
} from './error-classes.js';
