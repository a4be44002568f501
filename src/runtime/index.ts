/**
 * pipesh Runtime
 *
 * Public API for executing pipesh scripts.
 *
 * Module Structure:
 * - core/: Execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - values.ts: PipeValue, records and value utilities
 *   - scope.ts: Scope stack and variable qualifiers
 *   - stages.ts: Stage contract and registry
 *   - context.ts: Runtime context factory
 *   - execute.ts: Program and line execution, stepping
 *   - eval/: Mixin-composed evaluator (internal)
 * - ext/: Built-in stages
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  FunctionCallEvent,
  FunctionReturnEvent,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StageInvokeEvent,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

export { DEFAULT_MAX_CALL_DEPTH } from './core/types.js';

// ============================================================
// VALUE TYPES AND UTILITIES
// ============================================================

export type {
  PipeBlock,
  PipeCallable,
  PipeFunction,
  PipeRecord,
  PipeTypeName,
  PipeValue,
  RecordEntry,
} from './core/values.js';

export {
  compareValues,
  createRecord,
  formatNumber,
  getProperty,
  inferType,
  isBlock,
  isCallable,
  isFunction,
  isList,
  isRecord,
  recordFromObject,
  recordGet,
  recordKeys,
  recordToObject,
  toBoolean,
  toDisplayString,
  toNumber,
  valuesEqual,
} from './core/values.js';

// ============================================================
// SCOPE
// ============================================================

export {
  parseVariableName,
  ScopeStack,
  type FrameKind,
  type ScopeQualifier,
} from './core/scope.js';

// ============================================================
// STAGES
// ============================================================

export type {
  RawNamedArg,
  StageDefinition,
  StageInvocation,
  StageParam,
  StageRegistry,
  StageRuntime,
} from './core/stages.js';

export {
  bindNamedArgs,
  createStageRegistry,
  parseSwitch,
} from './core/stages.js';

export { BUILTIN_STAGES } from './ext/builtins.js';

// ============================================================
// CONTEXT AND EXECUTION
// ============================================================

export { createRuntimeContext } from './core/context.js';
export {
  createStepper,
  evaluateLine,
  evaluateProgram,
  execute,
} from './core/execute.js';
export {
  collapse,
  evaluateExpression,
  executeBlock,
  executePipeline,
  executeStatement,
  type Completion,
} from './core/eval/index.js';
