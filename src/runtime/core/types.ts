/**
 * Runtime Types
 *
 * Context, options and callback types for script execution.
 * These types are the primary interface for host applications.
 */

import type { SourceLocation } from '../../types.js';
import type { ScopeStack } from './scope.js';
import type { StageDefinition, StageRegistry } from './stages.js';
import type { PipeValue } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called when Write-Host runs */
  onLog: (value: PipeValue) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called before a user function runs */
  onFunctionCall?: (event: FunctionCallEvent) => void;
  /** Called after a user function returns */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called before a registered stage runs */
  onStageInvoke?: (event: StageInvokeEvent) => void;
  /** Called when an error escapes a top-level statement */
  onError?: (event: ErrorEvent) => void;
}

export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

export interface StepEndEvent {
  index: number;
  total: number;
  /** Value produced by the statement */
  value: PipeValue;
  durationMs: number;
}

export interface FunctionCallEvent {
  name: string;
  args: PipeValue[];
  location?: SourceLocation | undefined;
}

export interface FunctionReturnEvent {
  name: string;
  value: PipeValue;
  durationMs: number;
}

export interface StageInvokeEvent {
  name: string;
  /** Number of items in the input collection */
  inputCount: number;
  args: PipeValue[];
}

export interface ErrorEvent {
  error: Error;
  /** Statement index where the error occurred (if available) */
  index?: number;
}

/** Runtime context: the live scope stack plus host-supplied services */
export interface RuntimeContext {
  readonly scope: ScopeStack;
  readonly stages: StageRegistry;
  readonly callbacks: RuntimeCallbacks;
  readonly observability: ObservabilityCallbacks;
  /** Maximum nesting of user function calls */
  readonly maxCallDepth: number;
  /** Current nesting of user function calls */
  callDepth: number;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Initial global variables */
  variables?: Record<string, PipeValue>;
  /** Extra stages; a name matching a built-in replaces it */
  stages?: StageDefinition[];
  /** Replace the built-in stage registry entirely */
  registry?: StageRegistry;
  callbacks?: Partial<RuntimeCallbacks>;
  observability?: ObservabilityCallbacks;
  /** Defaults to DEFAULT_MAX_CALL_DEPTH */
  maxCallDepth?: number;
}

/** Result of script execution */
export interface ExecutionResult {
  /** Value of the final top-level statement */
  value: PipeValue;
  /** Global variables after execution */
  variables: Record<string, PipeValue>;
}

export const DEFAULT_MAX_CALL_DEPTH = 200;

/** Result of one stepper step */
export interface StepResult {
  /** Value of the statement just executed */
  value: PipeValue;
  /** True once every statement has run */
  done: boolean;
  /** Index of the statement just executed */
  index: number;
  total: number;
}

/** Step-by-step execution; the host drives the loop */
export interface ExecutionStepper {
  readonly done: boolean;
  /** Index of the next statement */
  readonly index: number;
  readonly total: number;
  readonly context: RuntimeContext;
  step(): StepResult;
  getResult(): ExecutionResult;
}
