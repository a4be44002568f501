/**
 * Test utilities for pipesh runtime tests
 */

import {
  createRuntimeContext,
  createStepper,
  execute,
  parse,
  isRecord,
  recordToObject,
  type ExecutionResult,
  type ObservabilityCallbacks,
  type PipeValue,
  type RuntimeOptions,
  type StageDefinition,
  type StageInvocation,
  type StepResult,
} from '../../src/index.js';

/** Shared setup for all execution modes */
function setup(source: string, options: RuntimeOptions = {}) {
  return { ast: parse(source), ctx: createRuntimeContext(options) };
}

/** Execute a script and return the final value */
export function run(source: string, options: RuntimeOptions = {}): PipeValue {
  const { ast, ctx } = setup(source, options);
  return execute(ast, ctx).value;
}

/** Execute and return full result with variables */
export function runFull(
  source: string,
  options: RuntimeOptions = {}
): ExecutionResult {
  const { ast, ctx } = setup(source, options);
  return execute(ast, ctx);
}

/** Execute using stepper and return all step results */
export function runStepped(
  source: string,
  options: RuntimeOptions = {}
): StepResult[] {
  const { ast, ctx } = setup(source, options);
  const stepper = createStepper(ast, ctx);
  const results: StepResult[] = [];

  while (!stepper.done) {
    results.push(stepper.step());
  }

  return results;
}

/** Narrow a result to a list, failing the test otherwise */
export function asList(value: PipeValue): PipeValue[] {
  if (!Array.isArray(value)) {
    throw new Error(`Expected a list, got ${JSON.stringify(value)}`);
  }
  return value;
}

/** Narrow a result to a record as a plain object */
export function asObject(value: PipeValue): Record<string, PipeValue> {
  if (!isRecord(value)) {
    throw new Error(`Expected a record, got ${JSON.stringify(value)}`);
  }
  return recordToObject(value);
}

/** Collect values sent to onLog */
export function createLogCollector(): {
  logs: PipeValue[];
  options: RuntimeOptions;
} {
  const logs: PipeValue[] = [];
  return {
    logs,
    options: { callbacks: { onLog: (value) => logs.push(value) } },
  };
}

/** A stage that records each invocation and returns a fixed value */
export function mockStage(
  name: string,
  returnValue: PipeValue = null
): StageDefinition & { calls: StageInvocation[] } {
  const calls: StageInvocation[] = [];
  return {
    name,
    description: `mock ${name}`,
    params: [
      { name: 'Label', type: 'value' },
      { name: 'Force', type: 'switch' },
    ],
    fn: (invocation) => {
      calls.push(invocation);
      return returnValue;
    },
    calls,
  };
}

/** Event collector for observability testing */
export interface CollectedEvents {
  stepStart: { index: number; total: number }[];
  stepEnd: {
    index: number;
    total: number;
    value: PipeValue;
    durationMs: number;
  }[];
  functionCall: { name: string; args: PipeValue[] }[];
  functionReturn: { name: string; value: PipeValue; durationMs: number }[];
  stageInvoke: { name: string; inputCount: number; args: PipeValue[] }[];
  error: { error: Error; index?: number | undefined }[];
}

/** Create an event collector for observability callbacks */
export function createEventCollector(): {
  events: CollectedEvents;
  callbacks: ObservabilityCallbacks;
} {
  const events: CollectedEvents = {
    stepStart: [],
    stepEnd: [],
    functionCall: [],
    functionReturn: [],
    stageInvoke: [],
    error: [],
  };

  const callbacks: ObservabilityCallbacks = {
    onStepStart: (e) => events.stepStart.push({ index: e.index, total: e.total }),
    onStepEnd: (e) => events.stepEnd.push(e),
    onFunctionCall: (e) => events.functionCall.push({ name: e.name, args: e.args }),
    onFunctionReturn: (e) => events.functionReturn.push(e),
    onStageInvoke: (e) => events.stageInvoke.push(e),
    onError: (e) => events.error.push(e),
  };

  return { events, callbacks };
}
