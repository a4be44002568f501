/**
 * Script Execution
 *
 * Public API for executing scripts.
 * Provides full execution, step-by-step execution and line-at-a-time
 * evaluation against a long-lived context.
 */

import type { ScriptNode, StatementNode } from '../../types.js';
import { ReturnOutsideFunctionError } from '../../types.js';
import { parse } from '../../parser/index.js';
import { executeStatement } from './eval/index.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';
import type { PipeValue } from './values.js';

/**
 * Execute a parsed script.
 *
 * @param script The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @returns The final value and the global variables
 */
export function execute(
  script: ScriptNode,
  context: RuntimeContext
): ExecutionResult {
  const stepper = createStepper(script, context);
  while (!stepper.done) {
    stepper.step();
  }
  return stepper.getResult();
}

/**
 * Run statements in order against the context's scope stack.
 * @returns The value of the last statement, null when there are none
 */
export function evaluateProgram(
  statements: readonly StatementNode[],
  context: RuntimeContext
): PipeValue {
  const stepper = stepperFor(statements, context);
  while (!stepper.done) {
    stepper.step();
  }
  return stepper.getResult().value;
}

/**
 * Evaluate one line of input. Variables and functions persist in the
 * context between calls.
 *
 * @example
 * const ctx = createRuntimeContext();
 * evaluateLine('$x = 5', ctx);
 * evaluateLine('$x * 2', ctx); // 10
 */
export function evaluateLine(
  line: string | readonly StatementNode[],
  context: RuntimeContext
): PipeValue {
  const statements = typeof line === 'string' ? parse(line).statements : line;
  return evaluateProgram(statements, context);
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Allows the caller to control the execution loop and inspect state between steps.
 *
 * @param script The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 */
export function createStepper(
  script: ScriptNode,
  context: RuntimeContext
): ExecutionStepper {
  return stepperFor(script.statements, context);
}

function stepperFor(
  statements: readonly StatementNode[],
  context: RuntimeContext
): ExecutionStepper {
  const total = statements.length;
  let index = 0;
  let lastValue: PipeValue = null;
  let isDone = total === 0;

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    step(): StepResult {
      const stmt = statements[index];
      if (isDone || !stmt) {
        isDone = true;
        return { value: lastValue, done: true, index, total };
      }

      const startTime = Date.now();
      context.observability.onStepStart?.({ index, total });

      try {
        const completion = executeStatement(stmt, context);
        if (completion.kind === 'return') {
          throw new ReturnOutsideFunctionError(completion.location);
        }
        lastValue = completion.value;
      } catch (error) {
        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });
        throw error;
      }

      context.observability.onStepEnd?.({
        index,
        total,
        value: lastValue,
        durationMs: Date.now() - startTime,
      });

      index++;
      isDone = index >= total;
      return { value: lastValue, done: isDone, index: index - 1, total };
    },

    getResult(): ExecutionResult {
      return {
        value: lastValue,
        variables: context.scope.globals(),
      };
    },
  };
}
