/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context for script execution.
 * Public API for host applications.
 */

import { BUILTIN_STAGES } from '../ext/builtins.js';
import { ScopeStack } from './scope.js';
import { createStageRegistry } from './stages.js';
import {
  DEFAULT_MAX_CALL_DEPTH,
  type RuntimeCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
} from './types.js';
import { toDisplayString } from './values.js';

const defaultCallbacks: RuntimeCallbacks = {
  onLog: (value) => {
    console.log(toDisplayString(value));
  },
};

/**
 * Create a runtime context for script execution.
 * The context owns one scope stack; reuse it across evaluateLine calls
 * to keep variables and functions between lines.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const scope = new ScopeStack();

  if (options.variables) {
    for (const [name, value] of Object.entries(options.variables)) {
      scope.write(`global:${name}`, value);
    }
  }

  // Custom stages can override built-ins
  const stages = options.registry ?? createStageRegistry(BUILTIN_STAGES);
  for (const definition of options.stages ?? []) {
    stages.register(definition);
  }

  const maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  if (!Number.isInteger(maxCallDepth) || maxCallDepth < 1) {
    throw new RangeError(
      `maxCallDepth must be a positive integer, got ${maxCallDepth}`
    );
  }

  return {
    scope,
    stages,
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
    maxCallDepth,
    callDepth: 0,
  };
}
