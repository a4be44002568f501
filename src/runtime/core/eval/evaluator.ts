/**
 * Composed Evaluator
 *
 * The complete evaluator class composed from all mixins.
 * Uses WeakMap caching to reuse evaluator instances per RuntimeContext.
 *
 * Mixin composition order (bottom to top):
 * 1. EvaluatorBase - Context access and upward-call stubs
 * 2. LiteralsMixin - Strings, records, lists, blocks
 * 3. VariablesMixin - Variable access, member and index access
 * 4. ExpressionsMixin - Binary, unary, grouped expressions
 * 5. ClosuresMixin - Function, block and stage invocation
 * 6. PipelineMixin - Stage-by-stage collection threading
 * 7. ControlFlowMixin - Statements and bodies
 * 8. CoreMixin - Expression dispatch (outermost)
 *
 * Each mixin can call methods of the mixins below it; calls upward go
 * through the stubs on EvaluatorBase.
 *
 * @internal
 */

import { EvaluatorBase } from './base.js';
import { ClosuresMixin } from './mixins/closures.js';
import { ControlFlowMixin } from './mixins/control-flow.js';
import { CoreMixin } from './mixins/core.js';
import { ExpressionsMixin } from './mixins/expressions.js';
import { LiteralsMixin } from './mixins/literals.js';
import { PipelineMixin } from './mixins/pipeline.js';
import { VariablesMixin } from './mixins/variables.js';
import type { RuntimeContext } from '../types.js';

export const Evaluator = CoreMixin(
  ControlFlowMixin(
    PipelineMixin(
      ClosuresMixin(
        ExpressionsMixin(VariablesMixin(LiteralsMixin(EvaluatorBase)))
      )
    )
  )
);

// eslint-disable-next-line no-redeclare
export type Evaluator = InstanceType<typeof Evaluator>;

/**
 * Evaluator instances per context. Entries go away with the context.
 */
const evaluatorCache = new WeakMap<RuntimeContext, Evaluator>();

/**
 * Get or create the evaluator for a RuntimeContext.
 *
 * @internal
 */
export function getEvaluator(ctx: RuntimeContext): Evaluator {
  let evaluator = evaluatorCache.get(ctx);
  if (!evaluator) {
    evaluator = new Evaluator(ctx);
    evaluatorCache.set(ctx, evaluator);
  }
  return evaluator;
}
