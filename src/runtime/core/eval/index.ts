/**
 * Evaluation Public API
 *
 * Functional wrappers around the cached Evaluator for each context.
 *
 * @internal
 */

import type {
  ExpressionNode,
  PipelineNode,
  StatementNode,
} from '../../../types.js';
import type { PipeBlock, PipeValue } from '../values.js';
import type { RuntimeContext } from '../types.js';
import { getEvaluator } from './evaluator.js';
import type { Completion } from './types.js';

export type { Completion } from './types.js';
export { collapse } from './mixins/pipeline.js';

/**
 * Evaluate an expression and return its value.
 */
export function evaluateExpression(
  expr: ExpressionNode,
  ctx: RuntimeContext
): PipeValue {
  return getEvaluator(ctx).evaluateExpression(expr);
}

/**
 * Execute a statement. A `return` outside any function comes back as
 * a 'return' completion for the caller to reject.
 */
export function executeStatement(
  stmt: StatementNode,
  ctx: RuntimeContext
): Completion {
  return getEvaluator(ctx).executeStatement(stmt);
}

/**
 * Run a pipeline and return its final collection.
 */
export function executePipeline(
  pipeline: PipelineNode,
  ctx: RuntimeContext
): PipeValue[] {
  return getEvaluator(ctx).executePipeline(pipeline);
}

/**
 * Run a deferred block with `$_` bound to input.
 */
export function executeBlock(
  block: PipeBlock,
  input: PipeValue,
  ctx: RuntimeContext
): PipeValue {
  return getEvaluator(ctx).executeBlock(block, input);
}
