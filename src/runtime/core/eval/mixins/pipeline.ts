/**
 * PipelineMixin: Pipeline Execution
 *
 * Threads a collection of values through successive stages:
 * - A command stage runs once with the whole collection as input
 * - A block stage runs once per item with `$_` bound
 * - Any other expression after the first stage runs once per item
 *
 * The first stage seeds the collection. A leading command contributes
 * its output, a leading list is unrolled, and a leading block literal is
 * a value, not something to run.
 *
 * Error Handling:
 * - Any stage error aborts the whole pipeline; no partial output
 *
 * @internal
 */

import type { ExpressionNode, PipelineNode } from '../../../../types.js';
import { isBlock, type PipeValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { ClosuresLayer } from './closures.js';
import { ITEM_VARIABLE } from './closures.js';

/** One level of flattening for a stage's return value */
function toItems(value: PipeValue): PipeValue[] {
  return Array.isArray(value) ? [...value] : [value];
}

/** Collection to statement value: none, one, or a list */
export function collapse(items: PipeValue[]): PipeValue {
  if (items.length === 0) return null;
  if (items.length === 1) return items[0] ?? null;
  return items;
}

/**
 * PipelineMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: evaluateExpression()
 * - ClosuresMixin: evaluateCall(), executeBlock()
 *
 * Methods added:
 * - executePipeline(pipeline) -> PipeValue[]
 * - executeStage(stage, input, first) -> PipeValue[]
 * - evaluatePipelineValue(pipeline) -> PipeValue
 * - collectOutput(expr) -> PipeValue[]
 */
function createPipelineMixin(Base: EvaluatorConstructor<ClosuresLayer>) {
  return class PipelineEvaluator extends Base {
    executePipeline(pipeline: PipelineNode): PipeValue[] {
      let collection: PipeValue[] = [];
      pipeline.stages.forEach((stage, index) => {
        collection = this.executeStage(stage, collection, index === 0);
      });
      return collection;
    }

    executeStage(
      stage: ExpressionNode,
      input: PipeValue[],
      first: boolean
    ): PipeValue[] {
      if (stage.type === 'Call') {
        return toItems(this.evaluateCall(stage, input));
      }

      if (first) {
        return toItems(this.evaluateExpression(stage));
      }

      if (stage.type === 'BlockLiteral') {
        const block = this.evaluateBlockLiteral(stage);
        return input.map((item) => this.executeBlock(block, item));
      }

      // A variable holding a block also runs per item
      return input.map((item) =>
        this.ctx.scope.withFrame('block', () => {
          this.ctx.scope.declare(ITEM_VARIABLE, item);
          const value = this.evaluateExpression(stage);
          return isBlock(value) ? this.executeBlock(value, item) : value;
        })
      );
    }

    /**
     * Statement value of a pipeline. A lone non-command stage is a plain
     * expression, so `@(1)` stays a list and `{ }` stays a block.
     */
    override evaluatePipelineValue(pipeline: PipelineNode): PipeValue {
      const [only] = pipeline.stages;
      if (pipeline.stages.length === 1 && only) {
        return only.type === 'Call'
          ? this.evaluateCall(only)
          : this.evaluateExpression(only);
      }
      return collapse(this.executePipeline(pipeline));
    }

    /** Output items of an expression used inside a list literal */
    override collectOutput(expr: ExpressionNode): PipeValue[] {
      if (expr.type === 'Grouped') {
        return this.executePipeline(expr.pipeline);
      }
      return toItems(this.evaluateExpression(expr));
    }
  };
}

export const PipelineMixin = createPipelineMixin;

export type PipelineLayer = InstanceType<ReturnType<typeof createPipelineMixin>>;
