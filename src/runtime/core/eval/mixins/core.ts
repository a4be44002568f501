/**
 * CoreMixin: Main Expression Dispatch
 *
 * Dispatches each expression node to the mixin that evaluates it.
 * This is the central coordination point that ties together all other mixins.
 *
 * @internal
 */

import type { ExpressionNode } from '../../../../types.js';
import type { PipeValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { ControlFlowLayer } from './control-flow.js';

/**
 * CoreMixin implementation.
 *
 * Depends on every other mixin; composed outermost.
 *
 * Methods added:
 * - evaluateExpression(expr) -> PipeValue
 */
function createCoreMixin(Base: EvaluatorConstructor<ControlFlowLayer>) {
  return class CoreEvaluator extends Base {
    override evaluateExpression(expr: ExpressionNode): PipeValue {
      switch (expr.type) {
        case 'Literal':
          return this.evaluateLiteral(expr);
        case 'StringInterpolation':
          return this.evaluateStringInterpolation(expr);
        case 'Variable':
          return this.evaluateVariable(expr);
        case 'BinaryExpr':
          return this.evaluateBinaryExpr(expr);
        case 'UnaryExpr':
          return this.evaluateUnaryExpr(expr);
        case 'MemberAccess':
          return this.evaluateMemberAccess(expr);
        case 'IndexAccess':
          return this.evaluateIndexAccess(expr);
        case 'RecordLiteral':
          return this.evaluateRecordLiteral(expr);
        case 'ListLiteral':
          return this.evaluateListLiteral(expr);
        case 'BlockLiteral':
          return this.evaluateBlockLiteral(expr);
        case 'Call':
          return this.evaluateCall(expr);
        case 'Grouped':
          return this.evaluateGrouped(expr);
        case 'SubExpression':
          return this.evaluateSubExpression(expr);
      }
    }
  };
}

export const CoreMixin = createCoreMixin;

export type CoreLayer = InstanceType<ReturnType<typeof createCoreMixin>>;
