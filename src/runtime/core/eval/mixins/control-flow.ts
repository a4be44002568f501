/**
 * ControlFlowMixin: Statements and Bodies
 *
 * Handles statement execution:
 * - Conditionals (if / elseif / else)
 * - return, as a 'return' completion
 * - Assignment through the scope stack
 * - Function definition
 * - Statement bodies and $( ) subexpressions
 *
 * A body stops at the first 'return' completion and hands it outward.
 * Function calls and deferred blocks turn it back into a value.
 *
 * @internal
 */

import type {
  AssignmentNode,
  FunctionDefNode,
  IfNode,
  ReturnNode,
  StatementNode,
  SubExpressionNode,
} from '../../../../types.js';
import { toBoolean, type PipeFunction, type PipeValue } from '../../values.js';
import { normal, type Completion, type EvaluatorConstructor } from '../types.js';
import type { PipelineLayer } from './pipeline.js';

/**
 * ControlFlowMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: evaluateExpression(), evaluatePipelineValue()
 * - VariablesMixin: setVariable()
 *
 * Methods added:
 * - executeStatement(stmt) -> Completion
 * - executeBody(body) -> Completion
 * - executeIf(node) -> Completion
 * - executeReturn(node) -> Completion
 * - executeAssignment(node) -> Completion
 * - defineFunction(node) -> Completion
 * - evaluateSubExpression(node) -> PipeValue
 */
function createControlFlowMixin(Base: EvaluatorConstructor<PipelineLayer>) {
  return class ControlFlowEvaluator extends Base {
    executeStatement(stmt: StatementNode): Completion {
      switch (stmt.type) {
        case 'Pipeline':
          return normal(this.evaluatePipelineValue(stmt));
        case 'Assignment':
          return this.executeAssignment(stmt);
        case 'If':
          return this.executeIf(stmt);
        case 'Return':
          return this.executeReturn(stmt);
        case 'FunctionDef':
          return this.defineFunction(stmt);
      }
    }

    /**
     * Run statements in order. The value is the last statement's value,
     * null for an empty body.
     */
    override executeBody(body: readonly StatementNode[]): Completion {
      let last: Completion = normal(null);
      for (const stmt of body) {
        last = this.executeStatement(stmt);
        if (last.kind === 'return') return last;
      }
      return last;
    }

    /** Branches run in the current frame */
    executeIf(node: IfNode): Completion {
      if (toBoolean(this.evaluateExpression(node.condition))) {
        return this.executeBody(node.thenBody);
      }
      if (node.elseBody) {
        return this.executeBody(node.elseBody);
      }
      return normal(null);
    }

    executeReturn(node: ReturnNode): Completion {
      const value = node.value ? this.evaluatePipelineValue(node.value) : null;
      return { kind: 'return', value, location: this.getNodeLocation(node) };
    }

    /** Assignments produce no value */
    executeAssignment(node: AssignmentNode): Completion {
      const value = this.evaluatePipelineValue(node.value);
      this.setVariable(node.target, value);
      return normal(null);
    }

    /** Binds in the innermost frame, like a local */
    defineFunction(node: FunctionDefNode): Completion {
      const fn: PipeFunction = {
        __type: 'callable',
        kind: 'function',
        name: node.name,
        params: node.params,
        body: node.body,
      };
      this.ctx.scope.declare(node.name, fn);
      return normal(null);
    }

    /** $( statements ) in the current frame; a return ends it early */
    evaluateSubExpression(node: SubExpressionNode): PipeValue {
      return this.executeBody(node.statements).value;
    }
  };
}

export const ControlFlowMixin = createControlFlowMixin;

export type ControlFlowLayer = InstanceType<ReturnType<typeof createControlFlowMixin>>;
