/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides context access and the upward-call stubs that later mixins
 * override.
 *
 * @internal
 */

import type {
  ASTNode,
  ExpressionNode,
  PipelineNode,
  SourceLocation,
  StatementNode,
} from '../../../types.js';
import type { RuntimeContext } from '../types.js';
import type { PipeValue } from '../values.js';
import type { Completion } from './types.js';

/**
 * Base class for the evaluator.
 * Members are public so composed classes can be emitted in declarations.
 */
export class EvaluatorBase {
  constructor(public readonly ctx: RuntimeContext) {}

  /** Source location of an AST node, for error reporting */
  getNodeLocation(node?: ASTNode): SourceLocation | undefined {
    return node?.span.start;
  }

  /**
   * Evaluate any expression node.
   * NOTE: Stub - CoreMixin provides the dispatch.
   */
  evaluateExpression(_expr: ExpressionNode): PipeValue {
    throw new Error(
      'evaluateExpression requires full Evaluator composition with CoreMixin'
    );
  }

  /**
   * Run a pipeline and collapse its output to one value.
   * NOTE: Stub - PipelineMixin provides the implementation.
   */
  evaluatePipelineValue(_pipeline: PipelineNode): PipeValue {
    throw new Error(
      'evaluatePipelineValue requires full Evaluator composition with PipelineMixin'
    );
  }

  /**
   * Evaluate an expression as pipeline output items.
   * NOTE: Stub - PipelineMixin provides the implementation.
   */
  collectOutput(_expr: ExpressionNode): PipeValue[] {
    throw new Error(
      'collectOutput requires full Evaluator composition with PipelineMixin'
    );
  }

  /**
   * Execute statements in the current frame.
   * NOTE: Stub - ControlFlowMixin provides the implementation.
   */
  executeBody(_body: readonly StatementNode[]): Completion {
    throw new Error(
      'executeBody requires full Evaluator composition with ControlFlowMixin'
    );
  }
}
