/**
 * ExpressionsMixin: Binary and Unary Expressions
 *
 * Handles arithmetic, comparison, and logical operators.
 * Provides evaluation for binary operations, unary operations, and grouped expressions.
 *
 * Error Handling:
 * - Non-numeric arithmetic operands throw TypeMismatchError
 * - `/` and `%` by zero throw DivisionByZeroError
 * - Nested expression evaluation errors are propagated
 *
 * @internal
 */

import type {
  ArithmeticOp,
  BinaryExprNode,
  ComparisonOp,
  GroupedNode,
  SourceLocation,
  UnaryExprNode,
} from '../../../../types.js';
import { DivisionByZeroError, TypeMismatchError } from '../../../../types.js';
import {
  compareValues,
  inferType,
  toBoolean,
  toDisplayString,
  toNumber,
  valuesEqual,
  type PipeValue,
} from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { VariablesLayer } from './variables.js';

function requireNumber(
  value: PipeValue,
  operation: string,
  location?: SourceLocation
): number {
  const number = toNumber(value);
  if (number === undefined) {
    throw new TypeMismatchError(
      operation,
      'number',
      inferType(value),
      location
    );
  }
  return number;
}

/**
 * ExpressionsMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: evaluateExpression(), evaluatePipelineValue()
 *
 * Methods added:
 * - evaluateBinaryExpr(node) -> PipeValue
 * - evaluateArithmetic(op, left, right, location?) -> PipeValue
 * - evaluateComparison(op, left, right) -> boolean
 * - evaluateUnaryExpr(node) -> PipeValue
 * - evaluateGrouped(node) -> PipeValue
 */
function createExpressionsMixin(Base: EvaluatorConstructor<VariablesLayer>) {
  return class ExpressionsEvaluator extends Base {
    /**
     * Evaluate binary expression: left op right.
     * Logical operators short-circuit.
     */
    evaluateBinaryExpr(node: BinaryExprNode): PipeValue {
      const { op } = node;

      if (op === '-or') {
        if (toBoolean(this.evaluateExpression(node.left))) return true;
        return toBoolean(this.evaluateExpression(node.right));
      }

      if (op === '-and') {
        if (!toBoolean(this.evaluateExpression(node.left))) return false;
        return toBoolean(this.evaluateExpression(node.right));
      }

      const left = this.evaluateExpression(node.left);
      const right = this.evaluateExpression(node.right);

      switch (op) {
        case '-eq':
        case '-ne':
        case '-gt':
        case '-lt':
        case '-ge':
        case '-le':
          return this.evaluateComparison(op, left, right);
        default:
          return this.evaluateArithmetic(
            op,
            left,
            right,
            this.getNodeLocation(node)
          );
      }
    }

    /**
     * `+` joins display forms when either side is a string and appends
     * to a list on the left. Everything else is numeric.
     */
    evaluateArithmetic(
      op: ArithmeticOp,
      left: PipeValue,
      right: PipeValue,
      location?: SourceLocation
    ): PipeValue {
      if (op === '+') {
        if (Array.isArray(left)) {
          return Array.isArray(right) ? [...left, ...right] : [...left, right];
        }
        if (typeof left === 'string' || typeof right === 'string') {
          return toDisplayString(left) + toDisplayString(right);
        }
      }

      const operation = `operator ${op}`;
      const a = requireNumber(left, operation, location);
      const b = requireNumber(right, operation, location);

      switch (op) {
        case '+':
          return a + b;
        case '-':
          return a - b;
        case '*':
          return a * b;
        case '/':
          if (b === 0) throw new DivisionByZeroError('/', location);
          return a / b;
        case '%':
          if (b === 0) throw new DivisionByZeroError('%', location);
          return a % b;
      }
    }

    evaluateComparison(
      op: ComparisonOp,
      left: PipeValue,
      right: PipeValue
    ): boolean {
      switch (op) {
        case '-eq':
          return valuesEqual(left, right);
        case '-ne':
          return !valuesEqual(left, right);
        case '-gt':
          return compareValues(left, right) > 0;
        case '-lt':
          return compareValues(left, right) < 0;
        case '-ge':
          return compareValues(left, right) >= 0;
        case '-le':
          return compareValues(left, right) <= 0;
      }
    }

    evaluateUnaryExpr(node: UnaryExprNode): PipeValue {
      const value = this.evaluateExpression(node.operand);
      if (node.op === '!') {
        return !toBoolean(value);
      }
      return -requireNumber(value, 'unary -', this.getNodeLocation(node));
    }

    /** ( pipeline ) runs in the current frame */
    evaluateGrouped(node: GroupedNode): PipeValue {
      return this.evaluatePipelineValue(node.pipeline);
    }
  };
}

export const ExpressionsMixin = createExpressionsMixin;

export type ExpressionsLayer = InstanceType<ReturnType<typeof createExpressionsMixin>>;
