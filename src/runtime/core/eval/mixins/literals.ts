/**
 * LiteralsMixin: Strings, Records, Lists and Blocks
 *
 * Handles evaluation of literal values including:
 * - Constant literals
 * - String interpolation ($name and $( ) parts)
 * - Record literals, last duplicate key wins
 * - List literals, spreading the output of embedded commands
 * - Block literals, which capture their body without running it
 *
 * Error Handling:
 * - Errors from embedded expressions propagate unchanged
 *
 * @internal
 */

import type {
  BlockLiteralNode,
  ExpressionNode,
  ListLiteralNode,
  LiteralNode,
  RecordLiteralNode,
  StringInterpolationNode,
} from '../../../../types.js';
import {
  createRecord,
  toDisplayString,
  type PipeBlock,
  type PipeRecord,
  type PipeValue,
} from '../../values.js';
import type { EvaluatorBase } from '../base.js';
import type { EvaluatorConstructor } from '../types.js';

/** Elements whose output is spread into the enclosing list */
function producesOutput(expr: ExpressionNode): boolean {
  return (
    expr.type === 'Call' ||
    expr.type === 'Grouped' ||
    expr.type === 'SubExpression'
  );
}

/**
 * LiteralsMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: evaluateExpression(), collectOutput()
 *
 * Methods added:
 * - evaluateLiteral(node) -> PipeValue
 * - evaluateStringInterpolation(node) -> string
 * - evaluateRecordLiteral(node) -> PipeRecord
 * - evaluateListLiteral(node) -> PipeValue[]
 * - evaluateBlockLiteral(node) -> PipeBlock
 */
function createLiteralsMixin(Base: EvaluatorConstructor<EvaluatorBase>) {
  return class LiteralsEvaluator extends Base {
    evaluateLiteral(node: LiteralNode): PipeValue {
      return node.value;
    }

    /**
     * Concatenate literal text with the display form of each
     * interpolated part, in source order.
     */
    evaluateStringInterpolation(node: StringInterpolationNode): string {
      let result = '';
      for (const part of node.parts) {
        if (typeof part === 'string') {
          result += part;
        } else {
          result += toDisplayString(this.evaluateExpression(part.expression));
        }
      }
      return result;
    }

    /** Values evaluate left to right; createRecord keeps the last duplicate */
    evaluateRecordLiteral(node: RecordLiteralNode): PipeRecord {
      const entries: [string, PipeValue][] = [];
      for (const entry of node.entries) {
        entries.push([entry.key, this.evaluateExpression(entry.value)]);
      }
      return createRecord(entries);
    }

    /**
     * `@(1, 2)` holds two items. A command or grouped pipeline element
     * contributes each of its output items, so `@(Get-Items)` is flat.
     */
    evaluateListLiteral(node: ListLiteralNode): PipeValue[] {
      const items: PipeValue[] = [];
      for (const element of node.elements) {
        if (producesOutput(element)) {
          for (const item of this.collectOutput(element)) items.push(item);
        } else {
          items.push(this.evaluateExpression(element));
        }
      }
      return items;
    }

    evaluateBlockLiteral(node: BlockLiteralNode): PipeBlock {
      return { __type: 'callable', kind: 'block', body: node.body };
    }
  };
}

export const LiteralsMixin = createLiteralsMixin;

export type LiteralsLayer = InstanceType<ReturnType<typeof createLiteralsMixin>>;
