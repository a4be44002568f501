/**
 * VariablesMixin: Variable Access and Mutation
 *
 * Handles variable lookup and assignment through the scope stack, plus
 * member and index access on the values variables hold.
 *
 * Error Handling:
 * - Undefined variables throw UndefinedVariableError
 * - Missing properties and non-record bases throw InvalidPropertyAccessError
 * - Indexing an unindexable value throws TypeMismatchError
 *
 * @internal
 */

import type {
  IndexAccessNode,
  MemberAccessNode,
  SourceLocation,
  VariableNode,
} from '../../../../types.js';
import {
  InvalidPropertyAccessError,
  TypeMismatchError,
  UndefinedVariableError,
} from '../../../../types.js';
import {
  inferType,
  isRecord,
  recordGet,
  toDisplayString,
  toNumber,
  type PipeValue,
} from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import type { LiteralsLayer } from './literals.js';

/**
 * VariablesMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: ctx, evaluateExpression(), getNodeLocation()
 *
 * Methods added:
 * - evaluateVariable(node) -> PipeValue
 * - setVariable(name, value) -> void
 * - evaluateMemberAccess(node) -> PipeValue
 * - accessMember(value, member, location?) -> PipeValue
 * - evaluateIndexAccess(node) -> PipeValue
 */
function createVariablesMixin(Base: EvaluatorConstructor<LiteralsLayer>) {
  return class VariablesEvaluator extends Base {
    evaluateVariable(node: VariableNode): PipeValue {
      const value = this.ctx.scope.read(node.name);
      if (value === undefined) {
        throw new UndefinedVariableError(
          node.name,
          this.getNodeLocation(node)
        );
      }
      return value;
    }

    /** Name may carry a global:, local: or script: qualifier */
    setVariable(name: string, value: PipeValue): void {
      this.ctx.scope.write(name, value);
    }

    evaluateMemberAccess(node: MemberAccessNode): PipeValue {
      const target = this.evaluateExpression(node.object);
      return this.accessMember(target, node.member, this.getNodeLocation(node));
    }

    /**
     * Records resolve members case-insensitively. Lists expose Count and
     * Length and otherwise project the member over their records;
     * strings expose Length.
     */
    accessMember(
      value: PipeValue,
      member: string,
      location?: SourceLocation
    ): PipeValue {
      const lower = member.toLowerCase();

      if (isRecord(value)) {
        const found = recordGet(value, member);
        if (found === undefined) {
          throw new InvalidPropertyAccessError(
            member,
            'missing',
            'record',
            location
          );
        }
        return found;
      }

      if (Array.isArray(value)) {
        if (lower === 'count' || lower === 'length') return value.length;
        return value.map((item) => {
          if (!isRecord(item)) {
            throw new InvalidPropertyAccessError(
              member,
              'not-record',
              inferType(item),
              location
            );
          }
          return this.accessMember(item, member, location);
        });
      }

      if (typeof value === 'string' && lower === 'length') {
        return value.length;
      }

      throw new InvalidPropertyAccessError(
        member,
        'not-record',
        inferType(value),
        location
      );
    }

    /**
     * Lists and strings take numeric indices (negative counts from the
     * end); records take keys. Out-of-range or missing yields null.
     */
    evaluateIndexAccess(node: IndexAccessNode): PipeValue {
      const target = this.evaluateExpression(node.object);
      const index = this.evaluateExpression(node.index);
      const location = this.getNodeLocation(node);

      if (isRecord(target)) {
        return recordGet(target, toDisplayString(index)) ?? null;
      }

      if (Array.isArray(target) || typeof target === 'string') {
        const position = toNumber(index);
        if (position === undefined) {
          throw new TypeMismatchError(
            'index',
            'number',
            inferType(index),
            location
          );
        }
        const length = target.length;
        const resolved = Math.trunc(position < 0 ? length + position : position);
        if (resolved < 0 || resolved >= length) return null;
        return Array.isArray(target)
          ? (target[resolved] ?? null)
          : target.charAt(resolved);
      }

      throw new TypeMismatchError(
        'index',
        'list, string or record',
        inferType(target),
        location
      );
    }
  };
}

export const VariablesMixin = createVariablesMixin;

export type VariablesLayer = InstanceType<ReturnType<typeof createVariablesMixin>>;
