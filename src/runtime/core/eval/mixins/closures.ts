/**
 * ClosuresMixin: Function, Block and Stage Invocation
 *
 * Handles all callable operations:
 * - Call resolution: user function, then registered stage, then not found
 * - User function calls with parameter binding in a fresh frame
 * - Deferred block execution with `$_` bound
 * - Registered stage invocation through the stage contract
 *
 * Error Handling:
 * - Unresolved names throw CommandNotFoundError
 * - Unknown named arguments throw UnknownParameterError
 * - Nesting past maxCallDepth throws CallDepthExceededError
 * - Frames are popped on every exit path
 *
 * @internal
 */

import type { CallNode, SourceLocation } from '../../../../types.js';
import {
  CallDepthExceededError,
  CommandNotFoundError,
  UnknownParameterError,
} from '../../../../types.js';
import {
  bindNamedArgs,
  type RawNamedArg,
  type StageDefinition,
} from '../../stages.js';
import {
  isFunction,
  type PipeBlock,
  type PipeFunction,
  type PipeValue,
} from '../../values.js';
import type { CallTarget, EvaluatorConstructor } from '../types.js';
import type { ExpressionsLayer } from './expressions.js';

/** Reserved names bound in every function frame */
const ARGS_VARIABLE = 'args';
const INPUT_VARIABLE = 'input';

/** Implicit input binding inside deferred blocks */
export const ITEM_VARIABLE = '_';

/**
 * ClosuresMixin implementation.
 *
 * Depends on:
 * - EvaluatorBase: ctx, evaluateExpression(), executeBody()
 *
 * Methods added:
 * - resolveCallTarget(name) -> CallTarget
 * - evaluateCall(node, input?) -> PipeValue
 * - evaluateCallArgs(node) -> { args, named }
 * - callFunction(fn, args, named, input, location?) -> PipeValue
 * - bindParameters(fn, args, named, location?) -> void (helper)
 * - executeBlock(block, input) -> PipeValue
 * - invokeStage(stage, input, args, named, location?) -> PipeValue
 */
function createClosuresMixin(Base: EvaluatorConstructor<ExpressionsLayer>) {
  return class ClosuresEvaluator extends Base {
    /** User functions in scope shadow registered stages */
    resolveCallTarget(name: string): CallTarget {
      const bound = this.ctx.scope.read(name);
      if (bound !== undefined && isFunction(bound)) {
        return { kind: 'function', fn: bound };
      }
      const stage = this.ctx.stages.resolve(name);
      if (stage) {
        return { kind: 'stage', stage };
      }
      return { kind: 'not-found' };
    }

    /**
     * Evaluate a command-shaped call. Outside a pipeline the input
     * collection is empty.
     */
    evaluateCall(node: CallNode, input: PipeValue[] = []): PipeValue {
      const location = this.getNodeLocation(node);
      const target = this.resolveCallTarget(node.name);
      if (target.kind === 'not-found') {
        throw new CommandNotFoundError(node.name, location);
      }

      // Arguments are evaluated in the caller's frame
      const { args, named } = this.evaluateCallArgs(node);

      if (target.kind === 'function') {
        return this.callFunction(target.fn, args, named, input, location);
      }
      return this.invokeStage(target.stage, input, args, named, location);
    }

    evaluateCallArgs(node: CallNode): {
      args: PipeValue[];
      named: RawNamedArg[];
    } {
      const args = node.args.map((arg) => this.evaluateExpression(arg));
      const named = node.namedArgs.map(
        (arg): RawNamedArg =>
          arg.value === null
            ? { kind: 'switch', name: arg.name }
            : { kind: 'value', name: arg.name, value: this.evaluateExpression(arg.value) }
      );
      return { args, named };
    }

    /**
     * Run a user function in a new frame. A `return` completion ends the
     * body early; otherwise the last statement's value is the result.
     */
    callFunction(
      fn: PipeFunction,
      args: PipeValue[],
      named: RawNamedArg[],
      input: PipeValue[],
      location?: SourceLocation
    ): PipeValue {
      if (this.ctx.callDepth >= this.ctx.maxCallDepth) {
        throw new CallDepthExceededError(
          fn.name,
          this.ctx.maxCallDepth,
          location
        );
      }

      this.ctx.observability.onFunctionCall?.({ name: fn.name, args, location });
      const startTime = Date.now();

      this.ctx.callDepth++;
      let value: PipeValue;
      try {
        value = this.ctx.scope.withFrame('function', () => {
          this.ctx.scope.declare(INPUT_VARIABLE, input);
          this.bindParameters(fn, args, named, location);
          return this.executeBody(fn.body).value;
        });
      } finally {
        this.ctx.callDepth--;
      }

      this.ctx.observability.onFunctionReturn?.({
        name: fn.name,
        value,
        durationMs: Date.now() - startTime,
      });
      return value;
    }

    /**
     * Named arguments bind first; positional arguments fill the rest in
     * declaration order. Defaults run in the callee frame, after the
     * parameters before them are bound.
     */
    bindParameters(
      fn: PipeFunction,
      args: PipeValue[],
      named: RawNamedArg[],
      location?: SourceLocation
    ): void {
      const namedValues = new Map<string, PipeValue>();
      for (const arg of named) {
        const key = arg.name.toLowerCase();
        if (!fn.params.some((param) => param.name.toLowerCase() === key)) {
          throw new UnknownParameterError(fn.name, arg.name, location);
        }
        namedValues.set(key, arg.kind === 'switch' ? true : arg.value);
      }

      let next = 0;
      const scope = this.ctx.scope;
      const positional = (): PipeValue | undefined =>
        next < args.length ? args[next++] : undefined;

      // $args first so defaults may read it; extras are filled in below
      scope.declare(ARGS_VARIABLE, []);

      for (const param of fn.params) {
        const fromName = namedValues.get(param.name.toLowerCase());
        if (fromName !== undefined) {
          scope.declare(param.name, fromName);
          continue;
        }
        const fromPosition = positional();
        if (fromPosition !== undefined) {
          scope.declare(param.name, fromPosition);
          continue;
        }
        scope.declare(
          param.name,
          param.defaultValue ? this.evaluateExpression(param.defaultValue) : null
        );
      }

      scope.declare(ARGS_VARIABLE, args.slice(next));
    }

    /**
     * Run a deferred block once with `$_` bound to input. The block sees
     * the live scope stack; its own frame is popped afterwards.
     */
    executeBlock(block: PipeBlock, input: PipeValue): PipeValue {
      return this.ctx.scope.withFrame('block', () => {
        this.ctx.scope.declare(ITEM_VARIABLE, input);
        return this.executeBody(block.body).value;
      });
    }

    /** Whole collection in, one value out */
    invokeStage(
      stage: StageDefinition,
      input: PipeValue[],
      args: PipeValue[],
      named: RawNamedArg[],
      location?: SourceLocation
    ): PipeValue {
      const bound = bindNamedArgs(stage, named, location);

      this.ctx.observability.onStageInvoke?.({
        name: stage.name,
        inputCount: input.length,
        args,
      });

      return stage.fn({
        name: stage.name,
        input,
        args,
        named: bound,
        location,
        runtime: {
          executeBlock: (block, item) => this.executeBlock(block, item),
          log: (value) => this.ctx.callbacks.onLog(value),
        },
      });
    }
  };
}

export const ClosuresMixin = createClosuresMixin;

export type ClosuresLayer = InstanceType<ReturnType<typeof createClosuresMixin>>;
