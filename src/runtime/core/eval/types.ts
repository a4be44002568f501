/**
 * Evaluator Composition Types
 *
 * @internal
 */

import type { SourceLocation } from '../../../types.js';
import type { StageDefinition } from '../stages.js';
import type { PipeFunction, PipeValue } from '../values.js';
import type { EvaluatorBase } from './base.js';

/**
 * Constructor type accepted by every mixin.
 * TypeScript requires `any[]` rest args for mixin base constructors.
 */
export type EvaluatorConstructor<TBase extends EvaluatorBase = EvaluatorBase> =
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  new (...args: any[]) => TBase;

/**
 * Outcome of executing a statement.
 * 'return' travels outward through statement lists until a function
 * call or deferred block turns it back into a value.
 */
export type Completion =
  | { readonly kind: 'normal'; readonly value: PipeValue }
  | {
      readonly kind: 'return';
      readonly value: PipeValue;
      readonly location?: SourceLocation | undefined;
    };

export function normal(value: PipeValue): Completion {
  return { kind: 'normal', value };
}

/** Result of resolving a call name */
export type CallTarget =
  | { readonly kind: 'function'; readonly fn: PipeFunction }
  | { readonly kind: 'stage'; readonly stage: StageDefinition }
  | { readonly kind: 'not-found' };
