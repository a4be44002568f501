/**
 * Stage Registry
 *
 * Contract between the pipeline engine and named commands. A stage
 * receives the whole input collection plus its arguments and returns
 * one value; the engine flattens a returned list one level.
 */

import type { SourceLocation } from '../../types.js';
import { InvalidArgumentError, UnknownParameterError } from '../../types.js';
import { toDisplayString, type PipeBlock, type PipeValue } from './values.js';

// ============================================================
// STAGE CONTRACT
// ============================================================

export interface StageParam {
  readonly name: string;
  /** Switches need no value; `-Name` alone means true */
  readonly type: 'value' | 'switch';
  readonly description?: string | undefined;
}

/** Engine services available to a running stage */
export interface StageRuntime {
  /** Run a deferred block with `$_` bound to input */
  executeBlock(block: PipeBlock, input: PipeValue): PipeValue;
  /** Send a value to the host's onLog callback */
  log(value: PipeValue): void;
}

export interface StageInvocation {
  readonly name: string;
  /** Current pipeline collection; empty when called outside a pipeline */
  readonly input: PipeValue[];
  readonly args: PipeValue[];
  /** Named arguments keyed by lowercased parameter name */
  readonly named: ReadonlyMap<string, PipeValue>;
  readonly location?: SourceLocation | undefined;
  readonly runtime: StageRuntime;
}

export interface StageDefinition {
  readonly name: string;
  readonly description: string;
  readonly params: readonly StageParam[];
  readonly fn: (invocation: StageInvocation) => PipeValue;
}

/**
 * Named argument as written at the call site. `-Name` alone is a
 * switch; `-Name expr` carries the evaluated value, which may be null.
 */
export type RawNamedArg =
  | { readonly kind: 'switch'; readonly name: string }
  | { readonly kind: 'value'; readonly name: string; readonly value: PipeValue };

// ============================================================
// REGISTRY
// ============================================================

export interface StageRegistry {
  /** Case-insensitive lookup */
  resolve(name: string): StageDefinition | undefined;
  register(definition: StageDefinition): void;
  /** Registered names in registration order */
  names(): string[];
}

class StageRegistryImpl implements StageRegistry {
  private readonly byName = new Map<string, StageDefinition>();

  resolve(name: string): StageDefinition | undefined {
    return this.byName.get(name.toLowerCase());
  }

  register(definition: StageDefinition): void {
    this.byName.set(definition.name.toLowerCase(), definition);
  }

  names(): string[] {
    return [...this.byName.values()].map((definition) => definition.name);
  }
}

export function createStageRegistry(
  definitions: Iterable<StageDefinition> = []
): StageRegistry {
  const registry = new StageRegistryImpl();
  for (const definition of definitions) {
    registry.register(definition);
  }
  return registry;
}

// ============================================================
// ARGUMENT BINDING
// ============================================================

const SWITCH_TRUE = new Set(['true', 't', '1', 'yes', 'y']);
const SWITCH_FALSE = new Set(['false', 'f', '0', 'no', 'n']);

/**
 * Interpret an explicit switch value.
 * @throws InvalidArgumentError for anything not boolean-like
 */
export function parseSwitch(
  stageName: string,
  paramName: string,
  value: PipeValue,
  location?: SourceLocation
): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number' || typeof value === 'string') {
    const text = String(value).trim().toLowerCase();
    if (SWITCH_TRUE.has(text)) return true;
    if (SWITCH_FALSE.has(text)) return false;
  }
  throw new InvalidArgumentError(
    stageName,
    `-${paramName} expects a switch value, got ${toDisplayString(value)}`,
    location
  );
}

/**
 * Validate named arguments against declared parameters.
 * Switch values become booleans; value parameters need a value.
 */
export function bindNamedArgs(
  definition: StageDefinition,
  namedArgs: readonly RawNamedArg[],
  location?: SourceLocation
): Map<string, PipeValue> {
  const bound = new Map<string, PipeValue>();

  for (const arg of namedArgs) {
    const key = arg.name.toLowerCase();
    const param = definition.params.find((p) => p.name.toLowerCase() === key);
    if (!param) {
      throw new UnknownParameterError(definition.name, arg.name, location);
    }

    if (param.type === 'switch') {
      bound.set(
        key,
        arg.kind === 'switch'
          ? true
          : parseSwitch(definition.name, param.name, arg.value, location)
      );
      continue;
    }

    if (arg.kind === 'switch') {
      throw new InvalidArgumentError(
        definition.name,
        `missing value for -${param.name}`,
        location
      );
    }
    bound.set(key, arg.value);
  }

  return bound;
}
