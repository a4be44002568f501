/**
 * Built-in Stages
 *
 * Default stage registry contents. Every stage takes the whole input
 * collection and returns a list (flattened one level by the engine) or
 * a single value. Host applications add stages via RuntimeOptions.stages.
 *
 * @internal - Not part of public API
 */

import { InvalidArgumentError } from '../../types.js';
import type { StageDefinition, StageInvocation } from '../core/stages.js';
import {
  compareValues,
  createRecord,
  getProperty,
  isBlock,
  isRecord,
  toBoolean,
  toDisplayString,
  toNumber,
  valuesEqual,
  type PipeBlock,
  type PipeValue,
} from '../core/values.js';

// ============================================================
// ARGUMENT HELPERS
// ============================================================

/** Flatten list arguments one level */
function unroll(values: readonly PipeValue[]): PipeValue[] {
  const items: PipeValue[] = [];
  for (const value of values) {
    if (Array.isArray(value)) {
      for (const item of value) items.push(item);
    } else {
      items.push(value);
    }
  }
  return items;
}

/** Pipeline input, or the positional arguments when there is none */
function itemsOf(invocation: StageInvocation): PipeValue[] {
  return invocation.input.length > 0
    ? invocation.input
    : unroll(invocation.args);
}

/** Property names from a string, or from a list of them */
function propertyNames(value: PipeValue | undefined): string[] {
  if (value === undefined || value === null) return [];
  const values = Array.isArray(value) ? unroll(value) : [value];
  return values.map(toDisplayString).filter((name) => name !== '');
}

/** Positional string arguments, used as property names */
function positionalNames(invocation: StageInvocation): string[] {
  return unroll(invocation.args)
    .filter((arg): arg is string => typeof arg === 'string')
    .filter((name) => name !== '');
}

/** Block from a named parameter, else the first positional argument */
function blockArgument(
  invocation: StageInvocation,
  param: string
): PipeBlock | undefined {
  const named = invocation.named.get(param);
  if (named !== undefined) {
    if (!isBlock(named)) {
      throw new InvalidArgumentError(
        invocation.name,
        `-${param} expects a script block`,
        invocation.location
      );
    }
    return named;
  }
  const [first] = invocation.args;
  return first !== undefined && isBlock(first) ? first : undefined;
}

function countArgument(
  invocation: StageInvocation,
  param: string
): number | undefined {
  const value = invocation.named.get(param);
  if (value === undefined) return undefined;
  const count = toNumber(value);
  if (count === undefined || count < 0) {
    throw new InvalidArgumentError(
      invocation.name,
      `-${param} expects a non-negative number, got ${toDisplayString(value)}`,
      invocation.location
    );
  }
  return Math.trunc(count);
}

function switchArgument(invocation: StageInvocation, param: string): boolean {
  return invocation.named.get(param) === true;
}

function propertyValue(item: PipeValue, name: string): PipeValue {
  return getProperty(item, name) ?? null;
}

/** Nulls sort first; otherwise compareValues */
function sortCompare(a: PipeValue, b: PipeValue): number {
  if (a === null && b === null) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return compareValues(a, b);
}

// ============================================================
// STAGES
// ============================================================

const writeOutput: StageDefinition = {
  name: 'Write-Output',
  description: 'Pass the input through, or emit the arguments',
  params: [],
  fn: (invocation) => itemsOf(invocation),
};

const whereObject: StageDefinition = {
  name: 'Where-Object',
  description: 'Keep items matching a script block or property test',
  params: [
    { name: 'FilterScript', type: 'value' },
    { name: 'Property', type: 'value' },
    { name: 'Value', type: 'value' },
  ],
  fn: (invocation) => {
    const { input, runtime } = invocation;

    const block = blockArgument(invocation, 'filterscript');
    if (block) {
      return input.filter((item) =>
        toBoolean(runtime.executeBlock(block, item))
      );
    }

    const [property] = propertyNames(
      invocation.named.get('property') ?? positionalNames(invocation)
    );
    if (property === undefined) return input;

    const expected = invocation.named.get('value');
    return input.filter((item) => {
      const actual = propertyValue(item, property);
      return expected === undefined
        ? toBoolean(actual)
        : valuesEqual(actual, expected);
    });
  },
};

const forEachObject: StageDefinition = {
  name: 'ForEach-Object',
  description: 'Run a script block per item, or project one member',
  params: [
    { name: 'Process', type: 'value' },
    { name: 'MemberName', type: 'value' },
  ],
  fn: (invocation) => {
    const { input, runtime } = invocation;

    const block = blockArgument(invocation, 'process');
    if (block) {
      const results: PipeValue[] = [];
      for (const item of input) {
        const result = runtime.executeBlock(block, item);
        if (Array.isArray(result)) {
          for (const value of result) results.push(value);
        } else if (result !== null) {
          results.push(result);
        }
      }
      return results;
    }

    const [member] = propertyNames(
      invocation.named.get('membername') ?? positionalNames(invocation)
    );
    if (member === undefined) return input;
    return input.map((item) => propertyValue(item, member));
  },
};

const selectObject: StageDefinition = {
  name: 'Select-Object',
  description: 'Project record properties and take a slice of the items',
  params: [
    { name: 'Property', type: 'value' },
    { name: 'First', type: 'value' },
    { name: 'Last', type: 'value' },
    { name: 'Skip', type: 'value' },
  ],
  fn: (invocation) => {
    const properties = propertyNames(
      invocation.named.get('property') ?? positionalNames(invocation)
    );

    let items =
      properties.length === 0
        ? invocation.input
        : invocation.input.map((item) =>
            isRecord(item)
              ? createRecord(
                  properties.map((name) => [name, propertyValue(item, name)])
                )
              : item
          );

    const skip = countArgument(invocation, 'skip');
    if (skip !== undefined) items = items.slice(skip);

    const first = countArgument(invocation, 'first');
    if (first !== undefined) items = items.slice(0, first);

    const last = countArgument(invocation, 'last');
    if (last !== undefined) items = items.slice(Math.max(0, items.length - last));

    return items;
  },
};

const sortObject: StageDefinition = {
  name: 'Sort-Object',
  description: 'Sort items, or records by properties',
  params: [
    { name: 'Property', type: 'value' },
    { name: 'Descending', type: 'switch' },
  ],
  fn: (invocation) => {
    const hasInput = invocation.input.length > 0;
    let properties = propertyNames(invocation.named.get('property'));
    if (hasInput && properties.length === 0) {
      properties = positionalNames(invocation);
    }
    const direction = switchArgument(invocation, 'descending') ? -1 : 1;

    const compare = (a: PipeValue, b: PipeValue): number => {
      if (properties.length === 0) return sortCompare(a, b);
      for (const name of properties) {
        const order = sortCompare(propertyValue(a, name), propertyValue(b, name));
        if (order !== 0) return order;
      }
      return 0;
    };

    // Array.prototype.sort is stable
    return [...itemsOf(invocation)].sort((a, b) => direction * compare(a, b));
  },
};

const groupObject: StageDefinition = {
  name: 'Group-Object',
  description: 'Group items by property values',
  params: [
    { name: 'Property', type: 'value' },
    { name: 'NoElement', type: 'switch' },
    { name: 'AsHashTable', type: 'switch' },
  ],
  fn: (invocation) => {
    const hasInput = invocation.input.length > 0;
    let properties = propertyNames(invocation.named.get('property'));
    if (hasInput && properties.length === 0) {
      properties = positionalNames(invocation);
    }
    const noElement = switchArgument(invocation, 'noelement');

    const groups = new Map<string, PipeValue[]>();
    for (const item of itemsOf(invocation)) {
      const key =
        properties.length === 0
          ? toDisplayString(item)
          : properties
              .map((name) => toDisplayString(propertyValue(item, name)))
              .join(',');
      const group = groups.get(key);
      if (group) {
        group.push(item);
      } else {
        groups.set(key, [item]);
      }
    }

    const infos = [...groups.keys()]
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
      .map((key) => {
        const group = groups.get(key) ?? [];
        const fields: [string, PipeValue][] = [
          ['Name', key],
          ['Count', group.length],
        ];
        if (!noElement) fields.push(['Group', group]);
        return createRecord(fields);
      });

    if (switchArgument(invocation, 'ashashtable')) {
      return createRecord(
        infos.map((info) => [toDisplayString(propertyValue(info, 'Name')), info])
      );
    }
    return infos;
  },
};

const measureObject: StageDefinition = {
  name: 'Measure-Object',
  description: 'Count items and summarize their numeric values',
  params: [{ name: 'Property', type: 'value' }],
  fn: (invocation) => {
    const items = itemsOf(invocation);
    const [property] = propertyNames(
      invocation.named.get('property') ?? positionalNames(invocation)
    );
    const values =
      property === undefined
        ? items
        : items.map((item) => propertyValue(item, property));

    const numbers: number[] = [];
    for (const value of values) {
      const number = toNumber(value);
      if (number !== undefined) numbers.push(number);
    }

    const sum = numbers.reduce((total, n) => total + n, 0);
    const hasNumbers = numbers.length > 0;
    return createRecord([
      ['Count', items.length],
      ['Sum', sum],
      ['Average', hasNumbers ? sum / numbers.length : null],
      ['Minimum', hasNumbers ? numbers.reduce((a, b) => (b < a ? b : a)) : null],
      ['Maximum', hasNumbers ? numbers.reduce((a, b) => (b > a ? b : a)) : null],
    ]);
  },
};

const writeHost: StageDefinition = {
  name: 'Write-Host',
  description: 'Send display text to the host log',
  params: [],
  fn: (invocation) => {
    const parts =
      invocation.args.length > 0 ? unroll(invocation.args) : invocation.input;
    invocation.runtime.log(parts.map(toDisplayString).join(' '));
    return null;
  },
};

export const BUILTIN_STAGES: readonly StageDefinition[] = [
  writeOutput,
  whereObject,
  forEachObject,
  selectObject,
  sortObject,
  groupObject,
  measureObject,
  writeHost,
];
