/**
 * Value model tests
 * Guards, conversions, display forms and comparison
 */

import { describe, expect, it } from 'vitest';
import {
  compareValues,
  createRecord,
  formatNumber,
  getProperty,
  inferType,
  isBlock,
  isCallable,
  isFunction,
  isList,
  isRecord,
  recordFromObject,
  recordGet,
  recordKeys,
  recordToObject,
  toBoolean,
  toDisplayString,
  toNumber,
  valuesEqual,
  type PipeBlock,
  type PipeFunction,
} from '../../src/index.js';

const block: PipeBlock = { __type: 'callable', kind: 'block', body: [] };
const fn: PipeFunction = {
  __type: 'callable',
  kind: 'function',
  name: 'Get-Thing',
  params: [],
  body: [],
};

describe('records', () => {
  it('looks up keys case-insensitively', () => {
    const record = createRecord([['Name', 'Ann']]);
    expect(recordGet(record, 'NAME')).toBe('Ann');
    expect(recordGet(record, 'missing')).toBeUndefined();
  });

  it('keeps the first spelling and position of a duplicate key', () => {
    const record = createRecord([
      ['a', 1],
      ['b', 2],
      ['A', 3],
    ]);
    expect(recordKeys(record)).toEqual(['a', 'b']);
    expect(recordToObject(record)).toEqual({ a: 3, b: 2 });
  });

  it('builds from a plain object', () => {
    expect(recordKeys(recordFromObject({ x: 1, y: null }))).toEqual(['x', 'y']);
  });

  it('reads properties only from records', () => {
    expect(getProperty(createRecord([['v', 1]]), 'V')).toBe(1);
    expect(getProperty('text', 'Length')).toBeUndefined();
  });
});

describe('guards and inferType', () => {
  it('names every kind', () => {
    expect(inferType(null)).toBe('null');
    expect(inferType(true)).toBe('boolean');
    expect(inferType(1)).toBe('number');
    expect(inferType('a')).toBe('string');
    expect(inferType([])).toBe('list');
    expect(inferType(createRecord())).toBe('record');
    expect(inferType(fn)).toBe('function');
    expect(inferType(block)).toBe('block');
  });

  it('tells callables apart', () => {
    expect(isCallable(block)).toBe(true);
    expect(isBlock(block)).toBe(true);
    expect(isFunction(block)).toBe(false);
    expect(isFunction(fn)).toBe(true);
    expect(isCallable(createRecord())).toBe(false);
    expect(isRecord(createRecord())).toBe(true);
    expect(isList([1])).toBe(true);
    expect(isRecord(null)).toBe(false);
  });
});

describe('toBoolean', () => {
  it('treats null, false, 0 and empty text as false', () => {
    expect([null, false, 0, ''].map(toBoolean)).toEqual([false, false, false, false]);
  });

  it('treats everything else as true', () => {
    expect([true, -1, '0', [], createRecord(), block].map(toBoolean)).toEqual([
      true,
      true,
      true,
      true,
      true,
      true,
    ]);
  });
});

describe('toNumber', () => {
  it('passes numbers and parses numeric text', () => {
    expect(toNumber(4)).toBe(4);
    expect(toNumber(' 2.5 ')).toBe(2.5);
  });

  it('returns undefined for anything else', () => {
    expect(toNumber('')).toBeUndefined();
    expect(toNumber('abc')).toBeUndefined();
    expect(toNumber(true)).toBeUndefined();
    expect(toNumber(null)).toBeUndefined();
  });
});

describe('toDisplayString', () => {
  it('renders scalars', () => {
    expect(toDisplayString(null)).toBe('');
    expect(toDisplayString(false)).toBe('False');
    expect(toDisplayString(2.5)).toBe('2.5');
    expect(formatNumber(-0)).toBe('0');
  });

  it('renders nested collections', () => {
    const record = createRecord([
      ['a', 1],
      ['b', [true, null]],
    ]);
    expect(toDisplayString(record)).toBe('@{a=1; b=@(True, )}');
    expect(toDisplayString([1, 'x'])).toBe('@(1, x)');
  });

  it('renders callables', () => {
    expect(toDisplayString(fn)).toBe('[function Get-Thing]');
    expect(toDisplayString(block)).toBe('[scriptblock]');
  });
});

describe('comparison', () => {
  it('compares numerically when both sides coerce', () => {
    expect(compareValues('10', 9)).toBe(1);
    expect(compareValues(2, 2)).toBe(0);
  });

  it('compares text case-insensitively', () => {
    expect(compareValues('apple', 'BANANA')).toBe(-1);
    expect(compareValues('X', 'x')).toBe(0);
  });

  it('compares lists and records structurally', () => {
    expect(valuesEqual([1, 'A'], [1, 'a'])).toBe(true);
    expect(valuesEqual([1], [1, 2])).toBe(false);
    expect(
      valuesEqual(createRecord([['K', 1]]), createRecord([['k', 1]]))
    ).toBe(true);
    expect(valuesEqual(createRecord([['k', 1]]), [1])).toBe(false);
  });

  it('treats Null as equal only to Null', () => {
    expect(valuesEqual(null, null)).toBe(true);
    expect(valuesEqual(null, '')).toBe(false);
    expect(valuesEqual('', null)).toBe(false);
    expect(valuesEqual(null, 0)).toBe(false);
  });

  it('compares callables by identity', () => {
    expect(valuesEqual(block, block)).toBe(true);
    expect(valuesEqual(block, { ...block })).toBe(false);
  });
});
