/**
 * Execution API tests
 * execute, evaluateProgram, evaluateLine, stepping and the evaluator wrappers
 */

import { describe, expect, it } from 'vitest';

import { runFull, runStepped, run } from '../helpers/runtime.js';
import {
  collapse,
  createRuntimeContext,
  createStepper,
  evaluateLine,
  evaluateProgram,
  executeBlock,
  executePipeline,
  executeStatement,
  isBlock,
  parse,
  recordFromObject,
  UndefinedVariableError,
} from '../../src/index.js';

describe('evaluateLine', () => {
  it('keeps variables between lines', () => {
    const ctx = createRuntimeContext();
    expect(evaluateLine('$x = 5', ctx)).toBe(null);
    expect(evaluateLine('$x * 2', ctx)).toBe(10);
  });

  it('keeps functions between lines', () => {
    const ctx = createRuntimeContext();
    evaluateLine('function Twice($n) { $n * 2 }', ctx);
    expect(evaluateLine('Twice 4', ctx)).toBe(8);
  });

  it('keeps earlier state after a failing line', () => {
    const ctx = createRuntimeContext();
    evaluateLine('$x = 5', ctx);
    expect(() => evaluateLine('$x = $nope', ctx)).toThrow(UndefinedVariableError);
    expect(evaluateLine('$x', ctx)).toBe(5);
  });

  it('accepts parsed statements', () => {
    const ctx = createRuntimeContext();
    expect(evaluateLine(parse('3 + 4').statements, ctx)).toBe(7);
  });
});

describe('evaluateProgram', () => {
  it('returns the last statement value', () => {
    const ctx = createRuntimeContext();
    expect(evaluateProgram(parse('1; 2').statements, ctx)).toBe(2);
  });

  it('returns null for no statements', () => {
    expect(evaluateProgram([], createRuntimeContext())).toBe(null);
  });
});

describe('execute', () => {
  it('returns global variables, functions included', () => {
    const result = runFull('$a = 1; function F { }');
    expect(Object.keys(result.variables)).toEqual(['a', 'F']);
    expect(result.value).toBe(null);
  });

  it('binds records from options', () => {
    const variables = { cfg: recordFromObject({ port: 8080 }) };
    expect(run('$cfg.Port', { variables })).toBe(8080);
  });
});

describe('createStepper', () => {
  it('steps through top-level statements', () => {
    const steps = runStepped('$x = 1; $x + 1; $x * 10');
    expect(steps).toEqual([
      { value: null, done: false, index: 0, total: 3 },
      { value: 2, done: false, index: 1, total: 3 },
      { value: 10, done: true, index: 2, total: 3 },
    ]);
  });

  it('exposes state between steps', () => {
    const ctx = createRuntimeContext();
    const stepper = createStepper(parse('$x = 1\n$x = 2'), ctx);
    stepper.step();
    expect(stepper.index).toBe(1);
    expect(stepper.context.scope.read('x')).toBe(1);
    stepper.step();
    expect(stepper.done).toBe(true);
    expect(stepper.getResult().variables).toEqual({ x: 2 });
  });

  it('is done immediately for an empty script', () => {
    const stepper = createStepper(parse(''), createRuntimeContext());
    expect(stepper.done).toBe(true);
    expect(stepper.step()).toEqual({ value: null, done: true, index: 0, total: 0 });
  });
});

describe('evaluator wrappers', () => {
  it('executes a pipeline to its collection', () => {
    const ctx = createRuntimeContext();
    const [stmt] = parse('1, 2 | { $_ + 1 }').statements;
    if (stmt?.type !== 'Pipeline') throw new Error('expected a pipeline');
    expect(executePipeline(stmt, ctx)).toEqual([2, 3]);
  });

  it('returns a return completion from a top-level return', () => {
    const ctx = createRuntimeContext();
    const [stmt] = parse('return 1').statements;
    if (!stmt) throw new Error('expected a statement');
    expect(executeStatement(stmt, ctx)).toMatchObject({ kind: 'return', value: 1 });
  });

  it('runs a block value with an input', () => {
    const ctx = createRuntimeContext();
    const block = evaluateLine('{ $_ * 2 }', ctx);
    if (!isBlock(block)) throw new Error('expected a block');
    expect(executeBlock(block, 21, ctx)).toBe(42);
    expect(ctx.scope.depth).toBe(1);
  });

  it('collapses collections', () => {
    expect(collapse([])).toBe(null);
    expect(collapse([1])).toBe(1);
    expect(collapse([1, 2])).toEqual([1, 2]);
  });
});
