/**
 * pipesh Runtime Tests: Variables and Scope
 * Assignment, qualifiers, shadowing and frame discipline
 */

import { describe, expect, it } from 'vitest';

import { run, runFull } from '../helpers/runtime.js';
import {
  createRuntimeContext,
  evaluateLine,
  UndefinedVariableError,
} from '../../src/index.js';

describe('pipesh Runtime: Variables', () => {
  describe('Assignment', () => {
    it('binds and reads a variable', () => {
      expect(run('$x = 42; $x')).toBe(42);
    });

    it('assignment yields no value', () => {
      expect(run('$x = 1')).toBe(null);
    });

    it('names are case-insensitive', () => {
      expect(run('$Name = "pipe"; $name')).toBe('pipe');
    });

    it('keeps the first spelling in the globals view', () => {
      const result = runFull('$Count = 1; $count = 2');
      expect(result.variables).toEqual({ Count: 2 });
    });

    it('assigns a comma list', () => {
      expect(run('$l = 1, 2, 3; $l')).toEqual([1, 2, 3]);
    });

    it('assigns pipeline output', () => {
      expect(run('$big = @(1, 5, 9) | Where-Object { $_ -gt 2 }; $big')).toEqual([
        5, 9,
      ]);
    });

    it('raises UndefinedVariable for unbound names', () => {
      expect(() => run('$missing')).toThrow(UndefinedVariableError);
      expect(() => run('$missing')).toThrow('Variable $missing is not defined');
    });

    it('pre-binds variables from options', () => {
      expect(run('$greeting', { variables: { greeting: 'hi' } })).toBe('hi');
    });
  });

  describe('Compound assignment', () => {
    it('+= adds', () => {
      expect(run('$x = 5; $x += 3; $x')).toBe(8);
    });

    it('+= concatenates strings', () => {
      expect(run('$s = "a"; $s += "b"; $s')).toBe('ab');
    });

    it('+= appends to lists', () => {
      expect(run('$l = 1, 2; $l += 3; $l')).toEqual([1, 2, 3]);
    });

    it('-=, *=, /= and %= update in place', () => {
      expect(run('$x = 10; $x -= 4; $x')).toBe(6);
      expect(run('$x = 10; $x *= 2; $x')).toBe(20);
      expect(run('$x = 10; $x /= 4; $x')).toBe(2.5);
      expect(run('$x = 10; $x %= 4; $x')).toBe(2);
    });
  });

  describe('Scope qualifiers', () => {
    it('global: writes the global frame from a function', () => {
      expect(run('$n = 1; function F { $global:n = 5 }; F; $n')).toBe(5);
    });

    it('script: is an alias for global:', () => {
      expect(run('$script:v = 7; $global:v')).toBe(7);
    });

    it('qualifiers are case-insensitive', () => {
      expect(run('$GLOBAL:v = 3; $v')).toBe(3);
    });

    it('local: at top level is the global frame', () => {
      expect(run('$local:x = 3; $x')).toBe(3);
    });

    it('local: inside a function binds in its own frame', () => {
      expect(run('$x = 1; function F { $local:x = 2; $x }; F')).toBe(2);
      expect(run('$x = 1; function F { $local:x = 2 }; F; $x')).toBe(1);
    });

    it('treats an unknown qualifier as part of the name', () => {
      expect(run('$env:HOME', { variables: { 'env:HOME': '/home/test' } })).toBe(
        '/home/test'
      );
    });

    it('reports the full name for an unknown qualifier', () => {
      try {
        run('$env:HOME');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(UndefinedVariableError);
        if (err instanceof UndefinedVariableError) {
          expect(err.variableName).toBe('env:HOME');
        }
      }
    });
  });

  describe('Shadowing', () => {
    it('unqualified writes in a function never touch globals', () => {
      expect(run('$n = 1; function F { $n = 2; $n }; F')).toBe(2);
      expect(run('$n = 1; function F { $n = 2 }; F; $n')).toBe(1);
    });

    it('functions read globals', () => {
      expect(run('$n = 1; function F { $n + 1 }; F')).toBe(2);
    });

    it('functions do not see their caller frame', () => {
      const script = `
        function Inner { $secret }
        function Outer { $secret = "hidden"; Inner }
        Outer
      `;
      expect(() => run(script)).toThrow(UndefinedVariableError);
    });

    it('blocks update the variables of the frame they run in', () => {
      const script = `
        $total = 0
        @(1, 2, 3) | ForEach-Object { $total = $total + $_ }
        $total
      `;
      expect(run(script)).toBe(6);
    });

    it('blocks run in a function update its locals', () => {
      const script = `
        $t = 100
        function Sum { $t = 0; $input | ForEach-Object { $t = $t + $_ }; $t }
        $first = 1, 2, 3 | Sum
        @($first, $t)
      `;
      expect(run(script)).toEqual([6, 100]);
    });

    it('binds $_ only inside the block', () => {
      expect(() => run('1 | { $_ }; $_')).toThrow(UndefinedVariableError);
    });
  });

  describe('Frame discipline', () => {
    it('pops block frames when a block fails', () => {
      const ctx = createRuntimeContext();
      expect(() => evaluateLine('1, 2 | { $_ / 0 }', ctx)).toThrow();
      expect(ctx.scope.depth).toBe(1);
    });

    it('pops function frames when a function fails', () => {
      const ctx = createRuntimeContext();
      evaluateLine('function Bad { $x = 1; $missing }', ctx);
      expect(() => evaluateLine('Bad', ctx)).toThrow(UndefinedVariableError);
      expect(ctx.scope.depth).toBe(1);
      expect(() => evaluateLine('$x', ctx)).toThrow(UndefinedVariableError);
    });
  });
});
