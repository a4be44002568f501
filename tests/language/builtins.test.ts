/**
 * pipesh Runtime Tests: Built-in Stages
 */

import { describe, expect, it } from 'vitest';

import {
  asObject,
  createLogCollector,
  mockStage,
  run,
} from '../helpers/runtime.js';
import {
  CommandNotFoundError,
  createStageRegistry,
  InvalidArgumentError,
  isBlock,
  type StageDefinition,
} from '../../src/index.js';

const PEOPLE = `$people = @(
  @{Name = "Ann"; Age = 31; Team = "red"}
  @{Name = "Bo"; Age = 25; Team = "blue"}
  @{Name = "Cy"; Age = 40; Team = "red"}
)
`;

describe('pipesh Runtime: Built-in Stages', () => {
  describe('Write-Output', () => {
    it('emits its arguments', () => {
      expect(run('Write-Output 1 2 3')).toEqual([1, 2, 3]);
    });

    it('unrolls list arguments', () => {
      expect(run('Write-Output @(1, 2) 3')).toEqual([1, 2, 3]);
    });

    it('passes input through', () => {
      expect(run('1, 2 | Write-Output')).toEqual([1, 2]);
    });
  });

  describe('Where-Object', () => {
    it('filters by a script block', () => {
      const script = `${PEOPLE}$people | Where-Object { $_.Age -gt 30 } | ForEach-Object { $_.Name }`;
      expect(run(script)).toEqual(['Ann', 'Cy']);
    });

    it('filters by property and value', () => {
      const script = `${PEOPLE}$people | Where-Object Team -Value red | ForEach-Object Name`;
      expect(run(script)).toEqual(['Ann', 'Cy']);
    });

    it('filters by a truthy property', () => {
      const script = '$r = @(@{On = 1}, @{On = 0}, @{Off = 1}) | Where-Object On; $r.On';
      expect(run(script)).toBe(1);
    });

    it('accepts -FilterScript', () => {
      expect(run('1, 2, 3 | Where-Object -FilterScript { $_ -ne 2 }')).toEqual([
        1, 3,
      ]);
    });

    it('passes input through without a test', () => {
      expect(run('1, 2 | Where-Object')).toEqual([1, 2]);
    });

    it('rejects a non-block -FilterScript', () => {
      expect(() => run('1 | Where-Object -FilterScript 5')).toThrow(
        InvalidArgumentError
      );
      expect(() => run('1 | Where-Object -FilterScript 5')).toThrow(
        'expects a script block'
      );
    });
  });

  describe('ForEach-Object', () => {
    it('runs a block per item', () => {
      expect(run('1, 2, 3 | ForEach-Object { $_ * $_ }')).toEqual([1, 4, 9]);
    });

    it('unrolls list results and drops nulls', () => {
      const script = '1, 2, 3 | ForEach-Object { if ($_ -ne 2) { @($_, $_) } }';
      expect(run(script)).toEqual([1, 1, 3, 3]);
    });

    it('accepts -Process', () => {
      expect(run('1, 2 | ForEach-Object -Process { $_ + 1 }')).toEqual([2, 3]);
    });

    it('projects a member', () => {
      expect(run(`${PEOPLE}$people | ForEach-Object -MemberName Age`)).toEqual([
        31, 25, 40,
      ]);
    });

    it('projects null for a missing member', () => {
      expect(run('@{a = 1}, @{b = 2} | ForEach-Object a')).toEqual([1, null]);
    });
  });

  describe('Select-Object', () => {
    it('projects properties into new records', () => {
      const script = `${PEOPLE}$s = $people | Select-Object Name, Age -First 2
$s | ForEach-Object { "$_" }`;
      expect(run(script)).toEqual(['@{Name=Ann; Age=31}', '@{Name=Bo; Age=25}']);
    });

    it('fills missing properties with null', () => {
      expect(asObject(run('@{a = 1} | Select-Object a, b'))).toEqual({
        a: 1,
        b: null,
      });
    });

    it('passes non-records through', () => {
      expect(run('1, 2 | Select-Object Name')).toEqual([1, 2]);
    });

    it('skips, then takes the first items', () => {
      expect(run('@(1, 2, 3, 4, 5) | Select-Object -Skip 1 -First 2')).toEqual([
        2, 3,
      ]);
    });

    it('takes the last items after skipping', () => {
      expect(run('@(1, 2, 3, 4, 5) | Select-Object -Last 2')).toEqual([4, 5]);
      expect(run('@(1, 2, 3) | Select-Object -Skip 2 -Last 2')).toBe(3);
    });

    it('collapses a single selection', () => {
      expect(run('@(5, 6) | Select-Object -First 1')).toBe(5);
    });

    it('rejects a negative count', () => {
      expect(() => run('1 | Select-Object -First -1')).toThrow(
        "Invalid argument for 'Select-Object': -first expects a non-negative number, got -1"
      );
    });
  });

  describe('Sort-Object', () => {
    it('sorts numbers ascending', () => {
      expect(run('3, 1, 2 | Sort-Object')).toEqual([1, 2, 3]);
    });

    it('sorts descending', () => {
      expect(run('3, 1, 2 | Sort-Object -Descending')).toEqual([3, 2, 1]);
    });

    it('sorts strings case-insensitively', () => {
      expect(run('"b", "A", "c" | Sort-Object')).toEqual(['A', 'b', 'c']);
    });

    it('sorts numeric strings numerically', () => {
      expect(run('"10", "9" | Sort-Object')).toEqual(['9', '10']);
    });

    it('puts nulls first', () => {
      expect(run('@(2, $null, 1) | Sort-Object')).toEqual([null, 1, 2]);
    });

    it('sorts records by property', () => {
      expect(run(`${PEOPLE}$people | Sort-Object Age | ForEach-Object Name`)).toEqual([
        'Bo',
        'Ann',
        'Cy',
      ]);
    });

    it('sorts records by property descending', () => {
      const script = `${PEOPLE}$people | Sort-Object -Property Age -Descending | ForEach-Object Name`;
      expect(run(script)).toEqual(['Cy', 'Ann', 'Bo']);
    });

    it('keeps equal items in input order', () => {
      expect(run(`${PEOPLE}$people | Sort-Object Team | ForEach-Object Name`)).toEqual([
        'Bo',
        'Ann',
        'Cy',
      ]);
    });

    it('sorts its arguments without input', () => {
      expect(run('Sort-Object 3 1 2')).toEqual([1, 2, 3]);
    });
  });

  describe('Group-Object', () => {
    it('groups by property with sorted keys', () => {
      const script = `${PEOPLE}$people | Group-Object Team | ForEach-Object { "$($_.Name)=$($_.Count)" }`;
      expect(run(script)).toEqual(['blue=1', 'red=2']);
    });

    it('keeps group members in input order', () => {
      const script = `${PEOPLE}$g = $people | Group-Object Team
$g[1].Group | ForEach-Object Name`;
      expect(run(script)).toEqual(['Ann', 'Cy']);
    });

    it('drops members with -NoElement', () => {
      const script = `${PEOPLE}$people | Group-Object Team -NoElement | ForEach-Object { "$_" }`;
      expect(run(script)).toEqual([
        '@{Name=blue; Count=1}',
        '@{Name=red; Count=2}',
      ]);
    });

    it('returns a record keyed by group with -AsHashTable', () => {
      const script = `${PEOPLE}$h = $people | Group-Object Team -AsHashTable
$h.red.Count`;
      expect(run(script)).toBe(2);
    });

    it('groups plain values by display form', () => {
      expect(run('1, 2, 1 | Group-Object | ForEach-Object { $_.Name }')).toEqual([
        '1',
        '2',
      ]);
    });
  });

  describe('Measure-Object', () => {
    it('summarizes numbers', () => {
      expect(asObject(run('1, 2, 3, 4 | Measure-Object'))).toEqual({
        Count: 4,
        Sum: 10,
        Average: 2.5,
        Minimum: 1,
        Maximum: 4,
      });
    });

    it('summarizes a property', () => {
      expect(asObject(run(`${PEOPLE}$people | Measure-Object -Property Age`))).toEqual({
        Count: 3,
        Sum: 96,
        Average: 32,
        Minimum: 25,
        Maximum: 40,
      });
    });

    it('summarizes inputs too large to spread into a call', () => {
      const big = Array.from({ length: 200000 }, (_, i) => i);
      expect(asObject(run('$big | Measure-Object', { variables: { big } }))).toEqual({
        Count: 200000,
        Sum: 19999900000,
        Average: 99999.5,
        Minimum: 0,
        Maximum: 199999,
      });
    });

    it('counts items without numeric values', () => {
      expect(asObject(run('"a", "b" | Measure-Object'))).toEqual({
        Count: 2,
        Sum: 0,
        Average: null,
        Minimum: null,
        Maximum: null,
      });
    });
  });

  describe('Write-Host', () => {
    it('logs its arguments as display text', () => {
      const { logs, options } = createLogCollector();
      expect(run('Write-Host "a" 1 $true', options)).toBe(null);
      expect(logs).toEqual(['a 1 True']);
    });

    it('logs the input when given no arguments', () => {
      const { logs, options } = createLogCollector();
      run('1, 2 | Write-Host', options);
      expect(logs).toEqual(['1 2']);
    });

    it('unrolls list arguments', () => {
      const { logs, options } = createLogCollector();
      run('Write-Host @(1, 2) 3', options);
      expect(logs).toEqual(['1 2 3']);
    });
  });

  describe('Registry', () => {
    it('built-in names are case-insensitive', () => {
      expect(run('3, 1 | sort-object')).toEqual([1, 3]);
    });

    it('a custom stage replaces a built-in of the same name', () => {
      const custom = mockStage('sort-object', 'custom');
      expect(run('1 | Sort-Object', { stages: [custom] })).toBe('custom');
    });

    it('a replacement registry drops the built-ins', () => {
      const registry = createStageRegistry([mockStage('Spy')]);
      expect(() => run('1 | Sort-Object', { registry })).toThrow(
        CommandNotFoundError
      );
    });

    it('custom stages can run blocks', () => {
      const applyTwice: StageDefinition = {
        name: 'Apply-Twice',
        description: 'Run a block on each item twice',
        params: [],
        fn: ({ input, args, runtime }) => {
          const [block] = args;
          if (block === undefined || !isBlock(block)) return null;
          return input.map((item) =>
            runtime.executeBlock(block, runtime.executeBlock(block, item))
          );
        },
      };
      expect(run('1, 2 | Apply-Twice { $_ * 3 }', { stages: [applyTwice] })).toEqual([
        9, 18,
      ]);
    });

    it('custom stages can log', () => {
      const { logs, options } = createLogCollector();
      const shout: StageDefinition = {
        name: 'Shout',
        description: 'Log a fixed value',
        params: [],
        fn: ({ runtime }) => {
          runtime.log('hey');
          return null;
        },
      };
      run('Shout', { ...options, stages: [shout] });
      expect(logs).toEqual(['hey']);
    });
  });
});
