/**
 * pipesh Runtime Tests: Conditionals
 */

import { describe, expect, it } from 'vitest';

import { run } from '../helpers/runtime.js';

describe('pipesh Runtime: Conditionals', () => {
  it('takes the then branch', () => {
    expect(run('if ($true) { 1 } else { 2 }')).toBe(1);
  });

  it('takes the else branch on a falsy condition', () => {
    expect(run('if (0) { 1 } else { 2 }')).toBe(2);
    expect(run('if ("") { 1 } else { 2 }')).toBe(2);
    expect(run('if ($null) { 1 } else { 2 }')).toBe(2);
  });

  it('yields null when no branch runs', () => {
    expect(run('if ($false) { 1 }')).toBe(null);
  });

  it('chains elseif', () => {
    const script =
      '$x = 5; if ($x -lt 3) { "low" } elseif ($x -lt 10) { "mid" } else { "high" }';
    expect(run(script)).toBe('mid');
  });

  it('accepts else and elseif on following lines', () => {
    expect(run('if ($false) { 1 }\nelse { 2 }')).toBe(2);
    expect(run('if ($false) { 1 }\n\nelseif ($true) { 3 }')).toBe(3);
  });

  it('branches run in the current frame', () => {
    expect(run('if ($true) { $inside = 1 }; $inside')).toBe(1);
  });

  it('yields the last statement of the branch', () => {
    expect(run('if ($true) { $a = 2; $a * 5 }')).toBe(10);
  });

  it('accepts a pipeline as condition', () => {
    expect(
      run('if (@(1, 2, 3) | Where-Object { $_ -gt 2 }) { "some" } else { "none" }')
    ).toBe('some');
    expect(
      run('if (@(1, 2, 3) | Where-Object { $_ -gt 5 }) { "some" } else { "none" }')
    ).toBe('none');
  });

  it('ignores comments', () => {
    expect(run('# leading comment\n1 + 1 # trailing')).toBe(2);
  });
});
