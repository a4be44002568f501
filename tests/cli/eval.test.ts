/**
 * pipesh CLI Tests: pipesh-eval command
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { evaluateSource, main, parseArgs } from '../../src/cli-eval.js';
import { explainError } from '../../src/cli-explain.js';
import { DivisionByZeroError, isRecord } from '../../src/index.js';

describe('pipesh-eval', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parseArgs', () => {
    it('joins words into one source', () => {
      expect(parseArgs(['2 + 3'])).toEqual({ mode: 'eval', source: '2 + 3' });
      expect(parseArgs(['1', '+', '2'])).toEqual({ mode: 'eval', source: '1 + 2' });
    });

    it('shows help with no arguments', () => {
      expect(parseArgs([])).toEqual({ mode: 'help' });
      expect(parseArgs(['-h'])).toEqual({ mode: 'help' });
    });

    it('parses version and explain', () => {
      expect(parseArgs(['--version'])).toEqual({ mode: 'version' });
      expect(parseArgs(['--explain', 'PIPE-R003'])).toEqual({
        mode: 'explain',
        errorId: 'PIPE-R003',
      });
    });

    it('throws on unknown options', () => {
      expect(() => parseArgs(['--nope'])).toThrow('Unknown option: --nope');
    });
  });

  describe('evaluateSource', () => {
    it('returns the pipeline result', () => {
      expect(evaluateSource('@(3, 1, 2) | Sort-Object').value).toEqual([1, 2, 3]);
    });

    it('binds configured variables', () => {
      const result = evaluateSource('$retries * 2', { variables: { retries: 3 } });
      expect(result.value).toBe(6);
    });

    it('prints Write-Host output', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      evaluateSource('Write-Host hello world');
      expect(log).toHaveBeenCalledWith('hello world');
    });

    it('throws runtime errors', () => {
      expect(() => evaluateSource('1 / 0')).toThrow(DivisionByZeroError);
    });

    it('returns records unchanged', () => {
      const result = evaluateSource('@{Name="a"}');
      expect(isRecord(result.value)).toBe(true);
    });
  });

  describe('main', () => {
    it('prints the result and exits 0', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      expect(await main(['2 + 3'])).toBe(0);
      expect(log).toHaveBeenCalledWith('5');
    });

    it('prints nothing for a null result', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      expect(await main(['$x = 1'])).toBe(0);
      expect(log).not.toHaveBeenCalled();
    });

    it('reports errors on stderr and exits 1', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      expect(await main(['1 / 0'])).toBe(1);
      expect(error).toHaveBeenCalledWith('Runtime error at line 1: Division by zero');
    });

    it('explains known error ids', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      expect(await main(['--explain', 'PIPE-R003'])).toBe(0);
      expect(log).toHaveBeenCalledWith(explainError('PIPE-R003'));
    });

    it('rejects unknown error ids', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      expect(await main(['--explain', 'PIPE-R999'])).toBe(1);
      expect(error).toHaveBeenCalledWith('Unknown error id: PIPE-R999');
    });
  });
});

describe('explainError', () => {
  it('renders category, message, cause, resolution and examples', () => {
    expect(explainError('PIPE-R003')).toBe(
      [
        'PIPE-R003  Division by zero',
        'Category: runtime (raised while a statement runs)',
        'Message:  Division by zero',
        '',
        'Why it happens',
        '  The right operand of / or % evaluated to 0.',
        '',
        'How to fix it',
        '  Guard the divisor with an if statement.',
        '',
        'Example (Literal zero divisor):',
        '  > 10 / 0',
      ].join('\n')
    );
  });

  it('shows message placeholders', () => {
    const text = explainError('PIPE-C002') ?? '';
    expect(text.split('\n')[2]).toBe(
      'Message:  Cannot read configuration {path}: {detail}'
    );
  });

  it('prefixes every line of a multi-line example', () => {
    const text = explainError('PIPE-C002') ?? '';
    expect(text.split('\n').slice(-3)).toEqual([
      '  > variables:',
      '  >  name: a',
      '  >   b: c',
    ]);
  });

  it('matches ids case-insensitively', () => {
    expect(explainError('pipe-r003')).toBe(explainError('PIPE-R003'));
  });

  it('lists the ids of a category', () => {
    expect(explainError(' Config ')).toBe(
      [
        'config (raised while loading .pipeshrc.yaml):',
        '  PIPE-C001  Invalid configuration',
        '  PIPE-C002  Configuration unreadable',
      ].join('\n')
    );
  });

  it('returns null for unknown ids', () => {
    expect(explainError('R003')).toBe(null);
    expect(explainError('PIPE-R999')).toBe(null);
    expect(explainError('semantic')).toBe(null);
  });
});
