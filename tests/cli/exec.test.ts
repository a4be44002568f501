/**
 * pipesh CLI Tests: pipesh-exec command
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';
import { parseArgs, executeScript } from '../../src/cli-exec.js';
import { formatOutput, formatError, shouldRunMain } from '../../src/cli-shared.js';
import {
  ConfigError,
  createRecord,
  ParseError,
  RuntimeError,
  UndefinedVariableError,
} from '../../src/index.js';
import { LexerError } from '../../src/lexer/errors.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

describe('pipesh-exec', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipesh-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  async function writeScript(name: string, content: string): Promise<string> {
    const scriptPath = path.join(tempDir, name);
    await fs.writeFile(scriptPath, content);
    return scriptPath;
  }

  describe('parseArgs', () => {
    it('parses file with args', () => {
      expect(parseArgs(['script.psh', 'arg1', 'arg2'])).toEqual({
        mode: 'exec',
        file: 'script.psh',
        args: ['arg1', 'arg2'],
      });
    });

    it('parses stdin mode', () => {
      expect(parseArgs(['-'])).toEqual({ mode: 'exec', file: '-', args: [] });
    });

    it('parses help and version flags', () => {
      expect(parseArgs(['--help']).mode).toBe('help');
      expect(parseArgs(['-h']).mode).toBe('help');
      expect(parseArgs(['--version']).mode).toBe('version');
      expect(parseArgs(['-v']).mode).toBe('version');
    });

    it('parses --explain', () => {
      expect(parseArgs(['--explain', 'PIPE-R001'])).toEqual({
        mode: 'explain',
        errorId: 'PIPE-R001',
      });
      expect(() => parseArgs(['--explain'])).toThrow(
        'Missing error id after --explain'
      );
    });

    it('throws on unknown flags', () => {
      expect(() => parseArgs(['--unknown'])).toThrow('Unknown option: --unknown');
      expect(() => parseArgs(['-x'])).toThrow('Unknown option: -x');
    });

    it('throws when missing file argument', () => {
      expect(() => parseArgs([])).toThrow('Missing file argument');
    });
  });

  describe('executeScript', () => {
    it('executes simple script', async () => {
      const script = await writeScript('simple.psh', '"hello"');
      const result = await executeScript(script, []);
      expect(result.value).toBe('hello');
    });

    it('binds arguments to $args as strings', async () => {
      const script = await writeScript('args.psh', '$args');
      const result = await executeScript(script, ['42', 'beta']);
      expect(result.value).toEqual(['42', 'beta']);
    });

    it('exposes $args to functions through the global qualifier', async () => {
      const script = await writeScript(
        'count.psh',
        'function Count-Args { $global:args.Count }\nCount-Args'
      );
      const result = await executeScript(script, ['a', 'b', 'c']);
      expect(result.value).toBe(3);
    });

    it('binds configured variables', async () => {
      const script = await writeScript('config.psh', '"run $name on $($server.Port)"');
      const result = await executeScript(script, [], {
        variables: { name: 'build', server: createRecord([['port', 8080]]) },
      });
      expect(result.value).toBe('run build on 8080');
    });

    it('applies the configured call depth', async () => {
      const script = await writeScript('deep.psh', 'function F { F }\nF');
      await expect(
        executeScript(script, [], { variables: {}, maxCallDepth: 3 })
      ).rejects.toThrow('Call depth exceeded 3 in F');
    });

    it('rejects for a missing file', async () => {
      await expect(
        executeScript(path.join(tempDir, 'missing.psh'), [])
      ).rejects.toThrow('ENOENT');
    });

    it('propagates parse errors', async () => {
      const script = await writeScript('parse-err.psh', 'if ($x) { 1');
      await expect(executeScript(script, [])).rejects.toThrow(ParseError);
    });

    it('propagates runtime errors', async () => {
      const script = await writeScript('runtime-err.psh', '$undefined');
      await expect(executeScript(script, [])).rejects.toThrow(RuntimeError);
    });

    it('handles empty script', async () => {
      const script = await writeScript('empty.psh', '');
      const result = await executeScript(script, []);
      expect(result.value).toBe(null);
      expect(result.variables).toEqual({ args: [] });
    });
  });

  describe('formatOutput', () => {
    it('formats primitives', () => {
      expect(formatOutput('hello')).toBe('hello');
      expect(formatOutput(42)).toBe('42');
      expect(formatOutput(true)).toBe('True');
      expect(formatOutput(null)).toBe('');
    });

    it('prints one list item per line', () => {
      expect(formatOutput([1, 'two'])).toBe('1\ntwo');
      expect(formatOutput([[1, 2], 3])).toBe('@(1, 2)\n3');
    });

    it('formats records', () => {
      expect(formatOutput(createRecord([['a', 1]]))).toBe('@{a=1}');
    });
  });

  describe('formatError', () => {
    const location = { line: 3, column: 4, offset: 10 };

    it('formats lexer errors', () => {
      const err = new LexerError('PIPE-L001', 'Unterminated string literal', location);
      expect(formatError(err)).toBe(
        'Lexer error at line 3: Unterminated string literal'
      );
    });

    it('formats parse errors', () => {
      const err = new ParseError(
        'PIPE-P001',
        'Unexpected token: end of input',
        location
      );
      expect(formatError(err)).toBe(
        'Parse error at line 3: Unexpected token: end of input'
      );
    });

    it('formats runtime errors with and without location', () => {
      expect(formatError(new UndefinedVariableError('x', location))).toBe(
        'Runtime error at line 3: Variable $x is not defined'
      );
      expect(formatError(new UndefinedVariableError('x'))).toBe(
        'Runtime error: Variable $x is not defined'
      );
    });

    it('formats config errors', () => {
      const err = new ConfigError('PIPE-C001', { detail: 'bad' });
      expect(formatError(err)).toBe('Config error: Invalid configuration: bad');
    });

    it('formats missing files', () => {
      const err = Object.assign(new Error('ENOENT: no such file'), {
        code: 'ENOENT',
        path: '/scripts/report.psh',
      });
      expect(formatError(err)).toBe('File not found: /scripts/report.psh');
    });

    it('passes other errors through', () => {
      expect(formatError(new Error('boom'))).toBe('boom');
    });
  });

  it('does not run main under the test runner', () => {
    expect(shouldRunMain()).toBe(false);
  });
});
