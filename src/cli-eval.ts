#!/usr/bin/env node
/**
 * pipesh CLI - Evaluate pipesh source
 *
 * Usage:
 *   pipesh-eval '2 + 3'
 *   pipesh-eval '@(3, 1, 2) | Sort-Object'
 *   pipesh-eval --explain PIPE-R001
 */

import {
  createRuntimeContext,
  execute,
  parse,
  type ExecutionResult,
} from './index.js';
import { loadConfig, type CliConfig } from './cli-config.js';
import { explainError } from './cli-explain.js';
import {
  formatError,
  formatOutput,
  printOutput,
  shouldRunMain,
  VERSION,
} from './cli-shared.js';

export type EvalArgs =
  | { mode: 'eval'; source: string }
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' | 'version' };

/**
 * Parse command-line arguments into structured command
 */
export function parseArgs(argv: string[]): EvalArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const explainAt = argv.indexOf('--explain');
  if (explainAt !== -1) {
    const errorId = argv[explainAt + 1];
    if (errorId === undefined) {
      throw new Error('Missing error id after --explain');
    }
    return { mode: 'explain', errorId };
  }

  const [source] = argv;
  if (source === undefined) {
    return { mode: 'help' };
  }
  if (source.startsWith('--')) {
    throw new Error(`Unknown option: ${source}`);
  }
  return { mode: 'eval', source: argv.join(' ') };
}

/**
 * Evaluate pipesh source in a fresh context
 */
export function evaluateSource(
  source: string,
  config: CliConfig = { variables: {} }
): ExecutionResult {
  const ctx = createRuntimeContext({
    variables: config.variables,
    maxCallDepth: config.maxCallDepth,
    callbacks: {
      onLog: (value) => console.log(formatOutput(value)),
    },
  });
  return execute(parse(source), ctx);
}

function showHelp(): void {
  console.log(`pipesh Expression Evaluator

Usage:
  pipesh-eval <source>           Evaluate pipesh source
  pipesh-eval --explain <id>     Show documentation for an error id or category
  pipesh-eval --help             Show this help message
  pipesh-eval --version          Show version information

Examples:
  pipesh-eval '2 + 3 * 4'
  pipesh-eval '@(3, 1, 2) | Sort-Object -Descending'
  pipesh-eval '@(1, 2, 3) | Where-Object { $_ -gt 1 }'`);
}

/**
 * Entry point for pipesh-eval binary
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const command = parseArgs(argv);

    switch (command.mode) {
      case 'help':
        showHelp();
        return 0;

      case 'version':
        console.log(`pipesh-eval ${VERSION}`);
        return 0;

      case 'explain': {
        const text = explainError(command.errorId);
        if (text === null) {
          console.error(`Unknown error id: ${command.errorId}`);
          return 1;
        }
        console.log(text);
        return 0;
      }

      case 'eval': {
        const config = await loadConfig();
        const result = evaluateSource(command.source, config);
        printOutput(result.value);
        return 0;
      }
    }
  } catch (err) {
    console.error(formatError(err instanceof Error ? err : new Error(String(err))));
    return 1;
  }
}

if (shouldRunMain()) {
  void main().then((code) => {
    process.exitCode = code;
  });
}
