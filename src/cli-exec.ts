#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs(), and executeScript() for pipesh-exec.
 * Handles file execution and stdin input.
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import { createRuntimeContext, execute, parse } from './index.js';
import type { ExecutionResult } from './index.js';
import { loadConfig, type CliConfig } from './cli-config.js';
import { explainError } from './cli-explain.js';
import {
  formatError,
  formatOutput,
  printOutput,
  shouldRunMain,
  VERSION,
} from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ExecArgs =
  | { mode: 'exec'; file: string; args: string[] }
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' | 'version' };

/**
 * Parse command-line arguments into structured command.
 * Everything after the script path is passed to the script.
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 */
export function parseArgs(argv: string[]): ExecArgs {
  const [first, second] = argv;

  if (first === undefined) {
    throw new Error('Missing file argument');
  }
  if (first === '--help' || first === '-h') {
    return { mode: 'help' };
  }
  if (first === '--version' || first === '-v') {
    return { mode: 'version' };
  }
  if (first === '--explain') {
    if (second === undefined) {
      throw new Error('Missing error id after --explain');
    }
    return { mode: 'explain', errorId: second };
  }
  if (first.startsWith('-') && first !== '-') {
    throw new Error(`Unknown option: ${first}`);
  }

  return { mode: 'exec', file: first, args: argv.slice(1) };
}

/**
 * Execute a script file. Script arguments are bound to the global `$args`.
 *
 * @param file - File path or '-' for stdin
 * @throws Error if the file cannot be read or execution fails
 */
export async function executeScript(
  file: string,
  args: string[],
  config: CliConfig = { variables: {} }
): Promise<ExecutionResult> {
  const source =
    file === '-'
      ? fsSync.readFileSync(0, 'utf-8')
      : await fs.readFile(file, 'utf-8');

  const ctx = createRuntimeContext({
    variables: { ...config.variables, args },
    maxCallDepth: config.maxCallDepth,
    callbacks: {
      onLog: (value) => console.log(formatOutput(value)),
    },
  });

  return execute(parse(source), ctx);
}

function showHelp(): void {
  console.log(`Usage:
  pipesh-exec <script.psh> [args...]  Execute a pipesh script file
  pipesh-exec -                       Read script from stdin
  pipesh-exec --explain <id>          Show documentation for an error id or category
  pipesh-exec --help                  Show this help message
  pipesh-exec --version               Show version information

Arguments:
  args are passed to the script as a list of strings in $args

Examples:
  pipesh-exec report.psh
  pipesh-exec report.psh alpha beta
  echo "Write-Host hello" | pipesh-exec -`);
}

/**
 * Entry point for pipesh-exec binary
 *
 * Writes results to stdout and errors to stderr.
 * @returns Process exit code
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        showHelp();
        return 0;

      case 'version':
        console.log(`pipesh-exec ${VERSION}`);
        return 0;

      case 'explain': {
        const text = explainError(parsed.errorId);
        if (text === null) {
          console.error(`Unknown error id: ${parsed.errorId}`);
          return 1;
        }
        console.log(text);
        return 0;
      }

      case 'exec': {
        const config = await loadConfig();
        const result = await executeScript(parsed.file, parsed.args, config);
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
