/**
 * CLI Configuration
 *
 * Loads `.pipeshrc.yaml` from the working directory:
 *
 * ```yaml
 * maxCallDepth: 50
 * variables:
 *   name: build
 *   retries: 3
 *   targets: [linux, darwin]
 * ```
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { createRecord, type PipeValue } from './runtime/index.js';
import { ConfigError } from './types.js';

export const CONFIG_FILE = '.pipeshrc.yaml';

export interface CliConfig {
  readonly maxCallDepth?: number | undefined;
  readonly variables: Record<string, PipeValue>;
}

const KNOWN_KEYS = new Set(['maxCallDepth', 'variables']);

function invalid(detail: string): ConfigError {
  return new ConfigError('PIPE-C001', { detail });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Convert parsed YAML into a runtime value; mappings become records */
function toPipeValue(raw: unknown, at: string): PipeValue {
  if (raw === null || raw === undefined) return null;
  if (
    typeof raw === 'string' ||
    typeof raw === 'number' ||
    typeof raw === 'boolean'
  ) {
    return raw;
  }
  if (Array.isArray(raw)) {
    return raw.map((item, i) => toPipeValue(item, `${at}[${i}]`));
  }
  if (isPlainObject(raw)) {
    return createRecord(
      Object.entries(raw).map(([key, value]) => [
        key,
        toPipeValue(value, `${at}.${key}`),
      ])
    );
  }
  throw invalid(`unsupported value at ${at}`);
}

/**
 * Validate parsed configuration data.
 * @throws ConfigError (PIPE-C001) on unknown keys or bad values
 */
export function validateConfig(data: unknown): CliConfig {
  if (data === null || data === undefined) {
    return { variables: {} };
  }
  if (!isPlainObject(data)) {
    throw invalid('expected a mapping at the top level');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw invalid(`unknown key '${key}'`);
    }
  }

  const rawDepth = data['maxCallDepth'];
  let depth: number | undefined;
  if (rawDepth !== undefined) {
    if (
      typeof rawDepth !== 'number' ||
      !Number.isInteger(rawDepth) ||
      rawDepth < 1
    ) {
      throw invalid('maxCallDepth must be a positive integer');
    }
    depth = rawDepth;
  }

  const rawVariables = data['variables'] ?? {};
  if (!isPlainObject(rawVariables)) {
    throw invalid('variables must be a mapping');
  }
  const variables: Record<string, PipeValue> = {};
  for (const [name, value] of Object.entries(rawVariables)) {
    variables[name] = toPipeValue(value, `variables.${name}`);
  }

  return { maxCallDepth: depth, variables };
}

function unreadable(filePath: string, err: unknown): ConfigError {
  return new ConfigError('PIPE-C002', {
    path: filePath,
    detail: err instanceof Error ? err.message : String(err),
  });
}

/**
 * Parse configuration text. YAML syntax errors name the file (C002)
 * when `filePath` is given, else they are invalid configuration (C001).
 */
export function parseConfig(source: string, filePath?: string): CliConfig {
  let data: unknown;
  try {
    data = yaml.parse(source);
  } catch (err) {
    if (filePath !== undefined) throw unreadable(filePath, err);
    throw invalid(err instanceof Error ? err.message : String(err));
  }
  return validateConfig(data);
}

/**
 * Load `.pipeshrc.yaml` from a directory. A missing file is an empty
 * configuration.
 * @throws ConfigError (PIPE-C002) when the file cannot be read or is not YAML
 */
export async function loadConfig(dir: string = process.cwd()): Promise<CliConfig> {
  const filePath = path.join(dir, CONFIG_FILE);
  let source: string;
  try {
    source = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { variables: {} };
    }
    throw unreadable(filePath, err);
  }
  return parseConfig(source, filePath);
}
