/**
 * Runtime Value Types and Utilities
 *
 * Core value types that flow through pipelines.
 * Public API for host applications.
 */

import type { ParamNode, StatementNode } from '../../types.js';

/**
 * Record: insertion-ordered mapping with case-insensitive keys.
 * Entries are keyed by lowercased name; each keeps the name as first written.
 */
export interface PipeRecord {
  readonly __pipe_record: true;
  readonly entries: ReadonlyMap<string, RecordEntry>;
}

export interface RecordEntry {
  readonly key: string;
  readonly value: PipeValue;
}

/** User-defined function, bound in the scope frame where it was defined */
export interface PipeFunction {
  readonly __type: 'callable';
  readonly kind: 'function';
  readonly name: string;
  readonly params: ParamNode[];
  readonly body: StatementNode[];
}

/** Unexecuted statement body, run later with `$_` bound */
export interface PipeBlock {
  readonly __type: 'callable';
  readonly kind: 'block';
  readonly body: StatementNode[];
}

export type PipeCallable = PipeFunction | PipeBlock;

/** Any value that can flow through a pipeline */
export type PipeValue =
  | string
  | number
  | boolean
  | null
  | PipeValue[]
  | PipeRecord
  | PipeCallable;

export type PipeTypeName =
  | 'null'
  | 'boolean'
  | 'number'
  | 'string'
  | 'record'
  | 'list'
  | 'function'
  | 'block';

// ============================================================
// CONSTRUCTORS AND GUARDS
// ============================================================

/**
 * Build a record. Later duplicate keys overwrite earlier values;
 * the key keeps its first spelling and position.
 */
export function createRecord(
  entries: Iterable<readonly [string, PipeValue]> = []
): PipeRecord {
  const map = new Map<string, RecordEntry>();
  for (const [key, value] of entries) {
    const lower = key.toLowerCase();
    const existing = map.get(lower);
    map.set(lower, { key: existing ? existing.key : key, value });
  }
  return { __pipe_record: true, entries: map };
}

/** Build a record from a plain object (host convenience) */
export function recordFromObject(obj: Record<string, PipeValue>): PipeRecord {
  return createRecord(Object.entries(obj));
}

export function isRecord(value: PipeValue): value is PipeRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    '__pipe_record' in value
  );
}

export function isCallable(value: PipeValue): value is PipeCallable {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    '__type' in value &&
    value.__type === 'callable'
  );
}

export function isFunction(value: PipeValue): value is PipeFunction {
  return isCallable(value) && value.kind === 'function';
}

export function isBlock(value: PipeValue): value is PipeBlock {
  return isCallable(value) && value.kind === 'block';
}

export function isList(value: PipeValue): value is PipeValue[] {
  return Array.isArray(value);
}

export function inferType(value: PipeValue): PipeTypeName {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'string') return 'string';
  if (Array.isArray(value)) return 'list';
  if (isRecord(value)) return 'record';
  return value.kind;
}

// ============================================================
// RECORD ACCESS
// ============================================================

export function recordGet(
  record: PipeRecord,
  key: string
): PipeValue | undefined {
  return record.entries.get(key.toLowerCase())?.value;
}

export function recordKeys(record: PipeRecord): string[] {
  return [...record.entries.values()].map((entry) => entry.key);
}

export function recordToObject(record: PipeRecord): Record<string, PipeValue> {
  const obj: Record<string, PipeValue> = {};
  for (const { key, value } of record.entries.values()) {
    obj[key] = value;
  }
  return obj;
}

/** Case-insensitive property lookup; only records have properties */
export function getProperty(
  value: PipeValue,
  name: string
): PipeValue | undefined {
  return isRecord(value) ? recordGet(value, name) : undefined;
}

// ============================================================
// CONVERSIONS
// ============================================================

/** null, false, 0 and "" are false; everything else is true */
export function toBoolean(value: PipeValue): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return value !== '';
  return true;
}

/**
 * Numbers pass through and numeric strings parse.
 * Returns undefined for everything else; callers raise the error.
 */
export function toNumber(value: PipeValue): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    const parsed = Number(trimmed);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

export function formatNumber(value: number): string {
  return Object.is(value, -0) ? '0' : String(value);
}

/**
 * Display form used by string interpolation and output.
 * @example
 * toDisplayString(createRecord([['a', 1], ['b', true]])) // "@{a=1; b=True}"
 */
export function toDisplayString(value: PipeValue): string {
  if (value === null) return '';
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  if (typeof value === 'number') return formatNumber(value);
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    return `@(${value.map(toDisplayString).join(', ')})`;
  }
  if (isRecord(value)) {
    const pairs = [...value.entries.values()].map(
      ({ key, value: v }) => `${key}=${toDisplayString(v)}`
    );
    return `@{${pairs.join('; ')}}`;
  }
  return value.kind === 'function' ? `[function ${value.name}]` : '[scriptblock]';
}

// ============================================================
// COMPARISON
// ============================================================

/**
 * Ordering shared by comparison operators and Sort-Object:
 * numeric when both sides coerce, otherwise case-insensitive text.
 */
export function compareValues(a: PipeValue, b: PipeValue): number {
  const left = toNumber(a);
  const right = toNumber(b);
  if (left !== undefined && right !== undefined) {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  const leftText = toDisplayString(a).toLowerCase();
  const rightText = toDisplayString(b).toLowerCase();
  return leftText < rightText ? -1 : leftText > rightText ? 1 : 0;
}

/** Structural equality, case-insensitive for strings and keys */
export function valuesEqual(a: PipeValue, b: PipeValue): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, i) => valuesEqual(item, b[i] ?? null));
  }
  if (isRecord(a) || isRecord(b)) {
    if (!isRecord(a) || !isRecord(b) || a.entries.size !== b.entries.size) {
      return false;
    }
    for (const [lower, entry] of a.entries) {
      const other = b.entries.get(lower);
      if (!other || !valuesEqual(entry.value, other.value)) return false;
    }
    return true;
  }
  if (isCallable(a) || isCallable(b)) return a === b;
  if (a === null || b === null) return a === b;
  return compareValues(a, b) === 0;
}
