/**
 * Scope Stack
 *
 * Ordered stack of variable frames. Frame 0 is the global frame and
 * lives as long as the stack. Function calls push a 'function' frame;
 * deferred blocks push a 'block' frame.
 *
 * Lookup rules:
 * - Unqualified reads walk inward-out until the nearest function frame,
 *   then fall back to the global frame.
 * - Unqualified writes update a binding found on that same walk (not the
 *   global fallback); otherwise they bind in the innermost frame.
 * - `global:` and `script:` target frame 0, `local:` the innermost frame.
 *   Any other prefix is part of the name.
 * Names are case-insensitive.
 */

import type { PipeValue } from './values.js';

export type FrameKind = 'global' | 'function' | 'block';

export type ScopeQualifier = 'global' | 'local' | 'script';

interface Binding {
  readonly name: string;
  value: PipeValue;
}

interface Frame {
  readonly kind: FrameKind;
  readonly bindings: Map<string, Binding>;
}

/**
 * Split `$global:name` style names.
 * @example
 * parseVariableName('Global:count') // { qualifier: 'global', name: 'count' }
 * parseVariableName('env:PATH')     // { qualifier: null, name: 'env:PATH' }
 */
export function parseVariableName(raw: string): {
  qualifier: ScopeQualifier | null;
  name: string;
} {
  const colon = raw.indexOf(':');
  if (colon > 0) {
    const prefix = raw.slice(0, colon).toLowerCase();
    if (prefix === 'global' || prefix === 'local' || prefix === 'script') {
      return { qualifier: prefix, name: raw.slice(colon + 1) };
    }
  }
  return { qualifier: null, name: raw };
}

function createFrame(kind: FrameKind): Frame {
  return { kind, bindings: new Map() };
}

export class ScopeStack {
  private readonly frames: Frame[] = [createFrame('global')];

  /** Number of frames, including the global frame */
  get depth(): number {
    return this.frames.length;
  }

  pushFrame(kind: Exclude<FrameKind, 'global'> = 'block'): void {
    this.frames.push(createFrame(kind));
  }

  popFrame(): void {
    if (this.frames.length <= 1) {
      throw new Error('Cannot pop the global scope frame');
    }
    this.frames.pop();
  }

  /** Run fn inside a new frame; the frame is popped on every exit path */
  withFrame<T>(kind: Exclude<FrameKind, 'global'>, fn: () => T): T {
    this.pushFrame(kind);
    try {
      return fn();
    } finally {
      this.popFrame();
    }
  }

  read(rawName: string): PipeValue | undefined {
    const { qualifier, name } = parseVariableName(rawName);
    const key = name.toLowerCase();

    if (qualifier !== null) {
      return this.targetFrame(qualifier).bindings.get(key)?.value;
    }

    const local = this.findVisible(key);
    if (local) return local.value;
    return this.globalFrame().bindings.get(key)?.value;
  }

  has(rawName: string): boolean {
    return this.read(rawName) !== undefined;
  }

  write(rawName: string, value: PipeValue): void {
    const { qualifier, name } = parseVariableName(rawName);
    const key = name.toLowerCase();

    if (qualifier !== null) {
      this.bind(this.targetFrame(qualifier), key, name, value);
      return;
    }

    const existing = this.findVisible(key);
    if (existing) {
      existing.value = value;
      return;
    }
    this.bind(this.innermost(), key, name, value);
  }

  /** Bind in the innermost frame regardless of outer bindings */
  declare(name: string, value: PipeValue): void {
    this.bind(this.innermost(), name.toLowerCase(), name, value);
  }

  /** Global bindings by their original names, in definition order */
  globals(): Record<string, PipeValue> {
    const result: Record<string, PipeValue> = {};
    for (const binding of this.globalFrame().bindings.values()) {
      result[binding.name] = binding.value;
    }
    return result;
  }

  /** Walk from the innermost frame to the nearest function frame */
  private findVisible(key: string): Binding | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (!frame) break;
      const binding = frame.bindings.get(key);
      if (binding) return binding;
      if (frame.kind === 'function') break;
    }
    return undefined;
  }

  private bind(frame: Frame, key: string, name: string, value: PipeValue): void {
    const existing = frame.bindings.get(key);
    if (existing) {
      existing.value = value;
    } else {
      frame.bindings.set(key, { name, value });
    }
  }

  private targetFrame(qualifier: ScopeQualifier): Frame {
    return qualifier === 'local' ? this.innermost() : this.globalFrame();
  }

  private innermost(): Frame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) throw new Error('Scope stack is empty');
    return frame;
  }

  private globalFrame(): Frame {
    const frame = this.frames[0];
    if (!frame) throw new Error('Scope stack is empty');
    return frame;
  }
}
