/**
 * @module handle-registry
 * Side table for values that events refer to but the core must not inspect,
 * such as the canvas layer's scroll coordinator.
 */

import type { OpaqueHandle } from '@notecore/types';

export class HandleRegistry<T> {
  private values = new Map<string, T>();
  private nextId = 1;

  constructor(private readonly prefix = 'handle') {}

  /** Number of live handles. */
  get size(): number {
    return this.values.size;
  }

  /** Store `value` and return a handle for it. */
  issue(value: T): OpaqueHandle {
    const id = `${this.prefix}-${this.nextId++}`;
    this.values.set(id, value);
    return { kind: 'opaque-handle', id };
  }

  /** The value behind `handle`, or undefined once released or if foreign. */
  resolve(handle: OpaqueHandle): T | undefined {
    return this.values.get(handle.id);
  }

  /** Forget the value behind `handle`. Releasing twice is harmless. */
  release(handle: OpaqueHandle): void {
    this.values.delete(handle.id);
  }
}
