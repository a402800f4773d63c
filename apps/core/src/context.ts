import type { JsonValue } from "./pipeline-types.js";

/** Persisted form of a context: entries in insertion order. */
export type ContextEntry = [string, JsonValue];

/** Read/write view of the context handed to hooks and renderers. */
export interface ContextAccess {
  get(key: string): JsonValue | undefined;
  getString(key: string): string | undefined;
  has(key: string): boolean;
  set(key: string, value: JsonValue): void;
}

/**
 * Ordered key/value state accumulated across a run.
 * Keys may be overwritten, never removed.
 */
export class ExecutionContext implements ContextAccess {
  private readonly values = new Map<string, JsonValue>();

  constructor(initial?: Iterable<readonly [string, JsonValue]>) {
    if (initial) {
      for (const [key, value] of initial) this.values.set(key, value);
    }
  }

  static fromSnapshot(snapshot: readonly ContextEntry[]): ExecutionContext {
    return new ExecutionContext(snapshot.map(([key, value]): ContextEntry => [key, structuredClone(value)]));
  }

  get(key: string): JsonValue | undefined {
    return this.values.get(key);
  }

  /** String value for a key, or undefined when absent or not a string. */
  getString(key: string): string | undefined {
    const value = this.values.get(key);
    return typeof value === "string" ? value : undefined;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  set(key: string, value: JsonValue): void {
    this.values.set(key, value);
  }

  entries(): IterableIterator<[string, JsonValue]> {
    return this.values.entries();
  }

  get size(): number {
    return this.values.size;
  }

  /** Deep copy suitable for persistence. Keeps insertion order, integer-like keys included. */
  snapshot(): ContextEntry[] {
    return [...this.values].map(([key, value]): ContextEntry => [key, structuredClone(value)]);
  }
}
