import { SNAPSHOT, type Snapshotable } from "./types.js";

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Own data property write that never reaches a setter, `__proto__` included. */
export function defineEntry<V>(target: Record<string, V>, key: string, value: V): void {
  Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
}

export function isSnapshotable(value: unknown): value is Snapshotable {
  return value !== null && typeof value === "object" && SNAPSHOT in value;
}

interface CopyMode {
  // Replace containers by their snapshot instead of keeping them by reference
  unwrap: boolean;
  freeze: boolean;
}

/**
 * Deep copy of plain objects and arrays. Containers and class instances
 * (dates, buffers, native handles) are kept by reference.
 */
export function cloneValue<T>(value: T): T {
  return copy(value, new WeakMap(), { unwrap: false, freeze: false });
}

/**
 * Frozen deep copy of the plain data in a value, for storing inside a
 * container: nothing the caller holds can reach it, and nothing read out
 * of it can change it.
 */
export function detach<T>(value: T): T {
  return copy(value, new WeakMap(), { unwrap: false, freeze: true });
}

/**
 * The plain data a value stands for: containers are replaced by their
 * snapshot, all the way down, so the result can be checked against a schema.
 */
export function toPlain(value: unknown): unknown {
  return copy(value, new WeakMap(), { unwrap: true, freeze: false });
}

function copy<T>(value: T, visited: WeakMap<object, unknown>, mode: CopyMode): T;
function copy(value: unknown, visited: WeakMap<object, unknown>, mode: CopyMode): unknown {
  if (value === null || typeof value !== "object") {
    return value;
  }

  // Handle circular refs
  if (visited.has(value)) {
    return visited.get(value);
  }

  if (isSnapshotable(value)) {
    if (!mode.unwrap) return value;
    const plain = copy(value[SNAPSHOT](), visited, mode);
    visited.set(value, plain);
    return plain;
  }

  if (Array.isArray(value)) {
    const clone: unknown[] = [];
    visited.set(value, clone);
    for (let i = 0; i < value.length; i++) {
      clone[i] = copy(value[i], visited, mode);
    }
    return mode.freeze ? Object.freeze(clone) : clone;
  }

  if (!isPlainObject(value)) {
    return value;
  }

  const clone: Record<string, unknown> = {};
  visited.set(value, clone);
  for (const key of Object.keys(value)) {
    defineEntry(clone, key, copy(Reflect.get(value, key), visited, mode));
  }
  return mode.freeze ? Object.freeze(clone) : clone;
}
