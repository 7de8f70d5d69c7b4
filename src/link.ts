import { getLogger } from "./logger.js";
import {
  type FieldChange,
  type FieldObserver,
  type FieldWrite,
  RECORD_STORE,
  type RecordHandle,
  type RecordStore,
} from "./types.js";

export type LinkTransform = (value: unknown) => unknown;

interface LinkTarget {
  store: RecordStore;
  key: string;
  transform?: LinkTransform;
}

export interface Propagation {
  key: string;
  target: LinkTarget;
  value: unknown;
}

export interface LinkHandle {
  unlink: () => void;
}

export interface ObserveHandle {
  unsubscribe: () => void;
}

// Registry: store -> source key -> link targets
const linkRegistry = new WeakMap<RecordStore, Map<string, Set<LinkTarget>>>();

// Registry: store -> field name -> observers
const observerRegistry = new WeakMap<RecordStore, Map<string, Set<FieldObserver>>>();

function subscribe<V>(
  registry: WeakMap<RecordStore, Map<string, Set<V>>>,
  store: RecordStore,
  key: string,
  entry: V
): () => void {
  let byKey = registry.get(store);
  if (!byKey) {
    byKey = new Map();
    registry.set(store, byKey);
  }
  let entries = byKey.get(key);
  if (!entries) {
    entries = new Set();
    byKey.set(key, entries);
  }
  entries.add(entry);

  // Return unsubscribe function
  return () => {
    entries?.delete(entry);
  };
}

/**
 * Internal: the propagations a write of `value` to `key` would cause.
 * Targets that already hold the value are skipped, which is what stops two
 * records linked both ways from bouncing a write back and forth.
 */
export function pendingPropagations(store: RecordStore, key: string, value: unknown): Propagation[] {
  const targets = linkRegistry.get(store)?.get(key);
  if (!targets || targets.size === 0) return [];

  const pending: Propagation[] = [];
  for (const target of targets) {
    const next = target.transform ? target.transform(value) : value;
    if (target.store.has(target.key) && Object.is(target.store.get(target.key), next)) {
      continue;
    }
    pending.push({ key, target, value: next });
  }
  return pending;
}

/**
 * Internal: every write a mutation causes, grouped by the store it lands in.
 * The source's own writes come first; a self-link adds to them.
 */
export function planWrites(
  source: RecordStore,
  local: readonly FieldWrite[],
  pending: readonly Propagation[]
): Map<RecordStore, FieldWrite[]> {
  const plan = new Map<RecordStore, FieldWrite[]>([[source, [...local]]]);
  for (const { target, value } of pending) {
    const write: FieldWrite = [target.key, value];
    const writes = plan.get(target.store);
    if (writes) {
      writes.push(write);
    } else {
      plan.set(target.store, [write]);
    }
  }
  return plan;
}

/** Internal: throw the failure any store would raise once all its planned writes land, before anything commits. */
export function preflight(plan: ReadonlyMap<RecordStore, readonly FieldWrite[]>): void {
  for (const [store, writes] of plan) {
    store.check(writes);
  }
}

/** Internal: deliver the planned writes to the other stores (one hop). */
export function propagate(
  source: RecordStore,
  plan: ReadonlyMap<RecordStore, readonly FieldWrite[]>,
  pending: readonly Propagation[]
): void {
  for (const [store, writes] of plan) {
    if (store !== source) store.receive(writes);
  }
  const logger = getLogger();
  for (const { key, target } of pending) {
    logger.debug(`Propagated ${key} -> ${target.key}`, { source: source.owner, target: target.store.owner });
  }
}

/** Internal: notify the observers of a committed field write. */
export function notifyObservers(store: RecordStore, change: FieldChange): void {
  const observers = observerRegistry.get(store)?.get(change.name);
  if (!observers || observers.size === 0) return;

  for (const observer of observers) {
    observer(change);
  }
}

/**
 * One-directional link: after each committed write to `sourceKey`, the value
 * (through `transform`, when given) is written to `targetKey` on `target`
 * through the target's own validation.
 */
export function dlink(
  source: RecordHandle,
  sourceKey: string,
  target: RecordHandle,
  targetKey: string,
  transform?: LinkTransform
): LinkHandle {
  const unlink = subscribe(linkRegistry, source[RECORD_STORE], sourceKey, {
    store: target[RECORD_STORE],
    key: targetKey,
    transform,
  });
  return { unlink };
}

/**
 * Link two fields both ways: a write to either side is copied to the other.
 */
export function link(
  source: RecordHandle,
  sourceKey: string,
  target: RecordHandle,
  targetKey: string
): LinkHandle {
  const forward = dlink(source, sourceKey, target, targetKey);
  const backward = dlink(target, targetKey, source, sourceKey);
  return {
    unlink() {
      forward.unlink();
      backward.unlink();
    },
  };
}

/**
 * Observe committed writes to `key`, including writes that arrive through
 * a link.
 */
export function observe(record: RecordHandle, key: string, observer: FieldObserver): ObserveHandle {
  const unsubscribe = subscribe(observerRegistry, record[RECORD_STORE], key, observer);
  return { unsubscribe };
}
