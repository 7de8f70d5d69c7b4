import type { z } from "zod";
import { cloneValue, defineEntry, detach, isSnapshotable } from "./clone.js";
import { reportIssues } from "./compile.js";
import type { Constraint } from "./constraints.js";
import { checkConstraints, type Infer, mergeNatives, NO_NATIVES, TypeDescriptor } from "./descriptor.js";
import { DefinitionError } from "./errors.js";
import {
  dlink,
  type LinkHandle,
  type LinkTransform,
  link as linkFields,
  notifyObservers,
  observe,
  type ObserveHandle,
  pendingPropagations,
  planWrites,
  preflight,
  propagate,
} from "./link.js";
import { getLogger } from "./logger.js";
import { mergeSchema } from "./schema.js";
import {
  type FieldObserver,
  type FieldWrite,
  type NativeRegistry,
  RECORD_STORE,
  type RecordHandle,
  type RecordStore,
  type SchemaDocument,
  SNAPSHOT,
  type Snapshotable,
} from "./types.js";

/** Field name to descriptor. */
export type Shape = Readonly<Record<string, TypeDescriptor<unknown>>>;

export type InferShape<S extends Shape> = { -readonly [K in keyof S]: Infer<S[K]> };

export type Parametrized<T, S extends Shape> = Omit<T, keyof S> & Partial<InferShape<S>>;
export type Extended<T, S extends Shape> = Omit<T, keyof S> & InferShape<S>;

export type PropertyPolicy = boolean | TypeDescriptor<unknown>;

/**
 * A class-style declaration: named, typed fields, a subset of them with
 * default values.
 */
export interface RecordDefinition<S extends Shape, V> {
  fields: S;
  defaults?: Partial<V>;
  additionalProperties?: PropertyPolicy;
}

interface FieldEntry {
  descriptor: TypeDescriptor<unknown>;
  // Declared fields without a default are required; parametrized ones never are
  declared: boolean;
}

export interface RecordLayout {
  readonly name: string;
  readonly fields: ReadonlyMap<string, FieldEntry>;
  readonly defaults: ReadonlyMap<string, unknown>;
  readonly additionalProperties: PropertyPolicy;
  readonly constraints: readonly Constraint[];
  readonly base: TypeDescriptor<unknown> | null;
}

function emptyLayout(name: string): RecordLayout {
  return {
    name,
    fields: new Map(),
    defaults: new Map(),
    additionalProperties: true,
    constraints: [],
    base: null,
  };
}

function verifyLayout(owner: TypeDescriptor<unknown>, layout: RecordLayout): void {
  for (const [name, field] of layout.fields) {
    if (name === "") {
      throw new DefinitionError(layout.name, "field names must not be empty");
    }
    if (!(field.descriptor instanceof TypeDescriptor)) {
      throw new DefinitionError(layout.name, `field "${name}" is not a type descriptor`);
    }
  }

  const extra = layout.additionalProperties;
  if (typeof extra !== "boolean" && !(extra instanceof TypeDescriptor)) {
    throw new DefinitionError(layout.name, "additionalProperties must be a boolean or a type descriptor");
  }

  for (const [name, value] of layout.defaults) {
    const field = layout.fields.get(name);
    if (!field) {
      throw new DefinitionError(layout.name, `default given for undeclared field "${name}"`);
    }
    const result = field.descriptor.validate(value);
    if (!result.success) {
      throw new DefinitionError(
        layout.name,
        `default for "${name}" is rejected by ${field.descriptor.name} (${result.error.message})`
      );
    }
  }

  // A record-level default carried over from a refinement must still fit
  const schema = owner.toSchema();
  if (Object.hasOwn(schema, "default")) {
    const result = owner.validate(schema.default);
    if (!result.success) {
      throw new DefinitionError(layout.name, `default is rejected (${result.error.message})`);
    }
  }
}

/**
 * Object-shaped descriptor shared by the dict-like and attribute-record
 * flavors. Holds the field table, the default table and the policy for
 * undeclared properties.
 */
export abstract class RecordDescriptor<T> extends TypeDescriptor<T> {
  readonly kind = "record";
  protected readonly layout: RecordLayout;
  private readonly registry: NativeRegistry;

  protected constructor(layout: RecordLayout) {
    super(layout.name);
    this.layout = layout;
    const extra = layout.additionalProperties;
    this.registry = mergeNatives(layout.name, [
      ...[...layout.fields.values()].map((field) => field.descriptor.natives()),
      typeof extra === "boolean" ? NO_NATIVES : extra.natives(),
      ...layout.constraints.map((constraint) => constraint.natives),
      layout.base?.natives() ?? NO_NATIVES,
    ]);
    verifyLayout(this, layout);
  }

  natives(): NativeRegistry {
    return this.registry;
  }

  fieldNames(): string[] {
    return [...this.layout.fields.keys()];
  }

  field(name: string): TypeDescriptor<unknown> | undefined {
    return this.layout.fields.get(name)?.descriptor;
  }

  /** Defaults applied at construction: explicit table over field-level defaults. */
  defaults(): ReadonlyMap<string, unknown> {
    const table = new Map<string, unknown>();
    for (const [name, { descriptor }] of this.layout.fields) {
      const schema = descriptor.toSchema();
      if (Object.hasOwn(schema, "default")) {
        table.set(name, schema.default);
      }
    }
    for (const [name, value] of this.layout.defaults) {
      table.set(name, value);
    }
    return table;
  }

  requiredFields(): string[] {
    const defaults = this.defaults();
    return [...this.layout.fields]
      .filter(([name, field]) => field.declared && !defaults.has(name))
      .map(([name]) => name);
  }

  protected synthesize(): SchemaDocument {
    const { defaults, additionalProperties: extra } = this.layout;
    const properties: Record<string, SchemaDocument> = {};
    for (const [name, { descriptor }] of this.layout.fields) {
      const schema = descriptor.toSchema();
      defineEntry(
        properties,
        name,
        defaults.has(name) ? mergeSchema(schema, { default: defaults.get(name) }) : schema
      );
    }

    const required = this.requiredFields();
    const document: SchemaDocument = {
      type: "object",
      properties,
      ...(required.length > 0 ? { required } : {}),
      ...(extra === true ? {} : { additionalProperties: extra === false ? false : extra.toSchema() }),
    };

    return this.layout.constraints.reduce(
      (schema, constraint) => mergeSchema(schema, constraint.keywords),
      document
    );
  }

  protected compile(): z.ZodTypeAny {
    const compiled = super.compile();
    if (!this.layout.base) return compiled;

    const base = this.layout.base.validator();
    return compiled.superRefine((value, ctx) => {
      reportIssues(base.safeParse(value), ctx, []);
    });
  }

  /**
   * Build the initial field values for a new container and validate them.
   * No seed means the record-level default, or an empty mapping; fields
   * missing from the seed are filled from the default table.
   */
  assemble(seed: unknown): Record<string, unknown> & T {
    let source: unknown = seed;
    if (source === undefined) {
      const schema = this.toSchema();
      source = Object.hasOwn(schema, "default") ? cloneValue(schema.default) : {};
    } else if (isSnapshotable(source)) {
      source = source[SNAPSHOT]();
    }

    const candidate: Record<string, unknown> = {};
    if (source === null || typeof source !== "object" || Array.isArray(source)) {
      // A mapping is the only acceptable seed; let the schema say so
      const result = this.validate(source);
      if (!result.success) throw result.error;
    } else {
      for (const [name, value] of this.defaults()) {
        if (!Object.hasOwn(source, name)) {
          defineEntry(candidate, name, detach(value));
        }
      }
      for (const key of Object.keys(source)) {
        defineEntry(candidate, key, detach(Reflect.get(source, key)));
      }
    }

    this.check(candidate);
    return candidate;
  }

  protected parametrized(shape: Shape): RecordLayout {
    const fields = new Map(this.layout.fields);
    const entries = Object.entries(shape);
    for (const [name, descriptor] of entries) {
      fields.set(name, { descriptor, declared: fields.get(name)?.declared ?? false });
    }
    const label = entries.map(([name, descriptor]) => `${name}: ${descriptor.name}`).join(", ");
    return { ...this.layout, name: `${this.name}[{${label}}]`, fields, base: null };
  }

  protected extended<S extends Shape, V>(name: string, definition: RecordDefinition<S, V>): RecordLayout {
    const fields = new Map(this.layout.fields);
    for (const [field, descriptor] of Object.entries(definition.fields)) {
      fields.set(field, { descriptor, declared: true });
    }

    const defaults = new Map(this.layout.defaults);
    for (const [field, value] of Object.entries(definition.defaults ?? {})) {
      defaults.set(field, cloneValue(value));
    }

    return {
      name,
      fields,
      defaults,
      additionalProperties: definition.additionalProperties ?? this.layout.additionalProperties,
      constraints: this.layout.constraints,
      base: null,
    };
  }

  protected refined(constraints: readonly Constraint[]): RecordLayout {
    const name = [this.name, ...constraints.map((constraint) => constraint.name)].join("+");
    checkConstraints(name, this, constraints);
    return {
      ...this.layout,
      name,
      constraints: [...this.layout.constraints, ...constraints],
      base: this,
    };
  }
}

/**
 * Field storage behind one container. Every write (item, attribute, link,
 * config) validates the whole candidate record before it commits.
 */
class FieldStore implements RecordStore {
  private readonly descriptor: TypeDescriptor<unknown>;
  private readonly values: Record<string, unknown>;
  private face: object | null = null;

  constructor(descriptor: TypeDescriptor<unknown>, values: Record<string, unknown>) {
    this.descriptor = descriptor;
    this.values = values;
  }

  get owner(): object {
    return this.face ?? this.values;
  }

  attach(face: object): void {
    this.face = face;
  }

  has(key: string): boolean {
    return Object.hasOwn(this.values, key);
  }

  get(key: string): unknown {
    return this.has(key) ? this.values[key] : undefined;
  }

  keys(): string[] {
    return Object.keys(this.values);
  }

  snapshot(): Record<string, unknown> {
    return { ...this.values };
  }

  check(writes: readonly FieldWrite[]): void {
    this.verify(this.candidate(writes));
  }

  set(key: string, value: unknown): void {
    this.apply([[key, value]]);
  }

  update(values: Readonly<Record<string, unknown>>): void {
    this.apply(Object.keys(values).map((key): FieldWrite => [key, values[key]]));
  }

  receive(writes: readonly FieldWrite[]): void {
    const changes = this.changes(writes);
    if (changes.length === 0) return;
    this.verify(this.candidate(changes));
    for (const [key, value] of changes) {
      this.commit(key, value);
    }
  }

  // All-or-nothing: the local writes and every write they propagate are
  // checked against their stores before any of them commits
  private apply(writes: readonly FieldWrite[]): void {
    const changes = this.changes(writes);
    if (changes.length === 0) return;

    const pending = changes.flatMap(([key, value]) => pendingPropagations(this, key, value));
    const plan = planWrites(this, changes, pending);
    preflight(plan);

    for (const [key, value] of this.changes(plan.get(this) ?? changes)) {
      this.commit(key, value);
    }
    propagate(this, plan, pending);
  }

  // Defaults are never re-applied; a delete only has to keep the record valid
  delete(key: string): boolean {
    if (!this.has(key)) return false;
    const candidate = this.snapshot();
    delete candidate[key];
    this.verify(candidate);
    delete this.values[key];
    return true;
  }

  private changes(writes: readonly FieldWrite[]): FieldWrite[] {
    return writes.filter(([key, value]) => !this.holds(key, value));
  }

  private candidate(writes: readonly FieldWrite[]): Record<string, unknown> {
    const candidate = this.snapshot();
    for (const [key, value] of writes) {
      defineEntry(candidate, key, value);
    }
    return candidate;
  }

  private holds(key: string, value: unknown): boolean {
    return this.has(key) && Object.is(this.values[key], value);
  }

  private verify(candidate: Record<string, unknown>): void {
    const result = this.descriptor.validate(candidate);
    if (!result.success) {
      getLogger().debug(`Rejected write to ${this.descriptor.name}`, {
        path: result.error.path,
        received: result.error.received,
      });
      throw result.error;
    }
  }

  // Stored plain data is a frozen copy, so it only changes through this store
  private commit(key: string, value: unknown): void {
    const oldValue = this.get(key);
    const newValue = detach(value);
    defineEntry(this.values, key, newValue);
    notifyObservers(this, { name: key, oldValue, newValue, object: this.owner });
  }
}

/** Dict-like record: item access through `get` and `set`. */
export class DictDescriptor<T = Record<string, unknown>> extends RecordDescriptor<T> {
  constructor(layout: RecordLayout) {
    super(layout);
  }

  /** Bind a shape; parametrized fields are optional. */
  of<S extends Shape>(shape: S): DictDescriptor<Parametrized<T, S>> {
    return new DictDescriptor<Parametrized<T, S>>(this.parametrized(shape));
  }

  /** Declare a named shape on top of this one; fields without a default are required. */
  extend<S extends Shape>(
    name: string,
    definition: RecordDefinition<S, Extended<T, S>>
  ): DictDescriptor<Extended<T, S>> {
    return new DictDescriptor<Extended<T, S>>(this.extended(name, definition));
  }

  refine(...constraints: Constraint[]): DictDescriptor<T> {
    return new DictDescriptor<T>(this.refined(constraints));
  }

  create(seed?: unknown): DictContainer<T> {
    return new DictContainer(this, seed);
  }
}

export class DictContainer<T = Record<string, unknown>>
  implements RecordHandle, Snapshotable, Iterable<[string, unknown]>
{
  readonly [RECORD_STORE]: RecordStore;
  readonly descriptor: DictDescriptor<T>;

  constructor(descriptor: DictDescriptor<T>, seed?: unknown) {
    const store = new FieldStore(descriptor, descriptor.assemble(seed));
    store.attach(this);
    this.descriptor = descriptor;
    this[RECORD_STORE] = store;
  }

  get size(): number {
    return this[RECORD_STORE].keys().length;
  }

  has(key: string): boolean {
    return this[RECORD_STORE].has(key);
  }

  get<K extends keyof T & string>(key: K): T[K];
  get(key: string): unknown;
  get(key: string): unknown {
    return this[RECORD_STORE].get(key);
  }

  set<K extends keyof T & string>(key: K, value: T[K]): this;
  set(key: string, value: unknown): this;
  set(key: string, value: unknown): this {
    this[RECORD_STORE].set(key, value);
    return this;
  }

  /** Write several fields at once; nothing is written unless all pass. */
  update(values: Readonly<Record<string, unknown>>): this {
    this[RECORD_STORE].update(values);
    return this;
  }

  delete(key: string): boolean {
    return this[RECORD_STORE].delete(key);
  }

  *keys(): IterableIterator<string> {
    yield* this[RECORD_STORE].keys();
  }

  *values(): IterableIterator<unknown> {
    yield* Object.values(this[RECORD_STORE].snapshot());
  }

  *entries(): IterableIterator<[string, unknown]> {
    yield* Object.entries(this[RECORD_STORE].snapshot());
  }

  [Symbol.iterator](): IterableIterator<[string, unknown]> {
    return this.entries();
  }

  link(key: string, other: RecordHandle, otherKey: string): LinkHandle {
    return linkFields(this, key, other, otherKey);
  }

  dlink(key: string, other: RecordHandle, otherKey: string, transform?: LinkTransform): LinkHandle {
    return dlink(this, key, other, otherKey, transform);
  }

  observe(key: string, observer: FieldObserver): ObserveHandle {
    return observe(this, key, observer);
  }

  toJSON(): Record<string, unknown> {
    return this[RECORD_STORE].snapshot();
  }

  [SNAPSHOT](): Record<string, unknown> {
    return this[RECORD_STORE].snapshot();
  }
}

/** An attribute record: fields are read and written as properties. */
export type Bunch<T = Record<string, unknown>> = T & RecordHandle;

function attachStore(values: object, store: RecordStore): asserts values is RecordHandle & Snapshotable {
  Object.defineProperty(values, RECORD_STORE, {
    value: store,
    enumerable: false,
    writable: false,
    configurable: false,
  });
  Object.defineProperty(values, SNAPSHOT, {
    value: () => store.snapshot(),
    enumerable: false,
    writable: false,
    configurable: false,
  });
}

function createBunch<T>(descriptor: BunchDescriptor<T>, seed: unknown): Bunch<T> {
  const values = descriptor.assemble(seed);
  const store = new FieldStore(descriptor, values);
  attachStore(values, store);

  // Property writes and item-style writes both land in store.set
  const proxy = new Proxy(values, {
    get(target, prop, receiver) {
      if (typeof prop === "string" && store.has(prop)) {
        return store.get(prop);
      }
      return Reflect.get(target, prop, receiver);
    },

    set(target, prop, value, receiver) {
      if (typeof prop === "symbol") {
        return Reflect.set(target, prop, value, receiver);
      }
      store.set(prop, value);
      return true;
    },

    deleteProperty(target, prop) {
      if (typeof prop === "symbol") {
        return Reflect.deleteProperty(target, prop);
      }
      store.delete(prop);
      return true;
    },

    defineProperty(target, prop, attributes) {
      if (typeof prop === "symbol") {
        return Reflect.defineProperty(target, prop, attributes);
      }
      // Fields stay plain, configurable data properties
      if (!("value" in attributes) || attributes.get || attributes.set || attributes.configurable === false) {
        return false;
      }
      store.set(prop, attributes.value);
      return true;
    },
  });

  store.attach(proxy);
  return proxy;
}

/** Attribute-record flavor: same validation path as Dict, property access. */
export class BunchDescriptor<T = Record<string, unknown>> extends RecordDescriptor<T> {
  constructor(layout: RecordLayout) {
    super(layout);
  }

  of<S extends Shape>(shape: S): BunchDescriptor<Parametrized<T, S>> {
    return new BunchDescriptor<Parametrized<T, S>>(this.parametrized(shape));
  }

  extend<S extends Shape>(
    name: string,
    definition: RecordDefinition<S, Extended<T, S>>
  ): BunchDescriptor<Extended<T, S>> {
    return new BunchDescriptor<Extended<T, S>>(this.extended(name, definition));
  }

  refine(...constraints: Constraint[]): BunchDescriptor<T> {
    return new BunchDescriptor<T>(this.refined(constraints));
  }

  create(seed?: unknown): Bunch<T> {
    return createBunch(this, seed);
  }
}

export const Dict = new DictDescriptor(emptyLayout("Dict"));
export const Bunch = new BunchDescriptor(emptyLayout("Bunch"));

/** Attribute record meant for linking; `link`, `dlink` and `observe` take it directly. */
export const Evented = new BunchDescriptor(emptyLayout("Evented"));

export function isRecordHandle(value: unknown): value is RecordHandle {
  return value !== null && typeof value === "object" && RECORD_STORE in value;
}
