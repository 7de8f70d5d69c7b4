import type { z } from "zod";
import { cloneValue, detach, isSnapshotable } from "./clone.js";
import { reportIssues } from "./compile.js";
import { type Constraint, UniqueItems } from "./constraints.js";
import { checkConstraints, type Infer, mergeNatives, NO_NATIVES, TypeDescriptor, union } from "./descriptor.js";
import { DefinitionError } from "./errors.js";
import { getLogger } from "./logger.js";
import { mergeSchema } from "./schema.js";
import { type NativeRegistry, type SchemaDocument, SNAPSHOT, type Snapshotable } from "./types.js";

type ItemLayout =
  | { mode: "any" }
  | { mode: "homogeneous"; descriptor: TypeDescriptor<unknown> }
  | { mode: "positional"; descriptors: readonly TypeDescriptor<unknown>[] };

export interface SequenceLayout {
  readonly name: string;
  readonly items: ItemLayout;
  // Tuples: length is fixed at construction
  readonly fixed: boolean;
  readonly constraints: readonly Constraint[];
  readonly base: TypeDescriptor<unknown> | null;
}

export type InferTuple<D extends readonly TypeDescriptor<unknown>[]> = {
  -readonly [K in keyof D]: Infer<D[K]>;
};

type SlotArgument = TypeDescriptor<unknown> | readonly TypeDescriptor<unknown>[];

// `of(A, B)` lists alternatives, `of([A, B])` lists positions
function readSlots(
  owner: string,
  args: readonly SlotArgument[]
): { positional: boolean; descriptors: TypeDescriptor<unknown>[] } {
  const [first] = args;
  const positional = args.length === 1 && first !== undefined && !(first instanceof TypeDescriptor);
  const candidates: readonly unknown[] = positional ? [...args.flat()] : args;

  const descriptors = candidates.map((candidate, index) => {
    if (!(candidate instanceof TypeDescriptor)) {
      throw new DefinitionError(owner, `item ${index} is not a type descriptor`);
    }
    return candidate;
  });
  if (descriptors.length === 0) {
    throw new DefinitionError(owner, "needs at least one item descriptor");
  }
  return { positional, descriptors };
}

function itemNatives(items: ItemLayout): NativeRegistry[] {
  switch (items.mode) {
    case "any":
      return [];
    case "homogeneous":
      return [items.descriptor.natives()];
    case "positional":
      return items.descriptors.map((descriptor) => descriptor.natives());
  }
}

/**
 * Array-shaped descriptor shared by lists and tuples.
 */
export abstract class SequenceDescriptor<T> extends TypeDescriptor<T> {
  readonly kind = "sequence";
  protected readonly layout: SequenceLayout;
  private readonly registry: NativeRegistry;

  protected constructor(layout: SequenceLayout) {
    super(layout.name);
    this.layout = layout;
    this.registry = mergeNatives(layout.name, [
      ...itemNatives(layout.items),
      ...layout.constraints.map((constraint) => constraint.natives),
      layout.base?.natives() ?? NO_NATIVES,
    ]);

    const schema = this.toSchema();
    if (Object.hasOwn(schema, "default")) {
      const result = this.validate(schema.default);
      if (!result.success) {
        throw new DefinitionError(layout.name, `default is rejected (${result.error.message})`);
      }
    }
  }

  natives(): NativeRegistry {
    return this.registry;
  }

  protected synthesize(): SchemaDocument {
    const { items, fixed } = this.layout;
    let document: SchemaDocument = { type: "array" };
    if (items.mode === "homogeneous") {
      document = { type: "array", items: items.descriptor.toSchema() };
    } else if (items.mode === "positional") {
      const slots = items.descriptors.map((descriptor) => descriptor.toSchema());
      document = fixed
        ? { type: "array", items: slots, minItems: slots.length, maxItems: slots.length }
        : { type: "array", items: slots };
    }

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
   * Initial items for a new container: the seed's items, or the
   * descriptor's default, or nothing. Only arrays are accepted.
   */
  assemble(seed: unknown): unknown[] & T {
    let source: unknown = seed;
    if (source === undefined) {
      const schema = this.toSchema();
      source = Object.hasOwn(schema, "default") ? cloneValue(schema.default) : [];
    } else if (isSnapshotable(source)) {
      source = source[SNAPSHOT]();
    }

    if (!Array.isArray(source)) {
      const result = this.validate(source);
      if (!result.success) throw result.error;
    }
    const candidate: unknown[] = Array.isArray(source) ? source.map((item: unknown) => detach(item)) : [];
    this.check(candidate);
    return candidate;
  }

  protected withItems(name: string, items: ItemLayout): SequenceLayout {
    return { ...this.layout, name, items, base: null };
  }

  protected refined(constraints: readonly Constraint[]): SequenceLayout {
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

function listItems(owner: string, args: readonly SlotArgument[]): ItemLayout {
  const { positional, descriptors } = readSlots(owner, args);
  if (positional) return { mode: "positional", descriptors };
  const [only] = descriptors;
  if (descriptors.length === 1 && only) return { mode: "homogeneous", descriptor: only };
  return { mode: "homogeneous", descriptor: union(...descriptors) };
}

function describeItems(items: ItemLayout): string {
  switch (items.mode) {
    case "any":
      return "";
    case "homogeneous":
      return items.descriptor.name;
    case "positional":
      return `(${items.descriptors.map((descriptor) => descriptor.name).join(", ")})`;
  }
}

export class ListDescriptor<E = unknown> extends SequenceDescriptor<E[]> {
  private readonly rootName: string;

  constructor(layout: SequenceLayout, rootName: string = layout.name) {
    super(layout);
    this.rootName = rootName;
  }

  /**
   * `of(A)` holds A items, `of(A, B)` holds items that are A or B, and
   * `of([A, B])` checks items by position.
   */
  of<const D extends readonly TypeDescriptor<unknown>[]>(slots: D): ListDescriptor<Infer<D[number]>>;
  of<const D extends readonly TypeDescriptor<unknown>[]>(...items: D): ListDescriptor<Infer<D[number]>>;
  of(...args: readonly SlotArgument[]): ListDescriptor<unknown> {
    const items = listItems(this.rootName, args);
    return new ListDescriptor(this.withItems(`${this.rootName}[${describeItems(items)}]`, items), this.rootName);
  }

  refine(...constraints: Constraint[]): ListDescriptor<E> {
    return new ListDescriptor<E>(this.refined(constraints), this.rootName);
  }

  create(seed?: unknown): ListContainer<E> {
    return new ListContainer(this, seed);
  }
}

function resolveIndex(index: number, length: number): number {
  const resolved = index < 0 ? length + index : index;
  if (!Number.isInteger(resolved) || resolved < 0 || resolved >= length) {
    throw new RangeError(`Index ${index} out of range for length ${length}`);
  }
  return resolved;
}

/**
 * Mutation-guarded list. Every operation builds the candidate list,
 * validates it whole and only then replaces the items.
 */
export class ListContainer<E = unknown> implements Snapshotable, Iterable<E> {
  readonly descriptor: ListDescriptor<E>;
  private items: E[];

  constructor(descriptor: ListDescriptor<E>, seed?: unknown) {
    this.descriptor = descriptor;
    this.items = descriptor.assemble(seed);
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): E | undefined {
    return this.items.at(index);
  }

  includes(item: E): boolean {
    return this.items.includes(item);
  }

  append(item: E): this {
    return this.commit([...this.items, detach(item)]);
  }

  extend(items: Iterable<E>): this {
    return this.commit([...this.items, ...Array.from(items, (item) => detach(item))]);
  }

  insert(index: number, item: E): this {
    const candidate = [...this.items];
    candidate.splice(index, 0, detach(item));
    return this.commit(candidate);
  }

  set(index: number, item: E): this {
    const candidate = [...this.items];
    candidate[resolveIndex(index, candidate.length)] = detach(item);
    return this.commit(candidate);
  }

  pop(): E {
    return this.removeAt(-1);
  }

  removeAt(index: number): E {
    const candidate = [...this.items];
    const [removed] = candidate.splice(resolveIndex(index, candidate.length), 1);
    this.commit(candidate);
    return removed;
  }

  clear(): this {
    return this.commit([]);
  }

  [Symbol.iterator](): Iterator<E> {
    return this.items[Symbol.iterator]();
  }

  toJSON(): E[] {
    return [...this.items];
  }

  [SNAPSHOT](): E[] {
    return [...this.items];
  }

  private commit(candidate: E[]): this {
    const result = this.descriptor.validate(candidate);
    if (!result.success) {
      getLogger().debug(`Rejected write to ${this.descriptor.name}`, {
        path: result.error.path,
        received: result.error.received,
      });
      throw result.error;
    }
    this.items = candidate;
    return this;
  }
}

export class TupleDescriptor<T = unknown[]> extends SequenceDescriptor<T> {
  constructor(layout: SequenceLayout) {
    super(layout);
  }

  /** `of(A, B)` and `of([A, B])` both declare the positions A then B. */
  of<const D extends readonly TypeDescriptor<unknown>[]>(slots: D): TupleDescriptor<InferTuple<D>>;
  of<const D extends readonly TypeDescriptor<unknown>[]>(...slots: D): TupleDescriptor<InferTuple<D>>;
  of(...args: readonly SlotArgument[]): TupleDescriptor<unknown[]> {
    const { descriptors } = readSlots("Tuple", args);
    const items: ItemLayout = { mode: "positional", descriptors };
    return new TupleDescriptor(
      this.withItems(`Tuple[${descriptors.map((descriptor) => descriptor.name).join(", ")}]`, items)
    );
  }

  refine(...constraints: Constraint[]): TupleDescriptor<T> {
    return new TupleDescriptor<T>(this.refined(constraints));
  }

  create(seed?: unknown): TupleContainer<T> {
    return new TupleContainer(this, seed);
  }
}

/** Fixed-length, positionally typed sequence. Items can be replaced, not added or removed. */
export class TupleContainer<T = unknown[]> implements Snapshotable, Iterable<unknown> {
  readonly descriptor: TupleDescriptor<T>;
  private items: unknown[];

  constructor(descriptor: TupleDescriptor<T>, seed?: unknown) {
    this.descriptor = descriptor;
    this.items = descriptor.assemble(seed);
  }

  get length(): number {
    return this.items.length;
  }

  get<K extends keyof T & number>(index: K): T[K];
  get(index: number): unknown;
  get(index: number): unknown {
    return this.items[resolveIndex(index, this.items.length)];
  }

  set<K extends keyof T & number>(index: K, value: T[K]): this;
  set(index: number, value: unknown): this;
  set(index: number, value: unknown): this {
    const candidate = [...this.items];
    candidate[resolveIndex(index, candidate.length)] = detach(value);
    this.descriptor.check(candidate);
    this.items = candidate;
    return this;
  }

  [Symbol.iterator](): Iterator<unknown> {
    return this.items[Symbol.iterator]();
  }

  toJSON(): unknown[] {
    return [...this.items];
  }

  [SNAPSHOT](): unknown[] {
    return [...this.items];
  }
}

export const List = new ListDescriptor({
  name: "List",
  items: { mode: "any" },
  fixed: false,
  constraints: [],
  base: null,
});

/** List whose items are pairwise distinct. */
export const Unique = new ListDescriptor({
  name: "Unique",
  items: { mode: "any" },
  fixed: false,
  constraints: [UniqueItems()],
  base: null,
});

export const Tuple = new TupleDescriptor({
  name: "Tuple",
  items: { mode: "any" },
  fixed: true,
  constraints: [],
  base: null,
});
