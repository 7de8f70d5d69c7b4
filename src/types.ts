// Symbols for reaching container internals (exported for use across files)
export const RECORD_STORE = Symbol("record_store");
export const SNAPSHOT = Symbol("snapshot");

export const SIMPLE_TYPES = [
  "array",
  "boolean",
  "integer",
  "null",
  "number",
  "object",
  "string",
] as const;

export type SimpleType = (typeof SIMPLE_TYPES)[number];

/**
 * Canonical, serializable description of the values a descriptor accepts.
 * Uses the JSON Schema keyword vocabulary, plus `instanceOf` for native
 * values that no JSON keyword can describe.
 */
export interface SchemaDocument {
  readonly type?: SimpleType;
  readonly title?: string;
  readonly description?: string;
  readonly default?: unknown;
  readonly examples?: readonly unknown[];
  readonly enum?: readonly unknown[];
  readonly const?: unknown;

  readonly properties?: { readonly [name: string]: SchemaDocument };
  readonly required?: readonly string[];
  readonly additionalProperties?: boolean | SchemaDocument;
  readonly minProperties?: number;
  readonly maxProperties?: number;

  readonly items?: SchemaDocument | readonly SchemaDocument[];
  readonly additionalItems?: boolean | SchemaDocument;
  readonly minItems?: number;
  readonly maxItems?: number;
  readonly uniqueItems?: boolean;

  readonly pattern?: string;
  readonly format?: string;
  readonly minLength?: number;
  readonly maxLength?: number;

  readonly minimum?: number;
  readonly maximum?: number;
  readonly exclusiveMinimum?: number;
  readonly exclusiveMaximum?: number;
  readonly multipleOf?: number;

  readonly anyOf?: readonly SchemaDocument[];
  readonly allOf?: readonly SchemaDocument[];
  readonly oneOf?: readonly SchemaDocument[];
  readonly not?: SchemaDocument;

  readonly instanceOf?: string;
}

export type SchemaKeyword = keyof SchemaDocument;

export type NativeConstructor<T = unknown> = abstract new (...args: never[]) => T;

export type NativeRegistry = ReadonlyMap<string, NativeConstructor>;

export type DescriptorKind =
  | "scalar"
  | "instance"
  | "record"
  | "sequence"
  | "union"
  | "combination"
  | "refinement";

export interface FieldChange {
  name: string;
  oldValue: unknown;
  newValue: unknown;
  object: object;
}

export type FieldObserver = (change: FieldChange) => void;

export type FieldWrite = readonly [key: string, value: unknown];

/**
 * Field storage behind dict-like and attribute records. Every entry point
 * (item access, attribute access, links, config binding) goes through it.
 */
export interface RecordStore {
  readonly owner: object;
  has(key: string): boolean;
  get(key: string): unknown;
  keys(): string[];
  snapshot(): Record<string, unknown>;
  set(key: string, value: unknown): void;
  update(values: Readonly<Record<string, unknown>>): void;
  delete(key: string): boolean;
  /** Throws the ValidationFailure the writes, applied together, would raise. */
  check(writes: readonly FieldWrite[]): void;
  /** Validated writes arriving through a link; they do not trigger further links. */
  receive(writes: readonly FieldWrite[]): void;
}

export interface RecordHandle {
  readonly [RECORD_STORE]: RecordStore;
}

export interface Snapshotable {
  [SNAPSHOT](): unknown;
}
