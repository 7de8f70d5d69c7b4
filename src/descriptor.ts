import type { z } from "zod";
import { cloneValue, toPlain } from "./clone.js";
import { compileSchema, reportIssues, toValidationFailure } from "./compile.js";
import type { Constraint } from "./constraints.js";
import { DefinitionError, type ValidationFailure } from "./errors.js";
import { describeTypes, freezeSchema, mergeSchema } from "./schema.js";
import type {
  DescriptorKind,
  NativeConstructor,
  NativeRegistry,
  SchemaDocument,
} from "./types.js";

// Synthesized documents and compiled validators, keyed by descriptor identity
const schemaCache = new WeakMap<object, SchemaDocument>();
const validatorCache = new WeakMap<object, z.ZodTypeAny>();

export const NO_NATIVES: NativeRegistry = new Map();

export type ValidationResult<T> =
  | { success: true; value: T }
  | { success: false; error: ValidationFailure };

export type Infer<D> = D extends TypeDescriptor<infer T> ? T : never;

/**
 * A value classifier. Renders itself as a Schema Document and validates
 * candidates against that document.
 *
 * Descriptors are immutable: combinators build new descriptors that refer
 * to their operands.
 */
export abstract class TypeDescriptor<T = unknown> {
  abstract readonly kind: DescriptorKind;
  readonly name: string;

  protected constructor(name: string) {
    this.name = name;
  }

  protected abstract synthesize(): SchemaDocument;

  /** Native constructors referenced through `instanceOf` in this tree. */
  natives(): NativeRegistry {
    return NO_NATIVES;
  }

  protected compile(): z.ZodTypeAny {
    return compileSchema(this.toSchema(), this.natives());
  }

  toSchema(): SchemaDocument {
    let schema = schemaCache.get(this);
    if (!schema) {
      schema = freezeSchema(this.synthesize());
      schemaCache.set(this, schema);
    }
    return schema;
  }

  validator(): z.ZodType<T> {
    let validator = validatorCache.get(this);
    if (!validator) {
      validator = this.compile();
      validatorCache.set(this, validator);
    }
    return validator;
  }

  validate(value: unknown): ValidationResult<T> {
    const candidate = toPlain(value);
    const result = this.validator().safeParse(candidate);
    if (result.success) {
      return { success: true, value: result.data };
    }
    return {
      success: false,
      error: toValidationFailure(result.error, this.toSchema(), candidate),
    };
  }

  /** Throw the ValidationFailure for `value`, if any. */
  check(value: unknown): asserts value is T {
    const result = this.validate(value);
    if (!result.success) throw result.error;
  }

  assert(value: unknown): T {
    const result = this.validate(value);
    if (!result.success) throw result.error;
    return result.value;
  }

  is(value: unknown): value is T {
    return this.validate(value).success;
  }

  union<const D extends readonly TypeDescriptor<unknown>[]>(
    ...others: D
  ): UnionDescriptor<T | Infer<D[number]>> {
    return new UnionDescriptor([this, ...others]);
  }

  refine(...constraints: Constraint[]): TypeDescriptor<T> {
    return new RefinementDescriptor(this, constraints);
  }
}

/**
 * Combine native registries, rejecting two different constructors that
 * share a name.
 */
export function mergeNatives(owner: string, registries: Iterable<NativeRegistry>): NativeRegistry {
  const merged = new Map<string, NativeConstructor>();
  for (const registry of registries) {
    for (const [name, native] of registry) {
      const existing = merged.get(name);
      if (existing && existing !== native) {
        throw new DefinitionError(owner, `two different native types are named "${name}"`);
      }
      merged.set(name, native);
    }
  }
  return merged.size === 0 ? NO_NATIVES : merged;
}

/**
 * Reject constraints that do not fit `base`: keywords for another value
 * type, or a default the base itself would refuse.
 */
export function checkConstraints(
  owner: string,
  base: TypeDescriptor<unknown>,
  constraints: readonly Constraint[]
): void {
  const type = base.toSchema().type;
  for (const constraint of constraints) {
    const accepted = constraint.appliesTo;
    if (accepted !== null) {
      if (type === undefined) {
        throw new DefinitionError(
          owner,
          `${constraint.name} constrains ${describeTypes(accepted)} values but ${base.name} has no type`
        );
      }
      if (!accepted.includes(type)) {
        throw new DefinitionError(owner, `${constraint.name} cannot refine "${type}" descriptor ${base.name}`);
      }
    }
    if (Object.hasOwn(constraint.keywords, "default")) {
      const result = base.validate(constraint.keywords.default);
      if (!result.success) {
        throw new DefinitionError(owner, `default is rejected by ${base.name} (${result.error.message})`);
      }
    }
  }
}

export class ScalarDescriptor<T> extends TypeDescriptor<T> {
  readonly kind = "scalar";
  private readonly schema: SchemaDocument;

  constructor(name: string, schema: SchemaDocument) {
    super(name);
    this.schema = cloneValue(schema);
  }

  protected synthesize(): SchemaDocument {
    return this.schema;
  }
}

export const Integer = new ScalarDescriptor<number>("Integer", { type: "integer" });
export const Float = new ScalarDescriptor<number>("Float", { type: "number" });
export const Str = new ScalarDescriptor<string>("String", { type: "string" });
export const Bool = new ScalarDescriptor<boolean>("Bool", { type: "boolean" });
export const Null = new ScalarDescriptor<null>("Null", { type: "null" });
export const Any = new ScalarDescriptor<unknown>("Any", {});

/** Accepts exactly the listed values. */
export function enumOf<const V extends readonly unknown[]>(...values: V): ScalarDescriptor<V[number]> {
  if (values.length === 0) {
    throw new DefinitionError("Enum", "needs at least one value");
  }
  return new ScalarDescriptor(`Enum[${values.map((value) => JSON.stringify(value)).join(", ")}]`, {
    enum: values,
  });
}

/** Accepts exactly `value`. */
export function literal<const V>(value: V): ScalarDescriptor<V> {
  return new ScalarDescriptor(`Const[${JSON.stringify(value)}]`, { const: value });
}

/**
 * Escape hatch for opaque native values: accepts anything the runtime
 * reports as an instance of `native`.
 */
export class InstanceDescriptor<T> extends TypeDescriptor<T> {
  readonly kind = "instance";
  readonly native: NativeConstructor<T>;
  readonly nativeName: string;
  private readonly registry: NativeRegistry;

  constructor(native: NativeConstructor<T>, name: string = native.name) {
    super(`Instance[${name}]`);
    if (!name) {
      throw new DefinitionError("Instance", "native type needs a name");
    }
    this.native = native;
    this.nativeName = name;
    this.registry = new Map([[name, native]]);
  }

  natives(): NativeRegistry {
    return this.registry;
  }

  protected synthesize(): SchemaDocument {
    return { instanceOf: this.nativeName };
  }
}

export function instanceOf<T>(native: NativeConstructor<T>, name?: string): InstanceDescriptor<T> {
  return new InstanceDescriptor(native, name);
}

/**
 * Accepts a value when any operand does. Nested unions are flattened, so
 * grouping does not change the document.
 */
export class UnionDescriptor<T> extends TypeDescriptor<T> {
  readonly kind = "union";
  readonly operands: readonly TypeDescriptor<unknown>[];
  private readonly registry: NativeRegistry;

  constructor(operands: readonly TypeDescriptor<unknown>[]) {
    const flattened = operands.flatMap((operand) =>
      operand instanceof UnionDescriptor ? operand.operands : [operand]
    );
    super(flattened.map((operand) => operand.name).join(" | "));
    if (flattened.length === 0) {
      throw new DefinitionError("AnyOf", "needs at least one operand");
    }
    this.operands = flattened;
    this.registry = mergeNatives(
      this.name,
      flattened.map((operand) => operand.natives())
    );
  }

  natives(): NativeRegistry {
    return this.registry;
  }

  protected synthesize(): SchemaDocument {
    return { anyOf: this.operands.map((operand) => operand.toSchema()) };
  }
}

export function union<const D extends readonly TypeDescriptor<unknown>[]>(
  ...operands: D
): UnionDescriptor<Infer<D[number]>> {
  return new UnionDescriptor(operands);
}

type CombinationKeyword = "allOf" | "oneOf" | "not";

export class CombinationDescriptor<T> extends TypeDescriptor<T> {
  readonly kind = "combination";
  readonly keyword: CombinationKeyword;
  readonly operands: readonly TypeDescriptor<unknown>[];
  private readonly registry: NativeRegistry;

  constructor(keyword: CombinationKeyword, operands: readonly TypeDescriptor<unknown>[]) {
    const label = keyword === "not" ? "Not" : keyword === "allOf" ? "AllOf" : "OneOf";
    super(`${label}[${operands.map((operand) => operand.name).join(", ")}]`);
    if (operands.length === 0 || (keyword === "not" && operands.length !== 1)) {
      throw new DefinitionError(this.name, `${keyword} takes ${keyword === "not" ? "one operand" : "operands"}`);
    }
    this.keyword = keyword;
    this.operands = operands;
    this.registry = mergeNatives(
      this.name,
      operands.map((operand) => operand.natives())
    );
  }

  natives(): NativeRegistry {
    return this.registry;
  }

  protected synthesize(): SchemaDocument {
    const schemas = this.operands.map((operand) => operand.toSchema());
    switch (this.keyword) {
      case "not":
        return { not: schemas[0] };
      case "allOf":
        return { allOf: schemas };
      case "oneOf":
        return { oneOf: schemas };
    }
  }
}

/** Accepts a value when every operand does. */
export function allOf<const D extends readonly TypeDescriptor<unknown>[]>(
  ...operands: D
): CombinationDescriptor<unknown> {
  return new CombinationDescriptor("allOf", operands);
}

/** Accepts a value when exactly one operand does. */
export function oneOf<const D extends readonly TypeDescriptor<unknown>[]>(
  ...operands: D
): CombinationDescriptor<Infer<D[number]>> {
  return new CombinationDescriptor("oneOf", operands);
}

export function not(operand: TypeDescriptor<unknown>): CombinationDescriptor<unknown> {
  return new CombinationDescriptor("not", [operand]);
}

/**
 * A base descriptor narrowed by constraint keywords. The document is the
 * base document with the constraint keywords merged in; validation also
 * runs the base, so a keyword override can never widen acceptance.
 */
export class RefinementDescriptor<T> extends TypeDescriptor<T> {
  readonly kind = "refinement";
  readonly base: TypeDescriptor<T>;
  readonly constraints: readonly Constraint[];
  private readonly registry: NativeRegistry;

  constructor(base: TypeDescriptor<T>, constraints: readonly Constraint[]) {
    super([base.name, ...constraints.map((constraint) => constraint.name)].join("+"));
    checkConstraints(this.name, base, constraints);
    this.base = base;
    this.constraints = constraints;
    this.registry = mergeNatives(this.name, [
      base.natives(),
      ...constraints.map((constraint) => constraint.natives),
    ]);
  }

  natives(): NativeRegistry {
    return this.registry;
  }

  protected synthesize(): SchemaDocument {
    return this.constraints.reduce(
      (schema, constraint) => mergeSchema(schema, constraint.keywords),
      this.base.toSchema()
    );
  }

  protected compile(): z.ZodTypeAny {
    const base = this.base.validator();
    return super.compile().superRefine((value, ctx) => {
      reportIssues(base.safeParse(value), ctx, []);
    });
  }
}

export function refine<T>(base: TypeDescriptor<T>, ...constraints: Constraint[]): TypeDescriptor<T> {
  return base.refine(...constraints);
}
