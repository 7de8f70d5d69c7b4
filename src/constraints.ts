import { cloneValue } from "./clone.js";
import { isStringFormat, STRING_FORMATS } from "./compile.js";
import { NO_NATIVES, Str, type TypeDescriptor } from "./descriptor.js";
import { DefinitionError } from "./errors.js";
import { keywordTypes, schemaDocumentSchema } from "./schema.js";
import type { NativeRegistry, SchemaDocument, SimpleType } from "./types.js";

/**
 * A schema-keyword delta for `refine`. It classifies nothing by itself;
 * it only narrows the descriptor it is merged into.
 */
export class Constraint {
  readonly name: string;
  readonly keywords: SchemaDocument;
  /** Value types the keywords constrain; `null` when they fit any type. */
  readonly appliesTo: readonly SimpleType[] | null;
  readonly natives: NativeRegistry;

  constructor(name: string, keywords: SchemaDocument, natives: NativeRegistry = NO_NATIVES) {
    const parsed = schemaDocumentSchema.safeParse(keywords);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      throw new DefinitionError(name, `invalid keywords (${where}${issue?.message ?? "invalid"})`);
    }
    this.name = name;
    this.keywords = cloneValue(keywords);
    this.appliesTo = keywordTypes(name, this.keywords);
    this.natives = natives;
  }

  toSchema(): SchemaDocument {
    return this.keywords;
  }
}

/** Any catalogue keywords at once, e.g. `constraint({ minLength: 1, maxLength: 8 })`. */
export function constraint(keywords: SchemaDocument, name = "Constraint"): Constraint {
  return new Constraint(name, keywords);
}

// Object keywords

export function Required(...names: string[]): Constraint {
  return new Constraint("Required", { required: names });
}

export function Default(value: unknown): Constraint {
  return new Constraint("Default", { default: value });
}

export function AdditionalProperties(policy: boolean | TypeDescriptor<unknown>): Constraint {
  if (typeof policy === "boolean") {
    return new Constraint("AdditionalProperties", { additionalProperties: policy });
  }
  return new Constraint(
    "AdditionalProperties",
    { additionalProperties: policy.toSchema() },
    policy.natives()
  );
}

export function MinProperties(count: number): Constraint {
  return new Constraint("MinProperties", { minProperties: count });
}

export function MaxProperties(count: number): Constraint {
  return new Constraint("MaxProperties", { maxProperties: count });
}

// Array keywords

export function MinItems(count: number): Constraint {
  return new Constraint("MinItems", { minItems: count });
}

export function MaxItems(count: number): Constraint {
  return new Constraint("MaxItems", { maxItems: count });
}

export function UniqueItems(unique = true): Constraint {
  return new Constraint("UniqueItems", { uniqueItems: unique });
}

// String keywords

export function Pattern(pattern: string | RegExp): Constraint {
  return new Constraint("Pattern", {
    pattern: typeof pattern === "string" ? pattern : pattern.source,
  });
}

export function Format(format: string): Constraint {
  if (!isStringFormat(format)) {
    throw new DefinitionError(
      "Format",
      `unknown format "${format}", expected one of ${STRING_FORMATS.join(", ")}`
    );
  }
  return new Constraint(`Format[${format}]`, { format });
}

export function MinLength(length: number): Constraint {
  return new Constraint("MinLength", { minLength: length });
}

export function MaxLength(length: number): Constraint {
  return new Constraint("MaxLength", { maxLength: length });
}

// Numeric keywords

export function Minimum(bound: number): Constraint {
  return new Constraint("Minimum", { minimum: bound });
}

export function Maximum(bound: number): Constraint {
  return new Constraint("Maximum", { maximum: bound });
}

export function ExclusiveMinimum(bound: number): Constraint {
  return new Constraint("ExclusiveMinimum", { exclusiveMinimum: bound });
}

export function ExclusiveMaximum(bound: number): Constraint {
  return new Constraint("ExclusiveMaximum", { exclusiveMaximum: bound });
}

export function MultipleOf(factor: number): Constraint {
  return new Constraint("MultipleOf", { multipleOf: factor });
}

// Annotations

export function Title(title: string): Constraint {
  return new Constraint("Title", { title });
}

export function Description(description: string): Constraint {
  return new Constraint("Description", { description });
}

export function Examples(...examples: unknown[]): Constraint {
  return new Constraint("Examples", { examples });
}

export const Email = Str.refine(Format("email"));
export const Uri = Str.refine(Format("uri"));
export const Uuid = Str.refine(Format("uuid"));
export const DateTime = Str.refine(Format("date-time"));
export const Hostname = Str.refine(Format("hostname"));
export const Ipv4 = Str.refine(Format("ipv4"));
export const Ipv6 = Str.refine(Format("ipv6"));
