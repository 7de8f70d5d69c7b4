import { z } from "zod";
import { DefinitionError, type PathSegment } from "./errors.js";
import { SIMPLE_TYPES, type SchemaDocument, type SchemaKeyword, type SimpleType } from "./types.js";

const count = z.number().int().nonnegative();

// Meta-schema: the keyword vocabulary a Schema Document may use
export const schemaDocumentSchema: z.ZodType<SchemaDocument> = z.lazy(() =>
  z
    .object({
      type: z.enum(SIMPLE_TYPES).optional(),
      title: z.string().optional(),
      description: z.string().optional(),
      default: z.unknown().optional(),
      examples: z.array(z.unknown()).optional(),
      enum: z.array(z.unknown()).min(1).optional(),
      const: z.unknown().optional(),

      properties: z.record(schemaDocumentSchema).optional(),
      required: z.array(z.string()).optional(),
      additionalProperties: z.union([z.boolean(), schemaDocumentSchema]).optional(),
      minProperties: count.optional(),
      maxProperties: count.optional(),

      items: z.union([schemaDocumentSchema, z.array(schemaDocumentSchema)]).optional(),
      additionalItems: z.union([z.boolean(), schemaDocumentSchema]).optional(),
      minItems: count.optional(),
      maxItems: count.optional(),
      uniqueItems: z.boolean().optional(),

      pattern: z
        .string()
        .refine(isRegExpSource, { message: "Invalid regular expression" })
        .optional(),
      format: z.string().optional(),
      minLength: count.optional(),
      maxLength: count.optional(),

      minimum: z.number().optional(),
      maximum: z.number().optional(),
      exclusiveMinimum: z.number().optional(),
      exclusiveMaximum: z.number().optional(),
      multipleOf: z.number().positive().optional(),

      anyOf: z.array(schemaDocumentSchema).min(1).optional(),
      allOf: z.array(schemaDocumentSchema).min(1).optional(),
      oneOf: z.array(schemaDocumentSchema).min(1).optional(),
      not: schemaDocumentSchema.optional(),

      instanceOf: z.string().optional(),
    })
    .strict()
);

export function isRegExpSource(source: string): boolean {
  try {
    new RegExp(source, "u");
    return true;
  } catch {
    return false;
  }
}

// Value types each type-specific keyword applies to
const KEYWORD_TYPES: Partial<Record<SchemaKeyword, readonly SimpleType[]>> = {
  properties: ["object"],
  required: ["object"],
  additionalProperties: ["object"],
  minProperties: ["object"],
  maxProperties: ["object"],
  items: ["array"],
  additionalItems: ["array"],
  minItems: ["array"],
  maxItems: ["array"],
  uniqueItems: ["array"],
  pattern: ["string"],
  format: ["string"],
  minLength: ["string"],
  maxLength: ["string"],
  minimum: ["number", "integer"],
  maximum: ["number", "integer"],
  exclusiveMinimum: ["number", "integer"],
  exclusiveMaximum: ["number", "integer"],
  multipleOf: ["number", "integer"],
};

/**
 * Value types a keyword set can constrain, or `null` when every keyword is
 * type-agnostic (`default`, `title`, `enum`, ...).
 */
export function keywordTypes(name: string, keywords: SchemaDocument): readonly SimpleType[] | null {
  let types: readonly SimpleType[] | null = keywords.type ? [keywords.type] : null;
  for (const keyword of keywordsOf(keywords)) {
    const accepted = KEYWORD_TYPES[keyword];
    if (!accepted) continue;
    const narrowed: readonly SimpleType[] = types
      ? types.filter((type) => accepted.includes(type))
      : accepted;
    if (narrowed.length === 0) {
      throw new DefinitionError(
        name,
        `keyword "${keyword}" cannot be combined with ${describeTypes(types ?? [])} keywords`
      );
    }
    types = narrowed;
  }
  return types;
}

export function describeTypes(types: readonly SimpleType[]): string {
  return types.map((type) => `"${type}"`).join(" or ");
}

export function keywordsOf(document: SchemaDocument): SchemaKeyword[] {
  return Object.keys(document).filter(isSchemaKeyword);
}

function isSchemaKeyword(key: string): key is SchemaKeyword {
  return key in schemaKeywordSet;
}

const schemaKeywordSet: Record<SchemaKeyword, true> = {
  type: true,
  title: true,
  description: true,
  default: true,
  examples: true,
  enum: true,
  const: true,
  properties: true,
  required: true,
  additionalProperties: true,
  minProperties: true,
  maxProperties: true,
  items: true,
  additionalItems: true,
  minItems: true,
  maxItems: true,
  uniqueItems: true,
  pattern: true,
  format: true,
  minLength: true,
  maxLength: true,
  minimum: true,
  maximum: true,
  exclusiveMinimum: true,
  exclusiveMaximum: true,
  multipleOf: true,
  anyOf: true,
  allOf: true,
  oneOf: true,
  not: true,
  instanceOf: true,
};

/**
 * Merge refinement keywords into a base document.
 *
 * `required` is the union of both lists and `properties` are merged by name
 * (the delta wins). Every other keyword in the delta replaces the base's.
 */
export function mergeSchema(base: SchemaDocument, delta: SchemaDocument): SchemaDocument {
  return {
    ...base,
    ...delta,
    ...(base.required && delta.required
      ? { required: [...new Set([...base.required, ...delta.required])] }
      : {}),
    ...(base.properties && delta.properties
      ? { properties: { ...base.properties, ...delta.properties } }
      : {}),
  };
}

export function isSchemaList(
  items: SchemaDocument | readonly SchemaDocument[]
): items is readonly SchemaDocument[] {
  return Array.isArray(items);
}

export interface SchemaLocation {
  schema: SchemaDocument | boolean;
  schemaPath: string;
}

/** Find the fragment of `document` that governs the value at `path`. */
export function schemaAt(document: SchemaDocument, path: readonly PathSegment[]): SchemaLocation {
  let schema: SchemaDocument | boolean = document;
  let schemaPath = "";

  for (const segment of path) {
    if (typeof schema === "boolean") break;

    if (typeof segment === "number") {
      const items: SchemaDocument | readonly SchemaDocument[] | undefined = schema.items;
      if (items === undefined) break;
      if (!isSchemaList(items)) {
        schema = items;
        schemaPath += ".items";
      } else if (segment < items.length) {
        schema = items[segment];
        schemaPath += `.items[${segment}]`;
      } else {
        schema = schema.additionalItems ?? true;
        schemaPath += ".additionalItems";
      }
      continue;
    }

    const property: SchemaDocument | undefined = schema.properties?.[segment];
    if (property && Object.hasOwn(schema.properties ?? {}, segment)) {
      schema = property;
      schemaPath += `.properties.${segment}`;
    } else if (schema.type === "object" || schema.properties) {
      schema = schema.additionalProperties ?? true;
      schemaPath += ".additionalProperties";
    } else {
      break;
    }
  }

  return { schema, schemaPath };
}

/** Read the value at `path`, or `undefined` when the path leaves the value. */
export function valueAt(value: unknown, path: readonly PathSegment[]): unknown {
  let current = value;
  for (const segment of path) {
    if (current === null || typeof current !== "object") return undefined;
    if (!Object.hasOwn(current, segment)) return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

/** Freeze a synthesized document so the cached copy can be handed out. */
export function freezeSchema<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      freezeSchema(Reflect.get(value, key));
    }
  }
  return value;
}
