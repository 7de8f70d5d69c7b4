import { isDeepStrictEqual } from "node:util";
import { z } from "zod";
import { formatPath, type PathSegment, ValidationFailure } from "./errors.js";
import { isRegExpSource, isSchemaList, schemaAt, valueAt } from "./schema.js";
import type { NativeRegistry, SchemaDocument } from "./types.js";

type Check = (value: unknown, ctx: z.RefinementCtx) => void;

export const STRING_FORMATS = [
  "email",
  "uri",
  "uuid",
  "date-time",
  "date",
  "time",
  "ipv4",
  "ipv6",
  "hostname",
  "regex",
] as const;

export type StringFormat = (typeof STRING_FORMATS)[number];

const HOSTNAME =
  /^(?=.{1,253}$)[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?(?:\.[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?)*$/;

const FORMATS: Record<StringFormat, (schema: z.ZodString) => z.ZodTypeAny> = {
  email: (schema) => schema.email(),
  uri: (schema) => schema.url(),
  uuid: (schema) => schema.uuid(),
  "date-time": (schema) => schema.datetime({ offset: true }),
  date: (schema) => schema.date(),
  time: (schema) => schema.time(),
  ipv4: (schema) => schema.ip({ version: "v4" }),
  ipv6: (schema) => schema.ip({ version: "v6" }),
  hostname: (schema) => schema.regex(HOSTNAME, { message: "Invalid hostname" }),
  regex: (schema) => schema.refine(isRegExpSource, { message: "Invalid regular expression" }),
};

export function isStringFormat(format: string): format is StringFormat {
  return format in FORMATS;
}

/**
 * Compile a Schema Document into the zod schema that checks it.
 * Values are only checked, never transformed.
 */
export function compileSchema(document: SchemaDocument, natives: NativeRegistry): z.ZodTypeAny {
  const base = compileType(document, natives);
  const checks = keywordChecks(document, natives);
  if (checks.length === 0) return base;

  return base.superRefine((value, ctx) => {
    for (const check of checks) {
      check(value, ctx);
    }
  });
}

function compileType(document: SchemaDocument, natives: NativeRegistry): z.ZodTypeAny {
  switch (document.type) {
    case "string":
      return compileString(document);
    case "integer":
      return compileNumber(z.number().int(), document);
    case "number":
      return compileNumber(z.number(), document);
    case "boolean":
      return z.boolean();
    case "null":
      return z.null();
    case "array":
      return compileArray(document, natives);
    case "object":
      return compileObject(document, natives);
    default:
      return z.unknown();
  }
}

function compileString(document: SchemaDocument): z.ZodTypeAny {
  let schema = z.string();
  if (document.minLength !== undefined) schema = schema.min(document.minLength);
  if (document.maxLength !== undefined) schema = schema.max(document.maxLength);
  if (document.pattern !== undefined) schema = schema.regex(new RegExp(document.pattern, "u"));
  if (document.format !== undefined && isStringFormat(document.format)) {
    return FORMATS[document.format](schema);
  }
  return schema;
}

function compileNumber(schema: z.ZodNumber, document: SchemaDocument): z.ZodTypeAny {
  if (document.minimum !== undefined) schema = schema.gte(document.minimum);
  if (document.maximum !== undefined) schema = schema.lte(document.maximum);
  if (document.exclusiveMinimum !== undefined) schema = schema.gt(document.exclusiveMinimum);
  if (document.exclusiveMaximum !== undefined) schema = schema.lt(document.exclusiveMaximum);
  if (document.multipleOf !== undefined) schema = schema.multipleOf(document.multipleOf);
  return schema;
}

function compileArray(document: SchemaDocument, natives: NativeRegistry): z.ZodTypeAny {
  const items = document.items;
  const element = items === undefined || isSchemaList(items) ? z.unknown() : compileSchema(items, natives);

  let schema = z.array(element);
  if (document.minItems !== undefined) schema = schema.min(document.minItems);
  if (document.maxItems !== undefined) schema = schema.max(document.maxItems);

  const checks: Check[] = [];

  // Positional items: each slot has its own schema, the rest follow additionalItems
  if (items !== undefined && isSchemaList(items)) {
    const slots = items.map((item) => compileSchema(item, natives));
    const extra = document.additionalItems;
    const rest =
      extra === undefined || extra === true
        ? null
        : extra === false
          ? false
          : compileSchema(extra, natives);

    checks.push((value, ctx) => {
      if (!Array.isArray(value)) return;
      value.forEach((item: unknown, index) => {
        const slot = index < slots.length ? slots[index] : rest;
        if (slot === null) return;
        if (slot === false) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Expected at most ${slots.length} items`,
            path: [index],
          });
          return;
        }
        reportIssues(slot.safeParse(item), ctx, [index]);
      });
    });
  }

  if (document.uniqueItems) {
    checks.push((value, ctx) => {
      if (!Array.isArray(value)) return;
      value.forEach((item: unknown, index) => {
        const first = value.findIndex((other: unknown) => isDeepStrictEqual(other, item));
        if (first < index) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate of item ${first}`,
            path: [index],
          });
        }
      });
    });
  }

  if (checks.length === 0) return schema;
  return schema.superRefine((value, ctx) => {
    for (const check of checks) {
      check(value, ctx);
    }
  });
}

function compileObject(document: SchemaDocument, natives: NativeRegistry): z.ZodTypeAny {
  const properties = document.properties ?? {};
  const required = new Set(document.required ?? []);

  const shape: z.ZodRawShape = {};
  // Names whose presence zod cannot see: undeclared ones, and declared ones
  // whose schema accepts `undefined` (a missing key reads as `undefined`)
  const presence = [...required].filter((name) => !Object.hasOwn(properties, name));
  // Optional fields whose schema rejects `undefined`: absent is fine, present-but-undefined is not
  const defined = new Map<string, z.ZodTypeAny>();
  for (const [name, property] of Object.entries(properties)) {
    const compiled = compileSchema(property, natives);
    const acceptsUndefined = compiled.safeParse(undefined).success;
    if (required.has(name)) {
      shape[name] = compiled;
      if (acceptsUndefined) presence.push(name);
    } else {
      shape[name] = compiled.optional();
      if (!acceptsUndefined) defined.set(name, compiled);
    }
  }

  const object = z.object(shape);
  const extra = document.additionalProperties;
  const schema: z.ZodTypeAny =
    extra === false
      ? object.strict()
      : extra === undefined || extra === true
        ? object.passthrough()
        : object.catchall(compileSchema(extra, natives));

  const checks: Check[] = [];
  if (presence.length > 0) {
    checks.push((value, ctx) => {
      if (value === null || typeof value !== "object") return;
      for (const name of presence) {
        if (!Object.hasOwn(value, name)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Required", path: [name] });
        }
      }
    });
  }

  if (defined.size > 0) {
    checks.push((value, ctx) => {
      if (value === null || typeof value !== "object") return;
      for (const [name, compiled] of defined) {
        if (Object.hasOwn(value, name) && Reflect.get(value, name) === undefined) {
          reportIssues(compiled.safeParse(undefined), ctx, [name]);
        }
      }
    });
  }

  const { minProperties, maxProperties } = document;
  if (minProperties !== undefined || maxProperties !== undefined) {
    checks.push((value, ctx) => {
      if (value === null || typeof value !== "object") return;
      const size = Object.keys(value).length;
      if (minProperties !== undefined && size < minProperties) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected at least ${minProperties} properties, received ${size}`,
        });
      }
      if (maxProperties !== undefined && size > maxProperties) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected at most ${maxProperties} properties, received ${size}`,
        });
      }
    });
  }

  if (checks.length === 0) return schema;
  return schema.superRefine((value, ctx) => {
    for (const check of checks) {
      check(value, ctx);
    }
  });
}

// Type-agnostic keywords: values, combinators and native identity
function keywordChecks(document: SchemaDocument, natives: NativeRegistry): Check[] {
  const checks: Check[] = [];

  const allowed = document.enum;
  if (allowed !== undefined) {
    checks.push((value, ctx) => {
      if (!allowed.some((candidate) => isDeepStrictEqual(candidate, value))) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected one of ${JSON.stringify(allowed)}`,
        });
      }
    });
  }

  if (Object.hasOwn(document, "const")) {
    const expected = document.const;
    checks.push((value, ctx) => {
      if (!isDeepStrictEqual(expected, value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected ${JSON.stringify(expected)}`,
        });
      }
    });
  }

  if (document.instanceOf !== undefined) {
    const name = document.instanceOf;
    const native = natives.get(name);
    checks.push((value, ctx) => {
      if (!native || !(value instanceof native)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected instance of ${name}` });
      }
    });
  }

  if (document.anyOf !== undefined) {
    const options = document.anyOf.map((option) => compileSchema(option, natives));
    checks.push((value, ctx) => {
      const results = options.map((option) => option.safeParse(value));
      if (results.some((result) => result.success)) return;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected any of ${options.length} alternatives (${results.map(describeResult).join("; ")})`,
      });
    });
  }

  if (document.oneOf !== undefined) {
    const options = document.oneOf.map((option) => compileSchema(option, natives));
    checks.push((value, ctx) => {
      const matched = options.filter((option) => option.safeParse(value).success).length;
      if (matched !== 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected exactly one of ${options.length} alternatives, matched ${matched}`,
        });
      }
    });
  }

  if (document.allOf !== undefined) {
    const parts = document.allOf.map((part) => compileSchema(part, natives));
    checks.push((value, ctx) => {
      for (const part of parts) {
        reportIssues(part.safeParse(value), ctx, []);
      }
    });
  }

  if (document.not !== undefined) {
    const negated = compileSchema(document.not, natives);
    checks.push((value, ctx) => {
      if (negated.safeParse(value).success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected the negated schema to fail" });
      }
    });
  }

  return checks;
}

function describeResult(result: z.SafeParseReturnType<unknown, unknown>): string {
  if (result.success) return "ok";
  const [issue] = result.error.issues;
  return issue ? `${formatPath(issue.path)}: ${issue.message}` : "invalid";
}

/** Re-emit the issues of a nested parse under `prefix`. */
export function reportIssues(
  result: z.SafeParseReturnType<unknown, unknown>,
  ctx: z.RefinementCtx,
  prefix: readonly PathSegment[]
): void {
  if (result.success) return;
  for (const issue of result.error.issues) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: issue.message,
      path: [...prefix, ...issuePath(issue)],
    });
  }
}

// Unrecognized keys are reported at the object; point at the first offending key
function issuePath(issue: z.ZodIssue): PathSegment[] {
  if (issue.code === z.ZodIssueCode.unrecognized_keys && issue.keys.length > 0) {
    return [...issue.path, issue.keys[0]];
  }
  return [...issue.path];
}

/** Turn a zod error into the ValidationFailure for `value` against `document`. */
export function toValidationFailure(
  error: z.ZodError,
  document: SchemaDocument,
  value: unknown
): ValidationFailure {
  const issues = error.issues.map((issue) => ({
    path: formatPath(issuePath(issue)),
    message: issue.message,
  }));
  const [first] = error.issues;
  const path = first ? issuePath(first) : [];
  const { schema, schemaPath } = schemaAt(document, path);

  return new ValidationFailure({
    path,
    schemaPath,
    expected: schema,
    value: valueAt(value, path),
    reason: first?.message ?? "Invalid value",
    issues,
  });
}
