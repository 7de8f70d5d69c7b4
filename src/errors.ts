import type { SchemaDocument } from "./types.js";

export type PathSegment = string | number;

export interface ValidationIssue {
  path: string;
  message: string;
}

export interface ValidationFailureDetails {
  path: readonly PathSegment[];
  schemaPath: string;
  expected: SchemaDocument | boolean;
  value: unknown;
  reason: string;
  issues: readonly ValidationIssue[];
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Render a value path in dot/bracket notation rooted at `$`.
 *
 * `["server", "hosts", 2]` becomes `$.server.hosts[2]`; keys that are not
 * identifiers are quoted: `$["content-type"]`.
 */
export function formatPath(path: readonly PathSegment[]): string {
  let rendered = "$";
  for (const segment of path) {
    if (typeof segment === "number") {
      rendered += `[${segment}]`;
    } else if (IDENTIFIER.test(segment)) {
      rendered += `.${segment}`;
    } else {
      rendered += `[${JSON.stringify(segment)}]`;
    }
  }
  return rendered;
}

// Kind of a value as reported in failures
export function kindOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number" && Number.isInteger(value)) return "integer";
  if (typeof value === "object") {
    const name = Object.getPrototypeOf(value)?.constructor?.name;
    return typeof name === "string" && name !== "Object" ? name : "object";
  }
  return typeof value;
}

/**
 * A value failed its schema. Raised synchronously by construction and by
 * every rejected mutation; the container is left as it was.
 */
export class ValidationFailure extends Error {
  readonly path: string;
  readonly segments: readonly PathSegment[];
  readonly schemaPath: string;
  readonly expected: SchemaDocument | boolean;
  readonly value: unknown;
  readonly received: string;
  readonly issues: readonly ValidationIssue[];

  constructor(details: ValidationFailureDetails) {
    const path = formatPath(details.path);
    super(`${path}: ${details.reason}`);
    this.name = "ValidationFailure";
    this.path = path;
    this.segments = details.path;
    this.schemaPath = details.schemaPath;
    this.expected = details.expected;
    this.value = details.value;
    this.received = kindOf(details.value);
    this.issues = details.issues;
  }
}

/**
 * A descriptor or shape was declared wrong. Raised when it is declared,
 * never when data is validated.
 */
export class DefinitionError extends Error {
  readonly descriptor: string;

  constructor(descriptor: string, message: string) {
    super(`${descriptor}: ${message}`);
    this.name = "DefinitionError";
    this.descriptor = descriptor;
  }
}
