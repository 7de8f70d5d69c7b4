import { describe, it } from "node:test";
import assert from "node:assert";
import { DefinitionError, formatPath, mergeSchema, type SchemaDocument, schemaDocumentSchema } from "../src/index.js";
import { keywordTypes, schemaAt, valueAt } from "../src/schema.js";

describe("formatPath", () => {
  it("should render the root as $", () => {
    assert.strictEqual(formatPath([]), "$");
  });

  it("should use dots for identifiers and brackets for indexes", () => {
    assert.strictEqual(formatPath(["server", "hosts", 2]), "$.server.hosts[2]");
  });

  it("should quote keys that are not identifiers", () => {
    assert.strictEqual(formatPath(["headers", "content-type"]), '$.headers["content-type"]');
  });
});

describe("mergeSchema", () => {
  it("should union required names and merge properties", () => {
    const base: SchemaDocument = {
      type: "object",
      properties: { a: { type: "integer" } },
      required: ["a"],
    };
    const merged = mergeSchema(base, {
      properties: { b: { type: "string" } },
      required: ["b", "a"],
      additionalProperties: false,
    });

    assert.deepStrictEqual(merged, {
      type: "object",
      properties: { a: { type: "integer" }, b: { type: "string" } },
      required: ["a", "b"],
      additionalProperties: false,
    });
  });

  it("should let the delta override other keywords", () => {
    assert.deepStrictEqual(mergeSchema({ type: "array", minItems: 1 }, { minItems: 3 }), {
      type: "array",
      minItems: 3,
    });
    assert.deepStrictEqual(mergeSchema({ type: "string", default: "a" }, { default: "b" }), {
      type: "string",
      default: "b",
    });
  });

  it("should not modify either operand", () => {
    const base: SchemaDocument = { type: "object", required: ["a"] };
    const delta: SchemaDocument = { required: ["b"] };
    mergeSchema(base, delta);

    assert.deepStrictEqual(base, { type: "object", required: ["a"] });
    assert.deepStrictEqual(delta, { required: ["b"] });
  });
});

describe("schemaAt", () => {
  const document: SchemaDocument = {
    type: "object",
    properties: {
      list: { type: "array", items: { type: "integer" } },
      pair: { type: "array", items: [{ type: "string" }], additionalItems: false },
    },
    additionalProperties: false,
  };

  it("should follow homogeneous items", () => {
    assert.deepStrictEqual(schemaAt(document, ["list", 2]), {
      schema: { type: "integer" },
      schemaPath: ".properties.list.items",
    });
  });

  it("should follow positional items and their overflow", () => {
    assert.deepStrictEqual(schemaAt(document, ["pair", 0]), {
      schema: { type: "string" },
      schemaPath: ".properties.pair.items[0]",
    });
    assert.deepStrictEqual(schemaAt(document, ["pair", 3]), {
      schema: false,
      schemaPath: ".properties.pair.additionalItems",
    });
  });

  it("should point undeclared keys at additionalProperties", () => {
    assert.deepStrictEqual(schemaAt(document, ["extra"]), {
      schema: false,
      schemaPath: ".additionalProperties",
    });
  });
});

describe("valueAt", () => {
  it("should read nested values and stop outside the value", () => {
    const value = { a: [10, { b: "x" }] };

    assert.strictEqual(valueAt(value, ["a", 1, "b"]), "x");
    assert.strictEqual(valueAt(value, ["a", 5]), undefined);
    assert.strictEqual(valueAt(value, ["a", 0, "c"]), undefined);
  });
});

describe("schemaDocumentSchema", () => {
  it("should accept nested documents", () => {
    const result = schemaDocumentSchema.safeParse({
      type: "object",
      properties: { name: { type: "string", minLength: 1 } },
      required: ["name"],
    });
    assert.strictEqual(result.success, true);
  });

  it("should reject unknown types and unknown keywords", () => {
    assert.strictEqual(schemaDocumentSchema.safeParse({ type: "text" }).success, false);
    assert.strictEqual(schemaDocumentSchema.safeParse({ minimumLength: 1 }).success, false);
  });

  it("should reject patterns that are not regular expressions", () => {
    assert.strictEqual(schemaDocumentSchema.safeParse({ pattern: "(" }).success, false);
  });
});

describe("keywordTypes", () => {
  it("should report the value types a keyword set constrains", () => {
    assert.deepStrictEqual(keywordTypes("Range", { minimum: 1, multipleOf: 2 }), ["number", "integer"]);
    assert.deepStrictEqual(keywordTypes("Sized", { type: "integer", maximum: 9 }), ["integer"]);
  });

  it("should return null for type-agnostic keywords", () => {
    assert.strictEqual(keywordTypes("Annotated", { default: 1, title: "t" }), null);
  });

  it("should reject keywords of different value types", () => {
    assert.throws(() => keywordTypes("Mixed", { minLength: 1, minItems: 1 }), DefinitionError);
    assert.throws(() => keywordTypes("Typed", { type: "string", minimum: 0 }), DefinitionError);
  });
});
