import { describe, it } from "node:test";
import assert from "node:assert";
import {
  Default,
  DefinitionError,
  Dict,
  Integer,
  List,
  type ListContainer,
  MaxItems,
  MinItems,
  Pattern,
  Str,
  Tuple,
  Unique,
} from "../src/index.js";
import { assertFailure } from "./helpers.js";

describe("List.of", () => {
  it("should render a homogeneous items schema", () => {
    const Ints = List.of(Integer);

    assert.strictEqual(Ints.name, "List[Integer]");
    assert.deepStrictEqual(Ints.toSchema(), { type: "array", items: { type: "integer" } });
  });

  it("should combine several item descriptors as a union", () => {
    const Mixed = List.of(Integer, Str);

    assert.strictEqual(Mixed.name, "List[Integer | String]");
    assert.deepStrictEqual(Mixed.toSchema(), {
      type: "array",
      items: { anyOf: [{ type: "integer" }, { type: "string" }] },
    });
    assert.deepStrictEqual(Mixed.create([1, "a", 2]).toJSON(), [1, "a", 2]);
  });

  it("should check positions for a literal sequence of descriptors", () => {
    const Positional = List.of([Integer, Str]);

    assert.strictEqual(Positional.name, "List[(Integer, String)]");
    assert.deepStrictEqual(Positional.toSchema(), {
      type: "array",
      items: [{ type: "integer" }, { type: "string" }],
    });
    assert.deepStrictEqual(Positional.create([1, "a", true]).toJSON(), [1, "a", true]);
    assertFailure(() => Positional.create(["a", 1]), { path: "$[0]", schemaPath: ".items[0]" });
  });

  it("should report the failing item of nested records", () => {
    const Rows = List.of(Dict.of({ a: Integer }));

    assertFailure(() => Rows.create([{ a: 1 }, { a: "x" }]), {
      path: "$[1].a",
      schemaPath: ".items.properties.a",
    });
  });

  it("should reject an empty item list", () => {
    assert.throws(() => List.of(), DefinitionError);
  });
});

describe("ListContainer", () => {
  it("should leave the list unchanged when one element of extend is bad", () => {
    const list: ListContainer<unknown> = List.of(Integer).create([1]);

    assertFailure(() => list.extend([2, "x"]), { path: "$[2]", schemaPath: ".items" });
    assert.deepStrictEqual([...list], [1]);
    assert.strictEqual(list.includes(2), false);
  });

  it("should validate append and insert before mutating", () => {
    const list: ListContainer<unknown> = List.of(Integer).create([1]);

    assertFailure(() => list.append("x"), { path: "$[1]" });
    assertFailure(() => list.insert(0, "x"), { path: "$[0]" });

    list.append(2).insert(0, 0);
    assert.deepStrictEqual(list.toJSON(), [0, 1, 2]);
  });

  it("should store copies of plain items", () => {
    const rows = List.of(Dict.of({ a: Integer })).create();
    const row = { a: 1 };

    rows.append(row);
    row.a = 2;

    assert.deepStrictEqual(rows.toJSON(), [{ a: 1 }]);
    assert.strictEqual(Object.isFrozen(rows.at(0)), true);
  });

  it("should replace and remove items by index", () => {
    const list = List.of(Integer).create([1, 2, 3]);

    list.set(-1, 9);
    assert.strictEqual(list.at(-1), 9);
    assert.strictEqual(list.pop(), 9);
    assert.strictEqual(list.removeAt(0), 1);
    assert.deepStrictEqual(list.toJSON(), [2]);
    assert.throws(() => list.set(5, 1), RangeError);
    assert.throws(() => list.removeAt(1), RangeError);
  });

  it("should check maxItems after the mutation would complete", () => {
    const Pair = List.of(Integer).refine(MaxItems(2));
    const list = Pair.create([1, 2]);

    assertFailure(() => list.append(3), { path: "$" });
    assertFailure(() => list.extend([3, 4]), { path: "$" });
    assert.strictEqual(list.length, 2);
  });

  it("should check minItems on removal", () => {
    const NonEmpty = List.of(Integer).refine(MinItems(1));
    const list = NonEmpty.create([5]);

    assertFailure(() => list.pop(), { path: "$" });
    assertFailure(() => list.clear(), { path: "$" });
    assert.deepStrictEqual(list.toJSON(), [5]);
    assertFailure(() => NonEmpty.create([]), { path: "$" });
  });

  it("should start from the descriptor default", () => {
    const Seeded = List.of(Integer).refine(Default([1, 2]));
    const first = Seeded.create();
    first.append(3);

    assert.deepStrictEqual(Seeded.create().toJSON(), [1, 2]);
  });

  it("should accept another list as a seed and reject a mapping", () => {
    const Ints = List.of(Integer);

    assert.deepStrictEqual(Ints.create(Ints.create([4, 5])).toJSON(), [4, 5]);
    assertFailure(() => Ints.create({ 0: 4 }), { path: "$" });
  });

  it("should reject constraints for other value types", () => {
    assert.throws(() => List.refine(Pattern("a")), DefinitionError);
    assert.throws(() => List.of(Integer).refine(Default([1, "x"])), DefinitionError);
  });
});

describe("Unique", () => {
  it("should render uniqueItems", () => {
    assert.deepStrictEqual(Unique.toSchema(), { type: "array", uniqueItems: true });
    assert.deepStrictEqual(Unique.of(Integer).toSchema(), {
      type: "array",
      items: { type: "integer" },
      uniqueItems: true,
    });
  });

  it("should reject duplicates, compared structurally", () => {
    const tags = Unique.of(Integer).create([1, 2]);

    assertFailure(() => tags.append(1), { path: "$[2]" });
    assertFailure(() => Unique.create([{ a: 1 }, { a: 1 }]), { path: "$[1]" });
    assert.deepStrictEqual(tags.toJSON(), [1, 2]);
  });
});

describe("Tuple", () => {
  const Entry = Tuple.of(Integer, Str);

  it("should fix the length and type each position", () => {
    assert.strictEqual(Entry.name, "Tuple[Integer, String]");
    assert.deepStrictEqual(Entry.toSchema(), {
      type: "array",
      items: [{ type: "integer" }, { type: "string" }],
      minItems: 2,
      maxItems: 2,
    });
    assert.deepStrictEqual(Tuple.of([Integer, Str]).toSchema(), Entry.toSchema());
  });

  it("should construct from a matching sequence", () => {
    const entry = Entry.create([1, "a"]);

    assert.strictEqual(entry.get(0), 1);
    assert.strictEqual(entry.get(1), "a");
    assert.strictEqual(entry.length, 2);
  });

  it("should reject positional mismatches and wrong lengths", () => {
    assertFailure(() => Entry.create(["a", 1]), { path: "$[0]", schemaPath: ".items[0]" });
    assertFailure(() => Entry.create([1]), { path: "$" });
    assertFailure(() => Entry.create([1, "a", 3]), { path: "$" });
  });

  it("should reject a mapping instead of coercing it", () => {
    assertFailure(() => Entry.create({ 0: 1, 1: "a" }), { path: "$" });
  });

  it("should validate replacements", () => {
    const entry = Entry.create([1, "a"]);

    entry.set(1, "b");
    assertFailure(() => entry.set(1, 2), { path: "$[1]", schemaPath: ".items[1]" });
    assert.deepStrictEqual([...entry], [1, "b"]);
    const outside: number = 2;
    assert.throws(() => entry.get(outside), RangeError);
  });
});
