import { describe, it } from "node:test";
import assert from "node:assert";
import {
  Dict,
  dlink,
  Evented,
  type FieldChange,
  Integer,
  link,
  MaxProperties,
  NoOpLogger,
  observe,
  setLogger,
} from "../src/index.js";
import { assertFailure, RecordingLogger } from "./helpers.js";

describe("link", () => {
  it("should converge in both directions without looping", () => {
    const d = Dict.create();
    const e = Dict.create();
    e.link("a", d, "b");

    e.set("a", 1);
    assert.strictEqual(d.get("b"), 1);

    d.set("b", 10);
    assert.strictEqual(e.get("a"), 10);
    assert.strictEqual(d.get("b"), 10);
  });

  it("should link attribute records through property writes", () => {
    const e = Evented.create();
    const d = Evented.create();
    link(e, "a", d, "b");

    e.a = 1;
    assert.strictEqual(d.b, 1);

    d.b = 10;
    assert.strictEqual(e.a, 10);
  });

  it("should stop propagating after unlink", () => {
    const e = Evented.create();
    const d = Evented.create();
    const handle = link(e, "a", d, "b");

    e.a = 1;
    handle.unlink();
    e.a = 2;
    d.b = 3;

    assert.strictEqual(d.b, 3);
    assert.strictEqual(e.a, 2);
  });
});

describe("dlink", () => {
  it("should propagate in one direction only", () => {
    const e = Evented.create();
    const d = Evented.create();
    dlink(e, "a", d, "b");

    d.b = 5;
    assert.strictEqual("a" in e, false);

    e.a = 6;
    assert.strictEqual(d.b, 6);
  });

  it("should apply the transform before the target write", () => {
    const thermometer = Evented.create();
    const display = Evented.create();
    dlink(thermometer, "celsius", display, "fahrenheit", (value) =>
      typeof value === "number" ? (value * 9) / 5 + 32 : value
    );

    thermometer.celsius = 100;
    assert.strictEqual(display.fahrenheit, 212);
  });

  it("should fail the triggering write when the target rejects the value", () => {
    const target = Dict.of({ b: Integer }).create();
    const source = Dict.create();
    source.dlink("a", target, "b");

    assertFailure(() => source.set("a", "x"), { path: "$.b", schemaPath: ".properties.b" });
    assert.strictEqual(source.has("a"), false);
    assert.strictEqual(target.has("b"), false);
  });

  it("should check every target before any write commits", () => {
    const loose = Dict.create();
    const strict = Dict.of({ y: Integer }).create();
    const source = Dict.create();
    source.dlink("a", loose, "x");
    source.dlink("a", strict, "y");

    assertFailure(() => source.set("a", "s"), { path: "$.y" });
    assert.strictEqual(loose.has("x"), false);
    assert.strictEqual(source.has("a"), false);
  });

  it("should check writes that land in one store together", () => {
    const target = Dict.refine(MaxProperties(1)).create();
    const source = Dict.create();
    source.dlink("a", target, "x");
    source.dlink("a", target, "y");

    assertFailure(() => source.set("a", 1), { path: "$" });
    assert.strictEqual(source.has("a"), false);
    assert.deepStrictEqual(target.toJSON(), {});
  });

  it("should leave a self-linked record unchanged when the linked write is rejected", () => {
    const single = Dict.refine(MaxProperties(1)).create();
    single.dlink("a", single, "b");

    assertFailure(() => single.set("a", 1), { path: "$" });
    assert.deepStrictEqual(single.toJSON(), {});
  });

  it("should copy a field within one record", () => {
    const record = Dict.create();
    record.dlink("a", record, "b");

    record.set("a", 1);
    assert.deepStrictEqual(record.toJSON(), { a: 1, b: 1 });
  });

  it("should propagate a single hop per write", () => {
    const x = Evented.create();
    const y = Evented.create();
    const z = Evented.create();
    dlink(x, "v", y, "v");
    dlink(y, "v", z, "v");

    x.v = 1;
    assert.strictEqual(y.v, 1);
    assert.strictEqual("v" in z, false);

    y.v = 2;
    assert.strictEqual(z.v, 2);
  });

  it("should log each propagation at debug level", () => {
    const logger = new RecordingLogger();
    setLogger(logger);
    try {
      const e = Evented.create();
      const d = Evented.create();
      dlink(e, "a", d, "b");
      e.a = 1;
    } finally {
      setLogger(new NoOpLogger());
    }

    assert.deepStrictEqual(logger.messages("debug"), ["Propagated a -> b"]);
  });
});

describe("observe", () => {
  it("should report committed writes with old and new values", () => {
    const d = Evented.create({ b: 1 });
    const changes: FieldChange[] = [];
    observe(d, "b", (change) => changes.push(change));

    d.b = 3;

    assert.strictEqual(changes.length, 1);
    const [change] = changes;
    assert.strictEqual(change.name, "b");
    assert.strictEqual(change.oldValue, 1);
    assert.strictEqual(change.newValue, 3);
    assert.strictEqual(change.object, d);
  });

  it("should see writes that arrive through a link, once", () => {
    const e = Dict.create();
    const d = Dict.create();
    e.link("a", d, "b");
    const seen: unknown[] = [];
    d.observe("b", (change) => seen.push(change.newValue));

    e.set("a", 1);
    e.set("a", 1);

    assert.deepStrictEqual(seen, [1]);
  });

  it("should not report rejected writes", () => {
    const d = Dict.of({ n: Integer }).create({ n: 1 });
    const seen: unknown[] = [];
    d.observe("n", (change) => seen.push(change.newValue));

    assertFailure(() => d.set("n", "two"), { path: "$.n" });
    assert.deepStrictEqual(seen, []);
  });

  it("should stop after unsubscribe", () => {
    const d = Evented.create();
    const seen: unknown[] = [];
    const handle = observe(d, "b", (change) => seen.push(change.newValue));

    d.b = 1;
    handle.unsubscribe();
    d.b = 2;

    assert.deepStrictEqual(seen, [1]);
  });
});
