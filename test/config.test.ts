import { describe, it } from "node:test";
import assert from "node:assert";
import { fileURLToPath } from "node:url";
import {
  bindConfig,
  Bool,
  Bunch,
  Dict,
  Integer,
  loadConfig,
  readConfigFile,
  Str,
  ValidationFailure,
} from "../src/index.js";
import { assertFailure, RecordingLogger } from "./helpers.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const Server = Dict.of({ host: Str, port: Integer });
const AppConfig = Dict.extend("AppConfig", {
  fields: { name: Str, server: Server, debug: Bool },
  defaults: { debug: false },
});

describe("readConfigFile", () => {
  it("should read YAML and JSON files", () => {
    assert.deepStrictEqual(readConfigFile(fixture("server.yaml")), {
      name: "edge",
      server: { host: "example.test", port: 8080 },
    });
    assert.deepStrictEqual(readConfigFile(fixture("server.json")), {
      name: "edge",
      server: { host: "example.test", port: 8080 },
      debug: true,
    });
  });
});

describe("loadConfig", () => {
  it("should build a record from a file, filling defaults", () => {
    const config = loadConfig(AppConfig, fixture("server.yaml"));

    assert.deepStrictEqual(config.toJSON(), {
      debug: false,
      name: "edge",
      server: { host: "example.test", port: 8080 },
    });
  });

  it("should build a record from an already-parsed mapping", () => {
    const config = loadConfig(AppConfig, { name: "local", server: { host: "localhost", port: 80 }, debug: true });

    assert.strictEqual(config.get("debug"), true);
    assert.strictEqual(config.get("name"), "local");
  });

  it("should read through a custom reader", () => {
    const paths: string[] = [];
    const config = loadConfig(AppConfig, "edge", {
      reader: (path) => {
        paths.push(path);
        return { name: path.toUpperCase(), server: { host: "h", port: 1 } };
      },
    });

    assert.deepStrictEqual(paths, ["edge"]);
    assert.strictEqual(config.get("name"), "EDGE");
  });

  it("should report the path of a nested mismatch", () => {
    assertFailure(() => loadConfig(AppConfig, fixture("bad-server.yaml")), { path: "$.server" });
  });

  it("should report a missing required field", () => {
    assertFailure(() => loadConfig(AppConfig, { name: "edge" }), { path: "$.server" });
  });

  it("should build attribute records", () => {
    const Service = Bunch.extend("Service", { fields: { name: Str, replicas: Integer }, defaults: { replicas: 1 } });
    const service = loadConfig(Service, { name: "api" });

    assert.strictEqual(service.name, "api");
    assert.strictEqual(service.replicas, 1);
  });

  it("should log each load at info level", () => {
    const logger = new RecordingLogger();
    const path = fixture("server.yaml");
    loadConfig(AppConfig, path, { logger });
    loadConfig(AppConfig, { name: "n", server: { host: "h", port: 1 } }, { logger });

    assert.deepStrictEqual(logger.messages("info"), [
      `Loaded AppConfig from ${path}`,
      "Loaded AppConfig from mapping",
    ]);
  });
});

describe("bindConfig", () => {
  const base = () => AppConfig.create({ name: "edge", server: { host: "h", port: 1 } });

  it("should merge a mapping into an existing record", () => {
    const config = base();
    const logger = new RecordingLogger();
    bindConfig(config, { debug: true, name: "core" }, { logger });

    assert.strictEqual(config.get("debug"), true);
    assert.strictEqual(config.get("name"), "core");
    assert.deepStrictEqual(logger.messages("info"), ["Bound 2 field(s) from mapping"]);
  });

  it("should write nothing when one field is rejected", () => {
    const config = base();

    assertFailure(() => bindConfig(config, { debug: true, name: 5 }), { path: "$.name" });
    assert.strictEqual(config.get("debug"), false);
    assert.strictEqual(config.get("name"), "edge");
  });

  it("should reject a source that is not a mapping", () => {
    const config = base();

    const failure = assertFailure(() => bindConfig(config, "list.yaml", { reader: () => [1, 2] }), {
      path: "$",
    });
    assert.ok(failure instanceof ValidationFailure);
    assert.strictEqual(failure.received, "array");
    assert.strictEqual(failure.message, "$: Expected object, received array");
  });

  it("should fire links for bound fields", () => {
    const config = base();
    const mirror = Dict.create();
    config.dlink("debug", mirror, "verbose");

    bindConfig(config, { debug: true });
    assert.strictEqual(mirror.get("verbose"), true);
  });
});
