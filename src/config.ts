import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { kindOf, ValidationFailure } from "./errors.js";
import { getLogger, type Logger } from "./logger.js";
import type { Bunch, BunchDescriptor, DictContainer, DictDescriptor } from "./record.js";
import { RECORD_STORE, type RecordHandle } from "./types.js";

/** An already-parsed mapping, or the path of a file to read one from. */
export type ConfigSource = string | Readonly<Record<string, unknown>>;

/** Turns a file path into a nested mapping. */
export type ConfigReader = (path: string) => unknown;

export interface ConfigOptions {
  reader?: ConfigReader;
  logger?: Logger;
}

/**
 * Default reader: JSON or YAML, decided by content rather than by file
 * extension (every JSON document is also YAML).
 */
export function readConfigFile(path: string): unknown {
  return parse(readFileSync(path, "utf8"));
}

function isMapping(value: unknown): value is Readonly<Record<string, unknown>> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function resolve(source: ConfigSource, options: ConfigOptions): { origin: string; parsed: unknown } {
  if (typeof source !== "string") {
    return { origin: "mapping", parsed: source };
  }
  const reader = options.reader ?? readConfigFile;
  return { origin: source, parsed: reader(source) };
}

/**
 * Build a new record from a config source. The parsed mapping goes through
 * the record's construction path: defaults fill missing fields, then the
 * whole record is validated.
 */
export function loadConfig<T>(
  descriptor: DictDescriptor<T>,
  source: ConfigSource,
  options?: ConfigOptions
): DictContainer<T>;
export function loadConfig<T>(
  descriptor: BunchDescriptor<T>,
  source: ConfigSource,
  options?: ConfigOptions
): Bunch<T>;
export function loadConfig<T>(
  descriptor: DictDescriptor<T> | BunchDescriptor<T>,
  source: ConfigSource,
  options: ConfigOptions = {}
): DictContainer<T> | Bunch<T> {
  const logger = options.logger ?? getLogger();
  const { origin, parsed } = resolve(source, options);
  const record = descriptor.create(parsed);
  logger.info(`Loaded ${descriptor.name} from ${origin}`);
  return record;
}

/**
 * Merge a config source into an existing record. All fields are written at
 * once or not at all; links and observers fire as for any other write.
 */
export function bindConfig(record: RecordHandle, source: ConfigSource, options: ConfigOptions = {}): void {
  const logger = options.logger ?? getLogger();
  const { origin, parsed } = resolve(source, options);

  if (!isMapping(parsed)) {
    const received = kindOf(parsed);
    throw new ValidationFailure({
      path: [],
      schemaPath: "",
      expected: { type: "object" },
      value: parsed,
      reason: `Expected object, received ${received}`,
      issues: [{ path: "$", message: `Expected object, received ${received}` }],
    });
  }

  record[RECORD_STORE].update(parsed);
  logger.info(`Bound ${Object.keys(parsed).length} field(s) from ${origin}`);
}
