import assert from "node:assert";
import { type Logger, ValidationFailure } from "../src/index.js";

/**
 * Assert that `fn` throws a ValidationFailure at `path` (and `schemaPath`, when given)
 */
export function assertFailure(
  fn: () => unknown,
  expected: { path: string; schemaPath?: string }
): ValidationFailure {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  assert.ok(caught instanceof ValidationFailure, `Expected a ValidationFailure, got ${String(caught)}`);
  assert.strictEqual(caught.path, expected.path);
  if (expected.schemaPath !== undefined) {
    assert.strictEqual(caught.schemaPath, expected.schemaPath);
  }
  return caught;
}

export interface LogEntry {
  level: "debug" | "info" | "warn" | "error";
  message: string;
  data?: unknown;
}

/**
 * Logger that keeps every entry for inspection
 */
export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string, data?: unknown): void {
    this.entries.push({ level: "debug", message, data });
  }

  info(message: string, data?: unknown): void {
    this.entries.push({ level: "info", message, data });
  }

  warn(message: string, data?: unknown): void {
    this.entries.push({ level: "warn", message, data });
  }

  error(message: string, data?: unknown): void {
    this.entries.push({ level: "error", message, data });
  }

  messages(level: LogEntry["level"]): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}
