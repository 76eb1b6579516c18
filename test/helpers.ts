import assert from "node:assert";
import type { CommandResult, FailureKind, LogFn } from "../src/index.js";

/**
 * Logger that keeps every line for later assertions
 */
export function collectLog(): { lines: string[]; log: LogFn } {
  const lines: string[] = [];
  return { lines, log: (message) => lines.push(message) };
}

export function assertValue(result: CommandResult, expected: string) {
  assert.deepStrictEqual(result, { ok: true, value: expected });
}

export function assertFailure(result: CommandResult, kind: FailureKind, message: string) {
  assert.deepStrictEqual(result, { ok: false, error: { kind, message } });
}
