/**
 * Logger tests.
 *
 * Run: node --import tsx --test src/logging/logger.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { createLogger, formatLogEntry, isLogLevel } from "./logger.js";
import { generateRunId } from "./run-id.js";

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

test("formatLogEntry: pads level and appends JSON context", () => {
  const entry = formatLogEntry(
    "info",
    "stage completed",
    "20250301-abc123",
    { stage: "writer" },
    new Date("2025-03-01T10:00:00.000Z")
  );
  assert.equal(
    entry,
    '[2025-03-01T10:00:00.000Z] [INFO ] [20250301-abc123] stage completed {"stage":"writer"}'
  );
});

test("formatLogEntry: omits empty context", () => {
  const entry = formatLogEntry(
    "error",
    "boom",
    "r1",
    {},
    new Date("2025-03-01T10:00:00.000Z")
  );
  assert.equal(entry, "[2025-03-01T10:00:00.000Z] [ERROR] [r1] boom");
});

test("isLogLevel narrows known levels only", () => {
  assert.equal(isLogLevel("warn"), true);
  assert.equal(isLogLevel("trace"), false);
});

// ---------------------------------------------------------------------------
// Levels, run IDs and bindings
// ---------------------------------------------------------------------------

test("createLogger: filters below the configured level", () => {
  const lines: string[] = [];
  const logger = createLogger({
    level: "warn",
    console: false,
    file: false,
    runId: "run-a",
    sink: (entry) => lines.push(entry),
  });

  logger.info("ignored");
  logger.warn("kept");

  assert.equal(lines.length, 1);
  assert.ok(lines[0]?.endsWith("[WARN ] [run-a] kept"));
});

test("child: merges bindings and overrides run ID", () => {
  const lines: string[] = [];
  const root = createLogger({
    console: false,
    file: false,
    runId: "root",
    bindings: { topic: "private credit" },
    sink: (entry) => lines.push(entry),
  });

  root.child({ stage: "seo" }, "run-b").info("done", { tokens: 10 });

  assert.equal(lines.length, 1);
  assert.ok(
    lines[0]?.endsWith(
      '[INFO ] [run-b] done {"topic":"private credit","stage":"seo","tokens":10}'
    )
  );
});

test("generateRunId: date prefix plus six hex chars", () => {
  const id = generateRunId(new Date("2025-01-15T08:00:00.000Z"));
  assert.match(id, /^20250115-[0-9a-f]{6}$/);
});
