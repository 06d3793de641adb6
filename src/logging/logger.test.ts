/**
 * Logger tests.
 *
 * Run: node --import tsx --test src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { after, describe, it } from "node:test";

import { createLogger, formatLogEntry, isLogLevel } from "./logger.js";
import { generateRunId } from "./run-id.js";

const logDir = mkdtempSync(join(tmpdir(), "research-logs-"));

after(() => {
  rmSync(logDir, { recursive: true, force: true });
});

describe("formatLogEntry", () => {
  it("renders timestamp, padded level, run id and context", () => {
    const line = formatLogEntry(
      "info",
      "Planning",
      "20240115-abc",
      { iteration: 1 },
      new Date("2024-01-15T10:00:00.000Z")
    );
    assert.equal(line, '[2024-01-15T10:00:00.000Z] [INFO ] [20240115-abc] Planning {"iteration":1}');
  });

  it("omits an empty context", () => {
    const line = formatLogEntry("warn", "x", "r", {}, new Date("2024-01-15T10:00:00.000Z"));
    assert.equal(line, "[2024-01-15T10:00:00.000Z] [WARN ] [r] x");
  });
});

describe("createLogger", () => {
  it("writes entries at or above the level to the file", () => {
    const logger = createLogger({
      level: "info",
      logDir,
      logFile: "levels.log",
      console: false,
      runId: "run-1",
    });
    logger.debug("hidden");
    logger.info("shown");
    logger.error("also shown", { code: 7 });

    const lines = readFileSync(join(logDir, "levels.log"), "utf-8").trim().split("\n");
    assert.equal(lines.length, 2);
    assert.match(lines[0] ?? "", /\[INFO \] \[run-1\] shown$/);
    assert.match(lines[1] ?? "", /\[ERROR\] \[run-1\] also shown \{"code":7\}$/);
  });

  it("child loggers carry their own run id and merged context", () => {
    const parent = createLogger({
      logDir,
      logFile: "child.log",
      console: false,
      runId: "process",
      context: { app: "test" },
    });
    parent.child({ runId: "session-9", context: { stage: "planning" } }).info("hello");

    const line = readFileSync(join(logDir, "child.log"), "utf-8").trim();
    assert.match(line, /\[session-9\] hello \{"app":"test","stage":"planning"\}$/);
  });
});

describe("helpers", () => {
  it("recognizes log levels", () => {
    assert.equal(isLogLevel("warn"), true);
    assert.equal(isLogLevel("verbose"), false);
  });

  it("generates date-prefixed ids", () => {
    assert.match(generateRunId(), /^\d{8}-[0-9a-f]{12}$/);
  });
});
