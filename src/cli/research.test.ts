/**
 * Research CLI tests.
 *
 * Run: node --import tsx --test src/cli/research.test.ts
 *
 * Sessions run against the offline collaborators; checkpoints go to a
 * temporary directory.
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, before, describe, it } from "node:test";

import {
  CliUsageError,
  DEFAULT_CHECKPOINT_DIR,
  exitCodeFor,
  formatProgress,
  parseCliArgs,
  runResearch,
  type CliDeps,
} from "./research.js";
import { createScriptedCollaborators } from "../agents/scripted.js";
import { createSilentLogger } from "../logging/logger.js";
import { CheckpointError } from "../orchestrator/checkpoint.js";
import { ResearchOrchestrator } from "../orchestrator/orchestrator.js";
import type { Collaborators, ProgressEvent } from "../orchestrator/types.js";
import { PlanValidationError } from "../research/errors.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

function deps(): CliDeps {
  return { collaborators: createScriptedCollaborators(), logger: createSilentLogger() };
}

function captureIo() {
  const out: string[] = [];
  const err: string[] = [];
  return { out, err, io: { out: (t: string) => out.push(t), err: (t: string) => err.push(t) } };
}

// ═══════════════════════════════════════════════════════════════════════════
// Argument parsing
// ═══════════════════════════════════════════════════════════════════════════

describe("parseCliArgs", () => {
  it("maps session flags onto research config", () => {
    const options = parseCliArgs([
      "--query",
      "heat pumps",
      "--max-steps",
      "3",
      "--style",
      "news",
      "--no-background",
      "--timeout",
      "60000",
    ]);

    assert.equal(options.query, "heat pumps");
    assert.deepEqual(options.config, {
      maxStepNum: 3,
      timeoutMs: 60000,
      reportStyle: "news",
      enableBackgroundInvestigation: false,
    });
    assert.deepEqual(options.clarifications, []);
    assert.equal(options.checkpointDir, DEFAULT_CHECKPOINT_DIR);
    assert.equal(options.color, true);
  });

  it("joins positional words into the query", () => {
    assert.equal(parseCliArgs(["how", "do", "heat", "pumps", "work"]).query, "how do heat pumps work");
  });

  it("lets explicit flags override the quick preset", () => {
    const options = parseCliArgs(["--quick", "-q", "x", "--max-steps", "4"]);

    assert.deepEqual(options.config, {
      maxStepNum: 4,
      enableClarification: false,
      enableBackgroundInvestigation: false,
      autoAcceptPlan: true,
    });
  });

  it("turns --review-plan into manual plan approval", () => {
    const options = parseCliArgs(["-q", "x", "--review-plan"]);
    assert.equal(options.reviewPlan, true);
    assert.equal(options.config.autoAcceptPlan, false);
  });

  it("pairs clarification answers with their questions", () => {
    const options = parseCliArgs([
      "-q",
      "x",
      "--clarify",
      "Europe",
      "--asked",
      "Where?",
      "--clarify",
      "2024",
    ]);

    assert.deepEqual(options.clarifications, [
      { question: "Where?", answer: "Europe" },
      { question: "Follow-up question", answer: "2024" },
    ]);
  });

  it("accepts --help without a query", () => {
    assert.equal(parseCliArgs(["--help"]).help, true);
  });

  it("rejects invalid combinations", () => {
    const cases: [string[], RegExp][] = [
      [[], /query is required/],
      [["--resume", "cp.json"], /exactly one of --accept or --edit-plan/],
      [["--resume", "cp.json", "--accept", "--edit-plan", "p.json"], /exactly one/],
      [["--resume", "cp.json", "--accept", "-q", "x"], /drop the query/],
      [["-q", "x", "--accept"], /only apply with --resume/],
      [["-q", "x", "--max-steps", "0"], /--max-steps must be a positive integer, got: 0/],
      [["-q", "x", "--asked", "Where?"], /matching --clarify/],
      [["-q", "x", "--timeout", "2147483648"], /--timeout must be at most 2147483647, got: 2147483648/],
      [
        ["--resume", "cp.json", "--accept", "--timeout", "500", "--no-background"],
        /keeps the checkpoint's settings; drop --timeout, --no-background/,
      ],
      [["--resume", "cp.json", "--accept", "--quick"], /drop --quick$/],
      [["--resume", "cp.json", "--accept", "--clarify", "Europe"], /drop --clarify$/],
    ];

    for (const [argv, pattern] of cases) {
      assert.throws(
        () => parseCliArgs(argv),
        (error: unknown) => error instanceof CliUsageError && pattern.test(error.message),
        argv.join(" ")
      );
    }
  });

  it("rejects unknown flags", () => {
    assert.throws(() => parseCliArgs(["-q", "x", "--verbose"]));
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Output
// ═══════════════════════════════════════════════════════════════════════════

describe("formatProgress", () => {
  const event: ProgressEvent = {
    researchId: "research-1",
    sequence: 3,
    stage: "planning",
    message: "Plan ready",
    plan: null,
    currentStepIndex: null,
    totalSteps: null,
    observationsSoFar: [],
  };

  it("prints sequence, stage and message", () => {
    assert.equal(formatProgress(event), "[3] planning: Plan ready");
  });

  it("colors the stage on request", () => {
    assert.equal(
      formatProgress(event, true),
      "\x1b[2m[3]\x1b[0m \x1b[36mplanning\x1b[0m: Plan ready"
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Sessions
// ═══════════════════════════════════════════════════════════════════════════

describe("runResearch", () => {
  let dir: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), "research-cli-"));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("streams progress to stderr and the report to stdout", async () => {
    const { out, err, io } = captureIo();
    const options = parseCliArgs(["-q", "lithium battery prices", "--no-color", "--brief"]);

    const code = await runResearch(options, deps(), io);

    assert.equal(code, 0);
    assert.equal(err[0], "[1] clarifying: Checking whether the query needs clarification");
    assert.match(err.at(-1) ?? "", /^\[\d+\] done: Research complete$/);
    assert.equal(out.length, 1);
    assert.ok(out[0]?.startsWith("# Research Report\n\n**Query:** lithium battery prices\n"));
    assert.ok(out[0]?.includes("**Status:** done"));
    assert.ok(!out[0]?.includes("## Research Plan"));
  });

  it("exits 3 when the query needs clarification", async () => {
    const { out, io } = captureIo();
    const code = await runResearch(parseCliArgs(["-q", "batteries", "--no-color"]), deps(), io);

    assert.equal(code, 3);
    assert.ok(out[0]?.includes("## Result"));
  });

  it("writes a checkpoint for review and resumes it", async () => {
    const review = captureIo();
    const reviewCode = await runResearch(
      parseCliArgs(["-q", "lithium battery prices", "--review-plan", "--checkpoint-dir", dir, "--json"]),
      deps(),
      review.io
    );

    assert.equal(reviewCode, 4);
    const files = readdirSync(dir).filter((f) => f.startsWith("checkpoint-"));
    assert.equal(files.length, 1);
    const checkpointPath = join(dir, files[0] ?? "");
    assert.ok(review.err.includes(`Checkpoint written to ${checkpointPath}`));

    const parsed: unknown = JSON.parse(review.out[0] ?? "");
    assert.ok(typeof parsed === "object" && parsed !== null && "status" in parsed);
    assert.equal(parsed.status, "awaiting_plan_approval");

    const resumed = captureIo();
    const resumeCode = await runResearch(
      parseCliArgs(["--resume", checkpointPath, "--accept", "--no-color"]),
      deps(),
      resumed.io
    );

    assert.equal(resumeCode, 0);
    assert.equal(resumed.err[0], "[1] executing_step: Executing step 1/3: Survey current sources");
    assert.ok(resumed.out[0]?.includes("**Status:** done"));
  });

  it("executes an edited plan from a file", async () => {
    const review = captureIo();
    await runResearch(
      parseCliArgs(["-q", "grid storage costs", "--review-plan", "--checkpoint-dir", join(dir, "edit")]),
      deps(),
      review.io
    );
    const [file] = readdirSync(join(dir, "edit"));
    assert.ok(file);

    const planPath = join(dir, "plan.json");
    writeFileSync(planPath, JSON.stringify({ title: "Edited", steps: [{ title: "Only step" }] }));

    const resumed = captureIo();
    const code = await runResearch(
      parseCliArgs(["--resume", join(dir, "edit", file), "--edit-plan", planPath, "--no-color"]),
      deps(),
      resumed.io
    );

    assert.equal(code, 0);
    assert.ok(resumed.out[0]?.includes("**Title:** Edited"));
    assert.ok(resumed.out[0]?.includes("1. **Only step**"));
  });

  it("rejects an invalid edited plan", async () => {
    const planPath = join(dir, "bad-plan.json");
    writeFileSync(planPath, JSON.stringify({ title: "" }));
    const checkpointDir = join(dir, "bad");
    await runResearch(
      parseCliArgs(["-q", "grid storage costs", "--review-plan", "--checkpoint-dir", checkpointDir]),
      deps(),
      captureIo().io
    );
    const [file] = readdirSync(checkpointDir);
    assert.ok(file);

    await assert.rejects(
      runResearch(
        parseCliArgs(["--resume", join(checkpointDir, file), "--edit-plan", planPath]),
        deps(),
        captureIo().io
      ),
      PlanValidationError
    );
  });

  it("rejects a missing checkpoint", async () => {
    await assert.rejects(
      runResearch(
        parseCliArgs(["--resume", join(dir, "missing.json"), "--accept"]),
        deps(),
        captureIo().io
      ),
      CheckpointError
    );
  });
});

describe("exitCodeFor", () => {
  function orchestrator(overrides: Partial<Collaborators> = {}) {
    return new ResearchOrchestrator({
      collaborators: { ...createScriptedCollaborators(), ...overrides },
      generateId: () => "research-1",
    });
  }

  it("maps each terminal status", async () => {
    const quick = { maxStepNum: 1, enableClarification: false, enableBackgroundInvestigation: false };
    const aborted = new AbortController();
    aborted.abort(new Error("stop"));

    const done = await orchestrator().run("solar panel recycling", quick);
    const clarify = await orchestrator().run("solar");
    const review = await orchestrator().run("solar panel recycling", { ...quick, autoAcceptPlan: false });
    const failed = await orchestrator({
      planner: {
        plan: async () => {
          throw new Error("offline");
        },
      },
    }).run("solar panel recycling", quick);
    const cancelled = await orchestrator().run("solar panel recycling", quick, {
      signal: aborted.signal,
    });

    assert.deepEqual(
      [done, clarify, review, failed, cancelled].map((o) => [o.status, exitCodeFor(o)]),
      [
        ["done", 0],
        ["needs_clarification", 3],
        ["awaiting_plan_approval", 4],
        ["failed", 1],
        ["cancelled", 5],
      ]
    );
  });
});
