/**
 * Research response formatting tests.
 *
 * Run: node --import tsx --test src/report/format.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { formatResearchResponse } from "./format.js";
import { completeStep, createPlan, startStep, type Plan } from "../research/plan.js";
import type { ResearchMetadata, ResearchOutcome } from "../orchestrator/types.js";

const METADATA: ResearchMetadata = {
  maxStepNum: 5,
  maxPlanIterations: 1,
  enableClarification: false,
  enableBackgroundInvestigation: false,
  autoAcceptPlan: true,
  reportStyle: "academic",
  planIterations: 1,
  stepsExecuted: 1,
  startedAt: "2025-01-01T00:00:00.000Z",
  finishedAt: "2025-01-01T00:00:01.000Z",
  durationMs: 1000,
};

function makePlan(result: string): Plan {
  const plan = createPlan(
    { title: "P", thought: "T", steps: [{ title: "A", description: "find a" }] },
    "en-US"
  );
  const step = plan.steps[0];
  assert.ok(step);
  startStep(step);
  completeStep(step, result);
  return plan;
}

function doneOutcome(result = "ok"): ResearchOutcome {
  return {
    status: "done",
    researchId: "r-1",
    query: "q",
    clarifiedQuery: "q",
    plan: makePlan(result),
    finalReport: "REPORT\n",
    observations: [
      { sequence: 1, content: "ok", origin: { kind: "step", stepIndex: 0, planIteration: 1 } },
    ],
    resources: [{ url: "https://u.example", title: "T" }],
    locale: "en-US",
    metadata: METADATA,
  };
}

describe("formatResearchResponse", () => {
  it("renders the detailed layout", () => {
    assert.equal(
      formatResearchResponse(doneOutcome()),
      [
        "# Research Report",
        "",
        "**Query:** q",
        "**Research ID:** r-1",
        "**Status:** done",
        "",
        "## Research Plan",
        "",
        "**Title:** P",
        "**Thought:** T",
        "",
        "### Steps",
        "",
        "1. **A**",
        "   - Type: research",
        "   - Status: completed",
        "   - Description: find a",
        "   - Result: ok",
        "",
        "## Key Observations",
        "",
        "1. ok",
        "",
        "## Final Report",
        "",
        "REPORT",
        "",
        "## Sources",
        "",
        "1. [T](https://u.example)",
        "",
      ].join("\n")
    );
  });

  it("renders only the header and report when brief", () => {
    assert.equal(
      formatResearchResponse(doneOutcome(), { detailed: false }),
      "# Research Report\n\n**Query:** q\n**Research ID:** r-1\n**Status:** done\n\n## Final Report\n\nREPORT\n"
    );
  });

  it("truncates long step results", () => {
    const text = formatResearchResponse(doneOutcome("x".repeat(250)));
    assert.ok(text.split("\n").includes(`   - Result: ${"x".repeat(200)}...`));
  });

  it("counts code points when truncating step results", () => {
    const cut = formatResearchResponse(doneOutcome(`${"x".repeat(199)}\u{1F600}tail`));
    assert.ok(cut.split("\n").includes(`   - Result: ${"x".repeat(199)}\u{1F600}...`));

    const emoji = "\u{1F600}".repeat(200);
    const whole = formatResearchResponse(doneOutcome(emoji));
    assert.ok(whole.split("\n").includes(`   - Result: ${emoji}`));
  });

  it("describes a failure", () => {
    const outcome: ResearchOutcome = {
      status: "failed",
      researchId: "r-2",
      query: "q",
      clarifiedQuery: "q",
      plan: null,
      observations: [],
      resources: [],
      locale: "en-US",
      metadata: { ...METADATA, planIterations: 0, stepsExecuted: 0 },
      error: { kind: "collaborator_error", stage: "planning", message: "planning failed: boom" },
    };

    assert.equal(
      formatResearchResponse(outcome),
      "# Research Report\n\n**Query:** q\n**Research ID:** r-2\n**Status:** failed\n\n" +
        "## Result\n\nResearch failed during planning (collaborator_error): planning failed: boom\n"
    );
  });
});
