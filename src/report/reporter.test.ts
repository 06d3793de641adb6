/**
 * Template reporter tests.
 *
 * Run: node --import tsx --test src/report/reporter.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { TemplateReporter, normalizeReportStyle } from "./reporter.js";
import { completeStep, createPlan, startStep, type Plan } from "../research/plan.js";
import { ObservationStore } from "../research/observations.js";
import type { Resource } from "../research/resources.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const QUERY = "How do heat pumps work?";

function makePlan(): Plan {
  const plan = createPlan(
    {
      title: "Heat pumps",
      thought: "Cover basics.",
      steps: [{ title: "Principles", description: "How they move heat" }],
    },
    "en-US"
  );
  const step = plan.steps[0];
  assert.ok(step);
  startStep(step);
  completeStep(step, "Moves heat using a refrigerant cycle.");
  return plan;
}

function makeObservations() {
  const store = new ObservationStore();
  store.append("Heat pumps are common.", { kind: "background" });
  store.append("Moves heat using a refrigerant cycle.", {
    kind: "step",
    stepIndex: 0,
    planIteration: 1,
  });
  return store.list();
}

const RESOURCES: Resource[] = [{ url: "https://hp.example/guide", title: "HP guide" }];

const reporter = new TemplateReporter();

// ═══════════════════════════════════════════════════════════════════════════
// Tests
// ═══════════════════════════════════════════════════════════════════════════

describe("normalizeReportStyle", () => {
  it("keeps known styles and ignores case", () => {
    assert.equal(normalizeReportStyle("news"), "news");
    assert.equal(normalizeReportStyle(" Investment "), "investment");
  });

  it("falls back to academic", () => {
    assert.equal(normalizeReportStyle("unknown_style"), "academic");
    assert.equal(normalizeReportStyle(""), "academic");
  });
});

describe("TemplateReporter", () => {
  it("renders the academic report", () => {
    const report = reporter.render(QUERY, makePlan(), makeObservations(), RESOURCES, "academic");
    const lines = report.split("\n");

    assert.equal(lines[0], "# Heat pumps");
    assert.ok(lines.includes(`**Research question:** ${QUERY}`));
    assert.ok(lines.includes("_Report style: academic · Locale: en-US_"));
    assert.ok(lines.includes("Cover basics."));
    assert.ok(
      lines.includes(
        "This report draws on 2 recorded observation(s) gathered across a plan of 1 step(s)."
      )
    );
    assert.ok(lines.includes("1. Principles [research, completed]"));
    assert.ok(lines.includes("### 1. Background investigation"));
    assert.ok(lines.includes("### 2. Step 1 (plan 1)"));
    assert.ok(lines.includes("- [HP guide](https://hp.example/guide)"));
    assert.ok(report.endsWith("Sources consulted: 1\n"));
  });

  it("renders an unknown style exactly like academic", () => {
    const plan = makePlan();
    const observations = makeObservations();
    assert.equal(
      reporter.render(QUERY, plan, observations, RESOURCES, "unknown_style"),
      reporter.render(QUERY, plan, observations, RESOURCES, "academic")
    );
  });

  it("is deterministic", () => {
    const first = reporter.render(QUERY, makePlan(), makeObservations(), RESOURCES, "news");
    const second = reporter.render(QUERY, makePlan(), makeObservations(), RESOURCES, "news");
    assert.equal(first, second);
  });

  it("includes every observation in every style", () => {
    for (const style of ["academic", "news", "social", "investment"]) {
      const report = reporter.render(QUERY, makePlan(), makeObservations(), RESOURCES, style);
      assert.ok(report.includes("Heat pumps are common."), style);
      assert.ok(report.includes("Moves heat using a refrigerant cycle."), style);
    }
  });

  it("uses the style's own layout", () => {
    const news = reporter.render(QUERY, makePlan(), makeObservations(), RESOURCES, "NEWS");
    assert.ok(news.split("\n").includes(`> ${QUERY}`));

    const investment = reporter.render(QUERY, makePlan(), makeObservations(), [], "investment");
    assert.ok(investment.startsWith("# Investment Brief: Heat pumps\n"));
    assert.ok(investment.split("\n").includes("| Sources | 0 |"));
  });

  it("omits the link list when there are no resources", () => {
    const report = reporter.render(QUERY, makePlan(), makeObservations(), [], "academic");
    assert.ok(!report.includes("- ["));
    assert.ok(report.endsWith("Sources consulted: 0\n"));
  });

  it("renders a plan with no steps", () => {
    const plan = createPlan({ title: "Known", hasEnoughContext: true }, "de-DE");
    const report = reporter.render(QUERY, plan, [], [], "social");
    const lines = report.split("\n");

    assert.equal(lines[0], "## Known");
    assert.ok(lines.includes("Steps (0):"));
    assert.ok(lines.includes("#social · de-DE · 0 notes · 0 links"));
  });
});
