/**
 * Agent prompt and LLM adapter tests. No model is called: prompts are
 * rendered from the bundled templates and adapters are fed fixed inputs.
 *
 * Run: node --import tsx --test src/agents/llm/prompts.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { PromptRenderer } from "./prompts.js";
import { toClarifyOutcome } from "./clarifier.js";
import { TavilyBackgroundInvestigator } from "./background.js";
import { formatHits, hitsToResources, type SearchResponse, type WebSearch } from "./search.js";
import { loadResearchConfig } from "../../config/research/loader.js";
import { createSilentLogger } from "../../logging/logger.js";
import { ObservationStore } from "../../research/observations.js";
import { createPlan, snapshotStep } from "../../research/plan.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const prompts = new PromptRenderer();

function lines(text: string): string[] {
  return text.split("\n");
}

const PLAN = createPlan(
  {
    title: "Heat pumps",
    thought: "Start broad.",
    steps: [
      { title: "Survey", description: "Find guides", needSearch: true },
      { title: "Compute COP", stepType: "processing" },
    ],
  },
  "en-US"
);

function observations() {
  const store = new ObservationStore();
  store.append("Heat pumps move heat.", { kind: "background" });
  return store.list();
}

function stepInput(index: number) {
  const step = PLAN.steps[index];
  assert.ok(step);
  return {
    query: "How efficient are heat pumps?",
    locale: "de-DE",
    plan: PLAN,
    stepIndex: index,
    step: snapshotStep(step),
    observations: observations(),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// Prompts
// ═══════════════════════════════════════════════════════════════════════════

describe("coordinator prompt", () => {
  it("omits the clarification section when there are no answers", () => {
    const text = prompts.coordinator("EV adoption", "en-US", []);

    assert.ok(lines(text).includes("Request: EV adoption"));
    assert.ok(lines(text).includes("Reply language: en-US"));
    assert.ok(!text.includes("Earlier clarification exchange"));
  });

  it("lists earlier answers", () => {
    const text = prompts.coordinator("EV adoption", "en-US", [
      { question: "Which region?", answer: "Europe" },
    ]);

    assert.ok(lines(text).includes("Earlier clarification exchange with the user:"));
    assert.ok(lines(text).includes("1. Q: Which region?"));
    assert.ok(lines(text).includes("   A: Europe"));
  });
});

describe("planner prompt", () => {
  it("states the budget, the round and the findings", () => {
    const text = prompts.planner("EV adoption", "fr-FR", 3, 2, observations());

    assert.ok(lines(text).includes("3 concrete steps. This is planning round"));
    assert.ok(lines(text).includes("2."));
    assert.ok(lines(text).includes("Write every title and description in fr-FR."));
    assert.ok(lines(text).includes("Observations gathered so far: 1"));
    assert.ok(lines(text).includes("### 1. Background investigation"));
    assert.ok(lines(text).includes("Heat pumps move heat."));
  });

  it("renders without findings", () => {
    const text = prompts.planner("EV adoption", "en-US", 5, 1, []);

    assert.ok(lines(text).includes("Observations gathered so far: 0"));
    assert.ok(!text.includes("###"));
  });
});

describe("step prompts", () => {
  it("offers web search to a researcher step that needs it", () => {
    const text = prompts.step("researcher", stepInput(0));

    assert.ok(text.startsWith("You are a researcher working on step 1 of the plan"));
    assert.ok(lines(text).includes("Current step (research): Survey"));
    assert.ok(lines(text).includes("Find guides"));
    assert.ok(text.includes("Use the `web_search` tool"));
    assert.ok(!text.includes("No web access"));
    assert.ok(lines(text).includes("1. Survey [research, pending]"));
  });

  it("tells a researcher step without search to work offline", () => {
    const input = stepInput(0);
    const text = prompts.step("researcher", {
      ...input,
      step: { ...input.step, needSearch: false },
    });

    assert.ok(text.includes("No web access is\navailable for this step."));
    assert.ok(!text.includes("web_search"));
  });

  it("renders the coder prompt for a processing step", () => {
    const text = prompts.step("coder", stepInput(1));

    assert.ok(text.startsWith("You are a data analyst handling step 2 (processing) of the plan"));
    assert.ok(lines(text).includes("Task: Compute COP"));
    assert.ok(lines(text).includes("Input material: 1 observation(s)"));
    assert.ok(!text.includes("outside data"));
    assert.ok(text.endsWith("with the result. Answer in de-DE."));
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Clarifier decision mapping
// ═══════════════════════════════════════════════════════════════════════════

describe("toClarifyOutcome", () => {
  it("asks the model's question", () => {
    assert.deepEqual(
      toClarifyOutcome("q", { decision: "need_more_input", clarifiedQuery: "", question: " Which year? " }),
      { kind: "need_more_input", question: "Which year?" }
    );
  });

  it("proceeds with the rewrite", () => {
    assert.deepEqual(
      toClarifyOutcome("q", { decision: "proceed", clarifiedQuery: "q in 2024", question: "" }),
      { kind: "proceed", clarifiedQuery: "q in 2024" }
    );
  });

  it("proceeds with the original query when the model gives no text", () => {
    assert.deepEqual(
      toClarifyOutcome("q", { decision: "need_more_input", clarifiedQuery: " ", question: "" }),
      { kind: "proceed", clarifiedQuery: "q" }
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Background investigation
// ═══════════════════════════════════════════════════════════════════════════

class FakeSearch implements WebSearch {
  readonly queries: { query: string; maxResults: number }[] = [];

  constructor(private readonly response: SearchResponse) {}

  async search(query: string, maxResults: number): Promise<SearchResponse> {
    this.queries.push({ query, maxResults });
    return this.response;
  }
}

const HITS = [
  { title: "Guide", url: "https://guide.example", content: "Heat pumps move heat." },
  { title: "Study", url: "https://study.example", content: "COP is around 3." },
];

describe("TavilyBackgroundInvestigator", () => {
  const context = {
    researchId: "research-1",
    signal: new AbortController().signal,
    logger: createSilentLogger(),
  };

  it("turns each hit into a finding after the summary", async () => {
    const web = new FakeSearch({ answer: "They are efficient.", hits: HITS });
    const investigator = new TavilyBackgroundInvestigator(web, 2);

    const findings = await investigator.investigate("heat pumps", loadResearchConfig({}), context);

    assert.deepEqual(web.queries, [{ query: "heat pumps", maxResults: 2 }]);
    assert.deepEqual(findings, [
      "Search summary: They are efficient.",
      "## Guide\n\nHeat pumps move heat.\n\nSource: https://guide.example",
      "## Study\n\nCOP is around 3.\n\nSource: https://study.example",
    ]);
  });

  it("returns nothing for an empty search", async () => {
    const investigator = new TavilyBackgroundInvestigator(new FakeSearch({ answer: null, hits: [] }));
    const findings = await investigator.investigate("heat pumps", loadResearchConfig({}), context);
    assert.deepEqual(findings, []);
  });
});

describe("search helpers", () => {
  it("maps hits to resources", () => {
    assert.deepEqual(hitsToResources(HITS), [
      { url: "https://guide.example", title: "Guide" },
      { url: "https://study.example", title: "Study" },
    ]);
  });

  it("joins hits as sections", () => {
    assert.equal(
      formatHits(HITS),
      "## Guide\n\nHeat pumps move heat.\n\nSource: https://guide.example\n\n" +
        "## Study\n\nCOP is around 3.\n\nSource: https://study.example"
    );
  });
});
