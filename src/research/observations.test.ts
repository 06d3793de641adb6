/**
 * Observation store, resource set and clarification formatting tests.
 *
 * Run: node --import tsx --test src/research/observations.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { ObservationStore, describeOrigin } from "./observations.js";
import { ResourceSet } from "./resources.js";
import { formatClarifications } from "./clarifications.js";

describe("ObservationStore", () => {
  it("numbers observations from 1 in insertion order", () => {
    const store = new ObservationStore();
    const first = store.append("background facts", { kind: "background" });
    const second = store.append("step summary", {
      kind: "step",
      stepIndex: 0,
      planIteration: 1,
    });

    assert.equal(first.sequence, 1);
    assert.equal(second.sequence, 2);
    assert.equal(store.size, 2);
    assert.deepEqual(store.contents(), ["background facts", "step summary"]);
  });

  it("hands out frozen snapshots that do not grow with the store", () => {
    const store = new ObservationStore();
    store.append("a", { kind: "background" });
    const snapshot = store.list();

    store.append("b", { kind: "background" });

    assert.equal(snapshot.length, 1);
    assert.ok(Object.isFrozen(snapshot));
    assert.ok(Object.isFrozen(snapshot[0]));
    assert.equal(store.list().length, 2);
  });

  it("does not share the caller's origin object", () => {
    const store = new ObservationStore();
    const origin = { kind: "step" as const, stepIndex: 2, planIteration: 1 };
    const observation = store.append("x", origin);

    origin.stepIndex = 7;
    assert.deepEqual(observation.origin, { kind: "step", stepIndex: 2, planIteration: 1 });
  });

  it("rebuilds from recorded observations", () => {
    const store = ObservationStore.from([
      { content: "one", origin: { kind: "background" } },
      { content: "two", origin: { kind: "step", stepIndex: 1, planIteration: 2 } },
    ]);

    assert.equal(store.size, 2);
    assert.equal(store.list()[1]?.sequence, 2);
  });

  it("describes origins", () => {
    assert.equal(describeOrigin({ kind: "background" }), "Background investigation");
    assert.equal(
      describeOrigin({ kind: "step", stepIndex: 0, planIteration: 3 }),
      "Step 1 (plan 3)"
    );
  });
});

describe("ResourceSet", () => {
  it("deduplicates by URL keeping the first title", () => {
    const set = new ResourceSet();

    assert.equal(set.add({ url: "https://a.example/x", title: "First" }), true);
    assert.equal(set.add({ url: "https://a.example/x", title: "Second" }), false);

    assert.deepEqual(set.list(), [{ url: "https://a.example/x", title: "First" }]);
  });

  it("skips blank URLs and falls back to the URL as title", () => {
    const set = new ResourceSet();
    const added = set.addAll([
      { url: "  ", title: "Nothing" },
      { url: "https://b.example", title: "" },
    ]);

    assert.equal(added, 1);
    assert.deepEqual(set.list(), [{ url: "https://b.example", title: "https://b.example" }]);
  });

  it("keeps first-seen order", () => {
    const set = ResourceSet.from([
      { url: "https://c.example", title: "C" },
      { url: "https://a.example", title: "A" },
      { url: "https://c.example", title: "C again" },
    ]);

    assert.equal(set.size, 2);
    assert.deepEqual(
      set.list().map((resource) => resource.url),
      ["https://c.example", "https://a.example"]
    );
  });
});

describe("formatClarifications", () => {
  it("numbers each question and answer pair", () => {
    assert.equal(
      formatClarifications([
        { question: "Which region?", answer: "Northern Europe" },
        { question: "Which years?", answer: "2015 onward" },
      ]),
      "1. Q: Which region?\n   A: Northern Europe\n2. Q: Which years?\n   A: 2015 onward"
    );
  });

  it("is empty for no clarifications", () => {
    assert.equal(formatClarifications([]), "");
  });
});
