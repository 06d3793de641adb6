/**
 * Observation store.
 *
 * Ordered, append-only record of every finding gathered during a session:
 * background search results, step summaries and step failure summaries.
 * Entries are frozen on insert and are never removed or reordered, so the
 * store length only grows and `sequence` equals insertion position + 1.
 */

import { z } from "zod";

export const ObservationOriginSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("background") }),
  z.object({
    kind: z.literal("step"),
    stepIndex: z.number().int().min(0),
    planIteration: z.number().int().min(1),
  }),
]);

export type ObservationOrigin = z.infer<typeof ObservationOriginSchema>;

export const ObservationSchema = z.object({
  sequence: z.number().int().min(1),
  content: z.string(),
  origin: ObservationOriginSchema,
});

export interface Observation {
  readonly sequence: number;
  readonly content: string;
  readonly origin: Readonly<ObservationOrigin>;
}

export class ObservationStore {
  private readonly entries: Observation[] = [];

  /**
   * Rebuild a store from previously recorded observations.
   * Sequences are re-derived from order.
   */
  static from(observations: readonly Pick<Observation, "content" | "origin">[]): ObservationStore {
    const store = new ObservationStore();
    for (const observation of observations) {
      store.append(observation.content, observation.origin);
    }
    return store;
  }

  append(content: string, origin: ObservationOrigin): Observation {
    const observation: Observation = Object.freeze({
      sequence: this.entries.length + 1,
      content,
      origin: Object.freeze({ ...origin }),
    });
    this.entries.push(observation);
    return observation;
  }

  get size(): number {
    return this.entries.length;
  }

  /** Snapshot of all observations in insertion order. */
  list(): readonly Observation[] {
    return Object.freeze([...this.entries]);
  }

  /** Observation texts in insertion order. */
  contents(): string[] {
    return this.entries.map((observation) => observation.content);
  }
}

/**
 * Short label for where an observation came from.
 */
export function describeOrigin(origin: ObservationOrigin): string {
  switch (origin.kind) {
    case "background":
      return "Background investigation";
    case "step":
      return `Step ${origin.stepIndex + 1} (plan ${origin.planIteration})`;
  }
}
