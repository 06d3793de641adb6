/**
 * Clarifier backed by the coordinator model.
 */

import { generateObject, type LanguageModel } from "ai";
import { z } from "zod";

import type { ResearchConfig } from "../../config/research/index.js";
import type { ClarifyContext, ClarifyOutcome, Clarifier } from "../../orchestrator/types.js";
import type { PromptRenderer } from "./prompts.js";

/** Every field required: OpenAI structured output rejects optional keys. */
const CoordinatorDecisionSchema = z.object({
  decision: z.enum(["proceed", "need_more_input"]),
  clarifiedQuery: z
    .string()
    .describe("Self-contained rewrite of the request; empty when asking a question"),
  question: z
    .string()
    .describe("One short follow-up question; empty when proceeding"),
});

export type CoordinatorDecision = z.infer<typeof CoordinatorDecisionSchema>;

/**
 * Map the model's decision onto a clarify outcome. A question without text
 * cannot be shown to anyone, so it falls back to proceeding.
 */
export function toClarifyOutcome(query: string, decision: CoordinatorDecision): ClarifyOutcome {
  const question = decision.question.trim();
  if (decision.decision === "need_more_input" && question !== "") {
    return { kind: "need_more_input", question };
  }
  const clarified = decision.clarifiedQuery.trim();
  return { kind: "proceed", clarifiedQuery: clarified === "" ? query : clarified };
}

export class LlmClarifier implements Clarifier {
  constructor(
    private readonly model: LanguageModel,
    private readonly prompts: PromptRenderer
  ) {}

  async clarify(
    query: string,
    _config: Readonly<ResearchConfig>,
    context: ClarifyContext
  ): Promise<ClarifyOutcome> {
    const { object } = await generateObject({
      model: this.model,
      schema: CoordinatorDecisionSchema,
      prompt: this.prompts.coordinator(query, context.locale, context.clarifications),
      abortSignal: context.signal,
    });
    return toClarifyOutcome(query, object);
  }
}
