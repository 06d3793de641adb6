/**
 * Planner backed by the planner model.
 */

import { generateObject, type LanguageModel } from "ai";
import { z } from "zod";

import { StepType } from "../../config/research/enums.js";
import type { PlanContext, Planner } from "../../orchestrator/types.js";
import type { Observation } from "../../research/observations.js";
import type { PlanDraft } from "../../research/plan.js";
import type { PromptRenderer } from "./prompts.js";

const LlmPlanSchema = z.object({
  title: z.string().describe("Short title for the research plan"),
  thought: z.string().describe("One paragraph explaining the approach"),
  hasEnoughContext: z.boolean(),
  steps: z.array(
    z.object({
      title: z.string(),
      description: z.string(),
      stepType: StepType,
      needSearch: z.boolean(),
    })
  ),
});

export class LlmPlanner implements Planner {
  constructor(
    private readonly model: LanguageModel,
    private readonly prompts: PromptRenderer
  ) {}

  async plan(
    query: string,
    observations: readonly Observation[],
    locale: string,
    iteration: number,
    context: PlanContext
  ): Promise<PlanDraft> {
    const { object } = await generateObject({
      model: this.model,
      schema: LlmPlanSchema,
      prompt: this.prompts.planner(query, locale, context.maxStepNum, iteration, observations),
      abortSignal: context.signal,
    });

    if (object.steps.length > context.maxStepNum) {
      context.logger.warn("Planner exceeded the step budget; truncating", {
        proposed: object.steps.length,
        maxStepNum: context.maxStepNum,
      });
    }
    return { ...object, steps: object.steps.slice(0, context.maxStepNum), locale };
  }
}
