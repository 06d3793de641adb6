/**
 * Processing step agent: calculation and data transformation over the
 * findings gathered so far. No tools.
 */

import { generateText, type LanguageModel } from "ai";

import type { StepAgent, StepAgentInput, StepAgentOutput } from "../step-executor.js";
import type { PromptRenderer } from "./prompts.js";

export class LlmCoder implements StepAgent {
  constructor(
    private readonly model: LanguageModel,
    private readonly prompts: PromptRenderer
  ) {}

  async run(input: StepAgentInput): Promise<StepAgentOutput> {
    const { step, context } = input;
    const { text } = await generateText({
      model: this.model,
      prompt: this.prompts.step("coder", {
        query: context.query,
        locale: context.locale,
        plan: context.plan,
        stepIndex: context.stepIndex,
        step,
        observations: context.observations,
      }),
      abortSignal: context.signal,
    });
    return { summary: text, resources: [] };
  }
}
