/**
 * Research step agent: the researcher model, with a web search tool when
 * the step asks for one.
 */

import { generateText, stepCountIs, tool, type LanguageModel } from "ai";
import { z } from "zod";

import type { Resource } from "../../research/resources.js";
import type { StepAgent, StepAgentInput, StepAgentOutput } from "../step-executor.js";
import type { PromptRenderer } from "./prompts.js";
import { hitsToResources, type WebSearch } from "./search.js";

export interface LlmResearcherOptions {
  /** Absent when no search API key is configured. */
  web?: WebSearch;
  maxResultsPerSearch?: number;
  /** Upper bound on model turns, tool calls included. */
  maxTurns?: number;
}

export class LlmResearcher implements StepAgent {
  private readonly web?: WebSearch;
  private readonly maxResultsPerSearch: number;
  private readonly maxTurns: number;

  constructor(
    private readonly model: LanguageModel,
    private readonly prompts: PromptRenderer,
    options: LlmResearcherOptions = {}
  ) {
    this.web = options.web;
    this.maxResultsPerSearch = options.maxResultsPerSearch ?? 5;
    this.maxTurns = options.maxTurns ?? 6;
  }

  async run(input: StepAgentInput): Promise<StepAgentOutput> {
    const { step, context } = input;
    const web = this.web;
    const resources: Resource[] = [];

    const webSearch = tool({
      description: "Search the web. Ask one specific, human-readable question per call.",
      inputSchema: z.object({
        query: z.string().describe("The search question"),
      }),
      execute: async ({ query }) => {
        if (!web) {
          throw new Error("Web search is not configured");
        }
        context.logger.debug("Web search", { step: context.stepIndex + 1, query });
        const response = await web.search(query, this.maxResultsPerSearch);
        resources.push(...hitsToResources(response.hits));
        return { answer: response.answer, results: response.hits };
      },
    });

    const searching = input.webSearch && web !== undefined;
    if (input.webSearch && !web) {
      context.logger.warn("Step asks for web search but none is configured", {
        step: context.stepIndex + 1,
      });
    }

    const { text } = await generateText({
      model: this.model,
      prompt: this.prompts.step("researcher", {
        query: context.query,
        locale: context.locale,
        plan: context.plan,
        stepIndex: context.stepIndex,
        step,
        observations: context.observations,
      }),
      tools: { web_search: webSearch },
      activeTools: searching ? ["web_search"] : [],
      stopWhen: stepCountIs(this.maxTurns),
      abortSignal: context.signal,
    });

    return { summary: text, resources };
  }
}
