/**
 * Production collaborators: OpenAI-compatible models through the AI SDK,
 * Tavily for web search.
 */

import type { AppConfig } from "../../config/index.js";
import type { Collaborators } from "../../orchestrator/types.js";
import { TemplateReporter } from "../../report/reporter.js";
import { AgentStepExecutor } from "../step-executor.js";
import { TavilyBackgroundInvestigator } from "./background.js";
import { LlmClarifier } from "./clarifier.js";
import { LlmCoder } from "./coder.js";
import { createModels } from "./models.js";
import { LlmPlanner } from "./planner.js";
import { PromptRenderer } from "./prompts.js";
import { LlmResearcher } from "./researcher.js";
import { TavilySearch } from "./search.js";

export { LlmClarifier, toClarifyOutcome, type CoordinatorDecision } from "./clarifier.js";
export { LlmPlanner } from "./planner.js";
export { LlmResearcher, type LlmResearcherOptions } from "./researcher.js";
export { LlmCoder } from "./coder.js";
export { TavilyBackgroundInvestigator } from "./background.js";
export { TavilySearch, formatHits, hitsToResources, type SearchHit, type SearchResponse, type WebSearch } from "./search.js";
export { PromptRenderer, type AgentRole, type StepPromptInput } from "./prompts.js";
export { createModels, type ModelsByRole } from "./models.js";

/**
 * Wire every collaborator from application config. Without a Tavily key
 * there is no background investigation and research steps run without
 * web access.
 *
 * @throws ConfigError when OPENAI_API_KEY is not set
 */
export function createLlmCollaborators(appConfig: AppConfig): Collaborators {
  const models = createModels(appConfig);
  const prompts = new PromptRenderer();
  const web = appConfig.tavilyApiKey ? new TavilySearch(appConfig.tavilyApiKey) : undefined;

  return {
    clarifier: new LlmClarifier(models.coordinator, prompts),
    backgroundInvestigator: web ? new TavilyBackgroundInvestigator(web) : undefined,
    planner: new LlmPlanner(models.planner, prompts),
    stepExecutor: new AgentStepExecutor({
      researcher: new LlmResearcher(models.researcher, prompts, { web }),
      processor: new LlmCoder(models.coder, prompts),
    }),
    reporter: new TemplateReporter(),
  };
}
