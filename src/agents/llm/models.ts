/**
 * Language model factory.
 *
 * One OpenAI-compatible provider per process; each agent role gets its own
 * model id from AppConfig.
 */

import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";

import { ConfigError, type AgentModels, type AppConfig } from "../../config/index.js";

export type ModelsByRole = { readonly [Role in keyof AgentModels]: LanguageModel };

/**
 * @throws ConfigError when OPENAI_API_KEY is not set
 */
export function createModels(appConfig: AppConfig): ModelsByRole {
  if (!appConfig.openaiApiKey) {
    throw new ConfigError("Missing required environment variable: OPENAI_API_KEY");
  }

  const provider = createOpenAI({
    apiKey: appConfig.openaiApiKey,
    baseURL: appConfig.openaiBaseUrl,
  });

  return {
    coordinator: provider(appConfig.models.coordinator),
    planner: provider(appConfig.models.planner),
    researcher: provider(appConfig.models.researcher),
    coder: provider(appConfig.models.coder),
  };
}
