/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 *
 * Only process entry points (the CLI, the LLM collaborator factory) read
 * this module. The orchestrator takes everything it needs as arguments.
 */

import {
  ConfigError,
  maybeEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
} from "./env.js";
import type { ResearchDefaults } from "./research/index.js";

export { ConfigError, requireEnv } from "./env.js";

// Re-export research configuration module
export * from "./research/index.js";

/** Model id per agent role. */
export interface AgentModels {
  readonly coordinator: string;
  readonly planner: string;
  readonly researcher: string;
  readonly coder: string;
}

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Application name */
  readonly appName: string;
  /** Process-wide fallbacks for per-session research settings */
  readonly researchDefaults: ResearchDefaults;
  readonly models: AgentModels;
  readonly openaiApiKey?: string;
  readonly openaiBaseUrl: string;
  readonly tavilyApiKey?: string;
}

/**
 * Load and validate application configuration.
 * Fails fast if required variables are malformed.
 */
function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "research-orchestrator"),
    researchDefaults: {
      maxStepNum: optionalEnvInt("RESEARCH_MAX_STEP_NUM", 5),
      maxPlanIterations: optionalEnvInt("RESEARCH_MAX_PLAN_ITERATIONS", 1),
      enableClarification: optionalEnvBool("RESEARCH_ENABLE_CLARIFICATION", true),
      enableBackgroundInvestigation: optionalEnvBool(
        "RESEARCH_ENABLE_BACKGROUND_INVESTIGATION",
        true
      ),
      reportStyle: optionalEnv("RESEARCH_REPORT_STYLE", "academic"),
      locale: optionalEnv("RESEARCH_LOCALE", "en-US"),
    },
    models: {
      coordinator: optionalEnv("COORDINATOR_MODEL", "gpt-4o-mini"),
      planner: optionalEnv("PLANNER_MODEL", "gpt-4o"),
      researcher: optionalEnv("RESEARCHER_MODEL", "gpt-4o-mini"),
      coder: optionalEnv("CODER_MODEL", "gpt-4o-mini"),
    },
    openaiApiKey: maybeEnv("OPENAI_API_KEY"),
    openaiBaseUrl: optionalEnv("OPENAI_BASE_URL", "https://api.openai.com/v1"),
    tavilyApiKey: maybeEnv("TAVILY_API_KEY"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate that all required configuration is present.
 * Call this at application startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}
