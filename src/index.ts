/**
 * Research workflow orchestrator: plan-and-execute research with bounded
 * re-planning, ordered progress events and pluggable collaborators.
 *
 * ```typescript
 * import { ResearchOrchestrator, createLlmCollaborators, config } from "research-orchestrator";
 *
 * const orchestrator = new ResearchOrchestrator({
 *   collaborators: createLlmCollaborators(config),
 *   defaults: config.researchDefaults,
 * });
 * const outcome = await orchestrator.run("How do heat pumps work?", { maxStepNum: 3 });
 * ```
 */

export * from "./orchestrator/index.js";
export * from "./research/index.js";
export * from "./report/index.js";
export * from "./templates/index.js";
export * from "./agents/index.js";
export {
  createLlmCollaborators,
  LlmClarifier,
  LlmPlanner,
  LlmResearcher,
  LlmCoder,
  TavilyBackgroundInvestigator,
  TavilySearch,
  PromptRenderer,
  type WebSearch,
  type SearchHit,
  type SearchResponse,
} from "./agents/llm/index.js";
export {
  config,
  validateConfig,
  ConfigError,
  type AppConfig,
  type AgentModels,
  DEFAULT_RESEARCH_CONFIG,
  QUICK_RESEARCH_CONFIG,
  ResearchConfigSchema,
  ResearchConfigError,
  resolveResearchConfig,
  loadResearchConfig,
  validateResearchConfig,
  ReportStyle,
  StepType,
  StepStatus,
  StepFailurePolicy,
  type ResearchConfig,
  type ResearchConfigInput,
  type ResearchDefaults,
} from "./config/index.js";
export { createLogger, createSilentLogger, generateRunId, type Logger, type LogLevel } from "./logging/index.js";
