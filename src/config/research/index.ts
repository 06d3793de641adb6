/**
 * Research configuration module.
 *
 * Provides schema-validated, immutable configuration for research sessions.
 *
 * Usage:
 *   import { resolveResearchConfig } from "./config/research/index.js";
 *
 *   // Schema defaults only
 *   const config = resolveResearchConfig();
 *
 *   // Caller overrides over process defaults
 *   const custom = resolveResearchConfig({ maxStepNum: 2 }, appConfig.researchDefaults);
 */

// Domain enums
export {
  ReportStyle,
  StepType,
  StepStatus,
  StepFailurePolicy,
} from "./enums.js";

// Schema types
export type {
  ResearchConfig,
  ResearchConfigInput,
  ResearchDefaults,
} from "./schema.js";

export { ResearchConfigSchema, MAX_TIMEOUT_MS } from "./schema.js";

// Loader and validation
export {
  loadResearchConfig,
  validateResearchConfig,
  resolveResearchConfig,
  validateQuery,
  deepFreeze,
  ResearchConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

// Defaults
export { DEFAULT_RESEARCH_CONFIG, QUICK_RESEARCH_CONFIG } from "./defaults.js";
