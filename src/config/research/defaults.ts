/**
 * Default research configuration.
 *
 * Mirrors the defaults of ResearchConfigSchema as a concrete value, for
 * callers that want to spread and override a known-good config.
 */

import type { ResearchConfig } from "./schema.js";

export const DEFAULT_RESEARCH_CONFIG: ResearchConfig = {
  maxStepNum: 5,
  maxPlanIterations: 1,
  enableClarification: true,
  enableBackgroundInvestigation: true,
  autoAcceptPlan: true,
  reportStyle: "academic",
  locale: "en-US",
  stepFailurePolicy: "continue",
  maxStepRetries: 0,
};

/**
 * Preset for fast, shallow research: two steps, no clarification turn and
 * no background search.
 */
export const QUICK_RESEARCH_CONFIG: Partial<ResearchConfig> = {
  maxStepNum: 2,
  enableClarification: false,
  enableBackgroundInvestigation: false,
  autoAcceptPlan: true,
};
