/**
 * Research configuration schema definition.
 *
 * A ResearchConfig is the immutable settings snapshot for one research
 * session. It is validated once when the session starts and then treated as
 * read-only; changing settings means starting a new session with a new
 * research id.
 */

import { z } from "zod";
import { StepFailurePolicy } from "./enums.js";

/** Longest delay a Node timer accepts (2^31 - 1 ms). */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const ResearchConfigSchema = z
  .object({
    /** Upper bound on steps executed for a single plan */
    maxStepNum: z
      .number()
      .int()
      .min(1)
      .default(5)
      .describe("Maximum number of steps executed per plan"),

    /** Upper bound on planner invocations for the whole session */
    maxPlanIterations: z
      .number()
      .int()
      .min(1)
      .default(1)
      .describe("Maximum number of plans generated in one session"),

    enableClarification: z
      .boolean()
      .default(true)
      .describe("Run the clarifier before planning"),

    enableBackgroundInvestigation: z
      .boolean()
      .default(true)
      .describe("Run a best-effort search before the first plan"),

    /** When false, the session pauses after each plan for human approval */
    autoAcceptPlan: z
      .boolean()
      .default(true)
      .describe("Execute generated plans without waiting for approval"),

    /**
     * Report style tag. Any string is accepted here; the reporter maps
     * values outside the ReportStyle enum to "academic".
     */
    reportStyle: z
      .string()
      .min(1)
      .default("academic")
      .describe("Report style (academic, news, social, investment)"),

    locale: z
      .string()
      .min(2)
      .default("en-US")
      .describe("BCP 47 locale for plans and reports"),

    stepFailurePolicy: StepFailurePolicy.default("continue").describe(
      "Whether a failed step ends the session or is recorded and skipped"
    ),

    /** Extra attempts for a failed step before its failure is final */
    maxStepRetries: z
      .number()
      .int()
      .min(0)
      .max(5)
      .default(0)
      .describe("Number of retries for a failed step"),

    /** Deadline for the whole session; expiry cancels the session */
    timeoutMs: z
      .number()
      .int()
      .positive()
      .max(MAX_TIMEOUT_MS)
      .optional()
      .describe("Session deadline in milliseconds"),
  })
  .strict();

/** Validated configuration, every default applied. */
export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;

/** Caller-facing configuration: every field optional. */
export type ResearchConfigInput = z.input<typeof ResearchConfigSchema>;

/**
 * Process-level fallbacks applied beneath per-session overrides.
 */
export type ResearchDefaults = Pick<
  ResearchConfigInput,
  | "maxStepNum"
  | "maxPlanIterations"
  | "enableClarification"
  | "enableBackgroundInvestigation"
  | "reportStyle"
  | "locale"
>;
