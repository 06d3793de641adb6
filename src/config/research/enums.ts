/**
 * Domain enumerations for the research workflow.
 *
 * These are the closed value sets shared by configuration, the plan model,
 * the reporter and the checkpoint format. Extending one is a format change:
 * bump CHECKPOINT_VERSION when a persisted value set changes.
 */

import { z } from "zod";

/**
 * Rendering modes for the final report.
 * Unrecognized styles fall back to "academic" at render time.
 */
export const ReportStyle = z.enum(["academic", "news", "social", "investment"]);
export type ReportStyle = z.infer<typeof ReportStyle>;

/**
 * What kind of agent a plan step needs.
 *
 *   research     information gathering (optionally with web search)
 *   processing   computation and analysis over what is already known
 */
export const StepType = z.enum(["research", "processing"]);
export type StepType = z.infer<typeof StepType>;

/**
 * Lifecycle of a plan step. Moves only pending → running → completed|failed.
 */
export const StepStatus = z.enum(["pending", "running", "completed", "failed"]);
export type StepStatus = z.infer<typeof StepStatus>;

/**
 * What the orchestrator does after a step has failed (retries exhausted).
 *
 *   continue   record the failure as an observation and move on
 *   abort      end the session in the failed state
 */
export const StepFailurePolicy = z.enum(["continue", "abort"]);
export type StepFailurePolicy = z.infer<typeof StepFailurePolicy>;
