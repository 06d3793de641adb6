/**
 * Plan and step model.
 *
 * A Plan is produced once per planner iteration and never rewritten: a
 * re-plan creates a new Plan. On the current plan only two step fields
 * move, and only through the functions below:
 *
 *   status           pending → running → completed | failed
 *   executionResult  null until the step is completed or failed
 *
 * Snapshots handed to event consumers and collaborators are deep copies,
 * frozen, so nothing outside the orchestrator can reach live step state.
 */

import { z } from "zod";
import { StepStatus, StepType } from "../config/research/enums.js";
import { deepFreeze } from "../config/research/loader.js";
import { PlanValidationError, StepTransitionError } from "./errors.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

/** A step as proposed by a planner (or edited by a reviewer). */
export const StepDraftSchema = z.object({
  title: z.string().trim().min(1),
  description: z.string().default(""),
  stepType: StepType.default("research"),
  needSearch: z.boolean().default(false),
});

/** A plan as proposed by a planner (or edited by a reviewer). */
export const PlanDraftSchema = z.object({
  title: z.string().trim().min(1),
  thought: z.string().default(""),
  steps: z.array(StepDraftSchema).default([]),
  hasEnoughContext: z.boolean().default(false),
  locale: z.string().min(2).optional(),
});

export type StepDraft = z.input<typeof StepDraftSchema>;
export type PlanDraft = z.input<typeof PlanDraftSchema>;

/** Full step including execution state (checkpoints, snapshots). */
export const StepSchema = z
  .object({
    title: z.string().min(1),
    description: z.string(),
    stepType: StepType,
    needSearch: z.boolean(),
    status: StepStatus,
    executionResult: z.string().nullable(),
  })
  .refine(
    (step) =>
      (step.executionResult !== null) ===
      (step.status === "completed" || step.status === "failed"),
    { message: "executionResult must be set exactly when the step is completed or failed" }
  );

export const PlanSchema = z.object({
  title: z.string().min(1),
  thought: z.string(),
  steps: z.array(StepSchema),
  hasEnoughContext: z.boolean(),
  locale: z.string().min(2),
});

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Step {
  readonly title: string;
  readonly description: string;
  readonly stepType: StepType;
  readonly needSearch: boolean;
  status: StepStatus;
  executionResult: string | null;
}

export interface Plan {
  readonly title: string;
  readonly thought: string;
  readonly steps: readonly Step[];
  readonly hasEnoughContext: boolean;
  readonly locale: string;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Validate a draft and turn it into a fresh Plan with every step pending.
 *
 * @param draft          - Planner output or reviewer edit (untrusted)
 * @param fallbackLocale - Locale used when the draft names none
 * @throws PlanValidationError
 */
export function createPlan(draft: unknown, fallbackLocale: string): Plan {
  const result = PlanDraftSchema.safeParse(draft);
  if (!result.success) {
    throw new PlanValidationError(
      result.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${path}: ${issue.message}`;
      })
    );
  }

  const data = result.data;
  return {
    title: data.title,
    thought: data.thought,
    hasEnoughContext: data.hasEnoughContext,
    locale: data.locale ?? fallbackLocale,
    steps: data.steps.map((step): Step => ({
      title: step.title,
      description: step.description,
      stepType: step.stepType,
      needSearch: step.needSearch,
      status: "pending",
      executionResult: null,
    })),
  };
}

/**
 * Rebuild a live Plan from a validated snapshot (checkpoint restore).
 */
export function restorePlan(snapshot: z.infer<typeof PlanSchema>): Plan {
  return {
    title: snapshot.title,
    thought: snapshot.thought,
    hasEnoughContext: snapshot.hasEnoughContext,
    locale: snapshot.locale,
    steps: snapshot.steps.map((step) => ({ ...step })),
  };
}

// ---------------------------------------------------------------------------
// Step transitions
// ---------------------------------------------------------------------------

export function startStep(step: Step): void {
  if (step.status !== "pending") {
    throw new StepTransitionError(step.title, step.status, "running");
  }
  step.status = "running";
}

export function completeStep(step: Step, result: string): void {
  if (step.status !== "running") {
    throw new StepTransitionError(step.title, step.status, "completed");
  }
  step.status = "completed";
  step.executionResult = result;
}

export function failStep(step: Step, errorSummary: string): void {
  if (step.status !== "running") {
    throw new StepTransitionError(step.title, step.status, "failed");
  }
  step.status = "failed";
  step.executionResult = errorSummary;
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

/**
 * Index of the first pending step at or after `from`, or -1.
 */
export function nextPendingStepIndex(plan: Plan, from = 0): number {
  for (let i = Math.max(0, from); i < plan.steps.length; i++) {
    if (plan.steps[i]?.status === "pending") return i;
  }
  return -1;
}

export function countSteps(plan: Plan, status: StepStatus): number {
  return plan.steps.filter((step) => step.status === status).length;
}

/**
 * Frozen deep copy of a step.
 */
export function snapshotStep(step: Step): Readonly<Step> {
  return deepFreeze({ ...step });
}

/**
 * Frozen deep copy of a plan, safe to hand to consumers.
 */
export function snapshotPlan(plan: Plan): Plan {
  return deepFreeze({
    title: plan.title,
    thought: plan.thought,
    hasEnoughContext: plan.hasEnoughContext,
    locale: plan.locale,
    steps: plan.steps.map((step) => ({ ...step })),
  });
}
