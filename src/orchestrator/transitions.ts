/**
 * Research state machine: states and pure transition functions.
 *
 *   clarifying ──► background_investigating ──► planning ──► executing_step ─┐
 *       │                                         ▲  │  │        ▲    │     │
 *       ▼                                         │  │  ▼        └────┘     │
 *   needs_clarification                           │  │ awaiting_plan_approval│
 *                                                 │  ▼                      │
 *                                                 └── reporting ◄───────────┘
 *                                                        │
 *                                                        ▼
 *                                                      done
 *
 * `failed` and `cancelled` are reachable from every active stage. Nothing
 * here performs I/O; the runner in runner.ts feeds each decision its
 * inputs and executes the effects of the resulting state.
 */

import type { StepFailurePolicy } from "../config/research/enums.js";
import { nextPendingStepIndex, type Plan } from "../research/plan.js";
import type { ClarifyOutcome, FailureSummary, ResearchStage } from "./types.js";

/** Why the session moved to reporting. */
export type ReportingReason =
  | "no_steps"
  | "enough_context"
  | "step_budget"
  | "iteration_budget";

export type MachineState =
  | { readonly stage: "clarifying" }
  | { readonly stage: "background_investigating" }
  | { readonly stage: "planning" }
  | { readonly stage: "executing_step"; readonly stepIndex: number }
  | { readonly stage: "reporting"; readonly reason: ReportingReason }
  | { readonly stage: "done" }
  | { readonly stage: "needs_clarification"; readonly question: string }
  | { readonly stage: "awaiting_plan_approval" }
  | { readonly stage: "failed"; readonly error: FailureSummary }
  | { readonly stage: "cancelled"; readonly reason: string };

export type TerminalState = Extract<
  MachineState,
  { stage: "done" | "needs_clarification" | "awaiting_plan_approval" | "failed" | "cancelled" }
>;

/** Which optional pre-planning passes will run. */
export interface PrePlanningFlags {
  readonly clarify: boolean;
  readonly investigate: boolean;
}

export function initialState(flags: PrePlanningFlags): MachineState {
  if (flags.clarify) return { stage: "clarifying" };
  if (flags.investigate) return { stage: "background_investigating" };
  return { stage: "planning" };
}

export function afterClarification(outcome: ClarifyOutcome, investigate: boolean): MachineState {
  if (outcome.kind === "need_more_input") {
    return { stage: "needs_clarification", question: outcome.question };
  }
  return investigate ? { stage: "background_investigating" } : { stage: "planning" };
}

export function afterBackgroundInvestigation(): MachineState {
  return { stage: "planning" };
}

/**
 * A fresh plan either has nothing to run, waits for a reviewer, or starts
 * at its first pending step. Completeness and the iteration budget are
 * judged after the steps run (see afterStep).
 */
export function afterPlanning(plan: Plan, autoAcceptPlan: boolean): MachineState {
  if (nextPendingStepIndex(plan) === -1) {
    return { stage: "reporting", reason: "no_steps" };
  }
  if (!autoAcceptPlan) {
    return { stage: "awaiting_plan_approval" };
  }
  return afterPlanApproval(plan);
}

export function afterPlanApproval(plan: Plan): MachineState {
  const first = nextPendingStepIndex(plan);
  return first === -1
    ? { stage: "reporting", reason: "no_steps" }
    : { stage: "executing_step", stepIndex: first };
}

export interface StepOutcomeInput {
  readonly plan: Plan;
  readonly stepIndex: number;
  /** Error summary when the step failed, null when it completed. */
  readonly stepError: string | null;
  readonly failurePolicy: StepFailurePolicy;
  /** Steps finalized under the current plan, including this one. */
  readonly stepsExecutedThisPlan: number;
  readonly maxStepNum: number;
  readonly planIterationCount: number;
  readonly maxPlanIterations: number;
}

export function afterStep(input: StepOutcomeInput): MachineState {
  const { plan, stepIndex, stepError } = input;

  if (stepError !== null && input.failurePolicy === "abort") {
    return {
      stage: "failed",
      error: {
        kind: "step_failed",
        stage: "executing_step",
        message: `Step ${stepIndex + 1} failed: ${stepError}`,
      },
    };
  }

  if (input.stepsExecutedThisPlan >= input.maxStepNum) {
    return { stage: "reporting", reason: "step_budget" };
  }

  const next = nextPendingStepIndex(plan, stepIndex + 1);
  if (next !== -1) {
    return { stage: "executing_step", stepIndex: next };
  }

  if (plan.hasEnoughContext) {
    return { stage: "reporting", reason: "enough_context" };
  }
  if (input.planIterationCount < input.maxPlanIterations) {
    return { stage: "planning" };
  }
  return { stage: "reporting", reason: "iteration_budget" };
}

export function afterReporting(): MachineState {
  return { stage: "done" };
}

const TERMINAL_STAGES: ReadonlySet<ResearchStage> = new Set<ResearchStage>([
  "done",
  "needs_clarification",
  "awaiting_plan_approval",
  "failed",
  "cancelled",
]);

export function isTerminal(state: MachineState): state is TerminalState {
  return TERMINAL_STAGES.has(state.stage);
}
