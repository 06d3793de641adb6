/**
 * Orchestrator contracts: collaborator interfaces, progress events and
 * terminal outcomes.
 *
 * Collaborators are injected per orchestrator. Every call receives the
 * session's AbortSignal; a collaborator that ignores it is still raced
 * against the signal, so cancellation never waits on it.
 */

import type { ResearchConfig } from "../config/research/index.js";
import type { Logger } from "../logging/logger.js";
import type { Clarification } from "../research/clarifications.js";
import type { Observation } from "../research/observations.js";
import type { Plan, PlanDraft, Step } from "../research/plan.js";
import type { Resource } from "../research/resources.js";
import type { SessionCheckpoint } from "./checkpoint.js";

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

/** Passed to every collaborator call. */
export interface CallContext {
  readonly researchId: string;
  readonly signal: AbortSignal;
  /** Session logger, tagged with the research ID. */
  readonly logger: Logger;
}

export type ClarifyOutcome =
  | { kind: "proceed"; clarifiedQuery: string }
  | { kind: "need_more_input"; question: string };

export interface ClarifyContext extends CallContext {
  /** Answers to questions asked by earlier sessions, oldest first. */
  readonly clarifications: readonly Clarification[];
  readonly locale: string;
}

export interface Clarifier {
  clarify(
    query: string,
    config: Readonly<ResearchConfig>,
    context: ClarifyContext
  ): Promise<ClarifyOutcome>;
}

export interface BackgroundInvestigator {
  /** @returns zero or more findings, each appended as one observation */
  investigate(
    query: string,
    config: Readonly<ResearchConfig>,
    context: CallContext
  ): Promise<readonly string[]>;
}

export interface PlanContext extends CallContext {
  readonly maxStepNum: number;
  /** The plan being replaced, or null on the first iteration. */
  readonly previousPlan: Plan | null;
}

export interface Planner {
  /**
   * Propose a plan. The draft is validated by the orchestrator; a draft
   * that does not satisfy the plan schema fails the session.
   *
   * @param iteration - 1-based planning round
   */
  plan(
    query: string,
    observations: readonly Observation[],
    locale: string,
    iteration: number,
    context: PlanContext
  ): Promise<PlanDraft>;
}

export type StepResult =
  | { status: "completed"; result: string; resources?: readonly Resource[] }
  | { status: "failed"; error: string };

export interface StepContext extends CallContext {
  readonly query: string;
  readonly locale: string;
  /** Frozen snapshot of the current plan, the step under execution running. */
  readonly plan: Plan;
  readonly stepIndex: number;
  readonly observations: readonly Observation[];
  /** 1-based attempt number (greater than 1 only when retries are enabled). */
  readonly attempt: number;
}

export interface StepExecutor {
  execute(step: Readonly<Step>, context: StepContext): Promise<StepResult>;
}

export interface Reporter {
  /** Pure and deterministic. Unknown styles render as academic. */
  render(
    query: string,
    plan: Plan,
    observations: readonly Observation[],
    resources: readonly Resource[],
    style: string
  ): string;
}

export interface Collaborators {
  clarifier?: Clarifier;
  backgroundInvestigator?: BackgroundInvestigator;
  planner: Planner;
  stepExecutor: StepExecutor;
  reporter: Reporter;
}

// ---------------------------------------------------------------------------
// Stages and events
// ---------------------------------------------------------------------------

export type ActiveStage =
  | "clarifying"
  | "background_investigating"
  | "planning"
  | "executing_step"
  | "reporting";

export type TerminalStage =
  | "done"
  | "needs_clarification"
  | "awaiting_plan_approval"
  | "failed"
  | "cancelled";

export type ResearchStage = ActiveStage | TerminalStage;

export interface ProgressEvent {
  readonly researchId: string;
  /** Strictly increasing from 1 within a session. */
  readonly sequence: number;
  readonly stage: ResearchStage;
  readonly message: string;
  /** Plan as of this event; null before a plan exists and while a new one is drafted. */
  readonly plan: Plan | null;
  readonly currentStepIndex: number | null;
  readonly totalSteps: number | null;
  /** Every observation recorded so far, in sequence order. */
  readonly observationsSoFar: readonly Observation[] | null;
}

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export type FailureKind = "collaborator_error" | "invalid_plan" | "step_failed" | "internal";

export interface FailureSummary {
  readonly kind: FailureKind;
  readonly stage: ActiveStage;
  readonly message: string;
}

export interface ResearchMetadata {
  readonly maxStepNum: number;
  readonly maxPlanIterations: number;
  readonly enableClarification: boolean;
  readonly enableBackgroundInvestigation: boolean;
  readonly autoAcceptPlan: boolean;
  readonly reportStyle: string;
  readonly planIterations: number;
  readonly stepsExecuted: number;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
}

interface OutcomeBase {
  readonly researchId: string;
  readonly query: string;
  readonly clarifiedQuery: string;
  readonly plan: Plan | null;
  readonly observations: readonly Observation[];
  readonly resources: readonly Resource[];
  readonly locale: string;
  readonly metadata: ResearchMetadata;
}

export interface DoneOutcome extends OutcomeBase {
  readonly status: "done";
  readonly plan: Plan;
  readonly finalReport: string;
}

export interface NeedsClarificationOutcome extends OutcomeBase {
  readonly status: "needs_clarification";
  readonly question: string;
}

export interface AwaitingApprovalOutcome extends OutcomeBase {
  readonly status: "awaiting_plan_approval";
  readonly plan: Plan;
  readonly checkpoint: SessionCheckpoint;
}

export interface FailedOutcome extends OutcomeBase {
  readonly status: "failed";
  readonly error: FailureSummary;
}

export interface CancelledOutcome extends OutcomeBase {
  readonly status: "cancelled";
  readonly reason: string;
}

export type ResearchOutcome =
  | DoneOutcome
  | NeedsClarificationOutcome
  | AwaitingApprovalOutcome
  | FailedOutcome
  | CancelledOutcome;

// ---------------------------------------------------------------------------
// Run handle and options
// ---------------------------------------------------------------------------

export interface ResearchRun {
  /** Assigned at creation, available before any event. */
  readonly researchId: string;
  /**
   * Ordered progress events, ending after the terminal event.
   * Single consumer: a second call throws.
   */
  events(): AsyncIterable<ProgressEvent>;
  /** Settles with the terminal outcome. Never rejects. */
  readonly result: Promise<ResearchOutcome>;
  /** Stop at the next suspension point with a `cancelled` outcome. */
  cancel(reason?: string): void;
}

export interface SessionOptions {
  /** Answers from earlier `needs_clarification` rounds. */
  clarifications?: readonly Clarification[];
  /** External cancellation. */
  signal?: AbortSignal;
}

export type PlanDecision =
  | { type: "accept" }
  | { type: "edit"; plan: PlanDraft };
