/**
 * Effect runner for one research session.
 *
 * Drives the state machine in transitions.ts: enters each state, performs
 * its collaborator call, feeds the result to the matching transition and
 * emits progress events. Always settles with a terminal outcome.
 */

import {
  completeStep,
  createPlan,
  failStep,
  snapshotPlan,
  snapshotStep,
  startStep,
  type Plan,
  type Step,
} from "../research/plan.js";
import { PlanValidationError } from "../research/errors.js";
import type { AsyncEventQueue } from "./event-queue.js";
import { CollaboratorError, SessionCancelledError, describeError } from "./errors.js";
import type { ResearchSession } from "./session.js";
import {
  afterBackgroundInvestigation,
  afterClarification,
  afterPlanning,
  afterReporting,
  afterStep,
  isTerminal,
  type MachineState,
  type ReportingReason,
  type TerminalState,
} from "./transitions.js";
import type {
  ActiveStage,
  CallContext,
  Collaborators,
  ProgressEvent,
  ResearchOutcome,
  ResearchStage,
  StepResult,
} from "./types.js";

const REPORTING_MESSAGES: Record<ReportingReason, string> = {
  no_steps: "Plan has no steps; writing the report",
  enough_context: "Plan finished with enough context; writing the report",
  step_budget: "Step budget reached; writing the report",
  iteration_budget: "Planning budget reached; writing the report",
};

/**
 * Race a collaborator promise against the session signal. The losing
 * promise keeps running but its settlement is ignored.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(toCancellation(signal.reason));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(toCancellation(signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

export function toCancellation(reason: unknown): SessionCancelledError {
  if (reason instanceof SessionCancelledError) return reason;
  return new SessionCancelledError(reason === undefined ? "aborted" : describeError(reason));
}

export class SessionRunner {
  private sequence = 0;

  constructor(
    private readonly session: ResearchSession,
    private readonly collaborators: Collaborators,
    private readonly signal: AbortSignal,
    private readonly queue: AsyncEventQueue<ProgressEvent>,
    private readonly now: () => Date
  ) {}

  /**
   * Run from `initial` until a terminal state. Never rejects.
   */
  async drive(initial: MachineState): Promise<ResearchOutcome> {
    let state = initial;
    let stage: ActiveStage = "planning";

    try {
      while (!isTerminal(state)) {
        stage = state.stage;
        this.throwIfCancelled();
        state = await this.enter(state);
      }
      return this.finish(state);
    } catch (error) {
      return this.finish(this.terminalFor(error, stage));
    }
  }

  // -------------------------------------------------------------------------
  // States
  // -------------------------------------------------------------------------

  private enter(state: Exclude<MachineState, TerminalState>): Promise<MachineState> {
    switch (state.stage) {
      case "clarifying":
        return this.clarify();
      case "background_investigating":
        return this.investigate();
      case "planning":
        return this.plan();
      case "executing_step":
        return this.executeStep(state.stepIndex);
      case "reporting":
        return Promise.resolve(this.report(state.reason));
    }
  }

  private get investigates(): boolean {
    return (
      this.session.config.enableBackgroundInvestigation &&
      this.collaborators.backgroundInvestigator !== undefined
    );
  }

  private async clarify(): Promise<MachineState> {
    const { session } = this;
    const clarifier = this.collaborators.clarifier;
    if (!clarifier) {
      return afterClarification(
        { kind: "proceed", clarifiedQuery: session.clarifiedQuery },
        this.investigates
      );
    }

    this.emit("clarifying", "Checking whether the query needs clarification");
    const outcome = await this.call("clarifying", (ctx) =>
      clarifier.clarify(session.originalQuery, session.config, {
        ...ctx,
        clarifications: session.clarifications,
        locale: session.locale,
      })
    );

    if (outcome.kind === "proceed") {
      const clarified = outcome.clarifiedQuery.trim();
      if (clarified !== "") session.clarifiedQuery = clarified;
      session.logger.info("Query accepted", { clarifiedQuery: session.clarifiedQuery });
    } else {
      session.logger.info("Clarification requested", { question: outcome.question });
    }

    return afterClarification(outcome, this.investigates);
  }

  private async investigate(): Promise<MachineState> {
    const { session } = this;
    const investigator = this.collaborators.backgroundInvestigator;
    if (!investigator) return afterBackgroundInvestigation();

    this.emit("background_investigating", "Running background investigation");
    try {
      const findings: unknown = await this.call("background_investigating", (ctx) =>
        investigator.investigate(session.clarifiedQuery, session.config, ctx)
      );
      if (!Array.isArray(findings)) {
        throw new CollaboratorError(
          "background_investigating",
          new TypeError("investigator must return a list of findings")
        );
      }
      const entries: readonly unknown[] = findings;
      let added = 0;
      let skipped = 0;
      for (const finding of entries) {
        if (typeof finding !== "string") {
          skipped++;
          continue;
        }
        if (finding.trim() === "") continue;
        session.observations.append(finding, { kind: "background" });
        added++;
      }
      if (skipped > 0) {
        session.logger.warn("Ignored background findings that are not text", { skipped });
      }
      session.logger.info("Background investigation finished", { observations: added });
    } catch (error) {
      if (!(error instanceof CollaboratorError)) throw error;
      session.logger.warn("Background investigation failed; continuing without it", {
        error: error.message,
      });
    }

    return afterBackgroundInvestigation();
  }

  private async plan(): Promise<MachineState> {
    const { session } = this;
    const { planner } = this.collaborators;
    const { config } = session;
    const iteration = session.planIterationCount + 1;

    // The previous plan is about to be replaced, so this event carries none.
    this.emit(
      "planning",
      `Planning (iteration ${iteration} of ${config.maxPlanIterations})`,
      null,
      null
    );
    const previous = session.plan;
    const draft = await this.call("planning", (ctx) =>
      planner.plan(session.clarifiedQuery, session.observations.list(), session.locale, iteration, {
        ...ctx,
        maxStepNum: config.maxStepNum,
        previousPlan: previous ? snapshotPlan(previous) : null,
      })
    );

    const plan = createPlan(draft, session.locale);
    session.adoptPlan(plan, true);
    session.logger.info("Plan created", {
      iteration,
      title: plan.title,
      steps: plan.steps.length,
      hasEnoughContext: plan.hasEnoughContext,
    });
    this.emit("planning", `Plan ready: ${plan.title} (${plan.steps.length} step(s))`);

    return afterPlanning(plan, config.autoAcceptPlan);
  }

  private async executeStep(stepIndex: number): Promise<MachineState> {
    const { session } = this;
    const plan = session.plan;
    const step = plan?.steps[stepIndex];
    if (!plan || !step) {
      throw new Error(`No step ${stepIndex + 1} in the current plan`);
    }
    const total = plan.steps.length;
    const label = `${stepIndex + 1}/${total}`;

    startStep(step);
    this.emit("executing_step", `Executing step ${label}: ${step.title}`, stepIndex);

    const result = await this.runStep(plan, step, stepIndex);
    const origin = {
      kind: "step" as const,
      stepIndex,
      planIteration: session.planIterationCount,
    };

    let stepError: string | null = null;
    if (result.status === "completed") {
      completeStep(step, result.result);
      session.resources.addAll(result.resources ?? []);
      session.observations.append(result.result, origin);
      session.logger.info("Step completed", { step: stepIndex + 1, title: step.title });
    } else {
      stepError = result.error;
      failStep(step, result.error);
      session.observations.append(
        `Step ${stepIndex + 1} "${step.title}" failed: ${result.error}`,
        origin
      );
      session.logger.warn("Step failed", { step: stepIndex + 1, title: step.title, error: result.error });
    }
    session.recordStepFinished();
    this.emit("executing_step", `Step ${label} ${step.status}: ${step.title}`, stepIndex);

    return afterStep({
      plan,
      stepIndex,
      stepError,
      failurePolicy: session.config.stepFailurePolicy,
      stepsExecutedThisPlan: session.stepsExecutedThisPlan,
      maxStepNum: session.config.maxStepNum,
      planIterationCount: session.planIterationCount,
      maxPlanIterations: session.config.maxPlanIterations,
    });
  }

  /**
   * Execute a step, retrying failed attempts up to maxStepRetries times.
   * The step stays running between attempts.
   */
  private async runStep(plan: Plan, step: Step, stepIndex: number): Promise<StepResult> {
    const attempts = this.session.config.maxStepRetries + 1;
    let result: StepResult = { status: "failed", error: "step was not attempted" };

    for (let attempt = 1; attempt <= attempts; attempt++) {
      result = await this.attemptStep(plan, step, stepIndex, attempt);
      if (result.status === "completed") return result;
      if (attempt < attempts) {
        this.session.logger.warn("Step attempt failed; retrying", {
          step: stepIndex + 1,
          attempt,
          error: result.error,
        });
      }
    }
    return result;
  }

  private async attemptStep(
    plan: Plan,
    step: Step,
    stepIndex: number,
    attempt: number
  ): Promise<StepResult> {
    const { session } = this;
    const executor = this.collaborators.stepExecutor;
    try {
      return await this.call("executing_step", (ctx) =>
        executor.execute(snapshotStep(step), {
          ...ctx,
          query: session.clarifiedQuery,
          locale: session.locale,
          plan: snapshotPlan(plan),
          stepIndex,
          observations: session.observations.list(),
          attempt,
        })
      );
    } catch (error) {
      if (error instanceof CollaboratorError) {
        return { status: "failed", error: describeError(error.cause) };
      }
      throw error;
    }
  }

  private report(reason: ReportingReason): MachineState {
    const { session } = this;
    const plan = session.plan;
    if (!plan) {
      throw new Error("Cannot report without a plan");
    }

    this.emit("reporting", REPORTING_MESSAGES[reason]);
    try {
      session.finalReport = this.collaborators.reporter.render(
        session.clarifiedQuery,
        snapshotPlan(plan),
        session.observations.list(),
        session.resources.list(),
        session.config.reportStyle
      );
    } catch (error) {
      throw new CollaboratorError("reporting", error);
    }
    return afterReporting();
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private async call<T>(stage: ActiveStage, invoke: (context: CallContext) => Promise<T>): Promise<T> {
    const context: CallContext = {
      researchId: this.session.researchId,
      signal: this.signal,
      logger: this.session.logger,
    };
    try {
      return await raceAbort(new Promise<T>((resolve) => resolve(invoke(context))), this.signal);
    } catch (error) {
      if (error instanceof SessionCancelledError) throw error;
      if (this.signal.aborted) throw toCancellation(this.signal.reason);
      throw new CollaboratorError(stage, error);
    }
  }

  private throwIfCancelled(): void {
    if (this.signal.aborted) {
      throw toCancellation(this.signal.reason);
    }
  }

  private terminalFor(error: unknown, stage: ActiveStage): TerminalState {
    if (error instanceof SessionCancelledError) {
      return { stage: "cancelled", reason: error.reason };
    }
    if (this.signal.aborted) {
      return { stage: "cancelled", reason: toCancellation(this.signal.reason).reason };
    }
    if (error instanceof CollaboratorError) {
      return {
        stage: "failed",
        error: { kind: "collaborator_error", stage: error.stage, message: error.message },
      };
    }
    if (error instanceof PlanValidationError) {
      return { stage: "failed", error: { kind: "invalid_plan", stage, message: error.message } };
    }
    return { stage: "failed", error: { kind: "internal", stage, message: describeError(error) } };
  }

  private emit(
    stage: ResearchStage,
    message: string,
    stepIndex: number | null = null,
    plan: Plan | null = this.session.plan
  ): void {
    const { session } = this;
    const event: ProgressEvent = {
      researchId: session.researchId,
      sequence: ++this.sequence,
      stage,
      message,
      plan: plan ? snapshotPlan(plan) : null,
      currentStepIndex: stepIndex,
      totalSteps: plan ? plan.steps.length : null,
      observationsSoFar: session.observations.list(),
    };
    this.queue.push(Object.freeze(event));
  }

  private finish(state: TerminalState): ResearchOutcome {
    let outcome: ResearchOutcome;
    try {
      outcome = this.buildOutcome(state);
    } catch (error) {
      outcome = this.buildOutcome({
        stage: "failed",
        error: { kind: "internal", stage: "reporting", message: describeError(error) },
      });
    }

    this.emit(outcome.status, terminalMessage(outcome));
    this.queue.close();
    this.session.logger.info("Research session finished", {
      status: outcome.status,
      planIterations: outcome.metadata.planIterations,
      stepsExecuted: outcome.metadata.stepsExecuted,
    });
    return outcome;
  }

  private buildOutcome(state: TerminalState): ResearchOutcome {
    const { session } = this;
    const finishedAt = this.now();
    const plan = session.plan ? snapshotPlan(session.plan) : null;
    const base = {
      researchId: session.researchId,
      query: session.originalQuery,
      clarifiedQuery: session.clarifiedQuery,
      plan,
      observations: session.observations.list(),
      resources: session.resources.list(),
      locale: session.locale,
      metadata: session.metadata(finishedAt),
    };

    switch (state.stage) {
      case "done": {
        const report = session.finalReport;
        if (!plan || report === null) {
          throw new Error("Session reached done without a plan and report");
        }
        return { ...base, status: "done", plan, finalReport: report };
      }
      case "needs_clarification":
        return { ...base, status: "needs_clarification", question: state.question };
      case "awaiting_plan_approval": {
        if (!plan) {
          throw new Error("Session awaits approval without a plan");
        }
        return {
          ...base,
          status: "awaiting_plan_approval",
          plan,
          checkpoint: session.toCheckpoint(finishedAt),
        };
      }
      case "failed":
        return { ...base, status: "failed", error: state.error };
      case "cancelled":
        return { ...base, status: "cancelled", reason: state.reason };
    }
  }
}

function terminalMessage(outcome: ResearchOutcome): string {
  switch (outcome.status) {
    case "done":
      return "Research complete";
    case "needs_clarification":
      return `Clarification needed: ${outcome.question}`;
    case "awaiting_plan_approval":
      return "Plan ready for review";
    case "failed":
      return `Research failed during ${outcome.error.stage}: ${outcome.error.message}`;
    case "cancelled":
      return `Research cancelled: ${outcome.reason}`;
  }
}
