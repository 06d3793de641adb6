/**
 * Research orchestrator.
 *
 * Entry point for research sessions. Validates input synchronously, builds
 * the session, wires cancellation (caller, external signal, deadline) and
 * hands the session to a SessionRunner.
 *
 * USAGE:
 *
 *   const orchestrator = new ResearchOrchestrator({ collaborators });
 *   const run = orchestrator.startSession("How do heat pumps work?", { maxStepNum: 3 });
 *   for await (const event of run.events()) console.log(event.message);
 *   const outcome = await run.result;
 */

import { z } from "zod";

import {
  ResearchConfigError,
  resolveResearchConfig,
  validateQuery,
  type ConfigValidationIssue,
  type ResearchConfigInput,
  type ResearchDefaults,
} from "../config/research/index.js";
import { generateRunId } from "../logging/run-id.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { ClarificationSchema, type Clarification } from "../research/clarifications.js";
import { createPlan } from "../research/plan.js";
import { parseCheckpoint, type SessionCheckpoint } from "./checkpoint.js";
import { SessionCancelledError } from "./errors.js";
import { AsyncEventQueue } from "./event-queue.js";
import { SessionRunner, toCancellation } from "./runner.js";
import { ResearchSession } from "./session.js";
import { afterPlanApproval, initialState, type MachineState } from "./transitions.js";
import type {
  Collaborators,
  PlanDecision,
  ProgressEvent,
  ResearchOutcome,
  ResearchRun,
  SessionOptions,
} from "./types.js";

export interface OrchestratorOptions {
  collaborators: Collaborators;
  /** Process-wide fallbacks for per-session settings. */
  defaults?: ResearchDefaults;
  /** Parent logger; each session logs through a child tagged with its ID. */
  logger?: Logger;
  /** Clock, injectable for tests. */
  now?: () => Date;
  /** Research ID generator, injectable for tests. */
  generateId?: () => string;
}

export interface RunOptions extends SessionOptions {
  /** Called for every progress event, in order. */
  onEvent?: (event: ProgressEvent) => void;
}

const ClarificationListSchema = z.array(ClarificationSchema);

function parseClarifications(value: readonly Clarification[]): Clarification[] {
  const result = ClarificationListSchema.safeParse(value);
  if (!result.success) {
    const issues: ConfigValidationIssue[] = result.error.issues.map((issue) => ({
      path: [
        "clarifications",
        ...issue.path.filter(
          (p): p is string | number => typeof p === "string" || typeof p === "number"
        ),
      ],
      message: issue.message,
      code: issue.code,
    }));
    throw new ResearchConfigError("Invalid clarifications", issues);
  }
  return result.data;
}

export class ResearchOrchestrator {
  private readonly collaborators: Collaborators;
  private readonly defaults: ResearchDefaults;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: OrchestratorOptions) {
    this.collaborators = options.collaborators;
    this.defaults = options.defaults ?? {};
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? generateRunId;
  }

  /**
   * Start a research session.
   *
   * @throws ResearchConfigError for an empty query, invalid config or
   *         malformed clarifications (no session is created)
   */
  startSession(
    query: string,
    config: ResearchConfigInput = {},
    options: SessionOptions = {}
  ): ResearchRun {
    const originalQuery = validateQuery(query);
    const resolved = resolveResearchConfig(config, this.defaults);
    const clarifications = parseClarifications(options.clarifications ?? []);

    const researchId = this.generateId();
    const session = new ResearchSession({
      researchId,
      originalQuery,
      config: resolved,
      clarifications,
      logger: this.logger.child({ runId: researchId }),
      startedAt: this.now(),
    });
    session.logger.info("Research session started", {
      query: originalQuery,
      maxStepNum: resolved.maxStepNum,
      maxPlanIterations: resolved.maxPlanIterations,
    });

    const initial = initialState({
      clarify: resolved.enableClarification && this.collaborators.clarifier !== undefined,
      investigate:
        resolved.enableBackgroundInvestigation &&
        this.collaborators.backgroundInvestigator !== undefined,
    });
    return this.launch(session, initial, options.signal);
  }

  /**
   * Continue a session paused in `awaiting_plan_approval`. The run keeps
   * the checkpoint's research ID.
   *
   * @throws CheckpointError       if the checkpoint is invalid or incompatible
   * @throws PlanValidationError   if an edited plan is invalid
   */
  resumeSession(
    checkpoint: SessionCheckpoint,
    decision: PlanDecision,
    options: Pick<SessionOptions, "signal"> = {}
  ): ResearchRun {
    const restored = parseCheckpoint(checkpoint);
    const session = ResearchSession.fromCheckpoint(
      restored,
      this.logger.child({ runId: restored.researchId }),
      this.now()
    );

    if (decision.type === "edit") {
      session.adoptPlan(createPlan(decision.plan, session.locale), false);
    }
    session.logger.info("Research session resumed", { decision: decision.type });

    const plan = session.plan;
    const initial: MachineState = plan
      ? afterPlanApproval(plan)
      : { stage: "planning" };
    return this.launch(session, initial, options.signal);
  }

  /**
   * Start a session, drain its events and return the outcome.
   */
  async run(
    query: string,
    config: ResearchConfigInput = {},
    options: RunOptions = {}
  ): Promise<ResearchOutcome> {
    const { onEvent, ...sessionOptions } = options;
    const run = this.startSession(query, config, sessionOptions);
    for await (const event of run.events()) {
      onEvent?.(event);
    }
    return run.result;
  }

  private launch(
    session: ResearchSession,
    initial: MachineState,
    externalSignal?: AbortSignal
  ): ResearchRun {
    const controller = new AbortController();
    const queue = new AsyncEventQueue<ProgressEvent>();

    const cancel = (reason: string): void => {
      if (!controller.signal.aborted) {
        controller.abort(new SessionCancelledError(reason));
      }
    };

    const onExternalAbort = (): void => {
      cancel(toCancellation(externalSignal?.reason).reason);
    };
    if (externalSignal?.aborted) {
      onExternalAbort();
    } else {
      externalSignal?.addEventListener("abort", onExternalAbort, { once: true });
    }

    const timeoutMs = session.config.timeoutMs;
    const timer =
      timeoutMs !== undefined
        ? setTimeout(() => cancel(`timed out after ${timeoutMs} ms`), timeoutMs)
        : undefined;

    const runner = new SessionRunner(session, this.collaborators, controller.signal, queue, this.now);
    const result = runner.drive(initial).finally(() => {
      clearTimeout(timer);
      externalSignal?.removeEventListener("abort", onExternalAbort);
    });

    let eventsTaken = false;
    return {
      researchId: session.researchId,
      events: () => {
        if (eventsTaken) {
          throw new Error("events() can be called only once per research run");
        }
        eventsTaken = true;
        return queue;
      },
      result,
      cancel: (reason?: string) => cancel(reason ?? "cancelled by caller"),
    };
  }
}
