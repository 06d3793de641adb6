/**
 * Mutable working state of one research session.
 *
 * Owned by a single runner; nothing here is shared between sessions.
 * Consumers only ever see frozen snapshots taken from it.
 */

import type { ResearchConfig } from "../config/research/index.js";
import { deepFreeze } from "../config/research/loader.js";
import type { Logger } from "../logging/logger.js";
import type { Clarification } from "../research/clarifications.js";
import { ObservationStore } from "../research/observations.js";
import { restorePlan, type Plan } from "../research/plan.js";
import { ResourceSet } from "../research/resources.js";
import { CHECKPOINT_VERSION, type SessionCheckpoint } from "./checkpoint.js";
import type { ResearchMetadata } from "./types.js";

export interface SessionInit {
  researchId: string;
  originalQuery: string;
  config: Readonly<ResearchConfig>;
  clarifications: readonly Clarification[];
  logger: Logger;
  startedAt: Date;
}

export class ResearchSession {
  readonly researchId: string;
  readonly originalQuery: string;
  readonly config: Readonly<ResearchConfig>;
  readonly clarifications: readonly Clarification[];
  readonly logger: Logger;
  readonly startedAt: Date;
  readonly observations = new ObservationStore();
  readonly resources = new ResourceSet();

  clarifiedQuery: string;
  locale: string;
  plan: Plan | null = null;
  planIterationCount = 0;
  /** Steps finalized across every plan of the session. */
  stepsExecuted = 0;
  /** Steps finalized under the current plan. */
  stepsExecutedThisPlan = 0;
  finalReport: string | null = null;

  constructor(init: SessionInit) {
    this.researchId = init.researchId;
    this.originalQuery = init.originalQuery;
    this.clarifiedQuery = init.originalQuery;
    this.config = init.config;
    this.locale = init.config.locale;
    this.clarifications = init.clarifications;
    this.logger = init.logger;
    this.startedAt = init.startedAt;
  }

  /**
   * Rebuild a session paused for plan review.
   */
  static fromCheckpoint(
    checkpoint: Readonly<SessionCheckpoint>,
    logger: Logger,
    startedAt: Date
  ): ResearchSession {
    const session = new ResearchSession({
      researchId: checkpoint.researchId,
      originalQuery: checkpoint.originalQuery,
      config: deepFreeze({ ...checkpoint.config }),
      clarifications: checkpoint.clarifications.map((c) => ({ ...c })),
      logger,
      startedAt,
    });
    session.clarifiedQuery = checkpoint.clarifiedQuery;
    session.locale = checkpoint.locale;
    session.plan = restorePlan(checkpoint.plan);
    session.planIterationCount = checkpoint.planIterationCount;
    session.stepsExecuted = checkpoint.stepsExecuted;
    for (const observation of checkpoint.observations) {
      session.observations.append(observation.content, observation.origin);
    }
    session.resources.addAll(checkpoint.resources);
    return session;
  }

  /**
   * Make `plan` the current plan. A planner-produced plan counts as a
   * planning iteration; a reviewer's edit replaces the plan in place.
   */
  adoptPlan(plan: Plan, countsAsIteration: boolean): void {
    this.plan = plan;
    this.locale = plan.locale;
    this.stepsExecutedThisPlan = 0;
    if (countsAsIteration) {
      this.planIterationCount++;
    }
  }

  recordStepFinished(): void {
    this.stepsExecuted++;
    this.stepsExecutedThisPlan++;
  }

  /**
   * @throws Error when there is no current plan to review
   */
  toCheckpoint(createdAt: Date): SessionCheckpoint {
    const plan = this.plan;
    if (!plan) {
      throw new Error("Cannot checkpoint a session without a plan");
    }

    return {
      checkpointVersion: CHECKPOINT_VERSION,
      researchId: this.researchId,
      createdAt: createdAt.toISOString(),
      originalQuery: this.originalQuery,
      clarifiedQuery: this.clarifiedQuery,
      locale: this.locale,
      clarifications: this.clarifications.map((c) => ({ ...c })),
      config: { ...this.config },
      plan: {
        title: plan.title,
        thought: plan.thought,
        hasEnoughContext: plan.hasEnoughContext,
        locale: plan.locale,
        steps: plan.steps.map((step) => ({ ...step })),
      },
      planIterationCount: this.planIterationCount,
      stepsExecuted: this.stepsExecuted,
      observations: this.observations.list().map((o) => ({
        sequence: o.sequence,
        content: o.content,
        origin: { ...o.origin },
      })),
      resources: this.resources.list().map((r) => ({ url: r.url, title: r.title })),
    };
  }

  metadata(finishedAt: Date): ResearchMetadata {
    return {
      maxStepNum: this.config.maxStepNum,
      maxPlanIterations: this.config.maxPlanIterations,
      enableClarification: this.config.enableClarification,
      enableBackgroundInvestigation: this.config.enableBackgroundInvestigation,
      autoAcceptPlan: this.config.autoAcceptPlan,
      reportStyle: this.config.reportStyle,
      planIterations: this.planIterationCount,
      stepsExecuted: this.stepsExecuted,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(0, finishedAt.getTime() - this.startedAt.getTime()),
    };
  }
}
