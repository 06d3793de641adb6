/**
 * Offline collaborators with canned behavior.
 *
 * Used by the demo script, by `research --offline`, and by tests that need a
 * full pipeline without a model or network. Output depends only on the
 * inputs, so runs are reproducible.
 */

import { setTimeout as sleep } from "node:timers/promises";

import type { Collaborators } from "../orchestrator/types.js";
import type { PlanDraft } from "../research/plan.js";
import { TemplateReporter } from "../report/reporter.js";
import { AgentStepExecutor, type StepAgent } from "./step-executor.js";

export interface ScriptedOptions {
  /**
   * Queries with fewer words than this get a clarification question unless
   * earlier answers are supplied.
   */
  minQueryWords?: number;
  /** Artificial latency per collaborator call. */
  delayMs?: number;
  /** Directory of report templates (defaults to the bundled ones). */
  reportTemplateDir?: string;
}

export const SCRIPTED_CLARIFICATION_QUESTION =
  "Could you narrow the topic down (time frame, region or audience)?";

async function pause(delayMs: number, signal: AbortSignal): Promise<void> {
  if (delayMs > 0) {
    await sleep(delayMs, undefined, { signal });
  }
}

export function scriptedPlan(query: string, maxStepNum: number): PlanDraft {
  const steps = [
    {
      title: "Survey current sources",
      description: `Collect recent, citable material on: ${query}`,
      stepType: "research" as const,
      needSearch: true,
    },
    {
      title: "Extract key facts",
      description: "List the facts and figures the sources agree on.",
      stepType: "research" as const,
      needSearch: false,
    },
    {
      title: "Compare figures",
      description: "Tabulate the figures collected so far and note disagreements.",
      stepType: "processing" as const,
      needSearch: false,
    },
  ];

  return {
    title: `Research plan: ${query}`,
    thought: "Gather sources first, then distill and compare what they report.",
    hasEnoughContext: true,
    steps: steps.slice(0, maxStepNum),
  };
}

export function createScriptedCollaborators(options: ScriptedOptions = {}): Collaborators {
  const minQueryWords = options.minQueryWords ?? 2;
  const delayMs = options.delayMs ?? 0;

  const researcher: StepAgent = {
    async run({ step, context, webSearch }) {
      await pause(delayMs, context.signal);
      const resources = webSearch
        ? [
            {
              url: `https://example.org/search?q=${encodeURIComponent(step.title)}`,
              title: `Results for ${step.title}`,
            },
          ]
        : [];
      const source = webSearch ? "web sources" : "prior findings";
      return {
        summary: `${step.title}: summarized ${source} for "${context.query}".`,
        resources,
      };
    },
  };

  const processor: StepAgent = {
    async run({ step, context }) {
      await pause(delayMs, context.signal);
      return {
        summary: `${step.title}: processed ${context.observations.length} observation(s).`,
        resources: [],
      };
    },
  };

  return {
    clarifier: {
      async clarify(query, _config, context) {
        await pause(delayMs, context.signal);
        if (context.clarifications.length > 0) {
          const answers = context.clarifications.map((c) => c.answer).join("; ");
          return { kind: "proceed", clarifiedQuery: `${query} (${answers})` };
        }
        if (query.split(/\s+/).length < minQueryWords) {
          return { kind: "need_more_input", question: SCRIPTED_CLARIFICATION_QUESTION };
        }
        return { kind: "proceed", clarifiedQuery: query };
      },
    },
    backgroundInvestigator: {
      async investigate(query, _config, context) {
        await pause(delayMs, context.signal);
        return [`Background: "${query}" is an active topic with several recent overviews.`];
      },
    },
    planner: {
      async plan(query, _observations, locale, _iteration, context) {
        await pause(delayMs, context.signal);
        return { ...scriptedPlan(query, context.maxStepNum), locale };
      },
    },
    stepExecutor: new AgentStepExecutor({ researcher, processor }),
    reporter: new TemplateReporter(options.reportTemplateDir),
  };
}
