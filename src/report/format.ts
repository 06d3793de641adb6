/**
 * Plain Markdown rendering of a research outcome for terminals and
 * chat-style clients.
 *
 * `detailed` adds the plan, each step result (truncated), the numbered
 * observations and the source list around the final report.
 */

import type { ResearchOutcome } from "../orchestrator/types.js";

export interface FormatOptions {
  /** Include plan, observations and sources (default true). */
  detailed?: boolean;
}

/** Code points of a step result shown in the detailed plan listing. */
export const STEP_RESULT_PREVIEW_LENGTH = 200;

function preview(text: string): string {
  const chars = Array.from(text);
  return chars.length > STEP_RESULT_PREVIEW_LENGTH
    ? `${chars.slice(0, STEP_RESULT_PREVIEW_LENGTH).join("")}...`
    : text;
}

function bodyFor(outcome: ResearchOutcome): string {
  switch (outcome.status) {
    case "done":
      return outcome.finalReport.trim();
    case "needs_clarification":
      return `More information is needed: ${outcome.question}`;
    case "awaiting_plan_approval":
      return "The plan is waiting for review. Resume the session to execute it.";
    case "failed":
      return `Research failed during ${outcome.error.stage} (${outcome.error.kind}): ${outcome.error.message}`;
    case "cancelled":
      return `Research was cancelled: ${outcome.reason}`;
  }
}

export function formatResearchResponse(
  outcome: ResearchOutcome,
  options: FormatOptions = {}
): string {
  const { detailed = true } = options;
  const out: string[] = [];

  out.push("# Research Report", "");
  out.push(`**Query:** ${outcome.query}`);
  out.push(`**Research ID:** ${outcome.researchId}`);
  out.push(`**Status:** ${outcome.status}`);
  out.push("");

  const plan = outcome.plan;
  if (detailed && plan) {
    out.push("## Research Plan", "");
    out.push(`**Title:** ${plan.title}`);
    if (plan.thought) out.push(`**Thought:** ${plan.thought}`);
    out.push("");

    if (plan.steps.length > 0) {
      out.push("### Steps", "");
      plan.steps.forEach((step, i) => {
        out.push(`${i + 1}. **${step.title}**`);
        out.push(`   - Type: ${step.stepType}`);
        out.push(`   - Status: ${step.status}`);
        if (step.description) out.push(`   - Description: ${step.description}`);
        if (step.executionResult) out.push(`   - Result: ${preview(step.executionResult)}`);
      });
      out.push("");
    }
  }

  if (detailed && outcome.observations.length > 0) {
    out.push("## Key Observations", "");
    for (const observation of outcome.observations) {
      out.push(`${observation.sequence}. ${observation.content}`);
    }
    out.push("");
  }

  out.push(outcome.status === "done" ? "## Final Report" : "## Result", "");
  out.push(bodyFor(outcome));
  out.push("");

  if (detailed && outcome.resources.length > 0) {
    out.push("## Sources", "");
    outcome.resources.forEach((resource, i) => {
      out.push(`${i + 1}. [${resource.title}](${resource.url})`);
    });
    out.push("");
  }

  return out.join("\n");
}
