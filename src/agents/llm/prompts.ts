/**
 * Agent prompt rendering.
 *
 * Each agent role has a template under templates/prompts/. Prompts are
 * rendered in strict mode, so a template and the context built for its role
 * must agree on every variable.
 */

import type { Clarification } from "../../research/clarifications.js";
import type { Observation } from "../../research/observations.js";
import type { Plan, Step } from "../../research/plan.js";
import { buildTemplateContext, type TemplateContext } from "../../templates/context.js";
import { TemplateLoader } from "../../templates/loader.js";
import { PROMPT_TEMPLATES_DIR } from "../../templates/paths.js";
import { renderTemplate } from "../../templates/renderer.js";

export type AgentRole = "coordinator" | "planner" | "researcher" | "coder";

export interface StepPromptInput {
  query: string;
  locale: string;
  plan: Plan;
  stepIndex: number;
  step: Readonly<Step>;
  observations: readonly Observation[];
}

export class PromptRenderer {
  private readonly loader: TemplateLoader;

  constructor(templateDir: string = PROMPT_TEMPLATES_DIR) {
    this.loader = new TemplateLoader(templateDir);
  }

  coordinator(query: string, locale: string, clarifications: readonly Clarification[]): string {
    return this.render(
      "coordinator",
      buildTemplateContext({ research: { query, locale, clarifications } })
    );
  }

  planner(
    query: string,
    locale: string,
    maxStepNum: number,
    iteration: number,
    observations: readonly Observation[]
  ): string {
    return this.render(
      "planner",
      buildTemplateContext({
        research: { query, locale, maxStepNum, iteration },
        findings: { observations },
      })
    );
  }

  /** Prompt for a research (`researcher`) or processing (`coder`) step. */
  step(role: "researcher" | "coder", input: StepPromptInput): string {
    return this.render(
      role,
      buildTemplateContext({
        research: { query: input.query, locale: input.locale },
        plan: input.plan,
        step: { index: input.stepIndex, step: input.step },
        findings: { observations: input.observations },
      })
    );
  }

  private render(role: AgentRole, context: TemplateContext): string {
    return renderTemplate(this.loader.load(`${role}.md`), context).trim();
  }
}
