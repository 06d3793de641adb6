/**
 * Typed template context.
 *
 * Defines the strongly-typed context object that templates are rendered against.
 * Every valid `{{path.to.value}}` placeholder in a template maps to a key in
 * TemplateContextMap. Values are always strings.
 *
 * The context is a flat namespace of dotted paths backed by the session's
 * domain objects. Templates only see this curated surface:
 *
 *   research.query         → clarified query
 *   plan.steps             → numbered step list with type and status
 *   findings.observations  → every observation, with origin headings
 *   report.style           → normalized report style
 *
 * Adding a new variable requires three changes:
 *   1. Add the key to TemplateContextMap
 *   2. Register it in template.ts
 *   3. Populate it in buildTemplateContext()
 */

import type { Plan, Step } from "../research/plan.js";
import { describeOrigin, type Observation } from "../research/observations.js";
import type { Resource } from "../research/resources.js";
import { formatClarifications, type Clarification } from "../research/clarifications.js";

// ---------------------------------------------------------------------------
// Context map
// ---------------------------------------------------------------------------

export interface TemplateContextMap {
  // ── Research session ──────────────────────────────────────
  "research.query": string;
  "research.locale": string;
  "research.clarifications": string;
  "research.maxStepNum": string;
  "research.iteration": string;

  // ── Plan ──────────────────────────────────────────────────
  "plan.title": string;
  "plan.thought": string;
  "plan.steps": string;
  "plan.stepCount": string;

  // ── Current step ──────────────────────────────────────────
  "step.index": string;
  "step.title": string;
  "step.description": string;
  "step.type": string;
  "step.needSearch": string;

  // ── Accumulated findings ──────────────────────────────────
  "findings.observations": string;
  "findings.observationCount": string;
  "findings.resources": string;
  "findings.resourceCount": string;

  // ── Report ────────────────────────────────────────────────
  "report.style": string;
}

/** A legal template variable name. */
export type TemplateVariable = keyof TemplateContextMap;

/** The concrete context object passed to the renderer. */
export type TemplateContext = Readonly<TemplateContextMap>;

// ---------------------------------------------------------------------------
// Builder input
// ---------------------------------------------------------------------------

/**
 * Input for building a template context.
 *
 * `research.query` and `research.locale` are always required. Every other
 * group is optional; variables whose source is missing get the UNSET
 * sentinel so the renderer can reject templates that reference them.
 */
export interface TemplateContextInput {
  research: {
    query: string;
    locale: string;
    clarifications?: readonly Clarification[];
    maxStepNum?: number;
    /** 1-based planner iteration */
    iteration?: number;
  };
  plan?: Plan;
  step?: {
    /** 0-based position in the plan */
    index: number;
    step: Pick<Step, "title" | "description" | "stepType" | "needSearch">;
  };
  findings?: {
    observations: readonly Observation[];
    resources?: readonly Resource[];
  };
  reportStyle?: string;
}

/** Sentinel for variables whose source was not provided. */
const UNSET = "__UNSET__";

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

export function formatPlanSteps(plan: Plan): string {
  return plan.steps
    .map((step, i) => {
      const head = `${i + 1}. ${step.title} [${step.stepType}, ${step.status}]`;
      return step.description ? `${head}\n   ${step.description}` : head;
    })
    .join("\n");
}

export function formatObservations(observations: readonly Observation[]): string {
  return observations
    .map((o) => `### ${o.sequence}. ${describeOrigin(o.origin)}\n\n${o.content}`)
    .join("\n\n");
}

export function formatResources(resources: readonly Resource[]): string {
  return resources.map((r) => `- [${r.title}](${r.url})`).join("\n");
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Build a fully-populated template context from session state.
 */
export function buildTemplateContext(input: TemplateContextInput): TemplateContext {
  const { research, plan, step, findings, reportStyle } = input;

  const ctx: TemplateContextMap = {
    "research.query": research.query,
    "research.locale": research.locale,
    "research.clarifications": research.clarifications
      ? formatClarifications(research.clarifications)
      : UNSET,
    "research.maxStepNum":
      research.maxStepNum !== undefined ? String(research.maxStepNum) : UNSET,
    "research.iteration":
      research.iteration !== undefined ? String(research.iteration) : UNSET,

    "plan.title": plan?.title ?? UNSET,
    "plan.thought": plan?.thought ?? UNSET,
    "plan.steps": plan ? formatPlanSteps(plan) : UNSET,
    "plan.stepCount": plan ? String(plan.steps.length) : UNSET,

    "step.index": step ? String(step.index + 1) : UNSET,
    "step.title": step?.step.title ?? UNSET,
    "step.description": step?.step.description ?? UNSET,
    "step.type": step?.step.stepType ?? UNSET,
    "step.needSearch": step ? String(step.step.needSearch) : UNSET,

    "findings.observations": findings ? formatObservations(findings.observations) : UNSET,
    "findings.observationCount": findings ? String(findings.observations.length) : UNSET,
    "findings.resources": findings?.resources ? formatResources(findings.resources) : UNSET,
    "findings.resourceCount": findings?.resources
      ? String(findings.resources.length)
      : UNSET,

    "report.style": reportStyle ?? UNSET,
  };

  return Object.freeze(ctx);
}

/**
 * Check whether a context value is the UNSET sentinel.
 */
export function isUnset(value: string): boolean {
  return value === UNSET;
}
