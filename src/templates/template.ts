/**
 * Template parsing and variable extraction.
 *
 * A template is a plain-text string (loaded from a .md or .txt file)
 * containing `{{variable.path}}` placeholders and optional
 * `{{#if …}}…{{/if}}` conditional blocks. This module extracts those
 * constructs and validates them against TemplateContextMap so that invalid
 * variable references are caught before rendering.
 *
 *   {{research.query}}                      substitution
 *   {{#if research.clarifications}}…{{/if}} truthy block
 *   {{#if step.type == "processing"}}…{{/if}}
 *   {{#if report.style != "social"}}…{{/if}}
 *
 * Rules:
 *   - Whitespace inside braces is trimmed: {{ plan.title }} is valid
 *   - Unrecognized variable names are rejected at parse time
 *   - Duplicate placeholders are fine (same value rendered)
 *   - No nested conditionals
 */

import type { TemplateVariable } from "./context.js";
import { parseConditionalBlocks, type ConditionalBlock } from "./conditional.js";

/**
 * Matches `{{variable.name}}` with optional inner whitespace.
 * Captures the trimmed variable name in group 1.
 */
const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

export interface ParsedTemplate {
  /** The raw template source (placeholders intact). */
  source: string;
  /** Unique variable names found in {{…}} placeholders, sorted. */
  variables: TemplateVariable[];
  conditionals: ConditionalBlock[];
  /** Optional name/id for error messages. */
  name?: string;
}

export class TemplateParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly invalidVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" references unknown variable(s): ${invalidVariables.join(", ")}`
    );
    this.name = "TemplateParseError";
  }
}

// ---------------------------------------------------------------------------
// Variable registry
// ---------------------------------------------------------------------------

/**
 * Runtime registry of legal variable names. Typed as a record over
 * TemplateVariable so a key added to the context map must be added here.
 */
const VARIABLE_REGISTRY: Readonly<Record<TemplateVariable, true>> = {
  "research.query": true,
  "research.locale": true,
  "research.clarifications": true,
  "research.maxStepNum": true,
  "research.iteration": true,
  "plan.title": true,
  "plan.thought": true,
  "plan.steps": true,
  "plan.stepCount": true,
  "step.index": true,
  "step.title": true,
  "step.description": true,
  "step.type": true,
  "step.needSearch": true,
  "findings.observations": true,
  "findings.observationCount": true,
  "findings.resources": true,
  "findings.resourceCount": true,
  "report.style": true,
};

export function isValidVariable(name: string): name is TemplateVariable {
  return Object.hasOwn(VARIABLE_REGISTRY, name);
}

/** All valid variable names, sorted. */
export function getValidVariables(): TemplateVariable[] {
  return Object.keys(VARIABLE_REGISTRY).filter(isValidVariable).sort();
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Extract all `{{…}}` placeholder names from a template string.
 * Returns deduplicated, sorted names (conditional tags are not placeholders).
 */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  for (const match of source.matchAll(PLACEHOLDER_RE)) {
    const name = match[1];
    if (name !== undefined) found.add(name);
  }
  return [...found].sort();
}

/**
 * Parse a template string, validating its variables and conditionals.
 *
 * @throws TemplateParseError      if any {{variable}} name is invalid
 * @throws ConditionalParseError   if any conditional is invalid
 */
export function parseTemplate(source: string, name?: string): ParsedTemplate {
  const templateName = name ?? "(anonymous)";
  const conditionals = parseConditionalBlocks(source, templateName, isValidVariable);

  const rawVariables = extractVariables(source);
  const invalid = rawVariables.filter((v) => !isValidVariable(v));
  if (invalid.length > 0) {
    throw new TemplateParseError(templateName, invalid);
  }

  return {
    source,
    variables: rawVariables.filter(isValidVariable),
    conditionals,
    name,
  };
}
