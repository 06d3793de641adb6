/**
 * Conditional block parsing, validation, and evaluation.
 *
 * Supported forms:
 *
 *   {{#if findings.resources}}              truthy: non-empty and set
 *   {{#if step.type == "processing"}}       equality with a literal
 *   {{#if report.style != "social"}}        inequality with a literal
 *
 * Constraints:
 *   - No nesting and no `{{#else}}` (use a second block with `!=`)
 *   - Variable names validated at parse time
 *   - Literals validated at parse time for variables with a known value set
 *   - UNSET is false for truthy, never equal, always unequal
 */

import type { TemplateVariable } from "./context.js";
import { isUnset } from "./context.js";
import { ReportStyle, StepType } from "../config/research/enums.js";

export type ConditionalOperator = "==" | "!=" | "truthy";

export interface ConditionalBlock {
  variable: TemplateVariable;
  operator: ConditionalOperator;
  /** Literal for == / != (undefined for truthy). */
  value?: string;
  /** Body text, may contain {{var}} placeholders. */
  body: string;
  /** Full block text including tags. */
  raw: string;
}

export class ConditionalParseError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly issues: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" has invalid conditional(s):\n  - ${issues.join("\n  - ")}`
    );
    this.name = "ConditionalParseError";
  }
}

// ---------------------------------------------------------------------------
// Enum validation map
// ---------------------------------------------------------------------------

const ENUM_VALUES: Partial<Record<TemplateVariable, ReadonlySet<string>>> = {
  "step.type": new Set<string>(StepType.options),
  "step.needSearch": new Set(["true", "false"]),
  "report.style": new Set<string>(ReportStyle.options),
};

export function getEnumValues(variable: TemplateVariable): ReadonlySet<string> | undefined {
  return ENUM_VALUES[variable];
}

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/**
 * Groups: 1 variable, 2 operator (optional), 3 literal (optional), 4 body.
 */
const CONDITIONAL_RE =
  /\{\{#if\s+([a-zA-Z][a-zA-Z0-9_.]*)\s*(?:(==|!=)\s*"([^"]*)")?\s*\}\}([\s\S]*?)\{\{\/if\}\}/g;

const NESTED_IF_RE = /\{\{#if\s/;

function toOperator(op: string | undefined): ConditionalOperator {
  return op === "==" || op === "!=" ? op : "truthy";
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Extract all conditional blocks from a template source string.
 *
 * @throws ConditionalParseError if blocks reference invalid variables or values
 */
export function parseConditionalBlocks(
  source: string,
  templateName: string,
  isValidVar: (name: string) => name is TemplateVariable
): ConditionalBlock[] {
  const blocks: ConditionalBlock[] = [];
  const issues: string[] = [];

  for (const match of source.matchAll(CONDITIONAL_RE)) {
    const [raw, variable = "", operator, value, body = ""] = match;

    if (!isValidVar(variable)) {
      issues.push(`Unknown variable "${variable}" in conditional`);
      continue;
    }

    if (NESTED_IF_RE.test(body)) {
      issues.push(
        `Nested conditionals are not supported (found {{#if inside {{#if ${variable}…}})`
      );
      continue;
    }

    const op = toOperator(operator);
    if (op !== "truthy" && value !== undefined) {
      const enumSet = ENUM_VALUES[variable];
      if (enumSet && !enumSet.has(value)) {
        const allowed = [...enumSet].sort().join(", ");
        issues.push(`Invalid value "${value}" for "${variable}" (allowed: ${allowed})`);
        continue;
      }
    }

    blocks.push({
      variable,
      operator: op,
      value: op !== "truthy" ? value : undefined,
      body,
      raw,
    });
  }

  const openTags = source.match(/\{\{#if\s/g) ?? [];
  const closeTags = source.match(/\{\{\/if\}\}/g) ?? [];
  if (openTags.length !== closeTags.length) {
    issues.push(
      `Mismatched conditional tags: ${openTags.length} opening {{#if}}, ${closeTags.length} closing {{/if}}`
    );
  }

  if (issues.length > 0) {
    throw new ConditionalParseError(templateName, issues);
  }

  return blocks;
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

export function evaluateCondition(
  block: Pick<ConditionalBlock, "operator" | "value">,
  contextValue: string
): boolean {
  const unset = isUnset(contextValue);

  switch (block.operator) {
    case "truthy":
      return !unset && contextValue !== "";
    case "==":
      return !unset && contextValue === block.value;
    case "!=":
      return unset || contextValue !== block.value;
  }
}

/**
 * Replace every conditional block with its body (condition true) or
 * nothing (condition false).
 */
export function resolveConditionals(
  source: string,
  lookup: (variable: string) => string | undefined
): string {
  return source.replace(
    CONDITIONAL_RE,
    (_raw: string, variable: string, op: string | undefined, value: string | undefined, body: string) => {
      const contextValue = lookup(variable) ?? "";
      return evaluateCondition({ operator: toOperator(op), value }, contextValue) ? body : "";
    }
  );
}
