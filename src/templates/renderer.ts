/**
 * Template renderer.
 *
 * Takes a ParsedTemplate and a TemplateContext and produces the final text.
 *
 * Processing pipeline:
 *
 *   1. Conditional blocks are resolved first.
 *   2. Every remaining {{variable}} in the resolved text MUST exist in the
 *      context with a real value (not the UNSET sentinel).
 *   3. In strict mode (default), every set variable in the context must be
 *      used, either as a placeholder in the resolved text or as a
 *      conditional test variable.
 *   4. Placeholders are substituted.
 *
 * Substitution is single-pass: a value that itself contains `{{…}}` is
 * emitted verbatim, never re-expanded.
 */

import type { ParsedTemplate } from "./template.js";
import { extractVariables, isValidVariable } from "./template.js";
import type { TemplateContext } from "./context.js";
import { isUnset } from "./context.js";
import { resolveConditionals } from "./conditional.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateRenderError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly missingVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Cannot render template "${templateName}": context is missing ` +
          `value(s) for: ${missingVariables.join(", ")}`
    );
    this.name = "TemplateRenderError";
  }
}

export class UnusedVariableError extends Error {
  constructor(
    public readonly templateName: string,
    public readonly unusedVariables: string[],
    message?: string
  ) {
    super(
      message ??
        `Template "${templateName}" does not use context variable(s): ${unusedVariables.join(", ")}. ` +
          `Pass { strict: false } to allow unused variables.`
    );
    this.name = "UnusedVariableError";
  }
}

export interface RenderOptions {
  /**
   * When true (default), rendering fails if the context carries set
   * variables the template never references.
   */
  strict?: boolean;
}

/** Matches `{{variable}}` with optional inner whitespace. */
const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

function lookup(context: TemplateContext, name: string): string | undefined {
  return isValidVariable(name) ? context[name] : undefined;
}

/**
 * Render a parsed template against a typed context.
 *
 * @throws TemplateRenderError if any remaining variable is missing or UNSET
 * @throws UnusedVariableError if strict mode is on and context has unused vars
 */
export function renderTemplate(
  template: ParsedTemplate,
  context: TemplateContext,
  options: RenderOptions = {}
): string {
  const { strict = true } = options;
  const templateName = template.name ?? "(anonymous)";

  // 1. Conditionals
  const resolvedSource =
    template.conditionals.length > 0
      ? resolveConditionals(template.source, (name) => lookup(context, name))
      : template.source;

  // 2. Missing / UNSET
  const resolvedVarNames = extractVariables(resolvedSource);
  const missing = resolvedVarNames.filter((name) => {
    const value = lookup(context, name);
    return value === undefined || isUnset(value);
  });
  if (missing.length > 0) {
    throw new TemplateRenderError(templateName, missing);
  }

  // 3. Unused (strict)
  if (strict) {
    const used = new Set<string>(resolvedVarNames);
    for (const cond of template.conditionals) {
      used.add(cond.variable);
    }
    const unused = Object.keys(context)
      .filter(isValidVariable)
      .filter((key) => !used.has(key) && !isUnset(context[key]));
    if (unused.length > 0) {
      throw new UnusedVariableError(templateName, unused);
    }
  }

  // 4. Substitution
  return resolvedSource.replace(
    PLACEHOLDER_RE,
    (_match: string, name: string) => lookup(context, name) ?? ""
  );
}
