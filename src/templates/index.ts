/**
 * Template system.
 *
 * Typed, validated template loading and rendering for agent prompts and
 * reports. Templates use `{{variable}}` placeholders and `{{#if …}}…{{/if}}`
 * blocks validated against a context built from session state.
 *
 * ```typescript
 * const loader = new TemplateLoader(REPORT_TEMPLATES_DIR);
 * const template = loader.load("academic.md");
 * const context = buildTemplateContext({ research: { query, locale }, plan });
 * const text = renderTemplate(template, context);
 * ```
 */

export {
  buildTemplateContext,
  formatPlanSteps,
  formatObservations,
  formatResources,
  isUnset,
  type TemplateContext,
  type TemplateContextMap,
  type TemplateContextInput,
  type TemplateVariable,
} from "./context.js";

export {
  parseTemplate,
  extractVariables,
  isValidVariable,
  getValidVariables,
  TemplateParseError,
  type ParsedTemplate,
} from "./template.js";

export {
  renderTemplate,
  TemplateRenderError,
  UnusedVariableError,
  type RenderOptions,
} from "./renderer.js";

export { TemplateLoader, TemplateLoadError } from "./loader.js";

export {
  parseConditionalBlocks,
  evaluateCondition,
  resolveConditionals,
  getEnumValues,
  ConditionalParseError,
  type ConditionalBlock,
  type ConditionalOperator,
} from "./conditional.js";

export { TEMPLATES_ROOT, REPORT_TEMPLATES_DIR, PROMPT_TEMPLATES_DIR } from "./paths.js";
