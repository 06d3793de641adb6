/**
 * Report rendering.
 */

export { TemplateReporter, normalizeReportStyle, DEFAULT_REPORT_STYLE } from "./reporter.js";
export { formatResearchResponse, STEP_RESULT_PREVIEW_LENGTH, type FormatOptions } from "./format.js";
