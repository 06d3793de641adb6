/**
 * Template-driven report rendering.
 *
 * One Markdown template per report style under templates/reports/. The
 * output depends only on the arguments, so equal inputs give equal reports.
 */

import { ReportStyle } from "../config/research/enums.js";
import type { Observation } from "../research/observations.js";
import type { Plan } from "../research/plan.js";
import type { Resource } from "../research/resources.js";
import { buildTemplateContext } from "../templates/context.js";
import { TemplateLoader } from "../templates/loader.js";
import { REPORT_TEMPLATES_DIR } from "../templates/paths.js";
import { renderTemplate } from "../templates/renderer.js";
import type { Reporter } from "../orchestrator/types.js";

export const DEFAULT_REPORT_STYLE: ReportStyle = "academic";

/**
 * Map any style name to a supported style (case-insensitive); anything
 * unknown becomes academic.
 */
export function normalizeReportStyle(style: string): ReportStyle {
  const parsed = ReportStyle.safeParse(style.trim().toLowerCase());
  return parsed.success ? parsed.data : DEFAULT_REPORT_STYLE;
}

export class TemplateReporter implements Reporter {
  private readonly loader: TemplateLoader;

  /**
   * @param templateDir - Directory holding `<style>.md` templates
   */
  constructor(templateDir: string = REPORT_TEMPLATES_DIR) {
    this.loader = new TemplateLoader(templateDir);
  }

  render(
    query: string,
    plan: Plan,
    observations: readonly Observation[],
    resources: readonly Resource[],
    style: string
  ): string {
    const reportStyle = normalizeReportStyle(style);
    const template = this.loader.load(`${reportStyle}.md`);
    const context = buildTemplateContext({
      research: { query, locale: plan.locale },
      plan,
      findings: { observations, resources },
      reportStyle,
    });
    return renderTemplate(template, context).trim() + "\n";
  }
}
