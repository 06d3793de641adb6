/**
 * Background investigation: one web search on the query before the first
 * plan. Each hit becomes its own finding.
 */

import type { ResearchConfig } from "../../config/research/index.js";
import type { BackgroundInvestigator, CallContext } from "../../orchestrator/types.js";
import { formatHits, type WebSearch } from "./search.js";

export class TavilyBackgroundInvestigator implements BackgroundInvestigator {
  constructor(
    private readonly web: WebSearch,
    private readonly maxResults = 3
  ) {}

  async investigate(
    query: string,
    _config: Readonly<ResearchConfig>,
    context: CallContext
  ): Promise<readonly string[]> {
    const response = await this.web.search(query, this.maxResults);
    context.logger.debug("Background search returned", { hits: response.hits.length });

    const findings = response.hits.map((hit) => formatHits([hit]));
    if (response.answer) {
      findings.unshift(`Search summary: ${response.answer}`);
    }
    return findings;
  }
}
