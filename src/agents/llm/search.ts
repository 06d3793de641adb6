/**
 * Web search backed by Tavily.
 */

import { tavily } from "@tavily/core";

import type { Resource } from "../../research/resources.js";

export interface SearchHit {
  title: string;
  url: string;
  content: string;
}

export interface SearchResponse {
  /** Tavily's synthesized answer, when it returned one. */
  answer: string | null;
  hits: SearchHit[];
}

export interface WebSearch {
  search(query: string, maxResults: number): Promise<SearchResponse>;
}

export class TavilySearch implements WebSearch {
  private readonly client: ReturnType<typeof tavily>;

  constructor(apiKey: string) {
    this.client = tavily({ apiKey });
  }

  async search(query: string, maxResults: number): Promise<SearchResponse> {
    const response = await this.client.search(query, {
      searchDepth: "basic",
      maxResults,
      includeAnswer: true,
    });

    return {
      answer: response.answer ? response.answer : null,
      hits: response.results
        .filter((r) => r.url.trim() !== "")
        .map((r) => ({ title: r.title, url: r.url, content: r.content })),
    };
  }
}

export function hitsToResources(hits: readonly SearchHit[]): Resource[] {
  return hits.map((hit) => ({ url: hit.url, title: hit.title }));
}

/** Render hits as Markdown sections for a prompt or an observation. */
export function formatHits(hits: readonly SearchHit[]): string {
  return hits.map((hit) => `## ${hit.title}\n\n${hit.content}\n\nSource: ${hit.url}`).join("\n\n");
}
