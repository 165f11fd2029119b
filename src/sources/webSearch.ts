import { OrganicResult, searchSerpApi } from "../data/serp";
import { Query, SourceResult } from "../routing/types";
import { termOverlap } from "./scoring";
import { InformationSource, SourceQueryOptions } from "./types";

export const WEB_CONFIDENCE_CAP = 80;

export type WebSearchFn = (params: {
  apiKey: string;
  query: string;
  numResults?: number;
  signal: AbortSignal;
  timeoutMs: number;
}) => Promise<OrganicResult[]>;

export function webConfidence(queryText: string, results: OrganicResult[]): number {
  const [top] = results;
  if (!top) {
    return 0;
  }
  const overlap = termOverlap(queryText, `${top.title} ${top.snippet}`);
  return Math.min(WEB_CONFIDENCE_CAP, Math.round(30 + 40 * overlap + 2 * Math.min(results.length, 5)));
}

export class WebSearchSource implements InformationSource {
  readonly name = "web";

  private readonly search: WebSearchFn;

  constructor(
    private readonly apiKey: string | undefined,
    search?: WebSearchFn
  ) {
    this.search = search ?? searchSerpApi;
  }

  async query(query: Query, options: SourceQueryOptions): Promise<SourceResult> {
    if (!this.apiKey) {
      throw new Error("SERPAPI_KEY is not configured");
    }
    const startedAt = Date.now();
    const results = await this.search({
      apiKey: this.apiKey,
      query: query.text,
      numResults: 10,
      signal: options.signal,
      timeoutMs: options.timeoutMs
    });

    const [top] = results;
    if (!top) {
      return {
        source: this.name,
        confidence: 0,
        answer: "",
        metadata: { latencyMs: Date.now() - startedAt, resultsFound: 0 },
        reasoning: "Web search returned no results."
      };
    }

    return {
      source: this.name,
      confidence: webConfidence(query.text, results),
      answer: top.snippet ? `${top.snippet} (${top.link})` : `${top.title} (${top.link})`,
      metadata: {
        latencyMs: Date.now() - startedAt,
        resultsFound: results.length,
        publishedAt: top.date,
        details: { links: results.slice(0, 3).map((result) => result.link) }
      },
      reasoning: `Compiled from ${results.length} web results; top hit "${top.title}".`
    };
  }

  canHandle(_query: Query): boolean {
    return this.apiKey !== undefined;
  }

  averageLatencyMs(): number {
    return 3000;
  }

  cost(): number {
    return 0.005;
  }
}
