import { DocsSearchResponse, SearchDocsParams, searchDocs } from "../data/docs";
import { Query, SourceResult } from "../routing/types";
import { isWithinDays, termOverlap } from "./scoring";
import { InformationSource, SourceQueryOptions } from "./types";

export type DocsSearchFn = (params: SearchDocsParams) => Promise<DocsSearchResponse>;

export interface DocsSearchSourceOptions {
  baseUrl: string;
  locale: string;
  top?: number;
  search?: DocsSearchFn;
  now?: () => Date;
}

/**
 * Official documentation. Base confidence comes from how well the top hit
 * covers the query and how many hits came back; articles updated within the
 * last year add up to 10 points.
 */
export function docsConfidence(queryText: string, response: DocsSearchResponse, now: Date): number {
  const [top] = response.results;
  if (!top) {
    return 0;
  }
  const overlap = termOverlap(queryText, `${top.title} ${top.description}`);
  const base = 40 + 40 * overlap + 5 * Math.min(response.results.length, 4);
  const recent = response.results.filter((result) => isWithinDays(result.lastUpdatedDate, now, 365)).length;
  const recencyBonus = Math.min(recent / 3, 1) * 10;
  return Math.min(100, Math.round(base + recencyBonus));
}

export class DocsSearchSource implements InformationSource {
  readonly name = "ms_docs";

  private readonly search: DocsSearchFn;

  private readonly now: () => Date;

  constructor(private readonly options: DocsSearchSourceOptions) {
    this.search = options.search ?? searchDocs;
    this.now = options.now ?? (() => new Date());
  }

  async query(query: Query, options: SourceQueryOptions): Promise<SourceResult> {
    const startedAt = Date.now();
    const response = await this.search({
      baseUrl: this.options.baseUrl,
      query: query.text,
      locale: this.options.locale,
      top: this.options.top,
      signal: options.signal,
      timeoutMs: options.timeoutMs
    });

    const [top] = response.results;
    if (!top) {
      return {
        source: this.name,
        confidence: 0,
        answer: "",
        metadata: { latencyMs: Date.now() - startedAt, resultsFound: 0 },
        reasoning: "Documentation search returned no articles."
      };
    }

    return {
      source: this.name,
      confidence: docsConfidence(query.text, response, this.now()),
      answer: top.description ? `${top.description} (${top.url})` : `${top.title} (${top.url})`,
      metadata: {
        latencyMs: Date.now() - startedAt,
        resultsFound: response.count ?? response.results.length,
        publishedAt: top.lastUpdatedDate,
        details: { urls: response.results.map((result) => result.url) }
      },
      reasoning: `Top documentation article: "${top.title}".`
    };
  }

  canHandle(_query: Query): boolean {
    return true;
  }

  averageLatencyMs(): number {
    return 1500;
  }

  cost(): number {
    return 0;
  }
}
