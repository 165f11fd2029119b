import { END, START, StateGraph } from "@langchain/langgraph";
import { RoutingConfig } from "../config/routing";
import { RoutingDeadlineError, describeError } from "../errors";
import { logDebug, logInfo, logWarning } from "../logger";
import { SourceLookup } from "../sources/types";
import { aggregateResults } from "./aggregator";
import { ResponseCache } from "./cache";
import { ClassifierTable, DEFAULT_CLASSIFIER_TABLE, classifyQuery } from "./classifier";
import { untilAborted } from "./invoke";
import { MetricsStore } from "./metrics";
import { normalizeResults } from "./normalization";
import { selectStrategy } from "./selector";
import { SimilarityFn } from "./similarity";
import { RouteGraphState, RouteGraphUpdate, RouteState } from "./state";
import { StrategySet } from "./strategies";
import { RouteResponse } from "./types";

export interface RouteGraphDeps {
  cache: ResponseCache;
  metrics: MetricsStore;
  sources: SourceLookup;
  strategiesFor: (config: RoutingConfig) => StrategySet;
  classifierTable?: ClassifierTable;
  similarity?: SimilarityFn;
  now?: () => Date;
}

function hitDeadline(signal: AbortSignal): boolean {
  return signal.aborted && signal.reason instanceof RoutingDeadlineError;
}

function markPartial(response: RouteResponse, timeoutMs: number): RouteResponse {
  const notice = `Routing stopped at the ${timeoutMs}ms limit; the answer uses only the sources that responded in time.`;
  return {
    ...response,
    partial: true,
    warning: response.warning ? `${response.warning} ${notice}` : notice
  };
}

export function buildRoutingGraph(deps: RouteGraphDeps) {
  const table = deps.classifierTable ?? DEFAULT_CLASSIFIER_TABLE;
  const now = deps.now ?? (() => new Date());

  const lookupCache = async (state: RouteGraphState): Promise<RouteGraphUpdate> => {
    const { config } = state.snapshot;
    const cacheSalt = config.cache.saltWithSources ? deps.sources.names() : undefined;
    if (!config.cache.enabled || state.bypassCache) {
      logDebug("Cache lookup skipped", { requestId: state.requestId, bypassCache: state.bypassCache });
      return { cacheSalt };
    }

    try {
      const cached = await untilAborted(deps.cache.get(state.query, cacheSalt), state.signal);
      if (cached) {
        deps.metrics.recordCacheHit();
        logInfo("Cache hit", { requestId: state.requestId, cachedRequestId: cached.requestId });
        return { cacheSalt, cacheHit: true, response: cached };
      }
    } catch (error) {
      logWarning("Cache lookup failed", { requestId: state.requestId, error: describeError(error) });
    }
    logDebug("Cache miss", { requestId: state.requestId });
    return { cacheSalt };
  };

  const classify = (state: RouteGraphState): RouteGraphUpdate => {
    const classification = classifyQuery(state.query, table);
    logInfo("Query classified", { requestId: state.requestId, ...classification });
    return { classification };
  };

  const select = (state: RouteGraphState): RouteGraphUpdate => {
    if (!state.classification) {
      throw new Error("selectStrategy ran before classification");
    }
    const selection = selectStrategy(state.classification, deps.strategiesFor(state.snapshot.config));
    logInfo("Strategy selected", { requestId: state.requestId, strategy: selection.strategy.name, rule: selection.rule });
    return { selection };
  };

  const execute = async (state: RouteGraphState): Promise<RouteGraphUpdate> => {
    if (!state.classification || !state.selection) {
      throw new Error("executeStrategy ran before strategy selection");
    }
    const run = await state.selection.strategy.execute(state.query, deps.sources, {
      signal: state.signal,
      classification: state.classification,
      performance: deps.metrics.getPerformance(state.classification.type)
    });
    logInfo("Strategy finished", {
      requestId: state.requestId,
      strategy: run.strategy,
      results: run.results.map((result) => ({ source: result.source, confidence: result.confidence })),
      failures: run.failures.map((failure) => failure.source),
      skipped: run.skipped,
      discarded: run.discarded,
      shortCircuitedBy: run.shortCircuitedBy
    });
    return { run };
  };

  const normalize = (state: RouteGraphState): RouteGraphUpdate => {
    const normalized = normalizeResults(state.run?.results ?? [], deps.metrics.getSourceAccuracy());
    return { normalized };
  };

  const aggregate = (state: RouteGraphState): RouteGraphUpdate => {
    const { config } = state.snapshot;
    let response = aggregateResults(state.normalized, {
      requestId: state.requestId,
      strategy: state.run?.strategy,
      settings: config.aggregation,
      profiles: config.sources,
      similarity: deps.similarity,
      now: now()
    });
    if (hitDeadline(state.signal)) {
      response = markPartial(response, config.globalTimeoutMs);
    }
    logInfo("Response aggregated", {
      requestId: state.requestId,
      source: response.source,
      confidence: response.confidence,
      conflict: response.conflict ?? false,
      combined: response.combined ?? false,
      partial: response.partial ?? false
    });
    return { response };
  };

  const persist = async (state: RouteGraphState): Promise<RouteGraphUpdate> => {
    const { response, run, classification } = state;
    if (!response || !run || !classification || (state.signal.aborted && !hitDeadline(state.signal))) {
      return {};
    }

    deps.metrics.recordRoute({
      requestId: state.requestId,
      queryType: classification.type,
      strategy: run.strategy,
      latencyMs: Date.now() - state.startedAt,
      winningSources: response.confidence > 0 ? response.source.split(" + ") : [],
      results: state.normalized.map((result) => ({
        source: result.source,
        confidence: result.confidence,
        originalConfidence: result.originalConfidence,
        latencyMs: result.metadata.latencyMs
      })),
      failures: run.failures,
      partial: response.partial
    });

    if (!state.snapshot.config.cache.enabled || response.partial || response.confidence <= 0) {
      return {};
    }
    try {
      const entry = await deps.cache.set(state.query, response, { salt: state.cacheSalt });
      logDebug("Response cached", { requestId: state.requestId, expiresAt: new Date(entry.expiresAt).toISOString() });
    } catch (error) {
      logWarning("Cache write failed", { requestId: state.requestId, error: describeError(error) });
    }
    return {};
  };

  return new StateGraph(RouteState)
    .addNode("lookupCache", lookupCache)
    .addNode("classifyQuery", classify)
    .addNode("selectStrategy", select)
    .addNode("executeStrategy", execute)
    .addNode("normalizeResults", normalize)
    .addNode("aggregateResults", aggregate)
    .addNode("persistOutcome", persist)
    .addEdge(START, "lookupCache")
    .addConditionalEdges("lookupCache", (state: RouteGraphState) => (state.cacheHit ? END : "classifyQuery"), [
      "classifyQuery",
      END
    ])
    .addEdge("classifyQuery", "selectStrategy")
    .addEdge("selectStrategy", "executeStrategy")
    .addEdge("executeStrategy", "normalizeResults")
    .addEdge("normalizeResults", "aggregateResults")
    .addEdge("aggregateResults", "persistOutcome")
    .addEdge("persistOutcome", END)
    .compile();
}

export type RoutingGraph = ReturnType<typeof buildRoutingGraph>;
