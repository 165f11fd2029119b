import { randomUUID } from "node:crypto";
import { RoutingConfig, RoutingConfigStore, SourceSettings } from "../config/routing";
import { RouteCancelledError, RoutingDeadlineError } from "../errors";
import { logInfo } from "../logger";
import { SourceLookup } from "../sources/types";
import { ResponseCache } from "./cache";
import { ClassifierTable } from "./classifier";
import { RoutingGraph, buildRoutingGraph } from "./graph";
import { MetricsStore } from "./metrics";
import { SimilarityFn } from "./similarity";
import { createInitialRouteState } from "./state";
import { StrategySet, buildStrategies } from "./strategies";
import { Query, QueryClassification, RouteOptions, RouteResponse, SourceAccuracy } from "./types";

export interface RouteOutcome {
  response: RouteResponse;
  /** Absent when the response came from the cache. */
  classification?: QueryClassification;
  cacheHit: boolean;
}

export interface OrchestratorDeps {
  config: RoutingConfigStore;
  sources: SourceLookup;
  cache: ResponseCache;
  metrics: MetricsStore;
  classifierTable?: ClassifierTable;
  similarity?: SimilarityFn;
  now?: () => Date;
}

export function priorAccuracyOf(sources: Record<string, SourceSettings>): SourceAccuracy {
  const prior: SourceAccuracy = {};
  for (const [name, settings] of Object.entries(sources)) {
    if (settings.priorAccuracy !== undefined) {
      prior[name] = settings.priorAccuracy;
    }
  }
  return prior;
}

export class Orchestrator {
  private readonly graph: RoutingGraph;
  private readonly strategies = new WeakMap<RoutingConfig, StrategySet>();
  private seededVersion = 0;

  constructor(private readonly deps: OrchestratorDeps) {
    this.graph = buildRoutingGraph({
      cache: deps.cache,
      metrics: deps.metrics,
      sources: deps.sources,
      classifierTable: deps.classifierTable,
      similarity: deps.similarity,
      now: deps.now,
      strategiesFor: (config) => this.strategiesFor(config)
    });
  }

  /**
   * Answers one query. Never rejects for missing or weak evidence: those come
   * back as a response carrying a warning. Rejects with RouteCancelledError when
   * the caller aborts `options.signal`.
   */
  async route(query: Query, options: RouteOptions = {}): Promise<RouteResponse> {
    const { response } = await this.routeWithDetails(query, options);
    return response;
  }

  /** Same as `route`, also returning how the query was classified. */
  async routeWithDetails(query: Query, options: RouteOptions = {}): Promise<RouteOutcome> {
    const snapshot = this.deps.config.current();
    this.seedPriorAccuracy(snapshot.version, snapshot.config);

    const requestId = randomUUID();
    const startedAt = Date.now();
    const controller = new AbortController();
    const callerSignal = options.signal;
    const onCallerAbort = () => controller.abort(new RouteCancelledError());

    if (callerSignal?.aborted) {
      throw new RouteCancelledError();
    }
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });
    const timer = setTimeout(
      () => controller.abort(new RoutingDeadlineError(snapshot.config.globalTimeoutMs)),
      snapshot.config.globalTimeoutMs
    );

    logInfo("Routing query", { requestId, requesterId: query.requesterId, configVersion: snapshot.version });

    try {
      const state = await this.graph.invoke(
        createInitialRouteState({
          requestId,
          query,
          snapshot,
          signal: controller.signal,
          bypassCache: options.bypassCache ?? false,
          startedAt
        })
      );

      if (controller.signal.reason instanceof RouteCancelledError) {
        throw controller.signal.reason;
      }
      if (!state.response) {
        throw new Error(`Routing pipeline finished without a response for ${requestId}`);
      }

      logInfo("Query routed", {
        requestId,
        source: state.response.source,
        confidence: state.response.confidence,
        cacheHit: state.cacheHit,
        latencyMs: Date.now() - startedAt
      });
      return { response: state.response, classification: state.classification ?? undefined, cacheHit: state.cacheHit };
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private strategiesFor(config: RoutingConfig): StrategySet {
    const existing = this.strategies.get(config);
    if (existing) {
      return existing;
    }
    const built = buildStrategies(config);
    this.strategies.set(config, built);
    return built;
  }

  private seedPriorAccuracy(version: number, config: RoutingConfig): void {
    if (version === this.seededVersion) {
      return;
    }
    this.deps.metrics.setPriorAccuracy(priorAccuracyOf(config.sources));
    this.seededVersion = version;
  }
}
