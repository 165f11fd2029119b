import { DEFAULT_HISTORICAL_ACCURACY, accuracyFor } from "./normalization";
import { QueryType, SourceAccuracy, SourceFailure, SourcePerformance, StrategyName } from "./types";

export const SUCCESS_CONFIDENCE = 75;
export const DEFAULT_HISTORY_SIZE = 1000;
// Feedback is blended with the prior as if the prior were this many votes.
export const PRIOR_FEEDBACK_WEIGHT = 5;

export interface SourceObservation {
  source: string;
  confidence: number;
  originalConfidence: number;
  latencyMs: number;
}

export interface RouteRecord {
  requestId: string;
  queryType: QueryType;
  strategy: StrategyName;
  latencyMs: number;
  winningSources: string[];
  results: SourceObservation[];
  failures: SourceFailure[];
  partial?: boolean;
}

interface SourceCounters {
  attempts: number;
  successes: number;
  failures: number;
  responses: number;
  confidenceSum: number;
  latencySum: number;
}

interface FeedbackCounters {
  correct: number;
  total: number;
}

export interface SourceSummary {
  attempts: number;
  successes: number;
  failures: number;
  avgConfidence: number;
  avgLatencyMs: number;
  accuracy: number;
}

export interface MetricsSnapshot {
  totalRoutes: number;
  cacheHits: number;
  cacheHitRate: number;
  partialRoutes: number;
  avgLatencyMs: number;
  feedbackReceived: number;
  strategies: Record<string, number>;
  sources: Record<string, SourceSummary>;
}

export interface MetricsStoreOptions {
  priorAccuracy?: SourceAccuracy;
  historySize?: number;
}

function emptyCounters(): SourceCounters {
  return { attempts: 0, successes: 0, failures: 0, responses: 0, confidenceSum: 0, latencySum: 0 };
}

function counterFor<K>(map: Map<K, SourceCounters>, key: K): SourceCounters {
  const existing = map.get(key);
  if (existing) {
    return existing;
  }
  const created = emptyCounters();
  map.set(key, created);
  return created;
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * Request history and per-source statistics shared by every request.
 * All updates are increments applied synchronously, so concurrent requests
 * never overwrite each other's counts.
 */
export class MetricsStore {
  private priorAccuracy: SourceAccuracy;
  private readonly historySize: number;
  private readonly history = new Map<string, string[]>();
  private readonly byType = new Map<QueryType, Map<string, SourceCounters>>();
  private readonly totals = new Map<string, SourceCounters>();
  private readonly feedback = new Map<string, FeedbackCounters>();
  private readonly strategies = new Map<string, number>();
  private totalRoutes = 0;
  private cacheHits = 0;
  private partialRoutes = 0;
  private latencySum = 0;
  private feedbackReceived = 0;

  constructor(options: MetricsStoreOptions = {}) {
    this.priorAccuracy = { ...options.priorAccuracy };
    this.historySize = options.historySize ?? DEFAULT_HISTORY_SIZE;
  }

  setPriorAccuracy(prior: SourceAccuracy): void {
    this.priorAccuracy = { ...prior };
  }

  recordRoute(record: RouteRecord): void {
    this.totalRoutes += 1;
    this.latencySum += record.latencyMs;
    if (record.partial) {
      this.partialRoutes += 1;
    }
    this.strategies.set(record.strategy, (this.strategies.get(record.strategy) ?? 0) + 1);

    let typeCounters = this.byType.get(record.queryType);
    if (!typeCounters) {
      typeCounters = new Map();
      this.byType.set(record.queryType, typeCounters);
    }

    for (const result of record.results) {
      for (const counters of [counterFor(typeCounters, result.source), counterFor(this.totals, result.source)]) {
        counters.attempts += 1;
        counters.responses += 1;
        counters.confidenceSum += result.confidence;
        counters.latencySum += result.latencyMs;
        if (result.originalConfidence >= SUCCESS_CONFIDENCE) {
          counters.successes += 1;
        }
      }
    }

    for (const failure of record.failures) {
      for (const counters of [counterFor(typeCounters, failure.source), counterFor(this.totals, failure.source)]) {
        counters.attempts += 1;
        counters.failures += 1;
        counters.latencySum += failure.latencyMs;
      }
    }

    if (record.winningSources.length > 0) {
      this.remember(record.requestId, record.winningSources);
    }
  }

  recordCacheHit(): void {
    this.cacheHits += 1;
  }

  /** Returns false when the request id is unknown or has aged out of the history. */
  recordFeedback(requestId: string, correct: boolean): boolean {
    const sources = this.history.get(requestId);
    if (!sources) {
      return false;
    }
    this.feedbackReceived += 1;
    sources.forEach((source) => this.recordSourceFeedback(source, correct));
    return true;
  }

  recordSourceFeedback(source: string, correct: boolean): void {
    const counters = this.feedback.get(source) ?? { correct: 0, total: 0 };
    counters.total += 1;
    if (correct) {
      counters.correct += 1;
    }
    this.feedback.set(source, counters);
  }

  /**
   * Prior accuracy per source, moved toward the observed feedback ratio as votes
   * accumulate. A source never reaches zero, so a single bad vote cannot
   * remove it from routing.
   */
  getSourceAccuracy(): SourceAccuracy {
    const accuracy: SourceAccuracy = { ...this.priorAccuracy };
    for (const [source, counters] of this.feedback) {
      if (counters.total > 0) {
        const prior = accuracyFor(source, this.priorAccuracy) * PRIOR_FEEDBACK_WEIGHT;
        accuracy[source] = (counters.correct + prior) / (counters.total + PRIOR_FEEDBACK_WEIGHT);
      }
    }
    return accuracy;
  }

  getPerformance(queryType: QueryType): SourcePerformance {
    const accuracy = this.getSourceAccuracy();
    const performance: SourcePerformance = {};
    for (const [source, counters] of this.byType.get(queryType) ?? []) {
      performance[source] = {
        avgConfidence: ratio(counters.confidenceSum, counters.responses),
        successRate: ratio(counters.successes, counters.attempts),
        avgLatencyMs: ratio(counters.latencySum, counters.attempts),
        accuracy: accuracy[source],
        samples: counters.attempts
      };
    }
    return performance;
  }

  getStats(): MetricsSnapshot {
    const accuracy = this.getSourceAccuracy();
    const sources: Record<string, SourceSummary> = {};
    for (const [source, counters] of this.totals) {
      sources[source] = {
        attempts: counters.attempts,
        successes: counters.successes,
        failures: counters.failures,
        avgConfidence: ratio(counters.confidenceSum, counters.responses),
        avgLatencyMs: ratio(counters.latencySum, counters.attempts),
        accuracy: accuracy[source] ?? DEFAULT_HISTORICAL_ACCURACY
      };
    }

    const lookups = this.totalRoutes + this.cacheHits;
    return {
      totalRoutes: this.totalRoutes,
      cacheHits: this.cacheHits,
      cacheHitRate: ratio(this.cacheHits, lookups),
      partialRoutes: this.partialRoutes,
      avgLatencyMs: ratio(this.latencySum, this.totalRoutes),
      feedbackReceived: this.feedbackReceived,
      strategies: Object.fromEntries(this.strategies),
      sources
    };
  }

  private remember(requestId: string, sources: string[]): void {
    this.history.delete(requestId);
    this.history.set(requestId, sources);
    while (this.history.size > this.historySize) {
      const oldest = this.history.keys().next();
      if (oldest.done) {
        break;
      }
      this.history.delete(oldest.value);
    }
  }
}
