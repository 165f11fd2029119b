import { describe, expect, it } from "vitest";
import { MetricsStore, RouteRecord } from "../../routing/metrics";

function record(requestId: string, overrides: Partial<RouteRecord> = {}): RouteRecord {
  return {
    requestId,
    queryType: "factual",
    strategy: "sequential_short_circuit",
    latencyMs: 100,
    winningSources: ["kb"],
    results: [],
    failures: [],
    ...overrides
  };
}

describe("MetricsStore", () => {
  it("seeds accuracy from priors and blends feedback into it", () => {
    const metrics = new MetricsStore({ priorAccuracy: { kb: 0.9, llm: 0.7 } });
    metrics.recordRoute(record("r1"));

    expect(metrics.recordFeedback("r1", false)).toBe(true);
    expect(metrics.recordFeedback("missing", true)).toBe(false);
    const accuracy = metrics.getSourceAccuracy();
    expect(accuracy.kb).toBeCloseTo(4.5 / 6, 10);
    expect(accuracy.llm).toBe(0.7);

    metrics.recordSourceFeedback("kb", true);
    expect(metrics.getSourceAccuracy().kb).toBeCloseTo(5.5 / 7, 10);
  });

  it("keeps a source above zero after repeated negative feedback", () => {
    const metrics = new MetricsStore({ priorAccuracy: { kb: 0.8 } });
    for (let vote = 0; vote < 15; vote += 1) {
      metrics.recordSourceFeedback("kb", false);
    }
    expect(metrics.getSourceAccuracy().kb).toBeCloseTo(4 / 20, 10);
  });

  it("credits every source of a combined answer", () => {
    const metrics = new MetricsStore();
    metrics.recordRoute(record("r1", { winningSources: ["llm", "kb"] }));
    metrics.recordFeedback("r1", true);
    const accuracy = metrics.getSourceAccuracy();
    expect(accuracy.llm).toBeCloseTo(5 / 6, 10);
    expect(accuracy.kb).toBeCloseTo(5 / 6, 10);
  });

  it("aggregates performance per query type", () => {
    const metrics = new MetricsStore({ priorAccuracy: { kb: 0.8 } });
    metrics.recordRoute(
      record("r1", { results: [{ source: "kb", confidence: 64, originalConfidence: 80, latencyMs: 30 }] })
    );
    metrics.recordRoute(
      record("r2", {
        results: [{ source: "kb", confidence: 48, originalConfidence: 60, latencyMs: 50 }],
        failures: [{ source: "kb", error: "boom", timedOut: false, latencyMs: 10 }]
      })
    );
    metrics.recordRoute(
      record("r3", {
        queryType: "procedural",
        results: [{ source: "kb", confidence: 80, originalConfidence: 100, latencyMs: 5 }]
      })
    );

    const performance = metrics.getPerformance("factual");
    expect(performance.kb.samples).toBe(3);
    expect(performance.kb.successRate).toBeCloseTo(1 / 3, 10);
    expect(performance.kb.avgConfidence).toBe(56);
    expect(performance.kb.avgLatencyMs).toBe(30);
    expect(performance.kb.accuracy).toBe(0.8);
    expect(metrics.getPerformance("diagnostic")).toEqual({});
  });

  it("forgets request ids beyond the history size", () => {
    const metrics = new MetricsStore({ historySize: 2 });
    metrics.recordRoute(record("r1"));
    metrics.recordRoute(record("r2"));
    metrics.recordRoute(record("r3"));
    expect(metrics.recordFeedback("r1", true)).toBe(false);
    expect(metrics.recordFeedback("r3", true)).toBe(true);
  });

  it("reports totals, cache hit rate and strategy counts", () => {
    const metrics = new MetricsStore();
    metrics.recordRoute(record("r1", { latencyMs: 100 }));
    metrics.recordRoute(record("r2", { latencyMs: 300, strategy: "parallel_race", partial: true }));
    metrics.recordCacheHit();

    const stats = metrics.getStats();
    expect(stats.totalRoutes).toBe(2);
    expect(stats.cacheHits).toBe(1);
    expect(stats.cacheHitRate).toBeCloseTo(1 / 3, 10);
    expect(stats.partialRoutes).toBe(1);
    expect(stats.avgLatencyMs).toBe(200);
    expect(stats.strategies).toEqual({ sequential_short_circuit: 1, parallel_race: 1 });
  });
});
