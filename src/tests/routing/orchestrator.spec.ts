import { describe, expect, it } from "vitest";
import { RoutingConfigInput, RoutingConfigStore } from "../../config/routing";
import { RouteCancelledError } from "../../errors";
import { MemoryCacheStore, ResponseCache } from "../../routing/cache";
import { MetricsStore } from "../../routing/metrics";
import { Orchestrator } from "../../routing/orchestrator";
import { ScriptedSource, query, registryOf } from "../helpers/fakeSources";

function cascade(...steps: Array<[string, number, number?]>) {
  return { sources: steps.map(([name, threshold, timeoutMs = 1000]) => ({ name, threshold, timeoutMs })) };
}

function configFor(names: string[]): RoutingConfigInput {
  const steps = cascade(...names.map((name, index): [string, number] => [name, index === names.length - 1 ? 0 : 85]));
  return {
    sources: Object.fromEntries(names.map((name, index) => [name, { priority: index + 1, priorAccuracy: 1 }])),
    strategies: {
      fast: steps,
      default: steps,
      critical: { sources: names, timeoutMs: 1000 },
      race: { sources: names, timeoutMs: 1000 }
    }
  };
}

class StalledReadStore extends MemoryCacheStore {
  reads = 0;

  async read(_key: string): Promise<string | undefined> {
    this.reads += 1;
    return new Promise<string | undefined>(() => undefined);
  }
}

function setup(sources: ScriptedSource[], input: () => RoutingConfigInput, store = new MemoryCacheStore()) {
  const names = sources.map((source) => source.name);
  const config = new RoutingConfigStore(input, () => names);
  const metrics = new MetricsStore();
  const orchestrator = new Orchestrator({
    config,
    sources: registryOf(...sources),
    cache: new ResponseCache(store),
    metrics
  });
  return { orchestrator, config, store, metrics };
}

describe("Orchestrator.route", () => {
  it("returns a confident first answer without querying later sources", async () => {
    const clock = new ScriptedSource("clock", { confidence: 92, answer: "3:04 PM" });
    const web = new ScriptedSource("web", { confidence: 50 });
    const { orchestrator } = setup([clock, web], () => configFor(["clock", "web"]));

    const response = await orchestrator.route(query("what time is it"));

    expect(response).toMatchObject({ answer: "3:04 PM", confidence: 92, source: "clock", alternatives: [] });
    expect(response.strategy).toBe("sequential_short_circuit");
    expect(web.calls).toBe(0);
  });

  it("reports the classification alongside a fresh answer but not a cached one", async () => {
    const clock = new ScriptedSource("clock", { confidence: 92, answer: "3:04 PM" });
    const { orchestrator } = setup([clock, new ScriptedSource("web", {})], () => configFor(["clock", "web"]));

    const fresh = await orchestrator.routeWithDetails(query("what time is it"));
    expect(fresh.cacheHit).toBe(false);
    expect(fresh.classification).toEqual({ urgency: "normal", complexity: 4, domain: "general", type: "general" });

    const cached = await orchestrator.routeWithDetails(query("what time is it"));
    expect(cached.cacheHit).toBe(true);
    expect(cached.classification).toBeUndefined();
    expect(cached.response).toEqual(fresh.response);
  });

  it("continues past a weak source and stops at the first confident one", async () => {
    const kb = new ScriptedSource("kb", { confidence: 60, answer: "Open the self-service portal" });
    const llm = new ScriptedSource("llm", { confidence: 78, answer: "Reset it from the VPN client settings page" });
    const web = new ScriptedSource("web", { confidence: 50 });
    const { orchestrator } = setup([kb, llm, web], () => ({
      ...configFor(["kb", "llm", "web"]),
      strategies: {
        fast: cascade(["kb", 85], ["llm", 75], ["web", 0]),
        default: cascade(["kb", 85], ["llm", 75], ["web", 0])
      }
    }));

    const response = await orchestrator.route(query("How do I reset my VPN password"));

    expect(kb.calls).toBe(1);
    expect(llm.calls).toBe(1);
    expect(web.calls).toBe(0);
    expect(response.source).toBe("llm");
    expect(response.confidence).toBe(78);
    expect(response.alternatives).toEqual([{ source: "kb", confidence: 60, answer: "Open the self-service portal" }]);
  });

  it("serves repeated questions from the cache without invoking sources", async () => {
    const clock = new ScriptedSource("clock", { confidence: 92, answer: "3:04 PM" });
    const { orchestrator, metrics } = setup([clock, new ScriptedSource("web", {})], () => configFor(["clock", "web"]));

    const first = await orchestrator.route(query("what time is it"));
    const second = await orchestrator.route(query("What time is it?"));

    expect(second).toEqual(first);
    expect(clock.calls).toBe(1);
    expect(metrics.getStats().cacheHits).toBe(1);

    await orchestrator.route(query("what time is it"), { bypassCache: true });
    expect(clock.calls).toBe(2);
  });

  it("answers with a warning instead of throwing when every source fails", async () => {
    const kb = new ScriptedSource("kb", { fail: "index offline" });
    const llm = new ScriptedSource("llm", { confidence: 0 });
    const web = new ScriptedSource("web", { fail: "quota exceeded" });
    const { orchestrator, store } = setup([kb, llm, web], () => configFor(["kb", "llm", "web"]));

    const response = await orchestrator.route(query("How do I reset my VPN password"));

    expect(response.confidence).toBe(0);
    expect(response.source).toBe("none");
    expect(response.warning).toBe("No source produced a usable answer for this query.");
    expect(store.size).toBe(0);
  });

  it("fans out critical queries to every source", async () => {
    const clock = new ScriptedSource("clock", { confidence: 92, answer: "3:04 PM" });
    const web = new ScriptedSource("web", { confidence: 50, answer: "noon" });
    const { orchestrator } = setup([clock, web], () => configFor(["clock", "web"]));

    const response = await orchestrator.route(query("urgent: what time is it"));

    expect(response.strategy).toBe("parallel_aggregate");
    expect(clock.calls).toBe(1);
    expect(web.calls).toBe(1);
    expect(response.alternatives).toEqual([{ source: "web", confidence: 50, answer: "noon" }]);
  });

  it("rejects on caller cancellation and caches nothing", async () => {
    const slow = new ScriptedSource("slow", { confidence: 95, delayMs: 200 });
    const { orchestrator, store, metrics } = setup([slow, new ScriptedSource("web", {})], () => configFor(["slow", "web"]));
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    await expect(orchestrator.route(query("what time is it"), { signal: controller.signal })).rejects.toBeInstanceOf(
      RouteCancelledError
    );
    expect(slow.aborts).toBe(1);
    expect(store.size).toBe(0);
    expect(metrics.getStats().totalRoutes).toBe(0);
  });

  it("returns a partial answer at the global deadline and does not cache it", async () => {
    const kb = new ScriptedSource("kb", { confidence: 72, delayMs: 5, answer: "Probably noon" });
    const llm = new ScriptedSource("llm", { confidence: 95, delayMs: 500 });
    const web = new ScriptedSource("web", { confidence: 50 });
    const { orchestrator, store } = setup([kb, llm, web], () => ({
      ...configFor(["kb", "llm", "web"]),
      globalTimeoutMs: 60,
      strategies: {
        fast: cascade(["kb", 90], ["llm", 75], ["web", 0]),
        default: cascade(["kb", 90], ["llm", 75], ["web", 0])
      }
    }));

    const response = await orchestrator.route(query("what time is it"));

    expect(response.partial).toBe(true);
    expect(response.source).toBe("kb");
    expect(response.confidence).toBe(72);
    expect(response.warning).toBe("Routing stopped at the 60ms limit; the answer uses only the sources that responded in time.");
    expect(web.calls).toBe(0);
    expect(store.size).toBe(0);
  });

  it("gives up on a stalled cache read at the global deadline", async () => {
    const clock = new ScriptedSource("clock", { confidence: 92, answer: "3:04 PM" });
    const stalled = new StalledReadStore();
    const { orchestrator } = setup(
      [clock, new ScriptedSource("web", {})],
      () => ({ ...configFor(["clock", "web"]), globalTimeoutMs: 50 }),
      stalled
    );

    const response = await orchestrator.route(query("what time is it"));

    expect(stalled.reads).toBe(1);
    expect(clock.calls).toBe(0);
    expect(response.partial).toBe(true);
    expect(response.confidence).toBe(0);
    expect(stalled.size).toBe(0);
  });

  it("picks up a reloaded configuration on the next request", async () => {
    const clock = new ScriptedSource("clock", { confidence: 92, answer: "3:04 PM" });
    const web = new ScriptedSource("web", { confidence: 50, answer: "noon" });
    let input: RoutingConfigInput = {
      ...configFor(["clock", "web"]),
      strategies: { fast: cascade(["clock", 95], ["web", 0]), default: cascade(["clock", 95], ["web", 0]) }
    };
    const { orchestrator, config } = setup([clock, web], () => input);

    const before = await orchestrator.route(query("what time is it"));
    expect(before.source).toBe("clock");
    expect(web.calls).toBe(1);

    input = {
      ...configFor(["clock", "web"]),
      sources: { clock: { priority: 1, priorAccuracy: 0.5 }, web: { priority: 2, priorAccuracy: 1 } }
    };
    config.reload();

    const after = await orchestrator.route(query("what time is it"), { bypassCache: true });
    expect(web.calls).toBe(1);
    expect(after.confidence).toBe(46);
    expect(after.warning).toBe("Low confidence: the best answer scored 46, below 70.");
  });

  it("keeps routing to a source after negative feedback", async () => {
    const clock = new ScriptedSource("clock", { confidence: 92, answer: "3:04 PM" });
    const { orchestrator, metrics } = setup([clock, new ScriptedSource("web", {})], () => configFor(["clock", "web"]));

    const response = await orchestrator.route(query("what time is it"));
    expect(metrics.recordFeedback(response.requestId, false)).toBe(true);
    expect(metrics.getSourceAccuracy().clock).toBeCloseTo(5 / 6, 10);

    const next = await orchestrator.route(query("what time is it"), { bypassCache: true });
    expect(next.source).toBe("clock");
    expect(next.confidence).toBe(77);
  });
});
