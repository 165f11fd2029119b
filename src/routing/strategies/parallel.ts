import pLimit from "p-limit";
import { RoutingDeadlineError } from "../../errors";
import { logDebug } from "../../logger";
import { InformationSource, SourceLookup } from "../../sources/types";
import { SourceOutcome, invokeSource } from "../invoke";
import { ParallelStrategyConfig, Query, StrategyName, StrategyRun } from "../types";
import { RoutingStrategy, StrategyContext, emptyRun } from "./types";

export interface ApplicableSources {
  applicable: InformationSource[];
  skipped: string[];
}

export function resolveApplicableSources(names: string[], sources: SourceLookup, query: Query): ApplicableSources {
  const candidates = names.length > 0 ? names : sources.names();
  const applicable: InformationSource[] = [];
  const skipped: string[] = [];
  for (const name of candidates) {
    const source = sources.get(name);
    if (source && source.canHandle(query)) {
      applicable.push(source);
    } else {
      skipped.push(name);
    }
  }
  return { applicable, skipped };
}

export class ParallelAggregateStrategy implements RoutingStrategy {
  readonly name: StrategyName = "parallel_aggregate";

  constructor(private readonly config: ParallelStrategyConfig) {}

  async execute(query: Query, sources: SourceLookup, context: StrategyContext): Promise<StrategyRun> {
    const run = emptyRun(this.name);
    const { applicable, skipped } = resolveApplicableSources(this.config.sources, sources, query);
    run.skipped.push(...skipped);

    const limit = pLimit(Math.max(1, this.config.maxConcurrency));
    const deadline = Date.now() + this.config.timeoutMs;

    const settled = await Promise.allSettled(
      applicable.map((source) =>
        limit(() => {
          const remaining = deadline - Date.now();
          if (remaining <= 0) {
            return Promise.resolve(deadlineOutcome(source.name, this.config.timeoutMs));
          }
          return invokeSource(source, query, remaining, context.signal);
        })
      )
    );

    settled.forEach((entry, index) => {
      if (entry.status === "rejected") {
        run.failures.push({ source: applicable[index].name, error: String(entry.reason), timedOut: false, latencyMs: 0 });
        return;
      }
      const outcome = entry.value;
      if (outcome.status === "fulfilled") {
        run.results.push(outcome.result);
      } else {
        run.failures.push(outcome.failure);
      }
    });

    logDebug("Parallel aggregate finished", { results: run.results.length, failures: run.failures.length });
    return run;
  }
}

function deadlineOutcome(source: string, timeoutMs: number): SourceOutcome {
  return {
    status: "failed",
    failure: { source, error: new RoutingDeadlineError(timeoutMs).message, timedOut: true, latencyMs: 0 }
  };
}
