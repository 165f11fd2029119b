import pLimit from "p-limit";
import { RoutingError } from "../../errors";
import { logDebug, logInfo } from "../../logger";
import { SourceLookup } from "../../sources/types";
import { delay } from "../../utils";
import { SourceOutcome, invokeSource } from "../invoke";
import { Query, RaceStrategyConfig, SourceResult, StrategyName, StrategyRun } from "../types";
import { resolveApplicableSources } from "./parallel";
import { RoutingStrategy, StrategyContext, emptyRun } from "./types";

export const DEFAULT_RACE_THRESHOLD = 80;
export const DEFAULT_GRACE_WINDOW_MS = 500;

class RaceSettledError extends RoutingError {
  constructor(winner: string) {
    super(`Race already won by ${winner}`);
  }
}

interface Arrival {
  name: string;
  outcome: SourceOutcome;
}

export class ParallelRaceStrategy implements RoutingStrategy {
  readonly name: StrategyName = "parallel_race";

  constructor(private readonly config: RaceStrategyConfig) {}

  async execute(query: Query, sources: SourceLookup, context: StrategyContext): Promise<StrategyRun> {
    const run = emptyRun(this.name);
    const { applicable, skipped } = resolveApplicableSources(this.config.sources, sources, query);
    run.skipped.push(...skipped);

    const controller = new AbortController();
    const onParentAbort = () => controller.abort(context.signal.reason);
    context.signal.addEventListener("abort", onParentAbort, { once: true });

    const limit = pLimit(Math.max(1, this.config.maxConcurrency));
    const pending = new Map<string, Promise<Arrival>>();
    for (const source of applicable) {
      pending.set(
        source.name,
        limit(() => invokeSource(source, query, this.config.timeoutMs, controller.signal)).then((outcome) => ({
          name: source.name,
          outcome
        }))
      );
    }

    const record = ({ name, outcome }: Arrival): SourceResult | undefined => {
      pending.delete(name);
      if (outcome.status === "failed") {
        run.failures.push(outcome.failure);
        return undefined;
      }
      run.results.push(outcome.result);
      return outcome.result;
    };

    try {
      let winner: SourceResult | undefined;
      while (pending.size > 0 && !winner) {
        const result = record(await Promise.race(pending.values()));
        if (result && result.confidence >= this.config.threshold) {
          winner = result;
        }
      }

      if (!winner) {
        return run;
      }

      logInfo("Race winner", { source: winner.source, confidence: winner.confidence, threshold: this.config.threshold });
      run.shortCircuitedBy = winner.source;

      const graceDeadline = Date.now() + this.config.graceWindowMs;
      const graceTimer = new AbortController();
      try {
        while (pending.size > 0) {
          const remaining = graceDeadline - Date.now();
          if (remaining <= 0) {
            break;
          }
          const arrival = await Promise.race([
            ...pending.values(),
            delay(remaining, graceTimer.signal).then(() => null)
          ]);
          if (arrival === null) {
            break;
          }
          record(arrival);
        }
      } finally {
        graceTimer.abort();
      }

      run.discarded.push(...pending.keys());
      if (run.discarded.length > 0) {
        logDebug("Discarding late race arrivals", { sources: run.discarded });
        controller.abort(new RaceSettledError(winner.source));
      }
      return run;
    } finally {
      context.signal.removeEventListener("abort", onParentAbort);
    }
  }
}
