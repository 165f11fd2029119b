import { logDebug, logInfo, logWarning } from "../../logger";
import { SourceLookup } from "../../sources/types";
import { invokeSource } from "../invoke";
import { Query, SequentialStrategyConfig, StrategyName, StrategyRun } from "../types";
import { RoutingStrategy, StrategyContext, emptyRun } from "./types";

export class SequentialShortCircuitStrategy implements RoutingStrategy {
  readonly name: StrategyName = "sequential_short_circuit";

  constructor(private readonly config: SequentialStrategyConfig) {}

  async execute(query: Query, sources: SourceLookup, context: StrategyContext): Promise<StrategyRun> {
    const run = emptyRun(this.name);

    for (const step of this.config.sources) {
      if (context.signal.aborted) {
        break;
      }

      const source = sources.get(step.name);
      if (!source) {
        logWarning("Configured source is not registered", { source: step.name });
        run.skipped.push(step.name);
        continue;
      }

      if (!source.canHandle(query)) {
        logDebug("Source cannot handle query", { source: step.name });
        run.skipped.push(step.name);
        continue;
      }

      const outcome = await invokeSource(source, query, step.timeoutMs, context.signal);
      if (outcome.status === "failed") {
        run.failures.push(outcome.failure);
        continue;
      }

      run.results.push(outcome.result);
      if (outcome.result.confidence >= step.threshold) {
        logInfo("Short-circuit", { source: step.name, confidence: outcome.result.confidence, threshold: step.threshold });
        run.shortCircuitedBy = step.name;
        break;
      }
      logDebug("Continuing cascade", { source: step.name, confidence: outcome.result.confidence, threshold: step.threshold });
    }

    return run;
  }
}
