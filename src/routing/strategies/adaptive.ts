import { logInfo } from "../../logger";
import { SourceLookup } from "../../sources/types";
import {
  AdaptiveStrategyConfig,
  ParallelStrategyConfig,
  Query,
  SequentialStrategyConfig,
  SourcePerformance,
  SourceStep,
  StrategyName,
  StrategyRun
} from "../types";
import { ParallelAggregateStrategy } from "./parallel";
import { SequentialShortCircuitStrategy } from "./sequential";
import { RoutingStrategy, StrategyContext } from "./types";

export type AdaptivePlan =
  | { mode: "sequential"; dominant: string; steps: SourceStep[] }
  | { mode: "parallel"; ranking: string[] };

interface RankedSource {
  step: SourceStep;
  index: number;
  successRate: number;
  eligible: boolean;
}

function rankSources(
  base: SequentialStrategyConfig,
  performance: SourcePerformance,
  config: AdaptiveStrategyConfig
): RankedSource[] {
  return base.sources
    .map((step, index) => {
      const stats = performance[step.name];
      const eligible = stats !== undefined && stats.samples >= config.minSamples;
      return { step, index, successRate: eligible && stats ? stats.successRate : 0, eligible } satisfies RankedSource;
    })
    .sort((a, b) => b.successRate - a.successRate || a.index - b.index);
}

/**
 * Picks sequential routing led by a dominant source when one source's
 * historical success rate for the query type reaches the dominance threshold;
 * otherwise fans out to every source.
 */
export function planAdaptiveRoute(
  base: SequentialStrategyConfig,
  performance: SourcePerformance,
  config: AdaptiveStrategyConfig
): AdaptivePlan {
  const ranked = rankSources(base, performance, config);
  const leader = ranked[0];

  if (!leader || !leader.eligible || leader.successRate < config.dominanceThreshold) {
    return { mode: "parallel", ranking: ranked.map((entry) => entry.step.name) };
  }

  const fallback = base.sources[base.sources.length - 1];
  const rest = ranked
    .filter((entry) => entry !== leader && entry.step !== fallback)
    .map((entry) => entry.step);
  const tail = fallback && fallback !== leader.step ? [fallback] : [];

  return {
    mode: "sequential",
    dominant: leader.step.name,
    steps: [
      { ...leader.step, threshold: Math.round(leader.step.threshold * config.thresholdScale) },
      ...rest,
      ...tail
    ]
  };
}

export class AdaptiveStrategy implements RoutingStrategy {
  readonly name: StrategyName = "adaptive";

  constructor(
    private readonly base: SequentialStrategyConfig,
    private readonly parallel: ParallelStrategyConfig,
    private readonly config: AdaptiveStrategyConfig
  ) {}

  async execute(query: Query, sources: SourceLookup, context: StrategyContext): Promise<StrategyRun> {
    const plan = planAdaptiveRoute(this.base, context.performance, this.config);
    logInfo("Adaptive plan", { queryType: context.classification.type, ...plan });

    const delegate =
      plan.mode === "sequential"
        ? new SequentialShortCircuitStrategy({ sources: plan.steps })
        : new ParallelAggregateStrategy({ ...this.parallel, sources: plan.ranking });

    const run = await delegate.execute(query, sources, context);
    return { ...run, strategy: this.name };
  }
}
