import { RoutingConfig } from "../../config/routing";
import { AdaptiveStrategy } from "./adaptive";
import { ParallelAggregateStrategy } from "./parallel";
import { ParallelRaceStrategy } from "./race";
import { SequentialShortCircuitStrategy } from "./sequential";
import { RoutingStrategy } from "./types";

export interface StrategySet {
  fast: RoutingStrategy;
  standard: RoutingStrategy;
  critical: RoutingStrategy;
  race: RoutingStrategy;
  adaptive?: RoutingStrategy;
}

export function buildStrategies(config: RoutingConfig): StrategySet {
  const { fast, default: standard, critical, race, adaptive } = config.strategies;
  return {
    fast: new SequentialShortCircuitStrategy(fast),
    standard: new SequentialShortCircuitStrategy(standard),
    critical: new ParallelAggregateStrategy(critical),
    race: new ParallelRaceStrategy(race),
    adaptive: adaptive.enabled ? new AdaptiveStrategy(standard, critical, adaptive) : undefined
  } satisfies StrategySet;
}

export { AdaptiveStrategy, planAdaptiveRoute } from "./adaptive";
export type { AdaptivePlan } from "./adaptive";
export { ParallelAggregateStrategy } from "./parallel";
export { ParallelRaceStrategy } from "./race";
export { SequentialShortCircuitStrategy } from "./sequential";
export type { RoutingStrategy, StrategyContext } from "./types";
