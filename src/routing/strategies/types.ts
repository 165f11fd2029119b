import { SourceLookup } from "../../sources/types";
import { Query, QueryClassification, SourcePerformance, StrategyName, StrategyRun } from "../types";

export interface StrategyContext {
  signal: AbortSignal;
  classification: QueryClassification;
  performance: SourcePerformance;
}

export interface RoutingStrategy {
  readonly name: StrategyName;
  execute(query: Query, sources: SourceLookup, context: StrategyContext): Promise<StrategyRun>;
}

export function emptyRun(strategy: StrategyName): StrategyRun {
  return {
    strategy,
    results: [],
    failures: [],
    skipped: [],
    discarded: []
  } satisfies StrategyRun;
}
