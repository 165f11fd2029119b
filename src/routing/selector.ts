import { RoutingStrategy } from "./strategies/types";
import { StrategySet } from "./strategies";
import { QueryClassification } from "./types";

export type SelectionRule = "critical_urgency" | "low_complexity" | "high_complexity" | "fallthrough";

export interface StrategySelection {
  rule: SelectionRule;
  strategy: RoutingStrategy;
}

/**
 * Ordered rules; the first match wins and the last one always matches.
 * The fall-through uses the adaptive policy only when it has been enabled.
 */
export function selectStrategy(classification: QueryClassification, strategies: StrategySet): StrategySelection {
  if (classification.urgency === "critical") {
    return { rule: "critical_urgency", strategy: strategies.critical };
  }
  if (classification.complexity < 5) {
    return { rule: "low_complexity", strategy: strategies.fast };
  }
  if (classification.complexity > 7) {
    return { rule: "high_complexity", strategy: strategies.race };
  }
  return { rule: "fallthrough", strategy: strategies.adaptive ?? strategies.standard };
}
