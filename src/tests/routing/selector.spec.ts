import { describe, expect, it } from "vitest";
import { selectStrategy } from "../../routing/selector";
import { buildStrategies } from "../../routing/strategies";
import { QueryClassification } from "../../routing/types";
import { buildConfig } from "../helpers/fakeSources";

const SOURCES = ["kb", "llm", "web"];

function config(adaptiveEnabled: boolean) {
  return buildConfig(
    {
      strategies: {
        fast: { sources: [{ name: "kb", threshold: 80, timeoutMs: 100 }] },
        default: { sources: [{ name: "kb", threshold: 85, timeoutMs: 100 }, { name: "web", threshold: 0, timeoutMs: 100 }] },
        critical: { sources: SOURCES },
        race: { sources: SOURCES },
        adaptive: { enabled: adaptiveEnabled }
      }
    },
    SOURCES
  );
}

function classification(overrides: Partial<QueryClassification>): QueryClassification {
  return { urgency: "normal", complexity: 6, domain: "general", type: "general", ...overrides };
}

describe("selectStrategy", () => {
  const strategies = buildStrategies(config(false));

  it("sends critical queries to parallel aggregate even when simple", () => {
    const selection = selectStrategy(classification({ urgency: "critical", complexity: 2 }), strategies);
    expect(selection.rule).toBe("critical_urgency");
    expect(selection.strategy).toBe(strategies.critical);
    expect(selection.strategy.name).toBe("parallel_aggregate");
  });

  it("routes by complexity", () => {
    expect(selectStrategy(classification({ complexity: 4 }), strategies).strategy).toBe(strategies.fast);
    expect(selectStrategy(classification({ complexity: 8 }), strategies).strategy.name).toBe("parallel_race");
    expect(selectStrategy(classification({ complexity: 5 }), strategies).strategy).toBe(strategies.standard);
    expect(selectStrategy(classification({ complexity: 7 }), strategies).rule).toBe("fallthrough");
  });

  it("uses the adaptive policy for the fall-through rule only when enabled", () => {
    const adaptive = buildStrategies(config(true));
    expect(selectStrategy(classification({ complexity: 6 }), adaptive).strategy.name).toBe("adaptive");
    expect(selectStrategy(classification({ complexity: 9 }), adaptive).strategy.name).toBe("parallel_race");
    expect(strategies.adaptive).toBeUndefined();
  });
});
