import { describe, expect, it } from "vitest";
import { logRouting } from "../../db";
import { routingLogEntry } from "../../routes";
import { RouteResponse } from "../../routing/types";
import { SqlClient } from "../../types";

class RecordingSqlClient implements SqlClient {
  readonly calls: Array<{ text: string; values?: unknown[] }> = [];

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount?: number | null }> {
    this.calls.push({ text, values });
    return { rows: [], rowCount: 1 };
  }
}

const response: RouteResponse = {
  requestId: "req-1",
  answer: "3:04 PM",
  confidence: 92,
  source: "clock",
  sources: ["clock"],
  alternatives: [],
  reasoning: "clock reasoning",
  strategy: "sequential_short_circuit",
  createdAt: "2026-01-01T00:00:00.000Z"
};

describe("routing log", () => {
  it("stores the classification the pipeline produced", async () => {
    const classification = { urgency: "normal", complexity: 4, domain: "general", type: "general" } as const;
    const entry = routingLogEntry(
      { text: "what time is it", requesterId: "tester" },
      { response, classification, cacheHit: false },
      12.4
    );
    const client = new RecordingSqlClient();

    await logRouting(client, entry);

    expect(client.calls).toHaveLength(1);
    expect(client.calls[0]?.values).toEqual([
      "req-1",
      "tester",
      "what time is it",
      "sequential_short_circuit",
      "clock",
      92,
      12,
      [],
      JSON.stringify(classification),
      JSON.stringify(response)
    ]);
  });

  it("leaves the classification empty for cached answers", async () => {
    const entry = routingLogEntry({ text: "what time is it", requesterId: "tester" }, { response, cacheHit: true }, 1);
    const client = new RecordingSqlClient();

    await logRouting(client, entry);

    expect(client.calls[0]?.values?.[8]).toBeNull();
  });
});
