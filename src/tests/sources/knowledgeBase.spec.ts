import { describe, expect, it } from "vitest";
import { KnowledgeBaseSource, KnowledgeDocument, documentRelevance } from "../../sources/knowledgeBase";
import { neverAborted, query } from "../helpers/fakeSources";

const DAY_MS = 86_400_000;
const UPDATED_AT = "2026-01-01T00:00:00.000Z";

const podLogs: KnowledgeDocument = {
  id: "kb-pods",
  title: "Checking Kubernetes pod logs",
  content: "Run kubectl logs with the pod name to stream container output.",
  updatedAt: UPDATED_AT
};

const shortPodLogs: KnowledgeDocument = {
  id: "kb-pods-short",
  title: "Pod logs",
  content: "Kubernetes keeps pod logs on the node.",
  updatedAt: UPDATED_AT
};

function daysAfterUpdate(days: number): () => Date {
  return () => new Date(Date.parse(UPDATED_AT) + days * DAY_MS);
}

const options = { timeoutMs: 1000, signal: neverAborted() };

describe("documentRelevance", () => {
  it("is the share of query words found in the title or content", () => {
    expect(documentRelevance("kubernetes pod logs", podLogs)).toBe(1);
    expect(documentRelevance("kubernetes pod eviction", podLogs)).toBeCloseTo(2 / 3);
  });
});

describe("KnowledgeBaseSource", () => {
  it("scores a fresh, fully matching article at 100", async () => {
    const source = new KnowledgeBaseSource([podLogs], { now: daysAfterUpdate(0) });
    const result = await source.query(query("kubernetes pod logs"), options);

    expect(result.confidence).toBe(100);
    expect(result.answer).toBe(podLogs.content);
    expect(result.metadata.publishedAt).toBe(UPDATED_AT);
    expect(result.metadata.resultsFound).toBe(1);
  });

  it("discounts older articles", async () => {
    const halfYear = new KnowledgeBaseSource([podLogs], { now: daysAfterUpdate(180) });
    const year = new KnowledgeBaseSource([podLogs], { now: daysAfterUpdate(365) });

    expect((await halfYear.query(query("kubernetes pod logs"), options)).confidence).toBe(81);
    expect((await year.query(query("kubernetes pod logs"), options)).confidence).toBe(74);
  });

  it("adds a boost when a second article also matches strongly", async () => {
    const source = new KnowledgeBaseSource([podLogs, shortPodLogs], { now: daysAfterUpdate(365) });
    const result = await source.query(query("kubernetes pod logs"), options);

    expect(result.confidence).toBe(81);
    expect(result.metadata.resultsFound).toBe(2);
  });

  it("answers with zero confidence when nothing matches", async () => {
    const source = new KnowledgeBaseSource([podLogs]);
    const result = await source.query(query("printer toner"), options);

    expect(result.confidence).toBe(0);
    expect(result.answer).toBe("");
    expect(result.reasoning).toBe("No matching documents found in the knowledge base.");
  });

  it("declines every query when it has no documents", () => {
    expect(new KnowledgeBaseSource([]).canHandle(query("kubernetes pod logs"))).toBe(false);
    expect(new KnowledgeBaseSource([podLogs]).canHandle(query("kubernetes pod logs"))).toBe(true);
  });
});
