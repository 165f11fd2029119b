import { describe, expect, it } from "vitest";
import { DocsSearchResponse, SearchDocsParams } from "../../data/docs";
import { OrganicResult } from "../../data/serp";
import { DocsSearchSource, docsConfidence } from "../../sources/docsSearch";
import { termOverlap } from "../../sources/scoring";
import { WebSearchSource, webConfidence } from "../../sources/webSearch";
import { neverAborted, query } from "../helpers/fakeSources";

const NOW = new Date("2026-06-01T00:00:00.000Z");
const options = { timeoutMs: 1000, signal: neverAborted() };

const firewallDocs: DocsSearchResponse = {
  results: [
    {
      title: "Configure Azure Storage firewalls and virtual networks",
      url: "https://docs.example.com/storage/network-security",
      description: "Learn how to configure the storage firewall.",
      lastUpdatedDate: "2026-03-10T00:00:00.000Z"
    },
    {
      title: "Storage account overview",
      url: "https://docs.example.com/storage/overview",
      description: "Types of storage accounts.",
      lastUpdatedDate: "2023-01-01T00:00:00.000Z"
    }
  ]
};

describe("termOverlap", () => {
  it("ignores terms shorter than three letters", () => {
    expect(termOverlap("to be", "to be or not")).toBe(0);
    expect(termOverlap("reset the vpn", "VPN reset guide")).toBeCloseTo(2 / 3);
    expect(termOverlap("reset vpn", "VPN reset guide")).toBe(1);
  });
});

describe("DocsSearchSource", () => {
  it("scores coverage, hit count and recency", () => {
    expect(docsConfidence("configure azure storage firewall", firewallDocs, NOW)).toBe(93);
    expect(docsConfidence("configure azure storage firewall", { results: [] }, NOW)).toBe(0);
  });

  it("answers with the top article and passes the request through", async () => {
    const calls: SearchDocsParams[] = [];
    const source = new DocsSearchSource({
      baseUrl: "https://docs.example.com/api/search",
      locale: "en-us",
      now: () => NOW,
      search: async (params) => {
        calls.push(params);
        return firewallDocs;
      }
    });

    const result = await source.query(query("configure azure storage firewall"), options);

    expect(result.confidence).toBe(93);
    expect(result.answer).toBe("Learn how to configure the storage firewall. (https://docs.example.com/storage/network-security)");
    expect(result.metadata.resultsFound).toBe(2);
    expect(calls).toHaveLength(1);
    expect(calls[0]?.query).toBe("configure azure storage firewall");
    expect(calls[0]?.locale).toBe("en-us");
  });
});

describe("WebSearchSource", () => {
  const vpnResults: OrganicResult[] = [
    { title: "How to reset your VPN client", link: "https://example.com/vpn", snippet: "Open settings and choose reset." },
    { title: "VPN FAQ", link: "https://example.com/faq", snippet: "Frequently asked questions." }
  ];

  it("scores overlap and result count below a fixed cap", () => {
    expect(webConfidence("reset vpn client", vpnResults)).toBe(74);
    const many = Array.from({ length: 8 }, (_, index) => ({
      title: "Reset a VPN client",
      link: `https://example.com/${index}`,
      snippet: "Reset steps."
    }));
    expect(webConfidence("reset vpn client", many)).toBe(80);
    expect(webConfidence("reset vpn client", [{ title: "VPN troubleshooting", link: "https://example.com/t", snippet: "Common fixes." }])).toBe(45);
  });

  it("answers with the top snippet", async () => {
    const source = new WebSearchSource("test-key", async () => vpnResults);
    const result = await source.query(query("reset vpn client"), options);

    expect(result.confidence).toBe(74);
    expect(result.answer).toBe("Open settings and choose reset. (https://example.com/vpn)");
  });

  it("is skipped without an API key", async () => {
    const source = new WebSearchSource(undefined, async () => vpnResults);
    expect(source.canHandle(query("reset vpn client"))).toBe(false);
    await expect(source.query(query("reset vpn client"), options)).rejects.toThrow("SERPAPI_KEY is not configured");
  });
});
