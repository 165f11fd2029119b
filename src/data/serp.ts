import { z } from "zod";
import { fetchJson } from "../utils";

const SERPAPI_URL = "https://serpapi.com/search.json";

const OrganicResultSchema = z.object({
  title: z.string().default(""),
  link: z.string().default(""),
  snippet: z.string().default(""),
  date: z.string().optional()
});

const SerpResponseSchema = z.object({
  organic_results: z.array(OrganicResultSchema).default([]),
  error: z.string().optional()
});

export type OrganicResult = z.infer<typeof OrganicResultSchema>;

interface SearchSerpApiParams {
  apiKey: string;
  query: string;
  engine?: "google" | "google_news";
  numResults?: number;
  signal: AbortSignal;
  timeoutMs: number;
}

export async function searchSerpApi({
  apiKey,
  query,
  engine = "google",
  numResults,
  signal,
  timeoutMs
}: SearchSerpApiParams): Promise<OrganicResult[]> {
  if (!query || query.trim().length === 0) {
    throw new Error("SerpAPI query must be a non-empty string");
  }

  const params: Record<string, string | number> = {
    api_key: apiKey,
    engine,
    q: query
  };

  if (typeof numResults === "number" && Number.isFinite(numResults) && numResults > 0) {
    params.num = numResults;
  }

  const payload = await fetchJson(SERPAPI_URL, { params, timeout: timeoutMs, signal }, { retries: 1, signal });
  const parsed = SerpResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Unexpected SerpAPI payload: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  if (parsed.data.error) {
    throw new Error(`SerpAPI error: ${parsed.data.error}`);
  }
  return parsed.data.organic_results;
}
