import { z } from "zod";
import { fetchJson } from "../utils";

const DocsResultSchema = z.object({
  title: z.string(),
  url: z.string(),
  description: z.string().default(""),
  lastUpdatedDate: z.string().optional()
});

const DocsSearchResponseSchema = z.object({
  results: z.array(DocsResultSchema).default([]),
  count: z.number().optional()
});

export type DocsResult = z.infer<typeof DocsResultSchema>;
export type DocsSearchResponse = z.infer<typeof DocsSearchResponseSchema>;

export interface SearchDocsParams {
  baseUrl: string;
  query: string;
  locale: string;
  top?: number;
  signal: AbortSignal;
  timeoutMs: number;
}

export async function searchDocs({ baseUrl, query, locale, top = 5, signal, timeoutMs }: SearchDocsParams): Promise<DocsSearchResponse> {
  if (!query || query.trim().length === 0) {
    throw new Error("Documentation search query must be a non-empty string");
  }

  const payload = await fetchJson(
    baseUrl,
    {
      params: { search: query, locale, $top: top },
      timeout: timeoutMs,
      signal
    },
    { retries: 1, initialDelayMs: 200, signal },
    { failureThreshold: 5, cooldownMs: 30_000 }
  );
  const parsed = DocsSearchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Unexpected documentation search payload: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}
