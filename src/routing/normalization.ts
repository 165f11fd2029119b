import { NormalizedResult, SourceAccuracy, SourceResult } from "./types";

export const DEFAULT_HISTORICAL_ACCURACY = 0.8;

export function accuracyFor(source: string, accuracy: SourceAccuracy): number {
  const value = accuracy[source];
  return typeof value === "number" && Number.isFinite(value) ? value : DEFAULT_HISTORICAL_ACCURACY;
}

export function normalizeResult(result: SourceResult | NormalizedResult, accuracy: SourceAccuracy): NormalizedResult {
  const originalConfidence = "originalConfidence" in result ? result.originalConfidence : result.confidence;
  return {
    ...result,
    originalConfidence,
    confidence: Math.round(originalConfidence * accuracyFor(result.source, accuracy))
  } satisfies NormalizedResult;
}

export function normalizeResults(
  results: ReadonlyArray<SourceResult | NormalizedResult>,
  accuracy: SourceAccuracy
): NormalizedResult[] {
  return results.map((result) => normalizeResult(result, accuracy));
}
