import { logDebug, logInfo } from "../logger";
import { average, clamp01 } from "../utils";
import { SimilarityFn, wordOverlapSimilarity } from "./similarity";
import { Alternative, NormalizedResult, RouteResponse, StrategyName } from "./types";

export interface TieBreakerWeights {
  recency: number;
  authority: number;
  specificity: number;
}

export interface AggregationSettings {
  lowConfidenceThreshold: number;
  tieMargin: number;
  agreementSimilarity: number;
  conflictSimilarity: number;
  conflictConfidence: number;
  conflictPenalty: number;
  tieBreakers: TieBreakerWeights;
}

export interface SourceProfile {
  priority: number;
  authoritative: boolean;
}

export interface AggregateOptions {
  requestId: string;
  strategy?: StrategyName;
  settings?: AggregationSettings;
  profiles?: Record<string, SourceProfile>;
  similarity?: SimilarityFn;
  now?: Date;
}

export const DEFAULT_AGGREGATION_SETTINGS: AggregationSettings = {
  lowConfidenceThreshold: 70,
  tieMargin: 5,
  agreementSimilarity: 0.7,
  conflictSimilarity: 0.5,
  conflictConfidence: 70,
  conflictPenalty: 0.1,
  tieBreakers: { recency: 0.3, authority: 0.4, specificity: 0.3 }
};

const DEFAULT_PRIORITY = 5;
const RECENCY_HALF_LIFE_DAYS = 180;
const SPECIFICITY_FULL_LENGTH = 2000;
const DAY_MS = 86_400_000;
const HOUR_MS = 3_600_000;

export function ttlMsForConfidence(confidence: number): number {
  if (confidence >= 90) return 24 * HOUR_MS;
  if (confidence >= 80) return 6 * HOUR_MS;
  if (confidence >= 70) return 2 * HOUR_MS;
  if (confidence >= 60) return HOUR_MS;
  return 30 * 60_000;
}

interface Context {
  requestId: string;
  strategy?: StrategyName;
  settings: AggregationSettings;
  profiles: Record<string, SourceProfile>;
  similarity: SimilarityFn;
  now: Date;
}

function priorityOf(source: string, profiles: Record<string, SourceProfile>): number {
  return profiles[source]?.priority ?? DEFAULT_PRIORITY;
}

export function sortResults(
  results: readonly NormalizedResult[],
  profiles: Record<string, SourceProfile> = {}
): NormalizedResult[] {
  return [...results].sort(
    (a, b) =>
      b.confidence - a.confidence ||
      priorityOf(a.source, profiles) - priorityOf(b.source, profiles) ||
      a.source.localeCompare(b.source)
  );
}

function toAlternative(result: NormalizedResult): Alternative {
  return { answer: result.answer, source: result.source, confidence: result.confidence };
}

function baseResponse(primary: NormalizedResult, ranked: NormalizedResult[], ctx: Context): RouteResponse {
  return {
    requestId: ctx.requestId,
    answer: primary.answer,
    confidence: primary.confidence,
    source: primary.source,
    sources: ranked.map((result) => result.source),
    alternatives: [],
    reasoning: primary.reasoning,
    strategy: ctx.strategy,
    createdAt: ctx.now.toISOString()
  };
}

export function noResultsResponse(requestId: string, now: Date = new Date(), strategy?: StrategyName): RouteResponse {
  return {
    requestId,
    answer: "",
    confidence: 0,
    source: "none",
    sources: [],
    alternatives: [],
    reasoning: "Every consulted source failed or returned zero confidence.",
    warning: "No source produced a usable answer for this query.",
    strategy,
    createdAt: now.toISOString()
  };
}

function recencyScore(result: NormalizedResult, now: Date): number {
  const publishedAt = result.metadata.publishedAt;
  if (!publishedAt) {
    return 0.5;
  }
  const published = Date.parse(publishedAt);
  if (Number.isNaN(published)) {
    return 0.5;
  }
  const ageDays = Math.max(0, now.getTime() - published) / DAY_MS;
  return Math.exp(-ageDays / RECENCY_HALF_LIFE_DAYS);
}

function authorityScore(source: string, profiles: Record<string, SourceProfile>): number {
  const profile = profiles[source];
  if (profile?.authoritative) {
    return 1;
  }
  return clamp01((DEFAULT_PRIORITY - priorityOf(source, profiles)) / DEFAULT_PRIORITY);
}

function specificityScore(result: NormalizedResult): number {
  return Math.min(1, result.answer.length / SPECIFICITY_FULL_LENGTH);
}

export function tieBreakerScore(
  result: NormalizedResult,
  weights: TieBreakerWeights,
  profiles: Record<string, SourceProfile>,
  now: Date
): number {
  return (
    weights.recency * recencyScore(result, now) +
    weights.authority * authorityScore(result.source, profiles) +
    weights.specificity * specificityScore(result)
  );
}

/** Results among the top three that take part in at least one disagreeing pair. */
function findConflict(ranked: NormalizedResult[], ctx: Context): NormalizedResult[] {
  const top = ranked.slice(0, 3);
  const involved = new Set<NormalizedResult>();
  for (let i = 0; i < top.length; i += 1) {
    for (let j = i + 1; j < top.length; j += 1) {
      const a = top[i];
      const b = top[j];
      if (
        a.confidence > ctx.settings.conflictConfidence &&
        b.confidence > ctx.settings.conflictConfidence &&
        ctx.similarity(a.answer, b.answer) < ctx.settings.conflictSimilarity
      ) {
        involved.add(a);
        involved.add(b);
      }
    }
  }
  return top.filter((result) => involved.has(result));
}

function resolveConflict(ranked: NormalizedResult[], conflicting: NormalizedResult[], ctx: Context): RouteResponse {
  const scored = conflicting
    .map((result) => ({ result, score: tieBreakerScore(result, ctx.settings.tieBreakers, ctx.profiles, ctx.now) }))
    .sort((a, b) => b.score - a.score);
  const winner = scored[0].result;
  const losers = ranked.slice(0, 3).filter((result) => result !== winner);

  logInfo("Conflict resolved by tie-breakers", {
    requestId: ctx.requestId,
    winner: winner.source,
    scores: scored.map(({ result, score }) => ({ source: result.source, score: Number(score.toFixed(3)) }))
  });

  return {
    ...baseResponse(winner, ranked, ctx),
    confidence: Math.round(winner.confidence * (1 - ctx.settings.conflictPenalty)),
    alternatives: losers.map(toAlternative),
    conflict: true,
    warning: `Sources disagree (${conflicting.map((result) => result.source).join(", ")}); ${winner.source} was preferred by the tie-breakers.`
  };
}

function resolveTie(ranked: NormalizedResult[], ctx: Context): RouteResponse {
  const top = ranked[0];
  const group = ranked.filter((result) => top.confidence - result.confidence <= ctx.settings.tieMargin);
  const agreeing = group.slice(1).every((result) => ctx.similarity(top.answer, result.answer) > ctx.settings.agreementSimilarity);

  if (agreeing) {
    return {
      ...baseResponse(top, ranked, ctx),
      confidence: Math.round(average(group.map((result) => result.confidence))),
      source: group.map((result) => result.source).join(" + "),
      alternatives: ranked.slice(group.length, group.length + 2).map(toAlternative),
      reasoning: group.map((result) => `${result.source}: ${result.reasoning}`).join(" | "),
      combined: true
    };
  }

  const conflicting = findConflict(ranked, ctx);
  if (conflicting.length > 0) {
    return resolveConflict(ranked, conflicting, ctx);
  }

  return {
    ...baseResponse(top, ranked, ctx),
    alternatives: group.slice(1).map(toAlternative),
    ambiguous: true,
    warning: "Several sources gave different answers with similar confidence; please check the alternatives."
  };
}

/**
 * Turns the normalized results of one strategy run into a single response.
 * Pure apart from logging: the same inputs always produce the same response.
 */
export function aggregateResults(results: readonly NormalizedResult[], options: AggregateOptions): RouteResponse {
  const ctx: Context = {
    requestId: options.requestId,
    strategy: options.strategy,
    settings: options.settings ?? DEFAULT_AGGREGATION_SETTINGS,
    profiles: options.profiles ?? {},
    similarity: options.similarity ?? wordOverlapSimilarity,
    now: options.now ?? new Date()
  };

  const ranked = sortResults(
    results.filter((result) => result.confidence > 0),
    ctx.profiles
  );
  const top = ranked[0];
  if (!top) {
    return noResultsResponse(ctx.requestId, ctx.now, ctx.strategy);
  }

  if (top.confidence < ctx.settings.lowConfidenceThreshold) {
    logDebug("Low confidence result", { requestId: ctx.requestId, source: top.source, confidence: top.confidence });
    return {
      ...baseResponse(top, ranked, ctx),
      alternatives: ranked.slice(1, 3).map(toAlternative),
      warning: `Low confidence: the best answer scored ${top.confidence}, below ${ctx.settings.lowConfidenceThreshold}.`
    };
  }

  const second = ranked[1];
  if (second && top.confidence - second.confidence <= ctx.settings.tieMargin) {
    return resolveTie(ranked, ctx);
  }

  const conflicting = findConflict(ranked, ctx);
  if (conflicting.length > 0) {
    return resolveConflict(ranked, conflicting, ctx);
  }

  return {
    ...baseResponse(top, ranked, ctx),
    alternatives: ranked.slice(1, 3).map(toAlternative)
  };
}
