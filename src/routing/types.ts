export const URGENCY_LEVELS = ["low", "normal", "high", "critical"] as const;
export type Urgency = (typeof URGENCY_LEVELS)[number];

export const QUERY_TYPES = ["factual", "procedural", "diagnostic", "comparative", "recommendation", "general"] as const;
export type QueryType = (typeof QUERY_TYPES)[number];

export const EXPERTISE_LEVELS = ["beginner", "intermediate", "expert"] as const;
export type ExpertiseLevel = (typeof EXPERTISE_LEVELS)[number];

export const STRATEGY_NAMES = ["sequential_short_circuit", "parallel_aggregate", "parallel_race", "adaptive"] as const;
export type StrategyName = (typeof STRATEGY_NAMES)[number];

export interface QueryContext {
  previousQueries?: readonly string[];
  urgency?: Urgency;
  domain?: string;
  expertiseLevel?: ExpertiseLevel;
}

export interface Query {
  readonly text: string;
  readonly requesterId: string;
  readonly context?: Readonly<QueryContext>;
}

export interface SourceResultMetadata {
  latencyMs: number;
  tokensUsed?: number;
  documentsSearched?: number;
  resultsFound?: number;
  publishedAt?: string;
  details?: Record<string, unknown>;
}

export interface SourceResult {
  source: string;
  confidence: number;
  answer: string;
  metadata: SourceResultMetadata;
  reasoning: string;
}

export interface NormalizedResult extends SourceResult {
  originalConfidence: number;
}

export interface QueryClassification {
  urgency: Urgency;
  complexity: number;
  domain: string;
  type: QueryType;
}

export interface SourceStep {
  name: string;
  threshold: number;
  timeoutMs: number;
}

export interface SequentialStrategyConfig {
  sources: SourceStep[];
}

export interface ParallelStrategyConfig {
  sources: string[];
  timeoutMs: number;
  maxConcurrency: number;
}

export interface RaceStrategyConfig extends ParallelStrategyConfig {
  threshold: number;
  graceWindowMs: number;
}

export interface AdaptiveStrategyConfig {
  enabled: boolean;
  dominanceThreshold: number;
  minSamples: number;
  thresholdScale: number;
}

export interface Alternative {
  answer: string;
  source: string;
  confidence: number;
}

export interface RouteResponse {
  requestId: string;
  answer: string;
  confidence: number;
  source: string;
  sources: string[];
  alternatives: Alternative[];
  reasoning: string;
  warning?: string;
  conflict?: boolean;
  combined?: boolean;
  ambiguous?: boolean;
  partial?: boolean;
  strategy?: StrategyName;
  createdAt: string;
}

export interface SourceStats {
  avgConfidence: number;
  successRate: number;
  avgLatencyMs: number;
  accuracy?: number;
  samples: number;
}

export type SourcePerformance = Record<string, SourceStats>;

export type SourceAccuracy = Record<string, number>;

export interface SourceFailure {
  source: string;
  error: string;
  timedOut: boolean;
  latencyMs: number;
}

export interface StrategyRun {
  strategy: StrategyName;
  results: SourceResult[];
  failures: SourceFailure[];
  skipped: string[];
  discarded: string[];
  shortCircuitedBy?: string;
}

export interface RouteOptions {
  bypassCache?: boolean;
  signal?: AbortSignal;
}
