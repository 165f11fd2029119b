import fs from "node:fs";
import { z } from "zod";
import { ConfigurationError, describeError } from "../errors";
import { logInfo } from "../logger";

const SourceStepSchema = z.object({
  name: z.string().min(1),
  threshold: z.number().min(0).max(100),
  timeoutMs: z.number().int().positive()
});

const SequentialSchema = z.object({
  sources: z.array(SourceStepSchema).min(1)
});

const ParallelSchema = z.object({
  sources: z.array(z.string().min(1)).default([]),
  timeoutMs: z.number().int().positive().default(5000),
  maxConcurrency: z.number().int().positive().default(4)
});

const RaceSchema = ParallelSchema.extend({
  threshold: z.number().min(0).max(100).default(80),
  graceWindowMs: z.number().int().nonnegative().default(500)
});

const AdaptiveSchema = z.object({
  enabled: z.boolean().default(false),
  dominanceThreshold: z.number().min(0).max(1).default(0.8),
  minSamples: z.number().int().nonnegative().default(5),
  thresholdScale: z.number().positive().max(1).default(0.9)
});

const SourceSettingsSchema = z.object({
  priority: z.number().int().min(1).default(5),
  authoritative: z.boolean().default(false),
  priorAccuracy: z.number().min(0).max(1).optional()
});

const TieBreakerSchema = z.object({
  recency: z.number().min(0).max(1).default(0.3),
  authority: z.number().min(0).max(1).default(0.4),
  specificity: z.number().min(0).max(1).default(0.3)
});

const AggregationSchema = z.object({
  lowConfidenceThreshold: z.number().min(0).max(100).default(70),
  tieMargin: z.number().min(0).max(100).default(5),
  agreementSimilarity: z.number().min(0).max(1).default(0.7),
  conflictSimilarity: z.number().min(0).max(1).default(0.5),
  conflictConfidence: z.number().min(0).max(100).default(70),
  conflictPenalty: z.number().min(0).max(1).default(0.1),
  tieBreakers: TieBreakerSchema.default({})
});

const CacheSchema = z.object({
  enabled: z.boolean().default(true),
  saltWithSources: z.boolean().default(false)
});

export const RoutingConfigSchema = z.object({
  globalTimeoutMs: z.number().int().positive().default(12_000),
  sources: z.record(SourceSettingsSchema).default({}),
  strategies: z.object({
    fast: SequentialSchema,
    default: SequentialSchema,
    critical: ParallelSchema.default({}),
    race: RaceSchema.default({}),
    adaptive: AdaptiveSchema.default({})
  }),
  aggregation: AggregationSchema.default({}),
  cache: CacheSchema.default({})
});

export type RoutingConfig = z.infer<typeof RoutingConfigSchema>;
export type RoutingConfigInput = z.input<typeof RoutingConfigSchema>;
export type SourceSettings = z.infer<typeof SourceSettingsSchema>;

export interface RoutingSnapshot {
  version: number;
  loadedAt: string;
  config: RoutingConfig;
}

function referencedSources(config: RoutingConfig): Array<{ path: string; name: string }> {
  const { fast, default: fallback, critical, race } = config.strategies;
  return [
    ...fast.sources.map((step) => ({ path: "strategies.fast", name: step.name })),
    ...fallback.sources.map((step) => ({ path: "strategies.default", name: step.name })),
    ...critical.sources.map((name) => ({ path: "strategies.critical", name })),
    ...race.sources.map((name) => ({ path: "strategies.race", name })),
    ...Object.keys(config.sources).map((name) => ({ path: "sources", name }))
  ];
}

export function parseRoutingConfig(input: unknown, registeredSources: string[]): RoutingConfig {
  const parsed = RoutingConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid routing configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }

  const config = parsed.data;
  const known = new Set(registeredSources);
  const issues = referencedSources(config)
    .filter((entry) => !known.has(entry.name))
    .map((entry) => `${entry.path}: unknown source "${entry.name}"`);

  const lists: Array<[string, string[]]> = [
    ["strategies.fast", config.strategies.fast.sources.map((step) => step.name)],
    ["strategies.default", config.strategies.default.sources.map((step) => step.name)],
    ["strategies.critical", config.strategies.critical.sources],
    ["strategies.race", config.strategies.race.sources]
  ];
  for (const [path, names] of lists) {
    names
      .filter((name, index) => names.indexOf(name) !== index)
      .forEach((name) => issues.push(`${path}: duplicate source "${name}"`));
  }

  const { recency, authority, specificity } = config.aggregation.tieBreakers;
  if (Math.abs(recency + authority + specificity - 1) > 1e-6) {
    issues.push("aggregation.tieBreakers: weights must sum to 1");
  }

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid routing configuration", Array.from(new Set(issues)));
  }

  return config;
}

export function readRoutingConfigFile(filePath: string): unknown {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Unable to read routing configuration at ${filePath}`, [describeError(error)]);
  }
  try {
    const parsed: unknown = JSON.parse(contents);
    return parsed;
  } catch (error) {
    throw new ConfigurationError(`Routing configuration at ${filePath} is not valid JSON`, [describeError(error)]);
  }
}

/**
 * Holds the active routing configuration. Requests read one snapshot and keep
 * it for their whole lifetime, so a reload never changes an in-flight request.
 */
export class RoutingConfigStore {
  private snapshot: RoutingSnapshot;

  constructor(
    private readonly load: () => unknown,
    private readonly registeredSources: () => string[]
  ) {
    this.snapshot = this.build(1);
  }

  static fromFile(filePath: string, registeredSources: () => string[]): RoutingConfigStore {
    return new RoutingConfigStore(() => readRoutingConfigFile(filePath), registeredSources);
  }

  current(): RoutingSnapshot {
    return this.snapshot;
  }

  reload(): RoutingSnapshot {
    const next = this.build(this.snapshot.version + 1);
    this.snapshot = next;
    logInfo("Routing configuration reloaded", { version: next.version });
    return next;
  }

  private build(version: number): RoutingSnapshot {
    const config = parseRoutingConfig(this.load(), this.registeredSources());
    return {
      version,
      loadedAt: new Date().toISOString(),
      config
    } satisfies RoutingSnapshot;
  }
}
