import { createHash } from "node:crypto";
import { z } from "zod";
import { describeError } from "../errors";
import { logDebug, logWarning } from "../logger";
import { SqlClient } from "../types";
import { ttlMsForConfidence } from "./aggregator";
import { Query, RouteResponse, STRATEGY_NAMES } from "./types";

export interface StoredEntry {
  key: string;
  value: string;
}

/** Key-value backend for cached responses. Values are opaque serialized entries. */
export interface CacheStore {
  read(key: string): Promise<string | undefined>;
  write(key: string, value: string, expiresAt: Date): Promise<void>;
  remove(keys: string[]): Promise<number>;
  scan(): Promise<StoredEntry[]>;
  clear(): Promise<void>;
}

export interface CacheEntry {
  key: string;
  normalizedQuery: string;
  response: RouteResponse;
  createdAt: number;
  expiresAt: number;
}

const AlternativeSchema = z.object({
  answer: z.string(),
  source: z.string(),
  confidence: z.number()
});

export const RouteResponseSchema = z.object({
  requestId: z.string(),
  answer: z.string(),
  confidence: z.number(),
  source: z.string(),
  sources: z.array(z.string()),
  alternatives: z.array(AlternativeSchema),
  reasoning: z.string(),
  warning: z.string().optional(),
  conflict: z.boolean().optional(),
  combined: z.boolean().optional(),
  ambiguous: z.boolean().optional(),
  partial: z.boolean().optional(),
  strategy: z.enum(STRATEGY_NAMES).optional(),
  createdAt: z.string()
});

const CacheEntrySchema = z.object({
  key: z.string(),
  normalizedQuery: z.string(),
  response: RouteResponseSchema,
  createdAt: z.number(),
  expiresAt: z.number()
});

export function normalizeQueryText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function cacheKey(text: string, salt?: readonly string[]): string {
  const hash = createHash("sha256").update(normalizeQueryText(text));
  if (salt && salt.length > 0) {
    hash.update(`|${[...salt].sort().join(",")}`);
  }
  return `route:${hash.digest("hex")}`;
}

function parseEntry(raw: string): CacheEntry | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (_error) {
    return null;
  }
  const parsed = CacheEntrySchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export interface ResponseCacheOptions {
  now?: () => number;
}

export interface CacheWriteOptions {
  ttlMs?: number;
  salt?: readonly string[];
}

export class ResponseCache {
  private readonly now: () => number;

  constructor(
    private readonly store: CacheStore,
    options: ResponseCacheOptions = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  async get(query: Query, salt?: readonly string[]): Promise<RouteResponse | undefined> {
    const key = cacheKey(query.text, salt);
    const raw = await this.store.read(key);
    if (raw === undefined) {
      return undefined;
    }

    const entry = parseEntry(raw);
    if (!entry) {
      logWarning("Dropping unreadable cache entry", { key });
      await this.store.remove([key]);
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      logDebug("Cache entry expired", { key });
      await this.store.remove([key]);
      return undefined;
    }
    return entry.response;
  }

  async set(query: Query, response: RouteResponse, options: CacheWriteOptions = {}): Promise<CacheEntry> {
    const createdAt = this.now();
    const ttlMs = options.ttlMs ?? ttlMsForConfidence(response.confidence);
    const entry: CacheEntry = {
      key: cacheKey(query.text, options.salt),
      normalizedQuery: normalizeQueryText(query.text),
      response,
      createdAt,
      expiresAt: createdAt + ttlMs
    };
    await this.store.write(entry.key, JSON.stringify(entry), new Date(entry.expiresAt));
    return entry;
  }

  /** Removes every entry whose normalized query text or key matches `pattern`. */
  async invalidate(pattern: RegExp | string): Promise<number> {
    const matcher = typeof pattern === "string" ? new RegExp(pattern, "i") : pattern;
    const test = (value: string) => {
      matcher.lastIndex = 0;
      return matcher.test(value);
    };

    const entries = await this.store.scan();
    const keys = entries
      .filter(({ key, value }) => {
        const entry = parseEntry(value);
        return test(key) || (entry !== null && test(entry.normalizedQuery));
      })
      .map(({ key }) => key);

    if (keys.length === 0) {
      return 0;
    }
    return this.store.remove(keys);
  }

  clear(): Promise<void> {
    return this.store.clear();
  }
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, string>();

  async read(key: string): Promise<string | undefined> {
    return this.entries.get(key);
  }

  async write(key: string, value: string, _expiresAt: Date): Promise<void> {
    this.entries.set(key, value);
  }

  async remove(keys: string[]): Promise<number> {
    return keys.filter((key) => this.entries.delete(key)).length;
  }

  async scan(): Promise<StoredEntry[]> {
    return Array.from(this.entries, ([key, value]) => ({ key, value }));
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

const CacheRowSchema = z.object({
  key: z.string(),
  value: z.string()
});

export class PostgresCacheStore implements CacheStore {
  constructor(private readonly client: SqlClient) {}

  async read(key: string): Promise<string | undefined> {
    const result = await this.client.query("SELECT key, value FROM route_cache WHERE key = $1 AND expires_at > NOW()", [key]);
    const row = CacheRowSchema.safeParse(result.rows[0]);
    return row.success ? row.data.value : undefined;
  }

  async write(key: string, value: string, expiresAt: Date): Promise<void> {
    await this.client.query(
      `INSERT INTO route_cache (key, value, expires_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, expires_at = EXCLUDED.expires_at`,
      [key, value, expiresAt]
    );
  }

  async remove(keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    const result = await this.client.query("DELETE FROM route_cache WHERE key = ANY($1)", [keys]);
    return result.rowCount ?? 0;
  }

  async scan(): Promise<StoredEntry[]> {
    const result = await this.client.query("SELECT key, value FROM route_cache WHERE expires_at > NOW()");
    return result.rows.flatMap((row) => {
      const parsed = CacheRowSchema.safeParse(row);
      if (!parsed.success) {
        logWarning("Skipping malformed route_cache row", { error: describeError(parsed.error) });
        return [];
      }
      return [parsed.data];
    });
  }

  async clear(): Promise<void> {
    await this.client.query("DELETE FROM route_cache");
  }
}
