import { Pool } from "pg";
import { Env } from "./config/env";
import { logError } from "./logger";
import { RoutingLog, SqlClient } from "./types";

export function createPool(env: Env): Pool {
  const pool = env.DATABASE_URL
    ? new Pool({ connectionString: env.DATABASE_URL })
    : new Pool({
        host: env.PGHOST,
        port: env.PGPORT ? Number(env.PGPORT) : undefined,
        user: env.PGUSER,
        password: env.PGPASSWORD,
        database: env.PGDATABASE,
        ssl: env.PGSSLMODE === "require" ? { rejectUnauthorized: false } : undefined
      });

  pool.on("error", (error: Error) => {
    logError("Unexpected PostgreSQL error", { error: error.message });
  });

  return pool;
}

export async function init(client: SqlClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS routing_logs (
      id SERIAL PRIMARY KEY,
      created_at TIMESTAMPTZ DEFAULT NOW(),
      request_id TEXT NOT NULL,
      requester_id TEXT NOT NULL,
      query TEXT NOT NULL,
      strategy TEXT,
      source TEXT NOT NULL,
      confidence DOUBLE PRECISION NOT NULL,
      latency_ms INTEGER NOT NULL,
      flags TEXT[] NOT NULL,
      classification JSONB,
      response JSONB NOT NULL
    );
  `);
  await client.query(`
    CREATE TABLE IF NOT EXISTS route_cache (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      expires_at TIMESTAMPTZ NOT NULL
    );
  `);
}

export function responseFlags(response: RoutingLog["response"]): string[] {
  const flags: Array<[string, boolean | undefined]> = [
    ["conflict", response.conflict],
    ["combined", response.combined],
    ["ambiguous", response.ambiguous],
    ["partial", response.partial],
    ["warning", response.warning !== undefined]
  ];
  return flags.filter(([, set]) => set === true).map(([name]) => name);
}

export async function logRouting(client: SqlClient, entry: RoutingLog): Promise<void> {
  const values = [
    entry.requestId,
    entry.requesterId,
    entry.query,
    entry.strategy ?? null,
    entry.response.source,
    entry.response.confidence,
    Math.round(entry.latencyMs),
    responseFlags(entry.response),
    entry.classification ? JSON.stringify(entry.classification) : null,
    JSON.stringify(entry.response)
  ];

  await client.query(
    `INSERT INTO routing_logs (request_id, requester_id, query, strategy, source, confidence, latency_ms, flags, classification, response)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
    values
  );
}
