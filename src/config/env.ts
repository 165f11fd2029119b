import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../errors";

dotenv.config();

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.string().default("info"),
  ROUTING_CONFIG_PATH: z.string().default("config/routing.json"),
  CACHE_BACKEND: z.enum(["memory", "postgres"]).default("memory"),
  KB_DOCUMENTS_PATH: z.string().default("data/knowledge-base.json"),
  DATABASE_URL: optionalString,
  PGHOST: optionalString,
  PGPORT: optionalString,
  PGUSER: optionalString,
  PGPASSWORD: optionalString,
  PGDATABASE: optionalString,
  PGSSLMODE: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  SERPAPI_KEY: optionalString,
  DOCS_SEARCH_BASE_URL: z.string().url().default("https://learn.microsoft.com/api/search"),
  DOCS_SEARCH_LOCALE: z.string().default("en-us")
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid environment",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function hasDatabase(env: Env): boolean {
  return Boolean(env.DATABASE_URL ?? env.PGHOST ?? env.PGDATABASE);
}
