import express, { Application, Request, Response, NextFunction } from "express";
import path from "node:path";
import fs from "node:fs";
import swaggerUi from "swagger-ui-express";
import helmet from "helmet";
import { hasDatabase, parseEnv } from "./src/config/env";
import { RoutingConfigStore } from "./src/config/routing";
import { createPool, init, logRouting } from "./src/db";
import { ConfigurationError, describeError } from "./src/errors";
import { logError, logInfo, logWarning, setLogLevel } from "./src/logger";
import { createRouter } from "./src/routes";
import { MemoryCacheStore, PostgresCacheStore, ResponseCache } from "./src/routing/cache";
import { MetricsStore } from "./src/routing/metrics";
import { Orchestrator } from "./src/routing/orchestrator";
import { createSourcesFromEnv } from "./src/sources";

const env = parseEnv();
setLogLevel(env.LOG_LEVEL);

const sources = createSourcesFromEnv(env);
const config = RoutingConfigStore.fromFile(path.resolve(env.ROUTING_CONFIG_PATH), () => sources.names());
const pool = hasDatabase(env) ? createPool(env) : null;

if (env.CACHE_BACKEND === "postgres" && !pool) {
  throw new ConfigurationError("CACHE_BACKEND=postgres requires DATABASE_URL or PG* settings");
}

const cache = new ResponseCache(env.CACHE_BACKEND === "postgres" && pool ? new PostgresCacheStore(pool) : new MemoryCacheStore());
const metrics = new MetricsStore();
const orchestrator = new Orchestrator({ config, sources, cache, metrics });

const app: Application = express();

app.use(helmet());
app.use(express.json({ limit: "1mb" }));

const swaggerPath = path.resolve(__dirname, "..", "swagger.json");
let swaggerDocument: Record<string, unknown> | null = null;

if (fs.existsSync(swaggerPath)) {
  try {
    swaggerDocument = JSON.parse(fs.readFileSync(swaggerPath, "utf-8"));
  } catch (error) {
    logError("Failed to parse swagger.json", { error: describeError(error) });
  }
} else {
  logWarning(`Swagger definition not found at ${swaggerPath}. /docs route disabled.`);
}

if (swaggerDocument) {
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument));
}

app.get("/health", (_req: Request, res: Response) => {
  res.json({ status: "ok", uptime: process.uptime() });
});

app.use(
  createRouter({
    orchestrator,
    metrics,
    cache,
    config,
    logRouting: pool ? (entry) => logRouting(pool, entry) : undefined
  })
);

app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  logError("Unhandled error", { error: err.message });
  res.status(500).json({ message: "Unexpected server error" });
});

async function start(): Promise<void> {
  if (pool) {
    await init(pool);
  }
  app.listen(env.PORT, () => {
    logInfo(`Confidence router listening on port ${env.PORT}`, { sources: sources.names() });
  });
}

start().catch((error: unknown) => {
  logError("Failed to start", { error: describeError(error) });
  process.exit(1);
});

process.on("SIGHUP", () => {
  try {
    config.reload();
  } catch (error) {
    logError("Routing configuration reload failed; keeping the previous configuration", { error: describeError(error) });
  }
});

process.on("unhandledRejection", (reason: unknown) => {
  logError("Unhandled promise rejection", { reason: describeError(reason) });
});

process.on("SIGTERM", () => {
  logInfo("Received SIGTERM, shutting down.");
  process.exit(0);
});
