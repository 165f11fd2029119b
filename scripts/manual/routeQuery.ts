import path from "node:path";
import { parseEnv } from "../../src/config/env";
import { RoutingConfigStore } from "../../src/config/routing";
import { setLogLevel } from "../../src/logger";
import { MemoryCacheStore, ResponseCache } from "../../src/routing/cache";
import { MetricsStore } from "../../src/routing/metrics";
import { Orchestrator } from "../../src/routing/orchestrator";
import { createSourcesFromEnv } from "../../src/sources";

async function main() {
  const text = process.argv.slice(2).join(" ").trim();
  if (!text) {
    console.error("Usage: npm run route:manual -- <question>");
    process.exit(1);
  }

  const env = parseEnv();
  setLogLevel(process.env.LOG_LEVEL ?? "debug");

  const sources = createSourcesFromEnv(env);
  const orchestrator = new Orchestrator({
    config: RoutingConfigStore.fromFile(path.resolve(env.ROUTING_CONFIG_PATH), () => sources.names()),
    sources,
    cache: new ResponseCache(new MemoryCacheStore()),
    metrics: new MetricsStore()
  });

  const response = await orchestrator.route({ text, requesterId: "manual" });
  console.log(JSON.stringify(response, null, 2));
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
