import { NextFunction, Request, Response, Router } from "express";
import { RoutingConfigStore } from "./config/routing";
import { ConfigurationError, RouteCancelledError, describeError } from "./errors";
import { logInfo, logWarning } from "./logger";
import {
  FeedbackRequestSchema,
  InvalidateRequestSchema,
  RouteRequestSchema,
  compilePattern,
  formatIssues,
  toQuery
} from "./parsers/query-schema";
import { ResponseCache } from "./routing/cache";
import { MetricsStore } from "./routing/metrics";
import { Orchestrator, RouteOutcome } from "./routing/orchestrator";
import { Query } from "./routing/types";
import { RoutingLog } from "./types";

export interface RouterDeps {
  orchestrator: Orchestrator;
  metrics: MetricsStore;
  cache: ResponseCache;
  config: RoutingConfigStore;
  logRouting?: (entry: RoutingLog) => Promise<void>;
}

export function routingLogEntry(query: Query, outcome: RouteOutcome, latencyMs: number): RoutingLog {
  return {
    requestId: outcome.response.requestId,
    requesterId: query.requesterId,
    query: query.text,
    classification: outcome.classification,
    strategy: outcome.response.strategy,
    response: outcome.response,
    latencyMs
  };
}

export function createRouter(deps: RouterDeps): Router {
  const router = Router();

  router.post("/route", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = RouteRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: formatIssues(parsed.error) });
    }

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    const query = toQuery(parsed.data);
    const startedAt = Date.now();
    try {
      const outcome = await deps.orchestrator.routeWithDetails(query, {
        bypassCache: parsed.data.bypassCache,
        signal: controller.signal
      });

      if (deps.logRouting) {
        await deps
          .logRouting(routingLogEntry(query, outcome, Date.now() - startedAt))
          .catch((error: unknown) => logWarning("Failed to persist routing log", { error: describeError(error) }));
      }

      return res.json(outcome.response);
    } catch (error) {
      if (error instanceof RouteCancelledError) {
        logInfo("Client went away before routing finished", { requesterId: query.requesterId });
        return undefined;
      }
      return next(error);
    }
  });

  router.post("/feedback", (req: Request, res: Response) => {
    const parsed = FeedbackRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: formatIssues(parsed.error) });
    }
    const known = deps.metrics.recordFeedback(parsed.data.requestId, parsed.data.correct);
    if (!known) {
      return res.status(404).json({ message: `Unknown request id ${parsed.data.requestId}` });
    }
    return res.status(204).end();
  });

  router.get("/metrics", (_req: Request, res: Response) => {
    res.json(deps.metrics.getStats());
  });

  router.post("/cache/invalidate", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = InvalidateRequestSchema.safeParse(req.body ?? {});
    const pattern = parsed.success ? compilePattern(parsed.data.pattern) : null;
    if (!parsed.success || !pattern) {
      return res.status(400).json({ message: parsed.success ? "pattern must be a valid regular expression" : formatIssues(parsed.error) });
    }
    try {
      const removed = await deps.cache.invalidate(pattern);
      logInfo("Cache invalidated", { pattern: parsed.data.pattern, removed });
      return res.json({ removed });
    } catch (error) {
      return next(error);
    }
  });

  router.post("/admin/reload", (_req: Request, res: Response, next: NextFunction) => {
    try {
      const snapshot = deps.config.reload();
      return res.json({ version: snapshot.version, loadedAt: snapshot.loadedAt });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return res.status(500).json({ message: error.message, issues: error.issues });
      }
      return next(error);
    }
  });

  return router;
}
