import type { QueryClassification, RouteResponse, StrategyName } from "./routing/types";

/** Minimal slice of `pg`'s Pool used by the Postgres-backed stores. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount?: number | null }>;
}

export interface RoutingLog {
  requestId: string;
  requesterId: string;
  query: string;
  classification?: QueryClassification;
  strategy?: StrategyName;
  response: RouteResponse;
  latencyMs: number;
}
