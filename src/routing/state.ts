import { Annotation } from "@langchain/langgraph";
import { RoutingSnapshot } from "../config/routing";
import { StrategySelection } from "./selector";
import { NormalizedResult, Query, QueryClassification, RouteResponse, StrategyRun } from "./types";

function replaced<T>(initial: () => T) {
  return Annotation<T>({
    reducer: (_current: T, next: T) => next,
    default: initial
  });
}

export const RouteState = Annotation.Root({
  requestId: Annotation<string>,
  query: Annotation<Query>,
  snapshot: Annotation<RoutingSnapshot>,
  signal: Annotation<AbortSignal>,
  bypassCache: Annotation<boolean>,
  startedAt: Annotation<number>,
  cacheSalt: replaced<string[] | undefined>(() => undefined),
  cacheHit: replaced<boolean>(() => false),
  classification: replaced<QueryClassification | null>(() => null),
  selection: replaced<StrategySelection | null>(() => null),
  run: replaced<StrategyRun | null>(() => null),
  normalized: replaced<NormalizedResult[]>(() => []),
  response: replaced<RouteResponse | null>(() => null)
});

export type RouteGraphState = typeof RouteState.State;
export type RouteGraphUpdate = typeof RouteState.Update;

export interface RouteGraphInput {
  requestId: string;
  query: Query;
  snapshot: RoutingSnapshot;
  signal: AbortSignal;
  bypassCache: boolean;
  startedAt: number;
}

export function createInitialRouteState(input: RouteGraphInput): RouteGraphUpdate {
  return { ...input };
}
