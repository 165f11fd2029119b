import { Query, SourceResult } from "../routing/types";

export interface SourceQueryOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

/**
 * Contract every information source satisfies. `query` must reject on failure
 * rather than return a fabricated low-confidence answer, and must stop work once
 * `signal` aborts.
 */
export interface InformationSource {
  readonly name: string;
  query(query: Query, options: SourceQueryOptions): Promise<SourceResult>;
  canHandle(query: Query): boolean;
  averageLatencyMs(): number;
  cost(): number;
}

export interface SourceLookup {
  get(name: string): InformationSource | undefined;
  names(): string[];
}
