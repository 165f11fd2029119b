import { z } from "zod";
import {
  InvalidSourceResultError,
  RouteCancelledError,
  RoutingError,
  SourceFailureError,
  SourceTimeoutError,
  describeError,
  toError
} from "../errors";
import { logDebug, logWarning } from "../logger";
import { InformationSource } from "../sources/types";
import { clamp } from "../utils";
import { Query, SourceFailure, SourceResult } from "./types";

const SourceResultSchema = z.object({
  source: z.string(),
  confidence: z.number().finite(),
  answer: z.string(),
  reasoning: z.string(),
  metadata: z
    .object({
      latencyMs: z.number().finite().nonnegative().optional(),
      tokensUsed: z.number().optional(),
      documentsSearched: z.number().optional(),
      resultsFound: z.number().optional(),
      publishedAt: z.string().optional(),
      details: z.record(z.unknown()).optional()
    })
    .default({})
});

export type SourceOutcome =
  | { status: "fulfilled"; result: SourceResult }
  | { status: "failed"; failure: SourceFailure };

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new RouteCancelledError();
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    signal.addEventListener("abort", () => reject(abortReason(signal)), { once: true });
  });
}

/** Settles with `work`, or rejects with the abort reason if `signal` fires first. */
export function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return Promise.race([work, rejectOnAbort(signal)]);
}

function validateResult(sourceName: string, raw: unknown, latencyMs: number): SourceResult {
  const parsed = SourceResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidSourceResultError(sourceName, parsed.error.issues.map((issue) => issue.message).join(", "));
  }
  const { metadata, ...rest } = parsed.data;
  return {
    ...rest,
    source: sourceName,
    confidence: clamp(rest.confidence, 0, 100),
    metadata: { ...metadata, latencyMs: metadata.latencyMs ?? latencyMs }
  } satisfies SourceResult;
}

/**
 * Queries one source under its own deadline. Never rejects: timeouts, adapter
 * errors, malformed results and cancellation all come back as a failed outcome.
 */
export async function invokeSource(
  source: InformationSource,
  query: Query,
  timeoutMs: number,
  parentSignal: AbortSignal
): Promise<SourceOutcome> {
  const startedAt = Date.now();
  if (parentSignal.aborted) {
    const failure: SourceFailure = {
      source: source.name,
      error: describeError(abortReason(parentSignal)),
      timedOut: false,
      latencyMs: 0
    };
    return { status: "failed", failure };
  }

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(abortReason(parentSignal));
  const timer = setTimeout(() => controller.abort(new SourceTimeoutError(source.name, timeoutMs)), Math.max(0, timeoutMs));

  parentSignal.addEventListener("abort", onParentAbort, { once: true });

  try {
    const raw = await Promise.race([
      Promise.resolve().then(() => source.query(query, { timeoutMs, signal: controller.signal })),
      rejectOnAbort(controller.signal)
    ]);
    const result = validateResult(source.name, raw, Date.now() - startedAt);
    logDebug("Source answered", { source: source.name, confidence: result.confidence, latencyMs: Date.now() - startedAt });
    return { status: "fulfilled", result };
  } catch (error) {
    const latencyMs = Date.now() - startedAt;
    const reason = error instanceof RoutingError ? error : new SourceFailureError(source.name, toError(error));
    const failure: SourceFailure = {
      source: source.name,
      error: describeError(reason),
      timedOut: reason instanceof SourceTimeoutError,
      latencyMs
    };
    logWarning("Source failed", { ...failure });
    return { status: "failed", failure };
  } finally {
    clearTimeout(timer);
    parentSignal.removeEventListener("abort", onParentAbort);
  }
}
