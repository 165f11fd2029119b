import axios, { AxiosRequestConfig } from "axios";
import { RoutingError } from "./errors";

export interface RetryOptions {
  retries?: number;
  initialDelayMs?: number;
  factor?: number;
  signal?: AbortSignal;
}

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  cooldownMs?: number;
}

interface CircuitBreakerState {
  failures: number;
  openedAt: number | null;
}

export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, initialDelayMs = 250, factor = 2, signal } = options;
  let attempt = 0;
  let wait = initialDelayMs;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || signal?.aborted) {
        throw error;
      }
      await delay(wait, signal);
      if (signal?.aborted) {
        throw error;
      }
      wait *= factor;
      attempt += 1;
    }
  }
}

export class CircuitBreaker {
  private readonly state: CircuitBreakerState = { failures: 0, openedAt: null };

  private readonly failureThreshold: number;

  private readonly cooldownMs: number;

  constructor(
    readonly name: string,
    { failureThreshold = 3, cooldownMs = 15_000 }: CircuitBreakerOptions = {}
  ) {
    this.failureThreshold = failureThreshold;
    this.cooldownMs = cooldownMs;
  }

  /** Cancelled calls (an aborted `signal` or an axios cancellation) do not count against the host. */
  async exec<T>(action: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (this.isOpen()) {
      throw new CircuitOpenError(this.name);
    }

    try {
      const result = await action();
      this.reset();
      return result;
    } catch (error) {
      if (!signal?.aborted && !axios.isCancel(error)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  private recordFailure(): void {
    this.state.failures += 1;
    if (this.state.failures >= this.failureThreshold) {
      this.state.openedAt = Date.now();
    }
  }

  private reset(): void {
    this.state.failures = 0;
    this.state.openedAt = null;
  }

  private isOpen(): boolean {
    if (this.state.openedAt === null) {
      return false;
    }
    const elapsed = Date.now() - this.state.openedAt;
    if (elapsed > this.cooldownMs) {
      this.reset();
      return false;
    }
    return true;
  }
}

export class CircuitOpenError extends RoutingError {
  constructor(readonly host: string) {
    super(`Circuit breaker for ${host} is open; skipping the request`);
  }
}

const breakerMap = new Map<string, CircuitBreaker>();

function getCircuitBreaker(host: string, options?: CircuitBreakerOptions): CircuitBreaker {
  const key = host.toLowerCase();
  const existing = breakerMap.get(key);
  if (existing) {
    return existing;
  }
  const breaker = new CircuitBreaker(key, options);
  breakerMap.set(key, breaker);
  return breaker;
}

export async function fetchJson(
  url: string,
  config: AxiosRequestConfig = {},
  retryOptions?: RetryOptions,
  cbOptions?: CircuitBreakerOptions
): Promise<unknown> {
  const parsed = new URL(url);
  const breaker = getCircuitBreaker(parsed.host, cbOptions);
  const executor = () => axios<unknown>({ url, ...config }).then((response) => response.data);
  const signal = retryOptions?.signal ?? toAbortSignal(config.signal);
  return breaker.exec(() => withRetry(executor, { ...retryOptions, signal }), signal);
}

function toAbortSignal(signal: AxiosRequestConfig["signal"]): AbortSignal | undefined {
  return signal instanceof AbortSignal ? signal : undefined;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

export function average(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter((token) => token.length > 0);
}
