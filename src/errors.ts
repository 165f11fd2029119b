export class RoutingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends RoutingError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

export class SourceTimeoutError extends RoutingError {
  constructor(readonly source: string, readonly timeoutMs: number) {
    super(`Source ${source} timed out after ${timeoutMs}ms`);
  }
}

export class SourceFailureError extends RoutingError {
  constructor(readonly source: string, cause: unknown) {
    super(`Source ${source} failed: ${describeError(cause)}`);
  }
}

export class InvalidSourceResultError extends RoutingError {
  constructor(readonly source: string, detail: string) {
    super(`Source ${source} returned an invalid result: ${detail}`);
  }
}

export class RouteCancelledError extends RoutingError {
  constructor() {
    super("Routing was cancelled by the caller");
  }
}

export class RoutingDeadlineError extends RoutingError {
  constructor(readonly timeoutMs: number) {
    super(`Routing deadline of ${timeoutMs}ms reached`);
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === "string" ? value : JSON.stringify(value));
}

export function describeError(value: unknown): string {
  return toError(value).message;
}
