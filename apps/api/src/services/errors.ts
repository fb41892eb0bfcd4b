// Base error for everything the fact-check service throws on purpose
export class FactCheckError extends Error {
  constructor(message: string, public readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FactCheckError";
  }
}

// Request/input shape problems, raised before a run starts
export class ValidationError extends FactCheckError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class ConfigError extends FactCheckError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

/**
 * Failure of the text-generation collaborator.
 * `systemic` marks a provider that cannot serve any request (unreachable,
 * missing or rejected credentials); such errors end the whole run.
 */
export class GenerationError extends FactCheckError {
  public readonly stage?: string;
  public readonly status?: number;
  public readonly systemic: boolean;

  constructor(
    message: string,
    opts: { stage?: string; status?: number; systemic?: boolean; cause?: unknown } = {}
  ) {
    super(message, "GENERATION_ERROR", { cause: opts.cause });
    this.name = "GenerationError";
    this.stage = opts.stage;
    this.status = opts.status;
    this.systemic = opts.systemic ?? false;
  }
}

export class SearchError extends FactCheckError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, "SEARCH_ERROR", options);
    this.name = "SearchError";
  }
}

export class TimeoutError extends FactCheckError {
  constructor(public readonly label: string, public readonly ms: number) {
    super(`${label} timed out after ${ms}ms`, "TIMEOUT");
    this.name = "TimeoutError";
  }
}

// Raised inside a run once its caller has gone away
export class CancelledError extends FactCheckError {
  constructor(message = "Run cancelled") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}

export class IllegalTransitionError extends FactCheckError {
  constructor(public readonly from: string, public readonly to: string) {
    super(`Illegal pipeline transition ${from} -> ${to}`, "ILLEGAL_TRANSITION");
    this.name = "IllegalTransitionError";
  }
}

export function isSystemic(e: unknown): boolean {
  return e instanceof GenerationError && e.systemic;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return typeof e === "string" ? e : "Unknown error";
}
