import type { RunStats } from "./batch/batchTypes.js";

export type ErrorKind = "rate_limited" | "service_overloaded" | "other";

export class ImageBatchError extends Error {
  constructor(readonly code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Failure of a single generation call, tagged with how the retry loop should
 * treat it.
 */
export class GenerationError extends ImageBatchError {
  readonly status?: number | string;

  constructor(readonly kind: ErrorKind, message: string, options: { status?: number | string; cause?: unknown } = {}) {
    super("GENERATION_" + kind.toUpperCase(), message, { cause: options.cause });
    this.status = options.status;
  }
}

export class ValidationError extends ImageBatchError {
  constructor(message: string) {
    super("VALIDATION", message);
  }
}

export class UsageError extends ImageBatchError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

export class ConfigError extends ImageBatchError {
  constructor(readonly issues: string[]) {
    super("CONFIG", "Invalid configuration: " + issues.join("; "));
  }
}

export class ProfileNotFoundError extends ImageBatchError {
  constructor(readonly profileId: string, readonly dir: string) {
    super("PROFILE_NOT_FOUND", `Profile '${profileId}' not found in ${dir}`);
  }
}

export class BatchCancelledError<R = unknown> extends ImageBatchError {
  constructor(readonly stats: RunStats, readonly results: R[], options?: { cause?: unknown }) {
    super("BATCH_CANCELLED", "Batch cancelled", options);
  }
}

export function isRetryable(kind: ErrorKind): boolean {
  return kind !== "other";
}

const RATE_LIMIT_STATUSES = new Set<number | string>([429, "RESOURCE_EXHAUSTED"]);
const OVERLOAD_STATUSES = new Set<number | string>([500, 502, 503, 504, "UNAVAILABLE", "INTERNAL"]);

/**
 * Maps anything thrown at the generation boundary onto a GenerationError.
 * Only structured status fields are consulted; messages are carried through
 * unchanged.
 */
export function classifyError(err: unknown): GenerationError {
  if (err instanceof GenerationError) return err;
  const status = readStatus(err);
  const message = err instanceof Error ? err.message : String(err);
  if (status !== undefined && RATE_LIMIT_STATUSES.has(status)) {
    return new GenerationError("rate_limited", message, { status, cause: err });
  }
  if (status !== undefined && OVERLOAD_STATUSES.has(status)) {
    return new GenerationError("service_overloaded", message, { status, cause: err });
  }
  return new GenerationError("other", message, { status, cause: err });
}

function readStatus(err: unknown): number | string | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  const { status } = err;
  return typeof status === "number" || typeof status === "string" ? status : undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
