import type { ErrorKind, GenerationError } from "../errors.js";
import type { ImageConfig } from "../generation/imageConfig.js";

export type BatchItem = Readonly<{
  prompt: string;
  output: string;
  config?: Partial<ImageConfig>;
}>;

export type ItemState =
  | "pending"
  | "in_flight"
  | "backoff"
  | "succeeded"
  | "failed"
  | "skipped"
  | "cancelled";

export type RunStats = {
  total: number;
  successful: number;
  failed: number;
  skipped: number;
  rateLimited: number;
};

export type AttemptRecord = {
  attemptIndex: number;
  lastError?: ErrorKind;
};

export type GenerateRequest = {
  prompt: string;
  output: string;
  config?: Partial<ImageConfig>;
  signal?: AbortSignal;
};

/** Must throw GenerationError (or something classifyError understands) on failure. */
export type GenerateFn<R> = (request: GenerateRequest) => Promise<R>;
export type ExistsFn = (output: string) => Promise<boolean>;

export type RetryPolicy = {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  jitterRatio?: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxRetries: 5, baseDelayMs: 2000 };

export type BatchHooks<R> = {
  onWindowResize?: (from: number, to: number) => void;
  onRetry?: (item: BatchItem, kind: ErrorKind, attempt: number, delayMs: number) => void;
  onSuccess?: (item: BatchItem, result: R) => void;
  onFailure?: (item: BatchItem, error: GenerationError) => void;
  onSkip?: (item: BatchItem) => void;
  onStateChange?: (item: BatchItem, prev: ItemState, next: ItemState) => void;
};

export type BatchOptions<R> = {
  concurrencyLimit: number;
  rpmLimit: number;
  skipExisting?: boolean;
  /** Floor of the adaptive window; lowered to concurrencyLimit when larger. */
  minConcurrency?: number;
  rpmPollIntervalMs?: number;
  retry?: Partial<RetryPolicy>;
  signal?: AbortSignal;
  hooks?: BatchHooks<R>;
};

export type ItemOutcome<R> =
  | { status: "succeeded"; result: R }
  | { status: "failed"; error: GenerationError }
  | { status: "skipped" }
  | { status: "cancelled" };

export type BatchOutcome<R> = {
  results: R[];
  stats: RunStats;
};
