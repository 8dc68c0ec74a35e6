import { classifyError, errorMessage, GenerationError, isRetryable } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { AdaptiveConcurrencyLimiter } from "../resilience/adaptiveConcurrencyLimiter.js";
import type { TokenBucketLimiter } from "../resilience/tokenBucketLimiter.js";
import { exponentialBackoff, jittered, type BackoffStrategy } from "../util/backoff.js";
import { sleep, type Sleeper } from "../util/time.js";
import type {
  AttemptRecord,
  BatchHooks,
  BatchItem,
  ExistsFn,
  GenerateFn,
  ItemOutcome,
  ItemState,
  RetryPolicy
} from "./batchTypes.js";
import type { RunStatsRecorder } from "./runStats.js";

export type OrchestratorDeps<R> = {
  concurrency: AdaptiveConcurrencyLimiter;
  rpm: TokenBucketLimiter;
  generate: GenerateFn<R>;
  exists: ExistsFn;
  stats: RunStatsRecorder;
  policy: RetryPolicy;
  skipExisting: boolean;
  logger: Logger;
  hooks?: BatchHooks<R>;
  signal?: AbortSignal;
  sleep?: Sleeper;
  random?: () => number;
};

type AttemptResult<R> = { ok: true; result: R } | { ok: false; error: GenerationError };

/**
 * Drives one batch item to a terminal state:
 *
 *   pending -> skipped
 *   pending -> in_flight -> succeeded | failed
 *   in_flight -> backoff -> in_flight ... (rate_limited / service_overloaded)
 *
 * A concurrency permit is held only while in_flight and is released on every
 * way out of it.
 */
export class RetryOrchestrator<R> {
  private state: ItemState = "pending";
  private readonly log: Logger;
  private readonly backoff: BackoffStrategy;
  private readonly sleep: Sleeper;

  constructor(private readonly item: BatchItem, index: number, private readonly deps: OrchestratorDeps<R>) {
    this.log = deps.logger.child({ item: index, output: item.output });
    const { baseDelayMs, maxDelayMs, jitterRatio } = deps.policy;
    this.backoff = jittered(exponentialBackoff(baseDelayMs, 2, maxDelayMs), jitterRatio ?? 0, deps.random);
    this.sleep = deps.sleep ?? sleep;
  }

  status(): ItemState {
    return this.state;
  }

  async run(): Promise<ItemOutcome<R>> {
    try {
      return await this.drive();
    } catch (err) {
      if (!this.deps.signal?.aborted) throw err;
      this.transition("cancelled");
      this.log.debug("batch.item.cancelled");
      return { status: "cancelled" };
    }
  }

  private async drive(): Promise<ItemOutcome<R>> {
    const { item, deps } = this;

    if (deps.skipExisting) {
      let exists: boolean;
      try {
        exists = await deps.exists(item.output);
      } catch (err) {
        if (deps.signal?.aborted) throw err;
        return this.fail(classifyError(err), 0, false);
      }
      if (exists) return this.skip();
    }

    const attempt: AttemptRecord = { attemptIndex: 0 };
    let lastError: GenerationError | undefined;
    while (attempt.attemptIndex < deps.policy.maxRetries) {
      const res = await this.attemptOnce();
      if (res.ok) return this.succeed(res.result, attempt.attemptIndex + 1);

      const { error } = res;
      lastError = error;
      attempt.lastError = error.kind;
      if (!isRetryable(error.kind)) return this.fail(error, attempt.attemptIndex + 1, false);

      const delayMs = this.backoff(attempt.attemptIndex);
      this.log.warn(error.kind === "rate_limited" ? "batch.item.rate_limited" : "batch.item.overloaded", {
        retry: attempt.attemptIndex + 1,
        maxRetries: deps.policy.maxRetries,
        delayMs,
        status: error.status
      });
      this.notify((h) => h.onRetry?.(item, error.kind, attempt.attemptIndex + 1, delayMs));
      this.transition("backoff");
      await this.sleep(delayMs, deps.signal);
      attempt.attemptIndex++;
    }

    return this.fail(lastError ?? new GenerationError("other", "no attempts were made"), attempt.attemptIndex, true);
  }

  private async attemptOnce(): Promise<AttemptResult<R>> {
    const { item, deps } = this;
    // Concurrency admission gates rate admission.
    await deps.concurrency.acquire(deps.signal);
    try {
      let result: R;
      try {
        await deps.rpm.acquire(deps.signal);
        this.transition("in_flight");
        result = await deps.generate({
          prompt: item.prompt,
          output: item.output,
          config: item.config,
          signal: deps.signal
        });
      } catch (err) {
        if (deps.signal?.aborted) throw err;
        const error = classifyError(err);
        if (error.kind === "rate_limited") {
          deps.stats.recordRateLimited();
          deps.concurrency.reportRateLimited();
        }
        return { ok: false, error };
      }
      deps.concurrency.reportSuccess();
      return { ok: true, result };
    } finally {
      deps.concurrency.release();
    }
  }

  private succeed(result: R, attempts: number): ItemOutcome<R> {
    this.transition("succeeded");
    this.deps.stats.recordSuccess();
    this.log.info("batch.item.succeeded", { attempts });
    this.notify((h) => h.onSuccess?.(this.item, result));
    return { status: "succeeded", result };
  }

  private fail(error: GenerationError, attempts: number, exhausted: boolean): ItemOutcome<R> {
    this.transition("failed");
    this.deps.stats.recordFailure();
    this.log.error(exhausted ? "batch.item.exhausted" : "batch.item.failed", {
      kind: error.kind,
      error: error.message,
      attempts
    });
    this.notify((h) => h.onFailure?.(this.item, error));
    return { status: "failed", error };
  }

  private skip(): ItemOutcome<R> {
    this.transition("skipped");
    this.deps.stats.recordSkip();
    this.log.info("batch.item.skipped");
    this.notify((h) => h.onSkip?.(this.item));
    return { status: "skipped" };
  }

  private transition(next: ItemState) {
    const prev = this.state;
    if (prev === next) return;
    this.state = next;
    this.notify((h) => h.onStateChange?.(this.item, prev, next));
  }

  // Hooks are advisory; a throwing hook must not change the item's outcome.
  private notify(fn: (hooks: BatchHooks<R>) => void) {
    const hooks = this.deps.hooks;
    if (!hooks) return;
    try {
      fn(hooks);
    } catch (err) {
      this.log.warn("batch.hook.error", { error: errorMessage(err) });
    }
  }
}
