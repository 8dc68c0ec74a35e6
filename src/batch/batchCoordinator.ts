import { BatchCancelledError, errorMessage, ValidationError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { AdaptiveConcurrencyLimiter } from "../resilience/adaptiveConcurrencyLimiter.js";
import { TokenBucketLimiter } from "../resilience/tokenBucketLimiter.js";
import { fileExists } from "../storage/outputStore.js";
import type { Sleeper } from "../util/time.js";
import {
  DEFAULT_RETRY_POLICY,
  type BatchItem,
  type BatchOptions,
  type BatchOutcome,
  type ExistsFn,
  type GenerateFn,
  type RetryPolicy
} from "./batchTypes.js";
import { RetryOrchestrator } from "./retryOrchestrator.js";
import { RunStatsRecorder } from "./runStats.js";

export type BatchCollaborators<R> = {
  generate: GenerateFn<R>;
  /** Defaults to a filesystem check on the item's output path. */
  exists?: ExistsFn;
};

export type BatchRuntime = {
  logger?: Logger;
  now?: () => number;
  sleep?: Sleeper;
  random?: () => number;
};

/**
 * Fans a list of items out to one RetryOrchestrator each, sharing a single
 * adaptive concurrency window and RPM bucket, and fans the outcomes back in.
 * Limiters and stats live for one runBatch call only.
 */
export class BatchCoordinator<R> {
  private logger: Logger;

  constructor(private collaborators: BatchCollaborators<R>, private runtime: BatchRuntime = {}) {
    this.logger = runtime.logger ?? silentLogger;
  }

  async runBatch(items: readonly BatchItem[], opts: BatchOptions<R>): Promise<BatchOutcome<R>> {
    const policy = resolvePolicy(opts.retry);
    validate(opts, policy);
    const stats = new RunStatsRecorder(items.length);
    if (opts.signal?.aborted) throw new BatchCancelledError<R>(stats.snapshot(), [], { cause: opts.signal.reason });

    const hooks = opts.hooks;
    const concurrency = new AdaptiveConcurrencyLimiter({
      max: opts.concurrencyLimit,
      min: Math.min(opts.minConcurrency ?? 2, opts.concurrencyLimit),
      logger: this.logger,
      onResize: hooks?.onWindowResize ? this.guardResize(hooks.onWindowResize) : undefined
    });
    const rpm = new TokenBucketLimiter({
      maxPerMinute: opts.rpmLimit,
      pollIntervalMs: opts.rpmPollIntervalMs,
      now: this.runtime.now,
      sleep: this.runtime.sleep
    });

    this.logger.info("batch.start", {
      total: items.length,
      concurrencyLimit: opts.concurrencyLimit,
      initialWindow: concurrency.current(),
      rpmLimit: opts.rpmLimit,
      maxRetries: policy.maxRetries
    });

    const frozen = items.map((item) => Object.freeze({ ...item }));
    const outcomes = await Promise.all(
      frozen.map((item, index) =>
        new RetryOrchestrator(item, index, {
          concurrency,
          rpm,
          generate: this.collaborators.generate,
          exists: this.collaborators.exists ?? fileExists,
          stats,
          policy,
          skipExisting: opts.skipExisting ?? true,
          logger: this.logger,
          hooks,
          signal: opts.signal,
          sleep: this.runtime.sleep,
          random: this.runtime.random
        }).run()
      )
    );

    const results: R[] = [];
    for (const o of outcomes) if (o.status === "succeeded") results.push(o.result);
    const snapshot = stats.snapshot();

    if (opts.signal?.aborted) {
      this.logger.warn("batch.cancelled", { ...snapshot, unfinished: snapshot.total - stats.finished() });
      throw new BatchCancelledError(snapshot, results, { cause: opts.signal.reason });
    }

    this.logger.info("batch.complete", { ...snapshot, finalWindow: concurrency.current() });
    return { results, stats: snapshot };
  }

  // The limiter calls this mid-attempt; a throwing hook must not reach the item.
  private guardResize(hook: (from: number, to: number) => void) {
    return (from: number, to: number) => {
      try {
        hook(from, to);
      } catch (err) {
        this.logger.warn("batch.hook.error", { hook: "onWindowResize", error: errorMessage(err) });
      }
    };
  }
}

export function resolvePolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxRetries: overrides.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries,
    baseDelayMs: overrides.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: overrides.maxDelayMs,
    jitterRatio: overrides.jitterRatio
  };
}

function validate<R>(opts: BatchOptions<R>, policy: RetryPolicy) {
  if (!Number.isInteger(opts.concurrencyLimit) || opts.concurrencyLimit < 1) {
    throw new ValidationError("concurrencyLimit must be an integer >= 1");
  }
  if (!(opts.rpmLimit > 0)) throw new ValidationError("rpmLimit must be > 0");
  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 1) {
    throw new ValidationError("maxRetries must be an integer >= 1");
  }
  if (!(policy.baseDelayMs >= 0)) throw new ValidationError("baseDelayMs must be >= 0");
}

export type RunBatchOptions<R> = BatchOptions<R> & BatchCollaborators<R> & BatchRuntime;

/** One-shot form of BatchCoordinator.runBatch. */
export function runBatch<R>(items: readonly BatchItem[], opts: RunBatchOptions<R>): Promise<BatchOutcome<R>> {
  const { generate, exists, logger, now, sleep, random, ...batchOpts } = opts;
  return new BatchCoordinator<R>({ generate, exists }, { logger, now, sleep, random }).runBatch(items, batchOpts);
}
