import { ValidationError } from "../errors.js";
import { sleep, type Sleeper } from "../util/time.js";

export type TokenBucketOptions = {
  maxPerMinute: number;
  /** Tokens in the bucket at construction; defaults to a full bucket. */
  initialCapacity?: number;
  pollIntervalMs?: number;
  now?: () => number; // ms epoch
  sleep?: Sleeper;
};

/**
 * Requests-per-minute gate. Capacity refills continuously and is consumed in
 * whole tokens; a caller that finds less than one token polls until it can
 * take one.
 */
export class TokenBucketLimiter {
  private capacity: number;
  private lastRefill: number;
  private readonly maxPerMinute: number;
  // Below 1 rpm the bucket still has to hold one whole token.
  private readonly ceiling: number;
  private readonly pollIntervalMs: number;
  private nowFn: () => number;
  private sleepFn: Sleeper;

  constructor(opts: TokenBucketOptions) {
    if (!(opts.maxPerMinute > 0)) throw new ValidationError("maxPerMinute must be > 0");
    const poll = opts.pollIntervalMs ?? 100;
    if (!(poll > 0)) throw new ValidationError("pollIntervalMs must be > 0");
    this.maxPerMinute = opts.maxPerMinute;
    this.ceiling = Math.max(1, opts.maxPerMinute);
    this.pollIntervalMs = poll;
    this.nowFn = opts.now ?? (() => Date.now());
    this.sleepFn = opts.sleep ?? sleep;
    this.capacity = Math.min(this.ceiling, Math.max(0, opts.initialCapacity ?? this.ceiling));
    this.lastRefill = this.nowFn();
  }

  /** Resolves once a token has been consumed. No upper bound on the wait. */
  async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      signal?.throwIfAborted();
      if (this.tryTake()) return;
      await this.sleepFn(this.pollIntervalMs, signal);
    }
  }

  // Refill and consume stay in one synchronous block: no await between them.
  tryTake(): boolean {
    this.refill();
    if (this.capacity >= 1) {
      this.capacity -= 1;
      return true;
    }
    return false;
  }

  available(): number {
    this.refill();
    return this.capacity;
  }

  limit() {
    return this.maxPerMinute;
  }

  private refill() {
    const now = this.nowFn();
    const elapsed = Math.max(0, now - this.lastRefill);
    this.capacity = Math.min(this.ceiling, this.capacity + (this.maxPerMinute * elapsed) / 60_000);
    this.lastRefill = now;
  }
}
