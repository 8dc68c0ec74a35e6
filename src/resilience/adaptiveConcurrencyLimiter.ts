import { ValidationError } from "../errors.js";
import type { Logger } from "../logging/logger.js";

export type AdaptiveConcurrencyOptions = {
  max: number;
  min?: number;
  /** Starting window; defaults to min(max, 8). */
  initial?: number;
  /** Consecutive successes needed to grow the window by one. */
  growEvery?: number;
  shrinkBy?: number;
  onResize?: (from: number, to: number) => void;
  logger?: Logger;
};

export type ConcurrencySnapshot = {
  current: number;
  min: number;
  max: number;
  inFlight: number;
  available: number;
  waiting: number;
  consecutiveSuccesses: number;
};

type Waiter = { grant: () => void };

/**
 * Counting permit pool whose size follows success and rate-limit signals.
 *
 * `target` is the logical window. Permits in circulation (`idle + held`) may
 * briefly exceed it after a shrink while callers still hold permits; those are
 * retired as they are released instead of being handed out again.
 */
export class AdaptiveConcurrencyLimiter {
  private target: number;
  private idle: number;
  private held = 0;
  private successes = 0;
  private waiters: Waiter[] = [];
  private readonly min: number;
  private readonly max: number;
  private readonly growEvery: number;
  private readonly shrinkBy: number;

  constructor(private opts: AdaptiveConcurrencyOptions) {
    const min = opts.min ?? 2;
    if (!Number.isInteger(opts.max) || opts.max < 1) throw new ValidationError("max must be an integer >= 1");
    if (!Number.isInteger(min) || min < 1 || min > opts.max) throw new ValidationError(`min must be an integer in [1, ${opts.max}]`);
    this.min = min;
    this.max = opts.max;
    this.growEvery = Math.max(1, opts.growEvery ?? 10);
    this.shrinkBy = Math.max(1, opts.shrinkBy ?? 2);
    this.target = clamp(opts.initial ?? Math.min(opts.max, 8), this.min, this.max);
    this.idle = this.target;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (this.idle > 0 && this.waiters.length === 0) {
      this.idle--;
      this.held++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          this.held++;
          resolve();
        }
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  release() {
    if (this.held <= 0) throw new Error("release() without a matching acquire()");
    this.held--;
    // Over target: retire this permit instead of recirculating it.
    if (this.held + this.idle >= this.target) return;
    this.dispatch();
  }

  reportSuccess() {
    this.successes++;
    if (this.successes % this.growEvery === 0) this.grow();
  }

  reportRateLimited() {
    this.successes = 0;
    const from = this.target;
    const to = Math.max(this.min, from - this.shrinkBy);
    if (to === from) return;
    this.target = to;
    const excess = this.held + this.idle - this.target;
    this.idle -= Math.min(this.idle, Math.max(0, excess));
    this.opts.logger?.warn("limiter.window.shrink", { from, to, inFlight: this.held });
    this.opts.onResize?.(from, to);
  }

  current() { return this.target; }
  inFlight() { return this.held; }
  available() { return this.idle; }
  waiting() { return this.waiters.length; }

  snapshot(): ConcurrencySnapshot {
    return {
      current: this.target,
      min: this.min,
      max: this.max,
      inFlight: this.held,
      available: this.idle,
      waiting: this.waiters.length,
      consecutiveSuccesses: this.successes
    };
  }

  private grow() {
    if (this.target >= this.max) return;
    const from = this.target;
    this.target = from + 1;
    if (this.held + this.idle < this.target) this.dispatch();
    this.opts.logger?.info("limiter.window.grow", { from, to: this.target });
    this.opts.onResize?.(from, this.target);
  }

  private dispatch() {
    const next = this.waiters.shift();
    if (next) next.grant();
    else this.idle++;
  }
}

function clamp(n: number, lo: number, hi: number) {
  return Math.min(hi, Math.max(lo, n));
}
