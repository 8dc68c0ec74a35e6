import type { RunStats } from "./batchTypes.js";

/**
 * Shared counters for one batch. Every increment is a synchronous statement,
 * so concurrent item tasks cannot interleave inside one.
 */
export class RunStatsRecorder {
  private stats: RunStats;

  constructor(total: number) {
    this.stats = { total, successful: 0, failed: 0, skipped: 0, rateLimited: 0 };
  }

  recordSuccess() { this.terminal("successful"); }
  recordFailure() { this.terminal("failed"); }
  recordSkip() { this.terminal("skipped"); }

  recordRateLimited() {
    this.stats.rateLimited++;
  }

  finished() {
    return this.stats.successful + this.stats.failed + this.stats.skipped;
  }

  snapshot(): RunStats {
    return { ...this.stats };
  }

  private terminal(key: "successful" | "failed" | "skipped") {
    if (this.finished() >= this.stats.total) throw new Error(`RunStats overflow: ${key} beyond total ${this.stats.total}`);
    this.stats[key]++;
  }
}
