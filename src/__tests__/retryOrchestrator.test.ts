import { describe, it, expect } from "vitest";
import type { BatchHooks, BatchItem, GenerateFn, ItemState } from "../batch/batchTypes.js";
import { RetryOrchestrator } from "../batch/retryOrchestrator.js";
import { RunStatsRecorder } from "../batch/runStats.js";
import { GenerationError } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import { RingBufferSink } from "../logging/sinks.js";
import { AdaptiveConcurrencyLimiter } from "../resilience/adaptiveConcurrencyLimiter.js";
import { TokenBucketLimiter } from "../resilience/tokenBucketLimiter.js";
import { fakeTime } from "./__mocks__/fakeTime.js";

const item: BatchItem = { prompt: "a lighthouse at dusk", output: "/tmp/out/001.png" };

function setup(generate: GenerateFn<string>, opts: { exists?: boolean; hooks?: BatchHooks<string>; maxRetries?: number } = {}) {
  const time = fakeTime();
  const sink = new RingBufferSink(100);
  const concurrency = new AdaptiveConcurrencyLimiter({ max: 4 });
  const stats = new RunStatsRecorder(1);
  const orchestrator = new RetryOrchestrator(item, 0, {
    concurrency,
    rpm: new TokenBucketLimiter({ maxPerMinute: 100, now: time.now, sleep: time.sleep }),
    generate,
    exists: async () => opts.exists ?? false,
    stats,
    policy: { maxRetries: opts.maxRetries ?? 5, baseDelayMs: 2000 },
    skipExisting: true,
    logger: createLogger({ level: "debug", sinks: [sink] }),
    hooks: opts.hooks,
    sleep: time.sleep
  });
  return { orchestrator, time, sink, concurrency, stats };
}

describe("RetryOrchestrator", () => {
  it("walks in_flight -> backoff -> in_flight -> succeeded", async () => {
    const states: string[] = [];
    let calls = 0;
    const { orchestrator, concurrency } = setup(
      async () => {
        calls++;
        if (calls === 1) throw new GenerationError("service_overloaded", "busy", { status: 503 });
        return "ok";
      },
      { hooks: { onStateChange: (_, prev: ItemState, next: ItemState) => states.push(`${prev}->${next}`) } }
    );
    const outcome = await orchestrator.run();
    expect(outcome).toEqual({ status: "succeeded", result: "ok" });
    expect(states).toEqual(["pending->in_flight", "in_flight->backoff", "backoff->in_flight", "in_flight->succeeded"]);
    expect(orchestrator.status()).toBe("succeeded");
    expect(concurrency.inFlight()).toBe(0);
  });

  it("logs each retry with its delay", async () => {
    let calls = 0;
    const { orchestrator, sink } = setup(async () => {
      calls++;
      if (calls < 3) throw new GenerationError("rate_limited", "quota", { status: 429 });
      return "ok";
    });
    await orchestrator.run();
    const retries = sink.entries().filter((e) => e.msg === "batch.item.rate_limited");
    expect(retries.map((e) => e.context?.delayMs)).toEqual([2000, 4000]);
    expect(retries[0].context).toEqual({
      item: 0,
      output: "/tmp/out/001.png",
      retry: 1,
      maxRetries: 5,
      delayMs: 2000,
      status: 429
    });
    expect(sink.messages()).toContain("batch.item.succeeded");
  });

  it("skips without calling generate when the output exists", async () => {
    let calls = 0;
    const { orchestrator, stats } = setup(
      async () => {
        calls++;
        return "ok";
      },
      { exists: true }
    );
    expect(await orchestrator.run()).toEqual({ status: "skipped" });
    expect(calls).toBe(0);
    expect(stats.snapshot().skipped).toBe(1);
  });

  it("fails at once on a non-retryable error", async () => {
    const failure = new GenerationError("other", "prompt rejected");
    const { orchestrator, time, sink } = setup(async () => {
      throw failure;
    });
    expect(await orchestrator.run()).toEqual({ status: "failed", error: failure });
    expect(time.sleeps).toEqual([]);
    const failed = sink.entries().find((e) => e.msg === "batch.item.failed");
    expect(failed?.context).toEqual({
      item: 0,
      output: "/tmp/out/001.png",
      kind: "other",
      error: "prompt rejected",
      attempts: 1
    });
  });

  it("reports exhaustion after maxRetries attempts", async () => {
    const { orchestrator, time, sink, stats } = setup(
      async () => {
        throw new GenerationError("service_overloaded", "busy");
      },
      { maxRetries: 2 }
    );
    const outcome = await orchestrator.run();
    expect(outcome.status).toBe("failed");
    expect(time.sleeps).toEqual([2000, 4000]);
    expect(sink.entries().find((e) => e.msg === "batch.item.exhausted")?.context?.attempts).toBe(2);
    expect(stats.snapshot()).toEqual({ total: 1, successful: 0, failed: 1, skipped: 0, rateLimited: 0 });
  });

  it("ignores a throwing hook", async () => {
    const { orchestrator, sink } = setup(async () => "ok", {
      hooks: {
        onSuccess: () => {
          throw new Error("hook broke");
        }
      }
    });
    expect(await orchestrator.run()).toEqual({ status: "succeeded", result: "ok" });
    const hookError = sink.entries().find((e) => e.msg === "batch.hook.error");
    expect(hookError?.context?.error).toBe("hook broke");
  });
});
