import type { Logger } from "../logging/logger.js";

export type ShutdownPhase = {
  name: string;
  fn: () => Promise<void> | void;
  timeoutMs?: number;
};

export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

/**
 * Ordered teardown run once, on the first signal or explicit execute().
 */
export class ShutdownManager {
  private phases: ShutdownPhase[] = [];
  private running?: Promise<void>;

  constructor(private logger: Logger) {}

  register(phase: ShutdownPhase) {
    this.phases.push(phase);
    return this;
  }

  execute(): Promise<void> {
    if (!this.running) this.running = this.runPhases();
    return this.running;
  }

  /** Runs execute() on any of `signals`; returns a function that unhooks them. */
  onSignals(signals: NodeJS.Signals[], proc: SignalSource = process) {
    const handler = (signal: NodeJS.Signals) => {
      this.logger.warn("shutdown.signal", { signal });
      void this.execute();
    };
    for (const s of signals) proc.on(s, handler);
    return () => {
      for (const s of signals) proc.off(s, handler);
    };
  }

  private async runPhases() {
    for (const p of this.phases) {
      const start = Date.now();
      this.logger.info("shutdown.phase.start", { name: p.name });
      const to = p.timeoutMs ?? 5000;
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<"timeout">((resolve) => {
        timer = setTimeout(() => resolve("timeout"), to);
      });
      try {
        const outcome = await Promise.race([Promise.resolve().then(p.fn).then(() => "done" as const), timeout]);
        this.logger.info("shutdown.phase.done", { name: p.name, ms: Date.now() - start, timedOut: outcome === "timeout" });
      } catch (e) {
        this.logger.error("shutdown.phase.error", { name: p.name, error: e instanceof Error ? e.message : String(e) });
      } finally {
        clearTimeout(timer);
      }
    }
  }
}
