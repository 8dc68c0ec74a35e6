import type { LogEntry } from "../types.js";

export interface LogSink {
  write(entry: LogEntry): void;
}

export type ConsoleFormat = "pretty" | "json";

/**
 * Writes to stderr so stdout stays free for command output.
 */
export class ConsoleSink implements LogSink {
  constructor(
    private format: ConsoleFormat = "pretty",
    private target: NodeJS.WritableStream = process.stderr
  ) {}

  write(entry: LogEntry) {
    const line = this.format === "json" ? JSON.stringify(entry) : formatPretty(entry);
    this.target.write(line + "\n");
  }
}

export function formatPretty(entry: LogEntry): string {
  const head = `${entry.ts} ${entry.level.toUpperCase().padEnd(5)} ${entry.msg}`;
  if (!entry.context) return head;
  const fields = Object.entries(entry.context).map(([k, v]) => `${k}=${typeof v === "string" ? v : JSON.stringify(v)}`);
  return `${head} ${fields.join(" ")}`;
}

export class RingBufferSink implements LogSink {
  private buf: LogEntry[] = [];
  constructor(private capacity: number) {
    if (capacity <= 0) throw new Error("RingBufferSink.capacity must be > 0");
  }
  write(entry: LogEntry) {
    if (this.buf.length === this.capacity) this.buf.shift();
    this.buf.push(entry);
  }
  entries() {
    return this.buf.slice();
  }
  messages() {
    return this.buf.map((e) => e.msg);
  }
}
