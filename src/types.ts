export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";
export type LogEntry = {
  ts: string;
  level: LogLevel;
  msg: string;
  context?: Record<string, unknown>;
};

/** A generated image written to disk. */
export type ImageResult = {
  path: string;
  width: number;
  height: number;
  prompt: string;
  generationTimeMs: number;
  model: string;
  aspectRatio: string;
  mimeType: string;
};
