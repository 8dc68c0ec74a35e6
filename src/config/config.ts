import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { DEFAULT_MODEL } from "../generation/imageConfig.js";
import type { ConsoleFormat } from "../logging/sinks.js";
import { isNodeError } from "../storage/outputStore.js";
import type { LogLevel } from "../types.js";
import { ms } from "../util/time.js";

export class Config {
  private data: Record<string, unknown> = {};
  private frozen = false;

  loadEnv(keys: readonly string[], env: NodeJS.ProcessEnv = process.env) {
    this.assertNotFrozen();
    for (const k of keys) {
      if (env[k] !== undefined) this.data[k] = env[k];
    }
    return this;
  }

  /** Reads a .env file into the store; process.env is left untouched. */
  loadDotenv(path = ".env") {
    this.assertNotFrozen();
    const target: Record<string, string> = {};
    const res = dotenv.config({ path, processEnv: target });
    if (res.error) {
      if (isNodeError(res.error) && res.error.code === "ENOENT") return this;
      throw res.error;
    }
    Object.assign(this.data, target);
    return this;
  }

  merge(obj: Record<string, unknown>) {
    this.assertNotFrozen();
    Object.assign(this.data, obj);
    return this;
  }

  get(key: string): unknown {
    return this.data[key];
  }

  all(): Record<string, unknown> {
    return { ...this.data };
  }

  freeze() {
    this.frozen = true;
    return this;
  }

  isFrozen() { return this.frozen; }

  private assertNotFrozen() {
    if (this.frozen) throw new Error("Config is frozen");
  }
}

const duration = z.union([z.number().nonnegative(), z.string()]).transform((v, ctx) => {
  if (typeof v === "number") return v;
  try {
    return ms(v);
  } catch (e) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: e instanceof Error ? e.message : String(e) });
    return z.NEVER;
  }
});

const logLevel = z.enum(["trace", "debug", "info", "warn", "error"]);

const SettingsSchema = z.object({
  GOOGLE_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  MAX_CONCURRENT: z.coerce.number().int().min(1).default(15),
  RPM_LIMIT: z.coerce.number().positive().default(50),
  MAX_RETRIES: z.coerce.number().int().min(1).default(5),
  RETRY_BASE_DELAY: duration.default("2s"),
  PROFILES_DIR: z.string().min(1).default("profiles"),
  OUTPUT_DIR: z.string().min(1).default("output"),
  LOG_LEVEL: logLevel.default("info"),
  LOG_FORMAT: z.enum(["pretty", "json"]).default("pretty")
});

export const SETTINGS_KEYS = Object.keys(SettingsSchema.shape);

export type Settings = {
  apiKey?: string;
  model: string;
  maxConcurrent: number;
  rpmLimit: number;
  maxRetries: number;
  baseDelayMs: number;
  profilesDir: string;
  outputDir: string;
  logLevel: LogLevel;
  logFormat: ConsoleFormat;
};

export function resolveSettings(config: Config): Settings {
  const parsed = SettingsSchema.safeParse(config.all());
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const d = parsed.data;
  return {
    apiKey: d.GOOGLE_API_KEY,
    model: d.GEMINI_MODEL,
    maxConcurrent: d.MAX_CONCURRENT,
    rpmLimit: d.RPM_LIMIT,
    maxRetries: d.MAX_RETRIES,
    baseDelayMs: d.RETRY_BASE_DELAY,
    profilesDir: d.PROFILES_DIR,
    outputDir: d.OUTPUT_DIR,
    logLevel: d.LOG_LEVEL,
    logFormat: d.LOG_FORMAT
  };
}

export type LoadSettingsOptions = {
  envFile?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Record<string, unknown>;
};

/** .env first, then the process environment, then explicit overrides. */
export function loadSettings(opts: LoadSettingsOptions = {}): Settings {
  const config = new Config()
    .loadDotenv(opts.envFile)
    .loadEnv(SETTINGS_KEYS, opts.env)
    .merge(opts.overrides ?? {})
    .freeze();
  return resolveSettings(config);
}
