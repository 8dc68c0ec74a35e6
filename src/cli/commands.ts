import { basename, join, resolve } from "node:path";
import { BatchCoordinator, type BatchRuntime } from "../batch/batchCoordinator.js";
import type { Settings } from "../config/config.js";
import { BatchCancelledError, ConfigError, errorMessage, UsageError } from "../errors.js";
import { GeminiImageClient } from "../generation/geminiClient.js";
import { generateImage } from "../generation/generator.js";
import { ASPECT_RATIOS, DEFAULT_IMAGE_CONFIG } from "../generation/imageConfig.js";
import { applyProfile, formatPrompt, listProfiles, loadProfile } from "../generation/profiles.js";
import type { Logger } from "../logging/logger.js";
import { fileExists, loadPromptsFile } from "../storage/outputStore.js";
import type { ImageResult } from "../types.js";
import { parseArgs } from "./args.js";

type Flags = Record<string, string | boolean>;
type ImageGenerator = Pick<GeminiImageClient, "generate">;

export type CliContext = {
  settings: Settings;
  logger: Logger;
  out: (line: string) => void;
  err: (line: string) => void;
  signal?: AbortSignal;
  createClient?: (settings: Settings, logger: Logger) => ImageGenerator;
  runtime?: Omit<BatchRuntime, "logger">;
};

export const HELP_TEXT = `imagebatch - Gemini image generation with adaptive rate limiting

Usage: imagebatch <command> [options]

Commands:
  generate <prompt>            Generate a single image
  batch <prompts.json>         Generate every prompt in a JSON file
  profiles                     List available profiles
  info <profile-id>            Show a profile's settings
  aspect-ratios                List supported aspect ratios
  test                         Generate one sample image to check the API setup

Generate options:
  --output, -o <file>          Output file (required)
  --aspect, -a <ratio>         Aspect ratio, e.g. 2:3 or wide (default: 2:3)
  --model, -m <model>          Gemini model ID
  --profile, -p <id>           Generation profile

Batch options:
  --output, -o <dir>           Output directory (default: OUTPUT_DIR)
  --concurrent, -c <n>         Max concurrent requests (default: MAX_CONCURRENT)
  --rpm <n>                    Requests per minute (default: RPM_LIMIT)
  --profile, -p <id>           Generation profile
  --no-skip                    Regenerate files that already exist

Test options:
  --prompt <text>              Prompt to send (default: a sunset over mountains)
  --output, -o <file>          Output file (default: OUTPUT_DIR/test_output.png)

Options:
  --help, -h                   Show this help message
`;

export async function runCli(argv: readonly string[], ctx: CliContext): Promise<number> {
  const { command, positional, flags } = parseArgs(argv);
  if (!command || flags.help === true) {
    ctx.out(HELP_TEXT);
    return 0;
  }

  try {
    switch (command) {
      case "generate":
        return await generateCommand(ctx, positional, flags);
      case "batch":
        return await batchCommand(ctx, positional, flags);
      case "profiles":
        return await profilesCommand(ctx);
      case "info":
        return await infoCommand(ctx, positional);
      case "aspect-ratios":
        return aspectRatiosCommand(ctx);
      case "test":
        return await testCommand(ctx, flags);
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (e) {
    if (e instanceof UsageError) {
      ctx.err(`Error: ${e.message}`);
      ctx.err(HELP_TEXT);
      return 2;
    }
    if (e instanceof BatchCancelledError) {
      const { stats } = e;
      ctx.err(`Cancelled: ${stats.successful + stats.failed + stats.skipped}/${stats.total} items finished`);
      return 1;
    }
    ctx.err(`Error: ${errorMessage(e)}`);
    return 1;
  }
}

export async function generateCommand(ctx: CliContext, positional: string[], flags: Flags): Promise<number> {
  const prompt = positional[0];
  if (!prompt) throw new UsageError("generate requires a prompt");
  const output = stringFlag(flags, "output");
  if (!output) throw new UsageError("--output is required");

  const profileId = stringFlag(flags, "profile");
  const profile = profileId ? await loadProfile(profileId, ctx.settings.profilesDir) : undefined;
  const result = await generateImage(prompt, resolve(output), {
    client: makeClient(ctx),
    aspectRatio: stringFlag(flags, "aspect"),
    model: stringFlag(flags, "model"),
    profile,
    signal: ctx.signal
  });
  ctx.out(`Generated: ${result.path} (${result.width}x${result.height}) in ${seconds(result.generationTimeMs)}s`);
  return 0;
}

export async function batchCommand(ctx: CliContext, positional: string[], flags: Flags): Promise<number> {
  const file = positional[0];
  if (!file) throw new UsageError("batch requires a prompts file");
  const { settings } = ctx;
  const outputDir = resolve(stringFlag(flags, "output") ?? settings.outputDir);
  const concurrencyLimit = intFlag(flags, "concurrent") ?? settings.maxConcurrent;
  const rpmLimit = numberFlag(flags, "rpm") ?? settings.rpmLimit;

  let items = await loadPromptsFile(file, outputDir);
  const profileId = stringFlag(flags, "profile");
  if (profileId) {
    const profile = await loadProfile(profileId, settings.profilesDir);
    items = items.map((item) => applyProfile(item, profile));
  }

  const client = makeClient(ctx);
  const coordinator = new BatchCoordinator<ImageResult>(
    { generate: (req) => client.generate(req), exists: fileExists },
    { ...ctx.runtime, logger: ctx.logger }
  );
  const { results, stats } = await coordinator.runBatch(items, {
    concurrencyLimit,
    rpmLimit,
    skipExisting: flags["no-skip"] !== true,
    retry: { maxRetries: settings.maxRetries, baseDelayMs: settings.baseDelayMs },
    signal: ctx.signal
  });

  ctx.out(
    `Completed: ${stats.successful}/${stats.total} generated, ${stats.skipped} skipped, ` +
      `${stats.failed} failed, ${stats.rateLimited} rate limited`
  );
  for (const r of results) {
    ctx.out(`  ${basename(r.path)}: ${r.width}x${r.height} (${seconds(r.generationTimeMs)}s)`);
  }
  return stats.failed > 0 ? 1 : 0;
}

export async function profilesCommand(ctx: CliContext): Promise<number> {
  const dir = ctx.settings.profilesDir;
  const ids = await listProfiles(dir);
  if (ids.length === 0) {
    ctx.out(`No profiles found in ${dir}`);
    return 0;
  }
  for (const id of ids) {
    const profile = await loadProfile(id, dir);
    ctx.out(profile.description ? `  ${id} - ${profile.name}: ${profile.description}` : `  ${id} - ${profile.name}`);
  }
  return 0;
}

export async function infoCommand(ctx: CliContext, positional: string[]): Promise<number> {
  const id = positional[0];
  if (!id) throw new UsageError("info requires a profile id");
  const profile = await loadProfile(id, ctx.settings.profilesDir);
  ctx.out(`Profile: ${profile.name} (${profile.id})`);
  if (profile.description) ctx.out(`Description: ${profile.description}`);
  ctx.out(`Model: ${profile.config.model ?? ctx.settings.model}`);
  ctx.out(`Aspect ratio: ${profile.config.aspectRatio ?? DEFAULT_IMAGE_CONFIG.aspectRatio}`);
  if (profile.stylePrefix) ctx.out(`Style prefix: ${profile.stylePrefix}`);
  if (profile.styleSuffix) ctx.out(`Style suffix: ${profile.styleSuffix}`);
  ctx.out(`Example: ${formatPrompt(profile, "Your prompt here")}`);
  return 0;
}

export function aspectRatiosCommand(ctx: CliContext): number {
  for (const [name, value] of Object.entries(ASPECT_RATIOS)) {
    ctx.out(`  ${value.padEnd(5)} ${name.toLowerCase()}`);
  }
  return 0;
}

export const TEST_PROMPT = "A beautiful sunset over mountains with vibrant colors";

export async function testCommand(ctx: CliContext, flags: Flags): Promise<number> {
  const prompt = stringFlag(flags, "prompt") ?? TEST_PROMPT;
  const output = resolve(stringFlag(flags, "output") ?? join(ctx.settings.outputDir, "test_output.png"));
  ctx.out("Running API test");
  ctx.out(`Prompt: ${prompt}`);
  ctx.out(`Output: ${output}`);

  try {
    const result = await generateImage(prompt, output, { client: makeClient(ctx), signal: ctx.signal });
    ctx.out("Success!");
    ctx.out(`Generated: ${result.path}`);
    ctx.out(`Size: ${result.width}x${result.height}`);
    ctx.out(`Time: ${seconds(result.generationTimeMs)}s`);
    ctx.out(`Model: ${result.model}`);
    return 0;
  } catch (e) {
    if (e instanceof ConfigError && e.issues.some((i) => i.startsWith("GOOGLE_API_KEY"))) {
      ctx.err("Error: GOOGLE_API_KEY not set");
      ctx.err("Set GOOGLE_API_KEY in a .env file or as an environment variable");
      return 1;
    }
    throw e;
  }
}

function makeClient(ctx: CliContext): ImageGenerator {
  if (ctx.createClient) return ctx.createClient(ctx.settings, ctx.logger);
  return new GeminiImageClient({
    apiKey: ctx.settings.apiKey,
    defaults: { model: ctx.settings.model },
    logger: ctx.logger
  });
}

function stringFlag(flags: Flags, name: string): string | undefined {
  const v = flags[name];
  if (v === undefined) return undefined;
  if (typeof v !== "string") throw new UsageError(`--${name} requires a value`);
  return v;
}

function intFlag(flags: Flags, name: string): number | undefined {
  const v = stringFlag(flags, name);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isInteger(n) || n < 1) throw new UsageError(`--${name} must be a positive integer`);
  return n;
}

function numberFlag(flags: Flags, name: string): number | undefined {
  const v = stringFlag(flags, name);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isFinite(n) || n <= 0) throw new UsageError(`--${name} must be a positive number`);
  return n;
}

function seconds(ms: number) {
  return (ms / 1000).toFixed(1);
}
