import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { BatchItem } from "../batch/batchTypes.js";
import { ProfileNotFoundError, ValidationError } from "../errors.js";
import { isNodeError } from "../storage/outputStore.js";
import { ImageConfigSchema } from "./imageConfig.js";

const ProfileSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  config: ImageConfigSchema.default({}),
  stylePrefix: z.string().default(""),
  styleSuffix: z.string().default("")
});

/** Reusable prompt styling plus image settings, stored as `<id>.json`. */
export type GenerationProfile = z.infer<typeof ProfileSchema>;

export function parseProfile(data: unknown, source = "profile"): GenerationProfile {
  const parsed = ProfileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `[${i.path.join(".")}] ${i.message}`);
    throw new ValidationError(`Invalid ${source}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function formatPrompt(profile: GenerationProfile, prompt: string): string {
  return [profile.stylePrefix, prompt, profile.styleSuffix].filter((p) => p.length > 0).join(" ");
}

/**
 * Profile styling wraps the prompt; profile config sits under the item's own.
 */
export function applyProfile(item: BatchItem, profile: GenerationProfile): BatchItem {
  return {
    prompt: formatPrompt(profile, item.prompt),
    output: item.output,
    config: { ...profile.config, ...item.config }
  };
}

export async function loadProfile(id: string, dir: string): Promise<GenerationProfile> {
  const path = join(dir, `${id}.json`);
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (e) {
    if (isNodeError(e) && e.code === "ENOENT") throw new ProfileNotFoundError(id, dir);
    throw e;
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new ValidationError(`Profile ${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseProfile(data, `profile ${path}`);
}

export async function listProfiles(dir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (e) {
    if (isNodeError(e) && e.code === "ENOENT") return [];
    throw e;
  }
  return names
    .filter((n) => n.endsWith(".json"))
    .map((n) => n.slice(0, -".json".length))
    .sort();
}
