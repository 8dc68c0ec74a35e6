import type { ImageResult } from "../types.js";
import { parseAspectRatio, type ImageConfig } from "./imageConfig.js";
import { applyProfile, type GenerationProfile } from "./profiles.js";
import type { GeminiImageClient } from "./geminiClient.js";

export type GenerateImageOptions = {
  client: Pick<GeminiImageClient, "generate">;
  aspectRatio?: string;
  model?: string;
  profile?: GenerationProfile;
  signal?: AbortSignal;
};

/**
 * Single image, no rate limiting. An explicit model or aspect ratio wins over
 * the profile's.
 */
export async function generateImage(prompt: string, output: string, opts: GenerateImageOptions): Promise<ImageResult> {
  const overrides: Partial<ImageConfig> = {};
  if (opts.aspectRatio) overrides.aspectRatio = parseAspectRatio(opts.aspectRatio);
  if (opts.model) overrides.model = opts.model;
  const item = opts.profile
    ? applyProfile({ prompt, output, config: overrides }, opts.profile)
    : { prompt, output, config: overrides };
  return opts.client.generate({ ...item, signal: opts.signal });
}
