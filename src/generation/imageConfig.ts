import { z } from "zod";
import { ValidationError } from "../errors.js";

export const ASPECT_RATIOS = {
  PORTRAIT: "2:3",
  LANDSCAPE: "3:2",
  SQUARE: "1:1",
  WIDE: "16:9",
  TALL: "9:16"
} as const;

export type AspectRatioName = keyof typeof ASPECT_RATIOS;
export type AspectRatio = (typeof ASPECT_RATIOS)[AspectRatioName];

export type ImageConfig = {
  model: string;
  aspectRatio: AspectRatio;
  responseModalities: string[];
};

export const DEFAULT_MODEL = "gemini-2.5-flash-image";

export const DEFAULT_IMAGE_CONFIG: ImageConfig = {
  model: DEFAULT_MODEL,
  aspectRatio: ASPECT_RATIOS.PORTRAIT,
  responseModalities: ["IMAGE"]
};

const BY_NAME = new Map<string, AspectRatio>(Object.entries(ASPECT_RATIOS));
const VALUES: AspectRatio[] = Object.values(ASPECT_RATIOS);

export function isAspectRatio(value: string): value is AspectRatio {
  return VALUES.some((v) => v === value);
}

/** Accepts a ratio ("16:9") or a case-insensitive name ("wide"). */
export function parseAspectRatio(value: string): AspectRatio {
  const trimmed = value.trim();
  if (isAspectRatio(trimmed)) return trimmed;
  const named = BY_NAME.get(trimmed.toUpperCase());
  if (named) return named;
  throw new ValidationError(`Invalid aspect ratio: ${value}. Valid options: ${VALUES.join(", ")}`);
}

const aspectRatioSchema = z.string().transform((value, ctx) => {
  try {
    return parseAspectRatio(value);
  } catch (e) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: e instanceof Error ? e.message : String(e) });
    return z.NEVER;
  }
});

export const ImageConfigSchema = z
  .object({
    model: z.string().min(1),
    aspectRatio: aspectRatioSchema,
    responseModalities: z.array(z.string().min(1)).min(1)
  })
  .partial()
  .strict();

/** Later layers win; undefined fields fall through to earlier ones. */
export function resolveImageConfig(...layers: Array<Partial<ImageConfig> | undefined>): ImageConfig {
  const out: ImageConfig = { ...DEFAULT_IMAGE_CONFIG, responseModalities: [...DEFAULT_IMAGE_CONFIG.responseModalities] };
  for (const layer of layers) {
    if (!layer) continue;
    if (layer.model !== undefined) out.model = layer.model;
    if (layer.aspectRatio !== undefined) out.aspectRatio = layer.aspectRatio;
    if (layer.responseModalities !== undefined) out.responseModalities = [...layer.responseModalities];
  }
  return out;
}
