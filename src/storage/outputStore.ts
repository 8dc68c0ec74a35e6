import { access, readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import type { BatchItem } from "../batch/batchTypes.js";
import { ValidationError } from "../errors.js";
import { ImageConfigSchema } from "../generation/imageConfig.js";

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (e) {
    if (isNodeError(e) && e.code === "ENOENT") return false;
    throw e;
  }
}

export function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

const PromptsFileSchema = z.array(
  z
    .object({
      prompt: z.string().min(1),
      output: z.string().min(1).optional(),
      config: ImageConfigSchema.optional()
    })
    .strict()
);

export function defaultOutputName(index: number): string {
  return `${String(index + 1).padStart(3, "0")}.png`;
}

/**
 * Parses a prompts file (JSON array of `{ prompt, output?, config? }`).
 * Relative outputs resolve against `outputDir`.
 */
export function parsePrompts(data: unknown, outputDir: string): BatchItem[] {
  const parsed = PromptsFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `[${i.path.join(".")}] ${i.message}`);
    throw new ValidationError("Invalid prompts file: " + issues.join("; "));
  }
  return parsed.data.map((entry, index) => ({
    prompt: entry.prompt,
    output: resolve(outputDir, entry.output ?? defaultOutputName(index)),
    config: entry.config
  }));
}

export async function loadPromptsFile(path: string, outputDir: string): Promise<BatchItem[]> {
  const raw = await readFile(path, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    throw new ValidationError(`Prompts file ${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parsePrompts(data, outputDir);
}
