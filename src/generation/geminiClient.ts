import { GoogleGenAI, type GenerateContentParameters, type GenerateContentResponse } from "@google/genai";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import sharp from "sharp";
import type { GenerateRequest } from "../batch/batchTypes.js";
import { classifyError, ConfigError, GenerationError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { ImageResult } from "../types.js";
import { resolveImageConfig, type ImageConfig } from "./imageConfig.js";

/** The slice of `GoogleGenAI#models` the client calls. */
export interface ImageModelClient {
  generateContent(params: GenerateContentParameters): Promise<Pick<GenerateContentResponse, "candidates">>;
}

export type GeminiImageClientOptions = {
  apiKey?: string;
  /** Injected models client; built from `apiKey` when absent. */
  models?: ImageModelClient;
  defaults?: Partial<ImageConfig>;
  logger?: Logger;
  now?: () => number;
};

type InlineImage = { data: string; mimeType: string };

/**
 * One request, one image. Failures surface as GenerationError; retrying is
 * left to the caller.
 */
export class GeminiImageClient {
  private models?: ImageModelClient;
  private logger: Logger;
  private nowFn: () => number;

  constructor(private opts: GeminiImageClientOptions = {}) {
    this.models = opts.models;
    this.logger = opts.logger ?? silentLogger;
    this.nowFn = opts.now ?? (() => Date.now());
  }

  async generate(request: GenerateRequest): Promise<ImageResult> {
    const config = resolveImageConfig(this.opts.defaults, request.config);
    const started = this.nowFn();
    this.logger.debug("gemini.request.start", {
      model: config.model,
      aspectRatio: config.aspectRatio,
      promptLength: request.prompt.length
    });

    let response: Pick<GenerateContentResponse, "candidates">;
    try {
      response = await this.client().generateContent({
        model: config.model,
        contents: request.prompt,
        config: {
          responseModalities: config.responseModalities,
          imageConfig: { aspectRatio: config.aspectRatio },
          abortSignal: request.signal
        }
      });
    } catch (err) {
      if (err instanceof ConfigError) throw err;
      throw classifyError(err);
    }

    const image = extractInlineImage(response);
    if (!image) throw new GenerationError("other", "No image in response from Gemini API");

    const buffer = Buffer.from(image.data, "base64");
    const { width, height } = await sharp(buffer).metadata();
    if (width === undefined || height === undefined) {
      throw new GenerationError("other", "Could not read dimensions of generated image");
    }
    await mkdir(dirname(request.output), { recursive: true });
    await writeFile(request.output, buffer);

    const generationTimeMs = this.nowFn() - started;
    this.logger.debug("gemini.request.done", { model: config.model, width, height, generationTimeMs });
    return {
      path: request.output,
      width,
      height,
      prompt: request.prompt,
      generationTimeMs,
      model: config.model,
      aspectRatio: config.aspectRatio,
      mimeType: image.mimeType
    };
  }

  private client(): ImageModelClient {
    if (!this.models) {
      if (!this.opts.apiKey) throw new ConfigError(["GOOGLE_API_KEY: required for image generation"]);
      this.models = new GoogleGenAI({ apiKey: this.opts.apiKey }).models;
    }
    return this.models;
  }
}

export function extractInlineImage(response: Pick<GenerateContentResponse, "candidates">): InlineImage | undefined {
  for (const candidate of response.candidates ?? []) {
    for (const part of candidate.content?.parts ?? []) {
      const data = part.inlineData?.data;
      if (data) return { data, mimeType: part.inlineData?.mimeType ?? "image/png" };
    }
  }
  return undefined;
}
