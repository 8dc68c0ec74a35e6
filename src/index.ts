export * from "./types.js";
export * from "./errors.js";
export { Logger, createLogger, redactSecrets, silentLogger, type LoggerOptions, type Redactor } from "./logging/logger.js";
export { ConsoleSink, RingBufferSink, type LogSink } from "./logging/sinks.js";
export { Config, loadSettings, resolveSettings, type Settings } from "./config/config.js";
export { TokenBucketLimiter, type TokenBucketOptions } from "./resilience/tokenBucketLimiter.js";
export {
  AdaptiveConcurrencyLimiter,
  type AdaptiveConcurrencyOptions,
  type ConcurrencySnapshot
} from "./resilience/adaptiveConcurrencyLimiter.js";
export * from "./batch/batchTypes.js";
export { BatchCoordinator, runBatch, type BatchCollaborators, type BatchRuntime, type RunBatchOptions } from "./batch/batchCoordinator.js";
export { RetryOrchestrator } from "./batch/retryOrchestrator.js";
export * from "./generation/imageConfig.js";
export { GeminiImageClient, type GeminiImageClientOptions, type ImageModelClient } from "./generation/geminiClient.js";
export { generateImage, type GenerateImageOptions } from "./generation/generator.js";
export { applyProfile, formatPrompt, listProfiles, loadProfile, parseProfile, type GenerationProfile } from "./generation/profiles.js";
export { fileExists, loadPromptsFile, parsePrompts } from "./storage/outputStore.js";
