import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect } from "vitest";
import type { GenerateRequest } from "../batch/batchTypes.js";
import { parseArgs } from "../cli/args.js";
import { HELP_TEXT, runCli, TEST_PROMPT, type CliContext } from "../cli/commands.js";
import { Config, resolveSettings } from "../config/config.js";
import { GenerationError } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import type { ImageResult } from "../types.js";
import { fakeTime } from "./__mocks__/fakeTime.js";

describe("parseArgs", () => {
  it("splits command, positionals and flags", () => {
    expect(parseArgs(["generate", "a fox", "-o", "fox.png", "--aspect=wide", "--model", "m1"])).toEqual({
      command: "generate",
      positional: ["a fox"],
      flags: { output: "fox.png", aspect: "wide", model: "m1" }
    });
  });

  it("treats boolean flags and trailing flags as true", () => {
    expect(parseArgs(["batch", "p.json", "--no-skip", "out", "-h"]).flags).toEqual({ "no-skip": true, help: true });
    expect(parseArgs(["batch", "p.json", "--no-skip", "out"]).positional).toEqual(["p.json", "out"]);
    expect(parseArgs(["generate", "--output"]).flags).toEqual({ output: true });
  });

  it("returns an empty command when none is given", () => {
    expect(parseArgs([]).command).toBe("");
  });
});

type Harness = { ctx: CliContext; out: string[]; err: string[]; requests: GenerateRequest[] };

function harness(
  overrides: Record<string, unknown>,
  respond: (req: GenerateRequest) => Promise<ImageResult> = async (req) => image(req)
): Harness {
  const time = fakeTime();
  const out: string[] = [];
  const err: string[] = [];
  const requests: GenerateRequest[] = [];
  const ctx: CliContext = {
    settings: resolveSettings(new Config().merge(overrides)),
    logger: createLogger({ sinks: [] }),
    out: (line) => out.push(line),
    err: (line) => err.push(line),
    createClient: () => ({
      generate: (req) => {
        requests.push(req);
        return respond(req);
      }
    }),
    runtime: { now: time.now, sleep: time.sleep }
  };
  return { ctx, out, err, requests };
}

function image(req: GenerateRequest): ImageResult {
  return {
    path: req.output,
    width: 4,
    height: 6,
    prompt: req.prompt,
    generationTimeMs: 1234,
    model: "gemini-test",
    aspectRatio: "2:3",
    mimeType: "image/png"
  };
}

function workspace() {
  const root = mkdtempSync(join(tmpdir(), "imagebatch-cli-"));
  const profiles = join(root, "profiles");
  const output = join(root, "output");
  mkdirSync(profiles);
  mkdirSync(output);
  writeFileSync(
    join(profiles, "noir.json"),
    JSON.stringify({
      id: "noir",
      name: "Noir",
      description: "High-contrast black and white",
      config: { aspectRatio: "3:2" },
      stylePrefix: "Film noir still of"
    })
  );
  writeFileSync(join(profiles, "plain.json"), JSON.stringify({ id: "plain", name: "Plain" }));
  return { root, profiles, output };
}

describe("runCli", () => {
  it("prints help without a command", async () => {
    const h = harness({});
    expect(await runCli([], h.ctx)).toBe(0);
    expect(h.out).toEqual([HELP_TEXT]);
  });

  it("exits 2 on an unknown command", async () => {
    const h = harness({});
    expect(await runCli(["paint"], h.ctx)).toBe(2);
    expect(h.err[0]).toBe('Error: Unknown command "paint"');
  });

  it("lists aspect ratios", async () => {
    const h = harness({});
    expect(await runCli(["aspect-ratios"], h.ctx)).toBe(0);
    expect(h.out).toEqual(["  2:3   portrait", "  3:2   landscape", "  1:1   square", "  16:9  wide", "  9:16  tall"]);
  });

  it("lists profiles and shows one", async () => {
    const ws = workspace();
    const h = harness({ PROFILES_DIR: ws.profiles, GEMINI_MODEL: "gemini-default" });
    expect(await runCli(["profiles"], h.ctx)).toBe(0);
    expect(h.out).toEqual(["  noir - Noir: High-contrast black and white", "  plain - Plain"]);

    h.out.length = 0;
    expect(await runCli(["info", "noir"], h.ctx)).toBe(0);
    expect(h.out).toEqual([
      "Profile: Noir (noir)",
      "Description: High-contrast black and white",
      "Model: gemini-default",
      "Aspect ratio: 3:2",
      "Style prefix: Film noir still of",
      "Example: Film noir still of Your prompt here"
    ]);
  });

  it("fails on an unknown profile", async () => {
    const ws = workspace();
    const h = harness({ PROFILES_DIR: ws.profiles });
    expect(await runCli(["info", "missing"], h.ctx)).toBe(1);
    expect(h.err).toEqual([`Error: Profile 'missing' not found in ${ws.profiles}`]);
  });

  it("generates a single image", async () => {
    const ws = workspace();
    const h = harness({ PROFILES_DIR: ws.profiles });
    const output = join(ws.output, "one.png");
    expect(await runCli(["generate", "a cat", "-o", output, "-a", "wide", "-p", "noir"], h.ctx)).toBe(0);
    expect(h.requests[0].prompt).toBe("Film noir still of a cat");
    expect(h.requests[0].config).toEqual({ aspectRatio: "16:9" });
    expect(h.out).toEqual([`Generated: ${output} (4x6) in 1.2s`]);
  });

  it("requires --output for generate", async () => {
    const h = harness({});
    expect(await runCli(["generate", "a cat"], h.ctx)).toBe(2);
    expect(h.err[0]).toBe("Error: --output is required");
  });

  it("runs a batch, skipping outputs that exist", async () => {
    const ws = workspace();
    const prompts = join(ws.root, "prompts.json");
    writeFileSync(prompts, JSON.stringify([{ prompt: "a fox" }, { prompt: "a heron" }]));
    writeFileSync(join(ws.output, "001.png"), "existing");
    const h = harness({ OUTPUT_DIR: ws.output, PROFILES_DIR: ws.profiles });

    expect(await runCli(["batch", prompts, "--profile", "noir"], h.ctx)).toBe(0);
    expect(h.requests.map((r) => r.prompt)).toEqual(["Film noir still of a heron"]);
    expect(h.out).toEqual(["Completed: 1/2 generated, 1 skipped, 0 failed, 0 rate limited", "  002.png: 4x6 (1.2s)"]);
  });

  it("exits 1 when any batch item fails", async () => {
    const ws = workspace();
    const prompts = join(ws.root, "prompts.json");
    writeFileSync(prompts, JSON.stringify([{ prompt: "a fox" }, { prompt: "blocked" }]));
    const h = harness({ OUTPUT_DIR: ws.output, RETRY_BASE_DELAY: "10ms" }, async (req) => {
      if (req.prompt === "blocked") throw new GenerationError("other", "prompt blocked");
      return image(req);
    });

    expect(await runCli(["batch", prompts, "--no-skip", "-c", "2", "--rpm", "30"], h.ctx)).toBe(1);
    expect(h.out[0]).toBe("Completed: 1/2 generated, 0 skipped, 1 failed, 0 rate limited");
  });

  it("accepts a fractional --rpm like RPM_LIMIT does", async () => {
    const ws = workspace();
    const prompts = join(ws.root, "prompts.json");
    writeFileSync(prompts, JSON.stringify([{ prompt: "a fox" }]));
    const h = harness({ OUTPUT_DIR: ws.output });
    expect(await runCli(["batch", prompts, "--rpm", "1.5"], h.ctx)).toBe(0);
    expect(h.out[0]).toBe("Completed: 1/1 generated, 0 skipped, 0 failed, 0 rate limited");

    expect(await runCli(["batch", prompts, "--rpm", "0"], h.ctx)).toBe(2);
    expect(h.err[0]).toBe("Error: --rpm must be a positive number");
  });

  it("runs the API test with the default prompt and output", async () => {
    const ws = workspace();
    const h = harness({ OUTPUT_DIR: ws.output });
    const output = join(ws.output, "test_output.png");
    expect(await runCli(["test"], h.ctx)).toBe(0);
    expect(h.requests[0].prompt).toBe(TEST_PROMPT);
    expect(h.out).toEqual([
      "Running API test",
      `Prompt: ${TEST_PROMPT}`,
      `Output: ${output}`,
      "Success!",
      `Generated: ${output}`,
      "Size: 4x6",
      "Time: 1.2s",
      "Model: gemini-test"
    ]);
  });

  it("runs the API test with a custom prompt and output", async () => {
    const ws = workspace();
    const h = harness({});
    const output = join(ws.root, "check.png");
    expect(await runCli(["test", "--prompt", "a red kite", "-o", output], h.ctx)).toBe(0);
    expect(h.requests[0]).toEqual({ prompt: "a red kite", output, config: {}, signal: undefined });
  });

  it("explains a missing API key in the API test", async () => {
    const ws = workspace();
    const h = harness({ OUTPUT_DIR: ws.output });
    const ctx: CliContext = { ...h.ctx, createClient: undefined };
    expect(ctx.settings.apiKey).toBeUndefined();
    expect(await runCli(["test"], ctx)).toBe(1);
    expect(h.err).toEqual([
      "Error: GOOGLE_API_KEY not set",
      "Set GOOGLE_API_KEY in a .env file or as an environment variable"
    ]);
  });

  it("rejects a non-numeric concurrency", async () => {
    const h = harness({});
    expect(await runCli(["batch", "p.json", "-c", "many"], h.ctx)).toBe(2);
    expect(h.err[0]).toBe("Error: --concurrent must be a positive integer");
  });
});
