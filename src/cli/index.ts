#!/usr/bin/env node
import { loadSettings, type Settings } from "../config/config.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import { ConsoleSink } from "../logging/sinks.js";
import { ShutdownManager } from "../shutdown/shutdown.js";
import { runCli } from "./commands.js";

async function main(): Promise<void> {
  let settings: Settings;
  try {
    settings = loadSettings();
  } catch (e) {
    process.stderr.write(`Error: ${errorMessage(e)}\n`);
    process.exitCode = 2;
    return;
  }

  const logger = createLogger({ level: settings.logLevel, sinks: [new ConsoleSink(settings.logFormat)] });
  const controller = new AbortController();
  const shutdown = new ShutdownManager(logger).register({
    name: "abort-batch",
    fn: () => controller.abort(new Error("interrupted"))
  });
  const unhook = shutdown.onSignals(["SIGINT", "SIGTERM"]);

  try {
    process.exitCode = await runCli(process.argv.slice(2), {
      settings,
      logger,
      out: (line) => process.stdout.write(line + "\n"),
      err: (line) => process.stderr.write(line + "\n"),
      signal: controller.signal
    });
  } finally {
    unhook();
  }
}

void main();
