import { randomUUID } from "node:crypto";
import { config as loadDotenv } from "dotenv";
import { ConfigError } from "@salesharvest/shared";
import { EXIT_CONFIG_ERROR, exitCodeFor, parseRunArgs, type RunCliArgs } from "./cli.js";
import { loadWorkerConfig, type WorkerConfig } from "./config.js";
import { runConfiguredIngestion } from "./ingest.js";

async function main() {
  loadDotenv();

  let args: RunCliArgs;
  let config: WorkerConfig;
  try {
    args = parseRunArgs(process.argv.slice(2));
    config = await loadWorkerConfig(process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[run] ${err.message}`);
      console.error("Usage: npm run ingest -w apps/worker -- [--dry-run] [--run-id <id>]");
      process.exit(EXIT_CONFIG_ERROR);
    }
    throw err;
  }

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    console.warn(`[run] ${signal} received; canceling`);
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  const runId = args.runId ?? randomUUID();
  try {
    const summary = await runConfiguredIngestion(config, {
      runId,
      requestedBy: "cli",
      signal: controller.signal,
      logPrefix: "run",
      ...(args.dryRun ? { dryRun: true } : {})
    });
    console.log(JSON.stringify(summary));
    process.exitCode = exitCodeFor(summary);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[run] ${err.message}`);
      process.exitCode = EXIT_CONFIG_ERROR;
      return;
    }
    throw err;
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
}

main().catch((err) => {
  console.error("[run] fatal:", err);
  process.exit(1);
});
