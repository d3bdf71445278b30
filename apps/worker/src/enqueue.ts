import { config as loadDotenv } from "dotenv";
import { ConfigError } from "@salesharvest/shared";
import { cancelIngestRun, enqueueIngestRun, upsertIngestScheduler } from "@salesharvest/queue";
import { EXIT_CONFIG_ERROR, parseEnqueueArgs, type EnqueueCliArgs } from "./cli.js";

async function main() {
  loadDotenv();

  let args: EnqueueCliArgs;
  try {
    args = parseEnqueueArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[enqueue] ${err.message}`);
      console.error("Usage: npm run enqueue -w apps/worker -- [--dry-run] [--run-id <id>] | --every <minutes> | --cancel <jobId>");
      process.exit(EXIT_CONFIG_ERROR);
    }
    throw err;
  }

  const redisUrl = process.env.REDIS_URL ?? "redis://localhost:6379";

  if (args.mode === "cancel") {
    const result = await cancelIngestRun(redisUrl, args.queueJobId);
    console.log(JSON.stringify({ ok: result.removed, queueJobId: args.queueJobId, ...result }, null, 2));
    if (!result.removed) process.exitCode = 1;
    return;
  }

  if (args.mode === "schedule") {
    const result = await upsertIngestScheduler(redisUrl, {
      enabled: args.everyMinutes > 0,
      intervalMinutes: args.everyMinutes,
      requestedBy: "scheduled"
    });
    console.log(JSON.stringify({ ok: true, ...result }, null, 2));
    return;
  }

  const { queueJobId } = await enqueueIngestRun(redisUrl, {
    requestedBy: "enqueue-cli",
    ...(args.runId ? { runId: args.runId } : {}),
    ...(args.dryRun ? { dryRun: true } : {})
  });
  console.log(JSON.stringify({ ok: true, runId: args.runId ?? null, queueJobId }, null, 2));
}

main().catch((err) => {
  console.error("[enqueue] fatal:", err);
  process.exit(1);
});
