import { randomUUID } from "node:crypto";
import { Worker } from "bullmq";
import { config as loadDotenv } from "dotenv";
import {
  INGEST_QUEUE_NAME,
  RUN_INGEST_JOB_NAME,
  createRedisConnection,
  getIngestScheduler,
  type RunIngestJobData
} from "@salesharvest/queue";
import { loadWorkerConfig } from "./config.js";
import { runConfiguredIngestion } from "./ingest.js";

async function main() {
  loadDotenv();
  const config = await loadWorkerConfig(process.env);
  const connection = createRedisConnection(config.redisUrl);
  const activeRuns = new Map<string, AbortController>();

  try {
    const scheduler = await getIngestScheduler(config.redisUrl);
    if (scheduler.exists) {
      console.log(`[worker] recurring ingest scheduled; next run at ${new Date(scheduler.nextRunAt ?? 0).toISOString()}`);
    }
  } catch (err) {
    console.warn("[worker] failed to read the ingest scheduler:", err);
  }

  // One run at a time: runs share the portal account and would log each other out.
  const worker = new Worker<RunIngestJobData>(
    INGEST_QUEUE_NAME,
    async (job) => {
      if (job.name !== RUN_INGEST_JOB_NAME) {
        throw new Error(`Unknown job name: ${job.name}`);
      }

      const runId = job.data.runId?.trim() || randomUUID();
      const controller = new AbortController();
      activeRuns.set(runId, controller);
      try {
        const summary = await runConfiguredIngestion(config, {
          runId,
          requestedBy: job.data.requestedBy ?? "queue",
          signal: controller.signal,
          ...(job.data.dryRun !== undefined ? { dryRun: job.data.dryRun } : {})
        });
        console.log(JSON.stringify(summary));

        if (summary.status === "failed") {
          const last = summary.errors.at(-1);
          throw new Error(`Run ${runId} failed: ${last ? `${last.reason}: ${last.message}` : "unknown error"}`);
        }
        return {
          ok: true,
          status: summary.status,
          runId,
          recordsUpserted: summary.recordsUpserted,
          recordsRejected: summary.recordsRejected
        };
      } finally {
        activeRuns.delete(runId);
      }
    },
    { connection, concurrency: 1 }
  );

  worker.on("completed", (job) => {
    console.log(`[worker] completed job ${job.id} (${job.name})`);
  });

  worker.on("failed", (job, err) => {
    console.error(`[worker] failed job ${job?.id} (${job?.name}):`, err);
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    console.log(`[worker] ${signal} received; canceling ${activeRuns.size} run(s) and closing`);
    for (const controller of activeRuns.values()) controller.abort();
    await worker.close();
    connection.disconnect();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, (received: NodeJS.Signals) => {
      shutdown(received).catch((err) => {
        console.error("[worker] shutdown failed:", err);
        process.exit(1);
      });
    });
  }

  console.log(`[worker] listening on ${INGEST_QUEUE_NAME} (portal: ${new URL(config.profile.loginUrl).origin})`);
}

main().catch((err) => {
  console.error("[worker] fatal:", err);
  process.exit(1);
});
