import { Queue, type JobsOptions } from "bullmq";
import { Redis } from "ioredis";

export const INGEST_QUEUE_NAME = "sales-ingest" as const;
export const RUN_INGEST_JOB_NAME = "runIngest" as const;

/** Credentials never travel through the queue; the worker reads them from its environment. */
export type RunIngestJobData = {
  runId?: string;
  requestedBy?: string;
  dryRun?: boolean;
};

export function createRedisConnection(redisUrl: string) {
  return new Redis(redisUrl, { maxRetriesPerRequest: null });
}

export async function enqueueIngestRun(redisUrl: string, data: RunIngestJobData, options?: JobsOptions) {
  const connection = createRedisConnection(redisUrl);
  const queue = new Queue<RunIngestJobData>(INGEST_QUEUE_NAME, { connection });
  try {
    const job = await queue.add(RUN_INGEST_JOB_NAME, data, {
      removeOnComplete: true,
      removeOnFail: false,
      ...options
    });
    return { queueJobId: job.id ?? null };
  } finally {
    await queue.close();
    connection.disconnect();
  }
}

export async function cancelIngestRun(redisUrl: string, queueJobId: string) {
  const jobId = queueJobId.trim();
  if (!jobId) {
    throw new Error("queueJobId is required");
  }

  const connection = createRedisConnection(redisUrl);
  const queue = new Queue<RunIngestJobData>(INGEST_QUEUE_NAME, { connection });
  try {
    const job = await queue.getJob(jobId);
    if (!job) {
      return { removed: false, reason: "not_found" as const };
    }
    // Active jobs are locked by the worker and cannot be removed.
    const state = await job.getState();
    if (state === "active") {
      return { removed: false, reason: "active" as const };
    }
    await job.remove();
    return { removed: true, reason: null };
  } finally {
    await queue.close();
    connection.disconnect();
  }
}

export const INGEST_SCHEDULER_ID = "runIngest:recurring" as const;

export async function getIngestScheduler(redisUrl: string) {
  const connection = createRedisConnection(redisUrl);
  const queue = new Queue<RunIngestJobData>(INGEST_QUEUE_NAME, { connection });
  try {
    const scheduler = await queue.getJobScheduler(INGEST_SCHEDULER_ID);
    return { schedulerId: INGEST_SCHEDULER_ID, exists: Boolean(scheduler), nextRunAt: scheduler?.next ?? null };
  } finally {
    await queue.close();
    connection.disconnect();
  }
}

export async function upsertIngestScheduler(
  redisUrl: string,
  args: {
    enabled: boolean;
    intervalMinutes?: number;
    requestedBy?: string;
  }
) {
  const connection = createRedisConnection(redisUrl);
  const queue = new Queue<RunIngestJobData>(INGEST_QUEUE_NAME, { connection });

  try {
    if (!args.enabled) {
      const removed = await queue.removeJobScheduler(INGEST_SCHEDULER_ID);
      return { schedulerId: INGEST_SCHEDULER_ID, removed, nextRunAt: null };
    }

    const intervalMinutes = args.intervalMinutes;
    if (intervalMinutes === undefined || !Number.isFinite(intervalMinutes) || intervalMinutes <= 0) {
      throw new Error("intervalMinutes must be a positive number when enabled");
    }

    const every = Math.round(intervalMinutes * 60_000);
    await queue.upsertJobScheduler(
      INGEST_SCHEDULER_ID,
      { every },
      {
        name: RUN_INGEST_JOB_NAME,
        data: args.requestedBy ? { requestedBy: args.requestedBy } : {},
        opts: {
          removeOnComplete: true,
          removeOnFail: false
        }
      }
    );

    const scheduler = await queue.getJobScheduler(INGEST_SCHEDULER_ID);
    return { schedulerId: INGEST_SCHEDULER_ID, removed: false, nextRunAt: scheduler?.next ?? null };
  } finally {
    await queue.close();
    connection.disconnect();
  }
}
