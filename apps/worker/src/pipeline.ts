import {
  AuthenticationError,
  CancelledError,
  PersistenceError,
  PipelineError,
  SessionExpiredError,
  errorMessage,
  formatRecordRef,
  retryWithBackoff,
  type Credentials,
  type ExtractedRow,
  type Rejection,
  type RunError,
  type RunStage,
  type RunStatus,
  type RunSummary,
  type SalesRecord,
  type Sleep
} from "@salesharvest/shared";
import { extractSalesPages, type PortalProfile, type SessionManager } from "@salesharvest/scrapers";
import type { SalesStore } from "@salesharvest/db";
import { PT_BR_LOCALE, normalizeSalesRow, type NormalizeLocale } from "./normalize.js";
import type { RunLogger } from "./runLog.js";

export type RetryPolicy = {
  attempts: number;
  baseDelayMs: number;
  factor?: number;
  maxDelayMs?: number;
};

export type IngestionOptions = {
  runId: string;
  credentials: Credentials;
  profile: Pick<PortalProfile, "selectors" | "columns">;
  locale?: NormalizeLocale;
  batchSize?: number;
  maxConsecutiveBatchFailures?: number;
  retry?: RetryPolicy;
  maxPages?: number;
  /** Extract and normalize only; nothing is written. */
  dryRun?: boolean;
  initSchema?: boolean;
  signal?: AbortSignal;
};

export type IngestionDeps<S> = {
  sessions: SessionManager<S>;
  /** Required unless `dryRun` is set. */
  store?: SalesStore;
  log?: RunLogger;
  sleep?: Sleep;
  now?: () => Date;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = { attempts: 3, baseDelayMs: 1000, factor: 2 };

const noopLog: RunLogger = async () => {};

function failureReason(err: unknown) {
  if (err instanceof PipelineError) return err.reason;
  return err instanceof Error ? err.name : "Error";
}

function rejectionMessage(rejection: Rejection) {
  return rejection.field && rejection.reason !== "MissingKey" ? `${rejection.field}: ${rejection.detail}` : rejection.detail;
}

/**
 * Runs one ingestion: authenticate, walk the listing, normalize, upsert in
 * batches. Never throws; every outcome, including failures, comes back as a
 * frozen RunSummary. The session is closed exactly once on every path.
 */
export async function runIngestion<S>(options: IngestionOptions, deps: IngestionDeps<S>): Promise<RunSummary> {
  const now = deps.now ?? (() => new Date());
  const log = deps.log ?? noopLog;
  const sessions = deps.sessions;
  const store = options.dryRun ? undefined : deps.store;
  const locale = options.locale ?? PT_BR_LOCALE;
  const batchSize = Math.max(1, Math.trunc(options.batchSize ?? 50));
  const maxConsecutiveFailures = Math.max(1, Math.trunc(options.maxConsecutiveBatchFailures ?? 3));
  const policy = options.retry ?? DEFAULT_RETRY_POLICY;
  const signal = options.signal;

  const startedAt = now();
  const errors: RunError[] = [];
  const counts = {
    recordsSeen: 0,
    recordsUpserted: 0,
    recordsRejected: 0,
    recordsFailed: 0,
    inserted: 0,
    updated: 0,
    batches: 0,
    reauthentications: 0
  };
  let stage: RunStage = "init";
  let status: RunStatus = "completed";
  let session: S | undefined;
  let buffer: SalesRecord[] = [];
  let consecutiveFailures = 0;

  const enter = async (next: RunStage) => {
    if (stage === next) return;
    await log("debug", `Stage ${stage} -> ${next}`);
    stage = next;
  };

  const withRetry = async <T>(label: string, fn: () => Promise<T>) =>
    await retryWithBackoff(fn, {
      attempts: policy.attempts,
      baseDelayMs: policy.baseDelayMs,
      ...(policy.factor !== undefined ? { factor: policy.factor } : {}),
      ...(policy.maxDelayMs !== undefined ? { maxDelayMs: policy.maxDelayMs } : {}),
      ...(signal ? { signal } : {}),
      ...(deps.sleep ? { sleep: deps.sleep } : {}),
      onRetry: async ({ attempt, delayMs, error }) => {
        await log("warn", `${label} failed (attempt ${attempt}/${policy.attempts}); retrying in ${delayMs}ms`, {
          reason: failureReason(error),
          error: errorMessage(error)
        });
      }
    });

  const reject = async (recordRef: string, rejection: Rejection) => {
    counts.recordsRejected += 1;
    const message = rejectionMessage(rejection);
    errors.push({ recordRef, reason: rejection.reason, message });
    await log("warn", `Rejected ${recordRef}`, { reason: rejection.reason, message });
  };

  const flush = async () => {
    if (buffer.length === 0) return;
    const batch = buffer;
    buffer = [];
    counts.batches += 1;
    const batchNo = counts.batches;

    if (!store) {
      await log("info", `Dry run: skipping batch ${batchNo} (${batch.length} record(s))`);
      return;
    }

    await enter("persisting");
    try {
      const { inserted, updated } = await store.upsertBatch(batch);
      counts.inserted += inserted;
      counts.updated += updated;
      counts.recordsUpserted += batch.length;
      consecutiveFailures = 0;
      await log("info", `Batch ${batchNo} committed`, { records: batch.length, inserted, updated });
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      consecutiveFailures += 1;
      counts.recordsFailed += batch.length;
      errors.push({ recordRef: `batch:${batchNo}`, reason: err.reason, message: err.message });
      await log("error", `Batch ${batchNo} rolled back`, { records: batch.length, code: err.code, error: err.message });
      if (consecutiveFailures >= maxConsecutiveFailures) {
        throw new PersistenceError(`${consecutiveFailures} consecutive batches failed; aborting run`, {
          cause: err,
          code: err.code
        });
      }
    }
    await enter("extracting");
  };

  const processRow = async (row: ExtractedRow) => {
    counts.recordsSeen += 1;
    const recordRef = formatRecordRef(row.ref);
    if ("mismatch" in row) {
      await reject(recordRef, { reason: "SchemaMismatch", detail: row.mismatch });
      return;
    }
    const result = normalizeSalesRow(row.fields, locale);
    if (!result.ok) {
      await reject(recordRef, result.rejection);
      return;
    }
    buffer.push(result.record);
    if (buffer.length >= batchSize) await flush();
  };

  await log("info", "Run started", {
    dryRun: options.dryRun === true,
    batchSize,
    maxConsecutiveBatchFailures: maxConsecutiveFailures
  });

  try {
    if (!options.dryRun && !store) {
      throw new PersistenceError("No sales store configured");
    }
    if (options.initSchema && store) {
      await store.ensureSchema();
      await log("info", "Schema ensured");
    }

    await enter("authenticating");
    const credentials = options.credentials;
    const active = await withRetry("authenticate", () => sessions.authenticate(credentials));
    session = active;

    await enter("extracting");
    let lastCompletedPage = 0;
    for (;;) {
      try {
        const pages = extractSalesPages(sessions, active, options.profile, {
          startPage: lastCompletedPage + 1,
          ...(options.maxPages !== undefined ? { maxPages: options.maxPages } : {}),
          ...(signal ? { signal } : {}),
          retry: withRetry,
          log: async (message) => await log("debug", message)
        });
        for await (const page of pages) {
          for (const row of page.rows) await processRow(row);
          lastCompletedPage = page.pageNumber;
        }
        break;
      } catch (err) {
        if (!(err instanceof SessionExpiredError)) throw err;
        if (counts.reauthentications > 0) {
          throw new AuthenticationError(`Session expired again after re-authentication: ${err.message}`, {
            cause: err,
            retryable: false
          });
        }
        counts.reauthentications += 1;
        await log("warn", `Session expired after page ${lastCompletedPage}; re-authenticating`);
        await enter("authenticating");
        await sessions.reauthenticate(active, credentials);
        await enter("extracting");
      }
    }

    await flush();
    await enter("done");
  } catch (err) {
    // Records from completed pages are still committed when a later step fails; a canceled run drops them.
    if (!(err instanceof CancelledError) && buffer.length > 0) {
      await log("warn", `Committing ${buffer.length} buffered record(s) before failing the run`);
      try {
        await flush();
      } catch (flushErr) {
        errors.push({ recordRef: null, reason: failureReason(flushErr), message: errorMessage(flushErr) });
        await log("error", "Final flush failed", { reason: failureReason(flushErr), error: errorMessage(flushErr) });
      }
    }
    status = err instanceof CancelledError ? "canceled" : "failed";
    stage = status === "canceled" ? "canceled" : "failed";
    errors.push({ recordRef: null, reason: failureReason(err), message: errorMessage(err) });
    await log(status === "canceled" ? "warn" : "error", status === "canceled" ? "Run canceled" : "Run failed", {
      reason: failureReason(err),
      error: errorMessage(err),
      ...(buffer.length > 0 ? { uncommittedRecords: buffer.length } : {})
    });
  } finally {
    if (session !== undefined) {
      try {
        await sessions.close(session, status === "completed" ? "final" : "error");
      } catch (err) {
        errors.push({ recordRef: null, reason: "SessionCloseError", message: errorMessage(err) });
        await log("warn", "Session close failed", { error: errorMessage(err) });
      }
    }
    if (store) {
      try {
        await store.close();
      } catch (err) {
        errors.push({ recordRef: null, reason: "PersistenceError", message: `store close failed: ${errorMessage(err)}` });
        await log("warn", "Store close failed", { error: errorMessage(err) });
      }
    }
  }

  const finishedAt = now();
  const summary: RunSummary = Object.freeze({
    runId: options.runId,
    status,
    ...counts,
    errors: Object.freeze(errors.map((e) => Object.freeze({ ...e }))),
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString()
  });

  await log(status === "completed" ? "info" : "warn", `Run ${status} in ${((finishedAt.getTime() - startedAt.getTime()) / 1000).toFixed(1)}s`, {
    stage,
    recordsSeen: counts.recordsSeen,
    recordsUpserted: counts.recordsUpserted,
    recordsRejected: counts.recordsRejected,
    recordsFailed: counts.recordsFailed
  });
  return summary;
}
