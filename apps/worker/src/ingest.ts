import { writeFile } from "node:fs/promises";
import path from "node:path";
import type { RunSummary } from "@salesharvest/shared";
import { connectSalesStore } from "@salesharvest/db";
import {
  createPortalSessionManager,
  type BrowserLaunchOptions,
  type BrowserLauncher,
  type PlaywrightRunArtifact,
  type PlaywrightRunArtifactsOptions
} from "@salesharvest/scrapers";
import { requireDatabaseUrl, type WorkerConfig } from "./config.js";
import { runIngestion } from "./pipeline.js";
import { openRunLog } from "./runLog.js";

export type IngestRunArgs = {
  runId: string;
  dryRun?: boolean;
  requestedBy?: string;
  signal?: AbortSignal;
  /** Replaces the Playwright launcher, e.g. with an in-process portal. */
  launcher?: BrowserLauncher;
  logPrefix?: string;
};

function combineSignals(signals: Array<AbortSignal | undefined>) {
  const present = signals.filter((s): s is AbortSignal => s !== undefined);
  if (present.length <= 1) return present[0];
  return AbortSignal.any(present);
}

/**
 * Wires configuration into one pipeline run: run log, browser launcher with
 * error artifacts, the Postgres store (skipped on dry runs), and the run timeout.
 * Writes `summary.json` next to the run log.
 */
export async function runConfiguredIngestion(config: WorkerConfig, args: IngestRunArgs): Promise<RunSummary> {
  const dryRun = args.dryRun ?? config.dryRun;
  const databaseUrl = dryRun ? undefined : requireDatabaseUrl(config);
  const { runDir, log } = await openRunLog(config.dataDir, args.runId, args.logPrefix);

  const artifacts: PlaywrightRunArtifact[] = [];
  const artifactOptions: PlaywrightRunArtifactsOptions | undefined = config.artifactsOnError
    ? {
        dir: runDir,
        prefix: "portal",
        when: dryRun ? "always" : "error",
        capture: { html: true, screenshot: true, trace: config.traceOnError },
        onArtifact: (artifact) => {
          artifacts.push(artifact);
        }
      }
    : undefined;
  const launchOptions: BrowserLaunchOptions = {
    warn: (message) => console.warn(`[playwright] ${args.runId}: ${message}`),
    ...(artifactOptions ? { artifacts: artifactOptions } : {})
  };

  const signal = combineSignals([
    args.signal,
    config.runTimeoutMs !== undefined ? AbortSignal.timeout(config.runTimeoutMs) : undefined
  ]);

  const sessions = createPortalSessionManager({
    profile: config.profile,
    launchOptions,
    loginTimeoutMs: config.loginTimeoutMs,
    navigationTimeoutMs: config.navigationTimeoutMs,
    log: async (message) => await log("info", message),
    ...(args.launcher ? { launcher: args.launcher } : {}),
    ...(signal ? { signal } : {})
  });

  await log("info", "Run requested", {
    requestedBy: args.requestedBy ?? null,
    dryRun,
    profile: config.profilePath,
    portal: new URL(config.profile.loginUrl).origin
  });

  const summary = await runIngestion(
    {
      runId: args.runId,
      credentials: config.credentials,
      profile: config.profile,
      locale: config.locale,
      batchSize: config.batchSize,
      maxConsecutiveBatchFailures: config.maxConsecutiveBatchFailures,
      retry: config.retry,
      maxPages: config.maxPages,
      dryRun,
      initSchema: config.initSchema,
      ...(signal ? { signal } : {})
    },
    {
      sessions,
      ...(databaseUrl ? { store: connectSalesStore(databaseUrl) } : {}),
      log
    }
  );

  if (artifacts.length > 0) {
    await log("info", "Saved browser artifacts", { files: artifacts.map((a) => a.key) });
  }
  await writeFile(path.join(runDir, "summary.json"), `${JSON.stringify(summary, null, 2)}\n`, "utf8");
  return summary;
}
