import { ConfigError, type RunSummary } from "@salesharvest/shared";

export const EXIT_OK = 0;
export const EXIT_RUN_FAILED = 1;
export const EXIT_CONFIG_ERROR = 2;

export type RunCliArgs = {
  runId?: string;
  dryRun?: boolean;
};

export type EnqueueCliArgs =
  | { mode: "enqueue"; runId?: string; dryRun?: boolean }
  | { mode: "schedule"; everyMinutes: number }
  | { mode: "cancel"; queueJobId: string };

function takeValue(argv: string[], idx: number, flag: string) {
  const value = argv[idx + 1];
  if (value === undefined || value.startsWith("--") || !value.trim()) {
    throw new ConfigError(`${flag} needs a value`);
  }
  return value.trim();
}

export function parseRunArgs(argv: string[]): RunCliArgs {
  const args: RunCliArgs = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--dry-run") {
      args.dryRun = true;
    } else if (arg === "--run-id") {
      args.runId = takeValue(argv, i, arg);
      i += 1;
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }
  return args;
}

/**
 * `--every <minutes>` manages the recurring scheduler (0 removes it), `--cancel <jobId>`
 * removes a waiting job; anything else enqueues one run.
 */
export function parseEnqueueArgs(argv: string[]): EnqueueCliArgs {
  const cancelIdx = argv.indexOf("--cancel");
  if (cancelIdx !== -1) {
    const queueJobId = takeValue(argv, cancelIdx, "--cancel");
    if (argv.length !== 2) throw new ConfigError("--cancel cannot be combined with other arguments");
    return { mode: "cancel", queueJobId };
  }
  const everyIdx = argv.indexOf("--every");
  if (everyIdx !== -1) {
    const raw = takeValue(argv, everyIdx, "--every");
    const everyMinutes = Number(raw);
    if (!Number.isFinite(everyMinutes) || everyMinutes < 0) {
      throw new ConfigError(`--every must be a non-negative number of minutes (got "${raw}")`);
    }
    if (argv.length !== 2) throw new ConfigError("--every cannot be combined with other arguments");
    return { mode: "schedule", everyMinutes };
  }
  return { mode: "enqueue", ...parseRunArgs(argv) };
}

export function exitCodeFor(summary: Pick<RunSummary, "status">) {
  return summary.status === "completed" ? EXIT_OK : EXIT_RUN_FAILED;
}
