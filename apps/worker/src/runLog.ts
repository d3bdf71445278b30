import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type RunLogger = (level: LogLevel, message: string, payload?: unknown) => Promise<void>;

export async function logToFile(logPath: string, level: string, message: string, payload?: unknown) {
  const ts = new Date().toISOString();
  const suffix = payload === undefined ? "" : ` ${JSON.stringify(payload)}`;
  await appendFile(logPath, `${ts} [${level}] ${message}${suffix}\n`, "utf8");
}

export type RunLog = {
  runDir: string;
  logPath: string;
  log: RunLogger;
};

/**
 * Per-run log under `<dataDir>/runs/<runId>/run.log`, mirrored to the console
 * (debug lines only go to the file).
 */
export async function openRunLog(dataDir: string, runId: string, prefix = "worker"): Promise<RunLog> {
  const runDir = path.join(dataDir, "runs", runId);
  await mkdir(runDir, { recursive: true });
  const logPath = path.join(runDir, "run.log");

  const log: RunLogger = async (level, message, payload) => {
    await logToFile(logPath, level, message, payload);
    if (level === "debug") return;
    const line = `[${prefix}] ${runId}: ${message}`;
    const args = payload === undefined ? [line] : [line, JSON.stringify(payload)];
    if (level === "error") console.error(...args);
    else if (level === "warn") console.warn(...args);
    else console.log(...args);
  };

  return { runDir, logPath, log };
}
