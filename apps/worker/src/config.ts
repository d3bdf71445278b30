import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError, asNonEmptyString, errorMessage, isPlainObject, type Credentials } from "@salesharvest/shared";
import { parsePortalProfile, type PortalProfile } from "@salesharvest/scrapers";
import { PT_BR_LOCALE, type DateFormat, type NormalizeLocale } from "./normalize.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./pipeline.js";

export const DEFAULT_PORTAL_PROFILE_PATH = fileURLToPath(new URL("../config/portal.json", import.meta.url));

export type WorkerConfig = {
  credentials: Credentials;
  databaseUrl: string | undefined;
  redisUrl: string;
  dataDir: string;
  profilePath: string;
  profile: PortalProfile;
  locale: NormalizeLocale;
  batchSize: number;
  maxConsecutiveBatchFailures: number;
  retry: RetryPolicy;
  loginTimeoutMs: number;
  navigationTimeoutMs: number;
  maxPages: number;
  runTimeoutMs: number | undefined;
  dryRun: boolean;
  initSchema: boolean;
  artifactsOnError: boolean;
  traceOnError: boolean;
};

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, key: string, fallback: number, min = 1) {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || String(value) !== raw || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function flagFromEnv(env: Env, key: string, fallback: boolean) {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === "1" || raw === "true" || raw === "yes") return true;
  if (raw === "0" || raw === "false" || raw === "no") return false;
  throw new ConfigError(`${key} must be 0 or 1 (got "${raw}")`);
}

const DATE_FORMATS: readonly DateFormat[] = ["DD/MM/YYYY", "MM/DD/YYYY", "YYYY-MM-DD"];

/** Reads the optional `numberFormat` block of the portal profile. */
export function parseNormalizeLocale(config: unknown): NormalizeLocale {
  if (config === undefined) return PT_BR_LOCALE;
  if (!isPlainObject(config)) throw new ConfigError("Invalid portal profile: numberFormat must be an object");

  const decimal = config.decimalSeparator ?? PT_BR_LOCALE.decimalSeparator;
  const thousands = config.thousandsSeparator ?? PT_BR_LOCALE.thousandsSeparator;
  const dateFormat = config.dateFormat ?? PT_BR_LOCALE.dateFormat;

  if (decimal !== "," && decimal !== ".") {
    throw new ConfigError('Invalid portal profile: numberFormat.decimalSeparator must be "," or "."');
  }
  if (thousands !== "." && thousands !== "," && thousands !== " " && thousands !== "") {
    throw new ConfigError('Invalid portal profile: numberFormat.thousandsSeparator must be ".", ",", " " or ""');
  }
  if (thousands === decimal) {
    throw new ConfigError("Invalid portal profile: decimal and thousands separators must differ");
  }
  const format = DATE_FORMATS.find((f) => f === dateFormat);
  if (!format) {
    throw new ConfigError(`Invalid portal profile: numberFormat.dateFormat must be one of ${DATE_FORMATS.join(", ")}`);
  }
  return { decimalSeparator: decimal, thousandsSeparator: thousands, dateFormat: format };
}

export async function readPortalProfile(profilePath: string) {
  let text: string;
  try {
    text = await readFile(profilePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read portal profile ${profilePath}: ${errorMessage(err)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Portal profile ${profilePath} is not valid JSON: ${errorMessage(err)}`);
  }
  const profile = parsePortalProfile(json);
  const locale = parseNormalizeLocale(isPlainObject(json) ? json.numberFormat : undefined);
  return { profile, locale };
}

export async function loadWorkerConfig(env: Env = process.env): Promise<WorkerConfig> {
  const username = asNonEmptyString(env.PORTAL_USERNAME);
  const password = asNonEmptyString(env.PORTAL_PASSWORD);
  if (!username || !password) {
    throw new ConfigError("PORTAL_USERNAME and PORTAL_PASSWORD must be set");
  }

  const profilePath = asNonEmptyString(env.PORTAL_PROFILE)
    ? path.resolve(env.PORTAL_PROFILE ?? "")
    : DEFAULT_PORTAL_PROFILE_PATH;
  const { profile, locale } = await readPortalProfile(profilePath);

  const runTimeoutMs = intFromEnv(env, "INGEST_RUN_TIMEOUT_MS", 0, 0);

  return {
    credentials: { username, password },
    databaseUrl: asNonEmptyString(env.DATABASE_URL),
    redisUrl: env.REDIS_URL ?? "redis://localhost:6379",
    dataDir: path.resolve(env.DATA_DIR ?? "./data"),
    profilePath,
    profile,
    locale,
    batchSize: intFromEnv(env, "INGEST_BATCH_SIZE", 50),
    maxConsecutiveBatchFailures: intFromEnv(env, "INGEST_MAX_CONSECUTIVE_BATCH_FAILURES", 3),
    retry: {
      ...DEFAULT_RETRY_POLICY,
      attempts: intFromEnv(env, "INGEST_RETRY_ATTEMPTS", DEFAULT_RETRY_POLICY.attempts),
      baseDelayMs: intFromEnv(env, "INGEST_RETRY_BASE_DELAY_MS", DEFAULT_RETRY_POLICY.baseDelayMs, 0)
    },
    loginTimeoutMs: intFromEnv(env, "PORTAL_LOGIN_TIMEOUT_MS", 20_000),
    navigationTimeoutMs: intFromEnv(env, "PORTAL_NAVIGATION_TIMEOUT_MS", 15_000),
    maxPages: intFromEnv(env, "PORTAL_MAX_PAGES", 500),
    runTimeoutMs: runTimeoutMs > 0 ? runTimeoutMs : undefined,
    dryRun: flagFromEnv(env, "INGEST_DRY_RUN", false),
    initSchema: flagFromEnv(env, "SALES_DB_INIT_SCHEMA", false),
    artifactsOnError: flagFromEnv(env, "SCRAPER_ARTIFACTS_ON_ERROR", true),
    traceOnError: flagFromEnv(env, "SCRAPER_TRACE_ON_ERROR", false)
  };
}

export function requireDatabaseUrl(config: Pick<WorkerConfig, "databaseUrl">) {
  if (!config.databaseUrl) {
    throw new ConfigError("DATABASE_URL must be set unless the run is a dry run");
  }
  return config.databaseUrl;
}
