import { describe, expect, it } from "vitest";
import { ConfigError } from "@salesharvest/shared";
import { EXIT_OK, EXIT_RUN_FAILED, exitCodeFor, parseEnqueueArgs, parseRunArgs } from "../cli.js";

describe("parseRunArgs", () => {
  it("reads --dry-run and --run-id", () => {
    expect(parseRunArgs(["--dry-run", "--run-id", "nightly-1"])).toEqual({ dryRun: true, runId: "nightly-1" });
    expect(parseRunArgs([])).toEqual({});
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseRunArgs(["--verbose"])).toThrow("Unknown argument: --verbose");
    expect(() => parseRunArgs(["--run-id"])).toThrow(ConfigError);
    expect(() => parseRunArgs(["--run-id", "--dry-run"])).toThrow("--run-id needs a value");
  });
});

describe("parseEnqueueArgs", () => {
  it("enqueues a single run by default", () => {
    expect(parseEnqueueArgs(["--dry-run"])).toEqual({ mode: "enqueue", dryRun: true });
  });

  it("manages the scheduler with --every", () => {
    expect(parseEnqueueArgs(["--every", "60"])).toEqual({ mode: "schedule", everyMinutes: 60 });
    expect(parseEnqueueArgs(["--every", "0"])).toEqual({ mode: "schedule", everyMinutes: 0 });
    expect(() => parseEnqueueArgs(["--every", "-5"])).toThrow('--every must be a non-negative number of minutes (got "-5")');
    expect(() => parseEnqueueArgs(["--every", "5", "--dry-run"])).toThrow(
      "--every cannot be combined with other arguments"
    );
  });
});

describe("parseEnqueueArgs --cancel", () => {
  it("cancels a queued job by id", () => {
    expect(parseEnqueueArgs(["--cancel", "42"])).toEqual({ mode: "cancel", queueJobId: "42" });
  });

  it("needs a job id and stands alone", () => {
    expect(() => parseEnqueueArgs(["--cancel"])).toThrow("--cancel needs a value");
    expect(() => parseEnqueueArgs(["--cancel", "42", "--dry-run"])).toThrow(
      "--cancel cannot be combined with other arguments"
    );
  });
});

describe("exitCodeFor", () => {
  it("maps run status to the process exit code", () => {
    expect(exitCodeFor({ status: "completed" })).toBe(EXIT_OK);
    expect(exitCodeFor({ status: "failed" })).toBe(EXIT_RUN_FAILED);
    expect(exitCodeFor({ status: "canceled" })).toBe(EXIT_RUN_FAILED);
  });
});
