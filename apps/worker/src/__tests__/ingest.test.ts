import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "@salesharvest/shared";
import { FakePortal, createFakeLauncher, fakePortalProfile } from "@salesharvest/scrapers/testing";
import { loadWorkerConfig, type WorkerConfig } from "../config.js";
import { runConfiguredIngestion } from "../ingest.js";

const credentials = { username: "test-user", password: "test-secret" };

let dataDir: string;

beforeEach(async () => {
  dataDir = await mkdtemp(path.join(os.tmpdir(), "salesharvest-ingest-"));
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dataDir, { recursive: true, force: true });
});

async function testConfig(overrides: Partial<WorkerConfig> = {}): Promise<WorkerConfig> {
  const base = await loadWorkerConfig({ PORTAL_USERNAME: credentials.username, PORTAL_PASSWORD: credentials.password });
  return { ...base, profile: fakePortalProfile, dataDir, artifactsOnError: false, ...overrides };
}

describe("runConfiguredIngestion", () => {
  it("runs a dry run against the portal and writes the run directory", async () => {
    const portal = new FakePortal({
      credentials,
      pages: [
        [
          ["V-1", "01/03/2024", "Mercado Sol", "Arroz 5kg", "4", "1.250,40"],
          ["V-2", "02/03/2024", "Mercado Sol", "Feijão 1kg", "12", "96,00"]
        ]
      ]
    });
    const browser = createFakeLauncher(portal);

    const summary = await runConfiguredIngestion(await testConfig(), {
      runId: "dry-1",
      dryRun: true,
      requestedBy: "test",
      launcher: browser.launcher
    });

    expect(summary).toMatchObject({
      runId: "dry-1",
      status: "completed",
      recordsSeen: 2,
      recordsUpserted: 0,
      recordsRejected: 0,
      batches: 1
    });
    expect(browser.launches).toBe(1);
    expect(browser.closes).toBe(1);

    const runDir = path.join(dataDir, "runs", "dry-1");
    const written: unknown = JSON.parse(await readFile(path.join(runDir, "summary.json"), "utf8"));
    expect(written).toEqual(summary);

    const runLog = await readFile(path.join(runDir, "run.log"), "utf8");
    expect(runLog).toContain("[info] Run requested");
    expect(runLog).toContain("[info] Dry run: skipping batch 1 (2 record(s))");
  });

  it("requires DATABASE_URL for a real run before opening a browser", async () => {
    const portal = new FakePortal({ credentials, pages: [] });
    const browser = createFakeLauncher(portal);

    await expect(
      runConfiguredIngestion(await testConfig(), { runId: "real-1", launcher: browser.launcher })
    ).rejects.toBeInstanceOf(ConfigError);
    expect(browser.launches).toBe(0);
  });
});
