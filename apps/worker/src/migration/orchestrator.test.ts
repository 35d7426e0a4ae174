import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readdir, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Db } from "../lib/db.js";
import { BackupFailedError, IntegrityCheckFailedError, StepExecutionFailedError } from "../lib/errors.js";
import { OpsEvents } from "../lib/events.js";
import { StateStore } from "../lib/stateStore.js";
import {
  count,
  createTestDb,
  fixedClock,
  inMemoryDatasetSource,
  type MutableDatasetSource
} from "../lib/test-utils.js";
import { BackupService } from "./backup.js";
import { checksum } from "./checksum.js";
import { MigrationOrchestrator, type MigrationOrchestratorDeps } from "./orchestrator.js";
import { MIGRATION_STEPS, type MigrationStep } from "./steps.js";

const ALL_STEPS = [
  "v1.import-workers",
  "v1.import-buildings",
  "v1.import-routine-templates",
  "v1.create-worker-assignments",
  "v1.setup-worker-capabilities"
];

// Runs the real step, then fails once; the savepoint must discard its writes.
function failingOnce(key: string): MigrationStep[] {
  let failed = false;
  return MIGRATION_STEPS.map((s): MigrationStep =>
    s.key !== key
      ? s
      : {
          ...s,
          run: async (ctx) => {
            const result = await s.run(ctx);
            if (!failed) {
              failed = true;
              throw new Error("constraint violated");
            }
            return result;
          }
        }
  );
}

describe("MigrationOrchestrator", () => {
  let db: Db;
  let state: StateStore;
  let source: MutableDatasetSource;
  let tmp: string;
  let backupDir: string;
  let events: OpsEvents;

  function orchestrator(overrides: Partial<MigrationOrchestratorDeps> = {}) {
    const clock = fixedClock("2024-03-04T05:01:00.000Z");
    return new MigrationOrchestrator({
      db,
      state,
      source,
      backups: new BackupService(backupDir, { clock }),
      targetVersion: 1,
      events,
      clock,
      ...overrides
    });
  }

  beforeEach(async () => {
    db = await createTestDb();
    state = new StateStore(db, fixedClock("2024-03-04T05:01:00.000Z"));
    source = inMemoryDatasetSource();
    tmp = await mkdtemp(path.join(os.tmpdir(), "ops-migration-"));
    backupDir = path.join(tmp, "backups");
    events = new OpsEvents();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await db.close();
    await rm(tmp, { recursive: true, force: true });
  });

  it("imports the dataset once and records every step", async () => {
    const progress = vi.fn();
    const complete = vi.fn();
    events.on("migrationProgress", progress);
    events.on("migrationComplete", complete);

    const outcome = await orchestrator().runMigrationIfNeeded();

    expect(outcome).toMatchObject({
      status: "migrated",
      fromVersion: 0,
      version: 1,
      executedSteps: ALL_STEPS,
      skippedSteps: [],
      backup: { checksum: checksum(source.dataset), reused: false },
      results: {
        "v1.import-workers": { inserted: 2, skipped: 0 },
        "v1.import-buildings": { inserted: 2, skipped: 0 },
        // One duplicate and one row without a worker id.
        "v1.import-routine-templates": { inserted: 3, skipped: 2 },
        "v1.create-worker-assignments": { inserted: 2, skipped: 0 },
        "v1.setup-worker-capabilities": { inserted: 2, skipped: 0 }
      }
    });
    expect(await state.schemaVersion()).toBe(1);
    expect((await state.migrationLog()).map((e) => e.stepId).sort()).toEqual([...ALL_STEPS].sort());
    expect(await count(db, "workers")).toBe(2);
    expect(await count(db, "buildings")).toBe(2);
    expect(await count(db, "routine_templates")).toBe(3);
    expect(await count(db, "worker_assignments")).toBe(2);
    expect(await count(db, "worker_capabilities")).toBe(2);

    expect(progress).toHaveBeenCalledTimes(5);
    expect(progress).toHaveBeenNthCalledWith(1, {
      step: 1,
      total: 5,
      key: "v1.import-workers",
      description: "Importing workers"
    });
    expect(complete).toHaveBeenCalledWith({ version: 1, executedSteps: ALL_STEPS });
  });

  it("stores normalized templates with derived priorities", async () => {
    await orchestrator().runMigrationIfNeeded();

    const rows = await db.all<{ title: string; priority: string; frequency: string; days_of_week: string | null }>(
      "SELECT title, priority, frequency, days_of_week FROM routine_templates ORDER BY title"
    );
    expect(rows).toEqual([
      { title: "Boiler inspection", priority: "high", frequency: "weekly", days_of_week: "mon" },
      { title: "Hallway sweep", priority: "normal", frequency: "daily", days_of_week: "mon,tue,wed,thu,fri" },
      { title: "Trash room wipe-down", priority: "high", frequency: "weekdays", days_of_week: "mon,tue,wed,thu,fri" }
    ]);
  });

  it("is a no-op once the schema version is current", async () => {
    const orch = orchestrator();
    await orch.runMigrationIfNeeded();

    expect(await orch.runMigrationIfNeeded()).toEqual({ status: "up-to-date", version: 1 });
    expect(source.loads).toBe(1);
    expect(await count(db, "workers")).toBe(2);
    expect(await readdir(backupDir)).toHaveLength(1);
    expect(await orch.needsMigration()).toBe(false);
  });

  it("never lowers a stored schema version", async () => {
    await state.setSchemaVersion(2);
    expect(await orchestrator().runMigrationIfNeeded()).toEqual({ status: "up-to-date", version: 2 });
    expect(source.loads).toBe(0);
  });

  it("keeps completed steps and resumes at the failed one", async () => {
    const orch = orchestrator({ steps: failingOnce("v1.import-routine-templates") });

    const err = await orch.runMigrationIfNeeded().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StepExecutionFailedError);
    expect(err).toMatchObject({ code: "STEP_EXECUTION_FAILED", stepId: "v1.import-routine-templates" });

    expect(await state.schemaVersion()).toBe(0);
    expect([...(await state.completedSteps())].sort()).toEqual(["v1.import-buildings", "v1.import-workers"]);
    expect(await count(db, "workers")).toBe(2);
    expect(await count(db, "routine_templates")).toBe(0);

    const outcome = await orch.runMigrationIfNeeded();
    expect(outcome).toMatchObject({
      status: "migrated",
      skippedSteps: ["v1.import-workers", "v1.import-buildings"],
      executedSteps: ["v1.import-routine-templates", "v1.create-worker-assignments", "v1.setup-worker-capabilities"],
      backup: { reused: true }
    });
    expect(await count(db, "routine_templates")).toBe(3);
    expect(await readdir(backupDir)).toHaveLength(1);
  });

  it("refuses to resume against a different dataset", async () => {
    const orch = orchestrator({ steps: failingOnce("v1.import-routine-templates") });
    await expect(orch.runMigrationIfNeeded()).rejects.toBeInstanceOf(StepExecutionFailedError);

    source.dataset = { ...source.dataset, version: "test-2" };

    await expect(orch.runMigrationIfNeeded()).rejects.toBeInstanceOf(IntegrityCheckFailedError);
    expect(await state.completedSteps()).toEqual(new Set(["v1.import-workers", "v1.import-buildings"]));
    expect(await count(db, "routine_templates")).toBe(0);
    expect(await readdir(backupDir)).toHaveLength(1);
  });

  it("checks a pinned checksum before touching anything", async () => {
    const orch = orchestrator({ expectedChecksum: "0".repeat(64) });

    const err = await orch.runMigrationIfNeeded().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(IntegrityCheckFailedError);
    expect(err).toMatchObject({ expected: "0".repeat(64), actual: checksum(source.dataset) });
    expect(await count(db, "workers")).toBe(0);
    expect(await readdir(tmp)).toEqual([]);
  });

  it("migrates when the pinned checksum matches", async () => {
    const outcome = await orchestrator({ expectedChecksum: checksum(source.dataset) }).runMigrationIfNeeded();
    expect(outcome.status).toBe("migrated");
  });

  it("aborts before any step when the backup fails", async () => {
    const orch = orchestrator();
    vi.spyOn(BackupService.prototype, "createBackup").mockRejectedValueOnce(new BackupFailedError("disk full"));

    await expect(orch.runMigrationIfNeeded()).rejects.toThrow("Backup failed: disk full");
    expect(await count(db, "workers")).toBe(0);
    expect(await state.migrationLog()).toEqual([]);
    expect(await state.lastBackup()).toBeNull();
  });

  it("shares one attempt between concurrent callers", async () => {
    const orch = orchestrator();
    const [a, b] = await Promise.all([orch.runMigrationIfNeeded(), orch.runMigrationIfNeeded()]);

    expect(a).toBe(b);
    expect(source.loads).toBe(1);
  });

  it("runs the post-migration pass only after a migration", async () => {
    const postMigrationPass = vi.fn(async () => undefined);
    const orch = orchestrator({ postMigrationPass });

    await orch.runMigrationIfNeeded();
    await orch.runMigrationIfNeeded();

    expect(postMigrationPass).toHaveBeenCalledTimes(1);
  });

  it("still reports the migration when the post-migration pass fails", async () => {
    const postMigrationPass = vi.fn(async () => {
      throw new Error("generation unavailable");
    });

    const outcome = await orchestrator({ postMigrationPass }).runMigrationIfNeeded();

    expect(outcome).toMatchObject({ status: "migrated", version: 1 });
    expect(await state.schemaVersion()).toBe(1);
    expect(console.error).toHaveBeenCalledWith("[migration] post-migration pass failed", {
      err: "generation unavailable"
    });
  });
});
