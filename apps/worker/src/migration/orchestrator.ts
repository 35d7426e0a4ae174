import type { Db } from "../lib/db.js";
import type { StateStore } from "../lib/stateStore.js";
import type { OpsEvents } from "../lib/events.js";
import { systemClock, type Clock } from "../lib/calendar.js";
import { IntegrityCheckFailedError, StepExecutionFailedError, errorMessage } from "../lib/errors.js";
import { checksum, type Digest } from "./checksum.js";
import type { BackupService } from "./backup.js";
import type { DatasetSource, OperationalDataset } from "./dataset.js";
import { MIGRATION_STEPS, type MigrationStep, type StepResult } from "./steps.js";

export type BackupUsed = {
  path: string;
  checksum: Digest;
  reused: boolean;
};

export type MigrationOutcome =
  | { status: "up-to-date"; version: number }
  | {
      status: "migrated";
      fromVersion: number;
      version: number;
      backup: BackupUsed;
      executedSteps: string[];
      skippedSteps: string[];
      results: Record<string, StepResult>;
    };

export type MigrationOrchestratorDeps = {
  db: Db;
  state: StateStore;
  source: DatasetSource;
  backups: BackupService;
  targetVersion: number;
  steps?: readonly MigrationStep[];
  expectedChecksum?: Digest;
  events?: OpsEvents;
  clock?: Clock;
  // Runs once after a migration commits (e.g. generate today's instances).
  postMigrationPass?: () => Promise<unknown>;
};

/**
 * One-time import of the operational dataset.
 *
 * Per attempt: integrity check, one backup, then every pending step in declared
 * order inside a single BEGIN IMMEDIATE transaction. Each step and its
 * migration_log row share a savepoint, so a step is either fully recorded or
 * not at all. When a step fails its savepoint is rolled back, the steps before
 * it are committed, and StepExecutionFailedError is raised; the next attempt
 * resumes at the failed step.
 */
export class MigrationOrchestrator {
  private readonly steps: readonly MigrationStep[];
  private readonly clock: Clock;
  private inFlight: Promise<MigrationOutcome> | null = null;

  constructor(private readonly deps: MigrationOrchestratorDeps) {
    this.steps = deps.steps ?? MIGRATION_STEPS;
    this.clock = deps.clock ?? systemClock;
  }

  async needsMigration(): Promise<boolean> {
    return (await this.deps.state.schemaVersion()) < this.deps.targetVersion;
  }

  /** Concurrent callers share the attempt already in flight. */
  runMigrationIfNeeded(): Promise<MigrationOutcome> {
    if (!this.inFlight) {
      this.inFlight = this.attempt().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private pendingSteps(fromVersion: number): MigrationStep[] {
    return this.steps.filter((s) => s.version > fromVersion && s.version <= this.deps.targetVersion);
  }

  private async attempt(): Promise<MigrationOutcome> {
    const { db, state, events, targetVersion } = this.deps;

    const fromVersion = await state.schemaVersion();
    if (fromVersion >= targetVersion) {
      return { status: "up-to-date", version: fromVersion };
    }

    console.log("[migration] starting", { fromVersion, targetVersion, source: this.deps.source.describe() });

    const pending = this.pendingSteps(fromVersion);
    const done = await state.completedSteps();

    const dataset = await this.deps.source.load();
    const digest = checksum(dataset);
    // A resumed attempt must see the same source the earlier attempt backed up.
    const resuming = pending.some((s) => done.has(s.key));
    const knownGood = this.deps.expectedChecksum ?? (resuming ? (await state.lastBackup())?.checksum : undefined);
    if (knownGood && knownGood !== digest) {
      throw new IntegrityCheckFailedError(knownGood, digest);
    }

    const backup = await this.ensureBackup(dataset, digest);

    const now = this.clock.now().toISOString();
    const executedSteps: string[] = [];
    const skippedSteps: string[] = [];
    const results: Record<string, StepResult> = {};

    const failure = await db.transaction(async (): Promise<StepExecutionFailedError | null> => {
      for (const [i, step] of pending.entries()) {
        if (done.has(step.key)) {
          skippedSteps.push(step.key);
          continue;
        }

        events?.emit("migrationProgress", {
          step: i + 1,
          total: pending.length,
          key: step.key,
          description: step.description
        });
        console.log(`[migration] ${step.description}...`, { step: step.key });

        try {
          const result = await db.savepoint(`migration_step_${i}`, async () => {
            const r = await step.run({ db, dataset, now });
            await state.markStepComplete(step.key, step.version, JSON.stringify(r));
            return r;
          });
          executedSteps.push(step.key);
          results[step.key] = result;
          console.log(`[migration] ${step.key} done`, result);
        } catch (e) {
          console.error(`[migration] ${step.key} failed`, { err: errorMessage(e) });
          return new StepExecutionFailedError(step.key, e);
        }
      }

      await state.setSchemaVersion(targetVersion);
      return null;
    });

    if (failure) throw failure;

    console.log("[migration] completed", { version: targetVersion, executed: executedSteps.length });
    events?.emit("migrationComplete", { version: targetVersion, executedSteps });

    // The schema version is already committed; a failed pass does not undo the migration.
    if (this.deps.postMigrationPass) {
      await this.deps.postMigrationPass().catch((e: unknown) => {
        console.error("[migration] post-migration pass failed", { err: errorMessage(e) });
      });
    }

    return {
      status: "migrated",
      fromVersion,
      version: targetVersion,
      backup,
      executedSteps,
      skippedSteps,
      results
    };
  }

  // One backup per distinct source snapshot: a retry over unchanged data reuses it.
  private async ensureBackup(dataset: OperationalDataset, digest: Digest): Promise<BackupUsed> {
    const { state, backups } = this.deps;
    const last = await state.lastBackup();
    if (last && last.checksum === digest && (await backups.exists(last.path))) {
      console.log("[migration] reusing backup", { path: last.path });
      return { path: last.path, checksum: digest, reused: true };
    }

    const record = await backups.createBackup(dataset);
    await state.setLastBackup({ path: record.path, checksum: record.checksum });
    return { path: record.path, checksum: record.checksum, reused: false };
  }
}
