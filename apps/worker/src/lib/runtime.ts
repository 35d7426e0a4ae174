import { Calendar, systemClock, type Clock } from "./calendar.js";
import type { OpsConfig } from "./config.js";
import { Db } from "./db.js";
import { OpsEvents } from "./events.js";
import { StateStore } from "./stateStore.js";
import { TaskStore } from "./taskStore.js";
import { BackupService } from "../migration/backup.js";
import { jsonFileDatasetSource, type DatasetSource } from "../migration/dataset.js";
import { MigrationOrchestrator } from "../migration/orchestrator.js";
import { InstanceGenerator } from "../scheduling/generator.js";
import { RetentionSweeper } from "../scheduling/retention.js";
import { DailyTrigger } from "../scheduling/dailyTrigger.js";
import { dailyOperationsJob, type DailyOperationsReport } from "../jobs/dailyOperations.js";

export type OpsRuntime = {
  config: OpsConfig;
  db: Db;
  state: StateStore;
  tasks: TaskStore;
  events: OpsEvents;
  calendar: Calendar;
  migration: MigrationOrchestrator;
  generator: InstanceGenerator;
  sweeper: RetentionSweeper;
  trigger: DailyTrigger<DailyOperationsReport>;
  close(): Promise<void>;
};

export type OpsRuntimeOptions = {
  clock?: Clock;
  source?: DatasetSource;
  events?: OpsEvents;
  // Generate today's instances as soon as a migration commits.
  generateAfterMigration?: boolean;
};

export async function createOpsRuntime(config: OpsConfig, opts: OpsRuntimeOptions = {}): Promise<OpsRuntime> {
  const clock = opts.clock ?? systemClock;
  const events = opts.events ?? new OpsEvents();
  const calendar = new Calendar(config.timezone);

  const db = await Db.open(config.dbPath);
  const state = new StateStore(db, clock);
  const tasks = new TaskStore(db, clock);

  const generator = new InstanceGenerator(tasks, events);
  const sweeper = new RetentionSweeper(tasks, { clock, events });

  const migration = new MigrationOrchestrator({
    db,
    state,
    source: opts.source ?? jsonFileDatasetSource(config.datasetPath),
    backups: new BackupService(config.backupDir, { clock }),
    targetVersion: config.schemaTargetVersion,
    expectedChecksum: config.expectedDatasetChecksum,
    events,
    clock,
    postMigrationPass: opts.generateAfterMigration
      ? () => generator.generateForDate(calendar.dateKey(clock.now()))
      : undefined
  });

  const trigger = new DailyTrigger<DailyOperationsReport>({
    state,
    calendar,
    fireTime: config.fireTime,
    clock,
    pipeline: dailyOperationsJob({ migration, generator, sweeper, retentionDays: config.retentionDays })
  });

  return {
    config,
    db,
    state,
    tasks,
    events,
    calendar,
    migration,
    generator,
    sweeper,
    trigger,
    close: () => db.close()
  };
}
