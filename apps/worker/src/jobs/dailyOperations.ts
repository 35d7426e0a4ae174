import type { DateKey } from "../lib/calendar.js";
import type { MigrationOrchestrator, MigrationOutcome } from "../migration/orchestrator.js";
import type { GenerationReport, InstanceGenerator } from "../scheduling/generator.js";
import type { CleanupReport, RetentionSweeper } from "../scheduling/retention.js";

export type DailyOperationsReport = {
  date: DateKey;
  migration: MigrationOutcome["status"];
  generation: GenerationReport;
  cleanup: CleanupReport;
};

export type DailyOperationsDeps = {
  migration: MigrationOrchestrator;
  generator: InstanceGenerator;
  sweeper: RetentionSweeper;
  retentionDays: number;
};

// Migration must finish before anything reads templates.
export function dailyOperationsJob(deps: DailyOperationsDeps) {
  return async function runDailyOperationsJob(date: DateKey): Promise<DailyOperationsReport> {
    const migration = await deps.migration.runMigrationIfNeeded();
    const generation = await deps.generator.generateForDate(date);
    const cleanup = await deps.sweeper.sweep(deps.retentionDays);
    return { date, migration: migration.status, generation, cleanup };
  };
}
