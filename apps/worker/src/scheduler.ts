import type { OpsConfig } from "./lib/config.js";
import type { WorkerQueue } from "./queues.js";
import { systemTasks } from "./systemTasks.js";

export const DAILY_SCHEDULE_JOB_ID = "schedule-daily-operations";

// Registers the repeatable daily job at the local fire time (idempotent).
export async function ensureSchedules(queue: WorkerQueue, config: Pick<OpsConfig, "fireTime" | "timezone">) {
  const def = systemTasks(config).DAILY_OPERATIONS;
  await queue.add(
    def.taskName,
    { source: "schedule" },
    {
      jobId: DAILY_SCHEDULE_JOB_ID,
      repeat: { pattern: def.cronExpr, tz: def.timezone },
      removeOnComplete: 10,
      removeOnFail: 50
    }
  );
  console.log("[scheduler] daily schedule registered", { cron: def.cronExpr, tz: def.timezone });
}
