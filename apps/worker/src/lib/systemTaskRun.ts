import cronParser from "cron-parser";
import { systemClock, type Clock } from "./calendar.js";
import type { Db } from "./db.js";
import { errorMessage } from "./errors.js";
import type { SystemTaskDef } from "../systemTasks.js";

export type SystemTaskStatus = "SUCCESS" | "SKIPPED" | "ERROR";

export type SystemTaskRun = {
  id: number;
  taskName: string;
  taskType: string;
  scopeType: string;
  scopeTarget: string | null;
  cronExpr: string;
  timezone: string;
  lastRunAt: string;
  nextRunAt: string | null;
  lastStatus: SystemTaskStatus;
  durationMs: number;
  note: string | null;
};

type SystemTaskRunRow = {
  id: number;
  task_name: string;
  task_type: string;
  scope_type: string;
  scope_target: string | null;
  cron_expr: string;
  timezone: string;
  last_run_at: string;
  next_run_at: string | null;
  last_status: SystemTaskStatus;
  duration_ms: number;
  note: string | null;
};

const NOTE_LIMIT = 900;

export function nextFromCron(expr: string, tz: string, from: Date = new Date()): Date | null {
  try {
    const interval = cronParser.parseExpression(expr, { tz, currentDate: from });
    return interval.next().toDate();
  } catch (e) {
    console.warn("[system-task] cannot compute next run", { expr, tz, error: errorMessage(e) });
    return null;
  }
}

async function insertRun(
  db: Db,
  def: SystemTaskDef,
  run: { lastRunAt: Date; status: SystemTaskStatus; durationMs: number; note: string | null }
) {
  const nextRunAt = nextFromCron(def.cronExpr, def.timezone, run.lastRunAt);
  // A fire that lands during a migration must not join a transaction that may roll back.
  while (db.inTransaction) await db.whenIdle();
  await db.run(
    `INSERT INTO system_task_runs (
      task_name, task_type, scope_type, scope_target, cron_expr, timezone,
      last_run_at, next_run_at, last_status, duration_ms, note
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      def.taskName,
      def.taskType,
      def.scopeType,
      def.scopeTarget ?? null,
      def.cronExpr,
      def.timezone,
      run.lastRunAt.toISOString(),
      nextRunAt ? nextRunAt.toISOString() : null,
      run.status,
      run.durationMs,
      run.note
    ]
  );
}

/**
 * Runs `run` and appends one system_task_runs row describing it. Errors are
 * recorded and rethrown so BullMQ still marks the job failed.
 */
export async function recordSystemTaskRun<T>(args: {
  db: Db;
  def: SystemTaskDef;
  run: () => Promise<T>;
  statusOf?: (result: T) => Exclude<SystemTaskStatus, "ERROR">;
  clock?: Clock;
}): Promise<T> {
  const { db, def } = args;
  const clock = args.clock ?? systemClock;
  const lastRunAt = clock.now();
  const started = lastRunAt.getTime();
  try {
    const result = await args.run();
    const status = args.statusOf ? args.statusOf(result) : "SUCCESS";
    const note = result === undefined ? def.notes ?? null : JSON.stringify(result).slice(0, NOTE_LIMIT);
    await insertRun(db, def, { lastRunAt, status, durationMs: clock.now().getTime() - started, note });
    return result;
  } catch (e) {
    await insertRun(db, def, {
      lastRunAt,
      status: "ERROR",
      durationMs: clock.now().getTime() - started,
      note: errorMessage(e).slice(0, NOTE_LIMIT)
    });
    throw e;
  }
}

export async function recentSystemTaskRuns(db: Db, limit = 10): Promise<SystemTaskRun[]> {
  const rows = await db.all<SystemTaskRunRow>("SELECT * FROM system_task_runs ORDER BY id DESC LIMIT ?", [limit]);
  return rows.map((r) => ({
    id: r.id,
    taskName: r.task_name,
    taskType: r.task_type,
    scopeType: r.scope_type,
    scopeTarget: r.scope_target,
    cronExpr: r.cron_expr,
    timezone: r.timezone,
    lastRunAt: r.last_run_at,
    nextRunAt: r.next_run_at,
    lastStatus: r.last_status,
    durationMs: r.duration_ms,
    note: r.note
  }));
}
