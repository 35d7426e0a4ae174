import type { FireTime, OpsConfig } from "./lib/config.js";

export type SystemTaskName = "DAILY_OPERATIONS";
export type SystemTaskType = "PIPELINE" | "MIGRATION" | "GENERATION" | "CLEANUP";
export type TaskScope = "GLOBAL" | "BUILDING" | "WORKER";

export type SystemTaskDef = {
  taskName: SystemTaskName;
  taskType: SystemTaskType;
  scopeType: TaskScope;
  scopeTarget?: string | null;
  cronExpr: string;
  timezone: string;
  notes?: string;
};

export function dailyCronExpr(t: FireTime): string {
  return `${t.minute} ${t.hour} * * *`;
}

export function systemTasks(config: Pick<OpsConfig, "fireTime" | "timezone">): Record<SystemTaskName, SystemTaskDef> {
  return {
    DAILY_OPERATIONS: {
      taskName: "DAILY_OPERATIONS",
      taskType: "PIPELINE",
      scopeType: "GLOBAL",
      scopeTarget: null,
      cronExpr: dailyCronExpr(config.fireTime),
      timezone: config.timezone,
      notes: "Migration if needed, then instance generation, then retention sweep."
    }
  };
}
