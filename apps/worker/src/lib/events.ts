import { EventEmitter } from "node:events";
import type { DateKey } from "./calendar.js";
import type { GenerationReport } from "../scheduling/generator.js";
import type { CleanupReport } from "../scheduling/retention.js";

export type MigrationProgress = {
  step: number;
  total: number;
  key: string;
  description: string;
};

export type OpsEventMap = {
  migrationProgress: [MigrationProgress];
  migrationComplete: [{ version: number; executedSteps: string[] }];
  instancesGenerated: [{ date: DateKey; report: GenerationReport }];
  metricsInvalidated: [{ date: DateKey; buildingIds: string[] }];
  cleanupCompleted: [CleanupReport];
};

/** In-process fan-out to metrics, cache invalidation and UI refresh collaborators. */
export class OpsEvents extends EventEmitter<OpsEventMap> {}
