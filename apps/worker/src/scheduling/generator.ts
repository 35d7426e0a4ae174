import { parseDateKey, type DateKey } from "../lib/calendar.js";
import { errorMessage } from "../lib/errors.js";
import type { OpsEvents } from "../lib/events.js";
import type { NewTaskInstance, RoutineTemplate, TaskStore } from "../lib/taskStore.js";
import { isDue } from "./recurrence.js";

export type GenerationReport = {
  created: number;
  skippedExisting: number;
  skippedNotDue: number;
  failed: number;
};

function instanceFrom(template: RoutineTemplate, date: DateKey): NewTaskInstance {
  return {
    templateId: template.id,
    buildingId: template.buildingId,
    workerId: template.workerId,
    title: template.title,
    description: template.description,
    category: template.category,
    priority: template.priority,
    frequency: template.frequency,
    estimatedDuration: template.estimatedDuration,
    requiresPhoto: template.requiresPhoto,
    scheduledDate: date
  };
}

/** Materializes today's task instances from the active routine templates. */
export class InstanceGenerator {
  constructor(
    private readonly tasks: TaskStore,
    private readonly events?: OpsEvents
  ) {}

  async generateForDate(date: DateKey): Promise<GenerationReport> {
    const day = parseDateKey(date);
    // Failing to read templates fails the run; per-template failures do not.
    const templates = await this.tasks.activeTemplates();

    const report: GenerationReport = { created: 0, skippedExisting: 0, skippedNotDue: 0, failed: 0 };
    const touchedBuildings = new Set<string>();

    for (const t of templates) {
      if (!isDue(t, day)) {
        report.skippedNotDue++;
        continue;
      }
      try {
        if (await this.tasks.findInstance(t.id, date)) {
          report.skippedExisting++;
          continue;
        }
        await this.tasks.insertInstance(instanceFrom(t, date));
        report.created++;
        touchedBuildings.add(t.buildingId);
      } catch (e) {
        report.failed++;
        console.error("[generator] instance failed", { templateId: t.id, date, error: errorMessage(e) });
      }
    }

    console.log("[generator] done", { date, ...report });
    this.events?.emit("instancesGenerated", { date, report });
    if (touchedBuildings.size > 0) {
      this.events?.emit("metricsInvalidated", { date, buildingIds: [...touchedBuildings].sort() });
    }
    return report;
  }
}
