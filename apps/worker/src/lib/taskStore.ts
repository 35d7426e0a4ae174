import { randomUUID } from "node:crypto";
import type { Db } from "./db.js";
import { systemClock, type Clock, type DateKey } from "./calendar.js";

export type TaskStatus = "pending" | "completed";

export type RoutineTemplate = {
  id: string;
  workerId: string;
  buildingId: string;
  title: string;
  description: string;
  category: string;
  skillLevel: string;
  frequency: string;
  // Raw comma list ("mon,wed"); null means any day.
  daysOfWeek: string | null;
  estimatedDuration: number;
  requiresPhoto: boolean;
  priority: string;
  startHour: number | null;
  endHour: number | null;
  isActive: boolean;
};

export type TaskInstance = {
  id: string;
  templateId: string;
  buildingId: string;
  workerId: string;
  title: string;
  description: string;
  category: string;
  priority: string;
  status: TaskStatus;
  frequency: string;
  estimatedDuration: number;
  requiresPhoto: boolean;
  scheduledDate: DateKey;
  createdAt: string;
  updatedAt: string;
};

export type NewTaskInstance = Omit<TaskInstance, "id" | "status" | "createdAt" | "updatedAt">;

type TemplateRow = {
  id: string;
  worker_id: string;
  building_id: string;
  title: string;
  description: string;
  category: string;
  skill_level: string;
  frequency: string;
  days_of_week: string | null;
  estimated_duration: number;
  requires_photo: number;
  priority: string;
  start_hour: number | null;
  end_hour: number | null;
  is_active: number;
};

type InstanceRow = {
  id: string;
  template_id: string;
  building_id: string;
  worker_id: string;
  title: string;
  description: string;
  category: string;
  priority: string;
  status: TaskStatus;
  frequency: string;
  estimated_duration: number;
  requires_photo: number;
  scheduled_date: string;
  created_at: string;
  updated_at: string;
};

function toTemplate(r: TemplateRow): RoutineTemplate {
  return {
    id: r.id,
    workerId: r.worker_id,
    buildingId: r.building_id,
    title: r.title,
    description: r.description,
    category: r.category,
    skillLevel: r.skill_level,
    frequency: r.frequency,
    daysOfWeek: r.days_of_week,
    estimatedDuration: r.estimated_duration,
    requiresPhoto: r.requires_photo === 1,
    priority: r.priority,
    startHour: r.start_hour,
    endHour: r.end_hour,
    isActive: r.is_active === 1
  };
}

function toInstance(r: InstanceRow): TaskInstance {
  return {
    id: r.id,
    templateId: r.template_id,
    buildingId: r.building_id,
    workerId: r.worker_id,
    title: r.title,
    description: r.description,
    category: r.category,
    priority: r.priority,
    status: r.status,
    frequency: r.frequency,
    estimatedDuration: r.estimated_duration,
    requiresPhoto: r.requires_photo === 1,
    scheduledDate: r.scheduled_date,
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

// Highest first when ordering templates for generation.
const PRIORITY_RANK_SQL = `CASE priority WHEN 'urgent' THEN 3 WHEN 'high' THEN 2 WHEN 'normal' THEN 1 ELSE 0 END`;

/** Templates, instances and the history tables the retention sweep reclaims. */
export class TaskStore {
  constructor(
    private readonly db: Db,
    private readonly clock: Clock = systemClock
  ) {}

  async activeTemplates(): Promise<RoutineTemplate[]> {
    const rows = await this.db.all<TemplateRow>(
      `SELECT * FROM routine_templates
       WHERE is_active = 1
       ORDER BY worker_id, building_id, ${PRIORITY_RANK_SQL} DESC, title`
    );
    return rows.map(toTemplate);
  }

  async findInstance(templateId: string, date: DateKey): Promise<TaskInstance | null> {
    const row = await this.db.get<InstanceRow>(
      "SELECT * FROM routine_tasks WHERE template_id = ? AND scheduled_date = ?",
      [templateId, date]
    );
    return row ? toInstance(row) : null;
  }

  async insertInstance(input: NewTaskInstance): Promise<TaskInstance> {
    const now = this.clock.now().toISOString();
    const instance: TaskInstance = { ...input, id: randomUUID(), status: "pending", createdAt: now, updatedAt: now };
    await this.db.run(
      `INSERT INTO routine_tasks (
        id, template_id, building_id, worker_id, title, description, category, priority,
        status, frequency, estimated_duration, requires_photo, scheduled_date, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        instance.id,
        instance.templateId,
        instance.buildingId,
        instance.workerId,
        instance.title,
        instance.description,
        instance.category,
        instance.priority,
        instance.status,
        instance.frequency,
        instance.estimatedDuration,
        instance.requiresPhoto ? 1 : 0,
        instance.scheduledDate,
        instance.createdAt,
        instance.updatedAt
      ]
    );
    return instance;
  }

  async instancesForDate(date: DateKey): Promise<TaskInstance[]> {
    const rows = await this.db.all<InstanceRow>(
      "SELECT * FROM routine_tasks WHERE scheduled_date = ? ORDER BY worker_id, building_id, title",
      [date]
    );
    return rows.map(toInstance);
  }

  async expiredCompletedInstanceIds(cutoffIso: string): Promise<string[]> {
    const rows = await this.db.all<{ id: string }>(
      "SELECT id FROM routine_tasks WHERE status = 'completed' AND updated_at < ? ORDER BY updated_at",
      [cutoffIso]
    );
    return rows.map((r) => r.id);
  }

  async expiredClosedSessionIds(cutoffIso: string): Promise<string[]> {
    const rows = await this.db.all<{ id: string }>(
      "SELECT id FROM work_sessions WHERE clock_out_time IS NOT NULL AND clock_out_time < ? ORDER BY clock_out_time",
      [cutoffIso]
    );
    return rows.map((r) => r.id);
  }

  async orphanedAttachmentIds(): Promise<string[]> {
    const rows = await this.db.all<{ id: string }>(
      `SELECT p.id FROM photo_evidence p
       LEFT JOIN task_completions c ON c.id = p.completion_id
       WHERE c.id IS NULL
       ORDER BY p.id`
    );
    return rows.map((r) => r.id);
  }

  // Each delete re-checks its eligibility predicate.
  async deleteCompletedInstance(id: string, cutoffIso: string): Promise<boolean> {
    const res = await this.db.run(
      "DELETE FROM routine_tasks WHERE id = ? AND status = 'completed' AND updated_at < ?",
      [id, cutoffIso]
    );
    return res.changes > 0;
  }

  async deleteClosedSession(id: string, cutoffIso: string): Promise<boolean> {
    const res = await this.db.run(
      "DELETE FROM work_sessions WHERE id = ? AND clock_out_time IS NOT NULL AND clock_out_time < ?",
      [id, cutoffIso]
    );
    return res.changes > 0;
  }

  async deleteAttachment(id: string): Promise<boolean> {
    const res = await this.db.run(
      "DELETE FROM photo_evidence WHERE id = ? AND completion_id NOT IN (SELECT id FROM task_completions)",
      [id]
    );
    return res.changes > 0;
  }
}
