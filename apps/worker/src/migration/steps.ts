import { randomUUID } from "node:crypto";
import type { Db } from "../lib/db.js";
import type { DatasetRoutine, OperationalDataset } from "./dataset.js";

export type StepContext = {
  db: Db;
  dataset: OperationalDataset;
  // ISO timestamp shared by every row written in one attempt.
  now: string;
};

export type StepResult = {
  inserted: number;
  skipped: number;
};

export type MigrationStep = {
  // Schema version this step belongs to; steps run while the stored version is below it.
  version: number;
  key: string;
  description: string;
  run(ctx: StepContext): Promise<StepResult>;
};

export function stepKey(version: number, name: string): string {
  return `v${version}.${name}`;
}

const DEFAULT_DURATION_MINUTES = 30;
const DEFAULT_TEMPLATE_DESCRIPTION = "Routine maintenance task";
const DEFAULT_DAYS_OF_WEEK = "mon,tue,wed,thu,fri";
const DEFAULT_START_HOUR = 0;
const DEFAULT_END_HOUR = 23;

export function determinePriority(routine: Pick<DatasetRoutine, "taskName" | "category">): string {
  const name = routine.taskName.toLowerCase();
  if (name.includes("emergency")) return "urgent";
  if (name.includes("inspection") || name.includes("compliance")) return "high";
  if (routine.category.toLowerCase() === "sanitation") return "high";
  return "normal";
}

function hasIds(r: DatasetRoutine): boolean {
  return r.workerId.trim() !== "" && r.buildingId.trim() !== "";
}

// Every step may run again: inserts ignore existing rows and capabilities are upserted.

async function importWorkers({ db, dataset, now }: StepContext): Promise<StepResult> {
  let inserted = 0;
  for (const w of dataset.workers) {
    const res = await db.run(
      `INSERT OR IGNORE INTO workers (id, name, email, role, shift, hire_date, is_active, created_at)
       VALUES (?, ?, ?, ?, ?, ?, 1, ?)`,
      [w.id, w.name, w.email, w.role, w.shift, w.hireDate, now]
    );
    inserted += res.changes;
  }
  return { inserted, skipped: dataset.workers.length - inserted };
}

async function importBuildings({ db, dataset, now }: StepContext): Promise<StepResult> {
  let inserted = 0;
  for (const b of dataset.buildings) {
    const res = await db.run(
      `INSERT OR IGNORE INTO buildings (
        id, name, address, type, floors, has_elevator, has_doorman,
        latitude, longitude, is_active, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 1, ?, ?)`,
      [
        b.id,
        b.name,
        b.address,
        b.type,
        b.floors,
        b.hasElevator ? 1 : 0,
        b.hasDoorman ? 1 : 0,
        b.latitude,
        b.longitude,
        now,
        now
      ]
    );
    inserted += res.changes;
  }
  return { inserted, skipped: dataset.buildings.length - inserted };
}

async function importRoutineTemplates({ db, dataset, now }: StepContext): Promise<StepResult> {
  let inserted = 0;
  let skipped = 0;
  const seen = new Set<string>();

  for (const r of dataset.routines) {
    if (!hasIds(r)) {
      console.warn(`[migration] skipping routine with missing ids: "${r.taskName}"`);
      skipped++;
      continue;
    }
    const templateKey = `${r.workerId}-${r.buildingId}-${r.taskName}`;
    if (seen.has(templateKey)) {
      skipped++;
      continue;
    }
    seen.add(templateKey);

    const days = r.daysOfWeek?.trim().toLowerCase();
    const res = await db.run(
      `INSERT OR IGNORE INTO routine_templates (
        id, worker_id, building_id, title, description, category, skill_level,
        frequency, days_of_week, estimated_duration, requires_photo, priority,
        start_hour, end_hour, is_active, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1, ?, ?)`,
      [
        randomUUID(),
        r.workerId,
        r.buildingId,
        r.taskName,
        DEFAULT_TEMPLATE_DESCRIPTION,
        r.category,
        r.skillLevel,
        r.recurrence.trim().toLowerCase(),
        days ? days : DEFAULT_DAYS_OF_WEEK,
        r.estimatedDuration ?? DEFAULT_DURATION_MINUTES,
        r.requiresPhoto ? 1 : 0,
        determinePriority(r),
        r.startHour ?? DEFAULT_START_HOUR,
        r.endHour ?? DEFAULT_END_HOUR,
        now,
        now
      ]
    );
    if (res.changes > 0) inserted++;
    else skipped++;
  }
  return { inserted, skipped };
}

async function createWorkerAssignments({ db, dataset, now }: StepContext): Promise<StepResult> {
  let inserted = 0;
  let skipped = 0;
  const pairs = new Set<string>();

  for (const r of dataset.routines) {
    if (!hasIds(r)) continue;
    const pair = `${r.workerId}-${r.buildingId}`;
    if (pairs.has(pair)) continue;
    pairs.add(pair);

    const res = await db.run(
      `INSERT OR IGNORE INTO worker_assignments (id, worker_id, building_id, role, is_primary, created_at)
       VALUES (?, ?, ?, 'maintenance', 1, ?)`,
      [randomUUID(), r.workerId, r.buildingId, now]
    );
    if (res.changes > 0) inserted++;
    else skipped++;
  }
  return { inserted, skipped };
}

async function setupWorkerCapabilities({ db, dataset, now }: StepContext): Promise<StepResult> {
  for (const w of dataset.workers) {
    const c = w.capabilities;
    await db.run(
      `INSERT INTO worker_capabilities (
        worker_id, can_upload_photos, can_add_notes, can_view_map, can_add_emergency_tasks,
        requires_photo_for_sanitation, simplified_interface, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (worker_id) DO UPDATE SET
        can_upload_photos = excluded.can_upload_photos,
        can_add_notes = excluded.can_add_notes,
        can_view_map = excluded.can_view_map,
        can_add_emergency_tasks = excluded.can_add_emergency_tasks,
        requires_photo_for_sanitation = excluded.requires_photo_for_sanitation,
        simplified_interface = excluded.simplified_interface,
        updated_at = excluded.updated_at`,
      [
        w.id,
        c.canUploadPhotos ? 1 : 0,
        c.canAddNotes ? 1 : 0,
        c.canViewMap ? 1 : 0,
        c.canAddEmergencyTasks ? 1 : 0,
        c.requiresPhotoForSanitation ? 1 : 0,
        c.simplifiedInterface ? 1 : 0,
        now
      ]
    );
  }
  return { inserted: dataset.workers.length, skipped: 0 };
}

/** Declared order is execution order. Keys are permanent once released. */
export const MIGRATION_STEPS: readonly MigrationStep[] = [
  { version: 1, key: stepKey(1, "import-workers"), description: "Importing workers", run: importWorkers },
  { version: 1, key: stepKey(1, "import-buildings"), description: "Importing buildings", run: importBuildings },
  {
    version: 1,
    key: stepKey(1, "import-routine-templates"),
    description: "Importing routine templates",
    run: importRoutineTemplates
  },
  {
    version: 1,
    key: stepKey(1, "create-worker-assignments"),
    description: "Creating worker assignments",
    run: createWorkerAssignments
  },
  {
    version: 1,
    key: stepKey(1, "setup-worker-capabilities"),
    description: "Setting up worker capabilities",
    run: setupWorkerCapabilities
  }
];
