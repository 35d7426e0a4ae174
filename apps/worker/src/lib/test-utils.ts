import { randomUUID } from "node:crypto";
import type { Clock } from "./calendar.js";
import { Db } from "./db.js";
import type { DatasetSource, OperationalDataset } from "../migration/dataset.js";

export type TestClock = Clock & {
  set(iso: string): void;
  advance(ms: number): void;
};

export function fixedClock(iso: string): TestClock {
  let current = new Date(iso);
  return {
    now: () => new Date(current.getTime()),
    set(next) {
      current = new Date(next);
    },
    advance(ms) {
      current = new Date(current.getTime() + ms);
    }
  };
}

export function createTestDb(): Promise<Db> {
  return Db.open(":memory:");
}

const capabilities = {
  canUploadPhotos: true,
  canAddNotes: true,
  canViewMap: false,
  canAddEmergencyTasks: false,
  requiresPhotoForSanitation: true,
  simplifiedInterface: false
};

export function sampleDataset(): OperationalDataset {
  return {
    version: "test-1",
    workers: [
      {
        id: "w1",
        name: "Test Worker One",
        email: "one@example.com",
        role: "maintenance",
        shift: "day",
        hireDate: "2020-01-01",
        capabilities: { ...capabilities }
      },
      {
        id: "w2",
        name: "Test Worker Two",
        email: "two@example.com",
        role: "sanitation",
        shift: "evening",
        hireDate: "2021-06-15",
        capabilities: { ...capabilities, canViewMap: true }
      }
    ],
    buildings: [
      {
        id: "b1",
        name: "Test Building A",
        address: "1 Test Street",
        type: "residential",
        floors: 5,
        hasElevator: true,
        hasDoorman: false,
        latitude: 40.1,
        longitude: -73.1
      },
      {
        id: "b2",
        name: "Test Building B",
        address: "2 Test Street",
        type: "commercial",
        floors: 3,
        hasElevator: false,
        hasDoorman: true,
        latitude: 40.2,
        longitude: -73.2
      }
    ],
    routines: [
      { workerId: "w1", buildingId: "b1", taskName: "Hallway sweep", category: "cleaning", skillLevel: "basic", recurrence: "daily" },
      {
        workerId: "w1",
        buildingId: "b1",
        taskName: "Boiler inspection",
        category: "maintenance",
        skillLevel: "advanced",
        recurrence: "weekly",
        daysOfWeek: "mon"
      },
      {
        workerId: "w2",
        buildingId: "b2",
        taskName: "Trash room wipe-down",
        category: "sanitation",
        skillLevel: "basic",
        recurrence: "Weekdays",
        requiresPhoto: true,
        estimatedDuration: 15
      },
      // Same worker, building and name as the first routine.
      { workerId: "w1", buildingId: "b1", taskName: "Hallway sweep", category: "cleaning", skillLevel: "basic", recurrence: "daily" },
      { workerId: "", buildingId: "b2", taskName: "Orphan routine", category: "cleaning", skillLevel: "basic", recurrence: "daily" }
    ]
  };
}

export type MutableDatasetSource = DatasetSource & {
  dataset: OperationalDataset;
  loads: number;
};

export function inMemoryDatasetSource(dataset: OperationalDataset = sampleDataset()): MutableDatasetSource {
  const source: MutableDatasetSource = {
    dataset,
    loads: 0,
    describe: () => "<memory>",
    load: async () => {
      source.loads++;
      return source.dataset;
    }
  };
  return source;
}

export type TemplateSeed = {
  id?: string;
  workerId?: string;
  buildingId?: string;
  title?: string;
  category?: string;
  frequency?: string;
  daysOfWeek?: string | null;
  priority?: string;
  isActive?: boolean;
};

export async function seedTemplate(db: Db, seed: TemplateSeed = {}): Promise<string> {
  const id = seed.id ?? randomUUID();
  const now = "2024-01-01T00:00:00.000Z";
  await db.run(
    `INSERT INTO routine_templates (
      id, worker_id, building_id, title, description, category, skill_level,
      frequency, days_of_week, estimated_duration, requires_photo, priority,
      start_hour, end_hour, is_active, created_at, updated_at
    ) VALUES (?, ?, ?, ?, 'Routine maintenance task', ?, 'basic', ?, ?, 30, 0, ?, NULL, NULL, ?, ?, ?)`,
    [
      id,
      seed.workerId ?? "w1",
      seed.buildingId ?? "b1",
      seed.title ?? `Template ${id.slice(0, 8)}`,
      seed.category ?? "cleaning",
      seed.frequency ?? "daily",
      seed.daysOfWeek ?? null,
      seed.priority ?? "normal",
      seed.isActive === false ? 0 : 1,
      now,
      now
    ]
  );
  return id;
}

export async function seedInstance(
  db: Db,
  seed: { templateId: string; scheduledDate: string; status: "pending" | "completed"; updatedAt: string; id?: string }
): Promise<string> {
  const id = seed.id ?? randomUUID();
  await db.run(
    `INSERT INTO routine_tasks (
      id, template_id, building_id, worker_id, title, description, category, priority,
      status, frequency, estimated_duration, requires_photo, scheduled_date, created_at, updated_at
    ) VALUES (?, ?, 'b1', 'w1', 'Seeded task', 'Routine maintenance task', 'cleaning', 'normal', ?, 'daily', 30, 0, ?, ?, ?)`,
    [id, seed.templateId, seed.status, seed.scheduledDate, seed.updatedAt, seed.updatedAt]
  );
  return id;
}

export async function seedSession(db: Db, seed: { id: string; clockIn: string; clockOut: string | null }): Promise<void> {
  await db.run(
    "INSERT INTO work_sessions (id, worker_id, building_id, clock_in_time, clock_out_time) VALUES (?, 'w1', 'b1', ?, ?)",
    [seed.id, seed.clockIn, seed.clockOut]
  );
}

export async function seedCompletion(db: Db, seed: { id: string; taskId: string; completedAt: string }): Promise<void> {
  await db.run("INSERT INTO task_completions (id, task_id, worker_id, completed_at) VALUES (?, ?, 'w1', ?)", [
    seed.id,
    seed.taskId,
    seed.completedAt
  ]);
}

export async function seedAttachment(db: Db, seed: { id: string; completionId: string; createdAt: string }): Promise<void> {
  await db.run("INSERT INTO photo_evidence (id, completion_id, file_path, created_at) VALUES (?, ?, ?, ?)", [
    seed.id,
    seed.completionId,
    `photos/${seed.id}.jpg`,
    seed.createdAt
  ]);
}

export async function count(db: Db, table: string): Promise<number> {
  const row = await db.get<{ n: number }>(`SELECT COUNT(*) AS n FROM ${table}`);
  return row?.n ?? 0;
}
