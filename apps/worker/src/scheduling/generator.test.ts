import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Db } from "../lib/db.js";
import { OpsEvents } from "../lib/events.js";
import { TaskStore } from "../lib/taskStore.js";
import { createTestDb, fixedClock, seedTemplate } from "../lib/test-utils.js";
import { InstanceGenerator } from "./generator.js";

// 2024-03-04 is a Monday.
const DATE = "2024-03-04";

describe("InstanceGenerator", () => {
  let db: Db;
  let tasks: TaskStore;
  let events: OpsEvents;
  let generator: InstanceGenerator;

  beforeEach(async () => {
    db = await createTestDb();
    tasks = new TaskStore(db, fixedClock("2024-03-04T05:01:00.000Z"));
    events = new OpsEvents();
    generator = new InstanceGenerator(tasks, events);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await db.close();
  });

  it("creates one pending instance per due active template", async () => {
    const daily = await seedTemplate(db, { title: "Lobby sweep", frequency: "daily" });
    await seedTemplate(db, { title: "Boiler check", frequency: "weekly", daysOfWeek: "tue" });
    await seedTemplate(db, { title: "Gutter clearing", frequency: "monthly", workerId: "w2", buildingId: "b2" });
    await seedTemplate(db, { title: "Retired task", frequency: "daily", isActive: false });

    const report = await generator.generateForDate(DATE);
    expect(report).toEqual({ created: 1, skippedExisting: 0, skippedNotDue: 2, failed: 0 });

    const instances = await tasks.instancesForDate(DATE);
    expect(instances).toHaveLength(1);
    expect(instances[0]).toMatchObject({
      templateId: daily,
      title: "Lobby sweep",
      description: "Routine maintenance task",
      category: "cleaning",
      priority: "normal",
      status: "pending",
      estimatedDuration: 30,
      requiresPhoto: false,
      scheduledDate: DATE,
      createdAt: "2024-03-04T05:01:00.000Z"
    });
  });

  it("never duplicates an instance for the same template and date", async () => {
    await seedTemplate(db, { title: "Lobby sweep", frequency: "daily" });

    await generator.generateForDate(DATE);
    const second = await generator.generateForDate(DATE);

    expect(second).toEqual({ created: 0, skippedExisting: 1, skippedNotDue: 0, failed: 0 });
    expect(await tasks.instancesForDate(DATE)).toHaveLength(1);
  });

  it("emits generation and metrics events", async () => {
    await seedTemplate(db, { title: "Lobby sweep", buildingId: "b2" });
    await seedTemplate(db, { title: "Stair mop", buildingId: "b1" });
    const generated = vi.fn();
    const invalidated = vi.fn();
    events.on("instancesGenerated", generated);
    events.on("metricsInvalidated", invalidated);

    await generator.generateForDate(DATE);
    await generator.generateForDate(DATE);

    expect(generated).toHaveBeenCalledTimes(2);
    expect(generated.mock.calls[0]?.[0]).toEqual({
      date: DATE,
      report: { created: 2, skippedExisting: 0, skippedNotDue: 0, failed: 0 }
    });
    // Nothing new on the second pass.
    expect(invalidated).toHaveBeenCalledTimes(1);
    expect(invalidated).toHaveBeenCalledWith({ date: DATE, buildingIds: ["b1", "b2"] });
  });

  it("isolates a failing insert and keeps going", async () => {
    await seedTemplate(db, { id: "tpl-alpha", title: "Alpha" });
    await seedTemplate(db, { id: "tpl-bravo", title: "Bravo" });
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(tasks, "insertInstance").mockRejectedValueOnce(new Error("disk full"));

    const report = await generator.generateForDate(DATE);

    expect(report).toEqual({ created: 1, skippedExisting: 0, skippedNotDue: 0, failed: 1 });
    expect(await tasks.findInstance("tpl-alpha", DATE)).toBeNull();
    expect(await tasks.findInstance("tpl-bravo", DATE)).not.toBeNull();
  });

  it("fails the run when templates cannot be read", async () => {
    vi.spyOn(tasks, "activeTemplates").mockRejectedValueOnce(new Error("database is locked"));
    await expect(generator.generateForDate(DATE)).rejects.toThrow("database is locked");
  });

  it("reads templates by worker, building and descending priority", async () => {
    await seedTemplate(db, { id: "t-normal", title: "A", priority: "normal" });
    await seedTemplate(db, { id: "t-urgent", title: "B", priority: "urgent" });
    await seedTemplate(db, { id: "t-high", title: "C", priority: "high" });
    await seedTemplate(db, { id: "t-other", title: "D", priority: "urgent", workerId: "w0" });

    const ids = (await tasks.activeTemplates()).map((t) => t.id);
    expect(ids).toEqual(["t-other", "t-urgent", "t-high", "t-normal"]);
  });
});
