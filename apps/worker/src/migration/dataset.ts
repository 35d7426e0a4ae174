import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DatasetInvalidError, errorMessage } from "../lib/errors.js";

const capabilitiesSchema = z.object({
  canUploadPhotos: z.boolean(),
  canAddNotes: z.boolean(),
  canViewMap: z.boolean(),
  canAddEmergencyTasks: z.boolean(),
  requiresPhotoForSanitation: z.boolean(),
  simplifiedInterface: z.boolean()
});

const workerSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  email: z.string().email(),
  role: z.string().min(1),
  shift: z.string().min(1),
  hireDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  capabilities: capabilitiesSchema
});

const buildingSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  address: z.string().min(1),
  type: z.string().min(1),
  floors: z.number().int().positive(),
  hasElevator: z.boolean(),
  hasDoorman: z.boolean(),
  latitude: z.number(),
  longitude: z.number()
});

// Ids may be blank in the source; the template import skips those rows.
const routineSchema = z.object({
  workerId: z.string(),
  buildingId: z.string(),
  taskName: z.string().min(1),
  category: z.string().min(1),
  skillLevel: z.string().min(1),
  recurrence: z.string().min(1),
  startHour: z.number().int().min(0).max(23).optional(),
  endHour: z.number().int().min(0).max(23).optional(),
  daysOfWeek: z.string().optional(),
  estimatedDuration: z.number().int().positive().optional(),
  requiresPhoto: z.boolean().optional()
});

export const operationalDatasetSchema = z.object({
  version: z.string().min(1),
  workers: z.array(workerSchema),
  buildings: z.array(buildingSchema),
  routines: z.array(routineSchema)
});

export type WorkerCapabilities = z.infer<typeof capabilitiesSchema>;
export type DatasetWorker = z.infer<typeof workerSchema>;
export type DatasetBuilding = z.infer<typeof buildingSchema>;
export type DatasetRoutine = z.infer<typeof routineSchema>;
export type OperationalDataset = z.infer<typeof operationalDatasetSchema>;

/** Supplies the canonical dataset the migration imports. */
export type DatasetSource = {
  describe(): string;
  load(): Promise<OperationalDataset>;
};

export function parseOperationalDataset(input: unknown, source = "<memory>"): OperationalDataset {
  const parsed = operationalDatasetSchema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join(".") || "<root>"}: ${first.message}` : parsed.error.message;
    throw new DatasetInvalidError(source, where, { cause: parsed.error });
  }
  return parsed.data;
}

export function jsonFileDatasetSource(filePath: string): DatasetSource {
  return {
    describe: () => filePath,
    async load() {
      let raw: string;
      try {
        raw = await readFile(filePath, "utf8");
      } catch (e) {
        throw new DatasetInvalidError(filePath, `unreadable (${errorMessage(e)})`, { cause: e });
      }
      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (e) {
        throw new DatasetInvalidError(filePath, `not JSON (${errorMessage(e)})`, { cause: e });
      }
      return parseOperationalDataset(json, filePath);
    }
  };
}
