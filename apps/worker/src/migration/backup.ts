import { randomUUID } from "node:crypto";
import { access, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { systemClock, type Clock } from "../lib/calendar.js";
import { BackupFailedError, errorMessage } from "../lib/errors.js";
import { checksum, type Digest } from "./checksum.js";
import type { OperationalDataset } from "./dataset.js";

export const BACKUP_FORMAT_VERSION = "1.0.0";

export type BackupCounts = {
  workers: number;
  buildings: number;
  routines: number;
};

export type BackupRecord = {
  path: string;
  checksum: Digest;
  createdAt: string;
  counts: BackupCounts;
};

export type BackupArtifact = {
  formatVersion: string;
  datasetVersion: string;
  timestamp: string;
  checksum: Digest;
  counts: BackupCounts;
  workerNames: string[];
  buildingNames: string[];
  dataset: OperationalDataset;
};

export class BackupService {
  private readonly clock: Clock;

  constructor(
    private readonly dir: string,
    opts: { clock?: Clock } = {}
  ) {
    this.clock = opts.clock ?? systemClock;
  }

  /** Writes one new artifact per call; an existing file is never replaced. */
  async createBackup(dataset: OperationalDataset): Promise<BackupRecord> {
    const createdAt = this.clock.now().toISOString();

    let digest: Digest;
    try {
      digest = checksum(dataset);
    } catch (e) {
      throw new BackupFailedError(`cannot checksum dataset (${errorMessage(e)})`, { cause: e });
    }

    const counts: BackupCounts = {
      workers: dataset.workers.length,
      buildings: dataset.buildings.length,
      routines: dataset.routines.length
    };
    const artifact: BackupArtifact = {
      formatVersion: BACKUP_FORMAT_VERSION,
      datasetVersion: dataset.version,
      timestamp: createdAt,
      checksum: digest,
      counts,
      workerNames: dataset.workers.map((w) => w.name),
      buildingNames: dataset.buildings.map((b) => b.name),
      dataset
    };

    const stamp = createdAt.replace(/[-:.]/g, "");
    const filePath = path.join(this.dir, `operational_backup_${stamp}_${randomUUID().slice(0, 8)}.json`);
    try {
      await mkdir(this.dir, { recursive: true });
      await writeFile(filePath, JSON.stringify(artifact, null, 2), { encoding: "utf8", flag: "wx" });
    } catch (e) {
      throw new BackupFailedError(`cannot write ${filePath} (${errorMessage(e)})`, { cause: e });
    }

    console.log("[backup] created", { path: filePath, checksum: digest, ...counts });
    return { path: filePath, checksum: digest, createdAt, counts };
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
