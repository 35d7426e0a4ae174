import path from "node:path";
import { optionalEnv, positiveIntEnv } from "./env.js";
import { assertTimeZone } from "./calendar.js";

export type FireTime = {
  hour: number;
  minute: number;
};

export type OpsConfig = {
  dbPath: string;
  datasetPath: string;
  backupDir: string;

  // Local wall clock the daily pipeline is scheduled against.
  timezone: string;
  fireTime: FireTime;

  retentionDays: number;
  schemaTargetVersion: number;

  // Pinned known-good dataset digest; when unset the last backup's checksum is used.
  expectedDatasetChecksum?: string;
};

export const DEFAULT_FIRE_TIME: FireTime = { hour: 0, minute: 1 };

export function parseFireTime(raw: string | undefined): FireTime {
  if (!raw) return DEFAULT_FIRE_TIME;
  const m = /^(\d{1,2}):(\d{2})$/.exec(raw.trim());
  if (!m) throw new Error(`DAILY_FIRE_TIME must look like HH:MM (got "${raw}")`);
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  if (hour > 23 || minute > 59) throw new Error(`DAILY_FIRE_TIME out of range (got "${raw}")`);
  return { hour, minute };
}

export function formatFireTime(t: FireTime): string {
  return `${String(t.hour).padStart(2, "0")}:${String(t.minute).padStart(2, "0")}`;
}

function resolvePath(raw: string): string {
  return raw === ":memory:" ? raw : path.resolve(process.cwd(), raw);
}

export function opsConfig(): OpsConfig {
  const timezone = optionalEnv("OPS_TIMEZONE") ?? "America/New_York";
  assertTimeZone(timezone);

  return {
    dbPath: resolvePath(optionalEnv("OPS_DB_PATH") ?? "./data/ops.sqlite"),
    datasetPath: resolvePath(optionalEnv("OPS_DATASET_PATH") ?? "./data/operational-dataset.json"),
    backupDir: resolvePath(optionalEnv("OPS_BACKUP_DIR") ?? "./data/backups"),
    timezone,
    fireTime: parseFireTime(optionalEnv("DAILY_FIRE_TIME")),
    retentionDays: positiveIntEnv("RETENTION_DAYS", 90),
    schemaTargetVersion: positiveIntEnv("SCHEMA_TARGET_VERSION", 1),
    expectedDatasetChecksum: optionalEnv("EXPECTED_DATASET_CHECKSUM")?.toLowerCase()
  };
}
