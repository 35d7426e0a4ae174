import type { Db } from "./db.js";
import { systemClock, type Clock, type DateKey } from "./calendar.js";

const STATE_KEYS = {
  schemaVersion: "schema_version",
  lastDailyRunDate: "last_daily_run_date",
  lastBackupPath: "last_backup_path",
  lastBackupChecksum: "last_backup_checksum"
} as const;

type StateKey = (typeof STATE_KEYS)[keyof typeof STATE_KEYS];

export type MigrationLogEntry = {
  stepId: string;
  schemaVersion: number;
  completedAt: string;
  detail: string | null;
};

export type BackupRef = {
  path: string;
  checksum: string;
};

type MigrationLogRow = {
  step_id: string;
  schema_version: number;
  completed_at: string;
  detail: string | null;
};

/** Persisted run state: schema version, run marker, last backup and the migration log. */
export class StateStore {
  constructor(
    private readonly db: Db,
    private readonly clock: Clock = systemClock
  ) {}

  private async getValue(key: StateKey): Promise<string | null> {
    const row = await this.db.get<{ value: string }>("SELECT value FROM app_state WHERE key = ?", [key]);
    return row?.value ?? null;
  }

  private async setValue(key: StateKey, value: string): Promise<void> {
    await this.db.run(
      `INSERT INTO app_state (key, value, updated_at) VALUES (?, ?, ?)
       ON CONFLICT (key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
      [key, value, this.clock.now().toISOString()]
    );
  }

  async schemaVersion(): Promise<number> {
    const raw = await this.getValue(STATE_KEYS.schemaVersion);
    const n = raw === null ? 0 : Number(raw);
    return Number.isInteger(n) && n > 0 ? n : 0;
  }

  async setSchemaVersion(version: number): Promise<void> {
    const current = await this.schemaVersion();
    if (version < current) {
      throw new Error(`Schema version is monotonic (stored ${current}, refusing ${version})`);
    }
    await this.setValue(STATE_KEYS.schemaVersion, String(version));
  }

  lastDailyRunDate(): Promise<DateKey | null> {
    return this.getValue(STATE_KEYS.lastDailyRunDate);
  }

  async setLastDailyRunDate(date: DateKey): Promise<void> {
    await this.setValue(STATE_KEYS.lastDailyRunDate, date);
  }

  async lastBackup(): Promise<BackupRef | null> {
    const path = await this.getValue(STATE_KEYS.lastBackupPath);
    const checksum = await this.getValue(STATE_KEYS.lastBackupChecksum);
    if (!path || !checksum) return null;
    return { path, checksum };
  }

  async setLastBackup(ref: BackupRef): Promise<void> {
    await this.setValue(STATE_KEYS.lastBackupPath, ref.path);
    await this.setValue(STATE_KEYS.lastBackupChecksum, ref.checksum);
  }

  async migrationLog(): Promise<MigrationLogEntry[]> {
    const rows = await this.db.all<MigrationLogRow>(
      "SELECT step_id, schema_version, completed_at, detail FROM migration_log ORDER BY completed_at, step_id"
    );
    return rows.map((r) => ({
      stepId: r.step_id,
      schemaVersion: r.schema_version,
      completedAt: r.completed_at,
      detail: r.detail
    }));
  }

  async completedSteps(): Promise<Set<string>> {
    const rows = await this.db.all<{ step_id: string }>("SELECT step_id FROM migration_log");
    return new Set(rows.map((r) => r.step_id));
  }

  async markStepComplete(stepId: string, schemaVersion: number, detail: string | null): Promise<void> {
    await this.db.run(
      "INSERT OR IGNORE INTO migration_log (step_id, schema_version, completed_at, detail) VALUES (?, ?, ?, ?)",
      [stepId, schemaVersion, this.clock.now().toISOString(), detail]
    );
  }
}
