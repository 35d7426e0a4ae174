export type OpsErrorCode =
  | "BACKUP_FAILED"
  | "INTEGRITY_CHECK_FAILED"
  | "STEP_EXECUTION_FAILED"
  | "DATABASE_ERROR"
  | "SERIALIZATION_FAILED"
  | "DATASET_INVALID";

export class OpsError extends Error {
  constructor(
    readonly code: OpsErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class BackupFailedError extends OpsError {
  constructor(readonly reason: string, options?: { cause?: unknown }) {
    super("BACKUP_FAILED", `Backup failed: ${reason}`, options);
  }
}

export class IntegrityCheckFailedError extends OpsError {
  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super("INTEGRITY_CHECK_FAILED", `Dataset checksum mismatch (expected ${expected}, got ${actual})`);
  }
}

export class StepExecutionFailedError extends OpsError {
  constructor(readonly stepId: string, cause: unknown) {
    super("STEP_EXECUTION_FAILED", `Migration step ${stepId} failed: ${errorMessage(cause)}`, { cause });
  }
}

export class DatabaseError extends OpsError {
  constructor(readonly sql: string, cause: unknown) {
    super("DATABASE_ERROR", `Database error: ${errorMessage(cause)}`, { cause });
  }
}

export class SerializationError extends OpsError {
  constructor(readonly path: string, reason: string) {
    super("SERIALIZATION_FAILED", `Cannot serialize value at ${path}: ${reason}`);
  }
}

export class DatasetInvalidError extends OpsError {
  constructor(readonly source: string, reason: string, options?: { cause?: unknown }) {
    super("DATASET_INVALID", `Operational dataset at ${source} is invalid: ${reason}`, options);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
