// Append-only. Statements are idempotent and run on every connection open.
export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS app_state (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS migration_log (
    step_id TEXT PRIMARY KEY,
    schema_version INTEGER NOT NULL,
    completed_at TEXT NOT NULL,
    detail TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS workers (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    email TEXT NOT NULL,
    role TEXT NOT NULL,
    shift TEXT NOT NULL,
    hire_date TEXT NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS buildings (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    address TEXT NOT NULL,
    type TEXT NOT NULL,
    floors INTEGER NOT NULL,
    has_elevator INTEGER NOT NULL,
    has_doorman INTEGER NOT NULL,
    latitude REAL NOT NULL,
    longitude REAL NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS worker_assignments (
    id TEXT PRIMARY KEY,
    worker_id TEXT NOT NULL,
    building_id TEXT NOT NULL,
    role TEXT NOT NULL,
    is_primary INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    UNIQUE (worker_id, building_id)
  )`,
  `CREATE TABLE IF NOT EXISTS worker_capabilities (
    worker_id TEXT PRIMARY KEY,
    can_upload_photos INTEGER NOT NULL,
    can_add_notes INTEGER NOT NULL,
    can_view_map INTEGER NOT NULL,
    can_add_emergency_tasks INTEGER NOT NULL,
    requires_photo_for_sanitation INTEGER NOT NULL,
    simplified_interface INTEGER NOT NULL,
    updated_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS routine_templates (
    id TEXT PRIMARY KEY,
    worker_id TEXT NOT NULL,
    building_id TEXT NOT NULL,
    title TEXT NOT NULL,
    description TEXT NOT NULL,
    category TEXT NOT NULL,
    skill_level TEXT NOT NULL,
    frequency TEXT NOT NULL,
    days_of_week TEXT,
    estimated_duration INTEGER NOT NULL,
    requires_photo INTEGER NOT NULL,
    priority TEXT NOT NULL,
    start_hour INTEGER,
    end_hour INTEGER,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (worker_id, building_id, title)
  )`,
  `CREATE TABLE IF NOT EXISTS routine_tasks (
    id TEXT PRIMARY KEY,
    template_id TEXT NOT NULL REFERENCES routine_templates(id),
    building_id TEXT NOT NULL,
    worker_id TEXT NOT NULL,
    title TEXT NOT NULL,
    description TEXT NOT NULL,
    category TEXT NOT NULL,
    priority TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('pending', 'completed')),
    frequency TEXT NOT NULL,
    estimated_duration INTEGER NOT NULL,
    requires_photo INTEGER NOT NULL,
    scheduled_date TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (template_id, scheduled_date)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_routine_tasks_status_updated ON routine_tasks (status, updated_at)`,
  `CREATE TABLE IF NOT EXISTS work_sessions (
    id TEXT PRIMARY KEY,
    worker_id TEXT NOT NULL,
    building_id TEXT NOT NULL,
    clock_in_time TEXT NOT NULL,
    clock_out_time TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS task_completions (
    id TEXT PRIMARY KEY,
    task_id TEXT NOT NULL,
    worker_id TEXT NOT NULL,
    completed_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS photo_evidence (
    id TEXT PRIMARY KEY,
    completion_id TEXT NOT NULL,
    file_path TEXT NOT NULL,
    created_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS system_task_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_name TEXT NOT NULL,
    task_type TEXT NOT NULL,
    scope_type TEXT NOT NULL,
    scope_target TEXT,
    cron_expr TEXT NOT NULL,
    timezone TEXT NOT NULL,
    last_run_at TEXT NOT NULL,
    next_run_at TEXT,
    last_status TEXT NOT NULL CHECK (last_status IN ('SUCCESS', 'ERROR', 'SKIPPED')),
    duration_ms INTEGER,
    note TEXT
  )`
];
