import Database from "better-sqlite3";
import path from "path";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS sync_records (
  local_key INTEGER PRIMARY KEY,
  remote_id TEXT,
  sync_status TEXT NOT NULL,
  last_synced TEXT,
  error_message TEXT,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sync_status ON sync_records(sync_status);

CREATE TABLE IF NOT EXISTS sync_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL UNIQUE,
  started_at TEXT NOT NULL,
  completed_at TEXT,
  watermark_before TEXT,
  watermark_after TEXT,
  mode TEXT NOT NULL,
  dry_run INTEGER NOT NULL DEFAULT 0,
  counts_json TEXT NOT NULL,
  status TEXT NOT NULL,
  error_message TEXT
);

CREATE INDEX IF NOT EXISTS idx_runs_status ON sync_runs(status, started_at);

CREATE TABLE IF NOT EXISTS pending_mints (
  local_key INTEGER PRIMARY KEY,
  remote_id TEXT UNIQUE,
  run_id TEXT NOT NULL,
  created_at TEXT NOT NULL,
  attempts INTEGER NOT NULL DEFAULT 0,
  status TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS audit_entries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL,
  local_key INTEGER NOT NULL,
  action TEXT NOT NULL,
  step TEXT,
  fields_changed TEXT,
  outcome TEXT NOT NULL,
  error_detail TEXT,
  timestamp TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_audit_run ON audit_entries(run_id);
CREATE INDEX IF NOT EXISTS idx_audit_key ON audit_entries(local_key, timestamp);
CREATE INDEX IF NOT EXISTS idx_audit_time ON audit_entries(timestamp);

CREATE TABLE IF NOT EXISTS run_lock (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  run_id TEXT NOT NULL,
  acquired_at TEXT NOT NULL,
  expires_at TEXT NOT NULL
);
`;

let _db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (!_db) {
    const configured = process.env.SYNC_LEDGER_PATH;
    const dbPath = configured === ":memory:"
      ? ":memory:"
      : configured
        ? path.resolve(configured)
        : path.resolve(process.cwd(), "sync_ledger.db");

    _db = new Database(dbPath);
    _db.pragma("journal_mode = WAL");
    _db.pragma("busy_timeout = 5000");
    _db.exec(SCHEMA);
  }
  return _db;
}

export function closeDatabase(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}
