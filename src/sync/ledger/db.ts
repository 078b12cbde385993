import Database from "better-sqlite3";
import path from "path";
import { parseEnv } from "@/sync/config/env";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS sync_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL UNIQUE,
  started_at TEXT NOT NULL,
  completed_at TEXT,
  mode TEXT NOT NULL,
  dry_run INTEGER NOT NULL DEFAULT 0,
  sync_year INTEGER NOT NULL,
  stats_json TEXT NOT NULL,
  matched_resources INTEGER NOT NULL DEFAULT 0,
  total_master_resources INTEGER NOT NULL DEFAULT 0,
  status TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_runs_started ON sync_runs(started_at);
`;

let _db: Database.Database | null = null;

// Read when the database is opened, not cached with the rest of the env
export function resolveLedgerPath(): string {
  const configured = parseEnv(process.env).SYNC_LEDGER_PATH;
  return configured === ":memory:" ? configured : path.resolve(configured);
}

export function getDatabase(): Database.Database {
  if (!_db) {
    const dbPath = resolveLedgerPath();
    _db = new Database(dbPath);
    if (dbPath !== ":memory:") _db.pragma("journal_mode = WAL");
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
