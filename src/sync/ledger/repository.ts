import { z } from "zod";
import type { SyncStats } from "@/sync/types";
import { getDatabase } from "./db";
import type { RunMode, RunStatus, SyncRunRecord } from "./types";

export function createRun(runId: string, mode: RunMode, dryRun: boolean, year: number): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    INSERT INTO sync_runs (run_id, started_at, mode, dry_run, sync_year, stats_json, status)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(runId, now, mode, dryRun ? 1 : 0, year, "{}", "running");
}

export function completeRun(
  runId: string,
  stats: SyncStats,
  resources: { matched: number; total: number },
  status: Exclude<RunStatus, "running">,
): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    UPDATE sync_runs
    SET completed_at = ?, stats_json = ?, matched_resources = ?, total_master_resources = ?, status = ?
    WHERE run_id = ?
  `).run(now, JSON.stringify(stats), resources.matched, resources.total, status, runId);
}

/** Most recent runs first. */
export function listRuns(limit = 10): SyncRunRecord[] {
  const db = getDatabase();
  const rows = db
    .prepare("SELECT * FROM sync_runs ORDER BY started_at DESC, id DESC LIMIT ?")
    .all(limit) as RawRunRow[];
  return rows.map(toRunRecord);
}

// --- Internal helpers ---

interface RawRunRow {
  id: number;
  run_id: string;
  started_at: string;
  completed_at: string | null;
  mode: string;
  dry_run: number;
  sync_year: number;
  stats_json: string;
  matched_resources: number;
  total_master_resources: number;
  status: string;
}

const modeSchema = z.enum(["interactive", "automated"]);
const statusSchema = z.enum(["running", "completed", "failed"]);

const counter = z.number().int().nonnegative().default(0);

const statsSchema = z.object({
  created: counter,
  updated: counter,
  deleted: counter,
  unchanged: counter,
  errors: counter,
});

function toRunRecord(row: RawRunRow): SyncRunRecord {
  return {
    id: row.id,
    runId: row.run_id,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    mode: modeSchema.parse(row.mode),
    dryRun: row.dry_run === 1,
    year: row.sync_year,
    stats: statsSchema.parse(JSON.parse(row.stats_json)),
    matchedResources: row.matched_resources,
    totalMasterResources: row.total_master_resources,
    status: statusSchema.parse(row.status),
  };
}
