import type { SyncStats } from "@/sync/types";

export type RunMode = "interactive" | "automated";

export type RunStatus = "running" | "completed" | "failed";

export interface SyncRunRecord {
  id: number;
  runId: string;
  startedAt: string;
  completedAt: string | null;
  mode: RunMode;
  dryRun: boolean;
  year: number;
  stats: SyncStats;
  matchedResources: number;
  totalMasterResources: number;
  status: RunStatus;
}
