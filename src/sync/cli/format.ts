import type { SyncRunSummary } from "@/sync/types";
import type { SyncRunRecord } from "@/sync/ledger/types";

export function formatStats(summary: Pick<SyncRunSummary, "stats" | "matchedResources" | "totalMasterResources">): string {
  const { created, updated, deleted, unchanged, errors } = summary.stats;
  return [
    `Resources matched: ${summary.matchedResources}/${summary.totalMasterResources}`,
    `created=${created} updated=${updated} deleted=${deleted} unchanged=${unchanged} errors=${errors}`,
  ].join("\n");
}

export function formatRunHistory(runs: readonly SyncRunRecord[]): string {
  if (runs.length === 0) return "No sync runs recorded yet.";
  return runs
    .map((run) => {
      const { created, updated, deleted, unchanged, errors } = run.stats;
      const flags = run.dryRun ? " (dry run)" : "";
      return `${run.startedAt} ${run.status}${flags} year=${run.year} matched=${run.matchedResources}/${run.totalMasterResources} ` +
        `+${created} ~${updated} -${deleted} =${unchanged} !${errors}`;
    })
    .join("\n");
}
