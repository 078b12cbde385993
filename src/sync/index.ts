import { randomUUID } from "crypto";
import type {
  Environment,
  Resource,
  ResourcePair,
  ResourceSource,
  SyncAction,
  SyncResult,
  SyncRunSummary,
  SyncStats,
  Unavailability,
  UnavailabilitySource,
  UnavailabilityStore,
} from "@/sync/types";
import { createChildLogger } from "@/sync/logger";
import { ResourceListError, errorMessage } from "@/sync/errors";
import { attempt } from "@/sync/outcome";
import { matchResources } from "@/sync/matching/matcher";
import type { MatchStrategy } from "@/sync/matching/strategies";
import { reconcile, yearWindow } from "@/sync/reconcile/reconciler";
import type { FleetClient } from "@/sync/fleet/client";
import { FleetResourceSource, UnavailabilityRepository } from "@/sync/fleet/repository";
import { createRun, completeRun } from "@/sync/ledger/repository";
import type { RunMode } from "@/sync/ledger/types";

const log = createChildLogger("sync-engine");

export interface SyncDependencies {
  masterResources: ResourceSource;
  localResources: ResourceSource;
  /** Read-only: the master is never written to. */
  masterUnavailabilities: UnavailabilitySource;
  localUnavailabilities: UnavailabilityStore;
}

export interface SyncOptions {
  year: number;
  dryRun?: boolean;
  strategies?: MatchStrategy[];
  mode?: RunMode;
  useLedger?: boolean;
}

type WriteAction = Exclude<SyncAction, "failed">;

const VERB: Record<WriteAction, string> = {
  created: "create",
  updated: "update",
  deleted: "delete",
};

export function emptyStats(): SyncStats {
  return { created: 0, updated: 0, deleted: 0, unchanged: 0, errors: 0 };
}

export function createDependencies(master: FleetClient, local: FleetClient): SyncDependencies {
  return {
    masterResources: new FleetResourceSource(master),
    localResources: new FleetResourceSource(local),
    masterUnavailabilities: new UnavailabilityRepository(master),
    localUnavailabilities: new UnavailabilityRepository(local),
  };
}

/**
 * Brings the local environment's unavailabilities for one year in line with
 * the master's. Resources are matched once, then each matched pair is synced
 * in turn. A failure inside a pair is counted and logged and the run moves on;
 * only failing to list either side's resources stops it.
 */
export class SyncOrchestrator {
  private deps: SyncDependencies;
  private options: Required<Omit<SyncOptions, "strategies">> & Pick<SyncOptions, "strategies">;
  private stats: SyncStats = emptyStats();
  private results: SyncResult[] = [];

  constructor(deps: SyncDependencies, options: SyncOptions) {
    this.deps = deps;
    this.options = {
      year: options.year,
      dryRun: options.dryRun ?? false,
      strategies: options.strategies,
      mode: options.mode ?? "automated",
      useLedger: options.useLedger ?? false,
    };
  }

  async run(): Promise<SyncRunSummary> {
    const { year, dryRun, mode, useLedger } = this.options;
    const runId = randomUUID();
    const startedAt = new Date().toISOString();
    this.stats = emptyStats();
    this.results = [];

    log.info("Starting sync run", { runId, year, dryRun });
    if (useLedger) createRun(runId, mode, dryRun, year);

    let summary: SyncRunSummary;
    try {
      const masterResources = await this.listResources("master", this.deps.masterResources);
      const localResources = await this.listResources("local", this.deps.localResources);

      const { pairs, unmatched } = matchResources(masterResources, localResources, this.options.strategies);
      if (dryRun) log.info("Dry run: no changes will be written");

      for (const pair of pairs) {
        await this.syncPair(pair);
      }

      summary = {
        runId,
        startedAt,
        completedAt: new Date().toISOString(),
        year,
        dryRun,
        stats: { ...this.stats },
        matchedResources: pairs.length,
        totalMasterResources: pairs.length + unmatched.length,
        unmatchedResources: unmatched.map((r) => r.id),
        results: [...this.results],
      };
    } catch (error) {
      log.error("Sync run failed", { runId, error: errorMessage(error) });
      if (useLedger) completeRun(runId, this.stats, { matched: 0, total: 0 }, "failed");
      throw error;
    }

    log.info("Sync complete", {
      runId,
      stats: summary.stats,
      matched: `${summary.matchedResources}/${summary.totalMasterResources}`,
    });
    if (useLedger) {
      completeRun(
        runId,
        summary.stats,
        { matched: summary.matchedResources, total: summary.totalMasterResources },
        "completed",
      );
    }
    return summary;
  }

  private async listResources(environment: Environment, source: ResourceSource): Promise<Resource[]> {
    const outcome = await attempt(() => source.listResources());
    if (!outcome.ok) {
      throw new ResourceListError(environment, outcome.error);
    }
    log.info(`Loaded ${outcome.value.length} ${environment} resources`);
    return outcome.value;
  }

  private async syncPair(pair: ResourcePair): Promise<void> {
    const { year } = this.options;
    const window = yearWindow(year);

    const planned = await attempt(async () => {
      const master = await this.deps.masterUnavailabilities.getAllForResource(pair.master.id, window);
      const local = await this.deps.localUnavailabilities.getAllForResource(pair.local.id, window);
      return reconcile(pair, master, local, year);
    });

    if (!planned.ok) {
      log.error("Failed to sync unavailabilities for resource", {
        masterId: pair.master.id,
        localId: pair.local.id,
        error: planned.error,
      });
      this.stats.errors += 1;
      this.results.push({
        resourceId: pair.local.id,
        action: "failed",
        error: planned.error,
        timestamp: new Date().toISOString(),
      });
      return;
    }

    const plan = planned.value;
    const store = this.deps.localUnavailabilities;
    this.stats.unchanged += plan.unchanged;

    for (const record of plan.creates) {
      await this.apply(pair, "created", record, () => store.create(record));
    }
    for (const record of plan.updates) {
      await this.apply(pair, "updated", record, () => store.update(record));
    }
    for (const record of plan.deletes) {
      await this.apply(pair, "deleted", record, async () => {
        if (!record.id) throw new Error("Cannot delete unavailability without an ID");
        await store.delete(pair.local.id, record.id);
        return record;
      });
    }

    log.debug("Resource synced", {
      localId: pair.local.id,
      creates: plan.creates.length,
      updates: plan.updates.length,
      deletes: plan.deletes.length,
      unchanged: plan.unchanged,
    });
  }

  private async apply(
    pair: ResourcePair,
    action: WriteAction,
    record: Unavailability,
    write: () => Promise<Unavailability>,
  ): Promise<void> {
    const timestamp = () => new Date().toISOString();

    if (this.options.dryRun) {
      log.info(`Would ${VERB[action]} unavailability`, {
        localId: pair.local.id,
        id: record.id,
        startTime: record.startTime,
        endTime: record.endTime,
        reason: record.reason,
      });
      this.stats[action] += 1;
      this.results.push({ resourceId: pair.local.id, action, unavailabilityId: record.id ?? undefined, timestamp: timestamp() });
      return;
    }

    const outcome = await attempt(write);
    if (!outcome.ok) {
      log.error(`Failed to ${VERB[action]} unavailability`, {
        masterId: pair.master.id,
        localId: pair.local.id,
        id: record.id,
        startTime: record.startTime,
        error: outcome.error,
      });
      this.stats.errors += 1;
      this.results.push({
        resourceId: pair.local.id,
        action: "failed",
        unavailabilityId: record.id ?? undefined,
        error: outcome.error,
        timestamp: timestamp(),
      });
      return;
    }

    this.stats[action] += 1;
    this.results.push({
      resourceId: pair.local.id,
      action,
      unavailabilityId: outcome.value.id ?? undefined,
      timestamp: timestamp(),
    });
  }
}
