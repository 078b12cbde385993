import * as p from "@clack/prompts";
import { SyncOrchestrator } from "@/sync";
import type { SyncEnv } from "@/sync/config/env";
import { closeDatabase } from "@/sync/ledger/db";
import { syncYearSchema } from "@/sync/types/api";
import { AuthenticationError } from "@/sync/errors";
import type { SyncRunSummary } from "@/sync/types";
import type { SyncDependencies } from "@/sync";
import { connect, resolveSyncOptions, type CliArgs } from "./setup";
import { formatStats } from "./format";

export async function runInteractiveSync(env: SyncEnv, args: CliArgs): Promise<void> {
  p.intro("Unavailability Sync");

  const defaults = resolveSyncOptions(env, args);

  const yearInput = await p.text({
    message: "Which year should be synced?",
    initialValue: String(defaults.year),
    validate: (value) => {
      const parsed = syncYearSchema.safeParse(value);
      return parsed.success ? undefined : parsed.error.issues[0]?.message;
    },
  });
  if (p.isCancel(yearInput)) {
    p.outro("Sync cancelled.");
    return;
  }
  const year = syncYearSchema.parse(yearInput);

  const connectSpinner = p.spinner();
  connectSpinner.start("Signing in to both environments...");
  let deps: SyncDependencies;
  try {
    deps = await connect(env);
    connectSpinner.stop("Signed in.");
  } catch (error) {
    // Fatal: entry.ts prints the error and exits 1
    connectSpinner.stop(
      error instanceof AuthenticationError && error.reason === "network"
        ? "Sign-in failed: token endpoint unreachable."
        : "Sign-in failed.",
    );
    throw error;
  }

  const dryRun = defaults.dryRun ?? false;
  if (dryRun) {
    p.log.warn("Dry run: nothing will be written to the destination.");
  }

  const proceed = await p.confirm({
    message: `Sync ${year} unavailabilities from master to destination?`,
  });
  if (p.isCancel(proceed) || !proceed) {
    p.outro("Sync cancelled.");
    return;
  }

  const syncSpinner = p.spinner();
  syncSpinner.start("Syncing...");

  let summary: SyncRunSummary;
  try {
    summary = await new SyncOrchestrator(deps, {
      ...defaults,
      year,
      mode: "interactive",
      useLedger: true,
    }).run();
  } catch (error) {
    syncSpinner.stop("Sync failed.");
    throw error;
  }
  syncSpinner.stop("Sync finished.");

  if (summary.stats.errors > 0) {
    p.log.warn(`${summary.stats.errors} error(s) during sync. Check the log for details.`);
  } else {
    p.log.success("All matched resources synced.");
  }
  if (summary.unmatchedResources.length > 0) {
    p.log.info(`${summary.unmatchedResources.length} master resource(s) had no match and were skipped.`);
  }
  p.log.message(formatStats(summary));

  closeDatabase();
  p.outro("Done!");
}
