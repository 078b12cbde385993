import "./load-env";
import { runInteractiveSync } from "./interactive";
import { connect, parseArgs, resolveSyncOptions } from "./setup";
import { formatRunHistory, formatStats } from "./format";
import { SyncOrchestrator } from "@/sync";
import { getEnv } from "@/sync/config/env";
import { closeDatabase } from "@/sync/ledger/db";
import { listRuns } from "@/sync/ledger/repository";
import { errorMessage } from "@/sync/errors";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const env = getEnv();

  if (args.history) {
    console.log(formatRunHistory(listRuns(10)));
    closeDatabase();
    return;
  }

  if (args.auto) {
    // Headless mode — no prompts, summary as JSON
    const options = resolveSyncOptions(env, args);
    const deps = await connect(env);
    const summary = await new SyncOrchestrator(deps, { ...options, mode: "automated", useLedger: true }).run();
    console.log(formatStats(summary));
    console.log(JSON.stringify(summary, null, 2));
    closeDatabase();
  } else {
    await runInteractiveSync(env, args);
  }
}

main().catch((err: unknown) => {
  console.error("Sync failed:", errorMessage(err));
  closeDatabase();
  process.exit(1);
});
