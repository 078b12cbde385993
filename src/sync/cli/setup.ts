import type { SyncEnv } from "@/sync/config/env";
import { parseMatchFields } from "@/sync/config/env";
import { fleetCredentialsSchema, syncYearSchema, type FleetCredentials } from "@/sync/types/api";
import { FleetAuth } from "@/sync/fleet/auth";
import { FleetClient } from "@/sync/fleet/client";
import { createDependencies, type SyncDependencies, type SyncOptions } from "@/sync";
import { defaultStrategies } from "@/sync/matching/strategies";

export interface CliArgs {
  auto: boolean;
  history: boolean;
  dryRun?: boolean;
  year?: number;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    auto: argv.includes("--auto") || argv.includes("--once"),
    history: argv.includes("--history"),
  };
  if (argv.includes("--dry-run")) args.dryRun = true;

  const yearArg = argv.find((a) => a.startsWith("--year="));
  if (yearArg) {
    const parsed = syncYearSchema.safeParse(yearArg.slice("--year=".length));
    if (!parsed.success) {
      throw new Error(`Invalid --year: ${parsed.error.issues.map((i) => i.message).join(", ")}`);
    }
    args.year = parsed.data;
  }
  return args;
}

export function getCliCredentials(env: SyncEnv): { master: FleetCredentials; local: FleetCredentials } {
  if (!env.MASTER_CLIENT_ID || !env.MASTER_CLIENT_SECRET) {
    throw new Error("MASTER_CLIENT_ID and MASTER_CLIENT_SECRET must be set in .env.local.");
  }
  if (!env.LOCAL_CLIENT_ID || !env.LOCAL_CLIENT_SECRET) {
    throw new Error("LOCAL_CLIENT_ID and LOCAL_CLIENT_SECRET must be set in .env.local.");
  }
  const shared = { authUrl: env.FLEET_AUTH_URL, baseUrl: env.FLEET_API_BASE_URL };
  return {
    master: fleetCredentialsSchema.parse({ clientId: env.MASTER_CLIENT_ID, clientSecret: env.MASTER_CLIENT_SECRET, ...shared }),
    local: fleetCredentialsSchema.parse({ clientId: env.LOCAL_CLIENT_ID, clientSecret: env.LOCAL_CLIENT_SECRET, ...shared }),
  };
}

export function resolveSyncOptions(env: SyncEnv, args: CliArgs, now = new Date()): SyncOptions {
  return {
    year: args.year ?? env.SYNC_YEAR ?? now.getUTCFullYear(),
    dryRun: args.dryRun ?? env.SYNC_DRY_RUN,
    strategies: defaultStrategies(parseMatchFields(env.SYNC_MATCH_FIELDS)),
  };
}

/**
 * Log in to both environments. Throws AuthenticationError before any sync
 * work happens if either side cannot produce a token.
 */
export async function connect(env: SyncEnv): Promise<SyncDependencies> {
  const credentials = getCliCredentials(env);
  const cachePath = env.SYNC_TOKEN_CACHE_PATH;

  const masterAuth = new FleetAuth(credentials.master, { cachePath });
  const localAuth = new FleetAuth(credentials.local, { cachePath });
  await masterAuth.getToken();
  await localAuth.getToken();

  return createDependencies(
    new FleetClient(masterAuth, credentials.master.baseUrl),
    new FleetClient(localAuth, credentials.local.baseUrl),
  );
}
