import { z } from "zod";
import { syncYearSchema } from "@/sync/types/api";

const envSchema = z.object({
  // Required for CLI runs; checked where credentials are assembled
  MASTER_CLIENT_ID: z.string().optional(),
  MASTER_CLIENT_SECRET: z.string().optional(),
  LOCAL_CLIENT_ID: z.string().optional(),
  LOCAL_CLIENT_SECRET: z.string().optional(),

  FLEET_API_BASE_URL: z
    .string()
    .url()
    .default("https://api.qargo.io/v1"),
  FLEET_AUTH_URL: z
    .string()
    .url()
    .default("https://api.qargo.com/v1/auth/token"),

  SYNC_YEAR: syncYearSchema.optional(),
  SYNC_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),
  SYNC_DRY_RUN: z
    .string()
    .default("false")
    .transform((v) => v === "true"),
  SYNC_LEDGER_PATH: z
    .string()
    .default("./sync_ledger.db"),
  SYNC_TOKEN_CACHE_PATH: z
    .string()
    .default("./.fleet_token.json"),
  SYNC_MATCH_FIELDS: z
    .string()
    .default("employeenumber,fleetno"),
});

export type SyncEnv = z.infer<typeof envSchema>;

let _env: SyncEnv | null = null;

export function parseEnv(source: NodeJS.ProcessEnv): SyncEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(
      `Sync environment validation failed:\n${problems}\n\nCopy .env.example to .env.local and fill in the values.`
    );
  }
  return result.data;
}

export function getEnv(): SyncEnv {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}

/**
 * "employeenumber,fleetno" -> [["employeenumber"], ["fleetno"]].
 * Fields joined with "+" must all match for that strategy.
 */
export function parseMatchFields(raw: string): string[][] {
  return raw
    .split(",")
    .map((group) => group.split("+").map((f) => f.trim()).filter((f) => f !== ""))
    .filter((group) => group.length > 0);
}
