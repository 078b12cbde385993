import winston from "winston";
import { getEnv } from "@/sync/config/env";

const { combine, timestamp, json, colorize, printf } = winston.format;

// Console lines read "12:00:01 info [sync-engine] (run 3f2a9c1e) Sync complete {...}"
const consoleLine = printf(({ timestamp: time, level, message, context, runId, ...rest }) => {
  const parts = [String(time), level];
  if (context) parts.push(`[${String(context)}]`);
  if (typeof runId === "string") parts.push(`(run ${runId.slice(0, 8)})`);
  parts.push(String(message));
  if (Object.keys(rest).length > 0) parts.push(JSON.stringify(rest));
  return parts.join(" ");
});

export const logger = winston.createLogger({
  level: getEnv().SYNC_LOG_LEVEL,
  format:
    process.env.NODE_ENV === "production"
      ? combine(timestamp(), json())
      : combine(timestamp({ format: "HH:mm:ss" }), colorize(), consoleLine),
  transports: [new winston.transports.Console()],
});

/** Every module logs through a child tagged with where the line came from. */
export function createChildLogger(context: string): winston.Logger {
  return logger.child({ context });
}
