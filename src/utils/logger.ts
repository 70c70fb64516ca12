import "dotenv/config";
import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export const LogLevelSchema = z.enum(LOG_LEVELS);

export type LogLevel = z.infer<typeof LogLevelSchema>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

// Read per call so a bad unrelated setting never breaks logging at import time.
function currentLevel(): LogLevel {
  const parsed = LogLevelSchema.safeParse(process.env.LOG_LEVEL);
  return parsed.success ? parsed.data : "info";
}

function enabled(level: LogLevel) {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

function format(data: unknown) {
  if (data === undefined) return "";
  if (data instanceof Error) return data.stack ?? data.message;
  return JSON.stringify(data, null, 2);
}

export function logDebug(msg: string, data?: unknown) {
  if (!enabled("debug")) return;
  console.debug(`[DEBUG] ${msg}`, format(data));
}

export function logInfo(msg: string, data?: unknown) {
  if (!enabled("info")) return;
  console.log(`[INFO] ${msg}`, format(data));
}

export function logWarn(msg: string, data?: unknown) {
  if (!enabled("warn")) return;
  console.warn(`[WARN] ${msg}`, format(data));
}

export function logError(msg: string, data?: unknown) {
  if (!enabled("error")) return;
  console.error(`[ERROR] ${msg}`, format(data));
}
