import path from "node:path";
import "dotenv/config";
import { z } from "zod";
import { LogLevelSchema, type LogLevel } from "./utils/logger";

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBED_MODEL: z.string().min(1).default("text-embedding-3-large"),
  EMBED_BATCH_SIZE: z.coerce.number().int().positive().default(32),
  DUPLICATE_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
  DEFAULT_VARIANT_MULTIPLIER: z.coerce.number().positive().default(1.2),
  ALLOCATOR_RUN_WINDOW: z.coerce.number().int().positive().default(200),
  QUALITY_WARNING_DIVISOR: z.coerce.number().positive().default(5),
  STATS_WINDOW_DAYS: z.coerce.number().int().positive().default(30),
  DATA_DIR: z.string().min(1).default("data"),
  LOG_LEVEL: LogLevelSchema.default("info")
});

export type AppConfig = {
  openaiApiKey: string | null;
  embedModel: string;
  embedBatchSize: number;
  duplicateThreshold: number;
  defaultVariantMultiplier: number;
  allocatorRunWindow: number;
  qualityWarningDivisor: number;
  statsWindowDays: number;
  dataDir: string;
  logLevel: LogLevel;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    openaiApiKey: e.OPENAI_API_KEY?.trim() ? e.OPENAI_API_KEY.trim() : null,
    embedModel: e.OPENAI_EMBED_MODEL,
    embedBatchSize: e.EMBED_BATCH_SIZE,
    duplicateThreshold: e.DUPLICATE_SIMILARITY_THRESHOLD,
    defaultVariantMultiplier: e.DEFAULT_VARIANT_MULTIPLIER,
    allocatorRunWindow: e.ALLOCATOR_RUN_WINDOW,
    qualityWarningDivisor: e.QUALITY_WARNING_DIVISOR,
    statsWindowDays: e.STATS_WINDOW_DAYS,
    dataDir: path.resolve(e.DATA_DIR),
    logLevel: e.LOG_LEVEL
  };
}

export const config = loadConfig();
