import { config as dotenvConfig } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors";

dotenvConfig();

const booleanString = (fallback: "true" | "false") =>
  z.string().default(fallback).transform((v) => v === "true");

const envSchema = z.object({
  OUTPUT_DIR: z.string().default("./output"),
  PROXY_URL: z.string().url().optional(),
  PLAYWRIGHT_HEADLESS: booleanString("true"),
  PLAYWRIGHT_SLOW_MO: z.coerce.number().default(0),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: booleanString("true"),
  ACQUISITION_MODE: z.enum(["browser", "api"]).default("browser"),
  SCRAPER_API_DELAY_MIN_MS: z.coerce.number().default(1000),
  SCRAPER_API_DELAY_MAX_MS: z.coerce.number().default(1500),
  SCRAPER_SCROLL_PIXELS: z.coerce.number().default(1200),
  SCRAPER_SCROLL_SETTLE_MS: z.coerce.number().default(1500),
  SCRAPER_NAVIGATION_TIMEOUT_MS: z.coerce.number().default(30000),
  PHASE2_MAX_NO_NEW_SEEDS: z.coerce.number().default(30),
  PHASE2_PER_SEED_CAP: z.coerce.number().default(50),
  DOWNLOAD_CONCURRENCY: z.coerce.number().int().positive().default(15),
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().default(30000),
  DOWNLOAD_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  DOWNLOAD_POLL_TIMEOUT_MS: z.coerce.number().default(1000),
  DOWNLOAD_MIN_FILE_BYTES: z.coerce.number().default(1024),
  SCHEDULER_PAGE_SIZE: z.coerce.number().int().positive().default(500),
  SCHEDULER_QUEUE_CAPACITY: z.coerce.number().int().positive().default(200),
  LOCK_STALE_SECONDS: z.coerce.number().default(3600),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration (${issues.join("; ")})`);
  }
  return result.data;
}

export const env: Env = parseEnv(process.env);
