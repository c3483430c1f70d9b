import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const envSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  REDIS_URL: z.string().url().optional(),
  ARCHIVE_DIR: z.string().min(1).default("downloads/archive"),
  LISTS_FILE: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  WORKER_NAME: z.string().min(1).default("worker"),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(2)
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export type WorkerConfig = {
  databaseUrl: string | undefined;
  redisUrl: string | undefined;
  archiveDir: string;
  listsFile: string;
  logLevel: LogLevel;
  workerName: string;
  concurrency: number;
};

export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const blankAsMissing = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1] !== "")
  );
  const parsed = envSchema.safeParse(blankAsMissing);
  if (!parsed.success) {
    throw new ConfigError({
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    });
  }

  const values = parsed.data;
  return {
    databaseUrl: values.DATABASE_URL,
    redisUrl: values.REDIS_URL,
    archiveDir: values.ARCHIVE_DIR,
    listsFile: values.LISTS_FILE ?? path.join(values.ARCHIVE_DIR, "lists.json"),
    logLevel: values.LOG_LEVEL,
    workerName: values.WORKER_NAME,
    concurrency: values.WORKER_CONCURRENCY
  };
}

export function requireSetting(value: string | undefined, name: string): string {
  if (!value) {
    throw new ConfigError({ issues: [`${name}: required for this command`] });
  }
  return value;
}
