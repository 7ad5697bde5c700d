/**
 * @file config.ts
 * @description Builds the frozen application config from environment variables.
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { DataKeepError } from "./errors";
import { parseLogLevel } from "./logger";
import { type AppConfig, type CacheConfig, type ConnectionConfig, DBType, type LoggerConfig } from "./types";

export const DEFAULT_DATABASE_URL = "sqlite:///./data/datakeep.db";

// Unset and empty variables both fall back to the default.
const unsetIfEmpty = (value: unknown) => (value === "" ? undefined : value);

const positiveInt = (fallback: number) =>
  z.preprocess(unsetIfEmpty, z.coerce.number().int().positive().default(fallback));
const nonNegativeInt = (fallback: number) =>
  z.preprocess(unsetIfEmpty, z.coerce.number().int().min(0).default(fallback));
const positiveNumber = (fallback: number) =>
  z.preprocess(unsetIfEmpty, z.coerce.number().positive().default(fallback));
const flag = (fallback: boolean) =>
  z.preprocess(
    unsetIfEmpty,
    z
      .enum(["true", "false", "1", "0", "yes", "no", "on", "off"], {
        errorMap: () => ({ message: "must be true or false" }),
      })
      .transform((value) => ["true", "1", "yes", "on"].includes(value))
      .default(fallback ? "true" : "false"),
  );
const text = (fallback: string) => z.preprocess(unsetIfEmpty, z.string().default(fallback));

const envSchema = z.object({
  DATABASE_URL: text(DEFAULT_DATABASE_URL),
  DB_POOL_SIZE: positiveInt(10),
  DB_MAX_OVERFLOW: nonNegativeInt(20),
  DB_POOL_TIMEOUT: positiveNumber(30),
  DB_POOL_RECYCLE: positiveNumber(3600),
  DB_POOL_PRE_PING: flag(true),
  DB_CONNECT_TIMEOUT: positiveNumber(10),
  DB_SLOW_QUERY_THRESHOLD: positiveNumber(1.0),
  DB_AUTO_MIGRATE: flag(false),
  DB_BACKUP_BEFORE_MIGRATE: flag(true),
  DB_MIGRATIONS_DIR: text("./migrations"),
  DB_BACKUPS_DIR: text("./backups"),
  DB_HEALTH_CHECK_INTERVAL: positiveNumber(300),
  REDIS_URL: z.preprocess(unsetIfEmpty, z.string().url().optional()),
  CACHE_TTL: positiveInt(300),
  CACHE_LOCAL_MAX_ENTRIES: positiveInt(1000),
  CACHE_REMOTE_TIMEOUT_MS: positiveInt(250),
  CACHE_PREFIX: text("datakeep:"),
  LOG_LEVEL: z.preprocess(
    unsetIfEmpty,
    z.enum(["debug", "info", "warn", "error"], { errorMap: () => ({ message: "must be debug, info, warn or error" }) }).default("info"),
  ),
  LOG_FILE: z.preprocess(unsetIfEmpty, z.string().optional()),
});

export interface ParsedDatabaseUrl {
  type: DBType;
  filename: string | null;
}

/**
 * Works out the backend kind from a connection URL.
 * @example parseDatabaseUrl("sqlite:///./data/app.db") // { type: "sqlite", filename: "./data/app.db" }
 */
export function parseDatabaseUrl(url: string): ParsedDatabaseUrl | null {
  const sqlite = /^sqlite:\/\/\/(.+)$/.exec(url);
  if (sqlite?.[1]) return { type: DBType.SQLite, filename: sqlite[1] };
  if (/^postgres(ql)?:\/\//.test(url)) return { type: DBType.Postgres, filename: null };
  if (/^mysql:\/\//.test(url)) return { type: DBType.MySQL, filename: null };
  return null;
}

/**
 * Validates `env` and returns the frozen config. Every offending variable is listed in the error.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<AppConfig, DataKeepError> {
  const parsed = envSchema.safeParse(env);
  const issues = parsed.success
    ? []
    : parsed.error.issues.map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`);

  const database = parsed.success ? parseDatabaseUrl(parsed.data.DATABASE_URL) : null;
  if (parsed.success && !database) {
    issues.push("  - DATABASE_URL: expected a sqlite:///, postgres://, postgresql:// or mysql:// URL");
  }
  if (!parsed.success || !database) {
    return err(new DataKeepError(`Invalid configuration:\n${issues.join("\n")}`, "CONFIG_ERROR"));
  }

  const vars = parsed.data;
  const connection: ConnectionConfig = Object.freeze({
    type: database.type,
    url: vars.DATABASE_URL,
    filename: database.filename,
    poolSize: vars.DB_POOL_SIZE,
    maxOverflow: vars.DB_MAX_OVERFLOW,
    poolTimeoutMs: vars.DB_POOL_TIMEOUT * 1000,
    poolRecycleMs: vars.DB_POOL_RECYCLE * 1000,
    prePing: vars.DB_POOL_PRE_PING,
    connectTimeoutMs: vars.DB_CONNECT_TIMEOUT * 1000,
    slowQueryThresholdMs: vars.DB_SLOW_QUERY_THRESHOLD * 1000,
    autoMigrate: vars.DB_AUTO_MIGRATE,
    backupBeforeMigrate: vars.DB_BACKUP_BEFORE_MIGRATE,
    migrationsDir: vars.DB_MIGRATIONS_DIR,
    backupsDir: vars.DB_BACKUPS_DIR,
    healthCheckIntervalMs: vars.DB_HEALTH_CHECK_INTERVAL * 1000,
  });

  const cache: CacheConfig = Object.freeze({
    redisUrl: vars.REDIS_URL,
    ttlSeconds: vars.CACHE_TTL,
    localMaxEntries: vars.CACHE_LOCAL_MAX_ENTRIES,
    remoteTimeoutMs: vars.CACHE_REMOTE_TIMEOUT_MS,
    keyPrefix: vars.CACHE_PREFIX,
  });

  const logger: LoggerConfig = Object.freeze({
    level: parseLogLevel(vars.LOG_LEVEL),
    filePath: vars.LOG_FILE,
    maxFileSize: 5 * 1024 * 1024,
    maxFiles: 3,
  });

  return ok(Object.freeze({ connection, cache, logger }));
}
