import { describe, expect, it } from "vitest";
import { DEFAULT_DATABASE_URL, loadConfig, parseDatabaseUrl } from "../src/config";
import { DataKeepError } from "../src/errors";
import { DBType, LogLevel } from "../src/types";

describe("parseDatabaseUrl", () => {
  it("recognizes each supported backend", () => {
    expect(parseDatabaseUrl("sqlite:///./data/app.db")).toEqual({ type: DBType.SQLite, filename: "./data/app.db" });
    expect(parseDatabaseUrl("sqlite:///:memory:")).toEqual({ type: DBType.SQLite, filename: ":memory:" });
    expect(parseDatabaseUrl("postgres://app@db/app")).toEqual({ type: DBType.Postgres, filename: null });
    expect(parseDatabaseUrl("postgresql://app@db/app")).toEqual({ type: DBType.Postgres, filename: null });
    expect(parseDatabaseUrl("mysql://app@db/app")).toEqual({ type: DBType.MySQL, filename: null });
  });

  it("returns null for anything else", () => {
    expect(parseDatabaseUrl("mongodb://db/app")).toBeNull();
    expect(parseDatabaseUrl("sqlite:///")).toBeNull();
  });
});

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({})._unsafeUnwrap();

    expect(config.connection).toEqual({
      type: DBType.SQLite,
      url: DEFAULT_DATABASE_URL,
      filename: "./data/datakeep.db",
      poolSize: 10,
      maxOverflow: 20,
      poolTimeoutMs: 30_000,
      poolRecycleMs: 3_600_000,
      prePing: true,
      connectTimeoutMs: 10_000,
      slowQueryThresholdMs: 1_000,
      autoMigrate: false,
      backupBeforeMigrate: true,
      migrationsDir: "./migrations",
      backupsDir: "./backups",
      healthCheckIntervalMs: 300_000,
    });
    expect(config.cache).toEqual({
      redisUrl: undefined,
      ttlSeconds: 300,
      localMaxEntries: 1000,
      remoteTimeoutMs: 250,
      keyPrefix: "datakeep:",
    });
    expect(config.logger).toEqual({
      level: LogLevel.Info,
      filePath: undefined,
      maxFileSize: 5 * 1024 * 1024,
      maxFiles: 3,
    });
  });

  it("reads and converts explicit values", () => {
    const config = loadConfig({
      DATABASE_URL: "postgresql://app:secret@db:5432/app",
      DB_POOL_SIZE: "4",
      DB_MAX_OVERFLOW: "0",
      DB_POOL_TIMEOUT: "2.5",
      DB_POOL_PRE_PING: "off",
      DB_SLOW_QUERY_THRESHOLD: "0.25",
      DB_AUTO_MIGRATE: "yes",
      REDIS_URL: "redis://cache:6379/0",
      LOG_LEVEL: "debug",
      LOG_FILE: "",
    })._unsafeUnwrap();

    expect(config.connection).toMatchObject({
      type: DBType.Postgres,
      filename: null,
      poolSize: 4,
      maxOverflow: 0,
      poolTimeoutMs: 2_500,
      prePing: false,
      slowQueryThresholdMs: 250,
      autoMigrate: true,
    });
    expect(config.cache.redisUrl).toBe("redis://cache:6379/0");
    expect(config.logger).toMatchObject({ level: LogLevel.Debug, filePath: undefined });
  });

  it("lists every invalid variable in one error", () => {
    const result = loadConfig({ DB_POOL_SIZE: "0", DB_POOL_PRE_PING: "maybe", LOG_LEVEL: "loud" });

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(DataKeepError);
    expect(error.code).toBe("CONFIG_ERROR");
    expect(error.message).toBe(
      [
        "Invalid configuration:",
        "  - DB_POOL_SIZE: Number must be greater than 0",
        "  - DB_POOL_PRE_PING: must be true or false",
        "  - LOG_LEVEL: must be debug, info, warn or error",
      ].join("\n"),
    );
  });

  it("rejects an unsupported database URL", () => {
    const error = loadConfig({ DATABASE_URL: "oracle://db/app" })._unsafeUnwrapErr();

    expect(error.message).toBe(
      "Invalid configuration:\n  - DATABASE_URL: expected a sqlite:///, postgres://, postgresql:// or mysql:// URL",
    );
  });

  it("returns a frozen config", () => {
    const config = loadConfig({})._unsafeUnwrap();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.connection)).toBe(true);
    expect(Object.isFrozen(config.cache)).toBe(true);
  });
});
