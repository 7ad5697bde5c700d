import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { type Mock, vi } from "vitest";
import type { RemoteEntry, RemoteStore } from "../src/cache";
import type { Driver, DriverConnection, StatementResult } from "../src/drivers";
import type { Logger } from "../src/logger";
import { type AppConfig, type CacheConfig, type ConnectionConfig, DBType, type SqlValue } from "../src/types";

export type MockLogger = { [K in keyof Logger]: Mock<Logger[K]> };

export function silentLogger(): MockLogger {
  return {
    logQuery: vi.fn<Logger["logQuery"]>(),
    logError: vi.fn<Logger["logError"]>(),
    logMetrics: vi.fn<Logger["logMetrics"]>(),
    logInfo: vi.fn<Logger["logInfo"]>(),
    logWarn: vi.fn<Logger["logWarn"]>(),
    logDebug: vi.fn<Logger["logDebug"]>(),
  };
}

export function connectionConfig(overrides: Partial<ConnectionConfig> = {}): ConnectionConfig {
  return {
    type: DBType.SQLite,
    url: "sqlite:///:memory:",
    filename: ":memory:",
    poolSize: 2,
    maxOverflow: 1,
    poolTimeoutMs: 200,
    poolRecycleMs: 0,
    prePing: false,
    connectTimeoutMs: 1000,
    slowQueryThresholdMs: 1000,
    autoMigrate: false,
    backupBeforeMigrate: true,
    migrationsDir: "./migrations",
    backupsDir: "./backups",
    healthCheckIntervalMs: 60_000,
    ...overrides,
  };
}

export function cacheConfig(overrides: Partial<CacheConfig> = {}): CacheConfig {
  return {
    ttlSeconds: 60,
    localMaxEntries: 100,
    remoteTimeoutMs: 50,
    keyPrefix: "test:",
    ...overrides,
  };
}

export function appConfig(connection: Partial<ConnectionConfig> = {}): AppConfig {
  return { connection: connectionConfig(connection), cache: cacheConfig(), logger: {} };
}

export async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "datakeep-test-"));
}

/** A driver connection that records statements and fails on demand. */
export class FakeConnection implements DriverConnection {
  alive = true;
  closed = false;
  pingError: Error | null = null;
  queryError: Error | null = null;
  readonly statements: string[] = [];

  constructor(readonly id: number) {}

  async query(sql: string, _params: readonly SqlValue[] = []): Promise<StatementResult> {
    this.statements.push(sql);
    if (this.queryError) throw this.queryError;
    return { rows: [{ value: 1 }], rowCount: 1, insertId: null };
  }

  async ping(): Promise<void> {
    if (this.pingError) throw this.pingError;
  }

  isAlive(): boolean {
    return this.alive && !this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeDriver implements Driver {
  readonly connections: FakeConnection[] = [];
  connectError: Error | null = null;
  connectAttempts = 0;

  constructor(readonly type: DBType = DBType.Postgres) {}

  async connect(): Promise<DriverConnection> {
    this.connectAttempts++;
    if (this.connectError) throw this.connectError;
    const connection = new FakeConnection(this.connections.length + 1);
    this.connections.push(connection);
    return connection;
  }
}

export function driverError(code: string, message = code): Error {
  return Object.assign(new Error(message), { code });
}

/** In-memory stand-in for Redis. `down` makes every call fail; `hang` makes them never settle. */
export class MemoryRemoteStore implements RemoteStore {
  readonly data = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  private readonly setAt = new Map<string, number>();
  down = false;
  hang = false;
  pings = 0;
  closed = false;

  constructor(private readonly now: () => number = Date.now) {}

  private async guard(): Promise<void> {
    if (this.hang) await new Promise<never>(() => undefined);
    if (this.down) throw driverError("ECONNREFUSED", "connect ECONNREFUSED 127.0.0.1:6379");
  }

  async get(key: string): Promise<RemoteEntry | null> {
    await this.guard();
    const payload = this.data.get(key);
    if (payload === undefined) return null;
    const ttlSeconds = this.ttls.get(key);
    const storedAt = this.setAt.get(key);
    if (ttlSeconds === undefined || storedAt === undefined) return { payload, ttlMs: null };
    const ttlMs = ttlSeconds * 1000 - (this.now() - storedAt);
    if (ttlMs <= 0) {
      this.data.delete(key);
      return null;
    }
    return { payload, ttlMs };
  }

  async set(key: string, payload: string, ttlSeconds: number): Promise<void> {
    await this.guard();
    this.data.set(key, payload);
    this.ttls.set(key, ttlSeconds);
    this.setAt.set(key, this.now());
  }

  async del(key: string): Promise<number> {
    await this.guard();
    return this.data.delete(key) ? 1 : 0;
  }

  async deletePrefix(prefix: string): Promise<number> {
    await this.guard();
    let removed = 0;
    for (const key of [...this.data.keys()]) {
      if (key.startsWith(prefix)) {
        this.data.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async ping(): Promise<void> {
    this.pings++;
    await this.guard();
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
