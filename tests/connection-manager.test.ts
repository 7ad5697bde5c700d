import { describe, expect, it, vi } from "vitest";
import { ConnectionManager } from "../src/connection-manager";
import { ConnectionError, QueryError } from "../src/errors";
import type { ConnectionObserver } from "../src/session";
import { DBType } from "../src/types";
import { connectionConfig, driverError, FakeDriver, silentLogger } from "./helpers";

function recordingObserver(): ConnectionObserver & { events: string[] } {
  const events: string[] = [];
  return {
    events,
    connectionOpened: () => events.push("opened"),
    queryExecuted: (_ms, sql) => events.push(`query:${sql}`),
    errorRaised: (error) => events.push(`error:${error.name}`),
    poolDisposed: () => events.push("disposed"),
  };
}

describe("ConnectionManager", () => {
  it("fails fast before initialize", async () => {
    const manager = new ConnectionManager(connectionConfig(), { logger: silentLogger() });

    const session = await manager.acquireSession();

    expect(session.isErr()).toBe(true);
    expect(session._unsafeUnwrapErr()).toMatchObject({ kind: "not-initialized" });
    expect(await manager.testConnection()).toBe(false);
    expect(manager.poolStatus()).toBeNull();
  });

  it("creates exactly one pool however often initialize is called", async () => {
    const driver = new FakeDriver(DBType.Postgres);
    const manager = new ConnectionManager(connectionConfig({ type: DBType.Postgres, url: "postgres://app:secret@db/app" }), {
      logger: silentLogger(),
      driver,
    });

    const [first, second] = await Promise.all([manager.initialize(), manager.initialize()]);
    const third = await manager.initialize();

    expect(first._unsafeUnwrap()).toEqual({ dbType: DBType.Postgres, poolKind: "queue" });
    expect(second._unsafeUnwrap()).toBe(first._unsafeUnwrap());
    expect(third._unsafeUnwrap()).toBe(first._unsafeUnwrap());
    expect(driver.connections).toHaveLength(1);
  });

  it("uses the static pool for SQLite", async () => {
    const manager = new ConnectionManager(connectionConfig(), { logger: silentLogger() });

    const ready = await manager.initialize();

    expect(ready._unsafeUnwrap()).toEqual({ dbType: DBType.SQLite, poolKind: "static" });
    await manager.shutdown();
  });

  it("returns a typed error and masks credentials when the store is unreachable", async () => {
    const driver = new FakeDriver(DBType.Postgres);
    driver.connectError = driverError("ECONNREFUSED", "connect ECONNREFUSED 10.0.0.5:5432");
    const logger = silentLogger();
    const observer = recordingObserver();
    const manager = new ConnectionManager(connectionConfig({ type: DBType.Postgres, url: "postgres://app:secret@db:5432/app" }), {
      logger,
      driver,
    });
    manager.addObserver(observer);

    const ready = await manager.initialize();

    expect(ready._unsafeUnwrapErr()).toBeInstanceOf(ConnectionError);
    expect(ready._unsafeUnwrapErr().kind).toBe("unreachable");
    expect(manager.isInitialized).toBe(false);
    expect(observer.events).toEqual(["error:ConnectionError"]);
    expect(logger.logError).toHaveBeenCalledWith(
      ready._unsafeUnwrapErr(),
      "Failed to initialize postgres connection to postgres://***:***@db:5432/app",
    );
  });

  it("classifies authentication failures", async () => {
    const driver = new FakeDriver(DBType.Postgres);
    driver.connectError = driverError("28P01", 'password authentication failed for user "app"');
    const manager = new ConnectionManager(connectionConfig({ type: DBType.Postgres }), { logger: silentLogger(), driver });

    const ready = await manager.initialize();

    expect(ready._unsafeUnwrapErr().kind).toBe("auth");
  });

  it("retries the connection test with doubling delays and no sleep after the last attempt", async () => {
    const driver = new FakeDriver(DBType.Postgres);
    const sleep = vi.fn(async (_ms: number) => undefined);
    const logger = silentLogger();
    const manager = new ConnectionManager(connectionConfig({ type: DBType.Postgres }), { logger, driver, sleep });
    await manager.initialize();
    const connection = driver.connections[0];
    if (connection) connection.queryError = new Error("terminating connection");

    const healthy = await manager.testConnection(3, 10);

    expect(healthy).toBe(false);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
    expect(logger.logWarn).toHaveBeenCalledWith("Connection test attempt 3/3 failed: terminating connection");
  });

  it("keeps probing the store after a failed initialize", async () => {
    const driver = new FakeDriver(DBType.Postgres);
    driver.connectError = driverError("ECONNREFUSED", "connect ECONNREFUSED 10.0.0.5:5432");
    const sleep = vi.fn(async (_ms: number) => undefined);
    const logger = silentLogger();
    const manager = new ConnectionManager(connectionConfig({ type: DBType.Postgres }), { logger, driver, sleep });
    expect((await manager.initialize()).isErr()).toBe(true);
    driver.connectAttempts = 0;

    const healthy = await manager.testConnection(3, 10);

    expect(healthy).toBe(false);
    expect(driver.connectAttempts).toBe(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
    expect(logger.logWarn).toHaveBeenCalledWith(
      "Connection test attempt 3/3 failed: Connection failed: connect ECONNREFUSED 10.0.0.5:5432",
    );

    driver.connectError = null;
    expect(await manager.testConnection(3, 10)).toBe(true);
    expect(driver.connections).toHaveLength(1);
    expect(driver.connections[0]?.closed).toBe(true);
    expect(manager.isInitialized).toBe(false);
  });

  it("succeeds on the first attempt without sleeping", async () => {
    const driver = new FakeDriver(DBType.Postgres);
    const sleep = vi.fn(async (_ms: number) => undefined);
    const manager = new ConnectionManager(connectionConfig({ type: DBType.Postgres }), { logger: silentLogger(), driver, sleep });
    await manager.initialize();

    expect(await manager.testConnection()).toBe(true);
    expect(sleep).not.toHaveBeenCalled();
    expect(driver.connections[0]?.statements).toEqual(["SELECT 1"]);
  });

  it("lists tables and shuts down so the manager can be reused", async () => {
    const observer = recordingObserver();
    const manager = new ConnectionManager(connectionConfig(), { logger: silentLogger() });
    manager.addObserver(observer);
    await manager.initialize();

    const session = (await manager.acquireSession())._unsafeUnwrap();
    await session.execute("CREATE TABLE notes (id INTEGER PRIMARY KEY, body TEXT)");
    session.release();

    expect((await manager.listTables())._unsafeUnwrap()).toEqual(["notes"]);

    await manager.shutdown();
    expect(observer.events.at(-1)).toBe("disposed");
    expect((await manager.acquireSession())._unsafeUnwrapErr().kind).toBe("not-initialized");

    expect((await manager.initialize()).isOk()).toBe(true);
    await manager.shutdown();
  });
});

describe("Session", () => {
  async function sqliteManager(): Promise<ConnectionManager> {
    const manager = new ConnectionManager(connectionConfig(), { logger: silentLogger() });
    await manager.initialize();
    const session = (await manager.acquireSession())._unsafeUnwrap();
    await session.execute("CREATE TABLE notes (id INTEGER PRIMARY KEY, body TEXT NOT NULL UNIQUE)");
    session.release();
    return manager;
  }

  it("commits when the callback resolves", async () => {
    const manager = await sqliteManager();
    const session = (await manager.acquireSession())._unsafeUnwrap();

    await session.transaction(async (tx) => {
      await tx.execute("INSERT INTO notes (body) VALUES (?)", ["first"]);
    });
    const rows = await session.query<{ body: string }>("SELECT body FROM notes");

    expect(rows).toEqual([{ body: "first" }]);
    session.release();
    await manager.shutdown();
  });

  it("rolls back and rethrows the callback's error", async () => {
    const manager = await sqliteManager();
    const session = (await manager.acquireSession())._unsafeUnwrap();
    const failure = new Error("validation failed");

    await expect(
      session.transaction(async (tx) => {
        await tx.execute("INSERT INTO notes (body) VALUES (?)", ["discarded"]);
        throw failure;
      }),
    ).rejects.toBe(failure);

    expect(await session.query("SELECT * FROM notes")).toEqual([]);
    session.release();
    await manager.shutdown();
  });

  it("reports constraint violations as query errors", async () => {
    const manager = await sqliteManager();
    const observer = recordingObserver();
    manager.addObserver(observer);
    const session = (await manager.acquireSession())._unsafeUnwrap();
    await session.execute("INSERT INTO notes (body) VALUES (?)", ["same"]);

    const error = await session.execute("INSERT INTO notes (body) VALUES (?)", ["same"]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QueryError);
    expect(error).toMatchObject({ kind: "constraint", sql: "INSERT INTO notes (body) VALUES (?)" });
    expect(observer.events.at(-1)).toBe("error:QueryError");
    session.release();
    await manager.shutdown();
  });

  it("refuses statements after release", async () => {
    const manager = await sqliteManager();
    const session = (await manager.acquireSession())._unsafeUnwrap();
    session.release();
    session.release();

    expect(session.isReleased).toBe(true);
    await expect(session.query("SELECT 1")).rejects.toMatchObject({ kind: "closed" });
    await manager.shutdown();
  });

  it("discards the connection after a connection-level failure", async () => {
    const driver = new FakeDriver(DBType.Postgres);
    const manager = new ConnectionManager(connectionConfig({ type: DBType.Postgres }), { logger: silentLogger(), driver });
    await manager.initialize();
    const session = (await manager.acquireSession())._unsafeUnwrap();
    const connection = driver.connections[0];
    if (connection) connection.queryError = driverError("ECONNRESET", "read ECONNRESET");

    await expect(session.query("SELECT 1")).rejects.toMatchObject({ kind: "unreachable" });
    session.release();

    expect(connection?.closed).toBe(true);
    expect(manager.poolStatus()?.invalidated).toBe(1);
  });
});
