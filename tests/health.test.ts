import { afterEach, describe, expect, it, vi } from "vitest";
import { ConnectionManager } from "../src/connection-manager";
import { HealthMonitor, type SlowQueryEvent } from "../src/health";
import { DBType } from "../src/types";
import { connectionConfig, driverError, FakeDriver, silentLogger } from "./helpers";

function setup(slowQueryThresholdMs = 100) {
  const driver = new FakeDriver(DBType.Postgres);
  const logger = silentLogger();
  const manager = new ConnectionManager(connectionConfig({ type: DBType.Postgres }), {
    logger,
    driver,
    sleep: async () => undefined,
  });
  const monitor = new HealthMonitor(manager, { slowQueryThresholdMs, logger, probeRetries: 2, probeBaseDelayMs: 1 });
  return { driver, logger, manager, monitor };
}

afterEach(() => {
  vi.useRealTimers();
});

describe("HealthMonitor", () => {
  it("starts with zeroed counters and unknown status", () => {
    const { monitor } = setup();

    expect(monitor.getSnapshot()).toEqual({
      connectionsOpened: 0,
      queriesExecuted: 0,
      slowQueries: 0,
      errors: 0,
      lastProbeAt: null,
      status: "unknown",
      pool: null,
    });
  });

  it("counts slow queries as executed queries too and notifies listeners", () => {
    const { monitor, logger } = setup(100);
    const events: SlowQueryEvent[] = [];
    monitor.onSlowQuery((event) => events.push(event));

    monitor.recordQuery(100, "SELECT fast");
    monitor.recordQuery(250.5, "SELECT * FROM exercise_sessions");

    const snapshot = monitor.getSnapshot();
    expect(snapshot.queriesExecuted).toBe(2);
    expect(snapshot.slowQueries).toBe(1);
    expect(events).toEqual([{ sql: "SELECT * FROM exercise_sessions", durationMs: 250.5, thresholdMs: 100 }]);
    expect(logger.logWarn).toHaveBeenCalledWith("Slow query (250.50ms > 100ms): SELECT * FROM exercise_sessions");
  });

  it("stops notifying a listener once unsubscribed", () => {
    const { monitor } = setup(10);
    const listener = vi.fn();
    const unsubscribe = monitor.onSlowQuery(listener);

    unsubscribe();
    monitor.recordQuery(50);

    expect(listener).not.toHaveBeenCalled();
    expect(monitor.getSnapshot().slowQueries).toBe(1);
  });

  it("receives connection, query and error events from the manager", async () => {
    const { monitor, manager, driver } = setup();
    await manager.initialize();

    const session = (await manager.acquireSession())._unsafeUnwrap();
    await session.query("SELECT 1");
    const connection = driver.connections[0];
    if (connection) connection.queryError = new Error("syntax error at or near \"SELEC\"");
    await session.query("SELEC 1").catch(() => undefined);
    session.release();

    expect(monitor.getSnapshot()).toMatchObject({ connectionsOpened: 1, queriesExecuted: 1, errors: 1 });
  });

  it("marks the store healthy after a successful probe and includes pool occupancy", async () => {
    const { monitor, manager } = setup();
    await manager.initialize();

    const report = await monitor.checkHealth();

    expect(report.connectionHealthy).toBe(true);
    expect(report.status).toBe("healthy");
    expect(report.lastProbeAt).toBeInstanceOf(Date);
    expect(report.pool).toMatchObject({ kind: "queue", checkedIn: 1, checkedOut: 0 });
  });

  it("marks the store unhealthy when every probe attempt fails", async () => {
    const { monitor, manager, driver } = setup();
    await manager.initialize();
    const connection = driver.connections[0];
    if (connection) connection.queryError = driverError("57P01", "terminating connection due to administrator command");
    driver.connectError = driverError("ECONNREFUSED");

    const report = await monitor.checkHealth();

    expect(report.connectionHealthy).toBe(false);
    expect(report.status).toBe("unhealthy");
  });

  it("reports closed once the pool is shut down", async () => {
    const { monitor, manager } = setup();
    await manager.initialize();

    await manager.shutdown();

    expect(monitor.getSnapshot()).toMatchObject({ status: "closed", pool: null });
  });

  it("stays closed through probes until the manager is initialized again", async () => {
    const { monitor, manager } = setup();
    await manager.initialize();
    await manager.shutdown();

    const report = await monitor.checkHealth();
    expect(report).toMatchObject({ connectionHealthy: false, status: "closed" });

    await manager.initialize();
    expect(monitor.getSnapshot().status).toBe("unknown");
    expect((await monitor.checkHealth()).status).toBe("healthy");
  });

  it("probes on an interval until stopped", async () => {
    vi.useFakeTimers();
    const { monitor, manager } = setup();
    await manager.initialize();
    const probe = vi.spyOn(monitor, "checkHealth");

    monitor.start(1_000);
    await vi.advanceTimersByTimeAsync(3_000);
    monitor.stop();
    await vi.advanceTimersByTimeAsync(3_000);

    expect(probe).toHaveBeenCalledTimes(3);
  });
});
