import * as fs from "fs/promises";
import * as path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createDataLayer, VERSION_TABLE } from "../src";
import { DBType } from "../src/types";
import { appConfig, driverError, FakeDriver, MemoryRemoteStore, silentLogger, tempDir } from "./helpers";

const dirs: string[] = [];

afterEach(async () => {
  vi.useRealTimers();
  for (const dir of dirs.splice(0)) await fs.rm(dir, { recursive: true, force: true });
});

async function sandbox(): Promise<string> {
  const dir = await tempDir();
  dirs.push(dir);
  return dir;
}

describe("createDataLayer", () => {
  it("connects and initializes migrations when auto-migrate is on", async () => {
    const dir = await sandbox();
    const logger = silentLogger();
    const config = appConfig({
      autoMigrate: true,
      migrationsDir: path.join(dir, "migrations"),
      backupsDir: path.join(dir, "backups"),
    });

    const layer = (await createDataLayer(config, { logger, remote: null, healthChecks: false }))._unsafeUnwrap();

    expect((await layer.connections.listTables())._unsafeUnwrap()).toEqual([VERSION_TABLE]);
    expect(await layer.migrations.state()).toBe("initialized");
    expect(logger.logInfo).toHaveBeenCalledWith("Database already at base");
    await layer.close();
  });

  it("returns the connection error and closes the cache when the store is unreachable", async () => {
    const driver = new FakeDriver(DBType.Postgres);
    driver.connectError = driverError("ECONNREFUSED", "connect ECONNREFUSED 10.0.0.5:5432");
    const remote = new MemoryRemoteStore();

    const created = await createDataLayer(appConfig({ type: DBType.Postgres }), {
      logger: silentLogger(),
      driver,
      remote,
    });

    expect(created._unsafeUnwrapErr()).toMatchObject({ name: "ConnectionError", kind: "unreachable" });
    expect(remote.closed).toBe(true);
  });

  it("runs periodic health checks until closed", async () => {
    vi.useFakeTimers();
    const config = appConfig({ healthCheckIntervalMs: 1_000 });
    const layer = (await createDataLayer(config, { logger: silentLogger(), remote: null }))._unsafeUnwrap();
    const probe = vi.spyOn(layer.health, "checkHealth");

    await vi.advanceTimersByTimeAsync(2_000);
    await layer.close();
    await vi.advanceTimersByTimeAsync(2_000);

    expect(probe).toHaveBeenCalledTimes(2);
  });
});
