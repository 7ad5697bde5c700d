import * as fs from "fs/promises";
import * as path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { describeError, runCli } from "../cli/program";
import { MigrationError, QueryError } from "../src/errors";
import { silentLogger, tempDir } from "./helpers";

const SUCCESS = "\x1b[42m\x1b[30m SUCCESS \x1b[0m";
const ERROR = "\x1b[41m\x1b[37m ERROR \x1b[0m";

const dirs: string[] = [];

afterEach(async () => {
  for (const dir of dirs.splice(0)) await fs.rm(dir, { recursive: true, force: true });
});

async function sandbox(): Promise<NodeJS.ProcessEnv> {
  const dir = await tempDir();
  dirs.push(dir);
  return {
    DATABASE_URL: `sqlite:///${path.join(dir, "app.db")}`,
    DB_MIGRATIONS_DIR: path.join(dir, "migrations"),
    DB_BACKUPS_DIR: path.join(dir, "backups"),
  };
}

async function run(args: string[], env: NodeJS.ProcessEnv) {
  const out: string[] = [];
  const err: string[] = [];
  const code = await runCli(args, {
    env,
    out: (line) => out.push(line),
    err: (line) => err.push(line),
    layerOptions: { logger: silentLogger(), remote: null },
  });
  return { code, out, err };
}

describe("describeError", () => {
  it("names the kind and points at the backup of a failed migration", () => {
    const error = new MigrationError("apply-failed", "Revision abc failed", {
      appliedRevisions: ["aaa"],
      backupPath: "/backups/backup_1.db",
    });

    expect(describeError(error)).toBe(
      "MigrationError [apply-failed]: Revision abc failed (applied: aaa) (restore from: /backups/backup_1.db)",
    );
    expect(describeError(new QueryError("constraint", "duplicate"))).toBe("QueryError [constraint]: duplicate");
    expect(describeError(new Error("plain"))).toBe("Error [error]: plain");
  });
});

describe("runCli", () => {
  it("refuses to clear data without --confirm", async () => {
    const result = await run(["data", "clear"], await sandbox());

    expect(result.code).toBe(1);
    expect(result.err).toEqual([`${ERROR} Refusing to delete all data without --confirm`]);
  });

  it("requires a message to create a revision", async () => {
    const result = await run(["migrate", "create"], await sandbox());

    expect(result.code).toBe(1);
    expect(result.err).toEqual([`${ERROR} migrate create requires --message`]);
  });

  it("rejects unknown migrate actions", async () => {
    const result = await run(["migrate", "sideways"], await sandbox());

    expect(result.code).toBe(1);
    expect(result.err).toEqual([
      `${ERROR} Unknown migrate action "sideways". Use one of: init, create, up, down, status, restore`,
    ]);
  });

  it("reports invalid configuration", async () => {
    const env = { ...(await sandbox()), DB_POOL_SIZE: "0" };

    const result = await run(["health"], env);

    expect(result.code).toBe(1);
    expect(result.err).toEqual([
      `${ERROR} DataKeepError [error]: Invalid configuration:\n  - DB_POOL_SIZE: Number must be greater than 0`,
    ]);
  });

  it("prints the version", async () => {
    const result = await run(["--version"], await sandbox());

    expect(result.code).toBe(0);
    expect(result.out).toEqual(["1.0.0"]);
  });

  it("sets up, reports status and health, and clears sample data", async () => {
    const env = await sandbox();

    const setup = await run(["setup", "--sample-data", "--users", "2", "--sessions-per-user", "3"], env);
    expect(setup.err).toEqual([]);
    expect(setup.code).toBe(0);
    expect(setup.out).toContain(`${SUCCESS} Sample data: 2 users, 2 profiles, 6 sessions`);
    expect(setup.out.at(-1)).toBe(`${SUCCESS} Setup complete`);

    const status = await run(["migrate", "status"], env);
    expect(status.code).toBe(0);
    expect(status.out).toContain("State: up-to-date");
    expect(status.out).toContain("Pending: 0");
    expect(status.out.at(-1)).toBe("Tables: datakeep_revision, exercise_sessions, user_profiles, users");

    const health = await run(["health"], env);
    expect(health.code).toBe(0);
    expect(health.out[0]).toBe("\x1b[42m\x1b[30m HEALTHY \x1b[0m Connection healthy: yes");
    expect(health.out).toContain("Status: healthy");

    const cleared = await run(["data", "clear", "--confirm"], env);
    expect(cleared.code).toBe(0);
    expect(cleared.out).toEqual([`${SUCCESS} Deleted rows: exercise_sessions=6, user_profiles=2, users=2`]);
  });
});
