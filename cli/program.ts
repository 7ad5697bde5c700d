import { Command, CommanderError, InvalidArgumentError } from "commander";
import { type AppConfig, createDataLayer, type DataLayer, type DataLayerOptions, loadConfig, MigrationError, schema } from "../src";
import { toError } from "../src/errors";

// --- ANSI Color and Styling Helpers ---
const C = {
  RESET: "\x1b[0m",
  BRIGHT: "\x1b[1m",
  BLUE: "\x1b[34m",
  CYAN: "\x1b[36m",
  BG_GREEN: "\x1b[42m\x1b[30m",
  BG_RED: "\x1b[41m\x1b[37m",
  BG_YELLOW: "\x1b[43m\x1b[30m",
};

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  out?: (line: string) => void;
  err?: (line: string) => void;
  /** Passed to `createDataLayer`; periodic health checks are always off for the CLI. */
  layerOptions?: DataLayerOptions;
}

interface CountOptions {
  users: number;
  sessionsPerUser: number;
}

interface SetupOptions extends CountOptions {
  migrate: boolean;
  sampleData?: boolean;
}

interface MigrateOptions {
  message?: string;
  revision?: string;
  backup?: string;
  autogenerate: boolean;
}

interface DataOptions extends CountOptions {
  confirm?: boolean;
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

/** One-line diagnosis naming the error kind. */
export function describeError(error: Error): string {
  const kind = "kind" in error && typeof error.kind === "string" ? error.kind : "error";
  let line = `${error.name} [${kind}]: ${error.message}`;
  if (error instanceof MigrationError) {
    if (error.details.appliedRevisions?.length) line += ` (applied: ${error.details.appliedRevisions.join(", ")})`;
    if (error.details.backupPath) line += ` (restore from: ${error.details.backupPath})`;
  }
  return line;
}

/**
 * Parses and runs one CLI invocation.
 * @returns The process exit code.
 */
export async function runCli(args: readonly string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const errOut = deps.err ?? ((line: string) => console.error(line));
  let exitCode = 0;

  const fail = (error: Error) => {
    errOut(`${C.BG_RED} ERROR ${C.RESET} ${describeError(error)}`);
    exitCode = 1;
  };

  const program = new Command();
  program
    .name("datakeep")
    .version("1.0.0")
    .description("Datakeep data layer CLI")
    .option("--database-url <url>", "Override DATABASE_URL")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => out(text.trimEnd()),
      writeErr: (text) => errOut(text.trimEnd()),
    });

  const resolveConfig = (): AppConfig | null => {
    const databaseUrl: unknown = program.opts().databaseUrl;
    const env = typeof databaseUrl === "string" ? { ...(deps.env ?? process.env), DATABASE_URL: databaseUrl } : (deps.env ?? process.env);
    const config = loadConfig(env);
    if (config.isErr()) {
      fail(config.error);
      return null;
    }
    // Migrations only run when a command asks for them.
    return { ...config.value, connection: { ...config.value.connection, autoMigrate: false } };
  };

  const withLayer = async (fn: (layer: DataLayer) => Promise<boolean>): Promise<void> => {
    const config = resolveConfig();
    if (!config) return;
    const created = await createDataLayer(config, { ...deps.layerOptions, healthChecks: false });
    if (created.isErr()) {
      fail(created.error);
      return;
    }
    const layer = created.value;
    try {
      exitCode = (await fn(layer)) ? 0 : 1;
    } catch (error) {
      fail(toError(error));
    } finally {
      await layer.close();
    }
  };

  const migrateToHead = async (layer: DataLayer): Promise<boolean> => {
    const initialized = await layer.migrations.init();
    if (initialized.isErr()) return report(initialized.error);

    const history = await layer.migrations.history();
    if (history.isErr()) return report(history.error);
    if (history.value.length === 0) {
      const generated = await layer.migrations.generate("initial schema", { autogenerate: true });
      if (generated.isErr()) return report(generated.error);
      out(`${C.BLUE} INFO ${C.RESET} Generated initial revision ${C.CYAN}${generated.value}${C.RESET}`);
    }

    const upgraded = await layer.migrations.upgrade("head");
    if (upgraded.isErr()) return report(upgraded.error);
    out(`${C.BG_GREEN} SUCCESS ${C.RESET} Database at revision ${upgraded.value ?? "base"}`);
    return true;
  };

  const report = (error: Error): false => {
    fail(error);
    return false;
  };

  const populate = async (layer: DataLayer, options: CountOptions): Promise<boolean> => {
    const populated = await schema.populateSampleData(layer.data, {
      users: options.users,
      sessionsPerUser: options.sessionsPerUser,
    });
    if (populated.isErr()) return report(populated.error);
    const { users, profiles, sessions } = populated.value;
    out(`${C.BG_GREEN} SUCCESS ${C.RESET} Sample data: ${users} users, ${profiles} profiles, ${sessions} sessions`);
    return true;
  };

  // --------------------------------------------------------------------------------------------------
  // COMMAND: SETUP
  // --------------------------------------------------------------------------------------------------

  program
    .command("setup")
    .description("Connect, migrate to head and optionally load sample data")
    .option("--no-migrate", "Skip migrations")
    .option("--sample-data", "Insert sample users, profiles and sessions")
    .option("--users <n>", "Sample users to create", parseCount, 10)
    .option("--sessions-per-user <n>", "Sample sessions per user", parseCount, 20)
    .action(async (options: SetupOptions) => {
      await withLayer(async (layer) => {
        out(`${C.BLUE} INFO ${C.RESET} Connected to ${C.BRIGHT}${layer.connections.dbType}${C.RESET}`);
        if (options.migrate && !(await migrateToHead(layer))) return false;
        if (options.sampleData && !(await populate(layer, options))) return false;

        const probe = await layer.health.checkHealth();
        if (!probe.connectionHealthy) {
          errOut(`${C.BG_RED} ERROR ${C.RESET} Database did not pass the health check`);
          return false;
        }
        out(`${C.BG_GREEN} SUCCESS ${C.RESET} Setup complete`);
        return true;
      });
    });

  // --------------------------------------------------------------------------------------------------
  // COMMAND: HEALTH
  // --------------------------------------------------------------------------------------------------

  program
    .command("health")
    .description("Probe the database and print health counters")
    .action(async () => {
      await withLayer(async (layer) => {
        const { database, cache } = await layer.data.healthCheck();
        const badge = database.connectionHealthy ? `${C.BG_GREEN} HEALTHY ${C.RESET}` : `${C.BG_RED} UNHEALTHY ${C.RESET}`;
        out(`${badge} Connection healthy: ${database.connectionHealthy ? "yes" : "no"}`);
        out(`Status: ${database.status}`);
        out(
          `Connections opened: ${database.connectionsOpened}, queries: ${database.queriesExecuted}, ` +
            `slow: ${database.slowQueries}, errors: ${database.errors}`,
        );
        if (database.pool) {
          const pool = database.pool;
          out(
            `Pool (${pool.kind}): checkedOut=${pool.checkedOut} checkedIn=${pool.checkedIn} overflow=${pool.overflow} ` +
              `waiting=${pool.waiting} invalidated=${pool.invalidated}`,
          );
        }
        out(`Cache: ${cache.mode} (hits=${cache.hits}, misses=${cache.misses}, local entries=${cache.localEntries})`);
        return database.connectionHealthy;
      });
    });

  // --------------------------------------------------------------------------------------------------
  // COMMAND: MIGRATE
  // --------------------------------------------------------------------------------------------------

  program
    .command("migrate")
    .description("Manage schema revisions")
    .argument("<action>", "init | create | up | down | status | restore")
    .option("-m, --message <text>", "Description of a new revision")
    .option("-r, --revision <id>", "Target revision: an id, head, base or -N")
    .option("-b, --backup <path>", "Backup file to restore")
    .option("--no-autogenerate", "Create an empty revision instead of diffing models")
    .action(async (action: string, options: MigrateOptions) => {
      const actions = ["init", "create", "up", "down", "status", "restore"];
      if (!actions.includes(action)) {
        errOut(`${C.BG_RED} ERROR ${C.RESET} Unknown migrate action "${action}". Use one of: ${actions.join(", ")}`);
        exitCode = 1;
        return;
      }
      if (action === "create" && !options.message) {
        errOut(`${C.BG_RED} ERROR ${C.RESET} migrate create requires --message`);
        exitCode = 1;
        return;
      }
      if (action === "restore" && !options.backup) {
        errOut(`${C.BG_RED} ERROR ${C.RESET} migrate restore requires --backup`);
        exitCode = 1;
        return;
      }

      await withLayer(async (layer) => {
        const migrations = layer.migrations;
        switch (action) {
          case "init": {
            const created = await migrations.init();
            if (created.isErr()) return report(created.error);
            out(`${C.BG_GREEN} SUCCESS ${C.RESET} ${created.value ? "Migrations initialized" : "Migrations already initialized"}`);
            return true;
          }
          case "create": {
            const generated = await migrations.generate(options.message ?? "", { autogenerate: options.autogenerate });
            if (generated.isErr()) return report(generated.error);
            out(`${C.BG_GREEN} SUCCESS ${C.RESET} Created revision ${C.CYAN}${generated.value}${C.RESET}`);
            return true;
          }
          case "up": {
            const target = options.revision ?? "head";
            const upgraded = await migrations.upgrade(target);
            if (upgraded.isErr()) return report(upgraded.error);
            out(`${C.BG_GREEN} SUCCESS ${C.RESET} Database at revision ${upgraded.value ?? "base"}`);
            return true;
          }
          case "down": {
            const downgraded = await migrations.downgrade(options.revision ?? "-1");
            if (downgraded.isErr()) return report(downgraded.error);
            out(`${C.BG_GREEN} SUCCESS ${C.RESET} Database at revision ${downgraded.value ?? "base"}`);
            return true;
          }
          case "restore": {
            const restored = await migrations.restoreBackup(options.backup ?? "");
            if (restored.isErr()) return report(restored.error);
            out(`${C.BG_GREEN} SUCCESS ${C.RESET} Restored; database at revision ${restored.value ?? "base"}`);
            return true;
          }
          default: {
            const status = await migrations.schemaStatus();
            if (status.isErr()) return report(status.error);
            const s = status.value;
            out(`\n${C.BRIGHT}Migration Status:${C.RESET}`);
            out(`---------------------------------`);
            out(`State: ${s.state}`);
            out(`Current revision: ${s.currentRevision ?? "base"}`);
            out(`Head revision: ${s.head ?? "none"}`);
            out(`Pending: ${s.pendingCount}`);
            for (const record of s.pending) {
              out(`${C.BG_YELLOW} PENDING ${C.RESET} ${record.revision} ${record.description}`);
            }
            out(`Tables: ${s.tables.join(", ") || "(none)"}`);
            return true;
          }
        }
      });
    });

  // --------------------------------------------------------------------------------------------------
  // COMMAND: DATA
  // --------------------------------------------------------------------------------------------------

  program
    .command("data")
    .description("Load or delete application data")
    .argument("<action>", "populate | clear")
    .option("--confirm", "Required by clear")
    .option("--users <n>", "Sample users to create", parseCount, 10)
    .option("--sessions-per-user <n>", "Sample sessions per user", parseCount, 20)
    .action(async (action: string, options: DataOptions) => {
      if (action !== "populate" && action !== "clear") {
        errOut(`${C.BG_RED} ERROR ${C.RESET} Unknown data action "${action}". Use populate or clear`);
        exitCode = 1;
        return;
      }
      if (action === "clear" && !options.confirm) {
        errOut(`${C.BG_RED} ERROR ${C.RESET} Refusing to delete all data without --confirm`);
        exitCode = 1;
        return;
      }

      await withLayer(async (layer) => {
        if (action === "populate") return populate(layer, options);
        const cleared = await schema.clearAllData(layer.data);
        if (cleared.isErr()) return report(cleared.error);
        const summary = Object.entries(cleared.value)
          .map(([table, count]) => `${table}=${count}`)
          .join(", ");
        out(`${C.BG_GREEN} SUCCESS ${C.RESET} Deleted rows: ${summary}`);
        return true;
      });
    });

  try {
    await program.parseAsync([...args], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode;
}
