/**
 * @file migrations.ts
 * @description Revision-based schema migrations. Revisions are JSON files forming one linear chain;
 * the applied revision is stored in the `datakeep_revision` table. Every upgrade and downgrade is
 * preceded by a verified backup when backups are enabled.
 */

import { randomUUID } from "crypto";
import * as fs from "fs/promises";
import * as path from "path";
import { glob } from "glob";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { BackupManager } from "./backup";
import type { ConnectionManager } from "./connection-manager";
import { errorMessage, MigrationError, migrationErr } from "./errors";
import type { Logger } from "./logger";
import { MetadataStorage, type ModelDefinition } from "./model";
import type { Session } from "./session";
import { getAutoIncrementPK, mapDataTypeToSql, quoteIdentifier } from "./sql";
import {
  type BackupReason,
  DataTypes,
  DBType,
  type MigrationRecord,
  type MigrationState,
  type RevisionId,
  type SchemaStatus,
} from "./types";

export const VERSION_TABLE = "datakeep_revision";

const revisionFileSchema = z.object({
  revision: z.string().regex(/^[0-9a-f]{12}$/, "must be 12 lowercase hex characters"),
  parent: z.string().nullable(),
  description: z.string(),
  createdAt: z.string(),
  up: z.array(z.string()),
  down: z.array(z.string()),
});

export type RevisionFile = z.infer<typeof revisionFileSchema>;

export interface GeneratedMigration {
  up: string[];
  down: string[];
}

export interface GenerateOptions {
  up?: string[];
  down?: string[];
  /** Creates tables for registered models that do not exist yet. */
  autogenerate?: boolean;
}

export interface MigrationManagerOptions {
  migrationsDir: string;
  backupBeforeMigrate: boolean;
  backups: BackupManager;
  logger: Logger;
  /** Models considered by autogeneration. Defaults to every registered model. */
  models?: () => ModelDefinition<object>[];
}

type Activity = "applying" | "rolling-back";

function sqlLiteral(value: string | number | boolean, dbType: DBType): string {
  if (typeof value === "boolean") {
    if (dbType === DBType.Postgres) return value ? "TRUE" : "FALSE";
    return value ? "1" : "0";
  }
  if (typeof value === "number") return String(value);
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Builds the `up` and `down` statements that create and drop a model's table.
 */
export function generateMigration(model: ModelDefinition<object>, dbType: DBType): GeneratedMigration {
  const q = (name: string) => quoteIdentifier(name, dbType);
  const columnDefs: string[] = [];
  const foreignKeys: string[] = [];
  const indexes: string[] = [];

  for (const [name, col] of Object.entries(model.columns)) {
    if (name === model.primaryKey) {
      const autoIncrement = col.type === DataTypes.INTEGER || col.type === DataTypes.BIGINT;
      columnDefs.push(
        autoIncrement ? `${q(name)} ${getAutoIncrementPK(dbType)}` : `${q(name)} ${mapDataTypeToSql(col.type, dbType)} PRIMARY KEY`,
      );
      continue;
    }

    const defParts = [q(name), mapDataTypeToSql(col.type, dbType)];
    if (col.required) defParts.push("NOT NULL");
    if (col.unique) defParts.push("UNIQUE");
    if (col.defaultValue !== undefined) defParts.push(`DEFAULT ${sqlLiteral(col.defaultValue, dbType)}`);
    columnDefs.push(defParts.join(" "));
    if (col.references) {
      // Table-level form: MySQL ignores inline column REFERENCES.
      let fk = `FOREIGN KEY (${q(name)}) REFERENCES ${q(col.references.table)} (${q(col.references.column ?? "id")})`;
      if (col.references.onDelete) fk += ` ON DELETE ${col.references.onDelete}`;
      foreignKeys.push(fk);
    }

    if (col.index) {
      const ifNotExists = dbType === DBType.MySQL ? "" : "IF NOT EXISTS ";
      indexes.push(`CREATE INDEX ${ifNotExists}${q(col.index)} ON ${q(model.tableName)} (${q(name)})`);
    }
  }

  const { createdAt, updatedAt } = model.timestamps;
  const timestampType = mapDataTypeToSql(DataTypes.DATETIME, dbType);
  if (createdAt && !(createdAt in model.columns)) {
    columnDefs.push(`${q(createdAt)} ${timestampType} NOT NULL DEFAULT CURRENT_TIMESTAMP`);
  }
  if (updatedAt && !(updatedAt in model.columns)) {
    let def = `${q(updatedAt)} ${timestampType} NOT NULL DEFAULT CURRENT_TIMESTAMP`;
    if (dbType === DBType.MySQL) def += " ON UPDATE CURRENT_TIMESTAMP";
    columnDefs.push(def);
  }

  return {
    up: [`CREATE TABLE IF NOT EXISTS ${q(model.tableName)} (${[...columnDefs, ...foreignKeys].join(", ")})`, ...indexes],
    down: [`DROP TABLE IF EXISTS ${q(model.tableName)}`],
  };
}

/**
 * Orders revisions from root to head. Rejects anything that is not a single linear chain.
 */
export function orderChain(revisions: readonly RevisionFile[]): Result<RevisionFile[], MigrationError> {
  if (revisions.length === 0) return ok([]);

  const byId = new Map<RevisionId, RevisionFile>();
  for (const revision of revisions) {
    if (byId.has(revision.revision)) {
      return migrationErr("broken-chain", `Duplicate revision ${revision.revision}`);
    }
    byId.set(revision.revision, revision);
  }

  const roots = revisions.filter((r) => r.parent === null);
  if (roots.length !== 1) {
    return migrationErr("broken-chain", `Expected exactly one root revision, found ${roots.length}`);
  }

  const children = new Map<RevisionId, RevisionFile>();
  for (const revision of revisions) {
    if (revision.parent === null) continue;
    if (!byId.has(revision.parent)) {
      return migrationErr("broken-chain", `Revision ${revision.revision} has unknown parent ${revision.parent}`);
    }
    const sibling = children.get(revision.parent);
    if (sibling) {
      return migrationErr(
        "broken-chain",
        `Revisions ${sibling.revision} and ${revision.revision} both follow ${revision.parent}`,
      );
    }
    children.set(revision.parent, revision);
  }

  const ordered: RevisionFile[] = [];
  for (let node = roots[0]; node; node = children.get(node.revision)) {
    ordered.push(node);
  }
  if (ordered.length !== revisions.length) {
    return migrationErr("broken-chain", `${revisions.length - ordered.length} revisions are not reachable from the root`);
  }
  return ok(ordered);
}

function slugify(description: string): string {
  const slug = description
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, 40);
  return slug || "revision";
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function toRecord(revision: RevisionFile, applied: boolean): MigrationRecord {
  return {
    revision: revision.revision,
    parent: revision.parent,
    description: revision.description,
    createdAt: revision.createdAt,
    applied,
  };
}

export class MigrationManager {
  private activity: Activity | null = null;
  private readonly versionsDir: string;
  private readonly lockPath: string;
  private readonly backups: BackupManager;
  private readonly logger: Logger;
  private readonly models: () => ModelDefinition<object>[];

  constructor(
    private readonly connections: ConnectionManager,
    private readonly options: MigrationManagerOptions,
  ) {
    this.versionsDir = path.join(options.migrationsDir, "versions");
    this.lockPath = path.join(options.migrationsDir, ".migrate.lock");
    this.backups = options.backups;
    this.logger = options.logger;
    this.models = options.models ?? (() => MetadataStorage.getModels());
  }

  private get dbType(): DBType {
    return this.connections.dbType;
  }

  private async withSession<T>(
    kind: MigrationError["kind"],
    fn: (session: Session) => Promise<T>,
  ): Promise<Result<T, MigrationError>> {
    const acquired = await this.connections.acquireSession();
    if (acquired.isErr()) return migrationErr(kind, acquired.error.message, {}, acquired.error);
    const session = acquired.value;
    try {
      return ok(await fn(session));
    } catch (error) {
      return migrationErr(kind, errorMessage(error), {}, error);
    } finally {
      session.release();
    }
  }

  /**
   * Creates the revisions directory and the version table.
   * @returns Whether anything had to be created.
   */
  async init(): Promise<Result<boolean, MigrationError>> {
    let created: boolean;
    try {
      created = (await fs.mkdir(this.versionsDir, { recursive: true })) !== undefined;
    } catch (error) {
      return migrationErr("not-initialized", `Cannot create ${this.versionsDir}: ${errorMessage(error)}`, {}, error);
    }

    const tables = await this.connections.listTables();
    if (tables.isErr()) return migrationErr("not-initialized", tables.error.message, {}, tables.error);
    if (tables.value.includes(VERSION_TABLE)) return ok(created);

    const table = await this.withSession("not-initialized", (session) =>
      session.execute(`CREATE TABLE IF NOT EXISTS ${VERSION_TABLE} (version_num VARCHAR(32) NOT NULL PRIMARY KEY)`),
    );
    if (table.isErr()) return err(table.error);
    this.logger.logInfo(`Migrations initialized in ${this.options.migrationsDir}`);
    return ok(true);
  }

  private async isInitialized(): Promise<boolean> {
    const dir = await fs.stat(this.versionsDir).catch(() => null);
    if (!dir?.isDirectory()) return false;
    const tables = await this.connections.listTables();
    return tables.isOk() && tables.value.includes(VERSION_TABLE);
  }

  /** Reads and orders every revision file. */
  async loadChain(): Promise<Result<RevisionFile[], MigrationError>> {
    let files: string[];
    try {
      files = await glob("*.json", { cwd: this.versionsDir, absolute: true, nodir: true });
    } catch (error) {
      return migrationErr("broken-chain", `Cannot list revisions: ${errorMessage(error)}`, {}, error);
    }

    const revisions: RevisionFile[] = [];
    for (const file of files) {
      let raw: unknown;
      try {
        raw = JSON.parse(await fs.readFile(file, "utf8"));
      } catch (error) {
        return migrationErr("broken-chain", `Unreadable revision file ${path.basename(file)}: ${errorMessage(error)}`, {}, error);
      }
      const parsed = revisionFileSchema.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        return migrationErr("broken-chain", `Invalid revision file ${path.basename(file)}: ${issues}`);
      }
      revisions.push(parsed.data);
    }
    return orderChain(revisions);
  }

  /** The revision the database is at, or null before the first upgrade. */
  async currentRevision(): Promise<Result<RevisionId | null, MigrationError>> {
    const rows = await this.withSession("not-initialized", (session) =>
      session.query<{ version_num: unknown }>(`SELECT version_num FROM ${VERSION_TABLE}`),
    );
    if (rows.isErr()) {
      return migrationErr("not-initialized", `Migrations are not initialized: ${rows.error.message}`, {}, rows.error);
    }
    const first = rows.value[0];
    return ok(first ? String(first.version_num) : null);
  }

  /**
   * Writes a new revision whose parent is the current head.
   */
  async generate(description: string, options: GenerateOptions = {}): Promise<Result<RevisionId, MigrationError>> {
    const dir = await fs.stat(this.versionsDir).catch(() => null);
    if (!dir?.isDirectory()) {
      return migrationErr("not-initialized", "Run init before generating revisions");
    }

    const chain = await this.loadChain();
    if (chain.isErr()) return err(chain.error);
    const head = chain.value.at(-1)?.revision ?? null;

    let up = options.up ?? [];
    let down = options.down ?? [];
    if (options.autogenerate) {
      const generated = await this.autogenerate(head);
      if (generated.isErr()) return err(generated.error);
      up = [...generated.value.up, ...up];
      down = [...down, ...generated.value.down];
    }

    const revision: RevisionFile = {
      revision: randomUUID().replace(/-/g, "").slice(0, 12),
      parent: head,
      description,
      createdAt: new Date().toISOString(),
      up,
      down,
    };
    const file = path.join(this.versionsDir, `${revision.revision}_${slugify(description)}.json`);
    try {
      await fs.writeFile(file, JSON.stringify(revision, null, 2) + "\n", { flag: "wx" });
    } catch (error) {
      return migrationErr("generate-failed", `Cannot write ${file}: ${errorMessage(error)}`, {}, error);
    }
    this.logger.logInfo(`Generated revision ${revision.revision}: ${description}`);
    return ok(revision.revision);
  }

  private async autogenerate(head: RevisionId | null): Promise<Result<GeneratedMigration, MigrationError>> {
    const current = await this.currentRevision();
    if (current.isErr()) return err(current.error);
    if (current.value !== head) {
      return migrationErr("generate-failed", "Database is not at head; upgrade before autogenerating a revision");
    }

    const tables = await this.connections.listTables();
    if (tables.isErr()) return migrationErr("generate-failed", tables.error.message, {}, tables.error);
    const existing = new Set(tables.value);

    const newModels = this.models().filter((model) => !existing.has(model.tableName));
    const up: string[] = [];
    const down: string[] = [];
    for (const model of newModels) {
      const migration = generateMigration(model, this.dbType);
      up.push(...migration.up);
      down.unshift(...migration.down);
    }
    if (newModels.length === 0) {
      this.logger.logWarn("No model changes detected; the revision will be empty");
    }
    return ok({ up, down });
  }

  /**
   * Runs `fn` holding the in-process flag and the lock file, so only one migration runs at a time.
   */
  private async exclusive<T>(
    activity: Activity,
    fn: () => Promise<Result<T, MigrationError>>,
  ): Promise<Result<T, MigrationError>> {
    if (this.activity) return migrationErr("busy", `Another migration is ${this.activity}`);
    this.activity = activity;

    let lock: fs.FileHandle;
    try {
      lock = await fs.open(this.lockPath, "wx");
      await lock.writeFile(`${process.pid}\n`);
    } catch (error) {
      this.activity = null;
      const code = errorCode(error);
      if (code === "EEXIST") {
        return migrationErr("busy", `Migration lock ${this.lockPath} is held by another process`);
      }
      if (code === "ENOENT") return migrationErr("not-initialized", "Run init before migrating");
      return migrationErr("apply-failed", `Cannot take migration lock: ${errorMessage(error)}`, {}, error);
    }

    try {
      return await fn();
    } finally {
      await lock.close().catch((error: unknown) => this.logger.logWarn(`Failed to close lock file: ${errorMessage(error)}`));
      await fs.rm(this.lockPath, { force: true });
      this.activity = null;
    }
  }

  private async takeBackup(
    reason: BackupReason,
    revision: RevisionId | null,
  ): Promise<Result<string | undefined, MigrationError>> {
    if (!this.options.backupBeforeMigrate) return ok(undefined);
    const backup = await this.backups.create(reason, revision);
    if (backup.isErr()) return err(backup.error);
    return ok(backup.value.path);
  }

  /** Runs `statements` and moves the version pointer to `version` in one transaction. */
  private async applyStep(statements: readonly string[], version: RevisionId | null): Promise<Result<void, MigrationError>> {
    return this.withSession("apply-failed", (session) =>
      session.transaction(async (tx) => {
        for (const statement of statements) {
          await tx.execute(statement);
        }
        await tx.execute(`DELETE FROM ${VERSION_TABLE}`);
        if (version !== null) {
          await tx.execute(`INSERT INTO ${VERSION_TABLE} (version_num) VALUES (?)`, [version]);
        }
      }),
    );
  }

  private async verifyLanded(expected: RevisionId | null, backupPath: string | undefined, applied: string[]) {
    const landed = await this.currentRevision();
    if (landed.isErr()) return err(landed.error);
    if (landed.value !== expected) {
      return migrationErr(
        "verification-mismatch",
        `Expected revision ${expected ?? "base"} after migrating, found ${landed.value ?? "base"}`,
        { backupPath, appliedRevisions: applied },
      );
    }
    return ok(expected);
  }

  /**
   * Applies every revision after the current one up to `target`. Already at target is a no-op
   * without a backup.
   * @returns The revision the database is at afterwards.
   */
  async upgrade(
    target: RevisionId | "head" = "head",
    options: { signal?: AbortSignal } = {},
  ): Promise<Result<RevisionId | null, MigrationError>> {
    return this.exclusive("applying", async () => {
      const chain = await this.loadChain();
      if (chain.isErr()) return err(chain.error);
      const current = await this.currentRevision();
      if (current.isErr()) return err(current.error);

      const ids = chain.value.map((r) => r.revision);
      const targetId = target === "head" ? (ids.at(-1) ?? null) : target;
      const targetIndex = targetId === null ? -1 : ids.indexOf(targetId);
      const currentIndex = current.value === null ? -1 : ids.indexOf(current.value);
      if (targetIndex === -1 && targetId !== null) {
        return migrationErr("unknown-revision", `Unknown target revision ${targetId}`);
      }
      if (currentIndex === -1 && current.value !== null) {
        return migrationErr("unknown-revision", `Database is at revision ${current.value}, which has no revision file`);
      }
      if (targetIndex < currentIndex) {
        return migrationErr("invalid-target", `Revision ${targetId ?? "base"} is behind the current revision; use downgrade`);
      }

      const steps = chain.value.slice(currentIndex + 1, targetIndex + 1);
      if (steps.length === 0) {
        this.logger.logInfo(`Database already at ${current.value ?? "base"}`);
        return ok(current.value);
      }

      const backup = await this.takeBackup("upgrade", current.value);
      if (backup.isErr()) return err(backup.error);
      const backupPath = backup.value;

      const applied: string[] = [];
      for (const step of steps) {
        if (options.signal?.aborted) {
          return migrationErr(
            "aborted",
            `Upgrade aborted after ${applied.length} of ${steps.length} revisions`,
            { backupPath, appliedRevisions: applied },
          );
        }
        const result = await this.applyStep(step.up, step.revision);
        if (result.isErr()) {
          this.logger.logError(result.error, `Revision ${step.revision} failed`);
          return migrationErr(
            "apply-failed",
            `Revision ${step.revision} (${step.description}) failed: ${result.error.message}`,
            { backupPath, appliedRevisions: applied },
            result.error,
          );
        }
        applied.push(step.revision);
        this.logger.logInfo(`Applied revision ${step.revision}: ${step.description}`);
      }

      return this.verifyLanded(targetId, backupPath, applied);
    });
  }

  /**
   * Reverts revisions down to `target`: a revision id, `base`, or `-N` for N steps back.
   * A fresh backup is taken first even if one was just taken for an upgrade.
   */
  async downgrade(target: string): Promise<Result<RevisionId | null, MigrationError>> {
    return this.exclusive("rolling-back", async () => {
      const chain = await this.loadChain();
      if (chain.isErr()) return err(chain.error);
      const current = await this.currentRevision();
      if (current.isErr()) return err(current.error);

      const ids = chain.value.map((r) => r.revision);
      const currentIndex = current.value === null ? -1 : ids.indexOf(current.value);
      if (currentIndex === -1 && current.value !== null) {
        return migrationErr("unknown-revision", `Database is at revision ${current.value}, which has no revision file`);
      }

      let targetIndex: number;
      const relative = /^-(\d+)$/.exec(target);
      if (target === "base") {
        targetIndex = -1;
      } else if (relative) {
        targetIndex = currentIndex - Number(relative[1]);
        if (targetIndex < -1) {
          return migrationErr("invalid-target", `Cannot go back ${relative[1]} revisions from ${current.value ?? "base"}`);
        }
      } else {
        targetIndex = ids.indexOf(target);
        if (targetIndex === -1) return migrationErr("unknown-revision", `Unknown target revision ${target}`);
        if (targetIndex > currentIndex) {
          return migrationErr("invalid-target", `Revision ${target} is ahead of the current revision; use upgrade`);
        }
      }

      const targetId = targetIndex === -1 ? null : (ids[targetIndex] ?? null);
      const steps = chain.value.slice(targetIndex + 1, currentIndex + 1).reverse();
      if (steps.length === 0) {
        this.logger.logInfo(`Database already at ${current.value ?? "base"}`);
        return ok(current.value);
      }

      const backup = await this.takeBackup("downgrade", current.value);
      if (backup.isErr()) return err(backup.error);
      const backupPath = backup.value;

      const reverted: string[] = [];
      for (const step of steps) {
        const result = await this.applyStep(step.down, step.parent);
        if (result.isErr()) {
          this.logger.logError(result.error, `Reverting ${step.revision} failed`);
          return migrationErr(
            "apply-failed",
            `Reverting ${step.revision} (${step.description}) failed: ${result.error.message}`,
            { backupPath, appliedRevisions: reverted },
            result.error,
          );
        }
        reverted.push(step.revision);
        this.logger.logInfo(`Reverted revision ${step.revision}: ${step.description}`);
      }

      return this.verifyLanded(targetId, backupPath, reverted);
    });
  }

  /** Every revision from root to head, flagged with whether it is applied. */
  async history(): Promise<Result<MigrationRecord[], MigrationError>> {
    const chain = await this.loadChain();
    if (chain.isErr()) return err(chain.error);
    const current = await this.currentRevision();
    const currentIndex = current.isOk() && current.value !== null ? chain.value.findIndex((r) => r.revision === current.value) : -1;
    return ok(chain.value.map((revision, index) => toRecord(revision, index <= currentIndex)));
  }

  async state(): Promise<MigrationState> {
    if (this.activity) return this.activity;
    if (!(await this.isInitialized())) return "uninitialized";
    const chain = await this.loadChain();
    const current = await this.currentRevision();
    if (chain.isErr() || current.isErr()) return "initialized";
    const head = chain.value.at(-1)?.revision ?? null;
    if (head === null) return "initialized";
    return current.value === head ? "up-to-date" : "pending";
  }

  /** Tables, current and head revision, and what is still pending. */
  async schemaStatus(): Promise<Result<SchemaStatus, MigrationError>> {
    const tables = await this.connections.listTables();
    if (tables.isErr()) return migrationErr("not-initialized", tables.error.message, {}, tables.error);

    const history = await this.history();
    if (history.isErr()) return err(history.error);
    const current = await this.currentRevision();
    const pending = history.value.filter((record) => !record.applied);

    return ok({
      tables: tables.value,
      currentRevision: current.isOk() ? current.value : null,
      head: history.value.at(-1)?.revision ?? null,
      pendingCount: pending.length,
      pending,
      state: await this.state(),
    });
  }

  /**
   * Replaces the SQLite database file with a file backup. The pool is shut down for the copy and
   * re-initialized afterwards.
   * @returns The revision recorded in the restored database.
   */
  async restoreBackup(backupPath: string): Promise<Result<RevisionId | null, MigrationError>> {
    const filename = this.connections.config.filename;
    if (this.dbType !== DBType.SQLite || filename === null || filename === ":memory:") {
      return migrationErr("restore-failed", "Restore is only supported for SQLite file databases");
    }
    if (!backupPath.endsWith(".db")) {
      return migrationErr("restore-failed", `${backupPath} is not a SQLite file backup`);
    }
    const stats = await fs.stat(backupPath).catch(() => null);
    if (!stats?.isFile() || stats.size === 0) {
      return migrationErr("restore-failed", `Backup file not found: ${backupPath}`, { backupPath });
    }

    return this.exclusive("rolling-back", async () => {
      try {
        await this.connections.shutdown();
        await fs.rm(`${filename}-wal`, { force: true });
        await fs.rm(`${filename}-shm`, { force: true });
        await fs.copyFile(backupPath, filename);
      } catch (error) {
        return migrationErr("restore-failed", `Failed to restore ${backupPath}: ${errorMessage(error)}`, { backupPath }, error);
      }

      const reopened = await this.connections.initialize();
      if (reopened.isErr()) {
        return migrationErr("restore-failed", `Database did not reopen after restore: ${reopened.error.message}`, { backupPath }, reopened.error);
      }
      this.logger.logInfo(`Database restored from backup: ${backupPath}`);
      const revision = await this.currentRevision();
      return ok(revision.isOk() ? revision.value : null);
    });
  }
}
