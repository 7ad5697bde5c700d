/**
 * @file backup.ts
 * @description Backup artifacts taken before schema changes. SQLite databases are copied with the
 * online backup API; client-server databases are dumped table by table to JSON.
 */

import { constants as fsConstants } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { glob } from "glob";
import { err, ok, type Result } from "neverthrow";
import type { ConnectionManager } from "./connection-manager";
import { errorMessage, type MigrationError, migrationErr } from "./errors";
import type { Logger } from "./logger";
import type { Session } from "./session";
import { listTablesSql, quoteIdentifier } from "./sql";
import type { BackupArtifact, BackupReason, DBType, RevisionId, Row } from "./types";

export type BackupFile = Omit<BackupArtifact, "reason" | "revision">;

export interface LogicalBackup {
  format: "datakeep-logical-backup";
  version: 1;
  createdAt: string;
  dbType: DBType;
  revision: RevisionId | null;
  tables: Record<string, Row[]>;
}

const MAX_NAME_ATTEMPTS = 100;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** `YYYYMMDD_HHMMSS_mmm` in local time. */
export function formatBackupStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}_${pad(date.getMilliseconds(), 3)}`
  );
}

const BACKUP_NAME = /^backup_(\d{8}_\d{6}_\d{3})(?:_(\d+))?\./;

/** Creation stamp and collision suffix of a backup file name. */
function backupOrder(filePath: string): [string, number] {
  const name = path.basename(filePath);
  const match = BACKUP_NAME.exec(name);
  if (!match) return [name, 0];
  return [match[1] ?? name, Number(match[2] ?? 0)];
}

function dumpReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString("base64");
  return value;
}

function isAlreadyExists(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "EEXIST";
}

export class BackupManager {
  constructor(
    private readonly connections: ConnectionManager,
    public readonly backupsDir: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  private async ensureWritableDir(): Promise<void> {
    await fs.mkdir(this.backupsDir, { recursive: true });
    await fs.access(this.backupsDir, fsConstants.W_OK);
  }

  /**
   * Calls `write` with candidate paths until one does not exist yet. `write` must fail with
   * EEXIST rather than overwrite.
   */
  private async writeExclusive(stamp: string, extension: string, write: (target: string) => Promise<void>): Promise<string> {
    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const suffix = attempt === 0 ? "" : `_${attempt}`;
      const target = path.join(this.backupsDir, `backup_${stamp}${suffix}.${extension}`);
      try {
        await write(target);
        return target;
      } catch (error) {
        if (!isAlreadyExists(error)) throw error;
      }
    }
    throw new Error(`No free backup name for stamp ${stamp}`);
  }

  private async fileBackup(session: Session, stamp: string): Promise<string> {
    const staging = path.join(this.backupsDir, `.staging_${stamp}_${process.pid}.db`);
    await session.backupTo(staging);
    try {
      return await this.writeExclusive(stamp, "db", (target) => fs.copyFile(staging, target, fsConstants.COPYFILE_EXCL));
    } finally {
      await fs.rm(staging, { force: true });
    }
  }

  private async logicalBackup(session: Session, stamp: string, createdAt: Date, revision: RevisionId | null): Promise<string> {
    const tableRows = await session.query<{ name: unknown }>(listTablesSql(session.dbType));
    const dump: LogicalBackup = {
      format: "datakeep-logical-backup",
      version: 1,
      createdAt: createdAt.toISOString(),
      dbType: session.dbType,
      revision,
      tables: {},
    };
    for (const { name } of tableRows) {
      const table = String(name);
      dump.tables[table] = await session.query(`SELECT * FROM ${quoteIdentifier(table, session.dbType)}`);
    }
    const payload = JSON.stringify(dump, dumpReplacer, 2);
    return this.writeExclusive(stamp, "json", (target) => fs.writeFile(target, payload, { flag: "wx" }));
  }

  /**
   * Takes a backup and verifies it landed. Any failure is a `backup-failed` MigrationError and no
   * schema change should follow it.
   */
  async create(reason: BackupReason, revision: RevisionId | null = null): Promise<Result<BackupArtifact, MigrationError>> {
    try {
      await this.ensureWritableDir();
    } catch (error) {
      return migrationErr("backup-failed", `Backups directory ${this.backupsDir} is not writable: ${errorMessage(error)}`, {}, error);
    }

    const acquired = await this.connections.acquireSession();
    if (acquired.isErr()) {
      return migrationErr("backup-failed", `Cannot back up: ${acquired.error.message}`, {}, acquired.error);
    }

    const session = acquired.value;
    const createdAt = this.now();
    const stamp = formatBackupStamp(createdAt);
    let backupPath: string;
    let kind: BackupArtifact["kind"];
    try {
      if (session.supportsFileBackup) {
        kind = "file";
        backupPath = await this.fileBackup(session, stamp);
      } else {
        kind = "logical";
        backupPath = await this.logicalBackup(session, stamp, createdAt, revision);
      }
    } catch (error) {
      return migrationErr("backup-failed", `Failed to create backup: ${errorMessage(error)}`, {}, error);
    } finally {
      session.release();
    }

    const verified = await this.verify(backupPath);
    if (verified.isErr()) return err(verified.error);

    this.logger.logInfo(`Database backup created: ${backupPath} (${reason})`);
    return ok({ path: backupPath, createdAt, kind, reason, revision, bytes: verified.value });
  }

  private async verify(backupPath: string): Promise<Result<number, MigrationError>> {
    try {
      const stats = await fs.stat(backupPath);
      if (stats.size > 0) return ok(stats.size);
      return migrationErr("backup-failed", `Backup ${backupPath} is empty`, { backupPath });
    } catch (error) {
      return migrationErr("backup-failed", `Backup ${backupPath} could not be verified`, { backupPath }, error);
    }
  }

  /** Backups found in the backups directory, newest first. */
  async list(): Promise<BackupFile[]> {
    let paths: string[];
    try {
      paths = await glob("backup_*.{db,json}", { cwd: this.backupsDir, absolute: true, nodir: true });
    } catch (error) {
      this.logger.logWarn(`Cannot list backups in ${this.backupsDir}: ${errorMessage(error)}`);
      return [];
    }
    paths.sort((a, b) => {
      const [stampA, suffixA] = backupOrder(a);
      const [stampB, suffixB] = backupOrder(b);
      if (stampA !== stampB) return stampA < stampB ? 1 : -1;
      return suffixB - suffixA;
    });

    const files: BackupFile[] = [];
    for (const filePath of paths) {
      const stats = await fs.stat(filePath).catch(() => null);
      if (!stats) continue;
      files.push({
        path: filePath,
        createdAt: stats.mtime,
        kind: filePath.endsWith(".db") ? "file" : "logical",
        bytes: stats.size,
      });
    }
    return files;
  }

  /**
   * Deletes all but the newest `keep` backups.
   * @returns Paths of the deleted backups.
   */
  async prune(keep: number): Promise<string[]> {
    const files = await this.list();
    const removed: string[] = [];
    for (const file of files.slice(Math.max(0, keep))) {
      await fs.rm(file.path, { force: true });
      removed.push(file.path);
    }
    if (removed.length > 0) this.logger.logInfo(`Pruned ${removed.length} old backups`);
    return removed;
  }
}
