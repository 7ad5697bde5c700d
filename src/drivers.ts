/**
 * @file drivers.ts
 * @description Thin adapters that open single physical connections for SQLite, PostgreSQL and MySQL.
 * Pooling is layered on top of these by `pool.ts`.
 */

import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import pg from "pg";
import mysql from "mysql2/promise";
import type { Logger } from "./logger";
import { formatQuery } from "./sql";
import { type ConnectionConfig, DBType, type Row, type SqlValue } from "./types";

export interface StatementResult {
  rows: Row[];
  /** Rows returned for reads, rows affected for writes. */
  rowCount: number;
  insertId: number | bigint | null;
}

/** One physical connection to the backend. */
export interface DriverConnection {
  query(sql: string, params?: readonly SqlValue[]): Promise<StatementResult>;
  ping(): Promise<void>;
  /** False once the backend reported the connection as broken. */
  isAlive(): boolean;
  close(): Promise<void>;
  /** Online copy of the whole database to `destination`. Only embedded stores provide it. */
  backupTo?(destination: string): Promise<void>;
}

export interface Driver {
  readonly type: DBType;
  connect(): Promise<DriverConnection>;
}

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const STATEMENT_CACHE_LIMIT = 256;

function toSqliteValue(value: SqlValue): string | number | bigint | Buffer | null {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  return value;
}

class SqliteConnection implements DriverConnection {
  private statements: Map<string, Database.Statement> = new Map();

  constructor(private readonly db: Database.Database) {}

  private prepare(sql: string): Database.Statement {
    let stmt = this.statements.get(sql);
    if (!stmt) {
      stmt = this.db.prepare(sql);
      if (this.statements.size >= STATEMENT_CACHE_LIMIT) {
        const oldest = this.statements.keys().next();
        if (!oldest.done) this.statements.delete(oldest.value);
      }
      this.statements.set(sql, stmt);
    }
    return stmt;
  }

  async query(sql: string, params: readonly SqlValue[] = []): Promise<StatementResult> {
    const stmt = this.prepare(sql);
    const bound = params.map(toSqliteValue);
    if (stmt.reader) {
      const rows = stmt.all(...bound).filter(isRow);
      return { rows, rowCount: rows.length, insertId: null };
    }
    const info = stmt.run(...bound);
    return { rows: [], rowCount: info.changes, insertId: info.lastInsertRowid };
  }

  async ping(): Promise<void> {
    this.db.prepare("SELECT 1").get();
  }

  isAlive(): boolean {
    return this.db.open;
  }

  async close(): Promise<void> {
    this.statements.clear();
    if (this.db.open) this.db.close();
  }

  async backupTo(destination: string): Promise<void> {
    await this.db.backup(destination);
  }
}

export class SqliteDriver implements Driver {
  readonly type = DBType.SQLite;

  constructor(
    private readonly filename: string,
    private readonly busyTimeoutMs: number,
  ) {}

  async connect(): Promise<DriverConnection> {
    const inMemory = this.filename === ":memory:";
    if (!inMemory) {
      fs.mkdirSync(path.dirname(path.resolve(this.filename)), { recursive: true });
    }
    const db = new Database(this.filename, { timeout: this.busyTimeoutMs });
    db.pragma("foreign_keys = ON");
    if (!inMemory) {
      db.pragma("journal_mode = WAL");
      db.pragma("synchronous = NORMAL");
    }
    return new SqliteConnection(db);
  }
}

// pg serializes unknown objects with JSON.stringify, which cannot handle bigint.
function toServerValue(value: SqlValue): string | number | boolean | Date | Buffer | null {
  return typeof value === "bigint" ? value.toString() : value;
}

class PostgresConnection implements DriverConnection {
  private alive = true;

  constructor(private readonly client: pg.Client, logger: Logger) {
    client.on("error", (error) => {
      this.alive = false;
      logger.logError(error, "PostgreSQL connection error");
    });
    client.on("end", () => {
      this.alive = false;
    });
  }

  async query(sql: string, params: readonly SqlValue[] = []): Promise<StatementResult> {
    const result = await this.client.query<Row>(formatQuery(sql, DBType.Postgres), params.map(toServerValue));
    const rows = Array.isArray(result.rows) ? result.rows : [];
    return { rows, rowCount: result.command === "SELECT" ? rows.length : result.rowCount ?? 0, insertId: null };
  }

  async ping(): Promise<void> {
    await this.client.query("SELECT 1");
  }

  isAlive(): boolean {
    return this.alive;
  }

  async close(): Promise<void> {
    this.alive = false;
    await this.client.end();
  }
}

export class PostgresDriver implements Driver {
  readonly type = DBType.Postgres;

  constructor(
    private readonly connectionString: string,
    private readonly connectTimeoutMs: number,
    private readonly logger: Logger,
  ) {}

  async connect(): Promise<DriverConnection> {
    const client = new pg.Client({
      connectionString: this.connectionString,
      connectionTimeoutMillis: this.connectTimeoutMs,
    });
    await client.connect();
    return new PostgresConnection(client, this.logger);
  }
}

function readHeader(result: unknown): { affected: number; insertId: number | null } {
  if (typeof result !== "object" || result === null) return { affected: 0, insertId: null };
  const affected = "affectedRows" in result && typeof result.affectedRows === "number" ? result.affectedRows : 0;
  const insertId = "insertId" in result && typeof result.insertId === "number" && result.insertId > 0 ? result.insertId : null;
  return { affected, insertId };
}

class MySQLConnection implements DriverConnection {
  private alive = true;

  constructor(private readonly connection: mysql.Connection, logger: Logger) {
    connection.on("error", (error: Error) => {
      this.alive = false;
      logger.logError(error, "MySQL connection error");
    });
  }

  async query(sql: string, params: readonly SqlValue[] = []): Promise<StatementResult> {
    const response = await this.connection.query(sql, params.map(toServerValue));
    const result: unknown = response[0];
    if (Array.isArray(result)) {
      const rows = result.filter(isRow);
      return { rows, rowCount: rows.length, insertId: null };
    }
    const header = readHeader(result);
    return { rows: [], rowCount: header.affected, insertId: header.insertId };
  }

  async ping(): Promise<void> {
    await this.connection.ping();
  }

  isAlive(): boolean {
    return this.alive;
  }

  async close(): Promise<void> {
    this.alive = false;
    await this.connection.end();
  }
}

export class MySQLDriver implements Driver {
  readonly type = DBType.MySQL;

  constructor(
    private readonly uri: string,
    private readonly connectTimeoutMs: number,
    private readonly logger: Logger,
  ) {}

  async connect(): Promise<DriverConnection> {
    const connection = await mysql.createConnection({ uri: this.uri, connectTimeout: this.connectTimeoutMs });
    return new MySQLConnection(connection, this.logger);
  }
}

/**
 * Picks the driver for the configured backend kind.
 */
export function createDriver(config: ConnectionConfig, logger: Logger): Driver {
  switch (config.type) {
    case DBType.SQLite:
      return new SqliteDriver(config.filename ?? ":memory:", config.connectTimeoutMs);
    case DBType.Postgres:
      return new PostgresDriver(config.url, config.connectTimeoutMs, logger);
    case DBType.MySQL:
      return new MySQLDriver(config.url, config.connectTimeoutMs, logger);
  }
}
