/**
 * @file sql.ts
 * @description Dialect helpers: placeholder formatting, identifier quoting, type mapping and
 * the few catalog queries the layer needs.
 */

import { DataTypes, DBType, type SqlValue } from "./types";

/**
 * Rewrites `?` placeholders into `$1, $2, ...` for PostgreSQL. Other dialects use `?` natively.
 */
export function formatQuery(query: string, dbType: DBType): string {
  if (dbType === DBType.Postgres) {
    let paramIndex = 1;
    return query.replace(/\?/g, () => `$${paramIndex++}`);
  }
  return query;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Quotes a table or column name. Only plain identifiers are accepted, so model metadata
 * can never smuggle SQL into a statement.
 */
export function quoteIdentifier(name: string, dbType: DBType): string {
  if (!IDENTIFIER.test(name)) {
    throw new TypeError(`Invalid SQL identifier: ${JSON.stringify(name)}`);
  }
  return dbType === DBType.MySQL ? `\`${name}\`` : `"${name}"`;
}

/**
 * Maps an abstract data type to the SQL type of the target dialect.
 */
export function mapDataTypeToSql(dt: DataTypes, dbType: DBType): string {
  const type = DataTypes[dt].toLowerCase();

  if (dbType === DBType.Postgres) {
    switch (type) {
      case "string": return "TEXT";
      case "text": return "TEXT";
      case "integer": return "INTEGER";
      case "bigint": return "BIGINT";
      case "float": return "REAL";
      case "double": return "DOUBLE PRECISION";
      case "decimal": return "DECIMAL";
      case "boolean": return "BOOLEAN";
      case "date": return "DATE";
      case "datetime": return "TIMESTAMP";
      case "json": return "JSONB";
      case "uuid": return "UUID";
      case "blob": return "BYTEA";
      default: return "TEXT";
    }
  }
  if (dbType === DBType.MySQL) {
    switch (type) {
      case "string": return "VARCHAR(255)";
      case "text": return "TEXT";
      case "integer": return "INT";
      case "bigint": return "BIGINT";
      case "float": return "FLOAT";
      case "double": return "DOUBLE";
      case "decimal": return "DECIMAL(10,2)";
      case "boolean": return "TINYINT(1)";
      case "date": return "DATE";
      case "datetime": return "DATETIME";
      case "json": return "JSON";
      case "uuid": return "CHAR(36)";
      case "blob": return "BLOB";
      default: return "TEXT";
    }
  }
  switch (type) {
    case "integer": return "INTEGER";
    case "bigint": return "INTEGER";
    case "float": return "REAL";
    case "double": return "REAL";
    case "decimal": return "NUMERIC";
    case "boolean": return "INTEGER";
    case "blob": return "BLOB";
    default: return "TEXT";
  }
}

/**
 * The column definition for an auto-incrementing primary key.
 */
export function getAutoIncrementPK(dbType: DBType): string {
  switch (dbType) {
    case DBType.Postgres:
      return "SERIAL PRIMARY KEY";
    case DBType.MySQL:
      return "INT AUTO_INCREMENT PRIMARY KEY";
    case DBType.SQLite:
      return "INTEGER PRIMARY KEY AUTOINCREMENT";
  }
}

export function listTablesSql(dbType: DBType): string {
  switch (dbType) {
    case DBType.Postgres:
      return `SELECT table_name AS name FROM information_schema.tables
        WHERE table_schema = current_schema() AND table_type = 'BASE TABLE' ORDER BY table_name`;
    case DBType.MySQL:
      return `SELECT table_name AS name FROM information_schema.tables
        WHERE table_schema = DATABASE() AND table_type = 'BASE TABLE' ORDER BY table_name`;
    case DBType.SQLite:
      return `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`;
  }
}

export function beginSql(dbType: DBType): string {
  return dbType === DBType.MySQL ? "START TRANSACTION" : "BEGIN";
}

/**
 * SQLite caps bound parameters at 999 on older builds; the client-server backends allow far more
 * but very large statements gain nothing.
 */
export function maxParamsPerStatement(dbType: DBType): number {
  return dbType === DBType.SQLite ? 999 : 10000;
}

export interface InsertStatement {
  sql: string;
  params: SqlValue[];
}

/**
 * Builds one multi-row INSERT. Missing values are bound as NULL. PostgreSQL has no insert id,
 * so `returningColumn` is read back with RETURNING instead.
 */
export function buildInsert(
  dbType: DBType,
  table: string,
  columns: readonly string[],
  rows: ReadonlyArray<Readonly<Record<string, SqlValue>>>,
  returningColumn?: string,
): InsertStatement {
  const columnList = columns.map((c) => quoteIdentifier(c, dbType)).join(", ");
  const tuple = `(${columns.map(() => "?").join(", ")})`;
  const params = rows.flatMap((row) => columns.map((c) => row[c] ?? null));
  const returning =
    returningColumn && dbType === DBType.Postgres ? ` RETURNING ${quoteIdentifier(returningColumn, dbType)}` : "";
  return {
    sql: `INSERT INTO ${quoteIdentifier(table, dbType)} (${columnList}) VALUES ${rows.map(() => tuple).join(", ")}${returning}`,
    params,
  };
}

/**
 * Value for an automatically maintained timestamp column. MySQL DATETIME rejects the ISO form.
 */
export function currentTimestamp(dbType: DBType, now: Date = new Date()): string {
  const iso = now.toISOString();
  return dbType === DBType.MySQL ? iso.slice(0, 19).replace("T", " ") : iso;
}
