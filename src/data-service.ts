/**
 * @file data-service.ts
 * @description The facade the rest of the application uses: scoped transactional sessions,
 * cache-aside reads, batched inserts and CRUD over declared models.
 */

import { err, ok, type Result } from "neverthrow";
import type { CacheManager } from "./cache";
import type { ConnectionManager } from "./connection-manager";
import { QueryError, toError } from "./errors";
import type { HealthMonitor } from "./health";
import type { Logger } from "./logger";
import type { ModelDefinition } from "./model";
import type { Session } from "./session";
import { buildInsert, currentTimestamp, maxParamsPerStatement, quoteIdentifier } from "./sql";
import type { CacheStats, DBType, HealthReport, SqlValue } from "./types";

export type RecordId = number | string;

export interface DataServiceDeps {
  connections: ConnectionManager;
  health: HealthMonitor;
  cache: CacheManager;
  logger: Logger;
}

export interface FindManyOptions {
  orderBy?: string;
  direction?: "ASC" | "DESC";
  limit?: number;
  offset?: number;
}

export interface DataLayerHealth {
  database: HealthReport;
  cache: CacheStats;
}

export class DataService {
  private readonly connections: ConnectionManager;
  private readonly health: HealthMonitor;
  private readonly cache: CacheManager;
  private readonly logger: Logger;

  constructor(deps: DataServiceDeps) {
    this.connections = deps.connections;
    this.health = deps.health;
    this.cache = deps.cache;
    this.logger = deps.logger;
  }

  private get dbType(): DBType {
    return this.connections.dbType;
  }

  /**
   * Runs `callback` in a transaction on a dedicated connection. Commits when it resolves, rolls back
   * when it throws; the connection is released either way. The callback's error is returned as is.
   */
  async withSession<T>(callback: (session: Session) => Promise<T>): Promise<Result<T, Error>> {
    const acquired = await this.connections.acquireSession();
    if (acquired.isErr()) return err(acquired.error);
    const session = acquired.value;
    try {
      return ok(await session.transaction(callback));
    } catch (error) {
      return err(toError(error));
    } finally {
      session.release();
    }
  }

  /**
   * Cache-aside read. A null or undefined result is returned but not cached, and failing to
   * populate the cache never fails the read.
   */
  async cachedRead<T>(
    key: string,
    ttlSeconds: number | undefined,
    loader: (session: Session) => Promise<T>,
  ): Promise<Result<T, Error>> {
    const cached = await this.cache.get<T>(key);
    if (cached !== null) return ok(cached);

    const loaded = await this.withSession(loader);
    if (loaded.isOk() && loaded.value !== null && loaded.value !== undefined) {
      await this.cache.set(key, loaded.value, ttlSeconds);
    }
    return loaded;
  }

  private withTimestamps<TRow extends object>(
    model: ModelDefinition<TRow>,
    values: Record<string, SqlValue>,
    creating: boolean,
  ): Record<string, SqlValue> {
    const now = currentTimestamp(this.dbType);
    const result = { ...values };
    const { createdAt, updatedAt } = model.timestamps;
    if (creating && createdAt && result[createdAt] === undefined) result[createdAt] = now;
    if (updatedAt && (!creating || result[updatedAt] === undefined)) result[updatedAt] = now;
    return result;
  }

  private async invalidateModel<TRow extends object>(model: ModelDefinition<TRow>): Promise<void> {
    await this.cache.invalidatePrefix(model.cachePrefix);
  }

  /**
   * Inserts `rows` with multi-row INSERT statements inside one transaction.
   * @returns The number of rows inserted.
   */
  async batchWrite<TRow extends object>(
    model: ModelDefinition<TRow>,
    rows: ReadonlyArray<Partial<TRow>>,
    options: { batchSize?: number } = {},
  ): Promise<Result<number, Error>> {
    if (rows.length === 0) return ok(0);

    const prepared: Record<string, SqlValue>[] = [];
    for (const row of rows) {
      const values = model.dehydrate(row);
      if (values.isErr()) return err(values.error);
      prepared.push(this.withTimestamps(model, values.value, true));
    }

    const columns = model.columnNames().filter((name) => prepared.some((row) => row[name] !== undefined));
    const byParams = Math.max(1, Math.floor(maxParamsPerStatement(this.dbType) / columns.length));
    const perStatement = Math.max(1, Math.min(options.batchSize ?? 500, byParams));

    const written = await this.withSession(async (session) => {
      let count = 0;
      for (let i = 0; i < prepared.length; i += perStatement) {
        const chunk = prepared.slice(i, i + perStatement);
        const statement = buildInsert(this.dbType, model.tableName, columns, chunk);
        const result = await session.execute(statement.sql, statement.params);
        count += result.rowCount;
      }
      return count;
    });

    if (written.isOk()) {
      this.logger.logDebug(`Inserted ${written.value} rows into ${model.tableName}`);
      await this.invalidateModel(model);
    }
    return written;
  }

  private async selectById<TRow extends object>(
    session: Session,
    model: ModelDefinition<TRow>,
    id: RecordId,
  ): Promise<TRow | null> {
    const sql = `SELECT * FROM ${quoteIdentifier(model.tableName, this.dbType)} WHERE ${quoteIdentifier(model.primaryKey, this.dbType)} = ?`;
    const rows = await session.query(sql, [id]);
    const row = rows[0];
    return row ? model.hydrate(row) : null;
  }

  /**
   * Inserts one row and returns it as stored, including generated keys and defaults.
   */
  async insert<TRow extends object>(model: ModelDefinition<TRow>, values: Partial<TRow>): Promise<Result<TRow, Error>> {
    const dehydrated = model.dehydrate(values);
    if (dehydrated.isErr()) return err(dehydrated.error);
    const row = this.withTimestamps(model, dehydrated.value, true);
    const columns = Object.keys(row);
    if (columns.length === 0) {
      return err(new QueryError("invalid", `Nothing to insert into ${model.tableName}`));
    }

    const inserted = await this.withSession(async (session) => {
      const statement = buildInsert(this.dbType, model.tableName, columns, [row], model.primaryKey);
      const result = await session.execute(statement.sql, statement.params);
      const id = readId(row[model.primaryKey]) ?? readId(result.insertId) ?? readId(result.rows[0]?.[model.primaryKey]);
      if (id === null) {
        throw new QueryError("invalid", `Could not determine the key of the row inserted into ${model.tableName}`);
      }
      const stored = await this.selectById(session, model, id);
      if (!stored) {
        throw new QueryError("invalid", `Inserted row ${String(id)} not found in ${model.tableName}`);
      }
      return stored;
    });

    if (inserted.isOk()) await this.invalidateModel(model);
    return inserted;
  }

  /**
   * Reads one row by primary key through the cache.
   */
  async findById<TRow extends object>(
    model: ModelDefinition<TRow>,
    id: RecordId,
    ttlSeconds?: number,
  ): Promise<Result<TRow | null, Error>> {
    return this.cachedRead(`${model.cachePrefix}id:${String(id)}`, ttlSeconds, (session) =>
      this.selectById(session, model, id),
    );
  }

  /**
   * Reads rows matching every `where` field by equality (`null` matches IS NULL). Not cached.
   */
  async findMany<TRow extends object>(
    model: ModelDefinition<TRow>,
    where: Partial<TRow> = {},
    options: FindManyOptions = {},
  ): Promise<Result<TRow[], Error>> {
    const conditions = model.dehydrate(where);
    if (conditions.isErr()) return err(conditions.error);
    if (options.orderBy !== undefined && !model.hasColumn(options.orderBy)) {
      return err(new QueryError("unknown-column", `Unknown column "${options.orderBy}" for table ${model.tableName}`));
    }

    const clauses: string[] = [];
    const params: SqlValue[] = [];
    for (const [column, value] of Object.entries(conditions.value)) {
      const quoted = quoteIdentifier(column, this.dbType);
      if (value === null) {
        clauses.push(`${quoted} IS NULL`);
      } else {
        clauses.push(`${quoted} = ?`);
        params.push(value);
      }
    }

    let sql = `SELECT * FROM ${quoteIdentifier(model.tableName, this.dbType)}`;
    if (clauses.length > 0) sql += ` WHERE ${clauses.join(" AND ")}`;
    const orderBy = options.orderBy ?? model.primaryKey;
    sql += ` ORDER BY ${quoteIdentifier(orderBy, this.dbType)} ${options.direction ?? "ASC"}`;
    if (options.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(options.limit);
      if (options.offset !== undefined) {
        sql += " OFFSET ?";
        params.push(options.offset);
      }
    }

    return this.withSession(async (session) => {
      const rows = await session.query(sql, params);
      return rows.map((row) => model.hydrate(row));
    });
  }

  /**
   * Applies `patch` to one row.
   * @returns The updated row, or null when no row has that key.
   */
  async update<TRow extends object>(
    model: ModelDefinition<TRow>,
    id: RecordId,
    patch: Partial<TRow>,
  ): Promise<Result<TRow | null, Error>> {
    const dehydrated = model.dehydrate(patch);
    if (dehydrated.isErr()) return err(dehydrated.error);
    if (model.primaryKey in dehydrated.value) {
      return err(new QueryError("invalid", `Primary key of ${model.tableName} cannot be updated`));
    }
    const values = this.withTimestamps(model, dehydrated.value, false);

    const updated = await this.withSession(async (session) => {
      const columns = Object.keys(values);
      if (columns.length > 0) {
        const assignments = columns.map((column) => `${quoteIdentifier(column, this.dbType)} = ?`).join(", ");
        const sql = `UPDATE ${quoteIdentifier(model.tableName, this.dbType)} SET ${assignments} WHERE ${quoteIdentifier(model.primaryKey, this.dbType)} = ?`;
        await session.execute(sql, [...columns.map((column) => values[column] ?? null), id]);
      }
      return this.selectById(session, model, id);
    });

    if (updated.isOk() && updated.value !== null) await this.invalidateModel(model);
    return updated;
  }

  /**
   * Deletes one row.
   * @returns Whether a row was deleted.
   */
  async remove<TRow extends object>(model: ModelDefinition<TRow>, id: RecordId): Promise<Result<boolean, Error>> {
    const removed = await this.withSession(async (session) => {
      const sql = `DELETE FROM ${quoteIdentifier(model.tableName, this.dbType)} WHERE ${quoteIdentifier(model.primaryKey, this.dbType)} = ?`;
      const result = await session.execute(sql, [id]);
      return result.rowCount > 0;
    });
    if (removed.isOk() && removed.value) await this.invalidateModel(model);
    return removed;
  }

  /** Drops every cached read under `prefix`. */
  async invalidate(prefix: string): Promise<number> {
    return this.cache.invalidatePrefix(prefix);
  }

  async healthCheck(): Promise<DataLayerHealth> {
    return { database: await this.health.checkHealth(), cache: this.cache.stats() };
  }

  async close(): Promise<void> {
    this.health.stop();
    await this.cache.disconnect();
    await this.connections.shutdown();
  }
}

function readId(value: unknown): RecordId | null {
  if (typeof value === "number" || typeof value === "string") return value;
  if (typeof value === "bigint") return Number(value);
  return null;
}
