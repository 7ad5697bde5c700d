/**
 * @file session.ts
 * @description A session owns one pooled connection until it is released. Every statement is timed
 * and reported to the connection observers.
 */

import type { StatementResult } from "./drivers";
import { classifyDriverError, ConnectionError, errorMessage } from "./errors";
import type { Logger } from "./logger";
import type { PooledConnection } from "./pool";
import { beginSql } from "./sql";
import type { DBType, Row, SqlValue } from "./types";

/**
 * Receives connection lifecycle events. HealthMonitor is the main implementation.
 */
export interface ConnectionObserver {
  connectionOpened(): void;
  queryExecuted(durationMs: number, sql: string): void;
  errorRaised(error: Error): void;
  /** The pool was disposed by `ConnectionManager.shutdown`. */
  poolDisposed?(): void;
}

export class Session {
  private released = false;
  private broken = false;
  private inTransaction = false;

  constructor(
    private readonly lease: PooledConnection,
    public readonly dbType: DBType,
    private readonly observer: ConnectionObserver,
    private readonly logger: Logger,
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Runs a statement and returns its rows.
   * @throws ConnectionError when the connection failed, QueryError for anything the backend rejected.
   */
  async query<T = Row>(sql: string, params: readonly SqlValue[] = []): Promise<T[]> {
    const result = await this.execute(sql, params);
    return result.rows as T[];
  }

  async execute(sql: string, params: readonly SqlValue[] = []): Promise<StatementResult> {
    if (this.released) {
      throw new ConnectionError("closed", "Session has already been released");
    }
    const start = performance.now();
    try {
      const result = await this.lease.connection.query(sql, params);
      const executionTime = performance.now() - start;
      this.logger.logQuery(sql, params, executionTime);
      this.observer.queryExecuted(executionTime, sql);
      return result;
    } catch (error) {
      const classified = classifyDriverError(error, sql);
      if (classified instanceof ConnectionError) this.broken = true;
      this.observer.errorRaised(classified);
      throw classified;
    }
  }

  /** Whether `backupTo` can copy the database file. */
  get supportsFileBackup(): boolean {
    return this.lease.connection.backupTo !== undefined;
  }

  /**
   * Writes an online copy of the database to `destination`.
   * @throws ConnectionError when the backend offers no file-level backup.
   */
  async backupTo(destination: string): Promise<void> {
    const connection = this.lease.connection;
    if (this.released || !connection.backupTo) {
      throw new ConnectionError("closed", "File backup is not available on this session");
    }
    await connection.backupTo(destination);
  }

  async begin(): Promise<void> {
    await this.execute(beginSql(this.dbType));
    this.inTransaction = true;
  }

  async commit(): Promise<void> {
    await this.execute("COMMIT");
    this.inTransaction = false;
  }

  async rollback(): Promise<void> {
    this.inTransaction = false;
    await this.execute("ROLLBACK");
  }

  /**
   * Runs `callback` inside a transaction: commit when it resolves, rollback when it throws.
   * The callback's error is rethrown unchanged.
   */
  async transaction<T>(callback: (session: Session) => Promise<T>): Promise<T> {
    await this.begin();
    try {
      const result = await callback(this);
      await this.commit();
      return result;
    } catch (error) {
      if (this.inTransaction) {
        try {
          await this.rollback();
        } catch (rollbackError) {
          this.broken = true;
          this.logger.logWarn(`Rollback failed: ${errorMessage(rollbackError)}`);
        }
      }
      throw error;
    }
  }

  /**
   * Returns the connection to the pool. A connection that failed, or that still has an open
   * transaction, is discarded instead. Safe to call more than once.
   */
  release(): void {
    if (this.released) return;
    this.released = true;
    if (this.inTransaction) {
      this.logger.logWarn("Session released with an open transaction; discarding its connection");
    }
    this.lease.release({ invalidate: this.broken || this.inTransaction });
  }
}
