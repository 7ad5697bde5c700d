/**
 * @file connection-manager.ts
 * @description Owns the connection pool for one configuration: picks the pooling policy, hands out
 * sessions and runs connection probes.
 */

import { err, ok, type Result } from "neverthrow";
import { createDriver, type Driver, type DriverConnection } from "./drivers";
import { asConnectionError, classifyDriverError, ConnectionError, errorMessage, type QueryError } from "./errors";
import { ConsoleLogger, type Logger, maskUrl } from "./logger";
import { type ConnectionPool, QueuePool, StaticPool } from "./pool";
import { type ConnectionObserver, Session } from "./session";
import { listTablesSql } from "./sql";
import { type ConnectionConfig, DBType, type PoolKind, type PoolStatus } from "./types";

export interface Ready {
  dbType: DBType;
  poolKind: PoolKind;
}

export interface ConnectionManagerOptions {
  logger?: Logger;
  /** Replaces the driver picked from `config.type`. */
  driver?: Driver;
  /** Used between `testConnection` attempts. */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class ConnectionManager {
  private pool: ConnectionPool | null = null;
  private ready: Ready | null = null;
  private initializing: Promise<Result<Ready, ConnectionError>> | null = null;
  /** Set when the last `initialize` failed; probes then go straight to the driver. */
  private initFailed = false;
  private observers: ConnectionObserver[] = [];
  private readonly driver: Driver;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  private readonly events: ConnectionObserver = {
    connectionOpened: () => this.observers.forEach((o) => o.connectionOpened()),
    queryExecuted: (durationMs, sql) => this.observers.forEach((o) => o.queryExecuted(durationMs, sql)),
    errorRaised: (error) => this.observers.forEach((o) => o.errorRaised(error)),
    poolDisposed: () => this.observers.forEach((o) => o.poolDisposed?.()),
  };

  constructor(
    public readonly config: ConnectionConfig,
    options: ConnectionManagerOptions = {},
  ) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.driver = options.driver ?? createDriver(config, this.logger);
    this.sleep = options.sleep ?? defaultSleep;
  }

  get dbType(): DBType {
    return this.config.type;
  }

  get isInitialized(): boolean {
    return this.ready !== null;
  }

  addObserver(observer: ConnectionObserver): void {
    this.observers.push(observer);
  }

  /**
   * Creates the pool and verifies one connection. Calling it again while initialized returns the
   * same result without creating another pool.
   */
  async initialize(): Promise<Result<Ready, ConnectionError>> {
    if (this.ready) return ok(this.ready);
    if (!this.initializing) {
      this.initializing = this.open().finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  private async open(): Promise<Result<Ready, ConnectionError>> {
    const pool = this.createPool();
    try {
      const lease = await pool.acquire();
      try {
        await lease.connection.ping();
      } finally {
        lease.release();
      }
    } catch (error) {
      const connectionError = asConnectionError(error);
      this.events.errorRaised(connectionError);
      this.logger.logError(connectionError, `Failed to initialize ${this.config.type} connection to ${maskUrl(this.config.url)}`);
      await pool.dispose().catch((disposeError: unknown) => {
        this.logger.logWarn(`Failed to dispose pool: ${errorMessage(disposeError)}`);
      });
      this.initFailed = true;
      return err(connectionError);
    }

    this.initFailed = false;
    this.pool = pool;
    this.ready = { dbType: this.config.type, poolKind: pool.kind };
    this.logger.logInfo(`Connected to ${this.config.type} at ${maskUrl(this.config.url)} (${pool.kind} pool)`);
    return ok(this.ready);
  }

  private createPool(): ConnectionPool {
    const onConnect = () => {
      this.logger.logDebug(`Opened new ${this.config.type} connection`);
      this.events.connectionOpened();
    };
    if (this.config.type === DBType.SQLite) {
      return new StaticPool(this.driver, { timeoutMs: this.config.poolTimeoutMs, logger: this.logger, onConnect });
    }
    return new QueuePool(this.driver, {
      size: this.config.poolSize,
      maxOverflow: this.config.maxOverflow,
      timeoutMs: this.config.poolTimeoutMs,
      recycleMs: this.config.poolRecycleMs,
      prePing: this.config.prePing,
      logger: this.logger,
      onConnect,
    });
  }

  /**
   * Leases a connection wrapped in a session. The caller must release it.
   */
  async acquireSession(): Promise<Result<Session, ConnectionError>> {
    const pool = this.pool;
    if (!pool) {
      return err(new ConnectionError("not-initialized", "Connection manager has not been initialized"));
    }
    try {
      const lease = await pool.acquire();
      return ok(new Session(lease, this.config.type, this.events, this.logger));
    } catch (error) {
      const connectionError = asConnectionError(error);
      this.events.errorRaised(connectionError);
      return err(connectionError);
    }
  }

  /**
   * Runs `SELECT 1`, retrying with exponential backoff. Never throws.
   * After a failed `initialize` each attempt opens a connection of its own.
   * @returns true once an attempt succeeds, false after `maxRetries` failures or when never initialized.
   */
  async testConnection(maxRetries = 3, baseDelayMs = 1000): Promise<boolean> {
    if (!this.pool && !this.initFailed) return false;

    let lastError = "";
    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      const failure = this.pool ? await this.probePooled() : await this.probeDirect();
      if (failure === null) return true;
      lastError = failure;

      this.logger.logWarn(`Connection test attempt ${attempt}/${maxRetries} failed: ${lastError}`);
      if (attempt < maxRetries) {
        await this.sleep(baseDelayMs * Math.pow(2, attempt - 1));
      }
    }
    this.logger.logError(new ConnectionError("unreachable", lastError), `Connection test failed after ${maxRetries} attempts`);
    return false;
  }

  /** @returns null on success, otherwise the failure message. */
  private async probePooled(): Promise<string | null> {
    const acquired = await this.acquireSession();
    if (acquired.isErr()) return acquired.error.message;
    const session = acquired.value;
    try {
      await session.query("SELECT 1");
      return null;
    } catch (error) {
      return errorMessage(error);
    } finally {
      session.release();
    }
  }

  private async probeDirect(): Promise<string | null> {
    let connection: DriverConnection;
    try {
      connection = await this.driver.connect();
    } catch (error) {
      const connectionError = asConnectionError(error);
      this.events.errorRaised(connectionError);
      return connectionError.message;
    }
    try {
      await connection.ping();
      return null;
    } catch (error) {
      return errorMessage(error);
    } finally {
      await connection.close().catch((closeError: unknown) => {
        this.logger.logWarn(`Failed to close probe connection: ${errorMessage(closeError)}`);
      });
    }
  }

  poolStatus(): PoolStatus | null {
    return this.pool ? this.pool.status() : null;
  }

  async listTables(): Promise<Result<string[], ConnectionError | QueryError>> {
    const acquired = await this.acquireSession();
    if (acquired.isErr()) return err(acquired.error);
    const session = acquired.value;
    try {
      const rows = await session.query<{ name: unknown }>(listTablesSql(this.config.type));
      return ok(rows.map((row) => String(row.name)));
    } catch (error) {
      return err(classifyDriverError(error));
    } finally {
      session.release();
    }
  }

  /** Disposes the pool. The manager can be initialized again afterwards. */
  async shutdown(): Promise<void> {
    this.initFailed = false;
    const pool = this.pool;
    if (!pool) return;
    this.pool = null;
    this.ready = null;
    this.logger.logMetrics(pool.status());
    await pool.dispose();
    this.events.poolDisposed?.();
    this.logger.logInfo("Connection pool disposed");
  }
}
