/**
 * @file pool.ts
 * @description Connection pools. `StaticPool` shares one connection between serialized leases
 * (embedded stores cannot safely serve concurrent connections); `QueuePool` keeps `size`
 * connections plus up to `maxOverflow` temporary ones, with acquire timeout, recycling and
 * optional pre-ping.
 */

import type { Driver, DriverConnection } from "./drivers";
import { asConnectionError, ConnectionError, errorMessage } from "./errors";
import type { Logger } from "./logger";
import type { PoolKind, PoolStatus } from "./types";

export interface PooledConnection {
  readonly connection: DriverConnection;
  /**
   * Returns the connection to the pool. `invalidate` closes it instead, for connections
   * that failed mid-use. Calling release more than once is a no-op.
   */
  release(options?: { invalidate?: boolean }): void;
}

export interface ConnectionPool {
  readonly kind: PoolKind;
  acquire(): Promise<PooledConnection>;
  status(): PoolStatus;
  dispose(): Promise<void>;
}

interface Waiter {
  resolve(lease: PooledConnection): void;
  reject(error: Error): void;
  deadline: number;
  timer: NodeJS.Timeout | null;
}

/** FIFO of callers blocked on a full pool. */
class WaitQueue {
  private waiters: Waiter[] = [];

  constructor(private readonly timeoutError: () => ConnectionError) {}

  get length(): number {
    return this.waiters.length;
  }

  enqueue(timeoutMs: number): Promise<PooledConnection> {
    return new Promise<PooledConnection>((resolve, reject) => {
      this.schedule({ resolve, reject, deadline: Date.now() + timeoutMs, timer: null }, false);
    });
  }

  /** Puts a waiter back at the head of the queue, keeping its original deadline. */
  requeue(waiter: Waiter): void {
    this.schedule(waiter, true);
  }

  private schedule(waiter: Waiter, front: boolean): void {
    waiter.timer = setTimeout(() => {
      this.waiters = this.waiters.filter((w) => w !== waiter);
      waiter.reject(this.timeoutError());
    }, Math.max(0, waiter.deadline - Date.now()));
    if (front) this.waiters.unshift(waiter);
    else this.waiters.push(waiter);
  }

  shift(): Waiter | undefined {
    const waiter = this.waiters.shift();
    if (waiter?.timer) clearTimeout(waiter.timer);
    return waiter;
  }

  rejectAll(error: Error): void {
    for (let waiter = this.shift(); waiter; waiter = this.shift()) {
      waiter.reject(error);
    }
  }
}

export interface PoolOptions {
  timeoutMs: number;
  logger: Logger;
  /** Called whenever a new physical connection has been opened. */
  onConnect?: () => void;
}

/**
 * One shared connection for the whole process. Leases are handed out one at a time in
 * request order, so two transactions never interleave on the same connection.
 */
export class StaticPool implements ConnectionPool {
  readonly kind = "static" as const;
  private connection: DriverConnection | null = null;
  private leased = false;
  private closed = false;
  private invalidated = 0;
  private readonly waiters: WaitQueue;

  constructor(
    private readonly driver: Driver,
    private readonly options: PoolOptions,
  ) {
    this.waiters = new WaitQueue(
      () => new ConnectionError("pool-exhausted", `Timed out after ${options.timeoutMs}ms waiting for the shared connection`),
    );
  }

  private async ensureConnection(): Promise<DriverConnection> {
    if (this.connection && this.connection.isAlive()) return this.connection;
    try {
      this.connection = await this.driver.connect();
    } catch (error) {
      throw asConnectionError(error);
    }
    this.options.onConnect?.();
    return this.connection;
  }

  async acquire(): Promise<PooledConnection> {
    if (this.closed) throw new ConnectionError("closed", "Pool has been disposed");
    if (this.leased || this.waiters.length > 0) {
      return this.waiters.enqueue(this.options.timeoutMs);
    }
    this.leased = true;
    try {
      return this.lease(await this.ensureConnection());
    } catch (error) {
      this.leased = false;
      throw error;
    }
  }

  private lease(connection: DriverConnection): PooledConnection {
    let released = false;
    return {
      connection,
      release: (options = {}) => {
        if (released) return;
        released = true;
        this.release(connection, options.invalidate === true);
      },
    };
  }

  private release(connection: DriverConnection, invalidate: boolean): void {
    if (invalidate || this.closed || !connection.isAlive()) {
      this.invalidated++;
      this.connection = null;
      void connection.close().catch((error: unknown) => this.options.logger.logWarn(`Failed to close connection: ${errorMessage(error)}`));
    }
    this.serveNext();
  }

  /** Hands the shared connection to the next waiter. A failed reconnect moves on to the one after. */
  private serveNext(): void {
    const waiter = this.waiters.shift();
    if (!waiter || this.closed) {
      this.leased = false;
      return;
    }
    void this.ensureConnection().then(
      (next) => waiter.resolve(this.lease(next)),
      (error: unknown) => {
        waiter.reject(asConnectionError(error));
        this.serveNext();
      },
    );
  }

  status(): PoolStatus {
    return {
      kind: this.kind,
      size: 1,
      maxOverflow: 0,
      checkedIn: this.connection && !this.leased ? 1 : 0,
      checkedOut: this.leased ? 1 : 0,
      overflow: 0,
      invalidated: this.invalidated,
      waiting: this.waiters.length,
    };
  }

  async dispose(): Promise<void> {
    this.closed = true;
    this.waiters.rejectAll(new ConnectionError("closed", "Pool has been disposed"));
    const connection = this.connection;
    this.connection = null;
    if (connection) await connection.close();
  }
}

export interface QueuePoolOptions extends PoolOptions {
  size: number;
  maxOverflow: number;
  /** Connections older than this are replaced before use. 0 disables recycling. */
  recycleMs: number;
  prePing: boolean;
}

interface Entry {
  connection: DriverConnection;
  createdAt: number;
}

/**
 * Bounded pool for client-server backends. At most `size + maxOverflow` connections are open;
 * connections beyond `size` are closed as soon as they are released.
 */
export class QueuePool implements ConnectionPool {
  readonly kind = "queue" as const;
  private idle: Entry[] = [];
  private leased = 0;
  private opening = 0;
  private invalidated = 0;
  private closed = false;
  private readonly waiters: WaitQueue;

  constructor(
    private readonly driver: Driver,
    private readonly options: QueuePoolOptions,
  ) {
    this.waiters = new WaitQueue(
      () =>
        new ConnectionError(
          "pool-exhausted",
          `Timed out after ${options.timeoutMs}ms waiting for a connection (size=${options.size}, overflow=${options.maxOverflow})`,
        ),
    );
  }

  private get capacity(): number {
    return this.options.size + this.options.maxOverflow;
  }

  private get open(): number {
    return this.idle.length + this.leased + this.opening;
  }

  async acquire(): Promise<PooledConnection> {
    if (this.closed) throw new ConnectionError("closed", "Pool has been disposed");
    if (this.waiters.length === 0) {
      const lease = await this.tryTake();
      if (lease) return lease;
      if (this.closed) throw new ConnectionError("closed", "Pool has been disposed");
    }
    return this.waiters.enqueue(this.options.timeoutMs);
  }

  /** Takes an idle connection or opens a new one; null when the pool is at capacity. */
  private async tryTake(): Promise<PooledConnection | null> {
    for (let entry = this.idle.pop(); entry; entry = this.idle.pop()) {
      this.leased++;
      if (await this.isUsable(entry)) return this.lease(entry);
      this.leased--;
      this.discard(entry);
    }

    if (this.open >= this.capacity) return null;

    this.opening++;
    let connection: DriverConnection;
    try {
      connection = await this.driver.connect();
    } catch (error) {
      this.opening--;
      this.pump();
      throw asConnectionError(error);
    }
    this.opening--;
    this.leased++;
    this.options.onConnect?.();
    return this.lease({ connection, createdAt: Date.now() });
  }

  private isExpired(entry: Entry): boolean {
    return this.options.recycleMs > 0 && Date.now() - entry.createdAt >= this.options.recycleMs;
  }

  private async isUsable(entry: Entry): Promise<boolean> {
    if (!entry.connection.isAlive() || this.isExpired(entry)) return false;
    if (!this.options.prePing) return true;
    try {
      await entry.connection.ping();
      return true;
    } catch (error) {
      this.options.logger.logWarn(`Pre-ping failed, replacing connection: ${errorMessage(error)}`);
      return false;
    }
  }

  private lease(entry: Entry): PooledConnection {
    let released = false;
    return {
      connection: entry.connection,
      release: (options = {}) => {
        if (released) return;
        released = true;
        this.release(entry, options.invalidate === true);
      },
    };
  }

  private release(entry: Entry, invalidate: boolean): void {
    this.leased--;

    if (this.closed || invalidate || !entry.connection.isAlive() || this.isExpired(entry)) {
      this.discard(entry);
      this.pump();
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      this.leased++;
      waiter.resolve(this.lease(entry));
      return;
    }

    if (this.open >= this.options.size) {
      // Overflow connection: not kept once demand drops.
      this.close(entry);
      return;
    }
    this.idle.push(entry);
  }

  /** Serves the first waiter when a slot has been freed. */
  private pump(): void {
    if (this.closed || this.waiters.length === 0 || this.open >= this.capacity) return;
    const waiter = this.waiters.shift();
    if (!waiter) return;
    void this.tryTake().then(
      (lease) => (lease ? waiter.resolve(lease) : this.waiters.requeue(waiter)),
      (error: unknown) => waiter.reject(asConnectionError(error)),
    );
  }

  private discard(entry: Entry): void {
    this.invalidated++;
    this.close(entry);
  }

  private close(entry: Entry): void {
    void entry.connection
      .close()
      .catch((error: unknown) => this.options.logger.logWarn(`Failed to close connection: ${errorMessage(error)}`));
  }

  status(): PoolStatus {
    return {
      kind: this.kind,
      size: this.options.size,
      maxOverflow: this.options.maxOverflow,
      checkedIn: this.idle.length,
      checkedOut: this.leased,
      overflow: Math.max(0, this.open - this.options.size),
      invalidated: this.invalidated,
      waiting: this.waiters.length,
    };
  }

  async dispose(): Promise<void> {
    this.closed = true;
    this.waiters.rejectAll(new ConnectionError("closed", "Pool has been disposed"));
    const idle = this.idle;
    this.idle = [];
    await Promise.all(idle.map((entry) => entry.connection.close().catch(() => undefined)));
  }
}
