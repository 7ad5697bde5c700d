/**
 * @file health.ts
 * @description Connection health counters, active probes and slow-query diagnostics.
 */

import { EventEmitter } from "events";
import type { ConnectionManager } from "./connection-manager";
import { errorMessage } from "./errors";
import type { Logger } from "./logger";
import type { ConnectionObserver } from "./session";
import type { HealthReport, HealthSnapshot, HealthStatus } from "./types";

export interface SlowQueryEvent {
  sql: string;
  durationMs: number;
  thresholdMs: number;
}

export interface HealthMonitorOptions {
  slowQueryThresholdMs: number;
  logger: Logger;
  /** Attempts per active probe. */
  probeRetries?: number;
  probeBaseDelayMs?: number;
}

const SLOW_QUERY = "slowQuery";
const MAX_LOGGED_SQL = 200;

export class HealthMonitor implements ConnectionObserver {
  private connectionsOpened = 0;
  private queriesExecuted = 0;
  private slowQueries = 0;
  private errors = 0;
  private lastProbeAt: Date | null = null;
  private status: HealthStatus = "unknown";
  private timer: NodeJS.Timeout | null = null;
  private probing = false;
  private readonly emitter = new EventEmitter();

  constructor(
    private readonly manager: ConnectionManager,
    private readonly options: HealthMonitorOptions,
  ) {
    manager.addObserver(this);
  }

  recordConnectionOpened(): void {
    this.connectionsOpened++;
  }

  recordQuery(durationMs: number, sql = ""): void {
    this.queriesExecuted++;
    if (durationMs <= this.options.slowQueryThresholdMs) return;

    this.slowQueries++;
    const shown = sql.length > MAX_LOGGED_SQL ? `${sql.slice(0, MAX_LOGGED_SQL)}...` : sql;
    this.options.logger.logWarn(`Slow query (${durationMs.toFixed(2)}ms > ${this.options.slowQueryThresholdMs}ms): ${shown}`);
    const event: SlowQueryEvent = { sql, durationMs, thresholdMs: this.options.slowQueryThresholdMs };
    this.emitter.emit(SLOW_QUERY, event);
  }

  recordError(): void {
    this.errors++;
  }

  connectionOpened(): void {
    if (this.status === "closed") this.status = "unknown";
    this.recordConnectionOpened();
  }

  queryExecuted(durationMs: number, sql: string): void {
    this.recordQuery(durationMs, sql);
  }

  errorRaised(_error: Error): void {
    this.recordError();
  }

  poolDisposed(): void {
    this.status = "closed";
  }

  /**
   * Subscribes to slow-query diagnostics.
   * @returns A function that removes the listener.
   */
  onSlowQuery(listener: (event: SlowQueryEvent) => void): () => void {
    this.emitter.on(SLOW_QUERY, listener);
    return () => {
      this.emitter.off(SLOW_QUERY, listener);
    };
  }

  getSnapshot(): HealthSnapshot {
    return {
      connectionsOpened: this.connectionsOpened,
      queriesExecuted: this.queriesExecuted,
      slowQueries: this.slowQueries,
      errors: this.errors,
      lastProbeAt: this.lastProbeAt,
      status: this.status,
      pool: this.manager.poolStatus(),
    };
  }

  /**
   * Actively probes the store and merges the outcome into the snapshot.
   */
  async checkHealth(): Promise<HealthReport> {
    const connectionHealthy = await this.manager.testConnection(
      this.options.probeRetries ?? 3,
      this.options.probeBaseDelayMs ?? 1000,
    );
    this.lastProbeAt = new Date();
    // A shut-down manager stays closed until it is initialized again.
    if (this.status !== "closed" || this.manager.isInitialized) {
      this.status = connectionHealthy ? "healthy" : "unhealthy";
    }
    const report = { ...this.getSnapshot(), connectionHealthy };
    if (report.pool) this.options.logger.logMetrics(report.pool);
    return report;
  }

  /**
   * Probes every `intervalMs` until `stop()`. The timer does not keep the process alive.
   */
  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.probing) return;
      this.probing = true;
      void this.checkHealth()
        .catch((error: unknown) => this.options.logger.logWarn(`Health probe failed: ${errorMessage(error)}`))
        .finally(() => {
          this.probing = false;
        });
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
