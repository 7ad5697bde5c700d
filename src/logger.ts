/**
 * @file logger.ts
 * @description A level-filtered logger that writes to the console and optionally to rotating log files.
 */

import * as fs from "fs/promises";
import { DataKeepError } from "./errors";
import { LogLevel, type LoggerConfig, type PoolStatus } from "./types";

/**
 * Logger contract used by every component. Implementations must not throw.
 */
export interface Logger {
  logQuery(query: string, params: readonly unknown[], executionTime?: number): void;
  logError(error: Error, context?: string): void;
  logMetrics(metrics: PoolStatus): void;
  logInfo(message: string): void;
  logWarn(message: string): void;
  logDebug(message: string): void;
}

export function parseLogLevel(value: string): LogLevel {
  switch (value.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "warn": return LogLevel.Warn;
    case "error": return LogLevel.Error;
    default: return LogLevel.Info;
  }
}

/**
 * Writes to the console and, when `filePath` is set, appends to a file that is rotated
 * once it exceeds `maxFileSize` (keeping `maxFiles` old copies).
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly filePath: string | null;
  private readonly maxFileSize: number;
  private readonly maxFiles: number;
  private writes: Promise<void> = Promise.resolve();

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? LogLevel.Info;
    this.filePath = config.filePath || null;
    this.maxFileSize = config.maxFileSize || 1 * 1024 * 1024; // 1MB
    this.maxFiles = config.maxFiles || 3;
  }

  private shouldLog(messageLevel: LogLevel): boolean {
    return messageLevel >= this.level;
  }

  private async rotateLogFile(filePath: string): Promise<void> {
    const stats = await fs.stat(filePath).catch(() => null);
    if (!stats || stats.size < this.maxFileSize) {
      return;
    }

    await fs.rm(`${filePath}.${this.maxFiles}`, { force: true });
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const source = `${filePath}.${i}`;
      if (await fs.stat(source).catch(() => null)) {
        await fs.rename(source, `${filePath}.${i + 1}`);
      }
    }
    await fs.rename(filePath, `${filePath}.1`);
  }

  private async appendToFile(filePath: string, logEntry: string): Promise<void> {
    try {
      await this.rotateLogFile(filePath);
      await fs.appendFile(filePath, logEntry + "\n");
    } catch (error) {
      const logError = new DataKeepError("Failed to write to log file", "LOG_WRITE_ERROR", error);
      console.error(`[LOGGER_ERROR] ${logError.message}: ${String(error)}`);
    }
  }

  private log(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return;

    const levelStr = LogLevel[level].toUpperCase();
    const logEntry = `[${levelStr}] ${new Date().toISOString()} - ${message}`;

    switch (level) {
      case LogLevel.Error: console.error(logEntry); break;
      case LogLevel.Warn: console.warn(logEntry); break;
      default: console.log(logEntry); break;
    }

    const filePath = this.filePath;
    if (filePath) {
      // File writes are chained so entries land in order and rotation never races itself.
      this.writes = this.writes.then(() => this.appendToFile(filePath, logEntry));
    }
  }

  /** Resolves once every queued file write has completed. */
  flush(): Promise<void> {
    return this.writes;
  }

  public logQuery(query: string, params: readonly unknown[], executionTime?: number): void {
    const time = executionTime !== undefined ? `${executionTime.toFixed(2)}ms` : "N/A";
    this.log(LogLevel.Debug, `Query: ${query} | Params: ${safeStringify(params)} | Time: ${time}`);
  }

  public logError(error: Error, context?: string): void {
    const prefix = context ? `${context}: ` : "";
    this.log(LogLevel.Error, `${prefix}${error.name}: ${error.message}`);
  }

  public logMetrics(metrics: PoolStatus): void {
    const message =
      `Pool Metrics (${metrics.kind}): CheckedOut=${metrics.checkedOut}, CheckedIn=${metrics.checkedIn}, ` +
      `Overflow=${metrics.overflow}, Waiting=${metrics.waiting}, Invalidated=${metrics.invalidated}`;
    this.log(LogLevel.Info, message);
  }

  public logInfo(message: string): void {
    this.log(LogLevel.Info, message);
  }

  public logWarn(message: string): void {
    this.log(LogLevel.Warn, message);
  }

  public logDebug(message: string): void {
    this.log(LogLevel.Debug, message);
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v));
  } catch {
    return "[unserializable]";
  }
}

/**
 * Masks the credentials of a connection URL so it can be logged.
 * @example maskUrl("postgres://app:secret@db:5432/app") // "postgres://***:***@db:5432/app"
 */
export function maskUrl(url: string): string {
  const schemeEnd = url.indexOf("://");
  if (schemeEnd === -1) return url;
  const rest = url.slice(schemeEnd + 3);
  const at = rest.lastIndexOf("@");
  if (at === -1) return url;
  return `${url.slice(0, schemeEnd)}://***:***@${rest.slice(at + 1)}`;
}
