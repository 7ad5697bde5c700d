/**
 * @file types.ts
 * @description Shared type definitions and enums for datakeep.
 */

export enum DBType {
  Postgres = "postgres",
  MySQL = "mysql",
  SQLite = "sqlite",
}

export enum LogLevel {
  Debug,
  Info,
  Warn,
  Error,
}

/**
 * Abstract column types, mapped to a dialect-specific SQL type when a migration
 * is generated from a model.
 */
export enum DataTypes {
  STRING,    // VARCHAR or TEXT
  TEXT,
  INTEGER,
  BIGINT,
  FLOAT,
  DOUBLE,
  DECIMAL,
  BOOLEAN,   // BOOLEAN or TINYINT/INTEGER
  DATE,
  DATETIME,  // TIMESTAMP, DATETIME or TEXT
  JSON,      // JSONB, JSON or TEXT
  UUID,
  BLOB,
}

/** A value that can be bound to a statement parameter. */
export type SqlValue = string | number | bigint | boolean | null | Date | Buffer;

export type Row = Record<string, unknown>;

/**
 * Immutable connection settings. Produced by `loadConfig` and read by every component.
 */
export interface ConnectionConfig {
  readonly type: DBType;
  /** The URL as configured, possibly including credentials. */
  readonly url: string;
  /** SQLite file path (or `:memory:`); null for client-server backends. */
  readonly filename: string | null;
  readonly poolSize: number;
  readonly maxOverflow: number;
  readonly poolTimeoutMs: number;
  readonly poolRecycleMs: number;
  readonly prePing: boolean;
  readonly connectTimeoutMs: number;
  readonly slowQueryThresholdMs: number;
  readonly autoMigrate: boolean;
  readonly backupBeforeMigrate: boolean;
  readonly migrationsDir: string;
  readonly backupsDir: string;
  readonly healthCheckIntervalMs: number;
}

export interface CacheConfig {
  /** Remote shared cache. Absent means the cache runs local-only. */
  readonly redisUrl?: string;
  readonly ttlSeconds: number;
  readonly localMaxEntries: number;
  readonly remoteTimeoutMs: number;
  readonly keyPrefix: string;
}

export interface LoggerConfig {
  level?: LogLevel;
  filePath?: string;
  maxFileSize?: number;
  maxFiles?: number;
}

export interface AppConfig {
  readonly connection: ConnectionConfig;
  readonly cache: CacheConfig;
  readonly logger: LoggerConfig;
}

export type PoolKind = "static" | "queue";

/** Point-in-time pool occupancy. */
export interface PoolStatus {
  kind: PoolKind;
  size: number;
  maxOverflow: number;
  checkedIn: number;
  checkedOut: number;
  /** Connections currently open beyond `size`. */
  overflow: number;
  /** Cumulative count of connections discarded (recycled, failed pre-ping, broken). */
  invalidated: number;
  /** Callers blocked in `acquire`. */
  waiting: number;
}

export type HealthStatus = "healthy" | "unhealthy" | "unknown" | "closed";

export interface HealthSnapshot {
  connectionsOpened: number;
  queriesExecuted: number;
  slowQueries: number;
  errors: number;
  lastProbeAt: Date | null;
  status: HealthStatus;
  pool: PoolStatus | null;
}

export interface HealthReport extends HealthSnapshot {
  connectionHealthy: boolean;
}

export interface CacheStats {
  hits: number;
  misses: number;
  localEntries: number;
  remoteFailures: number;
  mode: "remote" | "local-only";
}

export type RevisionId = string;

export interface MigrationRecord {
  revision: RevisionId;
  parent: RevisionId | null;
  description: string;
  createdAt: string;
  applied: boolean;
}

export type MigrationState =
  | "uninitialized"
  | "initialized"
  | "up-to-date"
  | "pending"
  | "applying"
  | "rolling-back";

export interface SchemaStatus {
  tables: string[];
  currentRevision: RevisionId | null;
  head: RevisionId | null;
  pendingCount: number;
  pending: MigrationRecord[];
  state: MigrationState;
}

export type BackupReason = "upgrade" | "downgrade" | "manual";

export interface BackupArtifact {
  path: string;
  createdAt: Date;
  /** `file` is a SQLite database copy, `logical` a JSON dump of every table. */
  kind: "file" | "logical";
  reason: BackupReason;
  revision: RevisionId | null;
  bytes: number;
}
