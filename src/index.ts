import { err, ok, type Result } from "neverthrow";
import { BackupManager, type BackupFile, type LogicalBackup, formatBackupStamp } from "./backup";
import { CacheManager, type CacheManagerOptions, RedisRemoteStore, type RemoteEntry, type RemoteStore } from "./cache";
import { DEFAULT_DATABASE_URL, loadConfig, parseDatabaseUrl, type ParsedDatabaseUrl } from "./config";
import { ConnectionManager, type ConnectionManagerOptions, type Ready } from "./connection-manager";
import {
  DataService,
  type DataLayerHealth,
  type DataServiceDeps,
  type FindManyOptions,
  type RecordId,
} from "./data-service";
import { createDriver, type Driver, type DriverConnection, type StatementResult } from "./drivers";
import {
  CacheError,
  type CacheErrorKind,
  ConnectionError,
  type ConnectionErrorKind,
  DataKeepError,
  MigrationError,
  type MigrationErrorKind,
  QueryError,
  type QueryErrorKind,
} from "./errors";
import { HealthMonitor, type HealthMonitorOptions, type SlowQueryEvent } from "./health";
import { LocalCache } from "./local-cache";
import { ConsoleLogger, type Logger, maskUrl, parseLogLevel } from "./logger";
import {
  generateMigration,
  type GeneratedMigration,
  type GenerateOptions,
  MigrationManager,
  type MigrationManagerOptions,
  orderChain,
  type RevisionFile,
  VERSION_TABLE,
} from "./migrations";
import {
  type ColumnConfig,
  defineModel,
  type ForeignKeyConfig,
  MetadataStorage,
  type ModelConfig,
  ModelDefinition,
  type TimestampsConfig,
} from "./model";
import { type ConnectionPool, type PooledConnection, QueuePool, StaticPool } from "./pool";
import { type ConnectionObserver, Session } from "./session";
import {
  type AppConfig,
  type BackupArtifact,
  type BackupReason,
  type CacheConfig,
  type CacheStats,
  type ConnectionConfig,
  DataTypes,
  DBType,
  type HealthReport,
  type HealthSnapshot,
  type HealthStatus,
  type LoggerConfig,
  LogLevel,
  type MigrationRecord,
  type MigrationState,
  type PoolKind,
  type PoolStatus,
  type RevisionId,
  type Row,
  type SchemaStatus,
  type SqlValue,
} from "./types";

export interface DataLayerOptions {
  logger?: Logger;
  /** Replaces the driver picked from the connection URL. */
  driver?: Driver;
  /** Replaces the Redis store; null forces a local-only cache. */
  remote?: RemoteStore | null;
  /** Starts periodic health probes. Defaults to true. */
  healthChecks?: boolean;
}

/**
 * Every component of the data layer, built once and wired together.
 */
export class DataLayer {
  readonly logger: Logger;
  readonly connections: ConnectionManager;
  readonly health: HealthMonitor;
  readonly cache: CacheManager;
  readonly data: DataService;
  readonly backups: BackupManager;
  readonly migrations: MigrationManager;

  constructor(
    readonly config: AppConfig,
    options: DataLayerOptions = {},
  ) {
    this.logger = options.logger ?? new ConsoleLogger(config.logger);
    this.connections = new ConnectionManager(config.connection, { logger: this.logger, driver: options.driver });
    this.health = new HealthMonitor(this.connections, {
      slowQueryThresholdMs: config.connection.slowQueryThresholdMs,
      logger: this.logger,
    });
    this.cache = new CacheManager(config.cache, { logger: this.logger, remote: options.remote });
    this.data = new DataService({
      connections: this.connections,
      health: this.health,
      cache: this.cache,
      logger: this.logger,
    });
    this.backups = new BackupManager(this.connections, config.connection.backupsDir, this.logger);
    this.migrations = new MigrationManager(this.connections, {
      migrationsDir: config.connection.migrationsDir,
      backupBeforeMigrate: config.connection.backupBeforeMigrate,
      backups: this.backups,
      logger: this.logger,
    });
  }

  async close(): Promise<void> {
    await this.data.close();
  }
}

/**
 * Builds the data layer, connects, and runs `init` + `upgrade head` when auto-migrate is on.
 * Nothing is left open when it fails.
 */
export async function createDataLayer(
  config: AppConfig,
  options: DataLayerOptions = {},
): Promise<Result<DataLayer, ConnectionError | MigrationError>> {
  const layer = new DataLayer(config, options);

  const ready = await layer.connections.initialize();
  if (ready.isErr()) {
    await layer.cache.disconnect();
    return err(ready.error);
  }

  if (config.connection.autoMigrate) {
    const initialized = await layer.migrations.init();
    const migrated = initialized.isErr() ? initialized : await layer.migrations.upgrade("head");
    if (migrated.isErr()) {
      layer.logger.logError(migrated.error, "Automatic migration failed");
      await layer.close();
      return err(migrated.error);
    }
  }

  if (options.healthChecks ?? true) {
    layer.health.start(config.connection.healthCheckIntervalMs);
  }
  return ok(layer);
}

export * as schema from "./schema";

export {
  // Types
  DBType,
  DataTypes,
  LogLevel,
  // Errors
  DataKeepError,
  ConnectionError,
  QueryError,
  CacheError,
  MigrationError,
  // Config
  DEFAULT_DATABASE_URL,
  loadConfig,
  parseDatabaseUrl,
  // Connections
  ConnectionManager,
  StaticPool,
  QueuePool,
  Session,
  createDriver,
  HealthMonitor,
  // Cache
  CacheManager,
  LocalCache,
  RedisRemoteStore,
  // Data access
  DataService,
  ModelDefinition,
  MetadataStorage,
  defineModel,
  // Migrations
  MigrationManager,
  BackupManager,
  generateMigration,
  orderChain,
  formatBackupStamp,
  VERSION_TABLE,
  // Logging
  ConsoleLogger,
  maskUrl,
  parseLogLevel,
};

export type {
  AppConfig,
  BackupArtifact,
  BackupFile,
  BackupReason,
  CacheConfig,
  CacheErrorKind,
  CacheManagerOptions,
  CacheStats,
  ColumnConfig,
  ConnectionConfig,
  ConnectionErrorKind,
  ConnectionManagerOptions,
  ConnectionObserver,
  ConnectionPool,
  DataLayerHealth,
  DataServiceDeps,
  Driver,
  DriverConnection,
  FindManyOptions,
  ForeignKeyConfig,
  GeneratedMigration,
  GenerateOptions,
  HealthMonitorOptions,
  HealthReport,
  HealthSnapshot,
  HealthStatus,
  LogicalBackup,
  Logger,
  LoggerConfig,
  MigrationErrorKind,
  MigrationManagerOptions,
  MigrationRecord,
  MigrationState,
  ModelConfig,
  ParsedDatabaseUrl,
  PoolKind,
  PooledConnection,
  PoolStatus,
  QueryErrorKind,
  Ready,
  RecordId,
  RemoteEntry,
  RemoteStore,
  RevisionFile,
  RevisionId,
  Row,
  SchemaStatus,
  SlowQueryEvent,
  SqlValue,
  TimestampsConfig,
};
