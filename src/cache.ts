/**
 * @file cache.ts
 * @description Two-tier read cache. Redis is the shared tier; an in-process LRU serves reads while
 * Redis is unreachable. Cache failures are logged and never raised to callers.
 */

import Redis from "ioredis";
import { err, ok, type Result } from "neverthrow";
import { CacheError, errorMessage } from "./errors";
import { ConsoleLogger, type Logger, maskUrl } from "./logger";
import { LocalCache } from "./local-cache";
import type { CacheConfig, CacheStats } from "./types";

/** A remote payload with its remaining lifetime; `ttlMs` is null for keys without expiry. */
export interface RemoteEntry {
  payload: string;
  ttlMs: number | null;
}

/**
 * The operations the cache needs from its shared tier. Payloads are JSON strings.
 */
export interface RemoteStore {
  get(key: string): Promise<RemoteEntry | null>;
  set(key: string, payload: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<number>;
  deletePrefix(prefix: string): Promise<number>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, "\\$&");
}

export class RedisRemoteStore implements RemoteStore {
  private readonly redis: Redis;

  constructor(url: string, timeoutMs: number, logger: Logger) {
    this.redis = new Redis(url, {
      lazyConnect: true,
      enableOfflineQueue: false,
      connectTimeout: timeoutMs,
      commandTimeout: timeoutMs,
      maxRetriesPerRequest: 0,
      // Reconnection happens on demand from `ping`.
      retryStrategy: () => null,
    });
    this.redis.on("error", (error: Error) => logger.logDebug(`Redis client error (${maskUrl(url)}): ${error.message}`));
  }

  private async ensureConnected(): Promise<void> {
    if (this.redis.status === "wait" || this.redis.status === "end") {
      await this.redis.connect();
    }
  }

  async get(key: string): Promise<RemoteEntry | null> {
    const replies = await this.redis.multi().get(key).pttl(key).exec();
    const payload = replies?.[0]?.[1];
    const ttlMs = replies?.[1]?.[1];
    if (typeof payload !== "string") return null;
    return { payload, ttlMs: typeof ttlMs === "number" && ttlMs > 0 ? ttlMs : null };
  }

  async set(key: string, payload: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, payload, "EX", Math.max(1, Math.ceil(ttlSeconds)));
  }

  async del(key: string): Promise<number> {
    return this.redis.del(key);
  }

  async deletePrefix(prefix: string): Promise<number> {
    let cursor = "0";
    let removed = 0;
    do {
      const [next, keys] = await this.redis.scan(cursor, "MATCH", `${escapeGlob(prefix)}*`, "COUNT", 100);
      cursor = next;
      if (keys.length > 0) removed += await this.redis.del(...keys);
    } while (cursor !== "0");
    return removed;
  }

  async ping(): Promise<void> {
    await this.ensureConnected();
    await this.redis.ping();
  }

  async close(): Promise<void> {
    if (this.redis.status === "ready") {
      await this.redis.quit();
    } else {
      this.redis.disconnect();
    }
  }
}

export interface CacheManagerOptions {
  logger?: Logger;
  /** Overrides the Redis store built from `config.redisUrl`; null forces local-only mode. */
  remote?: RemoteStore | null;
  now?: () => number;
}

type RemoteState = "unknown" | "up" | "down";

/** While the remote tier is down, it is re-probed at most this often. */
const REPROBE_INTERVAL_MS = 5000;

export class CacheManager {
  private readonly remote: RemoteStore | null;
  private readonly local: LocalCache;
  private readonly logger: Logger;
  private readonly now: () => number;
  private remoteState: RemoteState = "unknown";
  private lastProbeAt = Number.NEGATIVE_INFINITY;
  private hits = 0;
  private misses = 0;
  private remoteFailures = 0;
  // Invalidations the remote tier missed while down, replayed once it answers PING again.
  private pendingKeys = new Set<string>();
  private pendingPrefixes = new Set<string>();

  constructor(
    public readonly config: CacheConfig,
    options: CacheManagerOptions = {},
  ) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.now = options.now ?? Date.now;
    this.local = new LocalCache(config.localMaxEntries, this.now);
    if (options.remote !== undefined) {
      this.remote = options.remote;
    } else {
      this.remote = config.redisUrl ? new RedisRemoteStore(config.redisUrl, config.remoteTimeoutMs, this.logger) : null;
    }
    if (!this.remote) this.logger.logInfo("Cache running in local-only mode");
  }

  private key(key: string): string {
    return this.config.keyPrefix + key;
  }

  private async withTimeout<T>(operation: Promise<T>, name: string): Promise<Result<T, CacheError>> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(
        () => reject(new CacheError("timeout", `Remote cache ${name} timed out after ${this.config.remoteTimeoutMs}ms`)),
        this.config.remoteTimeoutMs,
      );
    });
    try {
      return ok(await Promise.race([operation, timeout]));
    } catch (error) {
      if (error instanceof CacheError) return err(error);
      return err(new CacheError("unavailable", `Remote cache ${name} failed: ${errorMessage(error)}`, error));
    } finally {
      clearTimeout(timer);
    }
  }

  private degrade(error: CacheError): void {
    this.remoteFailures++;
    if (this.remoteState !== "down") {
      this.logger.logWarn(`Remote cache unavailable, serving from local tier: ${error.message}`);
    }
    this.remoteState = "down";
    this.lastProbeAt = this.now();
  }

  /**
   * Runs `operation` against the remote tier. Fails without touching the network when there is no
   * remote tier, or when it is down and was probed recently.
   */
  private async useRemote<T>(name: string, operation: (remote: RemoteStore) => Promise<T>): Promise<Result<T, CacheError>> {
    const remote = this.remote;
    if (!remote) return err(new CacheError("unavailable", "No remote cache configured"));

    if (this.remoteState !== "up") {
      if (this.now() - this.lastProbeAt < REPROBE_INTERVAL_MS) {
        return err(new CacheError("unavailable", "Remote cache is marked unhealthy"));
      }
      this.lastProbeAt = this.now();
      const probe = await this.withTimeout(remote.ping(), "ping");
      if (probe.isErr()) {
        this.degrade(probe.error);
        return err(probe.error);
      }
      const replayed = await this.replayInvalidations(remote);
      if (replayed.isErr()) {
        this.degrade(replayed.error);
        return err(replayed.error);
      }
      if (this.remoteState === "down") this.logger.logInfo("Remote cache reachable again");
      this.remoteState = "up";
    }

    const result = await this.withTimeout(operation(remote), name);
    if (result.isErr()) this.degrade(result.error);
    return result;
  }

  private async replayInvalidations(remote: RemoteStore): Promise<Result<void, CacheError>> {
    const total = this.pendingPrefixes.size + this.pendingKeys.size;
    for (const prefix of [...this.pendingPrefixes]) {
      const result = await this.withTimeout(remote.deletePrefix(prefix), "invalidatePrefix");
      if (result.isErr()) return err(result.error);
      this.pendingPrefixes.delete(prefix);
    }
    for (const key of [...this.pendingKeys]) {
      const result = await this.withTimeout(remote.del(key), "del");
      if (result.isErr()) return err(result.error);
      this.pendingKeys.delete(key);
    }
    if (total > 0) this.logger.logInfo(`Replayed ${total} cache invalidations on the remote tier`);
    return ok(undefined);
  }

  /** Remembers a key whose remote copy may now be stale. */
  private remoteMissed(fullKey: string): void {
    if (this.remote) this.pendingKeys.add(fullKey);
  }

  /**
   * Reads a value. The remote tier's answer wins when it is reachable, including a miss.
   * @example
   * ```
   * const user = await cache.get<User>('users:1');
   * ```
   */
  async get<T>(key: string): Promise<T | null> {
    const fullKey = this.key(key);
    const remote = await this.useRemote("get", (store) => store.get(fullKey));

    let payload: string | null;
    if (remote.isOk()) {
      const entry = remote.value;
      payload = entry ? entry.payload : null;
      // The local copy never outlives the remote one.
      if (entry) this.local.set(fullKey, entry.payload, entry.ttlMs === null ? this.config.ttlSeconds : entry.ttlMs / 1000);
      else this.local.delete(fullKey);
    } else {
      payload = this.local.get(fullKey);
    }

    if (payload === null) {
      this.misses++;
      this.logger.logDebug(`Cache miss for key: ${key}`);
      return null;
    }

    try {
      const value = JSON.parse(payload) as T;
      this.hits++;
      this.logger.logDebug(`Cache hit for key: ${key}`);
      return value;
    } catch (error) {
      const cacheError = new CacheError("serialization", `Discarding unreadable cache entry ${key}`, error);
      this.logger.logWarn(cacheError.message);
      this.local.delete(fullKey);
      this.misses++;
      return null;
    }
  }

  /**
   * Stores a value in both tiers, or only locally while the remote tier is down.
   * @returns false when the value cannot be serialized to JSON (nothing is cached).
   */
  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<boolean> {
    let payload: string | undefined;
    try {
      payload = JSON.stringify(value);
    } catch (error) {
      this.logger.logWarn(new CacheError("serialization", `Value for ${key} is not serializable: ${errorMessage(error)}`).message);
      return false;
    }
    if (payload === undefined) {
      this.logger.logWarn(new CacheError("serialization", `Value for ${key} is not serializable`).message);
      return false;
    }

    const fullKey = this.key(key);
    const ttl = ttlSeconds ?? this.config.ttlSeconds;
    const serialized = payload;
    this.local.set(fullKey, serialized, ttl);
    const remote = await this.useRemote("set", (store) => store.set(fullKey, serialized, ttl));
    if (remote.isErr()) this.remoteMissed(fullKey);
    this.logger.logDebug(`Cache set for key: ${key}`);
    return true;
  }

  /** Removes a key from both tiers. */
  async delete(key: string): Promise<boolean> {
    const fullKey = this.key(key);
    const removedLocally = this.local.delete(fullKey);
    const remote = await this.useRemote("del", (store) => store.del(fullKey));
    if (remote.isErr()) this.remoteMissed(fullKey);
    return removedLocally || (remote.isOk() && remote.value > 0);
  }

  /**
   * Removes every key starting with `prefix` from both tiers.
   * @example
   * ```
   * await cache.invalidatePrefix('users:'); // every cached user read
   * ```
   */
  async invalidatePrefix(prefix: string): Promise<number> {
    const fullPrefix = this.key(prefix);
    const removedLocally = this.local.deletePrefix(fullPrefix);
    const remote = await this.useRemote("invalidatePrefix", (store) => store.deletePrefix(fullPrefix));
    if (remote.isErr() && this.remote) this.pendingPrefixes.add(fullPrefix);
    const removed = remote.isOk() ? Math.max(remote.value, removedLocally) : removedLocally;
    this.logger.logDebug(`Cache invalidated for prefix: ${prefix} (${removed} keys)`);
    return removed;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      localEntries: this.local.size,
      remoteFailures: this.remoteFailures,
      mode: this.remote && this.remoteState !== "down" ? "remote" : "local-only",
    };
  }

  async disconnect(): Promise<void> {
    this.local.clear();
    if (!this.remote) return;
    try {
      await this.remote.close();
      this.logger.logInfo("Redis connection closed");
    } catch (error) {
      this.logger.logWarn(`Failed to close Redis connection: ${errorMessage(error)}`);
    }
  }
}
