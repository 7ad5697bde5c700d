/**
 * @file errors.ts
 * @description Error taxonomy. Callers branch on `kind`, never on message text.
 */

import { err, type Err } from "neverthrow";

export class DataKeepError extends Error {
  constructor(
    message: string,
    public code: string,
    public originalError?: unknown,
  ) {
    super(message, originalError === undefined ? undefined : { cause: originalError });
    this.name = "DataKeepError";
  }
}

export type ConnectionErrorKind = "unreachable" | "auth" | "pool-exhausted" | "not-initialized" | "closed";

export class ConnectionError extends DataKeepError {
  constructor(
    public readonly kind: ConnectionErrorKind,
    message: string,
    originalError?: unknown,
  ) {
    super(message, "CONNECTION_ERROR", originalError);
    this.name = "ConnectionError";
  }
}

export type QueryErrorKind = "invalid" | "constraint" | "unknown-column";

export class QueryError extends DataKeepError {
  constructor(
    public readonly kind: QueryErrorKind,
    message: string,
    public readonly sql?: string,
    originalError?: unknown,
  ) {
    super(message, "QUERY_ERROR", originalError);
    this.name = "QueryError";
  }
}

export type CacheErrorKind = "timeout" | "unavailable" | "serialization";

/** Raised only inside the cache; CacheManager always recovers from it. */
export class CacheError extends DataKeepError {
  constructor(
    public readonly kind: CacheErrorKind,
    message: string,
    originalError?: unknown,
  ) {
    super(message, "CACHE_ERROR", originalError);
    this.name = "CacheError";
  }
}

export type MigrationErrorKind =
  | "backup-failed"
  | "apply-failed"
  | "verification-mismatch"
  | "not-initialized"
  | "unknown-revision"
  | "invalid-target"
  | "broken-chain"
  | "generate-failed"
  | "busy"
  | "aborted"
  | "restore-failed";

export class MigrationError extends DataKeepError {
  constructor(
    public readonly kind: MigrationErrorKind,
    message: string,
    public readonly details: { backupPath?: string; appliedRevisions?: string[] } = {},
    originalError?: unknown,
  ) {
    super(message, "MIGRATION_ERROR", originalError);
    this.name = "MigrationError";
  }
}

export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(typeof error === "string" ? error : JSON.stringify(error));
}

export function errorMessage(error: unknown): string {
  return toError(error).message;
}

export function migrationErr(
  kind: MigrationErrorKind,
  message: string,
  details: { backupPath?: string; appliedRevisions?: string[] } = {},
  originalError?: unknown,
): Err<never, MigrationError> {
  return err(new MigrationError(kind, message, details, originalError));
}

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "EPIPE",
  "PROTOCOL_CONNECTION_LOST",
  "SQLITE_CANTOPEN",
]);

const AUTH_CODES = new Set(["28P01", "28000", "ER_ACCESS_DENIED_ERROR", "ER_DBACCESS_DENIED_ERROR", "SQLITE_AUTH"]);

function readCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const code = error.code;
    if (typeof code === "string") return code;
  }
  return undefined;
}

/**
 * Maps a raw driver error onto the taxonomy. Network, auth and lost-connection failures
 * become `ConnectionError`, everything else is a `QueryError`.
 */
export function classifyDriverError(error: unknown, sql?: string): ConnectionError | QueryError {
  if (error instanceof ConnectionError || error instanceof QueryError) return error;
  const code = readCode(error);
  const message = errorMessage(error);

  if (code && AUTH_CODES.has(code)) {
    return new ConnectionError("auth", `Authentication failed: ${message}`, error);
  }
  // PostgreSQL class 08 is "connection exception", 57P01-03 is admin shutdown.
  if (code && (CONNECTION_CODES.has(code) || code.startsWith("08") || /^57P0[123]$/.test(code))) {
    return new ConnectionError("unreachable", `Connection failed: ${message}`, error);
  }
  if (
    code &&
    (code.startsWith("23") || code.startsWith("SQLITE_CONSTRAINT") || code === "ER_DUP_ENTRY" || code === "ER_NO_REFERENCED_ROW_2")
  ) {
    return new QueryError("constraint", message, sql, error);
  }
  return new QueryError("invalid", message, sql, error);
}

/** Like `classifyDriverError`, but for failures that happened while opening or leasing a connection. */
export function asConnectionError(error: unknown): ConnectionError {
  const classified = classifyDriverError(error);
  if (classified instanceof ConnectionError) return classified;
  return new ConnectionError("unreachable", `Could not open connection: ${classified.message}`, error);
}
