import Database from "better-sqlite3";
import type { FieldValue } from "@/sync/types";
import type { ColumnKind } from "@/sync/schema/mapper";
import { SyncError, TransientRemoteError } from "@/sync/errors";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TRANSIENT_CODES = new Set(["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_BUSY_SNAPSHOT"]);

export function quoteIdent(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Invalid SQL identifier: ${JSON.stringify(name)}`);
  }
  return `"${name}"`;
}

export function decodeValue(kind: ColumnKind, raw: unknown): FieldValue {
  if (raw === null || raw === undefined) return null;
  if (kind === "boolean" && typeof raw === "number") return raw !== 0;
  if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") return raw;
  if (typeof raw === "bigint") return Number(raw);
  return String(raw);
}

/** better-sqlite3 refuses to bind booleans. */
export function encodeValue(value: FieldValue): string | number | null {
  if (typeof value === "boolean") return value ? 1 : 0;
  return value;
}

export function asRow(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  return Object.fromEntries(Object.entries(value));
}

/** Map driver errors onto the sync taxonomy; busy/locked databases are retryable. */
export function wrapSqliteError(error: unknown, what: string): Error {
  if (error instanceof SyncError) return error;
  if (error instanceof Database.SqliteError && TRANSIENT_CODES.has(error.code)) {
    return new TransientRemoteError(`${what}: ${error.message}`, { cause: error });
  }
  return error instanceof Error ? error : new Error(String(error));
}
