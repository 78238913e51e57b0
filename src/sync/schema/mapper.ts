import type { z } from "zod";
import type { FieldRecord, FieldValue } from "@/sync/types";
import { SchemaMismatchError } from "@/sync/errors";

/** SQLite storage class of a column; booleans are stored as 0/1. */
export type ColumnKind = "text" | "integer" | "real" | "boolean";

export interface SharedField {
  local: string;
  remote: string;
  kind: ColumnKind;
  schema: z.ZodType<FieldValue>;
}

export interface LocalOnlyField {
  column: string;
  kind: ColumnKind;
}

/**
 * Static projection between the local and remote schemas. The shared list
 * is the whole contract: nothing outside it is ever sent to the remote store.
 */
export interface SchemaMap {
  local: {
    table: string;
    keyColumn: string;
    linkageColumn: string;
    lastModifiedColumn: string;
  };
  remote: {
    table: string;
    idColumn: string;
  };
  shared: readonly SharedField[];
  localOnly: readonly LocalOnlyField[];
}

export interface ProjectionDiff {
  changes: FieldRecord;
  fieldsChanged: string[];
}

export function sharedLocalColumns(map: SchemaMap): string[] {
  return map.shared.map((f) => f.local);
}

export function remoteColumns(map: SchemaMap): string[] {
  return map.shared.map((f) => f.remote);
}

/** Every content column of the local table, shared first. */
export function localColumns(map: SchemaMap): { column: string; kind: ColumnKind }[] {
  return [
    ...map.shared.map((f) => ({ column: f.local, kind: f.kind })),
    ...map.localOnly.map((f) => ({ column: f.column, kind: f.kind })),
  ];
}

/**
 * Project local fields onto the remote schema. Values are validated, never
 * coerced: a value the shared schema rejects is a SchemaMismatchError.
 */
export function projectShared(map: SchemaMap, fields: FieldRecord): FieldRecord {
  const projection: FieldRecord = {};
  for (const field of map.shared) {
    const value = field.local in fields ? fields[field.local] : null;
    const parsed = field.schema.safeParse(value);
    if (!parsed.success) {
      throw new SchemaMismatchError(field.local, firstIssue(parsed.error), { step: "project" });
    }
    projection[field.remote] = parsed.data;
  }
  return projection;
}

/**
 * Read the shared columns of a remote object. Only the storage kind is
 * checked: a NULL, or a value the local field schema would reject, is
 * simply different from the local value and gets overwritten.
 */
export function readRemoteProjection(map: SchemaMap, remote: FieldRecord): FieldRecord {
  const projection: FieldRecord = {};
  for (const field of map.shared) {
    const value = field.remote in remote ? remote[field.remote] : null;
    if (!matchesKind(field.kind, value)) {
      throw new SchemaMismatchError(field.remote, `remote value rejected: expected ${field.kind}, got ${typeof value}`, {
        step: "read",
      });
    }
    projection[field.remote] = value;
  }
  return projection;
}

function matchesKind(kind: ColumnKind, value: FieldValue): boolean {
  if (value === null) return true;
  switch (kind) {
    case "text":
      return typeof value === "string";
    case "integer":
      return Number.isInteger(value);
    case "real":
      return typeof value === "number";
    case "boolean":
      return typeof value === "boolean";
  }
}

/**
 * Columns whose local value differs from the remote one. Local always wins,
 * so the changes carry the local value.
 */
export function diffProjection(local: FieldRecord, remote: FieldRecord): ProjectionDiff {
  const changes: FieldRecord = {};
  const fieldsChanged: string[] = [];
  for (const [column, value] of Object.entries(local)) {
    const current = column in remote ? remote[column] : null;
    if (current !== value) {
      changes[column] = value;
      fieldsChanged.push(column);
    }
  }
  return { changes, fieldsChanged };
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? issue.message : "invalid value";
}
