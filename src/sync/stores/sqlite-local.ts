import type Database from "better-sqlite3";
import type { FieldRecord, LocalEntity } from "@/sync/types";
import type { LocalStore } from "./types";
import { localColumns, type ColumnKind, type SchemaMap } from "@/sync/schema/mapper";
import { LinkageConflictError, SyncError } from "@/sync/errors";
import { asRow, decodeValue, quoteIdent, wrapSqliteError } from "./sqlite-codec";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("local-store");

/** Local register kept in a SQLite file, one row per facility. */
export class SqliteLocalStore implements LocalStore {
  private readonly names: SchemaMap["local"];
  private readonly table: string;
  private readonly key: string;
  private readonly linkage: string;
  private readonly lastModified: string;
  private readonly columns: { column: string; kind: ColumnKind }[];

  constructor(
    private readonly db: Database.Database,
    map: SchemaMap,
  ) {
    this.names = map.local;
    this.table = quoteIdent(map.local.table);
    this.key = quoteIdent(map.local.keyColumn);
    this.linkage = quoteIdent(map.local.linkageColumn);
    this.lastModified = quoteIdent(map.local.lastModifiedColumn);
    this.columns = localColumns(map);
    this.columns.forEach((c) => quoteIdent(c.column));
  }

  async listChanged(since: string | null): Promise<LocalEntity[]> {
    const order = `ORDER BY ${this.lastModified}, ${this.key}`;
    try {
      const rows = since === null
        ? this.db.prepare(`SELECT * FROM ${this.table} ${order}`).all()
        : this.db.prepare(`SELECT * FROM ${this.table} WHERE ${this.lastModified} > ? ${order}`).all(since);
      log.debug("Listed changed local rows", { since, count: rows.length });
      return rows.map((row) => this.toEntity(row));
    } catch (error) {
      throw wrapSqliteError(error, "listing local changes");
    }
  }

  async read(localKey: number): Promise<LocalEntity | null> {
    try {
      const row = this.db.prepare(`SELECT * FROM ${this.table} WHERE ${this.key} = ?`).get(localKey);
      return row === undefined ? null : this.toEntity(row);
    } catch (error) {
      throw wrapSqliteError(error, `reading local key ${localKey}`);
    }
  }

  async writeLinkage(localKey: number, remoteId: string): Promise<void> {
    try {
      const row = asRow(this.db.prepare(`SELECT ${this.linkage} AS remote_id FROM ${this.table} WHERE ${this.key} = ?`).get(localKey));
      if (!row) {
        throw new SyncError(`Local key ${localKey} no longer exists`, { step: "backfill" });
      }
      const existing = typeof row.remote_id === "string" ? row.remote_id.trim() : "";
      if (existing === remoteId) return;
      if (existing !== "") {
        throw new LinkageConflictError(localKey, existing, remoteId);
      }
      // last_modified is left alone: linkage is not a content edit.
      this.db.prepare(`UPDATE ${this.table} SET ${this.linkage} = ? WHERE ${this.key} = ?`).run(remoteId, localKey);
    } catch (error) {
      throw wrapSqliteError(error, `linking local key ${localKey}`);
    }
  }

  private toEntity(raw: unknown): LocalEntity {
    const row = asRow(raw) ?? {};
    const localKey = row[this.names.keyColumn];
    const lastModified = row[this.names.lastModifiedColumn];
    if (typeof localKey !== "number" || typeof lastModified !== "string") {
      throw new SyncError(`Malformed local row: ${JSON.stringify(row)}`);
    }
    const remoteId = row[this.names.linkageColumn];
    const fields: FieldRecord = {};
    for (const { column, kind } of this.columns) {
      fields[column] = decodeValue(kind, row[column]);
    }
    return {
      localKey,
      remoteId: typeof remoteId === "string" && remoteId.trim() !== "" ? remoteId : null,
      fields,
      lastModified,
    };
  }
}
