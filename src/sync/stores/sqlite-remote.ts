import { randomUUID } from "crypto";
import type Database from "better-sqlite3";
import type { FieldRecord } from "@/sync/types";
import type { RemoteStore } from "./types";
import type { ColumnKind, SchemaMap } from "@/sync/schema/mapper";
import { OrphanIdentifierError, SyncError } from "@/sync/errors";
import { asRow, decodeValue, encodeValue, quoteIdent, wrapSqliteError } from "./sqlite-codec";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("remote-store");

/**
 * National register kept in a SQLite file. Minting inserts a bare row with
 * a fresh UUID; every other write is keyed on that id.
 */
export class SqliteRemoteStore implements RemoteStore {
  private readonly table: string;
  private readonly idColumn: string;
  private readonly kinds: Map<string, ColumnKind>;

  constructor(
    private readonly db: Database.Database,
    map: SchemaMap,
  ) {
    this.table = quoteIdent(map.remote.table);
    this.idColumn = quoteIdent(map.remote.idColumn);
    this.kinds = new Map(map.shared.map((f) => [f.remote, f.kind]));
    for (const column of this.kinds.keys()) quoteIdent(column);
  }

  async ping(): Promise<void> {
    try {
      this.db.prepare(`SELECT 1 FROM ${this.table} LIMIT 1`).get();
    } catch (error) {
      throw wrapSqliteError(error, "pinging remote store");
    }
  }

  async mint(): Promise<string> {
    const id = randomUUID();
    try {
      this.db.prepare(`INSERT INTO ${this.table} (${this.idColumn}) VALUES (?)`).run(id);
    } catch (error) {
      throw wrapSqliteError(error, "minting remote id");
    }
    log.info("Minted remote object", { remoteId: id });
    return id;
  }

  async readProjection(remoteId: string): Promise<FieldRecord | null> {
    const columns = [...this.kinds.keys()];
    let raw: unknown;
    try {
      raw = this.db
        .prepare(`SELECT ${columns.map(quoteIdent).join(", ")} FROM ${this.table} WHERE ${this.idColumn} = ?`)
        .get(remoteId);
    } catch (error) {
      throw wrapSqliteError(error, `reading remote object ${remoteId}`);
    }
    const row = asRow(raw);
    if (!row) return null;

    const fields: FieldRecord = {};
    for (const [column, kind] of this.kinds) {
      fields[column] = decodeValue(kind, row[column]);
    }
    return fields;
  }

  async writeProjection(remoteId: string, fields: FieldRecord): Promise<void> {
    const entries = Object.entries(fields);
    for (const [column] of entries) {
      if (!this.kinds.has(column)) {
        throw new SyncError(`Column "${column}" is not part of the remote projection`, { step: "push" });
      }
    }

    let changes: number;
    try {
      if (entries.length === 0) {
        changes = this.db.prepare(`SELECT 1 FROM ${this.table} WHERE ${this.idColumn} = ?`).get(remoteId) ? 1 : 0;
      } else {
        const assignments = entries.map(([column]) => `${quoteIdent(column)} = ?`).join(", ");
        const values = entries.map(([, value]) => encodeValue(value));
        changes = this.db
          .prepare(`UPDATE ${this.table} SET ${assignments} WHERE ${this.idColumn} = ?`)
          .run(...values, remoteId).changes;
      }
    } catch (error) {
      throw wrapSqliteError(error, `writing remote object ${remoteId}`);
    }

    if (changes === 0) {
      throw new OrphanIdentifierError(remoteId, { step: "push" });
    }
    log.debug("Wrote remote projection", { remoteId, columns: entries.map(([column]) => column) });
  }
}
