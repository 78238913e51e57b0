import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqliteLocalStore, SqliteRemoteStore } from "@/sync/stores";
import { facilitySchemaMap } from "@/sync/schema/facility";
import { LinkageConflictError, OrphanIdentifierError, SyncError } from "@/sync/errors";
import { T0, T1, T2, facilityFields, facilityProjection } from "./helpers/fixtures";
import { LOCAL_DDL, REMOTE_DDL, insertFacility } from "./helpers/sqlite";

describe("SqliteLocalStore", () => {
  let db: Database.Database;
  let store: SqliteLocalStore;

  beforeEach(() => {
    db = new Database(":memory:");
    db.exec(LOCAL_DDL);
    store = new SqliteLocalStore(db, facilitySchemaMap);
  });

  afterEach(() => db.close());

  it("decodes rows into entities with typed fields", async () => {
    insertFacility(db, 1, T1);

    expect(await store.read(1)).toEqual({
      localKey: 1,
      remoteId: null,
      fields: facilityFields(),
      lastModified: T1,
    });
    expect(await store.read(2)).toBeNull();
  });

  it("lists rows changed after a timestamp, oldest first", async () => {
    insertFacility(db, 3, T2);
    insertFacility(db, 1, T0);
    insertFacility(db, 2, T1);

    expect((await store.listChanged(null)).map((e) => e.localKey)).toEqual([1, 2, 3]);
    expect((await store.listChanged(T0)).map((e) => e.localKey)).toEqual([2, 3]);
  });

  it("reads a blank remote_id as unlinked", async () => {
    insertFacility(db, 1, T1, "   ");
    expect((await store.read(1))?.remoteId).toBeNull();
  });

  it("writes linkage without touching last_modified", async () => {
    insertFacility(db, 1, T1, "");

    await store.writeLinkage(1, "abc");
    await store.writeLinkage(1, "abc");

    expect(await store.read(1)).toMatchObject({ remoteId: "abc", lastModified: T1 });
  });

  it("refuses to relink to a different id", async () => {
    insertFacility(db, 1, T1, "abc");
    await expect(store.writeLinkage(1, "def")).rejects.toBeInstanceOf(LinkageConflictError);
  });

  it("fails to link a row that no longer exists", async () => {
    await expect(store.writeLinkage(5, "abc")).rejects.toThrow("Local key 5 no longer exists");
  });
});

describe("SqliteRemoteStore", () => {
  let db: Database.Database;
  let store: SqliteRemoteStore;

  beforeEach(() => {
    db = new Database(":memory:");
    db.exec(REMOTE_DDL);
    store = new SqliteRemoteStore(db, facilitySchemaMap);
  });

  afterEach(() => db.close());

  it("mints a bare row under a fresh uuid", async () => {
    const id = await store.mint();

    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(await store.readProjection(id)).toEqual({
      navn: null,
      temakode: null,
      beskrivelse: null,
      geometri: null,
      offentlig: null,
      kapacitet: null,
      aaben_fra: null,
    });
  });

  it("round-trips a projection, booleans included", async () => {
    const id = await store.mint();
    await store.writeProjection(id, facilityProjection());
    expect(await store.readProjection(id)).toEqual(facilityProjection());
  });

  it("updates only the columns it is given", async () => {
    db.prepare("INSERT INTO facilitet (objekt_id, navn, kapacitet, registreret_af) VALUES ('x', 'Old', 10, 'import')").run();

    await store.writeProjection("x", { navn: "New" });

    expect(db.prepare("SELECT navn, kapacitet, registreret_af FROM facilitet WHERE objekt_id = 'x'").get()).toEqual({
      navn: "New",
      kapacitet: 10,
      registreret_af: "import",
    });
  });

  it("returns null for an unknown id and rejects writes to it", async () => {
    expect(await store.readProjection("missing")).toBeNull();
    await expect(store.writeProjection("missing", { navn: "x" })).rejects.toBeInstanceOf(OrphanIdentifierError);
    await expect(store.writeProjection("missing", {})).rejects.toBeInstanceOf(OrphanIdentifierError);
  });

  it("refuses columns outside the shared projection", async () => {
    const id = await store.mint();
    await expect(store.writeProjection(id, { internal_note: "x" })).rejects.toBeInstanceOf(SyncError);
  });

  it("answers a ping while the table is there", async () => {
    await expect(store.ping()).resolves.toBeUndefined();
    db.exec("DROP TABLE facilitet");
    await expect(store.ping()).rejects.toThrow(/no such table/);
  });
});
