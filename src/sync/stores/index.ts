import Database from "better-sqlite3";
import path from "path";
import type { SyncEnv } from "@/sync/config/env";
import type { SchemaMap } from "@/sync/schema/mapper";
import { facilitySchemaMap } from "@/sync/schema/facility";
import { StoreUnavailableError } from "@/sync/errors";
import { SqliteLocalStore } from "./sqlite-local";
import { SqliteRemoteStore } from "./sqlite-remote";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("stores");

export interface OpenStores {
  local: SqliteLocalStore;
  remote: SqliteRemoteStore;
  schema: SchemaMap;
  close(): void;
}

/** Both registers must already exist; provisioning them is not our job. */
export function openStores(env: SyncEnv, schema: SchemaMap = facilitySchemaMap): OpenStores {
  const localDb = openFile(env.SYNC_LOCAL_DB_PATH, "local");
  let remoteDb: Database.Database;
  try {
    remoteDb = openFile(env.SYNC_REMOTE_DB_PATH, "remote");
  } catch (error) {
    localDb.close();
    throw error;
  }

  return {
    local: new SqliteLocalStore(localDb, schema),
    remote: new SqliteRemoteStore(remoteDb, schema),
    schema,
    close() {
      localDb.close();
      remoteDb.close();
    },
  };
}

function openFile(file: string, store: "local" | "remote"): Database.Database {
  const resolved = path.resolve(file);
  try {
    const db = new Database(resolved, { fileMustExist: true });
    db.pragma("busy_timeout = 5000");
    log.debug("Opened store database", { store, path: resolved });
    return db;
  } catch (error) {
    throw new StoreUnavailableError(store, error);
  }
}

export type { LocalStore, RemoteStore } from "./types";
export { SqliteLocalStore, SqliteRemoteStore };
