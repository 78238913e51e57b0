import type { FieldRecord, LocalEntity } from "@/sync/types";

/** The master register. Owns last_modified; the engine only writes linkage. */
export interface LocalStore {
  listChanged(since: string | null): Promise<LocalEntity[]>;
  read(localKey: number): Promise<LocalEntity | null>;
  /** Sets remote_id once. Re-linking to the same id is a no-op. */
  writeLinkage(localKey: number, remoteId: string): Promise<void>;
}

/** The identifier authority. */
export interface RemoteStore {
  ping(): Promise<void>;
  /** Allocates an identifier and an empty shell object. Not idempotent. */
  mint(): Promise<string>;
  readProjection(remoteId: string): Promise<FieldRecord | null>;
  /** Keyed overwrite of the given columns only. */
  writeProjection(remoteId: string, fields: FieldRecord): Promise<void>;
}
