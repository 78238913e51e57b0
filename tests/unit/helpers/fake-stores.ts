import type { FieldRecord, LocalEntity } from "@/sync/types";
import type { LocalStore, RemoteStore } from "@/sync/stores/types";
import { LinkageConflictError, OrphanIdentifierError } from "@/sync/errors";

/** An error to throw, or "hang" for a call that never settles. */
export type Failure = Error | "hang";

function fail(failure: Failure): Promise<never> {
  if (failure === "hang") return new Promise<never>(() => undefined);
  return Promise.reject(failure);
}

function clone(entity: LocalEntity): LocalEntity {
  return { ...entity, fields: { ...entity.fields } };
}

export class FakeLocalStore implements LocalStore {
  readonly rows = new Map<number, LocalEntity>();
  readonly linkageFailures = new Map<number, Failure>();
  unavailable: Failure | null = null;
  linkageCalls = 0;

  put(...entities: LocalEntity[]): void {
    for (const entity of entities) this.rows.set(entity.localKey, clone(entity));
  }

  /** A staff edit: fields change and last_modified moves forward. */
  edit(localKey: number, fields: FieldRecord, lastModified: string): void {
    const row = this.rows.get(localKey);
    if (!row) throw new Error(`no row ${localKey}`);
    this.rows.set(localKey, { ...row, fields: { ...row.fields, ...fields }, lastModified });
  }

  async listChanged(since: string | null): Promise<LocalEntity[]> {
    if (this.unavailable) return fail(this.unavailable);
    return [...this.rows.values()]
      .filter((row) => since === null || row.lastModified > since)
      .sort((a, b) => (a.lastModified < b.lastModified ? -1 : a.lastModified > b.lastModified ? 1 : a.localKey - b.localKey))
      .map(clone);
  }

  async read(localKey: number): Promise<LocalEntity | null> {
    if (this.unavailable) return fail(this.unavailable);
    const row = this.rows.get(localKey);
    return row ? clone(row) : null;
  }

  async writeLinkage(localKey: number, remoteId: string): Promise<void> {
    this.linkageCalls += 1;
    const failure = this.linkageFailures.get(localKey);
    if (failure) return fail(failure);
    const row = this.rows.get(localKey);
    if (!row) throw new Error(`no row ${localKey}`);
    const existing = row.remoteId?.trim();
    if (existing && existing !== remoteId) {
      throw new LinkageConflictError(localKey, existing, remoteId);
    }
    this.rows.set(localKey, { ...row, remoteId });
  }
}

export class FakeRemoteStore implements RemoteStore {
  readonly objects = new Map<string, FieldRecord>();
  readonly writes: { remoteId: string; fields: FieldRecord }[] = [];
  readonly readFailures = new Map<string, Failure>();
  readonly pushFailures = new Map<string, Failure>();
  /** Ids handed out by mint(), in order; falls back to remote-<n>. */
  readonly nextIds: string[] = [];
  mintFailure: Failure | null = null;
  /** mint() answers this late; the id is allocated all the same. */
  mintDelayMs = 0;
  unavailable: Failure | null = null;
  mintCount = 0;

  async ping(): Promise<void> {
    if (this.unavailable) return fail(this.unavailable);
  }

  async mint(): Promise<string> {
    if (this.mintFailure) return fail(this.mintFailure);
    if (this.mintDelayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.mintDelayMs));
    this.mintCount += 1;
    const id = this.nextIds.shift() ?? `remote-${this.mintCount}`;
    this.objects.set(id, {});
    return id;
  }

  async readProjection(remoteId: string): Promise<FieldRecord | null> {
    const failure = this.readFailures.get(remoteId);
    if (failure) return fail(failure);
    const object = this.objects.get(remoteId);
    return object ? { ...object } : null;
  }

  async writeProjection(remoteId: string, fields: FieldRecord): Promise<void> {
    const failure = this.pushFailures.get(remoteId);
    if (failure) return fail(failure);
    const object = this.objects.get(remoteId);
    if (!object) throw new OrphanIdentifierError(remoteId, { step: "push" });
    this.objects.set(remoteId, { ...object, ...fields });
    this.writes.push({ remoteId, fields: { ...fields } });
  }
}
