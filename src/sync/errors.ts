import type { RunSummary, SyncStep } from "@/sync/types";

export class SyncError extends Error {
  step?: SyncStep;

  constructor(message: string, options?: { cause?: unknown; step?: SyncStep }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.step = options?.step;
  }
}

// --- Entity-level: caught by the coordinators, retried next run ---

/** Remote call timed out or the store answered "unavailable". */
export class TransientRemoteError extends SyncError {
  readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; step?: SyncStep; timedOut?: boolean }) {
    super(message, options);
    this.timedOut = options?.timedOut ?? false;
  }
}

export class SchemaMismatchError extends SyncError {
  constructor(
    readonly field: string,
    message: string,
    options?: { step?: SyncStep },
  ) {
    super(`Field "${field}": ${message}`, options);
  }
}

/** Local holds a remote_id the remote store does not recognize. Never auto-recreated. */
export class OrphanIdentifierError extends SyncError {
  constructor(readonly remoteId: string, options?: { step?: SyncStep }) {
    super(`Remote store has no object with id ${remoteId}`, options);
  }
}

export class MintNotBackfilledError extends SyncError {
  constructor(
    readonly localKey: number,
    readonly remoteId: string,
    readonly attempts: number,
  ) {
    super(
      `Minted id ${remoteId} for local key ${localKey} is still not linked after ${attempts} attempts; repair manually`,
      { step: "backfill" },
    );
  }
}

export class MintUnconfirmedError extends SyncError {
  constructor(readonly localKey: number) {
    super(
      `A mint for local key ${localKey} timed out and never answered; check the remote store and link manually`,
      { step: "mint" },
    );
  }
}

export class LinkageConflictError extends SyncError {
  constructor(readonly localKey: number, readonly existing: string, readonly attempted: string) {
    super(`Local key ${localKey} is already linked to ${existing}, refusing to link ${attempted}`, { step: "backfill" });
  }
}

// --- Run-level: abort the run, watermark untouched ---

export class StoreUnavailableError extends SyncError {
  constructor(readonly store: "local" | "remote", cause: unknown) {
    super(`${store === "local" ? "Local" : "Remote"} store unreachable: ${errorMessage(cause)}`, { cause });
  }
}

export class RunLockError extends SyncError {
  constructor(readonly heldBy: string, readonly expiresAt: string) {
    super(`Another run (${heldBy}) holds the run lock until ${expiresAt}`);
  }
}

export class RunAbortedError extends SyncError {
  constructor(
    message: string,
    readonly summary: RunSummary,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** "<Name>: <message>", the form stored in audit entries. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
