import type { LinkState, LocalEntity } from "@/sync/types";

/**
 * Pure read of the linkage field. A blank or whitespace-only id is treated
 * as no id at all. Whether the remote store still knows a linked id is the
 * coordinators' concern, not this one's.
 */
export function classify(entity: Pick<LocalEntity, "remoteId">): LinkState {
  const remoteId = entity.remoteId?.trim();
  return remoteId ? { state: "linked", remoteId } : { state: "unlinked" };
}

/** A linked entity needs a push when it was never synced or was edited since. */
export function needsPush(entity: Pick<LocalEntity, "lastModified">, lastSynced: string | null): boolean {
  return lastSynced === null || entity.lastModified > lastSynced;
}
