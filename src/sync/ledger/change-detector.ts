import type { LocalEntity } from "@/sync/types";
import type { LocalStore } from "@/sync/stores/types";
import { listFailedKeys, listOpenPendingMints } from "./repository";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("change-detector");

/**
 * Entities modified after the watermark, plus everything the ledger has
 * re-queued (failed last time, or minted but never linked). A null
 * watermark is the bootstrap path and returns every entity; each still
 * goes through link-state classification.
 */
export async function detectChanges(local: LocalStore, watermark: string | null): Promise<LocalEntity[]> {
  const byKey = new Map<number, LocalEntity>();
  for (const entity of await local.listChanged(watermark)) {
    byKey.set(entity.localKey, entity);
  }

  const requeued = new Set([
    ...listFailedKeys(),
    ...listOpenPendingMints().map((m) => m.localKey),
  ]);
  for (const key of requeued) {
    if (byKey.has(key)) continue;
    const entity = await local.read(key);
    if (!entity) {
      log.warn("Re-queued entity no longer exists locally", { localKey: key });
      continue;
    }
    byKey.set(key, entity);
  }

  const entities = [...byKey.values()].sort(
    (a, b) => compareTimestamps(a.lastModified, b.lastModified) || a.localKey - b.localKey,
  );
  log.info("Detected changes", {
    watermark,
    changed: entities.length,
    requeued: requeued.size,
  });
  return entities;
}

function compareTimestamps(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
