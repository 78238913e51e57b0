import { beforeEach, describe, expect, it } from "vitest";
import { detectChanges } from "@/sync/ledger/change-detector";
import { markFailed, markSynced, recordPendingMint, setPendingMintStatus } from "@/sync/ledger/repository";
import { FakeLocalStore } from "./helpers/fake-stores";
import { RUN_1, T0, T1, T2, facility } from "./helpers/fixtures";

describe("detectChanges", () => {
  let local: FakeLocalStore;

  beforeEach(() => {
    local = new FakeLocalStore();
    local.put(
      facility(3, { lastModified: T2 }),
      facility(1, { lastModified: T0 }),
      facility(2, { lastModified: T1 }),
    );
  });

  it("returns every entity on bootstrap, oldest edit first", async () => {
    const entities = await detectChanges(local, null);
    expect(entities.map((e) => e.localKey)).toEqual([1, 2, 3]);
  });

  it("returns only entities modified after the watermark", async () => {
    const entities = await detectChanges(local, T1);
    expect(entities.map((e) => e.localKey)).toEqual([3]);
  });

  it("re-queues failed entities regardless of the watermark", async () => {
    markFailed(1, "boom");
    markSynced(2, "r-2", RUN_1);

    const entities = await detectChanges(local, T1);

    expect(entities.map((e) => e.localKey)).toEqual([1, 3]);
  });

  it("re-queues entities with an open pending mint", async () => {
    recordPendingMint(2, "r-2", "run-0");
    recordPendingMint(1, "r-1", "run-0");
    setPendingMintStatus(1, "backfilled");

    const entities = await detectChanges(local, RUN_1);

    expect(entities.map((e) => e.localKey)).toEqual([2]);
  });

  it("lists an entity once when it is both changed and re-queued", async () => {
    markFailed(3, "boom");
    const entities = await detectChanges(local, T1);
    expect(entities.map((e) => e.localKey)).toEqual([3]);
  });

  it("drops re-queued keys deleted locally", async () => {
    markFailed(99, "boom");
    const entities = await detectChanges(local, T2);
    expect(entities).toEqual([]);
  });

  it("detects a superset of keys at every earlier watermark", async () => {
    markFailed(1, "boom");
    recordPendingMint(2, "r-2", "run-0");
    const keysAt = async (watermark: string | null) =>
      (await detectChanges(local, watermark)).map((e) => e.localKey);

    const atStart = await keysAt(null);
    const atT0 = await keysAt(T0);
    const atT1 = await keysAt(T1);
    const atT2 = await keysAt(T2);

    expect(atT2).toEqual([1, 2]);
    expect(atT1).toEqual([1, 2, 3]);
    expect(atT0).toEqual([1, 2, 3]);
    expect(atStart).toEqual(expect.arrayContaining(atT0));
    expect(atT0).toEqual(expect.arrayContaining(atT1));
    expect(atT1).toEqual(expect.arrayContaining(atT2));
  });
});
