import { describe, expect, it } from "vitest";
import { classify, needsPush } from "@/sync/link-state";
import { RUN_1, T1, T2 } from "./helpers/fixtures";

describe("classify", () => {
  it("treats null, empty and whitespace ids as unlinked", () => {
    expect(classify({ remoteId: null })).toEqual({ state: "unlinked" });
    expect(classify({ remoteId: "" })).toEqual({ state: "unlinked" });
    expect(classify({ remoteId: " \t " })).toEqual({ state: "unlinked" });
  });

  it("returns the trimmed id for a linked entity", () => {
    expect(classify({ remoteId: " 4f1c " })).toEqual({ state: "linked", remoteId: "4f1c" });
  });
});

describe("needsPush", () => {
  it("is true for an entity never synced", () => {
    expect(needsPush({ lastModified: T1 }, null)).toBe(true);
  });

  it("compares last_modified against last_synced", () => {
    expect(needsPush({ lastModified: T2 }, RUN_1)).toBe(true);
    expect(needsPush({ lastModified: T1 }, RUN_1)).toBe(false);
    expect(needsPush({ lastModified: RUN_1 }, RUN_1)).toBe(false);
  });
});
