import { describe, expect, it } from "vitest";
import { formatAuditEntry, formatCounts, formatPendingMint, parseArgs } from "@/sync/cli/commands";
import type { RunSummary } from "@/sync/types";
import { RUN_1 } from "./helpers/fixtures";

function summary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    runId: "run-1",
    startedAt: RUN_1,
    completedAt: RUN_1,
    watermarkBefore: null,
    watermarkAfter: RUN_1,
    dryRun: false,
    status: "completed",
    outcomes: [],
    counts: { created: 2, updated: 3, skipped: 4, failed: 1, wouldCreate: 5, wouldUpdate: 6 },
    ...overrides,
  };
}

describe("parseArgs", () => {
  it("runs headless with --auto or --once", () => {
    expect(parseArgs(["--auto"], false)).toEqual({ kind: "run", dryRun: false });
    expect(parseArgs(["--once", "--dry-run"], false)).toEqual({ kind: "run", dryRun: true });
  });

  it("defaults to the interactive flow, honouring SYNC_DRY_RUN", () => {
    expect(parseArgs([], false)).toEqual({ kind: "interactive", dryRun: false });
    expect(parseArgs([], true)).toEqual({ kind: "interactive", dryRun: true });
  });

  it("parses audit filters", () => {
    expect(parseArgs(["audit", "--key", "42", "--action", "error", "--since", "2025-03-01"], false)).toEqual({
      kind: "audit",
      query: { key: 42, action: "error", since: "2025-03-01T00:00:00.000Z" },
    });
  });

  it("rejects bad audit filters", () => {
    expect(() => parseArgs(["audit", "--action", "delete"], false)).toThrow(/^Invalid audit query: --action: /);
    expect(() => parseArgs(["audit", "--key"], false)).toThrow("Missing value for --key");
    expect(() => parseArgs(["audit", "--colour", "red"], false)).toThrow('Unknown audit option "--colour"');
  });

  it("knows the maintenance commands and nothing else", () => {
    expect(parseArgs(["prune"], false)).toEqual({ kind: "prune" });
    expect(parseArgs(["pending"], false)).toEqual({ kind: "pending" });
    expect(() => parseArgs(["sync"], false)).toThrow('Unknown command "sync"');
  });
});

describe("formatting", () => {
  it("prints one line per audit entry", () => {
    expect(
      formatAuditEntry({
        id: 1,
        runId: "0123456789abcdef",
        localKey: 7,
        action: "update-push",
        step: null,
        fieldsChanged: ["navn", "kapacitet"],
        outcome: "success",
        errorDetail: null,
        timestamp: RUN_1,
      }),
    ).toBe(`${RUN_1} run=01234567 key=7 update-push success fields=navn,kapacitet`);

    expect(
      formatAuditEntry({
        id: 2,
        runId: "run-1",
        localKey: 8,
        action: "error",
        step: "read",
        fieldsChanged: null,
        outcome: "failure",
        errorDetail: "OrphanIdentifierError: gone",
        timestamp: RUN_1,
      }),
    ).toBe(`${RUN_1} run=run-1 key=8 error failure step=read error="OrphanIdentifierError: gone"`);
  });

  it("prints a pending mint", () => {
    expect(
      formatPendingMint({
        localKey: 3,
        remoteId: "r-3",
        runId: "run-1",
        createdAt: RUN_1,
        attempts: 2,
        status: "pending",
        updatedAt: RUN_1,
      }),
    ).toBe(`key=3 remote=r-3 status=pending attempts=2 since=${RUN_1}`);
  });

  it("marks an unconfirmed mint's unknown id", () => {
    expect(
      formatPendingMint({
        localKey: 4,
        remoteId: null,
        runId: "run-1",
        createdAt: RUN_1,
        attempts: 0,
        status: "unconfirmed",
        updatedAt: RUN_1,
      }),
    ).toBe(`key=4 remote=? status=unconfirmed attempts=0 since=${RUN_1}`);
  });

  it("summarises counts for real and dry runs", () => {
    expect(formatCounts(summary())).toBe("2 created, 3 updated, 4 skipped, 1 failed");
    expect(formatCounts(summary({ dryRun: true, status: "dry-run" }))).toBe(
      "5 to create, 6 to update, 4 unchanged, 1 invalid",
    );
  });
});
