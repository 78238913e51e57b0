import { getDatabase } from "./db";
import type {
  PendingMint,
  PendingMintStatus,
  RunRecord,
  RunStatus,
  SyncRecord,
  SyncStatus,
} from "./types";
import type { RunCounts, RunMode } from "@/sync/types";
import { RunLockError } from "@/sync/errors";

// --- Sync Records ---

export function findRecord(localKey: number): SyncRecord | undefined {
  const db = getDatabase();
  const row = db
    .prepare("SELECT * FROM sync_records WHERE local_key = ?")
    .get(localKey) as RawSyncRow | undefined;
  return row ? toSyncRecord(row) : undefined;
}

/** Keys whose last attempt failed. They are re-queued regardless of the watermark. */
export function listFailedKeys(): number[] {
  const db = getDatabase();
  const rows = db
    .prepare("SELECT local_key FROM sync_records WHERE sync_status = 'failed' ORDER BY local_key")
    .all() as { local_key: number }[];
  return rows.map((r) => r.local_key);
}

export function upsertRecord(
  localKey: number,
  syncStatus: SyncStatus,
  options: { remoteId?: string | null; lastSynced?: string | null; errorMessage?: string | null },
): void {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.prepare(`
    INSERT INTO sync_records (local_key, remote_id, sync_status, last_synced, error_message, updated_at)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(local_key) DO UPDATE SET
      remote_id = COALESCE(excluded.remote_id, sync_records.remote_id),
      sync_status = excluded.sync_status,
      last_synced = COALESCE(excluded.last_synced, sync_records.last_synced),
      error_message = excluded.error_message,
      updated_at = excluded.updated_at
  `).run(localKey, options.remoteId ?? null, syncStatus, options.lastSynced ?? null, options.errorMessage ?? null, now);
}

export function markSynced(localKey: number, remoteId: string, lastSynced: string): void {
  upsertRecord(localKey, "synced", { remoteId, lastSynced });
}

/** last_synced is deliberately left where it was. */
export function markFailed(localKey: number, error: string, remoteId?: string | null): void {
  upsertRecord(localKey, "failed", { remoteId, errorMessage: error });
}

// --- Runs ---

/** watermark_after of the latest completed, non-dry run; null means never. */
export function getWatermark(): string | null {
  const db = getDatabase();
  const row = db
    .prepare(`
      SELECT watermark_after FROM sync_runs
      WHERE status = 'completed' AND dry_run = 0 AND completed_at IS NOT NULL
      ORDER BY started_at DESC, id DESC
      LIMIT 1
    `)
    .get() as { watermark_after: string | null } | undefined;
  return row?.watermark_after ?? null;
}

export function createRun(
  runId: string,
  startedAt: string,
  watermarkBefore: string | null,
  mode: RunMode,
  dryRun: boolean,
): void {
  const db = getDatabase();
  db.prepare(`
    INSERT INTO sync_runs (run_id, started_at, watermark_before, mode, dry_run, counts_json, status)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(runId, startedAt, watermarkBefore, mode, dryRun ? 1 : 0, "{}", "running");
}

/**
 * Close a run. Only "completed" carries a watermark_after; the update is
 * guarded on status = 'running' so a closed record is never rewritten.
 */
export function completeRun(
  runId: string,
  status: Exclude<RunStatus, "running">,
  counts: RunCounts,
  options: { completedAt: string; watermarkAfter?: string | null; errorMessage?: string | null },
): void {
  const db = getDatabase();
  const close = db.transaction(() => {
    const result = db.prepare(`
      UPDATE sync_runs
      SET completed_at = ?, watermark_after = ?, counts_json = ?, status = ?, error_message = ?
      WHERE run_id = ? AND status = 'running'
    `).run(
      status === "aborted" ? null : options.completedAt,
      status === "completed" ? options.watermarkAfter ?? null : null,
      JSON.stringify(counts),
      status,
      options.errorMessage ?? null,
      runId,
    );
    if (result.changes !== 1) {
      throw new Error(`Run ${runId} is not open`);
    }
  });
  close.immediate();
}

export function findRun(runId: string): RunRecord | undefined {
  const db = getDatabase();
  const row = db.prepare("SELECT * FROM sync_runs WHERE run_id = ?").get(runId) as RawRunRow | undefined;
  return row ? toRunRecord(row) : undefined;
}

export function listRuns(limit = 20): RunRecord[] {
  const db = getDatabase();
  const rows = db
    .prepare("SELECT * FROM sync_runs ORDER BY started_at DESC, id DESC LIMIT ?")
    .all(limit) as RawRunRow[];
  return rows.map(toRunRecord);
}

// --- Pending mints ---

export function findPendingMint(localKey: number): PendingMint | undefined {
  const db = getDatabase();
  const row = db
    .prepare("SELECT * FROM pending_mints WHERE local_key = ? AND status != 'backfilled'")
    .get(localKey) as RawPendingMintRow | undefined;
  return row ? toPendingMint(row) : undefined;
}

export function listOpenPendingMints(): PendingMint[] {
  const db = getDatabase();
  const rows = db
    .prepare("SELECT * FROM pending_mints WHERE status != 'backfilled' ORDER BY created_at, local_key")
    .all() as RawPendingMintRow[];
  return rows.map(toPendingMint);
}

/** Written as soon as mint() returns, before any backfill attempt. */
export function recordPendingMint(localKey: number, remoteId: string, runId: string): void {
  const db = getDatabase();
  const now = new Date().toISOString();
  db.prepare(`
    INSERT INTO pending_mints (local_key, remote_id, run_id, created_at, attempts, status, updated_at)
    VALUES (?, ?, ?, ?, 0, 'pending', ?)
    ON CONFLICT(local_key) DO UPDATE SET
      remote_id = excluded.remote_id,
      run_id = excluded.run_id,
      created_at = excluded.created_at,
      attempts = 0,
      status = 'pending',
      updated_at = excluded.updated_at
    WHERE pending_mints.status = 'backfilled'
  `).run(localKey, remoteId, runId, now, now);
}

/**
 * A mint timed out but may still have allocated an id. Blocks another mint
 * for the key until the late answer is confirmed or discarded.
 */
export function recordUnconfirmedMint(localKey: number, runId: string): void {
  const db = getDatabase();
  const now = new Date().toISOString();
  db.prepare(`
    INSERT INTO pending_mints (local_key, remote_id, run_id, created_at, attempts, status, updated_at)
    VALUES (?, NULL, ?, ?, 0, 'unconfirmed', ?)
    ON CONFLICT(local_key) DO UPDATE SET
      remote_id = NULL,
      run_id = excluded.run_id,
      created_at = excluded.created_at,
      attempts = 0,
      status = 'unconfirmed',
      updated_at = excluded.updated_at
    WHERE pending_mints.status = 'backfilled'
  `).run(localKey, runId, now, now);
}

/** The late answer arrived: the id becomes an ordinary pending mint. */
export function confirmMint(localKey: number, remoteId: string): boolean {
  const db = getDatabase();
  const result = db.prepare(`
    UPDATE pending_mints SET remote_id = ?, status = 'pending', updated_at = ?
    WHERE local_key = ? AND status = 'unconfirmed'
  `).run(remoteId, new Date().toISOString(), localKey);
  return result.changes > 0;
}

/** The timed out mint failed at the remote store, so minting again is safe. */
export function discardUnconfirmedMint(localKey: number): void {
  const db = getDatabase();
  db.prepare("DELETE FROM pending_mints WHERE local_key = ? AND status = 'unconfirmed'").run(localKey);
}

export function recordBackfillFailure(localKey: number): number {
  const db = getDatabase();
  const row = db.prepare(`
    UPDATE pending_mints SET attempts = attempts + 1, updated_at = ?
    WHERE local_key = ? AND status = 'pending'
    RETURNING attempts
  `).get(new Date().toISOString(), localKey) as { attempts: number } | undefined;
  return row?.attempts ?? 0;
}

export function setPendingMintStatus(localKey: number, status: PendingMintStatus): void {
  const db = getDatabase();
  db.prepare("UPDATE pending_mints SET status = ?, updated_at = ? WHERE local_key = ?")
    .run(status, new Date().toISOString(), localKey);
}

// --- Run lock ---

/**
 * Take the single run lease. An expired lease is taken over; a live one
 * held by another run fails fast.
 */
export function acquireRunLock(runId: string, now: Date, ttlMs: number): void {
  const db = getDatabase();
  const acquiredAt = now.toISOString();
  const expiresAt = new Date(now.getTime() + ttlMs).toISOString();

  const acquire = db.transaction(() => {
    const held = db.prepare("SELECT run_id, expires_at FROM run_lock WHERE id = 1").get() as
      | { run_id: string; expires_at: string }
      | undefined;
    if (held && held.run_id !== runId && held.expires_at > acquiredAt) {
      throw new RunLockError(held.run_id, held.expires_at);
    }
    db.prepare(`
      INSERT INTO run_lock (id, run_id, acquired_at, expires_at) VALUES (1, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET run_id = excluded.run_id, acquired_at = excluded.acquired_at, expires_at = excluded.expires_at
    `).run(runId, acquiredAt, expiresAt);
  });
  acquire.immediate();
}

export function releaseRunLock(runId: string): void {
  const db = getDatabase();
  db.prepare("DELETE FROM run_lock WHERE id = 1 AND run_id = ?").run(runId);
}

// --- Internal helpers ---

interface RawSyncRow {
  local_key: number;
  remote_id: string | null;
  sync_status: string;
  last_synced: string | null;
  error_message: string | null;
  updated_at: string;
}

interface RawRunRow {
  id: number;
  run_id: string;
  started_at: string;
  completed_at: string | null;
  watermark_before: string | null;
  watermark_after: string | null;
  mode: string;
  dry_run: number;
  counts_json: string;
  status: string;
  error_message: string | null;
}

interface RawPendingMintRow {
  local_key: number;
  remote_id: string | null;
  run_id: string;
  created_at: string;
  attempts: number;
  status: string;
  updated_at: string;
}

const EMPTY_COUNTS: RunCounts = { created: 0, updated: 0, skipped: 0, failed: 0, wouldCreate: 0, wouldUpdate: 0 };

function toSyncRecord(row: RawSyncRow): SyncRecord {
  return {
    localKey: row.local_key,
    remoteId: row.remote_id,
    syncStatus: row.sync_status as SyncStatus,
    lastSynced: row.last_synced,
    errorMessage: row.error_message,
    updatedAt: row.updated_at,
  };
}

function toRunRecord(row: RawRunRow): RunRecord {
  return {
    runId: row.run_id,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    watermarkBefore: row.watermark_before,
    watermarkAfter: row.watermark_after,
    mode: row.mode as RunMode,
    dryRun: row.dry_run === 1,
    counts: { ...EMPTY_COUNTS, ...(JSON.parse(row.counts_json) as Partial<RunCounts>) },
    status: row.status as RunStatus,
    errorMessage: row.error_message,
  };
}

function toPendingMint(row: RawPendingMintRow): PendingMint {
  return {
    localKey: row.local_key,
    remoteId: row.remote_id,
    runId: row.run_id,
    createdAt: row.created_at,
    attempts: row.attempts,
    status: row.status as PendingMintStatus,
    updatedAt: row.updated_at,
  };
}
