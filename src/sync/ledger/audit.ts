import { getDatabase } from "./db";
import type { AuditEntry, AuditFilter, NewAuditEntry, RetentionPolicy } from "./types";
import type { AuditAction, AuditOutcome, SyncStep } from "@/sync/types";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("audit-log");

const DAY_MS = 24 * 60 * 60 * 1000;

/** Append-only: entries are never updated, only pruned. */
export function appendAudit(entry: NewAuditEntry): void {
  const db = getDatabase();
  db.prepare(`
    INSERT INTO audit_entries (run_id, local_key, action, step, fields_changed, outcome, error_detail, timestamp)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    entry.runId,
    entry.localKey,
    entry.action,
    entry.step ?? null,
    entry.fieldsChanged ? JSON.stringify(entry.fieldsChanged) : null,
    entry.outcome,
    entry.errorDetail ?? null,
    entry.timestamp ?? new Date().toISOString(),
  );
}

export function queryAudit(filter: AuditFilter = {}): AuditEntry[] {
  const db = getDatabase();
  const clauses: string[] = [];
  const params: (string | number)[] = [];

  if (filter.runId !== undefined) {
    clauses.push("run_id = ?");
    params.push(filter.runId);
  }
  if (filter.localKey !== undefined) {
    clauses.push("local_key = ?");
    params.push(filter.localKey);
  }
  if (filter.action !== undefined) {
    clauses.push("action = ?");
    params.push(filter.action);
  }
  if (filter.outcome !== undefined) {
    clauses.push("outcome = ?");
    params.push(filter.outcome);
  }
  if (filter.from !== undefined) {
    clauses.push("timestamp >= ?");
    params.push(filter.from);
  }
  if (filter.to !== undefined) {
    clauses.push("timestamp <= ?");
    params.push(filter.to);
  }

  const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";
  const limit = filter.limit !== undefined ? "LIMIT ?" : "";
  if (filter.limit !== undefined) params.push(filter.limit);

  const rows = db
    .prepare(`SELECT * FROM audit_entries ${where} ORDER BY id ${limit}`)
    .all(...params) as RawAuditRow[];
  return rows.map(toAuditEntry);
}

/**
 * Delete audit entries older than maxAgeDays, or belonging to runs outside
 * the maxRuns most recent. Run records are kept for watermark history.
 */
export function pruneAudit(policy: RetentionPolicy, now: Date = new Date()): number {
  const db = getDatabase();
  let pruned = 0;

  const prune = db.transaction(() => {
    if (policy.maxAgeDays && policy.maxAgeDays > 0) {
      const cutoff = new Date(now.getTime() - policy.maxAgeDays * DAY_MS).toISOString();
      pruned += db.prepare("DELETE FROM audit_entries WHERE timestamp < ?").run(cutoff).changes;
    }
    if (policy.maxRuns && policy.maxRuns > 0) {
      pruned += db.prepare(`
        DELETE FROM audit_entries WHERE run_id NOT IN (
          SELECT run_id FROM sync_runs WHERE dry_run = 0 ORDER BY started_at DESC, id DESC LIMIT ?
        )
      `).run(policy.maxRuns).changes;
    }
  });
  prune.immediate();

  if (pruned > 0) {
    log.info("Pruned audit entries", { pruned, ...policy });
  }
  return pruned;
}

interface RawAuditRow {
  id: number;
  run_id: string;
  local_key: number;
  action: string;
  step: string | null;
  fields_changed: string | null;
  outcome: string;
  error_detail: string | null;
  timestamp: string;
}

function toAuditEntry(row: RawAuditRow): AuditEntry {
  return {
    id: row.id,
    runId: row.run_id,
    localKey: row.local_key,
    action: row.action as AuditAction,
    step: row.step as SyncStep | null,
    fieldsChanged: row.fields_changed ? (JSON.parse(row.fields_changed) as string[]) : null,
    outcome: row.outcome as AuditOutcome,
    errorDetail: row.error_detail,
    timestamp: row.timestamp,
  };
}
