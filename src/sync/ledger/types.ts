import type { AuditAction, AuditOutcome, RunCounts, RunMode, SyncStep } from "@/sync/types";

export type SyncStatus = "synced" | "failed";

export interface SyncRecord {
  localKey: number;
  remoteId: string | null;
  syncStatus: SyncStatus;
  lastSynced: string | null;
  errorMessage: string | null;
  updatedAt: string;
}

export type RunStatus = "running" | "completed" | "aborted" | "dry-run";

export interface RunRecord {
  runId: string;
  startedAt: string;
  completedAt: string | null;
  watermarkBefore: string | null;
  watermarkAfter: string | null;
  mode: RunMode;
  dryRun: boolean;
  counts: RunCounts;
  status: RunStatus;
  errorMessage: string | null;
}

export type PendingMintStatus = "unconfirmed" | "pending" | "backfilled" | "stuck";

export interface PendingMint {
  localKey: number;
  /** Null while a mint that timed out has not answered. */
  remoteId: string | null;
  runId: string;
  createdAt: string;
  attempts: number;
  status: PendingMintStatus;
  updatedAt: string;
}

export interface AuditEntry {
  id: number;
  runId: string;
  localKey: number;
  action: AuditAction;
  step: SyncStep | null;
  fieldsChanged: string[] | null;
  outcome: AuditOutcome;
  errorDetail: string | null;
  timestamp: string;
}

export type NewAuditEntry = Omit<AuditEntry, "id" | "step" | "fieldsChanged" | "errorDetail" | "timestamp"> & {
  step?: SyncStep | null;
  fieldsChanged?: string[] | null;
  errorDetail?: string | null;
  timestamp?: string;
};

export interface AuditFilter {
  runId?: string;
  localKey?: number;
  action?: AuditAction;
  outcome?: AuditOutcome;
  /** Inclusive lower bound on timestamp. */
  from?: string;
  /** Inclusive upper bound on timestamp. */
  to?: string;
  limit?: number;
}

export interface RetentionPolicy {
  maxAgeDays?: number;
  maxRuns?: number;
}
