export type FieldValue = string | number | boolean | null;

export type FieldRecord = Record<string, FieldValue>;

/** A facility as the local (master) register holds it. */
export interface LocalEntity {
  localKey: number;
  remoteId: string | null;
  fields: FieldRecord;
  lastModified: string;
}

export type LinkState =
  | { state: "unlinked" }
  | { state: "linked"; remoteId: string };

export type CreationState = "unlinked" | "minting" | "backfilled" | "pushed" | "failed";

export type AuditAction =
  | "create-mint"
  | "create-backfill"
  | "create-push"
  | "update-push"
  | "skip"
  | "error";

export type AuditOutcome = "success" | "failure";

export type SyncStep = "project" | "mint" | "backfill" | "push" | "read" | "diff";

export type OutcomeKind = "created" | "updated" | "skipped" | "failed" | "would-create" | "would-update";

export interface EntityOutcome {
  localKey: number;
  kind: OutcomeKind;
  remoteId?: string;
  fieldsChanged?: string[];
  step?: SyncStep;
  error?: string;
}

export type RunMode = "interactive" | "automated";

export interface RunCounts {
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  wouldCreate: number;
  wouldUpdate: number;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  completedAt: string | null;
  watermarkBefore: string | null;
  watermarkAfter: string | null;
  dryRun: boolean;
  status: "completed" | "aborted" | "dry-run";
  outcomes: EntityOutcome[];
  counts: RunCounts;
}
