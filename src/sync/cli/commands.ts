import { auditQuerySchema, type AuditQuery } from "@/sync/types/api";
import type { AuditEntry, PendingMint } from "@/sync/ledger/types";
import type { RunSummary } from "@/sync/types";

export type CliCommand =
  | { kind: "run"; dryRun: boolean }
  | { kind: "interactive"; dryRun: boolean }
  | { kind: "audit"; query: AuditQuery }
  | { kind: "prune" }
  | { kind: "pending" };

const AUDIT_FLAGS: Record<string, keyof AuditQuery> = {
  "--run": "run",
  "--key": "key",
  "--action": "action",
  "--outcome": "outcome",
  "--since": "since",
  "--until": "until",
  "--limit": "limit",
};

export function parseArgs(args: string[], defaultDryRun: boolean): CliCommand {
  const dryRun = defaultDryRun || args.includes("--dry-run");
  const [first] = args;

  if (first === "audit") return { kind: "audit", query: parseAuditFlags(args.slice(1)) };
  if (first === "prune") return { kind: "prune" };
  if (first === "pending") return { kind: "pending" };
  if (first !== undefined && !first.startsWith("--")) {
    throw new Error(`Unknown command "${first}". Expected audit, prune or pending.`);
  }
  if (args.includes("--auto") || args.includes("--once")) return { kind: "run", dryRun };
  return { kind: "interactive", dryRun };
}

function parseAuditFlags(args: string[]): AuditQuery {
  const raw: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 2) {
    const flag = args[i];
    const key = AUDIT_FLAGS[flag];
    const value = args[i + 1];
    if (!key) throw new Error(`Unknown audit option "${flag}"`);
    if (value === undefined) throw new Error(`Missing value for ${flag}`);
    raw[key] = value;
  }

  const parsed = auditQuerySchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `--${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid audit query: ${problems}`);
  }
  return parsed.data;
}

export function formatAuditEntry(entry: AuditEntry): string {
  const parts = [
    entry.timestamp,
    `run=${entry.runId.slice(0, 8)}`,
    `key=${entry.localKey}`,
    entry.action,
    entry.outcome,
  ];
  if (entry.step) parts.push(`step=${entry.step}`);
  if (entry.fieldsChanged?.length) parts.push(`fields=${entry.fieldsChanged.join(",")}`);
  if (entry.errorDetail) parts.push(`error=${JSON.stringify(entry.errorDetail)}`);
  return parts.join(" ");
}

export function formatPendingMint(mint: PendingMint): string {
  return `key=${mint.localKey} remote=${mint.remoteId ?? "?"} status=${mint.status} attempts=${mint.attempts} since=${mint.createdAt}`;
}

export function formatCounts(summary: RunSummary): string {
  const { created, updated, skipped, failed, wouldCreate, wouldUpdate } = summary.counts;
  if (summary.dryRun) {
    return `${wouldCreate} to create, ${wouldUpdate} to update, ${skipped} unchanged, ${failed} invalid`;
  }
  return `${created} created, ${updated} updated, ${skipped} skipped, ${failed} failed`;
}
