import { z } from "zod";
import type { AuditFilter } from "@/sync/ledger/types";

export const auditActionSchema = z.enum([
  "create-mint",
  "create-backfill",
  "create-push",
  "update-push",
  "skip",
  "error",
]);

export const auditOutcomeSchema = z.enum(["success", "failure"]);

const isoTimestamp = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), "Must be an ISO-8601 timestamp")
  .transform((v) => new Date(v).toISOString());

const positiveInt = z
  .string()
  .regex(/^\d+$/, "Must be a non-negative integer")
  .transform((v) => Number(v));

export const runRequestSchema = z.object({
  dryRun: z.boolean().default(false),
});

/** Query-string shaped: every value arrives as a string. */
export const auditQuerySchema = z.object({
  run: z.string().min(1).optional(),
  key: positiveInt.optional(),
  action: auditActionSchema.optional(),
  outcome: auditOutcomeSchema.optional(),
  since: isoTimestamp.optional(),
  until: isoTimestamp.optional(),
  limit: positiveInt.pipe(z.number().int().min(1).max(10_000)).optional(),
});

export type RunRequest = z.infer<typeof runRequestSchema>;
export type AuditQuery = z.infer<typeof auditQuerySchema>;

export function toAuditFilter(query: AuditQuery): AuditFilter {
  return {
    runId: query.run,
    localKey: query.key,
    action: query.action,
    outcome: query.outcome,
    from: query.since,
    to: query.until,
    limit: query.limit ?? 500,
  };
}
