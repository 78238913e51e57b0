import type { Logger } from "winston";
import type { EntityOutcome, SyncStep } from "@/sync/types";
import type { LocalStore, RemoteStore } from "@/sync/stores/types";
import type { SchemaMap } from "@/sync/schema/mapper";
import { appendAudit } from "@/sync/ledger/audit";
import { markFailed } from "@/sync/ledger/repository";
import { TransientRemoteError, describeError, errorMessage } from "@/sync/errors";
import { withTimeout } from "@/sync/timeout";

/** Everything a coordinator needs for one run. */
export interface RunContext {
  runId: string;
  /** Run start; becomes last_synced for every entity pushed in this run. */
  startedAt: string;
  local: LocalStore;
  remote: RemoteStore;
  schema: SchemaMap;
  timeoutMs: number;
  mintBackfillMaxAttempts: number;
  onTimeout: () => void;
  /** Hands the run work that outlives a timed out call; the run waits for it briefly before finishing. */
  track: (task: Promise<void>) => void;
  log: Logger;
}

/** Run a store call under the per-call timeout, reporting timeouts to the run. */
export async function storeCall<T>(
  ctx: RunContext,
  step: SyncStep,
  label: string,
  call: () => Promise<T>,
): Promise<T> {
  try {
    return await withTimeout(call, ctx.timeoutMs, label, step);
  } catch (error) {
    if (error instanceof TransientRemoteError && error.timedOut) {
      ctx.onTimeout();
    }
    throw error;
  }
}

/**
 * Entity-level failure: one error audit entry, ledger marked failed,
 * last_synced untouched so the entity is retried next run.
 */
export function recordFailure(
  ctx: RunContext,
  localKey: number,
  step: SyncStep,
  error: unknown,
  remoteId?: string,
): EntityOutcome {
  const detail = describeError(error);
  ctx.log.warn("Entity failed", { localKey, step, remoteId, error: detail });
  appendAudit({
    runId: ctx.runId,
    localKey,
    action: "error",
    step,
    outcome: "failure",
    errorDetail: detail,
  });
  markFailed(localKey, errorMessage(error), remoteId);
  return { localKey, kind: "failed", step, remoteId, error: detail };
}
