import { randomUUID } from "crypto";
import { Semaphore } from "async-mutex";
import type { EntityOutcome, LocalEntity, RunCounts, RunMode, RunSummary } from "@/sync/types";
import type { LocalStore, RemoteStore } from "@/sync/stores/types";
import type { SchemaMap } from "@/sync/schema/mapper";
import type { RetentionPolicy } from "@/sync/ledger/types";
import type { SyncEnv } from "@/sync/config/env";
import { createChildLogger } from "@/sync/logger";
import { detectChanges } from "@/sync/ledger/change-detector";
import { appendAudit, pruneAudit } from "@/sync/ledger/audit";
import {
  acquireRunLock,
  completeRun,
  confirmMint,
  createRun,
  findPendingMint,
  findRecord,
  getWatermark,
  releaseRunLock,
  setPendingMintStatus,
} from "@/sync/ledger/repository";
import { classify, needsPush } from "@/sync/link-state";
import { CreationCoordinator } from "@/sync/coordinators/creation";
import { UpdateCoordinator } from "@/sync/coordinators/update";
import type { RunContext } from "@/sync/coordinators/context";
import { RunAbortedError, StoreUnavailableError, SyncError, errorMessage } from "@/sync/errors";
import { withTimeout } from "@/sync/timeout";

export interface EngineSettings {
  concurrency: number;
  remoteTimeoutMs: number;
  /** Timeouts tolerated in one run; one more aborts it. */
  timeoutAbortThreshold: number;
  lockTtlMs: number;
  mintBackfillMaxAttempts: number;
  retention: RetentionPolicy;
}

export interface EngineDeps {
  local: LocalStore;
  remote: RemoteStore;
  schema: SchemaMap;
  settings: EngineSettings;
  now?: () => Date;
}

export interface RunOptions {
  dryRun?: boolean;
  mode?: RunMode;
  /** Stops scheduling new entities; in-flight ones finish their current step chain. */
  signal?: AbortSignal;
}

export function settingsFromEnv(env: SyncEnv): EngineSettings {
  return {
    concurrency: env.SYNC_CONCURRENCY,
    remoteTimeoutMs: env.SYNC_REMOTE_TIMEOUT_MS,
    timeoutAbortThreshold: env.SYNC_TIMEOUT_ABORT_THRESHOLD,
    lockTtlMs: env.SYNC_LOCK_TTL_MS,
    mintBackfillMaxAttempts: env.SYNC_MINT_BACKFILL_MAX_ATTEMPTS,
    retention: {
      maxAgeDays: env.SYNC_AUDIT_MAX_AGE_DAYS,
      maxRuns: env.SYNC_AUDIT_MAX_RUNS,
    },
  };
}

/**
 * One reconciliation pass. Entity failures are recorded and do not stop
 * the run; the watermark advances to the run's start time once every
 * entity has been handled. Run-level failures throw RunAbortedError and
 * leave the watermark where it was.
 */
export async function runReconciliation(deps: EngineDeps, options?: RunOptions): Promise<RunSummary> {
  const { local, remote, schema, settings } = deps;
  const now = deps.now ?? (() => new Date());
  const dryRun = options?.dryRun ?? false;
  const mode = options?.mode ?? "automated";

  const runId = randomUUID();
  const started = now();
  const startedAt = started.toISOString();
  const log = createChildLogger("reconcile", { runId });
  const outcomes: EntityOutcome[] = [];
  const lateTasks: Promise<void>[] = [];

  acquireRunLock(runId, started, settings.lockTtlMs);
  try {
    const watermarkBefore = getWatermark();
    createRun(runId, startedAt, watermarkBefore, mode, dryRun);
    log.info("Starting reconciliation run", { watermarkBefore, dryRun, mode });

    try {
      let haltReason: string | null = null;
      let timeouts = 0;
      let notStarted = 0;
      const halted = (honourCancel = true) =>
        haltReason ?? (honourCancel && options?.signal?.aborted ? "Run cancelled" : null);

      const ctx: RunContext = {
        runId,
        startedAt,
        local,
        remote,
        schema,
        timeoutMs: settings.remoteTimeoutMs,
        mintBackfillMaxAttempts: settings.mintBackfillMaxAttempts,
        log,
        track: (task) => {
          lateTasks.push(
            task.catch((error: unknown) => {
              log.error("Recording a late store answer failed", { error: errorMessage(error) });
            }),
          );
        },
        onTimeout: () => {
          timeouts += 1;
          if (timeouts > settings.timeoutAbortThreshold && !haltReason) {
            haltReason = `Store timeouts (${timeouts}) exceeded threshold of ${settings.timeoutAbortThreshold}`;
            log.error("Halting run", { reason: haltReason });
          }
        },
      };

      await ensureReachable(remote, settings.remoteTimeoutMs);
      const entities = await detect(local, watermarkBefore, settings.remoteTimeoutMs);

      const creation = new CreationCoordinator(ctx);
      const update = new UpdateCoordinator(ctx);

      const processEntity = async (entity: LocalEntity): Promise<EntityOutcome> => {
        const link = classify(entity);
        if (link.state === "unlinked") {
          return dryRun ? creation.plan(entity) : creation.reconcile(entity);
        }

        if (!dryRun) settlePendingMint(entity.localKey, link.remoteId, log);
        const record = findRecord(entity.localKey);
        if (!needsPush(entity, record?.lastSynced ?? null) && record?.syncStatus !== "failed") {
          if (!dryRun) {
            appendAudit({ runId, localKey: entity.localKey, action: "skip", outcome: "success" });
          }
          return { localKey: entity.localKey, kind: "skipped", remoteId: link.remoteId };
        }
        return dryRun ? update.plan(entity, link.remoteId) : update.reconcile(entity, link.remoteId);
      };

      const semaphore = new Semaphore(settings.concurrency);
      const settled = await Promise.allSettled(
        entities.map((entity) =>
          semaphore.runExclusive(async () => {
            if (halted()) {
              notStarted += 1;
              return;
            }
            outcomes.push(await processEntity(entity));
          }),
        ),
      );
      await awaitLateTasks(lateTasks, settings.remoteTimeoutMs, log);
      for (const result of settled) {
        if (result.status === "rejected") throw result.reason;
      }

      // A cancellation that lands after the last entity started changes nothing.
      const reason = halted(notStarted > 0);
      if (reason) {
        throw new SyncError(`${reason}; ${notStarted} entities not started`);
      }

      const completedAt = now().toISOString();
      const summary = buildSummary({
        runId,
        startedAt,
        completedAt,
        watermarkBefore,
        watermarkAfter: dryRun ? null : startedAt,
        dryRun,
        status: dryRun ? "dry-run" : "completed",
        outcomes,
      });
      completeRun(runId, summary.status === "dry-run" ? "dry-run" : "completed", summary.counts, {
        completedAt,
        watermarkAfter: summary.watermarkAfter,
      });
      log.info("Reconciliation run complete", { counts: summary.counts, watermarkAfter: summary.watermarkAfter });

      if (!dryRun) pruneAfterRun(settings.retention, now(), log);
      return summary;
    } catch (error) {
      await awaitLateTasks(lateTasks, settings.remoteTimeoutMs, log);
      const message = errorMessage(error);
      log.error("Reconciliation run aborted", { error: message });
      const summary = buildSummary({
        runId,
        startedAt,
        completedAt: null,
        watermarkBefore,
        watermarkAfter: null,
        dryRun,
        status: "aborted",
        outcomes,
      });
      completeRun(runId, "aborted", summary.counts, { completedAt: now().toISOString(), errorMessage: message });
      throw new RunAbortedError(`Run aborted: ${message}`, summary, error);
    }
  } finally {
    releaseRunLock(runId);
  }
}

/** 0 = full success, 1 = entity failures pending retry, 2 = fatal abort. */
export function exitStatus(summary: RunSummary): 0 | 1 | 2 {
  if (summary.status === "aborted") return 2;
  return summary.counts.failed > 0 ? 1 : 0;
}

async function ensureReachable(remote: RemoteStore, timeoutMs: number): Promise<void> {
  try {
    await withTimeout(() => remote.ping(), timeoutMs, "remote ping");
  } catch (error) {
    throw new StoreUnavailableError("remote", error);
  }
}

async function detect(local: LocalStore, watermark: string | null, timeoutMs: number): Promise<LocalEntity[]> {
  try {
    return await withTimeout(() => detectChanges(local, watermark), timeoutMs, "change detection");
  } catch (error) {
    throw new StoreUnavailableError("local", error);
  }
}

/**
 * Give late answers to timed out calls one more timeout period to land.
 * Whatever is still outstanding stays recorded as unconfirmed.
 */
async function awaitLateTasks(
  tasks: Promise<void>[],
  graceMs: number,
  log: ReturnType<typeof createChildLogger>,
): Promise<void> {
  const waiting = tasks.splice(0);
  if (waiting.length === 0) return;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const grace = new Promise<"grace">((resolve) => {
    timer = setTimeout(() => resolve("grace"), graceMs);
  });
  try {
    const result = await Promise.race([Promise.all(waiting).then(() => "settled" as const), grace]);
    if (result === "grace") {
      log.warn("Timed out mints still unanswered; they stay unconfirmed", { count: waiting.length });
    }
  } finally {
    clearTimeout(timer);
  }
}

/**
 * A linked entity with an open pending mint for the same id was linked
 * outside the coordinator (a crash after backfill, or a manual repair).
 * An unconfirmed mint is settled by whatever id the entity was linked to.
 */
function settlePendingMint(localKey: number, remoteId: string, log: ReturnType<typeof createChildLogger>): void {
  const pending = findPendingMint(localKey);
  if (!pending) return;
  if (pending.remoteId === null) confirmMint(localKey, remoteId);
  if (pending.remoteId === null || pending.remoteId === remoteId) {
    setPendingMintStatus(localKey, "backfilled");
    log.info("Settled pending mint for linked entity", { localKey, remoteId });
  } else {
    log.warn("Entity is linked to a different id than its pending mint", {
      localKey,
      linkedId: remoteId,
      pendingId: pending.remoteId,
    });
  }
}

function pruneAfterRun(policy: RetentionPolicy, now: Date, log: ReturnType<typeof createChildLogger>): void {
  try {
    pruneAudit(policy, now);
  } catch (error) {
    log.error("Audit pruning failed", { error: errorMessage(error) });
  }
}

function buildSummary(input: Omit<RunSummary, "counts">): RunSummary {
  const count = (kind: EntityOutcome["kind"]) => input.outcomes.filter((o) => o.kind === kind).length;
  const counts: RunCounts = {
    created: count("created"),
    updated: count("updated"),
    skipped: count("skipped"),
    failed: count("failed"),
    wouldCreate: count("would-create"),
    wouldUpdate: count("would-update"),
  };
  return { ...input, counts };
}

export type { RunSummary, EntityOutcome } from "@/sync/types";
