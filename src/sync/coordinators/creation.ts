import type { CreationState, EntityOutcome, LocalEntity, SyncStep } from "@/sync/types";
import { projectShared } from "@/sync/schema/mapper";
import { appendAudit } from "@/sync/ledger/audit";
import {
  confirmMint,
  discardUnconfirmedMint,
  findPendingMint,
  markSynced,
  recordBackfillFailure,
  recordPendingMint,
  recordUnconfirmedMint,
  setPendingMintStatus,
} from "@/sync/ledger/repository";
import {
  MintNotBackfilledError,
  MintUnconfirmedError,
  TransientRemoteError,
  describeError,
  errorMessage,
} from "@/sync/errors";
import { recordFailure, storeCall, type RunContext } from "./context";

/**
 * Drives an unlinked entity through mint → backfill → full push.
 *
 * Minting is the only non-idempotent remote call, so its result is written
 * to the pending_mints ledger before anything else happens. A retry (same
 * run or a later one) resumes from that record instead of minting again.
 * A mint that times out is recorded as unconfirmed and its answer is still
 * awaited, so a late id is kept rather than minted twice.
 * Backfill and push are keyed overwrites and safe to repeat.
 */
export class CreationCoordinator {
  constructor(private readonly ctx: RunContext) {}

  async reconcile(entity: LocalEntity): Promise<EntityOutcome> {
    const { ctx } = this;
    const { localKey } = entity;
    let state: CreationState = "unlinked";
    let step: SyncStep = "project";
    let remoteId: string | undefined;

    try {
      // Validate before spending a mint on something that cannot be pushed.
      const projection = projectShared(ctx.schema, entity.fields);

      const pending = findPendingMint(localKey);
      if (pending) {
        if (pending.remoteId === null) {
          step = "mint";
          throw new MintUnconfirmedError(localKey);
        }
        const pendingId = pending.remoteId;
        remoteId = pendingId;
        step = "backfill";
        if (pending.status === "stuck" || pending.attempts >= ctx.mintBackfillMaxAttempts) {
          if (pending.status !== "stuck") setPendingMintStatus(localKey, "stuck");
          throw new MintNotBackfilledError(localKey, pendingId, pending.attempts);
        }
        ctx.log.info("Resuming pending mint", { localKey, remoteId, attempts: pending.attempts });
      } else {
        step = "mint";
        const minted = await this.mint(localKey);
        remoteId = minted;
        recordPendingMint(localKey, minted, ctx.runId);
        appendAudit({ runId: ctx.runId, localKey, action: "create-mint", outcome: "success" });
      }
      state = "minting";

      step = "backfill";
      const linkedId = remoteId;
      await this.backfill(localKey, linkedId);
      setPendingMintStatus(localKey, "backfilled");
      appendAudit({ runId: ctx.runId, localKey, action: "create-backfill", outcome: "success" });
      state = "backfilled";

      step = "push";
      await storeCall(ctx, "push", `pushing ${linkedId}`, () => ctx.remote.writeProjection(linkedId, projection));
      appendAudit({ runId: ctx.runId, localKey, action: "create-push", outcome: "success" });
      markSynced(localKey, linkedId, ctx.startedAt);
      state = "pushed";

      ctx.log.info("Created remote object", { localKey, remoteId: linkedId, state });
      return { localKey, kind: "created", remoteId: linkedId };
    } catch (error) {
      ctx.log.debug("Creation stopped", { localKey, state, step });
      return recordFailure(ctx, localKey, step, error, remoteId);
    }
  }

  /** Dry run: validate the projection and report what would be created. */
  plan(entity: LocalEntity): EntityOutcome {
    try {
      projectShared(this.ctx.schema, entity.fields);
      const pending = findPendingMint(entity.localKey);
      return { localKey: entity.localKey, kind: "would-create", remoteId: pending?.remoteId ?? undefined };
    } catch (error) {
      return { localKey: entity.localKey, kind: "failed", step: "project", error: describeError(error) };
    }
  }

  private async mint(localKey: number): Promise<string> {
    const { ctx } = this;
    const minting = ctx.remote.mint();
    try {
      return await storeCall(ctx, "mint", `minting id for ${localKey}`, () => minting);
    } catch (error) {
      if (error instanceof TransientRemoteError && error.timedOut) {
        recordUnconfirmedMint(localKey, ctx.runId);
        ctx.track(this.settleLateMint(localKey, minting));
      }
      throw error;
    }
  }

  private async settleLateMint(localKey: number, minting: Promise<string>): Promise<void> {
    const { ctx } = this;
    let remoteId: string;
    try {
      remoteId = await minting;
    } catch (error) {
      discardUnconfirmedMint(localKey);
      ctx.log.info("Timed out mint failed at the remote store", { localKey, error: errorMessage(error) });
      return;
    }
    if (!confirmMint(localKey, remoteId)) {
      ctx.log.warn("Late mint answer arrived after the key was settled", { localKey, remoteId });
      return;
    }
    appendAudit({ runId: ctx.runId, localKey, action: "create-mint", outcome: "success" });
    ctx.log.warn("Recorded late mint; the next run resumes it", { localKey, remoteId });
  }

  private async backfill(localKey: number, remoteId: string): Promise<void> {
    const { ctx } = this;
    try {
      await storeCall(ctx, "backfill", `linking ${localKey}`, () => ctx.local.writeLinkage(localKey, remoteId));
    } catch (error) {
      const attempts = recordBackfillFailure(localKey);
      if (attempts >= ctx.mintBackfillMaxAttempts) {
        setPendingMintStatus(localKey, "stuck");
        throw new MintNotBackfilledError(localKey, remoteId, attempts);
      }
      throw error;
    }
  }
}
