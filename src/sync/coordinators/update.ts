import type { EntityOutcome, FieldRecord, LocalEntity, SyncStep } from "@/sync/types";
import { diffProjection, projectShared, readRemoteProjection, type ProjectionDiff } from "@/sync/schema/mapper";
import { appendAudit } from "@/sync/ledger/audit";
import { markSynced } from "@/sync/ledger/repository";
import { OrphanIdentifierError, describeError } from "@/sync/errors";
import { recordFailure, storeCall, type RunContext } from "./context";

/**
 * Pushes a linked entity's shared-field changes. One-directional: for
 * shared columns the local value always overwrites the remote one. Only
 * columns that differ are written, so remote columns outside the diff are
 * left alone.
 */
export class UpdateCoordinator {
  constructor(private readonly ctx: RunContext) {}

  async reconcile(entity: LocalEntity, remoteId: string): Promise<EntityOutcome> {
    const { ctx } = this;
    const { localKey } = entity;
    let step: SyncStep = "project";

    try {
      const { changes, fieldsChanged } = await this.diff(entity, remoteId, (s) => {
        step = s;
      });

      if (fieldsChanged.length === 0) {
        // Typically a local-only column was edited; still counts as handled.
        appendAudit({ runId: ctx.runId, localKey, action: "skip", outcome: "success" });
        markSynced(localKey, remoteId, ctx.startedAt);
        return { localKey, kind: "skipped", remoteId };
      }

      step = "push";
      await storeCall(ctx, "push", `pushing ${remoteId}`, () => ctx.remote.writeProjection(remoteId, changes));
      appendAudit({ runId: ctx.runId, localKey, action: "update-push", fieldsChanged, outcome: "success" });
      markSynced(localKey, remoteId, ctx.startedAt);

      ctx.log.info("Updated remote object", { localKey, remoteId, fieldsChanged });
      return { localKey, kind: "updated", remoteId, fieldsChanged };
    } catch (error) {
      return recordFailure(ctx, localKey, step, error, remoteId);
    }
  }

  /** Dry run: read and diff, write nothing. */
  async plan(entity: LocalEntity, remoteId: string): Promise<EntityOutcome> {
    let step: SyncStep = "project";
    try {
      const { fieldsChanged } = await this.diff(entity, remoteId, (s) => {
        step = s;
      });
      return fieldsChanged.length === 0
        ? { localKey: entity.localKey, kind: "skipped", remoteId }
        : { localKey: entity.localKey, kind: "would-update", remoteId, fieldsChanged };
    } catch (error) {
      return { localKey: entity.localKey, kind: "failed", step, remoteId, error: describeError(error) };
    }
  }

  private async diff(
    entity: LocalEntity,
    remoteId: string,
    enter: (step: SyncStep) => void,
  ): Promise<ProjectionDiff> {
    const { ctx } = this;
    enter("project");
    const projection = projectShared(ctx.schema, entity.fields);

    enter("read");
    const raw: FieldRecord | null = await storeCall(ctx, "read", `reading ${remoteId}`, () =>
      ctx.remote.readProjection(remoteId),
    );
    if (raw === null) {
      throw new OrphanIdentifierError(remoteId, { step: "read" });
    }
    const current = readRemoteProjection(ctx.schema, raw);

    enter("diff");
    return diffProjection(projection, current);
  }
}
