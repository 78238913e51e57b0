import * as p from "@clack/prompts";
import type { SyncEnv } from "@/sync/config/env";
import type { RunSummary } from "@/sync/types";
import { runOnce } from "@/sync/runner";
import { formatCounts } from "./commands";

function describePlan(summary: RunSummary): string[] {
  const { wouldCreate, wouldUpdate, skipped, failed } = summary.counts;
  const lines: string[] = [];
  if (wouldCreate > 0) lines.push(`${wouldCreate} new facilities to register`);
  if (wouldUpdate > 0) lines.push(`${wouldUpdate} facilities with changed fields`);
  if (skipped > 0) lines.push(`${skipped} already up to date`);
  if (failed > 0) lines.push(`${failed} that cannot be pushed as they stand`);
  return lines;
}

function listFailures(summary: RunSummary): void {
  for (const outcome of summary.outcomes) {
    if (outcome.kind !== "failed") continue;
    p.log.message(`  #${outcome.localKey} (${outcome.step ?? "?"}): ${outcome.error ?? "unknown error"}`);
  }
}

export async function runInteractiveSync(env: SyncEnv, dryRun: boolean): Promise<number> {
  p.intro("Facility Sync");

  const planSpinner = p.spinner();
  planSpinner.start("Checking the local register for changes...");
  const plan = await runOnce(env, { dryRun: true, mode: "interactive" });
  if (plan.code === 2 || !plan.summary) {
    planSpinner.stop("Could not check for changes.");
    p.log.error(plan.error ?? "Unknown error");
    p.outro("Sync could not start. Check your settings and try again.");
    return 2;
  }
  planSpinner.stop("Changes checked.");

  const { wouldCreate, wouldUpdate, failed } = plan.summary.counts;
  if (wouldCreate + wouldUpdate + failed === 0) {
    p.log.success("Everything is up to date!");
    p.outro("Nothing to sync.");
    return 0;
  }

  p.log.info("Changes detected:");
  for (const line of describePlan(plan.summary)) {
    p.log.message(`  ${line}`);
  }
  if (failed > 0) listFailures(plan.summary);

  if (dryRun) {
    p.log.warn("Dry run: nothing will be written to either register.");
    p.outro("Done!");
    return 0;
  }

  const confirmed = await p.confirm({ message: "Push these changes to the national register?" });
  if (p.isCancel(confirmed) || !confirmed) {
    p.outro("Sync cancelled.");
    return 0;
  }

  const syncSpinner = p.spinner();
  syncSpinner.start("Syncing...");
  const result = await runOnce(env, { dryRun: false, mode: "interactive" });

  if (!result.summary) {
    syncSpinner.stop("Sync failed.");
    p.log.error(result.error ?? "Unknown error");
    p.outro(result.lockHeld ? "Another sync is already running." : "Nothing was changed.");
    return result.code;
  }

  syncSpinner.stop(result.code === 2 ? "Sync aborted." : "Sync finished.");
  const counts = formatCounts(result.summary);
  if (result.code === 0) {
    p.log.success(counts);
  } else {
    p.log.warn(counts);
    listFailures(result.summary);
    if (result.code === 2) p.log.error(result.error ?? "Run aborted");
    else p.log.info("Failed facilities will be retried on the next run.");
  }

  p.outro("Done!");
  return result.code;
}
