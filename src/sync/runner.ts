import type { SyncEnv } from "@/sync/config/env";
import type { RunMode, RunSummary } from "@/sync/types";
import { exitStatus, runReconciliation, settingsFromEnv } from "@/sync";
import { openStores, type OpenStores } from "@/sync/stores";
import { RunAbortedError, RunLockError, errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("runner");

export interface RunResult {
  /** 0 = full success, 1 = entity failures pending retry, 2 = fatal abort. */
  code: 0 | 1 | 2;
  summary?: RunSummary;
  error?: string;
  lockHeld?: boolean;
}

/** Open the configured stores, run once, close them again. Never throws. */
export async function runOnce(
  env: SyncEnv,
  options: { dryRun: boolean; mode: RunMode },
): Promise<RunResult> {
  let stores: OpenStores;
  try {
    stores = openStores(env);
  } catch (error) {
    log.error("Could not open stores", { error: errorMessage(error) });
    return { code: 2, error: errorMessage(error) };
  }

  try {
    const summary = await runReconciliation(
      { local: stores.local, remote: stores.remote, schema: stores.schema, settings: settingsFromEnv(env) },
      options,
    );
    return { code: exitStatus(summary), summary };
  } catch (error) {
    if (error instanceof RunAbortedError) {
      return { code: 2, summary: error.summary, error: error.message };
    }
    if (error instanceof RunLockError) {
      return { code: 2, error: error.message, lockHeld: true };
    }
    log.error("Run failed before it started", { error: errorMessage(error) });
    return { code: 2, error: errorMessage(error) };
  } finally {
    stores.close();
  }
}
