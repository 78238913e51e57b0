import "./load-env";
import { runInteractiveSync } from "./interactive";
import { formatAuditEntry, formatPendingMint, parseArgs } from "./commands";
import { getEnv } from "@/sync/config/env";
import { runOnce } from "@/sync/runner";
import { queryAudit, pruneAudit } from "@/sync/ledger/audit";
import { listOpenPendingMints } from "@/sync/ledger/repository";
import { toAuditFilter } from "@/sync/types/api";
import { closeDatabase } from "@/sync/ledger/db";
import { settingsFromEnv } from "@/sync";

async function main(): Promise<number> {
  const env = getEnv();
  const command = parseArgs(process.argv.slice(2), env.SYNC_DRY_RUN);

  switch (command.kind) {
    case "run": {
      // Headless mode: one run, JSON summary on stdout, exit status for the scheduler
      const result = await runOnce(env, { dryRun: command.dryRun, mode: "automated" });
      console.log(JSON.stringify({ code: result.code, error: result.error, summary: result.summary }, null, 2));
      return result.code;
    }
    case "audit": {
      const entries = queryAudit(toAuditFilter(command.query));
      for (const entry of entries) console.log(formatAuditEntry(entry));
      if (entries.length === 0) console.error("No matching audit entries.");
      return 0;
    }
    case "prune": {
      const pruned = pruneAudit(settingsFromEnv(env).retention);
      console.log(`Pruned ${pruned} audit entries.`);
      return 0;
    }
    case "pending": {
      const mints = listOpenPendingMints();
      for (const mint of mints) console.log(formatPendingMint(mint));
      if (mints.length === 0) console.error("No open pending mints.");
      return 0;
    }
    case "interactive":
      return runInteractiveSync(env, command.dryRun);
  }
}

main()
  .then((code) => {
    closeDatabase();
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Sync failed:", err instanceof Error ? err.message : String(err));
    closeDatabase();
    process.exit(2);
  });
