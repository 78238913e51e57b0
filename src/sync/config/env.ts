import { z } from "zod";

const intFromEnv = (fallback: string, min: number, max: number) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Number(v))
    .pipe(z.number().int().min(min).max(max));

const envSchema = z.object({
  SYNC_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),

  SYNC_LEDGER_PATH: z
    .string()
    .default("./sync_ledger.db"),
  SYNC_LOCAL_DB_PATH: z
    .string()
    .default("./local.db"),
  SYNC_REMOTE_DB_PATH: z
    .string()
    .default("./remote.db"),

  SYNC_DRY_RUN: z
    .string()
    .default("false")
    .transform((v) => v === "true"),

  SYNC_CONCURRENCY: intFromEnv("4", 1, 64),
  SYNC_REMOTE_TIMEOUT_MS: intFromEnv("10000", 1, 600_000),
  SYNC_TIMEOUT_ABORT_THRESHOLD: intFromEnv("5", 0, 10_000),
  SYNC_LOCK_TTL_MS: intFromEnv("900000", 1000, 86_400_000),
  SYNC_MINT_BACKFILL_MAX_ATTEMPTS: intFromEnv("3", 1, 1000),

  // Retention: whichever limit is reached first prunes. 0 disables a limit.
  SYNC_AUDIT_MAX_AGE_DAYS: intFromEnv("30", 0, 36_500),
  SYNC_AUDIT_MAX_RUNS: intFromEnv("5", 0, 100_000),
});

export type SyncEnv = z.infer<typeof envSchema>;

let _env: SyncEnv | null = null;

export function parseEnv(source: Record<string, string | undefined>): SyncEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const invalid = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(
      `Sync environment validation failed:\n${invalid}\n\nCopy .env.example to .env.local and fill in the values.`
    );
  }
  return result.data;
}

export function getEnv(): SyncEnv {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}

export function resetEnv(): void {
  _env = null;
}
