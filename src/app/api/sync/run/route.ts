import { NextRequest, NextResponse } from "next/server";
import { runRequestSchema } from "@/sync/types/api";
import { getEnv } from "@/sync/config/env";
import { runOnce } from "@/sync/runner";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("api-run");

export const runtime = "nodejs";
export const maxDuration = 300;

const STATUS_BY_CODE = { 0: 200, 1: 207, 2: 500 } as const;

/**
 * POST /api/sync/run: run one reconciliation pass.
 *
 * Body (optional):
 *   dryRun?: boolean
 */
export async function POST(request: NextRequest) {
  const text = await request.text();
  let body: unknown = {};
  if (text.trim() !== "") {
    try {
      body = JSON.parse(text);
    } catch {
      return NextResponse.json({ error: "Invalid JSON in request body" }, { status: 400 });
    }
  }

  const parsed = runRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json(
      { error: "Invalid request", details: parsed.error.issues },
      { status: 400 },
    );
  }

  let env: ReturnType<typeof getEnv>;
  try {
    env = getEnv();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error("Sync environment invalid", { error: message });
    return NextResponse.json({ error: "Sync is not configured", message }, { status: 500 });
  }

  log.info("Run triggered via API", { dryRun: parsed.data.dryRun });
  const result = await runOnce(env, { dryRun: parsed.data.dryRun, mode: "automated" });

  if (result.lockHeld) {
    return NextResponse.json({ error: "A run is already in progress", message: result.error }, { status: 409 });
  }

  const status = result.code === 2 ? "aborted" : result.code === 1 ? "completed_with_errors" : "completed";
  log.info("Run finished via API", { status, counts: result.summary?.counts });
  return NextResponse.json(
    {
      runId: result.summary?.runId ?? null,
      status,
      exitCode: result.code,
      error: result.error,
      summary: result.summary ?? null,
    },
    { status: STATUS_BY_CODE[result.code] },
  );
}
