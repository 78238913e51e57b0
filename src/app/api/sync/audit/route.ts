import { NextRequest, NextResponse } from "next/server";
import { auditQuerySchema, toAuditFilter } from "@/sync/types/api";
import { queryAudit } from "@/sync/ledger/audit";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("api-audit");

export const runtime = "nodejs";

/**
 * GET /api/sync/audit?run=&key=&action=&outcome=&since=&until=&limit=
 */
export async function GET(request: NextRequest) {
  const params = Object.fromEntries(request.nextUrl.searchParams.entries());
  const parsed = auditQuerySchema.safeParse(params);
  if (!parsed.success) {
    return NextResponse.json(
      { error: "Invalid query", details: parsed.error.issues },
      { status: 400 },
    );
  }

  try {
    const entries = queryAudit(toAuditFilter(parsed.data));
    return NextResponse.json({ count: entries.length, entries });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error("Audit query failed", { error: message });
    return NextResponse.json({ error: "Audit query failed", message }, { status: 500 });
  }
}
