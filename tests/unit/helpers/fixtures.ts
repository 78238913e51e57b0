import type { FieldRecord, LocalEntity } from "@/sync/types";
import type { EngineDeps, EngineSettings } from "@/sync";
import type { RunContext } from "@/sync/coordinators/context";
import { facilitySchemaMap } from "@/sync/schema/facility";
import { createChildLogger } from "@/sync/logger";
import { FakeLocalStore, FakeRemoteStore } from "./fake-stores";

export const T0 = "2025-03-01T08:00:00.000Z";
export const T1 = "2025-03-01T09:00:00.000Z";
export const RUN_1 = "2025-03-01T10:00:00.000Z";
export const T2 = "2025-03-01T11:00:00.000Z";
export const RUN_2 = "2025-03-01T12:00:00.000Z";
export const RUN_3 = "2025-03-01T14:00:00.000Z";

export function facilityFields(overrides: FieldRecord = {}): FieldRecord {
  return {
    name: "Harbour Bath",
    theme_code: 5800,
    description: null,
    geometry_wkt: "POINT(10.2 56.1)",
    public_access: true,
    capacity: 40,
    opened_on: "2024-05-01",
    internal_note: null,
    caretaker: "Parks department",
    inspection_due: null,
    ...overrides,
  };
}

/** The remote shape facilityFields() projects to. */
export function facilityProjection(overrides: FieldRecord = {}): FieldRecord {
  return {
    navn: "Harbour Bath",
    temakode: 5800,
    beskrivelse: null,
    geometri: "POINT(10.2 56.1)",
    offentlig: true,
    kapacitet: 40,
    aaben_fra: "2024-05-01",
    ...overrides,
  };
}

export function facility(
  localKey: number,
  options: { remoteId?: string | null; lastModified?: string; fields?: FieldRecord } = {},
): LocalEntity {
  return {
    localKey,
    remoteId: options.remoteId ?? null,
    fields: facilityFields(options.fields),
    lastModified: options.lastModified ?? T1,
  };
}

export const testSettings: EngineSettings = {
  concurrency: 2,
  remoteTimeoutMs: 50,
  timeoutAbortThreshold: 3,
  lockTtlMs: 60_000,
  mintBackfillMaxAttempts: 3,
  retention: { maxAgeDays: 0, maxRuns: 0 },
};

/** Engine deps over fake stores with a settable clock. */
export function makeDeps(settings: Partial<EngineSettings> = {}) {
  const local = new FakeLocalStore();
  const remote = new FakeRemoteStore();
  const clock = { now: new Date(RUN_1) };
  const deps: EngineDeps = {
    local,
    remote,
    schema: facilitySchemaMap,
    settings: { ...testSettings, ...settings },
    now: () => clock.now,
  };
  return { local, remote, clock, deps };
}

export function makeContext(
  local: FakeLocalStore,
  remote: FakeRemoteStore,
  overrides: Partial<RunContext> = {},
): RunContext & { timeouts: () => number; lateTasks: Promise<void>[] } {
  let timeouts = 0;
  const lateTasks: Promise<void>[] = [];
  return {
    runId: "run-1",
    startedAt: RUN_1,
    local,
    remote,
    schema: facilitySchemaMap,
    timeoutMs: 50,
    mintBackfillMaxAttempts: 3,
    log: createChildLogger("test"),
    onTimeout: () => {
      timeouts += 1;
    },
    timeouts: () => timeouts,
    track: (task) => {
      lateTasks.push(task);
    },
    lateTasks,
    ...overrides,
  };
}
