import { z } from "zod";
import type { SchemaMap } from "./mapper";

export const THEME_CODES = [5800, 5801, 5802] as const;

const themeCode = z
  .number()
  .int()
  .refine((v) => THEME_CODES.some((code) => code === v), "theme code must be 5800 (point), 5801 (area) or 5802 (route)");

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

/**
 * Municipal facility register (local) against the national register (remote).
 */
export const facilitySchemaMap: SchemaMap = {
  local: {
    table: "facilities",
    keyColumn: "local_key",
    linkageColumn: "remote_id",
    lastModifiedColumn: "last_modified",
  },
  remote: {
    table: "facilitet",
    idColumn: "objekt_id",
  },
  shared: [
    { local: "name", remote: "navn", kind: "text", schema: z.string().min(1).max(120) },
    { local: "theme_code", remote: "temakode", kind: "integer", schema: themeCode },
    { local: "description", remote: "beskrivelse", kind: "text", schema: z.string().max(2000).nullable() },
    { local: "geometry_wkt", remote: "geometri", kind: "text", schema: z.string().min(1) },
    { local: "public_access", remote: "offentlig", kind: "boolean", schema: z.boolean() },
    { local: "capacity", remote: "kapacitet", kind: "integer", schema: z.number().int().nonnegative().nullable() },
    { local: "opened_on", remote: "aaben_fra", kind: "text", schema: isoDate.nullable() },
  ],
  localOnly: [
    { column: "internal_note", kind: "text" },
    { column: "caretaker", kind: "text" },
    { column: "inspection_due", kind: "text" },
  ],
};
