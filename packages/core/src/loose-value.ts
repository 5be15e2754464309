import { z } from "zod";
import type { LooseValue, RawRecord } from "@mailsync/types";

// Accepts plain objects only: arrays, null, Dates and Maps are rejected.
const rawRecordSchema = z.record(z.string(), z.unknown());

export function isRawRecord(value: unknown): value is RawRecord {
  return rawRecordSchema.safeParse(value).success;
}

/**
 * Read one field of a record as a tagged loose value. `null` and missing
 * keys both read as absent.
 */
export function readField(record: RawRecord, key: string): LooseValue {
  const value = Object.hasOwn(record, key) ? record[key] : undefined;

  if (value === undefined || value === null) {
    return { kind: "absent" };
  }
  if (typeof value === "string") {
    return { kind: "string", value };
  }
  if (typeof value === "number") {
    return { kind: "number", value };
  }
  if (isRawRecord(value)) {
    return { kind: "mapping", value };
  }
  return { kind: "other", value };
}
