import { parseISO, isValid } from "date-fns";
import type { RawRecord, SyncFlags } from "@mailsync/types";
import { StorageError } from "@mailsync/errors";
import type { NewSyncedMessage } from "./schema/index.js";

function scalarText(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

// Object keys are emitted sorted so equal ids always produce the same text.
function sortKeys(_key: string, value: unknown): unknown {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(
      Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
    );
  }
  return value;
}

/**
 * Primary key for a record. Strings and numbers are used as text; any other
 * id (a provider mapping, an array, a boolean) is keyed by its canonical JSON.
 */
export function messageKey(id: unknown): string {
  const scalar = scalarText(id);
  if (scalar !== undefined) return scalar;

  let json: string | undefined;
  try {
    json = JSON.stringify(id, sortKeys);
  } catch (error: unknown) {
    throw new StorageError("Record id cannot be used as a key", "save_failed", { cause: error });
  }
  if (json === undefined) {
    throw new StorageError("Record id cannot be used as a key");
  }
  return json;
}

function senderAddress(record: RawRecord): string | null {
  const fromAddress = record["from_address"];
  if (typeof fromAddress === "string") {
    return fromAddress;
  }
  if (typeof fromAddress === "object" && fromAddress !== null && "email" in fromAddress) {
    const email = scalarText(fromAddress.email);
    if (email !== undefined) return email;
  }
  return scalarText(record["from"]) ?? null;
}

function sentAt(record: RawRecord): Date | null {
  const date = record["date"];
  if (typeof date !== "string") return null;
  const parsed = parseISO(date);
  return isValid(parsed) ? parsed : null;
}

/**
 * Map a validated record to a `synced_messages` row. The full record is kept
 * in `payload`.
 */
export function toMessageRow(record: RawRecord, flags: SyncFlags): NewSyncedMessage {
  return {
    id: messageKey(record["id"]),
    fromAddress: senderAddress(record),
    sentAt: sentAt(record),
    payload: { ...record },
    isManualSync: flags.isManualSync,
    isProviderManualSync: flags.isProviderManualSync,
  };
}

/**
 * Map a chunk to rows, keeping only the last record for each id. A single
 * upsert statement may not touch the same row twice.
 */
export function toMessageRows(records: readonly RawRecord[], flags: SyncFlags): NewSyncedMessage[] {
  const byId = new Map<string, NewSyncedMessage>();
  for (const record of records) {
    const row = toMessageRow(record, flags);
    byId.delete(row.id);
    byId.set(row.id, row);
  }
  return [...byId.values()];
}
