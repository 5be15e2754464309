import { sql } from "drizzle-orm";
import type { RecordStore } from "@mailsync/types";
import { StorageError } from "@mailsync/errors";
import type { DbClient } from "./client.js";
import { syncedMessages, type NewSyncedMessage } from "./schema/index.js";
import { toMessageRows } from "./message-row.js";

/**
 * Narrow write port the record store goes through. The drizzle implementation
 * below is the production one.
 */
export interface MessageWriter {
  upsertMessages(rows: NewSyncedMessage[]): Promise<void>;
}

const UNIQUE_VIOLATION = "23505";
const DUPLICATE_KEY_DETAIL = /^Key \([^)]*\)=\((.*)\) already exists/;

interface DriverErrorFields {
  code?: unknown;
  detail?: unknown;
  cause?: unknown;
}

function driverFields(err: unknown): DriverErrorFields | undefined {
  return typeof err === "object" && err !== null ? err : undefined;
}

/**
 * Translate a driver error into a StorageError. Unique violations become
 * `duplicate_key`; drizzle may wrap the driver error, so `cause` is checked too.
 */
export function toStorageError(err: unknown): StorageError {
  if (StorageError.isStorageError(err)) {
    return err;
  }

  const candidates = [driverFields(err), driverFields(driverFields(err)?.cause)];
  for (const fields of candidates) {
    if (fields?.code !== UNIQUE_VIOLATION) continue;
    const detail = typeof fields.detail === "string" ? fields.detail : "";
    const key = DUPLICATE_KEY_DETAIL.exec(detail)?.[1];
    return new StorageError(detail || "Duplicate key", "duplicate_key", { key, cause: err });
  }

  return StorageError.from(err);
}

export function createDrizzleMessageWriter(db: DbClient): MessageWriter {
  return {
    async upsertMessages(rows) {
      if (rows.length === 0) return;
      // One statement per chunk: the chunk is written entirely or not at all.
      await db
        .insert(syncedMessages)
        .values(rows)
        .onConflictDoUpdate({
          target: syncedMessages.id,
          set: {
            fromAddress: sql`excluded.from_address`,
            sentAt: sql`excluded.sent_at`,
            payload: sql`excluded.payload`,
            isManualSync: sql`excluded.is_manual_sync`,
            isProviderManualSync: sql`excluded.is_provider_manual_sync`,
            syncedAt: sql`now()`,
          },
        });
    },
  };
}

export function createRecordStore(writer: MessageWriter): RecordStore {
  return {
    async persist(records, flags) {
      try {
        await writer.upsertMessages(toMessageRows(records, flags));
      } catch (error: unknown) {
        throw toStorageError(error);
      }
    },
  };
}
