/**
 * A record as delivered by the sync source: a string-keyed mapping whose
 * values are loosely typed. The pipeline never mutates it.
 */
export type RawRecord = Readonly<Record<string, unknown>>;

/**
 * Tagged view over a single record field. Only the record validator reads
 * fields through this shape; every later stage works with `RawRecord`.
 */
export type LooseValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "mapping"; value: RawRecord }
  | { kind: "absent" }
  | { kind: "other"; value: unknown };

export interface SyncFlags {
  isManualSync: boolean;
  isProviderManualSync: boolean;
}

// Fields the sync source uses for the sender; either one satisfies validation.
export const ORIGIN_ADDRESS_FIELDS = ["from_address", "from"] as const;

export const SYNC_DATE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSSSS'Z'";

/**
 * Storage collaborator. `persist` writes one chunk atomically and rejects
 * with a `StorageError` when nothing was written. Implementations must
 * tolerate records they have already stored.
 */
export interface RecordStore {
  persist(records: readonly RawRecord[], flags: SyncFlags): Promise<void>;
}
