export * from "./schema/index.js";
export { createDbClient, type DbClient, type DbClientOptions, type DbConnection } from "./client.js";
export { toMessageRow, toMessageRows, messageKey } from "./message-row.js";
export {
  createRecordStore,
  createDrizzleMessageWriter,
  toStorageError,
  type MessageWriter,
} from "./record-store.js";
