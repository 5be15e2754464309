export { syncedMessages } from "./synced-messages.js";
export type { SyncedMessage, NewSyncedMessage } from "./synced-messages.js";
