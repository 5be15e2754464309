import { pgTable, text, timestamp, jsonb, boolean } from "drizzle-orm/pg-core";

export const syncedMessages = pgTable("synced_messages", {
  id: text("id").primaryKey(),
  fromAddress: text("from_address"),
  sentAt: timestamp("sent_at", { withTimezone: true }),
  payload: jsonb("payload").$type<Record<string, unknown>>().notNull(),
  isManualSync: boolean("is_manual_sync").notNull().default(false),
  isProviderManualSync: boolean("is_provider_manual_sync").notNull().default(false),
  syncedAt: timestamp("synced_at", { withTimezone: true }).notNull().defaultNow(),
});

export type SyncedMessage = typeof syncedMessages.$inferSelect;
export type NewSyncedMessage = typeof syncedMessages.$inferInsert;
