import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- Tables ----------

export const feeds = sqliteTable("feeds", {
  name: text("name").primaryKey(),
  url: text("url").notNull(),
  createdAt: integer("created_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
});

export const seenEntries = sqliteTable("seen_entries", {
  feedUrl: text("feed_url").primaryKey(),
  entryIds: text("entry_ids", { mode: "json" }).$type<Array<string>>().notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp" }).notNull(),
});
