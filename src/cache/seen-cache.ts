import { eq } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { seenEntries } from "../db/schema";

export type SeenEntryCache = {
  /** Stored ids for a feed URL, or `null` when the URL has never been recorded. */
  readonly get: (feedUrl: string) => ReadonlySet<string> | null;
  readonly save: (feedUrl: string, entryIds: ReadonlySet<string>) => void;
};

export function createSeenEntryCache(db: AppDatabase): SeenEntryCache {
  return {
    get(feedUrl) {
      const row = db
        .select({ entryIds: seenEntries.entryIds })
        .from(seenEntries)
        .where(eq(seenEntries.feedUrl, feedUrl))
        .get();

      return row ? new Set(row.entryIds) : null;
    },

    save(feedUrl, entryIds) {
      const ids = [...entryIds].sort();
      const updatedAt = new Date();

      db.insert(seenEntries)
        .values({ feedUrl, entryIds: ids, updatedAt })
        .onConflictDoUpdate({
          target: seenEntries.feedUrl,
          set: { entryIds: ids, updatedAt },
        })
        .run();
    },
  };
}
