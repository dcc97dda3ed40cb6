import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import { feeds, seenEntries } from "../db/schema";

/**
 * Creates an in-memory SQLite test database with both tables created.
 * @returns A new AppDatabase instance.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  return db;
}

/**
 * Seeds a test feed into the database with optional field overrides.
 * @param db - The AppDatabase instance to seed into.
 * @param overrides - Optional fields replacing the default test feed values.
 * @returns The name of the inserted feed.
 */
export function seedTestFeed(
  db: AppDatabase,
  overrides?: Partial<typeof feeds.$inferInsert>,
): string {
  const result = db
    .insert(feeds)
    .values({
      name: "Test Feed",
      url: "https://example.com/rss",
      ...overrides,
    })
    .returning({ name: feeds.name })
    .get();

  return result.name;
}

/**
 * Seeds a seen-set row for a feed URL.
 * @param db - The AppDatabase instance to seed into.
 * @param feedUrl - The feed URL the ids belong to.
 * @param entryIds - Ids to record as already seen.
 */
export function seedSeenEntries(
  db: AppDatabase,
  feedUrl: string,
  entryIds: ReadonlyArray<string>,
): void {
  db.insert(seenEntries)
    .values({ feedUrl, entryIds: [...entryIds], updatedAt: new Date() })
    .run();
}
