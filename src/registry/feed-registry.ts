import { asc, count, eq, gt } from "drizzle-orm";
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import { feeds } from "../db/schema";
import { DuplicateNameError, NotFoundError } from "../errors";
import type { Feed, FeedChanges, ImportResult } from "./types";

export type FeedRegistry = {
  readonly get: (name: string) => Feed | null;
  readonly count: () => number;
  readonly add: (name: string, url: string) => Feed;
  readonly renameOrUpdate: (name: string, changes: FeedChanges) => Feed;
  readonly updateUrl: (name: string, url: string) => Feed;
  readonly delete: (name: string) => void;
  readonly list: () => Iterable<Feed>;
  readonly importFeeds: (entries: ReadonlyArray<Feed>) => ImportResult;
};

export type FeedRegistryOptions = {
  /** Rows `list()` reads per query. */
  readonly listPageSize?: number;
};

const DEFAULT_LIST_PAGE_SIZE = 100;

/**
 * Name → URL registry backed by the `feeds` table.
 *
 * Every mutation checks its preconditions before writing, so a rejected call
 * leaves the table untouched. A rename deletes the old row and inserts the new
 * one inside a single transaction.
 *
 * `list()` is lazy: it reads the table a page at a time, keyed on the last
 * name it yielded, so no statement stays open between pages.
 */
export function createFeedRegistry(
  db: AppDatabase,
  logger: Logger,
  options: FeedRegistryOptions = {},
): FeedRegistry {
  const select = { name: feeds.name, url: feeds.url };
  const pageSize = options.listPageSize ?? DEFAULT_LIST_PAGE_SIZE;

  function get(name: string): Feed | null {
    return (
      db.select(select).from(feeds).where(eq(feeds.name, name)).get() ?? null
    );
  }

  function getOrThrow(name: string): Feed {
    const feed = get(name);
    if (!feed) {
      throw new NotFoundError(name);
    }
    return feed;
  }

  return {
    get,

    count() {
      const row = db.select({ total: count() }).from(feeds).get();
      return row?.total ?? 0;
    },

    add(name, url) {
      if (get(name)) {
        throw new DuplicateNameError(name);
      }
      db.insert(feeds).values({ name, url }).run();
      logger.debug({ feedName: name, feedUrl: url }, "feed added");
      return { name, url };
    },

    renameOrUpdate(name, changes) {
      return db.transaction((tx) => {
        const current = tx
          .select(select)
          .from(feeds)
          .where(eq(feeds.name, name))
          .get();
        if (!current) {
          throw new NotFoundError(name);
        }

        const finalName = changes.newName ?? name;
        const finalUrl = changes.newUrl ?? current.url;

        if (finalName !== name) {
          const clash = tx
            .select(select)
            .from(feeds)
            .where(eq(feeds.name, finalName))
            .get();
          if (clash) {
            throw new DuplicateNameError(finalName);
          }
          tx.delete(feeds).where(eq(feeds.name, name)).run();
          tx.insert(feeds).values({ name: finalName, url: finalUrl }).run();
        } else {
          tx.update(feeds)
            .set({ url: finalUrl })
            .where(eq(feeds.name, name))
            .run();
        }

        logger.debug(
          { feedName: name, newName: finalName, feedUrl: finalUrl },
          "feed edited",
        );
        return { name: finalName, url: finalUrl };
      });
    },

    updateUrl(name, url) {
      getOrThrow(name);
      db.update(feeds).set({ url }).where(eq(feeds.name, name)).run();
      logger.debug({ feedName: name, feedUrl: url }, "feed url updated");
      return { name, url };
    },

    delete(name) {
      getOrThrow(name);
      db.delete(feeds).where(eq(feeds.name, name)).run();
      logger.debug({ feedName: name }, "feed deleted");
    },

    *list() {
      let after: string | null = null;
      for (;;) {
        const page: Array<Feed> = db
          .select(select)
          .from(feeds)
          .where(after === null ? undefined : gt(feeds.name, after))
          .orderBy(asc(feeds.name))
          .limit(pageSize)
          .all();
        yield* page;

        const last = page[page.length - 1];
        if (!last || page.length < pageSize) {
          return;
        }
        after = last.name;
      }
    },

    importFeeds(entries) {
      return db.transaction((tx) => {
        const added: Array<string> = [];
        const skipped: Array<string> = [];

        for (const entry of entries) {
          const existing = tx
            .select(select)
            .from(feeds)
            .where(eq(feeds.name, entry.name))
            .get();

          if (existing) {
            skipped.push(entry.name);
            continue;
          }

          tx.insert(feeds).values({ name: entry.name, url: entry.url }).run();
          added.push(entry.name);
        }

        logger.info(
          { addedCount: added.length, skippedCount: skipped.length },
          "feed import complete",
        );
        return { added, skipped };
      });
    },
  };
}
