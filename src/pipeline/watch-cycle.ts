// pattern: Imperative Shell
import type { Logger } from "pino";
import type { FeedRegistry } from "../registry";
import type { SeenEntryCache } from "../cache";
import type { NotifyFn, SendResult } from "../notify";
import { detectNewEntries } from "./detector";
import type { FetchFeedFn, NewEntryRecord } from "./types";

export type WatchDeps = {
  readonly registry: Pick<FeedRegistry, "list">;
  readonly cache: SeenEntryCache;
  readonly fetchFeed: FetchFeedFn;
  readonly notify: NotifyFn;
  readonly logger: Logger;
};

export type WatchSummary = {
  readonly feedCount: number;
  readonly failedFeeds: ReadonlyArray<string>;
  readonly newEntries: ReadonlyArray<NewEntryRecord>;
  /** `null` when nothing was new and the notifier was not called. */
  readonly delivery: SendResult | null;
};

/**
 * Runs one pass over every registered feed, in name order.
 *
 * Behavior:
 * - A feed whose fetch fails is logged and skipped; the pass continues.
 * - Each feed's seen-set is written as soon as that feed is done, so a crash
 *   later in the pass keeps the progress made so far.
 * - The first successful fetch of a URL records its seen-set even when empty.
 * - New entries from all feeds go out in one notification, or none at all.
 */
export async function runWatchCycle(deps: WatchDeps): Promise<WatchSummary> {
  const { registry, cache, fetchFeed, notify, logger } = deps;

  const collected: Array<NewEntryRecord> = [];
  const failedFeeds: Array<string> = [];
  let feedCount = 0;

  for (const feed of registry.list()) {
    feedCount++;

    try {
      logger.info({ feedName: feed.name, feedUrl: feed.url }, "processing feed");

      const pollResult = await fetchFeed(feed.name, feed.url);
      if (pollResult.error !== null) {
        logger.warn(
          { feedName: feed.name, error: pollResult.error },
          "feed poll returned error, skipping",
        );
        failedFeeds.push(feed.name);
        continue;
      }

      const previous = cache.get(feed.url);
      const { newEntries, seen } = detectNewEntries(
        feed.name,
        previous,
        pollResult.entries,
      );

      if (previous === null || newEntries.length > 0) {
        cache.save(feed.url, seen);
      }

      collected.push(...newEntries);
      logger.info(
        {
          feedName: feed.name,
          newCount: newEntries.length,
          seenCount: seen.size,
        },
        newEntries.length > 0 ? "new entries found" : "no new entries",
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(
        { feedName: feed.name, feedUrl: feed.url, error: message },
        "unexpected error during feed processing",
      );
      failedFeeds.push(feed.name);
    }
  }

  if (collected.length === 0) {
    logger.info({ feedCount }, "no new entries found across all feeds");
    return { feedCount, failedFeeds, newEntries: collected, delivery: null };
  }

  const delivery = await notify(collected, logger);

  logger.info(
    {
      feedCount,
      failedCount: failedFeeds.length,
      newCount: collected.length,
      delivered: delivery.success,
    },
    "watch cycle complete",
  );
  return { feedCount, failedFeeds, newEntries: collected, delivery };
}
