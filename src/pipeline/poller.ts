import Parser from "rss-parser";
import type { Logger } from "pino";
import type { FeedEntry, FetchFeedFn, PollResult } from "./types";

type CustomItem = {
  // Atom entries carry their identifier as `id` rather than `guid`.
  id?: string;
};

export type FeedParser = Pick<
  Parser<Record<string, unknown>, CustomItem>,
  "parseURL"
>;

const USER_AGENT = "feed-watch/0.1 (+rss-parser)";

let parserInstance: FeedParser | null = null;

export function createParser(): Parser<Record<string, unknown>, CustomItem> {
  return new Parser<Record<string, unknown>, CustomItem>({
    headers: { "User-Agent": USER_AGENT },
  });
}

export function getParserInstance(): FeedParser {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

export function setParserInstance(parser: FeedParser): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}

// rss-parser hands back whatever xml2js produced, so an element that has
// attributes but no text (`<guid isPermaLink="false"></guid>`) arrives as an
// object despite the declared string type.
function textOf(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Fetches and parses one feed. Network failures, HTTP errors and malformed
 * XML all come back as a result with `error` set; this never rejects.
 */
export async function pollFeed(
  feedName: string,
  feedUrl: string,
  logger: Logger,
): Promise<PollResult> {
  try {
    const parser = getParserInstance();
    const feed = await parser.parseURL(feedUrl);

    const entries: Array<FeedEntry> = feed.items.map((item) => ({
      id: textOf(item.guid) ?? textOf(item.id),
      link: textOf(item.link),
      title: textOf(item.title),
    }));

    logger.info(
      { feedName, entryCount: entries.length },
      "feed polled successfully",
    );
    return { feedName, entries, error: null };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ feedName, feedUrl, error: message }, "feed poll failed");
    return { feedName, entries: [], error: message };
  }
}

export function createFeedFetcher(logger: Logger): FetchFeedFn {
  return (feedName, feedUrl) => pollFeed(feedName, feedUrl, logger);
}
