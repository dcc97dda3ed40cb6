export { pollFeed, createFeedFetcher } from "./poller";
export { detectNewEntries, entryIdOf } from "./detector";
export { runWatchCycle } from "./watch-cycle";
export type {
  FeedEntry,
  PollResult,
  FetchFeedFn,
  NewEntryRecord,
  DetectionResult,
} from "./types";
export type { WatchDeps, WatchSummary } from "./watch-cycle";
