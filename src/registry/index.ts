export { createFeedRegistry } from "./feed-registry";
export type { FeedRegistry, FeedRegistryOptions } from "./feed-registry";
export type { Feed, FeedChanges, ImportResult } from "./types";
