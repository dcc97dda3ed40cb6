export { createSeenEntryCache } from "./seen-cache";
export type { SeenEntryCache } from "./seen-cache";
