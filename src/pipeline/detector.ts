// pattern: Functional Core
import type { DetectionResult, FeedEntry, NewEntryRecord } from "./types";

export const DEFAULT_TITLE = "No title";
export const DEFAULT_LINK = "No link";

/**
 * The identifier an entry is remembered by: its native id, else its link.
 * Empty strings count as missing. `null` means the entry cannot be tracked.
 */
export function entryIdOf(entry: FeedEntry): string | null {
  if (entry.id) return entry.id;
  if (entry.link) return entry.link;
  return null;
}

/**
 * Splits a feed's fetched entries into those not yet seen and returns the
 * grown seen-set. The input set is left as is.
 *
 * Ids are added while iterating, so a repeated id later in the same batch is
 * not reported twice. Entries without any id are dropped from both outputs.
 */
export function detectNewEntries(
  feedName: string,
  seen: ReadonlySet<string> | null,
  entries: ReadonlyArray<FeedEntry>,
): DetectionResult {
  const updated = new Set<string>(seen ?? []);
  const newEntries: Array<NewEntryRecord> = [];

  for (const entry of entries) {
    const entryId = entryIdOf(entry);
    if (entryId === null || updated.has(entryId)) {
      continue;
    }

    updated.add(entryId);
    newEntries.push({
      feedName,
      title: entry.title ?? DEFAULT_TITLE,
      link: entry.link ?? DEFAULT_LINK,
    });
  }

  return { newEntries, seen: updated };
}
