// pattern: Functional Core
import type { NewEntryRecord } from "../pipeline/types";

/** Discord rejects message content longer than this. */
export const MESSAGE_LIMIT = 2000;

export const MESSAGE_HEADER = "**New RSS Feed Entries Found:**";

export function formatEntryLine(entry: NewEntryRecord): string {
  return `**${entry.feedName}**: [${entry.title}](${entry.link})`;
}

/**
 * Header plus one markdown line per entry, cut to {@link MESSAGE_LIMIT}
 * characters. The cut ignores line boundaries but counts code points, so a
 * surrogate pair is never split.
 */
export function formatNotification(
  entries: ReadonlyArray<NewEntryRecord>,
): string {
  const lines = [MESSAGE_HEADER, ...entries.map(formatEntryLine)];
  return Array.from(lines.join("\n")).slice(0, MESSAGE_LIMIT).join("");
}
