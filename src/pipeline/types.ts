/**
 * One item from a fetched feed. Every field is optional: RSS items carry a
 * `guid`, Atom entries an `id`, and either may lack a link or title.
 */
export type FeedEntry = {
  readonly id?: string;
  readonly link?: string;
  readonly title?: string;
};

export type PollResult = {
  readonly feedName: string;
  readonly entries: ReadonlyArray<FeedEntry>;
  readonly error: string | null;
};

export type FetchFeedFn = (
  feedName: string,
  feedUrl: string,
) => Promise<PollResult>;

export type NewEntryRecord = {
  readonly feedName: string;
  readonly title: string;
  readonly link: string;
};

export type DetectionResult = {
  readonly newEntries: ReadonlyArray<NewEntryRecord>;
  readonly seen: ReadonlySet<string>;
};
