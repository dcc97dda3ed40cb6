export type Feed = {
  readonly name: string;
  readonly url: string;
};

export type FeedChanges = {
  readonly newName?: string;
  readonly newUrl?: string;
};

export type ImportResult = {
  readonly added: ReadonlyArray<string>;
  readonly skipped: ReadonlyArray<string>;
};
