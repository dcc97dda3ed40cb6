export type FeedWatchErrorCode =
  | "DUPLICATE_NAME"
  | "NOT_FOUND"
  | "MISSING_REQUIRED_OPTION"
  | "USAGE";

/**
 * Base class for the errors that end a CLI invocation with exit code 1.
 * Feed fetch and webhook delivery failures are not errors in this sense:
 * they come back as result values.
 */
export class FeedWatchError extends Error {
  readonly code: FeedWatchErrorCode;

  constructor(code: FeedWatchErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DuplicateNameError extends FeedWatchError {
  readonly feedName: string;

  constructor(feedName: string) {
    super(
      "DUPLICATE_NAME",
      `A feed with the name '${feedName}' already exists.`,
    );
    this.feedName = feedName;
  }
}

export class NotFoundError extends FeedWatchError {
  readonly feedName: string;

  constructor(feedName: string) {
    super("NOT_FOUND", `No feed found with the name '${feedName}'.`);
    this.feedName = feedName;
  }
}

export class MissingRequiredOptionError extends FeedWatchError {
  constructor(message: string) {
    super("MISSING_REQUIRED_OPTION", message);
  }
}

export class UsageError extends FeedWatchError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

