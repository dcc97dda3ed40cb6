import { describe, it, expect } from "vitest";
import {
  formatEntryLine,
  formatNotification,
  MESSAGE_HEADER,
  MESSAGE_LIMIT,
} from "./message";
import type { NewEntryRecord } from "../pipeline/types";

describe("formatEntryLine", () => {
  it("should render feed name in bold and the title as a markdown link", () => {
    expect(
      formatEntryLine({
        feedName: "Example",
        title: "Hello",
        link: "https://example.com/hello",
      }),
    ).toBe("**Example**: [Hello](https://example.com/hello)");
  });
});

describe("formatNotification", () => {
  it("should put the header first and one line per entry", () => {
    const message = formatNotification([
      { feedName: "A", title: "One", link: "https://a.example.com/1" },
      { feedName: "B", title: "No title", link: "No link" },
    ]);

    expect(message).toBe(
      [
        "**New RSS Feed Entries Found:**",
        "**A**: [One](https://a.example.com/1)",
        "**B**: [No title](No link)",
      ].join("\n"),
    );
  });

  it("should cut long messages to exactly the limit", () => {
    const entries: Array<NewEntryRecord> = Array.from(
      { length: 100 },
      (_, i) => ({
        feedName: "Feed",
        title: `Entry number ${i}`,
        link: `https://example.com/entries/${i}`,
      }),
    );

    const message = formatNotification(entries);

    expect(message).toHaveLength(MESSAGE_LIMIT);
    expect(message.slice(0, 70)).toBe(
      `${MESSAGE_HEADER}\n**Feed**: [Entry number 0](https://exa`,
    );
  });

  it("should leave a message at the limit untouched", () => {
    // header (31) + newline (1) + line of 1968 = 2000
    const line = formatEntryLine({ feedName: "F", title: "", link: "" });
    const title = "x".repeat(
      MESSAGE_LIMIT - MESSAGE_HEADER.length - 1 - line.length,
    );

    const message = formatNotification([{ feedName: "F", title, link: "" }]);

    expect(message).toHaveLength(MESSAGE_LIMIT);
    expect(message.endsWith("x]()")).toBe(true);
  });

  it("should not split a character that straddles the limit", () => {
    // header (31) + newline (1) + "**F**: [" (8) puts the title at 40
    const title = `${"a".repeat(MESSAGE_LIMIT - 1 - 40)}\u{1F600}b`;

    const message = formatNotification([
      { feedName: "F", title, link: "https://example.com/f" },
    ]);

    expect(Array.from(message)).toHaveLength(MESSAGE_LIMIT);
    expect(message).toHaveLength(MESSAGE_LIMIT + 1);
    expect(message.endsWith("a\u{1F600}")).toBe(true);
  });
});
