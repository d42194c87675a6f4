import { describe, expect, test } from "vitest";
import {
  buildSectionBlocks,
  formatMarkdown,
  hasAnyMention,
  mentions,
  mimeSubtype,
  splitMessage,
  stripMention,
} from "../src/channels/slack/format.js";

describe("formatMarkdown", () => {
  test("turns star list items into dashes", () => {
    expect(formatMarkdown("Items:\n* one\n* two")).toBe("Items:\n- one\n- two");
  });

  test("keeps indentation and blank lines before list items", () => {
    expect(formatMarkdown("a\n\n  * nested")).toBe("a\n\n  - nested");
  });

  test("collapses double stars to single stars", () => {
    expect(formatMarkdown("**Bold** and **more**")).toBe("*Bold* and *more*");
  });

  test("applies both rewrites together", () => {
    expect(formatMarkdown("**Bold**\n* a\n* b")).toBe("*Bold*\n- a\n- b");
  });

  test("leaves a star at the very start alone", () => {
    expect(formatMarkdown("* first")).toBe("* first");
  });
});

describe("mentions", () => {
  test("strips every occurrence of the bot mention and trims", () => {
    expect(stripMention("<@UBOT> hi <@UBOT>", "UBOT")).toBe("hi");
    expect(stripMention("ask <@UOTHER>", "UBOT")).toBe("ask <@UOTHER>");
  });

  test("detects the bot mention", () => {
    expect(mentions("hey <@UBOT>", "UBOT")).toBe(true);
    expect(mentions("hey <@UOTHER>", "UBOT")).toBe(false);
  });

  test("detects any user mention", () => {
    expect(hasAnyMention("hey <@U123>")).toBe(true);
    expect(hasAnyMention("hey @U123")).toBe(false);
  });
});

describe("section blocks", () => {
  test("splits on the last space before the limit", () => {
    expect(splitMessage("aaaa bbbb cccc", 9)).toEqual(["aaaa", "bbbb cccc"]);
  });

  test("hard-cuts text without break points", () => {
    const chunks = splitMessage("a".repeat(3500));
    expect(chunks.map((c) => c.length)).toEqual([3000, 500]);
  });

  test("builds one mrkdwn section per chunk", () => {
    expect(buildSectionBlocks("hi")).toEqual([{ type: "section", text: { type: "mrkdwn", text: "hi" } }]);
    expect(buildSectionBlocks("b".repeat(3001))).toHaveLength(2);
  });
});

describe("mimeSubtype", () => {
  test("returns the part after the slash", () => {
    expect(mimeSubtype("image/png")).toBe("png");
    expect(mimeSubtype("text/plain; charset=utf-8")).toBe("plain");
    expect(mimeSubtype("weird")).toBe("weird");
  });
});
