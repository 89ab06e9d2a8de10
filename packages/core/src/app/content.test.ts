import { describe, expect, it } from "vitest";
import { makeEntry } from "../__tests__/fakes.js";
import { chatContent, detailContent, detailJsonContent, helpContent, wrapText } from "./content.js";

describe("wrapText", () => {
  it("breaks on spaces", () => {
    expect(wrapText("the quick brown fox jumps", 10)).toEqual(["the quick", "brown fox", "jumps"]);
  });

  it("hard-breaks long words", () => {
    expect(wrapText("a".repeat(25), 10)).toEqual(["a".repeat(10), "a".repeat(10), "a".repeat(5)]);
  });
});

describe("detailContent", () => {
  it("lists set fields, the message and sorted metrics", () => {
    const entry = makeEntry({
      timestampMs: Date.UTC(2024, 0, 1),
      level: "ERROR",
      serviceName: "api",
      durationMs: 2.5,
      message: "boom",
      metrics: { b: 2, a: 1 },
    });
    expect(detailContent(entry, 80).split("\n")).toEqual([
      "Timestamp:  2024-01-01T00:00:00.000Z",
      "Level:      ERROR",
      "Service:    api",
      "Duration:   2.5 ms",
      "",
      "Message:",
      "boom",
      "",
      "Metrics:",
      "  a: 1",
      "  b: 2",
    ]);
  });

  it("shows the raw document as JSON", () => {
    expect(detailJsonContent(makeEntry({ raw: { a: 1 } }))).toBe('{\n  "a": 1\n}');
  });
});

describe("helpContent", () => {
  it("groups bindings in order", () => {
    expect(
      helpContent([
        { keys: ["j", "k"], label: "scroll", kind: "quick", group: "Navigation" },
        { keys: ["q"], label: "quit", kind: "full", group: "System" },
      ]),
    ).toBe(
      [
        "Navigation",
        "  j/k         scroll",
        "",
        "System",
        "  q           quit",
        "",
        "  ?           close help",
        "  ctrl+c      quit",
      ].join("\n"),
    );
  });
});

describe("chatContent", () => {
  it("labels speakers and shows pending replies", () => {
    expect(
      chatContent(
        [
          { role: "user", content: "hi", timestampMs: 0 },
          { role: "assistant", content: "oops", timestampMs: 0, error: true },
        ],
        true,
        40,
      ),
    ).toBe("You:\n  hi\n\nAssistant (error):\n  oops\n\nThinking...");
  });
});
