import { describe, expect, it } from "vitest";
import { parseInput } from "./input.js";

function keys(data: string): string[] {
  return parseInput(data).map((event) => (event.type === "key" ? event.key : event.action));
}

describe("parseInput", () => {
  it("maps printable characters one by one", () => {
    expect(keys("jG/")).toEqual(["j", "G", "/"]);
    expect(keys("é")).toEqual(["é"]);
  });

  it("names whitespace and control keys", () => {
    expect(keys("\r\t \x7f")).toEqual(["enter", "tab", "space", "backspace"]);
    expect(keys("\x03\x0c\x15")).toEqual(["ctrl+c", "ctrl+l", "ctrl+u"]);
  });

  it("decodes cursor and editing sequences", () => {
    expect(keys("\x1b[A\x1b[B\x1b[C\x1b[D")).toEqual(["up", "down", "right", "left"]);
    expect(keys("\x1b[5~\x1b[6~\x1b[3~")).toEqual(["pgup", "pgdown", "delete"]);
    expect(keys("\x1b[H\x1b[4~\x1bOF")).toEqual(["home", "end", "end"]);
    expect(keys("\x1b[1;5A")).toEqual(["up"]);
  });

  it("treats a lone escape as esc", () => {
    expect(keys("\x1b")).toEqual(["esc"]);
    expect(keys("\x1bq")).toEqual(["esc", "q"]);
  });

  it("drops unknown sequences", () => {
    expect(keys("\x1b[99~x")).toEqual(["x"]);
  });

  it("decodes SGR mouse reports to zero-based cells", () => {
    expect(parseInput("\x1b[<64;10;5M\x1b[<65;1;1M")).toEqual([
      { type: "mouse", action: "wheelUp", x: 9, y: 4 },
      { type: "mouse", action: "wheelDown", x: 0, y: 0 },
    ]);
    expect(parseInput("\x1b[<0;3;7M\x1b[<0;3;7m")).toEqual([{ type: "mouse", action: "click", x: 2, y: 6 }]);
  });
});
