import { describe, expect, it } from "vitest";
import { buildOpenCommand } from "./browser.js";
import { buildCopyCommand } from "./clipboard.js";

describe("buildOpenCommand", () => {
  it("uses the platform opener", () => {
    const url = "http://localhost:5601/app/discover";
    expect(buildOpenCommand("darwin", url)).toEqual({ command: "open", args: [url] });
    expect(buildOpenCommand("win32", url)).toEqual({ command: "cmd", args: ["/c", "start", "", url] });
    expect(buildOpenCommand("linux", url)).toEqual({ command: "xdg-open", args: [url] });
  });
});

describe("buildCopyCommand", () => {
  it("picks the clipboard tool for the platform", () => {
    expect(buildCopyCommand("darwin", {})).toEqual({ command: "pbcopy", args: [] });
    expect(buildCopyCommand("win32", {})).toEqual({ command: "clip", args: [] });
    expect(buildCopyCommand("linux", {})).toEqual({ command: "xclip", args: ["-selection", "clipboard"] });
  });

  it("prefers wl-copy under Wayland", () => {
    expect(buildCopyCommand("linux", { WAYLAND_DISPLAY: "wayland-0" })).toEqual({ command: "wl-copy", args: [] });
  });
});
