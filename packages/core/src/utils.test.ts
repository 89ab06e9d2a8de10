import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { asNumber, asString, compactText, expandHome, getPath, parseEpochMs, setPath, truncateText } from "./utils.js";

describe("utils", () => {
  it("expands a leading tilde only", () => {
    expect(expandHome("~")).toBe(os.homedir());
    expect(expandHome("~/logs/app.log")).toBe(path.join(os.homedir(), "logs/app.log"));
    expect(expandHome("/var/~/x")).toBe("/var/~/x");
  });

  it("reads dotted paths from flat and nested documents", () => {
    const doc = {
      "service.name": "api",
      resource: { attributes: { "service.namespace": "prod" } },
      http: { response: { status_code: 503 } },
    };
    expect(getPath(doc, "service.name")).toBe("api");
    expect(getPath(doc, "resource.attributes.service.namespace")).toBe("prod");
    expect(getPath(doc, "http.response.status_code")).toBe(503);
    expect(getPath(doc, "http.request.method")).toBeUndefined();
  });

  it("builds nested objects when setting a dotted path", () => {
    const target: Record<string, unknown> = { a: 1 };
    setPath(target, "a.b.c", "x");
    expect(target).toEqual({ a: { b: { c: "x" } } });
  });

  it("coerces loosely typed values", () => {
    expect(asString(null)).toBe("");
    expect(asString(12)).toBe("12");
    expect(asString({ a: 1 })).toBe('{"a":1}');
    expect(asNumber("1.5")).toBe(1.5);
    expect(asNumber(" ")).toBeNull();
    expect(asNumber(Number.NaN)).toBeNull();
  });

  it("parses epoch seconds, milliseconds and ISO strings", () => {
    expect(parseEpochMs(1_700_000_000)).toBe(1_700_000_000_000);
    expect(parseEpochMs(1_700_000_000_123)).toBe(1_700_000_000_123);
    expect(parseEpochMs("1700000000123")).toBe(1_700_000_000_123);
    expect(parseEpochMs("2023-11-14T22:13:20.000Z")).toBe(1_700_000_000_000);
    expect(parseEpochMs("yesterday")).toBeNull();
  });

  it("truncates with an ellipsis and collapses whitespace", () => {
    expect(truncateText("abcdef", 4)).toBe("abc…");
    expect(truncateText("abc", 4)).toBe("abc");
    expect(truncateText("abc", 0)).toBe("");
    expect(compactText("  disk\n  full\t now ", 20)).toBe("disk full now");
  });
});
