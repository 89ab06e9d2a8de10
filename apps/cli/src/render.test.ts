import type { LogEntry, SearchResult } from "@tailscope/contracts";
import { App, type DataSource, type DisplayField, mergeConfig } from "@tailscope/core";
import { describe, expect, it } from "vitest";
import { columnHeader, formatTimestamp, layoutColumns, render, sparkline, stripAnsi, windowStart } from "./render.js";

const T0 = 1_700_000_000_000;

const emptyResult = async (): Promise<SearchResult> => ({ entries: [], total: 0, query: "" });

const stubDataSource: DataSource = {
  tail: emptyResult,
  tailEsql: emptyResult,
  searchEsql: emptyResult,
  countEsql: async () => ({ total: 0, query: "" }),
  aggregateMetrics: async () => ({ metrics: [], bucketSize: "1m", query: "" }),
  getTransactionNames: async () => [],
  getServices: async () => [],
  getResources: async () => [],
  getFieldCaps: async () => [],
  ping: async () => undefined,
  getIndex: () => "logs-*",
  setIndex: () => undefined,
};

function entry(partial: Partial<LogEntry>): LogEntry {
  return {
    timestampMs: T0,
    level: "INFO",
    message: "",
    serviceName: "",
    resource: "",
    traceId: "",
    spanId: "",
    name: "",
    kind: "",
    statusCode: "",
    durationMs: null,
    processorEvent: "",
    metrics: {},
    raw: {},
    ...partial,
  };
}

function field(name: string, width: number): DisplayField {
  return { name, label: name.toUpperCase(), width, selected: true, searchFields: [] };
}

function smallApp(): App {
  const app = new App({
    config: mergeConfig({ tui: { autoRefresh: false } }),
    dataSource: stubDataSource,
    now: () => T0,
  });
  app.update({ type: "resize", width: 80, height: 8 });
  return app;
}

describe("formatTimestamp", () => {
  it("renders clock and full forms in UTC", () => {
    expect(formatTimestamp(T0, "clock", T0)).toBe("22:13:20");
    expect(formatTimestamp(T0, "full", T0)).toBe("2023-11-14 22:13:20.000");
  });

  it("renders relative ages in the largest whole unit", () => {
    expect(formatTimestamp(T0, "relative", T0 + 5_000)).toBe("5s ago");
    expect(formatTimestamp(T0, "relative", T0 + 90_000)).toBe("1m ago");
    expect(formatTimestamp(T0, "relative", T0 + 7_200_000)).toBe("2h ago");
    expect(formatTimestamp(T0, "relative", T0 + 3 * 86_400_000)).toBe("3d ago");
  });
});

describe("sparkline", () => {
  it("scales between the minimum and maximum and leaves gaps blank", () => {
    expect(sparkline([1, 2, 3, null])).toBe("▁▅█ ");
  });

  it("keeps the newest values when narrower than the series", () => {
    expect(sparkline([9, 1, 2, 3], 3)).toBe("▁▅█");
  });
});

describe("layoutColumns", () => {
  it("gives the message column the remaining width", () => {
    const app = smallApp();
    const widths = layoutColumns(app.displayFields, 80, "clock").map((column) => column.width);
    expect(widths).toEqual([8, 7, 12, 15, 34]);
    expect(layoutColumns(app.displayFields, 80, "full").map((column) => column.width)).toEqual([23, 7, 12, 15, 19]);
  });

  it("gives extra flexible columns ten cells", () => {
    const widths = layoutColumns([field("a", 0), field("b", 0)], 40, "clock").map((column) => column.width);
    expect(widths).toEqual([29, 10]);
  });

  it("marks the sort direction on the time column", () => {
    const columns = layoutColumns([{ ...field("@timestamp", 8), label: "TIME" }, field("msg", 0)], 30, "clock");
    expect(columnHeader(columns, true)).toBe("TIME ↑   MSG");
  });
});

describe("windowStart", () => {
  it("scrolls only as far as needed to show the cursor", () => {
    expect(windowStart(2, 20, 10)).toBe(0);
    expect(windowStart(15, 20, 10)).toBe(6);
    expect(windowStart(19, 20, 10)).toBe(10);
    expect(windowStart(4, 5, 10)).toBe(0);
  });
});

describe("render", () => {
  it("fills the screen with the list, status bar and key hints", () => {
    const lines = render(smallApp(), T0).split("\n").map(stripAnsi);
    expect(lines).toHaveLength(8);
    expect(lines[0]).toBe("TIME ↓   LEVEL   RESOURCE     SERVICE         MESSAGE");
    expect(lines[1]).toBe("No entries");
    expect(lines[6]).toBe("tailscope │ Logs │ logs-* │ last hour");
  });

  it("draws entry rows and the entry count", () => {
    const app = smallApp();
    app.entries = [entry({ level: "ERROR", resource: "prod", serviceName: "api", message: "disk full" })];
    app.total = 5;
    app.selection.setLength(1);

    const lines = render(app, T0).split("\n").map(stripAnsi);
    expect(lines[1]).toBe("22:13:20 ERROR   prod         api             disk full                         ");
    expect(lines[5]).toBe("1 of 5 entries");
  });

  it("draws the quit prompt over the view underneath", () => {
    const app = smallApp();
    app.update({ type: "resize", width: 80, height: 10 });
    app.update({ type: "key", key: "q" });
    expect(app.mode).toBe("quitConfirm");

    const lines = render(app, T0).split("\n").map(stripAnsi);
    expect(lines).toHaveLength(10);
    expect(lines[0]).toBe("TIME ↓   LEVEL   RESOURCE     SERVICE         MESSAGE");
    expect(lines[1]).toBe("No entries");
    expect(lines[2]).toBe(`┌─ Quit ${"─".repeat(71)}┐`);
    expect(lines[3]).toBe(`│ ${"Quit tailscope? (y/n)".padEnd(76)} │`);
    expect(lines[4]).toBe(`└${"─".repeat(78)}┘`);
    expect(lines[5]).toBe("");
    expect(lines[8]).toBe("tailscope │ Logs │ logs-* │ last hour");
  });
});
