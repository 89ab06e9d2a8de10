import { describe, expect, it, vi } from "vitest";
import { FakeCollector, FakeDataSource, makeEntry, searchResult, testConfig } from "../__tests__/fakes.js";
import type { Effects } from "../dataSource.js";
import { defaultFields } from "../fields.js";
import { buildDiscoverUrl, formatQueryText } from "../kibana.js";
import { prettyJson } from "../utils.js";
import { App } from "./app.js";
import { detailContent } from "./content.js";

function setup(effects: Effects = {}) {
  const dataSource = new FakeDataSource();
  const app = new App({ config: testConfig(), dataSource, effects, now: () => 5_000 });
  return { app, dataSource };
}

async function press(app: App, ...keys: string[]): Promise<void> {
  for (const key of keys) {
    app.update({ type: "key", key });
    await app.settle();
  }
}

function clipboard() {
  return vi.fn<(text: string) => Promise<void>>(async () => undefined);
}

describe("global keys", () => {
  it("asks before quitting", async () => {
    const { app } = setup();
    await press(app, "q");
    expect(app.mode).toBe("quitConfirm");
    await press(app, "n");
    expect(app.mode).toBe("logs");
    expect(app.quitting).toBe(false);

    await press(app, "q", "y");
    expect(app.quitting).toBe(true);
    expect(app.queue.isClosed).toBe(true);
  });

  it("quits immediately on ctrl+c from any view", async () => {
    const { app } = setup();
    await press(app, "/", "ctrl+c");
    expect(app.quitting).toBe(true);
  });

  it("types ? and q into text inputs instead of acting on them", async () => {
    const { app } = setup();
    await press(app, "/", "?", "q");
    expect(app.mode).toBe("search");
    expect(app.searchInput.value).toBe("?q");
  });

  it("toggles help with the bindings of the view underneath", async () => {
    const { app } = setup();
    await press(app, "?");
    expect(app.mode).toBe("help");
    expect(app.helpViewport.content.split("\n")[0]).toBe("Navigation");
    expect(app.helpViewport.content).toContain("  /           search");
    await press(app, "?");
    expect(app.mode).toBe("logs");
  });
});

describe("search and index inputs", () => {
  it("submits a search and resets tail-follow", async () => {
    const { app, dataSource } = setup();
    app.selection.userHasScrolled = true;
    await press(app, "/", "e", "r", "r", "enter");

    expect(app.mode).toBe("logs");
    expect(app.searchQuery).toBe("err");
    expect(app.selection.userHasScrolled).toBe(false);
    const [query, opts] = dataSource.searchEsql.mock.calls[0] ?? [];
    expect(query).toBe("err");
    expect(opts?.searchFields).toEqual([
      "severity_text",
      "log.level",
      "resource.attributes.service.namespace",
      "resource.attributes.deployment.environment",
      "resource.attributes.service.name",
      "service.name",
      "body.text",
      "message",
      "event_name",
    ]);
  });

  it("leaves the search untouched on escape", async () => {
    const { app, dataSource } = setup();
    await press(app, "/", "x", "esc");
    expect(app.mode).toBe("logs");
    expect(app.searchQuery).toBe("");
    expect(dataSource.searchEsql).not.toHaveBeenCalled();
  });

  it("switches the index pattern", async () => {
    const { app, dataSource } = setup();
    await press(app, "i");
    expect(app.indexInput.value).toBe("logs-*");

    await press(app, "ctrl+u", "a", "p", "p", "-", "*", "enter");
    expect(dataSource.setIndex).toHaveBeenCalledWith("app-*");
    expect(app.statusText()).toBe("Index: app-*");
    expect(dataSource.tailEsql).toHaveBeenCalledTimes(1);
  });

  it("ignores an empty index", async () => {
    const { app, dataSource } = setup();
    await press(app, "i", "ctrl+u", "enter");
    expect(app.mode).toBe("logs");
    expect(dataSource.setIndex).not.toHaveBeenCalled();
  });
});

describe("logs keys", () => {
  it("applies level filters", async () => {
    const { app, dataSource } = setup();
    await press(app, "2");
    expect(app.levelFilter).toBe("WARN");
    expect(dataSource.tailEsql).toHaveBeenLastCalledWith(expect.objectContaining({ level: "WARN" }), expect.any(AbortSignal));
    await press(app, "0");
    expect(app.levelFilter).toBe("");
  });

  it("cycles lookback, sort and time display", async () => {
    const { app } = setup();
    await press(app, "l");
    expect(app.lookback).toBe("24h");
    await press(app, "s");
    expect(app.sortAscending).toBe(true);
    await press(app, "t");
    expect(app.timeDisplay).toBe("relative");
    await press(app, "t", "t");
    expect(app.timeDisplay).toBe("clock");
  });

  it("copies the last query as curl from the query overlay", async () => {
    const copyToClipboard = clipboard();
    const { app, dataSource } = setup({ copyToClipboard });
    dataSource.tailEsql.mockResolvedValueOnce(searchResult([makeEntry()], "FROM logs-* | LIMIT 100"));
    await press(app, "r", "Q");
    expect(app.mode).toBe("query");

    await press(app, "c", "y");
    expect(app.queryFormat).toBe("curl");
    expect(copyToClipboard).toHaveBeenCalledWith(
      formatQueryText("curl", "FROM logs-* | LIMIT 100", "logs-*", "http://es.test:9200"),
    );
    expect(app.statusText()).toBe("Copied query to clipboard");

    await press(app, "esc");
    expect(app.mode).toBe("logs");
  });
});

describe("detail keys", () => {
  it("steps through entries and toggles the raw document", async () => {
    const copyToClipboard = clipboard();
    const { app, dataSource } = setup({ copyToClipboard });
    const entries = [
      makeEntry({ message: "first", raw: { id: 1 } }),
      makeEntry({ message: "second", raw: { id: 2 } }),
    ];
    dataSource.tailEsql.mockResolvedValueOnce(searchResult(entries));
    await press(app, "r", "enter");

    expect(app.mode).toBe("detail");
    expect(app.detailViewport.content).toBe(detailContent(entries[0] ?? makeEntry(), app.detailViewport.width));

    await press(app, "right");
    expect(app.selection.selectedIndex).toBe(1);
    expect(app.detailViewport.content).toContain("second");

    await press(app, "J");
    expect(app.mode).toBe("detailJson");
    expect(app.detailViewport.content).toBe(prettyJson({ id: 2 }));

    await press(app, "y");
    expect(copyToClipboard).toHaveBeenCalledWith(prettyJson({ id: 2 }));

    await press(app, "esc");
    expect(app.mode).toBe("logs");
  });
});

describe("field picker", () => {
  it("toggles, filters and resets display fields", async () => {
    const { app, dataSource } = setup();
    dataSource.getFieldCaps.mockResolvedValue([
      { name: "host.name", type: "keyword", searchable: true, aggregatable: true, docCount: 50 },
    ]);

    await press(app, "f");
    expect(app.mode).toBe("fields");
    expect(app.fieldList().map((field) => field.name)).toEqual([
      "@timestamp",
      "severity_text",
      "_resource",
      "service.name",
      "body.text",
      "host.name",
    ]);

    await press(app, "G", "space");
    expect(app.displayFields.map((field) => field.name)).toContain("host.name");

    await press(app, "/", "h", "o", "s", "t", "enter");
    expect(app.fieldsFilterMode).toBe(false);
    expect(app.fieldList().map((field) => field.name)).toEqual(["host.name"]);

    await press(app, "space");
    expect(app.displayFields.map((field) => field.name)).not.toContain("host.name");

    await press(app, "r");
    expect(app.displayFields).toEqual(defaultFields("logs"));

    await press(app, "esc");
    expect(app.mode).toBe("logs");
  });
});

describe("kibana credentials modal", () => {
  it("copies, opens and can be skipped afterwards", async () => {
    const copyToClipboard = clipboard();
    const openUrl = vi.fn<(url: string) => Promise<void>>(async () => undefined);
    const { app, dataSource } = setup({ copyToClipboard, openUrl });
    dataSource.tailEsql.mockResolvedValueOnce(searchResult([makeEntry()], "FROM logs-* | LIMIT 100"));
    await press(app, "r", "K");

    const url = buildDiscoverUrl(app.config.kibana, "FROM logs-* | LIMIT 100", "1h");
    expect(app.mode).toBe("credsModal");
    expect(app.pendingKibanaUrl).toBe(url);

    await press(app, "y");
    expect(copyToClipboard).toHaveBeenLastCalledWith(url);
    await press(app, "p");
    expect(copyToClipboard).toHaveBeenLastCalledWith("test-secret");
    expect(app.statusText()).toBe("Copied password to clipboard");

    await press(app, "n");
    expect(app.hideCredsModal).toBe(true);
    expect(app.mode).toBe("logs");
    expect(openUrl).toHaveBeenCalledWith(url);
    expect(app.statusText()).toBe("Opened Kibana in browser");

    await press(app, "K");
    expect(app.mode).toBe("logs");
    expect(openUrl).toHaveBeenCalledTimes(2);
  });

  it("reports when there is no query yet", async () => {
    const { app } = setup();
    await press(app, "K");
    expect(app.mode).toBe("logs");
    expect(app.statusText()).toBe("No query to open in Kibana");
  });
});

describe("collector config", () => {
  it("opens, watches, validates and reloads the collector", async () => {
    const collector = new FakeCollector();
    const { app } = setup({ collector });

    await press(app, "O");
    expect(app.mode).toBe("otelConfigExplain");
    await press(app, "enter");
    expect(app.mode).toBe("otelConfigModal");
    expect(app.collectorPath).toBe("/tmp/otel-collector.yaml");

    collector.onChange?.("/tmp/otel-collector.yaml");
    await app.settle();
    expect(collector.validate).toHaveBeenCalledWith("/tmp/otel-collector.yaml");
    expect(collector.reload).toHaveBeenCalledTimes(1);
    expect(app.collectorReloadedMs).toBe(5_000);
    expect(app.statusText()).toBe("Collector reloaded");

    await press(app, "esc");
    expect(collector.unwatch).toHaveBeenCalledTimes(1);
    expect(app.mode).toBe("logs");
  });

  it("keeps an invalid config from being reloaded", async () => {
    const collector = new FakeCollector();
    collector.validate.mockResolvedValue({ valid: false, message: "line 3: bad indentation" });
    const copyToClipboard = clipboard();
    const { app } = setup({ collector, copyToClipboard });

    await press(app, "O", "enter");
    collector.onChange?.("/tmp/otel-collector.yaml");
    await app.settle();

    expect(collector.reload).not.toHaveBeenCalled();
    expect(app.statusText()).toBe("Collector config is invalid");
    await press(app, "Y");
    expect(copyToClipboard).toHaveBeenCalledWith("line 3: bad indentation");
  });

  it("explains when no collector is available", async () => {
    const { app } = setup();
    await press(app, "O", "enter");
    expect(app.mode).toBe("otelConfigUnavailable");
    expect(app.collectorUnavailableReason).toBe("No collector is configured.");
    await press(app, "esc");
    expect(app.mode).toBe("logs");
  });

  it("shows the failure reason when the collector cannot be opened", async () => {
    const collector = new FakeCollector();
    collector.open.mockRejectedValueOnce(new Error("container otel-collector is not running"));
    const { app } = setup({ collector });
    await press(app, "O", "enter");
    expect(app.mode).toBe("otelConfigUnavailable");
    expect(app.collectorUnavailableReason).toBe("container otel-collector is not running");
  });
});
