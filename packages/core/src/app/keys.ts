import type { LevelFilter, ViewMode } from "@tailscope/contracts";
import { formatError } from "../errors.js";
import { defaultFields, toggleField } from "../fields.js";
import { formatQueryText } from "../kibana.js";
import { nextLookback } from "../lookback.js";
import { LIST_PAGE_SIZE, listNav } from "../selection.js";
import { prettyJson } from "../utils.js";
import { viewportScroll } from "../viewport.js";
import type { App } from "./app.js";

export type KeyHandler = (app: App, key: string) => void;

const LEVEL_KEYS: Readonly<Record<string, LevelFilter>> = {
  "0": "",
  "1": "ERROR",
  "2": "WARN",
  "3": "INFO",
  "4": "DEBUG",
};

const TIME_DISPLAY_ORDER = ["clock", "relative", "full"] as const;

function levelForKey(key: string): LevelFilter | null {
  return Object.hasOwn(LEVEL_KEYS, key) ? (LEVEL_KEYS[key] ?? null) : null;
}

/** Moves the entry cursor; in trace mode a real move may start a span fetch. */
function moveEntrySelection(app: App, key: string): boolean {
  let moved: boolean;
  switch (key) {
    case "up":
    case "k":
      moved = app.selection.moveSelection(-1);
      break;
    case "down":
    case "j":
      moved = app.selection.moveSelection(1);
      break;
    case "pgup":
      moved = app.selection.moveSelection(-LIST_PAGE_SIZE);
      break;
    case "pgdown":
      moved = app.selection.moveSelection(LIST_PAGE_SIZE);
      break;
    case "home":
    case "g":
      moved = app.selection.setSelectedIndex(0);
      break;
    case "end":
    case "G":
      moved = app.selection.setSelectedIndex(app.entries.length - 1);
      break;
    default:
      return false;
  }
  if (moved) app.maybeFetchSpansForSelection();
  return true;
}

function openSearch(app: App): void {
  app.searchInput.setValue(app.searchQuery);
  app.searchInput.focus();
  app.views.push("search");
}

function cycleLookback(app: App): void {
  app.lookback = nextLookback(app.lookback);
  app.startInitialFetch();
}

/** `esc` in the list walks back up the trace or metric hierarchy. */
function logsBack(app: App): void {
  if (app.signal === "traces" && app.traceViewLevel === "spans") {
    app.traceViewLevel = "transactions";
    app.selectedTraceId = "";
    app.selection.reset(0);
    app.selection.resetScroll();
    app.fetchLogs();
    return;
  }
  if (app.signal === "traces" && app.traceViewLevel === "transactions") {
    app.traceViewLevel = "names";
    app.selectedTxName = "";
    app.returnTo("traceNames");
    app.fetchTransactionNames();
    return;
  }
  if (app.signal === "metrics" && app.metricsViewMode === "documents") {
    app.metricsViewMode = "aggregated";
    app.returnTo("metricsDashboard");
    app.fetchMetricsAgg();
  }
}

function handleLogsKey(app: App, key: string): void {
  if (moveEntrySelection(app, key)) return;

  const level = levelForKey(key);
  if (level !== null) {
    app.levelFilter = level;
    app.selection.resetScroll();
    app.fetchLogs();
    return;
  }

  switch (key) {
    case "/":
      openSearch(app);
      return;
    case "enter":
      if (app.selectedEntry()) app.openDetail("entries");
      return;
    case "r":
      app.fetchLogs();
      return;
    case "a":
      app.autoRefresh = !app.autoRefresh;
      app.setStatus(app.autoRefresh ? "Auto-refresh on" : "Auto-refresh off");
      return;
    case "Q":
      app.queryFormat = "kibana";
      app.views.push("query");
      return;
    case "f":
      app.fieldsCursor = 0;
      app.fieldsFilter.reset();
      app.fieldsFilterMode = false;
      app.views.push("fields");
      app.fetchFieldCaps();
      return;
    case "s":
      app.sortAscending = !app.sortAscending;
      app.fetchLogs();
      return;
    case "l":
      cycleLookback(app);
      return;
    case "m":
      app.cycleSignalType();
      return;
    case "p":
      app.cyclePerspective();
      return;
    case "K":
      app.openQueryInKibana();
      return;
    case "i":
      app.indexInput.setValue(app.dataSource.getIndex());
      app.indexInput.focus();
      app.views.push("index");
      return;
    case "t": {
      const idx = TIME_DISPLAY_ORDER.indexOf(app.timeDisplay);
      app.timeDisplay = TIME_DISPLAY_ORDER[(idx + 1) % TIME_DISPLAY_ORDER.length] ?? "clock";
      return;
    }
    case "d":
      if (app.signal === "metrics" && app.metricsViewMode === "documents") logsBack(app);
      return;
    case "c":
      app.openChat();
      return;
    case "O":
      app.views.push("otelConfigExplain");
      return;
    case "esc":
      logsBack(app);
      return;
    default:
      return;
  }
}

function stepDetail(app: App, delta: number): void {
  if (app.detailSource === "metricDocs") {
    const next = Math.min(Math.max(app.metricDocCursor + delta, 0), Math.max(0, app.metricDocs.length - 1));
    if (next === app.metricDocCursor) return;
    app.metricDocCursor = next;
  } else if (!app.selection.moveSelection(delta)) {
    return;
  }
  app.refreshDetailContent();
  app.detailViewport.gotoTop();
}

function handleDetailKey(app: App, key: string): void {
  switch (key) {
    case "esc":
    case "q":
      app.views.pop();
      return;
    case "left":
    case "h":
      stepDetail(app, -1);
      return;
    case "right":
    case "l":
      stepDetail(app, 1);
      return;
    case "enter":
    case "J":
      app.views.set(app.mode === "detail" ? "detailJson" : "detail");
      app.refreshDetailContent();
      app.detailViewport.gotoTop();
      return;
    case "y": {
      const item = app.detailItem();
      if (item) app.copy(prettyJson(item.raw), "JSON");
      return;
    }
    case "S": {
      const item = app.detailItem();
      if (app.signal !== "traces" || app.detailSource !== "entries" || !item?.traceId) return;
      app.selectedTraceId = item.traceId;
      app.traceViewLevel = "spans";
      app.views.pop();
      app.selection.reset(0);
      app.selection.resetScroll();
      app.fetchLogs();
      return;
    }
    default:
      viewportScroll(app.detailViewport, key);
  }
}

function handleSearchKey(app: App, key: string): void {
  switch (key) {
    case "enter":
      app.searchQuery = app.searchInput.value.trim();
      app.searchInput.blur();
      app.selection.resetScroll();
      app.views.pop();
      app.startInitialFetch();
      return;
    case "esc":
      app.searchInput.blur();
      app.views.pop();
      return;
    default:
      app.searchInput.handleKey(key);
  }
}

function handleIndexKey(app: App, key: string): void {
  switch (key) {
    case "enter": {
      const index = app.indexInput.value.trim();
      app.indexInput.blur();
      app.views.pop();
      if (!index) return;
      app.dataSource.setIndex(index);
      app.setStatus(`Index: ${index}`);
      app.startInitialFetch();
      return;
    }
    case "esc":
      app.indexInput.blur();
      app.views.pop();
      return;
    default:
      app.indexInput.handleKey(key);
  }
}

function handleQueryKey(app: App, key: string): void {
  switch (key) {
    case "esc":
    case "q":
    case "Q":
      app.views.pop();
      return;
    case "c":
      app.queryFormat = "curl";
      return;
    case "k":
      app.queryFormat = "kibana";
      return;
    case "y":
      if (!app.lastQuery) {
        app.setStatus("No query to copy");
        return;
      }
      app.copy(formatQueryText(app.queryFormat, app.lastQuery, app.lastQueryIndex, app.config.es.url), "query");
      return;
    default:
      return;
  }
}

function handleFieldsKey(app: App, key: string): void {
  if (app.fieldsFilterMode) {
    switch (key) {
      case "esc":
        app.fieldsFilter.reset();
        app.fieldsFilterMode = false;
        app.fieldsCursor = 0;
        return;
      case "enter":
        app.fieldsFilterMode = false;
        return;
      default:
        if (app.fieldsFilter.handleKey(key)) app.fieldsCursor = 0;
        return;
    }
  }

  const fields = app.fieldList();
  const cursor = listNav(app.fieldsCursor, fields.length, key);
  if (cursor >= 0) {
    app.fieldsCursor = cursor;
    return;
  }
  switch (key) {
    case "esc":
    case "q":
      app.views.pop();
      return;
    case "space":
    case "enter": {
      const field = fields[app.fieldsCursor];
      if (!field) return;
      app.displayFields = toggleField(app.displayFields, field.name);
      app.fieldsCursor = Math.min(app.fieldsCursor, Math.max(0, app.fieldList().length - 1));
      return;
    }
    case "/":
      app.fieldsFilterMode = true;
      return;
    case "r":
      app.displayFields = defaultFields(app.signal);
      app.fieldsCursor = 0;
      app.setStatus("Fields reset to defaults");
      return;
    default:
      return;
  }
}

function handleMetricsDashboardKey(app: App, key: string): void {
  const cursor = listNav(app.metricsCursor, app.metricList().length, key);
  if (cursor >= 0) {
    app.metricsCursor = cursor;
    return;
  }
  switch (key) {
    case "enter":
      if (!app.selectedMetric()) return;
      app.metricDocCursor = 0;
      app.metricDocs = [];
      app.views.push("metricDetail");
      app.fetchMetricDetailDocs();
      return;
    case "r":
      app.fetchMetricsAgg();
      return;
    case "d":
      app.metricsViewMode = "documents";
      app.views.push("logs");
      app.entries = [];
      app.selection.setLength(0);
      app.selection.reset(0);
      app.selection.resetScroll();
      app.fetchLogs();
      return;
    case "p":
      app.cyclePerspective();
      return;
    case "l":
      app.lookback = nextLookback(app.lookback);
      app.fetchMetricsAgg();
      return;
    case "m":
      app.cycleSignalType();
      return;
    case "/":
      openSearch(app);
      return;
    case "K":
      app.openMetricInKibana();
      return;
    default:
      return;
  }
}

function stepMetric(app: App, delta: number): void {
  const next = Math.min(Math.max(app.metricsCursor + delta, 0), Math.max(0, app.metricList().length - 1));
  if (next === app.metricsCursor) return;
  app.metricsCursor = next;
  app.metricDocCursor = 0;
  app.metricDocs = [];
  app.fetchMetricDetailDocs();
}

function handleMetricDetailKey(app: App, key: string): void {
  switch (key) {
    case "esc":
    case "backspace":
    case "q":
      app.views.pop();
      return;
    case "left":
    case "h":
      stepMetric(app, -1);
      return;
    case "right":
    case "l":
      stepMetric(app, 1);
      return;
    case "n":
      app.metricDocCursor = Math.min(app.metricDocCursor + 1, Math.max(0, app.metricDocs.length - 1));
      return;
    case "N":
      app.metricDocCursor = Math.max(0, app.metricDocCursor - 1);
      return;
    case "J":
      if (app.metricDocs[app.metricDocCursor]) app.openDetail("metricDocs", "detailJson");
      return;
    case "y": {
      const doc = app.metricDocs[app.metricDocCursor];
      if (doc) app.copy(prettyJson(doc.raw), "document JSON");
      return;
    }
    case "r":
      app.fetchMetricsAgg();
      app.fetchMetricDetailDocs();
      return;
    case "K":
      app.openMetricInKibana();
      return;
    default:
      return;
  }
}

function handleTraceNamesKey(app: App, key: string): void {
  const cursor = listNav(app.traceNamesCursor, app.transactionNames.length, key);
  if (cursor >= 0) {
    app.traceNamesCursor = cursor;
    return;
  }
  switch (key) {
    case "enter": {
      const selected = app.transactionNames[app.traceNamesCursor];
      if (!selected) return;
      app.selectedTxName = selected.name;
      app.traceViewLevel = "transactions";
      app.views.push("logs");
      app.entries = [];
      app.selection.setLength(0);
      app.selection.reset(0);
      app.selection.resetScroll();
      app.fetchLogs();
      return;
    }
    case "r":
      app.fetchTransactionNames();
      return;
    case "p":
      app.cyclePerspective();
      return;
    case "l":
      app.lookback = nextLookback(app.lookback);
      app.fetchTransactionNames();
      return;
    case "m":
      app.cycleSignalType();
      return;
    case "/":
      openSearch(app);
      return;
    default:
      return;
  }
}

function handlePerspectiveKey(app: App, key: string): void {
  const cursor = listNav(app.perspectiveCursor, app.perspectiveItems.length, key);
  if (cursor >= 0) {
    app.perspectiveCursor = cursor;
    return;
  }
  switch (key) {
    case "enter":
      app.togglePerspectiveFilter();
      return;
    case "p":
      app.cyclePerspective();
      return;
    case "l":
      app.lookback = nextLookback(app.lookback);
      app.filtersDirty = true;
      app.fetchPerspective();
      return;
    case "r":
      app.fetchPerspective();
      return;
    case "esc":
    case "q":
      app.leavePerspective();
      return;
    default:
      return;
  }
}

function handleErrorModalKey(app: App, key: string): void {
  switch (key) {
    case "esc":
    case "q":
      app.dismissError();
      return;
    case "y":
      if (app.err) app.copy(formatError(app.err), "error");
      return;
    default:
      viewportScroll(app.errorViewport, key);
  }
}

function handleQuitConfirmKey(app: App, key: string): void {
  switch (key) {
    case "y":
    case "Y":
      app.quit();
      return;
    case "n":
    case "N":
    case "esc":
      app.views.pop();
      return;
    default:
      return;
  }
}

function handleHelpKey(app: App, key: string): void {
  if (key === "esc" || key === "q") {
    app.views.pop();
    return;
  }
  viewportScroll(app.helpViewport, key);
}

function handleChatKey(app: App, key: string): void {
  if (key === "ctrl+l") {
    app.clearChat();
    return;
  }
  if (app.chatInput.focused) {
    switch (key) {
      case "esc":
        app.chatInput.blur();
        return;
      case "enter":
        app.submitChat();
        return;
      default:
        app.chatInput.handleKey(key);
        return;
    }
  }
  switch (key) {
    case "esc":
    case "q":
      app.leaveChat();
      return;
    case "i":
    case "enter":
    case "/":
      app.chatInput.focus();
      return;
    default:
      viewportScroll(app.chatViewport, key);
  }
}

function handleCredsModalKey(app: App, key: string): void {
  switch (key) {
    case "esc":
      app.pendingKibanaUrl = "";
      app.views.pop();
      return;
    case "enter":
      app.openUrl(app.pendingKibanaUrl, "Kibana");
      return;
    case "y":
      app.copy(app.pendingKibanaUrl, "URL");
      return;
    case "p":
      if (!app.config.es.password) {
        app.setStatus("No password configured");
        return;
      }
      app.copy(app.config.es.password, "password");
      return;
    case "n":
      app.hideCredsModal = true;
      app.views.pop();
      app.openUrl(app.pendingKibanaUrl, "Kibana");
      return;
    default:
      return;
  }
}

function handleCollectorExplainKey(app: App, key: string): void {
  switch (key) {
    case "enter":
    case "o":
    case "O":
      app.views.pop();
      app.openCollector();
      return;
    case "esc":
    case "q":
      app.views.pop();
      return;
    default:
      return;
  }
}

function handleCollectorUnavailableKey(app: App, key: string): void {
  if (key === "esc" || key === "q" || key === "enter") {
    app.views.pop();
  }
}

function handleCollectorModalKey(app: App, key: string): void {
  switch (key) {
    case "y":
      app.copy(app.collectorPath, "config path");
      return;
    case "Y": {
      const error = app.collectorErrorText();
      if (!error) {
        app.setStatus("No errors to copy");
        return;
      }
      app.copy(error, "error");
      return;
    }
    case "esc":
    case "q":
      app.stopWatchingCollector();
      app.views.pop();
      return;
    default:
      return;
  }
}

export const KEY_HANDLERS: Readonly<Record<ViewMode, KeyHandler>> = {
  logs: handleLogsKey,
  search: handleSearchKey,
  detail: handleDetailKey,
  detailJson: handleDetailKey,
  index: handleIndexKey,
  query: handleQueryKey,
  fields: handleFieldsKey,
  metricsDashboard: handleMetricsDashboardKey,
  metricDetail: handleMetricDetailKey,
  traceNames: handleTraceNamesKey,
  perspectiveList: handlePerspectiveKey,
  errorModal: handleErrorModalKey,
  quitConfirm: handleQuitConfirmKey,
  help: handleHelpKey,
  chat: handleChatKey,
  credsModal: handleCredsModalKey,
  otelConfigExplain: handleCollectorExplainKey,
  otelConfigUnavailable: handleCollectorUnavailableKey,
  otelConfigModal: handleCollectorModalKey,
};
