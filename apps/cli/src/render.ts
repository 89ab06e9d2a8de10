import type { LogEntry, TimeDisplayMode, ViewMode } from "@tailscope/contracts";
import {
  type App,
  compactText,
  type DisplayField,
  describeLookback,
  entryLevel,
  entryMessage,
  formatDurationMs,
  formatQueryText,
  getPath,
  quickBindings,
  truncateText,
  type Viewport,
} from "@tailscope/core";

const ansi = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  inverse: "\x1b[7m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const SPARK_CHARS = "▁▂▃▄▅▆▇█";

export function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, "");
}

function paint(code: string, text: string): string {
  return `${code}${text}${ansi.reset}`;
}

function fit(text: string, width: number): string {
  return truncateText(text, width).padEnd(width);
}

function fitRight(text: string, width: number): string {
  return truncateText(text, width).padStart(width);
}

export function formatTimestamp(ms: number, mode: TimeDisplayMode, nowMs: number): string {
  const iso = new Date(ms).toISOString();
  switch (mode) {
    case "clock":
      return iso.slice(11, 19);
    case "full":
      return iso.slice(0, 23).replace("T", " ");
    case "relative": {
      const seconds = Math.floor(Math.max(0, nowMs - ms) / 1000);
      if (seconds < 60) return `${seconds}s ago`;
      if (seconds < 3600) return `${Math.floor(seconds / 60)}m ago`;
      if (seconds < 86400) return `${Math.floor(seconds / 3600)}h ago`;
      return `${Math.floor(seconds / 86400)}d ago`;
    }
  }
}

export function formatNumber(value: number | null): string {
  if (value === null) return "-";
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function sparkline(values: Array<number | null>, width = values.length): string {
  const tail = values.slice(-Math.max(0, width));
  const present = tail.filter((value): value is number => value !== null);
  if (present.length === 0) return " ".repeat(tail.length);
  const min = Math.min(...present);
  const max = Math.max(...present);
  const top = SPARK_CHARS.length - 1;
  return tail
    .map((value) => {
      if (value === null) return " ";
      const idx = max === min ? Math.floor(top / 2) : Math.round(((value - min) / (max - min)) * top);
      return SPARK_CHARS[idx] ?? " ";
    })
    .join("");
}

/** Column value for a display field; virtual columns read the extracted entry, others the raw document. */
export function cellValue(entry: LogEntry, field: DisplayField, timeDisplay: TimeDisplayMode, nowMs: number): string {
  switch (field.name) {
    case "@timestamp":
      return formatTimestamp(entry.timestampMs, timeDisplay, nowMs);
    case "severity_text":
      return entryLevel(entry);
    case "_resource":
      return entry.resource;
    case "service.name":
      return entry.serviceName;
    case "body.text":
      return compactText(entryMessage(entry), 2000);
    case "name":
      return entry.name;
    case "duration_ms":
      return formatDurationMs(entry.durationMs);
    case "status.code":
      return entry.statusCode;
    case "kind":
      return entry.kind;
    case "trace_id":
      return entry.traceId;
    case "_metrics":
      return Object.entries(entry.metrics)
        .map(([name, value]) => `${name}=${formatNumber(value)}`)
        .join(" ");
    default:
      return compactText(getPath(entry.raw, field.name), 2000);
  }
}

interface Column {
  field: DisplayField;
  width: number;
}

export function layoutColumns(fields: DisplayField[], width: number, timeDisplay: TimeDisplayMode): Column[] {
  const selected = fields.filter((field) => field.selected);
  const widths = selected.map((field) => {
    if (field.name === "@timestamp") return timeDisplay === "full" ? 23 : 8;
    return field.width;
  });
  const fixed = widths.reduce((sum, w) => sum + w, 0) + Math.max(0, selected.length - 1);
  const flexCount = widths.filter((w) => w === 0).length;
  // The first flexible column takes what is left; any further ones get ten cells.
  const flex = Math.max(10, width - fixed - Math.max(0, flexCount - 1) * 10);
  let flexUsed = false;
  return selected.map((field, i) => {
    const w = widths[i] ?? 0;
    if (w > 0) return { field, width: w };
    const out = { field, width: flexUsed ? 10 : flex };
    flexUsed = true;
    return out;
  });
}

export function columnHeader(columns: Column[], sortAscending: boolean): string {
  return columns
    .map(({ field, width }) => {
      const label = field.name === "@timestamp" ? `${field.label} ${sortAscending ? "↑" : "↓"}` : field.label;
      return fit(label, width);
    })
    .join(" ")
    .trimEnd();
}

function levelColor(level: string): string {
  switch (level.toUpperCase()) {
    case "ERROR":
    case "FATAL":
      return ansi.red;
    case "WARN":
    case "WARNING":
      return ansi.yellow;
    case "DEBUG":
    case "TRACE":
      return ansi.gray;
    default:
      return "";
  }
}

/** First index of a window of `rows` lines that keeps `cursor` visible. */
export function windowStart(cursor: number, length: number, rows: number): number {
  if (rows <= 0 || length <= rows) return 0;
  return Math.min(Math.max(0, cursor - rows + 1), length - rows);
}

function listRows<T>(items: T[], cursor: number, rows: number, line: (item: T, selected: boolean) => string): string[] {
  const start = windowStart(cursor, items.length, rows);
  return items.slice(start, start + rows).map((item, i) => {
    const selected = start + i === cursor;
    const text = line(item, selected);
    return selected ? paint(ansi.inverse, text) : text;
  });
}

function signalTitle(app: App): string {
  switch (app.signal) {
    case "logs":
      return "Logs";
    case "chat":
      return "Chat";
    case "metrics":
      return app.metricsViewMode === "documents" ? "Metrics › documents" : "Metrics";
    case "traces":
      if (app.traceViewLevel === "spans") return `Traces › ${app.selectedTxName} › ${app.selectedTraceId}`;
      if (app.traceViewLevel === "transactions") return `Traces › ${app.selectedTxName}`;
      return "Traces";
  }
}

function statusLine(app: App): string {
  const parts = [paint(ansi.bold, "tailscope"), signalTitle(app), app.dataSource.getIndex(), describeLookback(app.lookback)];
  if (app.levelFilter) parts.push(`level=${app.levelFilter}`);
  if (app.filterService) parts.push(`service${app.negateService ? "!=" : "="}${app.filterService}`);
  if (app.filterResource) parts.push(`resource${app.negateResource ? "!=" : "="}${app.filterResource}`);
  if (app.searchQuery) parts.push(`search="${app.searchQuery}"`);
  if (app.autoRefresh) parts.push("auto");
  if (app.loading) parts.push("loading…");
  const status = app.statusText();
  const left = parts.join(" │ ");
  return status ? `${left}  ${paint(ansi.cyan, status)}` : left;
}

function bindingsLine(app: App): string {
  return paint(
    ansi.dim,
    quickBindings(app.keymapContext())
      .map((binding) => `${binding.keys.join("/")} ${binding.label}`)
      .join("  "),
  );
}

function logsBody(app: App, rows: number, nowMs: number): string[] {
  const columns = layoutColumns(app.displayFields, app.width, app.timeDisplay);
  const lines = [paint(ansi.bold, columnHeader(columns, app.sortAscending))];
  if (app.entries.length === 0) {
    lines.push(app.loading ? "Loading..." : "No entries");
    return lines;
  }
  const listHeight = Math.max(1, rows - 2);
  lines.push(
    ...listRows(app.entries, app.selection.selectedIndex, listHeight, (entry, selected) => {
      const text = columns.map(({ field, width }) => fit(cellValue(entry, field, app.timeDisplay, nowMs), width)).join(" ");
      const color = levelColor(entryLevel(entry));
      return color && !selected ? paint(color, text) : text;
    }),
  );
  while (lines.length < rows - 1) lines.push("");
  lines.push(paint(ansi.dim, `${app.entries.length} of ${app.total} entries`));
  return lines;
}

function traceNamesBody(app: App, rows: number, nowMs: number): string[] {
  const header = [
    fit("TRANSACTION", 30),
    fitRight("COUNT", 7),
    fitRight("TRACES", 7),
    fitRight("AVG(ms)", 9),
    fitRight("MIN(ms)", 9),
    fitRight("MAX(ms)", 9),
    fitRight("ERR%", 6),
    "  LAST SEEN",
  ].join(" ");
  const lines = [paint(ansi.bold, header)];
  if (app.transactionNames.length === 0) {
    lines.push(app.tracesLoading ? "Loading..." : "No transactions");
    return lines;
  }
  lines.push(
    ...listRows(app.transactionNames, app.traceNamesCursor, rows - 1, (tx) =>
      [
        fit(tx.name, 30),
        fitRight(String(tx.count), 7),
        fitRight(String(tx.traceCount), 7),
        fitRight(tx.avgDurationMs.toFixed(1), 9),
        fitRight(tx.minDurationMs.toFixed(1), 9),
        fitRight(tx.maxDurationMs.toFixed(1), 9),
        fitRight(tx.errorRate.toFixed(1), 6),
        `  ${tx.lastSeenMs === null ? "-" : formatTimestamp(tx.lastSeenMs, "relative", nowMs)}`,
      ].join(" "),
    ),
  );
  return lines;
}

function metricsDashboardBody(app: App, rows: number): string[] {
  const trendWidth = Math.max(10, app.width - 30 - 12 - 4 * 11 - 7);
  const header = [
    fit("METRIC", 30),
    fit("TYPE", 12),
    fitRight("MIN", 10),
    fitRight("AVG", 10),
    fitRight("MAX", 10),
    fitRight("LATEST", 10),
    " TREND",
  ].join(" ");
  const lines = [paint(ansi.bold, header)];
  const metrics = app.metricList();
  if (metrics.length === 0) {
    lines.push(app.metricsLoading ? "Loading..." : "No metrics");
    return lines;
  }
  lines.push(
    ...listRows(metrics, app.metricsCursor, rows - 1, (metric) =>
      [
        fit(metric.shortName, 30),
        fit(metric.type, 12),
        fitRight(formatNumber(metric.min), 10),
        fitRight(formatNumber(metric.avg), 10),
        fitRight(formatNumber(metric.max), 10),
        fitRight(formatNumber(metric.latest), 10),
        ` ${sparkline(
          metric.buckets.map((bucket) => bucket.value),
          trendWidth,
        )}`,
      ].join(" "),
    ),
  );
  return lines;
}

function metricDetailBody(app: App, nowMs: number): string[] {
  const metric = app.selectedMetric();
  if (!metric) return ["No metric selected"];
  const lines = [
    paint(ansi.bold, metric.name),
    "",
    `Type:     ${metric.type}`,
    `Min:      ${formatNumber(metric.min)}`,
    `Avg:      ${formatNumber(metric.avg)}`,
    `Max:      ${formatNumber(metric.max)}`,
    `Latest:   ${formatNumber(metric.latest)}`,
    `Buckets:  ${metric.buckets.length} × ${app.metrics?.bucketSize ?? ""}`,
    "",
    sparkline(
      metric.buckets.map((bucket) => bucket.value),
      Math.max(10, app.width - 2),
    ),
    "",
  ];
  if (app.metricDocsLoading) {
    lines.push("Loading documents...");
    return lines;
  }
  const doc = app.metricDocs[app.metricDocCursor];
  if (!doc) {
    lines.push("No documents");
    return lines;
  }
  lines.push(
    `Document ${app.metricDocCursor + 1}/${app.metricDocs.length}  ${formatTimestamp(doc.timestampMs, "full", nowMs)}`,
    `  ${metric.name}: ${formatNumber(doc.metrics[metric.shortName] ?? null)}`,
  );
  if (doc.serviceName) lines.push(`  service: ${doc.serviceName}`);
  return lines;
}

function perspectiveBody(app: App, rows: number): string[] {
  const title = app.perspectiveType === "services" ? "SERVICE" : "RESOURCE";
  const active = app.perspectiveType === "services" ? app.filterService : app.filterResource;
  const negated = app.perspectiveType === "services" ? app.negateService : app.negateResource;
  const header = ["  ", fit(title, 40), fitRight("LOGS", 9), fitRight("TRACES", 9), fitRight("METRICS", 9)].join(" ");
  const lines = [paint(ansi.bold, header)];
  if (app.perspectiveItems.length === 0) {
    lines.push(app.perspectiveLoading ? "Loading..." : "Nothing found");
    return lines;
  }
  lines.push(
    ...listRows(app.perspectiveItems, app.perspectiveCursor, rows - 1, (item) => {
      const marker = item.name === active ? (negated ? "- " : "+ ") : "  ";
      return [
        marker,
        fit(item.name, 40),
        fitRight(String(item.logCount), 9),
        fitRight(String(item.traceCount), 9),
        fitRight(String(item.metricCount), 9),
      ].join(" ");
    }),
  );
  return lines;
}

function fieldsBody(app: App, rows: number): string[] {
  const displayed = new Set(app.displayFields.map((field) => field.name));
  const filter = app.fieldsFilterMode || app.fieldsFilter.value ? `filter: ${app.fieldsFilter.value}` : "";
  const lines = [paint(ansi.bold, "Fields"), filter];
  const fields = app.fieldList();
  if (fields.length === 0) {
    lines.push(app.fieldsLoading ? "Loading..." : "No fields");
    return lines;
  }
  lines.push(
    ...listRows(fields, app.fieldsCursor, rows - 2, (field) => {
      const box = displayed.has(field.name) ? "[x]" : "[ ]";
      return `${box} ${fit(field.name, 50)} ${fit(field.type, 12)} ${fitRight(String(field.docCount), 9)}`;
    }),
  );
  return lines;
}

function viewportBody(title: string, viewport: Viewport): string[] {
  return [paint(ansi.bold, title), ...viewport.visibleLines()];
}

function inputLine(prefix: string, value: string, cursor: number, focused: boolean): string {
  if (!focused) return `${prefix}${value}`;
  const at = value.slice(cursor, cursor + 1) || " ";
  return `${prefix}${value.slice(0, cursor)}${paint(ansi.inverse, at)}${value.slice(cursor + 1)}`;
}

function chatBody(app: App): string[] {
  return [
    ...viewportBody("Chat", app.chatViewport),
    "",
    inputLine("> ", app.chatInput.value || (app.chatInput.focused ? "" : app.chatInput.placeholder), app.chatInput.cursor, app.chatInput.focused),
  ];
}

function credsBody(app: App): string[] {
  const es = app.config.es;
  const user = es.apiKey ? "(API key)" : es.username || "(none)";
  return [
    paint(ansi.bold, "Open in Kibana"),
    "",
    "Kibana may ask you to log in with these credentials:",
    `  username: ${user}`,
    `  password: ${es.password ? "*".repeat(8) : "(none)"}`,
    "",
    truncateText(app.pendingKibanaUrl, app.width),
    "",
    "enter open  y copy URL  p copy password  n open and don't ask again  esc cancel",
  ];
}

function collectorBody(app: App): string[] {
  switch (app.mode) {
    case "otelConfigExplain":
      return [
        paint(ansi.bold, "OpenTelemetry collector config"),
        "",
        "Opens the collector configuration in your editor and watches it for changes.",
        "Every saved change is validated and, when valid, the collector is reloaded.",
        "",
        "enter open  esc cancel",
      ];
    case "otelConfigUnavailable":
      return [paint(ansi.bold, "Collector config unavailable"), "", app.collectorUnavailableReason, "", "esc close"];
    default: {
      const validation = app.collectorValidation;
      const lines = [paint(ansi.bold, "Collector config"), "", `Watching: ${app.collectorPath}`];
      if (validation) {
        lines.push(validation.valid ? paint(ansi.green, "Config is valid") : paint(ansi.red, "Config is invalid"));
        if (!validation.valid) lines.push(...validation.message.split("\n"));
      }
      if (app.collectorReloadError) {
        lines.push(paint(ansi.red, `Reload failed: ${app.collectorReloadError.message}`));
      } else if (app.collectorReloadedMs !== null) {
        lines.push(`Reloaded at ${formatTimestamp(app.collectorReloadedMs, "full", 0)}`);
      }
      lines.push("", "y copy path  Y copy errors  esc stop watching");
      return lines;
    }
  }
}

/** Modes drawn as a box over the view underneath them. */
const OVERLAY_MODES: ReadonlySet<ViewMode> = new Set<ViewMode>(["errorModal", "help", "quitConfirm"]);

function modalBox(title: string, content: string[], width: number, color: string): string[] {
  const inner = Math.max(1, width - 4);
  const label = truncateText(` ${title} `, inner);
  const side = paint(color, "│");
  return [
    paint(color, `┌─${label}${"─".repeat(inner - label.length)}─┐`),
    ...content.map((line) => `${side} ${fit(line, inner)} ${side}`),
    paint(color, `└${"─".repeat(inner + 2)}┘`),
  ];
}

function overlayBox(app: App, mode: ViewMode): string[] {
  switch (mode) {
    case "errorModal":
      return modalBox("Error", app.errorViewport.visibleLines(), app.width, ansi.red);
    case "help":
      return modalBox("Help", app.helpViewport.visibleLines(), app.width, ansi.cyan);
    default:
      return modalBox("Quit", ["Quit tailscope? (y/n)"], app.width, ansi.yellow);
  }
}

/** Nearest view under the active one that is not itself an overlay. */
function backdrop(app: App): ViewMode {
  const under = app.views.peek();
  if (!OVERLAY_MODES.has(under)) return under;
  const ancestors = app.views.snapshot();
  for (let i = ancestors.length - 1; i >= 0; i -= 1) {
    const mode = ancestors[i];
    if (mode && !OVERLAY_MODES.has(mode)) return mode;
  }
  return "logs";
}

function screenBody(app: App, mode: ViewMode, rows: number, nowMs: number): string[] {
  const lines = body(app, mode, rows, nowMs).slice(0, rows);
  while (lines.length < rows) lines.push("");
  if (!OVERLAY_MODES.has(mode)) return lines;
  const box = overlayBox(app, mode).slice(0, rows);
  const top = Math.floor((rows - box.length) / 2);
  lines.splice(top, box.length, ...box);
  return lines;
}

function body(app: App, mode: ViewMode, rows: number, nowMs: number): string[] {
  switch (mode) {
    case "logs":
      return logsBody(app, rows, nowMs);
    case "search": {
      const lines = logsBody(app, rows, nowMs).slice(0, rows - 1);
      while (lines.length < rows - 1) lines.push("");
      return [...lines, inputLine("/", app.searchInput.value, app.searchInput.cursor, true)];
    }
    case "index": {
      const lines = logsBody(app, rows, nowMs).slice(0, rows - 1);
      while (lines.length < rows - 1) lines.push("");
      return [...lines, inputLine("index: ", app.indexInput.value, app.indexInput.cursor, true)];
    }
    case "traceNames":
      return traceNamesBody(app, rows, nowMs);
    case "metricsDashboard":
      return metricsDashboardBody(app, rows);
    case "metricDetail":
      return metricDetailBody(app, nowMs);
    case "perspectiveList":
      return perspectiveBody(app, rows);
    case "fields":
      return fieldsBody(app, rows);
    case "detail":
      return viewportBody("Detail", app.detailViewport);
    case "detailJson":
      return viewportBody("Detail (JSON)", app.detailViewport);
    case "errorModal":
    case "help":
    case "quitConfirm":
      return body(app, backdrop(app), rows, nowMs);
    case "chat":
      return chatBody(app);
    case "query":
      return [
        paint(ansi.bold, `Query (${app.queryFormat})`),
        "",
        ...(app.lastQuery
          ? formatQueryText(app.queryFormat, app.lastQuery, app.lastQueryIndex, app.config.es.url).split("\n")
          : ["No query yet"]),
      ];
    case "credsModal":
      return credsBody(app);
    case "otelConfigExplain":
    case "otelConfigUnavailable":
    case "otelConfigModal":
      return collectorBody(app);
  }
}

/** Full frame: the view body, then the status bar and the quick key hints on the last two lines. */
export function render(app: App, nowMs = Date.now()): string {
  const rows = Math.max(1, app.height - 2);
  const lines = screenBody(app, app.mode, rows, nowMs);
  lines.push(statusLine(app), bindingsLine(app));
  return lines.join("\n");
}
