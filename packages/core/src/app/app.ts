import type {
  AggregatedMetric,
  AppConfig,
  AppEvent,
  ChatMessage,
  CollectorOpened,
  CollectorValidation,
  EffectEvent,
  FetchOutcome,
  FieldInfo,
  LevelFilter,
  LogEntry,
  Lookback,
  MetricsAggResult,
  MetricsViewMode,
  MouseEvent,
  PerspectiveItem,
  PerspectiveType,
  QueryFilters,
  QueryFormat,
  RequestKind,
  ResultEvent,
  SignalType,
  TailOptions,
  TimeDisplayMode,
  TraceViewLevel,
  TransactionNameAgg,
  ViewMode,
} from "@tailscope/contracts";
import { CHAT_WELCOME, type ChatContext, formatChatContext, withContext } from "../agentBuilder.js";
import type { ChatClient, DataSource, Effects } from "../dataSource.js";
import { formatError, isAbortError, toError } from "../errors.js";
import { EventQueue } from "../eventQueue.js";
import { FetchPipeline, METRIC_DETAIL_DOCS } from "../fetchPipeline.js";
import { collectSearchFields, defaultFields, type DisplayField, sortedFieldList } from "../fields.js";
import { helpEnabled, type KeymapContext, viewKeymap } from "../keymap.js";
import { buildDiscoverUrl, buildMetricKibanaQuery } from "../kibana.js";
import { createNoopLogger, type Logger } from "../logger.js";
import { entryLevel, entryMessage } from "../logEntry.js";
import { describeLookback, lookbackBucketSize } from "../lookback.js";
import { RequestTracker } from "../requests.js";
import { SelectionModel } from "../selection.js";
import { TextInput } from "../textInput.js";
import { truncateText } from "../utils.js";
import { Viewport } from "../viewport.js";
import { ViewStack } from "../viewStack.js";
import { chatContent, detailContent, detailJsonContent, helpContent } from "./content.js";
import { KEY_HANDLERS } from "./keys.js";

export interface AppOptions {
  config: AppConfig;
  dataSource: DataSource;
  chat?: ChatClient;
  effects?: Effects;
  logger?: Logger;
  /** Signal shown first. */
  signal?: SignalType;
  /** Fixes the first view's lookback instead of auto-detecting it. */
  lookback?: Lookback;
  now?: () => number;
  /** Asks the driver to enqueue a tick event after `delayMs`. */
  scheduleTick?: (delayMs: number) => void;
  /** Aborting it cancels every in-flight request. */
  abortSignal?: AbortSignal;
}

export interface StatusMessage {
  text: string;
  atMs: number;
}

/** Which list the detail views read their item from. */
export type DetailSource = "entries" | "metricDocs";

export const SIGNAL_INDEX: Readonly<Record<Exclude<SignalType, "chat">, string>> = {
  logs: "logs-*",
  traces: "traces-*",
  metrics: "metrics-*",
};

const RESULT_KIND: Readonly<Record<ResultEvent["type"], RequestKind>> = {
  logsResult: "logs",
  fieldCapsResult: "fieldCaps",
  autoDetectResult: "autoDetect",
  metricsAggResult: "metricsAgg",
  metricDetailDocsResult: "metricDetailDocs",
  transactionNamesResult: "transactionNames",
  spansResult: "spans",
  perspectiveResult: "perspective",
  chatResult: "chat",
};

/** Views that own the screen rather than sit on top of one; `q` asks to quit there. */
const PRIMARY_VIEWS: ReadonlySet<ViewMode> = new Set(["logs", "traceNames", "metricsDashboard"]);

const MOUSE_LIST_STEP = 2;
const MOUSE_VIEWPORT_STEP = 3;

function perspectiveLabel(type: PerspectiveType): string {
  return type === "services" ? "Services" : "Resources";
}

function clampCursor(cursor: number, length: number): number {
  if (length <= 0) return 0;
  return Math.min(Math.max(cursor, 0), length - 1);
}

/**
 * The interaction model. All mutable state lives here and only `update` changes it; fetches run
 * in the pipeline and come back as result events.
 */
export class App {
  readonly config: AppConfig;
  readonly dataSource: DataSource;
  readonly effects: Effects;
  readonly logger: Logger;
  readonly queue = new EventQueue<AppEvent>();
  readonly tracker: RequestTracker;
  readonly pipeline: FetchPipeline;
  readonly views: ViewStack;
  readonly selection = new SelectionModel();
  private readonly now: () => number;
  private readonly scheduleTick: (delayMs: number) => void;
  private readonly latest = new Map<RequestKind, number>();
  private readonly effectsInFlight = new Set<Promise<void>>();
  private stopCollectorWatch: (() => void) | null = null;
  private skipAutoDetect = false;

  signal: SignalType;
  lookback: Lookback = "1h";
  sortAscending = false;
  levelFilter: LevelFilter = "";
  searchQuery = "";
  filterService = "";
  negateService = false;
  filterResource = "";
  negateResource = false;
  /** Set when a perspective filter changed; the view underneath refetches on return. */
  filtersDirty = false;
  autoRefresh: boolean;
  timeDisplay: TimeDisplayMode = "clock";
  queryFormat: QueryFormat = "kibana";
  traceViewLevel: TraceViewLevel = "names";
  metricsViewMode: MetricsViewMode = "aggregated";

  entries: LogEntry[] = [];
  total = 0;
  loading = false;
  err: Error | null = null;
  lastRefreshMs: number | null = null;
  lastQuery = "";
  lastQueryIndex = "";

  displayFields: DisplayField[];
  availableFields: FieldInfo[] = [];
  fieldsLoading = false;
  fieldsCursor = 0;
  fieldsFilterMode = false;
  readonly fieldsFilter = new TextInput("filter fields");

  metrics: MetricsAggResult | null = null;
  metricsLoading = false;
  metricsCursor = 0;
  metricDocs: LogEntry[] = [];
  metricDocsLoading = false;
  metricDocCursor = 0;

  transactionNames: TransactionNameAgg[] = [];
  tracesLoading = false;
  traceNamesCursor = 0;
  selectedTxName = "";
  selectedTraceId = "";
  spans: LogEntry[] = [];
  spansLoading = false;
  lastFetchedTraceId = "";

  perspectiveType: PerspectiveType = "services";
  perspectiveItems: PerspectiveItem[] = [];
  perspectiveLoading = false;
  perspectiveCursor = 0;

  chatMessages: ChatMessage[] = [];
  chatLoading = false;
  conversationId = "";
  readonly chatInput = new TextInput("Ask about your data...");
  readonly searchInput = new TextInput("search");
  readonly indexInput = new TextInput("index pattern");

  detailSource: DetailSource = "entries";
  readonly detailViewport = new Viewport();
  readonly errorViewport = new Viewport();
  readonly helpViewport = new Viewport();
  readonly chatViewport = new Viewport();
  width = 80;
  height = 24;

  status: StatusMessage | null = null;
  pendingKibanaUrl = "";
  hideCredsModal = false;

  collectorPath = "";
  collectorValidation: CollectorValidation | null = null;
  collectorReloadError: Error | null = null;
  collectorReloadedMs: number | null = null;
  collectorUnavailableReason = "";

  quitting = false;

  constructor(options: AppOptions) {
    this.config = options.config;
    this.dataSource = options.dataSource;
    this.effects = options.effects ?? {};
    this.logger = options.logger ?? createNoopLogger();
    this.now = options.now ?? Date.now;
    this.scheduleTick = options.scheduleTick ?? (() => undefined);
    this.signal = options.signal ?? "logs";
    if (options.lookback) {
      this.lookback = options.lookback;
      this.skipAutoDetect = true;
    }
    this.autoRefresh = options.config.tui.autoRefresh;
    this.displayFields = defaultFields(this.signal);
    this.tracker = new RequestTracker(options.abortSignal);
    this.pipeline = new FetchPipeline({
      tracker: this.tracker,
      queue: this.queue,
      dataSource: options.dataSource,
      chat: options.chat,
      timeouts: options.config.tui,
      logger: this.logger,
    });
    this.views = new ViewStack("logs");
    this.resize(this.width, this.height);
  }

  get mode(): ViewMode {
    return this.views.current;
  }

  /** Enters the initial signal view and arms the refresh tick. */
  start(): void {
    this.enterSignalView(this.signal);
    this.skipAutoDetect = false;
    this.scheduleTick(this.config.tui.tickIntervalMs);
  }

  update(event: AppEvent): void {
    switch (event.type) {
      case "key":
        this.handleKey(event.key);
        return;
      case "mouse":
        this.handleMouse(event);
        return;
      case "resize":
        this.resize(event.width, event.height);
        return;
      case "tick":
        if (this.autoRefresh && this.mode === "logs") {
          this.fetchLogs();
        }
        this.scheduleTick(this.config.tui.tickIntervalMs);
        return;
      case "logsResult":
      case "fieldCapsResult":
      case "autoDetectResult":
      case "metricsAggResult":
      case "metricDetailDocsResult":
      case "transactionNamesResult":
      case "spansResult":
      case "perspectiveResult":
      case "chatResult":
        this.handleResult(event);
        return;
      default:
        this.handleEffect(event);
    }
  }

  /** Consumes events until quit or the queue closes; `onUpdate` runs after each one. */
  async run(onUpdate: (app: App) => void): Promise<void> {
    onUpdate(this);
    for (;;) {
      const event = await this.queue.next();
      if (event === null) return;
      this.update(event);
      onUpdate(this);
      if (this.quitting) return;
    }
  }

  /** Applies queued events until no fetch or effect is outstanding. */
  async settle(): Promise<void> {
    for (;;) {
      for (const event of this.queue.drain()) {
        this.update(event);
      }
      if (this.pipeline.pending === 0 && this.effectsInFlight.size === 0 && this.queue.size === 0) return;
      await Promise.all([this.pipeline.whenIdle(), ...this.effectsInFlight]);
    }
  }

  quit(): void {
    this.quitting = true;
    this.pipeline.cancelAll();
    this.stopWatchingCollector();
    this.queue.close();
  }

  // --- status -------------------------------------------------------------

  setStatus(text: string): void {
    this.status = { text, atMs: this.now() };
  }

  statusText(): string {
    if (!this.status) return "";
    return this.now() - this.status.atMs < this.config.tui.statusMessageMs ? this.status.text : "";
  }

  // --- selection helpers --------------------------------------------------

  selectedEntry(): LogEntry | null {
    return this.entries[this.selection.selectedIndex] ?? null;
  }

  metricList(): AggregatedMetric[] {
    return this.metrics?.metrics ?? [];
  }

  selectedMetric(): AggregatedMetric | null {
    return this.metricList()[this.metricsCursor] ?? null;
  }

  fieldList(): FieldInfo[] {
    return sortedFieldList(this.displayFields, this.availableFields, this.fieldsFilter.value);
  }

  detailItem(): LogEntry | null {
    return this.detailSource === "metricDocs" ? (this.metricDocs[this.metricDocCursor] ?? null) : this.selectedEntry();
  }

  filters(): QueryFilters {
    return {
      service: this.filterService,
      negateService: this.negateService,
      resource: this.filterResource,
      negateResource: this.negateResource,
      level: this.levelFilter,
    };
  }

  keymapContext(): KeymapContext {
    return {
      mode: this.mode,
      underlying: this.mode === "help" ? this.views.peek() : null,
      signal: this.signal,
      traceViewLevel: this.traceViewLevel,
      metricsViewMode: this.metricsViewMode,
    };
  }

  textInputActive(): boolean {
    switch (this.mode) {
      case "search":
      case "index":
        return true;
      case "chat":
        return this.chatInput.focused;
      case "fields":
        return this.fieldsFilterMode;
      default:
        return false;
    }
  }

  // --- fetches ------------------------------------------------------------

  fetchLogs(): void {
    this.loading = true;
    const tail: TailOptions = {
      size: this.config.tui.pageSize,
      lookback: this.lookback,
      sortAsc: this.sortAscending,
      ...this.filters(),
    };
    if (this.signal === "traces") {
      if (this.traceViewLevel === "spans") {
        tail.traceId = this.selectedTraceId;
      } else {
        tail.processorEvent = "transaction";
        if (this.traceViewLevel === "transactions" && this.selectedTxName) {
          tail.transactionName = this.selectedTxName;
        }
      }
    }
    const id = this.pipeline.fetchLogs({
      tail,
      search: this.searchQuery,
      searchFields: collectSearchFields(this.displayFields),
    });
    this.latest.set("logs", id);
  }

  fetchFieldCaps(): void {
    this.fieldsLoading = true;
    this.latest.set("fieldCaps", this.pipeline.fetchFieldCaps());
  }

  fetchMetricsAgg(): void {
    this.metricsLoading = true;
    const id = this.pipeline.fetchMetricsAgg({
      lookback: this.lookback,
      bucketSize: lookbackBucketSize(this.lookback),
      ...this.filters(),
    });
    this.latest.set("metricsAgg", id);
  }

  fetchMetricDetailDocs(): void {
    const metric = this.selectedMetric();
    if (!metric) return;
    this.metricDocsLoading = true;
    const id = this.pipeline.fetchMetricDetailDocs({
      tail: { size: METRIC_DETAIL_DOCS, lookback: this.lookback, ...this.filters(), metricField: metric.name },
      metricType: metric.type,
    });
    this.latest.set("metricDetailDocs", id);
  }

  fetchTransactionNames(): void {
    this.tracesLoading = true;
    const id = this.pipeline.fetchTransactionNames({ lookback: this.lookback, ...this.filters() });
    this.latest.set("transactionNames", id);
  }

  fetchPerspective(): void {
    this.perspectiveLoading = true;
    this.latest.set("perspective", this.pipeline.fetchPerspective(this.perspectiveType, this.lookback));
  }

  autoDetectLookback(): void {
    if (this.skipAutoDetect) {
      // Metrics and traces fetch alongside auto-detect; logs wait for it.
      if (this.signal === "logs") this.startInitialFetch();
      return;
    }
    const base: Omit<TailOptions, "size" | "lookback"> =
      this.signal === "traces" ? { ...this.filters(), processorEvent: "transaction" } : this.filters();
    this.latest.set("autoDetect", this.pipeline.autoDetect(base));
  }

  /** Fetches whatever the current signal and drill-down level display. */
  startInitialFetch(): void {
    if (this.signal === "chat") return;
    if (this.signal === "metrics" && this.metricsViewMode === "aggregated") {
      this.fetchMetricsAgg();
    } else if (this.signal === "traces" && this.traceViewLevel === "names") {
      this.fetchTransactionNames();
    } else {
      this.fetchLogs();
    }
  }

  /** A span fetch is due unless this trace's spans are already loading or loaded. */
  needsSpanFetch(traceId: string): boolean {
    if (!traceId) return false;
    return !(traceId === this.lastFetchedTraceId && (this.spansLoading || this.spans.length > 0));
  }

  maybeFetchSpansForSelection(): void {
    if (this.signal !== "traces") return;
    const entry = this.selectedEntry();
    if (!entry || !entry.traceId) {
      this.lastFetchedTraceId = "";
      return;
    }
    if (!this.needsSpanFetch(entry.traceId)) return;
    this.spansLoading = true;
    this.lastFetchedTraceId = entry.traceId;
    this.spans = [];
    this.latest.set("spans", this.pipeline.fetchSpans(entry.traceId));
  }

  // --- navigation ---------------------------------------------------------

  /** Pops back to `mode` when it sits directly underneath, otherwise makes it the base view. */
  returnTo(mode: ViewMode): void {
    if (this.views.peek() === mode) {
      this.views.pop();
    } else {
      this.views.replaceBase(mode);
    }
  }

  cycleSignalType(): void {
    const next: SignalType = this.signal === "logs" ? "traces" : this.signal === "traces" ? "metrics" : "logs";
    this.switchSignal(next);
  }

  switchSignal(next: SignalType): void {
    this.logger.info("signal switched", { from: this.signal, to: next });
    this.signal = next;
    this.displayFields = defaultFields(next);
    this.entries = [];
    this.total = 0;
    this.selection.setLength(0);
    this.selection.reset(0);
    this.selection.resetScroll();
    this.spans = [];
    this.lastFetchedTraceId = "";
    if (next !== "chat") {
      this.dataSource.setIndex(SIGNAL_INDEX[next]);
      this.setStatus("Auto-detecting time range...");
    }
    this.enterSignalView(next);
  }

  enterSignalView(signal: SignalType): void {
    switch (signal) {
      case "metrics":
        this.views.replaceBase("metricsDashboard");
        this.metricsViewMode = "aggregated";
        this.metricsCursor = 0;
        this.autoDetectLookback();
        this.fetchMetricsAgg();
        return;
      case "traces":
        this.views.replaceBase("traceNames");
        this.traceViewLevel = "names";
        this.selectedTxName = "";
        this.selectedTraceId = "";
        this.traceNamesCursor = 0;
        this.autoDetectLookback();
        this.fetchTransactionNames();
        return;
      case "chat":
        this.views.replaceBase("chat");
        this.openChat();
        return;
      case "logs":
        this.views.replaceBase("logs");
        this.loading = true;
        this.autoDetectLookback();
        return;
    }
  }

  cyclePerspective(): void {
    if (this.mode === "perspectiveList") {
      this.perspectiveType = this.perspectiveType === "services" ? "resources" : "services";
    } else {
      this.views.push("perspectiveList");
    }
    this.perspectiveItems = [];
    this.perspectiveCursor = 0;
    this.setStatus(`Loading ${perspectiveLabel(this.perspectiveType)}...`);
    this.fetchPerspective();
  }

  /** Include, then exclude, then clear the filter for the highlighted perspective item. */
  togglePerspectiveFilter(): void {
    const item = this.perspectiveItems[this.perspectiveCursor];
    if (!item) return;
    if (this.perspectiveType === "services") {
      if (this.filterService !== item.name) {
        this.filterService = item.name;
        this.negateService = false;
        this.setStatus(`Filtered to service: ${item.name}`);
      } else if (!this.negateService) {
        this.negateService = true;
        this.setStatus(`Excluding service: ${item.name}`);
      } else {
        this.filterService = "";
        this.negateService = false;
        this.setStatus(`Cleared service filter: ${item.name}`);
      }
    } else if (this.filterResource !== item.name) {
      this.filterResource = item.name;
      this.negateResource = false;
      this.setStatus(`Filtered to resource: ${item.name}`);
    } else if (!this.negateResource) {
      this.negateResource = true;
      this.setStatus(`Excluding resource: ${item.name}`);
    } else {
      this.filterResource = "";
      this.negateResource = false;
      this.setStatus(`Cleared resource filter: ${item.name}`);
    }
    this.selection.resetScroll();
    this.filtersDirty = true;
  }

  leavePerspective(): void {
    this.views.pop();
    if (this.filtersDirty) {
      this.filtersDirty = false;
      this.startInitialFetch();
    }
  }

  openDetail(source: DetailSource, mode: "detail" | "detailJson" = "detail"): void {
    this.detailSource = source;
    this.views.push(mode);
    this.refreshDetailContent();
    this.detailViewport.gotoTop();
  }

  refreshDetailContent(): void {
    const item = this.detailItem();
    if (!item) {
      this.detailViewport.setContent("No entry selected");
    } else if (this.mode === "detailJson") {
      this.detailViewport.setContent(detailJsonContent(item));
    } else {
      this.detailViewport.setContent(detailContent(item, this.detailViewport.width));
    }
  }

  showErrorModal(): void {
    if (!this.err) return;
    if (this.mode !== "errorModal") {
      this.views.push("errorModal");
    }
    this.errorViewport.setContent(formatError(this.err));
    this.errorViewport.gotoTop();
  }

  dismissError(): void {
    this.views.pop();
    this.err = null;
  }

  toggleHelp(): void {
    if (this.mode === "help") {
      this.views.pop();
      return;
    }
    this.helpViewport.setContent(helpContent(viewKeymap(this.keymapContext())));
    this.helpViewport.gotoTop();
    this.views.push("help");
  }

  // --- kibana -------------------------------------------------------------

  openQueryInKibana(): void {
    if (!this.lastQuery || this.lastQuery.trimStart().startsWith("{")) {
      this.setStatus("No query to open in Kibana");
      return;
    }
    this.offerKibanaUrl(buildDiscoverUrl(this.config.kibana, this.lastQuery, this.lookback));
  }

  openMetricInKibana(): void {
    const metric = this.selectedMetric();
    if (!metric) {
      this.setStatus("No metric selected");
      return;
    }
    const query = buildMetricKibanaQuery(this.dataSource.getIndex(), metric.name, metric.type, this.lookback);
    this.offerKibanaUrl(buildDiscoverUrl(this.config.kibana, query, this.lookback));
  }

  /** Shows the credentials modal first unless the user asked not to see it again. */
  offerKibanaUrl(url: string): void {
    this.pendingKibanaUrl = url;
    if (this.hideCredsModal) {
      this.openUrl(url, "Kibana");
      return;
    }
    this.views.push("credsModal");
  }

  // --- chat ---------------------------------------------------------------

  openChat(): void {
    if (this.mode !== "chat") {
      this.views.push("chat");
    }
    if (this.chatMessages.length === 0) {
      this.chatMessages.push({ role: "assistant", content: CHAT_WELCOME, timestampMs: this.now() });
    }
    this.chatInput.focus();
    this.updateChatViewport();
  }

  leaveChat(): void {
    this.chatInput.blur();
    if (!this.views.pop()) {
      this.switchSignal("logs");
    }
  }

  clearChat(): void {
    this.chatMessages = [{ role: "assistant", content: CHAT_WELCOME, timestampMs: this.now() }];
    this.conversationId = "";
    this.updateChatViewport();
    this.setStatus("Chat cleared");
  }

  updateChatViewport(): void {
    this.chatViewport.setContent(chatContent(this.chatMessages, this.chatLoading, this.chatViewport.width));
    this.chatViewport.gotoBottom();
  }

  selectedSummary(): string {
    if (this.signal === "traces" && this.traceViewLevel === "names") {
      const name = this.transactionNames[this.traceNamesCursor]?.name;
      return name ? `Transaction: ${name}` : "";
    }
    if (this.signal === "metrics" && this.metricsViewMode === "aggregated") {
      const metric = this.selectedMetric();
      return metric ? `Metric: ${metric.name}` : "";
    }
    const entry = this.selectedEntry();
    if (!entry) return "";
    if (this.signal === "traces") return `Transaction: ${entry.name}`;
    return `Log: ${entryLevel(entry)} - ${truncateText(entryMessage(entry), 200)}`;
  }

  chatContext(): ChatContext {
    const filters: Array<[string, string]> = [];
    if (this.filterService) filters.push([this.negateService ? "service (excluded)" : "service", this.filterService]);
    if (this.filterResource) filters.push([this.negateResource ? "resource (excluded)" : "resource", this.filterResource]);
    if (this.levelFilter) filters.push(["level", this.levelFilter]);
    if (this.searchQuery) filters.push(["search", this.searchQuery]);
    return {
      signal: this.signal === "chat" ? "" : this.signal,
      index: this.dataSource.getIndex(),
      timeRange: describeLookback(this.lookback),
      filters,
      selected: this.selectedSummary(),
    };
  }

  submitChat(): void {
    const text = this.chatInput.value.trim();
    if (!text || this.chatLoading) return;
    this.chatMessages.push({ role: "user", content: text, timestampMs: this.now() });
    this.chatInput.reset();
    this.chatLoading = true;
    this.updateChatViewport();

    const history = this.chatMessages
      .filter((message) => !message.error && message.content !== CHAT_WELCOME)
      .map(({ role, content }) => ({ role, content }));
    const id = this.pipeline.sendChat({
      conversationId: this.conversationId,
      messages: withContext(history, formatChatContext(this.chatContext())),
    });
    this.latest.set("chat", id);
  }

  // --- effects ------------------------------------------------------------

  private runEffect<T>(promise: Promise<T>, onOk: (value: T) => EffectEvent, onError: (error: Error) => EffectEvent): void {
    const task = promise.then(
      (value) => this.queue.push(onOk(value)),
      (error: unknown) => this.queue.push(onError(toError(error))),
    );
    this.effectsInFlight.add(task);
    void task.finally(() => this.effectsInFlight.delete(task));
  }

  copy(text: string, label: string): void {
    const copyToClipboard = this.effects.copyToClipboard;
    if (!copyToClipboard) {
      this.setStatus("Clipboard not available");
      return;
    }
    this.runEffect(
      copyToClipboard(text),
      () => ({ type: "clipboardResult", ok: true, message: `Copied ${label} to clipboard` }),
      (error) => ({ type: "clipboardResult", ok: false, message: `Copy failed: ${error.message}` }),
    );
  }

  openUrl(url: string, label: string): void {
    const openUrl = this.effects.openUrl;
    if (!openUrl) {
      this.setStatus("Browser not available");
      return;
    }
    this.runEffect(
      openUrl(url),
      () => ({ type: "browserResult", ok: true, message: `Opened ${label} in browser` }),
      (error) => ({ type: "browserResult", ok: false, message: `Failed to open browser: ${error.message}` }),
    );
  }

  openCollector(): void {
    const collector = this.effects.collector;
    if (!collector) {
      this.collectorUnavailableReason = "No collector is configured.";
      this.views.push("otelConfigUnavailable");
      return;
    }
    this.runEffect(
      collector.open(),
      (value) => ({ type: "collectorOpened", outcome: { ok: true, value } }),
      (error) => ({ type: "collectorOpened", outcome: { ok: false, error } }),
    );
  }

  stopWatchingCollector(): void {
    this.stopCollectorWatch?.();
    this.stopCollectorWatch = null;
  }

  collectorErrorText(): string {
    if (this.collectorValidation && !this.collectorValidation.valid) return this.collectorValidation.message;
    return this.collectorReloadError?.message ?? "";
  }

  private handleEffect(event: EffectEvent): void {
    switch (event.type) {
      case "clipboardResult":
      case "browserResult":
        if (!event.ok) this.logger.warn(event.message);
        this.setStatus(event.message);
        return;
      case "collectorOpened":
        this.onCollectorOpened(event.outcome);
        return;
      case "collectorFileChanged": {
        const collector = this.effects.collector;
        if (!collector || !this.collectorPath) return;
        this.logger.debug("collector config changed", { path: event.path });
        this.runEffect(
          collector.validate(this.collectorPath),
          (validation) => ({ type: "collectorValidated", validation }),
          (error) => ({ type: "collectorValidated", validation: { valid: false, message: error.message } }),
        );
        return;
      }
      case "collectorValidated": {
        this.collectorValidation = event.validation;
        const collector = this.effects.collector;
        if (!event.validation.valid || !collector) {
          this.setStatus("Collector config is invalid");
          return;
        }
        this.runEffect(
          collector.reload(),
          () => ({ type: "collectorReloaded", atMs: this.now(), error: null }),
          (error) => ({ type: "collectorReloaded", atMs: this.now(), error }),
        );
        return;
      }
      case "collectorReloaded":
        this.collectorReloadedMs = event.atMs;
        this.collectorReloadError = event.error;
        this.setStatus(event.error ? "Collector reload failed" : "Collector reloaded");
        return;
    }
  }

  private onCollectorOpened(outcome: FetchOutcome<CollectorOpened>): void {
    if (!outcome.ok) {
      this.collectorUnavailableReason = outcome.error.message;
      this.views.push("otelConfigUnavailable");
      return;
    }
    const collector = this.effects.collector;
    this.collectorPath = outcome.value.configPath;
    this.collectorValidation = null;
    this.collectorReloadError = null;
    this.views.push("otelConfigModal");
    this.stopWatchingCollector();
    if (collector) {
      this.stopCollectorWatch = collector.watch(this.collectorPath, (changedPath) =>
        this.queue.push({ type: "collectorFileChanged", path: changedPath }),
      );
    }
  }

  // --- results ------------------------------------------------------------

  /** Cancellations are dropped quietly; anything else opens the error modal. */
  private handleAsyncError(error: Error): void {
    if (isAbortError(error)) {
      this.logger.debug("request cancelled", { reason: error.message });
      return;
    }
    this.logger.warn("request failed", { error: error.message });
    this.err = error;
    this.showErrorModal();
  }

  private handleResult(event: ResultEvent): void {
    const kind = RESULT_KIND[event.type];
    if (this.latest.get(kind) !== event.requestId) {
      this.logger.debug("stale result dropped", { kind, id: event.requestId });
      return;
    }

    switch (event.type) {
      case "logsResult": {
        this.loading = false;
        this.lastRefreshMs = this.now();
        if (!event.outcome.ok) {
          this.handleAsyncError(event.outcome.error);
          return;
        }
        const { entries, total, query, index } = event.outcome.value;
        this.entries = entries;
        this.total = total;
        this.err = null;
        this.lastQuery = query;
        this.lastQueryIndex = index;
        this.selection.applyTail(entries.length, this.sortAscending);
        if (this.signal === "traces") {
          this.maybeFetchSpansForSelection();
        } else {
          this.lastFetchedTraceId = "";
        }
        return;
      }
      case "fieldCapsResult":
        this.fieldsLoading = false;
        if (!event.outcome.ok) {
          this.handleAsyncError(event.outcome.error);
          return;
        }
        this.availableFields = event.outcome.value;
        this.fieldsCursor = clampCursor(this.fieldsCursor, this.fieldList().length);
        return;
      case "autoDetectResult":
        if (!event.outcome.ok) {
          if (this.quitting) return;
          if (isAbortError(event.outcome.error)) {
            this.logger.debug("lookback auto-detect cancelled", { reason: event.outcome.error.message });
          } else {
            this.logger.warn("lookback auto-detect failed", { error: event.outcome.error.message });
          }
          this.startInitialFetch();
          return;
        }
        this.lookback = event.outcome.value.lookback;
        this.setStatus(`Found ${event.outcome.value.total} entries in ${describeLookback(this.lookback)}`);
        this.startInitialFetch();
        return;
      case "metricsAggResult":
        this.metricsLoading = false;
        if (!event.outcome.ok) {
          this.handleAsyncError(event.outcome.error);
          return;
        }
        this.metrics = event.outcome.value;
        this.err = null;
        if (event.outcome.value.query) {
          this.lastQuery = event.outcome.value.query;
        }
        this.lastQueryIndex = this.dataSource.getIndex();
        this.metricsCursor = clampCursor(this.metricsCursor, this.metricList().length);
        return;
      case "metricDetailDocsResult":
        this.metricDocsLoading = false;
        if (!event.outcome.ok) {
          this.handleAsyncError(event.outcome.error);
          return;
        }
        this.metricDocs = event.outcome.value;
        this.metricDocCursor = 0;
        return;
      case "transactionNamesResult":
        this.tracesLoading = false;
        if (!event.outcome.ok) {
          this.handleAsyncError(event.outcome.error);
          return;
        }
        this.transactionNames = event.outcome.value;
        this.err = null;
        this.traceNamesCursor = clampCursor(this.traceNamesCursor, this.transactionNames.length);
        return;
      case "spansResult":
        this.spansLoading = false;
        if (!event.outcome.ok) {
          this.handleAsyncError(event.outcome.error);
          return;
        }
        if (event.traceId === this.lastFetchedTraceId) {
          this.spans = event.outcome.value;
        }
        return;
      case "perspectiveResult":
        this.perspectiveLoading = false;
        if (!event.outcome.ok) {
          this.handleAsyncError(event.outcome.error);
          return;
        }
        this.perspectiveItems = event.outcome.value;
        this.perspectiveCursor = clampCursor(this.perspectiveCursor, this.perspectiveItems.length);
        this.setStatus(`Loaded ${this.perspectiveItems.length} ${perspectiveLabel(this.perspectiveType)}`);
        return;
      case "chatResult":
        this.chatLoading = false;
        if (!event.outcome.ok) {
          if (isAbortError(event.outcome.error)) {
            this.logger.debug("chat request cancelled", { reason: event.outcome.error.message });
          } else {
            this.chatMessages.push({
              role: "assistant",
              content: `Error: ${event.outcome.error.message}`,
              timestampMs: this.now(),
              error: true,
            });
          }
          this.updateChatViewport();
          return;
        }
        if (event.outcome.value.conversationId) {
          this.conversationId = event.outcome.value.conversationId;
        }
        this.chatMessages.push(event.outcome.value.message);
        this.updateChatViewport();
        return;
    }
  }

  // --- input --------------------------------------------------------------

  private handleKey(key: string): void {
    if (key === "ctrl+c") {
      this.quit();
      return;
    }
    if (!this.textInputActive()) {
      if (key === "q" && PRIMARY_VIEWS.has(this.mode)) {
        this.views.push("quitConfirm");
        return;
      }
      if (key === "?" && helpEnabled(this.mode)) {
        this.toggleHelp();
        return;
      }
    }
    KEY_HANDLERS[this.mode](this, key);
  }

  private handleMouse(event: MouseEvent): void {
    if (event.action === "click") {
      if (this.mode === "logs" && event.y === 0) {
        this.sortAscending = !this.sortAscending;
        this.fetchLogs();
      }
      return;
    }
    const direction = event.action === "wheelUp" ? -1 : 1;
    const listStep = direction * MOUSE_LIST_STEP;
    const viewportStep = direction * MOUSE_VIEWPORT_STEP;
    switch (this.mode) {
      case "logs":
        if (this.selection.moveSelection(listStep)) {
          this.maybeFetchSpansForSelection();
        }
        return;
      case "fields":
        this.fieldsCursor = clampCursor(this.fieldsCursor + listStep, this.fieldList().length);
        return;
      case "metricsDashboard":
        this.metricsCursor = clampCursor(this.metricsCursor + listStep, this.metricList().length);
        return;
      case "traceNames":
        this.traceNamesCursor = clampCursor(this.traceNamesCursor + listStep, this.transactionNames.length);
        return;
      case "perspectiveList":
        this.perspectiveCursor = clampCursor(this.perspectiveCursor + listStep, this.perspectiveItems.length);
        return;
      case "detail":
      case "detailJson":
        this.detailViewport.scrollBy(viewportStep);
        return;
      case "errorModal":
        this.errorViewport.scrollBy(viewportStep);
        return;
      case "help":
        this.helpViewport.scrollBy(viewportStep);
        return;
      case "chat":
        this.chatViewport.scrollBy(viewportStep);
        return;
      default:
        return;
    }
  }

  private resize(width: number, height: number): void {
    this.width = width;
    this.height = height;
    const innerWidth = Math.max(20, width - 4);
    const innerHeight = Math.max(1, height - 4);
    for (const viewport of [this.detailViewport, this.errorViewport, this.helpViewport]) {
      viewport.resize(innerWidth, innerHeight);
    }
    this.chatViewport.resize(innerWidth, Math.max(1, height - 6));
    if (this.mode === "detail" || this.mode === "detailJson") {
      this.refreshDetailContent();
    } else if (this.mode === "chat") {
      this.updateChatViewport();
    }
  }
}
