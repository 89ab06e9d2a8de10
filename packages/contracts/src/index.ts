export type SignalType = "logs" | "traces" | "metrics" | "chat";

export type ViewMode =
  | "logs"
  | "search"
  | "detail"
  | "detailJson"
  | "index"
  | "query"
  | "fields"
  | "metricsDashboard"
  | "metricDetail"
  | "traceNames"
  | "perspectiveList"
  | "errorModal"
  | "quitConfirm"
  | "help"
  | "chat"
  | "credsModal"
  | "otelConfigExplain"
  | "otelConfigUnavailable"
  | "otelConfigModal";

export interface ViewStackFrame {
  mode: ViewMode;
}

export type RequestKind =
  | "logs"
  | "fieldCaps"
  | "autoDetect"
  | "metricsAgg"
  | "metricDetailDocs"
  | "transactionNames"
  | "spans"
  | "perspective"
  | "chat";

export type Lookback = "5m" | "1h" | "24h" | "1w" | "all";
export type LevelFilter = "" | "ERROR" | "WARN" | "INFO" | "DEBUG";
export type TraceViewLevel = "names" | "transactions" | "spans";
export type MetricsViewMode = "aggregated" | "documents";
export type TimeDisplayMode = "clock" | "relative" | "full";
export type QueryFormat = "kibana" | "curl";
export type PerspectiveType = "services" | "resources";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestampMs: number;
  level: string;
  message: string;
  serviceName: string;
  resource: string;
  traceId: string;
  spanId: string;
  name: string;
  kind: string;
  statusCode: string;
  durationMs: number | null;
  processorEvent: string;
  metrics: Record<string, number>;
  raw: Record<string, unknown>;
}

export interface SearchResult {
  entries: LogEntry[];
  total: number;
  query: string;
}

export interface CountResult {
  total: number;
  query: string;
}

export interface FieldInfo {
  name: string;
  type: string;
  searchable: boolean;
  aggregatable: boolean;
  docCount: number;
}

export interface MetricBucket {
  timestampMs: number;
  value: number | null;
  count: number;
}

export interface AggregatedMetric {
  name: string;
  shortName: string;
  type: string;
  min: number | null;
  max: number | null;
  avg: number | null;
  latest: number | null;
  buckets: MetricBucket[];
}

export interface MetricsAggResult {
  metrics: AggregatedMetric[];
  bucketSize: string;
  query: string;
}

export interface TransactionNameAgg {
  name: string;
  count: number;
  traceCount: number;
  avgDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
  errorRate: number;
  lastSeenMs: number | null;
}

export interface PerspectiveItem {
  name: string;
  logCount: number;
  traceCount: number;
  metricCount: number;
}

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
  timestampMs: number;
  error?: boolean;
}

export interface QueryFilters {
  service: string;
  negateService: boolean;
  resource: string;
  negateResource: boolean;
  level: LevelFilter;
}

export interface TailOptions extends Partial<QueryFilters> {
  size: number;
  /** Omitted means no time bound. */
  lookback?: Lookback;
  sortAsc?: boolean;
  processorEvent?: string;
  transactionName?: string;
  traceId?: string;
  metricField?: string;
}

export interface SearchOptions extends TailOptions {
  searchFields: string[];
}

export interface AggregateMetricsOptions extends Partial<QueryFilters> {
  lookback: Lookback;
  bucketSize: string;
}

export interface TransactionNamesOptions extends Partial<QueryFilters> {
  lookback: Lookback;
}

export interface EsConfig {
  url: string;
  index: string;
  apiKey: string;
  username: string;
  password: string;
  timeoutMs: number;
}

export interface KibanaConfig {
  url: string;
  space: string;
}

export interface TuiConfig {
  tickIntervalMs: number;
  logsTimeoutMs: number;
  metricsTimeoutMs: number;
  tracesTimeoutMs: number;
  fieldCapsTimeoutMs: number;
  autoDetectTimeoutMs: number;
  chatTimeoutMs: number;
  statusMessageMs: number;
  autoRefresh: boolean;
  pageSize: number;
}

export interface LogConfig {
  path: string;
  level: LogLevel;
}

export interface CollectorConfig {
  configPath: string;
  container: string;
}

/** Named connection settings; `${VAR}` in a credential reads that environment variable. */
export interface ConnectionProfile {
  es?: Partial<Pick<EsConfig, "url" | "index" | "apiKey" | "username" | "password">>;
  kibana?: Partial<KibanaConfig>;
}

export interface AppConfig {
  es: EsConfig;
  kibana: KibanaConfig;
  tui: TuiConfig;
  log: LogConfig;
  collector: CollectorConfig;
}

export type FetchOutcome<T> = { ok: true; value: T } | { ok: false; error: Error };

export interface LogsPayload {
  entries: LogEntry[];
  total: number;
  query: string;
  index: string;
}

export interface AutoDetectPayload {
  lookback: Lookback;
  total: number;
}

export interface ChatReply {
  conversationId: string;
  message: ChatMessage;
}

export interface CollectorOpened {
  configPath: string;
}

export interface CollectorValidation {
  valid: boolean;
  message: string;
}

export type KeyEvent = { type: "key"; key: string };

export type MouseAction = "wheelUp" | "wheelDown" | "click";
export type MouseEvent = { type: "mouse"; action: MouseAction; x: number; y: number };

export type ResizeEvent = { type: "resize"; width: number; height: number };
export type TickEvent = { type: "tick"; atMs: number };

export type ResultEvent =
  | { type: "logsResult"; requestId: number; outcome: FetchOutcome<LogsPayload> }
  | { type: "fieldCapsResult"; requestId: number; outcome: FetchOutcome<FieldInfo[]> }
  | { type: "autoDetectResult"; requestId: number; outcome: FetchOutcome<AutoDetectPayload> }
  | { type: "metricsAggResult"; requestId: number; outcome: FetchOutcome<MetricsAggResult> }
  | { type: "metricDetailDocsResult"; requestId: number; outcome: FetchOutcome<LogEntry[]> }
  | { type: "transactionNamesResult"; requestId: number; outcome: FetchOutcome<TransactionNameAgg[]> }
  | { type: "spansResult"; requestId: number; traceId: string; outcome: FetchOutcome<LogEntry[]> }
  | { type: "perspectiveResult"; requestId: number; outcome: FetchOutcome<PerspectiveItem[]> }
  | { type: "chatResult"; requestId: number; outcome: FetchOutcome<ChatReply> };

export type EffectEvent =
  | { type: "clipboardResult"; ok: boolean; message: string }
  | { type: "browserResult"; ok: boolean; message: string }
  | { type: "collectorOpened"; outcome: FetchOutcome<CollectorOpened> }
  | { type: "collectorFileChanged"; path: string }
  | { type: "collectorValidated"; validation: CollectorValidation }
  | { type: "collectorReloaded"; atMs: number; error: Error | null };

export type AppEvent = KeyEvent | MouseEvent | ResizeEvent | TickEvent | ResultEvent | EffectEvent;
