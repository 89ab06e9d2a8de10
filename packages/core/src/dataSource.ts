import type {
  AggregateMetricsOptions,
  ChatMessage,
  ChatReply,
  CollectorOpened,
  CollectorValidation,
  CountResult,
  FieldInfo,
  Lookback,
  MetricsAggResult,
  PerspectiveItem,
  SearchOptions,
  SearchResult,
  TailOptions,
  TransactionNameAgg,
  TransactionNamesOptions,
} from "@tailscope/contracts";

/** Backend collaborator. Every call observes `signal` and rejects once it aborts. */
export interface DataSource {
  /** Query DSL search; used where ES|QL cannot read the field type. */
  tail(opts: TailOptions, signal: AbortSignal): Promise<SearchResult>;
  tailEsql(opts: TailOptions, signal: AbortSignal): Promise<SearchResult>;
  searchEsql(query: string, opts: SearchOptions, signal: AbortSignal): Promise<SearchResult>;
  countEsql(opts: TailOptions, signal: AbortSignal): Promise<CountResult>;
  aggregateMetrics(opts: AggregateMetricsOptions, signal: AbortSignal): Promise<MetricsAggResult>;
  getTransactionNames(opts: TransactionNamesOptions, signal: AbortSignal): Promise<TransactionNameAgg[]>;
  getServices(lookback: Lookback, signal: AbortSignal): Promise<PerspectiveItem[]>;
  getResources(lookback: Lookback, signal: AbortSignal): Promise<PerspectiveItem[]>;
  getFieldCaps(signal: AbortSignal): Promise<FieldInfo[]>;
  ping(signal: AbortSignal): Promise<void>;
  getIndex(): string;
  setIndex(index: string): void;
}

export interface ConverseRequest {
  conversationId: string;
  messages: Array<Pick<ChatMessage, "role" | "content">>;
}

export interface ChatClient {
  converse(request: ConverseRequest, signal: AbortSignal): Promise<ChatReply>;
}

export interface CollectorControl {
  /** Resolves with the editable config path, rejects when the collector cannot be configured. */
  open(): Promise<CollectorOpened>;
  /** Calls `onChange` on every write; returns the unsubscribe function. */
  watch(configPath: string, onChange: (changedPath: string) => void): () => void;
  validate(configPath: string): Promise<CollectorValidation>;
  reload(): Promise<void>;
}

/** Outbound integrations. Each is optional; a missing one is reported as unavailable. */
export interface Effects {
  copyToClipboard?: (text: string) => Promise<void>;
  openUrl?: (url: string) => Promise<void>;
  collector?: CollectorControl;
}
