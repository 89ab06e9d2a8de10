import type {
  AggregateMetricsOptions,
  AppEvent,
  AutoDetectPayload,
  ChatReply,
  FetchOutcome,
  FieldInfo,
  LogEntry,
  LogsPayload,
  MetricsAggResult,
  PerspectiveItem,
  PerspectiveType,
  Lookback,
  RequestKind,
  ResultEvent,
  SearchOptions,
  TailOptions,
  TransactionNameAgg,
  TransactionNamesOptions,
  TuiConfig,
} from "@tailscope/contracts";
import type { ChatClient, ConverseRequest, DataSource } from "./dataSource.js";
import { isAbortError, isTimeoutError, toError } from "./errors.js";
import type { EventQueue } from "./eventQueue.js";
import type { Logger } from "./logger.js";
import { LOOKBACKS } from "./lookback.js";
import type { RequestTracker } from "./requests.js";

export const AUTO_DETECT_TARGET = 10_000;
export const METRIC_DETAIL_DOCS = 10;
export const SPANS_PER_TRACE = 1000;

export type TimeoutConfig = Pick<
  TuiConfig,
  | "logsTimeoutMs"
  | "metricsTimeoutMs"
  | "tracesTimeoutMs"
  | "fieldCapsTimeoutMs"
  | "autoDetectTimeoutMs"
  | "chatTimeoutMs"
>;

export function requestTimeout(kind: RequestKind, config: TimeoutConfig): number {
  switch (kind) {
    case "logs":
    case "perspective":
      return config.logsTimeoutMs;
    case "fieldCaps":
      return config.fieldCapsTimeoutMs;
    case "autoDetect":
      return config.autoDetectTimeoutMs;
    case "metricsAgg":
    case "metricDetailDocs":
      return config.metricsTimeoutMs;
    case "transactionNames":
    case "spans":
      return config.tracesTimeoutMs;
    case "chat":
      return config.chatTimeoutMs;
  }
}

export interface LogsRequest {
  tail: TailOptions;
  /** Free-text query; empty runs a plain tail. */
  search: string;
  searchFields: string[];
}

export interface MetricDetailRequest {
  tail: TailOptions;
  metricType: string;
}

export interface FetchPipelineOptions {
  tracker: RequestTracker;
  queue: EventQueue<AppEvent>;
  dataSource: DataSource;
  chat?: ChatClient;
  timeouts: TimeoutConfig;
  logger: Logger;
}

/**
 * One async operation per data domain. Each op starts a tracked request, runs without touching
 * app state and enqueues exactly one result event when it settles.
 */
export class FetchPipeline {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly options: FetchPipelineOptions) {}

  private run<T>(
    kind: RequestKind,
    op: (signal: AbortSignal) => Promise<T>,
    toEvent: (requestId: number, outcome: FetchOutcome<T>) => ResultEvent,
  ): number {
    const { tracker, queue, timeouts, logger } = this.options;
    const handle = tracker.startRequest(kind, requestTimeout(kind, timeouts));
    logger.debug("request started", { kind, id: handle.id });

    const task = (async () => {
      let outcome: FetchOutcome<T>;
      try {
        outcome = { ok: true, value: await op(handle.signal) };
      } catch (error) {
        outcome = { ok: false, error: toError(error) };
      } finally {
        handle.done();
      }
      queue.push(toEvent(handle.id, outcome));
    })();

    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
    return handle.id;
  }

  /** Resolves once every op started so far has enqueued its result. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  get pending(): number {
    return this.inFlight.size;
  }

  fetchLogs(request: LogsRequest): number {
    const { dataSource } = this.options;
    return this.run(
      "logs",
      async (signal): Promise<LogsPayload> => {
        const result = request.search
          ? await dataSource.searchEsql(request.search, { ...request.tail, searchFields: request.searchFields } satisfies SearchOptions, signal)
          : await dataSource.tailEsql(request.tail, signal);
        return { entries: result.entries, total: result.total, query: result.query, index: dataSource.getIndex() };
      },
      (requestId, outcome) => ({ type: "logsResult", requestId, outcome }),
    );
  }

  fetchFieldCaps(): number {
    return this.run(
      "fieldCaps",
      (signal): Promise<FieldInfo[]> => this.options.dataSource.getFieldCaps(signal),
      (requestId, outcome) => ({ type: "fieldCapsResult", requestId, outcome }),
    );
  }

  /**
   * Probes lookbacks from narrowest to widest and settles on the first one holding at least
   * AUTO_DETECT_TARGET entries, else the one holding the most. Failed probes are skipped, and
   * running out of time settles on the best lookback seen so far.
   */
  autoDetect(base: Omit<TailOptions, "size" | "lookback">): number {
    const { dataSource, logger } = this.options;
    return this.run(
      "autoDetect",
      async (signal): Promise<AutoDetectPayload> => {
        let best: AutoDetectPayload = { lookback: "5m", total: 0 };
        for (const lookback of LOOKBACKS) {
          let total: number;
          try {
            total = (await dataSource.countEsql({ ...base, size: 0, lookback }, signal)).total;
          } catch (error) {
            if (isTimeoutError(signal.reason)) {
              logger.debug("lookback auto-detect timed out", { lookback, best: best.lookback });
              return best;
            }
            if (isAbortError(error)) throw error;
            logger.debug("lookback probe failed", { lookback, error: toError(error).message });
            continue;
          }
          if (total > best.total) best = { lookback, total };
          if (total >= AUTO_DETECT_TARGET) return { lookback, total };
        }
        return best;
      },
      (requestId, outcome) => ({ type: "autoDetectResult", requestId, outcome }),
    );
  }

  fetchMetricsAgg(opts: AggregateMetricsOptions): number {
    return this.run(
      "metricsAgg",
      (signal): Promise<MetricsAggResult> => this.options.dataSource.aggregateMetrics(opts, signal),
      (requestId, outcome) => ({ type: "metricsAggResult", requestId, outcome }),
    );
  }

  /** ES|QL cannot filter on histogram fields, so those go through the DSL search. */
  fetchMetricDetailDocs(request: MetricDetailRequest): number {
    const { dataSource } = this.options;
    return this.run(
      "metricDetailDocs",
      async (signal): Promise<LogEntry[]> => {
        const tail = { ...request.tail, size: METRIC_DETAIL_DOCS, sortAsc: false };
        const result =
          request.metricType === "histogram" ? await dataSource.tail(tail, signal) : await dataSource.tailEsql(tail, signal);
        return result.entries;
      },
      (requestId, outcome) => ({ type: "metricDetailDocsResult", requestId, outcome }),
    );
  }

  fetchTransactionNames(opts: TransactionNamesOptions): number {
    return this.run(
      "transactionNames",
      (signal): Promise<TransactionNameAgg[]> => this.options.dataSource.getTransactionNames(opts, signal),
      (requestId, outcome) => ({ type: "transactionNamesResult", requestId, outcome }),
    );
  }

  fetchSpans(traceId: string): number {
    return this.run(
      "spans",
      async (signal): Promise<LogEntry[]> => {
        const result = await this.options.dataSource.tailEsql(
          { size: SPANS_PER_TRACE, traceId, processorEvent: "span", sortAsc: true },
          signal,
        );
        return result.entries;
      },
      (requestId, outcome) => ({ type: "spansResult", requestId, traceId, outcome }),
    );
  }

  fetchPerspective(type: PerspectiveType, lookback: Lookback): number {
    const { dataSource } = this.options;
    return this.run(
      "perspective",
      (signal): Promise<PerspectiveItem[]> =>
        type === "services" ? dataSource.getServices(lookback, signal) : dataSource.getResources(lookback, signal),
      (requestId, outcome) => ({ type: "perspectiveResult", requestId, outcome }),
    );
  }

  sendChat(request: ConverseRequest): number {
    const { chat } = this.options;
    return this.run(
      "chat",
      (signal): Promise<ChatReply> => {
        if (!chat) throw new Error("chat is not configured");
        return chat.converse(request, signal);
      },
      (requestId, outcome) => ({ type: "chatResult", requestId, outcome }),
    );
  }

  cancelAll(): void {
    this.options.tracker.cancelAll();
  }
}
