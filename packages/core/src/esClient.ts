import type {
  AggregateMetricsOptions,
  CountResult,
  EsConfig,
  FieldInfo,
  Lookback,
  MetricsAggResult,
  PerspectiveItem,
  PerspectiveType,
  SearchOptions,
  SearchResult,
  TailOptions,
  TransactionNameAgg,
  TransactionNamesOptions,
} from "@tailscope/contracts";
import type { DataSource } from "./dataSource.js";
import {
  buildMetricsAggDsl,
  buildPerspectiveDsl,
  buildTailDsl,
  parseFieldCaps,
  parseMetricFieldCaps,
  parseMetricsAggResponse,
  parsePerspectiveResponse,
  parseSearchHits,
  PERSPECTIVE_INDEX,
} from "./dsl.js";
import { BackendError, isAbortError } from "./errors.js";
import {
  buildSearchQueries,
  buildTailQueries,
  buildTransactionNamesQuery,
  esqlCount,
  esqlRowsToEntries,
  parseEsqlResult,
  parseTransactionNames,
  type EsqlResult,
} from "./esql.js";
import { asNumber, asRecord, prettyJson } from "./utils.js";

const FIELD_COUNT_LIMIT = 50;

export type EsClientOptions = Pick<EsConfig, "url" | "index"> &
  Partial<Pick<EsConfig, "apiKey" | "username" | "password">> & {
    fetchImpl?: typeof fetch;
    now?: () => number;
  };

export function authorizationHeader(opts: Pick<EsClientOptions, "apiKey" | "username" | "password">): string | null {
  if (opts.apiKey) return `ApiKey ${opts.apiKey}`;
  if (opts.username) {
    return `Basic ${Buffer.from(`${opts.username}:${opts.password ?? ""}`).toString("base64")}`;
  }
  return null;
}

/** Verification failures that mean "no data yet" rather than a broken query. */
export function isEmptyStateError(error: unknown): boolean {
  if (!(error instanceof BackendError) || error.status !== 400) return false;
  return /Unknown index \[/.test(error.body) || /unsupported type/i.test(error.body);
}

interface RequestOptions {
  method: "GET" | "POST";
  path: string;
  body?: unknown;
  params?: Record<string, string>;
  signal: AbortSignal;
  /** Prefix for the error message on HTTP failures. */
  failure: string;
  /** Appended to the error message, usually the query text. */
  detail?: string;
}

export class EsqlDataSource implements DataSource {
  private index: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly auth: string | null;
  private readonly now: () => number;

  constructor(opts: EsClientOptions) {
    this.index = opts.index;
    this.baseUrl = opts.url.replace(/\/+$/, "");
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.auth = authorizationHeader(opts);
    this.now = opts.now ?? Date.now;
  }

  getIndex(): string {
    return this.index;
  }

  setIndex(index: string): void {
    this.index = index;
  }

  private async request({ method, path, body, params, signal, failure, detail }: RequestOptions): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, value);
    }
    const headers: Record<string, string> = { accept: "application/json" };
    if (body !== undefined) headers["content-type"] = "application/json";
    if (this.auth) headers.authorization = this.auth;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      throw new Error(`failed to reach ${this.baseUrl}`, { cause: error });
    }

    if (response.status >= 400) {
      const text = await response.text();
      const status = `${response.status} ${response.statusText}`.trim();
      const lines = [`${failure}: ${status}`, `Error: ${text}`];
      if (detail) lines.push("", "Query:", detail);
      throw new BackendError(lines.join("\n"), response.status, text);
    }
    const parsed: unknown = await response.json();
    return parsed;
  }

  async executeEsql(query: string, signal: AbortSignal): Promise<EsqlResult> {
    const body = await this.request({
      method: "POST",
      path: "/_query",
      body: { query },
      signal,
      failure: "ES|QL query failed",
      detail: query,
    });
    return parseEsqlResult(body);
  }

  private async docs(queries: { docs: string; count: string }, signal: AbortSignal): Promise<SearchResult> {
    const result = await this.executeEsql(queries.docs, signal);
    const entries = esqlRowsToEntries(result, this.now());
    let total = entries.length;
    try {
      total = esqlCount(await this.executeEsql(queries.count, signal));
    } catch (error) {
      // The count only decorates the header; a failed count keeps the page size.
      if (isAbortError(error)) throw error;
    }
    return { entries, total, query: queries.docs };
  }

  async tail(opts: TailOptions, signal: AbortSignal): Promise<SearchResult> {
    const dsl = buildTailDsl(opts);
    const query = prettyJson(dsl);
    const body = await this.request({
      method: "POST",
      path: `/${this.index}/_search`,
      body: dsl,
      signal,
      failure: "search failed",
      detail: query,
    });
    const { entries, total } = parseSearchHits(body, this.now());
    return { entries, total, query };
  }

  tailEsql(opts: TailOptions, signal: AbortSignal): Promise<SearchResult> {
    return this.docs(buildTailQueries(this.index, opts), signal);
  }

  searchEsql(query: string, opts: SearchOptions, signal: AbortSignal): Promise<SearchResult> {
    return this.docs(buildSearchQueries(this.index, query, opts), signal);
  }

  async countEsql(opts: TailOptions, signal: AbortSignal): Promise<CountResult> {
    const { count } = buildTailQueries(this.index, opts);
    return { total: esqlCount(await this.executeEsql(count, signal)), query: count };
  }

  async aggregateMetrics(opts: AggregateMetricsOptions, signal: AbortSignal): Promise<MetricsAggResult> {
    const caps = await this.request({
      method: "GET",
      path: `/${this.index}/_field_caps`,
      params: { fields: "metrics.*" },
      signal,
      failure: "metric field caps failed",
    });
    const fields = parseMetricFieldCaps(caps);
    if (fields.length === 0) {
      return { metrics: [], bucketSize: opts.bucketSize, query: "" };
    }

    const dsl = buildMetricsAggDsl(fields, opts);
    const query = prettyJson(dsl);
    const body = await this.request({
      method: "POST",
      path: `/${this.index}/_search`,
      body: dsl,
      signal,
      failure: "aggregation failed",
      detail: query,
    });
    return { metrics: parseMetricsAggResponse(body, fields), bucketSize: opts.bucketSize, query };
  }

  async getTransactionNames(opts: TransactionNamesOptions, signal: AbortSignal): Promise<TransactionNameAgg[]> {
    try {
      return parseTransactionNames(await this.executeEsql(buildTransactionNamesQuery(this.index, opts), signal));
    } catch (error) {
      if (isEmptyStateError(error)) return [];
      throw error;
    }
  }

  private async perspective(type: PerspectiveType, lookback: Lookback, signal: AbortSignal): Promise<PerspectiveItem[]> {
    const dsl = buildPerspectiveDsl(type, lookback);
    const body = await this.request({
      method: "POST",
      path: `/${PERSPECTIVE_INDEX}/_search`,
      body: dsl,
      signal,
      failure: "search error",
      detail: prettyJson(dsl),
    });
    return parsePerspectiveResponse(body);
  }

  getServices(lookback: Lookback, signal: AbortSignal): Promise<PerspectiveItem[]> {
    return this.perspective("services", lookback, signal);
  }

  getResources(lookback: Lookback, signal: AbortSignal): Promise<PerspectiveItem[]> {
    return this.perspective("resources", lookback, signal);
  }

  async getFieldCaps(signal: AbortSignal): Promise<FieldInfo[]> {
    const body = await this.request({
      method: "GET",
      path: `/${this.index}/_field_caps`,
      params: { fields: "*" },
      signal,
      failure: "field caps failed",
    });
    const fields = parseFieldCaps(body);
    await this.enrichFieldCounts(fields, signal);
    return fields;
  }

  // Counts are best effort; only the first FIELD_COUNT_LIMIT fields are probed.
  private async enrichFieldCounts(fields: FieldInfo[], signal: AbortSignal): Promise<void> {
    const probed = fields.slice(0, FIELD_COUNT_LIMIT);
    if (probed.length === 0) return;
    const aggs: Record<string, unknown> = {};
    probed.forEach((field, i) => {
      aggs[`f${i}`] = field.aggregatable
        ? { value_count: { field: field.name } }
        : { filter: { exists: { field: field.name } } };
    });

    let body: unknown;
    try {
      body = await this.request({
        method: "POST",
        path: `/${this.index}/_search`,
        body: { size: 0, aggs },
        signal,
        failure: "field counts failed",
      });
    } catch (error) {
      if (isAbortError(error)) throw error;
      return;
    }

    const results = asRecord(asRecord(body).aggregations);
    probed.forEach((field, i) => {
      const agg = asRecord(results[`f${i}`]);
      const value = asNumber(agg.value) ?? 0;
      field.docCount = value > 0 ? value : (asNumber(agg.doc_count) ?? 0);
    });
  }

  async ping(signal: AbortSignal): Promise<void> {
    await this.request({ method: "GET", path: "/", signal, failure: "ping failed" });
  }
}
