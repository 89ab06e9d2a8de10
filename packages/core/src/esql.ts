import type { LogEntry, SearchOptions, TailOptions, TransactionNameAgg, TransactionNamesOptions } from "@tailscope/contracts";
import { lookbackEsqlInterval } from "./lookback.js";
import { extractLogEntry } from "./logEntry.js";
import { asArray, asNumber, asRecord, asString, parseEpochMs, setPath } from "./utils.js";

export const DEFAULT_SEARCH_FIELDS = ["body.text", "message", "event_name"] as const;
export const DEFAULT_DOCS_LIMIT = 100;

export interface EsqlColumn {
  name: string;
  type: string;
}

export interface EsqlResult {
  columns: EsqlColumn[];
  values: unknown[][];
}

export function escapeEsqlString(value: string): string {
  return value.replaceAll('"', '\\"');
}

function quoted(value: string): string {
  return `"${escapeEsqlString(value)}"`;
}

export function buildSearchClause(query: string, fields: readonly string[] = []): string {
  if (!query) return "";
  const targets = fields.length > 0 ? fields : DEFAULT_SEARCH_FIELDS;
  const pattern = `"*${escapeEsqlString(query)}*"`;
  return `(${targets.map((field) => `COALESCE(${field}, "") LIKE ${pattern}`).join(" OR ")})`;
}

/** WHERE conditions shared by document, count and Kibana queries, in a fixed order. */
export function buildCommonFilters(opts: Omit<TailOptions, "size">, searchClause = ""): string[] {
  const parts: string[] = [];
  const interval = opts.lookback ? lookbackEsqlInterval(opts.lookback) : null;
  if (interval) {
    parts.push(`@timestamp >= NOW() - ${interval}`);
  }
  if (opts.service) {
    parts.push(`service.name ${opts.negateService ? "!=" : "=="} ${quoted(opts.service)}`);
  }
  if (opts.resource) {
    parts.push(`resource.attributes.deployment.environment ${opts.negateResource ? "!=" : "=="} ${quoted(opts.resource)}`);
  }
  if (opts.level) {
    const level = quoted(opts.level);
    parts.push(`(COALESCE(severity_text, "") == ${level} OR COALESCE(log.level, "") == ${level})`);
  }
  if (opts.processorEvent) {
    parts.push(`processor.event == ${quoted(opts.processorEvent)}`);
  }
  if (opts.transactionName) {
    const name = quoted(opts.transactionName);
    parts.push(`(transaction.name == ${name} OR name == ${name})`);
  }
  if (opts.traceId) {
    const traceId = quoted(opts.traceId);
    parts.push(`(trace.id == ${traceId} OR trace_id == ${traceId})`);
  }
  if (opts.metricField) {
    parts.push(`\`${opts.metricField}\` IS NOT NULL`);
  }
  if (searchClause) {
    parts.push(searchClause);
  }
  return parts;
}

function whereLine(parts: readonly string[]): string {
  return parts.length > 0 ? `WHERE ${parts.join(" AND ")}` : "WHERE true";
}

export function buildDocsQuery(index: string, parts: readonly string[], size: number, sortAsc = false): string {
  const limit = size > 0 ? size : DEFAULT_DOCS_LIMIT;
  return [
    `FROM ${index}`,
    `| ${whereLine(parts)}`,
    `| SORT @timestamp ${sortAsc ? "ASC" : "DESC"}`,
    `| LIMIT ${limit}`,
    "| KEEP *",
  ].join("\n");
}

export function buildCountQuery(index: string, parts: readonly string[]): string {
  return [`FROM ${index}`, `| ${whereLine(parts)}`, "| STATS total = COUNT(*)"].join("\n");
}

export function buildTailQueries(index: string, opts: TailOptions): { docs: string; count: string } {
  const parts = buildCommonFilters(opts);
  return { docs: buildDocsQuery(index, parts, opts.size, opts.sortAsc), count: buildCountQuery(index, parts) };
}

export function buildSearchQueries(index: string, query: string, opts: SearchOptions): { docs: string; count: string } {
  const parts = buildCommonFilters(opts, buildSearchClause(query, opts.searchFields));
  return { docs: buildDocsQuery(index, parts, opts.size, opts.sortAsc), count: buildCountQuery(index, parts) };
}

export function buildTransactionNamesQuery(index: string, opts: TransactionNamesOptions): string {
  const parts = ['processor.event == "transaction"', ...buildCommonFilters({ ...opts, level: "" })];
  return [
    `FROM ${index}`,
    `| WHERE ${parts.join(" AND ")}`,
    "| STATS tx_count = COUNT(*), unique_traces = COUNT_DISTINCT(trace.id), " +
      "min_duration = MIN(transaction.duration.us), avg_duration = AVG(transaction.duration.us), " +
      "max_duration = MAX(transaction.duration.us), " +
      'error_count = COUNT(CASE(event.outcome == "failure", 1, null)), last_seen = MAX(@timestamp) ' +
      "BY transaction.name",
    "| EVAL error_rate = error_count / tx_count * 100",
    "| SORT tx_count DESC",
    "| LIMIT 100",
  ].join("\n");
}

export function parseEsqlResult(body: unknown): EsqlResult {
  const record = asRecord(body);
  const columns = asArray(record.columns).map((column) => {
    const entry = asRecord(column);
    return { name: asString(entry.name), type: asString(entry.type) };
  });
  const values = asArray(record.values).map((row) => asArray(row));
  return { columns, values };
}

/** Rebuilds nested documents from column names and fills the flat id aliases entries read. */
export function esqlRowToDocument(columns: readonly EsqlColumn[], row: readonly unknown[]): Record<string, unknown> {
  const doc: Record<string, unknown> = {};
  columns.forEach((column, i) => {
    if (i < row.length) setPath(doc, column.name, row[i]);
  });

  const aliases: Array<[string, string, string]> = [
    ["trace", "id", "trace_id"],
    ["span", "id", "span_id"],
    ["transaction", "name", "name"],
  ];
  for (const [parent, child, flat] of aliases) {
    const nested = asRecord(doc[parent]);
    if (child in nested && !(flat in doc)) {
      doc[flat] = nested[child];
    }
  }
  return doc;
}

export function esqlRowsToEntries(result: EsqlResult, nowMs = Date.now()): LogEntry[] {
  return result.values.map((row) => extractLogEntry(esqlRowToDocument(result.columns, row), nowMs));
}

export function esqlCount(result: EsqlResult): number {
  const first = result.values[0]?.[0];
  return asNumber(first) ?? 0;
}

function columnReader(result: EsqlResult): (row: readonly unknown[], name: string) => unknown {
  const indexes = new Map(result.columns.map((column, i) => [column.name, i]));
  return (row, name) => {
    const idx = indexes.get(name);
    return idx === undefined ? undefined : row[idx];
  };
}

// Durations are stored in microseconds.
export function parseTransactionNames(result: EsqlResult): TransactionNameAgg[] {
  const read = columnReader(result);
  const out: TransactionNameAgg[] = [];
  for (const row of result.values) {
    const name = asString(read(row, "transaction.name"));
    if (!name) continue;
    out.push({
      name,
      count: asNumber(read(row, "tx_count")) ?? 0,
      traceCount: asNumber(read(row, "unique_traces")) ?? 0,
      minDurationMs: (asNumber(read(row, "min_duration")) ?? 0) / 1000,
      avgDurationMs: (asNumber(read(row, "avg_duration")) ?? 0) / 1000,
      maxDurationMs: (asNumber(read(row, "max_duration")) ?? 0) / 1000,
      errorRate: asNumber(read(row, "error_rate")) ?? 0,
      lastSeenMs: parseEpochMs(read(row, "last_seen")),
    });
  }
  return out;
}
