import type {
  AggregateMetricsOptions,
  AggregatedMetric,
  FieldInfo,
  Lookback,
  LogEntry,
  MetricBucket,
  PerspectiveItem,
  PerspectiveType,
  TailOptions,
} from "@tailscope/contracts";
import { extractLogEntry } from "./logEntry.js";
import { lookbackEsRange } from "./lookback.js";
import { asArray, asNumber, asRecord, asString, getPath } from "./utils.js";

type Clause = Record<string, unknown>;

export const MAX_METRICS = 50;
export const PERSPECTIVE_INDEX = "logs-*,traces-*,metrics-*";

const METRIC_TYPES = new Set([
  "long",
  "double",
  "float",
  "half_float",
  "scaled_float",
  "histogram",
  "aggregate_metric_double",
]);

export interface MetricField {
  name: string;
  shortName: string;
  /** `time_series_metric` when the mapping declares one, otherwise the field type. */
  type: string;
}

function rangeClause(lookback: Lookback | undefined): Clause | null {
  const gte = lookback ? lookbackEsRange(lookback) : null;
  return gte ? { range: { "@timestamp": { gte } } } : null;
}

function eitherTerm(fields: readonly string[], value: string): Clause {
  return {
    bool: {
      should: fields.map((field) => ({ term: { [field]: value } })),
      minimum_should_match: 1,
    },
  };
}

export function buildTailDsl(opts: TailOptions): Clause {
  const must: Clause[] = [];
  const mustNot: Clause[] = [];

  const range = rangeClause(opts.lookback);
  if (range) must.push(range);
  if (opts.service) {
    const clause = eitherTerm(["resource.attributes.service.name", "resource.service.name"], opts.service);
    (opts.negateService ? mustNot : must).push(clause);
  }
  if (opts.resource) {
    const clause = { term: { "resource.attributes.deployment.environment": opts.resource } };
    (opts.negateResource ? mustNot : must).push(clause);
  }
  if (opts.level) must.push(eitherTerm(["severity_text", "level"], opts.level));
  if (opts.processorEvent) must.push({ term: { "attributes.processor.event": opts.processorEvent } });
  if (opts.transactionName) must.push(eitherTerm(["transaction.name", "name"], opts.transactionName));
  if (opts.traceId) must.push({ term: { trace_id: opts.traceId } });
  if (opts.metricField) must.push({ exists: { field: opts.metricField } });

  const bool: Clause = { must };
  if (mustNot.length > 0) bool.must_not = mustNot;
  return {
    size: opts.size > 0 ? opts.size : 100,
    sort: [{ "@timestamp": opts.sortAsc ? "asc" : "desc" }],
    query: { bool },
  };
}

export function parseSearchHits(body: unknown, nowMs = Date.now()): { entries: LogEntry[]; total: number } {
  const hits = asRecord(asRecord(body).hits);
  const entries = asArray(hits.hits).map((hit) => extractLogEntry(asRecord(asRecord(hit)._source), nowMs));
  const total = asNumber(asRecord(hits.total).value) ?? entries.length;
  return { entries, total };
}

/** `fields=*` capabilities; internal `_` fields are skipped and the first mapped type wins. */
export function parseFieldCaps(body: unknown): FieldInfo[] {
  const out: FieldInfo[] = [];
  for (const [name, types] of Object.entries(asRecord(asRecord(body).fields))) {
    if (name.startsWith("_")) continue;
    const first = Object.values(asRecord(types))[0];
    if (first === undefined) continue;
    const info = asRecord(first);
    out.push({
      name,
      type: asString(info.type),
      searchable: info.searchable === true,
      aggregatable: info.aggregatable === true,
      docCount: 0,
    });
  }
  return out.sort((a, b) => a.name.localeCompare(b.name));
}

export function parseMetricFieldCaps(body: unknown): MetricField[] {
  const out: MetricField[] = [];
  for (const [name, types] of Object.entries(asRecord(asRecord(body).fields))) {
    const first = Object.values(asRecord(types))[0];
    if (first === undefined) continue;
    const info = asRecord(first);
    const type = asString(info.type);
    if (info.aggregatable !== true || !METRIC_TYPES.has(type)) continue;
    out.push({
      name,
      shortName: name.startsWith("metrics.") ? name.slice("metrics.".length) : name,
      type: asString(info.time_series_metric) || type,
    });
  }
  return out.sort((a, b) => (a.shortName < b.shortName ? -1 : a.shortName > b.shortName ? 1 : 0)).slice(0, MAX_METRICS);
}

export function buildMetricsAggDsl(fields: readonly MetricField[], opts: AggregateMetricsOptions): Clause {
  const aggs: Clause = {};
  fields.forEach((field, i) => {
    aggs[`m${i}`] = {
      filter: { exists: { field: field.name } },
      aggs: {
        stats: { extended_stats: { field: field.name } },
        over_time: {
          date_histogram: { field: "@timestamp", fixed_interval: opts.bucketSize },
          aggs: { value: { avg: { field: field.name } } },
        },
        latest: {
          top_hits: { size: 1, sort: [{ "@timestamp": "desc" }], _source: [field.name] },
        },
      },
    };
  });

  const filter: Clause[] = [];
  const mustNot: Clause[] = [];
  const range = rangeClause(opts.lookback);
  if (range) filter.push(range);
  if (opts.service) {
    (opts.negateService ? mustNot : filter).push({ term: { "service.name": opts.service } });
  }
  if (opts.resource) {
    const clause = { term: { "resource.attributes.deployment.environment": opts.resource } };
    (opts.negateResource ? mustNot : filter).push(clause);
  }

  const query: Clause = { size: 0, aggs };
  if (filter.length > 0 || mustNot.length > 0) {
    const bool: Clause = {};
    if (filter.length > 0) bool.filter = filter;
    if (mustNot.length > 0) bool.must_not = mustNot;
    query.query = { bool };
  }
  return query;
}

function parseBuckets(overTime: unknown): MetricBucket[] {
  return asArray(asRecord(overTime).buckets).map((raw) => {
    const bucket = asRecord(raw);
    return {
      timestampMs: asNumber(bucket.key) ?? 0,
      value: asNumber(asRecord(bucket.value).value),
      count: asNumber(bucket.doc_count) ?? 0,
    };
  });
}

export function parseMetricsAggResponse(body: unknown, fields: readonly MetricField[]): AggregatedMetric[] {
  const aggs = asRecord(asRecord(body).aggregations);
  const out: AggregatedMetric[] = [];
  fields.forEach((field, i) => {
    const key = `m${i}`;
    if (!(key in aggs)) return;
    const metric = asRecord(aggs[key]);
    const stats = asRecord(metric.stats);
    const latestHit = asRecord(asArray(asRecord(asRecord(metric.latest).hits).hits)[0]);
    out.push({
      name: field.name,
      shortName: field.shortName,
      type: field.type,
      min: asNumber(stats.min),
      max: asNumber(stats.max),
      avg: asNumber(stats.avg),
      latest: asNumber(getPath(asRecord(latestHit._source), field.name)),
      buckets: parseBuckets(metric.over_time),
    });
  });
  return out;
}

export function perspectiveField(type: PerspectiveType): string {
  return type === "services" ? "service.name" : "resource.attributes.deployment.environment";
}

export function buildPerspectiveDsl(type: PerspectiveType, lookback: Lookback): Clause {
  const range = rangeClause(lookback);
  return {
    size: 0,
    query: { bool: { filter: range ? [range] : [] } },
    aggs: {
      items: {
        terms: { field: perspectiveField(type), size: 100 },
        aggs: {
          logs: {
            filter: {
              bool: {
                must_not: [{ term: { "processor.event": "transaction" } }, { term: { "processor.event": "span" } }],
              },
            },
          },
          traces: { filter: { term: { "processor.event": "transaction" } } },
          metrics: { filter: { exists: { field: "metrics" } } },
        },
      },
    },
  };
}

export function parsePerspectiveResponse(body: unknown): PerspectiveItem[] {
  const items = asRecord(asRecord(asRecord(body).aggregations).items);
  const out: PerspectiveItem[] = [];
  for (const raw of asArray(items.buckets)) {
    const bucket = asRecord(raw);
    const name = typeof bucket.key === "string" ? bucket.key : "";
    if (!name) continue;
    const count = (key: string) => asNumber(asRecord(bucket[key]).doc_count) ?? 0;
    out.push({ name, logCount: count("logs"), traceCount: count("traces"), metricCount: count("metrics") });
  }
  return out;
}
