import type { KibanaConfig, Lookback, QueryFormat } from "@tailscope/contracts";
import { escapeEsqlString } from "./esql.js";
import { lookbackEsqlBucket, lookbackEsqlInterval, lookbackKibanaFrom } from "./lookback.js";

export const DEFAULT_KIBANA_URL = "http://localhost:5601";

/** Form encoding: spaces become `+`, everything outside `[A-Za-z0-9-_.~]` is percent-encoded. */
export function queryEscape(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, "+");
}

function baseUrl(kibana: Pick<KibanaConfig, "url">): string {
  return (kibana.url || DEFAULT_KIBANA_URL).replace(/\/+$/, "");
}

export function buildDiscoverUrl(kibana: KibanaConfig, esqlQuery: string, lookback: Lookback): string {
  const appPath = kibana.space ? `/s/${kibana.space}/app/discover` : "/app/discover";
  const globalState = `(filters:!(),refreshInterval:(pause:!t,value:60000),time:(from:${lookbackKibanaFrom(lookback)},to:now))`;
  const appState =
    "(columns:!('@timestamp'),dataSource:(type:esql),filters:!(),interval:auto," +
    `query:(esql:'${queryEscape(esqlQuery)}'),sort:!())`;
  return `${baseUrl(kibana)}${appPath}#/?_g=${globalState}&_a=${appState}`;
}

export function buildSpaceUrl(kibana: KibanaConfig): string {
  return kibana.space ? `${baseUrl(kibana)}/s/${kibana.space}` : baseUrl(kibana);
}

// Discover needs a bounded range, so "all" is shown as the last 30 days.
function kibanaInterval(lookback: Lookback): string {
  return lookbackEsqlInterval(lookback) ?? "30 days";
}

/**
 * Time-series query for one metric. Counters and histograms cannot be averaged in ES|QL, so
 * those only chart document counts.
 */
export function buildMetricKibanaQuery(index: string, metricName: string, metricType: string, lookback: Lookback): string {
  const interval = kibanaInterval(lookback);
  const bucket = lookbackEsqlBucket(lookback);
  if (metricType !== "histogram" && metricType !== "counter") {
    return [
      `FROM ${index}`,
      `| WHERE @timestamp >= NOW() - ${interval}`,
      `| STATS doc_count = COUNT(*), avg_val = AVG(\`${metricName}\`) BY bucket = DATE_TRUNC(${bucket}, @timestamp)`,
      "| SORT bucket",
    ].join("\n");
  }
  return [
    `FROM ${index}`,
    `| WHERE @timestamp >= NOW() - ${interval} AND \`${metricName}\` IS NOT NULL`,
    `| STATS doc_count = COUNT(*) BY bucket = DATE_TRUNC(${bucket}, @timestamp)`,
    "| SORT bucket",
  ].join("\n");
}

export function buildTraceKibanaQuery(index: string, traceId: string, lookback: Lookback): string {
  const id = escapeEsqlString(traceId);
  return [
    `FROM ${index}`,
    `| WHERE @timestamp >= NOW() - ${kibanaInterval(lookback)} AND (trace.id == "${id}" OR trace_id == "${id}")`,
    "| SORT @timestamp ASC",
    "| LIMIT 1000",
  ].join("\n");
}

function isDslQuery(query: string): boolean {
  return query.trimStart().startsWith("{");
}

function compactJson(text: string): string {
  try {
    return JSON.stringify(JSON.parse(text));
  } catch {
    return text;
  }
}

/** Copyable form of the last query: Dev Tools console syntax or a curl command. */
export function formatQueryText(format: QueryFormat, query: string, index: string, esUrl: string): string {
  const dsl = isDslQuery(query);
  const path = dsl ? `/${index}/_search` : "/_query";
  const body = dsl ? query : JSON.stringify({ query }, null, 2);
  if (format === "kibana") {
    return `${dsl ? "GET" : "POST"} ${path}\n${body}`;
  }
  const url = `${esUrl.replace(/\/+$/, "")}${path}`;
  return `curl -X ${dsl ? "GET" : "POST"} '${url}' \\\n  -H 'Content-Type: application/json' \\\n  -d '${compactJson(body)}'`;
}
