import type { LogEntry } from "@tailscope/contracts";
import { asNumber, asRecord, getPath, parseEpochMs } from "./utils.js";

function nonEmptyString(value: unknown): string {
  return typeof value === "string" && value !== "" ? value : "";
}

function firstString(raw: Record<string, unknown>, paths: readonly string[]): string {
  for (const candidate of paths) {
    const value = nonEmptyString(getPath(raw, candidate));
    if (value) return value;
  }
  return "";
}

function extractMessage(raw: Record<string, unknown>): string {
  const body = raw.body;
  if (body && typeof body === "object") {
    const text = nonEmptyString(asRecord(body).text);
    if (text) return text;
  }
  return nonEmptyString(body) || nonEmptyString(raw.message) || nonEmptyString(raw.event_name);
}

// OTel severity numbers: 1-4 TRACE, 5-8 DEBUG, 9-12 INFO, 13-16 WARN, 17-20 ERROR, 21+ FATAL.
export function severityFromNumber(severity: number): string {
  if (severity <= 4) return "TRACE";
  if (severity <= 8) return "DEBUG";
  if (severity <= 12) return "INFO";
  if (severity <= 16) return "WARN";
  if (severity <= 20) return "ERROR";
  return "FATAL";
}

function extractLevel(raw: Record<string, unknown>): string {
  const text = firstString(raw, ["severity_text", "log.level", "level"]);
  if (text) return text;
  const severity = asNumber(raw.severity_number);
  return severity === null ? "" : severityFromNumber(severity);
}

const SERVICE_PATHS = [
  "resource.attributes.service.name",
  "resource.service.name",
  "attributes.service.name",
  "service.name",
] as const;

const RESOURCE_PATHS = [
  "resource.attributes.service.namespace",
  "resource.attributes.deployment.environment",
  "resource.attributes.host.name",
  "resource.attributes.k8s.namespace.name",
  "resource.attributes.cloud.region",
  "resource.service.namespace",
  "resource.deployment.environment",
  "resource.host.name",
] as const;

function extractDurationMs(raw: Record<string, unknown>): number | null {
  const nanos = asNumber(raw.duration);
  if (nanos !== null) return nanos / 1_000_000;
  for (const micros of ["transaction.duration.us", "span.duration.us"]) {
    const value = asNumber(getPath(raw, micros));
    if (value !== null) return value / 1000;
  }
  return null;
}

function collectMetrics(value: unknown, prefix: string, out: Record<string, number>): void {
  for (const [key, child] of Object.entries(asRecord(value))) {
    const name = prefix ? `${prefix}.${key}` : key;
    if (typeof child === "number" && Number.isFinite(child)) {
      out[name] = child;
    } else if (child && typeof child === "object" && !Array.isArray(child)) {
      collectMetrics(child, name, out);
    }
  }
}

/**
 * Builds an entry from any document shape, from bare `message` lines to OTel semconv records.
 * Fields that cannot be found are left empty; the raw document is always kept.
 */
export function extractLogEntry(raw: Record<string, unknown>, nowMs = Date.now()): LogEntry {
  const metrics: Record<string, number> = {};
  collectMetrics(raw.metrics, "", metrics);

  return {
    timestampMs: parseEpochMs(raw["@timestamp"]) ?? nowMs,
    level: extractLevel(raw),
    message: extractMessage(raw),
    serviceName: firstString(raw, SERVICE_PATHS),
    resource: firstString(raw, RESOURCE_PATHS),
    traceId: firstString(raw, ["trace_id", "trace.id"]),
    spanId: firstString(raw, ["span_id", "span.id"]),
    name: firstString(raw, ["name", "transaction.name", "span.name"]),
    kind: nonEmptyString(raw.kind),
    statusCode: firstString(raw, ["status.code", "event.outcome"]),
    durationMs: extractDurationMs(raw),
    processorEvent: firstString(raw, ["processor.event", "attributes.processor.event"]),
    metrics,
    raw,
  };
}

export function entryLevel(entry: LogEntry): string {
  return entry.level || "INFO";
}

export function entryMessage(entry: LogEntry): string {
  return entry.message || entry.name;
}

export function formatDurationMs(durationMs: number | null): string {
  if (durationMs === null || durationMs <= 0) return "";
  return durationMs < 1 ? durationMs.toFixed(3) : durationMs.toFixed(1);
}
