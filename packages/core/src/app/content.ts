import type { ChatMessage, LogEntry } from "@tailscope/contracts";
import type { KeyBinding } from "../keymap.js";
import { entryLevel, formatDurationMs } from "../logEntry.js";
import { prettyJson } from "../utils.js";

/** Hard-wraps each line at `width` columns, breaking on spaces where possible. */
export function wrapText(text: string, width: number): string[] {
  const limit = Math.max(10, width);
  const out: string[] = [];
  for (const line of text.split("\n")) {
    let rest = line;
    while (rest.length > limit) {
      const space = rest.lastIndexOf(" ", limit);
      const cut = space > 0 ? space : limit;
      out.push(rest.slice(0, cut));
      rest = rest.slice(cut).replace(/^ /, "");
    }
    out.push(rest);
  }
  return out;
}

function labelled(label: string, value: string): string {
  return `${`${label}:`.padEnd(12)}${value}`;
}

export function detailContent(entry: LogEntry, width: number): string {
  const lines = [labelled("Timestamp", new Date(entry.timestampMs).toISOString()), labelled("Level", entryLevel(entry))];
  const optional: Array<[string, string]> = [
    ["Service", entry.serviceName],
    ["Resource", entry.resource],
    ["Name", entry.name],
    ["Kind", entry.kind],
    ["Status", entry.statusCode],
    ["Duration", entry.durationMs === null ? "" : `${formatDurationMs(entry.durationMs)} ms`],
    ["Trace ID", entry.traceId],
    ["Span ID", entry.spanId],
    ["Event", entry.processorEvent],
  ];
  for (const [label, value] of optional) {
    if (value) lines.push(labelled(label, value));
  }

  if (entry.message) {
    lines.push("", "Message:", ...wrapText(entry.message, width));
  }

  const metricNames = Object.keys(entry.metrics).sort();
  if (metricNames.length > 0) {
    lines.push("", "Metrics:");
    for (const name of metricNames) {
      lines.push(`  ${name}: ${String(entry.metrics[name])}`);
    }
  }
  return lines.join("\n");
}

export function detailJsonContent(entry: LogEntry): string {
  return prettyJson(entry.raw);
}

export function helpContent(bindings: KeyBinding[]): string {
  const groups = new Map<string, KeyBinding[]>();
  for (const binding of bindings) {
    const list = groups.get(binding.group) ?? [];
    list.push(binding);
    groups.set(binding.group, list);
  }
  const lines: string[] = [];
  for (const [group, list] of groups) {
    if (lines.length > 0) lines.push("");
    lines.push(group);
    for (const binding of list) {
      lines.push(`  ${binding.keys.join("/").padEnd(12)}${binding.label}`);
    }
  }
  lines.push("", "  ?           close help", "  ctrl+c      quit");
  return lines.join("\n");
}

export function chatContent(messages: ChatMessage[], loading: boolean, width: number): string {
  const lines: string[] = [];
  for (const message of messages) {
    if (lines.length > 0) lines.push("");
    const who = message.role === "user" ? "You" : message.error ? "Assistant (error)" : "Assistant";
    lines.push(`${who}:`);
    lines.push(...wrapText(message.content, width - 2).map((line) => `  ${line}`));
  }
  if (loading) {
    if (lines.length > 0) lines.push("");
    lines.push("Thinking...");
  }
  return lines.join("\n");
}
