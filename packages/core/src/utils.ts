import os from "node:os";
import path from "node:path";

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return {};
}

export function asString(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function asNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return null;
}

export function parseEpochMs(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    if (value > 1_000_000_000_000) {
      return Math.floor(value);
    }
    if (value > 1_000_000_000) {
      return Math.round(value * 1000);
    }
  }
  if (typeof value === "string" && value.trim()) {
    const numeric = Number(value);
    if (Number.isFinite(numeric) && numeric > 1_000_000_000_000) {
      return Math.floor(numeric);
    }
    const parsed = Date.parse(value);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
  }
  return null;
}

/** Reads `a.b.c` either as a flat dotted key or as nested objects. */
export function getPath(source: Record<string, unknown>, dottedKey: string): unknown {
  if (dottedKey in source) return source[dottedKey];
  const parts = dottedKey.split(".");
  let cursor: unknown = source;
  for (let i = 0; i < parts.length; i += 1) {
    const record = asRecord(cursor);
    const rest = parts.slice(i).join(".");
    if (i > 0 && rest in record) return record[rest];
    const part = parts[i];
    if (part === undefined || !(part in record)) return undefined;
    cursor = record[part];
  }
  return cursor;
}

export function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  if (parts.length === 0) return;

  let cursor: Record<string, unknown> = target;
  for (let i = 0; i < parts.length - 1; i += 1) {
    const key = parts[i];
    if (!key) continue;
    const next = cursor[key];
    if (!next || typeof next !== "object" || Array.isArray(next)) {
      cursor[key] = {};
    }
    cursor = asRecord(cursor[key]);
  }
  const lastKey = parts[parts.length - 1];
  if (!lastKey) return;
  cursor[lastKey] = value;
}

export function truncateText(value: string, maxLen: number): string {
  if (maxLen <= 0) return "";
  if (value.length <= maxLen) {
    return value;
  }
  if (maxLen === 1) return "…";
  return `${value.slice(0, maxLen - 1)}…`;
}

export function compactText(value: unknown, maxLen = 220): string {
  const oneLine = asString(value).replace(/\s+/g, " ").trim();
  return truncateText(oneLine, maxLen);
}

export function prettyJson(value: unknown): string {
  try {
    return JSON.stringify(value, null, 2);
  } catch {
    return asString(value);
  }
}
