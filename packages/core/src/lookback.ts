import type { Lookback } from "@tailscope/contracts";

export const LOOKBACKS: readonly Lookback[] = ["5m", "1h", "24h", "1w", "all"];

interface LookbackSpec {
  durationMs: number | null;
  esRange: string | null;
  esqlInterval: string | null;
  esqlBucket: string;
  histogramInterval: string;
  kibanaFrom: string;
}

// "all" carries no time bound; Kibana has no unbounded range so it falls back to 30 days there.
const SPECS: Record<Lookback, LookbackSpec> = {
  "5m": {
    durationMs: 5 * 60_000,
    esRange: "now-5m",
    esqlInterval: "5 minutes",
    esqlBucket: "10 seconds",
    histogramInterval: "10s",
    kibanaFrom: "now-5m",
  },
  "1h": {
    durationMs: 60 * 60_000,
    esRange: "now-1h",
    esqlInterval: "1 hour",
    esqlBucket: "1 minute",
    histogramInterval: "1m",
    kibanaFrom: "now-1h",
  },
  "24h": {
    durationMs: 24 * 60 * 60_000,
    esRange: "now-24h",
    esqlInterval: "24 hours",
    esqlBucket: "30 minutes",
    histogramInterval: "5m",
    kibanaFrom: "now-24h",
  },
  "1w": {
    durationMs: 7 * 24 * 60 * 60_000,
    esRange: "now-1w",
    esqlInterval: "7 days",
    esqlBucket: "6 hours",
    histogramInterval: "30m",
    kibanaFrom: "now-7d",
  },
  all: {
    durationMs: null,
    esRange: null,
    esqlInterval: null,
    esqlBucket: "1 day",
    histogramInterval: "1d",
    kibanaFrom: "now-30d",
  },
};

export function isLookback(value: string): value is Lookback {
  return value === "5m" || value === "1h" || value === "24h" || value === "1w" || value === "all";
}

export function nextLookback(current: Lookback): Lookback {
  const idx = LOOKBACKS.indexOf(current);
  return LOOKBACKS[(idx + 1) % LOOKBACKS.length] ?? "5m";
}

export function lookbackDurationMs(lookback: Lookback): number | null {
  return SPECS[lookback].durationMs;
}

/** Date-math lower bound for Query DSL range filters, or null when unbounded. */
export function lookbackEsRange(lookback: Lookback): string | null {
  return SPECS[lookback].esRange;
}

export function lookbackEsqlInterval(lookback: Lookback): string | null {
  return SPECS[lookback].esqlInterval;
}

export function lookbackEsqlBucket(lookback: Lookback): string {
  return SPECS[lookback].esqlBucket;
}

/** `fixed_interval` for date_histogram aggregations. */
export function lookbackBucketSize(lookback: Lookback): string {
  return SPECS[lookback].histogramInterval;
}

export function lookbackKibanaFrom(lookback: Lookback): string {
  return SPECS[lookback].kibanaFrom;
}

export function describeLookback(lookback: Lookback): string {
  switch (lookback) {
    case "5m":
      return "last 5 minutes";
    case "1h":
      return "last hour";
    case "24h":
      return "last 24 hours";
    case "1w":
      return "last week";
    case "all":
      return "all time";
  }
}
