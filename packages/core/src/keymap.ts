import type { MetricsViewMode, SignalType, TraceViewLevel, ViewMode } from "@tailscope/contracts";

export type Action =
  | "scrollUp"
  | "scrollDown"
  | "pageUp"
  | "pageDown"
  | "goTop"
  | "goBottom"
  | "prevItem"
  | "nextItem"
  | "select"
  | "back"
  | "quit"
  | "help"
  | "refresh"
  | "search"
  | "cycleLookback"
  | "cycleSignal"
  | "perspective"
  | "copy"
  | "json"
  | "kibana"
  | "sort"
  | "fields"
  | "query"
  | "autoRefresh"
  | "toggle"
  | "spans"
  | "nextDoc"
  | "prevDoc"
  | "chat"
  | "creds"
  | "collector";

// Uppercase keys carry the less common actions.
export const DEFAULT_KEY_BINDINGS: Readonly<Record<string, Action>> = {
  up: "scrollUp",
  k: "scrollUp",
  down: "scrollDown",
  j: "scrollDown",
  pgup: "pageUp",
  pgdown: "pageDown",
  home: "goTop",
  g: "goTop",
  end: "goBottom",
  G: "goBottom",
  left: "prevItem",
  right: "nextItem",
  enter: "select",
  esc: "back",
  backspace: "back",
  q: "quit",
  "?": "help",
  r: "refresh",
  "/": "search",
  l: "cycleLookback",
  m: "cycleSignal",
  p: "perspective",
  y: "copy",
  K: "kibana",
  f: "fields",
  Q: "query",
  a: "autoRefresh",
  space: "toggle",
  s: "sort",
  J: "json",
  S: "spans",
  n: "nextDoc",
  N: "prevDoc",
  c: "chat",
  C: "creds",
  O: "collector",
};

export function getAction(key: string): Action | null {
  return Object.hasOwn(DEFAULT_KEY_BINDINGS, key) ? (DEFAULT_KEY_BINDINGS[key] ?? null) : null;
}

const LIST_NAV_ACTIONS: ReadonlySet<Action> = new Set(["scrollUp", "scrollDown", "pageUp", "pageDown", "goTop", "goBottom"]);

export function isListNavAction(action: Action | null): boolean {
  return action !== null && LIST_NAV_ACTIONS.has(action);
}

export type KeyKind = "quick" | "full";

export interface KeyBinding {
  keys: string[];
  label: string;
  kind: KeyKind;
  group: string;
}

export interface KeymapContext {
  mode: ViewMode;
  /** The mode beneath the help overlay, used when `mode` is `help`. */
  underlying: ViewMode | null;
  signal: SignalType;
  traceViewLevel: TraceViewLevel;
  metricsViewMode: MetricsViewMode;
}

const QUICK_LIMIT = 7;

function quick(keys: string[], label: string, group: string): KeyBinding {
  return { keys, label, kind: "quick", group };
}

function full(keys: string[], label: string, group: string): KeyBinding {
  return { keys, label, kind: "full", group };
}

function logsKeymap(ctx: KeymapContext): KeyBinding[] {
  const bindings = [
    quick(["j", "k"], "scroll", "Navigation"),
    quick(["enter"], "details", "View"),
    quick(["/"], "search", "Filter"),
    quick(["l"], "lookback", "Filter"),
    quick(["m"], "signal", "View"),
  ];
  const extra: KeyBinding[] = [];
  if (ctx.signal === "metrics" && ctx.metricsViewMode === "documents") {
    extra.push(full(["d"], "dashboard", "View"));
  }
  if (ctx.signal === "traces" && ctx.traceViewLevel !== "names") {
    extra.push(full(["esc"], "back", "Navigation"));
  }
  return [
    ...bindings,
    ...extra,
    full(["p"], "perspective", "View"),
    full(["s"], "sort", "View"),
    full(["f"], "fields", "View"),
    full(["Q"], "query", "View"),
    full(["K"], "kibana", "View"),
    full(["r"], "refresh", "View"),
    full(["a"], "auto refresh", "View"),
    full(["t"], "time format", "View"),
    full(["i"], "index", "Filter"),
    full(["0-4"], "level filters", "Filter"),
    full(["c"], "chat", "View"),
    full(["O"], "collector config", "System"),
    full(["q"], "quit", "System"),
  ];
}

function detailKeymap(ctx: KeymapContext): KeyBinding[] {
  const bindings = [
    quick(["↑", "↓"], "scroll", "Navigation"),
    quick(["←", "→"], "prev/next", "Navigation"),
    quick(["J"], "JSON", "View"),
    quick(["y"], "copy", "Clipboard"),
    quick(["esc"], "close", "Navigation"),
  ];
  if (ctx.signal === "traces") {
    bindings.push(full(["S"], "spans", "View"));
  }
  return bindings;
}

/** Full keymap for the active view; views with text input have none. */
export function viewKeymap(ctx: KeymapContext): KeyBinding[] {
  const mode = ctx.mode === "help" && ctx.underlying ? ctx.underlying : ctx.mode;
  switch (mode) {
    case "logs":
      return logsKeymap(ctx);
    case "detail":
      return detailKeymap(ctx);
    case "detailJson":
      return [
        quick(["↑", "↓"], "scroll", "Navigation"),
        quick(["←", "→"], "prev/next", "Navigation"),
        quick(["J"], "details", "View"),
        quick(["y"], "copy", "Clipboard"),
        quick(["esc"], "close", "Navigation"),
      ];
    case "metricsDashboard":
      return [
        quick(["j", "k"], "scroll", "Navigation"),
        quick(["enter"], "detail", "View"),
        quick(["l"], "lookback", "Filter"),
        quick(["p"], "perspective", "View"),
        quick(["m"], "signal", "View"),
        full(["r"], "refresh", "View"),
        full(["d"], "documents", "View"),
        full(["K"], "kibana", "View"),
        full(["q"], "quit", "System"),
      ];
    case "metricDetail":
      return [
        quick(["←", "→"], "prev/next metric", "Navigation"),
        quick(["N", "n"], "prev/next doc", "Navigation"),
        quick(["J"], "JSON", "View"),
        quick(["y"], "copy", "Clipboard"),
        quick(["esc"], "back", "Navigation"),
        full(["r"], "refresh", "View"),
        full(["K"], "kibana", "View"),
      ];
    case "traceNames":
      return [
        quick(["j", "k"], "scroll", "Navigation"),
        quick(["enter"], "select", "View"),
        quick(["l"], "lookback", "Filter"),
        quick(["p"], "perspective", "View"),
        quick(["m"], "signal", "View"),
        full(["r"], "refresh", "View"),
        full(["q"], "quit", "System"),
      ];
    case "perspectiveList":
      return [
        quick(["j", "k"], "scroll", "Navigation"),
        quick(["enter"], "include/exclude", "Filter"),
        quick(["p"], "cycle", "View"),
        quick(["l"], "lookback", "Filter"),
        quick(["esc"], "back", "Navigation"),
        full(["r"], "refresh", "View"),
        full(["q"], "quit", "System"),
      ];
    case "fields":
      return [
        quick(["j", "k"], "scroll", "Navigation"),
        quick(["space", "enter"], "toggle", "View"),
        quick(["/"], "filter", "Filter"),
        quick(["r"], "reset", "View"),
        quick(["esc"], "close", "Navigation"),
      ];
    case "errorModal":
      return [
        quick(["j", "k"], "scroll", "Navigation"),
        quick(["pgup", "pgdown"], "page", "Navigation"),
        quick(["g", "G"], "top/bottom", "Navigation"),
        quick(["y"], "copy", "Clipboard"),
        quick(["esc"], "close", "Navigation"),
      ];
    case "query":
      return [
        quick(["k", "c"], "kibana/curl", "View"),
        quick(["y"], "copy", "Clipboard"),
        quick(["esc"], "close", "Navigation"),
      ];
    default:
      return [];
  }
}

export function helpEnabled(mode: ViewMode): boolean {
  switch (mode) {
    case "logs":
    case "detail":
    case "fields":
    case "metricsDashboard":
    case "metricDetail":
    case "traceNames":
    case "perspectiveList":
    case "help":
      return true;
    default:
      return false;
  }
}

export function quickBindings(ctx: KeymapContext): KeyBinding[] {
  const bindings = viewKeymap(ctx).filter((binding) => binding.kind === "quick");
  const withHelp = helpEnabled(ctx.mode) ? [quick(["?"], "help", "Help"), ...bindings] : bindings;
  return withHelp.slice(0, QUICK_LIMIT);
}
