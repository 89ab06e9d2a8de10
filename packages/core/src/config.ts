import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type {
  AppConfig,
  CollectorConfig,
  ConnectionProfile,
  EsConfig,
  KibanaConfig,
  LogConfig,
  LogLevel,
  TuiConfig,
} from "@tailscope/contracts";
import { ConfigError, toError } from "./errors.js";
import { expandHome } from "./utils.js";

export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), ".tailscope");
export const DEFAULT_CONFIG_PATH = path.join(DEFAULT_CONFIG_DIR, "config.toml");

export const DEFAULT_CONFIG: AppConfig = {
  es: {
    url: "http://localhost:9200",
    index: "logs-*",
    apiKey: "",
    username: "",
    password: "",
    timeoutMs: 30_000,
  },
  kibana: {
    url: "http://localhost:5601",
    space: "",
  },
  tui: {
    tickIntervalMs: 2_000,
    logsTimeoutMs: 10_000,
    metricsTimeoutMs: 30_000,
    tracesTimeoutMs: 30_000,
    fieldCapsTimeoutMs: 10_000,
    autoDetectTimeoutMs: 30_000,
    chatTimeoutMs: 120_000,
    statusMessageMs: 2_000,
    autoRefresh: true,
    pageSize: 100,
  },
  log: {
    path: path.join(DEFAULT_CONFIG_DIR, "logs", "tailscope.log"),
    level: "info",
  },
  collector: {
    configPath: "",
    container: "otel-collector",
  },
};

export type PartialAppConfigInput = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

/** The config file: the app sections plus named connection profiles. */
export type ConfigFileInput = PartialAppConfigInput & {
  currentProfile?: string;
  profiles?: Record<string, ConnectionProfile>;
};

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function positiveMsOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.max(1, Math.round(numeric));
}

function stringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function optionalString(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function mergeEs(input?: Partial<EsConfig>): EsConfig {
  const defaults = DEFAULT_CONFIG.es;
  return {
    url: stringOrDefault(input?.url, defaults.url).replace(/\/+$/, ""),
    index: stringOrDefault(input?.index, defaults.index),
    apiKey: optionalString(input?.apiKey, defaults.apiKey),
    username: optionalString(input?.username, defaults.username),
    password: optionalString(input?.password, defaults.password),
    timeoutMs: positiveMsOrDefault(input?.timeoutMs, defaults.timeoutMs),
  };
}

function mergeKibana(input?: Partial<KibanaConfig>): KibanaConfig {
  const defaults = DEFAULT_CONFIG.kibana;
  return {
    url: stringOrDefault(input?.url, defaults.url).replace(/\/+$/, ""),
    space: optionalString(input?.space, defaults.space).trim(),
  };
}

function mergeTui(input?: Partial<TuiConfig>): TuiConfig {
  const defaults = DEFAULT_CONFIG.tui;
  return {
    tickIntervalMs: positiveMsOrDefault(input?.tickIntervalMs, defaults.tickIntervalMs),
    logsTimeoutMs: positiveMsOrDefault(input?.logsTimeoutMs, defaults.logsTimeoutMs),
    metricsTimeoutMs: positiveMsOrDefault(input?.metricsTimeoutMs, defaults.metricsTimeoutMs),
    tracesTimeoutMs: positiveMsOrDefault(input?.tracesTimeoutMs, defaults.tracesTimeoutMs),
    fieldCapsTimeoutMs: positiveMsOrDefault(input?.fieldCapsTimeoutMs, defaults.fieldCapsTimeoutMs),
    autoDetectTimeoutMs: positiveMsOrDefault(input?.autoDetectTimeoutMs, defaults.autoDetectTimeoutMs),
    chatTimeoutMs: positiveMsOrDefault(input?.chatTimeoutMs, defaults.chatTimeoutMs),
    statusMessageMs: positiveMsOrDefault(input?.statusMessageMs, defaults.statusMessageMs),
    autoRefresh: typeof input?.autoRefresh === "boolean" ? input.autoRefresh : defaults.autoRefresh,
    pageSize: positiveIntOrDefault(input?.pageSize, defaults.pageSize),
  };
}

function mergeLog(input?: Partial<LogConfig>): LogConfig {
  const defaults = DEFAULT_CONFIG.log;
  return {
    path: expandHome(stringOrDefault(input?.path, defaults.path)),
    level: isLogLevel(input?.level) ? input.level : defaults.level,
  };
}

function mergeCollector(input?: Partial<CollectorConfig>): CollectorConfig {
  const defaults = DEFAULT_CONFIG.collector;
  return {
    configPath: optionalString(input?.configPath, defaults.configPath).trim(),
    container: stringOrDefault(input?.container, defaults.container),
  };
}

export function mergeConfig(input?: PartialAppConfigInput): AppConfig {
  return {
    es: mergeEs(input?.es),
    kibana: mergeKibana(input?.kibana),
    tui: mergeTui(input?.tui),
    log: mergeLog(input?.log),
    collector: mergeCollector(input?.collector),
  };
}

function parseBool(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") return true;
  if (normalized === "0" || normalized === "false" || normalized === "no") return false;
  return undefined;
}

function parseNumber(value: string): number | undefined {
  const numeric = Number(value);
  return value.trim() !== "" && Number.isFinite(numeric) ? numeric : undefined;
}

/** Reads TAILSCOPE_* variables into a partial config; unset variables leave the section untouched. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PartialAppConfigInput {
  const es: Partial<EsConfig> = {};
  const kibana: Partial<KibanaConfig> = {};
  const tui: Partial<TuiConfig> = {};
  const log: Partial<LogConfig> = {};
  const collector: Partial<CollectorConfig> = {};

  if (env.TAILSCOPE_ES_URL) es.url = env.TAILSCOPE_ES_URL;
  if (env.TAILSCOPE_ES_INDEX) es.index = env.TAILSCOPE_ES_INDEX;
  if (env.TAILSCOPE_ES_API_KEY) es.apiKey = env.TAILSCOPE_ES_API_KEY;
  if (env.TAILSCOPE_ES_USERNAME) es.username = env.TAILSCOPE_ES_USERNAME;
  if (env.TAILSCOPE_ES_PASSWORD) es.password = env.TAILSCOPE_ES_PASSWORD;
  if (env.TAILSCOPE_KIBANA_URL) kibana.url = env.TAILSCOPE_KIBANA_URL;
  if (env.TAILSCOPE_KIBANA_SPACE) kibana.space = env.TAILSCOPE_KIBANA_SPACE;
  const tickIntervalMs = parseNumber(env.TAILSCOPE_TICK_INTERVAL_MS ?? "");
  if (tickIntervalMs !== undefined) tui.tickIntervalMs = tickIntervalMs;
  const autoRefresh = parseBool(env.TAILSCOPE_AUTO_REFRESH ?? "");
  if (autoRefresh !== undefined) tui.autoRefresh = autoRefresh;
  if (env.TAILSCOPE_LOG_PATH) log.path = env.TAILSCOPE_LOG_PATH;
  if (env.TAILSCOPE_LOG_LEVEL && isLogLevel(env.TAILSCOPE_LOG_LEVEL)) log.level = env.TAILSCOPE_LOG_LEVEL;
  if (env.TAILSCOPE_COLLECTOR_CONFIG) collector.configPath = env.TAILSCOPE_COLLECTOR_CONFIG;

  return { es, kibana, tui, log, collector };
}

/** Layers partial configs left to right; later layers win per key. */
export function layerConfig(...layers: PartialAppConfigInput[]): PartialAppConfigInput {
  const out: PartialAppConfigInput = {};
  for (const layer of layers) {
    out.es = { ...out.es, ...layer.es };
    out.kibana = { ...out.kibana, ...layer.kibana };
    out.tui = { ...out.tui, ...layer.tui };
    out.log = { ...out.log, ...layer.log };
    out.collector = { ...out.collector, ...layer.collector };
  }
  return out;
}

const ENV_REF = /^\$\{([^}]+)\}$/;
const CREDENTIAL_FIELDS = ["apiKey", "username", "password"] as const;

/** Expands a value that is exactly `${VAR}`; undefined when VAR is unset. Other values pass through. */
export function expandEnvRef(value: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const name = ENV_REF.exec(value)?.[1];
  return name === undefined ? value : env[name];
}

/**
 * Picks the named profile (or the file's `currentProfile`) and returns its settings as a config
 * layer with credential references expanded. No profile selected yields an empty layer.
 */
export function resolveProfile(
  file: ConfigFileInput,
  name?: string,
  env: NodeJS.ProcessEnv = process.env,
): PartialAppConfigInput {
  const selected = name || file.currentProfile;
  if (!selected) return {};
  const profiles = file.profiles ?? {};
  const profile = Object.hasOwn(profiles, selected) ? profiles[selected] : undefined;
  if (!profile) {
    throw new ConfigError(`profile "${selected}" not found`);
  }
  const es = { ...profile.es };
  for (const field of CREDENTIAL_FIELDS) {
    const raw = es[field];
    if (typeof raw !== "string") continue;
    const value = expandEnvRef(raw, env);
    if (value === undefined) {
      throw new ConfigError(`profile "${selected}": undefined environment variable in ${field}: ${raw}`);
    }
    es[field] = value;
  }
  return { es, kibana: { ...profile.kibana } };
}

export async function readConfigFile(configPath = DEFAULT_CONFIG_PATH): Promise<ConfigFileInput> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw new ConfigError(`cannot read config ${configPath}: ${toError(error).message}`);
  }
  try {
    return TOML.parse(raw) as ConfigFileInput;
  } catch (error) {
    throw new ConfigError(`invalid config ${configPath}: ${toError(error).message}`);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  overrides?: PartialAppConfigInput;
  /** Profile to apply; falls back to TAILSCOPE_PROFILE, then the file's `currentProfile`. `false` skips profiles. */
  profile?: string | false;
}

/**
 * File, then the active profile, then environment, then explicit overrides (CLI flags).
 * A missing file yields defaults.
 */
export async function loadConfig(configPath = DEFAULT_CONFIG_PATH, options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const fromFile = await readConfigFile(configPath);
  const fromProfile =
    options.profile === false ? {} : resolveProfile(fromFile, options.profile || env.TAILSCOPE_PROFILE, env);
  return mergeConfig(layerConfig(fromFile, fromProfile, configFromEnv(env), options.overrides ?? {}));
}

/** Writes `config`, keeping any profiles passed in `keep` alongside it. */
export async function saveConfig(
  config: AppConfig,
  configPath = DEFAULT_CONFIG_PATH,
  keep: Pick<ConfigFileInput, "currentProfile" | "profiles"> = {},
): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const file: ConfigFileInput = { ...config };
  if (keep.currentProfile) file.currentProfile = keep.currentProfile;
  if (keep.profiles) file.profiles = keep.profiles;
  const content = TOML.stringify(file as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}
